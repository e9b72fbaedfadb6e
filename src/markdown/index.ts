/**
 * Markdown reference handling exports
 */

export { extractReferences } from "./extract-references";
export { renderReference } from "./render-reference";
