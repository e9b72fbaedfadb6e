/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export { process } from "./processor";
export { stats } from "./stats";
