/**
 * Localizer exports
 */

export { localizeDocument } from "./localize-document";
export type { DocumentSource } from "./localize-document";
export { createRunContext, createDownloadMemo } from "./run-context";
export type {
  RunContext,
  RunContextInit,
  FetchLike,
  LocalizerOptions,
  DownloadMemo,
} from "./run-context";
