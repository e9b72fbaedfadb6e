/**
 * Central type exports
 */

// Configuration
export type {
  LocalizerConfig,
  PartialLocalizerConfig,
  InputConfig,
  ImagesConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  LocalizerConfigSchema,
  PartialLocalizerConfigSchema,
} from "./config";

// Files
export type { DocumentDescriptor, DocumentReport } from "./files";

// References
export type {
  ImageReference,
  MarkdownImageReference,
  HtmlImageReference,
  FetchFailureReason,
  DownloadStatus,
  DownloadRecord,
  OutcomeStatus,
  ReferenceOutcome,
  LocalizedDocument,
} from "./references";

// Context
export type {
  LocalizationContext,
  Issue,
  IssueType,
  FileIssue,
  ImageIssue,
  ResourceIssue,
  FileIssueReason,
  ImageIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";
