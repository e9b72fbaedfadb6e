/**
 * Localization context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { LocalizerConfig } from "./config";
import type { DocumentDescriptor } from "./files";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { RunContext } from "../localizer";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  ImageIssue,
  ResourceIssue,
  FileIssueReason,
  ImageIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "../utils/tracker";

export interface LocalizationContext {
  // Input - provided at initialization
  root: string;
  config: LocalizerConfig;
  tracker: Tracker;
  logger: Logger;
  run: RunContext; // Run-scoped download memo shared by every document
  dryRun?: boolean;
  verbose?: boolean;
  reportPath?: string; // Optional JSON report destination

  files?: DocumentDescriptor[]; // Written by the scanner
}
