/**
 * File-related type definitions
 */

export interface DocumentDescriptor {
  // Scanner fills these fields:
  path: string; // Absolute path to the Markdown document
  relativePath: string; // Relative path from input root
  directory: string; // Absolute directory containing the document
}

/**
 * Per-document result shown in the final summary
 */
export interface DocumentReport {
  path: string; // Relative path from input root
  localized: number;
  failed: number;
  skipped: number;
  failedUrls: string[];
}
