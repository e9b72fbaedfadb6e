/**
 * Image reference and download type definitions
 */

// ============================================================================
// Extractor
// ============================================================================

interface BaseImageReference {
  url: string; // Remote URL (http/https only)
  raw: string; // Exact source text of the whole image construct
  start: number; // Offset of the first character of `raw` in the document
  end: number; // Offset just past the last character of `raw`
}

/**
 * Inline Markdown image: ![alt](url "title")
 */
export interface MarkdownImageReference extends BaseImageReference {
  kind: "markdown";
  alt: string;
  title: string | null;
}

/**
 * Raw HTML image tag: <img src="url" ...>
 */
export interface HtmlImageReference extends BaseImageReference {
  kind: "html";
}

export type ImageReference = MarkdownImageReference | HtmlImageReference;

// ============================================================================
// Localizer
// ============================================================================

export type FetchFailureReason =
  | "timeout"
  | "network-error"
  | "http-status"
  | "empty-body"
  | "too-large";

export type DownloadStatus = "fetched" | "failed" | "skipped";

/**
 * Run-scoped memo entry, one per distinct remote URL
 */
export interface DownloadRecord {
  url: string;
  localPath: string | null; // Absolute path on disk (fetched only)
  status: DownloadStatus;
  reason?: FetchFailureReason;
  details?: string;
}

export type OutcomeStatus = "localized" | "failed" | "skipped";

export interface ReferenceOutcome {
  reference: ImageReference;
  status: OutcomeStatus;
  cached: boolean; // True when the record came from the memo
  localPath?: string; // Path written into the document (relative, "/" separated)
  reason?: FetchFailureReason;
  details?: string;
}

export interface LocalizedDocument {
  text: string;
  outcomes: ReferenceOutcome[];
}
