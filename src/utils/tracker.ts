/**
 * Localization Tracker
 * Unified tracking for stats, issues and per-document reports
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { ZodError } from "zod";
import { WriteError } from "./errors";
import type {
  DocumentReport,
  FetchFailureReason,
  ReferenceOutcome,
} from "../types";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type FileIssueReason = "read-error" | "write-error";
export type ImageIssueReason = FetchFailureReason;
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface ImageIssue {
  type: "image";
  path: string; // Remote URL
  document: string; // Document that referenced it
  reason: ImageIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = FileIssue | ImageIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  // File counts
  totalFiles: number;
  successfulFiles: number;
  failedFiles: number;
  skippedFiles: number;

  // Image counts (per reference)
  downloadedImages: number;
  cachedImages: number;
  failedImages: number;
  skippedImages: number;

  issues: Issue[];
  documents: DocumentReport[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

function mapFileError(
  error: unknown,
  context: "read" | "write" = "read",
): IssueInfo<FileIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof WriteError) {
    return { reason: "write-error", details };
  }

  return { reason: `${context}-error`, details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private successfulFiles = 0;
  private failedFiles = 0;
  private skippedFiles = 0;
  private downloadedImages = 0;
  private cachedImages = 0;
  private failedImages = 0;
  private skippedImages = 0;
  private issues: Issue[] = [];
  private documents: DocumentReport[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementSuccessful(): void {
    this.successfulFiles++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  incrementSkipped(): void {
    this.skippedFiles++;
  }

  // ============================================================================
  // Document reports
  // ============================================================================

  /**
   * Record the outcomes of one document and update image counters
   */
  trackDocument(path: string, outcomes: ReferenceOutcome[]): DocumentReport {
    const report: DocumentReport = {
      path,
      localized: 0,
      failed: 0,
      skipped: 0,
      failedUrls: [],
    };

    for (const outcome of outcomes) {
      switch (outcome.status) {
        case "localized": {
          report.localized++;
          if (outcome.cached) {
            this.cachedImages++;
          } else {
            this.downloadedImages++;
          }
          break;
        }
        case "failed": {
          report.failed++;
          this.failedImages++;
          const url = outcome.reference.url;
          if (!report.failedUrls.includes(url)) {
            report.failedUrls.push(url);
            this.issues.push({
              type: "image",
              path: url,
              document: path,
              reason: outcome.reason ?? "network-error",
              details: outcome.details,
            });
          }
          break;
        }
        case "skipped": {
          report.skipped++;
          this.skippedImages++;
          break;
        }
      }
    }

    this.documents.push(report);
    return report;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackError(
    path: string,
    error: unknown,
    type: "file" | "resource",
    context?: "read" | "write",
  ): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error, context);
        this.issues.push({ type: "file", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getFileIssues(): FileIssue[] {
    return this.issues.filter((i): i is FileIssue => i.type === "file");
  }

  getImageIssues(): ImageIssue[] {
    return this.issues.filter((i): i is ImageIssue => i.type === "image");
  }

  getResourceIssues(): ResourceIssue[] {
    return this.issues.filter(
      (i): i is ResourceIssue => i.type === "resource",
    );
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      successfulFiles: this.successfulFiles,
      failedFiles: this.failedFiles,
      skippedFiles: this.skippedFiles,
      downloadedImages: this.downloadedImages,
      cachedImages: this.cachedImages,
      failedImages: this.failedImages,
      skippedImages: this.skippedImages,
      issues: this.issues,
      documents: this.documents,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputPath: string): Promise<void> {
    const stats = this.getStats();

    const exported = {
      summary: {
        totalFiles: stats.totalFiles,
        successfulFiles: stats.successfulFiles,
        failedFiles: stats.failedFiles,
        skippedFiles: stats.skippedFiles,
        downloadedImages: stats.downloadedImages,
        cachedImages: stats.cachedImages,
        failedImages: stats.failedImages,
        skippedImages: stats.skippedImages,
        duration: stats.duration,
      },
      documents: stats.documents,
      issues: this.groupIssuesByTypeAndReason(),
    };

    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupIssuesByTypeAndReason(): {
    file: Record<string, FileIssue[]>;
    image: Record<string, ImageIssue[]>;
    resource: Record<string, ResourceIssue[]>;
  } {
    const grouped: {
      file: Record<string, FileIssue[]>;
      image: Record<string, ImageIssue[]>;
      resource: Record<string, ResourceIssue[]>;
    } = {
      file: {},
      image: {},
      resource: {},
    };

    for (const issue of this.issues) {
      switch (issue.type) {
        case "file": {
          (grouped.file[issue.reason] ??= []).push(issue);
          break;
        }
        case "image": {
          (grouped.image[issue.reason] ??= []).push(issue);
          break;
        }
        case "resource": {
          (grouped.resource[issue.reason] ??= []).push(issue);
          break;
        }
      }
    }

    return grouped;
  }
}

