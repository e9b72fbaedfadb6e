/**
 * Stats Module
 * Displays per-document results, failed URLs and overall totals
 */

import chalk from "chalk";
import type {
  DocumentReport,
  LocalizationContext,
  ProcessingStats,
} from "../types";
import type { Tracker } from "../utils";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a progress bar with percentage
 */
function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

/**
 * One-line summary for a document, e.g. "notes/a.md  3 localized · 1 failed"
 */
function documentLine(report: DocumentReport): string {
  const parts = [chalk.green(`${report.localized} localized`)];
  if (report.failed > 0) {
    parts.push(chalk.red(`${report.failed} failed`));
  }
  if (report.skipped > 0) {
    parts.push(chalk.yellow(`${report.skipped} skipped`));
  }
  return `   ${report.path}  ${parts.join(chalk.dim(" · "))}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export the optional JSON report and display statistics on the console
 */
export async function stats(ctx: LocalizationContext): Promise<void> {
  const { tracker, reportPath, verbose, dryRun } = ctx;
  if (reportPath) {
    await tracker.exportStats(reportPath);
  }

  const stats = tracker.getStats();
  const hasWarnings = stats.failedImages > 0;
  const hasErrors = stats.failedFiles > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = dryRun ? "Dry Run Complete" : "Localization Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayFilesSection(stats);
  displayImagesSection(stats);
  displayDocumentsSection(stats, verbose);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Files"));

  const bar = progressBar(
    stats.successfulFiles + stats.skippedFiles,
    stats.totalFiles,
  );
  console.log(`   ${bar}`);

  console.log(
    statRow(chalk.green("◉"), "Processed", stats.successfulFiles, chalk.green),
  );

  if (stats.skippedFiles > 0) {
    console.log(
      statRow(chalk.dim("◉"), "No remote images", stats.skippedFiles, chalk.dim),
    );
  }

  if (stats.failedFiles > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedFiles, chalk.red),
    );
  }
}

function displayImagesSection(stats: ProcessingStats): void {
  const totalImages =
    stats.downloadedImages +
    stats.cachedImages +
    stats.failedImages +
    stats.skippedImages;
  if (totalImages === 0) {
    return;
  }

  console.log(sectionHeader("Images"));

  const bar = progressBar(
    stats.downloadedImages + stats.cachedImages,
    totalImages,
  );
  console.log(`   ${bar}`);

  if (stats.downloadedImages > 0) {
    console.log(
      statRow(
        chalk.green("◉"),
        "Downloaded",
        stats.downloadedImages,
        chalk.green,
      ),
    );
  }

  if (stats.cachedImages > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Reused", stats.cachedImages, chalk.cyan),
    );
  }

  if (stats.skippedImages > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Skipped", stats.skippedImages, chalk.yellow),
    );
  }

  if (stats.failedImages > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedImages, chalk.red),
    );
  }
}

/**
 * Per-document counts; failed URLs are always listed so broken links can
 * be investigated by hand
 */
function displayDocumentsSection(
  stats: ProcessingStats,
  verbose?: boolean,
): void {
  const documents = verbose
    ? stats.documents
    : stats.documents.filter((d) => d.failed > 0);

  if (documents.length === 0) {
    return;
  }

  console.log(sectionHeader(verbose ? "Documents" : "Documents with failures"));

  for (const report of documents) {
    console.log(documentLine(report));
    for (const url of report.failedUrls) {
      console.log(`      ${chalk.dim("·")} ${chalk.red(url)}`);
    }
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const fileIssues = tracker.getFileIssues();
  const resourceIssues = tracker.getResourceIssues();

  if (fileIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (fileIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Files failed", fileIssues.length, chalk.red),
    );
    for (const issue of fileIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (verbose && issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Config failed",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    for (const issue of resourceIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}
