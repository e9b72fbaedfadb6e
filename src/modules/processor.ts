/**
 * Processor Module
 * Localizes documents one at a time and writes each back only after all
 * of its references have been handled
 */

import { readFile } from "fs/promises";
import { join } from "node:path";
import { extractReferences } from "../markdown";
import { localizeDocument } from "../localizer";
import { replaceFile, WriteError } from "../utils";
import type { DocumentDescriptor, LocalizationContext } from "../types";

/**
 * Destination directory for images referenced by `file`
 */
function destinationFor(
  ctx: LocalizationContext,
  file: DocumentDescriptor,
): string {
  return join(file.directory, ctx.config.images.directory);
}

export async function process(ctx: LocalizationContext): Promise<void> {
  if (!ctx.files) {
    throw new Error("Scanner must run before processor");
  }

  const { config, files, tracker, logger, run } = ctx;
  tracker.setTotalFiles(files.length);

  for (const file of files) {
    let text: string;
    try {
      text = await readFile(file.path, config.input.encoding);
    } catch (error) {
      tracker.trackError(file.relativePath, error, "file", "read");
      tracker.incrementFailed();
      continue;
    }

    const references = extractReferences(text);
    if (references.length === 0) {
      logger.debug(`No remote images in ${file.relativePath}`);
      tracker.incrementSkipped();
      continue;
    }

    try {
      const result = await localizeDocument(
        { path: file.path, text },
        references,
        destinationFor(ctx, file),
        run,
      );

      if (result.text !== text && !ctx.dryRun) {
        try {
          await replaceFile(file.path, result.text, config.input.encoding);
        } catch (error) {
          throw new WriteError(file.path, error);
        }
      }

      const report = tracker.trackDocument(file.relativePath, result.outcomes);
      logger.info(
        `${file.relativePath}: ${report.localized} localized, ${report.failed} failed`,
      );
      tracker.incrementSuccessful();
    } catch (error) {
      // Abandon this document only; its file on disk is left untouched
      tracker.trackError(file.relativePath, error, "file", "write");
      tracker.incrementFailed();
    }
  }
}
