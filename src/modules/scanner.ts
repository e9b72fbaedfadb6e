/**
 * Scanner Module
 * Validates the root directory and discovers Markdown documents
 */

import glob from "fast-glob";
import path from "node:path";
import { access, stat } from "fs/promises";
import { constants } from "node:fs";
import { InvalidInputPathError } from "../utils";
import type { LocalizationContext, DocumentDescriptor } from "../types";

/**
 * Ensure the root exists, is a directory, and is readable
 */
async function validateRoot(root: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(root)).isDirectory();
  } catch {
    throw new InvalidInputPathError(root, "does not exist");
  }

  if (!isDirectory) {
    throw new InvalidInputPathError(root, "is not a directory");
  }

  try {
    await access(root, constants.R_OK | constants.X_OK);
  } catch {
    throw new InvalidInputPathError(root, "is not readable");
  }
}

/**
 * Scans the root directory for Markdown files and populates context
 *
 * Writes to context:
 * - files: documents sorted by relative path, so name disambiguation
 *   is deterministic across runs
 */
export async function scan(ctx: LocalizationContext): Promise<void> {
  const root = path.resolve(ctx.root);
  await validateRoot(root);

  const markdownFiles = await glob(ctx.config.input.pattern, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    ignore: ctx.config.input.ignore,
  });

  const files: DocumentDescriptor[] = markdownFiles
    .map((filePath) => {
      const absolute = path.resolve(filePath);
      return {
        path: absolute,
        relativePath: path.relative(root, absolute),
        directory: path.dirname(absolute),
      };
    })
    .sort((a, b) => a.relativePath.localeCompare(b.relativePath));

  ctx.logger.debug(`Found ${files.length} Markdown files under ${root}`);
  ctx.files = files;
}
