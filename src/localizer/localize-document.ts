/**
 * Localizer
 * Downloads every referenced image and rebuilds the document text with
 * each localized span replaced
 */

import path from "node:path";
import MagicString from "magic-string";
import { renderReference } from "../markdown";
import { toRelativeLink } from "../utils";
import { resolveRecord } from "./download";
import type { RunContext } from "./run-context";
import type {
  ImageReference,
  LocalizedDocument,
  ReferenceOutcome,
} from "../types";

export interface DocumentSource {
  path: string;
  text: string;
}

/**
 * Localize all references of one document
 *
 * Only the exact spans of localized references change; failed and skipped
 * references keep their original text. Throws WriteError when an image
 * cannot be stored, in which case the caller must discard the document.
 */
export async function localizeDocument(
  document: DocumentSource,
  references: ImageReference[],
  destinationDir: string,
  run: RunContext,
): Promise<LocalizedDocument> {
  const documentDir = path.dirname(path.resolve(document.path));
  const output = new MagicString(document.text);
  const outcomes: ReferenceOutcome[] = [];

  for (const reference of references) {
    const { record, cached } = await resolveRecord(
      reference.url,
      destinationDir,
      run,
    );

    if (record.status === "fetched" && record.localPath) {
      const target = toRelativeLink(documentDir, record.localPath);
      output.overwrite(
        reference.start,
        reference.end,
        renderReference(reference, target),
      );
      outcomes.push({ reference, status: "localized", cached, localPath: target });
      continue;
    }

    outcomes.push({
      reference,
      status: record.status === "skipped" ? "skipped" : "failed",
      cached,
      reason: record.reason,
      details: record.details,
    });
  }

  return { text: output.toString(), outcomes };
}
