/**
 * Build the replacement text for a localized image reference
 */

import { replaceImageSource } from "./html-image";
import type { ImageReference } from "../types";

function escapeAlt(alt: string): string {
  return alt.replace(/[\\[\]]/g, "\\$&");
}

function escapeTitle(title: string): string {
  return title.replace(/["\\]/g, "\\$&");
}

/**
 * CommonMark ends a bare destination at whitespace or an unbalanced
 * parenthesis; angle brackets lift both restrictions
 */
function formatDestination(target: string): string {
  if (/[\s()<>]/.test(target)) {
    return `<${target.replace(/[<>]/g, encodeURIComponent)}>`;
  }
  return target;
}

/**
 * Render the same image construct pointing at `target`
 *
 * @example
 * renderReference(ref, "images/logo.png") // "![logo](images/logo.png)"
 */
export function renderReference(
  reference: ImageReference,
  target: string,
): string {
  if (reference.kind === "html") {
    return replaceImageSource(reference.raw, target);
  }

  const title =
    reference.title === null ? "" : ` "${escapeTitle(reference.title)}"`;
  return `![${escapeAlt(reference.alt)}](${formatDestination(target)}${title})`;
}
