import path from "node:path";

// Characters that are unsafe in filenames on common platforms
const UNSAFE_FILENAME_CHARS = /[\\/:*?"<>|#%\s]+/g;

/**
 * Extract a filesystem-safe basename from a URL's path component
 * Returns an empty string when the path has no usable last segment
 *
 * @example
 * urlBasename("https://example.com/a/logo.png?v=2") // "logo.png"
 * urlBasename("https://example.com/a/my%20icon.png") // "my-icon.png"
 * urlBasename("https://example.com/") // ""
 */
export function urlBasename(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return "";
  }

  return decodeSegment(path.posix.basename(pathname))
    .replace(UNSAFE_FILENAME_CHARS, "-")
    .replace(/^[.-]+/, "")
    .replace(/-+$/, "");
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
