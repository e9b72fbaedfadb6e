import path from "node:path";

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  "image/png": ".png",
  "image/apng": ".apng",
  "image/jpeg": ".jpg",
  "image/jpg": ".jpg",
  "image/pjpeg": ".jpg",
  "image/gif": ".gif",
  "image/webp": ".webp",
  "image/avif": ".avif",
  "image/svg+xml": ".svg",
  "image/bmp": ".bmp",
  "image/tiff": ".tiff",
  "image/x-icon": ".ico",
  "image/vnd.microsoft.icon": ".ico",
  "image/heic": ".heic",
};

const IMAGE_EXTENSIONS = new Set([
  ...Object.values(CONTENT_TYPE_EXTENSIONS),
  ".jpeg",
  ".jfif",
  ".tif",
  ".heif",
]);

const EXTENSION_PATTERN = /^\.[a-z0-9]{1,5}$/;

const DEFAULT_EXTENSION = ".bin";

/**
 * Whether `extension` (with leading dot, any case) names a known image format
 *
 * @example
 * isImageExtension(".PNG") // true
 * isImageExtension(".php") // false
 * isImageExtension(".jpg!thumb") // false
 */
export function isImageExtension(extension: string): boolean {
  const normalized = extension.toLowerCase();
  return (
    EXTENSION_PATTERN.test(normalized) && IMAGE_EXTENSIONS.has(normalized)
  );
}

/**
 * Map a Content-Type header to a file extension (with leading dot)
 */
function extensionFromContentType(
  contentType: string | null | undefined,
): string | null {
  if (!contentType) return null;
  const mime = contentType.split(";")[0].trim().toLowerCase();
  return CONTENT_TYPE_EXTENSIONS[mime] ?? null;
}

/**
 * Read an image file extension from the URL path
 */
function extensionFromUrl(url: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }
  const extension = path.posix.extname(pathname).toLowerCase();
  return isImageExtension(extension) ? extension : null;
}

/**
 * Infer a file extension for downloaded bytes
 * Preference: Content-Type header, then URL suffix, then ".bin"
 *
 * @example
 * inferExtension("image/png", "https://example.com/x") // ".png"
 * inferExtension("application/octet-stream", "https://example.com/x.gif") // ".gif"
 * inferExtension(null, "https://example.com/x") // ".bin"
 */
export function inferExtension(
  contentType: string | null | undefined,
  url: string,
): string {
  return (
    extensionFromContentType(contentType) ??
    extensionFromUrl(url) ??
    DEFAULT_EXTENSION
  );
}
