import path from "node:path";

/**
 * Path of a local file relative to a document's directory, "/" separated
 * so the link stays valid when the folder is moved or synced elsewhere
 *
 * @example
 * toRelativeLink("/notes", "/notes/images/logo.png") // "images/logo.png"
 * toRelativeLink("/notes/sub", "/notes/images/logo.png") // "../images/logo.png"
 */
export function toRelativeLink(documentDir: string, localPath: string): string {
  return path.relative(documentDir, localPath).split(path.sep).join("/");
}
