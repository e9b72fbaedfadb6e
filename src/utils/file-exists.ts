import { access } from "fs/promises";
import { constants } from "node:fs";

/**
 * Check whether anything (file, directory, link) occupies a path
 * A parent that is not a directory counts as "nothing there"
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}
