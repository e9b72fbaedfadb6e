/**
 * Image Persistence
 * Writes fetched bytes to disk without leaving partial files behind
 */

import { mkdir, open, rm } from "fs/promises";
import type { FileHandle } from "fs/promises";
import { dirname } from "node:path";
import { WriteError } from "../utils";

/**
 * Write `bytes` to a new file at `localPath`
 * The handle is closed on every path and a partially written file is removed.
 * Never overwrites an existing file.
 */
export async function persistImage(
  localPath: string,
  bytes: Uint8Array,
): Promise<void> {
  let handle: FileHandle;
  try {
    await mkdir(dirname(localPath), { recursive: true });
    handle = await open(localPath, "wx");
  } catch (error) {
    throw new WriteError(localPath, error);
  }

  let complete = false;
  try {
    await handle.writeFile(bytes);
    complete = true;
  } catch (error) {
    throw new WriteError(localPath, error);
  } finally {
    await handle.close();
    if (!complete) {
      await rm(localPath, { force: true });
    }
  }
}
