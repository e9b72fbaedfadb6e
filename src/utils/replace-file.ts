import { randomBytes } from "crypto";
import { chmod, rename, rm, stat, writeFile } from "fs/promises";
import path from "node:path";

/**
 * Replace the contents of an existing file
 * The new text goes to a temporary sibling that is renamed over `filePath`,
 * so a failed write leaves the original as it was.
 */
export async function replaceFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding,
): Promise<void> {
  const { mode } = await stat(filePath);
  const temp = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${randomBytes(6).toString("hex")}.tmp`,
  );

  try {
    await writeFile(temp, data, { encoding, flag: "wx" });
    await chmod(temp, mode & 0o7777);
    await rename(temp, filePath);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}
