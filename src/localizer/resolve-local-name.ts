/**
 * Local Name Resolution
 * Picks a collision-free filename for each downloaded URL
 */

import { createHash } from "crypto";
import { readFile, stat } from "fs/promises";
import path from "node:path";
import {
  fileExists,
  inferExtension,
  isImageExtension,
  urlBasename,
} from "../utils";
import type { DownloadMemo } from "./run-context";
import type { FetchedImage } from "./fetch-image";

/**
 * Candidate filename for a fetched image
 * The URL basename when it ends in a known image extension, otherwise the
 * MD5 of the bytes plus an extension inferred from Content-Type or the URL
 *
 * @example
 * candidateName("https://example.com/a/logo.png", image) // "logo.png"
 * candidateName("https://example.com/render.php?id=7", pngImage) // "<md5>.png"
 */
export function candidateName(url: string, image: FetchedImage): string {
  const basename = urlBasename(url);
  if (isImageExtension(path.extname(basename))) {
    return basename;
  }

  const hash = createHash("md5").update(image.bytes).digest("hex");
  return `${hash}${inferExtension(image.contentType, url)}`;
}

export interface LocalSlot {
  path: string;
  // True when a file with identical bytes was already on disk
  existing: boolean;
}

async function hasSameBytes(
  filePath: string,
  bytes: Uint8Array,
): Promise<boolean> {
  const info = await stat(filePath);
  if (!info.isFile() || info.size !== bytes.byteLength) return false;
  const current = await readFile(filePath);
  return current.equals(bytes);
}

/**
 * Reserve a path in `directory` for `url`
 * Appends -1, -2, ... before the extension while the name is taken by
 * another URL in this run or by a different file already on disk. A file on
 * disk holding exactly `bytes` is reused instead of written again.
 *
 * The in-memory reservation happens before any await, so two concurrent
 * callers never receive the same path.
 */
export async function reserveLocalPath(
  directory: string,
  name: string,
  url: string,
  bytes: Uint8Array,
  memo: DownloadMemo,
): Promise<LocalSlot> {
  const { name: stem, ext } = path.parse(name);

  for (let counter = 0; ; counter++) {
    const filename = counter === 0 ? name : `${stem}-${counter}${ext}`;
    const candidate = path.resolve(directory, filename);

    if (memo.reserved.has(candidate)) continue;
    memo.reserved.set(candidate, url);

    if (await fileExists(candidate)) {
      let same: boolean;
      try {
        same = await hasSameBytes(candidate, bytes);
      } catch (error) {
        memo.reserved.delete(candidate);
        throw error;
      }
      if (same) {
        return { path: candidate, existing: true };
      }
      memo.reserved.set(candidate, "");
      continue;
    }

    return { path: candidate, existing: false };
  }
}

/**
 * Give back a reservation whose file was never written
 */
export function releaseLocalPath(localPath: string, memo: DownloadMemo): void {
  memo.reserved.delete(localPath);
}
