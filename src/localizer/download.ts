/**
 * Memoized Download
 * At most one fetch per distinct URL per run; every reference to the same
 * URL resolves to the same record
 */

import path from "node:path";
import { FetchError } from "../utils";
import { fetchImage } from "./fetch-image";
import type { FetchedImage } from "./fetch-image";
import { persistImage } from "./persist-image";
import {
  candidateName,
  releaseLocalPath,
  reserveLocalPath,
} from "./resolve-local-name";
import type { RunContext } from "./run-context";
import type { DownloadRecord } from "../types";

export interface ResolvedRecord {
  record: DownloadRecord;
  cached: boolean;
}

async function download(
  url: string,
  directory: string,
  run: RunContext,
): Promise<DownloadRecord> {
  if (run.options.dryRun) {
    run.logger?.debug(`Dry run, not fetching ${url}`);
    return { url, localPath: null, status: "skipped" };
  }

  let image: FetchedImage;
  try {
    image = await fetchImage(url, run);
  } catch (error) {
    if (!(error instanceof FetchError)) throw error;
    run.logger?.warn(`Could not fetch ${url}: ${error.message}`);
    return {
      url,
      localPath: null,
      status: "failed",
      reason: error.reason,
      details: error.message,
    };
  }

  const slot = await reserveLocalPath(
    directory,
    candidateName(url, image),
    url,
    image.bytes,
    run.memo,
  );

  if (slot.existing) {
    run.logger?.debug(`Reusing ${slot.path} for ${url}`);
    return { url, localPath: slot.path, status: "fetched" };
  }

  try {
    await persistImage(slot.path, image.bytes);
  } catch (error) {
    releaseLocalPath(slot.path, run.memo);
    throw error;
  }

  run.logger?.debug(`Saved ${url} -> ${slot.path}`);
  return { url, localPath: slot.path, status: "fetched" };
}

/**
 * Look up `url` in the run memo, downloading into `directory` on a miss
 * A WriteError removes the memo entry so another document can try again
 */
export async function resolveRecord(
  url: string,
  directory: string,
  run: RunContext,
): Promise<ResolvedRecord> {
  const existing = run.memo.records.get(url);
  if (existing) {
    return { record: await existing, cached: true };
  }

  const pending = download(url, path.resolve(directory), run);
  run.memo.records.set(url, pending);

  try {
    return { record: await pending, cached: false };
  } catch (error) {
    run.memo.records.delete(url);
    throw error;
  }
}
