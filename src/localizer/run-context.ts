/**
 * Run Context
 * Explicit, run-scoped state shared by every document in one invocation
 */

import type { Logger } from "../utils/logger";
import type { DownloadRecord, ImagesConfig } from "../types";

/**
 * Subset of the global fetch used for image downloads
 * Injected so tests can run without network access
 */
export type FetchLike = (
  url: string,
  init: { signal: AbortSignal; headers: Record<string, string> },
) => Promise<Response>;

export interface LocalizerOptions {
  timeout: number;
  retries: number;
  retryDelay: number;
  maxSize: number;
  userAgent: string;
  dryRun: boolean;
}

export interface DownloadMemo {
  // One promise per distinct remote URL; later lookups await the first
  records: Map<string, Promise<DownloadRecord>>;
  // Absolute local path -> URL that claimed it ("" for files already on disk)
  reserved: Map<string, string>;
}

export interface RunContext {
  memo: DownloadMemo;
  options: LocalizerOptions;
  fetch: FetchLike;
  logger?: Logger;
}

export interface RunContextInit {
  dryRun?: boolean;
  fetch?: FetchLike;
  logger?: Logger;
}

export function createDownloadMemo(): DownloadMemo {
  return {
    records: new Map(),
    reserved: new Map(),
  };
}

/**
 * Create an isolated run context from the images configuration
 */
export function createRunContext(
  images: Omit<ImagesConfig, "directory">,
  init: RunContextInit = {},
): RunContext {
  return {
    memo: createDownloadMemo(),
    options: {
      timeout: images.timeout,
      retries: images.retries,
      retryDelay: images.retryDelay,
      maxSize: images.maxSize,
      userAgent: images.userAgent,
      dryRun: init.dryRun ?? false,
    },
    fetch: init.fetch ?? ((url, options) => fetch(url, options)),
    logger: init.logger,
  };
}
