/**
 * Image Fetcher
 * HTTP(S) GET with a bounded timeout and exponential backoff retries
 */

import { FetchError } from "../utils";
import type { RunContext } from "./run-context";

export interface FetchedImage {
  bytes: Buffer;
  contentType: string | null;
}

function toFetchError(error: unknown, timeout: number): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  if (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  ) {
    return new FetchError("timeout", `Timed out after ${timeout}ms`);
  }
  if (error instanceof Error) {
    // Node's fetch reports the socket-level problem in `cause`
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    return new FetchError("network-error", `${error.message}${cause}`);
  }
  return new FetchError("network-error", String(error));
}

async function attemptFetch(
  url: string,
  run: RunContext,
): Promise<FetchedImage> {
  const { timeout, maxSize, userAgent } = run.options;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await run.fetch(url, {
      signal: controller.signal,
      headers: {
        "user-agent": userAgent,
        accept: "image/*,*/*;q=0.8",
      },
    });

    if (!response.ok) {
      throw new FetchError(
        "http-status",
        `HTTP ${response.status}: ${response.statusText}`,
      );
    }

    const declaredSize = Number(response.headers.get("content-length"));
    if (declaredSize > maxSize) {
      throw new FetchError(
        "too-large",
        `Declared size ${declaredSize} exceeds limit of ${maxSize} bytes`,
      );
    }

    const bytes = Buffer.from(await response.arrayBuffer());
    if (bytes.length === 0) {
      throw new FetchError("empty-body", "Response body is empty");
    }
    if (bytes.length > maxSize) {
      throw new FetchError(
        "too-large",
        `Size ${bytes.length} exceeds limit of ${maxSize} bytes`,
      );
    }

    return { bytes, contentType: response.headers.get("content-type") };
  } catch (error) {
    throw toFetchError(error, timeout);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Download one image, retrying failed attempts
 * Always rejects with a FetchError
 */
export async function fetchImage(
  url: string,
  run: RunContext,
): Promise<FetchedImage> {
  const { retries, retryDelay } = run.options;
  let lastError = new FetchError("network-error", "Download failed");

  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      return await attemptFetch(url, run);
    } catch (error) {
      lastError = toFetchError(error, run.options.timeout);
      run.logger?.debug(
        `Attempt ${attempt + 1} failed for ${url}: ${lastError.message}`,
      );
      if (lastError.reason === "too-large") {
        break;
      }
      if (attempt < retries) {
        await new Promise((r) => setTimeout(r, retryDelay * 2 ** attempt));
      }
    }
  }

  throw lastError;
}
