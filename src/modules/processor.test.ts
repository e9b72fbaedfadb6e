import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  mkdir,
  mkdtemp,
  readdir,
  readFile,
  rename,
  rm,
  writeFile,
} from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "node:path";
import { scan } from "./scanner";
import { process } from "./processor";
import { createRunContext } from "../localizer";
import type { FetchLike } from "../localizer";
import {
  InvalidInputPathError,
  Logger,
  Tracker,
  loadDefaultConfig,
} from "../utils";
import type { LocalizationContext } from "../types";

vi.mock("fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("fs/promises")>();
  return { ...actual, rename: vi.fn(actual.rename) };
});

const LOGO = "https://example.com/logo.png";
const BROKEN = "https://bad.example/x.png";

function fakeFetch() {
  return vi.fn<FetchLike>(async (url) =>
    url === LOGO
      ? new Response("logo-bytes", { headers: { "content-type": "image/png" } })
      : new Response("oops", { status: 500, statusText: "Server Error" }),
  );
}

async function createContext(
  root: string,
  fetch: FetchLike,
  dryRun = false,
): Promise<LocalizationContext> {
  const defaults = await loadDefaultConfig();
  const config = {
    ...defaults,
    images: { ...defaults.images, retries: 0, retryDelay: 0 },
  };
  const logger = new Logger("error");

  return {
    root,
    config,
    tracker: new Tracker(),
    logger,
    run: createRunContext(config.images, { fetch, dryRun, logger }),
    dryRun,
  };
}

describe("scan + process", () => {
  let root: string;

  async function put(relativePath: string, content: string): Promise<void> {
    const path = join(root, relativePath);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, "utf-8");
  }

  async function read(relativePath: string): Promise<string> {
    return readFile(join(root, relativePath), "utf-8");
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "md-localize-run-"));
    await put("a.md", `![logo](${LOGO})\n`);
    await put("notes/b.md", `![logo](${LOGO}) ![x](${BROKEN})\n`);
    await put("plain.md", "No images here.\n");
    await put("node_modules/pkg/readme.md", `![logo](${LOGO})\n`);
    await put("notes/c.txt", `![logo](${LOGO})\n`);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("discovers Markdown files in path order and skips ignored directories", async () => {
    const ctx = await createContext(root, fakeFetch());
    await scan(ctx);

    expect(ctx.files?.map((f) => f.relativePath)).toEqual([
      "a.md",
      join("notes", "b.md"),
      "plain.md",
    ]);
  });

  it("rewrites documents and reports failed URLs per file", async () => {
    const fetch = fakeFetch();
    const ctx = await createContext(root, fetch);

    await scan(ctx);
    await process(ctx);

    expect(await read("a.md")).toBe("![logo](images/logo.png)\n");
    expect(await read("notes/b.md")).toBe(
      `![logo](../images/logo.png) ![x](${BROKEN})\n`,
    );
    expect(await read("plain.md")).toBe("No images here.\n");
    expect(fetch.mock.calls.filter(([url]) => url === LOGO)).toHaveLength(1);

    const stats = ctx.tracker.getStats();
    expect(stats).toMatchObject({
      totalFiles: 3,
      successfulFiles: 2,
      skippedFiles: 1,
      failedFiles: 0,
      downloadedImages: 1,
      cachedImages: 1,
      failedImages: 1,
    });
    expect(stats.documents).toEqual([
      { path: "a.md", localized: 1, failed: 0, skipped: 0, failedUrls: [] },
      {
        path: join("notes", "b.md"),
        localized: 1,
        failed: 1,
        skipped: 0,
        failedUrls: [BROKEN],
      },
    ]);
    expect(ctx.tracker.getImageIssues()).toEqual([
      {
        type: "image",
        path: BROKEN,
        document: join("notes", "b.md"),
        reason: "http-status",
        details: "HTTP 500: Server Error",
      },
    ]);
  });

  it("abandons a document whose images cannot be written and continues", async () => {
    const broken = `![other](https://example.com/other.png)\n`;
    await put("broken/doc.md", broken);
    await put("broken/images", "not a directory");
    const fetch = vi.fn<FetchLike>(async () => new Response("bytes"));
    const ctx = await createContext(root, fetch);

    await scan(ctx);
    await process(ctx);

    expect(await read("broken/doc.md")).toBe(broken);
    expect(await read("a.md")).toBe("![logo](images/logo.png)\n");
    expect(ctx.tracker.getStats().failedFiles).toBe(1);
    expect(ctx.tracker.getFileIssues()).toMatchObject([
      { type: "file", path: join("broken", "doc.md"), reason: "write-error" },
    ]);
  });

  it("reuses images saved by an earlier run instead of numbering them", async () => {
    const first = await createContext(root, fakeFetch());
    await scan(first);
    await process(first);

    await put("a.md", `![logo](${LOGO})\n`);
    const second = await createContext(root, fakeFetch());
    await scan(second);
    await process(second);

    expect(await read("a.md")).toBe("![logo](images/logo.png)\n");
    expect(await readdir(join(root, "images"))).toEqual(["logo.png"]);
  });

  it("keeps the original document when it cannot be replaced", async () => {
    vi.mocked(rename).mockRejectedValueOnce(
      new Error("ENOSPC: no space left on device"),
    );
    const ctx = await createContext(root, fakeFetch());

    await scan(ctx);
    await process(ctx);

    expect(await read("a.md")).toBe(`![logo](${LOGO})\n`);
    expect(await read("notes/b.md")).toBe(
      `![logo](../images/logo.png) ![x](${BROKEN})\n`,
    );
    expect((await readdir(root)).filter((name) => name.endsWith(".tmp"))).toEqual([]);
    expect(ctx.tracker.getFileIssues()).toMatchObject([
      { type: "file", path: "a.md", reason: "write-error" },
    ]);
  });

  it("leaves every file untouched in dry-run mode", async () => {
    const fetch = fakeFetch();
    const ctx = await createContext(root, fetch, true);

    await scan(ctx);
    await process(ctx);

    expect(await read("a.md")).toBe(`![logo](${LOGO})\n`);
    expect(fetch).not.toHaveBeenCalled();
    expect(ctx.tracker.getStats().skippedImages).toBe(3);
  });

  it("rejects a root that does not exist", async () => {
    const ctx = await createContext(join(root, "missing"), fakeFetch());
    await expect(scan(ctx)).rejects.toBeInstanceOf(InvalidInputPathError);
  });

  it("rejects a root that is a file", async () => {
    const ctx = await createContext(join(root, "a.md"), fakeFetch());
    await expect(scan(ctx)).rejects.toThrow("is not a directory");
  });
});
