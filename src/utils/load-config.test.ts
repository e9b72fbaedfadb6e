import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "node:path";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();

    expect(config.input.pattern).toBe("**/*.{md,markdown}");
    expect(config.images).toMatchObject({
      directory: "images",
      timeout: 15000,
      retries: 2,
    });
  });
});

describe("mergeConfig", () => {
  it("overrides individual keys and keeps the rest", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, { images: { directory: "assets" } });

    expect(merged.images.directory).toBe("assets");
    expect(merged.images.timeout).toBe(base.images.timeout);
    expect(merged.input).toEqual(base.input);
  });
});

describe("loadConfig", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it("applies a custom config file", async () => {
    dir = await mkdtemp(join(tmpdir(), "md-localize-config-"));
    const custom = join(dir, "custom.json");
    await writeFile(custom, JSON.stringify({ images: { directory: "assets", retries: 0 } }));

    const { config, errors } = await loadConfig(custom);

    expect(errors.filter((e) => e.path === custom)).toEqual([]);
    expect(config.images.directory).toBe("assets");
    expect(config.images.retries).toBe(0);
  });

  it("reports an invalid custom config instead of applying it", async () => {
    dir = await mkdtemp(join(tmpdir(), "md-localize-config-"));
    const custom = join(dir, "custom.json");
    await writeFile(custom, JSON.stringify({ images: { timeout: -5 } }));

    const { config, errors } = await loadConfig(custom);

    expect(errors.map((e) => e.path)).toContain(custom);
    expect(config.images.timeout).toBeGreaterThan(0);
  });
});
