import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, it, expect, vi } from "vitest";
import {
  deepMerge,
  getBusyPatterns,
  getDataRoomRoot,
  getSupportedExtensions,
  loadConfig,
  loadConfigWithOverrides,
} from "../config";
import { ConfigurationError } from "../pipeline/errors";

describe("config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("loads successfully", () => {
    const config = loadConfig();
    expect(config.rasterize.dpi).toBe(200);
    expect(config.converter.command).toBe("soffice");
    expect(config.summarization.page_prompt).toBe("page_summary");
    expect(config.summarization.document_prompt).toBe("document_summary");
  });

  it("supports the common office formats", () => {
    const extensions = getSupportedExtensions(loadConfig());
    for (const ext of [".pdf", ".doc", ".docx", ".xls", ".xlsx", ".ppt", ".pptx"]) {
      expect(extensions.has(ext)).toBe(true);
    }
  });

  it("compiles busy patterns case-insensitively", () => {
    const patterns = getBusyPatterns(loadConfig());
    expect(patterns.some((re) => re.test("Resource Temporarily Unavailable"))).toBe(true);
    expect(patterns.some((re) => re.test("source file could not be loaded"))).toBe(false);
  });

  it("applies overrides on top of the file", () => {
    const config = loadConfigWithOverrides(undefined, {
      rasterize: { dpi: 300 },
      summarization: { concurrency: 8 },
    });
    expect(config.rasterize.dpi).toBe(300);
    expect(config.rasterize.concurrency).toBe(2);
    expect(config.summarization.concurrency).toBe(8);
    expect(config.summarization.max_attempts).toBe(4);
  });

  it("ignores overrides left undefined", () => {
    const config = loadConfigWithOverrides(undefined, {
      provider: undefined,
      rasterize: { dpi: undefined },
    });
    expect(config.provider).toBe("openai");
    expect(config.rasterize.dpi).toBe(200);
  });

  it("rejects out-of-range values", () => {
    expect(() => loadConfigWithOverrides(undefined, { rasterize: { dpi: 10 } })).toThrow(ConfigurationError);
    expect(() => loadConfigWithOverrides(undefined, { summarization: { concurrency: 0 } })).toThrow(
      ConfigurationError
    );
  });

  it("rejects an unknown provider", () => {
    expect(() => loadConfigWithOverrides(undefined, { provider: "nope" })).toThrow(ConfigurationError);
  });

  it("reports a missing config file", () => {
    const missing = path.join(os.tmpdir(), "no-such-dir", "config.yaml");
    expect(() => loadConfig(missing)).toThrow(`Config file not found: ${missing}`);
  });

  it("rejects a file that is not a mapping", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-test-"));
    const file = path.join(dir, "config.yaml");
    fs.writeFileSync(file, "- just\n- a list\n");
    try {
      expect(() => loadConfig(file)).toThrow(ConfigurationError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("resolves the output root from the environment first", () => {
    const config = loadConfig();
    vi.stubEnv("DATA_ROOM_ROOT", "/tmp/custom-room");
    expect(getDataRoomRoot(config)).toBe(path.resolve("/tmp/custom-room"));
  });

  it("falls back to output_dir", () => {
    const saved = process.env.DATA_ROOM_ROOT;
    delete process.env.DATA_ROOM_ROOT;
    try {
      const config = loadConfigWithOverrides(undefined, { output_dir: "rooms/a" });
      expect(getDataRoomRoot(config)).toBe(path.resolve("rooms/a"));
    } finally {
      if (saved !== undefined) process.env.DATA_ROOM_ROOT = saved;
    }
  });
});

describe("deepMerge", () => {
  it("merges nested objects and replaces arrays", () => {
    const merged = deepMerge(
      { a: { b: 1, c: 2 }, list: [1, 2], keep: "x" },
      { a: { c: 3 }, list: [9] }
    );
    expect(merged).toEqual({ a: { b: 1, c: 3 }, list: [9], keep: "x" });
  });
});
