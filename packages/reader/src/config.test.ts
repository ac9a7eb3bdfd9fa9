/**
 * Tests for reader configuration: defaults, TOML file, env precedence.
 */

import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_MAX_FILE_BYTES, loadReaderConfig, resolveReaderConfig } from "./config";
import { ConfigError } from "./errors";

const SETTINGS = fileURLToPath(new URL("../fixtures/settings.toml", import.meta.url));

async function configError(load: Promise<unknown>): Promise<ConfigError> {
  try {
    await load;
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

// ---------------------------------------------------------------------------
// Defaults and sources
// ---------------------------------------------------------------------------

describe("loadReaderConfig", () => {
  it("fills in defaults with nothing configured", async () => {
    expect(await loadReaderConfig({ env: {} })).toEqual({
      inclusiveEnd: false,
      logDiagnostics: true,
      maxFileBytes: DEFAULT_MAX_FILE_BYTES,
    });
  });

  it("reads ALMANAC_* variables", async () => {
    const config = await loadReaderConfig({
      env: {
        ALMANAC_DEFAULT_TIMEZONE: "America/New_York",
        ALMANAC_INCLUSIVE_END: "yes",
        ALMANAC_LOG_DIAGNOSTICS: "0",
        ALMANAC_MAX_FILE_BYTES: "1024",
        UNRELATED: "ignored",
      },
    });

    expect(config).toEqual({
      defaultTimezone: "America/New_York",
      inclusiveEnd: true,
      logDiagnostics: false,
      maxFileBytes: 1024,
    });
  });

  it("reads a TOML file", async () => {
    expect(await loadReaderConfig({ env: {}, file: SETTINGS })).toEqual({
      defaultTimezone: "Europe/Paris",
      inclusiveEnd: true,
      logDiagnostics: true,
      maxFileBytes: 4096,
    });
  });

  it("lets environment variables win over the file", async () => {
    const config = await loadReaderConfig({
      env: { ALMANAC_INCLUSIVE_END: "false", ALMANAC_DEFAULT_TIMEZONE: "Asia/Tokyo" },
      file: SETTINGS,
    });

    expect(config.inclusiveEnd).toBe(false);
    expect(config.defaultTimezone).toBe("Asia/Tokyo");
    expect(config.maxFileBytes).toBe(4096);
  });
});

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe("loadReaderConfig: invalid settings", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "almanac-config-"));
    await writeFile(join(dir, "broken.toml"), "inclusive_end = \n", "utf-8");
    await writeFile(join(dir, "typed.toml"), 'inclusive_end = "sometimes"\n', "utf-8");
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("rejects an unknown time zone", async () => {
    const error = await configError(loadReaderConfig({ env: { ALMANAC_DEFAULT_TIMEZONE: "Mars/Olympus_Mons" } }));
    expect(error.issues).toEqual(["defaultTimezone: unknown IANA time zone"]);
  });

  it("rejects an unreadable flag", async () => {
    const error = await configError(loadReaderConfig({ env: { ALMANAC_INCLUSIVE_END: "maybe" } }));

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^ALMANAC_INCLUSIVE_END: /);
  });

  it("rejects a byte limit that is not a whole number", async () => {
    const error = await configError(loadReaderConfig({ env: { ALMANAC_MAX_FILE_BYTES: "10MB" } }));
    expect(error.issues).toEqual(["ALMANAC_MAX_FILE_BYTES: must be a whole number of bytes"]);
  });

  it("rejects a missing file", async () => {
    const missing = join(dir, "missing.toml");
    const error = await configError(loadReaderConfig({ env: {}, file: missing }));

    expect(error.issues).toEqual([`${missing}: cannot be read`]);
    expect(error.cause).toBeInstanceOf(Error);
  });

  it("rejects a file that is not TOML", async () => {
    const error = await configError(loadReaderConfig({ env: {}, file: join(dir, "broken.toml") }));
    expect(error.issues[0]).toMatch(/broken\.toml: /);
  });

  it("rejects a file setting of the wrong type", async () => {
    const file = join(dir, "typed.toml");
    const error = await configError(loadReaderConfig({ env: {}, file }));

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].startsWith(`${file}: inclusive_end: `)).toBe(true);
  });
});

describe("resolveReaderConfig", () => {
  it("rejects a non-positive byte limit", () => {
    expect(() => resolveReaderConfig({ maxFileBytes: 0 })).toThrow(ConfigError);
  });
});
