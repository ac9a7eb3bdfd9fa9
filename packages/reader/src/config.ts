/**
 * @almanac/reader -- configuration.
 *
 * Settings come from an optional TOML file and from ALMANAC_* environment
 * variables; a variable that is set wins over the file. The merged result
 * is validated with zod and defaults filled in.
 *
 * File keys: default_timezone, inclusive_end, log_diagnostics, max_file_bytes.
 */

import { readFile } from "node:fs/promises";
import { parse as parseToml, TomlError } from "smol-toml";
import { z } from "zod/v4";
import { intlZoneResolver } from "@almanac/core";
import { ConfigError } from "./errors";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const zones = intlZoneResolver();

function isKnownZone(zoneId: string): boolean {
  return zones.offsetAt(zoneId, 0) !== undefined;
}

export const DEFAULT_MAX_FILE_BYTES = 10 * 1024 * 1024;

export const ReaderConfigSchema = z.object({
  /** IANA zone floating times and all-day dates are read in. UTC when unset. */
  defaultTimezone: z.string().min(1).refine(isKnownZone, "unknown IANA time zone").optional(),
  /** Whether query windows include their end instant by default. */
  inclusiveEnd: z.boolean().default(false),
  /** Print parse and resolution diagnostics to the console. */
  logDiagnostics: z.boolean().default(true),
  /** Files larger than this are refused before being read. */
  maxFileBytes: z.number().int().positive().default(DEFAULT_MAX_FILE_BYTES),
});

export type ReaderConfig = z.infer<typeof ReaderConfigSchema>;

const FileSchema = z.object({
  default_timezone: z.string().optional(),
  inclusive_end: z.boolean().optional(),
  log_diagnostics: z.boolean().optional(),
  max_file_bytes: z.number().optional(),
});

const EnvFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const EnvSchema = z.object({
  ALMANAC_DEFAULT_TIMEZONE: z.string().optional(),
  ALMANAC_INCLUSIVE_END: EnvFlag.optional(),
  ALMANAC_LOG_DIAGNOSTICS: EnvFlag.optional(),
  ALMANAC_MAX_FILE_BYTES: z
    .string()
    .regex(/^\d+$/, "must be a whole number of bytes")
    .transform(Number)
    .optional(),
});

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export interface LoadReaderConfigOptions {
  /** Environment to read ALMANAC_* variables from. Defaults to process.env. */
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** Path of a TOML settings file. */
  readonly file?: string;
}

function issuesOf(error: z.ZodError, prefix = ""): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.map(String).join(".");
    return `${prefix}${path || "(root)"}: ${issue.message}`;
  });
}

/** Settings from `over` that are set replace those of `base`. */
function layer(base: Partial<ReaderConfig>, over: Partial<ReaderConfig>): Partial<ReaderConfig> {
  return {
    defaultTimezone: over.defaultTimezone ?? base.defaultTimezone,
    inclusiveEnd: over.inclusiveEnd ?? base.inclusiveEnd,
    logDiagnostics: over.logDiagnostics ?? base.logDiagnostics,
    maxFileBytes: over.maxFileBytes ?? base.maxFileBytes,
  };
}

async function readFileSettings(file: string): Promise<Partial<ReaderConfig>> {
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  } catch (err) {
    throw new ConfigError([`${file}: cannot be read`], { cause: err });
  }

  let table: unknown;
  try {
    table = parseToml(text);
  } catch (err) {
    if (!(err instanceof TomlError)) throw err;
    throw new ConfigError([`${file}: ${err.message}`], { cause: err });
  }

  const parsed = FileSchema.safeParse(table);
  if (!parsed.success) throw new ConfigError(issuesOf(parsed.error, `${file}: `));
  return {
    defaultTimezone: parsed.data.default_timezone,
    inclusiveEnd: parsed.data.inclusive_end,
    logDiagnostics: parsed.data.log_diagnostics,
    maxFileBytes: parsed.data.max_file_bytes,
  };
}

function readEnvSettings(env: Readonly<Record<string, string | undefined>>): Partial<ReaderConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw new ConfigError(issuesOf(parsed.error));
  return {
    defaultTimezone: parsed.data.ALMANAC_DEFAULT_TIMEZONE,
    inclusiveEnd: parsed.data.ALMANAC_INCLUSIVE_END,
    logDiagnostics: parsed.data.ALMANAC_LOG_DIAGNOSTICS,
    maxFileBytes: parsed.data.ALMANAC_MAX_FILE_BYTES,
  };
}

/**
 * Validate a partial configuration and fill in defaults.
 * @throws ConfigError listing every invalid setting
 */
export function resolveReaderConfig(input: Partial<ReaderConfig> = {}): ReaderConfig {
  const parsed = ReaderConfigSchema.safeParse(input);
  if (!parsed.success) throw new ConfigError(issuesOf(parsed.error));
  return parsed.data;
}

/**
 * Load settings from `file` (if given) and `env`, env taking precedence.
 * @throws ConfigError when the file is unreadable or any setting is invalid
 */
export async function loadReaderConfig(options: LoadReaderConfigOptions = {}): Promise<ReaderConfig> {
  const fromFile = options.file ? await readFileSettings(options.file) : {};
  const fromEnv = readEnvSettings(options.env ?? process.env);
  return resolveReaderConfig(layer(fromFile, fromEnv));
}
