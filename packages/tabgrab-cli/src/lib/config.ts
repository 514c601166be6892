import { z } from "zod";
import { invalidOption } from "./errors/catalog.js";
import { DEFAULT_TIMEOUT_MS } from "./http-client.js";
import { LOG_LEVEL_NAMES } from "./logger.js";
import { SONGSTERR_BASE_URL } from "./songsterr-api.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Default values for all run options */
export const CONFIG_DEFAULTS = {
  outputDir: "./output",
  maxResults: 20,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  baseUrl: SONGSTERR_BASE_URL,
} as const;

/** Environment variables read at startup. Flags take precedence. */
export const ENV_VARS = {
  output: "TABGRAB_OUTPUT",
  maxResults: "TABGRAB_MAX_RESULTS",
  timeout: "TABGRAB_TIMEOUT",
  logLevel: "TABGRAB_LOG_LEVEL",
  json: "TABGRAB_JSON",
  quiet: "TABGRAB_QUIET",
  baseUrl: "TABGRAB_BASE_URL",
} as const;

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const RunConfigSchema = z.object({
  interactive: z.boolean(),
  file: z.string().min(1).optional(),
  outputDir: z.string().min(1),
  maxResults: z.coerce.number().int().positive(),
  timeoutMs: z.coerce.number().int().positive(),
  baseUrl: z.string().url(),
  logLevel: z.enum(LOG_LEVEL_NAMES),
  json: z.boolean(),
  quiet: z.boolean(),
});

/** Options for one run, built once at startup and passed down explicitly. */
export type RunConfig = z.infer<typeof RunConfigSchema>;

/** Raw option values as commander hands them over. */
export interface CliFlags {
  interactive?: boolean;
  file?: string;
  output?: string;
  out?: string;
  maxResults?: string;
  timeout?: string;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

/** Option name shown to the user for each config key */
const OPTION_NAMES: Record<keyof RunConfig, string> = {
  interactive: "interactive",
  file: "file",
  outputDir: "output",
  maxResults: "max-results",
  timeoutMs: "timeout",
  baseUrl: `base-url (${ENV_VARS.baseUrl})`,
  logLevel: `log-level (${ENV_VARS.logLevel})`,
  json: "json",
  quiet: "quiet",
};

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function envFlag(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Whether the run prints JSON, from `--json` or the environment.
 */
export function isJsonRun(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(flags.json) || envFlag(env[ENV_VARS.json]);
}

function isConfigKey(key: PropertyKey | undefined): key is keyof RunConfig {
  return typeof key === "string" && key in OPTION_NAMES;
}

function pickLogLevel(flags: CliFlags, env: NodeJS.ProcessEnv, json: boolean): string {
  if (flags.verbose) return "debug";
  const fromEnv = env[ENV_VARS.logLevel];
  if (fromEnv) return fromEnv;
  // Keep stdout clean for the JSON document
  return json ? "warn" : "info";
}

/**
 * Merge flags, environment and defaults (in that order of precedence) and
 * validate the result. Invalid values become usage errors.
 */
export function resolveRunConfig(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): RunConfig {
  const json = isJsonRun(flags, env);

  const candidate = {
    interactive: Boolean(flags.interactive),
    file: flags.file,
    outputDir: flags.output ?? flags.out ?? env[ENV_VARS.output] ?? CONFIG_DEFAULTS.outputDir,
    maxResults: flags.maxResults ?? env[ENV_VARS.maxResults] ?? CONFIG_DEFAULTS.maxResults,
    timeoutMs: flags.timeout ?? env[ENV_VARS.timeout] ?? CONFIG_DEFAULTS.timeoutMs,
    baseUrl: env[ENV_VARS.baseUrl] ?? CONFIG_DEFAULTS.baseUrl,
    logLevel: pickLogLevel(flags, env, json),
    json,
    quiet: json || Boolean(flags.quiet) || envFlag(env[ENV_VARS.quiet]),
  };

  const result = RunConfigSchema.safeParse(candidate);
  if (!result.success) {
    const [issue] = result.error.issues;
    const key = issue?.path[0];
    const name = isConfigKey(key) ? OPTION_NAMES[key] : "option";
    const validValues = key === "logLevel" ? [...LOG_LEVEL_NAMES] : undefined;
    throw invalidOption(name, issue?.message ?? "invalid value", validValues);
  }
  // Prompts and result tables are drawn on stdout, which JSON runs reserve for the document
  if (result.data.json && result.data.interactive) {
    throw invalidOption("json", "cannot be combined with --interactive");
  }
  return result.data;
}
