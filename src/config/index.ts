/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to every environment variable the engine,
 * CLI and HTTP surface read. Directory settings default relative to
 * DECIGRAPH_ROOT, which itself defaults to the working directory.
 */

import { join, resolve } from "node:path";
import { z } from "zod";

/**
 * Environment enum
 */
const Environment = z.enum(["development", "test", "production"]);

/**
 * Log Level enum
 */
const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Optional string that treats empty as undefined
 */
const optionalPath = z
  .union([z.string(), z.undefined()])
  .transform((val) => (val === undefined || val.trim() === "" ? undefined : val.trim()));

/**
 * Comma-separated list
 */
const csvList = z
  .union([z.string(), z.undefined()])
  .transform((val) =>
    val
      ? val
          .split(",")
          .map((o) => o.trim())
          .filter((o) => o.length > 0)
      : [],
  );

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3101),
    host: z.string().default("127.0.0.1"),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024),
    allowedOrigins: csvList,
  }),

  paths: z.object({
    root: z.string().min(1),
    projectDir: z.string().min(1),
    constitutionDir: z.string().min(1),
    stateDir: z.string().min(1),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;
  const root = resolve(optionalPath.parse(env.DECIGRAPH_ROOT) ?? process.cwd());
  const fromRoot = (value: string | undefined, fallback: string): string =>
    resolve(root, optionalPath.parse(value) ?? fallback);

  const rawConfig = {
    // Empty strings (a blank line in .env) fall back to the defaults
    server: {
      port: env.PORT || undefined,
      host: env.HOST || undefined,
      nodeEnv: env.NODE_ENV || undefined,
      logLevel: env.LOG_LEVEL || undefined,
      bodyLimitBytes: env.BODY_LIMIT_BYTES || undefined,
      allowedOrigins: env.ALLOWED_ORIGINS,
    },
    paths: {
      root,
      projectDir: fromRoot(env.DECIGRAPH_PROJECT_DIR, "dna"),
      constitutionDir: fromRoot(env.DECIGRAPH_CONSTITUTION_DIR, "constitution"),
      stateDir: fromRoot(env.DECIGRAPH_STATE_DIR, ".dna"),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration. Please check environment variables. ${issues}`);
  }
  return result.data;
}

/**
 * Lazily parsed configuration, cached after first access so tests can set
 * environment variables before anything reads it.
 */
let _cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

/**
 * Path of the lint configuration file inside the state directory
 */
export function lintConfigPath(config: Config = getConfig()): string {
  return join(config.paths.stateDir, "config.json");
}

/**
 * Path of the scratchpad file inside the state directory
 */
export function scratchpadPath(config: Config = getConfig()): string {
  return join(config.paths.stateDir, "scratchpad.json");
}

/**
 * Path of the derived health report at the repository root
 */
export function healthPath(config: Config = getConfig()): string {
  return join(config.paths.root, "HEALTH.md");
}
