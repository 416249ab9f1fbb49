/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger options.
 * Used by both server.ts (Fastify) and telemetry.ts (standalone Pino).
 *
 * Decision bodies can be long free text; they are never logged whole.
 * Any field named body/old_text/new_text is censored at any depth.
 */

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  "*.body",
  "*.old_text",
  "*.new_text",
  "*.headers.authorization",
  "*.headers.cookie",
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

/**
 * Create a Pino-compatible redact configuration
 */
export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string) {
  return {
    level,
    redact: createRedactConfig(),
  };
}
