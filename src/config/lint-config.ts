/**
 * Body lint configuration.
 *
 * Loaded from `<stateDir>/config.json` and compiled once into a value that
 * callers pass to the validator explicitly. Nothing here is cached at module
 * level; each invocation builds its own.
 *
 * File shape:
 * {
 *   "terminology": { "flagged_term": "...", "exemptions": ["regex"], "exempt_ids": ["DEC-001"] },
 *   "deleted_artifacts": [{ "pattern": "regex", "label": "..." }]
 * }
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError } from "../utils/errors.js";

const RegexSource = z.string().superRefine((source, ctx) => {
  try {
    new RegExp(source);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
});

export const LintConfigFileSchema = z
  .object({
    terminology: z
      .object({
        flagged_term: z.string().optional(),
        exemptions: z.array(RegexSource).default([]),
        exempt_ids: z.array(z.string()).default([]),
      })
      .optional(),
    deleted_artifacts: z
      .array(
        z.object({
          pattern: RegexSource.optional(),
          label: z.string().optional(),
        }),
      )
      .default([]),
  })
  .passthrough();

export type LintConfigFile = z.infer<typeof LintConfigFileSchema>;

export interface TerminologyRule {
  /** The configured term, as written, for messages */
  term: string;
  /** Case-insensitive, word-bounded match of the term */
  pattern: RegExp;
  /** A matching line is skipped when any exemption matches it */
  exemptions: RegExp[];
  exemptIds: ReadonlySet<string>;
}

export interface DeletedArtifactRule {
  pattern: RegExp;
  label: string;
}

export interface LintConfig {
  terminology: TerminologyRule | null;
  deletedArtifacts: DeletedArtifactRule[];
}

export const EMPTY_LINT_CONFIG: LintConfig = Object.freeze({
  terminology: null,
  deletedArtifacts: [],
});

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compile a parsed config file into matchers. Entries without a pattern are
 * ignored; an artifact without a label is reported by its pattern.
 */
export function compileLintConfig(file: LintConfigFile): LintConfig {
  const term = file.terminology?.flagged_term;
  const terminology: TerminologyRule | null = term
    ? {
        term,
        pattern: new RegExp(`\\b${escapeRegExp(term)}\\b`, "i"),
        exemptions: (file.terminology?.exemptions ?? []).map((source) => new RegExp(source)),
        exemptIds: new Set(file.terminology?.exempt_ids ?? []),
      }
    : null;

  const deletedArtifacts: DeletedArtifactRule[] = [];
  for (const entry of file.deleted_artifacts) {
    if (!entry.pattern) continue;
    deletedArtifacts.push({
      pattern: new RegExp(entry.pattern),
      label: entry.label ?? entry.pattern,
    });
  }

  return { terminology, deletedArtifacts };
}

/**
 * Parse an unknown JSON value into a lint configuration.
 */
export function parseLintConfig(raw: unknown, source = "lint config"): LintConfig {
  const result = LintConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}`, { validation_errors: result.error.flatten() });
  }
  return compileLintConfig(result.data);
}

/**
 * Read the lint configuration from disk. A missing file is the empty
 * configuration; unreadable JSON is an error.
 */
export async function loadLintConfig(filePath: string): Promise<LintConfig> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return EMPTY_LINT_CONFIG;
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Malformed JSON in ${filePath}`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return parseLintConfig(raw, filePath);
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
