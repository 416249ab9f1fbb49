/**
 * Decision graph types.
 *
 * Consumed by the loader, validators, cascade and frontier analysis.
 * All types are structural; field values arrive from frontmatter as-is and
 * are checked by the validator (see validators/graph-validator.ts).
 *
 * @module graph/types
 */

// =============================================================================
// Vocabularies
// =============================================================================

export const DECISION_STATES = ["suggested", "committed", "superseded"] as const;
export type DecisionState = (typeof DECISION_STATES)[number];

export const DECISION_STAKES = ["high", "medium", "low"] as const;
export type DecisionStakes = (typeof DECISION_STAKES)[number];

export const DECISION_LEVELS = [1, 2, 3, 4] as const;
export type DecisionLevel = (typeof DECISION_LEVELS)[number];

export const LEVEL_NAMES: Record<DecisionLevel, string> = {
  1: "Identity",
  2: "Direction",
  3: "Strategy",
  4: "Tactics",
};

/** Partition a record was loaded from. Constitution is upstream of project. */
export const SCOPES = ["constitution", "project"] as const;
export type Scope = (typeof SCOPES)[number];

/** Immutable, format: DEC-NNN */
export const DECISION_ID_REGEX = /^DEC-\d{3}$/;
export const DECISION_ID_PREFIX = "DEC-";

/** Body headings every decision is expected to carry. */
export const REQUIRED_SECTIONS = ["Decision", "Reasoning", "Assumptions", "Tradeoffs"] as const;

/** Sections searched by title/body search, in report order. */
export const BODY_SECTIONS = [...REQUIRED_SECTIONS, "Detail"] as const;

export function isDecisionState(value: unknown): value is DecisionState {
  return typeof value === "string" && (DECISION_STATES as readonly string[]).includes(value);
}

export function isDecisionStakes(value: unknown): value is DecisionStakes {
  return typeof value === "string" && (DECISION_STAKES as readonly string[]).includes(value);
}

export function isDecisionLevel(value: unknown): value is DecisionLevel {
  return typeof value === "number" && (DECISION_LEVELS as readonly number[]).includes(value);
}

// =============================================================================
// Records
// =============================================================================

/** Scalar or list value as produced by the frontmatter parser. */
export type FieldValue = string | number | boolean | null | FieldValue[] | { [key: string]: FieldValue };

/** Raw frontmatter field map. */
export type FieldMap = Record<string, FieldValue>;

/**
 * One dependency entry as written in a record. Older records carry a
 * structured reference (`- id: DEC-001` with extra keys); only `id` is used.
 */
export type DependencyRef =
  | { kind: "plain"; id: string }
  | { kind: "structured"; id: string; extra: Record<string, FieldValue> };

/** A record yielded by a record source, before graph assembly. */
export interface DecisionRecord {
  scope: Scope;
  fields: FieldMap;
  body: string;
  /** Where the record came from, for diagnostics */
  location?: string;
}

/**
 * A decision node. Frontmatter values are kept as read (`level` may be a
 * string, `state` may be outside the vocabulary) so that the validator can
 * report them; `dependsOn` is already normalised to flat IDs.
 */
export interface DecisionNode {
  id: string;
  title?: string;
  date?: string;
  level?: FieldValue;
  state?: FieldValue;
  stakes?: FieldValue;
  dependsOn: string[];
  scope: Scope;
  body: string;
  location?: string;
  /** Original field map, for rewriting the record on mutation */
  fields: FieldMap;
}

/** Identity-keyed node mapping, rebuilt on every load. */
export type DecisionGraph = ReadonlyMap<string, DecisionNode>;

/** Result shape shared by every validator. */
export interface ValidationOutcome {
  errors: string[];
  warnings: string[];
}

/** Fields a caller may set on an existing decision. */
export const SETTABLE_FIELDS = ["state", "depends_on", "level", "stakes", "title"] as const;

/** Proposed fields for a new decision. */
export interface DecisionDraft {
  title: string;
  level: FieldValue;
  state?: FieldValue;
  stakes?: FieldValue;
  depends_on?: string[];
  date?: string;
}
