/**
 * Decision Service
 *
 * One method per engine operation. Each call loads the graph fresh from the
 * store, runs the relevant computation or pre-validation, and writes at most
 * one record. There is no cache between calls and no locking: a concurrent
 * external edit between the read and the write is not detected.
 *
 * @module services/decision-service
 */

import { cascade, type CascadeDirection, type CascadeResult } from "../analysis/cascade.js";
import { DEFAULT_TOP_N, frontier, type FrontierResult } from "../analysis/frontier.js";
import { compileManifest, type CompiledManifest, type ManifestTarget } from "../analysis/manifest.js";
import { searchDecisions, type SearchResult } from "../analysis/search.js";
import { EMPTY_LINT_CONFIG, type LintConfig } from "../config/lint-config.js";
import { SCAFFOLD_BODY, isoDate } from "../graph/frontmatter.js";
import { buildGraph, toDecisionNode } from "../graph/loader.js";
import type { DecisionDraft, DecisionGraph, DecisionNode, FieldMap, FieldValue, Scope } from "../graph/types.js";
import type { DecisionStore } from "../store/interface.js";
import { EditConflictError, GraphLoadError, NotFoundError, UsageError } from "../utils/errors.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { validate } from "../validators/graph-validator.js";
import { validateForCreate, validateForSet, type SetValue } from "../validators/mutation-validator.js";

export interface ValidationReport {
  errors: string[];
  warnings: string[];
  node_count: number;
}

export interface CreateDecisionInput {
  title: string;
  level: number;
  state?: string;
  stakes?: string;
  depends_on?: string[];
}

export type CreateResult =
  | { created: true; node: DecisionNode; location: string; warnings: string[] }
  | { created: false; errors: string[]; warnings: string[] };

export type SetResult =
  | {
      applied: true;
      id: string;
      field: string;
      old_value: FieldValue;
      new_value: SetValue;
      warnings: string[];
    }
  | { applied: false; errors: string[]; warnings: string[] };

export interface EditResult {
  id: string;
  chars_removed: number;
  chars_added: number;
  new_warnings: string[];
  resolved_warnings: string[];
  /** Non-empty means the edit introduced errors; the edit is already persisted */
  new_errors: string[];
}

export interface DecisionServiceOptions {
  store: DecisionStore;
  lintConfig?: LintConfig;
  now?: () => Date;
}

/** Non-overlapping occurrences of `needle` in `haystack`. */
export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

function difference(a: readonly string[], b: readonly string[]): string[] {
  const exclude = new Set(b);
  return [...new Set(a)].filter((item) => !exclude.has(item)).sort();
}

export class DecisionService {
  private readonly store: DecisionStore;
  private readonly lintConfig: LintConfig;
  private readonly now: () => Date;

  constructor(options: DecisionServiceOptions) {
    this.store = options.store;
    this.lintConfig = options.lintConfig ?? EMPTY_LINT_CONFIG;
    this.now = options.now ?? (() => new Date());
  }

  lintRules(): LintConfig {
    return this.lintConfig;
  }

  today(): string {
    return isoDate(this.now());
  }

  /**
   * Load every record and assemble the graph.
   * @throws GraphLoadError on an ID collision across partitions
   */
  async loadGraph(): Promise<DecisionGraph> {
    const records = await this.store.loadRecords();
    try {
      const graph = buildGraph(records);
      emit(TelemetryEvents.GraphLoaded, { nodeCount: graph.size });
      return graph;
    } catch (error) {
      if (error instanceof GraphLoadError) {
        emit(TelemetryEvents.GraphLoadFailed, { reason: error.message });
      }
      throw error;
    }
  }

  async validate(): Promise<ValidationReport> {
    const graph = await this.loadGraph();
    const { errors, warnings } = validate(graph, this.lintConfig);
    emit(TelemetryEvents.ValidationCompleted, {
      nodeCount: graph.size,
      errorCount: errors.length,
      warningCount: warnings.length,
    });
    return { errors, warnings, node_count: graph.size };
  }

  async cascade(id: string, direction: CascadeDirection = "downstream"): Promise<CascadeResult> {
    const graph = await this.loadGraph();
    const result = cascade(graph, id, direction);
    emit(TelemetryEvents.CascadeComputed, {
      id,
      direction,
      waveCount: result.summary.wave_count,
      uniqueAffected: result.summary.unique_affected,
    });
    return result;
  }

  async frontier(top: number = DEFAULT_TOP_N): Promise<FrontierResult> {
    const graph = await this.loadGraph();
    const result = frontier(graph, top);
    emit(TelemetryEvents.FrontierComputed, {
      committable: result.summary.committable_count,
      blocked: result.summary.blocked_count,
    });
    return result;
  }

  async search(terms: readonly string[]): Promise<SearchResult[]> {
    return searchDecisions(await this.loadGraph(), terms);
  }

  async manifest(target?: ManifestTarget): Promise<CompiledManifest> {
    return compileManifest(await this.loadGraph(), target);
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  /**
   * Create a decision with the scaffold body. Nothing is written when
   * pre-validation reports errors.
   */
  async create(id: string, input: CreateDecisionInput, partition: Scope = "project"): Promise<CreateResult> {
    if (!input.title.trim()) {
      throw new UsageError("title is required");
    }

    const draft: DecisionDraft = {
      title: input.title,
      level: input.level,
      state: input.state ?? "suggested",
      stakes: input.stakes,
      depends_on: input.depends_on ?? [],
      date: this.today(),
    };

    const graph = await this.loadGraph();
    const { errors, warnings } = validateForCreate(id, draft, graph, partition);
    if (errors.length > 0) {
      emit(TelemetryEvents.MutationRejected, { id, operation: "create", errorCount: errors.length });
      return { created: false, errors, warnings };
    }

    const fields: FieldMap = {
      id,
      title: draft.title,
      date: this.today(),
      level: draft.level,
      state: draft.state ?? "suggested",
      depends_on: draft.depends_on ?? [],
    };
    if (draft.stakes) fields.stakes = draft.stakes;

    const location = await this.store.write(partition, id, fields, SCAFFOLD_BODY);
    emit(TelemetryEvents.MutationApplied, { id, operation: "create", scope: partition });

    const node = toDecisionNode(id, { scope: partition, fields, body: SCAFFOLD_BODY, location });
    return { created: true, node, location, warnings };
  }

  /**
   * Update one frontmatter field, keeping the body and every other field.
   * @throws NotFoundError when the decision does not exist
   */
  async set(id: string, field: string, value: SetValue): Promise<SetResult> {
    const graph = await this.loadGraph();
    const node = graph.get(id);
    if (!node) {
      throw new NotFoundError(id);
    }

    const { errors, warnings } = validateForSet(id, field, value, graph);
    if (errors.length > 0) {
      emit(TelemetryEvents.MutationRejected, { id, operation: "set", field, errorCount: errors.length });
      return { applied: false, errors, warnings };
    }

    const doc = await this.store.read(node.scope, id);
    if (!doc) {
      throw new NotFoundError(id);
    }

    const oldValue = doc.fields[field] ?? null;
    await this.store.write(node.scope, id, { ...doc.fields, [field]: value }, doc.body);
    emit(TelemetryEvents.MutationApplied, { id, operation: "set", field });

    return { applied: true, id, field, old_value: oldValue, new_value: value, warnings };
  }

  /**
   * Replace a unique span of body text and report the validation delta.
   *
   * The edit is written before the post-edit validation runs, so a result
   * with `new_errors` describes a change that is already on disk.
   *
   * @throws NotFoundError when the decision does not exist
   * @throws EditConflictError when `oldText` is absent or not unique
   */
  async edit(id: string, oldText: string, newText: string): Promise<EditResult> {
    if (oldText.length === 0) {
      throw new UsageError("old text must not be empty");
    }

    const graph = await this.loadGraph();
    const node = graph.get(id);
    if (!node) {
      throw new NotFoundError(id);
    }

    const doc = await this.store.read(node.scope, id);
    if (!doc) {
      throw new NotFoundError(id);
    }

    const occurrences = countOccurrences(doc.body, oldText);
    if (occurrences === 0) {
      throw new EditConflictError(`old text not found in body of ${id}`, 0);
    }
    if (occurrences > 1) {
      throw new EditConflictError(
        `old text matches ${occurrences} locations in ${id} body — must be unique`,
        occurrences,
      );
    }

    const before = validate(graph, this.lintConfig);
    const newBody = doc.body.replace(oldText, () => newText);
    await this.store.write(node.scope, id, doc.fields, newBody);

    const after = validate(await this.loadGraph(), this.lintConfig);

    const result: EditResult = {
      id,
      chars_removed: oldText.length,
      chars_added: newText.length,
      new_warnings: difference(after.warnings, before.warnings),
      resolved_warnings: difference(before.warnings, after.warnings),
      new_errors: difference(after.errors, before.errors),
    };

    emit(TelemetryEvents.EditApplied, {
      id,
      charsRemoved: result.chars_removed,
      charsAdded: result.chars_added,
      newWarnings: result.new_warnings.length,
      resolvedWarnings: result.resolved_warnings.length,
      newErrors: result.new_errors.length,
    });
    if (result.new_errors.length > 0) {
      log.warn({ id, newErrors: result.new_errors.length }, "Edit introduced validation errors");
    }

    return result;
  }
}

// =============================================================================
// Input coercion
// =============================================================================

/**
 * Parse a comma-separated dependency list. `"[]"` and `""` mean none.
 */
export function parseDependencyList(raw: string): string[] {
  const trimmed = raw.trim();
  if (trimmed === "[]" || trimmed === "") return [];
  return trimmed
    .split(",")
    .map((dep) => dep.trim())
    .filter((dep) => dep.length > 0);
}

export function parseLevel(raw: string | number): number {
  if (typeof raw === "number") {
    if (Number.isInteger(raw)) return raw;
    throw new UsageError(`level must be a number, got '${raw}'`);
  }
  if (!/^[+-]?\d+$/.test(raw.trim())) {
    throw new UsageError(`level must be a number, got '${raw}'`);
  }
  return Number.parseInt(raw.trim(), 10);
}

/**
 * Turn a raw value from the CLI or an HTTP body into the shape the field
 * takes. Title arrives as several words on the command line.
 */
export function coerceSetValue(field: string, raw: string | number | string[]): SetValue {
  switch (field) {
    case "depends_on":
      if (Array.isArray(raw)) return raw.map((dep) => dep.trim()).filter((dep) => dep.length > 0);
      return parseDependencyList(String(raw));
    case "level":
      return parseLevel(Array.isArray(raw) ? raw.join(" ") : raw);
    case "title":
      return Array.isArray(raw) ? raw.join(" ") : String(raw);
    default:
      return Array.isArray(raw) ? raw.join(" ") : raw;
  }
}
