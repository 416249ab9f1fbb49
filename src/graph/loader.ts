/**
 * Graph Loader
 *
 * Assembles decision records from both partitions into one identity-keyed
 * mapping. Dependency entries are normalised here, once, so the algorithms
 * downstream only ever see flat ID lists.
 *
 * @module graph/loader
 */

import { log } from "../utils/telemetry.js";
import { GraphLoadError } from "../utils/errors.js";
import type {
  DecisionGraph,
  DecisionNode,
  DecisionRecord,
  DependencyRef,
  FieldValue,
  Scope,
} from "./types.js";

const SCOPE_ORDER: Record<Scope, number> = { constitution: 0, project: 1 };

// =============================================================================
// Dependency normalisation
// =============================================================================

/**
 * Classify one raw `depends_on` entry. Anything that is neither a bare ID nor
 * an object with a string `id` is dropped.
 */
export function normalizeDependencyRef(raw: FieldValue): DependencyRef | null {
  if (typeof raw === "string") {
    return raw.length > 0 ? { kind: "plain", id: raw } : null;
  }
  if (raw !== null && typeof raw === "object" && !Array.isArray(raw)) {
    const { id, ...extra } = raw;
    if (typeof id === "string" && id.length > 0) {
      return { kind: "structured", id, extra };
    }
  }
  return null;
}

export function parseDependencies(raw: FieldValue | undefined): DependencyRef[] {
  if (!Array.isArray(raw)) return [];
  const refs: DependencyRef[] = [];
  for (const entry of raw) {
    const ref = normalizeDependencyRef(entry);
    if (ref) refs.push(ref);
  }
  return refs;
}

/** Flat dependency IDs of a node, in declared order. */
export function getDepsList(node: Pick<DecisionNode, "dependsOn">): string[] {
  return [...node.dependsOn];
}

/** IDs of every node whose depends_on contains `id`, ascending. */
export function getDependents(graph: DecisionGraph, id: string): string[] {
  const dependents: string[] = [];
  for (const node of graph.values()) {
    if (node.dependsOn.includes(id)) {
      dependents.push(node.id);
    }
  }
  return dependents.sort();
}

/** Node IDs in ascending order. */
export function sortedIds(graph: DecisionGraph): string[] {
  return [...graph.keys()].sort();
}

/** Level as a number, when it is one. Used for ordering comparisons. */
export function numericLevel(value: FieldValue | undefined): number | undefined {
  return typeof value === "number" ? value : undefined;
}

// =============================================================================
// Assembly
// =============================================================================

function optionalText(value: FieldValue | undefined): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function recordId(record: DecisionRecord): string | undefined {
  const id = record.fields.id;
  if (typeof id === "string" && id.length > 0) return id;
  if (typeof id === "number") return String(id);
  return undefined;
}

export function toDecisionNode(id: string, record: DecisionRecord): DecisionNode {
  const { fields } = record;
  return {
    id,
    title: optionalText(fields.title),
    date: optionalText(fields.date),
    level: fields.level ?? undefined,
    state: fields.state ?? undefined,
    stakes: fields.stakes ?? undefined,
    dependsOn: parseDependencies(fields.depends_on).map((ref) => ref.id),
    scope: record.scope,
    body: record.body,
    location: record.location,
    fields,
  };
}

/**
 * Build the graph. Constitution records are placed first, then project
 * records, each sorted by ID.
 *
 * @throws GraphLoadError when an ID appears in both partitions
 */
export function buildGraph(records: Iterable<DecisionRecord>): DecisionGraph {
  const keyed: Array<{ id: string; record: DecisionRecord }> = [];
  for (const record of records) {
    const id = recordId(record);
    if (id === undefined) {
      log.debug({ location: record.location }, "Skipping record without id");
      continue;
    }
    keyed.push({ id, record });
  }

  keyed.sort((a, b) => {
    const byScope = SCOPE_ORDER[a.record.scope] - SCOPE_ORDER[b.record.scope];
    if (byScope !== 0) return byScope;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  });

  const nodes = new Map<string, DecisionNode>();
  for (const { id, record } of keyed) {
    const existing = nodes.get(id);
    if (existing) {
      throw new GraphLoadError(id, existing.scope, record.scope);
    }
    nodes.set(id, toDecisionNode(id, record));
  }

  return nodes;
}
