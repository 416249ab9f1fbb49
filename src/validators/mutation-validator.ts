/**
 * Mutation pre-validators.
 *
 * Run a scoped subset of the whole-graph checks against a proposed create or
 * single-field update, before anything is written. A mutation may proceed
 * only when `errors` is empty.
 *
 * @module validators/mutation-validator
 */

import { numericLevel } from "../graph/loader.js";
import {
  DECISION_ID_REGEX,
  isDecisionLevel,
  isDecisionStakes,
  isDecisionState,
  SETTABLE_FIELDS,
  type DecisionDraft,
  type DecisionGraph,
  type DecisionNode,
  type FieldValue,
  type Scope,
  type ValidationOutcome,
} from "../graph/types.js";
import { formatValue } from "./graph-validator.js";

const LEGAL_TRANSITIONS: ReadonlySet<string> = new Set([
  "suggested→committed",
  "suggested→superseded",
  "committed→superseded",
]);

export type TransitionCheck = { ok: true } | { ok: false; message: string };

/**
 * Check a state change against the lifecycle lattice. Same-state is a no-op
 * and always legal.
 */
export function validateTransition(oldState: string, newState: string): TransitionCheck {
  if (oldState === newState) return { ok: true };
  if (LEGAL_TRANSITIONS.has(`${oldState}→${newState}`)) return { ok: true };
  return { ok: false, message: `Illegal state transition: ${oldState} → ${newState}` };
}

// =============================================================================
// Shared checks
// =============================================================================

function checkDependencies(
  nid: string,
  deps: readonly string[],
  level: FieldValue | undefined,
  graph: DecisionGraph,
  out: ValidationOutcome,
): void {
  const ownLevel = numericLevel(level);
  for (const dep of deps) {
    if (dep === nid) {
      out.errors.push(`${nid}: self-dependency`);
      continue;
    }
    const target = graph.get(dep);
    if (!target) {
      out.errors.push(`${nid}: depends_on references non-existent ${dep}`);
      continue;
    }
    const depLevel = numericLevel(target.level);
    if (ownLevel !== undefined && depLevel !== undefined && depLevel > ownLevel) {
      out.warnings.push(`${nid} (level ${ownLevel}): depends on ${dep} (level ${depLevel}) — level inversion`);
    }
  }
}

function checkIronRule(
  nid: string,
  scope: Scope,
  deps: readonly string[],
  graph: DecisionGraph,
  out: ValidationOutcome,
): void {
  if (scope !== "constitution") return;
  for (const dep of deps) {
    if (graph.get(dep)?.scope === "project") {
      out.errors.push(`${nid}: constitution depends on project ${dep} (iron rule violation)`);
    }
  }
}

function stateLabel(node: DecisionNode): string {
  return node.state === undefined ? "unknown" : String(node.state);
}

/**
 * Which of `deps` can reach `nid` once `nid`'s outgoing edges are replaced by
 * `deps`. Iterative depth-first reachability per dependency. Edges already
 * pointing at `nid` count even when `nid` is not in the graph yet.
 */
export function findCycleDependencies(nid: string, deps: readonly string[], graph: DecisionGraph): string[] {
  const adjacency = new Map<string, string[]>();
  for (const node of graph.values()) {
    if (node.id === nid) continue;
    adjacency.set(
      node.id,
      node.dependsOn.filter((dep) => dep === nid || graph.has(dep)),
    );
  }
  adjacency.set(nid, [...new Set(deps)]);

  const offending: string[] = [];
  for (const start of deps) {
    const visited = new Set<string>();
    const stack = [start];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      if (current === nid) {
        offending.push(start);
        break;
      }
      if (visited.has(current)) continue;
      visited.add(current);
      stack.push(...(adjacency.get(current) ?? []));
    }
  }
  return offending;
}

// =============================================================================
// Create
// =============================================================================

/**
 * Pre-validate a new node destined for `partition`.
 *
 * The cycle check only runs when every other check has passed.
 */
export function validateForCreate(
  nid: string,
  draft: DecisionDraft,
  graph: DecisionGraph,
  partition: Scope,
): ValidationOutcome {
  const out: ValidationOutcome = { errors: [], warnings: [] };

  if (!DECISION_ID_REGEX.test(nid)) {
    out.errors.push(`${nid}: ID must match DEC-NNN (3 digits)`);
  }

  const existing = graph.get(nid);
  if (existing) {
    out.errors.push(`${nid}: ID already exists at ${existing.location ?? existing.scope}`);
  }

  if (!isDecisionLevel(draft.level)) {
    out.errors.push(`${nid}: invalid level '${formatValue(draft.level)}' (must be 1-4)`);
  }

  const state = draft.state ?? "suggested";
  if (!isDecisionState(state)) {
    out.errors.push(
      `${nid}: invalid state '${formatValue(state)}' (must be suggested/committed/superseded)`,
    );
  }

  if (draft.stakes && !isDecisionStakes(draft.stakes)) {
    out.errors.push(`${nid}: invalid stakes '${formatValue(draft.stakes)}' (must be high/medium/low)`);
  }

  const deps = draft.depends_on ?? [];
  checkDependencies(nid, deps, draft.level, graph, out);
  checkIronRule(nid, partition, deps, graph, out);

  if (state === "committed") {
    for (const dep of deps) {
      const target = graph.get(dep);
      if (target && target.state !== "committed") {
        out.errors.push(`${nid}: cannot create as committed — upstream ${dep} is '${stateLabel(target)}'`);
      }
    }
  }

  if (deps.length > 0 && out.errors.length === 0) {
    for (const dep of findCycleDependencies(nid, deps, graph)) {
      out.errors.push(`${nid}: adding this node would create a cycle through ${dep}`);
    }
  }

  return out;
}

// =============================================================================
// Set
// =============================================================================

export type SetValue = string | number | string[];

function validateStateChange(node: DecisionNode, value: SetValue, graph: DecisionGraph, out: ValidationOutcome): void {
  const oldState = node.state === undefined ? "suggested" : String(node.state);
  const newState = String(value);
  const check = validateTransition(oldState, newState);
  if (!check.ok) {
    out.errors.push(`${node.id}: ${check.message}`);
    return;
  }
  if (newState !== "committed") return;

  for (const dep of node.dependsOn) {
    const target = graph.get(dep);
    if (target && target.state !== "committed") {
      out.errors.push(`${node.id}: cannot commit — upstream ${dep} is '${stateLabel(target)}'`);
    }
  }
}

function validateDependsOnChange(node: DecisionNode, value: SetValue, graph: DecisionGraph, out: ValidationOutcome): void {
  const deps = Array.isArray(value) ? value : [];
  checkDependencies(node.id, deps, node.level, graph, out);
  checkIronRule(node.id, node.scope, deps, graph, out);

  if (deps.length > 0 && out.errors.length === 0) {
    for (const dep of findCycleDependencies(node.id, deps, graph)) {
      out.errors.push(`${node.id}: this change would create a cycle through ${dep}`);
    }
  }
}

function validateLevelChange(node: DecisionNode, value: SetValue, graph: DecisionGraph, out: ValidationOutcome): void {
  if (!isDecisionLevel(value)) {
    out.errors.push(`${node.id}: invalid level '${formatValue(value)}' (must be 1-4)`);
    return;
  }
  for (const dep of node.dependsOn) {
    const depLevel = numericLevel(graph.get(dep)?.level);
    if (depLevel !== undefined && depLevel > value) {
      out.warnings.push(`${node.id} (level ${value}): depends on ${dep} (level ${depLevel}) — level inversion`);
    }
  }
}

/**
 * Pre-validate a single-field update on an existing node.
 *
 * Valid fields are `SETTABLE_FIELDS`.
 */
export function validateForSet(
  nid: string,
  field: string,
  value: SetValue,
  graph: DecisionGraph,
): ValidationOutcome {
  const out: ValidationOutcome = { errors: [], warnings: [] };

  const node = graph.get(nid);
  if (!node) {
    out.errors.push(`${nid}: not found in graph`);
    return out;
  }

  switch (field) {
    case "state":
      validateStateChange(node, value, graph, out);
      break;
    case "depends_on":
      validateDependsOnChange(node, value, graph, out);
      break;
    case "level":
      validateLevelChange(node, value, graph, out);
      break;
    case "stakes":
      if (!isDecisionStakes(value)) {
        out.errors.push(`${nid}: invalid stakes '${formatValue(value)}' (must be high/medium/low)`);
      }
      break;
    case "title":
      if (typeof value !== "string" || value.trim() === "") {
        out.errors.push(`${nid}: title cannot be empty`);
      }
      break;
    default:
      out.errors.push(`Unknown field: ${field} (valid: ${SETTABLE_FIELDS.join(", ")})`);
  }

  return out;
}

