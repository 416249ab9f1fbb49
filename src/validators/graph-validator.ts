/**
 * Graph Validator
 *
 * Whole-graph checks over a loaded decision graph. Every tier always runs
 * and every finding is collected; nothing here throws on bad data.
 *
 * Errors block (a graph with errors is not healthy); warnings are advisory.
 *
 * @module validators/graph-validator
 */

import { log } from "../utils/telemetry.js";
import { EMPTY_LINT_CONFIG, type LintConfig } from "../config/lint-config.js";
import { getDependents, numericLevel, sortedIds } from "../graph/loader.js";
import {
  DECISION_ID_PREFIX,
  REQUIRED_SECTIONS,
  isDecisionLevel,
  isDecisionStakes,
  isDecisionState,
  type DecisionGraph,
  type DecisionNode,
  type FieldValue,
  type ValidationOutcome,
} from "../graph/types.js";
import { lintBody } from "./body-linter.js";

// =============================================================================
// Helpers
// =============================================================================

/** Render a raw field value the way it appears in messages. */
export function formatValue(value: FieldValue | undefined): string {
  if (value === undefined || value === null) return "None";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function isBlank(value: FieldValue | undefined): boolean {
  return value === undefined || value === null || value === "" || value === false || value === 0;
}

/**
 * Forward adjacency restricted to edges whose target exists, in declared
 * order. Dangling edges are reported elsewhere and ignored for traversal.
 */
export function buildForwardAdjacency(graph: DecisionGraph): Map<string, string[]> {
  const forward = new Map<string, string[]>();
  for (const node of graph.values()) {
    forward.set(
      node.id,
      node.dependsOn.filter((dep) => graph.has(dep)),
    );
  }
  return forward;
}

function sectionPattern(section: string): RegExp {
  return new RegExp(`^## ${section}[ \\t]*$`, "m");
}

const SECTION_PATTERNS = REQUIRED_SECTIONS.map((section) => ({
  section,
  pattern: sectionPattern(section),
}));

// =============================================================================
// Tier 1: Fields and references
// =============================================================================

function validateFields(node: DecisionNode, graph: DecisionGraph, out: ValidationOutcome): void {
  const nid = node.id;

  if (!nid.startsWith(DECISION_ID_PREFIX)) {
    out.errors.push(`${nid}: ID must start with ${DECISION_ID_PREFIX}`);
  }

  if (!node.title) out.warnings.push(`${nid}: missing title`);
  if (!node.date) out.warnings.push(`${nid}: missing date`);

  if (node.level === undefined) {
    out.errors.push(`${nid}: missing level`);
  } else if (!isDecisionLevel(node.level)) {
    out.errors.push(`${nid}: invalid level '${formatValue(node.level)}' (must be 1-4)`);
  }

  if (!isBlank(node.state) && !isDecisionState(node.state)) {
    out.errors.push(
      `${nid}: invalid state '${formatValue(node.state)}' (must be suggested/committed/superseded)`,
    );
  } else if (isBlank(node.state)) {
    out.warnings.push(`${nid}: missing state`);
  }

  if (!isBlank(node.stakes) && !isDecisionStakes(node.stakes)) {
    out.errors.push(`${nid}: invalid stakes '${formatValue(node.stakes)}' (must be high/medium/low)`);
  }

  for (const dep of node.dependsOn) {
    if (!graph.has(dep)) {
      out.errors.push(`${nid}: depends_on references non-existent ${dep}`);
    }
  }

  for (const { section, pattern } of SECTION_PATTERNS) {
    if (!pattern.test(node.body)) {
      out.warnings.push(`${nid}: missing required section ## ${section}`);
    }
  }
}

// =============================================================================
// Tier 2: Cycles
// =============================================================================

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;
type Color = typeof WHITE | typeof GRAY | typeof BLACK;

/**
 * Three-colour depth-first search over the forward edges with an explicit
 * work stack. The stack of in-progress nodes is the current path, so a back
 * edge to a gray node yields the cycle directly. After the first cycle in a
 * component the remaining in-progress nodes are closed and the search moves
 * on to the next unvisited root.
 */
export function findCycles(graph: DecisionGraph): string[][] {
  const forward = buildForwardAdjacency(graph);
  const color = new Map<string, Color>();
  for (const id of graph.keys()) color.set(id, WHITE);

  const cycles: string[][] = [];

  for (const root of graph.keys()) {
    if (color.get(root) !== WHITE) continue;

    const path: string[] = [root];
    const nextEdge: number[] = [0];
    color.set(root, GRAY);

    while (path.length > 0) {
      const depth = path.length - 1;
      const current = path[depth];
      const neighbours = forward.get(current) ?? [];
      const edgeIndex = nextEdge[depth];

      if (edgeIndex >= neighbours.length) {
        color.set(current, BLACK);
        path.pop();
        nextEdge.pop();
        continue;
      }

      nextEdge[depth] = edgeIndex + 1;
      const next = neighbours[edgeIndex];
      const nextColor = color.get(next);

      if (nextColor === GRAY) {
        cycles.push([...path.slice(path.indexOf(next)), next]);
        for (const open of path) color.set(open, BLACK);
        break;
      }

      if (nextColor === WHITE) {
        color.set(next, GRAY);
        path.push(next);
        nextEdge.push(0);
      }
    }
  }

  return cycles;
}

// =============================================================================
// Tier 3: Topology
// =============================================================================

function validateOrphans(graph: DecisionGraph, ids: string[], out: ValidationOutcome): void {
  const orphans = new Set<string>();

  for (const nid of ids) {
    const node = graph.get(nid);
    if (!node) continue;
    if (node.dependsOn.length === 0 && getDependents(graph, nid).length === 0) {
      orphans.add(nid);
      out.warnings.push(`${nid}: orphan (no upstream or downstream edges)`);
    }
  }

  // Missing-dep only fires where the plain orphan warning does not already apply
  for (const nid of ids) {
    const node = graph.get(nid);
    if (!node) continue;
    const level = numericLevel(node.level);
    if (level !== undefined && level >= 2 && node.dependsOn.length === 0 && !orphans.has(nid)) {
      out.warnings.push(
        `${nid} [missing-dep]: no depends_on — L${level} decisions should have upstream dependencies`,
      );
    }
  }
}

function validateLevelOrder(graph: DecisionGraph, ids: string[], out: ValidationOutcome): void {
  for (const nid of ids) {
    const node = graph.get(nid);
    const level = numericLevel(node?.level);
    if (!node || level === undefined) continue;

    for (const dep of node.dependsOn) {
      const depLevel = numericLevel(graph.get(dep)?.level);
      if (depLevel !== undefined && depLevel > level) {
        out.warnings.push(
          `${nid} (level ${level}): depends on ${dep} (level ${depLevel}) — level inversion`,
        );
      }
    }
  }
}

/** Constitution never depends on project. */
function validateIronRule(graph: DecisionGraph, ids: string[], out: ValidationOutcome): void {
  for (const nid of ids) {
    const node = graph.get(nid);
    if (!node || node.scope !== "constitution") continue;

    for (const dep of node.dependsOn) {
      if (graph.get(dep)?.scope === "project") {
        out.errors.push(`${nid}: constitution depends on project ${dep} (iron rule violation)`);
      }
    }
  }
}

function validateStateHealth(graph: DecisionGraph, ids: string[], out: ValidationOutcome): void {
  for (const nid of ids) {
    const node = graph.get(nid);
    if (!node || node.state !== "committed") continue;

    for (const dep of node.dependsOn) {
      const depState = graph.get(dep)?.state;
      if (depState === "superseded") {
        out.errors.push(`${nid}: committed but upstream ${dep} is superseded`);
      } else if (depState === "suggested") {
        out.errors.push(`${nid}: committed but upstream ${dep} is still suggested`);
      }
    }
  }
}

// =============================================================================
// Main Validation Function
// =============================================================================

/**
 * Validate the whole graph.
 *
 * Errors and warnings are plain strings naming the node and the offending
 * value or counterpart. Per-node findings are emitted in ID order.
 */
export function validate(graph: DecisionGraph, lintConfig: LintConfig = EMPTY_LINT_CONFIG): ValidationOutcome {
  const startTime = Date.now();
  const out: ValidationOutcome = { errors: [], warnings: [] };
  const ids = sortedIds(graph);

  // Tier 1: Fields, references, sections
  for (const nid of ids) {
    const node = graph.get(nid);
    if (node) validateFields(node, graph, out);
  }

  // Tier 2: Cycles
  for (const cycle of findCycles(graph)) {
    out.errors.push(`Cycle detected: ${cycle.join(" → ")}`);
  }

  // Tier 3: Topology and scope
  validateOrphans(graph, ids, out);
  validateLevelOrder(graph, ids, out);
  validateIronRule(graph, ids, out);
  validateStateHealth(graph, ids, out);

  // Tier 4: Body lint
  for (const nid of ids) {
    const node = graph.get(nid);
    if (node) out.warnings.push(...lintBody(node, graph, lintConfig));
  }

  log.debug(
    {
      event: "graph_validator.complete",
      nodeCount: graph.size,
      errorCount: out.errors.length,
      warningCount: out.warnings.length,
      durationMs: Date.now() - startTime,
    },
    out.errors.length === 0 ? "Graph validation passed" : "Graph validation failed",
  );

  return out;
}
