/**
 * Frontier analysis: what is ready to decide next, what blocks the rest, and
 * which decisions carry the most downstream weight.
 *
 * @module analysis/frontier
 */

import { getDependents, numericLevel, sortedIds } from "../graph/loader.js";
import {
  DECISION_LEVELS,
  LEVEL_NAMES,
  type DecisionGraph,
  type DecisionLevel,
  type DecisionNode,
  type FieldValue,
  type Scope,
} from "../graph/types.js";

export const DEFAULT_TOP_N = 10;

export interface FrontierEntry {
  id: string;
  title: string;
  level: FieldValue;
  stakes: FieldValue;
  scope: Scope;
  downstream_weight: number;
  downstream_ids: string[];
}

export interface BlockedEntry extends FrontierEntry {
  /** Direct dependencies that are not committed */
  blockers: string[];
  /** Deepest unresolved ancestor first, ending next to the target */
  critical_path: string[];
  critical_path_length: number;
}

export interface LevelGap {
  level: DecisionLevel;
  level_name: string;
  committed: number;
  suggested: number;
  superseded: number;
  total: number;
  flags: string[];
}

export interface HighWeightEntry {
  id: string;
  title: string;
  level: FieldValue;
  state: string;
  stakes: FieldValue;
  scope: Scope;
  downstream_weight: number;
  direct_dependents: string[];
}

export interface FrontierSummary {
  total_decisions: number;
  suggested: number;
  committable_count: number;
  blocked_count: number;
  level_gap_count: number;
}

export interface FrontierResult {
  committable: FrontierEntry[];
  blocked: BlockedEntry[];
  level_gaps: LevelGap[];
  high_weight: HighWeightEntry[];
  summary: FrontierSummary;
}

// =============================================================================
// Downstream weight
// =============================================================================

function buildReverseAdjacency(graph: DecisionGraph): Map<string, Set<string>> {
  const reverse = new Map<string, Set<string>>();
  for (const node of graph.values()) {
    for (const dep of node.dependsOn) {
      if (!graph.has(dep)) continue;
      const dependents = reverse.get(dep) ?? new Set<string>();
      dependents.add(node.id);
      reverse.set(dep, dependents);
    }
  }
  return reverse;
}

/**
 * Every node's full set of transitive dependents. A finished set is reused
 * whenever another search reaches that node, instead of expanding it again.
 */
export function computeTransitiveDownstream(graph: DecisionGraph): Map<string, Set<string>> {
  const reverse = buildReverseAdjacency(graph);
  const memo = new Map<string, Set<string>>();

  for (const nid of sortedIds(graph)) {
    const reached = new Set<string>();
    const queue = [...(reverse.get(nid) ?? [])];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || reached.has(current)) continue;
      reached.add(current);

      const known = memo.get(current);
      if (known) {
        for (const id of known) reached.add(id);
        continue;
      }
      for (const next of reverse.get(current) ?? []) {
        if (!reached.has(next)) queue.push(next);
      }
    }

    memo.set(nid, reached);
  }

  return memo;
}

// =============================================================================
// Critical path
// =============================================================================

function isUnresolved(graph: DecisionGraph, id: string): boolean {
  const node = graph.get(id);
  return node !== undefined && node.state !== "committed";
}

/**
 * Breadth-first search upstream from `targetId` through non-committed
 * dependencies. Returns the chain from the deepest unresolved ancestor down
 * to (excluding) the target.
 */
export function criticalPath(graph: DecisionGraph, targetId: string): string[] {
  const target = graph.get(targetId);
  if (!target) return [];

  const visited = new Set<string>([targetId]);
  const depth = new Map<string, number>([[targetId, 0]]);
  const parent = new Map<string, string>();
  const queue = [targetId];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    const currentDepth = depth.get(current) ?? 0;

    for (const dep of graph.get(current)?.dependsOn ?? []) {
      if (visited.has(dep) || !isUnresolved(graph, dep)) continue;
      visited.add(dep);
      depth.set(dep, currentDepth + 1);
      parent.set(dep, current);
      queue.push(dep);
    }
  }

  if (parent.size === 0) {
    return target.dependsOn.filter((dep) => isUnresolved(graph, dep));
  }

  let deepest = "";
  let deepestDepth = -1;
  for (const id of parent.keys()) {
    const d = depth.get(id) ?? 0;
    if (d > deepestDepth) {
      deepest = id;
      deepestDepth = d;
    }
  }

  const path: string[] = [];
  let current: string | undefined = deepest;
  while (current !== undefined && current !== targetId) {
    path.push(current);
    current = parent.get(current);
  }
  return path;
}

// =============================================================================
// Level gaps
// =============================================================================

export function computeLevelGaps(graph: DecisionGraph): LevelGap[] {
  return DECISION_LEVELS.map((level) => {
    let committed = 0;
    let suggested = 0;
    let superseded = 0;
    for (const node of graph.values()) {
      if (node.level !== level) continue;
      if (node.state === "committed") committed++;
      else if (node.state === "suggested") suggested++;
      else if (node.state === "superseded") superseded++;
    }

    const total = committed + suggested + superseded;
    const flags: string[] = [];
    if (suggested > committed) flags.push("more suggested than committed");
    if (committed === 0 && total > 0) flags.push("no committed decisions");

    return {
      level,
      level_name: LEVEL_NAMES[level],
      committed,
      suggested,
      superseded,
      total,
      flags,
    };
  });
}

// =============================================================================
// Frontier
// =============================================================================

function baseEntry(node: DecisionNode, downstream: Set<string> | undefined): FrontierEntry {
  return {
    id: node.id,
    title: node.title ?? "",
    level: node.level ?? null,
    stakes: node.stakes ?? null,
    scope: node.scope,
    downstream_weight: downstream?.size ?? 0,
    downstream_ids: [...(downstream ?? [])].sort(),
  };
}

function sortLevel(level: FieldValue): number {
  const n = numericLevel(level);
  return n === undefined || n === 0 ? 99 : n;
}

/**
 * Partition suggested decisions into committable and blocked, and rank the
 * whole graph by downstream weight.
 */
export function frontier(graph: DecisionGraph, topN: number = DEFAULT_TOP_N): FrontierResult {
  const downstream = computeTransitiveDownstream(graph);
  const ids = sortedIds(graph);

  const committable: FrontierEntry[] = [];
  const blocked: BlockedEntry[] = [];

  for (const nid of ids) {
    const node = graph.get(nid);
    if (!node || node.state !== "suggested") continue;

    const entry = baseEntry(node, downstream.get(nid));
    const blockers = node.dependsOn.filter((dep) => isUnresolved(graph, dep));

    if (blockers.length === 0) {
      committable.push(entry);
    } else {
      const path = criticalPath(graph, nid);
      blocked.push({
        ...entry,
        blockers,
        critical_path: path,
        critical_path_length: path.length,
      });
    }
  }

  committable.sort(
    (a, b) => b.downstream_weight - a.downstream_weight || sortLevel(a.level) - sortLevel(b.level),
  );
  blocked.sort(
    (a, b) => a.critical_path_length - b.critical_path_length || b.downstream_weight - a.downstream_weight,
  );

  const levelGaps = computeLevelGaps(graph);

  const highWeight: HighWeightEntry[] = ids
    .flatMap((nid) => {
      const node = graph.get(nid);
      if (!node) return [];
      return [
        {
          id: nid,
          title: node.title ?? "",
          level: node.level ?? null,
          state: node.state === undefined ? "unknown" : String(node.state),
          stakes: node.stakes ?? null,
          scope: node.scope,
          downstream_weight: downstream.get(nid)?.size ?? 0,
          direct_dependents: getDependents(graph, nid),
        },
      ];
    })
    .sort((a, b) => b.downstream_weight - a.downstream_weight)
    .slice(0, Math.max(0, topN));

  let suggestedCount = 0;
  for (const node of graph.values()) {
    if (node.state === "suggested") suggestedCount++;
  }

  return {
    committable,
    blocked,
    level_gaps: levelGaps,
    high_weight: highWeight,
    summary: {
      total_decisions: graph.size,
      suggested: suggestedCount,
      committable_count: committable.length,
      blocked_count: blocked.length,
      level_gap_count: levelGaps.filter((gap) => gap.flags.length > 0).length,
    },
  };
}
