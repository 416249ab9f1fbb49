/**
 * Compile manifests: deterministic skeletons of the committed and suggested
 * decisions, grouped for a human reader (by level) or an agent (by stakes
 * and state).
 *
 * @module analysis/manifest
 */

import { sortedIds } from "../graph/loader.js";
import {
  DECISION_LEVELS,
  LEVEL_NAMES,
  type DecisionGraph,
  type DecisionNode,
  type FieldValue,
} from "../graph/types.js";

export const MANIFEST_TARGETS = ["human", "agent"] as const;
export type ManifestTarget = (typeof MANIFEST_TARGETS)[number];

export interface DecisionSummary {
  id: string;
  title: string;
  level: FieldValue;
  state: string;
  stakes: FieldValue;
}

export interface ManifestCounts {
  total: number;
  committed: number;
  suggested: number;
  superseded: number;
  by_level: Record<string, number>;
}

export interface HumanLevelEntry {
  name: string;
  committed: DecisionSummary[];
  suggested?: DecisionSummary[];
}

export interface HumanManifest {
  target: "human";
  levels: Record<string, HumanLevelEntry>;
  counts: ManifestCounts;
}

export interface AgentManifest {
  target: "agent";
  constitution: DecisionSummary[];
  high_stakes: DecisionSummary[];
  all_committed: DecisionSummary[];
  all_suggested: DecisionSummary[];
  counts: ManifestCounts;
}

export interface CompiledManifest {
  human?: HumanManifest;
  agent?: AgentManifest;
}

export function summarize(node: DecisionNode): DecisionSummary {
  return {
    id: node.id,
    title: node.title ?? "",
    level: node.level ?? null,
    state: node.state === undefined ? "unknown" : String(node.state),
    stakes: node.stakes ?? null,
  };
}

function orderedNodes(graph: DecisionGraph): DecisionNode[] {
  return sortedIds(graph).flatMap((id) => {
    const node = graph.get(id);
    return node ? [node] : [];
  });
}

export function countDecisions(graph: DecisionGraph): ManifestCounts {
  const byLevel = new Map<string, number>();
  const byState = new Map<string, number>();
  for (const node of graph.values()) {
    const level = node.level === undefined ? "?" : String(node.level);
    const state = node.state === undefined ? "unknown" : String(node.state);
    byLevel.set(level, (byLevel.get(level) ?? 0) + 1);
    byState.set(state, (byState.get(state) ?? 0) + 1);
  }

  return {
    total: graph.size,
    committed: byState.get("committed") ?? 0,
    suggested: byState.get("suggested") ?? 0,
    superseded: byState.get("superseded") ?? 0,
    by_level: Object.fromEntries([...byLevel.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))),
  };
}

function humanManifest(nodes: DecisionNode[], counts: ManifestCounts): HumanManifest {
  const levels: Record<string, HumanLevelEntry> = {};
  for (const level of DECISION_LEVELS) {
    const atLevel = nodes.filter((node) => node.level === level);
    const committed = atLevel.filter((node) => node.state === "committed").map(summarize);
    const suggested = atLevel.filter((node) => node.state === "suggested").map(summarize);

    const entry: HumanLevelEntry = { name: LEVEL_NAMES[level], committed };
    if (suggested.length > 0) entry.suggested = suggested;
    levels[String(level)] = entry;
  }
  return { target: "human", levels, counts };
}

function agentManifest(nodes: DecisionNode[], counts: ManifestCounts): AgentManifest {
  return {
    target: "agent",
    constitution: nodes.filter((node) => node.scope === "constitution").map(summarize),
    high_stakes: nodes.filter((node) => node.stakes === "high").map(summarize),
    all_committed: nodes.filter((node) => node.state === "committed").map(summarize),
    all_suggested: nodes.filter((node) => node.state === "suggested").map(summarize),
    counts,
  };
}

/**
 * Build the requested manifest, or both when no target is given.
 */
export function compileManifest(graph: DecisionGraph, target?: ManifestTarget): CompiledManifest {
  const nodes = orderedNodes(graph);
  const counts = countDecisions(graph);
  const manifest: CompiledManifest = {};

  if (target === undefined || target === "human") {
    manifest.human = humanManifest(nodes, counts);
  }
  if (target === undefined || target === "agent") {
    manifest.agent = agentManifest(nodes, counts);
  }
  return manifest;
}

export function isManifestTarget(value: string): value is ManifestTarget {
  return (MANIFEST_TARGETS as readonly string[]).includes(value);
}
