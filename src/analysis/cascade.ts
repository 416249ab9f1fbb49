/**
 * Cascade propagation.
 *
 * Breadth-first expansion from a start node in discrete waves, either
 * through dependents (downstream: what a change affects) or through
 * dependencies (upstream: what constrains the node).
 *
 * @module analysis/cascade
 */

import { getDependents } from "../graph/loader.js";
import type { DecisionGraph, DecisionNode } from "../graph/types.js";
import { NotFoundError } from "../utils/errors.js";

export const CASCADE_DIRECTIONS = ["downstream", "upstream"] as const;
export type CascadeDirection = (typeof CASCADE_DIRECTIONS)[number];

export interface CascadeEffect {
  node: string;
  title: string;
  current_state: string;
  /** Names the node that led here */
  reason: string;
  /** The two nodes sit in different partitions */
  cross_scope: boolean;
}

export interface CascadeWave {
  wave: number;
  effects: CascadeEffect[];
}

export interface CascadeResult {
  start_node: string;
  start_title: string;
  direction: CascadeDirection;
  waves: CascadeWave[];
  summary: {
    total_affected: number;
    unique_affected: number;
    wave_count: number;
  };
}

function neighbours(graph: DecisionGraph, node: DecisionNode, direction: CascadeDirection): string[] {
  if (direction === "downstream") {
    return getDependents(graph, node.id);
  }
  return [...new Set(node.dependsOn.filter((dep) => graph.has(dep)))];
}

function reasonFor(from: string, direction: CascadeDirection): string {
  return direction === "downstream" ? `depends on ${from}` : `${from} depends on this`;
}

/**
 * Compute the cascade from `startId`.
 *
 * A node is reported only in the earliest wave that reaches it. Within that
 * wave it gets one effect per parent that reaches it, so `total_affected`
 * can exceed `unique_affected`.
 *
 * @throws NotFoundError when `startId` is not in the graph
 */
export function cascade(
  graph: DecisionGraph,
  startId: string,
  direction: CascadeDirection = "downstream",
): CascadeResult {
  const start = graph.get(startId);
  if (!start) {
    throw new NotFoundError(startId);
  }

  const visited = new Set<string>([startId]);
  const waves: CascadeWave[] = [];
  let frontier = [startId];

  while (frontier.length > 0) {
    const effects: CascadeEffect[] = [];
    const reached = new Set<string>();

    for (const nid of frontier) {
      const node = graph.get(nid);
      if (!node) continue;

      for (const next of neighbours(graph, node, direction)) {
        if (visited.has(next)) continue;
        const target = graph.get(next);
        if (!target) continue;

        effects.push({
          node: next,
          title: target.title ?? "",
          current_state: target.state === undefined ? "unknown" : String(target.state),
          reason: reasonFor(nid, direction),
          cross_scope: node.scope !== target.scope,
        });
        reached.add(next);
      }
    }

    for (const nid of reached) visited.add(nid);
    if (effects.length > 0) {
      waves.push({ wave: waves.length + 1, effects });
    }
    frontier = [...reached].sort();
  }

  const total = waves.reduce((sum, wave) => sum + wave.effects.length, 0);
  const unique = new Set(waves.flatMap((wave) => wave.effects.map((effect) => effect.node))).size;

  return {
    start_node: startId,
    start_title: start.title ?? "",
    direction,
    waves,
    summary: {
      total_affected: total,
      unique_affected: unique,
      wave_count: waves.length,
    },
  };
}
