/**
 * Derived markdown documents: the per-partition index and the health report.
 * Both are pure renderers; writing them is the caller's job.
 */

import { sortedIds } from "../graph/loader.js";
import type { DecisionGraph, DecisionNode, Scope } from "../graph/types.js";

function nodesIn(graph: DecisionGraph, scope: Scope): DecisionNode[] {
  return sortedIds(graph).flatMap((id) => {
    const node = graph.get(id);
    return node && node.scope === scope ? [node] : [];
  });
}

function cell(value: unknown): string {
  return value === undefined || value === null ? "" : String(value);
}

export const INDEX_TITLES: Record<Scope, string> = {
  constitution: "Constitution Index",
  project: "Decision Index",
};

/**
 * Markdown table of one partition's decisions.
 */
export function renderIndex(graph: DecisionGraph, scope: Scope): string {
  const nodes = nodesIn(graph, scope);
  const lines = [
    `# ${INDEX_TITLES[scope]}`,
    "",
    "Derived index. Regenerate via `decigraph index`. Do not edit directly.",
    "",
    `**Total:** ${nodes.length} decisions`,
    "",
    "| ID | Title | Level | State | Stakes | Depends On |",
    "|----|-------|-------|-------|--------|------------|",
  ];

  for (const node of nodes) {
    const deps = node.dependsOn.join(", ") || "—";
    const title = (node.title ?? "").replace(/\|/g, "\\|");
    lines.push(
      `| ${node.id} | ${title} | ${cell(node.level)} | ${cell(node.state)} | ${cell(node.stakes)} | ${deps} |`,
    );
  }

  lines.push("");
  return lines.join("\n");
}

export function countByScope(graph: DecisionGraph, scope: Scope): number {
  return nodesIn(graph, scope).length;
}

// =============================================================================
// Health
// =============================================================================

function stateSummary(nodes: DecisionNode[]): string {
  const counts = new Map<string, number>();
  for (const node of nodes) {
    const state = node.state === undefined ? "unknown" : String(node.state);
    counts.set(state, (counts.get(state) ?? 0) + 1);
  }
  const parts = [...counts.keys()].sort().map((state) => {
    const count = counts.get(state) ?? 0;
    return count === nodes.length ? `all \`${state}\`` : `${count} \`${state}\``;
  });
  return parts.length > 0 ? parts.join(", ") : "—";
}

function levelSummary(nodes: DecisionNode[]): string {
  const counts = new Map<string, number>();
  for (const node of nodes) {
    const level = node.level === undefined ? "?" : String(node.level);
    counts.set(level, (counts.get(level) ?? 0) + 1);
  }
  return [...counts.keys()]
    .sort()
    .map((level) => `L${level}: ${counts.get(level) ?? 0}`)
    .join(", ");
}

/**
 * Body of the `## Manual Flags` section of a previous report, trimmed.
 * Empty when there is none.
 */
export function extractManualFlags(previous: string | undefined): string {
  if (!previous) return "";
  const match = /^## Manual Flags\s*\n([\s\S]*?)(?=^## |(?![\s\S]))/m.exec(previous);
  return match ? match[1].trim() : "";
}

export interface HealthInput {
  graph: DecisionGraph;
  /** Number of validation errors in the current graph */
  errorCount: number;
  /** Previous report, for carrying over manual flags */
  previous?: string;
  today: string;
}

export interface HealthReport {
  content: string;
  flaggedCount: number;
}

export function renderHealth({ graph, errorCount, previous, today }: HealthInput): HealthReport {
  const constitution = nodesIn(graph, "constitution");
  const project = nodesIn(graph, "project");

  const lines = ["# System Health", "", `Last updated: ${today}`, "", "## Node Counts", ""];

  if (constitution.length > 0) {
    lines.push("### Constitution");
    lines.push(`- Decisions: ${constitution.length} — ${stateSummary(constitution)}`);
    lines.push(`- Levels: ${levelSummary(constitution)}`);
    lines.push("");
  }

  if (constitution.length > 0) lines.push("### Project");
  lines.push(`- Decisions: ${project.length} — ${stateSummary(project)}`);
  lines.push(`- Levels: ${levelSummary(project)}`);
  lines.push(`- **Total: ${graph.size} decisions**`);
  lines.push("");

  const flagged: string[] = [];
  for (const state of ["suggested", "superseded"]) {
    const ids = sortedIds(graph).filter((id) => graph.get(id)?.state === state);
    if (ids.length > 0) {
      flagged.push(`${ids.length} decisions at \`${state}\` (${ids.join(", ")})`);
    }
  }
  if (errorCount > 0) {
    flagged.push(`${errorCount} validation error(s) — run \`decigraph validate\` for details`);
  }

  lines.push("## Flagged Items", "");
  if (flagged.length > 0) {
    for (const item of flagged) lines.push(`- ${item}`);
  } else {
    lines.push("- No issues found.");
  }
  lines.push("");

  const manualFlags = extractManualFlags(previous);
  if (manualFlags) {
    lines.push("## Manual Flags", "", manualFlags, "");
  }

  lines.push("## Last Session", "", `${today} — Health regenerated by decigraph`, "");

  return { content: lines.join("\n"), flaggedCount: flagged.length };
}
