/**
 * Body text lint rules.
 *
 * Each rule looks only at one node's body and contributes warnings. The
 * static rules always run; terminology and deleted-artifact rules come from
 * the lint configuration passed in by the caller.
 */

import type { LintConfig } from "../config/lint-config.js";
import type { DecisionGraph, DecisionNode } from "../graph/types.js";

const STALE_INF_REF = /\bINF-\d{3}\b/g;
const STALE_CTX_REF = /\bCTX-\d{3}\b/g;
const DECISION_BODY_REF = /\bDEC-(\d{3})\b/g;
const SUPERSEDES_CLAIM = /[Ss]upersedes?\s+(DEC-\d{3})/g;

function uniqueSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

function staleRefs(node: DecisionNode): string[] {
  const out: string[] = [];
  for (const [family, pattern] of [["INF", STALE_INF_REF], ["CTX", STALE_CTX_REF]] as const) {
    const ids = uniqueSorted(node.body.match(pattern) ?? []);
    if (ids.length > 0) {
      out.push(
        `${node.id} [stale-ref]: body references ${ids.length} stale ${family} ID(s) (${ids.join(", ")})`,
      );
    }
  }
  return out;
}

function brokenRefs(node: DecisionNode, graph: DecisionGraph): string[] {
  const referenced = uniqueSorted([...node.body.matchAll(DECISION_BODY_REF)].map((m) => `DEC-${m[1]}`));
  const missing = referenced.filter((ref) => ref !== node.id && !graph.has(ref));
  if (missing.length === 0) return [];
  return [`${node.id} [broken-ref]: body references non-existent ${missing.join(", ")}`];
}

function supersessionClaims(node: DecisionNode, graph: DecisionGraph): string[] {
  const out: string[] = [];
  for (const match of node.body.matchAll(SUPERSEDES_CLAIM)) {
    const targetId = match[1];
    const target = graph.get(targetId);
    if (target && target.state !== "superseded") {
      const state = target.state === undefined ? "unknown" : String(target.state);
      out.push(
        `${node.id} [supersession]: claims to supersede ${targetId}, but ${targetId} state is '${state}'`,
      );
    }
  }
  return out;
}

function terminology(node: DecisionNode, config: LintConfig): string[] {
  const rule = config.terminology;
  if (!rule || rule.exemptIds.has(node.id)) return [];

  let count = 0;
  for (const line of node.body.split("\n")) {
    if (!rule.pattern.test(line)) continue;
    if (rule.exemptions.some((exemption) => exemption.test(line))) continue;
    count++;
  }

  if (count === 0) return [];
  return [`${node.id} [terminology]: ${count} line(s) with unexempted '${rule.term}' in body text`];
}

function deletedArtifacts(node: DecisionNode, config: LintConfig): string[] {
  const labels = config.deletedArtifacts
    .filter((artifact) => artifact.pattern.test(node.body))
    .map((artifact) => artifact.label);
  if (labels.length === 0) return [];
  return [`${node.id} [deleted-artifact]: body references deleted artifacts: ${labels.join(", ")}`];
}

/**
 * Run every body rule over one node. Empty bodies are skipped.
 */
export function lintBody(node: DecisionNode, graph: DecisionGraph, config: LintConfig): string[] {
  if (!node.body) return [];
  return [
    ...staleRefs(node),
    ...brokenRefs(node, graph),
    ...supersessionClaims(node, graph),
    ...terminology(node, config),
    ...deletedArtifacts(node, config),
  ];
}
