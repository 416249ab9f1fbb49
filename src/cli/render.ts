/**
 * Plain-text and markdown renderers for CLI output. Every function returns
 * lines; the caller decides where they go.
 */

import type { CascadeResult } from "../analysis/cascade.js";
import type { FrontierResult } from "../analysis/frontier.js";
import type { AgentManifest, DecisionSummary, HumanManifest } from "../analysis/manifest.js";
import type { SearchResult } from "../analysis/search.js";
import type { FieldValue } from "../graph/types.js";
import type { EditResult, SetResult, ValidationReport } from "../services/decision-service.js";
import type { ScratchpadEntry, ScratchpadListing } from "../store/scratchpad-store.js";

const RULE_60 = "-".repeat(60);
const RULE_70 = "-".repeat(70);
const RULE_90 = "-".repeat(90);

function show(value: FieldValue | undefined): string {
  if (value === undefined || value === null) return "?";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function col(value: string, width: number): string {
  return value.padEnd(width);
}

// =============================================================================
// validate
// =============================================================================

export function renderValidation(report: ValidationReport): string[] {
  const lines: string[] = [];
  if (report.errors.length > 0) {
    lines.push(`ERRORS (${report.errors.length}):`);
    for (const error of report.errors) lines.push(`  ${error}`);
  }
  if (report.warnings.length > 0) {
    lines.push("", `WARNINGS (${report.warnings.length}):`);
    for (const warning of report.warnings) lines.push(`  ${warning}`);
  }
  if (report.errors.length === 0 && report.warnings.length === 0) {
    lines.push(`Validation passed: ${report.node_count} decisions, 0 errors, 0 warnings.`);
  }
  return lines;
}

// =============================================================================
// cascade
// =============================================================================

export function renderCascadeTable(result: CascadeResult): string[] {
  const upstream = result.direction === "upstream";
  if (result.waves.length === 0) {
    return [`No ${upstream ? "upstream dependencies" : "downstream dependents"} for ${result.start_node}.`];
  }

  const lines: string[] = [];
  for (const wave of result.waves) {
    lines.push("", `=== Wave ${wave.wave} ===`);
    lines.push(`${col("Node", 12)} ${col("State", 14)} Reason`);
    lines.push(RULE_60);
    for (const effect of wave.effects) {
      const cross = effect.cross_scope ? " [cross-scope]" : "";
      lines.push(`${col(effect.node, 12)} ${col(effect.current_state, 14)} ${effect.reason}${cross}`);
    }
  }

  const { total_affected, unique_affected, wave_count } = result.summary;
  lines.push(
    "",
    upstream
      ? `Total: ${unique_affected} upstream decisions across ${wave_count} wave(s).`
      : `Total: ${total_affected} decisions need review across ${wave_count} wave(s).`,
  );
  return lines;
}

export function renderCascadeMarkdown(result: CascadeResult): string[] {
  const upstream = result.direction === "upstream";
  const lines = [`### ${upstream ? "Upstream" : "Cascade"}: ${result.start_node} — ${result.start_title || "(no title)"}`, ""];

  if (result.waves.length === 0) {
    lines.push(upstream ? "No upstream dependencies." : "No downstream dependents.");
    return lines;
  }

  const { total_affected, unique_affected, wave_count } = result.summary;
  lines.push(
    upstream
      ? `**${unique_affected} upstream decisions** across ${wave_count} wave(s).`
      : `**${total_affected} decisions** need review across ${wave_count} wave(s).`,
    "",
  );

  for (const wave of result.waves) {
    lines.push(`#### Wave ${wave.wave}`, "", "| Node | Title | State | Reason |", "|------|-------|-------|--------|");
    for (const effect of wave.effects) {
      const cross = effect.cross_scope ? " [cross-scope]" : "";
      lines.push(`| ${effect.node} | ${effect.title} | ${effect.current_state} | ${effect.reason}${cross} |`);
    }
    lines.push("");
  }
  return lines;
}

// =============================================================================
// frontier
// =============================================================================

function pathText(path: string[], id: string): string {
  return path.length > 0 ? `${path.join(" → ")} → ${id}` : "—";
}

export function renderFrontierTable(result: FrontierResult, topN: number): string[] {
  const { summary, committable, blocked, level_gaps, high_weight } = result;
  const lines = [
    `Decision Frontier — ${summary.total_decisions} decisions, ${summary.suggested} suggested, ` +
      `${summary.committable_count} committable, ${summary.blocked_count} blocked`,
  ];

  lines.push("", `=== Committable Now (${committable.length}) ===`);
  if (committable.length > 0) {
    lines.push(`${col("ID", 12)} ${col("Level", 7)} ${col("Stakes", 8)} ${col("Weight", 8)} Title`, RULE_70);
    for (const entry of committable) {
      lines.push(
        `${col(entry.id, 12)} L${col(show(entry.level), 6)} ${col(entry.stakes ? show(entry.stakes) : "—", 8)} ` +
          `${col(String(entry.downstream_weight), 8)} ${entry.title}`,
      );
    }
  } else {
    lines.push("  None — all suggested decisions have uncommitted upstream.");
  }

  lines.push("", `=== Blocked (${blocked.length}) ===`);
  if (blocked.length > 0) {
    lines.push(`${col("ID", 12)} ${col("Level", 7)} ${col("Path Len", 10)} ${col("Blockers", 25)} Critical Path`, RULE_90);
    for (const entry of blocked) {
      lines.push(
        `${col(entry.id, 12)} L${col(show(entry.level), 6)} ${col(String(entry.critical_path_length), 10)} ` +
          `${col(entry.blockers.join(", "), 25)} ${pathText(entry.critical_path, entry.id)}`,
      );
    }
  } else {
    lines.push("  None — all suggested decisions are committable.");
  }

  lines.push("", "=== Level Gaps ===");
  lines.push(`${col("Level", 8)} ${col("Name", 12)} ${col("Committed", 11)} ${col("Suggested", 11)} Flags`, RULE_60);
  for (const gap of level_gaps) {
    lines.push(
      `L${col(String(gap.level), 7)} ${col(gap.level_name, 12)} ${col(String(gap.committed), 11)} ` +
        `${col(String(gap.suggested), 11)} ${gap.flags.length > 0 ? gap.flags.join(", ") : "—"}`,
    );
  }

  lines.push("", `=== High-Weight Nodes (top ${topN}) ===`);
  if (high_weight.length > 0) {
    lines.push(`${col("ID", 12)} ${col("Level", 7)} ${col("State", 12)} ${col("Weight", 8)} Title`, RULE_70);
    for (const entry of high_weight) {
      lines.push(
        `${col(entry.id, 12)} L${col(show(entry.level), 6)} ${col(entry.state, 12)} ` +
          `${col(String(entry.downstream_weight), 8)} ${entry.title}`,
      );
    }
  }
  return lines;
}

export function renderFrontierMarkdown(result: FrontierResult, topN: number): string[] {
  const { summary, committable, blocked, level_gaps, high_weight } = result;
  const lines = [
    "# Decision Frontier",
    "",
    `**${summary.total_decisions} decisions** — ${summary.suggested} suggested, ` +
      `${summary.committable_count} committable, ${summary.blocked_count} blocked`,
    "",
    "## Committable Now",
    "",
  ];

  if (committable.length > 0) {
    lines.push("| ID | Title | Level | Stakes | Downstream |", "|----|-------|-------|--------|------------|");
    for (const entry of committable) {
      lines.push(
        `| ${entry.id} | ${entry.title} | L${show(entry.level)} | ${entry.stakes ? show(entry.stakes) : "—"} | ${entry.downstream_weight} |`,
      );
    }
  } else {
    lines.push("None — all suggested decisions have uncommitted upstream.");
  }
  lines.push("", "## Blocked", "");

  if (blocked.length > 0) {
    lines.push("| ID | Title | Level | Blockers | Critical Path |", "|----|-------|-------|----------|---------------|");
    for (const entry of blocked) {
      lines.push(
        `| ${entry.id} | ${entry.title} | L${show(entry.level)} | ${entry.blockers.join(", ")} | ${pathText(entry.critical_path, entry.id)} |`,
      );
    }
  } else {
    lines.push("None — all suggested decisions are committable.");
  }
  lines.push("", "## Level Gaps", "", "| Level | Name | Committed | Suggested | Flags |", "|-------|------|-----------|-----------|-------|");

  for (const gap of level_gaps) {
    const flags = gap.flags.length > 0 ? gap.flags.join(", ") : "—";
    lines.push(`| L${gap.level} | ${gap.level_name} | ${gap.committed} | ${gap.suggested} | ${flags} |`);
  }

  lines.push("", `## High-Weight Nodes (top ${topN})`, "", "| ID | Title | Level | State | Downstream |", "|----|-------|-------|-------|------------|");
  for (const entry of high_weight) {
    lines.push(`| ${entry.id} | ${entry.title} | L${show(entry.level)} | ${entry.state} | ${entry.downstream_weight} |`);
  }
  return lines;
}

// =============================================================================
// search
// =============================================================================

export function renderSearch(results: SearchResult[], terms: string[]): string[] {
  const query = terms.join(" ");
  if (results.length === 0) {
    return [`No decisions match: ${query}`];
  }

  const lines = [
    `Found ${results.length} decision(s) matching: ${query}`,
    "",
    `${col("ID", 12)} ${col("Level", 7)} ${col("State", 12)} ${col("Sections", 30)} Title`,
    RULE_90,
  ];
  for (const result of results) {
    const sections = result.matched_sections.length > 0 ? result.matched_sections.join(", ") : "—";
    lines.push(
      `${col(result.id, 12)} L${col(show(result.level), 6)} ${col(result.state, 12)} ${col(sections, 30)} ${result.title}`,
    );
  }
  return lines;
}

// =============================================================================
// compile-manifest
// =============================================================================

function stakesTag(summary: DecisionSummary): string {
  return summary.stakes ? ` [${show(summary.stakes)}]` : "";
}

export function renderHumanManifest(manifest: HumanManifest): string[] {
  const lines = ["# Compile Manifest — Human Contract", ""];
  for (const [level, entry] of Object.entries(manifest.levels)) {
    lines.push(`## ${entry.name} (Level ${level})`, "");
    for (const summary of entry.committed) {
      lines.push(`  - ${summary.id}: ${summary.title}${stakesTag(summary)}`);
    }
    if (entry.suggested) {
      lines.push("  Suggested:");
      for (const summary of entry.suggested) {
        lines.push(`  - ${summary.id}: ${summary.title}${stakesTag(summary)}`);
      }
    }
    lines.push("");
  }
  const { counts } = manifest;
  lines.push(`Total: ${counts.total} decisions (${counts.committed} committed, ${counts.suggested} suggested)`);
  return lines;
}

export function renderAgentManifest(manifest: AgentManifest): string[] {
  const lines = ["# Compile Manifest — Agent Contract", ""];

  lines.push(`## Constitution (${manifest.constitution.length} decisions)`);
  for (const summary of manifest.constitution) lines.push(`  - ${summary.id}: ${summary.title} [${summary.state}]`);
  lines.push("", `## High Stakes (${manifest.high_stakes.length} decisions)`);
  for (const summary of manifest.high_stakes) lines.push(`  - ${summary.id}: ${summary.title} [${summary.state}]`);
  lines.push("", `## All Committed (${manifest.all_committed.length} decisions)`);
  for (const summary of manifest.all_committed) lines.push(`  - ${summary.id}: ${summary.title}${stakesTag(summary)}`);
  lines.push("");

  if (manifest.all_suggested.length > 0) {
    lines.push(`## All Suggested (${manifest.all_suggested.length} decisions)`);
    for (const summary of manifest.all_suggested) lines.push(`  - ${summary.id}: ${summary.title}${stakesTag(summary)}`);
    lines.push("");
  }

  const { counts } = manifest;
  lines.push(`Total: ${counts.total} decisions (${counts.committed} committed, ${counts.suggested} suggested)`);
  return lines;
}

// =============================================================================
// mutations
// =============================================================================

function showSetValue(value: FieldValue): string {
  if (Array.isArray(value)) {
    return value.length > 0 ? value.map((item) => show(item)).join(", ") : "[]";
  }
  return value === null ? "None" : show(value);
}

export function renderSetApplied(result: Extract<SetResult, { applied: true }>): string {
  return `${result.id}: ${result.field} ${showSetValue(result.old_value)} → ${showSetValue(result.new_value)}`;
}

export function renderEdit(result: EditResult): string[] {
  const lines = [`${result.id}: body edited (${result.chars_removed} chars → ${result.chars_added} chars)`];

  if (result.resolved_warnings.length > 0) {
    lines.push(`  Resolved ${result.resolved_warnings.length} warning(s):`);
    for (const warning of result.resolved_warnings) lines.push(`    - ${warning}`);
  }
  if (result.new_warnings.length > 0) {
    lines.push(`  Introduced ${result.new_warnings.length} new warning(s):`);
    for (const warning of result.new_warnings) lines.push(`    + ${warning}`);
  }
  if (result.new_errors.length > 0) {
    lines.push(`  INTRODUCED ${result.new_errors.length} new ERROR(s):`);
    for (const error of result.new_errors) lines.push(`    ! ${error}`);
  } else if (result.new_warnings.length === 0) {
    lines.push("  No new issues introduced.");
  }
  return lines;
}

// =============================================================================
// scratchpad
// =============================================================================

export function renderScratchpadEntry(entry: ScratchpadEntry): string {
  const links = entry.links.length > 0 ? ` (links: ${entry.links.join(", ")})` : "";
  return `Added ${entry.id} [${entry.type}]: ${entry.content}${links}`;
}

export function renderScratchpadList({ active, matured }: ScratchpadListing): string[] {
  if (active.length === 0 && matured.length === 0) {
    return ["Scratchpad is empty."];
  }

  const lines: string[] = [];
  if (active.length > 0) {
    lines.push(`Active (${active.length}):`, `${col("ID", 10)} ${col("Type", 12)} ${col("Created", 12)} Content`, RULE_70);
    for (const entry of active) {
      const links = entry.links.length > 0 ? ` → ${entry.links.join(", ")}` : "";
      lines.push(`${col(entry.id, 10)} ${col(entry.type, 12)} ${col(entry.created, 12)} ${entry.content}${links}`);
    }
  }
  if (matured.length > 0) {
    lines.push("", `Matured (${matured.length}):`);
    for (const entry of matured) {
      lines.push(`  ${entry.id} [${entry.type}] → ${entry.matured_to ?? ""}`);
    }
  }
  return lines;
}
