import { describe, it, expect } from "vitest";
import { extractManualFlags, renderHealth, renderIndex } from "../../src/analysis/reports.js";
import { graphOf, record } from "../helpers/graph-fixtures.js";

const graph = graphOf(
  record("DEC-001", { title: "Mission" }, { scope: "constitution" }),
  record("DEC-002", { title: "A | B", level: 2, state: "suggested", depends_on: ["DEC-001"] }),
  record("DEC-003", { title: "Hosting", level: 2, stakes: "low", depends_on: ["DEC-001"] }),
  record("DEC-004", { title: "Old plan", level: 3, state: "superseded", depends_on: ["DEC-003"] }),
);

describe("renderIndex", () => {
  it("tabulates one partition", () => {
    expect(renderIndex(graph, "constitution").split("\n")).toEqual([
      "# Constitution Index",
      "",
      "Derived index. Regenerate via `decigraph index`. Do not edit directly.",
      "",
      "**Total:** 1 decisions",
      "",
      "| ID | Title | Level | State | Stakes | Depends On |",
      "|----|-------|-------|-------|--------|------------|",
      "| DEC-001 | Mission | 1 | committed |  | — |",
      "",
    ]);
  });

  it("escapes pipes in titles", () => {
    const lines = renderIndex(graph, "project").split("\n");

    expect(lines[4]).toBe("**Total:** 3 decisions");
    expect(lines[8]).toBe("| DEC-002 | A \\| B | 2 | suggested |  | DEC-001 |");
    expect(lines[9]).toBe("| DEC-003 | Hosting | 2 | committed | low | DEC-001 |");
  });
});

describe("renderHealth", () => {
  it("summarises partitions, flags and carries manual flags over", () => {
    const previous = "# System Health\n\n## Manual Flags\n\n- Check vendor contract\n\n## Last Session\n\nold\n";
    const report = renderHealth({ graph, errorCount: 0, previous, today: "2026-10-19" });

    expect(report.flaggedCount).toBe(2);
    expect(report.content.split("\n")).toEqual([
      "# System Health",
      "",
      "Last updated: 2026-10-19",
      "",
      "## Node Counts",
      "",
      "### Constitution",
      "- Decisions: 1 — all `committed`",
      "- Levels: L1: 1",
      "",
      "### Project",
      "- Decisions: 3 — 1 `committed`, 1 `suggested`, 1 `superseded`",
      "- Levels: L2: 2, L3: 1",
      "- **Total: 4 decisions**",
      "",
      "## Flagged Items",
      "",
      "- 1 decisions at `suggested` (DEC-002)",
      "- 1 decisions at `superseded` (DEC-004)",
      "",
      "## Manual Flags",
      "",
      "- Check vendor contract",
      "",
      "## Last Session",
      "",
      "2026-10-19 — Health regenerated by decigraph",
      "",
    ]);
  });

  it("flags validation errors and reports a clean graph", () => {
    const clean = graphOf(record("DEC-001"));

    expect(renderHealth({ graph: clean, errorCount: 0, today: "2026-10-19" }).content).toContain(
      "## Flagged Items\n\n- No issues found.\n",
    );
    const broken = renderHealth({ graph: clean, errorCount: 3, today: "2026-10-19" });
    expect(broken.flaggedCount).toBe(1);
    expect(broken.content).toContain("- 3 validation error(s) — run `decigraph validate` for details\n");
  });
});

describe("extractManualFlags", () => {
  it("reads the section up to the next heading or the end", () => {
    expect(extractManualFlags("## Manual Flags\n\n- A\n- B\n")).toBe("- A\n- B");
    expect(extractManualFlags("# Other\n")).toBe("");
    expect(extractManualFlags(undefined)).toBe("");
  });
});
