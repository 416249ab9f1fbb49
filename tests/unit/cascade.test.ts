import { describe, it, expect } from "vitest";
import { cascade } from "../../src/analysis/cascade.js";
import { renderCascadeTable } from "../../src/cli/render.js";
import { NotFoundError } from "../../src/utils/errors.js";
import { graphOf, record } from "../helpers/graph-fixtures.js";

// DEC-001 (constitution) ← DEC-002, DEC-003 ← DEC-004 ← DEC-005
const graph = graphOf(
  record("DEC-001", { title: "Mission" }, { scope: "constitution" }),
  record("DEC-002", { title: "Storage", level: 2, state: "suggested", depends_on: ["DEC-001"] }),
  record("DEC-003", { title: "Hosting", level: 2, depends_on: ["DEC-001"] }),
  record("DEC-004", { title: "Backups", level: 3, state: "suggested", depends_on: ["DEC-002", "DEC-003"] }),
  record("DEC-005", { title: "Restore drill", level: 4, state: "suggested", depends_on: ["DEC-004"] }),
);

describe("cascade", () => {
  it("expands dependents wave by wave", () => {
    const result = cascade(graph, "DEC-001");

    expect(result.start_node).toBe("DEC-001");
    expect(result.start_title).toBe("Mission");
    expect(result.direction).toBe("downstream");
    expect(result.waves.map((wave) => wave.effects.map((effect) => effect.node))).toEqual([
      ["DEC-002", "DEC-003"],
      ["DEC-004", "DEC-004"],
      ["DEC-005"],
    ]);
    expect(result.summary).toEqual({ total_affected: 5, unique_affected: 4, wave_count: 3 });
  });

  it("records the reason and partition crossing for each effect", () => {
    const [first, second] = cascade(graph, "DEC-001").waves;

    expect(first.effects[0]).toEqual({
      node: "DEC-002",
      title: "Storage",
      current_state: "suggested",
      reason: "depends on DEC-001",
      cross_scope: true,
    });
    expect(second.effects).toEqual([
      { node: "DEC-004", title: "Backups", current_state: "suggested", reason: "depends on DEC-002", cross_scope: false },
      { node: "DEC-004", title: "Backups", current_state: "suggested", reason: "depends on DEC-003", cross_scope: false },
    ]);
  });

  it("walks dependencies when run upstream", () => {
    const result = cascade(graph, "DEC-005", "upstream");

    expect(result.waves.map((wave) => wave.effects.map((effect) => `${effect.node}: ${effect.reason}`))).toEqual([
      ["DEC-004: DEC-005 depends on this"],
      ["DEC-002: DEC-004 depends on this", "DEC-003: DEC-004 depends on this"],
      ["DEC-001: DEC-002 depends on this", "DEC-001: DEC-003 depends on this"],
    ]);
    expect(result.summary).toEqual({ total_affected: 5, unique_affected: 4, wave_count: 3 });
  });

  it("is deterministic across runs", () => {
    expect(cascade(graph, "DEC-002")).toEqual(cascade(graph, "DEC-002"));
  });

  it("returns no waves for a leaf", () => {
    const result = cascade(graph, "DEC-005");

    expect(result.waves).toEqual([]);
    expect(result.summary).toEqual({ total_affected: 0, unique_affected: 0, wave_count: 0 });
    expect(renderCascadeTable(result)).toEqual(["No downstream dependents for DEC-005."]);
  });

  it("terminates on a cycle", () => {
    const cyclic = graphOf(
      record("DEC-001", { depends_on: ["DEC-002"] }),
      record("DEC-002", { depends_on: ["DEC-001"] }),
    );

    expect(cascade(cyclic, "DEC-001").summary).toEqual({ total_affected: 1, unique_affected: 1, wave_count: 1 });
  });

  it("throws for an unknown start node", () => {
    expect(() => cascade(graph, "DEC-404")).toThrow(NotFoundError);
    expect(() => cascade(graph, "DEC-404")).toThrow("DEC-404 not found in graph");
  });
});
