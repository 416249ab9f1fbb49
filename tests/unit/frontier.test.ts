import { describe, it, expect } from "vitest";
import { computeTransitiveDownstream, criticalPath, frontier } from "../../src/analysis/frontier.js";
import { baseRecords, graphOf, record } from "../helpers/graph-fixtures.js";

// DEC-001 (committed) ← DEC-002 ← DEC-003 ← DEC-004, and DEC-001 ← DEC-005
const chain = graphOf(
  record("DEC-001"),
  record("DEC-002", { level: 2, state: "suggested", depends_on: ["DEC-001"] }),
  record("DEC-003", { level: 3, state: "suggested", depends_on: ["DEC-002"] }),
  record("DEC-004", { level: 4, state: "suggested", depends_on: ["DEC-003"] }),
  record("DEC-005", { level: 2, state: "suggested", depends_on: ["DEC-001"] }),
);

describe("frontier", () => {
  it("marks a suggested node on a committed parent as committable", () => {
    const result = frontier(graphOf(...baseRecords()));

    expect(result.committable.map((entry) => entry.id)).toEqual(["DEC-002"]);
    expect(result.blocked).toEqual([]);
  });

  it("splits suggested nodes into committable and blocked", () => {
    const result = frontier(chain);

    expect(result.committable.map((entry) => [entry.id, entry.downstream_weight])).toEqual([
      ["DEC-002", 2],
      ["DEC-005", 0],
    ]);
    expect(result.blocked.map((entry) => [entry.id, entry.blockers, entry.critical_path])).toEqual([
      ["DEC-003", ["DEC-002"], ["DEC-002"]],
      ["DEC-004", ["DEC-003"], ["DEC-002", "DEC-003"]],
    ]);
    expect(result.summary).toEqual({
      total_decisions: 5,
      suggested: 4,
      committable_count: 2,
      blocked_count: 2,
      level_gap_count: 3,
    });
  });

  it("flags levels with more suggested than committed", () => {
    const [identity, direction] = frontier(chain).level_gaps;

    expect(identity).toEqual({
      level: 1,
      level_name: "Identity",
      committed: 1,
      suggested: 0,
      superseded: 0,
      total: 1,
      flags: [],
    });
    expect(direction.flags).toEqual(["more suggested than committed", "no committed decisions"]);
  });

  it("ranks the heaviest nodes first and honours the limit", () => {
    const result = frontier(chain, 2);

    expect(result.high_weight).toEqual([
      {
        id: "DEC-001",
        title: "Decision DEC-001",
        level: 1,
        state: "committed",
        stakes: null,
        scope: "project",
        downstream_weight: 4,
        direct_dependents: ["DEC-002", "DEC-005"],
      },
      {
        id: "DEC-002",
        title: "Decision DEC-002",
        level: 2,
        state: "suggested",
        stakes: null,
        scope: "project",
        downstream_weight: 2,
        direct_dependents: ["DEC-003"],
      },
    ]);
  });

  it("breaks weight ties by level", () => {
    const graph = graphOf(
      record("DEC-001", { level: 3, state: "suggested" }),
      record("DEC-002", { level: 1, state: "suggested" }),
    );

    expect(frontier(graph).committable.map((entry) => entry.id)).toEqual(["DEC-002", "DEC-001"]);
  });
});

describe("computeTransitiveDownstream", () => {
  it("collects every transitive dependent", () => {
    const downstream = computeTransitiveDownstream(chain);

    expect([...(downstream.get("DEC-001") ?? [])].sort()).toEqual(["DEC-002", "DEC-003", "DEC-004", "DEC-005"]);
    expect([...(downstream.get("DEC-003") ?? [])]).toEqual(["DEC-004"]);
    expect(downstream.get("DEC-004")?.size).toBe(0);
  });
});

describe("criticalPath", () => {
  it("runs from the deepest unresolved ancestor to the target", () => {
    expect(criticalPath(chain, "DEC-004")).toEqual(["DEC-002", "DEC-003"]);
  });

  it("is empty when nothing upstream is unresolved", () => {
    expect(criticalPath(chain, "DEC-002")).toEqual([]);
  });

  it("is empty for an unknown node", () => {
    expect(criticalPath(chain, "DEC-404")).toEqual([]);
  });
});
