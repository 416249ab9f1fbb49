import { describe, it, expect } from "vitest";
import {
  buildGraph,
  getDependents,
  getDepsList,
  normalizeDependencyRef,
  parseDependencies,
} from "../../src/graph/loader.js";
import { GraphLoadError } from "../../src/utils/errors.js";
import { graphOf, nodeOf, record } from "../helpers/graph-fixtures.js";

describe("Graph loader", () => {
  it("orders constitution records before project records", () => {
    const graph = graphOf(
      record("DEC-000"),
      record("DEC-005", {}, { scope: "constitution" }),
      record("DEC-002"),
    );

    expect([...graph.keys()]).toEqual(["DEC-005", "DEC-000", "DEC-002"]);
    expect(nodeOf(graph, "DEC-005").scope).toBe("constitution");
  });

  it("fails on an ID present in both partitions", () => {
    const build = () =>
      buildGraph([record("DEC-001", {}, { scope: "constitution" }), record("DEC-001")]);

    expect(build).toThrow(GraphLoadError);
    expect(build).toThrow("ID collision — DEC-001 exists in both constitution and project");
  });

  it("skips records without an id", () => {
    const graph = buildGraph([{ scope: "project", fields: { title: "No id" }, body: "" }, record("DEC-001")]);

    expect([...graph.keys()]).toEqual(["DEC-001"]);
  });

  it("flattens structured dependency entries and drops unusable ones", () => {
    const graph = graphOf(
      record("DEC-003", { depends_on: [{ id: "DEC-001", relation: "informs" }, "DEC-002", 5, ""] }),
    );

    expect(nodeOf(graph, "DEC-003").dependsOn).toEqual(["DEC-001", "DEC-002"]);
  });

  it("classifies dependency references", () => {
    expect(normalizeDependencyRef("DEC-001")).toEqual({ kind: "plain", id: "DEC-001" });
    expect(normalizeDependencyRef({ id: "DEC-002", note: "x" })).toEqual({
      kind: "structured",
      id: "DEC-002",
      extra: { note: "x" },
    });
    expect(normalizeDependencyRef({ note: "x" })).toBeNull();
    expect(parseDependencies("DEC-001")).toEqual([]);
  });

  it("lists dependents in ascending order", () => {
    const graph = graphOf(
      record("DEC-001"),
      record("DEC-004", { depends_on: ["DEC-001"] }),
      record("DEC-002", { depends_on: ["DEC-001"] }),
      record("DEC-003"),
    );

    expect(getDependents(graph, "DEC-001")).toEqual(["DEC-002", "DEC-004"]);
    expect(getDependents(graph, "DEC-003")).toEqual([]);
  });

  it("returns a copy of the dependency list", () => {
    const node = nodeOf(graphOf(record("DEC-002", { depends_on: ["DEC-001"] })), "DEC-002");
    const deps = getDepsList(node);
    deps.push("DEC-009");

    expect(node.dependsOn).toEqual(["DEC-001"]);
  });
});
