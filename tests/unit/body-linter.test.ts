import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { EMPTY_LINT_CONFIG, loadLintConfig, parseLintConfig } from "../../src/config/lint-config.js";
import { ConfigError } from "../../src/utils/errors.js";
import { lintBody } from "../../src/validators/body-linter.js";
import { graphOf, nodeOf, record } from "../helpers/graph-fixtures.js";

const LINT_CONFIG = parseLintConfig({
  terminology: { flagged_term: "user", exemptions: ["end user"], exempt_ids: ["DEC-003"] },
  deleted_artifacts: [{ pattern: "legacy-api\\.md", label: "legacy API doc" }, { pattern: "old_dashboard" }],
});

describe("lintBody", () => {
  it("reports stale, broken and supersession references", () => {
    const body = [
      "See INF-002 and INF-001, INF-002 again; CTX-010.",
      "Refs DEC-002 and DEC-009, and DEC-001 itself.",
      "This supersedes DEC-002.",
      "",
    ].join("\n");
    const graph = graphOf(record("DEC-001", {}, { body }), record("DEC-002"));

    expect(lintBody(nodeOf(graph, "DEC-001"), graph, EMPTY_LINT_CONFIG)).toEqual([
      "DEC-001 [stale-ref]: body references 2 stale INF ID(s) (INF-001, INF-002)",
      "DEC-001 [stale-ref]: body references 1 stale CTX ID(s) (CTX-010)",
      "DEC-001 [broken-ref]: body references non-existent DEC-009",
      "DEC-001 [supersession]: claims to supersede DEC-002, but DEC-002 state is 'committed'",
    ]);
  });

  it("accepts a supersession claim when the target is superseded", () => {
    const graph = graphOf(
      record("DEC-001", {}, { body: "Supersedes DEC-002.\n" }),
      record("DEC-002", { state: "superseded" }),
    );

    expect(lintBody(nodeOf(graph, "DEC-001"), graph, EMPTY_LINT_CONFIG)).toEqual([]);
  });

  it("applies configured terminology and deleted-artifact rules", () => {
    const body = [
      "The User signs in.",
      "Our end user flow.",
      "users list",
      "A user again.",
      "See legacy-api.md and old_dashboard.",
      "",
    ].join("\n");
    const graph = graphOf(record("DEC-001", {}, { body }), record("DEC-003", {}, { body }));

    expect(lintBody(nodeOf(graph, "DEC-001"), graph, LINT_CONFIG)).toEqual([
      "DEC-001 [terminology]: 2 line(s) with unexempted 'user' in body text",
      "DEC-001 [deleted-artifact]: body references deleted artifacts: legacy API doc, old_dashboard",
    ]);
    expect(lintBody(nodeOf(graph, "DEC-003"), graph, LINT_CONFIG)).toEqual([
      "DEC-003 [deleted-artifact]: body references deleted artifacts: legacy API doc, old_dashboard",
    ]);
  });

  it("skips an empty body", () => {
    const graph = graphOf(record("DEC-001", {}, { body: "" }));

    expect(lintBody(nodeOf(graph, "DEC-001"), graph, LINT_CONFIG)).toEqual([]);
  });
});

describe("lint configuration", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "decigraph-lint-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("treats a missing file as the empty configuration", async () => {
    expect(await loadLintConfig(join(dir, "config.json"))).toBe(EMPTY_LINT_CONFIG);
  });

  it("loads and compiles a config file", async () => {
    const path = join(dir, "config.json");
    await writeFile(path, JSON.stringify({ terminology: { flagged_term: "tenant" } }));

    const config = await loadLintConfig(path);

    expect(config.terminology?.term).toBe("tenant");
    expect(config.terminology?.pattern.test("One Tenant only")).toBe(true);
    expect(config.deletedArtifacts).toEqual([]);
  });

  it("rejects malformed JSON", async () => {
    const path = join(dir, "config.json");
    await writeFile(path, "{ not json");

    await expect(loadLintConfig(path)).rejects.toThrow(ConfigError);
  });

  it("rejects an invalid regular expression", () => {
    expect(() => parseLintConfig({ deleted_artifacts: [{ pattern: "(" }] })).toThrow(ConfigError);
  });
});
