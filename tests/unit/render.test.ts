import { describe, it, expect } from "vitest";
import { renderValidation } from "../../src/cli/render.js";

describe("renderValidation", () => {
  it("prints findings in the order validate returned them", () => {
    const lines = renderValidation({
      errors: ["DEC-002: missing level", "Cycle detected: DEC-003 → DEC-004 → DEC-003"],
      warnings: ["DEC-003: missing state", "DEC-001: missing title"],
      node_count: 4,
    });

    expect(lines).toEqual([
      "ERRORS (2):",
      "  DEC-002: missing level",
      "  Cycle detected: DEC-003 → DEC-004 → DEC-003",
      "",
      "WARNINGS (2):",
      "  DEC-003: missing state",
      "  DEC-001: missing title",
    ]);
  });

  it("reports a clean graph on one line", () => {
    expect(renderValidation({ errors: [], warnings: [], node_count: 2 })).toEqual([
      "Validation passed: 2 decisions, 0 errors, 0 warnings.",
    ]);
  });
});
