import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  buildErrorV1,
  EditConflictError,
  GraphLoadError,
  getStatusCodeForErrorCode,
  NotFoundError,
  toErrorV1,
  UsageError,
  zodErrorToErrorV1,
  type ErrorCode,
} from "../../src/utils/errors.js";

describe("error utilities", () => {
  describe("buildErrorV1", () => {
    it("omits empty details and a missing request id", () => {
      expect(buildErrorV1("BAD_INPUT", "Invalid request", {})).toEqual({
        schema: "error.v1",
        code: "BAD_INPUT",
        message: "Invalid request",
      });
    });

    it("includes details and request_id when provided", () => {
      expect(buildErrorV1("INTERNAL", "Server error", { id: "DEC-001" }, "req-123")).toEqual({
        schema: "error.v1",
        code: "INTERNAL",
        message: "Server error",
        details: { id: "DEC-001" },
        request_id: "req-123",
      });
    });
  });

  describe("domain errors", () => {
    it("carry their code, message and details", () => {
      const collision = new GraphLoadError("DEC-001", "constitution", "project");
      expect(collision.name).toBe("GraphLoadError");
      expect(toErrorV1(collision)).toEqual({
        schema: "error.v1",
        code: "GRAPH_LOAD_FAILED",
        message: "ID collision — DEC-001 exists in both constitution and project",
        details: { id: "DEC-001", scopes: ["constitution", "project"] },
      });

      expect(toErrorV1(new NotFoundError("SP-004", "scratchpad")).message).toBe("SP-004 not found in scratchpad");
      expect(toErrorV1(new EditConflictError("old text matches 2 locations", 2)).details).toEqual({ occurrences: 2 });
      expect(toErrorV1(new UsageError("bad")).code).toBe("BAD_INPUT");
    });
  });

  describe("toErrorV1", () => {
    it("maps zod errors to BAD_INPUT", () => {
      const result = z.object({ level: z.number() }).safeParse({ level: "x" });
      if (result.success) throw new Error("expected a parse failure");

      const error = toErrorV1(result.error);

      expect(error.code).toBe("BAD_INPUT");
      expect(error.message).toBe("Validation failed");
      expect(error).toEqual(zodErrorToErrorV1(result.error));
    });

    it("strips file paths from unexpected errors", () => {
      expect(toErrorV1(new Error("EACCES: permission denied, open '/srv/dna/DEC-001.md'")).message).toBe(
        "EACCES: permission denied, open '[path]'",
      );
    });

    it("handles non-Error values", () => {
      expect(toErrorV1("boom")).toEqual({
        schema: "error.v1",
        code: "INTERNAL",
        message: "An unexpected error occurred",
      });
    });
  });

  describe("getStatusCodeForErrorCode", () => {
    it("maps each code to its HTTP status", () => {
      const expected: Array<[ErrorCode, number]> = [
        ["BAD_INPUT", 400],
        ["NOT_FOUND", 404],
        ["CONFLICT", 409],
        ["VALIDATION_FAILED", 422],
        ["GRAPH_LOAD_FAILED", 500],
        ["INTERNAL", 500],
      ];
      for (const [code, status] of expected) {
        expect(getStatusCodeForErrorCode(code)).toBe(status);
      }
    });
  });
});
