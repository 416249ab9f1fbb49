import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { SERVICE_VERSION } from "../src/version.js";

describe("Version", () => {
  it("matches package.json", () => {
    const pkgPath = new URL("../package.json", import.meta.url);
    const pkg = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(fileURLToPath(pkgPath), "utf-8")));

    expect(SERVICE_VERSION).toBe(pkg.version);
    expect(SERVICE_VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });
});
