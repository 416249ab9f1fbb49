import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  nextScratchpadId,
  ScratchpadStore,
  summarizeScratchpad,
  type ScratchpadEntry,
} from "../../src/store/scratchpad-store.js";
import { ConflictError, NotFoundError, RecordParseError, UsageError } from "../../src/utils/errors.js";
import { baseRecords, FIXED_NOW, graphOf } from "../helpers/graph-fixtures.js";

function entry(id: string, type: string, maturedTo: string | null = null): ScratchpadEntry {
  return { id, type, content: `note ${id}`, created: "2026-01-05", links: [], matured_to: maturedTo };
}

describe("ScratchpadStore", () => {
  let dir: string;
  let filePath: string;
  let store: ScratchpadStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "decigraph-sp-"));
    filePath = join(dir, "state", "scratchpad.json");
    store = new ScratchpadStore({
      filePath,
      loadGraph: async () => graphOf(...baseRecords()),
      now: FIXED_NOW,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("starts empty when the file does not exist", async () => {
    expect(await store.load()).toEqual([]);
    expect(await store.summary()).toBe("");
  });

  it("appends entries with sequential ids", async () => {
    const first = await store.add("idea", "Try SQLite", ["DEC-001"]);
    await store.add("question", "Who owns it?");

    expect(first).toEqual({
      id: "SP-001",
      type: "idea",
      content: "Try SQLite",
      created: "2026-10-19",
      links: ["DEC-001"],
      matured_to: null,
    });
    const saved: unknown = JSON.parse(await readFile(filePath, "utf-8"));
    expect(saved).toEqual({
      entries: [first, { ...first, id: "SP-002", type: "question", content: "Who owns it?", links: [] }],
    });
    expect(await store.summary()).toBe("2 active — 1 idea(s), 1 question(s)");
  });

  it("rejects bad input before writing", async () => {
    await expect(store.add("wish", "x")).rejects.toThrow(
      "invalid type 'wish' (must be one of: concern, constraint, idea, question)",
    );
    await expect(store.add("idea", "   ")).rejects.toThrow(UsageError);
    await expect(store.add("idea", "x", ["DEC-404"])).rejects.toThrow(
      new NotFoundError("linked decision DEC-404"),
    );
    expect(await store.load()).toEqual([]);
  });

  it("matures an entry into an existing decision once", async () => {
    await store.add("idea", "Try SQLite");
    await store.add("concern", "Disk usage");

    const matured = await store.mature("SP-001", "DEC-002");
    expect(matured.matured_to).toBe("DEC-002");

    const listing = await store.list();
    expect(listing.active.map((e) => e.id)).toEqual(["SP-002"]);
    expect(listing.matured.map((e) => e.id)).toEqual(["SP-001"]);
    expect((await store.list("idea")).active).toEqual([]);

    await expect(store.mature("SP-001", "DEC-001")).rejects.toThrow(
      new ConflictError("SP-001 already matured to DEC-002"),
    );
    await expect(store.mature("SP-009", "DEC-001")).rejects.toThrow("SP-009 not found in scratchpad");
    await expect(store.mature("SP-002", "DEC-404")).rejects.toThrow("DEC-404 not found in graph");
  });

  it("refuses a file it cannot parse", async () => {
    await store.add("idea", "x");
    await writeFile(filePath, "{ not json");

    await expect(store.load()).rejects.toThrow(RecordParseError);
  });
});

describe("scratchpad helpers", () => {
  it("numbers past the highest id in use", () => {
    expect(nextScratchpadId([])).toBe("SP-001");
    expect(nextScratchpadId([entry("SP-001", "idea"), entry("SP-005", "idea"), entry("note", "idea")])).toBe(
      "SP-006",
    );
  });

  it("summarizes only active entries", () => {
    expect(
      summarizeScratchpad([
        entry("SP-001", "question"),
        entry("SP-002", "idea"),
        entry("SP-003", "question"),
        entry("SP-004", "idea", "DEC-001"),
      ]),
    ).toBe("3 active — 1 idea(s), 2 question(s)");
  });
});
