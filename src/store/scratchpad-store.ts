/**
 * Scratchpad: an append-only list of pre-decision notes kept in
 * `<stateDir>/scratchpad.json`. An entry graduates ("matures") once a
 * decision captures it.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { isMissingFile } from "../config/lint-config.js";
import { isoDate } from "../graph/frontmatter.js";
import type { DecisionGraph } from "../graph/types.js";
import { ConflictError, NotFoundError, RecordParseError, UsageError } from "../utils/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { writeFileAtomic } from "./atomic.js";

export const SCRATCHPAD_TYPES = ["idea", "constraint", "question", "concern"] as const;
export type ScratchpadType = (typeof SCRATCHPAD_TYPES)[number];

export const ScratchpadEntrySchema = z.object({
  id: z.string(),
  type: z.string(),
  content: z.string(),
  created: z.string(),
  links: z.array(z.string()).default([]),
  matured_to: z.string().nullable().default(null),
});

export type ScratchpadEntry = z.infer<typeof ScratchpadEntrySchema>;

const ScratchpadFileSchema = z.object({
  entries: z.array(ScratchpadEntrySchema).default([]),
});

export interface ScratchpadListing {
  active: ScratchpadEntry[];
  matured: ScratchpadEntry[];
}

export function isScratchpadType(value: string): value is ScratchpadType {
  return (SCRATCHPAD_TYPES as readonly string[]).includes(value);
}

/** Next free `SP-NNN` id: one past the highest in use. */
export function nextScratchpadId(entries: readonly ScratchpadEntry[]): string {
  let max = 0;
  for (const entry of entries) {
    const match = /^SP-(\d{3})$/.exec(entry.id);
    if (match) max = Math.max(max, Number(match[1]));
  }
  return `SP-${String(max + 1).padStart(3, "0")}`;
}

/**
 * `"<n> active — <count> <type>(s), ..."` over active entries, types sorted.
 * Empty when nothing is active.
 */
export function summarizeScratchpad(entries: readonly ScratchpadEntry[]): string {
  const active = entries.filter((entry) => !entry.matured_to);
  if (active.length === 0) return "";

  const counts = new Map<string, number>();
  for (const entry of active) {
    counts.set(entry.type, (counts.get(entry.type) ?? 0) + 1);
  }
  const parts = [...counts.keys()].sort().map((type) => `${counts.get(type) ?? 0} ${type}(s)`);
  return `${active.length} active — ${parts.join(", ")}`;
}

export interface ScratchpadStoreConfig {
  filePath: string;
  /** Fresh graph for link and maturity checks */
  loadGraph: () => Promise<DecisionGraph>;
  now?: () => Date;
}

export class ScratchpadStore {
  private readonly config: Required<ScratchpadStoreConfig>;

  constructor(config: ScratchpadStoreConfig) {
    this.config = { now: () => new Date(), ...config };
  }

  async load(): Promise<ScratchpadEntry[]> {
    let content: string;
    try {
      content = await readFile(this.config.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      throw new RecordParseError(this.config.filePath, "scratchpad");
    }
    const result = ScratchpadFileSchema.safeParse(raw);
    if (!result.success) {
      throw new RecordParseError(this.config.filePath, "scratchpad");
    }
    return result.data.entries;
  }

  private async save(entries: ScratchpadEntry[]): Promise<void> {
    await writeFileAtomic(this.config.filePath, `${JSON.stringify({ entries }, null, 2)}\n`);
  }

  async add(type: string, content: string, links: readonly string[] = []): Promise<ScratchpadEntry> {
    if (!isScratchpadType(type)) {
      throw new UsageError(
        `invalid type '${type}' (must be one of: ${[...SCRATCHPAD_TYPES].sort().join(", ")})`,
      );
    }
    if (!content.trim()) {
      throw new UsageError("content string is required");
    }

    if (links.length > 0) {
      const graph = await this.config.loadGraph();
      for (const link of links) {
        if (!graph.has(link)) {
          throw new NotFoundError(`linked decision ${link}`);
        }
      }
    }

    const entries = await this.load();
    const entry: ScratchpadEntry = {
      id: nextScratchpadId(entries),
      type,
      content,
      created: isoDate(this.config.now()),
      links: [...links],
      matured_to: null,
    };
    entries.push(entry);
    await this.save(entries);

    emit(TelemetryEvents.ScratchpadEntryAdded, { id: entry.id, type, linkCount: links.length });
    return entry;
  }

  async list(type?: string): Promise<ScratchpadListing> {
    const entries = await this.load();
    const keep = (entry: ScratchpadEntry): boolean => type === undefined || entry.type === type;
    return {
      active: entries.filter((entry) => !entry.matured_to && keep(entry)),
      matured: entries.filter((entry) => Boolean(entry.matured_to) && keep(entry)),
    };
  }

  async mature(spId: string, decisionId: string): Promise<ScratchpadEntry> {
    const entries = await this.load();
    const entry = entries.find((candidate) => candidate.id === spId);
    if (!entry) {
      throw new NotFoundError(spId, "scratchpad");
    }
    if (entry.matured_to) {
      throw new ConflictError(`${spId} already matured to ${entry.matured_to}`);
    }

    const graph = await this.config.loadGraph();
    if (!graph.has(decisionId)) {
      throw new NotFoundError(decisionId);
    }

    entry.matured_to = decisionId;
    await this.save(entries);

    emit(TelemetryEvents.ScratchpadEntryMatured, { id: spId, decisionId });
    return entry;
  }

  async summary(): Promise<string> {
    return summarizeScratchpad(await this.load());
  }
}
