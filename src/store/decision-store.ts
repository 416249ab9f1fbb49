/**
 * Decision stores.
 *
 * `FileDecisionStore` keeps one markdown document per decision under the
 * constitution and project directories. `InMemoryDecisionStore` holds the
 * same data in a map, for tests and embedding.
 */

import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { isMissingFile } from "../config/lint-config.js";
import { isoDate, parseDocument, serializeDocument } from "../graph/frontmatter.js";
import type { DecisionRecord, FieldMap, Scope } from "../graph/types.js";
import { RecordParseError } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";
import { writeFileAtomic } from "./atomic.js";
import type { DecisionStore, StoredDocument } from "./interface.js";

const DECISION_FILE = /^DEC-.*\.md$/;

export interface FileStoreConfig {
  projectDir: string;
  constitutionDir: string;
  /** Clock for dates filled in on write */
  now?: () => Date;
}

export class FileDecisionStore implements DecisionStore {
  private readonly config: Required<FileStoreConfig>;
  /** Last seen file for each ID, so rewrites land where the record was read from */
  private readonly locations = new Map<string, string>();

  constructor(config: FileStoreConfig) {
    this.config = { now: () => new Date(), ...config };
  }

  dirFor(scope: Scope): string {
    return scope === "constitution" ? this.config.constitutionDir : this.config.projectDir;
  }

  private async listDecisionFiles(dir: string): Promise<string[]> {
    try {
      const entries = await readdir(dir);
      return entries.filter((name) => DECISION_FILE.test(name)).sort();
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
  }

  async loadRecords(): Promise<DecisionRecord[]> {
    const records: DecisionRecord[] = [];
    this.locations.clear();

    for (const scope of ["constitution", "project"] as const) {
      const dir = this.dirFor(scope);
      for (const name of await this.listDecisionFiles(dir)) {
        const location = join(dir, name);
        const { fields, body, error } = parseDocument(await readFile(location, "utf-8"));
        if (error !== undefined) {
          throw new RecordParseError(location, "frontmatter", error);
        }
        if (!fields || !("id" in fields)) {
          log.debug({ location }, "Skipping document without frontmatter id");
          continue;
        }
        if (typeof fields.id === "string") {
          this.locations.set(`${scope}:${fields.id}`, location);
        }
        records.push({ scope, fields, body, location });
      }
    }

    return records;
  }

  private pathFor(scope: Scope, id: string): string {
    return this.locations.get(`${scope}:${id}`) ?? join(this.dirFor(scope), `${id}.md`);
  }

  async read(scope: Scope, id: string): Promise<StoredDocument | null> {
    const location = this.pathFor(scope, id);
    let content: string;
    try {
      content = await readFile(location, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    const { fields, body, error } = parseDocument(content);
    if (!fields) {
      throw new RecordParseError(location, "frontmatter", error);
    }
    return { fields, body, location };
  }

  async write(scope: Scope, id: string, fields: FieldMap, body: string): Promise<string> {
    const location = this.pathFor(scope, id);
    await writeFileAtomic(location, serializeDocument(fields, body, isoDate(this.config.now())));
    this.locations.set(`${scope}:${id}`, location);
    log.debug({ id, scope, location }, "Decision written");
    return location;
  }
}

/**
 * Map-backed store. Documents round-trip through the same codec as the
 * file store, so what `loadRecords` yields after a write matches what a
 * file would hold.
 */
export class InMemoryDecisionStore implements DecisionStore {
  private readonly documents = new Map<string, { scope: Scope; id: string; text: string }>();
  private readonly now: () => Date;

  constructor(records: DecisionRecord[] = [], now: () => Date = () => new Date()) {
    this.now = now;
    for (const record of records) {
      if (typeof record.fields.id !== "string") continue;
      this.put(record.scope, record.fields.id, record.fields, record.body);
    }
  }

  private key(scope: Scope, id: string): string {
    return `${scope}:${id}`;
  }

  /**
   * Store a record without the template rewrite, keeping every field as
   * given.
   */
  put(scope: Scope, id: string, fields: FieldMap, body: string): void {
    this.documents.set(this.key(scope, id), {
      scope,
      id,
      text: `---\n${JSON.stringify(fields)}\n---${body}`,
    });
  }

  /** Raw stored text, for assertions. */
  text(scope: Scope, id: string): string | undefined {
    return this.documents.get(this.key(scope, id))?.text;
  }

  async loadRecords(): Promise<DecisionRecord[]> {
    const records: DecisionRecord[] = [];
    for (const scope of ["constitution", "project"] as const) {
      const docs = [...this.documents.values()]
        .filter((doc) => doc.scope === scope)
        .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
      for (const doc of docs) {
        const location = `memory:${this.key(scope, doc.id)}`;
        const { fields, body, error } = parseDocument(doc.text);
        if (error !== undefined) throw new RecordParseError(location, "frontmatter", error);
        if (!fields || !("id" in fields)) continue;
        records.push({ scope, fields, body, location });
      }
    }
    return records;
  }

  async read(scope: Scope, id: string): Promise<StoredDocument | null> {
    const doc = this.documents.get(this.key(scope, id));
    if (!doc) return null;
    const { fields, body, error } = parseDocument(doc.text);
    const location = `memory:${this.key(scope, id)}`;
    if (!fields) throw new RecordParseError(location, "frontmatter", error);
    return { fields, body, location };
  }

  async write(scope: Scope, id: string, fields: FieldMap, body: string): Promise<string> {
    this.documents.set(this.key(scope, id), {
      scope,
      id,
      text: serializeDocument(fields, body, isoDate(this.now())),
    });
    return `memory:${this.key(scope, id)}`;
  }
}
