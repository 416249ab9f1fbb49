/**
 * Decision Store Interface
 *
 * Boundary between the graph engine and wherever records live. The engine
 * reads every record on each invocation through `RecordSource` and writes
 * single records back through `PersistenceSink`.
 */

import type { DecisionRecord, FieldMap, Scope } from "../graph/types.js";

export interface StoredDocument {
  fields: FieldMap;
  body: string;
  location: string;
}

export interface RecordSource {
  /**
   * All records, constitution partition first. Documents without a
   * frontmatter block, or without an `id`, are not yielded.
   * @throws RecordParseError if a frontmatter block is present but unreadable
   */
  loadRecords(): Promise<DecisionRecord[]>;
}

export interface PersistenceSink {
  /**
   * Current stored document for a record
   * @returns null if not found
   * @throws RecordParseError if the document exists but cannot be parsed
   */
  read(scope: Scope, id: string): Promise<StoredDocument | null>;

  /**
   * Replace (or create) a record. The write is atomic per record.
   * @returns the record's location
   */
  write(scope: Scope, id: string, fields: FieldMap, body: string): Promise<string>;
}

export interface DecisionStore extends RecordSource, PersistenceSink {}
