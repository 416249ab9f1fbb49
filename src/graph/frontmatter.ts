/**
 * Decision document codec.
 *
 * A document is `---\n<yaml>\n---<body>`. Parsing goes through the yaml
 * package; serialisation is template-based with a fixed field order so that
 * rewrites produce stable diffs.
 */

import YAML from "yaml";
import type { FieldMap, FieldValue } from "./types.js";

export interface ParsedDocument {
  /** null when the document has no frontmatter block, or the block is unreadable */
  fields: FieldMap | null;
  body: string;
  /** Set when a frontmatter block is present but is not a YAML mapping */
  error?: string;
}

function toFieldValue(value: unknown): FieldValue {
  if (value === undefined || value === null) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  if (Array.isArray(value)) {
    return value.map(toFieldValue);
  }
  if (typeof value === "object") {
    const out: Record<string, FieldValue> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = toFieldValue(v);
    }
    return out;
  }
  return String(value);
}

/**
 * Split a document into its field map and body. The body is everything
 * after the closing fence, preserved byte-for-byte.
 */
export function parseDocument(text: string): ParsedDocument {
  if (!text.startsWith("---")) {
    return { fields: null, body: text };
  }

  const end = text.indexOf("\n---", 3);
  if (end === -1) {
    return { fields: null, body: text };
  }

  const yamlBlock = text.slice(4, end);
  const body = text.slice(end + 4);

  let parsed: unknown;
  try {
    parsed = YAML.parse(yamlBlock);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { fields: null, body, error: message.split("\n")[0] };
  }

  if (parsed === null || parsed === undefined) {
    return { fields: {}, body };
  }
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    return { fields: null, body, error: "frontmatter is not a mapping" };
  }

  const fields: FieldMap = {};
  for (const [key, value] of Object.entries(parsed)) {
    fields[key] = toFieldValue(value);
  }
  return { fields, body };
}

function renderScalar(value: FieldValue | undefined): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function renderDependency(dep: FieldValue): string {
  if (dep !== null && typeof dep === "object" && !Array.isArray(dep) && typeof dep.id === "string") {
    return dep.id;
  }
  return renderScalar(dep);
}

/**
 * Render a field map and body back into a document.
 *
 * Field order: id, title, date, level, state, stakes (only when set),
 * depends_on. Other keys are not written.
 */
export function serializeDocument(fields: FieldMap, body: string, today: string): string {
  const lines = ["---"];

  lines.push(`id: ${renderScalar(fields.id)}`);

  // Free text: the yaml library chooses plain, single or double quoting. Always one line.
  const title = typeof fields.title === "string" ? fields.title : renderScalar(fields.title);
  lines.push(YAML.stringify({ title }, { lineWidth: 0, blockQuote: false }).trimEnd());

  lines.push(`date: ${fields.date ? renderScalar(fields.date) : today}`);
  lines.push(`level: ${renderScalar(fields.level)}`);
  lines.push(`state: ${fields.state ? renderScalar(fields.state) : "suggested"}`);

  if (fields.stakes) {
    lines.push(`stakes: ${renderScalar(fields.stakes)}`);
  }

  const deps = Array.isArray(fields.depends_on) ? fields.depends_on : [];
  if (deps.length === 0) {
    lines.push("depends_on: []");
  } else {
    lines.push("depends_on:");
    for (const dep of deps) {
      lines.push(`  - ${renderDependency(dep)}`);
    }
  }

  lines.push("---");
  const head = lines.join("\n");

  // The body owns the newline after the closing fence, so a parsed body writes back unchanged
  if (!body) return `${head}\n`;
  return body.startsWith("\n") ? `${head}${body}` : `${head}\n\n${body}`;
}

/** Body written for newly created decisions: the four required sections, empty. */
export const SCAFFOLD_BODY = "\n\n## Decision\n\n\n\n## Reasoning\n\n\n\n## Assumptions\n\n\n\n## Tradeoffs\n\n";

/** Local calendar date as YYYY-MM-DD. */
export function isoDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}
