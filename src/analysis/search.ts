import { sortedIds } from "../graph/loader.js";
import { BODY_SECTIONS, type DecisionGraph, type FieldValue, type Scope } from "../graph/types.js";

export interface SearchResult {
  id: string;
  title: string;
  level: FieldValue;
  state: string;
  scope: Scope;
  /** "title" first when the title matched, then body sections in document order */
  matched_sections: string[];
}

/**
 * Text of a `## Name` section, from its heading to the next `## ` heading.
 * Undefined when the heading is absent.
 */
export function sectionText(body: string, name: string): string | undefined {
  const heading = new RegExp(`^## ${name}[ \\t]*$`, "m").exec(body);
  if (!heading) return undefined;
  const rest = body.slice(heading.index + heading[0].length);
  const next = rest.search(/^## /m);
  return next === -1 ? rest : rest.slice(0, next);
}

/**
 * Case-insensitive OR search over titles and bodies. Results are sorted by ID.
 */
export function searchDecisions(graph: DecisionGraph, terms: readonly string[]): SearchResult[] {
  const needles = terms.map((term) => term.toLowerCase()).filter((term) => term.length > 0);
  if (needles.length === 0) return [];

  const matchesAny = (text: string): boolean => needles.some((needle) => text.includes(needle));
  const results: SearchResult[] = [];

  for (const nid of sortedIds(graph)) {
    const node = graph.get(nid);
    if (!node) continue;

    const title = (node.title ?? "").toLowerCase();
    if (!matchesAny(title) && !matchesAny(node.body.toLowerCase())) continue;

    const matched: string[] = [];
    if (matchesAny(title)) matched.push("title");
    for (const section of BODY_SECTIONS) {
      const text = sectionText(node.body, section);
      if (text !== undefined && matchesAny(text.toLowerCase())) {
        matched.push(section);
      }
    }

    results.push({
      id: nid,
      title: node.title ?? "",
      level: node.level ?? null,
      state: node.state === undefined ? "unknown" : String(node.state),
      scope: node.scope,
      matched_sections: matched,
    });
  }

  return results;
}
