// Link inference: co-occurrence heuristic over raw text, or declared references from an index

import type {
  Corpus,
  Extraction,
  IdentifierKind,
  IndexItem,
  ReferenceGraph,
} from "./model.js";

/** Kinds a requirement may be linked to by co-occurrence. Tests are never inferred. */
export const INFERRED_TARGET_KINDS: readonly IdentifierKind[] = [
  "decision",
  "component",
  "scenario",
];

function addEdge(
  forward: Map<string, Set<string>>,
  source: string,
  target: string
): void {
  let targets = forward.get(source);
  if (!targets) {
    targets = new Set<string>();
    forward.set(source, targets);
  }
  targets.add(target);
}

/**
 * Transpose forward edges. Sources are visited in the order given, so the
 * caller controls the order of every backward list.
 */
export function transpose(
  sources: Iterable<[string, Iterable<string>]>
): Map<string, string[]> {
  const backward = new Map<string, string[]>();
  for (const [source, targets] of sources) {
    for (const target of targets) {
      const list = backward.get(target);
      if (list) list.push(source);
      else backward.set(target, [source]);
    }
  }
  return backward;
}

/** Text footprint of an element: every unit it occurs in, newline-joined. */
export function elementText(
  corpus: Corpus,
  extraction: Extraction,
  id: string
): string {
  const units = extraction.occurrences.get(id);
  if (!units) return "";
  const parts: string[] = [];
  for (const unit of units) {
    const text = corpus.get(unit);
    if (text !== undefined) parts.push(text);
  }
  return parts.join("\n");
}

/**
 * Infer requirement → {decision, component, scenario} edges: R → E iff R's
 * literal id appears in the text of a unit where E occurs.
 *
 * Approximate by construction: unrelated ids sharing a file produce an edge,
 * related ids kept in separate files produce none.
 */
export function inferLinks(
  corpus: Corpus,
  extraction: Extraction
): ReferenceGraph {
  const requirements = [...extraction.ids.requirement].sort();
  const forward = new Map<string, Set<string>>();

  for (const kind of INFERRED_TARGET_KINDS) {
    for (const element of [...extraction.ids[kind]].sort()) {
      const text = elementText(corpus, extraction, element);
      for (const req of requirements) {
        if (text.includes(req)) addEdge(forward, req, element);
      }
    }
  }

  const sorted = [...forward.entries()].sort(([a], [b]) =>
    a < b ? -1 : a > b ? 1 : 0
  );
  return { forward, backward: transpose(sorted) };
}

/**
 * Build the graph from declared references. Repeated references and repeated
 * item ids collapse into one edge; backward lists follow first item
 * appearance, then reference order.
 */
export function buildExplicitGraph(items: readonly IndexItem[]): ReferenceGraph {
  const forward = new Map<string, Set<string>>();
  for (const item of items) {
    const targets = forward.get(item.id) ?? new Set<string>();
    for (const ref of item.references) targets.add(ref);
    forward.set(item.id, targets);
  }
  return { forward, backward: transpose(forward) };
}

export function linksOf(graph: ReferenceGraph, id: string): string[] {
  return [...(graph.forward.get(id) ?? [])].sort();
}

export function hasLinks(graph: ReferenceGraph, id: string): boolean {
  return (graph.forward.get(id)?.size ?? 0) > 0;
}
