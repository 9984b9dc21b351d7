// Orphan detection: elements missing an expected link to or from a requirement

import type {
  IdentifierGroups,
  OrphanCategory,
  OrphanReport,
  ReferenceGraph,
} from "./model.js";
import { kindOf } from "./identifiers.js";
import { hasLinks } from "./linker.js";

export const ORPHAN_CATEGORIES: readonly OrphanCategory[] = [
  "requirements_no_links",
  "scenarios_no_req",
  "components_no_req",
  "adrs_no_req",
];

/** Every id that is the target of at least one requirement's edge. */
export function referencedByRequirements(graph: ReferenceGraph): Set<string> {
  const referenced = new Set<string>();
  for (const [source, targets] of graph.forward) {
    if (kindOf(source) !== "requirement") continue;
    for (const target of targets) referenced.add(target);
  }
  return referenced;
}

function sorted(ids: Iterable<string>): string[] {
  return [...ids].sort();
}

export function detectOrphans(
  groups: IdentifierGroups,
  graph: ReferenceGraph
): OrphanReport {
  const referenced = referencedByRequirements(graph);
  const unreferenced = (ids: Iterable<string>) =>
    sorted([...ids].filter((id) => !referenced.has(id)));

  return {
    requirements_no_links: sorted(
      [...groups.requirement].filter((id) => !hasLinks(graph, id))
    ),
    scenarios_no_req: unreferenced(groups.scenario),
    components_no_req: unreferenced(groups.component),
    adrs_no_req: unreferenced(groups.decision),
  };
}

export function countOrphans(report: OrphanReport): number {
  return ORPHAN_CATEGORIES.reduce((n, c) => n + report[c].length, 0);
}
