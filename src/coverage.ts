// Coverage metrics: per-group linkage and requirement coverage per target kind

import type {
  CoverageMetric,
  DimensionMetric,
  IdentifierGroups,
  IdentifierKind,
  KeyScheme,
  MetricsTable,
  ReferenceGraph,
} from "./model.js";
import { IDENTIFIER_KINDS, emptyGroups, groupKey, kindOf } from "./identifiers.js";
import { hasLinks } from "./linker.js";

export interface CoverageOptions {
  groups?: readonly IdentifierKind[];
  keyScheme?: KeyScheme;
}

// Dimension keys are the same under both key schemes.
export const DIMENSIONS: ReadonlyArray<[key: string, target: IdentifierKind]> = [
  ["requirement_to_ADR", "decision"],
  ["requirement_to_component", "component"],
  ["requirement_to_scenario", "scenario"],
  ["requirement_to_test", "test"],
];

/** Percentage with an empty group counting as fully covered. */
export function percentage(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 100.0;
}

export function groupCoverage(
  ids: Iterable<string>,
  graph: ReferenceGraph
): CoverageMetric {
  let total = 0;
  let withLinks = 0;
  for (const id of ids) {
    total++;
    if (hasLinks(graph, id)) withLinks++;
  }
  return {
    total,
    with_links: withLinks,
    coverage_pct: percentage(withLinks, total),
  };
}

/**
 * Share of requirements with at least one outbound edge to an id of the
 * target kind. Stricter than the group metric, which accepts any edge.
 */
export function dimensionCoverage(
  requirements: Iterable<string>,
  graph: ReferenceGraph,
  target: IdentifierKind
): DimensionMetric {
  let total = 0;
  let withLink = 0;
  for (const req of requirements) {
    total++;
    const refs = graph.forward.get(req);
    if (refs && [...refs].some((r) => kindOf(r) === target)) withLink++;
  }
  return {
    total_requirements: total,
    requirements_with_link: withLink,
    coverage_pct: percentage(withLink, total),
  };
}

export function computeCoverage(
  groups: IdentifierGroups,
  graph: ReferenceGraph,
  options: CoverageOptions = {}
): MetricsTable {
  const { groups: kinds = IDENTIFIER_KINDS, keyScheme = "label" } = options;
  const metrics: MetricsTable = {};
  for (const kind of kinds) {
    metrics[groupKey(kind, keyScheme)] = groupCoverage(groups[kind], graph);
  }
  for (const [key, target] of DIMENSIONS) {
    metrics[key] = dimensionCoverage(groups.requirement, graph, target);
  }
  return metrics;
}

/** Group arbitrary ids by prefix; ids of no known kind are dropped. */
export function groupIdentifiers(ids: Iterable<string>): IdentifierGroups {
  const groups = emptyGroups();
  for (const id of ids) {
    const kind = kindOf(id);
    if (kind) groups[kind].add(id);
  }
  return groups;
}

export function isCoverageMetric(
  metric: CoverageMetric | DimensionMetric
): metric is CoverageMetric {
  return "with_links" in metric;
}
