// Markdown rendering of audit results: pure functions, no I/O

import type {
  IdentifierGroups,
  MetricsTable,
  OrphanReport,
  ReferenceGraph,
} from "./model.js";
import { isCoverageMetric } from "./coverage.js";
import { linksOf } from "./linker.js";
import { ORPHAN_CATEGORIES } from "./orphans.js";

export function renderMatrix(
  groups: IdentifierGroups,
  graph: ReferenceGraph
): string {
  const lines = [
    "# Traceability Matrix (Heuristic Draft)",
    "",
    "| Requirement | Linked Elements (ADR / Component / Scenario / Test) |",
    "|-------------|----------------------------------------------------|",
  ];
  for (const req of [...groups.requirement].sort()) {
    const linked = linksOf(graph, req).join(", ") || "(none)";
    lines.push(`| ${req} | ${linked} |`);
  }
  return lines.join("\n");
}

export function renderOrphanReport(orphans: OrphanReport): string {
  const lines = ["# Orphan Analysis", ""];
  for (const category of ORPHAN_CATEGORIES) {
    lines.push(`## ${category}`);
    const ids = orphans[category];
    if (ids.length === 0) lines.push("- None");
    else for (const id of ids) lines.push(`- ${id}`);
    lines.push("");
  }
  return lines.join("\n");
}

export function renderCoverageSummary(metrics: MetricsTable): string {
  return Object.entries(metrics)
    .map(([key, m]) =>
      isCoverageMetric(m)
        ? `${key}: ${m.with_links}/${m.total} linked (${m.coverage_pct.toFixed(1)}%)`
        : `${key}: ${m.requirements_with_link}/${m.total_requirements} requirements (${m.coverage_pct.toFixed(1)}%)`
    )
    .join("\n");
}
