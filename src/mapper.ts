// Audit → MCP resource mapping: pure functions, no I/O

import type { HeuristicAudit } from "./audit.js";
import { linksOf } from "./linker.js";
import { countOrphans } from "./orphans.js";

// --- URI construction ---

export function toProjectSlug(project: string): string {
  return project
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "");
}

export type ReportName = "metrics" | "orphans" | "matrix";

export function buildReportUri(projectSlug: string, report: ReportName): string {
  return `trace://${projectSlug}/${report}`;
}

export function buildIdentifierUri(projectSlug: string, id: string): string {
  return `trace://${projectSlug}/id/${id}`;
}

// --- MCP Resource shapes ---
// Plain objects matching the protocol's resource schema, kept free of SDK types.

export interface McpResourceMeta {
  uri: string;
  name: string;
  title: string;
  description: string;
  mimeType: string;
  annotations: {
    audience: Array<"user" | "assistant">;
    priority: number;
  };
}

export function buildReportResources(
  audit: HeuristicAudit,
  projectSlug: string
): McpResourceMeta[] {
  const requirements = audit.groups.requirement.size;
  return [
    {
      uri: buildReportUri(projectSlug, "metrics"),
      name: "metrics",
      title: "Traceability coverage metrics",
      description:
        `Coverage per identifier group and per requirement link dimension ` +
        `across ${audit.corpus.size} document(s). Read this first.`,
      mimeType: "application/json",
      annotations: { audience: ["assistant", "user"], priority: 1.0 },
    },
    {
      uri: buildReportUri(projectSlug, "orphans"),
      name: "orphans",
      title: "Orphan analysis",
      description: `${countOrphans(audit.orphans)} element(s) missing an expected requirement link.`,
      mimeType: "text/markdown",
      annotations: { audience: ["assistant", "user"], priority: 0.8 },
    },
    {
      uri: buildReportUri(projectSlug, "matrix"),
      name: "matrix",
      title: "Traceability matrix",
      description: `Inferred links for ${requirements} requirement(s).`,
      mimeType: "text/markdown",
      annotations: { audience: ["assistant", "user"], priority: 0.7 },
    },
  ];
}

export function buildRequirementResource(
  audit: HeuristicAudit,
  projectSlug: string,
  id: string
): McpResourceMeta {
  const links = linksOf(audit.graph, id);
  return {
    uri: buildIdentifierUri(projectSlug, id),
    name: id,
    title: id,
    description:
      links.length > 0 ? `Linked to: ${links.join(", ")}` : "No inferred links",
    mimeType: "application/json",
    annotations: { audience: ["assistant"], priority: 0.5 },
  };
}

export function identifierToJson(audit: HeuristicAudit, id: string): string {
  const payload = {
    id,
    occurrences: [...(audit.extraction.occurrences.get(id) ?? [])].sort(),
    links: linksOf(audit.graph, id),
    referenced_by: [...(audit.graph.backward.get(id) ?? [])],
  };
  return JSON.stringify(payload, null, 2);
}

export function metricsToJson(audit: HeuristicAudit): string {
  return JSON.stringify(audit.metrics, null, 2);
}
