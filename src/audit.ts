// Audit pipelines: raw-text heuristic and declared-index variants

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type {
  Corpus,
  Extraction,
  IdentifierGroups,
  MetricsTable,
  OrphanReport,
  ParseResult,
  ReferenceGraph,
  TraceArtifact,
  TraceIndex,
} from "./model.js";
import { DEFAULT_CONFIG, type AuditConfig } from "./config.js";
import { extractIdentifiers, loadCorpus } from "./extractor.js";
import { buildExplicitGraph, inferLinks } from "./linker.js";
import { computeCoverage, groupIdentifiers } from "./coverage.js";
import { detectOrphans } from "./orphans.js";
import { buildTraceArtifact, loadTraceIndex } from "./artifact.js";
import { renderMatrix, renderOrphanReport } from "./report.js";
import { silentLogger, type Logger } from "./log.js";

export interface AuditResult {
  groups: IdentifierGroups;
  graph: ReferenceGraph;
  metrics: MetricsTable;
  orphans: OrphanReport;
}

export interface HeuristicAudit extends AuditResult {
  corpus: Corpus;
  extraction: Extraction;
}

export interface IndexAudit extends AuditResult {
  index: TraceIndex;
  artifact: TraceArtifact;
}

export function auditCorpus(
  corpus: Corpus,
  config: AuditConfig = DEFAULT_CONFIG
): HeuristicAudit {
  const extraction = extractIdentifiers(corpus);
  const graph = inferLinks(corpus, extraction);
  return {
    corpus,
    extraction,
    groups: extraction.ids,
    graph,
    metrics: computeCoverage(extraction.ids, graph, {
      keyScheme: config.keyScheme,
    }),
    orphans: detectOrphans(extraction.ids, graph),
  };
}

export function runHeuristicAudit(
  root: string,
  config: AuditConfig = DEFAULT_CONFIG,
  logger: Logger = silentLogger
): HeuristicAudit {
  const corpus = loadCorpus(root, {
    extensions: config.extensions,
    exclude: config.exclude,
    logger,
  });
  return auditCorpus(corpus, config);
}

export function auditIndex(
  index: TraceIndex,
  config: AuditConfig = DEFAULT_CONFIG
): IndexAudit {
  const graph = buildExplicitGraph(index.items);
  const groups = groupIdentifiers(index.items.map((i) => i.id));
  const metrics = computeCoverage(groups, graph, { keyScheme: config.keyScheme });
  return {
    index,
    groups,
    graph,
    metrics,
    orphans: detectOrphans(groups, graph),
    artifact: buildTraceArtifact(index.items, graph, metrics),
  };
}

export function runIndexAudit(
  indexPath: string,
  config: AuditConfig = DEFAULT_CONFIG
): ParseResult<IndexAudit> {
  const index = loadTraceIndex(indexPath);
  if (!index.ok) return index;
  return { ok: true, value: auditIndex(index.value, config) };
}

export const REPORT_FILES = {
  matrix: "traceability-matrix.md",
  orphans: "orphans.md",
} as const;

/** Overwrite the matrix and orphan reports in dir; returns the written paths. */
export function writeReports(dir: string, audit: AuditResult): string[] {
  mkdirSync(dir, { recursive: true });
  const matrixPath = join(dir, REPORT_FILES.matrix);
  const orphansPath = join(dir, REPORT_FILES.orphans);
  writeFileSync(matrixPath, renderMatrix(audit.groups, audit.graph), "utf-8");
  writeFileSync(orphansPath, renderOrphanReport(audit.orphans), "utf-8");
  return [matrixPath, orphansPath];
}
