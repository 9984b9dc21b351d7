// trace-audit: public library surface
// Import this to run traceability audits from your own tooling.

export {
  ID_PATTERNS,
  IDENTIFIER_KINDS,
  kindOf,
  groupKey,
  findIdentifiers,
} from "./identifiers.js";
export {
  extractIdentifiers,
  identifiersOfKind,
  loadCorpus,
  readTextUnit,
} from "./extractor.js";
export {
  inferLinks,
  buildExplicitGraph,
  transpose,
  linksOf,
  hasLinks,
  INFERRED_TARGET_KINDS,
} from "./linker.js";
export {
  computeCoverage,
  groupCoverage,
  dimensionCoverage,
  groupIdentifiers,
  percentage,
  DIMENSIONS,
} from "./coverage.js";
export { detectOrphans, countOrphans, ORPHAN_CATEGORIES } from "./orphans.js";
export {
  evaluateThreshold,
  describeOutcome,
  exitCodeFor,
  requirementCoverage,
  DEFAULT_MIN_REQUIREMENT_COVERAGE,
  EXIT_CODES,
} from "./threshold.js";
export {
  loadTraceIndex,
  loadTraceArtifact,
  parseTraceIndex,
  parseTraceArtifact,
  buildTraceArtifact,
  writeTraceArtifact,
} from "./artifact.js";
export {
  extractFrontMatter,
  parseFrontMatter,
  checkSpecDocument,
  checkSpecStructure,
} from "./frontmatter.js";
export { renderMatrix, renderOrphanReport, renderCoverageSummary } from "./report.js";
export {
  auditCorpus,
  auditIndex,
  runHeuristicAudit,
  runIndexAudit,
  writeReports,
} from "./audit.js";
export { loadConfig, parseConfig, DEFAULT_CONFIG } from "./config.js";
export { createLogger } from "./log.js";
export { createTraceServer } from "./server.js";
export { run } from "./commands.js";
export type {
  IdentifierKind,
  Corpus,
  Extraction,
  IdentifierGroups,
  ReferenceGraph,
  CoverageMetric,
  DimensionMetric,
  MetricsTable,
  KeyScheme,
  OrphanReport,
  OrphanCategory,
  IndexItem,
  TraceIndex,
  TraceArtifact,
  StoredArtifact,
  ParseResult,
  ParseFailure,
  ThresholdOutcome,
} from "./model.js";
export type { AuditConfig } from "./config.js";
export type { AuditResult, HeuristicAudit, IndexAudit } from "./audit.js";
export type { StructureIssue, StructureReport } from "./frontmatter.js";
export type { Logger } from "./log.js";
export type { TraceServerOptions, TraceMcpServer } from "./server.js";
