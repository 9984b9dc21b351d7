// Traceability data model: shared types for extraction, linking and metrics

export type IdentifierKind =
  | "stakeholder"
  | "requirement"
  | "decision"
  | "component"
  | "scenario"
  | "test";

/** Document path (root-relative, `/`-separated) → raw text. */
export type Corpus = ReadonlyMap<string, string>;

export type IdentifierGroups = Readonly<
  Record<IdentifierKind, ReadonlySet<string>>
>;

export interface Extraction {
  ids: IdentifierGroups;
  occurrences: ReadonlyMap<string, ReadonlySet<string>>;
}

export interface ReferenceGraph {
  forward: ReadonlyMap<string, ReadonlySet<string>>;
  backward: ReadonlyMap<string, readonly string[]>;
}

export interface CoverageMetric {
  total: number;
  with_links: number;
  coverage_pct: number;
}

export interface DimensionMetric {
  total_requirements: number;
  requirements_with_link: number;
  coverage_pct: number;
}

export type MetricsTable = Record<string, CoverageMetric | DimensionMetric>;

export type KeyScheme = "label" | "prefix";

export interface OrphanReport {
  requirements_no_links: string[];
  scenarios_no_req: string[];
  components_no_req: string[];
  adrs_no_req: string[];
}

export type OrphanCategory = keyof OrphanReport;

// --- Structured inputs ---

export interface IndexItem {
  id: string;
  references: string[];
  [field: string]: unknown;
}

export interface TraceIndex {
  items: IndexItem[];
}

export interface TraceArtifact {
  items: IndexItem[];
  forward: Record<string, string[]>;
  backward: Record<string, string[]>;
  metrics: MetricsTable;
}

/** An artifact as read back: metric entries stay unchecked until selected. */
export interface StoredArtifact extends Omit<TraceArtifact, "metrics"> {
  metrics: Record<string, unknown>;
}

// --- Fallible parsing ---

export type FailureReason = "missing" | "unreadable" | "malformed";

export interface ParseFailure {
  reason: FailureReason;
  file: string;
  message: string;
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ParseFailure };

// --- Threshold gate ---

export type ThresholdOutcome =
  | { status: "pass"; coverage: number; minimum: number }
  | { status: "below-threshold"; coverage: number; minimum: number }
  | { status: "data-unavailable"; cause: string };
