// Coverage gate over a persisted traceability artifact
// Pure: callers map the outcome to a process exit code at the boundary.

import { z } from "zod";
import type { ParseResult, StoredArtifact, ThresholdOutcome } from "./model.js";

export const DEFAULT_MIN_REQUIREMENT_COVERAGE = 90.0;

// Label scheme first, then the raw-prefix spellings.
const REQUIREMENT_METRIC_KEYS = ["requirement", "REQ", "REQ-"] as const;

// Only the percentage is read; other fields and other entries are not checked.
const requirementMetricSchema = z.object({ coverage_pct: z.number() }).passthrough();

export const EXIT_CODES = {
  pass: 0,
  "data-unavailable": 1,
  "below-threshold": 2,
} as const satisfies Record<ThresholdOutcome["status"], number>;

export function requirementCoverage(artifact: StoredArtifact): number | undefined {
  for (const key of REQUIREMENT_METRIC_KEYS) {
    const metric = requirementMetricSchema.safeParse(artifact.metrics[key]);
    if (metric.success) return metric.data.coverage_pct;
  }
  return undefined;
}

export function evaluateThreshold(
  artifact: ParseResult<StoredArtifact>,
  minimum: number = DEFAULT_MIN_REQUIREMENT_COVERAGE
): ThresholdOutcome {
  if (!artifact.ok) {
    const cause =
      artifact.error.reason === "missing"
        ? `${artifact.error.file} missing; run the trace graph step first`
        : artifact.error.message;
    return { status: "data-unavailable", cause };
  }
  const coverage = requirementCoverage(artifact.value);
  if (coverage === undefined) {
    return {
      status: "data-unavailable",
      cause: "No requirement metrics found in traceability artifact",
    };
  }
  if (coverage < minimum) {
    return { status: "below-threshold", coverage, minimum };
  }
  return { status: "pass", coverage, minimum };
}

export function describeOutcome(outcome: ThresholdOutcome): string {
  switch (outcome.status) {
    case "pass":
      return `Requirement linkage coverage ${outcome.coverage.toFixed(2)}% >= threshold ${outcome.minimum.toFixed(2)}%`;
    case "below-threshold":
      return `Requirement linkage coverage ${outcome.coverage.toFixed(2)}% < threshold ${outcome.minimum.toFixed(2)}%`;
    case "data-unavailable":
      return outcome.cause;
  }
}

export function exitCodeFor(outcome: ThresholdOutcome): number {
  return EXIT_CODES[outcome.status];
}
