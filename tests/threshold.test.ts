import { describe, it, expect } from "vitest";
import {
  describeOutcome,
  evaluateThreshold,
  exitCodeFor,
  requirementCoverage,
} from "../src/threshold.js";
import { parseTraceArtifact } from "../src/artifact.js";
import type { ParseResult, StoredArtifact } from "../src/model.js";

function artifactWith(metrics: StoredArtifact["metrics"]): ParseResult<StoredArtifact> {
  return { ok: true, value: { items: [], forward: {}, backward: {}, metrics } };
}

function requirementAt(coverage: number): ParseResult<StoredArtifact> {
  return artifactWith({
    requirement: { total: 100, with_links: coverage, coverage_pct: coverage },
  });
}

const missing: ParseResult<StoredArtifact> = {
  ok: false,
  error: {
    reason: "missing",
    file: "build/traceability.json",
    message: "File not found: build/traceability.json",
  },
};

describe("evaluateThreshold", () => {
  it("is data-unavailable without an artifact", () => {
    const outcome = evaluateThreshold(missing, 90);
    expect(outcome.status).toBe("data-unavailable");
    expect(exitCodeFor(outcome)).toBe(1);
    expect(describeOutcome(outcome)).toBe(
      "build/traceability.json missing; run the trace graph step first"
    );
  });

  it("is data-unavailable for a malformed artifact", () => {
    const outcome = evaluateThreshold(
      {
        ok: false,
        error: { reason: "malformed", file: "t.json", message: "Invalid JSON in t.json" },
      },
      90
    );
    expect(outcome).toEqual({ status: "data-unavailable", cause: "Invalid JSON in t.json" });
  });

  it("is data-unavailable when the requirement metric is absent", () => {
    const outcome = evaluateThreshold(
      artifactWith({ decision: { total: 1, with_links: 1, coverage_pct: 100 } })
    );
    expect(outcome).toEqual({
      status: "data-unavailable",
      cause: "No requirement metrics found in traceability artifact",
    });
  });

  it("ignores metric entries other than the requirement metric", () => {
    const outcome = evaluateThreshold(
      parseTraceArtifact({
        metrics: {
          requirement: { total: 10, with_links: 10, coverage_pct: 100 },
          generated: { note: "nightly" },
        },
      }),
      90
    );
    expect(outcome).toEqual({ status: "pass", coverage: 100, minimum: 90 });
  });

  it("reads a requirement metric carrying only its percentage", () => {
    const outcome = evaluateThreshold(
      parseTraceArtifact({ metrics: { REQ: { coverage_pct: 95 } } }),
      90
    );
    expect(outcome).toEqual({ status: "pass", coverage: 95, minimum: 90 });
  });

  it("treats a requirement metric without a percentage as absent", () => {
    const outcome = evaluateThreshold(
      parseTraceArtifact({ metrics: { requirement: { total: 3 } } }),
      90
    );
    expect(outcome).toEqual({
      status: "data-unavailable",
      cause: "No requirement metrics found in traceability artifact",
    });
  });

  it("is below-threshold at 85% against 90%", () => {
    const outcome = evaluateThreshold(requirementAt(85), 90);
    expect(outcome).toEqual({ status: "below-threshold", coverage: 85, minimum: 90 });
    expect(exitCodeFor(outcome)).toBe(2);
    expect(describeOutcome(outcome)).toBe(
      "Requirement linkage coverage 85.00% < threshold 90.00%"
    );
  });

  it("passes at 92% against 90%", () => {
    const outcome = evaluateThreshold(requirementAt(92), 90);
    expect(outcome.status).toBe("pass");
    expect(exitCodeFor(outcome)).toBe(0);
  });

  it("passes when coverage equals the minimum", () => {
    expect(evaluateThreshold(requirementAt(90), 90).status).toBe("pass");
  });

  it("passes full coverage against the default minimum", () => {
    const outcome = evaluateThreshold(requirementAt(100));
    expect(outcome).toEqual({ status: "pass", coverage: 100, minimum: 90 });
    expect(describeOutcome(outcome)).toBe(
      "Requirement linkage coverage 100.00% >= threshold 90.00%"
    );
  });
});

describe("requirementCoverage", () => {
  it("reads the prefix-scheme key", () => {
    const result = artifactWith({
      REQ: { total: 4, with_links: 3, coverage_pct: 75 },
    });
    expect(result.ok && requirementCoverage(result.value)).toBe(75);
  });

  it("reads the legacy dashed key", () => {
    const result = artifactWith({
      "REQ-": { total: 2, with_links: 1, coverage_pct: 50 },
    });
    expect(result.ok && requirementCoverage(result.value)).toBe(50);
  });
});
