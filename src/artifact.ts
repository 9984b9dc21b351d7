// Structured inputs and outputs: the spec index and the traceability artifact
// Parsing never throws: every reader returns a tagged ParseResult.

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type {
  IndexItem,
  MetricsTable,
  ParseResult,
  ReferenceGraph,
  StoredArtifact,
  TraceArtifact,
  TraceIndex,
} from "./model.js";

// --- Schemas ---

export const indexItemSchema = z
  .object({
    id: z.string().min(1),
    references: z.array(z.string()).default([]),
  })
  .passthrough();

export const traceIndexSchema = z.object({
  items: z.array(indexItemSchema),
});

export const traceArtifactSchema = z.object({
  items: z.array(indexItemSchema).default([]),
  forward: z.record(z.array(z.string())).default({}),
  backward: z.record(z.array(z.string())).default({}),
  metrics: z.record(z.unknown()).default({}),
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join("/") || "<root>"}: ${issue.message}`)
    .join("; ");
}

// --- Reading ---

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function readJsonFile(file: string): ParseResult<unknown> {
  if (!existsSync(file)) {
    return {
      ok: false,
      error: { reason: "missing", file, message: `File not found: ${file}` },
    };
  }
  let raw: string;
  try {
    raw = readFileSync(file, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: { reason: "unreadable", file, message: errorMessage(err) },
    };
  }
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (err) {
    return {
      ok: false,
      error: {
        reason: "malformed",
        file,
        message: `Invalid JSON in ${file}: ${errorMessage(err)}`,
      },
    };
  }
}

export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  file: string
): ParseResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (!result.success) {
    return {
      ok: false,
      error: {
        reason: "malformed",
        file,
        message: `Invalid structure in ${file}: ${formatIssues(result.error)}`,
      },
    };
  }
  return { ok: true, value: result.data };
}

export function parseTraceIndex(
  data: unknown,
  file: string = "<input>"
): ParseResult<TraceIndex> {
  return parseWith(traceIndexSchema, data, file);
}

export function parseTraceArtifact(
  data: unknown,
  file: string = "<input>"
): ParseResult<StoredArtifact> {
  return parseWith(traceArtifactSchema, data, file);
}

export function loadTraceIndex(file: string): ParseResult<TraceIndex> {
  const json = readJsonFile(file);
  return json.ok ? parseTraceIndex(json.value, file) : json;
}

export function loadTraceArtifact(file: string): ParseResult<StoredArtifact> {
  const json = readJsonFile(file);
  return json.ok ? parseTraceArtifact(json.value, file) : json;
}

// --- Writing ---

export function graphToRecords(graph: ReferenceGraph): {
  forward: Record<string, string[]>;
  backward: Record<string, string[]>;
} {
  const forward: Record<string, string[]> = {};
  for (const [id, targets] of graph.forward) forward[id] = [...targets];
  const backward: Record<string, string[]> = {};
  for (const [id, sources] of graph.backward) backward[id] = [...sources];
  return { forward, backward };
}

export function buildTraceArtifact(
  items: IndexItem[],
  graph: ReferenceGraph,
  metrics: MetricsTable
): TraceArtifact {
  return { items, ...graphToRecords(graph), metrics };
}

/** Overwrite the artifact file wholesale. */
export function writeTraceArtifact(file: string, artifact: TraceArtifact): void {
  mkdirSync(dirname(file), { recursive: true });
  writeFileSync(file, JSON.stringify(artifact, null, 2) + "\n", "utf-8");
}
