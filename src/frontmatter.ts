// Spec document structure checks: YAML front matter plus required identifiers in the body

import { existsSync, readdirSync, statSync } from "node:fs";
import { basename, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import type { ParseResult } from "./model.js";
import { readTextUnit, toCorpusPath } from "./extractor.js";

const FRONT_MATTER_RE = /^---\r?\n([\s\S]*?)\r?\n---/;

export interface StructureIssue {
  file: string;
  message: string;
}

const baseSpecSchema = z.object({
  title: z.string().min(1),
  version: z.union([z.string().min(1), z.number()]),
  status: z.enum(["draft", "review", "approved", "deprecated"]).optional(),
  date: z.union([z.string(), z.date()]).optional(),
  authors: z.array(z.string()).optional(),
  traceability: z.record(z.array(z.string())).optional(),
});

export const SPEC_SCHEMAS = {
  requirements: baseSpecSchema.extend({ specType: z.literal("requirements") }),
  architecture: baseSpecSchema.extend({ specType: z.literal("architecture") }),
} as const;

export type SpecType = keyof typeof SPEC_SCHEMAS;

function isSpecType(value: string): value is SpecType {
  return Object.prototype.hasOwnProperty.call(SPEC_SCHEMAS, value);
}

// Identifiers the body of each spec type must mention at least once.
const BODY_RULES: Record<SpecType, { pattern: RegExp; message: string }> = {
  requirements: {
    pattern: /REQ-(F|NF)-\d{3}/,
    message: "No REQ-* identifiers found in body",
  },
  architecture: {
    pattern: /ADR-\d{3}/,
    message: "No ADR-XXX references found in architecture spec",
  },
};

export function extractFrontMatter(text: string): string | undefined {
  return FRONT_MATTER_RE.exec(text)?.[1];
}

export function parseFrontMatter(
  block: string,
  file: string = "<input>"
): ParseResult<Record<string, unknown>> {
  let data: unknown;
  try {
    data = yaml.load(block, { schema: yaml.DEFAULT_SCHEMA });
  } catch (err) {
    return {
      ok: false,
      error: {
        reason: "malformed",
        file,
        message: err instanceof Error ? err.message : String(err),
      },
    };
  }
  if (data === null || data === undefined) return { ok: true, value: {} };
  const result = z.record(z.unknown()).safeParse(data);
  if (!result.success) {
    return {
      ok: false,
      error: { reason: "malformed", file, message: "Front matter is not a mapping" },
    };
  }
  return { ok: true, value: result.data };
}

export function checkSpecDocument(file: string, text: string): StructureIssue[] {
  const issue = (message: string): StructureIssue => ({ file, message });

  const block = extractFrontMatter(text);
  if (block === undefined) return [issue("Missing YAML front matter (--- block)")];

  const meta = parseFrontMatter(block, file);
  if (!meta.ok) return [issue("Invalid YAML front matter")];

  const specType = meta.value["specType"];
  if (specType === undefined || specType === null || specType === "") {
    return [issue("Missing specType in front matter")];
  }
  if (typeof specType !== "string" || !isSpecType(specType)) {
    return [issue(`Schema load error: No schema for specType=${String(specType)}`)];
  }

  const issues: StructureIssue[] = [];
  const result = SPEC_SCHEMAS[specType].safeParse(meta.value);
  if (!result.success) {
    for (const violation of result.error.issues) {
      const at = violation.path.join("/") || "<root>";
      issues.push(issue(`Schema violation: ${at}: ${violation.message}`));
    }
  }

  const rule = BODY_RULES[specType];
  if (!rule.pattern.test(text)) issues.push(issue(rule.message));
  return issues;
}

function markdownFilesUnder(dir: string): string[] {
  if (!existsSync(dir)) return [];
  const files: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) files.push(...markdownFilesUnder(fullPath));
    else if (entry.isFile() && entry.name.endsWith(".md")) files.push(fullPath);
  }
  return files.sort();
}

export function discoverSpecFiles(
  root: string,
  specDirs: readonly string[]
): string[] {
  return specDirs.flatMap((d) => markdownFilesUnder(join(root, d)));
}

export interface StructureReport {
  checked: string[];
  issues: StructureIssue[];
}

/**
 * Check the given files (or every spec file under specDirs). README files are
 * skipped; reported paths are relative to root.
 */
export function checkSpecStructure(
  root: string,
  specDirs: readonly string[],
  paths: readonly string[] = []
): StructureReport {
  const targets = (paths.length > 0 ? [...paths] : discoverSpecFiles(root, specDirs))
    .filter((p) => !basename(p).startsWith("README"));

  const checked: string[] = [];
  const issues: StructureIssue[] = [];
  for (const target of targets) {
    const display = toCorpusPath(root, target);
    if (!existsSync(target) || !statSync(target).isFile()) {
      issues.push({ file: display, message: "File not found" });
      continue;
    }
    const text = readTextUnit(target);
    if (text === undefined) {
      issues.push({ file: display, message: "Unreadable file" });
      continue;
    }
    checked.push(display);
    issues.push(...checkSpecDocument(display, text));
  }
  return { checked, issues };
}
