// Audit configuration: defaults, an optional trace-audit.yaml, then CLI overrides

import { existsSync, readFileSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import type { ParseResult } from "./model.js";
import { formatIssues } from "./artifact.js";
import { DEFAULT_MIN_REQUIREMENT_COVERAGE } from "./threshold.js";

export const CONFIG_FILE = "trace-audit.yaml";

export const auditConfigSchema = z
  .object({
    extensions: z.array(z.string().startsWith(".")).min(1),
    exclude: z.array(z.string()),
    reportsDir: z.string().min(1),
    indexPath: z.string().min(1),
    artifactPath: z.string().min(1),
    minRequirementCoverage: z.number().min(0).max(100),
    keyScheme: z.enum(["label", "prefix"]),
    specDirs: z.array(z.string()),
  })
  .strict();

export type AuditConfig = z.infer<typeof auditConfigSchema>;

export const DEFAULT_CONFIG: AuditConfig = {
  extensions: [".md"],
  exclude: ["node_modules", "reports", ".git", "build"],
  reportsDir: "reports",
  indexPath: "build/spec-index.json",
  artifactPath: "build/traceability.json",
  minRequirementCoverage: DEFAULT_MIN_REQUIREMENT_COVERAGE,
  keyScheme: "label",
  specDirs: ["02-requirements", "03-architecture"],
};

const overridesSchema = auditConfigSchema.partial();

/**
 * Parse the YAML text of a config file and merge it over the defaults.
 * An empty document yields the defaults.
 */
export function parseConfig(text: string, file: string): ParseResult<AuditConfig> {
  let data: unknown;
  try {
    data = yaml.load(text, { schema: yaml.DEFAULT_SCHEMA });
  } catch (err) {
    return {
      ok: false,
      error: {
        reason: "malformed",
        file,
        message: `Invalid YAML in ${file}: ${err instanceof Error ? err.message : String(err)}`,
      },
    };
  }
  const result = overridesSchema.safeParse(data ?? {});
  if (!result.success) {
    return {
      ok: false,
      error: {
        reason: "malformed",
        file,
        message: `Invalid config in ${file}: ${formatIssues(result.error)}`,
      },
    };
  }
  return { ok: true, value: { ...DEFAULT_CONFIG, ...result.data } };
}

/**
 * Load configuration for a corpus root. Without an explicit path, a missing
 * trace-audit.yaml means defaults; an explicit path must exist.
 */
export function loadConfig(
  root: string,
  configPath?: string
): ParseResult<AuditConfig> {
  const file = configPath ?? join(root, CONFIG_FILE);
  if (!existsSync(file)) {
    if (configPath === undefined) return { ok: true, value: DEFAULT_CONFIG };
    return {
      ok: false,
      error: { reason: "missing", file, message: `Config file not found: ${file}` },
    };
  }
  let text: string;
  try {
    text = readFileSync(file, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: {
        reason: "unreadable",
        file,
        message: err instanceof Error ? err.message : String(err),
      },
    };
  }
  return parseConfig(text, file);
}

export function resolveFrom(root: string, path: string): string {
  return isAbsolute(path) ? path : join(root, path);
}
