// trace-audit subcommands. Each returns its process exit code instead of exiting.

import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, resolveFrom, type AuditConfig } from "./config.js";
import { runHeuristicAudit, runIndexAudit, writeReports } from "./audit.js";
import { loadTraceArtifact, writeTraceArtifact } from "./artifact.js";
import { describeOutcome, evaluateThreshold, exitCodeFor } from "./threshold.js";
import { checkSpecStructure } from "./frontmatter.js";
import { countOrphans } from "./orphans.js";
import { renderCoverageSummary } from "./report.js";
import { createTraceServer } from "./server.js";
import { createLogger, type Logger } from "./log.js";

export interface Output {
  write(text: string): void;
}

export const USAGE = `Usage: trace-audit <command> [options]

Commands:
  scan [root]              Infer links from raw text, write matrix and orphan reports
  graph                    Build the traceability artifact from a spec index
  check                    Enforce minimum requirement linkage coverage
  lint [paths...]          Validate spec front matter and required identifiers
  serve [root]             Serve audit results as MCP resources over stdio

Options:
  --root <dir>        Corpus root (default: current directory)
  --config <file>     Config file (default: <root>/trace-audit.yaml)
  --index <file>      Spec index for 'graph' (default: build/spec-index.json)
  --out <file>        Artifact output for 'graph' (default: build/traceability.json)
  --artifact <file>   Artifact input for 'check' (default: build/traceability.json)
  --min-req <pct>     Minimum requirement coverage for 'check' (default: 90)
  --reports <dir>     Report directory for 'scan' (default: reports)
  --verbose           Debug logging on stderr
  --help, -h          Show this help

Exit codes for 'check': 0 pass, 1 artifact or metric missing, 2 below threshold.
`;

interface CommandContext {
  root: string;
  config: AuditConfig;
  positionals: string[];
  values: ParsedValues;
  out: Output;
  logger: Logger;
}

type ParsedValues = ReturnType<typeof parse>["values"];

function parse(args: string[]) {
  return parseArgs({
    args,
    options: {
      root: { type: "string" },
      config: { type: "string" },
      index: { type: "string" },
      out: { type: "string" },
      artifact: { type: "string" },
      "min-req": { type: "string" },
      reports: { type: "string" },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", default: false, short: "h" },
    },
    allowPositionals: true,
    strict: true,
  });
}

function scan(ctx: CommandContext): number {
  const audit = runHeuristicAudit(ctx.root, ctx.config, ctx.logger);
  const reportsDir = resolveFrom(ctx.root, ctx.values.reports ?? ctx.config.reportsDir);
  for (const written of writeReports(reportsDir, audit)) {
    ctx.logger.info(`Wrote ${written}`);
  }
  ctx.out.write(renderCoverageSummary(audit.metrics) + "\n");
  ctx.out.write(`Orphans: ${countOrphans(audit.orphans)}\n`);
  return 0;
}

function graph(ctx: CommandContext): number {
  const indexPath = resolveFrom(ctx.root, ctx.values.index ?? ctx.config.indexPath);
  const outPath = resolveFrom(ctx.root, ctx.values.out ?? ctx.config.artifactPath);
  const result = runIndexAudit(indexPath, ctx.config);
  if (!result.ok) {
    const hint =
      result.error.reason === "missing" ? "; generate the spec index first" : "";
    ctx.logger.warn(`${result.error.message}${hint}`);
    return 1;
  }
  writeTraceArtifact(outPath, result.value.artifact);
  ctx.out.write(`Wrote ${outPath}\n`);
  return 0;
}

function parseMinimum(raw: string): number | undefined {
  if (raw.trim() === "") return undefined;
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 && value <= 100 ? value : undefined;
}

function check(ctx: CommandContext): number {
  const raw = ctx.values["min-req"];
  const minimum = raw === undefined ? ctx.config.minRequirementCoverage : parseMinimum(raw);
  if (minimum === undefined) {
    ctx.logger.warn(`--min-req expects a number from 0 to 100, got '${raw}'`);
    return 1;
  }
  const artifactPath = resolveFrom(
    ctx.root,
    ctx.values.artifact ?? ctx.config.artifactPath
  );
  const outcome = evaluateThreshold(loadTraceArtifact(artifactPath), minimum);
  if (outcome.status === "data-unavailable") ctx.logger.warn(describeOutcome(outcome));
  else ctx.out.write(`${describeOutcome(outcome)}\n`);
  return exitCodeFor(outcome);
}

function lint(ctx: CommandContext): number {
  const paths = ctx.positionals.map((p) => resolve(p));
  const report = checkSpecStructure(ctx.root, ctx.config.specDirs, paths);
  if (report.checked.length === 0 && report.issues.length === 0) {
    ctx.logger.warn("No spec files found to validate");
    return 0;
  }
  const failing = new Set(report.issues.map((i) => i.file));
  for (const file of report.checked) {
    if (!failing.has(file)) ctx.out.write(`ok   ${file}\n`);
  }
  for (const issue of report.issues) {
    ctx.out.write(`FAIL ${issue.file}: ${issue.message}\n`);
  }
  if (report.issues.length > 0) {
    ctx.out.write(
      `\nFailed: ${report.issues.length} validation issues across ${failing.size} files.\n`
    );
    return 1;
  }
  ctx.out.write("All specs validated successfully.\n");
  return 0;
}

async function serve(ctx: CommandContext): Promise<number> {
  const { server } = createTraceServer(ctx.root, {
    config: ctx.config,
    logger: ctx.logger,
  });
  await server.connect(new StdioServerTransport());
  return 0;
}

// Commands whose first positional argument is the corpus root.
const ROOT_POSITIONAL = new Set(["scan", "serve"]);

const COMMANDS: Record<string, (ctx: CommandContext) => number | Promise<number>> = {
  scan,
  graph,
  check,
  lint,
  serve,
};

/**
 * Run a subcommand. `argv` excludes the node binary and script path.
 * Throws only on invalid arguments; callers print and exit 1.
 */
export async function run(
  argv: string[],
  out: Output = process.stdout
): Promise<number> {
  const [command, ...rest] = argv;
  if (command === undefined || command === "--help" || command === "-h") {
    out.write(USAGE);
    return command === undefined ? 1 : 0;
  }
  const handler = Object.prototype.hasOwnProperty.call(COMMANDS, command)
    ? COMMANDS[command]
    : undefined;
  if (!handler) {
    process.stderr.write(`Unknown command: ${command}\n\n${USAGE}`);
    return 1;
  }

  const { values, positionals } = parse(rest);
  if (values.help) {
    out.write(USAGE);
    return 0;
  }

  const logger = createLogger(values.verbose === true);
  const rootArg = ROOT_POSITIONAL.has(command) ? positionals[0] : undefined;
  const root = resolve(values.root ?? rootArg ?? ".");
  const config = loadConfig(root, values.config ? resolve(values.config) : undefined);
  if (!config.ok) {
    logger.warn(config.error.message);
    return 1;
  }

  return handler({
    root,
    config: config.value,
    positionals,
    values,
    out,
    logger,
  });
}
