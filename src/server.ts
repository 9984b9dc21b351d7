// Trace audit MCP server
// Runs the heuristic audit over a corpus root and exposes the results as MCP resources.

import { basename, resolve } from "node:path";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { runHeuristicAudit, type HeuristicAudit } from "./audit.js";
import { DEFAULT_CONFIG, type AuditConfig } from "./config.js";
import {
  toProjectSlug,
  buildReportResources,
  buildRequirementResource,
  buildReportUri,
  identifierToJson,
  metricsToJson,
  type McpResourceMeta,
} from "./mapper.js";
import { renderMatrix, renderOrphanReport } from "./report.js";
import { silentLogger, type Logger } from "./log.js";

export interface TraceServerOptions {
  project?: string;
  config?: AuditConfig;
  logger?: Logger;
}

export interface TraceMcpServer {
  server: Server;
  audit: HeuristicAudit;
  projectSlug: string;
}

/**
 * Create an MCP Server serving the traceability audit of a documentation root.
 *
 * @param root     Corpus root directory
 * @param options  project: display name (defaults to the root's basename)
 */
export function createTraceServer(
  root: string,
  options: TraceServerOptions = {}
): TraceMcpServer {
  const resolvedRoot = resolve(root);
  const {
    project = basename(resolvedRoot),
    config = DEFAULT_CONFIG,
    logger = silentLogger,
  } = options;

  const audit = runHeuristicAudit(resolvedRoot, config, logger);
  const projectSlug = toProjectSlug(project) || "corpus";

  const requirementIds = [...audit.groups.requirement].sort();
  const resourceList: McpResourceMeta[] = [
    ...buildReportResources(audit, projectSlug),
    ...requirementIds.map((id) => buildRequirementResource(audit, projectSlug, id)),
  ];
  const knownIds = new Set(requirementIds);

  const server = new Server(
    { name: `trace-${projectSlug}`, version: "0.1.0" },
    {
      capabilities: {
        resources: {},
      },
    }
  );

  logger.info(
    `Serving '${project}': ${audit.corpus.size} documents, ${requirementIds.length} requirements`
  );

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: resourceList,
  }));

  const reports: Record<string, { mimeType: string; render: () => string }> = {
    [buildReportUri(projectSlug, "metrics")]: {
      mimeType: "application/json",
      render: () => metricsToJson(audit),
    },
    [buildReportUri(projectSlug, "orphans")]: {
      mimeType: "text/markdown",
      render: () => renderOrphanReport(audit.orphans),
    },
    [buildReportUri(projectSlug, "matrix")]: {
      mimeType: "text/markdown",
      render: () => renderMatrix(audit.groups, audit.graph),
    },
  };

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const uri = request.params.uri;

    const report = Object.prototype.hasOwnProperty.call(reports, uri)
      ? reports[uri]
      : undefined;
    if (report) {
      return {
        contents: [{ uri, mimeType: report.mimeType, text: report.render() }],
      };
    }

    const prefix = `trace://${projectSlug}/id/`;
    if (!uri.startsWith(prefix)) {
      throw new Error(`Unknown resource URI: ${uri}`);
    }
    const id = uri.slice(prefix.length);
    if (!knownIds.has(id)) {
      throw new Error(`No requirement with id '${id}'`);
    }
    return {
      contents: [
        { uri, mimeType: "application/json", text: identifierToJson(audit, id) },
      ],
    };
  });

  return { server, audit, projectSlug };
}
