import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  CallToolResultSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { CallToolResult, ListToolsResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { Envelope } from "../errors";
import { errorMessage, fail } from "../errors";
import type { Gateway } from "../gateway/gateway";
import type { Logger } from "../logger";
import { noopLogger } from "../logger";

export const SERVER_NAME = "toolgate";
export const SERVER_VERSION = "0.1.0";

const SEARCH_BM25 = "gateway_search_bm25";
const SEARCH_REGEX = "gateway_search_regex";
const EXECUTE = "gateway_execute";
const STATUS = "gateway_status";
const PERF = "gateway_perf";

const BM25_DESC = `Search downstream tools by natural language. Search before saying "I cannot do that."

Matching tools are activated and returned with their schemas. Call them directly or through ${EXECUTE}.`;

const REGEX_DESC = `Search downstream tools by regex over names, descriptions and arguments.

Use when you know part of a tool name or server prefix (e.g., "weather__.*", "forecast"). Matching ignores case.`;

const EXECUTE_DESC = `Execute a tool discovered via ${SEARCH_BM25} or ${SEARCH_REGEX}.

Pass the full <server>__<tool> name and arguments matching the tool's schema.`;

const STATUS_DESC = `Get gateway status: registered servers, discovery health and tool counts.`;

const PERF_DESC = `Get performance metrics: search and execution latencies, index builds and cache statistics.`;

const SearchArgsSchema = z.object({
  query: z.string(),
  max_results: z.number().optional(),
});

const RegexArgsSchema = z.object({
  pattern: z.string(),
  max_results: z.number().optional(),
});

const ExecuteArgsSchema = z.object({
  name: z.string().min(1),
  // Accepts an object or its JSON encoding
  arguments: z.union([z.record(z.string(), z.unknown()), z.string()]).optional(),
  auth_header: z.string().optional(),
});

const META_TOOLS: Tool[] = [
  {
    name: SEARCH_BM25,
    description: BM25_DESC,
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "What you need, in plain words (e.g., 'weather forecast')" },
        max_results: { type: "number", description: "Maximum number of results (1-10, default 5)" },
      },
      required: ["query"],
    },
  },
  {
    name: SEARCH_REGEX,
    description: REGEX_DESC,
    inputSchema: {
      type: "object",
      properties: {
        pattern: { type: "string", description: "Case-insensitive regex pattern (max 200 chars)" },
        max_results: { type: "number", description: "Maximum number of results (1-10, default 5)" },
      },
      required: ["pattern"],
    },
  },
  {
    name: EXECUTE,
    description: EXECUTE_DESC,
    inputSchema: {
      type: "object",
      properties: {
        name: { type: "string", description: "Full tool name from search results (e.g., 'weather__get_forecast')" },
        arguments: { type: "object", description: "Tool arguments matching its schema" },
        auth_header: { type: "string", description: "Authorization header for this call only" },
      },
      required: ["name"],
    },
  },
  { name: STATUS, description: STATUS_DESC, inputSchema: { type: "object", properties: {} } },
  { name: PERF, description: PERF_DESC, inputSchema: { type: "object", properties: {} } },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * MCP tool input schema from a downstream JSON schema
 */
export function toInputSchema(schema: Record<string, unknown>): Tool["inputSchema"] {
  const required = Array.isArray(schema.required)
    ? schema.required.filter((item): item is string => typeof item === "string")
    : undefined;
  return {
    ...schema,
    type: "object",
    properties: isRecord(schema.properties) ? schema.properties : {},
    ...(required ? { required } : {}),
  };
}

/**
 * Envelope rendered as JSON text content
 */
export function envelopeResult(result: Envelope<unknown>): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
    isError: !result.success,
  };
}

/**
 * Downstream result of an activated tool. Well-formed results pass through
 * unchanged; anything else is wrapped as JSON text.
 */
export function passthroughResult(result: Envelope<unknown>): CallToolResult {
  if (!result.success) {
    return envelopeResult(result);
  }
  const parsed = CallToolResultSchema.safeParse(result.data);
  if (parsed.success) {
    return parsed.data;
  }
  return { content: [{ type: "text", text: JSON.stringify(result.data) }] };
}

function invalidArgs(tool: string, error: z.ZodError): CallToolResult {
  const issues = error.issues.map(issue => `${issue.path.join(".") || "arguments"}: ${issue.message}`);
  return envelopeResult(fail("invalid_request", `Invalid arguments for ${tool}: ${issues.join(", ")}`));
}

function parseToolArguments(raw: Record<string, unknown> | string | undefined): Record<string, unknown> | string {
  if (raw === undefined) return {};
  if (typeof raw !== "string") return raw;
  if (raw.trim() === "") return {};

  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : "arguments must encode a JSON object";
  } catch (error) {
    return `Failed to parse arguments as JSON: ${errorMessage(error)}`;
  }
}

export type GatewayServerOptions = {
  logger?: Logger;
};

/**
 * MCP server exposing the gateway's meta tools plus every activated tool
 */
export function createGatewayServer(gateway: Gateway, options: GatewayServerOptions = {}): Server {
  const logger = options.logger ?? noopLogger;
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: { listChanged: true } } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => {
    const activated: Tool[] = gateway.capabilities.list().map(capability => ({
      name: capability.name,
      description: capability.description,
      inputSchema: toInputSchema(capability.inputSchema),
    }));
    return { tools: [...META_TOOLS, ...activated] };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra): Promise<CallToolResult> => {
    const { name, arguments: args = {} } = request.params;
    const caller = extra.sessionId;
    const header = extra.requestInfo?.headers["authorization"];
    const authHeader = typeof header === "string" ? header : undefined;

    switch (name) {
      case SEARCH_BM25: {
        const parsed = SearchArgsSchema.safeParse(args);
        if (!parsed.success) return invalidArgs(name, parsed.error);
        return envelopeResult(
          await gateway.search(parsed.data.query, { mode: "bm25", maxResults: parsed.data.max_results, caller })
        );
      }

      case SEARCH_REGEX: {
        const parsed = RegexArgsSchema.safeParse(args);
        if (!parsed.success) return invalidArgs(name, parsed.error);
        return envelopeResult(
          await gateway.search(parsed.data.pattern, { mode: "regex", maxResults: parsed.data.max_results, caller })
        );
      }

      case EXECUTE: {
        const parsed = ExecuteArgsSchema.safeParse(args);
        if (!parsed.success) return invalidArgs(name, parsed.error);

        const toolArgs = parseToolArguments(parsed.data.arguments);
        if (typeof toolArgs === "string") {
          return envelopeResult(fail("invalid_request", toolArgs));
        }

        return envelopeResult(
          await gateway.callTool(parsed.data.name, toolArgs, {
            authOverride: parsed.data.auth_header ?? authHeader,
            signal: extra.signal,
            caller,
          })
        );
      }

      case STATUS:
        return envelopeResult(await gateway.getStatus());

      case PERF:
        return envelopeResult(gateway.getPerformance());
    }

    const capability = gateway.capabilities.get(name);
    if (!capability) {
      return envelopeResult(fail("not_found", `Tool '${name}' is not available; search for it first`));
    }
    return passthroughResult(await capability.handler(args, { authHeader, caller, signal: extra.signal }));
  });

  // Several activations from one search produce a single notification
  let notifyScheduled = false;
  const unsubscribe = gateway.capabilities.onChange(() => {
    if (notifyScheduled) return;
    notifyScheduled = true;
    queueMicrotask(() => {
      notifyScheduled = false;
      server.sendToolListChanged().catch((error: unknown) => {
        logger.debug(`Could not send tools/list_changed: ${errorMessage(error)}`);
      });
    });
  });

  const previousOnClose = server.onclose;
  server.onclose = () => {
    unsubscribe();
    previousOnClose?.();
  };

  return server;
}
