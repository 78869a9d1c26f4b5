import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { SEP } from "./types";
import type { NamespacedName, ToolArg, ToolDefinition, ToolMetadata } from "./types";

/**
 * Build the globally unique name of a tool
 */
export function namespacedName(serverName: string, toolName: string): NamespacedName {
  return `${serverName}${SEP}${toolName}`;
}

export function isNamespacedName(value: string): value is NamespacedName {
  return value.includes(SEP);
}

/**
 * Split a namespaced name on the first separator.
 * Tool names may themselves contain the separator.
 */
export function parseNamespacedName(
  name: string
): { serverName: string; toolName: string; namespacedName: NamespacedName } | null {
  const index = name.indexOf(SEP);
  if (index <= 0) {
    return null;
  }

  const toolName = name.substring(index + SEP.length);
  if (toolName.length === 0) {
    return null;
  }

  const serverName = name.substring(0, index);
  return { serverName, toolName, namespacedName: namespacedName(serverName, toolName) };
}

/**
 * Normalize a tool from an MCP server into a ToolDefinition
 */
export function normalizeTool(serverName: string, tool: Tool): ToolDefinition {
  return {
    namespacedName: namespacedName(serverName, tool.name),
    serverName,
    toolName: tool.name,
    description: tool.description || "",
    inputSchema: { ...tool.inputSchema },
    args: extractArgs(tool.inputSchema),
  };
}

/**
 * Normalize multiple tools from a server
 */
export function normalizeTools(serverName: string, tools: Tool[]): ToolDefinition[] {
  return tools.map(tool => normalizeTool(serverName, tool));
}

/**
 * Extract argument information from JSON schema
 */
export function extractArgs(schema: Record<string, unknown>): ToolArg[] {
  const args: ToolArg[] = [];
  const properties = schema.properties;

  if (typeof properties !== "object" || properties === null) {
    return args;
  }

  for (const [name, prop] of Object.entries(properties)) {
    const description =
      typeof prop === "object" && prop !== null && "description" in prop && prop.description != null
        ? String(prop.description)
        : undefined;
    args.push(description !== undefined ? { name, description } : { name });
  }

  return args;
}

/**
 * Derive the compact metadata stored for indexing
 */
export function toToolMetadata(def: ToolDefinition): ToolMetadata {
  return {
    namespacedName: def.namespacedName,
    serverName: def.serverName,
    toolName: def.toolName,
    description: def.description,
    argNames: def.args.map(arg => arg.name),
    argDescriptions: def.args.flatMap(arg => (arg.description ? [arg.description] : [])),
  };
}

/**
 * Build searchable text for a tool
 * Includes: namespaced name, original name, description, argument names, argument descriptions
 */
export function buildSearchableText(meta: ToolMetadata): string {
  const parts: string[] = [meta.namespacedName, meta.toolName];

  if (meta.description) {
    parts.push(meta.description);
  }

  parts.push(...meta.argNames, ...meta.argDescriptions);

  return parts.join(" ");
}

/**
 * Generate a condensed function signature for a tool
 */
export function toolSignature(def: Pick<ToolDefinition, "toolName" | "args" | "inputSchema">): string {
  const required = Array.isArray(def.inputSchema.required)
    ? new Set(def.inputSchema.required.filter((r): r is string => typeof r === "string"))
    : new Set<string>();

  const argList = def.args
    .map(arg => `${arg.name}${required.has(arg.name) ? "" : "?"}`)
    .join(", ");

  return `${def.toolName}(${argList})`;
}
