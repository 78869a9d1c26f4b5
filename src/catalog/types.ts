// Separator between server and tool name (e.g., "weather__forecast")
export const SEP = "__";

// Canonical identifier for a tool in the catalog
export type ToolId = {
  server: string;  // downstream MCP server name
  name: string;    // original tool name
};

// Combined tool ID, globally unique while server names are unique
export type NamespacedName = `${string}__${string}`;

export type ToolArg = { name: string; description?: string };

// Full tool definition, owned by the registry
export type ToolDefinition = {
  namespacedName: NamespacedName;
  serverName: string;
  toolName: string;
  description: string;
  inputSchema: Record<string, unknown>;  // Full MCP/JSON schema
  args: ToolArg[];
};

// Compact subset used to build the search index
export type ToolMetadata = {
  namespacedName: NamespacedName;
  serverName: string;
  toolName: string;
  description: string;
  argNames: string[];
  argDescriptions: string[];
};

// Search hit
export type SearchResult = {
  tool: ToolId;
  namespacedName: NamespacedName;
  score: number;
  preview: string;  // Description
  signature: string;  // Condensed function signature
};
