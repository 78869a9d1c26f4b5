import { z } from "zod";
import { ConnectionModeSchema, LoadingModeSchema } from "../config/schema";
import type { ConnectionMode, LoadingMode } from "../config/schema";
import { namespacedName, parseNamespacedName } from "../catalog/catalog";
import type { NamespacedName } from "../catalog/types";

export type ServerTransport =
  | { type: "http"; url: string }
  | { type: "stdio"; command: string; args: string[]; env?: Record<string, string> };

export type ServerRegistration = {
  name: string;
  url: string;
  transport: ServerTransport;
  connectionMode: ConnectionMode;
  loadingMode: LoadingMode;
  /** Static auth headers sent when no per-call override is given */
  headers?: Record<string, string>;
};

export type ServerStatus = "unknown" | "active" | "error";

export type ServerRecord = ServerRegistration & {
  registeredAt: string;
  status: ServerStatus;
  toolCount: number;
  errorMessage?: string;
};

const TransportSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("http"), url: z.string() }),
  z.object({
    type: z.literal("stdio"),
    command: z.string(),
    args: z.array(z.string()),
    env: z.record(z.string(), z.string()).optional(),
  }),
]);

// Validates records read back from storage
export const ServerRecordSchema = z.object({
  name: z.string().min(1),
  url: z.string(),
  transport: TransportSchema,
  connectionMode: ConnectionModeSchema,
  loadingMode: LoadingModeSchema,
  headers: z.record(z.string(), z.string()).optional(),
  registeredAt: z.string(),
  status: z.enum(["unknown", "active", "error"]),
  toolCount: z.number().int().min(0),
  errorMessage: z.string().optional(),
});

const NamespacedNameSchema = z.custom<NamespacedName>(
  value => typeof value === "string" && parseNamespacedName(value) !== null,
  { message: "Expected <server>__<tool>" }
);

function namesAgree(value: { namespacedName: string; serverName: string; toolName: string }): boolean {
  return value.namespacedName === namespacedName(value.serverName, value.toolName);
}

export const ToolDefinitionSchema = z.object({
  namespacedName: NamespacedNameSchema,
  serverName: z.string().min(1),
  toolName: z.string().min(1),
  description: z.string(),
  inputSchema: z.record(z.string(), z.unknown()),
  args: z.array(z.object({ name: z.string(), description: z.string().optional() })),
}).refine(namesAgree, { message: "namespacedName does not match serverName/toolName" });

export const ToolMetadataSchema = z.object({
  namespacedName: NamespacedNameSchema,
  serverName: z.string().min(1),
  toolName: z.string().min(1),
  description: z.string(),
  argNames: z.array(z.string()),
  argDescriptions: z.array(z.string()),
}).refine(namesAgree, { message: "namespacedName does not match serverName/toolName" });
