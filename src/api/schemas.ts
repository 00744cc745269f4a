import { z } from 'zod';
import { GraphStateSchema } from '../domain/models/graphState';
import { OperationalParamsSchema } from '../domain/models/stageContexts';

// --- Generic JSON-RPC Models ---
export const JSONRPCIdSchema = z.union([z.string(), z.number(), z.null()]);

export type JSONRPCId = z.infer<typeof JSONRPCIdSchema>;

export const JSONRPCRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  method: z.string().min(1),
  params: z.unknown().optional(),
  id: JSONRPCIdSchema.optional(),
});

export type JSONRPCRequest = z.infer<typeof JSONRPCRequestSchema>;

export const JSONRPCErrorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export type JSONRPCErrorObject = z.infer<typeof JSONRPCErrorObjectSchema>;

export type JSONRPCResponse =
  | { jsonrpc: "2.0"; id: JSONRPCId; result: unknown }
  | { jsonrpc: "2.0"; id: JSONRPCId; error: JSONRPCErrorObject };

export const JSONRPC_ERRORS = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  PROCESSING_ERROR: -32000,
  UNAUTHORIZED: -32001,
  PROCESSOR_UNAVAILABLE: -32002,
  RATE_LIMITED: -32003,
} as const;

// --- MCP Specific Schemas ---
export const MCPInitializeClientInfoSchema = z.object({
  client_name: z.string().optional(),
  client_version: z.string().optional(),
  supported_mcp_versions: z.array(z.string()).default([]),
});

export const MCPInitializeParamsSchema = z.object({
  process_id: z.number().int().optional(),
  client_info: MCPInitializeClientInfoSchema.default({}),
});

export type MCPInitializeParams = z.infer<typeof MCPInitializeParamsSchema>;

export const MCPInitializeResultSchema = z.object({
  server_name: z.string(),
  server_version: z.string(),
  mcp_version: z.string(),
});

export type MCPInitializeResult = z.infer<typeof MCPInitializeResultSchema>;

export const MCPQueryContextSchema = z.object({
  conversation_id: z.string().optional(),
  history: z.array(z.record(z.unknown())).optional(),
  user_preferences: z.record(z.unknown()).optional(),
});

export type MCPQueryContext = z.infer<typeof MCPQueryContextSchema>;

// Request-level defaults on top of the pipeline overrides the stages understand.
export const MCPQueryOperationalParamsSchema = OperationalParamsSchema.extend({
  include_reasoning_trace: z.boolean().default(true),
  include_graph_state: z.boolean().default(true),
  max_nodes_in_response_graph: z.number().int().min(0).default(50),
  output_detail_level: z.enum(["summary", "detailed"]).default("summary"),
});

export type MCPQueryOperationalParams = z.infer<typeof MCPQueryOperationalParamsSchema>;

export const MCPASRGoTQueryParamsSchema = z.object({
  query: z.string().trim().min(1, 'query must be a non-empty string'),
  context: MCPQueryContextSchema.default({}),
  parameters: MCPQueryOperationalParamsSchema.default({}),
  session_id: z.string().optional(),
});

export type MCPASRGoTQueryParams = z.infer<typeof MCPASRGoTQueryParamsSchema>;

export const MCPASRGoTQueryResultSchema = z.object({
  answer: z.string(),
  reasoning_trace_summary: z.string().optional(),
  graph_state_full: GraphStateSchema.optional(),
  confidence_vector: z.array(z.number()).optional(),
  execution_time_ms: z.number().int().optional(),
  session_id: z.string().optional(),
});

export type MCPASRGoTQueryResult = z.infer<typeof MCPASRGoTQueryResultSchema>;

export function createJsonRpcError(
  requestId: JSONRPCId | undefined,
  code: number,
  message: string,
  data?: unknown
): JSONRPCResponse {
  const error: JSONRPCErrorObject = data === undefined ? { code, message } : { code, message, data };
  return { jsonrpc: "2.0", id: requestId ?? null, error };
}

export function createJsonRpcResult(requestId: JSONRPCId | undefined, result: unknown): JSONRPCResponse {
  return { jsonrpc: "2.0", id: requestId ?? null, result };
}
