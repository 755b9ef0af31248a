import { z } from 'zod';

export const JSONRPC_VERSION = '2.0';
export const MCP_PROTOCOL_VERSION = '2025-06-18';

export const INITIALIZE_METHOD = 'initialize';
export const INITIALIZED_NOTIFICATION = 'notifications/initialized';
export const TOOLS_LIST_METHOD = 'tools/list';
export const TOOLS_CALL_METHOD = 'tools/call';

export type JsonRpcParams = Record<string, unknown>;

export interface JsonRpcRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  id: number;
  method: string;
  params: JsonRpcParams;
}

export interface JsonRpcNotification {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
}

export interface ClientInfo {
  name: string;
  version: string;
}

// Key order is part of the wire format.
export function buildRequest(id: number, method: string, params: JsonRpcParams = {}): JsonRpcRequest {
  return { jsonrpc: JSONRPC_VERSION, id, method, params };
}

export function buildNotification(method: string): JsonRpcNotification {
  return { jsonrpc: JSONRPC_VERSION, method };
}

export function buildInitializeParams(clientInfo: ClientInfo): JsonRpcParams {
  return {
    protocolVersion: MCP_PROTOCOL_VERSION,
    capabilities: {},
    clientInfo: { name: clientInfo.name, version: clientInfo.version }
  };
}

export const jsonRpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional()
});

export const jsonRpcResponseSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: z.union([z.number(), z.string(), z.null()]),
  result: z.unknown().optional(),
  error: jsonRpcErrorSchema.optional()
});

export type JsonRpcResponse = z.infer<typeof jsonRpcResponseSchema>;
