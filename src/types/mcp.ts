// This file defines JSON-RPC envelopes and MCP tool payload types shared by the engine and transports.

export type JsonRpcId = string | number;

export type JsonRpcParams = Record<string, unknown>;

// A message with an id expects exactly one response.
export interface JsonRpcRequest {
  kind: 'request';
  id: JsonRpcId;
  method: string;
  params: JsonRpcParams;
}

// A message without an id is never answered.
export interface JsonRpcNotification {
  kind: 'notification';
  method: string;
  params: JsonRpcParams;
}

// An id is present but cannot be echoed back faithfully, so only a null-id error can answer it.
export interface JsonRpcInvalidMessage {
  kind: 'invalid';
  method: string;
  reason: string;
}

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcInvalidMessage;

export interface JsonRpcError {
  code: number;
  message: string;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  error: JsonRpcError;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export interface McpTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolCallResult {
  content: Array<{ type: 'text'; text: string }>;
}
