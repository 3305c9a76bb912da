// This module implements the JSON-RPC engine behind every transport: parse, route, dispatch, serialize.

import { randomUUID } from 'node:crypto';
import type {
  JsonRpcErrorResponse,
  JsonRpcId,
  JsonRpcMessage,
  JsonRpcParams,
  JsonRpcRequest,
  JsonRpcResponse,
  ToolCallResult
} from '../types/mcp.js';
import {
  AppError,
  RPC_INTERNAL_ERROR,
  RPC_PARSE_ERROR,
  mapAppErrorToRpc,
  normalizeError,
  toSingleLineMessage
} from '../utils/errors.js';
import { errorForLog, sanitizeForLog, type AppLogger } from '../utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import type { ToolOutcome, ToolRegistry } from './registry.js';

export interface ServerInfo {
  name: string;
  version: string;
}

export interface McpProtocolEngineOptions {
  registry: ToolRegistry;
  logger: AppLogger;
  serverInfo?: ServerInfo;
}

export const SUPPORTED_METHODS = ['initialize', 'notifications/initialized', 'ping', 'tools/list', 'tools/call'] as const;

// This helper creates a canonical JSON-RPC error payload with a single-line message.
export function rpcError(id: JsonRpcId | null, code: number, message: string): JsonRpcErrorResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: {
      code,
      message: toSingleLineMessage(message)
    }
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Integers beyond 2^53 were already rounded by JSON.parse, so echoing them would answer a different id.
function isEchoableId(value: unknown): value is JsonRpcId {
  if (typeof value === 'string') {
    return true;
  }

  return typeof value === 'number' && Number.isFinite(value) && (!Number.isInteger(value) || Number.isSafeInteger(value));
}

// This helper classifies a decoded payload as a request, a notification (id absent or null) or an invalid message.
export function parseMessage(payload: Record<string, unknown>): JsonRpcMessage {
  const method = typeof payload.method === 'string' ? payload.method : String(payload.method);
  const params: JsonRpcParams = isRecord(payload.params) ? payload.params : {};
  const id = payload.id;

  if (id === undefined || id === null) {
    return { kind: 'notification', method, params };
  }

  if (!isEchoableId(id)) {
    const reason = typeof id === 'number' ? 'unsafe_integer' : Array.isArray(id) ? 'array' : typeof id;
    return { kind: 'invalid', method, reason };
  }

  return { kind: 'request', id, method, params };
}

// This class is a pure function of the tool registry plus one incoming message; it keeps no session state.
export class McpProtocolEngine {
  private readonly registry: ToolRegistry;
  private readonly logger: AppLogger;
  private readonly serverInfo: ServerInfo;

  public constructor(options: McpProtocolEngineOptions) {
    this.registry = options.registry;
    this.logger = options.logger;
    this.serverInfo = options.serverInfo ?? { name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION };
  }

  // This function handles one raw line and returns the serialized response, or null when nothing is owed.
  public async handleLine(rawLine: string): Promise<string | null> {
    let payload: unknown;
    try {
      payload = JSON.parse(rawLine);
    } catch (error) {
      this.logger.warn(
        {
          event: 'mcp_parse_error',
          line: sanitizeForLog(rawLine),
          error: errorForLog(error)
        },
        'mcp_parse_error'
      );
      return this.serialize(rpcError(null, RPC_PARSE_ERROR, 'Parse error'));
    }

    const response = await this.handleMessage(payload);
    return response ? this.serialize(response) : null;
  }

  // This function handles one decoded payload and returns either a response object or null for notifications.
  public async handleMessage(payload: unknown): Promise<JsonRpcResponse | null> {
    if (!isRecord(payload)) {
      this.logger.warn(
        {
          event: 'mcp_invalid_envelope',
          payloadType: Array.isArray(payload) ? 'array' : typeof payload
        },
        'mcp_invalid_envelope'
      );
      return rpcError(null, RPC_INTERNAL_ERROR, 'Internal error: request must be a JSON object');
    }

    if (payload.jsonrpc !== '2.0') {
      this.logger.warn(
        {
          event: 'mcp_unexpected_jsonrpc_version',
          jsonrpc: sanitizeForLog(payload.jsonrpc)
        },
        'mcp_unexpected_jsonrpc_version'
      );
    }

    const message = parseMessage(payload);
    if (message.kind === 'notification') {
      this.logger.info(
        {
          event: 'mcp_notification_received',
          method: message.method
        },
        'mcp_notification_received'
      );
      return null;
    }

    if (message.kind === 'invalid') {
      this.logger.warn(
        {
          event: 'mcp_invalid_request_id',
          method: message.method,
          reason: message.reason
        },
        'mcp_invalid_request_id'
      );
      return rpcError(null, RPC_INTERNAL_ERROR, 'Internal error: invalid request id');
    }

    return this.handleRequest(message);
  }

  private async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse | null> {
    const startedAt = Date.now();
    const rpcTraceId = randomUUID();

    this.logger.info(
      {
        event: 'mcp_rpc_request_received',
        rpcTraceId,
        rpcRequestId: request.id,
        method: request.method
      },
      'mcp_rpc_request_received'
    );

    try {
      switch (request.method) {
        case 'initialize':
          return {
            jsonrpc: '2.0',
            id: request.id,
            result: {
              protocolVersion: MCP_PROTOCOL_VERSION,
              capabilities: {
                tools: {}
              },
              serverInfo: { ...this.serverInfo }
            }
          };

        // Acknowledgement only, even when a client attaches an id.
        case 'notifications/initialized':
          return null;

        case 'ping':
          return { jsonrpc: '2.0', id: request.id, result: {} };

        case 'tools/list':
          return {
            jsonrpc: '2.0',
            id: request.id,
            result: {
              tools: this.registry.list()
            }
          };

        case 'tools/call':
          return {
            jsonrpc: '2.0',
            id: request.id,
            result: await this.callTool(request, rpcTraceId)
          };

        default:
          throw new AppError(404, 'method_not_found', `Unknown method: ${request.method}`);
      }
    } catch (error) {
      const appError = normalizeError(error);
      const mapped = mapAppErrorToRpc(appError);

      this.logger.error(
        {
          event: 'mcp_rpc_request_failed',
          rpcTraceId,
          rpcRequestId: request.id,
          method: request.method,
          code: appError.code,
          rpcCode: mapped.code,
          details: sanitizeForLog(appError.details),
          error: errorForLog(error)
        },
        'mcp_rpc_request_failed'
      );

      return rpcError(request.id, mapped.code, mapped.message);
    } finally {
      this.logger.info(
        {
          event: 'mcp_rpc_request_completed',
          rpcTraceId,
          rpcRequestId: request.id,
          method: request.method,
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_completed'
      );
    }
  }

  // Collaborator failures become AppErrors here; only unknown tool names map to "method not found".
  private async callTool(request: JsonRpcRequest, rpcTraceId: string): Promise<ToolCallResult> {
    const name = request.params.name;
    const args = isRecord(request.params.arguments) ? request.params.arguments : {};
    const tool = typeof name === 'string' ? this.registry.get(name) : undefined;

    if (!tool) {
      throw new AppError(404, 'tool_not_found', `Unknown tool: ${String(name)}`);
    }

    this.logger.info(
      {
        event: 'mcp_tool_call_requested',
        rpcTraceId,
        toolName: tool.descriptor.name,
        arguments: sanitizeForLog(args)
      },
      'mcp_tool_call_requested'
    );

    let outcome: ToolOutcome;
    try {
      outcome = await tool.invoke(args);
    } catch (error) {
      const appError = normalizeError(error);
      throw new AppError(
        appError.statusCode,
        'tool_execution_failed',
        `Error calling tool '${tool.descriptor.name}': ${appError.message}`,
        appError.details
      );
    }

    if (!outcome.ok) {
      throw new AppError(502, 'tool_failed', `${tool.failureLabel}: ${outcome.message}`);
    }

    return {
      content: [{ type: 'text', text: outcome.text }]
    };
  }

  // Serialization failures are fatal to that one message only and reuse whatever id was recovered.
  private serialize(response: JsonRpcResponse): string {
    try {
      return JSON.stringify(response);
    } catch (error) {
      this.logger.error(
        {
          event: 'mcp_response_serialization_failed',
          rpcRequestId: response.id,
          error: errorForLog(error)
        },
        'mcp_response_serialization_failed'
      );
      const detail = error instanceof Error ? error.message : String(error);
      return JSON.stringify(rpcError(response.id, RPC_INTERNAL_ERROR, `Internal error: ${detail}`));
    }
  }
}
