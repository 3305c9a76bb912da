// This module provides the application error type and its mapping onto the fixed JSON-RPC error taxonomy.

export const RPC_PARSE_ERROR = -32700;
export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INTERNAL_ERROR = -32603;

export type RpcErrorCode = typeof RPC_PARSE_ERROR | typeof RPC_METHOD_NOT_FOUND | typeof RPC_INTERNAL_ERROR;

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  public constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// This helper normalizes unknown failures into an AppError, keeping the original message when there is one.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}

// This helper maps application errors into the three protocol codes clients can receive.
export function mapAppErrorToRpc(error: AppError): { code: RpcErrorCode; message: string } {
  if (error.code === 'tool_not_found' || error.code === 'method_not_found') {
    return { code: RPC_METHOD_NOT_FOUND, message: error.message };
  }

  return { code: RPC_INTERNAL_ERROR, message: error.message };
}

// Error messages travel inside a single output line, so control characters are flattened to spaces.
export function toSingleLineMessage(message: string): string {
  return message.replace(/[\u0000-\u001f\u007f]+/g, ' ').trim();
}
