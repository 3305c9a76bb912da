// This module runs the newline-delimited JSON-RPC loop over a pair of byte streams (stdin/stdout in production).

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { rpcError, type McpProtocolEngine } from '../mcp/protocol.js';
import { RPC_INTERNAL_ERROR } from '../utils/errors.js';
import { errorForLog, type AppLogger } from '../utils/logger.js';

export type LineHandler = Pick<McpProtocolEngine, 'handleLine'>;

export interface StdioTransportOptions {
  logger: AppLogger;
  // Aborting ends the loop quietly, e.g. on SIGINT.
  signal?: AbortSignal;
}

// This helper resolves once the line has been handed to the output stream.
function writeLine(output: Writable, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(`${line}\n`, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

// One line in, at most one line out; the next line is not read until the current response is written.
export async function runStdioTransport(
  input: Readable,
  output: Writable,
  engine: LineHandler,
  options: StdioTransportOptions
): Promise<void> {
  const { logger, signal } = options;
  if (signal?.aborted) {
    return;
  }

  const reader = createInterface({ input, crlfDelay: Infinity, terminal: false });
  const onAbort = (): void => {
    logger.info({ event: 'stdio_transport_interrupted' }, 'stdio_transport_interrupted');
    reader.close();
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  logger.info({ event: 'stdio_transport_started' }, 'stdio_transport_started');
  let handled = 0;

  try {
    for await (const line of reader) {
      if (line.trim().length === 0) {
        continue;
      }

      let response: string | null;
      try {
        response = await engine.handleLine(line);
      } catch (error) {
        logger.error({ event: 'stdio_transport_engine_failed', error: errorForLog(error) }, 'stdio_transport_engine_failed');
        const detail = error instanceof Error ? error.message : String(error);
        await writeLine(output, JSON.stringify(rpcError(null, RPC_INTERNAL_ERROR, `Server error: ${detail}`)));
        break;
      }

      handled += 1;
      if (response) {
        await writeLine(output, response);
      }
    }
  } finally {
    signal?.removeEventListener('abort', onAbort);
    reader.close();
    logger.info({ event: 'stdio_transport_stopped', handled }, 'stdio_transport_stopped');
  }
}
