// This test suite verifies line framing, ordering and shutdown behavior of the stdio loop.

import { once } from 'node:events';
import { PassThrough } from 'node:stream';
import { describe, expect, it, vi } from 'vitest';
import { runStdioTransport, type LineHandler } from '../src/transport/stdio.js';
import { makeEngine, makeProvider, silentLogger } from './helpers.js';

function collect(stream: PassThrough): () => string {
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer | string) => {
    chunks.push(String(chunk));
  });
  return () => chunks.join('');
}

async function runWithInput(text: string, engine: LineHandler = makeEngine()): Promise<string> {
  const input = new PassThrough();
  const output = new PassThrough();
  const read = collect(output);

  const done = runStdioTransport(input, output, engine, { logger: silentLogger });
  input.end(text);
  await done;
  return read();
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('stdio transport', () => {
  it('writes one newline-terminated response per request', async () => {
    const output = await runWithInput('{"jsonrpc":"2.0","id":1,"method":"ping"}\n');
    expect(output).toBe('{"jsonrpc":"2.0","id":1,"result":{}}\n');
  });

  it('skips blank lines and stays silent for notifications', async () => {
    const output = await runWithInput('\n   \n{"jsonrpc":"2.0","method":"notifications/initialized"}\n\t\n');
    expect(output).toBe('');
  });

  it('handles a final line without a trailing newline', async () => {
    const output = await runWithInput('not-json-at-all');
    expect(output).toBe('{"jsonrpc":"2.0","id":null,"error":{"code":-32700,"message":"Parse error"}}\n');
  });

  it('keeps responses in request order even when earlier calls are slower', async () => {
    const engine = makeEngine(
      makeProvider({
        getCurrentWeather: async (location) => {
          await delay(location === 'Slowtown' ? 30 : 1);
          return { ok: true, report: location };
        }
      })
    );

    const lines = [
      '{"jsonrpc":"2.0","id":1,"method":"tools/call","params":{"name":"get_weather","arguments":{"location":"Slowtown"}}}',
      '{"jsonrpc":"2.0","id":2,"method":"tools/call","params":{"name":"get_weather","arguments":{"location":"Fastville"}}}',
      '{"jsonrpc":"2.0","id":3,"method":"ping"}'
    ];

    const output = await runWithInput(`${lines.join('\n')}\n`, engine);
    const ids = output
      .trimEnd()
      .split('\n')
      .map((line) => (JSON.parse(line) as { id: number }).id);

    expect(ids).toEqual([1, 2, 3]);
  });

  it('reports an engine fault once with a null id and stops reading', async () => {
    const handleLine = vi.fn(async (_line: string): Promise<string | null> => {
      throw new Error('boom');
    });

    const output = await runWithInput('{"jsonrpc":"2.0","id":1,"method":"ping"}\n{"jsonrpc":"2.0","id":2,"method":"ping"}\n', {
      handleLine
    });

    expect(output).toBe('{"jsonrpc":"2.0","id":null,"error":{"code":-32603,"message":"Server error: boom"}}\n');
    expect(handleLine).toHaveBeenCalledTimes(1);
  });

  it('returns immediately when the signal is already aborted', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const read = collect(output);
    const controller = new AbortController();
    controller.abort();

    await runStdioTransport(input, output, makeEngine(), { logger: silentLogger, signal: controller.signal });
    expect(read()).toBe('');
  });

  it('ends the loop without output when interrupted while the input is still open', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const read = collect(output);
    const controller = new AbortController();

    const done = runStdioTransport(input, output, makeEngine(), { logger: silentLogger, signal: controller.signal });
    const firstChunk = once(output, 'data');
    input.write('{"jsonrpc":"2.0","id":"a","method":"ping"}\n');
    await firstChunk;

    controller.abort();
    await done;

    expect(read()).toBe('{"jsonrpc":"2.0","id":"a","result":{}}\n');
  });
});
