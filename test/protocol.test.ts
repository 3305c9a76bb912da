// This test suite verifies JSON-RPC dispatch, notification handling and the error taxonomy of the engine.

import { describe, expect, it, vi } from 'vitest';
import { parseMessage } from '../src/mcp/protocol.js';
import type { WeatherResult } from '../src/weather/types.js';
import { makeEngine, makeProvider } from './helpers.js';

function request(body: Record<string, unknown>): string {
  return JSON.stringify({ jsonrpc: '2.0', ...body });
}

async function call(line: string, engine = makeEngine()): Promise<Record<string, unknown>> {
  const output = await engine.handleLine(line);
  expect(output).not.toBeNull();
  return JSON.parse(output ?? '') as Record<string, unknown>;
}

describe('message classification', () => {
  it('treats a message with an id as a request and defaults params', () => {
    expect(parseMessage({ jsonrpc: '2.0', id: 4, method: 'tools/list' })).toEqual({
      kind: 'request',
      id: 4,
      method: 'tools/list',
      params: {}
    });
  });

  it('treats absent and null ids as notifications', () => {
    expect(parseMessage({ jsonrpc: '2.0', method: 'ping' }).kind).toBe('notification');
    expect(parseMessage({ jsonrpc: '2.0', id: null, method: 'ping' }).kind).toBe('notification');
  });

  it('marks present ids that cannot be echoed as invalid', () => {
    expect(parseMessage({ jsonrpc: '2.0', id: true, method: 'initialize' })).toEqual({
      kind: 'invalid',
      method: 'initialize',
      reason: 'boolean'
    });
    expect(parseMessage({ jsonrpc: '2.0', id: [1], method: 'ping' })).toMatchObject({ kind: 'invalid', reason: 'array' });
    expect(parseMessage({ jsonrpc: '2.0', id: 2 ** 53 + 2, method: 'ping' })).toMatchObject({
      kind: 'invalid',
      reason: 'unsafe_integer'
    });
    expect(parseMessage({ jsonrpc: '2.0', id: 1.5, method: 'ping' })).toMatchObject({ kind: 'request', id: 1.5 });
  });

  it('ignores params that are not an object', () => {
    expect(parseMessage({ jsonrpc: '2.0', id: 'a', method: 'tools/call', params: [1, 2] })).toEqual({
      kind: 'request',
      id: 'a',
      method: 'tools/call',
      params: {}
    });
  });
});

describe('protocol engine', () => {
  it('answers a non-JSON line with a parse error and a null id', async () => {
    const engine = makeEngine();
    await expect(engine.handleLine('not-json-at-all')).resolves.toBe(
      '{"jsonrpc":"2.0","id":null,"error":{"code":-32700,"message":"Parse error"}}'
    );
  });

  it('returns the handshake result with the request id echoed', async () => {
    const response = await call(
      request({
        id: 1,
        method: 'initialize',
        params: { protocolVersion: '2024-11-05', capabilities: {}, clientInfo: { name: 'test-client', version: '0.0.1' } }
      })
    );

    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: {
        protocolVersion: '2024-11-05',
        capabilities: { tools: {} },
        serverInfo: { name: 'weather-server', version: '1.0.0' }
      }
    });
  });

  it('keeps string ids unchanged', async () => {
    const response = await call(request({ id: 'req-7', method: 'ping' }));
    expect(response).toEqual({ jsonrpc: '2.0', id: 'req-7', result: {} });
  });

  it('produces no output for the initialized notification', async () => {
    const engine = makeEngine();
    await expect(engine.handleLine('{"jsonrpc":"2.0","method":"notifications/initialized"}')).resolves.toBeNull();
    await expect(engine.handleLine(request({ id: 3, method: 'notifications/initialized' }))).resolves.toBeNull();
  });

  it('never answers a message without an id, whatever the method', async () => {
    const getCurrentWeather = vi.fn(async (): Promise<WeatherResult> => ({ ok: true, report: 'unused' }));
    const engine = makeEngine(makeProvider({ getCurrentWeather }));

    await expect(engine.handleLine(request({ method: 'tools/list' }))).resolves.toBeNull();
    await expect(engine.handleLine(request({ id: null, method: 'initialize' }))).resolves.toBeNull();
    await expect(engine.handleLine(request({ method: 'does/not/exist' }))).resolves.toBeNull();
    await expect(
      engine.handleLine(request({ method: 'tools/call', params: { name: 'get_weather', arguments: { location: 'Oslo' } } }))
    ).resolves.toBeNull();
    expect(getCurrentWeather).not.toHaveBeenCalled();
  });

  it('answers requests whose id is neither a string nor a number with a null-id error', async () => {
    const engine = makeEngine();
    const expected = '{"jsonrpc":"2.0","id":null,"error":{"code":-32603,"message":"Internal error: invalid request id"}}';

    await expect(engine.handleLine('{"jsonrpc":"2.0","id":true,"method":"initialize"}')).resolves.toBe(expected);
    await expect(engine.handleLine('{"jsonrpc":"2.0","id":{"x":1},"method":"tools/list"}')).resolves.toBe(expected);
    await expect(engine.handleLine('{"jsonrpc":"2.0","id":[],"method":"ping"}')).resolves.toBe(expected);
  });

  it('refuses integer ids that JSON parsing cannot represent exactly', async () => {
    const engine = makeEngine();

    await expect(engine.handleLine('{"jsonrpc":"2.0","id":9007199254740993,"method":"ping"}')).resolves.toBe(
      '{"jsonrpc":"2.0","id":null,"error":{"code":-32603,"message":"Internal error: invalid request id"}}'
    );
    await expect(engine.handleLine('{"jsonrpc":"2.0","id":9007199254740991,"method":"ping"}')).resolves.toBe(
      '{"jsonrpc":"2.0","id":9007199254740991,"result":{}}'
    );
  });

  it('lists the registered tools in a stable order across repeated calls', async () => {
    const engine = makeEngine();
    const first = await call(request({ id: 1, method: 'tools/list' }), engine);
    const second = await call(request({ id: 2, method: 'tools/list' }), engine);

    const names = (response: Record<string, unknown>): string[] =>
      ((response.result as { tools: Array<{ name: string }> }).tools).map((tool) => tool.name);

    expect(names(first)).toEqual(['get_weather', 'get_weather_forecast']);
    expect(second.result).toEqual(first.result);
    expect(second.id).toBe(2);
  });

  it('reports unknown methods with -32601', async () => {
    const response = await call(request({ id: 9, method: 'resources/list' }));
    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 9,
      error: { code: -32601, message: 'Unknown method: resources/list' }
    });
  });

  it('reports unknown tools with -32601', async () => {
    const response = await call(request({ id: 5, method: 'tools/call', params: { name: '__nonexistent__', arguments: {} } }));
    expect(response.error).toEqual({ code: -32601, message: 'Unknown tool: __nonexistent__' });
    expect(response.id).toBe(5);
  });

  it('reports a missing tool name as an unknown tool', async () => {
    const response = await call(request({ id: 6, method: 'tools/call', params: 'get_weather' }));
    expect(response.error).toEqual({ code: -32601, message: 'Unknown tool: undefined' });
  });

  it('wraps a successful tool result as text content', async () => {
    const getCurrentWeather = vi.fn(async (location: string): Promise<WeatherResult> => ({
      ok: true,
      report: `Sunny in ${location}`
    }));
    const response = await call(
      request({ id: 11, method: 'tools/call', params: { name: 'get_weather', arguments: { location: 'Paris' } } }),
      makeEngine(makeProvider({ getCurrentWeather }))
    );

    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 11,
      result: { content: [{ type: 'text', text: 'Sunny in Paris' }] }
    });
    expect(getCurrentWeather).toHaveBeenCalledWith('Paris', { units: 'metric' });
  });

  it('applies forecast defaults before calling the collaborator', async () => {
    const getForecast = vi.fn(async (): Promise<WeatherResult> => ({ ok: true, report: 'forecast' }));
    await call(
      request({ id: 12, method: 'tools/call', params: { name: 'get_weather_forecast', arguments: { location: 'Lima' } } }),
      makeEngine(makeProvider({ getForecast }))
    );

    expect(getForecast).toHaveBeenCalledWith('Lima', { units: 'metric', days: 5 });
  });

  it('treats missing arguments as an empty mapping', async () => {
    const response = await call(request({ id: 13, method: 'tools/call', params: { name: 'get_weather' } }));
    expect(response.error).toEqual({
      code: -32603,
      message: "Error calling tool 'get_weather': Invalid arguments: location: Required"
    });
  });

  it('maps collaborator failures to -32603 with the failure detail', async () => {
    const engine = makeEngine(
      makeProvider({
        getCurrentWeather: async (location) => ({ ok: false, error: { kind: 'location_not_found', location } }),
        getForecast: async () => ({ ok: false, error: { kind: 'empty_location' } })
      })
    );

    const current = await call(
      request({ id: 14, method: 'tools/call', params: { name: 'get_weather', arguments: { location: 'Atlantis' } } }),
      engine
    );
    expect(current).toEqual({
      jsonrpc: '2.0',
      id: 14,
      error: { code: -32603, message: "Weather API error: Location 'Atlantis' not found" }
    });

    const forecast = await call(
      request({ id: 15, method: 'tools/call', params: { name: 'get_weather_forecast', arguments: { location: '' } } }),
      engine
    );
    expect(forecast.error).toEqual({ code: -32603, message: 'Forecast API error: No location provided' });
  });

  it('rejects out-of-range forecast lengths as an internal error', async () => {
    const response = await call(
      request({
        id: 16,
        method: 'tools/call',
        params: { name: 'get_weather_forecast', arguments: { location: 'Lima', days: 9 } }
      })
    );

    expect(response.error).toEqual({
      code: -32603,
      message: "Error calling tool 'get_weather_forecast': Invalid arguments: days: Number must be less than or equal to 5"
    });
  });

  it('catches thrown collaborator faults and flattens control characters', async () => {
    const engine = makeEngine(
      makeProvider({
        getCurrentWeather: async () => {
          throw new Error('socket hang up\nretry later');
        }
      })
    );

    const output = await engine.handleLine(
      request({ id: 17, method: 'tools/call', params: { name: 'get_weather', arguments: { location: 'Rome' } } })
    );

    expect(output).toBe(
      '{"jsonrpc":"2.0","id":17,"error":{"code":-32603,"message":"Error calling tool \'get_weather\': socket hang up retry later"}}'
    );
  });

  it('answers a JSON value that is not an object with -32603 and a null id', async () => {
    const response = await call('[{"jsonrpc":"2.0","id":1,"method":"ping"}]');
    expect(response).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32603, message: 'Internal error: request must be a JSON object' }
    });
  });

  it('accepts tool calls before initialize', async () => {
    const response = await call(
      request({ id: 18, method: 'tools/call', params: { name: 'get_weather', arguments: { location: 'Quito' } } })
    );
    expect(response.result).toEqual({ content: [{ type: 'text', text: 'Current weather for Quito' }] });
  });
});
