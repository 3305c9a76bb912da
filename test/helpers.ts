// Shared fixtures for engine and transport tests.

import pino from 'pino';
import { McpProtocolEngine } from '../src/mcp/protocol.js';
import { createToolRegistry } from '../src/mcp/tools.js';
import type { WeatherProvider, WeatherResult } from '../src/weather/types.js';

export const silentLogger = pino({ level: 'silent' });

// This stub answers with canned results and records what the tools asked for.
export function makeProvider(overrides?: Partial<WeatherProvider>): WeatherProvider {
  return {
    getCurrentWeather: async (location): Promise<WeatherResult> => ({ ok: true, report: `Current weather for ${location}` }),
    getForecast: async (location, options): Promise<WeatherResult> => ({
      ok: true,
      report: `${options.days}-day forecast for ${location}`
    }),
    ...(overrides ?? {})
  };
}

export function makeEngine(provider: WeatherProvider = makeProvider()): McpProtocolEngine {
  return new McpProtocolEngine({
    registry: createToolRegistry(provider),
    logger: silentLogger
  });
}
