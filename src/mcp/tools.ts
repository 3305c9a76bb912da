// This module wires the weather collaborator into MCP tool definitions.

import { describeWeatherError, type WeatherProvider, type WeatherResult } from '../weather/types.js';
import { defineTool, ToolRegistry, type RegisteredTool, type ToolOutcome } from './registry.js';
import { getWeatherForecastSchema, getWeatherSchema } from './tool-schemas.js';

function toOutcome(result: WeatherResult): ToolOutcome {
  return result.ok ? { ok: true, text: result.report } : { ok: false, message: describeWeatherError(result.error) };
}

export function createWeatherTools(provider: WeatherProvider): RegisteredTool[] {
  return [
    defineTool({
      name: 'get_weather',
      description: 'Get current weather for a location',
      schema: getWeatherSchema,
      failureLabel: 'Weather API error',
      execute: async (args) => toOutcome(await provider.getCurrentWeather(args.location, { units: args.units }))
    }),
    defineTool({
      name: 'get_weather_forecast',
      description: 'Get a daily weather forecast (up to 5 days) for a location',
      schema: getWeatherForecastSchema,
      failureLabel: 'Forecast API error',
      execute: async (args) =>
        toOutcome(await provider.getForecast(args.location, { units: args.units, days: args.days }))
    })
  ];
}

// This function builds the process-wide registry once at startup.
export function createToolRegistry(provider: WeatherProvider): ToolRegistry {
  return new ToolRegistry(createWeatherTools(provider));
}
