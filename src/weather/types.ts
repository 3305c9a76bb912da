// This file defines the weather collaborator's inputs and its explicit success/failure results.

import { z } from 'zod';

export const UNITS = ['metric', 'imperial', 'kelvin'] as const;
export type Units = (typeof UNITS)[number];

export const MAX_FORECAST_DAYS = 5;

export interface CurrentWeatherOptions {
  units: Units;
}

export interface ForecastOptions {
  units: Units;
  days: number;
}

export type WeatherFetchError =
  | { kind: 'missing_credential' }
  | { kind: 'empty_location' }
  | { kind: 'location_not_found'; location: string }
  | { kind: 'upstream_http_error'; status: number; statusText: string }
  | { kind: 'network_failure'; reason: string }
  | { kind: 'invalid_payload'; reason: string };

export type WeatherResult = { ok: true; report: string } | { ok: false; error: WeatherFetchError };

// The tools only depend on this interface, so tests can swap in a stub provider.
export interface WeatherProvider {
  getCurrentWeather(location: string, options: CurrentWeatherOptions): Promise<WeatherResult>;
  getForecast(location: string, options: ForecastOptions): Promise<WeatherResult>;
}

// These schemas cover only the OpenWeatherMap fields the reports read.
const conditionSchema = z.object({
  description: z.string()
});

export const currentWeatherPayloadSchema = z.object({
  name: z.string(),
  sys: z.object({
    country: z.string().optional()
  }),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number(),
    pressure: z.number()
  }),
  weather: z.array(conditionSchema).min(1),
  wind: z.object({
    speed: z.number()
  })
});

export const forecastEntrySchema = z.object({
  dt_txt: z.string().regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/),
  main: z.object({
    temp: z.number(),
    temp_min: z.number(),
    temp_max: z.number(),
    humidity: z.number()
  }),
  weather: z.array(conditionSchema).min(1)
});

export const forecastPayloadSchema = z.object({
  city: z.object({
    name: z.string(),
    country: z.string().optional()
  }),
  list: z.array(forecastEntrySchema)
});

export type CurrentWeatherPayload = z.infer<typeof currentWeatherPayloadSchema>;
export type ForecastEntry = z.infer<typeof forecastEntrySchema>;
export type ForecastPayload = z.infer<typeof forecastPayloadSchema>;

// This helper turns every failure kind into one human-readable sentence.
export function describeWeatherError(error: WeatherFetchError): string {
  switch (error.kind) {
    case 'missing_credential':
      return 'OPENWEATHER_API_KEY environment variable not set';
    case 'empty_location':
      return 'No location provided';
    case 'location_not_found':
      return `Location '${error.location}' not found`;
    case 'upstream_http_error':
      return error.statusText ? `HTTP ${error.status} - ${error.statusText}` : `HTTP ${error.status}`;
    case 'network_failure':
      return `Network failure: ${error.reason}`;
    case 'invalid_payload':
      return `Unexpected response from weather API: ${error.reason}`;
    default: {
      const unreachable: never = error;
      return `Unhandled weather error: ${JSON.stringify(unreachable)}`;
    }
  }
}
