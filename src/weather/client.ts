// This module wraps OpenWeatherMap REST calls with a timeout and maps every failure into a typed result.

import type { ZodType } from 'zod';
import { errorForLog, sanitizeForLog, type AppLogger } from '../utils/logger.js';
import { formatCurrentReport, formatForecastReport } from './format.js';
import {
  currentWeatherPayloadSchema,
  forecastPayloadSchema,
  type CurrentWeatherOptions,
  type ForecastOptions,
  type Units,
  type WeatherFetchError,
  type WeatherProvider,
  type WeatherResult
} from './types.js';

export interface OpenWeatherClientOptions {
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
  logger?: AppLogger;
}

type FetchOutcome<T> = { ok: true; payload: T } | { ok: false; error: WeatherFetchError };

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// OpenWeatherMap has no "kelvin" unit name; its "standard" system reports Kelvin.
function toApiUnits(units: Units): string {
  return units === 'kelvin' ? 'standard' : units;
}

export class OpenWeatherClient implements WeatherProvider {
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger?: AppLogger;

  public constructor(options: OpenWeatherClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl.slice(0, -1) : options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  public async getCurrentWeather(location: string, options: CurrentWeatherOptions): Promise<WeatherResult> {
    const outcome = await this.request('/weather', location, options.units, currentWeatherPayloadSchema);
    if (!outcome.ok) {
      return outcome;
    }

    return { ok: true, report: formatCurrentReport(outcome.payload, options.units) };
  }

  public async getForecast(location: string, options: ForecastOptions): Promise<WeatherResult> {
    const outcome = await this.request('/forecast', location, options.units, forecastPayloadSchema);
    if (!outcome.ok) {
      return outcome;
    }

    return { ok: true, report: formatForecastReport(outcome.payload, options.units, options.days) };
  }

  private log(level: 'debug' | 'info' | 'warn', event: string, details: Record<string, unknown>): void {
    this.logger?.[level]({ event, ...details }, event);
  }

  // This helper builds canonical endpoint URLs against the configured base URL.
  private buildUrl(path: string, query: Record<string, string>): URL {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  // This helper performs one GET without retries and validates the body against the expected shape.
  private async request<T>(
    path: string,
    location: string,
    units: Units,
    schema: ZodType<T>
  ): Promise<FetchOutcome<T>> {
    if (!this.apiKey) {
      return { ok: false, error: { kind: 'missing_credential' } };
    }

    const query = location.trim();
    if (!query) {
      return { ok: false, error: { kind: 'empty_location' } };
    }

    const url = this.buildUrl(path, { q: query, appid: this.apiKey, units: toApiUnits(units) });
    const abortController = new AbortController();
    const timer = setTimeout(() => abortController.abort(), this.timeoutMs);
    const startedAt = Date.now();

    this.log('debug', 'weather_request_started', { path, location: query, units });

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method: 'GET',
          headers: { Accept: 'application/json' },
          signal: abortController.signal
        });
      } catch (error) {
        const reason = abortController.signal.aborted
          ? `request timed out after ${this.timeoutMs}ms`
          : reasonOf(error);
        this.log('warn', 'weather_request_failed', { path, location: query, error: errorForLog(error) });
        return { ok: false, error: { kind: 'network_failure', reason } };
      }

      this.log('debug', 'weather_request_response', {
        path,
        status: response.status,
        durationMs: Date.now() - startedAt
      });

      if (response.status === 404) {
        return { ok: false, error: { kind: 'location_not_found', location: query } };
      }

      if (!response.ok) {
        this.log('warn', 'weather_request_http_error', { path, status: response.status });
        return {
          ok: false,
          error: { kind: 'upstream_http_error', status: response.status, statusText: response.statusText }
        };
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        // The timer also covers the body read.
        if (abortController.signal.aborted) {
          this.log('warn', 'weather_request_failed', { path, location: query, error: errorForLog(error) });
          return {
            ok: false,
            error: { kind: 'network_failure', reason: `request timed out after ${this.timeoutMs}ms` }
          };
        }
        return { ok: false, error: { kind: 'invalid_payload', reason: reasonOf(error) } };
      }

      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        this.log('warn', 'weather_payload_invalid', {
          path,
          issues: sanitizeForLog(parsed.error.issues)
        });
        const first = parsed.error.issues[0];
        const reason = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'malformed body';
        return { ok: false, error: { kind: 'invalid_payload', reason } };
      }

      this.log('info', 'weather_request_completed', { path, location: query, durationMs: Date.now() - startedAt });
      return { ok: true, payload: parsed.data };
    } finally {
      clearTimeout(timer);
    }
  }
}
