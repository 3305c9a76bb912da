// This module reads process configuration from environment variables and validates it once at startup.

import { z } from 'zod';
import { AppError } from '../utils/errors.js';

export const DEFAULT_OPENWEATHER_BASE_URL = 'https://api.openweathermap.org/data/2.5';

// Blank values count as unset so an empty `OPENWEATHER_API_KEY=` line does not become a credential.
const optionalNonEmpty = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  OPENWEATHER_API_KEY: optionalNonEmpty,
  OPENWEATHER_BASE_URL: z.string().trim().url().default(DEFAULT_OPENWEATHER_BASE_URL),
  WEATHER_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(10_000),
  MCP_TRANSPORT: z.enum(['stdio', 'http']).default('stdio'),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export type TransportMode = z.infer<typeof envSchema>['MCP_TRANSPORT'];

export interface AppConfig {
  openWeatherApiKey?: string;
  openWeatherBaseUrl: string;
  requestTimeoutMs: number;
  transport: TransportMode;
  host: string;
  port: number;
  logLevel: string;
}

// This function validates the given environment and returns typed configuration.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new AppError(500, 'invalid_config', `Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;
  return {
    openWeatherApiKey: values.OPENWEATHER_API_KEY,
    openWeatherBaseUrl: values.OPENWEATHER_BASE_URL,
    requestTimeoutMs: values.WEATHER_REQUEST_TIMEOUT_MS,
    transport: values.MCP_TRANSPORT,
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL
  };
}
