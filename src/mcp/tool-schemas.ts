// This module defines the weather tool argument contracts and their advertised JSON schemas.

import { z, type ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { MAX_FORECAST_DAYS, UNITS } from '../weather/types.js';

const locationSchema = z.string().describe("City name (e.g., 'London', 'New York', 'Jakarta')");

const unitsSchema = z
  .enum(UNITS)
  .default('metric')
  .describe('Temperature units (metric for Celsius, imperial for Fahrenheit, kelvin for Kelvin)');

export const getWeatherSchema = z.object({
  location: locationSchema,
  units: unitsSchema
});

export const getWeatherForecastSchema = z.object({
  location: locationSchema,
  days: z
    .number()
    .int()
    .min(1)
    .max(MAX_FORECAST_DAYS)
    .default(MAX_FORECAST_DAYS)
    .describe(`Number of days to forecast (1-${MAX_FORECAST_DAYS})`),
  units: unitsSchema
});

export type GetWeatherArgs = z.infer<typeof getWeatherSchema>;
export type GetWeatherForecastArgs = z.infer<typeof getWeatherForecastSchema>;

// Inline definitions keep the schema flat ({ type, properties, required }) for clients that do not resolve $ref.
export function toInputSchema(schema: ZodTypeAny): Record<string, unknown> {
  const jsonSchema = zodToJsonSchema(schema, { $refStrategy: 'none' }) as Record<string, unknown>;
  delete jsonSchema.$schema;
  return jsonSchema;
}
