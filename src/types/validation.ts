/**
 * Validation schemas using Zod for runtime validation
 */

import { z } from 'zod';

export const CoordinateSchema = z.object({
  lat: z.number().finite().min(-90).max(90),
  lng: z.number().finite().min(-180).max(180),
});

// Postgres DECIMAL columns come back as strings from the REST layer
const DecimalSchema = z.union([
  z.number().finite(),
  z
    .string()
    .regex(/^-?\d+(\.\d+)?$/)
    .transform(Number),
]);

export const ZoneRowSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  town_id: z.string().nullish(),
  zone_number: z.number().int().nullish(),
  zone_type: z.enum(['polygon', 'circle']),
  boundary_coordinates: z.array(CoordinateSchema).nullish(),
  center_lat: DecimalSchema.nullish(),
  center_lng: DecimalSchema.nullish(),
  radius_km: DecimalSchema.nullish(),
  is_active: z.boolean(),
  priority: z.number().int().nullish(),
});

export const ZoneRowsSchema = z.array(z.unknown());

export type ZoneRow = z.infer<typeof ZoneRowSchema>;

const IntFromEnv = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  ZONE_API_BASE_URL: z.string().url().optional(),
  ZONE_API_KEY: z.string().min(1).optional(),
  ZONE_API_TIMEOUT_MS: IntFromEnv(5000),
  HTTP_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(3),
  HTTP_RETRY_DELAY_MS: IntFromEnv(500),
  READINESS_BASIC_CHECKS_TIMEOUT_MS: IntFromEnv(2000),
  READINESS_COORDINATE_TIMEOUT_MS: IntFromEnv(8000),
  READINESS_ADDRESS_TIMEOUT_MS: IntFromEnv(2000),
  READINESS_ZONE_VALIDATION_TIMEOUT_MS: IntFromEnv(3000),
  ZONE_CACHE_TTL_SECONDS: IntFromEnv(300),
  ZONE_VIEWING_RADIUS_KM: z.coerce.number().nonnegative().default(10),
});

export type Env = z.infer<typeof EnvSchema>;
