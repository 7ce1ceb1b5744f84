/**
 * Configuration layer - all external configuration comes through here
 * Supports environment variables and defaults
 */

import dotenv from 'dotenv';
import { EnvSchema } from '../types/validation';

dotenv.config();

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  environment: 'development' | 'test' | 'staging' | 'production';
  logLevel: LogLevelName;
  zoneApi: ZoneApiConfig;
  http: HttpConfig;
  readiness: ReadinessConfig;
  zones: ZonesConfig;
}

export interface ZoneApiConfig {
  baseUrl: string;
  apiKey: string;
  zonesPath: string;
  requestTimeoutMs: number;
}

export interface HttpConfig {
  retryAttempts: number;
  retryDelayMs: number;
}

export interface ReadinessConfig {
  basicChecksTimeoutMs: number;
  coordinateTimeoutMs: number;
  addressTimeoutMs: number;
  zoneValidationTimeoutMs: number;
}

export interface ZonesConfig {
  cacheTtlSeconds: number;
  viewingRadiusKm: number;
}

function getConfig(): AppConfig {
  const env = EnvSchema.parse(process.env);

  if (env.NODE_ENV !== 'test') {
    const requiredVars = ['ZONE_API_BASE_URL', 'ZONE_API_KEY'] as const;
    const missingVars = requiredVars.filter((v) => !env[v]);

    if (missingVars.length > 0) {
      console.warn(
        `Warning: Missing environment variables: ${missingVars.join(', ')}. ` +
          'Set them in .env or export them. Defaults will be used.'
      );
    }
  }

  const config: AppConfig = {
    environment: env.NODE_ENV,
    logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === 'test' ? 'error' : 'info'),
    zoneApi: {
      baseUrl: env.ZONE_API_BASE_URL ?? 'http://localhost:54321',
      apiKey: env.ZONE_API_KEY ?? 'test-anon-key',
      zonesPath: '/rest/v1/zones',
      requestTimeoutMs: env.ZONE_API_TIMEOUT_MS,
    },
    http: {
      retryAttempts: env.HTTP_RETRY_ATTEMPTS,
      retryDelayMs: env.HTTP_RETRY_DELAY_MS,
    },
    readiness: {
      basicChecksTimeoutMs: env.READINESS_BASIC_CHECKS_TIMEOUT_MS,
      coordinateTimeoutMs: env.READINESS_COORDINATE_TIMEOUT_MS,
      addressTimeoutMs: env.READINESS_ADDRESS_TIMEOUT_MS,
      zoneValidationTimeoutMs: env.READINESS_ZONE_VALIDATION_TIMEOUT_MS,
    },
    zones: {
      cacheTtlSeconds: env.ZONE_CACHE_TTL_SECONDS,
      viewingRadiusKm: env.ZONE_VIEWING_RADIUS_KM,
    },
  };

  return config;
}

// Export singleton instance
export const config = getConfig();
