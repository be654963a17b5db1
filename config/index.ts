/**
 * Centralized Configuration File
 * 
 * Single Source of Truth for all application configuration.
 * Consolidates environment variables and constants.
 */

import logger from '../utils/logger';
import { TIME } from '../utils/constants';
import { DEFAULT_HOME_COUNTRY, DEFAULT_MAX_ATTEMPTS, LATITUDE_TIERS } from '../services/location/constants';
import { validateTiers } from '../services/location/sampler';

const parseIntEnv = (value: string | undefined, defaultValue: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
};

/**
 * Configuration object
 * All environment variables and constants centralized here
 */
export const config = {
  // Environment
  env: process.env.NODE_ENV || 'development',
  isProduction: process.env.NODE_ENV === 'production',
  isDevelopment: process.env.NODE_ENV !== 'production',

  // Server Configuration
  server: {
    port: parseIntEnv(process.env.PORT, 3000),
    host: process.env.HOST || '0.0.0.0',
    trustProxy: process.env.TRUST_PROXY !== 'false',
  },

  // Target selection
  location: {
    maxAttempts: parseIntEnv(process.env.LOCATION_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS),
    // Localities in this country are shown with their state instead of the country name
    homeCountry: process.env.HOME_COUNTRY || DEFAULT_HOME_COUNTRY,
    tiers: LATITUDE_TIERS,
  },

  // Reverse geocoding (OpenStreetMap Nominatim)
  geocoding: {
    baseUrl: process.env.NOMINATIM_BASE_URL || 'https://nominatim.openstreetmap.org',
    userAgent: process.env.NOMINATIM_USER_AGENT || 'weather-game-server/1.0 (development)',
    language: process.env.GEOCODE_LANGUAGE || 'en',
    timeoutMs: parseIntEnv(process.env.GEOCODE_TIMEOUT_MS, TIME.GEOCODE_TIMEOUT),
    cacheTtlSeconds: parseIntEnv(process.env.GEOCODE_CACHE_TTL_SECONDS, 3600),
    minIntervalMs: parseIntEnv(process.env.NOMINATIM_MIN_INTERVAL_MS, TIME.SECOND),
  },

  // Game sessions (current target per game)
  games: {
    sessionTtlSeconds: parseIntEnv(process.env.GAME_SESSION_TTL_SECONDS, (6 * TIME.HOUR) / TIME.SECOND),
  },

  // Request Limits
  limits: {
    jsonBodySize: process.env.JSON_BODY_SIZE_LIMIT || '100kb',
  },

  // Rate Limiting configuration
  rateLimit: {
    api: {
      max: parseIntEnv(process.env.RATE_LIMIT_API_MAX, 100),
      windowMs: 15 * TIME.MINUTE,
    },
    selection: {
      max: parseIntEnv(process.env.RATE_LIMIT_SELECTION_MAX, 20),
      windowMs: TIME.MINUTE,
    },
  },
};

export type AppConfig = typeof config;

/**
 * Validate critical configuration on startup
 * @throws {Error} If critical config is missing or inconsistent
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (config.location.maxAttempts < 1) {
    errors.push('LOCATION_MAX_ATTEMPTS must be at least 1');
  }
  if (config.geocoding.timeoutMs < 1) {
    errors.push('GEOCODE_TIMEOUT_MS must be positive');
  }

  try {
    validateTiers(config.location.tiers);
  } catch (error: unknown) {
    errors.push(error instanceof Error ? error.message : String(error));
  }

  // Nominatim blocks generic user agents
  if (config.isProduction && !process.env.NOMINATIM_USER_AGENT) {
    errors.push('NOMINATIM_USER_AGENT is required in production');
  }

  if (!process.env.NOMINATIM_USER_AGENT) {
    logger.warn('⚠️ NOMINATIM_USER_AGENT not set (using development default)', {
      service: 'weather-game-server'
    });
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
}
