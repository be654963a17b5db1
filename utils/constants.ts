/**
 * Application-wide constants
 * SSOT (Single Source of Truth) for magic numbers and common values
 * 
 * All time-related constants are in milliseconds unless otherwise specified.
 */

/**
 * Time constants (in milliseconds)
 */
export const TIME = {
  SECOND: 1000,
  MINUTE: 60 * 1000,
  HOUR: 60 * 60 * 1000,

  GEOCODE_TIMEOUT: 5 * 1000, // Nominatim usually answers well under a second
  SHUTDOWN_GRACE: 10 * 1000
} as const;

/**
 * Geographic bounds (degrees)
 */
export const GEO = {
  MIN_LATITUDE: -90,
  MAX_LATITUDE: 90,
  MIN_LONGITUDE: -180,
  MAX_LONGITUDE: 180,
  CACHE_PRECISION: 4 // ~11m, finer than any zoom=10 reverse lookup distinguishes
} as const;

export type TimeConstants = typeof TIME;
export type GeoConstants = typeof GEO;
