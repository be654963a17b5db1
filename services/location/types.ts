/**
 * Location domain types
 */

export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

/**
 * Display name, or null when nothing usable was found
 */
export type PlaceName = string | null;

/**
 * What a reverse-geocoding lookup knows about a coordinate.
 * An empty object means no resolvable place.
 */
export interface GeocodeResult {
  locality?: string;
  subLocality?: string;
  administrativeArea?: string;
  country?: string;
}

export type TargetSource = 'geocoded' | 'fallback';

export interface TargetLocation {
  readonly coordinate: Coordinate;
  readonly name: string;
  readonly source: TargetSource;
}

export interface FallbackEntry {
  readonly name: string;
  readonly coordinate: Coordinate;
}

/**
 * Latitude band used by the weighted sampler
 */
export interface LatitudeTier {
  name: string;
  probability: number;
  minLat: number;
  maxLat: number;
}

/**
 * Uniform real-valued draws over a closed interval
 */
export interface RandomSource {
  uniform(min: number, max: number): number;
}

/**
 * Reverse-geocoding capability consumed by the resolver.
 * Implementations reject on network/service failure.
 */
export interface ReverseGeocodingOracle {
  query(coordinate: Coordinate, signal?: AbortSignal): Promise<GeocodeResult>;
}

export function createCoordinate(latitude: number, longitude: number): Coordinate {
  return Object.freeze({ latitude, longitude });
}
