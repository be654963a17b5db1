/**
 * Location Service
 * 
 * Wires the weighted sampler, habitability resolver and Nominatim oracle
 * from configuration and exposes target selection to the routes.
 */

import { config } from '../config';
import { NominatimOracle } from './geocoding/nominatimOracle';
import { HabitabilityResolver } from './location/resolver';
import { WeightedCoordinateSampler } from './location/sampler';
import { LocationSelector } from './location/selector';
import { mathRandomSource } from './location/random';
import { RandomSource, ReverseGeocodingOracle, TargetLocation } from './location/types';

export interface LocationServiceDependencies {
  oracle?: ReverseGeocodingOracle;
  random?: RandomSource;
}

export function createLocationSelector({ oracle, random = mathRandomSource }: LocationServiceDependencies = {}): LocationSelector {
  const geocoder = oracle ?? new NominatimOracle({
    baseUrl: config.geocoding.baseUrl,
    userAgent: config.geocoding.userAgent,
    language: config.geocoding.language,
    timeoutMs: config.geocoding.timeoutMs,
    cacheTtlSeconds: config.geocoding.cacheTtlSeconds,
    minIntervalMs: config.geocoding.minIntervalMs
  });

  return new LocationSelector({
    sampler: new WeightedCoordinateSampler(random, config.location.tiers),
    resolver: new HabitabilityResolver({
      oracle: geocoder,
      homeCountry: config.location.homeCountry,
      timeoutMs: config.geocoding.timeoutMs
    }),
    random,
    maxAttempts: config.location.maxAttempts
  });
}

let defaultSelector: LocationSelector | null = null;

function getSelector(): LocationSelector {
  if (!defaultSelector) {
    defaultSelector = createLocationSelector();
  }
  return defaultSelector;
}

/**
 * Pick a new random target. Rejects only when `signal` aborts.
 */
export function selectRandomTarget(signal?: AbortSignal): Promise<TargetLocation> {
  return getSelector().selectTarget(signal);
}
