/**
 * Habitability resolver - turns a candidate coordinate into a display name,
 * or null when the point is unnamed or looks like open water.
 */

import logger from '../../utils/logger';
import { formatErrorForLogging } from '../../utils/errorHandler';
import { TIME } from '../../utils/constants';
import { withAbort, withTimeout } from '../../utils/timeout';
import { DEFAULT_HOME_COUNTRY } from './constants';
import { OCEAN_KEYWORDS } from './catalog';
import { SelectionCancelledError, isSelectionCancelled } from './errors';
import { Coordinate, GeocodeResult, PlaceName, ReverseGeocodingOracle } from './types';

export interface HabitabilityResolverOptions {
  oracle: ReverseGeocodingOracle;
  homeCountry?: string;
  oceanKeywords?: readonly string[];
  timeoutMs?: number;
}

const clean = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

/**
 * Drop blank fields so "" behaves like a missing field
 */
export function normalizeGeocodeResult(result: GeocodeResult): GeocodeResult {
  const normalized: GeocodeResult = {};
  const locality = clean(result.locality);
  const subLocality = clean(result.subLocality);
  const administrativeArea = clean(result.administrativeArea);
  const country = clean(result.country);

  if (locality) normalized.locality = locality;
  if (subLocality) normalized.subLocality = subLocality;
  if (administrativeArea) normalized.administrativeArea = administrativeArea;
  if (country) normalized.country = country;
  return normalized;
}

/**
 * Priority cascade: locality, sub-locality, administrative area, country.
 * Localities in the home country carry the state instead of the country name.
 */
export function extractPlaceName(result: GeocodeResult, homeCountry: string = DEFAULT_HOME_COUNTRY): PlaceName {
  const { locality, subLocality, administrativeArea, country } = result;

  if (locality) {
    if (country && country !== homeCountry) {
      return `${locality}, ${country}`;
    }
    return administrativeArea ? `${locality}, ${administrativeArea}` : locality;
  }

  if (subLocality) {
    return country ? `${subLocality}, ${country}` : subLocality;
  }

  if (administrativeArea) {
    return country ? `${administrativeArea}, ${country}` : administrativeArea;
  }

  return country ?? null;
}

/**
 * Heuristic, not a landmask: no sub-country detail at all, or any field mentioning an ocean/sea.
 */
export function isLikelyUninhabited(result: GeocodeResult, oceanKeywords: readonly string[] = OCEAN_KEYWORDS): boolean {
  if (!result.locality && !result.subLocality && !result.administrativeArea) {
    return true;
  }

  const locationString = [
    result.locality,
    result.subLocality,
    result.administrativeArea,
    result.country
  ].filter((part): part is string => Boolean(part)).join(' ').toLowerCase();

  return oceanKeywords.some(keyword => locationString.includes(keyword));
}

export class HabitabilityResolver {
  private readonly oracle: ReverseGeocodingOracle;
  private readonly homeCountry: string;
  private readonly oceanKeywords: readonly string[];
  private readonly timeoutMs: number;

  constructor({ oracle, homeCountry = DEFAULT_HOME_COUNTRY, oceanKeywords = OCEAN_KEYWORDS, timeoutMs = TIME.GEOCODE_TIMEOUT }: HabitabilityResolverOptions) {
    this.oracle = oracle;
    this.homeCountry = homeCountry;
    this.oceanKeywords = oceanKeywords;
    this.timeoutMs = timeoutMs;
  }

  /**
   * Resolve a coordinate to a usable place name.
   * Oracle failures and timeouts yield null; only cancellation rejects.
   */
  async resolve(coordinate: Coordinate, signal?: AbortSignal): Promise<PlaceName> {
    if (signal?.aborted) {
      throw new SelectionCancelledError();
    }

    // Per-attempt signal for the oracle: aborted with the caller's signal, on timeout, and on failure
    const attempt = new AbortController();
    const abortAttempt = (): void => attempt.abort();
    signal?.addEventListener('abort', abortAttempt, { once: true });

    let raw: GeocodeResult;
    try {
      raw = await withAbort(
        withTimeout(this.oracle.query(coordinate, attempt.signal), this.timeoutMs, 'Reverse geocode', attempt.signal),
        signal,
        () => new SelectionCancelledError()
      );
    } catch (error: unknown) {
      attempt.abort();
      if (isSelectionCancelled(error) || signal?.aborted) {
        throw error instanceof SelectionCancelledError ? error : new SelectionCancelledError();
      }
      logger.warn('⚠️ Reverse geocoding failed, counting as a failed attempt', {
        latitude: coordinate.latitude,
        longitude: coordinate.longitude,
        ...formatErrorForLogging(error)
      });
      return null;
    } finally {
      signal?.removeEventListener('abort', abortAttempt);
    }

    const result = normalizeGeocodeResult(raw);
    const name = extractPlaceName(result, this.homeCountry);
    if (!name) {
      logger.debug('🌊 No usable place name', { latitude: coordinate.latitude, longitude: coordinate.longitude });
      return null;
    }

    if (isLikelyUninhabited(result, this.oceanKeywords)) {
      logger.debug(`🌊 Rejected likely uninhabited point: ${name}`);
      return null;
    }

    return name;
  }
}
