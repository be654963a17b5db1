/**
 * Nominatim (OpenStreetMap) reverse-geocoding oracle.
 *
 * Usage policy: identify with a User-Agent, at most 1 request/second, cache results.
 */

import axios, { AxiosInstance } from 'axios';
import { setTimeout as sleep } from 'timers/promises';
import { CacheKeys, geocodeCache } from '../../utils/cache';
import { GEO } from '../../utils/constants';
import logger from '../../utils/logger';
import { NominatimReverseSchema } from '../../schemas/locationSchemas';
import { Coordinate, GeocodeResult, ReverseGeocodingOracle } from '../location/types';

type AddressRecord = Record<string, unknown>;

export interface NominatimOracleOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  cacheTtlSeconds: number;
  minIntervalMs: number;
  language?: string;
  /** Injected for tests; defaults to an axios instance bound to baseUrl */
  http?: Pick<AxiosInstance, 'get'>;
}

const LOCALITY_FIELDS = ['city', 'town', 'village', 'hamlet', 'municipality'];
const SUB_LOCALITY_FIELDS = ['suburb', 'city_district', 'borough', 'neighbourhood', 'quarter'];
const ADMINISTRATIVE_FIELDS = ['state', 'province', 'region', 'state_district', 'county'];

function firstString(address: AddressRecord, fields: string[]): string | undefined {
  for (const field of fields) {
    const value = address[field];
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }
  return undefined;
}

/**
 * Map a Nominatim address block onto the oracle's result shape
 */
export function mapNominatimAddress(address: AddressRecord): GeocodeResult {
  const result: GeocodeResult = {};
  const locality = firstString(address, LOCALITY_FIELDS);
  const subLocality = firstString(address, SUB_LOCALITY_FIELDS);
  const administrativeArea = firstString(address, ADMINISTRATIVE_FIELDS);
  const country = firstString(address, ['country']);

  if (locality) result.locality = locality;
  if (subLocality) result.subLocality = subLocality;
  if (administrativeArea) result.administrativeArea = administrativeArea;
  if (country) result.country = country;
  return result;
}

export class NominatimOracle implements ReverseGeocodingOracle {
  private readonly http: Pick<AxiosInstance, 'get'>;
  private readonly language: string;
  private readonly minIntervalMs: number;
  private nextSlotAt = 0;
  private readonly cachedLookup: (coordinate: Coordinate, signal?: AbortSignal) => Promise<GeocodeResult>;

  constructor(options: NominatimOracleOptions) {
    this.http = options.http ?? axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: { 'User-Agent': options.userAgent, Accept: 'application/json' }
    });
    this.language = options.language ?? 'en';
    this.minIntervalMs = options.minIntervalMs;
    this.cachedLookup = geocodeCache.wrap(
      (coordinate: Coordinate, signal?: AbortSignal) => this.lookup(coordinate, signal),
      (coordinate: Coordinate) => CacheKeys.reverseGeocode(coordinate.latitude, coordinate.longitude, GEO.CACHE_PRECISION),
      options.cacheTtlSeconds
    );
  }

  query(coordinate: Coordinate, signal?: AbortSignal): Promise<GeocodeResult> {
    return this.cachedLookup(coordinate, signal);
  }

  private async lookup(coordinate: Coordinate, signal?: AbortSignal): Promise<GeocodeResult> {
    await this.throttle(signal);

    const response = await this.http.get<unknown>('/reverse', {
      params: {
        format: 'jsonv2',
        lat: coordinate.latitude.toFixed(6),
        lon: coordinate.longitude.toFixed(6),
        zoom: 10,
        addressdetails: 1,
        'accept-language': this.language
      },
      signal
    });

    const parsed = NominatimReverseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`Unexpected Nominatim response: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
    }

    const body = parsed.data;
    if (body.error || !body.address) {
      logger.debug(`🌊 Nominatim has no place at ${coordinate.latitude.toFixed(4)}, ${coordinate.longitude.toFixed(4)}`, {
        reason: body.error ?? 'no address'
      });
      return {};
    }

    return mapNominatimAddress(body.address);
  }

  /**
   * Space requests at least minIntervalMs apart across all callers of this instance
   */
  private async throttle(signal?: AbortSignal): Promise<void> {
    if (this.minIntervalMs <= 0) return;

    const now = Date.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.minIntervalMs;

    const wait = slot - now;
    if (wait > 0) {
      try {
        await sleep(wait, undefined, { signal });
      } catch (error: unknown) {
        // Hand the slot back unless a later caller is already queued behind it
        if (this.nextSlotAt === slot + this.minIntervalMs) {
          this.nextSlotAt = slot;
        }
        throw error;
      }
    }
  }
}
