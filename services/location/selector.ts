/**
 * Location selection loop - sample, resolve, accept or retry,
 * then fall back to the curated catalog once the attempt ceiling is reached.
 */

import logger from '../../utils/logger';
import { DEFAULT_MAX_ATTEMPTS } from './constants';
import { FALLBACK_CATALOG } from './catalog';
import { LocationConfigError, SelectionCancelledError } from './errors';
import { pickIndex } from './random';
import { HabitabilityResolver } from './resolver';
import { WeightedCoordinateSampler } from './sampler';
import { FallbackEntry, RandomSource, TargetLocation } from './types';

export interface LocationSelectorOptions {
  sampler: WeightedCoordinateSampler;
  resolver: HabitabilityResolver;
  random: RandomSource;
  maxAttempts?: number;
  fallbackCatalog?: readonly FallbackEntry[];
}

export interface SelectionOutcome {
  target: TargetLocation;
  /** Oracle calls made (equals maxAttempts on fallback) */
  attempts: number;
}

export class LocationSelector {
  private readonly sampler: WeightedCoordinateSampler;
  private readonly resolver: HabitabilityResolver;
  private readonly random: RandomSource;
  private readonly maxAttempts: number;
  private readonly fallbackCatalog: readonly FallbackEntry[];

  constructor({ sampler, resolver, random, maxAttempts = DEFAULT_MAX_ATTEMPTS, fallbackCatalog = FALLBACK_CATALOG }: LocationSelectorOptions) {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new LocationConfigError(`maxAttempts must be a positive integer (got ${maxAttempts})`);
    }
    if (fallbackCatalog.length === 0) {
      throw new LocationConfigError('Fallback catalog needs at least one entry');
    }
    this.sampler = sampler;
    this.resolver = resolver;
    this.random = random;
    this.maxAttempts = maxAttempts;
    this.fallbackCatalog = fallbackCatalog;
  }

  /**
   * Always produces a target unless `signal` aborts, in which case it
   * rejects with SelectionCancelledError.
   */
  async select(signal?: AbortSignal): Promise<SelectionOutcome> {
    let attempts = 0;

    while (attempts < this.maxAttempts) {
      if (signal?.aborted) {
        throw new SelectionCancelledError();
      }

      const coordinate = this.sampler.sample();
      attempts++;
      logger.debug(`🎲 Attempt ${attempts}/${this.maxAttempts}: resolving ${coordinate.latitude.toFixed(4)}, ${coordinate.longitude.toFixed(4)}`);

      const name = await this.resolver.resolve(coordinate, signal);
      if (name) {
        logger.info(`📍 Target accepted after ${attempts} attempt(s): ${name}`);
        const target: TargetLocation = { coordinate, name, source: 'geocoded' };
        return { target: Object.freeze(target), attempts };
      }
    }

    const entry = this.pickFallback();
    logger.info(`🏙️ No habitable point after ${attempts} attempts, using fallback: ${entry.name}`);
    const target: TargetLocation = { coordinate: entry.coordinate, name: entry.name, source: 'fallback' };
    return { target: Object.freeze(target), attempts };
  }

  async selectTarget(signal?: AbortSignal): Promise<TargetLocation> {
    const { target } = await this.select(signal);
    return target;
  }

  private pickFallback(): FallbackEntry {
    const index = pickIndex(this.random, this.fallbackCatalog.length);
    const entry = this.fallbackCatalog[index];
    if (!entry) {
      throw new LocationConfigError('Fallback catalog needs at least one entry');
    }
    return entry;
  }
}
