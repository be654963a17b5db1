/**
 * Weighted coordinate sampler - draws candidates biased toward populated latitudes
 */

import { GEO } from '../../utils/constants';
import { LATITUDE_TIERS, PROBABILITY_TOLERANCE } from './constants';
import { LocationConfigError } from './errors';
import { Coordinate, LatitudeTier, RandomSource, createCoordinate } from './types';

/**
 * Throws LocationConfigError unless the tiers form a valid mixture
 * with the first tier dominant.
 */
export function validateTiers(tiers: readonly LatitudeTier[]): void {
  const [primary] = tiers;
  if (!primary) {
    throw new LocationConfigError('At least one latitude tier is required');
  }

  for (const tier of tiers) {
    if (!(tier.probability > 0)) {
      throw new LocationConfigError(`Tier "${tier.name}" must have a positive probability`);
    }
    if (tier.minLat < GEO.MIN_LATITUDE || tier.maxLat > GEO.MAX_LATITUDE || tier.minLat >= tier.maxLat) {
      throw new LocationConfigError(`Tier "${tier.name}" has an invalid latitude range [${tier.minLat}, ${tier.maxLat}]`);
    }
  }

  const total = tiers.reduce((sum, tier) => sum + tier.probability, 0);
  if (Math.abs(total - 1) > PROBABILITY_TOLERANCE) {
    throw new LocationConfigError(`Tier probabilities must sum to 1 (got ${total})`);
  }

  if (tiers.some(tier => tier !== primary && tier.probability >= primary.probability)) {
    throw new LocationConfigError(`Tier "${primary.name}" must be the dominant tier`);
  }
}

export interface SampleDraw {
  tier: LatitudeTier;
  coordinate: Coordinate;
}

export class WeightedCoordinateSampler {
  private readonly random: RandomSource;
  private readonly tiers: readonly LatitudeTier[];
  private readonly lastTier: LatitudeTier;

  constructor(random: RandomSource, tiers: readonly LatitudeTier[] = LATITUDE_TIERS) {
    validateTiers(tiers);
    const lastTier = tiers[tiers.length - 1];
    if (!lastTier) {
      throw new LocationConfigError('At least one latitude tier is required');
    }
    this.random = random;
    this.tiers = tiers;
    this.lastTier = lastTier;
  }

  sample(): Coordinate {
    return this.draw().coordinate;
  }

  /**
   * Draw order is fixed: tier, latitude, longitude.
   */
  draw(): SampleDraw {
    const tier = this.pickTier();
    const latitude = this.random.uniform(tier.minLat, tier.maxLat);
    const longitude = this.random.uniform(GEO.MIN_LONGITUDE, GEO.MAX_LONGITUDE);
    return { tier, coordinate: createCoordinate(latitude, longitude) };
  }

  private pickTier(): LatitudeTier {
    let remaining = this.random.uniform(0, 1);
    for (const tier of this.tiers) {
      remaining -= tier.probability;
      if (remaining < 0) {
        return tier;
      }
    }
    // Rounding leftovers land in the last tier
    return this.lastTier;
  }
}
