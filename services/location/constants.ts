/**
 * Location selection constants
 */

import { LatitudeTier } from './types';

/**
 * Latitude mixture weighted by population density.
 * Uniform sampling over the sphere wastes most draws on ocean and polar terrain.
 * The first tier must stay dominant; probabilities sum to 1.
 */
export const LATITUDE_TIERS: readonly LatitudeTier[] = [
  { name: 'temperate', probability: 0.8, minLat: -40, maxLat: 60 },
  { name: 'tropical', probability: 0.15, minLat: -23.5, maxLat: 23.5 },
  { name: 'anywhere', probability: 0.05, minLat: -90, maxLat: 90 }
];

export const DEFAULT_MAX_ATTEMPTS = 15;

export const DEFAULT_HOME_COUNTRY = 'United States';

export const PROBABILITY_TOLERANCE = 1e-9;
