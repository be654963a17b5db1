/**
 * Weighted Coordinate Sampler Tests
 */

import { WeightedCoordinateSampler, validateTiers } from './sampler';
import { LATITUDE_TIERS } from './constants';
import { LocationConfigError } from './errors';
import { LatitudeTier } from './types';
import { createSeededRandom, createSequenceRandom } from '../../tests/utils/testHelpers';

describe('WeightedCoordinateSampler', () => {
  describe('sample', () => {
    it('should draw a temperate latitude for a low tier draw', () => {
      const sampler = new WeightedCoordinateSampler(createSequenceRandom([0.5, 0.5, 0.5]));

      const draw = sampler.draw();

      expect(draw.tier.name).toBe('temperate');
      expect(draw.coordinate).toEqual({ latitude: 10, longitude: 0 });
    });

    it('should draw from the tropical band when the draw passes the temperate share', () => {
      const sampler = new WeightedCoordinateSampler(createSequenceRandom([0.85, 0, 1]));

      const draw = sampler.draw();

      expect(draw.tier.name).toBe('tropical');
      expect(draw.coordinate).toEqual({ latitude: -23.5, longitude: 180 });
    });

    it('should draw from anywhere for the top of the range', () => {
      const sampler = new WeightedCoordinateSampler(createSequenceRandom([0.97, 1, 0]));

      const draw = sampler.draw();

      expect(draw.tier.name).toBe('anywhere');
      expect(draw.coordinate).toEqual({ latitude: 90, longitude: -180 });
    });

    it('should land in the last tier when the draw is exactly 1', () => {
      const sampler = new WeightedCoordinateSampler(createSequenceRandom([1, 1, 0.5]));

      const draw = sampler.draw();

      expect(draw.tier.name).toBe('anywhere');
      expect(draw.coordinate.latitude).toBe(90);
    });

    it('should make exactly three random draws per sample', () => {
      const random = createSequenceRandom([0.1]);
      const sampler = new WeightedCoordinateSampler(random);

      sampler.sample();
      sampler.sample();

      expect(random.calls).toBe(6);
    });

    it('should return frozen coordinates', () => {
      const sampler = new WeightedCoordinateSampler(createSeededRandom(7));

      expect(Object.isFrozen(sampler.sample())).toBe(true);
    });

    it('should stay within valid bounds for every seed', () => {
      for (let seed = 1; seed <= 20; seed++) {
        const sampler = new WeightedCoordinateSampler(createSeededRandom(seed));
        for (let i = 0; i < 500; i++) {
          const { latitude, longitude } = sampler.sample();
          expect(latitude).toBeGreaterThanOrEqual(-90);
          expect(latitude).toBeLessThanOrEqual(90);
          expect(longitude).toBeGreaterThanOrEqual(-180);
          expect(longitude).toBeLessThanOrEqual(180);
        }
      }
    });
  });

  describe('distribution', () => {
    const N = 10000;

    it('should pick the temperate tier at its configured rate', () => {
      const sampler = new WeightedCoordinateSampler(createSeededRandom(42));
      let temperate = 0;
      for (let i = 0; i < N; i++) {
        if (sampler.draw().tier.name === 'temperate') temperate++;
      }

      // 0.8 with a standard error of 0.004 at N = 10000
      expect(Math.abs(temperate / N - 0.8)).toBeLessThan(0.02);
    });

    it('should concentrate latitudes in the populated band', () => {
      const sampler = new WeightedCoordinateSampler(createSeededRandom(1234));
      let inBand = 0;
      for (let i = 0; i < N; i++) {
        const { latitude } = sampler.sample();
        if (latitude >= -40 && latitude <= 60) inBand++;
      }

      // temperate + tropical + the band's share of "anywhere": 0.8 + 0.15 + 0.05 * 100 / 180
      const expected = 0.8 + 0.15 + 0.05 * (100 / 180);
      expect(Math.abs(inBand / N - expected)).toBeLessThan(0.01);
    });
  });

  describe('validateTiers', () => {
    const tier = (name: string, probability: number, minLat = -10, maxLat = 10): LatitudeTier => ({
      name, probability, minLat, maxLat
    });

    it('should accept the default tiers', () => {
      expect(() => validateTiers(LATITUDE_TIERS)).not.toThrow();
    });

    it('should reject an empty tier list', () => {
      expect(() => validateTiers([])).toThrow(LocationConfigError);
    });

    it('should reject probabilities that do not sum to 1', () => {
      expect(() => validateTiers([tier('a', 0.7), tier('b', 0.2)])).toThrow('Tier probabilities must sum to 1');
    });

    it('should reject a first tier that is not dominant', () => {
      expect(() => validateTiers([tier('a', 0.4), tier('b', 0.6)])).toThrow('Tier "a" must be the dominant tier');
    });

    it('should reject a non-positive probability', () => {
      expect(() => validateTiers([tier('a', 1), tier('b', 0)])).toThrow('Tier "b" must have a positive probability');
    });

    it('should reject latitude ranges outside the globe', () => {
      expect(() => validateTiers([tier('a', 1, -95, 10)])).toThrow('Tier "a" has an invalid latitude range [-95, 10]');
    });

    it('should reject inverted ranges', () => {
      expect(() => validateTiers([tier('a', 1, 20, 10)])).toThrow(LocationConfigError);
    });

    it('should validate on construction', () => {
      expect(() => new WeightedCoordinateSampler(createSeededRandom(1), [tier('a', 0.5)])).toThrow(LocationConfigError);
    });
  });
});
