/**
 * Test Suite for the pheromone field.
 */

import { PheromoneField } from '../src/environment/pheromone';
import { ConfigurationError } from '../src/errors';
import { createRandom } from '../src/utils/random';

describe('PheromoneField', () => {
  describe('decay then deposit', () => {
    it('should deposit toward 1 on an empty field', () => {
      const field = new PheromoneField(3, 2, { decay: 0.9, depositRate: 0.5 });
      field.step(0, 0);
      expect(field.valueAt(0, 0)).toBeCloseTo(0.5, 12);
      expect(field.valueAt(1, 0)).toBe(0);
    });

    it('should decay every cell before depositing on the visited one', () => {
      const field = new PheromoneField(3, 2, { decay: 0.9, depositRate: 0.5 });
      field.step(0, 0);
      field.step(1, 0);
      field.step(0, 0);
      // 0.45 decays to 0.405, then gains 0.5 * (1 - 0.405)
      expect(field.valueAt(0, 0)).toBeCloseTo(0.7025, 12);
      expect(field.valueAt(1, 0)).toBeCloseTo(0.45, 12);
      expect(field.valueAt(2, 1)).toBe(0);
    });

    it('should match decay*old + rate*(1 - decay*old) on the visited cell only', () => {
      const decay = 0.97;
      const rate = 0.6;
      const field = new PheromoneField(4, 3, { decay, depositRate: rate });
      const random = createRandom('pheromone-order');
      for (let i = 0; i < 20; i++) field.step(random.int(4), random.int(3));

      const before = field.snapshot();
      field.step(2, 1);
      const after = field.snapshot();
      for (let y = 0; y < 3; y++) {
        for (let x = 0; x < 4; x++) {
          const old = before[y]?.[x] ?? NaN;
          const expected =
            x === 2 && y === 1 ? decay * old + rate * (1 - decay * old) : decay * old;
          expect(after[y]?.[x]).toBeCloseTo(expected, 12);
        }
      }
    });
  });

  describe('bounds', () => {
    it('should keep every value within [0, 1] over long runs', () => {
      const field = new PheromoneField(5, 5, { decay: 0.99, depositRate: 0.9 });
      const random = createRandom('bounded');
      for (let i = 0; i < 2000; i++) {
        field.step(random.int(5), random.int(5));
        expect(field.max()).toBeLessThanOrEqual(1);
      }
      for (const row of field.snapshot()) {
        for (const v of row) {
          expect(v).toBeGreaterThanOrEqual(0);
          expect(v).toBeLessThanOrEqual(1);
        }
      }
    });

    it('should saturate at exactly 1 with a full deposit rate', () => {
      const field = new PheromoneField(2, 2, { decay: 0.5, depositRate: 1 });
      field.step(1, 1);
      field.step(1, 1);
      expect(field.valueAt(1, 1)).toBe(1);
    });
  });

  it('should zero the field on reset', () => {
    const field = new PheromoneField(2, 2, { decay: 0.5, depositRate: 0.5 });
    field.step(0, 1);
    field.reset();
    expect(field.snapshot()).toEqual([
      [0, 0],
      [0, 0],
    ]);
  });

  it('should reject decay outside (0, 1)', () => {
    expect(() => new PheromoneField(2, 2, { decay: 1, depositRate: 0.5 })).toThrow(
      ConfigurationError,
    );
    expect(() => new PheromoneField(2, 2, { decay: 0, depositRate: 0.5 })).toThrow(
      ConfigurationError,
    );
  });

  it('should reject a deposit rate above 1', () => {
    expect(() => new PheromoneField(2, 2, { decay: 0.5, depositRate: 1.5 })).toThrow(
      ConfigurationError,
    );
  });

  it('should throw RangeError for cells outside the field', () => {
    const field = new PheromoneField(2, 2, { decay: 0.5, depositRate: 0.5 });
    expect(() => field.valueAt(2, 0)).toThrow(RangeError);
  });
});
