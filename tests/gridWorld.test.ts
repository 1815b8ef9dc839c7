/**
 * Test Suite for the grid world environment.
 */

import { ACTIONS } from '../src/agent/encoding';
import { GridWorld } from '../src/environment/gridWorld';
import { randomGrid } from '../src/environment/generator';
import { ConfigurationError } from '../src/errors';
import { createRandom } from '../src/utils/random';
import { gridFrom } from './helpers';

const UP = 0;
const DOWN = 1;
const LEFT = 2;
const RIGHT = 3;
const UL = 4;

describe('GridWorld', () => {
  describe('single free cell surrounded by obstacles', () => {
    const grid = gridFrom('111/101/111');

    it('should start on the goal after reset', () => {
      const env = new GridWorld(grid, { x: 1, y: 1 }, { x: 1, y: 1 });
      expect(env.reset()).toEqual({ x: 1, y: 1 });
      expect(env.isAtGoal()).toBe(true);
    });

    it('should report reachedGoal only when the new position is the goal', () => {
      const env = new GridWorld(grid, { x: 1, y: 1 }, { x: 1, y: 1 });
      env.reset();
      const result = env.step(UP);
      expect(result.position).toEqual({ x: 1, y: 0 });
      expect(result.info).toEqual({ hitWall: false, hitObstacle: true, reachedGoal: false });
      expect(result.done).toBe(true);
      // obstacle penalty -1, then pheromone 0.6 on the fresh cell
      expect(result.reward).toBeCloseTo(-1.6, 12);
    });

    it('should keep going on obstacles under the goal-only policy', () => {
      const env = new GridWorld(grid, { x: 1, y: 1 }, { x: 1, y: 1 }, {
        terminationPolicy: 'goalOnly',
      });
      env.reset();
      expect(env.step(UP).done).toBe(false);
      const back = env.step(DOWN);
      expect(back.info.reachedGoal).toBe(true);
      expect(back.done).toBe(true);
      expect(back.reward).toBeCloseTo(-0.6 + 50, 12);
    });
  });

  describe('wall bumps', () => {
    const grid = gridFrom('000/000/000');

    it('should clamp the position and add the wall penalty', () => {
      const env = new GridWorld(grid, { x: 0, y: 1 }, { x: 2, y: 2 });
      env.reset();
      const result = env.step(LEFT);
      expect(result.position).toEqual({ x: 0, y: 1 });
      expect(result.info).toEqual({ hitWall: true, hitObstacle: false, reachedGoal: false });
      expect(result.done).toBe(true);
      expect(result.reward).toBeCloseTo(-1 - 0.6, 12);
    });

    it('should not end the episode on a wall under the goal-only policy', () => {
      const env = new GridWorld(grid, { x: 0, y: 1 }, { x: 2, y: 2 }, {
        terminationPolicy: 'goalOnly',
      });
      env.reset();
      const result = env.step(LEFT);
      expect(result.info.hitWall).toBe(true);
      expect(result.done).toBe(false);
    });

    it('should clamp each axis independently on diagonal moves', () => {
      const env = new GridWorld(grid, { x: 0, y: 1 }, { x: 2, y: 2 });
      env.reset();
      const result = env.step(UL);
      expect(result.info.hitWall).toBe(true);
      expect(result.position).toEqual({ x: 0, y: 0 });
    });

    it('should honour configured penalty magnitudes', () => {
      const env = new GridWorld(grid, { x: 0, y: 1 }, { x: 2, y: 2 }, {
        wallPenalty: -5,
        pheromonePenalty: 0,
      });
      env.reset();
      expect(env.step(LEFT).reward).toBe(-5);
    });
  });

  describe('pheromone shaping', () => {
    it('should decay the whole field and penalise the occupied cell', () => {
      const env = new GridWorld(gridFrom('0000'), { x: 0, y: 0 }, { x: 3, y: 0 }, {
        terminationPolicy: 'goalOnly',
      });
      env.reset();
      expect(env.step(RIGHT).reward).toBeCloseTo(-0.6, 12);
      const second = env.step(RIGHT);
      expect(second.reward).toBeCloseTo(-0.6, 12);
      expect(env.pheromoneAt(1, 0)).toBeCloseTo(0.6 * 0.97, 12);
      expect(env.pheromoneAt(2, 0)).toBeCloseTo(0.6, 12);
      expect(env.pheromoneAt(0, 0)).toBe(0);
    });

    it('should charge more for revisiting a trodden cell', () => {
      const env = new GridWorld(gridFrom('000'), { x: 0, y: 0 }, { x: 2, y: 0 }, {
        terminationPolicy: 'goalOnly',
      });
      env.reset();
      env.step(RIGHT);
      env.step(LEFT);
      const revisit = env.step(RIGHT);
      // (1,0): 0.6 -> 0.582 -> 0.56454, then deposit 0.6 of the headroom
      const p = 0.56454 + 0.6 * (1 - 0.56454);
      expect(revisit.reward).toBeCloseTo(-p, 10);
    });

    it('should add the goal bonus on arrival', () => {
      const env = new GridWorld(gridFrom('00'), { x: 0, y: 0 }, { x: 1, y: 0 }, { goalBonus: 10 });
      env.reset();
      const result = env.step(RIGHT);
      expect(result.done).toBe(true);
      expect(result.info.reachedGoal).toBe(true);
      expect(result.reward).toBeCloseTo(10 - 0.6, 12);
    });

    it('should keep pheromones within [0, 1] along a long random walk', () => {
      const random = createRandom('walk');
      const grid = randomGrid({ width: 9, height: 7, freeProbability: 0.7, random });
      const env = new GridWorld(grid, { x: 1, y: 1 }, { x: 7, y: 5 }, {
        terminationPolicy: 'goalOnly',
        pheromoneDepositRate: 0.95,
      });
      env.reset();
      for (let i = 0; i < 1500; i++) {
        env.step(random.int(ACTIONS.length));
        for (const row of env.pheromoneSnapshot()) {
          for (const v of row) {
            expect(v).toBeGreaterThanOrEqual(0);
            expect(v).toBeLessThanOrEqual(1);
          }
        }
      }
    });
  });

  describe('reset', () => {
    it('should return to start and clear pheromones', () => {
      const env = new GridWorld(gridFrom('000'), { x: 0, y: 0 }, { x: 2, y: 0 }, {
        terminationPolicy: 'goalOnly',
      });
      env.step(RIGHT);
      expect(env.reset()).toEqual({ x: 0, y: 0 });
      expect(env.position).toEqual({ x: 0, y: 0 });
      expect(env.pheromoneSnapshot()).toEqual([[0, 0, 0]]);
    });
  });

  describe('construction', () => {
    it('should reject an empty grid', () => {
      expect(() => new GridWorld([], { x: 0, y: 0 }, { x: 0, y: 0 })).toThrow(ConfigurationError);
      expect(() => new GridWorld([[]], { x: 0, y: 0 }, { x: 0, y: 0 })).toThrow(
        ConfigurationError,
      );
    });

    it('should reject a ragged grid', () => {
      const ragged = [['free', 'free'], ['free']] as const;
      expect(() => new GridWorld(ragged, { x: 0, y: 0 }, { x: 1, y: 0 })).toThrow(
        'not rectangular',
      );
    });

    it('should reject start or goal outside the grid', () => {
      const grid = gridFrom('00/00');
      expect(() => new GridWorld(grid, { x: 2, y: 0 }, { x: 0, y: 0 })).toThrow('start');
      expect(() => new GridWorld(grid, { x: 0, y: 0 }, { x: 0, y: -1 })).toThrow('goal');
      expect(() => new GridWorld(grid, { x: 0.5, y: 0 }, { x: 0, y: 0 })).toThrow(
        ConfigurationError,
      );
    });

    it('should reject invalid shaping options', () => {
      const grid = gridFrom('00');
      expect(
        () => new GridWorld(grid, { x: 0, y: 0 }, { x: 1, y: 0 }, { pheromoneDecay: 1.2 }),
      ).toThrow(ConfigurationError);
    });

    it('should not see later mutations of the input grid', () => {
      const grid = gridFrom('00');
      const env = new GridWorld(grid, { x: 0, y: 0 }, { x: 1, y: 0 });
      const row = grid[0];
      if (row) row[1] = 'obstacle';
      expect(env.cellAt(1, 0)).toBe('free');
    });

    it('should reject action indices outside 0..7', () => {
      const env = new GridWorld(gridFrom('00'), { x: 0, y: 0 }, { x: 1, y: 0 });
      expect(() => env.step(8)).toThrow(RangeError);
    });
  });
});
