/**
 * Test Suite for the Q-table and the tabular Q-learning agent.
 */

import { N_ACTIONS, stateToKey } from '../src/agent/encoding';
import { QLearningAgent, QLearningAgentOptions } from '../src/agent/qLearningAgent';
import { QTable } from '../src/agent/qTable';
import { ConfigurationError } from '../src/errors';
import { ObservationState } from '../src/types';
import { createRandom } from '../src/utils/random';
import { SequenceRandom } from './helpers';

const S: ObservationState = [1, 1, 1, 1, 1, 1, 1, 1];
const S2: ObservationState = [0, 2, 3, 1, 1, 1, 2, 0];

describe('QTable', () => {
  it('should create a zero row on first access', () => {
    const q = new QTable();
    expect(q.size).toBe(0);
    expect(q.row(S)).toEqual(new Array(N_ACTIONS).fill(0));
    expect(q.size).toBe(1);
    expect(q.has(S)).toBe(true);
  });

  it('should not create rows when peeking', () => {
    const q = new QTable();
    expect(q.peek(S2)).toEqual(new Array(N_ACTIONS).fill(0));
    expect(q.has(S2)).toBe(false);
    expect(q.size).toBe(0);
  });

  it('should key rows by exact component values', () => {
    const q = new QTable();
    const a: ObservationState = [0.25, 0.25, 0.25, 0.25, 1, 1, 1, 1];
    const b: ObservationState = [0.25 + 1e-12, 0.25, 0.25, 0.25, 1, 1, 1, 1];
    q.set(a, 3, 7);
    expect(q.get(a, 3)).toBe(7);
    expect(q.get(b, 3)).toBe(0);
    expect(stateToKey(a)).not.toBe(stateToKey(b));
    expect(q.get([0.25, 0.25, 0.25, 0.25, 1, 1, 1, 1], 3)).toBe(7);
  });

  it('should reject out-of-range actions on write', () => {
    const q = new QTable();
    expect(() => q.set(S, N_ACTIONS, 1)).toThrow(RangeError);
  });
});

describe('QLearningAgent', () => {
  describe('bellman update', () => {
    it('should bootstrap from the best next value on non-terminal steps', () => {
      const agent = new QLearningAgent({ alpha: 0.5, gamma: 0.9, random: createRandom('u') });
      agent.getQTable().set(S2, 4, 10);
      agent.update(S, 0, 2, S2, false);
      expect(agent.getQTable().get(S, 0)).toBeCloseTo(0.5 * (2 + 0.9 * 10), 12);
    });

    it('should not bootstrap through a terminal transition', () => {
      const agent = new QLearningAgent({ alpha: 0.5, gamma: 0.9, random: createRandom('u') });
      agent.getQTable().set(S2, 4, 10);
      agent.update(S, 0, 2, S2, true);
      expect(agent.getQTable().get(S, 0)).toBeCloseTo(1, 12);
    });

    it('should move an existing estimate toward the target', () => {
      const agent = new QLearningAgent({ alpha: 0.2, gamma: 0.95, random: createRandom('u') });
      agent.getQTable().set(S, 2, 5);
      agent.update(S, 2, -1, S2, true);
      expect(agent.getQTable().get(S, 2)).toBeCloseTo(5 + 0.2 * (-1 - 5), 12);
      expect(agent.getUpdateCount()).toBe(1);
    });
  });

  describe('action selection', () => {
    it('should exploit the best action when the draw exceeds epsilon', () => {
      const agent = new QLearningAgent({ epsilon: 0.3, random: new SequenceRandom([0.9, 0]) });
      agent.getQTable().set(S, 5, 1);
      expect(agent.selectAction(S)).toEqual({ action: 5, explored: false });
    });

    it('should explore uniformly when the draw is below epsilon', () => {
      // 0.1 < epsilon, then 0.5 * 8 = action 4
      const agent = new QLearningAgent({ epsilon: 0.3, random: new SequenceRandom([0.1, 0.5]) });
      agent.getQTable().set(S, 5, 1);
      expect(agent.selectAction(S)).toEqual({ action: 4, explored: true });
    });

    it('should spread greedy choices over an untrained row', () => {
      const agent = new QLearningAgent({ epsilon: 0, random: createRandom('fair') });
      const counts = new Array<number>(N_ACTIONS).fill(0);
      const trials = 16000;
      for (let i = 0; i < trials; i++) {
        const { action } = agent.selectAction(S);
        counts[action] = (counts[action] ?? 0) + 1;
      }
      for (const c of counts) {
        expect(Math.abs(c / trials - 1 / N_ACTIONS)).toBeLessThan(0.02);
      }
    });

    it('should read without creating rows in greedy mode', () => {
      const agent = new QLearningAgent({ random: createRandom('g') });
      agent.greedyAction(S2);
      expect(agent.getQTableSize()).toBe(0);
    });
  });

  describe('exploration schedule', () => {
    it('should decay epsilon multiplicatively down to the floor', () => {
      const agent = new QLearningAgent({
        epsilon: 0.4,
        epsilonDecay: 0.5,
        epsilonMin: 0.15,
        random: createRandom('e'),
      });
      agent.onEpisodeEnd(1);
      expect(agent.getEpsilon()).toBeCloseTo(0.2, 12);
      agent.onEpisodeEnd(2);
      expect(agent.getEpsilon()).toBe(0.15);
      agent.onEpisodeEnd(3);
      expect(agent.getEpsilon()).toBe(0.15);
    });
  });

  describe('construction', () => {
    const invalid: Array<[QLearningAgentOptions, string]> = [
      [{ alpha: 7 }, 'alpha'],
      [{ alpha: 0 }, 'alpha'],
      [{ gamma: -0.1 }, 'gamma'],
      [{ epsilon: 1.5 }, 'epsilon'],
      [{ epsilonDecay: 0 }, 'epsilonDecay'],
      [{ epsilonMin: Number.NaN }, 'epsilonMin'],
    ];

    it.each(invalid)('should reject %j', (opts, name) => {
      expect(() => new QLearningAgent(opts)).toThrow(ConfigurationError);
      expect(() => new QLearningAgent(opts)).toThrow(name);
    });

    it('should accept the boundary values', () => {
      const agent = new QLearningAgent({ alpha: 1, gamma: 0, epsilon: 0, epsilonDecay: 1 });
      expect(agent.getLearningRate()).toBe(1);
      expect(agent.getEpsilon()).toBe(0);
    });
  });
});
