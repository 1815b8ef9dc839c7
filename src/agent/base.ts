import { RandomSource } from "../utils/random";
import { ReadonlyQTable } from "./qTable";

/** An action plus whether it came from the exploration branch. */
export interface ActionChoice {
  action: number;
  explored: boolean;
}

/**
 * Base class for RL agents.
 *
 * Subclasses implement action selection and the learning update. Provides
 * epsilon/learning-rate controls for runtime adjustments.
 */
export abstract class RLAgent<S> {
  protected learningRate: number = 0.2;
  protected discountFactor: number = 0.95;
  protected epsilon: number = 0.4; // Exploration rate
  protected epsilonDecay: number = 0.995;
  protected minEpsilon: number = 0.01;

  constructor(protected readonly random: RandomSource) {}

  /** Epsilon-greedy choice used while learning. */
  abstract selectAction(state: S): ActionChoice;
  /** Pure exploitation, used by rollouts. */
  abstract greedyAction(state: S): number;
  abstract update(
    state: S,
    action: number,
    reward: number,
    nextState: S,
    done: boolean,
  ): void;
  abstract getQTable(): ReadonlyQTable;

  /** Multiplicative epsilon decay toward the floor, once per episode. */
  onEpisodeEnd(_episode: number): void {
    this.epsilon = Math.max(this.minEpsilon, this.epsilon * this.epsilonDecay);
  }

  setEpsilon(value: number): void {
    this.epsilon = Math.max(0, Math.min(1, value));
  }
  setLearningRate(value: number): void {
    this.learningRate = Math.max(0, value);
  }
  getEpsilon(): number {
    return this.epsilon;
  }
  getLearningRate(): number {
    return this.learningRate;
  }
}
