import { AgentHyperparameters, validateAgentHyperparameters } from "../config";
import { ObservationState } from "../types";
import { argmaxIndex, maxValue } from "../utils/math";
import { RandomSource, createRandom } from "../utils/random";
import { ActionChoice, RLAgent } from "./base";
import { N_ACTIONS } from "./encoding";
import { QTable } from "./qTable";

export type QLearningAgentOptions = AgentHyperparameters & {
  random?: RandomSource;
  /** Continue training an existing table. */
  qTable?: QTable;
};

/**
 * Tabular Q-learning agent with an epsilon-greedy policy.
 *
 * Ties in the greedy branch are broken uniformly at random, so an untrained
 * all-zero row explores every direction instead of always picking UP.
 */
export class QLearningAgent extends RLAgent<ObservationState> {
  private readonly qTable: QTable;
  private updateCount = 0;

  constructor(opts: QLearningAgentOptions = {}) {
    super(opts.random ?? createRandom());
    validateAgentHyperparameters(opts);
    if (opts.alpha !== undefined) this.learningRate = opts.alpha;
    if (opts.gamma !== undefined) this.discountFactor = opts.gamma;
    if (opts.epsilon !== undefined) this.epsilon = opts.epsilon;
    if (opts.epsilonDecay !== undefined) this.epsilonDecay = opts.epsilonDecay;
    if (opts.epsilonMin !== undefined) this.minEpsilon = opts.epsilonMin;
    this.qTable = opts.qTable ?? new QTable(N_ACTIONS);
  }

  selectAction(state: ObservationState): ActionChoice {
    if (this.random.next() < this.epsilon) {
      return { action: this.random.int(this.qTable.actionCount), explored: true };
    }
    return { action: argmaxIndex(this.qTable.row(state), this.random), explored: false };
  }

  greedyAction(state: ObservationState): number {
    return argmaxIndex(this.qTable.peek(state), this.random);
  }

  /**
   * One-step TD update. A terminal transition never bootstraps: the target is
   * the reward alone, whatever the next state's row holds.
   */
  update(
    state: ObservationState,
    action: number,
    reward: number,
    nextState: ObservationState,
    done: boolean,
  ): void {
    const row = this.qTable.row(state);
    const bestNext = done ? 0 : maxValue(this.qTable.row(nextState));
    const currentQ = row[action];
    if (currentQ === undefined) {
      throw new RangeError(`action ${action} outside [0, ${row.length})`);
    }
    row[action] =
      currentQ + this.learningRate * (reward + this.discountFactor * bestNext - currentQ);
    this.updateCount++;
  }

  getQTable(): QTable {
    return this.qTable;
  }

  getUpdateCount(): number {
    return this.updateCount;
  }

  getQTableSize(): number {
    return this.qTable.size;
  }
}
