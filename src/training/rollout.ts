import { ACTION_NAMES, actionName } from "../agent/encoding";
import { describeFeatures, featurizeDebug } from "../agent/featurizer";
import { ReadonlyQTable } from "../agent/qTable";
import {
  DEFAULT_FEATURIZER_OPTIONS,
  DEFAULT_LEARNING_OPTIONS,
  FeaturizerOptions,
  validateFeaturizerOptions,
} from "../config";
import { GridWorld } from "../environment/gridWorld";
import { ProgressSink } from "../observers/types";
import { EpisodeOutcome, ObservationState, outcomeOf } from "../types";
import { argmaxIndex } from "../utils/math";
import { RandomSource, createRandom } from "../utils/random";

/** Anything that can pick the greedy action for an observation. */
export interface GreedyPolicy {
  greedyAction(state: ObservationState): number;
}

export interface RolloutOptions {
  maxSteps?: number;
  featurizer?: FeaturizerOptions;
  sink?: ProgressSink;
}

export interface RolloutResult {
  totalReward: number;
  /** True only when the episode ended by reaching the goal. */
  success: boolean;
  steps: number;
  outcome: EpisodeOutcome;
  actions: number[];
  uniqueCells: number;
  /**
   * The progress sink asked to stop before the episode ended. A stop on the
   * step that ends the episode keeps that step's outcome.
   */
  stopped: boolean;
}

/** Argmax over a read-only table, ties broken by `random`. */
export function greedyPolicy(
  qTable: ReadonlyQTable,
  random: RandomSource = createRandom(),
): GreedyPolicy {
  return {
    greedyAction: (state) => argmaxIndex(qTable.peek(state), random),
  };
}

/**
 * Deterministic evaluation pass: argmax actions, no learning updates.
 */
export async function runGreedy(
  env: GridWorld,
  policy: GreedyPolicy,
  opts: RolloutOptions = {},
): Promise<RolloutResult> {
  const maxSteps = opts.maxSteps ?? DEFAULT_LEARNING_OPTIONS.maxSteps;
  const featurizer = opts.featurizer ?? DEFAULT_FEATURIZER_OPTIONS;
  validateFeaturizerOptions(featurizer);
  const sink = opts.sink;
  let sinkStopped = false;

  env.reset();
  const visited = new Set<string>([`${env.position.x},${env.position.y}`]);
  const actions: number[] = [];
  let totalReward = 0;
  let outcome: EpisodeOutcome = "timeout";

  for (let t = 1; t <= maxSteps; t++) {
    const features = featurizeDebug(env, featurizer);
    const a = policy.greedyAction(features.state);
    const { position, reward, done, info } = env.step(a);
    actions.push(a);
    totalReward += reward;
    visited.add(`${position.x},${position.y}`);
    if (done) outcome = outcomeOf(info);

    if (sink) {
      const keepGoing = await sink.report(
        `GREEDY  t ${t}/${maxSteps}  a=${actionName(a)}  r=${reward.toFixed(3)}  total=${totalReward.toFixed(2)}`,
        undefined,
        describeFeatures(featurizeDebug(env, featurizer)),
      );
      if (!keepGoing && !done) {
        return {
          totalReward,
          success: false,
          steps: t,
          outcome: "stopped",
          actions,
          uniqueCells: visited.size,
          stopped: true,
        };
      }
      sinkStopped = !keepGoing;
    }

    if (done) break;
  }

  const steps = actions.length;
  if (sink && !sinkStopped) {
    await sink.report(
      outcome === "goal"
        ? `Reached goal in ${steps} steps. Total reward=${totalReward.toFixed(2)}`
        : `Rollout ended (${outcome}) after ${steps} steps. Total reward=${totalReward.toFixed(2)}`,
      `actions: ${actions.map((a) => ACTION_NAMES[a] ?? a).join(" ")}`,
    );
  }

  return {
    totalReward,
    success: outcome === "goal",
    steps,
    outcome,
    actions,
    uniqueCells: visited.size,
    stopped: false,
  };
}
