/**
 * Configuration surface for the environment, featurizer and learner.
 *
 * Every tunable lives here with a named default. The historical reward-shaping
 * variants (plain vs softmax tile pooling, bucketized vs raw observations,
 * goal-only vs collision termination) are options, not forks of the code.
 */

import { ConfigurationError } from "./errors";
import { TerminationPolicy, TilePooling } from "./types";

export interface EnvironmentOptions {
  /** Multiplier applied to every pheromone cell each step, in (0, 1). */
  pheromoneDecay: number;
  /** Fraction of the remaining headroom deposited on the occupied cell, in [0, 1]. */
  pheromoneDepositRate: number;
  /** Weight of the loop-avoidance penalty `-w * P[cell]`. */
  pheromonePenalty: number;
  /** Reward added when the occupied cell is an obstacle (<= 0). */
  obstaclePenalty: number;
  /** Reward added when a move would leave the grid (<= 0). */
  wallPenalty: number;
  /** Terminal bonus for reaching the goal. */
  goalBonus: number;
  terminationPolicy: TerminationPolicy;
}

export interface FeaturizerOptions {
  /** Quadrant extent around the agent; 1 gives four 2x2 blocks. */
  visionRadius: number;
  /** Ascending bucket thresholds; N thresholds give N+1 buckets. */
  thresholds: readonly number[];
  tilePooling: TilePooling;
  bucketizeTiles: boolean;
  bucketizePheromones: boolean;
}

export interface LearningOptions {
  episodes: number;
  maxSteps: number;
  /** Learning rate. */
  alpha: number;
  /** Discount factor. */
  gamma: number;
  /** Initial exploration rate. */
  epsilon: number;
  epsilonDecay: number;
  epsilonMin: number;
  /** Send step reports to the progress sink on every Nth episode. */
  reportEvery: number;
  /** Run a greedy evaluation every N episodes; 0 disables. */
  evaluationFrequency: number;
}

export interface AgentConfig {
  environment: EnvironmentOptions;
  featurizer: FeaturizerOptions;
  learning: LearningOptions;
  /** Seed for exploration, tie-breaks and grid generation. */
  seed?: string;
}

export type AgentConfigOverrides = {
  environment?: Partial<EnvironmentOptions>;
  featurizer?: Partial<FeaturizerOptions>;
  learning?: Partial<LearningOptions>;
  seed?: string;
};

export const DEFAULT_ENVIRONMENT_OPTIONS = {
  pheromoneDecay: 0.97,
  pheromoneDepositRate: 0.6,
  pheromonePenalty: 1.0,
  obstaclePenalty: -1.0,
  wallPenalty: -1.0,
  goalBonus: 50,
  terminationPolicy: "collision",
} as const satisfies EnvironmentOptions;

export const ENVIRONMENT_OPTION_KEYS: readonly (keyof EnvironmentOptions)[] = [
  "pheromoneDecay",
  "pheromoneDepositRate",
  "pheromonePenalty",
  "obstaclePenalty",
  "wallPenalty",
  "goalBonus",
  "terminationPolicy",
];

export const DEFAULT_FEATURIZER_OPTIONS = {
  visionRadius: 1,
  thresholds: [0.2, 0.4, 0.6, 0.8],
  tilePooling: "softmax",
  bucketizeTiles: true,
  bucketizePheromones: true,
} as const satisfies FeaturizerOptions;

export const DEFAULT_LEARNING_OPTIONS = {
  episodes: 220,
  maxSteps: 300,
  alpha: 0.2,
  gamma: 0.95,
  epsilon: 0.4,
  epsilonDecay: 0.995,
  epsilonMin: 0.01,
  reportEvery: 1,
  evaluationFrequency: 0,
} as const satisfies LearningOptions;

function requireRange(
  name: string,
  value: number,
  min: number,
  max: number,
  { minExclusive = false, maxExclusive = false } = {},
): void {
  const belowMin = minExclusive ? value <= min : value < min;
  const aboveMax = maxExclusive ? value >= max : value > max;
  if (!Number.isFinite(value) || belowMin || aboveMax) {
    const lo = minExclusive ? "(" : "[";
    const hi = maxExclusive ? ")" : "]";
    throw new ConfigurationError(
      `${name} must be in ${lo}${min}, ${max}${hi}, got ${value}`,
    );
  }
}

function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(
      `${name} must be an integer >= ${min}, got ${value}`,
    );
  }
}

export function validateEnvironmentOptions(o: EnvironmentOptions): void {
  requireRange("pheromoneDecay", o.pheromoneDecay, 0, 1, {
    minExclusive: true,
    maxExclusive: true,
  });
  requireRange("pheromoneDepositRate", o.pheromoneDepositRate, 0, 1);
  requireRange("pheromonePenalty", o.pheromonePenalty, 0, Infinity);
  requireRange("obstaclePenalty", o.obstaclePenalty, -Infinity, 0);
  requireRange("wallPenalty", o.wallPenalty, -Infinity, 0);
  if (!Number.isFinite(o.goalBonus)) {
    throw new ConfigurationError(`goalBonus must be finite, got ${o.goalBonus}`);
  }
  if (o.terminationPolicy !== "collision" && o.terminationPolicy !== "goalOnly") {
    throw new ConfigurationError(
      `terminationPolicy must be "collision" or "goalOnly", got "${String(o.terminationPolicy)}"`,
    );
  }
}

export function validateFeaturizerOptions(o: FeaturizerOptions): void {
  requireInteger("visionRadius", o.visionRadius, 1);
  if (o.thresholds.length === 0) {
    throw new ConfigurationError("thresholds must not be empty");
  }
  for (let i = 0; i < o.thresholds.length; i++) {
    const t = o.thresholds[i];
    const prev = i > 0 ? o.thresholds[i - 1] : undefined;
    if (t === undefined || !Number.isFinite(t)) {
      throw new ConfigurationError(`thresholds[${i}] must be a finite number`);
    }
    if (prev !== undefined && t <= prev) {
      throw new ConfigurationError("thresholds must be strictly ascending");
    }
  }
  if (o.tilePooling !== "softmax" && o.tilePooling !== "ratio") {
    throw new ConfigurationError(
      `tilePooling must be "softmax" or "ratio", got "${String(o.tilePooling)}"`,
    );
  }
}

export function validateLearningOptions(o: LearningOptions): void {
  requireInteger("episodes", o.episodes, 0);
  requireInteger("maxSteps", o.maxSteps, 1);
  validateAgentHyperparameters(o);
  requireInteger("reportEvery", o.reportEvery, 1);
  requireInteger("evaluationFrequency", o.evaluationFrequency, 0);
}

export type AgentHyperparameters = Partial<
  Pick<LearningOptions, "alpha" | "gamma" | "epsilon" | "epsilonDecay" | "epsilonMin">
>;

/** Range checks for the agent's own knobs; absent values are skipped. */
export function validateAgentHyperparameters(o: AgentHyperparameters): void {
  if (o.alpha !== undefined) requireRange("alpha", o.alpha, 0, 1, { minExclusive: true });
  if (o.gamma !== undefined) requireRange("gamma", o.gamma, 0, 1);
  if (o.epsilon !== undefined) requireRange("epsilon", o.epsilon, 0, 1);
  if (o.epsilonDecay !== undefined) {
    requireRange("epsilonDecay", o.epsilonDecay, 0, 1, { minExclusive: true });
  }
  if (o.epsilonMin !== undefined) requireRange("epsilonMin", o.epsilonMin, 0, 1);
}

export function validateConfig(config: AgentConfig): void {
  validateEnvironmentOptions(config.environment);
  validateFeaturizerOptions(config.featurizer);
  validateLearningOptions(config.learning);
}

/** Merge overrides onto the defaults and validate the result. */
export function resolveConfig(overrides: AgentConfigOverrides = {}): AgentConfig {
  const config: AgentConfig = {
    environment: { ...DEFAULT_ENVIRONMENT_OPTIONS, ...overrides.environment },
    featurizer: { ...DEFAULT_FEATURIZER_OPTIONS, ...overrides.featurizer },
    learning: { ...DEFAULT_LEARNING_OPTIONS, ...overrides.learning },
    ...(overrides.seed !== undefined ? { seed: overrides.seed } : {}),
  };
  validateConfig(config);
  return config;
}
