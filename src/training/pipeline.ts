import { RLAgent } from "../agent/base";
import { actionName } from "../agent/encoding";
import { describeFeatures, featurizeDebug } from "../agent/featurizer";
import { QLearningAgent } from "../agent/qLearningAgent";
import { QTable, ReadonlyQTable } from "../agent/qTable";
import {
  AgentConfig,
  AgentConfigOverrides,
  DEFAULT_FEATURIZER_OPTIONS,
  DEFAULT_LEARNING_OPTIONS,
  ENVIRONMENT_OPTION_KEYS,
  EnvironmentOptions,
  FeaturizerOptions,
  LearningOptions,
  resolveConfig,
  validateFeaturizerOptions,
  validateLearningOptions,
} from "../config";
import { ConfigurationError } from "../errors";
import { GridWorld } from "../environment/gridWorld";
import { EpisodeMetrics, ProgressSink, TrainingObserver } from "../observers/types";
import { EpisodeOutcome, ObservationState, outcomeOf } from "../types";
import { RandomSource, createRandom } from "../utils/random";
import { RolloutOptions, RolloutResult, greedyPolicy, runGreedy } from "./rollout";

export type TrainingConfig = Partial<
  Pick<LearningOptions, "episodes" | "maxSteps" | "reportEvery" | "evaluationFrequency">
>;

export interface PipelineOptions {
  featurizer?: FeaturizerOptions;
  /** Step-level progress sink; training runs the same without one. */
  sink?: ProgressSink;
}

export interface TrainingResult<T extends ReadonlyQTable = ReadonlyQTable> {
  qTable: T;
  trainingHistory: EpisodeMetrics[];
  evaluationHistory: EpisodeMetrics[];
  /** The progress sink asked to stop; the table is trained-so-far. */
  stopped: boolean;
}

interface EpisodeRun {
  metrics: EpisodeMetrics;
  stopped: boolean;
}

/**
 * Training controller that connects an RL agent with a grid world and
 * dispatches step/episode events to observers.
 *
 * Per episode: reset, then select / step / update until the episode ends or
 * the step budget runs out, then decay exploration.
 */
export class TrainingPipeline {
  private readonly agent: RLAgent<ObservationState>;
  private readonly environment: GridWorld;
  private readonly featurizer: FeaturizerOptions;
  private readonly sink: ProgressSink | undefined;
  private observers: TrainingObserver[] = [];
  /** Step budget of the last `train()` call. */
  private trainedMaxSteps: number | undefined;

  private trainingHistory: EpisodeMetrics[] = [];
  private evaluationHistory: EpisodeMetrics[] = [];

  constructor(
    agent: RLAgent<ObservationState>,
    environment: GridWorld,
    opts: PipelineOptions = {},
  ) {
    this.agent = agent;
    this.environment = environment;
    this.featurizer = opts.featurizer ?? DEFAULT_FEATURIZER_OPTIONS;
    validateFeaturizerOptions(this.featurizer);
    this.sink = opts.sink;
  }

  /** Register a training observer for episode-level callbacks. */
  addObserver(observer: TrainingObserver): void {
    this.observers.push(observer);
  }

  /** Notify all observers that an episode has completed. */
  notifyObservers(metrics: EpisodeMetrics): void {
    for (const observer of this.observers) {
      observer.onEpisodeComplete(metrics.episode, metrics.totalReward, metrics);
    }
  }

  private async runEpisode(
    episodeNum: number,
    numEpisodes: number,
    maxSteps: number,
    report: boolean,
  ): Promise<EpisodeRun> {
    const env = this.environment;
    env.reset();
    let state = featurizeDebug(env, this.featurizer).state;
    const epsilon = this.agent.getEpsilon();
    const visited = new Set<string>([`${env.position.x},${env.position.y}`]);
    let totalReward = 0;
    let explorationSteps = 0;
    let steps = 0;
    let outcome: EpisodeOutcome = "timeout";
    let stopped = false;

    for (let t = 1; t <= maxSteps; t++) {
      const { action, explored } = this.agent.selectAction(state);
      const { position, reward, done, info } = env.step(action);
      const next = featurizeDebug(env, this.featurizer);

      this.agent.update(state, action, reward, next.state, done);

      steps = t;
      totalReward += reward;
      if (explored) explorationSteps++;
      visited.add(`${position.x},${position.y}`);

      if (report && this.sink) {
        const keepGoing = await this.sink.report(
          `TRAIN  ep ${episodeNum}/${numEpisodes}  t ${t}/${maxSteps}  ` +
            `a=${actionName(action)} (${explored ? "explore" : "exploit"})  ` +
            `r=${reward.toFixed(3)}  total=${totalReward.toFixed(2)}  eps=${epsilon.toFixed(3)}`,
          undefined,
          describeFeatures(next),
        );
        if (!keepGoing) {
          stopped = true;
          outcome = done ? outcomeOf(info) : "stopped";
          break;
        }
      }

      state = next.state;
      if (done) {
        outcome = outcomeOf(info);
        break;
      }
    }

    return {
      metrics: {
        episode: episodeNum,
        totalReward,
        steps,
        outcome,
        epsilon,
        qTableSize: this.agent.getQTable().size,
        explorationSteps,
        uniqueCells: visited.size,
        isEvaluation: false,
      },
      stopped,
    };
  }

  /** Run N training episodes with optional periodic greedy evaluation. */
  async train(config: TrainingConfig = {}): Promise<TrainingResult> {
    const learning: LearningOptions = { ...DEFAULT_LEARNING_OPTIONS, ...config };
    validateLearningOptions(learning);
    const { episodes, maxSteps, reportEvery, evaluationFrequency } = learning;
    this.trainedMaxSteps = maxSteps;

    this.trainingHistory = [];
    this.evaluationHistory = [];
    let stopped = false;

    for (let episode = 1; episode <= episodes; episode++) {
      const run = await this.runEpisode(
        episode,
        episodes,
        maxSteps,
        episode % reportEvery === 0,
      );
      this.trainingHistory.push(run.metrics);
      this.notifyObservers(run.metrics);

      if (run.stopped) {
        stopped = true;
        break;
      }

      // Episode end hook: epsilon schedule
      this.agent.onEpisodeEnd(episode);

      if (evaluationFrequency > 0 && episode % evaluationFrequency === 0) {
        const rollout = await runGreedy(this.environment, this.agent, {
          maxSteps,
          featurizer: this.featurizer,
        });
        const evalMetrics = toEpisodeMetrics(
          episode,
          rollout,
          this.agent.getEpsilon(),
          this.agent.getQTable().size,
        );
        this.evaluationHistory.push(evalMetrics);
        this.notifyObservers(evalMetrics);
      }
    }

    return {
      qTable: this.agent.getQTable(),
      trainingHistory: this.trainingHistory,
      evaluationHistory: this.evaluationHistory,
      stopped,
    };
  }

  /**
   * Greedy rollout of the current policy; reports to the pipeline's sink.
   * The step budget defaults to the one the agent was last trained with.
   */
  async greedyRun(opts: RolloutOptions = {}): Promise<RolloutResult> {
    const sink = opts.sink ?? this.sink;
    return runGreedy(this.environment, this.agent, {
      maxSteps: opts.maxSteps ?? this.trainedMaxSteps ?? DEFAULT_LEARNING_OPTIONS.maxSteps,
      featurizer: opts.featurizer ?? this.featurizer,
      ...(sink ? { sink } : {}),
    });
  }

  /** Get training history for analysis. */
  getTrainingHistory(): EpisodeMetrics[] {
    return this.trainingHistory;
  }

  /** Get evaluation history for analysis. */
  getEvaluationHistory(): EpisodeMetrics[] {
    return this.evaluationHistory;
  }
}

function toEpisodeMetrics(
  episode: number,
  rollout: RolloutResult,
  epsilon: number,
  qTableSize: number,
): EpisodeMetrics {
  return {
    episode,
    totalReward: rollout.totalReward,
    steps: rollout.steps,
    outcome: rollout.outcome,
    epsilon,
    qTableSize,
    explorationSteps: 0,
    uniqueCells: rollout.uniqueCells,
    isEvaluation: true,
  };
}

export interface QLearningOptions {
  config?: AgentConfigOverrides;
  sink?: ProgressSink;
  observers?: TrainingObserver[];
  /** Overrides the seeded source built from `config.seed`. */
  random?: RandomSource;
}

/**
 * The GridWorld already owns its shaping options; an override that names a
 * different value would be silently ignored, so it is rejected instead.
 */
function checkEnvironmentOverrides(
  env: GridWorld,
  overrides: Partial<EnvironmentOptions> | undefined,
): void {
  if (overrides === undefined) return;
  for (const key of ENVIRONMENT_OPTION_KEYS) {
    const wanted = overrides[key];
    if (wanted !== undefined && wanted !== env.options[key]) {
      throw new ConfigurationError(
        `environment.${key} is ${String(wanted)} but the grid world was built with ` +
          `${String(env.options[key])}; pass it to the GridWorld constructor instead`,
      );
    }
  }
}

/**
 * Train a fresh tabular agent on `env` and return its Q-table.
 *
 * Environment shaping comes from the GridWorld itself; `config.environment`
 * may only repeat its values. `config.learning` and `config.featurizer` drive
 * the loop.
 */
export async function qLearning(
  env: GridWorld,
  opts: QLearningOptions = {},
): Promise<TrainingResult<QTable>> {
  const config: AgentConfig = resolveConfig(opts.config);
  checkEnvironmentOverrides(env, opts.config?.environment);
  const random = opts.random ?? createRandom(config.seed);
  const agent = new QLearningAgent({ ...config.learning, random });
  const pipeline = new TrainingPipeline(agent, env, {
    featurizer: config.featurizer,
    ...(opts.sink ? { sink: opts.sink } : {}),
  });
  for (const o of opts.observers ?? []) pipeline.addObserver(o);
  const result = await pipeline.train(config.learning);
  return { ...result, qTable: agent.getQTable() };
}

export interface GreedyRunOptions extends RolloutOptions {
  random?: RandomSource;
  seed?: string;
}

/** Greedy evaluation of a learned table. Never modifies it. */
export async function greedyRun(
  env: GridWorld,
  qTable: ReadonlyQTable,
  opts: GreedyRunOptions = {},
): Promise<RolloutResult> {
  const { random, seed, ...rollout } = opts;
  return runGreedy(env, greedyPolicy(qTable, random ?? createRandom(seed)), rollout);
}
