// Barrel exports for the library API

// Core types
export {
  CellKind,
  Grid,
  Position,
  StepInfo,
  StepResult,
  ObservationState,
  TerminationPolicy,
  TilePooling,
  EpisodeOutcome,
} from "./types";
export { ConfigurationError } from "./errors";

// Configuration
export {
  AgentConfig,
  AgentConfigOverrides,
  EnvironmentOptions,
  FeaturizerOptions,
  LearningOptions,
  DEFAULT_ENVIRONMENT_OPTIONS,
  DEFAULT_FEATURIZER_OPTIONS,
  DEFAULT_LEARNING_OPTIONS,
  resolveConfig,
  validateConfig,
} from "./config";

// Environment
export { GridWorld, GridView } from "./environment/gridWorld";
export { PheromoneField, PheromoneOptions } from "./environment/pheromone";
export {
  randomGrid,
  clearCells,
  parseGrid,
  formatGrid,
} from "./environment/generator";

// Agent
export { RLAgent, ActionChoice } from "./agent/base";
export { QLearningAgent, QLearningAgentOptions } from "./agent/qLearningAgent";
export { QTable, ReadonlyQTable } from "./agent/qTable";
export {
  featurize,
  featurizeDebug,
  describeFeatures,
  quadrantOffsets,
  FeatureBreakdown,
} from "./agent/featurizer";
export {
  ACTIONS,
  ACTION_NAMES,
  N_ACTIONS,
  actionDelta,
  actionName,
  isValidAction,
  stateToKey,
} from "./agent/encoding";

// Training
export {
  TrainingPipeline,
  TrainingConfig,
  TrainingResult,
  qLearning,
  greedyRun,
} from "./training/pipeline";
export { runGreedy, greedyPolicy, GreedyPolicy, RolloutResult } from "./training/rollout";

// Observers
export { ConsoleLogger } from "./observers/consoleLogger";
export { MetricsCollector } from "./observers/metricsCollector";
export { DiagnosticLogger } from "./observers/diagnosticLogger";
export { ConsoleRenderer } from "./observers/consoleRenderer";
export { EpisodeMetrics, ProgressSink, TrainingObserver } from "./observers/types";

// Utilities
export { argmaxIndex, softmax, normalize, bucketize } from "./utils/math";
export { RandomSource, createRandom } from "./utils/random";
