#!/usr/bin/env node
/**
 * @fileoverview Command-line entry point for the pheromone grid navigator.
 *
 * Builds (or loads) a grid, trains a tabular Q-learning agent on it with
 * pheromone-based loop avoidance, then demonstrates the greedy policy.
 *
 * @example
 * // CLI usage: node dist/src/main.js --episodes=300 --seed=42 --visualize=true
 * // Environment: EPISODES=300 SEED=42 VISUALIZE=true node dist/src/main.js
 */

import { readFileSync } from "fs";
import {
  AgentConfig,
  AgentConfigOverrides,
  EnvironmentOptions,
  FeaturizerOptions,
  LearningOptions,
  resolveConfig,
} from "./config";
import { ConfigurationError } from "./errors";
import { clearCells, parseGrid, randomGrid } from "./environment/generator";
import { GridWorld } from "./environment/gridWorld";
import { ConsoleLogger } from "./observers/consoleLogger";
import { ConsoleRenderer } from "./observers/consoleRenderer";
import { DiagnosticLogger } from "./observers/diagnosticLogger";
import { MetricsCollector } from "./observers/metricsCollector";
import { TrainingObserver } from "./observers/types";
import { greedyRun, qLearning } from "./training/pipeline";
import { CellKind, Position, TerminationPolicy, TilePooling } from "./types";
import { createRandom } from "./utils/random";

/**
 * Parsed command-line arguments and environment variables
 */
export interface ParsedArgs {
  config: AgentConfig;
  /** Grid size and density when generating a random grid. */
  width: number;
  height: number;
  freeProbability: number;
  /** Text grid of 0/1 rows; overrides random generation. */
  gridFile?: string;
  start?: Position;
  goal?: Position;
  /** Draw every reported step to the terminal. */
  visualize: boolean;
  delayMs: number;
  /** Print a per-episode line every N episodes. */
  logEvery: number;
  diagnostics: boolean;
  /** Skip the greedy demonstration after training. */
  noDemo: boolean;
}

type Env = Record<string, string | undefined>;

function parseNumber(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw === "") return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return n;
}

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === "") return fallback;
  return ["1", "true", "yes", "on"].includes(raw.toLowerCase());
}

export function parsePosition(name: string, raw: string | undefined): Position | undefined {
  if (raw === undefined || raw === "") return undefined;
  const m = /^\s*(-?\d+)\s*,\s*(-?\d+)\s*$/.exec(raw);
  if (!m) throw new ConfigurationError(`${name} must look like "x,y", got "${raw}"`);
  return { x: Number(m[1]), y: Number(m[2]) };
}

function parseThresholds(raw: string | undefined): number[] | undefined {
  if (raw === undefined || raw === "") return undefined;
  return raw.split(",").map((s, i) => {
    const n = parseNumber(`thresholds[${i}]`, s.trim());
    if (n === undefined) throw new ConfigurationError(`thresholds[${i}] is empty`);
    return n;
  });
}

function parseChoice<T extends string>(
  name: string,
  raw: string | undefined,
  allowed: readonly T[],
): T | undefined {
  if (raw === undefined || raw === "") return undefined;
  const match = allowed.find((a) => a === raw);
  if (match === undefined) {
    throw new ConfigurationError(`${name} must be one of ${allowed.join(", ")}, got "${raw}"`);
  }
  return match;
}

/** Partial options that only receive keys with a value. */
function collector<T>(): {
  out: Partial<T>;
  set: <K extends keyof T>(key: K, value: T[K] | undefined) => void;
} {
  const out: Partial<T> = {};
  return {
    out,
    set: (key, value) => {
      if (value !== undefined) out[key] = value;
    },
  };
}

/**
 * Parse `--name=value` flags with environment-variable fallbacks. CLI flags
 * take precedence over environment variables.
 */
export function parseArgs(
  argv: readonly string[] = process.argv.slice(2),
  env: Env = process.env,
): ParsedArgs {
  const getArg = (name: string): string | undefined => {
    const p = argv.find((a) => a.startsWith(`--${name}=`));
    return p ? p.slice(name.length + 3) : undefined;
  };
  const num = (flag: string, envName: string) =>
    parseNumber(flag, getArg(flag) ?? env[envName]);
  const str = (flag: string, envName: string) => getArg(flag) ?? env[envName];
  const bool = (flag: string, envName: string, fallback: boolean) =>
    parseBool(getArg(flag) ?? (argv.includes(`--${flag}`) ? "true" : env[envName]), fallback);

  const environment = collector<EnvironmentOptions>();
  environment.set("pheromoneDecay", num("pheromoneDecay", "PHER_DECAY"));
  environment.set("pheromoneDepositRate", num("depositRate", "PHER_DEPOSIT"));
  environment.set("pheromonePenalty", num("pheromonePenalty", "PHER_PENALTY"));
  environment.set("obstaclePenalty", num("obstaclePenalty", "OBSTACLE_PENALTY"));
  environment.set("wallPenalty", num("wallPenalty", "WALL_PENALTY"));
  environment.set("goalBonus", num("goalBonus", "GOAL_BONUS"));
  environment.set(
    "terminationPolicy",
    parseChoice<TerminationPolicy>("termination", str("termination", "TERMINATION"), [
      "collision",
      "goalOnly",
    ]),
  );

  const featurizer = collector<FeaturizerOptions>();
  featurizer.set("visionRadius", num("visionRadius", "VISION_RADIUS"));
  featurizer.set("thresholds", parseThresholds(str("thresholds", "THRESHOLDS")));
  featurizer.set(
    "tilePooling",
    parseChoice<TilePooling>("tilePooling", str("tilePooling", "TILE_POOLING"), [
      "softmax",
      "ratio",
    ]),
  );
  const bucketize = parseChoice("bucketize", str("bucketize", "BUCKETIZE"), [
    "all",
    "tiles",
    "pheromones",
    "none",
  ]);
  if (bucketize !== undefined) {
    featurizer.set("bucketizeTiles", bucketize === "all" || bucketize === "tiles");
    featurizer.set("bucketizePheromones", bucketize === "all" || bucketize === "pheromones");
  }

  const learning = collector<LearningOptions>();
  learning.set("episodes", num("episodes", "EPISODES"));
  learning.set("maxSteps", num("maxSteps", "MAX_STEPS"));
  learning.set("alpha", num("alpha", "ALPHA"));
  learning.set("gamma", num("gamma", "GAMMA"));
  learning.set("epsilon", num("epsilon", "EPSILON"));
  learning.set("epsilonDecay", num("epsilonDecay", "EPS_DECAY"));
  learning.set("epsilonMin", num("epsilonMin", "EPS_MIN"));
  learning.set("reportEvery", num("reportEvery", "REPORT_EVERY"));
  learning.set("evaluationFrequency", num("evalEvery", "EVAL_EVERY"));

  const overrides: AgentConfigOverrides = {
    environment: environment.out,
    featurizer: featurizer.out,
    learning: learning.out,
  };
  const seed = str("seed", "SEED");
  if (seed !== undefined && seed !== "") overrides.seed = seed;

  const gridFile = str("grid", "GRID_FILE");
  const start = parsePosition("start", str("start", "START"));
  const goal = parsePosition("goal", str("goal", "GOAL"));

  return {
    config: resolveConfig(overrides),
    width: num("width", "WIDTH") ?? 24,
    height: num("height", "HEIGHT") ?? 16,
    freeProbability: num("freeProb", "FREE_PROB") ?? 0.72,
    ...(gridFile ? { gridFile } : {}),
    ...(start ? { start } : {}),
    ...(goal ? { goal } : {}),
    visualize: bool("visualize", "VISUALIZE", false),
    delayMs: num("delayMs", "DELAY_MS") ?? 20,
    logEvery: num("logEvery", "LOG_EVERY") ?? 10,
    diagnostics: bool("diagnostics", "DIAGNOSTICS", false),
    noDemo: bool("no-demo", "NO_DEMO", false),
  };
}

/** Load or generate the grid, keeping start and goal free on generated maps. */
export function buildEnvironment(args: ParsedArgs): GridWorld {
  let grid: CellKind[][];
  if (args.gridFile) {
    grid = parseGrid(readFileSync(args.gridFile, "utf8"));
  } else {
    grid = randomGrid({
      width: args.width,
      height: args.height,
      freeProbability: args.freeProbability,
      random: createRandom(args.config.seed === undefined ? undefined : `grid:${args.config.seed}`),
    });
  }
  const height = grid.length;
  const width = grid[0]?.length ?? 0;
  const start = args.start ?? { x: 1, y: 1 };
  const goal = args.goal ?? { x: width - 2, y: height - 2 };
  if (!args.gridFile) grid = clearCells(grid, [start, goal]);
  return new GridWorld(grid, start, goal, args.config.environment);
}

function printBanner(): void {
  console.log("=".repeat(60));
  console.log("PHEROMONE GRID NAVIGATOR (tabular Q-learning)");
  console.log("=".repeat(60));
}

async function main(): Promise<void> {
  printBanner();
  const args = parseArgs();
  const { config } = args;
  const env = buildEnvironment(args);

  console.log(
    `Grid ${env.width}x${env.height}, start (${env.start.x}, ${env.start.y}), ` +
      `goal (${env.goal.x}, ${env.goal.y}), termination=${env.options.terminationPolicy}`,
  );
  console.log(
    `Training for ${config.learning.episodes} episodes ` +
      `(max ${config.learning.maxSteps} steps, seed=${config.seed ?? "none"})\n`,
  );

  const renderer = args.visualize
    ? new ConsoleRenderer(env, { delayMs: args.delayMs, clearScreen: true })
    : undefined;
  process.once("SIGINT", () => {
    if (renderer) renderer.stop();
    else process.exit(130);
  });

  const metrics = new MetricsCollector();
  const observers: TrainingObserver[] = [new ConsoleLogger(args.logEvery), metrics];
  if (args.diagnostics) observers.push(new DiagnosticLogger(args.logEvery));

  const result = await qLearning(env, {
    config,
    observers,
    ...(renderer ? { sink: renderer } : {}),
  });
  metrics.printSummary();
  console.log(`Q-table states: ${result.qTable.size}`);
  if (result.stopped) console.log("Training stopped early by the viewer.");

  if (!args.noDemo && !result.stopped) {
    console.log("\nDemonstrating learned policy...\n");
    const rollout = await greedyRun(env, result.qTable, {
      maxSteps: config.learning.maxSteps,
      featurizer: config.featurizer,
      ...(config.seed !== undefined ? { seed: `greedy:${config.seed}` } : {}),
      ...(renderer ? { sink: renderer } : {}),
    });
    console.log(
      `Greedy run: ${rollout.success ? "reached goal" : `ended by ${rollout.outcome}`} ` +
        `in ${rollout.steps} steps, total reward ${rollout.totalReward.toFixed(2)}`,
    );
  }

  await renderer?.close();
}

// Execute main function if this file is run directly (not imported)
if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}

// Export main function for programmatic usage
export { main };
