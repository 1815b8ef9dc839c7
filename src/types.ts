/**
 * Core domain types shared by the environment, featurizer and learner.
 *
 * Keep these stable: the observation tuple is used verbatim as the Q-table
 * key, so changing its arity or ordering invalidates any learned table.
 */

export type CellKind = "free" | "obstacle";

/** Row-major grid: `grid[y][x]`, y grows downward. */
export type Grid = ReadonlyArray<ReadonlyArray<CellKind>>;

export interface Position {
  readonly x: number;
  readonly y: number;
}

/** Why the environment flagged a step, for termination-reason reporting. */
export interface StepInfo {
  hitWall: boolean;
  hitObstacle: boolean;
  reachedGoal: boolean;
}

export interface StepResult {
  position: Position;
  reward: number;
  done: boolean;
  info: StepInfo;
}

/**
 * Which events end an episode.
 *
 * - "collision": goal, wall bump or obstacle entry all terminate.
 * - "goalOnly": only the goal terminates; walls clamp and obstacles are
 *   entered with their penalty.
 */
export type TerminationPolicy = "collision" | "goalOnly";

/** How the four tile averages become relative strengths. */
export type TilePooling = "softmax" | "ratio";

/**
 * Local observation: [tileUL, tileUR, tileDR, tileDL, pherUL, pherUR,
 * pherDR, pherDL]. Each component is a bucket index or a raw strength.
 */
export type ObservationState = readonly [
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
];

/** How an episode or rollout ended. */
export type EpisodeOutcome = "goal" | "wall" | "obstacle" | "timeout" | "stopped";

export function outcomeOf(info: StepInfo): EpisodeOutcome {
  if (info.reachedGoal) return "goal";
  if (info.hitWall) return "wall";
  if (info.hitObstacle) return "obstacle";
  return "timeout";
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}
