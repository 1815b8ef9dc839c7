import { actionDelta } from "../agent/encoding";
import {
  DEFAULT_ENVIRONMENT_OPTIONS,
  EnvironmentOptions,
  validateEnvironmentOptions,
} from "../config";
import { ConfigurationError } from "../errors";
import { clamp } from "../utils/math";
import {
  CellKind,
  Grid,
  Position,
  StepInfo,
  StepResult,
  samePosition,
} from "../types";
import { PheromoneField } from "./pheromone";

/**
 * Read-only view of the world used by the featurizer and renderers.
 */
export interface GridView {
  readonly width: number;
  readonly height: number;
  readonly position: Position;
  readonly start: Position;
  readonly goal: Position;
  inBounds(x: number, y: number): boolean;
  cellAt(x: number, y: number): CellKind;
  pheromoneAt(x: number, y: number): number;
}

function checkGrid(grid: Grid): { width: number; height: number } {
  const height = grid.length;
  const firstRow = grid[0];
  if (height === 0 || firstRow === undefined || firstRow.length === 0) {
    throw new ConfigurationError("grid must have at least one row and one column");
  }
  const width = firstRow.length;
  grid.forEach((row, y) => {
    if (row.length !== width) {
      throw new ConfigurationError(
        `grid is not rectangular: row ${y} has ${row.length} cells, expected ${width}`,
      );
    }
    row.forEach((cell, x) => {
      if (cell !== "free" && cell !== "obstacle") {
        throw new ConfigurationError(`unknown cell kind "${String(cell)}" at (${x}, ${y})`);
      }
    });
  });
  return { width, height };
}

/**
 * Grid navigation environment with pheromone-based loop avoidance.
 *
 * Owns the static grid, the agent position and the pheromone field. Nothing
 * outside this instance is touched by `reset()` or `step()`.
 */
export class GridWorld implements GridView {
  readonly width: number;
  readonly height: number;
  readonly start: Position;
  readonly goal: Position;
  readonly options: Readonly<EnvironmentOptions>;

  private readonly grid: Grid;
  private readonly pheromones: PheromoneField;
  private pos: Position;

  constructor(
    grid: Grid,
    start: Position,
    goal: Position,
    opts: Partial<EnvironmentOptions> = {},
  ) {
    const { width, height } = checkGrid(grid);
    this.width = width;
    this.height = height;
    for (const [label, p] of [
      ["start", start],
      ["goal", goal],
    ] as const) {
      if (!Number.isInteger(p.x) || !Number.isInteger(p.y) || !this.inBounds(p.x, p.y)) {
        throw new ConfigurationError(
          `${label} (${p.x}, ${p.y}) is outside the ${width}x${height} grid`,
        );
      }
    }

    const options: EnvironmentOptions = { ...DEFAULT_ENVIRONMENT_OPTIONS, ...opts };
    validateEnvironmentOptions(options);
    this.options = Object.freeze(options);

    this.grid = Object.freeze(grid.map((row) => Object.freeze([...row])));
    this.start = { x: start.x, y: start.y };
    this.goal = { x: goal.x, y: goal.y };
    this.pheromones = new PheromoneField(width, height, {
      decay: options.pheromoneDecay,
      depositRate: options.pheromoneDepositRate,
    });
    this.pos = this.start;
  }

  get position(): Position {
    return this.pos;
  }

  inBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  cellAt(x: number, y: number): CellKind {
    const cell = this.grid[y]?.[x];
    if (cell === undefined) {
      throw new RangeError(`cell (${x}, ${y}) outside ${this.width}x${this.height}`);
    }
    return cell;
  }

  pheromoneAt(x: number, y: number): number {
    return this.pheromones.valueAt(x, y);
  }

  pheromoneSnapshot(): number[][] {
    return this.pheromones.snapshot();
  }

  isAtGoal(): boolean {
    return samePosition(this.pos, this.goal);
  }

  reset(): Position {
    this.pos = this.start;
    this.pheromones.reset();
    return this.pos;
  }

  step(action: number): StepResult {
    const { dx, dy } = actionDelta(action);
    const tx = this.pos.x + dx;
    const ty = this.pos.y + dy;

    const hitWall = !this.inBounds(tx, ty);
    this.pos = hitWall
      ? { x: clamp(tx, 0, this.width - 1), y: clamp(ty, 0, this.height - 1) }
      : { x: tx, y: ty };
    const { x, y } = this.pos;

    const hitObstacle = this.cellAt(x, y) === "obstacle";
    let reward = hitObstacle ? this.options.obstaclePenalty : 0;
    if (hitWall) reward += this.options.wallPenalty;

    this.pheromones.step(x, y);
    reward -= this.options.pheromonePenalty * this.pheromones.valueAt(x, y);

    const reachedGoal = samePosition(this.pos, this.goal);
    if (reachedGoal) reward += this.options.goalBonus;

    const info: StepInfo = { hitWall, hitObstacle, reachedGoal };
    const done =
      this.options.terminationPolicy === "collision"
        ? reachedGoal || hitWall || hitObstacle
        : reachedGoal;

    return { position: this.pos, reward, done, info };
  }
}
