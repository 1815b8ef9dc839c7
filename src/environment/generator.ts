import { ConfigurationError } from "../errors";
import { RandomSource, createRandom } from "../utils/random";
import { CellKind, Grid } from "../types";

export const FREE_SYMBOL = "0";
export const OBSTACLE_SYMBOL = "1";

export interface RandomGridOptions {
  width?: number;
  height?: number;
  /** Chance that an interior cell is free. */
  freeProbability?: number;
  random?: RandomSource;
}

/**
 * Obstacle border with a random interior. Start and goal placement is the
 * caller's concern; use `clearCells` to guarantee they are free.
 */
export function randomGrid(opts: RandomGridOptions = {}): CellKind[][] {
  const width = opts.width ?? 12;
  const height = opts.height ?? 8;
  const freeProbability = opts.freeProbability ?? 0.7;
  const random = opts.random ?? createRandom();
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new ConfigurationError(`grid size must be positive integers, got ${width}x${height}`);
  }
  if (!(freeProbability >= 0 && freeProbability <= 1)) {
    throw new ConfigurationError(`freeProbability must be in [0, 1], got ${freeProbability}`);
  }

  const grid: CellKind[][] = [];
  for (let y = 0; y < height; y++) {
    const row: CellKind[] = [];
    for (let x = 0; x < width; x++) {
      const border = x === 0 || x === width - 1 || y === 0 || y === height - 1;
      if (border) row.push("obstacle");
      else row.push(random.next() < freeProbability ? "free" : "obstacle");
    }
    grid.push(row);
  }
  return grid;
}

/** Copy of `grid` with the given cells forced free. */
export function clearCells(
  grid: Grid,
  cells: ReadonlyArray<{ x: number; y: number }>,
): CellKind[][] {
  const copy = grid.map((row) => [...row]);
  for (const { x, y } of cells) {
    const row = copy[y];
    if (row !== undefined && x >= 0 && x < row.length) row[x] = "free";
  }
  return copy;
}

/**
 * Parse rows of `0` (free) and `1` (obstacle). Blank lines and surrounding
 * whitespace are ignored.
 */
export function parseGrid(text: string): CellKind[][] {
  const lines = text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
  if (lines.length === 0) throw new ConfigurationError("grid text is empty");

  const width = lines[0]?.length ?? 0;
  return lines.map((line, y) => {
    if (line.length !== width) {
      throw new ConfigurationError(
        `grid is not rectangular: line ${y + 1} has ${line.length} cells, expected ${width}`,
      );
    }
    return Array.from(line, (ch, x): CellKind => {
      if (ch === FREE_SYMBOL) return "free";
      if (ch === OBSTACLE_SYMBOL) return "obstacle";
      throw new ConfigurationError(`unexpected symbol "${ch}" at (${x}, ${y})`);
    });
  });
}

export function formatGrid(grid: Grid): string {
  return grid
    .map((row) => row.map((c) => (c === "free" ? FREE_SYMBOL : OBSTACLE_SYMBOL)).join(""))
    .join("\n");
}
