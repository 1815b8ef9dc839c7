/**
 * Local observation featurizer.
 *
 * Pools the neighbourhood around the agent into four quadrant averages for
 * tiles and pheromones, turns each set into relative strengths that sum to 1,
 * and (optionally) bucketizes them into a small discrete state. A raw (x, y)
 * state would not generalize across maps; this one does.
 */

import { DEFAULT_FEATURIZER_OPTIONS, FeaturizerOptions } from "../config";
import { GridView } from "../environment/gridWorld";
import { ObservationState } from "../types";
import { bucketize, normalize, softmax } from "../utils/math";

export const QUADRANT_NAMES = ["UL", "UR", "DR", "DL"] as const;

/** Axis signs per quadrant, in QUADRANT_NAMES order. */
const QUADRANT_SIGNS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [1, -1],
  [1, 1],
  [-1, 1],
];

export const TILE_VALUES = {
  free: 1,
  obstacle: -1,
  outOfBounds: -2,
} as const;

/** Map edges read as fully trodden so they never look attractive. */
export const OUT_OF_BOUNDS_PHEROMONE = 1.0;

type Quad = readonly [number, number, number, number];

export interface FeatureBreakdown {
  state: ObservationState;
  tileAverages: Quad;
  pheromoneAverages: Quad;
  tileStrengths: Quad;
  pheromoneStrengths: Quad;
  tileBuckets: Quad;
  pheromoneBuckets: Quad;
}

/**
 * Offsets covered by each quadrant for a vision radius. Radius 1 yields four
 * overlapping 2x2 blocks that share the agent's own cell.
 */
export function quadrantOffsets(
  radius: number,
): ReadonlyArray<ReadonlyArray<readonly [number, number]>> {
  return QUADRANT_SIGNS.map(([sx, sy]) => {
    const cells: Array<readonly [number, number]> = [];
    for (let j = 0; j <= radius; j++) {
      for (let i = 0; i <= radius; i++) {
        // `+ 0` folds -0 into 0 for the shared axis cells
        cells.push([i * sx + 0, j * sy + 0]);
      }
    }
    return cells;
  });
}

function toQuad(xs: readonly number[]): Quad {
  return [xs[0] ?? 0, xs[1] ?? 0, xs[2] ?? 0, xs[3] ?? 0];
}

/** Tile averages shifted so the out-of-bounds sentinel maps to zero. */
function ratioStrengths(avgs: readonly number[]): number[] {
  return normalize(avgs.map((v) => v - TILE_VALUES.outOfBounds));
}

export function featurizeDebug(
  env: GridView,
  opts: FeaturizerOptions = DEFAULT_FEATURIZER_OPTIONS,
): FeatureBreakdown {
  const { x: x0, y: y0 } = env.position;
  const tileAvgs: number[] = [];
  const pherAvgs: number[] = [];

  for (const quad of quadrantOffsets(opts.visionRadius)) {
    let tSum = 0;
    let pSum = 0;
    for (const [dx, dy] of quad) {
      const x = x0 + dx;
      const y = y0 + dy;
      if (env.inBounds(x, y)) {
        tSum += TILE_VALUES[env.cellAt(x, y)];
        pSum += env.pheromoneAt(x, y);
      } else {
        tSum += TILE_VALUES.outOfBounds;
        pSum += OUT_OF_BOUNDS_PHEROMONE;
      }
    }
    tileAvgs.push(tSum / quad.length);
    pherAvgs.push(pSum / quad.length);
  }

  const tileStrengths =
    opts.tilePooling === "softmax" ? softmax(tileAvgs) : ratioStrengths(tileAvgs);
  // lower pheromone is better
  const pherStrengths = normalize(pherAvgs.map((p) => 1 / (1 + p)));

  const tileBuckets = tileStrengths.map((v) => bucketize(v, opts.thresholds));
  const pherBuckets = pherStrengths.map((v) => bucketize(v, opts.thresholds));

  const t = toQuad(opts.bucketizeTiles ? tileBuckets : tileStrengths);
  const p = toQuad(opts.bucketizePheromones ? pherBuckets : pherStrengths);

  return {
    state: [t[0], t[1], t[2], t[3], p[0], p[1], p[2], p[3]],
    tileAverages: toQuad(tileAvgs),
    pheromoneAverages: toQuad(pherAvgs),
    tileStrengths: toQuad(tileStrengths),
    pheromoneStrengths: toQuad(pherStrengths),
    tileBuckets: toQuad(tileBuckets),
    pheromoneBuckets: toQuad(pherBuckets),
  };
}

/** Observation used verbatim as the Q-table key. Pure in the env's state. */
export function featurize(
  env: GridView,
  opts: FeaturizerOptions = DEFAULT_FEATURIZER_OPTIONS,
): ObservationState {
  return featurizeDebug(env, opts).state;
}

/** Human-readable lines for progress sinks and diagnostics. */
export function describeFeatures(f: FeatureBreakdown): string[] {
  const fmt = (q: Quad) => q.map((v) => v.toFixed(3)).join(" ");
  return [
    `quadrants  ${QUADRANT_NAMES.join("    ")}`,
    `tile avg   ${fmt(f.tileAverages)}`,
    `tile str   ${fmt(f.tileStrengths)}`,
    `pher avg   ${fmt(f.pheromoneAverages)}`,
    `pher str   ${fmt(f.pheromoneStrengths)}`,
    `state      (${f.state.join(", ")})`,
  ];
}
