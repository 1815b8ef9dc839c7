import { ConfigurationError } from "../errors";

export interface PheromoneOptions {
  /** Per-step multiplier applied to every cell, in (0, 1). */
  decay: number;
  /** Fraction of the remaining headroom added on deposit, in [0, 1]. */
  depositRate: number;
}

/**
 * Per-cell pheromone levels in [0, 1].
 *
 * Each step the whole field decays, then the occupied cell receives
 * `rate * (1 - P)`, a contraction toward 1 that can never overshoot it.
 */
export class PheromoneField {
  readonly width: number;
  readonly height: number;
  private readonly decay: number;
  private readonly depositRate: number;
  private values: Float64Array;

  constructor(width: number, height: number, opts: PheromoneOptions) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new ConfigurationError(
        `PheromoneField dimensions must be positive integers, got ${width}x${height}`,
      );
    }
    if (!(opts.decay > 0 && opts.decay < 1)) {
      throw new ConfigurationError(`pheromone decay must be in (0, 1), got ${opts.decay}`);
    }
    if (!(opts.depositRate >= 0 && opts.depositRate <= 1)) {
      throw new ConfigurationError(
        `pheromone deposit rate must be in [0, 1], got ${opts.depositRate}`,
      );
    }
    this.width = width;
    this.height = height;
    this.decay = opts.decay;
    this.depositRate = opts.depositRate;
    this.values = new Float64Array(width * height);
  }

  reset(): void {
    this.values.fill(0);
  }

  decayAll(): void {
    for (let i = 0; i < this.values.length; i++) {
      this.values[i] = (this.values[i] ?? 0) * this.decay;
    }
  }

  deposit(x: number, y: number): void {
    const i = this.index(x, y);
    const p = this.values[i] ?? 0;
    this.values[i] = p + this.depositRate * (1 - p);
  }

  /** Decay the whole field, then deposit on the occupied cell. */
  step(x: number, y: number): void {
    this.decayAll();
    this.deposit(x, y);
  }

  valueAt(x: number, y: number): number {
    return this.values[this.index(x, y)] ?? 0;
  }

  /** Row-major copy, `snapshot()[y][x]`. */
  snapshot(): number[][] {
    const rows: number[][] = [];
    for (let y = 0; y < this.height; y++) {
      rows.push(Array.from(this.values.subarray(y * this.width, (y + 1) * this.width)));
    }
    return rows;
  }

  max(): number {
    let m = 0;
    for (const v of this.values) if (v > m) m = v;
    return m;
  }

  private index(x: number, y: number): number {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) {
      throw new RangeError(`pheromone cell (${x}, ${y}) outside ${this.width}x${this.height}`);
    }
    return y * this.width + x;
  }
}
