import seedrandom from "seedrandom";

/**
 * Source of uniform randomness owned by whoever drives an episode.
 *
 * Exploration draws, tie-breaks and grid generation all go through one of
 * these so a seeded run replays exactly.
 */
export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [0, n). */
  int(n: number): number;
}

class SeededRandom implements RandomSource {
  private readonly prng: seedrandom.PRNG;

  constructor(seed: string) {
    this.prng = seedrandom(seed);
  }

  next(): number {
    return this.prng();
  }

  int(n: number): number {
    return Math.floor(this.prng() * n);
  }
}

class MathRandom implements RandomSource {
  next(): number {
    return Math.random();
  }

  int(n: number): number {
    return Math.floor(Math.random() * n);
  }
}

/** Seeded generator when a seed is given, otherwise Math.random. */
export function createRandom(seed?: string | number): RandomSource {
  if (seed === undefined) return new MathRandom();
  return new SeededRandom(String(seed));
}
