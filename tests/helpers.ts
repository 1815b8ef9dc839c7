import { parseGrid } from "../src/environment/generator";
import { CellKind } from "../src/types";
import { RandomSource } from "../src/utils/random";

/** Rows of 0/1 separated by slashes, e.g. "111/101/111". */
export function gridFrom(rows: string): CellKind[][] {
  return parseGrid(rows.split("/").join("\n"));
}

/** Replays a fixed list of draws, cycling when exhausted. */
export class SequenceRandom implements RandomSource {
  private i = 0;
  constructor(private readonly draws: readonly number[]) {}

  next(): number {
    const v = this.draws[this.i % this.draws.length] ?? 0;
    this.i++;
    return v;
  }

  int(n: number): number {
    return Math.floor(this.next() * n);
  }
}
