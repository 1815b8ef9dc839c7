import { ObservationState } from "../types";
import { N_ACTIONS, stateToKey } from "./encoding";

/**
 * Read access for rollout and diagnostics. Never creates rows.
 */
export interface ReadonlyQTable {
  readonly actionCount: number;
  peek(state: ObservationState): readonly number[];
  has(state: ObservationState): boolean;
  readonly size: number;
}

/**
 * Tabular action-value store keyed by observation.
 *
 * Rows are created as `actionCount` zeros on the first `row()` access and are
 * never deleted.
 */
export class QTable implements ReadonlyQTable {
  readonly actionCount: number;
  private readonly rows = new Map<string, number[]>();
  private readonly zeros: readonly number[];

  constructor(actionCount: number = N_ACTIONS) {
    if (!Number.isInteger(actionCount) || actionCount <= 0) {
      throw new RangeError(`actionCount must be a positive integer, got ${actionCount}`);
    }
    this.actionCount = actionCount;
    this.zeros = Object.freeze(new Array<number>(actionCount).fill(0));
  }

  /** Mutable row for `state`, created as zeros on first access. */
  row(state: ObservationState): number[] {
    const key = stateToKey(state);
    let r = this.rows.get(key);
    if (r === undefined) {
      r = new Array<number>(this.actionCount).fill(0);
      this.rows.set(key, r);
    }
    return r;
  }

  /** Stored row, or a shared zero row when the state was never seen. */
  peek(state: ObservationState): readonly number[] {
    return this.rows.get(stateToKey(state)) ?? this.zeros;
  }

  has(state: ObservationState): boolean {
    return this.rows.has(stateToKey(state));
  }

  get(state: ObservationState, action: number): number {
    return this.peek(state)[action] ?? 0;
  }

  set(state: ObservationState, action: number, value: number): void {
    if (!Number.isInteger(action) || action < 0 || action >= this.actionCount) {
      throw new RangeError(`action ${action} outside [0, ${this.actionCount})`);
    }
    this.row(state)[action] = value;
  }

  /** Number of states with a row. */
  get size(): number {
    return this.rows.size;
  }

  /** Number of stored action values, rows times actions. */
  valueCount(): number {
    return this.rows.size * this.actionCount;
  }

  entries(): IterableIterator<[string, number[]]> {
    return this.rows.entries();
  }
}
