/**
 * Deterministic action table for the grid agent.
 *
 * Keep the ordering stable: Q-table rows are indexed by these positions.
 * Screen coordinates, so UP is dy = -1.
 */

import { ObservationState } from "../types";

export interface ActionDef {
  name: string;
  dx: number;
  dy: number;
}

export const ACTIONS: readonly ActionDef[] = [
  { name: "UP", dx: 0, dy: -1 },
  { name: "DOWN", dx: 0, dy: 1 },
  { name: "LEFT", dx: -1, dy: 0 },
  { name: "RIGHT", dx: 1, dy: 0 },
  { name: "UL", dx: -1, dy: -1 },
  { name: "UR", dx: 1, dy: -1 },
  { name: "DL", dx: -1, dy: 1 },
  { name: "DR", dx: 1, dy: 1 },
];

export const N_ACTIONS = ACTIONS.length;

export const ACTION_NAMES: readonly string[] = ACTIONS.map((a) => a.name);

export function isValidAction(idx: number): boolean {
  return Number.isInteger(idx) && idx >= 0 && idx < N_ACTIONS;
}

/** Delta for an action index; throws on anything outside 0..7. */
export function actionDelta(idx: number): { dx: number; dy: number } {
  const a = ACTIONS[idx];
  if (!Number.isInteger(idx) || a === undefined) {
    throw new RangeError(`action index must be an integer in [0, ${N_ACTIONS}), got ${idx}`);
  }
  return { dx: a.dx, dy: a.dy };
}

export function actionName(idx: number): string {
  return ACTIONS[idx]?.name ?? `#${idx}`;
}

/**
 * Canonical Q-table key for an observation. Number-to-string conversion
 * round-trips doubles, so two states share a key only if every component is
 * exactly equal.
 */
export function stateToKey(state: ObservationState): string {
  return state.join("|");
}
