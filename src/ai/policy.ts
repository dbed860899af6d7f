import type { Action, GameState } from "../shared/types.js";

/** Prior probabilities over `actions`, index-aligned with it. */
export type Policy = (state: GameState, actions: readonly Action[]) => number[];

export const uniformPolicy: Policy = (_state, actions) => {
  if (actions.length === 0) return [];
  const p = 1 / actions.length;
  return actions.map(() => p);
};
