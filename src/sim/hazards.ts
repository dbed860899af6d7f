import type { GameState } from "../shared/types.js";
import { next } from "./state.js";

/**
 * End of a player turn: suffocation without life support, burns in a
 * burning room, and the per-turn action counter back to zero.
 */
export function applyEndOfTurn(state: GameState): GameState {
  const oxygen = !state.lifeSupportActive && state.oxygen > 0 ? state.oxygen - 1 : state.oxygen;
  const burning = state.fires.has(state.playerRoom);
  const health = burning && state.health > 0 ? state.health - 1 : state.health;
  return next(state, { oxygen, health, actionsInTurn: 0 });
}

/** Intruders standing in burning rooms. */
export function countBurningIntruders(state: GameState): number {
  let total = 0;
  for (const room of state.intruders.keys()) {
    if (state.fires.has(room)) total++;
  }
  return total;
}
