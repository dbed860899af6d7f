import type { GameState } from "../shared/types.js";
import { next } from "./state.js";

/**
 * Self-destruct countdown, run once per CLEANUP. An armed charge that has
 * reached zero ends the game as a loss; escaping is the only win.
 */
export function tickSelfDestruct(state: GameState): GameState {
  if (!state.selfDestructArmed) return state;

  const timer = state.destructionTimer > 0 ? state.destructionTimer - 1 : state.destructionTimer;
  if (timer === 0 && !state.gameOver) {
    return next(state, { destructionTimer: timer, gameOver: true, win: false });
  }
  return next(state, { destructionTimer: timer });
}

export function escapeStation(state: GameState): GameState {
  return next(state, { gameOver: true, win: true });
}

export type Outcome = "win" | "loss" | "ongoing";

export function outcomeOf(state: GameState): Outcome {
  if (!state.gameOver) return "ongoing";
  return state.win ? "win" : "loss";
}
