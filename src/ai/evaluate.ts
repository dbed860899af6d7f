import type { GameState } from "../shared/types.js";
import { MAX_HEALTH, START_OXYGEN } from "../shared/constants.js";

export const WIN_VALUE = 1;
export const LOSS_VALUE = -1;

/** Terminal value from the player's side, or null while the game is running. */
export function terminalValue(state: GameState): number | null {
  if (!state.gameOver) return null;
  return state.win ? WIN_VALUE : LOSS_VALUE;
}

/**
 * Heuristic for non-terminal leaves, in [-0.5, 0.5]: the mean of health and
 * oxygen as fractions of their starting values, recentred on zero.
 */
export function evaluateState(state: GameState): number {
  const terminal = terminalValue(state);
  if (terminal !== null) return terminal;
  const health = Math.max(0, Math.min(1, state.health / MAX_HEALTH));
  const oxygen = Math.max(0, Math.min(1, state.oxygen / START_OXYGEN));
  return (health + oxygen) / 2 - 0.5;
}
