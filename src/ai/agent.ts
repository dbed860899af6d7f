import type { Action, GameState } from "../shared/types.js";

/** Anything that picks an action for a state. */
export interface Agent {
  readonly name: string;
  act(state: GameState): Action | Promise<Action>;
}
