import type { Action, GameState } from "../shared/types.js";
import { ActionType } from "../shared/types.js";
import { legalActions } from "../sim/actions.js";
import type { Agent } from "./agent.js";
import { createRng, pick } from "../sim/rng.js";
import type { Rng } from "../sim/rng.js";

/** Uniformly random over the legal actions, reproducible for a given seed. */
export class RandomAgent implements Agent {
  readonly name = "random";
  private readonly rng: Rng;

  constructor(seed?: number) {
    this.rng = createRng(seed);
  }

  act(state: GameState): Action {
    return pick(this.rng, legalActions(state)) ?? { type: ActionType.Noop };
  }
}
