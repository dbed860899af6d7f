/**
 * Episode wrapper around the engine: keeps the current state, scores the
 * outcome and stops advancing once the game is over.
 */
import type { Action, GameState, StateChanges } from "../shared/types.js";
import { createInitialState } from "./state.js";
import { step } from "./step.js";

export interface StepResult {
  state: GameState;
  /** +1 on a win, -1 on a loss, 0 otherwise. */
  reward: number;
  done: boolean;
}

export function rewardOf(state: GameState): number {
  if (!state.gameOver) return 0;
  return state.win ? 1 : -1;
}

export class Environment {
  private current: GameState;

  constructor(private readonly baseOverrides: StateChanges = {}) {
    this.current = createInitialState(baseOverrides);
  }

  get state(): GameState {
    return this.current;
  }

  get done(): boolean {
    return this.current.gameOver;
  }

  reset(seed?: number, overrides: StateChanges = {}): GameState {
    this.current = createInitialState({
      ...this.baseOverrides,
      ...overrides,
      seed: seed ?? overrides.seed ?? this.baseOverrides.seed,
    });
    return this.current;
  }

  step(action: Action): StepResult {
    if (this.done) return { state: this.current, reward: 0, done: true };
    this.current = step(this.current, action);
    return { state: this.current, reward: rewardOf(this.current), done: this.done };
  }
}
