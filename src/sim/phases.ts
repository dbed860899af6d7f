/**
 * Round cycle: PLAYER → ENEMY → EVENT → CLEANUP → PLAYER.
 * Entering a phase applies that phase's effects immediately.
 */
import type { GameState, NoiseTarget } from "../shared/types.js";
import { Phase } from "../shared/types.js";
import { countBurningIntruders } from "./hazards.js";
import { moveIntruders } from "./intruders.js";
import { resolveEventDeck } from "./events.js";
import { tickSelfDestruct } from "./objectives.js";
import { next } from "./state.js";

/** Successor of each phase in the round cycle. SETUP leads into play once. */
export const NEXT_PHASE: Readonly<Record<Phase, Phase>> = {
  [Phase.Setup]: Phase.Player,
  [Phase.Player]: Phase.Enemy,
  [Phase.Enemy]: Phase.Event,
  [Phase.Event]: Phase.Cleanup,
  [Phase.Cleanup]: Phase.Player,
};

function hurtPlayer(state: GameState): GameState {
  return state.health > 0 ? next(state, { health: state.health - 1 }) : state;
}

export function enterEnemyPhase(state: GameState): GameState {
  const s = next(state, { phase: Phase.Enemy, intruderBurnLast: countBurningIntruders(state) });
  return s.intruders.has(s.playerRoom) ? hurtPlayer(s) : s;
}

export function enterEventPhase(state: GameState, noiseRoll: NoiseTarget): GameState {
  const { state: moved, reachedPlayer } = moveIntruders(next(state, { phase: Phase.Event }));
  const s = reachedPlayer ? hurtPlayer(moved) : moved;
  return resolveEventDeck(s, noiseRoll);
}

export function enterCleanupPhase(state: GameState): GameState {
  return tickSelfDestruct(next(state, { phase: Phase.Cleanup, round: state.round + 1 }));
}

export function enterPlayerPhase(state: GameState): GameState {
  return next(state, { phase: Phase.Player, actionsInTurn: 0 });
}

export function enterPhase(state: GameState, phase: Phase, noiseRoll: NoiseTarget): GameState {
  switch (phase) {
    case Phase.Enemy:
      return enterEnemyPhase(state);
    case Phase.Event:
      return enterEventPhase(state, noiseRoll);
    case Phase.Cleanup:
      return enterCleanupPhase(state);
    case Phase.Player:
      return enterPlayerPhase(state);
    case Phase.Setup:
      return next(state, { phase });
  }
}
