import type { Action, ActionOf, GameState } from "../shared/types.js";
import { ActionType, Phase, RoomType } from "../shared/types.js";
import { ACTIONS_PER_TURN } from "../shared/constants.js";
import { hasEdge, isOpen, normEdge, roomTypeOf } from "./board.js";
import { handleMelee, handleRangedAttack } from "./combat.js";
import { exploreRoom } from "./exploration.js";
import { applyEndOfTurn } from "./hazards.js";
import { hasNoiseAt, placeCorridorNoise, placeRoomNoise, resolveEncounter } from "./noise.js";
import { escapeStation } from "./objectives.js";
import { NEXT_PHASE, enterEnemyPhase, enterPhase } from "./phases.js";
import { useRoom } from "./rooms.js";
import { next, withMember, withoutMember } from "./state.js";

// ── Movement ─────────────────────────────────────────────────

function placeMoveNoise(
  state: GameState,
  action: ActionOf<ActionType.Move> | ActionOf<ActionType.MoveCautious>,
  from: string,
): GameState {
  if ((action.noiseRoll ?? "corridor") === "room") {
    return placeRoomNoise(state, action.to);
  }
  if (action.type === ActionType.MoveCautious && action.noiseEdge) {
    // A nominated corridor must be open; otherwise the noise is lost.
    const [a, b] = action.noiseEdge;
    return isOpen(state, a, b) ? placeCorridorNoise(state, normEdge(a, b)) : state;
  }
  return placeCorridorNoise(state, normEdge(from, action.to));
}

function handleMove(
  state: GameState,
  action: ActionOf<ActionType.Move> | ActionOf<ActionType.MoveCautious>,
): GameState | null {
  const from = state.playerRoom;
  const to = action.to;
  if (!isOpen(state, from, to)) return null;

  // Encounters answer to noise that was there before the player made any.
  const triggered = hasNoiseAt(state, to);

  const moved = next(state, { playerRoom: to, actionsInTurn: state.actionsInTurn + 1 });
  const explored = exploreRoom(moved, from, to, action.type === ActionType.MoveCautious);
  const noisy = explored.replacesNoise ? explored.state : placeMoveNoise(explored.state, action, from);
  return resolveEncounter(noisy, to, triggered);
}

// ── Doors ────────────────────────────────────────────────────

function handleDoor(state: GameState, action: ActionOf<ActionType.OpenDoor> | ActionOf<ActionType.CloseDoor>): GameState | null {
  const here = state.playerRoom;
  if (!hasEdge(state.board, here, action.to)) return null;

  const edge = normEdge(here, action.to);
  const closed = state.doors.has(edge);
  const counted = state.actionsInTurn + 1;

  if (action.type === ActionType.OpenDoor) {
    return closed ? next(state, { doors: withoutMember(state.doors, edge), actionsInTurn: counted }) : null;
  }
  return closed ? null : next(state, { doors: withMember(state.doors, edge), actionsInTurn: counted });
}

// ── Player phase dispatch ────────────────────────────────────

function applyPlayerAction(state: GameState, action: Action): GameState | null {
  switch (action.type) {
    case ActionType.Move:
    case ActionType.MoveCautious:
      return handleMove(state, action);
    case ActionType.OpenDoor:
    case ActionType.CloseDoor:
      return handleDoor(state, action);
    case ActionType.Shoot:
      return handleRangedAttack(state, false);
    case ActionType.Burst:
      return handleRangedAttack(state, true);
    case ActionType.Melee:
      return handleMelee(state);
    case ActionType.UseRoom:
      return useRoom(state);
    case ActionType.Escape:
      return roomTypeOf(state.board, state.playerRoom) === RoomType.Engine ? escapeStation(state) : null;
    case ActionType.Pass:
      return state;
    case ActionType.EndPlayerPhase:
    case ActionType.NextPhase:
    case ActionType.Noop:
      return null;
  }
}

// ── Entry point ──────────────────────────────────────────────

/**
 * The transition function. Produces the state after `action`; `state` is
 * never modified. Anything not legal right now behaves as NOOP: the turn
 * counter advances and every other field is left as it was.
 */
export function step(state: GameState, action: Action): GameState {
  const advanced = next(state, { turn: state.turn + 1 });

  if (action.type === ActionType.NextPhase) {
    if (state.phase === Phase.Player) return advanced;
    return enterPhase(advanced, NEXT_PHASE[state.phase], action.noiseRoll ?? "corridor");
  }

  if (state.phase !== Phase.Player) return advanced;

  if (action.type === ActionType.EndPlayerPhase) {
    return state.actionsInTurn === 0 ? enterEnemyPhase(advanced) : advanced;
  }

  const result = applyPlayerAction(advanced, action);
  if (result === null) return advanced;

  if (action.type === ActionType.Pass || result.actionsInTurn >= ACTIONS_PER_TURN) {
    return applyEndOfTurn(result);
  }
  return result;
}

/** Alias matching the engine's two-function contract: legalActions + apply. */
export const apply = step;
