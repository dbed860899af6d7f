import type { Action, GameState } from "../shared/types.js";
import { ActionType, Phase, RoomType } from "../shared/types.js";
import { neighbors, normEdge, openNeighbors, roomTypeOf } from "./board.js";

/** Room types whose console can be operated with USE_ROOM. */
export const USABLE_ROOM_TYPES: ReadonlySet<RoomType> = new Set([
  RoomType.Control,
  RoomType.Armory,
  RoomType.Surgery,
  RoomType.Engine,
  RoomType.FireControl,
]);

export function intruderHere(state: GameState): boolean {
  return state.intruders.has(state.playerRoom);
}

export function canFire(state: GameState): boolean {
  return state.ammo > 0 && !state.weaponJammed && intruderHere(state);
}

/**
 * Enumerate every action legal in `state`, in a stable order:
 * movement, doors, combat, room use, PASS, phase control, NOOP.
 * Callers may select by index into this list.
 */
export function legalActions(state: GameState): Action[] {
  const actions: Action[] = [];

  if (state.phase !== Phase.Player) {
    actions.push({ type: ActionType.NextPhase });
    actions.push({ type: ActionType.Noop });
    return actions;
  }

  const here = state.playerRoom;

  // 1. Movement across open corridors
  for (const to of openNeighbors(state, here)) {
    actions.push({ type: ActionType.Move, to });
    actions.push({ type: ActionType.MoveCautious, to });
  }

  // 2. Doors, only the toggle that would change something
  for (const to of neighbors(state.board, here)) {
    if (state.doors.has(normEdge(here, to))) {
      actions.push({ type: ActionType.OpenDoor, to });
    } else {
      actions.push({ type: ActionType.CloseDoor, to });
    }
  }

  // 3. Combat
  if (intruderHere(state)) {
    if (canFire(state)) {
      actions.push({ type: ActionType.Shoot });
      actions.push({ type: ActionType.Burst });
    }
    actions.push({ type: ActionType.Melee });
  }

  // 4. Room consoles
  const roomType = roomTypeOf(state.board, here);
  if (USABLE_ROOM_TYPES.has(roomType)) {
    actions.push({ type: ActionType.UseRoom });
  }
  if (roomType === RoomType.Engine) {
    actions.push({ type: ActionType.Escape });
  }

  actions.push({ type: ActionType.Pass });

  // 5. Phase control, not once an action sequence has started
  if (state.actionsInTurn === 0) {
    actions.push({ type: ActionType.EndPlayerPhase });
  }

  actions.push({ type: ActionType.Noop });
  return actions;
}

/** Structural identity of an action, including optional parameters. */
export function actionKey(action: Action): string {
  switch (action.type) {
    case ActionType.Move:
      return `${action.type}:${action.to}:${action.noiseRoll ?? ""}`;
    case ActionType.MoveCautious:
      return `${action.type}:${action.to}:${action.noiseEdge?.join("|") ?? ""}:${action.noiseRoll ?? ""}`;
    case ActionType.OpenDoor:
    case ActionType.CloseDoor:
      return `${action.type}:${action.to}`;
    case ActionType.NextPhase:
      return `${action.type}:${action.noiseRoll ?? ""}`;
    default:
      return action.type;
  }
}

/** Identity ignoring the optional noise parameters a caller may add. */
function baseKey(action: Action): string {
  switch (action.type) {
    case ActionType.Move:
    case ActionType.MoveCautious:
    case ActionType.OpenDoor:
    case ActionType.CloseDoor:
      return `${action.type}:${action.to}`;
    default:
      return action.type;
  }
}

/** True when `action` (noise parameters aside) appears in legalActions(state). */
export function isLegalAction(state: GameState, action: Action): boolean {
  const key = baseKey(action);
  return legalActions(state).some(a => baseKey(a) === key);
}
