/**
 * Noise placement and the encounter check.
 *
 * Corridor noise lives on canonical edges, room noise on rooms. Either kind,
 * present when the player walks in, makes a hidden intruder show up.
 */
import type { EdgeKey, GameState, NoiseTarget, RoomId } from "../shared/types.js";
import { SPAWN_HP } from "../shared/constants.js";
import { incidentEdges, smallestOpenEdge } from "./board.js";
import { bumpCount, next, withEntry, withoutKeys } from "./state.js";

/** One noise marker on a corridor. Secured corridors take none. */
export function placeCorridorNoise(state: GameState, edge: EdgeKey): GameState {
  if (!state.board.edges.has(edge) || state.secureTokens.has(edge)) return state;
  return next(state, { noise: bumpCount(state.noise, edge) });
}

export function placeRoomNoise(state: GameState, room: RoomId): GameState {
  return next(state, { roomNoise: bumpCount(state.roomNoise, room) });
}

/**
 * Noise that is not tied to a traversed corridor (event fallback, NOISE_CORRIDOR):
 * the smallest open corridor out of `room`, or the room itself.
 */
export function placeNoiseAround(state: GameState, room: RoomId, target: NoiseTarget): GameState {
  if (target === "room") return placeRoomNoise(state, room);
  const edge = smallestOpenEdge(state, room);
  return edge ? placeCorridorNoise(state, edge) : state;
}

/** Any room noise, or noise on any corridor touching `room`. */
export function hasNoiseAt(state: GameState, room: RoomId): boolean {
  if ((state.roomNoise.get(room) ?? 0) >= 1) return true;
  return incidentEdges(state.board, room).some(e => (state.noise.get(e) ?? 0) >= 1);
}

/**
 * Spawn a 1-HP intruder in `room` when `triggered` and the room is empty.
 * The noise that caused it, on the room and every touching corridor, is consumed.
 */
export function resolveEncounter(state: GameState, room: RoomId, triggered: boolean): GameState {
  if (!triggered || state.intruders.has(room)) return state;
  return next(state, {
    intruders: withEntry(state.intruders, room, SPAWN_HP),
    noise: withoutKeys(state.noise, incidentEdges(state.board, room)),
    roomNoise: withoutKeys(state.roomNoise, [room]),
  });
}
