/**
 * Intruder movement. Every intruder steps one room toward the player along a
 * shortest path over open corridors; closed doors are walls to them.
 */
import type { GameState, RoomId } from "../shared/types.js";
import { openNeighbors } from "./board.js";
import { next } from "./state.js";

/** Breadth-first distances from `origin` across open corridors. */
export function distancesFrom(state: GameState, origin: RoomId): Map<RoomId, number> {
  const dist = new Map<RoomId, number>([[origin, 0]]);
  const queue: RoomId[] = [origin];

  for (let head = 0; head < queue.length; head++) {
    const room = queue[head];
    const d = dist.get(room) ?? 0;
    for (const n of openNeighbors(state, room)) {
      if (dist.has(n)) continue;
      dist.set(n, d + 1);
      queue.push(n);
    }
  }
  return dist;
}

/**
 * The room an intruder in `room` moves to: the smallest-id open neighbour one
 * step closer to the player, or `room` itself when it is already there or cut off.
 */
export function stepToward(state: GameState, dist: ReadonlyMap<RoomId, number>, room: RoomId): RoomId {
  const d = dist.get(room);
  if (d === undefined || d === 0) return room;
  for (const n of openNeighbors(state, room)) {
    if (dist.get(n) === d - 1) return n;
  }
  return room;
}

export interface IntruderMoveResult {
  state: GameState;
  /** An intruder entered the player's room this step. */
  reachedPlayer: boolean;
}

/** Move every intruder one step; intruders landing together merge, keeping the highest HP. */
export function moveIntruders(state: GameState): IntruderMoveResult {
  if (state.intruders.size === 0) return { state, reachedPlayer: false };

  const dist = distancesFrom(state, state.playerRoom);
  const moved = new Map<RoomId, number>();
  let reachedPlayer = false;

  const rooms = [...state.intruders.keys()].sort();
  for (const room of rooms) {
    const hp = state.intruders.get(room) ?? 0;
    const dest = stepToward(state, dist, room);
    if (dest !== room && dest === state.playerRoom) reachedPlayer = true;
    moved.set(dest, Math.max(hp, moved.get(dest) ?? 0));
  }

  return { state: next(state, { intruders: moved }), reachedPlayer };
}
