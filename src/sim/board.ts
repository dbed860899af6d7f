/**
 * Board graph utilities: rooms, canonical corridor edges and room types.
 * Boards are built once and shared by every state derived from them.
 */
import type { Board, BoardDef, EdgeKey, GameState, RoomId } from "../shared/types.js";
import { RoomType } from "../shared/types.js";

const EDGE_SEPARATOR = "|";

export class BoardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BoardError";
  }
}

// ── Edges ────────────────────────────────────────────────────

/** Canonical key for the undirected edge between a and b. */
export function normEdge(a: RoomId, b: RoomId): EdgeKey {
  return a < b ? `${a}${EDGE_SEPARATOR}${b}` : `${b}${EDGE_SEPARATOR}${a}`;
}

export function edgeEnds(key: EdgeKey): [RoomId, RoomId] {
  const idx = key.indexOf(EDGE_SEPARATOR);
  return [key.slice(0, idx), key.slice(idx + 1)];
}

/**
 * Order edges as (min, max) tuples, comparing room ids by code unit.
 * Not the same as comparing the joined keys when ids differ in length.
 */
export function compareEdges(x: EdgeKey, y: EdgeKey): number {
  const [xa, xb] = edgeEnds(x);
  const [ya, yb] = edgeEnds(y);
  if (xa !== ya) return xa < ya ? -1 : 1;
  if (xb !== yb) return xb < yb ? -1 : 1;
  return 0;
}

// ── Construction ─────────────────────────────────────────────

export function createBoard(def: BoardDef): Board {
  const rooms = new Set<RoomId>();
  for (const room of def.rooms) {
    if (room.length === 0) throw new BoardError("Room id must not be empty");
    if (room.includes(EDGE_SEPARATOR)) {
      throw new BoardError(`Room id "${room}" must not contain "${EDGE_SEPARATOR}"`);
    }
    rooms.add(room);
  }

  const edges = new Set<EdgeKey>();
  for (const [a, b] of def.edges) {
    if (!rooms.has(a) || !rooms.has(b)) {
      throw new BoardError(`Edge (${a}, ${b}) references an undeclared room`);
    }
    if (a === b) throw new BoardError(`Edge (${a}, ${b}) is a self-loop`);
    edges.add(normEdge(a, b));
  }

  const roomTypes = new Map<RoomId, RoomType>();
  for (const [room, type] of Object.entries(def.roomTypes ?? {})) {
    if (!rooms.has(room)) {
      throw new BoardError(`Room type given for undeclared room "${room}"`);
    }
    roomTypes.set(room, type);
  }

  return { rooms, edges, roomTypes };
}

// ── Queries ──────────────────────────────────────────────────

export function hasEdge(board: Board, a: RoomId, b: RoomId): boolean {
  return board.edges.has(normEdge(a, b));
}

/** Rooms adjacent to `room`, sorted by id. */
export function neighbors(board: Board, room: RoomId): RoomId[] {
  const result: RoomId[] = [];
  for (const key of board.edges) {
    const [a, b] = edgeEnds(key);
    if (a === room) result.push(b);
    else if (b === room) result.push(a);
  }
  return result.sort((x, y) => (x < y ? -1 : x > y ? 1 : 0));
}

/** Edges touching `room`, in canonical order. */
export function incidentEdges(board: Board, room: RoomId): EdgeKey[] {
  return neighbors(board, room).map(n => normEdge(room, n)).sort(compareEdges);
}

export function roomTypeOf(board: Board, room: RoomId): RoomType {
  return board.roomTypes.get(room) ?? RoomType.Default;
}

/** True when a and b are connected by a corridor with no closed door. */
export function isOpen(state: GameState, a: RoomId, b: RoomId): boolean {
  const key = normEdge(a, b);
  return state.board.edges.has(key) && !state.doors.has(key);
}

export function openNeighbors(state: GameState, room: RoomId): RoomId[] {
  return neighbors(state.board, room).filter(n => !state.doors.has(normEdge(room, n)));
}

/** Smallest open edge touching `room`, or null when every corridor is blocked. */
export function smallestOpenEdge(state: GameState, room: RoomId): EdgeKey | null {
  const open = incidentEdges(state.board, room).filter(e => !state.doors.has(e));
  return open.length > 0 ? open[0] : null;
}
