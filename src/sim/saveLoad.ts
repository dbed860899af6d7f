/**
 * Save/Load: GameState to and from a flat JSON record.
 * Sets and maps become sorted arrays and objects, so equal states always
 * serialize to the same text and hash to the same key.
 */

import { createHash } from "node:crypto";
import { readFileSync, writeFileSync } from "node:fs";
import type { Board, EdgeKey, GameState, RoomId } from "../shared/types.js";
import { Phase, RoomType } from "../shared/types.js";
import { compareEdges, createBoard, edgeEnds, normEdge } from "./board.js";

const RECORD_VERSION = 1;

type EdgePair = [RoomId, RoomId];

export interface BoardRecord {
  rooms: RoomId[];
  edges: EdgePair[];
  roomTypes: Record<RoomId, string>;
}

export interface StateRecord {
  version: typeof RECORD_VERSION;
  turn: number;
  phase: string;
  round: number;
  seed: number | null;
  board: BoardRecord;
  playerRoom: RoomId;
  oxygen: number;
  health: number;
  ammo: number;
  ammoMax: number;
  weaponJammed: boolean;
  seriousWounds: number;
  actionsInTurn: number;
  lifeSupportActive: boolean;
  fires: RoomId[];
  doors: EdgePair[];
  noise: { edge: EdgePair; count: number }[];
  roomNoise: Record<RoomId, number>;
  intruders: Record<RoomId, number>;
  intruderBurnLast: number;
  eventDeck: number;
  eventDeckCards: string[];
  bag: Record<string, number>;
  bagDevCount: number;
  attackDeck: number;
  selfDestructArmed: boolean;
  destructionTimer: number;
  discoveredRooms: RoomId[] | null;
  explorationDeckCards: string[];
  secureTokens: EdgePair[];
  gameOver: boolean;
  win: boolean;
}

// ── Serialize ────────────────────────────────────────────────

function sortedEdges(edges: Iterable<EdgeKey>): EdgePair[] {
  return [...edges].sort(compareEdges).map(edgeEnds);
}

function sortedObject<V>(map: ReadonlyMap<string, V>): Record<string, V> {
  return Object.fromEntries([...map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

function boardToRecord(board: Board): BoardRecord {
  return {
    rooms: [...board.rooms].sort(),
    edges: sortedEdges(board.edges),
    roomTypes: sortedObject(board.roomTypes),
  };
}

export function toRecord(state: GameState): StateRecord {
  return {
    version: RECORD_VERSION,
    turn: state.turn,
    phase: state.phase,
    round: state.round,
    seed: state.seed ?? null,
    board: boardToRecord(state.board),
    playerRoom: state.playerRoom,
    oxygen: state.oxygen,
    health: state.health,
    ammo: state.ammo,
    ammoMax: state.ammoMax,
    weaponJammed: state.weaponJammed,
    seriousWounds: state.seriousWounds,
    actionsInTurn: state.actionsInTurn,
    lifeSupportActive: state.lifeSupportActive,
    fires: [...state.fires].sort(),
    doors: sortedEdges(state.doors),
    noise: [...state.noise.keys()]
      .sort(compareEdges)
      .map((key) => ({ edge: edgeEnds(key), count: state.noise.get(key) ?? 0 })),
    roomNoise: sortedObject(state.roomNoise),
    intruders: sortedObject(state.intruders),
    intruderBurnLast: state.intruderBurnLast,
    eventDeck: state.eventDeck,
    eventDeckCards: [...state.eventDeckCards],
    bag: sortedObject(state.bag),
    bagDevCount: state.bagDevCount,
    attackDeck: state.attackDeck,
    selfDestructArmed: state.selfDestructArmed,
    destructionTimer: state.destructionTimer,
    discoveredRooms: state.discoveredRooms ? [...state.discoveredRooms].sort() : null,
    explorationDeckCards: [...state.explorationDeckCards],
    secureTokens: sortedEdges(state.secureTokens),
    gameOver: state.gameOver,
    win: state.win,
  };
}

/** SHA-256 of the canonical record. Equal states share a key. */
export function stateKey(state: GameState): string {
  return createHash("sha256").update(JSON.stringify(toRecord(state))).digest("hex");
}

// ── Deserialize ──────────────────────────────────────────────

class RecordError extends Error {}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function num(obj: Record<string, unknown>, key: string): number {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value)) throw new RecordError(`${key} must be a number`);
  return value;
}

function bool(obj: Record<string, unknown>, key: string): boolean {
  const value = obj[key];
  if (typeof value !== "boolean") throw new RecordError(`${key} must be a boolean`);
  return value;
}

function str(obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== "string") throw new RecordError(`${key} must be a string`);
  return value;
}

function strings(value: unknown, key: string): string[] {
  if (!Array.isArray(value)) throw new RecordError(`${key} must be an array`);
  return value.map((item) => {
    if (typeof item !== "string") throw new RecordError(`${key} must hold strings`);
    return item;
  });
}

function edgePair(value: unknown, key: string): EdgePair {
  const [a, b, ...rest] = strings(value, key);
  if (a === undefined || b === undefined || rest.length > 0) {
    throw new RecordError(`${key} entries must be [room, room] pairs`);
  }
  return [a, b];
}

function edgeKeys(value: unknown, key: string): Set<EdgeKey> {
  if (!Array.isArray(value)) throw new RecordError(`${key} must be an array`);
  return new Set(value.map((pair) => normEdge(...edgePair(pair, key))));
}

function counts(value: unknown, key: string): Map<string, number> {
  if (!isObject(value)) throw new RecordError(`${key} must be an object`);
  const out = new Map<string, number>();
  for (const [k, v] of Object.entries(value)) {
    if (typeof v !== "number" || !Number.isFinite(v)) throw new RecordError(`${key}.${k} must be a number`);
    out.set(k, v);
  }
  return out;
}

function parsePhase(value: string): Phase {
  const phase = Object.values(Phase).find((p) => p === value);
  if (phase === undefined) throw new RecordError(`Unknown phase "${value}"`);
  return phase;
}

function parseRoomType(value: unknown): RoomType {
  const type = Object.values(RoomType).find((t) => t === value);
  if (type === undefined) throw new RecordError(`Unknown room type "${String(value)}"`);
  return type;
}

function boardFromRecord(value: unknown): Board {
  if (!isObject(value)) throw new RecordError("board must be an object");
  const rooms = strings(value.rooms, "board.rooms");
  if (!Array.isArray(value.edges)) throw new RecordError("board.edges must be an array");
  const edges = value.edges.map((pair) => edgePair(pair, "board.edges"));
  if (!isObject(value.roomTypes)) throw new RecordError("board.roomTypes must be an object");
  const roomTypes: Record<RoomId, RoomType> = {};
  for (const [room, type] of Object.entries(value.roomTypes)) roomTypes[room] = parseRoomType(type);
  return createBoard({ rooms, edges, roomTypes });
}

function parseNoise(value: unknown): Map<EdgeKey, number> {
  if (!Array.isArray(value)) throw new RecordError("noise must be an array");
  const out = new Map<EdgeKey, number>();
  for (const entry of value) {
    if (!isObject(entry)) throw new RecordError("noise entries must be objects");
    out.set(normEdge(...edgePair(entry.edge, "noise.edge")), num(entry, "count"));
  }
  return out;
}

// ── Invariants ───────────────────────────────────────────────

const COUNTER_FIELDS = [
  "turn", "round", "oxygen", "health", "ammo", "ammoMax", "seriousWounds",
  "actionsInTurn", "intruderBurnLast", "eventDeck", "bagDevCount", "attackDeck",
  "destructionTimer",
] as const;

function roomsOnBoard(board: Board, rooms: Iterable<RoomId>, key: string): void {
  for (const room of rooms) {
    if (!board.rooms.has(room)) throw new RecordError(`${key} names room "${room}", which is not on the board`);
  }
}

function edgesOnBoard(board: Board, edges: Iterable<EdgeKey>, key: string): void {
  for (const edge of edges) {
    if (!board.edges.has(edge)) throw new RecordError(`${key} names corridor "${edge}", which is not on the board`);
  }
}

function positiveCounts(map: ReadonlyMap<string, number>, key: string): void {
  for (const [k, v] of map) {
    if (!Number.isInteger(v) || v <= 0) throw new RecordError(`${key}.${k} must be a positive integer`);
  }
}

/** Reject states the engine never produces. */
function checkInvariants(state: GameState): void {
  for (const key of COUNTER_FIELDS) {
    const value = state[key];
    if (!Number.isInteger(value) || value < 0) throw new RecordError(`${key} must be a non-negative integer`);
  }
  if (state.ammo > state.ammoMax) throw new RecordError("ammo exceeds ammoMax");

  const { board } = state;
  roomsOnBoard(board, state.fires, "fires");
  roomsOnBoard(board, state.intruders.keys(), "intruders");
  roomsOnBoard(board, state.roomNoise.keys(), "roomNoise");
  roomsOnBoard(board, state.discoveredRooms ?? [], "discoveredRooms");
  edgesOnBoard(board, state.doors, "doors");
  edgesOnBoard(board, state.noise.keys(), "noise");
  edgesOnBoard(board, state.secureTokens, "secureTokens");

  positiveCounts(state.intruders, "intruders");
  positiveCounts(state.noise, "noise");
  positiveCounts(state.roomNoise, "roomNoise");
  positiveCounts(state.bag, "bag");
}

function parseState(raw: unknown): GameState {
  if (!isObject(raw)) throw new RecordError("record must be an object");
  if (raw.version !== RECORD_VERSION) throw new RecordError(`Unsupported version ${String(raw.version)}`);

  const board = boardFromRecord(raw.board);
  const playerRoom = str(raw, "playerRoom");
  if (!board.rooms.has(playerRoom)) throw new RecordError(`playerRoom "${playerRoom}" is not on the board`);

  const seed = raw.seed === null || raw.seed === undefined ? undefined : num(raw, "seed");

  const state: GameState = {
    turn: num(raw, "turn"),
    phase: parsePhase(str(raw, "phase")),
    round: num(raw, "round"),
    seed,
    board,
    playerRoom,
    oxygen: num(raw, "oxygen"),
    health: num(raw, "health"),
    ammo: num(raw, "ammo"),
    ammoMax: num(raw, "ammoMax"),
    weaponJammed: bool(raw, "weaponJammed"),
    seriousWounds: num(raw, "seriousWounds"),
    actionsInTurn: num(raw, "actionsInTurn"),
    lifeSupportActive: bool(raw, "lifeSupportActive"),
    fires: new Set(strings(raw.fires, "fires")),
    doors: edgeKeys(raw.doors, "doors"),
    noise: parseNoise(raw.noise),
    roomNoise: counts(raw.roomNoise, "roomNoise"),
    intruders: counts(raw.intruders, "intruders"),
    intruderBurnLast: num(raw, "intruderBurnLast"),
    eventDeck: num(raw, "eventDeck"),
    eventDeckCards: strings(raw.eventDeckCards, "eventDeckCards"),
    bag: counts(raw.bag, "bag"),
    bagDevCount: num(raw, "bagDevCount"),
    attackDeck: num(raw, "attackDeck"),
    selfDestructArmed: bool(raw, "selfDestructArmed"),
    destructionTimer: num(raw, "destructionTimer"),
    discoveredRooms: raw.discoveredRooms === null ? undefined : new Set(strings(raw.discoveredRooms, "discoveredRooms")),
    explorationDeckCards: strings(raw.explorationDeckCards, "explorationDeckCards"),
    secureTokens: edgeKeys(raw.secureTokens, "secureTokens"),
    gameOver: bool(raw, "gameOver"),
    win: bool(raw, "win"),
  };
  checkInvariants(state);
  return state;
}

/** Rebuild a state from a record. Returns null (and warns) when the record is malformed. */
export function fromRecord(raw: unknown): GameState | null {
  try {
    return parseState(raw);
  } catch (err) {
    console.warn("[saveLoad] Rejected state record:", err instanceof Error ? err.message : err);
    return null;
  }
}

// ── Files ────────────────────────────────────────────────────

export function saveGame(path: string, state: GameState): void {
  writeFileSync(path, JSON.stringify(toRecord(state), null, 2) + "\n");
}

/** Load a saved state. Returns null if the file is unreadable or corrupt. */
export function loadGame(path: string): GameState | null {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    console.warn(`[saveLoad] Failed to read ${path}:`, err instanceof Error ? err.message : err);
    return null;
  }
  try {
    return fromRecord(JSON.parse(text));
  } catch (err) {
    console.warn(`[saveLoad] ${path} is not valid JSON:`, err instanceof Error ? err.message : err);
    return null;
  }
}
