import type { GameState, StateChanges } from "../shared/types.js";
import { Phase } from "../shared/types.js";
import {
  START_OXYGEN, START_HEALTH, START_AMMO, AMMO_MAX, START_ROUND,
  START_EVENT_DECK, START_ATTACK_DECK,
} from "../shared/constants.js";
import { DEFAULT_BOARD_DEF } from "../data/boards.js";
import { createBoard } from "./board.js";

const DEFAULT_BOARD = createBoard(DEFAULT_BOARD_DEF);

export function createInitialState(changes: StateChanges = {}): GameState {
  const base: GameState = {
    turn: 0,
    phase: Phase.Player,
    round: START_ROUND,
    seed: undefined,

    board: DEFAULT_BOARD,
    playerRoom: "A",

    oxygen: START_OXYGEN,
    health: START_HEALTH,
    ammo: START_AMMO,
    ammoMax: AMMO_MAX,
    weaponJammed: false,
    seriousWounds: 0,

    actionsInTurn: 0,
    lifeSupportActive: true,

    fires: new Set(),
    doors: new Set(),
    noise: new Map(),
    roomNoise: new Map(),

    intruders: new Map(),
    intruderBurnLast: 0,

    eventDeck: START_EVENT_DECK,
    eventDeckCards: [],
    bag: new Map(),
    bagDevCount: 0,
    attackDeck: START_ATTACK_DECK,

    selfDestructArmed: false,
    destructionTimer: 0,

    discoveredRooms: undefined,
    explorationDeckCards: [],
    secureTokens: new Set(),

    gameOver: false,
    win: false,
  };
  return { ...base, ...changes };
}

/**
 * Persistent-record update: a new state with the named fields replaced.
 * The input is never touched, so older snapshots stay valid for search.
 */
export function next(state: GameState, changes: StateChanges): GameState {
  return { ...state, ...changes };
}

/** The NOOP transition: the turn counter advances and nothing else changes. */
export function noop(state: GameState): GameState {
  return next(state, { turn: state.turn + 1 });
}

// ── Copy-on-write collection helpers ─────────────────────────

/** Add `delta` to a counter; entries that drop to zero or below are removed. */
export function bumpCount<K>(map: ReadonlyMap<K, number>, key: K, delta = 1): Map<K, number> {
  const out = new Map(map);
  const value = (map.get(key) ?? 0) + delta;
  if (value > 0) out.set(key, value);
  else out.delete(key);
  return out;
}

export function withEntry<K, V>(map: ReadonlyMap<K, V>, key: K, value: V): Map<K, V> {
  const out = new Map(map);
  out.set(key, value);
  return out;
}

export function withoutKeys<K, V>(map: ReadonlyMap<K, V>, keys: Iterable<K>): Map<K, V> {
  const out = new Map(map);
  for (const key of keys) out.delete(key);
  return out;
}

export function withMember<T>(set: ReadonlySet<T>, value: T): Set<T> {
  const out = new Set(set);
  out.add(value);
  return out;
}

export function withoutMember<T>(set: ReadonlySet<T>, value: T): Set<T> {
  const out = new Set(set);
  out.delete(value);
  return out;
}
