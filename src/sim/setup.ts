/**
 * New-game setup for the harness and self-play: board choice and seeded
 * deck shuffles. Given the same options it always builds the same state.
 */
import type { GameState, StateChanges } from "../shared/types.js";
import { DEFAULT_SEED } from "../shared/constants.js";
import { BOARD_DEFS, BOARD_START_ROOMS } from "../data/boards.js";
import { EVENT_DECK_RECIPE, EXPLORATION_DECK_RECIPE, STARTING_BAG } from "../data/decks.js";
import type { DeckRecipe } from "../data/decks.js";
import { createBoard } from "./board.js";
import { createRng } from "./rng.js";
import type { Rng } from "./rng.js";
import { createInitialState } from "./state.js";

export interface GameSetup {
  board?: string;
  seed?: number;
  /** Shuffle a deck of concrete event cards instead of the abstract countdown. */
  eventCards?: boolean;
  /** Turn on room exploration with a shuffled exploration deck. */
  explore?: boolean;
}

export function boardNames(): string[] {
  return Object.keys(BOARD_DEFS).sort();
}

/** Expand a recipe into a flat deck, shuffled by `rng`. */
export function buildDeck(recipe: DeckRecipe, rng: Rng): string[] {
  const cards: string[] = [];
  const entries = Object.entries(recipe).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [card, copies] of entries) {
    for (let i = 0; i < copies; i++) cards.push(card);
  }
  return rng.shuffle(cards);
}

/** Returns `{ error }` for an unknown board name. */
export function createGame(setup: GameSetup = {}): GameState | { error: string } {
  const name = setup.board ?? "default";
  const def = BOARD_DEFS[name];
  const start = BOARD_START_ROOMS[name];
  if (!def || !start) {
    return { error: `Unknown board "${name}". Available: ${boardNames().join(", ")}` };
  }

  const seed = setup.seed ?? DEFAULT_SEED;
  const rng = createRng(seed);
  let changes: StateChanges = { seed, board: createBoard(def), playerRoom: start };

  if (setup.eventCards) {
    const eventDeckCards = buildDeck(EVENT_DECK_RECIPE, rng);
    changes = {
      ...changes,
      eventDeckCards,
      eventDeck: eventDeckCards.length,
      bag: new Map(Object.entries(STARTING_BAG)),
    };
  }
  if (setup.explore) {
    changes = {
      ...changes,
      discoveredRooms: new Set([start]),
      explorationDeckCards: buildDeck(EXPLORATION_DECK_RECIPE, rng),
    };
  }

  return createInitialState(changes);
}
