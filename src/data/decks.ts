import { EVENT_CARDS } from "../sim/events.js";
import { EXPLORATION_CARDS } from "../sim/exploration.js";

/** Card id → copies in a fresh deck. */
export type DeckRecipe = Readonly<Record<string, number>>;

export const EVENT_DECK_RECIPE: DeckRecipe = {
  [EVENT_CARDS.NoiseCorridor]: 3,
  [EVENT_CARDS.NoiseRoom]: 2,
  [EVENT_CARDS.BagDev]: 2,
  [EVENT_CARDS.SpawnFromBag]: 1,
  [EVENT_CARDS.OxygenLeak]: 1,
  [EVENT_CARDS.FireRoom]: 1,
};

export const EXPLORATION_DECK_RECIPE: DeckRecipe = {
  [EXPLORATION_CARDS.NoiseRoom]: 3,
  [EXPLORATION_CARDS.NoiseCorridor]: 3,
  [EXPLORATION_CARDS.CloseDoors]: 1,
  [EXPLORATION_CARDS.Silence]: 2,
  [EXPLORATION_CARDS.Fire]: 1,
};

/** Intruder tokens in the bag at the start of a game. */
export const STARTING_BAG: DeckRecipe = {
  ADULT: 1,
};
