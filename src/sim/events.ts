/**
 * Event cards, drawn once per EVENT phase from the front of `eventDeckCards`.
 */
import type { GameState, NoiseTarget } from "../shared/types.js";
import { ADULT_TOKEN, SPAWN_HP } from "../shared/constants.js";
import { placeNoiseAround } from "./noise.js";
import { bumpCount, next, withEntry, withMember } from "./state.js";

export const EVENT_CARDS = {
  NoiseCorridor: "NOISE_CORRIDOR",
  NoiseRoom: "NOISE_ROOM",
  BagDev: "BAG_DEV",
  SpawnFromBag: "SPAWN_FROM_BAG",
  OxygenLeak: "OXYGEN_LEAK",
  FireRoom: "FIRE_ROOM",
} as const;

/** Alphabetically first bag token with a positive count. */
export function firstBagToken(bag: ReadonlyMap<string, number>): string | null {
  const tokens = [...bag.entries()]
    .filter(([, count]) => count > 0)
    .map(([token]) => token)
    .sort();
  return tokens.length > 0 ? tokens[0] : null;
}

function drawFromBag(state: GameState): GameState {
  const token = firstBagToken(state.bag);
  if (token === null) return state;

  const s = next(state, { bag: bumpCount(state.bag, token, -1) });
  if (token !== ADULT_TOKEN || s.intruders.has(s.playerRoom)) return s;
  return next(s, { intruders: withEntry(s.intruders, s.playerRoom, SPAWN_HP) });
}

/** Effect of one card; unknown ids do nothing. */
export function applyEventCard(state: GameState, card: string): GameState {
  const here = state.playerRoom;
  switch (card) {
    case EVENT_CARDS.NoiseCorridor:
      return placeNoiseAround(state, here, "corridor");
    case EVENT_CARDS.NoiseRoom:
      return placeNoiseAround(state, here, "room");
    case EVENT_CARDS.BagDev:
      return next(state, {
        bagDevCount: state.bagDevCount + 1,
        bag: bumpCount(state.bag, ADULT_TOKEN),
      });
    case EVENT_CARDS.SpawnFromBag:
      return drawFromBag(state);
    case EVENT_CARDS.OxygenLeak:
      return next(state, { lifeSupportActive: false });
    case EVENT_CARDS.FireRoom:
      return next(state, { fires: withMember(state.fires, here) });
    default:
      return state;
  }
}

/**
 * Resolve the top card. With the explicit deck empty, the abstract
 * `eventDeck` counter ticks down and noise lands around the player instead.
 */
export function resolveEventDeck(state: GameState, noiseRoll: NoiseTarget): GameState {
  const [card, ...rest] = state.eventDeckCards;
  if (card === undefined) {
    const s = next(state, { eventDeck: Math.max(0, state.eventDeck - 1) });
    return placeNoiseAround(s, s.playerRoom, noiseRoll);
  }

  const s = applyEventCard(state, card);
  return next(s, { eventDeckCards: rest, eventDeck: rest.length });
}
