/**
 * Room exploration. Only active once a state carries `discoveredRooms`;
 * the first entry into a room draws an exploration card in place of the
 * regular noise roll.
 */
import type { GameState, RoomId } from "../shared/types.js";
import { incidentEdges, normEdge } from "./board.js";
import { placeCorridorNoise, placeRoomNoise } from "./noise.js";
import { next, withMember } from "./state.js";

export const EXPLORATION_CARDS = {
  NoiseRoom: "ENTRANCE_NOISE_ROOM",
  NoiseCorridor: "ENTRANCE_NOISE_CORRIDOR",
  CloseDoors: "ENTRANCE_CLOSE_DOORS",
  Silence: "ENTRANCE_SILENCE",
  Fire: "ENTRANCE_FIRE",
} as const;

export interface ExplorationResult {
  state: GameState;
  /** True when the drawn card stands in for the move's noise placement. */
  replacesNoise: boolean;
}

export function exploreRoom(
  state: GameState,
  from: RoomId,
  to: RoomId,
  cautious: boolean,
): ExplorationResult {
  const discovered = state.discoveredRooms;
  if (!discovered || discovered.has(to)) return { state, replacesNoise: false };

  const traversed = normEdge(from, to);
  let s = next(state, { discoveredRooms: withMember(discovered, to) });
  if (cautious) {
    s = next(s, { secureTokens: withMember(s.secureTokens, traversed) });
  }

  const [card, ...rest] = s.explorationDeckCards;
  if (card === undefined) return { state: s, replacesNoise: false };
  s = next(s, { explorationDeckCards: rest });

  switch (card) {
    case EXPLORATION_CARDS.NoiseRoom:
      return { state: placeRoomNoise(s, to), replacesNoise: true };
    case EXPLORATION_CARDS.NoiseCorridor:
      return { state: placeCorridorNoise(s, traversed), replacesNoise: true };
    case EXPLORATION_CARDS.CloseDoors: {
      const doors = new Set(s.doors);
      for (const edge of incidentEdges(s.board, to)) doors.add(edge);
      return { state: next(s, { doors }), replacesNoise: true };
    }
    case EXPLORATION_CARDS.Silence:
      return { state: s, replacesNoise: true };
    case EXPLORATION_CARDS.Fire:
      return { state: next(s, { fires: withMember(s.fires, to) }), replacesNoise: true };
    default:
      return { state: s, replacesNoise: false };
  }
}
