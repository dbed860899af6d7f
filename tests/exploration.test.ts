import { describe, it, expect } from "vitest";
import { step } from "../src/sim/step.js";
import { createInitialState, next } from "../src/sim/state.js";
import { EXPLORATION_CARDS } from "../src/sim/exploration.js";
import { legalActions } from "../src/sim/actions.js";
import type { Action, GameState } from "../src/shared/types.js";
import { ActionType } from "../src/shared/types.js";

function exploring(cards: string[]): GameState {
  return createInitialState({
    discoveredRooms: new Set(["A"]),
    explorationDeckCards: cards,
  });
}

function legal(state: GameState, type: ActionType, to: string): Action {
  const found = legalActions(state).find(a => a.type === type && "to" in a && a.to === to);
  if (!found) throw new Error(`${type} ${to} is not legal`);
  return found;
}

const DECK = [
  EXPLORATION_CARDS.NoiseRoom,
  EXPLORATION_CARDS.CloseDoors,
  EXPLORATION_CARDS.NoiseCorridor,
];

describe("exploration", () => {
  it("discovers the room and lets the card replace the move's noise", () => {
    const s0 = exploring(DECK);
    const s1 = step(s0, legal(s0, ActionType.Move, "B"));
    expect(s1.discoveredRooms?.has("B")).toBe(true);
    expect(s1.roomNoise.get("B")).toBe(1);
    expect(s1.noise.has("A|B")).toBe(false);
    expect(s1.explorationDeckCards).toHaveLength(2);
  });

  it("secures the corridor behind a cautious explorer", () => {
    const s0 = exploring(DECK);
    const s1 = step(s0, legal(s0, ActionType.MoveCautious, "B"));
    expect(s1.secureTokens.has("A|B")).toBe(true);
  });

  it("closes every door around the room on CLOSE_DOORS", () => {
    const s0 = exploring(DECK);
    const s1 = step(s0, legal(s0, ActionType.Move, "B"));
    const back = next(s1, { playerRoom: "A", discoveredRooms: new Set(["A"]) });
    const s2 = step(back, legal(back, ActionType.Move, "B"));
    expect(s2.doors.has("A|B")).toBe(true);
    expect(s2.doors.has("B|C")).toBe(true);
  });

  it("marks the traversed corridor on NOISE_CORRIDOR", () => {
    const s1 = step(exploring([EXPLORATION_CARDS.NoiseCorridor]), { type: ActionType.Move, to: "B" });
    expect(s1.noise.get("A|B")).toBe(1);
    expect(s1.roomNoise.size).toBe(0);
  });

  it("stays quiet on SILENCE", () => {
    const s1 = step(exploring([EXPLORATION_CARDS.Silence]), { type: ActionType.Move, to: "B" });
    expect(s1.noise.size).toBe(0);
    expect(s1.roomNoise.size).toBe(0);
  });

  it("sets the new room alight on FIRE", () => {
    const s1 = step(exploring([EXPLORATION_CARDS.Fire]), { type: ActionType.Move, to: "B" });
    expect(s1.fires.has("B")).toBe(true);
    expect(s1.noise.size).toBe(0);
  });

  it("falls back to the regular noise roll on an empty deck", () => {
    const s1 = step(exploring([]), { type: ActionType.Move, to: "B" });
    expect(s1.discoveredRooms?.has("B")).toBe(true);
    expect(s1.noise.get("A|B")).toBe(1);
  });

  it("falls back to the regular noise roll on an unknown card", () => {
    const s1 = step(exploring(["ENTRANCE_UNKNOWN"]), { type: ActionType.Move, to: "B" });
    expect(s1.noise.get("A|B")).toBe(1);
    expect(s1.explorationDeckCards).toEqual([]);
  });

  it("draws nothing for a room already discovered", () => {
    const state = next(exploring([EXPLORATION_CARDS.Fire]), { discoveredRooms: new Set(["A", "B"]) });
    const s1 = step(state, { type: ActionType.Move, to: "B" });
    expect(s1.fires.size).toBe(0);
    expect(s1.noise.get("A|B")).toBe(1);
    expect(s1.explorationDeckCards).toEqual([EXPLORATION_CARDS.Fire]);
  });

  it("is inactive without a discovered set", () => {
    const state = createInitialState({ explorationDeckCards: [EXPLORATION_CARDS.Fire] });
    const s1 = step(state, { type: ActionType.Move, to: "B" });
    expect(s1.fires.size).toBe(0);
    expect(s1.discoveredRooms).toBeUndefined();
  });

  it("keeps a secured corridor quiet on later moves", () => {
    const s1 = step(exploring([]), { type: ActionType.MoveCautious, to: "B" });
    expect(s1.noise.size).toBe(0);
    const s2 = step(s1, { type: ActionType.Move, to: "A" });
    expect(s2.noise.size).toBe(0);
  });
});
