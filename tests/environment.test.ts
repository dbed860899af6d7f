import { describe, it, expect } from "vitest";
import { Environment, rewardOf } from "../src/sim/environment.js";
import { boardNames, buildDeck, createGame } from "../src/sim/setup.js";
import { createRng } from "../src/sim/rng.js";
import { createInitialState } from "../src/sim/state.js";
import { DEFAULT_SEED } from "../src/shared/constants.js";
import type { GameState } from "../src/shared/types.js";
import { ActionType, Phase } from "../src/shared/types.js";

function game(setup: Parameters<typeof createGame>[0]): GameState {
  const result = createGame(setup);
  if ("error" in result) throw new Error(result.error);
  return result;
}

describe("Environment", () => {
  it("starts a fresh game on reset", () => {
    const env = new Environment();
    const state = env.reset(5);
    expect(state.seed).toBe(5);
    expect(state.turn).toBe(0);
    expect(env.done).toBe(false);
  });

  it("pays nothing while the game runs", () => {
    const env = new Environment();
    env.reset();
    expect(env.step({ type: ActionType.Pass })).toEqual({ state: env.state, reward: 0, done: false });
  });

  it("pays +1 for an escape and then stops advancing", () => {
    const env = new Environment({ playerRoom: "E" });
    env.reset();
    const won = env.step({ type: ActionType.Escape });
    expect(won.reward).toBe(1);
    expect(won.done).toBe(true);

    const after = env.step({ type: ActionType.Noop });
    expect(after.state).toBe(won.state);
    expect(after.reward).toBe(0);
    expect(after.done).toBe(true);
  });

  it("pays -1 when the station blows", () => {
    const env = new Environment();
    env.reset(1, { phase: Phase.Event, selfDestructArmed: true, destructionTimer: 1 });
    const { reward, done, state } = env.step({ type: ActionType.NextPhase });
    expect(state.phase).toBe(Phase.Cleanup);
    expect(reward).toBe(-1);
    expect(done).toBe(true);
  });

  it("keeps the constructor's seed unless reset names one", () => {
    const env = new Environment({ seed: 9 });
    expect(env.reset().seed).toBe(9);
    expect(env.reset(undefined, { seed: 6 }).seed).toBe(6);
    expect(env.reset(4).seed).toBe(4);
  });

  it("lets reset overrides win over the constructor's", () => {
    const env = new Environment({ playerRoom: "E", oxygen: 2 });
    const state = env.reset(undefined, { playerRoom: "C" });
    expect(state.playerRoom).toBe("C");
    expect(state.oxygen).toBe(2);
  });
});

describe("rewardOf", () => {
  it("scores the outcome", () => {
    expect(rewardOf(createInitialState())).toBe(0);
    expect(rewardOf(createInitialState({ gameOver: true, win: true }))).toBe(1);
    expect(rewardOf(createInitialState({ gameOver: true }))).toBe(-1);
  });
});

describe("createGame", () => {
  it("sets up the default board", () => {
    const state = game({});
    expect(state.playerRoom).toBe("A");
    expect(state.seed).toBe(DEFAULT_SEED);
    expect(state.eventDeckCards).toEqual([]);
    expect(state.discoveredRooms).toBeUndefined();
  });

  it("starts the station board in the hibernatorium", () => {
    const state = game({ board: "station" });
    expect(state.playerRoom).toBe("hibernatorium");
    expect(state.board.rooms.size).toBe(8);
  });

  it("reports an unknown board", () => {
    expect(createGame({ board: "moonbase" })).toEqual({
      error: 'Unknown board "moonbase". Available: default, station',
    });
    expect(boardNames()).toEqual(["default", "station"]);
  });

  it("shuffles a full event deck and fills the bag", () => {
    const state = game({ eventCards: true, seed: 42 });
    expect(state.eventDeck).toBe(10);
    expect([...state.eventDeckCards].sort()).toEqual([
      "BAG_DEV", "BAG_DEV", "FIRE_ROOM",
      "NOISE_CORRIDOR", "NOISE_CORRIDOR", "NOISE_CORRIDOR",
      "NOISE_ROOM", "NOISE_ROOM", "OXYGEN_LEAK", "SPAWN_FROM_BAG",
    ]);
    expect([...state.bag]).toEqual([["ADULT", 1]]);
  });

  it("deals the same decks for the same seed", () => {
    const a = game({ eventCards: true, explore: true, seed: 42 });
    const b = game({ eventCards: true, explore: true, seed: 42 });
    expect(b.eventDeckCards).toEqual(a.eventDeckCards);
    expect(b.explorationDeckCards).toEqual(a.explorationDeckCards);
  });

  it("turns on exploration from the start room", () => {
    const state = game({ board: "station", explore: true });
    expect([...(state.discoveredRooms ?? [])]).toEqual(["hibernatorium"]);
    expect(state.explorationDeckCards).toHaveLength(10);
  });
});

describe("buildDeck", () => {
  it("expands every copy", () => {
    const deck = buildDeck({ X: 2, Y: 1 }, createRng(1));
    expect([...deck].sort()).toEqual(["X", "X", "Y"]);
  });
});
