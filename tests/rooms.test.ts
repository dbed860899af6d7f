import { describe, it, expect } from "vitest";
import { step } from "../src/sim/step.js";
import { createInitialState } from "../src/sim/state.js";
import { createBoard } from "../src/sim/board.js";
import type { GameState, StateChanges } from "../src/shared/types.js";
import { ActionType } from "../src/shared/types.js";

function useRoomIn(room: string, changes: StateChanges = {}): { before: GameState; after: GameState } {
  const before = createInitialState({ playerRoom: room, ...changes });
  return { before, after: step(before, { type: ActionType.UseRoom }) };
}

describe("USE_ROOM", () => {
  it("toggles life support in control", () => {
    const { after } = useRoomIn("B");
    expect(after.lifeSupportActive).toBe(false);
    expect(after.actionsInTurn).toBe(1);
    const again = step(after, { type: ActionType.UseRoom });
    expect(again.lifeSupportActive).toBe(true);
  });

  it("refills ammo in the armory", () => {
    const { after } = useRoomIn("C", { ammo: 0 });
    expect(after.ammo).toBe(3);
  });

  it("is a NOOP in a fully stocked armory", () => {
    const { before, after } = useRoomIn("C");
    expect(after).toEqual({ ...before, turn: 1 });
  });

  it("heals and treats a wound in surgery", () => {
    const { after } = useRoomIn("D", { health: 4, seriousWounds: 1 });
    expect(after.health).toBe(5);
    expect(after.seriousWounds).toBe(0);
  });

  it("treats wounds even at full health", () => {
    const { after } = useRoomIn("D", { seriousWounds: 2 });
    expect(after.health).toBe(5);
    expect(after.seriousWounds).toBe(1);
  });

  it("keeps health above the maximum when treating a wound", () => {
    const { after } = useRoomIn("D", { health: 7, seriousWounds: 1 });
    expect(after.health).toBe(7);
    expect(after.seriousWounds).toBe(0);
  });

  it("is a NOOP in surgery above full health with no wounds", () => {
    const { before, after } = useRoomIn("D", { health: 7 });
    expect(after).toEqual({ ...before, turn: 1 });
  });

  it("is a NOOP in surgery with nothing to treat", () => {
    const { before, after } = useRoomIn("D");
    expect(after).toEqual({ ...before, turn: 1 });
  });

  it("arms the self-destruct in the engine room", () => {
    const { after } = useRoomIn("E");
    expect(after.selfDestructArmed).toBe(true);
    expect(after.destructionTimer).toBe(3);
    expect(after.actionsInTurn).toBe(1);
  });

  it("does not re-arm a running countdown", () => {
    const { before, after } = useRoomIn("E", { selfDestructArmed: true, destructionTimer: 1 });
    expect(after).toEqual({ ...before, turn: 1 });
  });

  it("puts out a fire in fire control", () => {
    const { after } = useRoomIn("A", { fires: new Set(["A"]) });
    expect(after.fires.has("A")).toBe(false);
    expect(after.actionsInTurn).toBe(1);
  });

  it("spends the action in fire control with nothing burning", () => {
    const { after } = useRoomIn("A");
    expect(after.fires.size).toBe(0);
    expect(after.actionsInTurn).toBe(1);
  });

  it("is a NOOP in a room without a console", () => {
    const board = createBoard({ rooms: ["X"], edges: [] });
    const { before, after } = useRoomIn("X", { board });
    expect(after).toEqual({ ...before, turn: 1 });
  });
});

describe("ESCAPE", () => {
  it("wins the game from the engine room", () => {
    const s1 = step(createInitialState({ playerRoom: "E" }), { type: ActionType.Escape });
    expect(s1.gameOver).toBe(true);
    expect(s1.win).toBe(true);
  });

  it("is a NOOP anywhere else", () => {
    const state = createInitialState({ playerRoom: "D" });
    expect(step(state, { type: ActionType.Escape })).toEqual({ ...state, turn: 1 });
  });
});

describe("end of turn", () => {
  it("costs oxygen while life support is off", () => {
    const s1 = step(createInitialState({ lifeSupportActive: false }), { type: ActionType.Pass });
    expect(s1.oxygen).toBe(4);
    expect(s1.actionsInTurn).toBe(0);
  });

  it("runs after the second action without a PASS", () => {
    const s1 = step(createInitialState({ lifeSupportActive: false }), { type: ActionType.CloseDoor, to: "B" });
    expect(s1.oxygen).toBe(5);
    const s2 = step(s1, { type: ActionType.OpenDoor, to: "B" });
    expect(s2.oxygen).toBe(4);
    expect(s2.actionsInTurn).toBe(0);
  });

  it("burns the player standing in a fire", () => {
    const s1 = step(createInitialState({ fires: new Set(["A"]) }), { type: ActionType.Pass });
    expect(s1.health).toBe(4);
  });

  it("floors oxygen and health at zero without ending the game", () => {
    const state = createInitialState({
      oxygen: 0, health: 1, lifeSupportActive: false, fires: new Set(["A"]),
    });
    const s1 = step(state, { type: ActionType.Pass });
    expect(s1.oxygen).toBe(0);
    expect(s1.health).toBe(0);
    expect(s1.gameOver).toBe(false);
  });

  it("keeps the player phase after a PASS", () => {
    const s1 = step(createInitialState(), { type: ActionType.Pass });
    expect(s1.phase).toBe("PLAYER");
    expect(s1.turn).toBe(1);
  });
});
