import { describe, it, expect } from "vitest";
import { resolveAttack } from "../src/sim/combat.js";
import { step } from "../src/sim/step.js";
import { createInitialState } from "../src/sim/state.js";
import type { GameState, StateChanges } from "../src/shared/types.js";
import { ActionType } from "../src/shared/types.js";

/** Player in the armory (C) facing an intruder. */
function standoff(changes: StateChanges = {}): GameState {
  return createInitialState({ playerRoom: "C", intruders: new Map([["C", 2]]), ...changes });
}

describe("resolveAttack", () => {
  it("follows the fixed attack table", () => {
    expect(resolveAttack(11)).toEqual({ outcome: "hit", damage: 1, lastBullet: false });
    expect(resolveAttack(10)).toEqual({ outcome: "hit", damage: 1, lastBullet: true });
    expect(resolveAttack(14)).toEqual({ outcome: "crit", damage: 2, lastBullet: false });
    expect(resolveAttack(35)).toEqual({ outcome: "crit", damage: 2, lastBullet: true });
    expect(resolveAttack(13)).toEqual({ outcome: "jam", damage: 0, lastBullet: false });
  });

  it("lets a jam take precedence over a critical", () => {
    expect(resolveAttack(91).outcome).toBe("jam");
    expect(resolveAttack(65)).toEqual({ outcome: "jam", damage: 0, lastBullet: true });
  });

  it("misses on an exhausted deck", () => {
    expect(resolveAttack(0)).toEqual({ outcome: "miss", damage: 0, lastBullet: false });
    expect(resolveAttack(-3)).toEqual({ outcome: "miss", damage: 0, lastBullet: false });
  });
});

describe("SHOOT", () => {
  it("hits without spending ammo", () => {
    const s1 = step(standoff({ attackDeck: 11 }), { type: ActionType.Shoot });
    expect(s1.intruders.get("C")).toBe(1);
    expect(s1.ammo).toBe(3);
    expect(s1.attackDeck).toBe(10);
    expect(s1.actionsInTurn).toBe(1);
  });

  it("spends a round on the last-bullet trigger", () => {
    const s1 = step(standoff({ attackDeck: 10 }), { type: ActionType.Shoot });
    expect(s1.ammo).toBe(2);
    expect(s1.attackDeck).toBe(9);
    expect(s1.intruders.get("C")).toBe(1);
  });

  it("removes the intruder on a critical", () => {
    const s1 = step(standoff({ attackDeck: 14 }), { type: ActionType.Shoot });
    expect(s1.intruders.has("C")).toBe(false);
  });

  it("jams the weapon, and the armory clears it", () => {
    const s1 = step(standoff({ attackDeck: 13, ammo: 2 }), { type: ActionType.Shoot });
    expect(s1.weaponJammed).toBe(true);
    expect(s1.ammo).toBe(2);
    expect(s1.intruders.get("C")).toBe(2);

    const s2 = step(s1, { type: ActionType.UseRoom });
    expect(s2.weaponJammed).toBe(false);
    expect(s2.ammo).toBe(3);
  });

  it("does nothing to the intruder on an empty attack deck", () => {
    const s1 = step(standoff({ attackDeck: 0 }), { type: ActionType.Shoot });
    expect(s1.intruders.get("C")).toBe(2);
    expect(s1.ammo).toBe(3);
    expect(s1.attackDeck).toBe(0);
    expect(s1.actionsInTurn).toBe(1);
  });

  it("is a NOOP with nobody in the room", () => {
    const state = createInitialState({ attackDeck: 11 });
    expect(step(state, { type: ActionType.Shoot })).toEqual({ ...state, turn: 1 });
  });

  it("is a NOOP with a jammed weapon or no ammo", () => {
    for (const state of [standoff({ weaponJammed: true }), standoff({ ammo: 0 })]) {
      expect(step(state, { type: ActionType.Shoot })).toEqual({ ...state, turn: 1 });
    }
  });

  it("fires the final round", () => {
    const s1 = step(standoff({ ammo: 1, attackDeck: 5 }), { type: ActionType.Shoot });
    expect(s1.ammo).toBe(0);
    expect(s1.intruders.get("C")).toBe(1);
  });
});

describe("BURST", () => {
  it("always spends exactly one round", () => {
    const s1 = step(standoff({ attackDeck: 11 }), { type: ActionType.Burst });
    expect(s1.ammo).toBe(2);
    expect(s1.attackDeck).toBe(10);

    const s2 = step(standoff({ attackDeck: 10 }), { type: ActionType.Burst });
    expect(s2.ammo).toBe(2);
    expect(s2.attackDeck).toBe(9);
    expect(s2.intruders.get("C")).toBe(1);
  });
});

describe("MELEE", () => {
  it("trades a point of health for a point of damage", () => {
    const s1 = step(standoff(), { type: ActionType.Melee });
    expect(s1.intruders.get("C")).toBe(1);
    expect(s1.health).toBe(4);
    expect(s1.seriousWounds).toBe(0);

    const s2 = step(s1, { type: ActionType.Melee });
    expect(s2.intruders.has("C")).toBe(false);
    expect(s2.health).toBe(3);
    expect(s2.seriousWounds).toBe(1);
    expect(s2.actionsInTurn).toBe(0);
  });

  it("works without ammo", () => {
    const s1 = step(standoff({ ammo: 0 }), { type: ActionType.Melee });
    expect(s1.health).toBe(4);
  });

  it("caps serious wounds", () => {
    const s1 = step(standoff({ health: 2, seriousWounds: 3 }), { type: ActionType.Melee });
    expect(s1.health).toBe(1);
    expect(s1.seriousWounds).toBe(3);
  });

  it("never drops health below zero", () => {
    const s1 = step(standoff({ health: 0 }), { type: ActionType.Melee });
    expect(s1.health).toBe(0);
    expect(s1.seriousWounds).toBe(0);
    expect(s1.gameOver).toBe(false);
  });

  it("is a NOOP with nobody to fight", () => {
    const state = createInitialState();
    expect(step(state, { type: ActionType.Melee })).toEqual({ ...state, turn: 1 });
  });
});
