import { describe, it, expect } from "vitest";
import { step } from "../src/sim/step.js";
import { createInitialState } from "../src/sim/state.js";
import { outcomeOf, tickSelfDestruct } from "../src/sim/objectives.js";
import type { GameState } from "../src/shared/types.js";
import { ActionType, Phase } from "../src/shared/types.js";

/** PASS, then play the round through to the next CLEANUP. */
function playRound(state: GameState): GameState {
  let s = step(state, { type: ActionType.Pass });
  s = step(s, { type: ActionType.EndPlayerPhase });
  s = step(s, { type: ActionType.NextPhase }); // EVENT
  return step(s, { type: ActionType.NextPhase }); // CLEANUP
}

describe("self-destruct", () => {
  it("counts down over three cleanups and ends in a loss", () => {
    const armed = step(createInitialState({ playerRoom: "E" }), { type: ActionType.UseRoom });
    expect(armed.selfDestructArmed).toBe(true);
    expect(armed.destructionTimer).toBe(3);

    const r1 = playRound(armed);
    expect(r1.destructionTimer).toBe(2);
    expect(r1.gameOver).toBe(false);

    const r2 = playRound(step(r1, { type: ActionType.NextPhase }));
    expect(r2.destructionTimer).toBe(1);

    const r3 = playRound(step(r2, { type: ActionType.NextPhase }));
    expect(r3.destructionTimer).toBe(0);
    expect(r3.gameOver).toBe(true);
    expect(r3.win).toBe(false);
    expect(outcomeOf(r3)).toBe("loss");
  });

  it("does nothing while disarmed", () => {
    const state = createInitialState({ phase: Phase.Cleanup });
    expect(tickSelfDestruct(state)).toBe(state);
  });

  it("does not overturn an escape", () => {
    const state = createInitialState({
      selfDestructArmed: true, destructionTimer: 1, gameOver: true, win: true,
    });
    const after = tickSelfDestruct(state);
    expect(after.destructionTimer).toBe(0);
    expect(after.win).toBe(true);
  });
});

describe("outcomeOf", () => {
  it("reads the game flags", () => {
    expect(outcomeOf(createInitialState())).toBe("ongoing");
    expect(outcomeOf(createInitialState({ gameOver: true, win: true }))).toBe("win");
    expect(outcomeOf(createInitialState({ gameOver: true }))).toBe("loss");
  });

  it("stays settled as the engine keeps accepting actions", () => {
    const won = step(createInitialState({ playerRoom: "E" }), { type: ActionType.Escape });
    const later = step(won, { type: ActionType.Noop });
    expect(later.turn).toBe(2);
    expect(outcomeOf(later)).toBe("win");
  });
});
