import { describe, it, expect } from "vitest";
import { createAgent, isAgentKind, runSelfPlay } from "../src/harness/selfplay.js";
import type { Agent } from "../src/ai/agent.js";
import { RandomAgent } from "../src/ai/randomAgent.js";
import { createInitialState } from "../src/sim/state.js";
import { ActionType } from "../src/shared/types.js";

const escaper: Agent = {
  name: "escaper",
  act: () => ({ type: ActionType.Escape }),
};

describe("runSelfPlay", () => {
  it("stops as soon as the game is won", async () => {
    const result = await runSelfPlay({
      agent: escaper,
      initial: createInitialState({ playerRoom: "E" }),
      maxTurns: 10,
    });
    expect(result.outcome).toBe("win");
    expect(result.steps).toBe(1);
    expect(result.turns).toBe(1);
    expect(result.distinctStates).toBe(2);
  });

  it("stops at the turn limit", async () => {
    const result = await runSelfPlay({
      agent: new RandomAgent(3),
      initial: createInitialState({ seed: 3 }),
      maxTurns: 25,
    });
    expect(result.steps).toBeLessThanOrEqual(25);
    expect(result.turns).toBe(result.steps);
    expect(result.distinctStates).toBe(result.steps + 1);
    if (result.steps < 25) expect(result.outcome).not.toBe("ongoing");
  });
});

describe("createAgent", () => {
  it("builds each kind", () => {
    expect(createAgent("random", { seed: 1 }).name).toBe("random");
    expect(createAgent("mcts", { seed: 1, iterations: 5 }).name).toBe("mcts");
    expect(createAgent("llm").name).toBe("llm");
  });

  it("recognises agent kinds", () => {
    expect(isAgentKind("mcts")).toBe(true);
    expect(isAgentKind("human")).toBe(false);
  });
});
