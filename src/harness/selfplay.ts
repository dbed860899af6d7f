#!/usr/bin/env node
/**
 * Self-play runner: lets an agent play a full game and reports the result.
 *
 * Usage:
 *   tsx src/harness/selfplay.ts [--agent random|mcts|llm] [--seed N] [--board NAME]
 *                               [--max-turns N] [--iterations N] [--persona TEXT] [--verbose]
 */

import { DEFAULT_SEED, MCTS_DEFAULT_ITERATIONS } from "../shared/constants.js";
import type { GameState } from "../shared/types.js";
import { Environment } from "../sim/environment.js";
import { createGame } from "../sim/setup.js";
import { stateKey } from "../sim/saveLoad.js";
import { outcomeOf } from "../sim/objectives.js";
import type { Outcome } from "../sim/objectives.js";
import type { Agent } from "../ai/agent.js";
import { RandomAgent } from "../ai/randomAgent.js";
import { MctsAgent } from "../ai/mcts.js";
import { LlmAgent } from "../ai/llmAgent.js";
import { actionLabel } from "./actionParser.js";

export type AgentKind = "random" | "mcts" | "llm";

const AGENT_KINDS: readonly AgentKind[] = ["random", "mcts", "llm"];
const DEFAULT_MAX_TURNS = 200;

export interface SelfPlayOptions {
  agent: Agent;
  initial: GameState;
  maxTurns: number;
  verbose?: boolean;
}

export interface SelfPlayResult {
  outcome: Outcome;
  turns: number;
  rounds: number;
  steps: number;
  distinctStates: number;
  finalState: GameState;
}

export function createAgent(
  kind: AgentKind,
  opts: { seed?: number; iterations?: number; persona?: string } = {},
): Agent {
  switch (kind) {
    case "random":
      return new RandomAgent(opts.seed);
    case "mcts":
      return new MctsAgent({ seed: opts.seed }, opts.iterations ?? MCTS_DEFAULT_ITERATIONS);
    case "llm":
      return new LlmAgent({ persona: opts.persona });
  }
}

export function isAgentKind(value: string): value is AgentKind {
  return AGENT_KINDS.some(k => k === value);
}

/** Play until the game ends or `maxTurns` steps have been taken. */
export async function runSelfPlay(options: SelfPlayOptions): Promise<SelfPlayResult> {
  const env = new Environment();
  env.reset(options.initial.seed, options.initial);
  const seen = new Set<string>([stateKey(env.state)]);
  let steps = 0;

  while (!env.done && steps < options.maxTurns) {
    const action = await options.agent.act(env.state);
    const { state } = env.step(action);
    steps++;
    seen.add(stateKey(state));
    if (options.verbose) {
      process.stderr.write(
        `[selfplay] turn=${state.turn} phase=${state.phase} ${actionLabel(action)} ` +
        `hp=${state.health} o2=${state.oxygen} ammo=${state.ammo}\n`,
      );
    }
  }

  return {
    outcome: outcomeOf(env.state),
    turns: env.state.turn,
    rounds: env.state.round,
    steps,
    distinctStates: seen.size,
    finalState: env.state,
  };
}

// ── CLI ──────────────────────────────────────────────────────

interface SelfPlayArgs {
  agent: AgentKind;
  seed: number;
  board: string;
  maxTurns: number;
  iterations: number;
  persona: string | undefined;
  verbose: boolean;
}

function fail(message: string): never {
  console.error(`ERROR: ${message}`);
  process.exit(1);
}

function parseArgs(argv: string[]): SelfPlayArgs {
  const opts: SelfPlayArgs = {
    agent: "random",
    seed: DEFAULT_SEED,
    board: "station",
    maxTurns: DEFAULT_MAX_TURNS,
    iterations: MCTS_DEFAULT_ITERATIONS,
    persona: undefined,
    verbose: false,
  };

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case "--agent": {
        const kind = argv[++i] ?? "";
        if (!isAgentKind(kind)) fail(`--agent must be one of ${AGENT_KINDS.join(", ")}`);
        opts.agent = kind;
        break;
      }
      case "--seed":
        opts.seed = parseInt(argv[++i], 10);
        if (Number.isNaN(opts.seed)) fail("--seed requires a valid integer");
        break;
      case "--board":
        opts.board = argv[++i] ?? fail("--board requires a board name");
        break;
      case "--max-turns":
        opts.maxTurns = parseInt(argv[++i], 10);
        if (Number.isNaN(opts.maxTurns) || opts.maxTurns < 1) fail("--max-turns requires a positive integer");
        break;
      case "--iterations":
        opts.iterations = parseInt(argv[++i], 10);
        if (Number.isNaN(opts.iterations) || opts.iterations < 1) fail("--iterations requires a positive integer");
        break;
      case "--persona":
        opts.persona = argv[++i];
        break;
      case "--verbose":
        opts.verbose = true;
        break;
      default:
        console.error(`WARNING: Unknown argument "${argv[i]}"`);
        break;
    }
  }
  return opts;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const initial = createGame({ board: args.board, seed: args.seed, eventCards: true });
  if ("error" in initial) fail(initial.error);

  process.stderr.write(
    `[selfplay] agent=${args.agent} seed=${args.seed} board=${args.board} maxTurns=${args.maxTurns}\n`,
  );

  const agent = createAgent(args.agent, { seed: args.seed, iterations: args.iterations, persona: args.persona });
  const result = await runSelfPlay({ agent, initial, maxTurns: args.maxTurns, verbose: args.verbose });

  console.log("");
  console.log("=== SELF-PLAY SUMMARY ===");
  console.log(`Agent: ${agent.name}`);
  console.log(`Result: ${result.outcome.toUpperCase()}`);
  console.log(`Turns: ${result.turns}`);
  console.log(`Rounds: ${result.rounds}`);
  console.log(`Distinct states: ${result.distinctStates}`);
  console.log(`Final health: ${result.finalState.health}  oxygen: ${result.finalState.oxygen}`);
}

const isMainModule =
  process.argv[1] &&
  (process.argv[1].endsWith("selfplay.ts") ||
   process.argv[1].endsWith("selfplay.js") ||
   process.argv[1].endsWith("station-selfplay"));

if (isMainModule) {
  main().catch(err => {
    process.stderr.write(`[selfplay] Fatal error: ${err}\n`);
    process.exit(1);
  });
}
