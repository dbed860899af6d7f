#!/usr/bin/env node
import { createInterface } from "node:readline";
import { readFileSync } from "node:fs";
import { step } from "../sim/step.js";
import { createGame } from "../sim/setup.js";
import { loadGame, saveGame } from "../sim/saveLoad.js";
import { outcomeOf } from "../sim/objectives.js";
import { DEFAULT_SEED } from "../shared/constants.js";
import type { GameState } from "../shared/types.js";
import { parseInputLine } from "./actionParser.js";
import { buildObservation, renderObservationAsText } from "./obsRenderer.js";

// ── Arg parsing ──────────────────────────────────────────────

interface CliArgs {
  seed: number;
  board: string;
  maxTurns: number;
  script: string | null;
  load: string | null;
  save: string | null;
  explore: boolean;
  eventCards: boolean;
}

function fail(message: string): never {
  console.error(`ERROR: ${message}`);
  process.exit(1);
}

function parseArgs(): CliArgs {
  const argv = process.argv.slice(2);
  const opts: CliArgs = {
    seed: DEFAULT_SEED,
    board: "default",
    maxTurns: 500,
    script: null,
    load: null,
    save: null,
    explore: false,
    eventCards: false,
  };

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
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
      case "--script":
        opts.script = argv[++i] ?? fail("--script requires a file path");
        break;
      case "--load":
        opts.load = argv[++i] ?? fail("--load requires a file path");
        break;
      case "--save":
        opts.save = argv[++i] ?? fail("--save requires a file path");
        break;
      case "--explore":
        opts.explore = true;
        break;
      case "--event-cards":
        opts.eventCards = true;
        break;
      default:
        console.error(`WARNING: Unknown argument "${argv[i]}"`);
        break;
    }
  }

  return opts;
}

// ── Observation ──────────────────────────────────────────────

/**
 * Emit the observation block to stdout, delimited for agent parsing.
 */
function emitObservation(state: GameState): void {
  console.log("===OBSERVATION_START===");
  console.log(renderObservationAsText(buildObservation(state)));
  console.log("===OBSERVATION_END===");
}

// ── Game summary ─────────────────────────────────────────────

function printSummary(state: GameState): void {
  const outcome = outcomeOf(state);
  console.log("");
  console.log("=== GAME SUMMARY ===");
  console.log(`Result: ${outcome === "win" ? "ESCAPED" : outcome === "loss" ? "DEFEAT" : "UNFINISHED"}`);
  console.log(`Turns: ${state.turn}`);
  console.log(`Rounds: ${state.round}`);
  console.log(`Health: ${state.health}  Oxygen: ${state.oxygen}  Ammo: ${state.ammo}/${state.ammoMax}`);
  console.log(`Intruders on board: ${state.intruders.size}`);
}

function finish(state: GameState, args: CliArgs): void {
  printSummary(state);
  if (args.save) {
    saveGame(args.save, state);
    console.log(`Saved to ${args.save}`);
  }
}

// ── Script mode ──────────────────────────────────────────────

function runScript(args: CliArgs, scriptPath: string, initial: GameState): void {
  let state = initial;
  let rawLines: string[];
  try {
    const content = readFileSync(scriptPath, "utf-8");
    rawLines = content.split("\n").map(l => l.trim()).filter(l => l.length > 0 && !l.startsWith("//"));
  } catch (err) {
    fail(`Could not read script file "${scriptPath}": ${err instanceof Error ? err.message : String(err)}`);
  }

  emitObservation(state);

  for (const line of rawLines) {
    if (state.gameOver) break;
    if (state.turn >= args.maxTurns) {
      console.log(`MAX TURNS (${args.maxTurns}) reached.`);
      break;
    }

    const result = parseInputLine(line, state);
    if ("error" in result) {
      console.log(`===ERROR=== ${result.error}`);
      continue;
    }

    state = step(state, result);
    emitObservation(state);
  }

  finish(state, args);
}

// ── Interactive stdin mode ───────────────────────────────────

async function runInteractive(args: CliArgs, initial: GameState): Promise<number> {
  let state = initial;
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: false,
  });

  emitObservation(state);

  for await (const line of rl) {
    const trimmed = line.trim();
    if (trimmed.length === 0) continue;

    if (trimmed.toLowerCase() === "quit" || trimmed.toLowerCase() === "exit") {
      console.log("Agent requested exit.");
      finish(state, args);
      rl.close();
      return 0;
    }

    const result = parseInputLine(trimmed, state);
    if ("error" in result) {
      console.log(`===ERROR=== ${result.error}`);
      // Re-emit so the agent can try again
      emitObservation(state);
      continue;
    }

    state = step(state, result);
    emitObservation(state);

    if (state.gameOver) {
      finish(state, args);
      rl.close();
      return state.win ? 0 : 1;
    }

    if (state.turn >= args.maxTurns) {
      console.log(`MAX TURNS (${args.maxTurns}) reached.`);
      finish(state, args);
      rl.close();
      return 1;
    }
  }

  // stdin closed (pipe ended)
  console.log("stdin closed.");
  finish(state, args);
  return 0;
}

// ── Main ─────────────────────────────────────────────────────

function initialState(args: CliArgs): GameState {
  if (args.load) {
    return loadGame(args.load) ?? fail(`Could not load a game from "${args.load}"`);
  }
  const game = createGame({
    board: args.board,
    seed: args.seed,
    explore: args.explore,
    eventCards: args.eventCards,
  });
  if ("error" in game) fail(game.error);
  return game;
}

async function main(): Promise<void> {
  const args = parseArgs();

  console.log("Station Survival Harness v0.1");
  console.log(`Seed: ${args.seed}  Board: ${args.board}  Max turns: ${args.maxTurns}`);
  if (args.script) {
    console.log(`Script: ${args.script}`);
  }
  console.log("");

  const state = initialState(args);

  if (args.script) {
    runScript(args, args.script, state);
  } else {
    process.exitCode = await runInteractive(args, state);
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
