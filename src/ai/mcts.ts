/**
 * Monte Carlo tree search over the deterministic engine.
 *
 * Selection follows PUCT (Q + c·P·√N_parent / (1 + N_child)); a leaf is
 * expanded the second time it is reached and scored by a bounded random
 * rollout. The game has one decision maker, so values are never negated
 * between plies.
 */
import type { Action, GameState } from "../shared/types.js";
import { ActionType } from "../shared/types.js";
import {
  MCTS_C_PUCT, MCTS_DEFAULT_ITERATIONS, MCTS_MAX_DEPTH, MCTS_ROLLOUT_DEPTH,
} from "../shared/constants.js";
import { actionKey, legalActions } from "../sim/actions.js";
import { step } from "../sim/step.js";
import type { Agent } from "./agent.js";
import { evaluateState, terminalValue } from "./evaluate.js";
import type { Policy } from "./policy.js";
import { uniformPolicy } from "./policy.js";
import { createRng, pick } from "../sim/rng.js";
import type { Rng } from "../sim/rng.js";

export interface MctsOptions {
  policy?: Policy;
  cPuct?: number;
  rolloutDepth?: number;
  maxDepth?: number;
  seed?: number;
}

export class SearchNode {
  /** Visit count. */
  N = 0;
  /** Total backed-up value. */
  W = 0;
  /** Mean value, W / N. */
  Q = 0;
  readonly children = new Map<string, SearchNode>();

  constructor(
    readonly action: Action | null,
    /** Prior probability from the policy. */
    readonly P: number,
  ) {}

  get expanded(): boolean {
    return this.children.size > 0;
  }
}

export class Mcts {
  private readonly policy: Policy;
  private readonly cPuct: number;
  private readonly rolloutDepth: number;
  private readonly maxDepth: number;
  private readonly rng: Rng;
  private lastRoot: SearchNode | null = null;

  constructor(options: MctsOptions = {}) {
    this.policy = options.policy ?? uniformPolicy;
    this.cPuct = options.cPuct ?? MCTS_C_PUCT;
    this.rolloutDepth = options.rolloutDepth ?? MCTS_ROLLOUT_DEPTH;
    this.maxDepth = options.maxDepth ?? MCTS_MAX_DEPTH;
    this.rng = createRng(options.seed);
  }

  /** Root of the most recent search, for inspection. */
  get root(): SearchNode | null {
    return this.lastRoot;
  }

  /** Best action for `state`: the root child visited most (ties go to the earlier legal action). */
  search(state: GameState, iterations: number = MCTS_DEFAULT_ITERATIONS): Action {
    const actions = legalActions(state);
    if (actions.length === 0) return { type: ActionType.Noop };
    if (actions.length === 1) return actions[0];

    const root = new SearchNode(null, 1);
    this.lastRoot = root;
    for (let i = 0; i < iterations; i++) {
      this.iterate(state, root, 0);
    }

    let best: Action = actions[0];
    let bestVisits = -1;
    for (const action of actions) {
      const child = root.children.get(actionKey(action));
      if (child && child.N > bestVisits) {
        bestVisits = child.N;
        best = action;
      }
    }
    return best;
  }

  // ── Tree walk ──────────────────────────────────────────────

  private iterate(state: GameState, node: SearchNode, depth: number): number {
    const value = this.visit(state, node, depth);
    node.N += 1;
    node.W += value;
    node.Q = node.W / node.N;
    return value;
  }

  private visit(state: GameState, node: SearchNode, depth: number): number {
    const terminal = terminalValue(state);
    if (terminal !== null) return terminal;
    if (depth >= this.maxDepth) return evaluateState(state);

    const actions = legalActions(state);
    if (!node.expanded && node.N > 0) this.expand(node, state, actions);
    if (!node.expanded) return this.rollout(state);

    const selected = this.select(node, actions);
    if (selected === null) return this.rollout(state);
    const [action, child] = selected;
    return this.iterate(step(state, action), child, depth + 1);
  }

  private expand(node: SearchNode, state: GameState, actions: readonly Action[]): void {
    let priors = this.policy(state, actions);
    if (priors.length !== actions.length) priors = uniformPolicy(state, actions);
    actions.forEach((action, i) => {
      node.children.set(actionKey(action), new SearchNode(action, priors[i]));
    });
  }

  private select(node: SearchNode, actions: readonly Action[]): [Action, SearchNode] | null {
    const sqrtParent = Math.sqrt(node.N);
    let best: [Action, SearchNode] | null = null;
    let bestScore = -Infinity;

    for (const action of actions) {
      const child = node.children.get(actionKey(action));
      if (!child) continue;
      const score = child.Q + (this.cPuct * child.P * sqrtParent) / (1 + child.N);
      if (score > bestScore) {
        bestScore = score;
        best = [action, child];
      }
    }
    return best;
  }

  private rollout(state: GameState): number {
    let current = state;
    for (let depth = 0; depth < this.rolloutDepth; depth++) {
      if (current.gameOver) break;
      const action = pick(this.rng, legalActions(current));
      if (action === null) break;
      current = step(current, action);
    }
    return evaluateState(current);
  }
}

/** Agent wrapper: one fresh search per decision. */
export class MctsAgent implements Agent {
  readonly name = "mcts";
  private readonly mcts: Mcts;

  constructor(
    options: MctsOptions = {},
    private readonly iterations: number = MCTS_DEFAULT_ITERATIONS,
  ) {
    this.mcts = new Mcts(options);
  }

  act(state: GameState): Action {
    return this.mcts.search(state, this.iterations);
  }
}
