// ── Harness types for agents and the stdin protocol ─────────

/**
 * Structured observation of game state, for humans and LLM agents.
 * Rendered from GameState via buildObservation().
 */
export interface HarnessObservation {
  turn: number;
  round: number;
  phase: string;
  seed: number | null;
  gameOver: boolean;
  win: boolean;

  room: string;
  roomType: string;
  health: number;
  maxHealth: number;
  oxygen: number;
  ammo: number;
  ammoMax: number;
  weaponJammed: boolean;
  seriousWounds: number;
  actionsInTurn: number;
  actionsPerTurn: number;
  lifeSupportActive: boolean;

  exits: ExitEntry[];
  intruders: IntruderEntry[];
  fires: string[];
  selfDestruct: { armed: boolean; timer: number };
  eventDeck: number;
  attackDeck: number;

  alerts: string[];           // urgent warnings
  validActions: ValidAction[];
}

/** A corridor leaving the player's room. */
export interface ExitEntry {
  room: string;
  open: boolean;
  noise: number;
}

export interface IntruderEntry {
  room: string;
  hp: number;
  distance: number | null;    // open-corridor steps to the player; null if cut off
}

/**
 * One legal action, by its index in legalActions().
 */
export interface ValidAction {
  index: number;
  type: string;
  params?: HarnessParams;
  description: string;
}

/** Wire parameters. Snake case, as agents send them. */
export interface HarnessParams {
  to?: string;
  noise_edge?: [string, string];
  noise_roll?: string;
}

/**
 * An action submitted by an agent / LLM.
 */
export interface HarnessAction {
  type: string;               // MOVE, SHOOT, NEXT_PHASE, ...
  params?: HarnessParams;
}
