import type { Action, GameState, NoiseTarget, RoomId } from "../shared/types.js";
import { ActionType } from "../shared/types.js";
import { legalActions } from "../sim/actions.js";
import type { HarnessAction, HarnessParams, ValidAction } from "./types.js";

type ParseError = { error: string };
type Parsed<T> = T | ParseError;

export function isParseError<T extends object>(value: Parsed<T>): value is ParseError {
  return "error" in value;
}

const ACTION_TYPES: readonly ActionType[] = Object.values(ActionType);
const NOISE_TARGETS: readonly NoiseTarget[] = ["corridor", "room"];

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ── Parameter readers ────────────────────────────────────────

function readTo(params: Record<string, unknown>, type: ActionType): Parsed<RoomId> {
  const to = params.to;
  if (typeof to !== "string" || to.length === 0) {
    return { error: `${type} requires params.to (a room id)` };
  }
  return to;
}

function readNoiseRoll(params: Record<string, unknown>): Parsed<{ noiseRoll?: NoiseTarget }> {
  const roll = params.noise_roll;
  if (roll === undefined || roll === null) return {};
  const target = NOISE_TARGETS.find(t => t === roll);
  if (target === undefined) {
    return { error: `params.noise_roll must be "corridor" or "room", got ${JSON.stringify(roll)}` };
  }
  return { noiseRoll: target };
}

function readNoiseEdge(params: Record<string, unknown>): Parsed<{ noiseEdge?: readonly [RoomId, RoomId] }> {
  const edge = params.noise_edge;
  if (edge === undefined || edge === null) return {};
  if (!Array.isArray(edge) || edge.length !== 2) {
    return { error: "params.noise_edge must be a [room, room] pair" };
  }
  const [a, b] = edge;
  if (typeof a !== "string" || typeof b !== "string") {
    return { error: "params.noise_edge must be a [room, room] pair" };
  }
  return { noiseEdge: [a, b] };
}

// ── Action parsing ───────────────────────────────────────────

/**
 * Convert a decoded wire object into an Action or an error.
 *
 * Expected shapes:
 *   {"type": "MOVE", "params": {"to": "B"}}
 *   {"type": "MOVE_CAUTIOUS", "params": {"to": "B", "noise_edge": ["B", "C"]}}
 *   {"type": "NEXT_PHASE", "params": {"noise_roll": "room"}}
 *   {"type": "SHOOT"}
 */
export function actionFromWire(value: unknown): Parsed<Action> {
  if (!isObject(value)) return { error: "Action must be a JSON object" };

  const rawType = value.type;
  if (typeof rawType !== "string") return { error: `Missing or invalid "type" field` };
  const type = ACTION_TYPES.find(t => t === rawType.toUpperCase());
  if (type === undefined) {
    return { error: `Unknown action "${rawType}". Valid: ${ACTION_TYPES.join(", ")}.` };
  }

  const rawParams = value.params ?? {};
  if (!isObject(rawParams)) return { error: `"params" must be an object` };

  switch (type) {
    case ActionType.Move: {
      const to = readTo(rawParams, type);
      if (typeof to !== "string") return to;
      const roll = readNoiseRoll(rawParams);
      if (isParseError(roll)) return roll;
      return { type, to, ...roll };
    }
    case ActionType.MoveCautious: {
      const to = readTo(rawParams, type);
      if (typeof to !== "string") return to;
      const roll = readNoiseRoll(rawParams);
      if (isParseError(roll)) return roll;
      const edge = readNoiseEdge(rawParams);
      if (isParseError(edge)) return edge;
      return { type, to, ...edge, ...roll };
    }
    case ActionType.OpenDoor:
    case ActionType.CloseDoor: {
      const to = readTo(rawParams, type);
      if (typeof to !== "string") return to;
      return { type, to };
    }
    case ActionType.NextPhase: {
      const roll = readNoiseRoll(rawParams);
      if (isParseError(roll)) return roll;
      return { type, ...roll };
    }
    default:
      return { type };
  }
}

/** Parse one line of JSON from an agent into an Action or an error. */
export function parseAction(input: string): Parsed<Action> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(input.trim());
  } catch {
    return { error: `Invalid JSON: ${input.trim()}` };
  }
  return actionFromWire(parsed);
}

// ── Serialization ────────────────────────────────────────────

/** Wire form of an action; parseAction(JSON.stringify(...)) gives it back. */
export function serializeAction(action: Action): HarnessAction {
  const params: HarnessParams = {};
  switch (action.type) {
    case ActionType.Move:
      params.to = action.to;
      if (action.noiseRoll) params.noise_roll = action.noiseRoll;
      break;
    case ActionType.MoveCautious:
      params.to = action.to;
      if (action.noiseEdge) params.noise_edge = [action.noiseEdge[0], action.noiseEdge[1]];
      if (action.noiseRoll) params.noise_roll = action.noiseRoll;
      break;
    case ActionType.OpenDoor:
    case ActionType.CloseDoor:
      params.to = action.to;
      break;
    case ActionType.NextPhase:
      if (action.noiseRoll) params.noise_roll = action.noiseRoll;
      break;
    default:
      break;
  }
  return Object.keys(params).length > 0 ? { type: action.type, params } : { type: action.type };
}

/** Short label: the type, plus the target room where there is one. */
export function actionLabel(action: Action): string {
  switch (action.type) {
    case ActionType.Move:
    case ActionType.MoveCautious:
    case ActionType.OpenDoor:
    case ActionType.CloseDoor:
      return `${action.type} ${action.to}`;
    default:
      return action.type;
  }
}

/**
 * Format an action as a human-readable description string.
 */
export function describeAction(action: Action): string {
  switch (action.type) {
    case ActionType.Move:
      return `Move to ${action.to}`;
    case ActionType.MoveCautious:
      return `Move carefully to ${action.to}`;
    case ActionType.OpenDoor:
      return `Open the door to ${action.to}`;
    case ActionType.CloseDoor:
      return `Close the door to ${action.to}`;
    case ActionType.Shoot:
      return "Shoot the intruder";
    case ActionType.Burst:
      return "Fire a burst at the intruder";
    case ActionType.Melee:
      return "Fight the intruder hand to hand";
    case ActionType.UseRoom:
      return "Use the room console";
    case ActionType.Escape:
      return "Escape the station";
    case ActionType.Pass:
      return "Pass the rest of the turn";
    case ActionType.EndPlayerPhase:
      return "End the player phase";
    case ActionType.NextPhase:
      return "Advance to the next phase";
    case ActionType.Noop:
      return "Do nothing";
  }
}

// ── Valid action enumeration ─────────────────────────────────

/**
 * Legal actions for the current state, indexed as legalActions() orders them.
 */
export function getValidActionsForState(state: GameState): ValidAction[] {
  return legalActions(state).map((action, index) => ({
    index,
    ...serializeAction(action),
    description: describeAction(action),
  }));
}

/**
 * One protocol line: a JSON action, or the bare index of a legal action.
 */
export function parseInputLine(line: string, state: GameState): Parsed<Action> {
  const trimmed = line.trim();
  if (/^\d+$/.test(trimmed)) {
    const actions = legalActions(state);
    const index = Number.parseInt(trimmed, 10);
    if (index >= actions.length) {
      return { error: `Action index ${index} out of range 0..${actions.length - 1}` };
    }
    return actions[index];
  }
  return parseAction(trimmed);
}
