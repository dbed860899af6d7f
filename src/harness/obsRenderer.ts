import type { GameState } from "../shared/types.js";
import { ACTIONS_PER_TURN, MAX_HEALTH } from "../shared/constants.js";
import { edgeEnds, incidentEdges, isOpen, roomTypeOf } from "../sim/board.js";
import { distancesFrom } from "../sim/intruders.js";
import { getValidActionsForState } from "./actionParser.js";
import type { ExitEntry, HarnessObservation, IntruderEntry } from "./types.js";

const LOW_HEALTH = 2;
const LOW_OXYGEN = 2;

// ── Observation builder ──────────────────────────────────────

function buildExits(state: GameState): ExitEntry[] {
  const here = state.playerRoom;
  return incidentEdges(state.board, here).map(edge => {
    const [a, b] = edgeEnds(edge);
    const room = a === here ? b : a;
    return { room, open: isOpen(state, here, room), noise: state.noise.get(edge) ?? 0 };
  });
}

function buildIntruders(state: GameState): IntruderEntry[] {
  const dist = distancesFrom(state, state.playerRoom);
  return [...state.intruders.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([room, hp]) => ({ room, hp, distance: dist.get(room) ?? null }));
}

function buildAlerts(state: GameState): string[] {
  const alerts: string[] = [];
  const here = state.playerRoom;
  if (state.intruders.has(here)) alerts.push("Intruder in this room");
  if (state.fires.has(here)) alerts.push("This room is on fire");
  if (!state.lifeSupportActive) alerts.push("Life support is offline");
  if (state.oxygen <= LOW_OXYGEN) alerts.push(`Oxygen low (${state.oxygen})`);
  if (state.health <= LOW_HEALTH) alerts.push(`Health low (${state.health})`);
  if (state.weaponJammed) alerts.push("Weapon jammed");
  if (state.selfDestructArmed) {
    alerts.push(`Self-destruct armed: ${state.destructionTimer} cleanup(s) left`);
  }
  return alerts;
}

/**
 * Snapshot everything an agent needs to pick its next action.
 */
export function buildObservation(state: GameState): HarnessObservation {
  return {
    turn: state.turn,
    round: state.round,
    phase: state.phase,
    seed: state.seed ?? null,
    gameOver: state.gameOver,
    win: state.win,

    room: state.playerRoom,
    roomType: roomTypeOf(state.board, state.playerRoom),
    health: state.health,
    maxHealth: MAX_HEALTH,
    oxygen: state.oxygen,
    ammo: state.ammo,
    ammoMax: state.ammoMax,
    weaponJammed: state.weaponJammed,
    seriousWounds: state.seriousWounds,
    actionsInTurn: state.actionsInTurn,
    actionsPerTurn: ACTIONS_PER_TURN,
    lifeSupportActive: state.lifeSupportActive,

    exits: buildExits(state),
    intruders: buildIntruders(state),
    fires: [...state.fires].sort(),
    selfDestruct: { armed: state.selfDestructArmed, timer: state.destructionTimer },
    eventDeck: state.eventDeck,
    attackDeck: state.attackDeck,

    alerts: buildAlerts(state),
    validActions: getValidActionsForState(state),
  };
}

// ── Text rendering ───────────────────────────────────────────

/**
 * Render a HarnessObservation to a human/LLM-readable text block.
 */
export function renderObservationAsText(obs: HarnessObservation): string {
  const lines: string[] = [];

  // Header
  lines.push(`=== TURN ${obs.turn} | ROUND ${obs.round} | ${obs.phase} | ${obs.room} (${obs.roomType}) ===`);
  lines.push(
    `Health: ${obs.health}/${obs.maxHealth} | Oxygen: ${obs.oxygen} | Ammo: ${obs.ammo}/${obs.ammoMax} | Wounds: ${obs.seriousWounds}`,
  );
  lines.push(
    `Actions: ${obs.actionsInTurn}/${obs.actionsPerTurn} | Life support: ${obs.lifeSupportActive ? "ON" : "OFF"} | Weapon: ${obs.weaponJammed ? "JAMMED" : "ready"}`,
  );

  if (obs.gameOver) {
    lines.push(obs.win ? ">>> ESCAPED <<<" : ">>> GAME OVER <<<");
  }

  // Alerts
  if (obs.alerts.length > 0) {
    lines.push("");
    lines.push("ALERTS:");
    for (const alert of obs.alerts) {
      lines.push(`  ! ${alert}`);
    }
  }

  // Exits
  lines.push("");
  lines.push("EXITS:");
  if (obs.exits.length === 0) lines.push("  (none)");
  for (const exit of obs.exits) {
    lines.push(`  ${exit.room.padEnd(16)} ${exit.open ? "open  " : "CLOSED"} noise=${exit.noise}`);
  }

  if (obs.intruders.length > 0) {
    lines.push("");
    lines.push("INTRUDERS:");
    for (const i of obs.intruders) {
      const dist = i.distance === null ? "unreachable" : `dist=${i.distance}`;
      lines.push(`  ${i.room.padEnd(16)} hp=${i.hp} ${dist}`);
    }
  }

  if (obs.fires.length > 0) {
    lines.push("");
    lines.push(`FIRES: ${obs.fires.join(", ")}`);
  }

  // Valid actions
  lines.push("");
  lines.push("VALID ACTIONS:");
  for (const a of obs.validActions) {
    const target = a.params?.to ? ` ${a.params.to}` : "";
    lines.push(`  [${a.index}] ${a.type}${target}: ${a.description}`);
  }

  return lines.join("\n");
}
