/**
 * Combat resolution.
 *
 * The attack deck is a counter, not a shuffled deck: outcomes come from fixed
 * arithmetic on its current value so that a replay is exact. The moduli stand
 * in for the tabletop dice and are not tuned balance.
 */
import type { AttackResult, GameState, RoomId } from "../shared/types.js";
import {
  JAM_MODULUS, CRIT_MODULUS, LAST_BULLET_MODULUS, HIT_DAMAGE, CRIT_DAMAGE,
  MAX_SERIOUS_WOUNDS, SERIOUS_WOUND_THRESHOLDS,
} from "../shared/constants.js";
import { canFire, intruderHere } from "./actions.js";
import { next, withEntry, withoutKeys } from "./state.js";

export function resolveAttack(deck: number): AttackResult {
  // An exhausted deck has nothing to draw: a plain miss.
  if (deck <= 0) return { outcome: "miss", damage: 0, lastBullet: false };

  const lastBullet = deck % LAST_BULLET_MODULUS === 0;
  if (deck % JAM_MODULUS === 0) return { outcome: "jam", damage: 0, lastBullet };
  if (deck % CRIT_MODULUS === 0) return { outcome: "crit", damage: CRIT_DAMAGE, lastBullet };
  return { outcome: "hit", damage: HIT_DAMAGE, lastBullet };
}

/** Intruder map after `damage` to the intruder in `room`; removed at HP ≤ 0. */
export function damageIntruder(
  intruders: ReadonlyMap<RoomId, number>,
  room: RoomId,
  damage: number,
): ReadonlyMap<RoomId, number> {
  const hp = intruders.get(room);
  if (hp === undefined || damage <= 0) return intruders;
  const left = hp - damage;
  return left > 0 ? withEntry(intruders, room, left) : withoutKeys(intruders, [room]);
}

/**
 * SHOOT (burst = false) and BURST (burst = true). SHOOT only spends ammo on
 * the last-bullet trigger; BURST always spends exactly one.
 * Returns null when the weapon cannot fire.
 */
export function handleRangedAttack(state: GameState, burst: boolean): GameState | null {
  if (!canFire(state)) return null;

  const result = resolveAttack(state.attackDeck);
  const spent = burst || result.lastBullet ? 1 : 0;

  return next(state, {
    attackDeck: Math.max(0, state.attackDeck - 1),
    ammo: Math.max(0, state.ammo - spent),
    weaponJammed: state.weaponJammed || result.outcome === "jam",
    intruders: damageIntruder(state.intruders, state.playerRoom, result.damage),
    actionsInTurn: state.actionsInTurn + 1,
  });
}

export function handleMelee(state: GameState): GameState | null {
  if (!intruderHere(state)) return null;

  const health = Math.max(0, state.health - 1);
  const wounded = SERIOUS_WOUND_THRESHOLDS.includes(health) && state.seriousWounds < MAX_SERIOUS_WOUNDS;

  return next(state, {
    intruders: damageIntruder(state.intruders, state.playerRoom, 1),
    health,
    seriousWounds: wounded ? state.seriousWounds + 1 : state.seriousWounds,
    actionsInTurn: state.actionsInTurn + 1,
  });
}
