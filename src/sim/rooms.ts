/**
 * Room consoles: the USE_ROOM effect for each room type.
 */
import type { GameState } from "../shared/types.js";
import { RoomType } from "../shared/types.js";
import { DESTRUCTION_TIMER, MAX_HEALTH } from "../shared/constants.js";
import { roomTypeOf } from "./board.js";
import { next, withoutMember } from "./state.js";

/**
 * Apply the console of the player's room. Returns null when the room has no
 * console or using it would change nothing (full ammo, full health, already armed).
 */
export function useRoom(state: GameState): GameState | null {
  const here = state.playerRoom;
  const counted = state.actionsInTurn + 1;

  switch (roomTypeOf(state.board, here)) {
    case RoomType.Control:
      return next(state, { lifeSupportActive: !state.lifeSupportActive, actionsInTurn: counted });

    case RoomType.Armory:
      if (state.ammo === state.ammoMax && !state.weaponJammed) return null;
      return next(state, { ammo: state.ammoMax, weaponJammed: false, actionsInTurn: counted });

    case RoomType.Surgery: {
      const health = state.health >= MAX_HEALTH ? state.health : state.health + 1;
      const seriousWounds = Math.max(0, state.seriousWounds - 1);
      if (health === state.health && seriousWounds === state.seriousWounds) return null;
      return next(state, { health, seriousWounds, actionsInTurn: counted });
    }

    case RoomType.Engine:
      if (state.selfDestructArmed) return null;
      return next(state, {
        selfDestructArmed: true,
        destructionTimer: DESTRUCTION_TIMER,
        actionsInTurn: counted,
      });

    case RoomType.FireControl:
      // Always spends the action, fire or not.
      return next(state, { fires: withoutMember(state.fires, here), actionsInTurn: counted });

    case RoomType.Default:
      return null;
  }
}
