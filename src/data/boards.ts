import type { BoardDef } from "../shared/types.js";
import { RoomType } from "../shared/types.js";

/** Five rooms in a chain, one of every console type. */
export const DEFAULT_BOARD_DEF: BoardDef = {
  rooms: ["A", "B", "C", "D", "E"],
  edges: [
    ["A", "B"],
    ["B", "C"],
    ["C", "D"],
    ["D", "E"],
  ],
  roomTypes: {
    A: RoomType.FireControl,
    B: RoomType.Control,
    C: RoomType.Armory,
    D: RoomType.Surgery,
    E: RoomType.Engine,
  },
};

/** Larger loop layout used by self-play runs. */
export const STATION_BOARD_DEF: BoardDef = {
  rooms: [
    "hibernatorium",
    "corridor_fore",
    "armory",
    "surgery",
    "command",
    "fire_control",
    "storage",
    "engine_1",
  ],
  edges: [
    ["hibernatorium", "corridor_fore"],
    ["corridor_fore", "armory"],
    ["corridor_fore", "surgery"],
    ["armory", "command"],
    ["surgery", "storage"],
    ["command", "fire_control"],
    ["storage", "fire_control"],
    ["fire_control", "engine_1"],
    ["storage", "engine_1"],
  ],
  roomTypes: {
    armory: RoomType.Armory,
    surgery: RoomType.Surgery,
    command: RoomType.Control,
    fire_control: RoomType.FireControl,
    engine_1: RoomType.Engine,
  },
};

export const BOARD_DEFS: Readonly<Record<string, BoardDef>> = {
  default: DEFAULT_BOARD_DEF,
  station: STATION_BOARD_DEF,
};

/** Where the player wakes up on each built-in board. */
export const BOARD_START_ROOMS: Readonly<Record<string, string>> = {
  default: "A",
  station: "hibernatorium",
};
