// ── Board ────────────────────────────────────────────────────
export type RoomId = string;

/** Canonical undirected edge key: `"<min>|<max>"`. Build with normEdge(). */
export type EdgeKey = `${string}|${string}`;

export enum RoomType {
  Default = "DEFAULT",
  Control = "CONTROL",
  Armory = "ARMORY",
  Surgery = "SURGERY",
  Engine = "ENGINE",
  FireControl = "FIRE_CONTROL",
}

export interface Board {
  readonly rooms: ReadonlySet<RoomId>;
  readonly edges: ReadonlySet<EdgeKey>;
  readonly roomTypes: ReadonlyMap<RoomId, RoomType>;
}

/** Plain description of a board, as written in src/data/boards.ts. */
export interface BoardDef {
  rooms: readonly RoomId[];
  edges: readonly (readonly [RoomId, RoomId])[];
  roomTypes?: Readonly<Record<RoomId, RoomType>>;
}

// ── Phases ───────────────────────────────────────────────────
export enum Phase {
  Setup = "SETUP",
  Player = "PLAYER",
  Enemy = "ENEMY",
  Event = "EVENT",
  Cleanup = "CLEANUP",
}

// ── Actions ──────────────────────────────────────────────────
export enum ActionType {
  Noop = "NOOP",
  Pass = "PASS",
  Move = "MOVE",
  MoveCautious = "MOVE_CAUTIOUS",
  OpenDoor = "OPEN_DOOR",
  CloseDoor = "CLOSE_DOOR",
  Shoot = "SHOOT",
  Burst = "BURST",
  Melee = "MELEE",
  UseRoom = "USE_ROOM",
  Escape = "ESCAPE",
  EndPlayerPhase = "END_PLAYER_PHASE",
  NextPhase = "NEXT_PHASE",
}

/** Where a noise roll lands: on a corridor edge or in a room. */
export type NoiseTarget = "corridor" | "room";

export type Action =
  | { readonly type: ActionType.Noop }
  | { readonly type: ActionType.Pass }
  | { readonly type: ActionType.Move; readonly to: RoomId; readonly noiseRoll?: NoiseTarget }
  | {
      readonly type: ActionType.MoveCautious;
      readonly to: RoomId;
      readonly noiseEdge?: readonly [RoomId, RoomId];
      readonly noiseRoll?: NoiseTarget;
    }
  | { readonly type: ActionType.OpenDoor; readonly to: RoomId }
  | { readonly type: ActionType.CloseDoor; readonly to: RoomId }
  | { readonly type: ActionType.Shoot }
  | { readonly type: ActionType.Burst }
  | { readonly type: ActionType.Melee }
  | { readonly type: ActionType.UseRoom }
  | { readonly type: ActionType.Escape }
  | { readonly type: ActionType.EndPlayerPhase }
  | { readonly type: ActionType.NextPhase; readonly noiseRoll?: NoiseTarget };

export type ActionOf<T extends ActionType> = Extract<Action, { type: T }>;

// ── Combat ───────────────────────────────────────────────────
export type AttackOutcome = "hit" | "crit" | "miss" | "jam";

export interface AttackResult {
  outcome: AttackOutcome;
  damage: number;
  lastBullet: boolean;
}

// ── Game state ───────────────────────────────────────────────
export interface GameState {
  readonly turn: number;
  readonly phase: Phase;
  readonly round: number;
  readonly seed: number | undefined;

  readonly board: Board;
  readonly playerRoom: RoomId;

  // player resources / hazards
  readonly oxygen: number;
  readonly health: number;
  readonly ammo: number;
  readonly ammoMax: number;
  readonly weaponJammed: boolean;
  readonly seriousWounds: number;

  readonly actionsInTurn: number;
  readonly lifeSupportActive: boolean;

  readonly fires: ReadonlySet<RoomId>;
  readonly doors: ReadonlySet<EdgeKey>;
  readonly noise: ReadonlyMap<EdgeKey, number>;
  readonly roomNoise: ReadonlyMap<RoomId, number>;

  /** Room → intruder HP. At most one entry per room. */
  readonly intruders: ReadonlyMap<RoomId, number>;
  readonly intruderBurnLast: number;

  readonly eventDeck: number;
  readonly eventDeckCards: readonly string[];
  readonly bag: ReadonlyMap<string, number>;
  readonly bagDevCount: number;
  readonly attackDeck: number;

  readonly selfDestructArmed: boolean;
  readonly destructionTimer: number;

  // exploration: inactive while discoveredRooms is undefined
  readonly discoveredRooms: ReadonlySet<RoomId> | undefined;
  readonly explorationDeckCards: readonly string[];
  readonly secureTokens: ReadonlySet<EdgeKey>;

  readonly gameOver: boolean;
  readonly win: boolean;
}

/** Field overrides accepted by next() and createInitialState(). */
export type StateChanges = Partial<GameState>;
