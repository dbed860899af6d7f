// ── Starting resources ───────────────────────────────────────
export const START_OXYGEN = 5;
export const START_HEALTH = 5;
export const START_AMMO = 3;
export const AMMO_MAX = 3;
export const MAX_HEALTH = 5; // surgery never heals past this

// ── Turn structure ───────────────────────────────────────────
export const ACTIONS_PER_TURN = 2; // turn ends automatically after this many actions
export const START_ROUND = 1;

// ── Decks ────────────────────────────────────────────────────
export const START_EVENT_DECK = 10;
export const START_ATTACK_DECK = 10;

// Attack table. Deterministic placeholders for the dice of the tabletop game,
// kept arithmetic-exact for replay compatibility; not final balance.
export const JAM_MODULUS = 13;
export const CRIT_MODULUS = 7;
export const LAST_BULLET_MODULUS = 5;
export const HIT_DAMAGE = 1;
export const CRIT_DAMAGE = 2;

// ── Wounds ───────────────────────────────────────────────────
export const MAX_SERIOUS_WOUNDS = 3;
/** Health values on which a melee exchange opens a serious wound. */
export const SERIOUS_WOUND_THRESHOLDS: readonly number[] = [3, 1];

// ── Intruders ────────────────────────────────────────────────
export const SPAWN_HP = 1;
export const ADULT_TOKEN = "ADULT";

// ── Self-destruct ────────────────────────────────────────────
export const DESTRUCTION_TIMER = 3;

// ── Search / agents ──────────────────────────────────────────
export const DEFAULT_SEED = 184201;
export const MCTS_DEFAULT_ITERATIONS = 100;
export const MCTS_C_PUCT = 1.0;
export const MCTS_ROLLOUT_DEPTH = 20;
export const MCTS_MAX_DEPTH = 100;

// ── LLM driver ───────────────────────────────────────────────
export const LLM_DEFAULT_MODEL = "gpt-4o-mini";
export const LLM_DEFAULT_BASE_URL = "https://api.openai.com/v1";
export const LLM_DEFAULT_TEMPERATURE = 0.7;
export const LLM_MAX_TOKENS = 200;
export const LLM_MAX_RETRIES = 3;
export const LLM_INITIAL_BACKOFF_MS = 1000;
