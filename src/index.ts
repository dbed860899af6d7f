// ── Public API ───────────────────────────────────────────────

export * from "./shared/types.js";
export * from "./shared/constants.js";

export { BoardError, createBoard, neighbors, normEdge, edgeEnds, isOpen, roomTypeOf } from "./sim/board.js";
export { createInitialState, next } from "./sim/state.js";
export { legalActions, isLegalAction, actionKey } from "./sim/actions.js";
export { step, apply } from "./sim/step.js";
export { resolveAttack } from "./sim/combat.js";
export { createGame } from "./sim/setup.js";
export type { GameSetup } from "./sim/setup.js";
export { Environment } from "./sim/environment.js";
export type { StepResult } from "./sim/environment.js";
export { toRecord, fromRecord, stateKey, saveGame, loadGame } from "./sim/saveLoad.js";
export type { StateRecord } from "./sim/saveLoad.js";
export { outcomeOf } from "./sim/objectives.js";
export type { Outcome } from "./sim/objectives.js";

export type { Agent } from "./ai/agent.js";
export { RandomAgent } from "./ai/randomAgent.js";
export { Mcts, MctsAgent } from "./ai/mcts.js";
export type { MctsOptions } from "./ai/mcts.js";
export { uniformPolicy } from "./ai/policy.js";
export type { Policy } from "./ai/policy.js";
export { evaluateState } from "./ai/evaluate.js";
export { LlmAgent, LlmError, loadLlmConfig } from "./ai/llmAgent.js";
export type { LlmConfig } from "./ai/llmAgent.js";

export { parseAction, serializeAction, describeAction } from "./harness/actionParser.js";
export { buildObservation, renderObservationAsText } from "./harness/obsRenderer.js";
export type { HarnessAction, HarnessObservation } from "./harness/types.js";
