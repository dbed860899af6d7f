/**
 * LLM agent: asks an OpenAI-compatible chat completions endpoint to pick one
 * of the indexed legal actions.
 *
 * Configuration comes from the environment:
 *   LLM_API_KEY (or OPENAI_API_KEY)    required
 *   LLM_BASE_URL (or OPENAI_BASE_URL)  default https://api.openai.com/v1
 *   LLM_MODEL                          default gpt-4o-mini
 *   LLM_TEMPERATURE                    default 0.7
 */

import type { Action, GameState } from "../shared/types.js";
import { ActionType } from "../shared/types.js";
import {
  LLM_DEFAULT_BASE_URL, LLM_DEFAULT_MODEL, LLM_DEFAULT_TEMPERATURE,
  LLM_INITIAL_BACKOFF_MS, LLM_MAX_RETRIES, LLM_MAX_TOKENS,
} from "../shared/constants.js";
import { legalActions } from "../sim/actions.js";
import { buildObservation, renderObservationAsText } from "../harness/obsRenderer.js";
import type { ValidAction } from "../harness/types.js";
import type { Agent } from "./agent.js";

// ── Configuration ────────────────────────────────────────────

export interface LlmConfig {
  apiKey: string | undefined;
  baseUrl: string;
  model: string;
  temperature: number;
  maxRetries: number;
  initialBackoffMs: number;
}

export class LlmError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "LlmError";
  }
}

export function loadLlmConfig(env: NodeJS.ProcessEnv = process.env): LlmConfig {
  const temperature = Number.parseFloat(env.LLM_TEMPERATURE ?? "");
  return {
    apiKey: env.LLM_API_KEY || env.OPENAI_API_KEY || undefined,
    baseUrl: (env.LLM_BASE_URL || env.OPENAI_BASE_URL || LLM_DEFAULT_BASE_URL).replace(/\/+$/, ""),
    model: env.LLM_MODEL || LLM_DEFAULT_MODEL,
    temperature: Number.isFinite(temperature) ? temperature : LLM_DEFAULT_TEMPERATURE,
    maxRetries: LLM_MAX_RETRIES,
    initialBackoffMs: LLM_INITIAL_BACKOFF_MS,
  };
}

export type FetchFn = typeof fetch;

// ── Prompting ────────────────────────────────────────────────

const SYSTEM_PROMPT =
  "You are an AI agent playing a survival board game aboard a damaged space station. " +
  "Choose exactly ONE action from the provided legal actions. " +
  "Role-play the given persona, try to escape alive, and return STRICT JSON only.";

export function buildUserPrompt(stateText: string, actions: readonly ValidAction[], persona?: string): string {
  const compact = actions.map(a => ({ index: a.index, type: a.type, params: a.params ?? null }));
  return [
    `Persona: ${persona?.trim() || "neutral"}`,
    `State:\n${stateText}`,
    "",
    "Legal actions are indexed starting at 0.",
    `Actions: ${JSON.stringify(compact)}`,
    "",
    "Return JSON ONLY in the following schema (no extra text):",
    `{"pick": <int index>, "rationale": <short string>}`,
  ].join("\n");
}

// ── Response handling ────────────────────────────────────────

export interface LlmChoice {
  pick: number;
  rationale: string;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse the reply text, falling back to the outermost {...} span. */
function extractJson(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    const start = content.indexOf("{");
    const end = content.lastIndexOf("}");
    if (start === -1 || end <= start) throw new LlmError("LLM returned non-JSON content");
    try {
      return JSON.parse(content.slice(start, end + 1));
    } catch {
      throw new LlmError("LLM returned non-JSON content");
    }
  }
}

export function parseChoice(content: string, actionCount: number): LlmChoice {
  const data = extractJson(content);
  if (!isObject(data) || typeof data.pick !== "number" || !Number.isInteger(data.pick)) {
    throw new LlmError("LLM response missing integer 'pick'");
  }
  if (data.pick < 0 || data.pick >= actionCount) {
    throw new LlmError(`LLM pick ${data.pick} out of range 0..${actionCount - 1}`);
  }
  return { pick: data.pick, rationale: typeof data.rationale === "string" ? data.rationale : "" };
}

function completionText(data: unknown): string {
  if (!isObject(data) || !Array.isArray(data.choices)) {
    throw new LlmError("LLM response has no choices");
  }
  const first: unknown = data.choices[0];
  if (!isObject(first) || !isObject(first.message)) return "{}";
  return typeof first.message.content === "string" ? first.message.content : "{}";
}

// ── HTTP ─────────────────────────────────────────────────────

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

async function callChat(
  system: string,
  user: string,
  temperature: number,
  config: LlmConfig,
  fetchFn: FetchFn,
): Promise<string> {
  if (!config.apiKey) {
    throw new LlmError("LLM not configured: set LLM_API_KEY (or OPENAI_API_KEY)");
  }

  let lastError: Error | null = null;

  for (let attempt = 0; attempt < config.maxRetries; attempt++) {
    const backoff = config.initialBackoffMs * Math.pow(2, attempt);
    try {
      const response = await fetchFn(`${config.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${config.apiKey}`,
        },
        body: JSON.stringify({
          model: config.model,
          temperature,
          max_tokens: LLM_MAX_TOKENS,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: system },
            { role: "user", content: user },
          ],
        }),
      });

      if (response.status === 429 || response.status >= 500) {
        lastError = new LlmError(`API returned ${response.status}: ${response.statusText}`, response.status);
        if (attempt < config.maxRetries - 1) {
          process.stderr.write(`[llmAgent] API ${response.status}, retrying in ${backoff}ms...\n`);
          await sleep(backoff);
        }
        continue;
      }

      if (!response.ok) {
        const body = await response.text();
        throw new LlmError(`API error ${response.status}: ${body}`, response.status);
      }

      const data: unknown = await response.json();
      return completionText(data);
    } catch (err) {
      // Client errors other than rate limiting will not improve on retry.
      if (err instanceof LlmError && err.status !== undefined) throw err;
      lastError = err instanceof Error ? err : new Error(String(err));
      if (attempt < config.maxRetries - 1) {
        process.stderr.write(`[llmAgent] Error: ${lastError.message}, retrying in ${backoff}ms...\n`);
        await sleep(backoff);
      }
    }
  }

  throw lastError ?? new LlmError("API call failed after retries");
}

export interface ChooseOptions {
  persona?: string;
  temperature?: number;
  config?: LlmConfig;
  fetchFn?: FetchFn;
}

/** Ask the model for one index into `actions`. Throws LlmError on any failure. */
export async function llmChooseAction(
  stateText: string,
  actions: readonly ValidAction[],
  options: ChooseOptions = {},
): Promise<LlmChoice> {
  const config = options.config ?? loadLlmConfig();
  const content = await callChat(
    SYSTEM_PROMPT,
    buildUserPrompt(stateText, actions, options.persona),
    options.temperature ?? config.temperature,
    config,
    options.fetchFn ?? fetch,
  );
  return parseChoice(content, actions.length);
}

// ── Agent ────────────────────────────────────────────────────

export class LlmAgent implements Agent {
  readonly name = "llm";
  /** Rationale given with the most recent pick, if any. */
  lastRationale: string | null = null;

  constructor(private readonly options: ChooseOptions = {}) {}

  async act(state: GameState): Promise<Action> {
    const actions = legalActions(state);
    if (actions.length === 0) return { type: ActionType.Noop };
    if (actions.length === 1) return actions[0];

    const obs = buildObservation(state);
    try {
      const choice = await llmChooseAction(renderObservationAsText(obs), obs.validActions, this.options);
      this.lastRationale = choice.rationale;
      return actions[choice.pick];
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      process.stderr.write(`[llmAgent] Turn ${state.turn}: ${msg}; falling back to NOOP\n`);
      this.lastRationale = null;
      return { type: ActionType.Noop };
    }
  }
}
