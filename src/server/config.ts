import type { BrowserConfig, LLMConfig, LLMProviderType, NegotiationConfig, Persona } from "./types.js";
import { InvalidConfigError } from "./errors.js";
import { isPersona, PERSONAS } from "./prompts/personas.js";
import { resolveStrategy } from "./escalation.js";

export interface AppConfig {
  port: number;
  dbPath: string;
  marketplaceUrl: string;
  llm: LLMConfig;
  llmTimeoutMs: number;
  negotiation: NegotiationConfig;
  browser: BrowserConfig;
}

export type Env = Record<string, string | undefined>;

export const SETTING_STRATEGY = "escalation_strategy";
export const SETTING_PERSONA = "persona";

const PROVIDERS: readonly LLMProviderType[] = ["anthropic", "openai", "ollama"];

export const DEFAULT_MODELS: Record<LLMProviderType, string> = {
  anthropic: "claude-sonnet-4-5",
  openai: "gpt-4o",
  ollama: "llama3",
};

function isProvider(value: string): value is LLMProviderType {
  return PROVIDERS.some((p) => p === value);
}

function str(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

function num(env: Env, key: string, fallback: number, opts: { integer?: boolean; min?: number; max?: number } = {}): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  const min = opts.min ?? 0;
  const ok =
    Number.isFinite(value) &&
    (!opts.integer || Number.isInteger(value)) &&
    value >= min &&
    (opts.max === undefined || value <= opts.max);
  if (!ok) {
    const range = opts.max === undefined ? `>= ${min}` : `between ${min} and ${opts.max}`;
    throw new InvalidConfigError(key, raw, `${opts.integer ? "an integer" : "a number"} ${range}`);
  }
  return value;
}

function bool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === "true" || raw === "1" || raw === "yes") return true;
  if (raw === "false" || raw === "0" || raw === "no") return false;
  throw new InvalidConfigError(key, raw, "true or false");
}

export function parsePersona(key: string, value: string): Persona {
  if (!isPersona(value)) throw new InvalidConfigError(key, value, `one of ${PERSONAS.join(", ")}`);
  return value;
}

/** Validate a strategy spec ("standard", "ackerman" or "40,55,70") and return it unchanged. */
export function parseStrategy(key: string, value: string): string {
  try {
    resolveStrategy(value);
  } catch (err) {
    throw new InvalidConfigError(key, value, `"standard", "ackerman" or increasing percentages like "40,55,70" (${err instanceof Error ? err.message : String(err)})`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const providerRaw = str(env, "LLM_PROVIDER", "anthropic");
  if (!isProvider(providerRaw)) {
    throw new InvalidConfigError("LLM_PROVIDER", providerRaw, `one of ${PROVIDERS.join(", ")}`);
  }

  const llm: LLMConfig = {
    provider: providerRaw,
    apiKey: str(env, "LLM_API_KEY", ""),
    model: str(env, "LLM_MODEL", DEFAULT_MODELS[providerRaw]),
    temperature: num(env, "LLM_TEMPERATURE", 0.7, { max: 2 }),
    maxTokens: num(env, "LLM_MAX_TOKENS", 1024, { integer: true, min: 1 }),
  };
  const baseUrl = env.LLM_BASE_URL?.trim();
  if (baseUrl) llm.baseUrl = baseUrl;

  const modeRaw = str(env, "BROWSER_MODE", "launch");
  if (modeRaw !== "launch" && modeRaw !== "cdp") {
    throw new InvalidConfigError("BROWSER_MODE", modeRaw, "launch or cdp");
  }
  const browser: BrowserConfig = { mode: modeRaw, headless: bool(env, "HEADLESS_BROWSER", false) };
  if (modeRaw === "cdp") {
    const endpoint = env.CDP_ENDPOINT?.trim();
    if (!endpoint) throw new InvalidConfigError("CDP_ENDPOINT", "", "a CDP endpoint URL when BROWSER_MODE=cdp");
    browser.cdpEndpoint = endpoint;
  }

  return {
    port: num(env, "PORT", 3000, { integer: true, min: 1, max: 65535 }),
    dbPath: str(env, "DB_PATH", "data/lowballer.db"),
    marketplaceUrl: str(env, "MARKETPLACE_URL", "https://www.carousell.sg"),
    llm,
    llmTimeoutMs: num(env, "LLM_TIMEOUT_MS", 30_000, { integer: true, min: 1 }),
    negotiation: {
      strategy: parseStrategy("ESCALATION_STRATEGY", str(env, "ESCALATION_STRATEGY", "standard")),
      persona: parsePersona("PERSONA", str(env, "PERSONA", "tactical_empathy")),
      maxRounds: num(env, "MAX_NEGOTIATION_ROUNDS", 5, { integer: true, min: 1 }),
      replyTimeoutMs: num(env, "REPLY_TIMEOUT_MS", 60_000, { integer: true, min: 1 }),
      replyPollAttempts: num(env, "REPLY_POLL_ATTEMPTS", 5, { integer: true, min: 1 }),
      sendRetryDelayMs: num(env, "SEND_RETRY_DELAY_MS", 2_000, { integer: true }),
    },
    browser,
  };
}

/**
 * Persisted dashboard settings win over the environment for strategy and
 * persona. Invalid stored values throw, same as invalid env values.
 */
export function applySettings(config: NegotiationConfig, settings: Record<string, string>): NegotiationConfig {
  const next = { ...config };
  const strategy = settings[SETTING_STRATEGY];
  if (strategy !== undefined) next.strategy = parseStrategy(SETTING_STRATEGY, strategy);
  const persona = settings[SETTING_PERSONA];
  if (persona !== undefined) next.persona = parsePersona(SETTING_PERSONA, persona);
  return next;
}
