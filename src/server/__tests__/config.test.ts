import { describe, it, expect } from "vitest";
import { applySettings, loadConfig } from "../config.js";
import { InvalidConfigError } from "../errors.js";

describe("loadConfig", () => {
  it("fills defaults from an empty environment", () => {
    const config = loadConfig({});
    expect(config).toEqual({
      port: 3000,
      dbPath: "data/lowballer.db",
      marketplaceUrl: "https://www.carousell.sg",
      llm: { provider: "anthropic", apiKey: "", model: "claude-sonnet-4-5", temperature: 0.7, maxTokens: 1024 },
      llmTimeoutMs: 30_000,
      negotiation: {
        strategy: "standard",
        persona: "tactical_empathy",
        maxRounds: 5,
        replyTimeoutMs: 60_000,
        replyPollAttempts: 5,
        sendRetryDelayMs: 2_000,
      },
      browser: { mode: "launch", headless: false },
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      PORT: "8080",
      LLM_PROVIDER: "ollama",
      LLM_BASE_URL: "http://gpu-box:11434",
      ESCALATION_STRATEGY: "40,55,70",
      PERSONA: "student",
      MAX_NEGOTIATION_ROUNDS: "3",
      HEADLESS_BROWSER: "true",
      BROWSER_MODE: "cdp",
      CDP_ENDPOINT: "http://localhost:9222",
    });
    expect(config.port).toBe(8080);
    expect(config.llm).toMatchObject({ provider: "ollama", model: "llama3", baseUrl: "http://gpu-box:11434" });
    expect(config.negotiation).toMatchObject({ strategy: "40,55,70", persona: "student", maxRounds: 3 });
    expect(config.browser).toEqual({ mode: "cdp", headless: true, cdpEndpoint: "http://localhost:9222" });
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow('Invalid value for PORT: "abc" (expected an integer between 1 and 65535)');
    expect(() => loadConfig({ LLM_PROVIDER: "gemini" })).toThrow(InvalidConfigError);
    expect(() => loadConfig({ PERSONA: "pirate" })).toThrow(InvalidConfigError);
    expect(() => loadConfig({ ESCALATION_STRATEGY: "90,80" })).toThrow(InvalidConfigError);
    expect(() => loadConfig({ REPLY_POLL_ATTEMPTS: "0" })).toThrow(InvalidConfigError);
    expect(() => loadConfig({ HEADLESS_BROWSER: "maybe" })).toThrow('Invalid value for HEADLESS_BROWSER: "maybe" (expected true or false)');
    expect(() => loadConfig({ BROWSER_MODE: "cdp" })).toThrow(/CDP_ENDPOINT/);
  });
});

describe("applySettings", () => {
  const negotiation = loadConfig({}).negotiation;

  it("lets stored settings override strategy and persona", () => {
    const next = applySettings(negotiation, { escalation_strategy: "ackerman", persona: "bulk_buyer", theme: "dark" });
    expect(next.strategy).toBe("ackerman");
    expect(next.persona).toBe("bulk_buyer");
    expect(next.maxRounds).toBe(negotiation.maxRounds);
    expect(negotiation.strategy).toBe("standard");
  });

  it("rejects invalid stored values", () => {
    expect(() => applySettings(negotiation, { persona: "pirate" })).toThrow(InvalidConfigError);
  });
});
