// ============================================================
// lowballer — Shared Server Types
// This file is the contract between ALL components.
// ============================================================

// --- Listings ---

export interface Listing {
  readonly title: string;
  readonly price: number;
  readonly sellerId: string;
  readonly sourceUrl: string;
  readonly channelReference: string;
}

// --- Negotiation Records ---

export type MessageRole = "buyer" | "seller";

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  readonly offerPrice?: number;
  readonly round?: number;
  readonly timestamp: number;
  /** Set on a closing buyer message the chat refused; the outcome is recorded regardless. */
  readonly undelivered?: boolean;
}

export type NegotiationStatus = "active" | "accepted" | "walked_away";

export interface Negotiation {
  key: string;
  listing: Listing;
  messages: Message[];
  currentRound: number;
  status: NegotiationStatus;
  finalPrice?: number;
  startedAt: number;
  updatedAt: number;
}

// --- Controller Session State Machine ---

export type ControllerState =
  | "idle"
  | "searching"
  | "listed"
  | "chat_open"
  | "negotiating"
  | "deal_closed"
  | "walked";

export type SessionOutcome = "accepted" | "walked_away" | "no_response";

export interface SessionResult {
  outcome: SessionOutcome;
  negotiation: Negotiation;
}

// --- Commands ---

export type ControllerCommand =
  | { type: "search"; query: string; maxPrice?: number }
  | { type: "listings" }
  | { type: "open"; index: number }
  | { type: "lowball"; index: number }
  | { type: "history" }
  | { type: "help" };

export type CommandType = ControllerCommand["type"];

export type CommandOf<K extends CommandType> = Extract<ControllerCommand, { type: K }>;

export interface CommandResult {
  ok: boolean;
  message: string;
}

// --- LLM Configuration ---

export type LLMProviderType = "anthropic" | "openai" | "ollama";

export interface LLMConfig {
  provider: LLMProviderType;
  apiKey: string;
  model: string;
  baseUrl?: string;
  temperature: number;
  maxTokens: number;
}

// --- Negotiation Configuration ---

export type Persona = "friendly" | "student" | "bulk_buyer" | "urgent_cash" | "tactical_empathy";

export interface NegotiationConfig {
  strategy: string;
  persona: Persona;
  maxRounds: number;
  replyTimeoutMs: number;
  replyPollAttempts: number;
  sendRetryDelayMs: number;
}

// --- Browser Connection ---

export interface BrowserConfig {
  mode: "launch" | "cdp";
  cdpEndpoint?: string;
  headless?: boolean;
}

// --- WebSocket Messages (Server ↔ Dashboard) ---

// Server → UI
export type ServerMessage =
  | { type: "command_result"; result: CommandResult }
  | { type: "status_update"; state: ControllerState }
  | { type: "negotiations_update"; negotiations: Negotiation[] }
  | { type: "settings_loaded"; settings: Record<string, string> }
  | { type: "error"; message: string };

// UI → Server
export type ClientMessage =
  | { type: "command"; text: string }
  | { type: "prompt"; text: string }
  | { type: "cancel" }
  | { type: "list_negotiations" }
  | { type: "get_settings" }
  | { type: "save_setting"; key: string; value: string };
