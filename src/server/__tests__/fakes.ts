import type { Listing } from "../types.js";
import type { ChannelHandle, ChatChannel, ListingSource } from "../capabilities.js";
import type {
  ChatTurn,
  GenerationPrompt,
  LLMProvider,
  StructuredResponse,
  TextGenerator,
  ToolDefinition,
} from "../llm/types.js";

export function makeListing(overrides: Partial<Listing> = {}): Listing {
  return {
    title: "iPhone 14",
    price: 800,
    sellerId: "techseller",
    sourceUrl: "https://market.test/p/iphone-14-123",
    channelReference: "https://market.test/p/iphone-14-123",
    ...overrides,
  };
}

/** Returns scripted generations in order; an Error entry is thrown instead. */
export class ScriptedGenerator implements TextGenerator {
  readonly prompts: GenerationPrompt[] = [];
  private script: Array<string | Error>;

  constructor(script: Array<string | Error> = []) {
    this.script = script;
  }

  async generate(prompt: GenerationPrompt): Promise<string> {
    this.prompts.push(prompt);
    const next = this.script.shift();
    if (next instanceof Error) throw next;
    return next ?? `generated message ${this.prompts.length}`;
  }
}

/** Monotonic fake clock: each call advances by one second. */
export function fakeClock(start = 1_700_000_000_000): () => number {
  let t = start;
  return () => {
    t += 1000;
    return t;
  };
}

export interface FakeHandle extends ChannelHandle {
  id: number;
}

/**
 * In-memory chat channel. `sendResults` and `replies` are consumed in order;
 * once exhausted, sends succeed and polls return null.
 */
export class FakeChannel implements ChatChannel<FakeHandle> {
  readonly sent: string[] = [];
  readonly opened: Listing[] = [];
  sendResults: Array<boolean | Error> = [];
  replies: Array<string | null> = [];
  pollCount = 0;
  onPoll: (() => void) | null = null;

  async open(listing: Listing): Promise<FakeHandle> {
    this.opened.push(listing);
    return { listing, id: this.opened.length };
  }

  async send(_handle: FakeHandle, text: string): Promise<boolean> {
    const next = this.sendResults.shift();
    if (next instanceof Error) throw next;
    if (next === false) return false;
    this.sent.push(text);
    return true;
  }

  async pollReply(_handle: FakeHandle, _timeoutMs: number): Promise<string | null> {
    this.pollCount++;
    if (this.onPoll) this.onPoll();
    return this.replies.shift() ?? null;
  }
}

export class FakeListingSource implements ListingSource {
  readonly queries: Array<{ query: string; maxPrice?: number }> = [];
  results: Listing[] | Error = [];

  async search(query: string, maxPrice?: number): Promise<Listing[]> {
    this.queries.push(maxPrice === undefined ? { query } : { query, maxPrice });
    if (this.results instanceof Error) throw this.results;
    return this.results;
  }
}

/** LLM stand-in: `chat` and `chatWithTools` replay queued responses. */
export class FakeLLM implements LLMProvider {
  readonly chatCalls: Array<{ system: string; messages: ChatTurn[] }> = [];
  readonly toolCalls: Array<{ system: string; messages: ChatTurn[]; tools: ToolDefinition[] }> = [];
  chatResponses: Array<string | Error> = [];
  toolResponses: Array<StructuredResponse | Error> = [];

  async chat(system: string, messages: ChatTurn[]): Promise<string> {
    this.chatCalls.push({ system, messages: [...messages] });
    const next = this.chatResponses.shift();
    if (next instanceof Error) throw next;
    return next ?? "";
  }

  async chatWithTools(system: string, messages: ChatTurn[], tools: ToolDefinition[]): Promise<StructuredResponse> {
    this.toolCalls.push({ system, messages: [...messages], tools });
    const next = this.toolResponses.shift();
    if (next instanceof Error) throw next;
    return next ?? { type: "text", text: "" };
  }
}

export function toolCall(name: string, args: Record<string, unknown>): StructuredResponse {
  return { type: "tool_call", call: { name, args } };
}
