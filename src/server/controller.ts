import type {
  CommandOf,
  CommandResult,
  CommandType,
  ControllerCommand,
  ControllerState,
  Listing,
  Negotiation,
  NegotiationConfig,
  ServerMessage,
  SessionResult,
} from "./types.js";
import type { ChannelHandle, ChatChannel, ListingSource, NegotiationRepository } from "./capabilities.js";
import type { ChatTurn, LLMProvider, StructuredResponse } from "./llm/types.js";
import {
  AlreadyResolvedError,
  ChannelSendError,
  IndexOutOfRangeError,
  NoListingsError,
  SessionBusyError,
  SessionCancelledError,
} from "./errors.js";
import { NegotiationEngine, isTerminal, lastBuyerOffer, negotiationKey } from "./negotiation-engine.js";
import { extractPrice as defaultExtractPrice, type PriceExtractor } from "./price-parser.js";
import { formatPrice } from "./escalation.js";
import { CONTROLLER_TOOLS } from "./llm/tools.js";
import { controllerPrompt } from "./prompts/controller.js";
import { HELP_TEXT, commandFromToolCall } from "./commands.js";
import { createLog } from "./log.js";

const log = createLog("Controller");

const SEND_ATTEMPTS = 2;
/** Prompt/response pairs kept as context for the command interpreter. */
const PROMPT_HISTORY_TURNS = 4;

export type SendToUI = (msg: ServerMessage) => void;

export type SessionTimings = Pick<
  NegotiationConfig,
  "maxRounds" | "replyTimeoutMs" | "replyPollAttempts" | "sendRetryDelayMs"
>;

export interface ControllerOptions<H extends ChannelHandle> {
  listingSource: ListingSource;
  chatChannel: ChatChannel<H>;
  store: NegotiationRepository;
  /** Called once per delegated session so strategy and persona changes apply to the next one. */
  createEngine: () => NegotiationEngine;
  config: SessionTimings;
  /** Needed only for free-form prompts. */
  llm?: LLMProvider;
  extractPrice?: PriceExtractor;
  sendToUI?: SendToUI;
  sleep?: (ms: number) => Promise<void>;
}

type CommandHandlers = { [K in CommandType]: (command: CommandOf<K>) => Promise<string> };

function dispatch<K extends CommandType>(
  handlers: CommandHandlers,
  type: K,
  command: CommandOf<K>,
): Promise<string> {
  const handler = handlers[type];
  return handler(command);
}

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

function formatListing(listing: Listing, index: number): string {
  return `[${index}] ${listing.title}, $${formatPrice(listing.price)} (seller ${listing.sellerId})`;
}

function rounds(n: number): string {
  return `${n} round${n === 1 ? "" : "s"}`;
}

export function describeNegotiation(n: Negotiation): string {
  const head = `${n.listing.title} (seller ${n.listing.sellerId}, listed $${formatPrice(n.listing.price)})`;
  switch (n.status) {
    case "accepted":
      return `${head}: accepted at $${formatPrice(n.finalPrice ?? 0)} after ${rounds(n.currentRound)}`;
    case "walked_away":
      return `${head}: walked away after ${rounds(n.currentRound)}`;
    case "active": {
      const offer = lastBuyerOffer(n);
      return `${head}: active, ${rounds(n.currentRound)}${offer !== undefined ? `, last offer $${formatPrice(offer)}` : ""}`;
    }
  }
}

function describeResult(result: SessionResult): string {
  const n = result.negotiation;
  const title = `"${n.listing.title}"`;
  const undelivered = n.messages[n.messages.length - 1]?.undelivered === true;
  switch (result.outcome) {
    case "accepted":
      return `Deal! ${title} accepted at $${formatPrice(n.finalPrice ?? 0)} (listed $${formatPrice(n.listing.price)}) after ${rounds(n.currentRound)}.` +
        (undelivered ? " The confirmation could not be sent; follow up with the seller in the chat." : "");
    case "walked_away": {
      const best = lastBuyerOffer(n);
      return `Walked away from ${title} after ${rounds(n.currentRound)}.${best !== undefined ? ` Best offer was $${formatPrice(best)}.` : ""}` +
        (undelivered ? " The closing message could not be sent." : "");
    }
    case "no_response":
      return `No reply from ${n.listing.sellerId} for ${title} after round ${n.currentRound}. Run lowball again later to resume.`;
  }
}

/**
 * Drives one user's session: search, pick, open, and the delegated
 * offer/reply loop. At most one delegated negotiation runs at a time.
 *
 * Every offer is sent before it is recorded, and every record is saved
 * before the next step, so a crash or cancel never leaves the store claiming
 * an offer the seller did not get. Closing messages (walk-away, deal
 * confirmation) follow an outcome that is already decided; if they cannot be
 * sent the outcome stands and the message is flagged undelivered.
 */
export class ControllerLoop<H extends ChannelHandle = ChannelHandle> {
  private listingSource: ListingSource;
  private chat: ChatChannel<H>;
  private store: NegotiationRepository;
  private createEngine: () => NegotiationEngine;
  private config: SessionTimings;
  private llm: LLMProvider | null;
  private extractPrice: PriceExtractor;
  private sendToUI: SendToUI;
  private sleep: (ms: number) => Promise<void>;

  private state: ControllerState = "idle";
  private listings: Listing[] = [];
  private openChat: { key: string; handle: H } | null = null;
  private busyWith: string | null = null;
  private abort: AbortController | null = null;
  private promptHistory: ChatTurn[] = [];
  private readonly handlers: CommandHandlers;

  constructor(options: ControllerOptions<H>) {
    this.listingSource = options.listingSource;
    this.chat = options.chatChannel;
    this.store = options.store;
    this.createEngine = options.createEngine;
    this.config = options.config;
    this.llm = options.llm ?? null;
    this.extractPrice = options.extractPrice ?? defaultExtractPrice;
    this.sendToUI = options.sendToUI ?? (() => {});
    this.sleep = options.sleep ?? defaultSleep;

    this.handlers = {
      search: async ({ query, maxPrice }) => {
        const found = await this.search(query, maxPrice);
        if (found.length === 0) return `No listings found for "${query}".`;
        return [`Found ${found.length} listing(s) for "${query}":`, ...found.map(formatListing)].join("\n");
      },
      listings: async () => {
        const current = this.listCurrentListings();
        if (current.length === 0) throw new NoListingsError();
        return current.map(formatListing).join("\n");
      },
      open: async ({ index }) => {
        await this.open(index);
        const listing = this.listings[index];
        return `Opened chat with ${listing.sellerId} for "${listing.title}".`;
      },
      lowball: async ({ index }) => describeResult(await this.delegateNegotiate(index)),
      history: async () => this.showHistory(),
      help: async () => HELP_TEXT,
    };
  }

  // --- Accessors ---

  getState(): ControllerState {
    return this.state;
  }

  isBusy(): boolean {
    return this.busyWith !== null;
  }

  listCurrentListings(): readonly Listing[] {
    return [...this.listings];
  }

  // --- Operations ---

  async search(query: string, maxPrice?: number): Promise<Listing[]> {
    this.assertIdle();
    this.busyWith = `search "${query}"`;
    this.setState("searching");
    try {
      const found = await this.listingSource.search(query, maxPrice);
      this.listings = [...found];
      this.openChat = null;
      this.setState("listed");
      return [...found];
    } catch (err) {
      log("search", `Search for "${query}" failed`, String(err));
      this.listings = [];
      this.openChat = null;
      this.setState("idle");
      throw err;
    } finally {
      this.busyWith = null;
    }
  }

  async open(index: number): Promise<H> {
    this.assertIdle();
    const listing = this.listingAt(index);
    this.busyWith = `open [${index}]`;
    try {
      const handle = await this.chat.open(listing);
      this.openChat = { key: negotiationKey(listing), handle };
      this.setState("chat_open");
      return handle;
    } finally {
      this.busyWith = null;
    }
  }

  async delegateNegotiate(index: number): Promise<SessionResult> {
    this.assertIdle();
    const listing = this.listingAt(index);
    const key = negotiationKey(listing);
    const abort = new AbortController();
    this.busyWith = key;
    this.abort = abort;

    try {
      const existing = await this.store.load(key);
      if (existing && isTerminal(existing.status)) throw new AlreadyResolvedError(existing);

      const engine = this.createEngine();
      let negotiation: Negotiation;
      if (existing) {
        negotiation = existing;
        log("session", `Resuming ${key} at round ${existing.currentRound}`);
      } else {
        log("session", `Starting ${key} with strategy ${engine.getStrategy().name}`);
        negotiation = engine.start(listing);
        await this.persist(negotiation);
      }

      const handle = await this.handleFor(listing, key);
      this.setState("negotiating");
      const result = await this.runSession(engine, negotiation, handle, abort.signal);
      log("session", `${key} finished: ${result.outcome}`);
      if (result.outcome === "accepted") this.setState("deal_closed");
      else if (result.outcome === "walked_away") this.setState("walked");
      else this.setState("chat_open");
      return result;
    } catch (err) {
      if (this.state === "negotiating") this.setState("chat_open");
      throw err;
    } finally {
      this.busyWith = null;
      this.abort = null;
    }
  }

  async showHistory(): Promise<string> {
    const all = await this.store.loadAll();
    if (all.size === 0) return "No negotiations yet.";
    return [...all.values()].map(describeNegotiation).join("\n");
  }

  /** Abort the running negotiation at its next step. */
  cancel(): boolean {
    if (!this.abort) return false;
    log("session", `Cancel requested for ${this.busyWith}`);
    this.abort.abort();
    return true;
  }

  async execute(command: ControllerCommand): Promise<CommandResult> {
    try {
      const message = await dispatch(this.handlers, command.type, command);
      return { ok: true, message };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log("command", `${command.type} failed`, message);
      return { ok: false, message };
    }
  }

  /** Interpret a free-form prompt as one command through the LLM. */
  async run(prompt: string): Promise<CommandResult> {
    if (!this.llm) return { ok: false, message: "No LLM configured. Use text commands (type \"help\")." };

    this.promptHistory.push({ role: "user", content: prompt });
    const context = this.promptHistory.slice(-(PROMPT_HISTORY_TURNS * 2 + 1));

    let response: StructuredResponse;
    try {
      response = await this.llm.chatWithTools(controllerPrompt(this.listings), context, Object.values(CONTROLLER_TOOLS));
    } catch (err) {
      log("prompt", "Interpreter call failed", String(err));
      return this.remember({ ok: false, message: `Could not interpret prompt: ${err instanceof Error ? err.message : String(err)}` });
    }

    if (response.type === "text") return this.remember({ ok: true, message: response.text });

    log("prompt", `Tool call: ${response.call.name}`, response.call.args);
    const parsed = commandFromToolCall(response.call.name, response.call.args);
    if (!parsed.ok) return this.remember({ ok: false, message: parsed.error });
    return this.remember(await this.execute(parsed.command));
  }

  // --- Session loop ---

  private async runSession(
    engine: NegotiationEngine,
    negotiation: Negotiation,
    handle: H,
    signal: AbortSignal,
  ): Promise<SessionResult> {
    // A resumed record whose last message is our offer is still waiting for the seller.
    const last = negotiation.messages[negotiation.messages.length - 1];
    let awaitingReply = last !== undefined && last.role === "buyer" && last.offerPrice !== undefined;

    while (negotiation.status === "active") {
      this.throwIfCancelled(signal, negotiation);

      if (!awaitingReply) {
        if (engine.hasReachedPlateau(negotiation) || negotiation.currentRound >= this.config.maxRounds) {
          log("session", `${negotiation.key}: no further offers after ${rounds(negotiation.currentRound)}, walking away`);
          const text = await engine.composeWalkAway(negotiation);
          const delivered = await this.sendClosing(handle, text, negotiation, "walk-away message");
          engine.walkAway(negotiation, text, delivered);
          await this.persist(negotiation);
          break;
        }

        const offer = engine.nextOffer(negotiation);
        const text = await engine.composeMessage(negotiation, offer);
        this.throwIfCancelled(signal, negotiation);
        await this.sendWithRetry(handle, text, negotiation, `round ${negotiation.currentRound + 1} offer`);
        engine.recordBuyerOffer(negotiation, offer, text);
        await this.persist(negotiation);
      }
      awaitingReply = false;

      const reply = await this.awaitReply(handle, negotiation, signal);
      if (reply === null) return { outcome: "no_response", negotiation };

      const price = this.extractPrice(reply, { listedPrice: negotiation.listing.price });
      engine.recordSellerReply(negotiation, reply, price ?? undefined);
      await this.persist(negotiation);
    }

    if (negotiation.status === "walked_away") return { outcome: "walked_away", negotiation };

    const text = await engine.composeConfirmation(negotiation);
    const delivered = await this.sendClosing(handle, text, negotiation, "deal confirmation");
    engine.recordConfirmation(negotiation, text, delivered);
    await this.persist(negotiation);
    return { outcome: "accepted", negotiation };
  }

  private async sendWithRetry(handle: H, text: string, negotiation: Negotiation, what: string): Promise<void> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= SEND_ATTEMPTS; attempt++) {
      try {
        if (await this.chat.send(handle, text)) return;
        lastError = undefined;
      } catch (err) {
        lastError = err;
      }
      log("send", `Attempt ${attempt}/${SEND_ATTEMPTS} failed for ${negotiation.key}`, lastError === undefined ? undefined : String(lastError));
      if (attempt < SEND_ATTEMPTS) await this.sleep(this.config.sendRetryDelayMs);
    }
    throw new ChannelSendError(negotiation, what, SEND_ATTEMPTS, lastError);
  }

  /**
   * Send a message that follows an outcome already decided (walk-away, deal).
   * The outcome is recorded either way; returns whether the seller got the text.
   */
  private async sendClosing(handle: H, text: string, negotiation: Negotiation, what: string): Promise<boolean> {
    try {
      await this.sendWithRetry(handle, text, negotiation, what);
      return true;
    } catch (err) {
      if (!(err instanceof ChannelSendError)) throw err;
      log("send", `${err.message}; recording the outcome anyway`);
      return false;
    }
  }

  private async awaitReply(handle: H, negotiation: Negotiation, signal: AbortSignal): Promise<string | null> {
    const attempts = this.config.replyPollAttempts;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      this.throwIfCancelled(signal, negotiation);
      const reply = await this.chat.pollReply(handle, this.config.replyTimeoutMs);
      if (reply !== null && reply.trim()) return reply.trim();
      log("poll", `No reply for ${negotiation.key} (${attempt}/${attempts})`);
    }
    this.throwIfCancelled(signal, negotiation);
    return null;
  }

  // --- Helpers ---

  private async handleFor(listing: Listing, key: string): Promise<H> {
    if (this.openChat && this.openChat.key === key) return this.openChat.handle;
    const handle = await this.chat.open(listing);
    this.openChat = { key, handle };
    this.setState("chat_open");
    return handle;
  }

  private async persist(negotiation: Negotiation): Promise<void> {
    await this.store.save(negotiation);
    const all = await this.store.loadAll();
    this.sendToUI({ type: "negotiations_update", negotiations: [...all.values()] });
  }

  private listingAt(index: number): Listing {
    if (!Number.isInteger(index) || index < 0 || index >= this.listings.length) {
      throw new IndexOutOfRangeError(index, this.listings.length);
    }
    return this.listings[index];
  }

  private assertIdle(): void {
    if (this.busyWith !== null) throw new SessionBusyError(this.busyWith);
  }

  private throwIfCancelled(signal: AbortSignal, negotiation: Negotiation): void {
    if (signal.aborted) throw new SessionCancelledError(negotiation);
  }

  private remember(result: CommandResult): CommandResult {
    this.promptHistory.push({ role: "assistant", content: result.message });
    return result;
  }

  private setState(newState: ControllerState): void {
    const old = this.state;
    this.state = newState;
    log("state", `${old} → ${newState}`);
    this.sendToUI({ type: "status_update", state: newState });
  }
}
