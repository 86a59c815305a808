import type { Listing, Message, Negotiation, NegotiationStatus, Persona } from "./types.js";
import type { TextGenerator } from "./llm/types.js";
import {
  InvalidListingError,
  NonMonotonicOfferError,
  PlateauReachedError,
  TerminalNegotiationError,
} from "./errors.js";
import {
  STANDARD_STRATEGY,
  formatPrice,
  fromMinorUnits,
  offerForRound,
  toMinorUnits,
  validateStrategy,
  type EscalationStrategy,
} from "./escalation.js";
import { confirmationMessagePrompt, offerMessagePrompt, walkAwayMessagePrompt } from "./prompts/negotiation.js";
import { fallbackConfirmationMessage, fallbackOfferMessage, fallbackWalkAwayMessage } from "./prompts/fallback.js";
import { createLog } from "./log.js";

const log = createLog("Engine");

export interface NegotiationEngineOptions {
  strategy?: EscalationStrategy;
  persona?: Persona;
  now?: () => number;
}

export function negotiationKey(listing: Pick<Listing, "sellerId" | "title">): string {
  return `${listing.sellerId}_${listing.title}`;
}

export function isTerminal(status: NegotiationStatus): boolean {
  return status !== "active";
}

export function lastBuyerOffer(negotiation: Negotiation): number | undefined {
  for (let i = negotiation.messages.length - 1; i >= 0; i--) {
    const m = negotiation.messages[i];
    if (m.role === "buyer" && m.offerPrice !== undefined) return m.offerPrice;
  }
  return undefined;
}

/** Strip wrapping quotes and whitespace some models add around chat text. */
function cleanGenerated(text: string): string {
  return text.trim().replace(/^["'`]+|["'`]+$/g, "").trim();
}

/**
 * Per-listing negotiation state machine. Decides offers, phrases messages
 * through the TextGenerator and records both sides of the conversation.
 * Never touches the chat channel; the controller sends what this returns.
 *
 * Every mutating operation validates first and mutates last, so a throw
 * leaves the record untouched.
 */
export class NegotiationEngine {
  private generator: TextGenerator;
  private strategy: EscalationStrategy;
  private persona: Persona;
  private now: () => number;

  constructor(generator: TextGenerator, options: NegotiationEngineOptions = {}) {
    this.generator = generator;
    this.strategy = validateStrategy(options.strategy ?? STANDARD_STRATEGY);
    this.persona = options.persona ?? "tactical_empathy";
    this.now = options.now ?? Date.now;
  }

  getStrategy(): EscalationStrategy {
    return this.strategy;
  }

  start(listing: Listing): Negotiation {
    if (!Number.isFinite(listing.price) || listing.price <= 0) {
      throw new InvalidListingError(listing, `price must be positive, got ${listing.price}`);
    }
    if (!listing.title.trim()) throw new InvalidListingError(listing, "title is empty");
    if (!listing.sellerId.trim()) throw new InvalidListingError(listing, "seller id is empty");

    const ts = this.now();
    log("start", `New negotiation for "${listing.title}" @ $${formatPrice(listing.price)} (seller ${listing.sellerId}, strategy ${this.strategy.name})`);
    return {
      key: negotiationKey(listing),
      listing: { ...listing },
      messages: [],
      currentRound: 0,
      status: "active",
      startedAt: ts,
      updatedAt: ts,
    };
  }

  hasReachedPlateau(negotiation: Negotiation): boolean {
    return negotiation.currentRound >= this.strategy.percentages.length;
  }

  nextOffer(negotiation: Negotiation): number {
    this.assertActive(negotiation, "compute next offer");
    const round = negotiation.currentRound + 1;
    const computed = offerForRound(this.strategy, negotiation.listing.price, round);
    if (computed === null) throw new PlateauReachedError(negotiation);

    const previous = lastBuyerOffer(negotiation);
    if (previous !== undefined && toMinorUnits(computed) <= toMinorUnits(previous)) {
      const bumped = fromMinorUnits(toMinorUnits(previous) + 1);
      log("offer", `Round ${round}: computed $${formatPrice(computed)} does not exceed $${formatPrice(previous)}, bumping to $${formatPrice(bumped)}`);
      return bumped;
    }
    log("offer", `Round ${round}: $${formatPrice(computed)} (${this.strategy.percentages[round - 1]}% of $${formatPrice(negotiation.listing.price)})`);
    return computed;
  }

  async composeMessage(negotiation: Negotiation, offerAmount: number): Promise<string> {
    const round = negotiation.currentRound + 1;
    const fallback = fallbackOfferMessage(negotiation.listing.title, offerAmount, round);
    try {
      const prompt = offerMessagePrompt(negotiation, offerAmount, round, this.persona);
      const t0 = this.now();
      const text = cleanGenerated(await this.generator.generate(prompt));
      if (!text) {
        log("compose", `Round ${round}: empty generation, using fallback`);
        return fallback;
      }
      log("compose", `Round ${round}: generated in ${this.now() - t0}ms`, text);
      return text;
    } catch (err) {
      log("compose", `Round ${round}: generation failed, using fallback`, String(err));
      return fallback;
    }
  }

  async composeWalkAway(negotiation: Negotiation): Promise<string> {
    const fallback = fallbackWalkAwayMessage(negotiation.listing.title);
    try {
      const text = cleanGenerated(await this.generator.generate(walkAwayMessagePrompt(negotiation, this.persona)));
      return text || fallback;
    } catch (err) {
      log("compose", "Walk-away generation failed, using fallback", String(err));
      return fallback;
    }
  }

  /** Phrase the buyer's reply to an accepted deal. Never rejects. */
  async composeConfirmation(negotiation: Negotiation): Promise<string> {
    const fallback = fallbackConfirmationMessage(negotiation.finalPrice ?? lastBuyerOffer(negotiation) ?? negotiation.listing.price);
    try {
      const text = cleanGenerated(await this.generator.generate(confirmationMessagePrompt(negotiation, this.persona)));
      return text || fallback;
    } catch (err) {
      log("compose", "Confirmation generation failed, using fallback", String(err));
      return fallback;
    }
  }

  recordBuyerOffer(negotiation: Negotiation, offerAmount: number, text: string): void {
    this.assertActive(negotiation, "record buyer offer");
    if (!Number.isFinite(offerAmount) || offerAmount <= 0) {
      throw new RangeError(`Offer must be a positive amount, got ${offerAmount}`);
    }
    const previous = lastBuyerOffer(negotiation);
    if (previous !== undefined && toMinorUnits(offerAmount) <= toMinorUnits(previous)) {
      throw new NonMonotonicOfferError(negotiation, offerAmount, previous);
    }

    const round = negotiation.currentRound + 1;
    const ts = this.now();
    negotiation.messages.push({ role: "buyer", content: text, offerPrice: offerAmount, round, timestamp: ts });
    negotiation.currentRound = round;
    negotiation.updatedAt = ts;
    log("buyer", `Round ${round} offer $${formatPrice(offerAmount)} recorded for ${negotiation.key}`);
  }

  recordSellerReply(negotiation: Negotiation, text: string, parsedPrice?: number): void {
    this.assertActive(negotiation, "record seller reply");
    const lastOffer = lastBuyerOffer(negotiation);
    const accepted =
      parsedPrice !== undefined &&
      lastOffer !== undefined &&
      toMinorUnits(parsedPrice) <= toMinorUnits(lastOffer);

    const ts = this.now();
    const message: Message = parsedPrice !== undefined
      ? { role: "seller", content: text, offerPrice: parsedPrice, timestamp: ts }
      : { role: "seller", content: text, timestamp: ts };
    negotiation.messages.push(message);
    negotiation.updatedAt = ts;

    if (accepted && parsedPrice !== undefined) {
      negotiation.status = "accepted";
      negotiation.finalPrice = parsedPrice;
      log("seller", `>>> DEAL at $${formatPrice(parsedPrice)} for ${negotiation.key}`);
    } else {
      log("seller", `Reply for ${negotiation.key}${parsedPrice !== undefined ? ` (price $${formatPrice(parsedPrice)})` : ""}`, text);
    }
  }

  /** Pass `delivered = false` when the closing message could not be sent; the walk-away still stands. */
  walkAway(negotiation: Negotiation, text?: string, delivered = true): void {
    if (isTerminal(negotiation.status)) {
      log("walk", `${negotiation.key} already ${negotiation.status}, nothing to do`);
      return;
    }
    const ts = this.now();
    const content = text ?? fallbackWalkAwayMessage(negotiation.listing.title);
    negotiation.messages.push(
      delivered
        ? { role: "buyer", content, timestamp: ts }
        : { role: "buyer", content, timestamp: ts, undelivered: true },
    );
    negotiation.status = "walked_away";
    negotiation.updatedAt = ts;
    log("walk", `Walked away from ${negotiation.key} after ${negotiation.currentRound} rounds${delivered ? "" : " (closing message not delivered)"}`);
  }

  /** Record the buyer's reply to an accepted deal. Carries no offer and does not change the round. */
  recordConfirmation(negotiation: Negotiation, text: string, delivered = true): void {
    if (negotiation.status !== "accepted") {
      throw new TerminalNegotiationError(negotiation, "record deal confirmation");
    }
    const ts = this.now();
    negotiation.messages.push(
      delivered
        ? { role: "buyer", content: text, timestamp: ts }
        : { role: "buyer", content: text, timestamp: ts, undelivered: true },
    );
    negotiation.updatedAt = ts;
    log("buyer", `Deal confirmation recorded for ${negotiation.key}${delivered ? "" : " (not delivered)"}`);
  }

  private assertActive(negotiation: Negotiation, action: string): void {
    if (isTerminal(negotiation.status)) {
      throw new TerminalNegotiationError(negotiation, action);
    }
  }
}
