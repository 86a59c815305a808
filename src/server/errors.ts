import type { Listing, Negotiation, NegotiationStatus } from "./types.js";

export interface ErrorContext {
  title?: string;
  sellerId?: string;
  round?: number;
  [key: string]: unknown;
}

export type ErrorCode =
  | "INVALID_LISTING"
  | "TERMINAL_NEGOTIATION"
  | "ALREADY_RESOLVED"
  | "CHANNEL_SEND"
  | "GENERATION_FAILURE"
  | "GENERATION_TIMEOUT"
  | "INDEX_OUT_OF_RANGE"
  | "PLATEAU_REACHED"
  | "NON_MONOTONIC_OFFER"
  | "SESSION_BUSY"
  | "SESSION_CANCELLED"
  | "NO_LISTINGS"
  | "INVALID_CONFIG";

export class LowballerError extends Error {
  readonly code: ErrorCode;
  readonly context: ErrorContext;

  constructor(code: ErrorCode, message: string, context: ErrorContext = {}) {
    super(message);
    this.code = code;
    this.context = context;
    this.name = "LowballerError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function listingContext(listing: Listing): ErrorContext {
  return { title: listing.title, sellerId: listing.sellerId };
}

function negotiationContext(negotiation: Negotiation): ErrorContext {
  return { ...listingContext(negotiation.listing), round: negotiation.currentRound };
}

export class InvalidListingError extends LowballerError {
  constructor(listing: Listing, reason: string) {
    super("INVALID_LISTING", `Invalid listing "${listing.title}" from ${listing.sellerId}: ${reason}`, listingContext(listing));
    this.name = "InvalidListingError";
  }
}

export class TerminalNegotiationError extends LowballerError {
  readonly status: NegotiationStatus;

  constructor(negotiation: Negotiation, action: string) {
    super(
      "TERMINAL_NEGOTIATION",
      `Cannot ${action}: negotiation ${negotiation.key} is ${negotiation.status} (round ${negotiation.currentRound})`,
      negotiationContext(negotiation),
    );
    this.status = negotiation.status;
    this.name = "TerminalNegotiationError";
  }
}

export class AlreadyResolvedError extends LowballerError {
  constructor(negotiation: Negotiation) {
    const price = negotiation.finalPrice !== undefined ? ` at $${negotiation.finalPrice}` : "";
    super(
      "ALREADY_RESOLVED",
      `Negotiation for "${negotiation.listing.title}" with ${negotiation.listing.sellerId} was already ${negotiation.status}${price} after ${negotiation.currentRound} rounds`,
      negotiationContext(negotiation),
    );
    this.name = "AlreadyResolvedError";
  }
}

export class ChannelSendError extends LowballerError {
  /** `what` names the message, e.g. "round 2 offer" or "walk-away message". */
  constructor(negotiation: Negotiation, what: string, attempts: number, cause?: unknown) {
    super(
      "CHANNEL_SEND",
      `Failed to send ${what} for "${negotiation.listing.title}" to ${negotiation.listing.sellerId} after ${attempts} attempts${cause !== undefined ? `: ${String(cause)}` : ""}`,
      { ...negotiationContext(negotiation), attempts },
    );
    this.name = "ChannelSendError";
  }
}

export class GenerationFailureError extends LowballerError {
  constructor(message: string) {
    super("GENERATION_FAILURE", `Text generation failed: ${message}`);
    this.name = "GenerationFailureError";
  }
}

export class GenerationTimeoutError extends LowballerError {
  constructor(timeoutMs: number) {
    super("GENERATION_TIMEOUT", `Text generation timed out after ${timeoutMs}ms`, { timeoutMs });
    this.name = "GenerationTimeoutError";
  }
}

export class IndexOutOfRangeError extends LowballerError {
  constructor(index: number, size: number) {
    const range = size > 0 ? `0-${size - 1}` : "none (search first)";
    super("INDEX_OUT_OF_RANGE", `Invalid listing index ${index}. Valid range: ${range}`, { index, size });
    this.name = "IndexOutOfRangeError";
  }
}

export class PlateauReachedError extends LowballerError {
  constructor(negotiation: Negotiation) {
    super(
      "PLATEAU_REACHED",
      `No further offers for "${negotiation.listing.title}": escalation table exhausted at round ${negotiation.currentRound}`,
      negotiationContext(negotiation),
    );
    this.name = "PlateauReachedError";
  }
}

export class NonMonotonicOfferError extends LowballerError {
  constructor(negotiation: Negotiation, offer: number, previous: number) {
    super(
      "NON_MONOTONIC_OFFER",
      `Offer $${offer} for "${negotiation.listing.title}" does not exceed previous offer $${previous}`,
      { ...negotiationContext(negotiation), offer, previous },
    );
    this.name = "NonMonotonicOfferError";
  }
}

export class SessionBusyError extends LowballerError {
  constructor(activeKey: string) {
    super("SESSION_BUSY", `A negotiation session is already running for ${activeKey}`, { activeKey });
    this.name = "SessionBusyError";
  }
}

export class SessionCancelledError extends LowballerError {
  constructor(negotiation: Negotiation) {
    super(
      "SESSION_CANCELLED",
      `Session for "${negotiation.listing.title}" cancelled at round ${negotiation.currentRound}; negotiation left ${negotiation.status}`,
      negotiationContext(negotiation),
    );
    this.name = "SessionCancelledError";
  }
}

export class NoListingsError extends LowballerError {
  constructor() {
    super("NO_LISTINGS", "No listings available. Search first.");
    this.name = "NoListingsError";
  }
}

export class InvalidConfigError extends LowballerError {
  constructor(key: string, value: string, expected: string) {
    super("INVALID_CONFIG", `Invalid value for ${key}: "${value}" (expected ${expected})`, { key, value });
    this.name = "InvalidConfigError";
  }
}
