import type { Listing, Negotiation } from "./types.js";

export interface ListingSource {
  /** One finite result set per call, in marketplace order. */
  search(query: string, maxPrice?: number): Promise<Listing[]>;
}

/** Opaque per-conversation handle issued by a ChatChannel. */
export interface ChannelHandle {
  readonly listing: Listing;
}

export interface ChatChannel<H extends ChannelHandle = ChannelHandle> {
  open(listing: Listing): Promise<H>;
  /** Resolves false when the message could not be delivered; may also reject. */
  send(handle: H, text: string): Promise<boolean>;
  /** The next new seller message, or null if none arrived within `timeoutMs`. */
  pollReply(handle: H, timeoutMs: number): Promise<string | null>;
}

export interface NegotiationRepository {
  save(negotiation: Negotiation): Promise<void>;
  load(key: string): Promise<Negotiation | null>;
  /** Most recently updated first. */
  loadAll(): Promise<Map<string, Negotiation>>;
}
