import type { Listing } from "./types.js";
import type { ChannelHandle, ChatChannel, ListingSource } from "./capabilities.js";
import type { BrowserSession } from "./mcp-client.js";
import type { LLMProvider } from "./llm/types.js";
import { EXTRACT_LISTINGS_TOOL, READ_CHAT_TOOL } from "./llm/tools.js";
import { isRecord } from "./llm/utils.js";
import { extractListingsPrompt, readChatPrompt } from "./prompts/page-reading.js";
import { createLog } from "./log.js";

const log = createLog("Market");

export interface MarketplaceOptions {
  baseUrl: string;
  pageLoadMs?: number;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface MarketplaceChatHandle extends ChannelHandle {
  /** Seller messages already seen on the page; only later ones are new. */
  seenSellerMessages: number;
  lastSnapshotHash: string;
}

interface ChatView {
  messages: Array<{ sender: "buyer" | "seller"; text: string }>;
  chatButtonRef?: string;
}

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export function simpleHash(str: string): string {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = ((hash << 5) - hash) + char;
    hash |= 0;
  }
  return String(hash);
}

/** Locate the chat textbox ref in an accessibility snapshot. */
export function findChatInput(snapshot: string): string | null {
  const lines = snapshot.split("\n");
  for (const line of lines) {
    const lower = line.toLowerCase();
    if (
      (lower.includes("textbox") || lower.includes("type here") || lower.includes("type a message") || lower.includes("write a message")) &&
      !lower.includes("search")
    ) {
      const refMatch = line.match(/\[ref=([\w-]+)\]/);
      if (refMatch) return refMatch[1];
    }
  }
  for (const line of lines) {
    if (line.toLowerCase().includes("contenteditable") || line.toLowerCase().includes("textarea")) {
      const refMatch = line.match(/\[ref=([\w-]+)\]/);
      if (refMatch) return refMatch[1];
    }
  }
  return null;
}

/**
 * ListingSource and ChatChannel over a browser session. Reading the page is
 * delegated to the LLM through tool calls; typing goes through the session.
 */
export class MarketplaceBrowser implements ListingSource, ChatChannel<MarketplaceChatHandle> {
  private session: BrowserSession;
  private llm: LLMProvider;
  private baseUrl: string;
  private pageLoadMs: number;
  private pollIntervalMs: number;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  constructor(session: BrowserSession, llm: LLMProvider, options: MarketplaceOptions) {
    this.session = session;
    this.llm = llm;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.pageLoadMs = options.pageLoadMs ?? 3000;
    this.pollIntervalMs = options.pollIntervalMs ?? 5000;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async search(query: string, maxPrice?: number): Promise<Listing[]> {
    const url = `${this.baseUrl}/search/${encodeURIComponent(query)}`;
    log("search", `Navigating to ${url}`);
    await this.session.navigate(url);
    await this.sleep(this.pageLoadMs);

    const snapshot = await this.session.snapshot();
    const result = await this.llm.chatWithTools(
      extractListingsPrompt(query),
      [{ role: "user", content: `Accessibility tree:\n${snapshot}` }],
      [EXTRACT_LISTINGS_TOOL],
    );
    const raw: unknown = result.type === "tool_call" ? result.call.args.listings : undefined;
    if (!Array.isArray(raw)) {
      throw new Error(`Could not read listings from the results page for "${query}"`);
    }

    const items: unknown[] = raw;
    const listings: Listing[] = [];
    let skipped = 0;
    for (const item of items) {
      if (
        !isRecord(item) ||
        typeof item.title !== "string" ||
        typeof item.price !== "number" ||
        typeof item.sellerId !== "string" ||
        typeof item.url !== "string"
      ) {
        skipped++;
        continue;
      }
      const sourceUrl = new URL(item.url, `${this.baseUrl}/`).toString();
      listings.push({
        title: item.title.trim(),
        price: item.price,
        sellerId: item.sellerId.trim(),
        sourceUrl,
        channelReference: sourceUrl,
      });
    }

    const filtered = maxPrice === undefined ? listings : listings.filter((l) => l.price <= maxPrice);
    log("search", `Found ${listings.length} listings (${skipped} unreadable), ${filtered.length} within budget`);
    return filtered;
  }

  async open(listing: Listing): Promise<MarketplaceChatHandle> {
    log("open", `Opening chat for "${listing.title}" (${listing.sellerId})`);
    await this.session.navigate(listing.channelReference);
    await this.sleep(this.pageLoadMs);

    let snapshot = await this.session.snapshot();
    let view = await this.readChat(snapshot);
    if (!findChatInput(snapshot) && view.chatButtonRef) {
      log("open", `Clicking chat button ${view.chatButtonRef}`);
      await this.session.click(view.chatButtonRef);
      await this.sleep(this.pageLoadMs);
      snapshot = await this.session.snapshot();
      view = await this.readChat(snapshot);
    }

    return {
      listing,
      seenSellerMessages: view.messages.filter((m) => m.sender === "seller").length,
      lastSnapshotHash: simpleHash(snapshot),
    };
  }

  async send(handle: MarketplaceChatHandle, text: string): Promise<boolean> {
    const snapshot = await this.session.snapshot();
    const inputRef = findChatInput(snapshot);
    if (!inputRef) {
      log("send", `No chat input found for "${handle.listing.title}"`);
      return false;
    }
    log("send", `Typing into ${inputRef}`, text);
    await this.session.click(inputRef);
    await this.session.type(inputRef, text);
    await this.session.pressKey("Enter");
    return true;
  }

  async pollReply(handle: MarketplaceChatHandle, timeoutMs: number): Promise<string | null> {
    const deadline = this.now() + timeoutMs;
    for (;;) {
      const snapshot = await this.session.snapshot();
      const hash = simpleHash(snapshot);
      if (hash !== handle.lastSnapshotHash) {
        handle.lastSnapshotHash = hash;
        const view = await this.readChat(snapshot);
        const sellerMessages = view.messages.filter((m) => m.sender === "seller");
        if (sellerMessages.length > handle.seenSellerMessages) {
          const fresh = sellerMessages.slice(handle.seenSellerMessages).map((m) => m.text);
          handle.seenSellerMessages = sellerMessages.length;
          log("poll", `${fresh.length} new seller message(s) for "${handle.listing.title}"`);
          return fresh.join("\n");
        }
      }
      if (this.now() + this.pollIntervalMs > deadline) return null;
      await this.sleep(this.pollIntervalMs);
    }
  }

  private async readChat(snapshot: string): Promise<ChatView> {
    const result = await this.llm.chatWithTools(
      readChatPrompt(),
      [{ role: "user", content: `Accessibility tree:\n${snapshot}` }],
      [READ_CHAT_TOOL],
    );
    if (result.type !== "tool_call") {
      log("read", "LLM returned text instead of a chat reading");
      return { messages: [] };
    }
    const { messages, chatButtonRef } = result.call.args;
    const view: ChatView = { messages: [] };
    if (Array.isArray(messages)) {
      const items: unknown[] = messages;
      for (const m of items) {
        if (isRecord(m) && (m.sender === "buyer" || m.sender === "seller") && typeof m.text === "string") {
          view.messages.push({ sender: m.sender, text: m.text });
        }
      }
    }
    if (typeof chatButtonRef === "string" && chatButtonRef) view.chatButtonRef = chatButtonRef;
    return view;
  }
}
