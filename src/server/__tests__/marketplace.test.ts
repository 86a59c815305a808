import { describe, it, expect } from "vitest";
import { MarketplaceBrowser, findChatInput, simpleHash } from "../marketplace.js";
import type { BrowserSession } from "../mcp-client.js";
import { FakeLLM, makeListing, toolCall } from "./fakes.js";

const BASE = "https://market.test";

const LISTING_PAGE = `- heading "Desk lamp" [level=1]
- text: $250
- button "Chat" [ref=e5]`;

const CHAT_PAGE = `- heading "Desk lamp" [level=1]
- text: Hi, still available
- textbox "Type a message..." [ref=e9]`;

const CHAT_PAGE_NEW_REPLY = `${CHAT_PAGE}
- text: Sure, how much?`;

/** Records actions; snapshots are served in order and the last one repeats. */
class FakeSession implements BrowserSession {
  readonly actions: string[] = [];
  snapshots: string[] = [];
  snapshotCount = 0;

  async navigate(url: string): Promise<void> {
    this.actions.push(`navigate ${url}`);
  }

  async snapshot(): Promise<string> {
    this.snapshotCount++;
    const next = this.snapshots.length > 1 ? this.snapshots.shift() : this.snapshots[0];
    return next ?? "";
  }

  async click(ref: string): Promise<void> {
    this.actions.push(`click ${ref}`);
  }

  async type(ref: string, text: string): Promise<void> {
    this.actions.push(`type ${ref} ${text}`);
  }

  async pressKey(key: string): Promise<void> {
    this.actions.push(`press ${key}`);
  }
}

function setup() {
  const session = new FakeSession();
  const llm = new FakeLLM();
  let t = 0;
  const market = new MarketplaceBrowser(session, llm, {
    baseUrl: `${BASE}/`,
    pollIntervalMs: 5000,
    sleep: async (ms) => {
      t += ms;
    },
    now: () => t,
  });
  return { session, llm, market };
}

function chatReading(messages: Array<{ sender: string; text: string }>, chatButtonRef?: string) {
  return toolCall("read_chat", chatButtonRef ? { messages, chatButtonRef } : { messages });
}

describe("findChatInput", () => {
  it("finds the message textbox and skips the search box", () => {
    const snapshot = `- textbox "Search for an item" [ref=e1]\n- textbox "Type a message..." [ref=e9]`;
    expect(findChatInput(snapshot)).toBe("e9");
  });

  it("falls back to a textarea", () => {
    expect(findChatInput(`- generic [ref=e2]\n- textarea [ref=e3]`)).toBe("e3");
  });

  it("returns null without an input", () => {
    expect(findChatInput(LISTING_PAGE)).toBeNull();
  });
});

describe("MarketplaceBrowser.search", () => {
  it("reads listings from the results page", async () => {
    const { session, llm, market } = setup();
    session.snapshots = ["- link \"iPhone 14\" [ref=e1]"];
    llm.toolResponses = [
      toolCall("extract_listings", {
        listings: [
          { title: " iPhone 14 ", price: 800, sellerId: "techseller", url: "/p/iphone-14-123" },
          { title: "iPhone 14 Pro", price: 1100, sellerId: "prostore", url: "https://market.test/p/iphone-14-pro-7" },
          { title: "Broken card", price: "ask" },
        ],
      }),
    ];

    const listings = await market.search("iphone 14", 900);

    expect(session.actions).toEqual(["navigate https://market.test/search/iphone%2014"]);
    expect(listings).toEqual([
      {
        title: "iPhone 14",
        price: 800,
        sellerId: "techseller",
        sourceUrl: "https://market.test/p/iphone-14-123",
        channelReference: "https://market.test/p/iphone-14-123",
      },
    ]);
    expect(llm.toolCalls[0].tools.map((t) => t.name)).toEqual(["extract_listings"]);
    expect(llm.toolCalls[0].messages[0].content).toBe("Accessibility tree:\n- link \"iPhone 14\" [ref=e1]");
  });

  it("fails when the page cannot be read", async () => {
    const { llm, market } = setup();
    llm.toolResponses = [{ type: "text", text: "I see no listings" }];
    await expect(market.search("lamp")).rejects.toThrow('Could not read listings from the results page for "lamp"');
  });
});

describe("MarketplaceBrowser chat", () => {
  const lamp = makeListing({
    title: "Desk lamp",
    price: 250,
    sellerId: "lampco",
    channelReference: "https://market.test/p/desk-lamp-9",
  });

  it("opens the chat through the chat button when no input is visible", async () => {
    const { session, llm, market } = setup();
    session.snapshots = [LISTING_PAGE, CHAT_PAGE];
    llm.toolResponses = [chatReading([], "e5"), chatReading([{ sender: "seller", text: "Hi, still available" }])];

    const handle = await market.open(lamp);

    expect(session.actions).toEqual(["navigate https://market.test/p/desk-lamp-9", "click e5"]);
    expect(handle.seenSellerMessages).toBe(1);
    expect(handle.lastSnapshotHash).toBe(simpleHash(CHAT_PAGE));
  });

  it("types into the chat input and presses Enter", async () => {
    const { session, market } = setup();
    session.snapshots = [CHAT_PAGE];
    const handle = { listing: lamp, seenSellerMessages: 0, lastSnapshotHash: "" };

    expect(await market.send(handle, "Would you do $125?")).toBe(true);
    expect(session.actions).toEqual(["click e9", "type e9 Would you do $125?", "press Enter"]);
  });

  it("reports a failed send when there is no input", async () => {
    const { session, market } = setup();
    session.snapshots = [LISTING_PAGE];
    const handle = { listing: lamp, seenSellerMessages: 0, lastSnapshotHash: "" };

    expect(await market.send(handle, "hello")).toBe(false);
    expect(session.actions).toEqual([]);
  });

  it("returns only seller messages that arrived after the last poll", async () => {
    const { session, llm, market } = setup();
    session.snapshots = [CHAT_PAGE, CHAT_PAGE_NEW_REPLY];
    llm.toolResponses = [
      chatReading([
        { sender: "seller", text: "Hi, still available" },
        { sender: "buyer", text: "Would you do $125?" },
        { sender: "seller", text: "Sure, how much?" },
      ]),
    ];
    const handle = { listing: lamp, seenSellerMessages: 1, lastSnapshotHash: simpleHash(CHAT_PAGE) };

    expect(await market.pollReply(handle, 10_000)).toBe("Sure, how much?");
    expect(handle.seenSellerMessages).toBe(2);
    expect(handle.lastSnapshotHash).toBe(simpleHash(CHAT_PAGE_NEW_REPLY));
    // unchanged page is not re-read
    expect(llm.toolCalls).toHaveLength(1);
  });

  it("gives up after the timeout when the page does not change", async () => {
    const { session, llm, market } = setup();
    session.snapshots = [CHAT_PAGE];
    const handle = { listing: lamp, seenSellerMessages: 1, lastSnapshotHash: simpleHash(CHAT_PAGE) };

    expect(await market.pollReply(handle, 10_000)).toBeNull();
    expect(session.snapshotCount).toBe(3);
    expect(llm.toolCalls).toHaveLength(0);
  });
});
