import { describe, it, expect } from "vitest";
import { formatTranscript, summarize } from "../report.js";
import { NegotiationEngine } from "../negotiation-engine.js";
import type { Negotiation } from "../types.js";
import { ScriptedGenerator, fakeClock, makeListing } from "./fakes.js";

const engine = new NegotiationEngine(new ScriptedGenerator(), { now: fakeClock() });

function accepted(price: number, finalPrice: number, title: string): Negotiation {
  const n = engine.start(makeListing({ title, price }));
  engine.recordBuyerOffer(n, finalPrice, `Would you do $${finalPrice}?`);
  engine.recordSellerReply(n, `ok $${finalPrice}`, finalPrice);
  return n;
}

describe("summarize", () => {
  it("counts outcomes and averages the discount on deals", () => {
    const walked = engine.start(makeListing({ title: "Desk lamp", price: 250 }));
    engine.walkAway(walked);
    const active = engine.start(makeListing({ title: "Camera", price: 300 }));

    const s = summarize([accepted(800, 480, "iPhone 14"), accepted(100, 80, "Kettle"), walked, active]);
    expect(s).toEqual({
      total: 4,
      accepted: 2,
      walkedAway: 1,
      active: 1,
      averageDiscountPct: 30,
      totalSaved: 340,
    });
  });

  it("has no average without deals", () => {
    expect(summarize([]).averageDiscountPct).toBeNull();
  });
});

describe("formatTranscript", () => {
  it("tags buyer offers with their round", () => {
    const n = accepted(800, 480, "iPhone 14");
    expect(formatTranscript(n)).toBe(
      [
        "== iPhone 14 (seller techseller) ==",
        "https://market.test/p/iphone-14-123",
        "BUYER  [round 1, $480]: Would you do $480?",
        "SELLER: ok $480",
      ].join("\n"),
    );
  });

  it("marks closing messages the seller never got", () => {
    const n = engine.start(makeListing({ title: "Desk lamp", price: 250, sellerId: "lampco", sourceUrl: "https://market.test/p/desk-lamp-9" }));
    engine.walkAway(n, "Thanks, I'll pass", false);
    expect(formatTranscript(n)).toBe(
      ["== Desk lamp (seller lampco) ==", "https://market.test/p/desk-lamp-9", "BUYER  (not delivered): Thanks, I'll pass"].join("\n"),
    );
  });
});
