import { describe, it, expect } from "vitest";
import {
  ACKERMAN_STRATEGY,
  STANDARD_STRATEGY,
  formatPrice,
  offerForRound,
  resolveStrategy,
  validateStrategy,
} from "../escalation.js";

describe("offerForRound", () => {
  it("follows the standard 50/60/70 table", () => {
    expect(offerForRound(STANDARD_STRATEGY, 800, 1)).toBe(400);
    expect(offerForRound(STANDARD_STRATEGY, 800, 2)).toBe(480);
    expect(offerForRound(STANDARD_STRATEGY, 800, 3)).toBe(560);
  });

  it("returns null past the end of the table", () => {
    expect(offerForRound(STANDARD_STRATEGY, 800, 4)).toBeNull();
  });

  it("rounds to whole cents", () => {
    expect(offerForRound(STANDARD_STRATEGY, 99.99, 1)).toBe(50);
    expect(offerForRound(ACKERMAN_STRATEGY, 250, 1)).toBe(162.5);
    expect(offerForRound(ACKERMAN_STRATEGY, 250, 4)).toBe(250);
  });
});

describe("resolveStrategy", () => {
  it("finds built-ins by name, case-insensitively", () => {
    expect(resolveStrategy("standard")).toBe(STANDARD_STRATEGY);
    expect(resolveStrategy(" Ackerman ")).toBe(ACKERMAN_STRATEGY);
  });

  it("parses a custom comma-separated table", () => {
    const s = resolveStrategy("40, 55,70");
    expect(s.name).toBe("custom(40,55,70)");
    expect(s.percentages).toEqual([40, 55, 70]);
  });

  it("rejects unknown names and malformed tables", () => {
    expect(() => resolveStrategy("aggressive")).toThrow('Unknown escalation strategy "aggressive"');
    expect(() => resolveStrategy("40,,70")).toThrow(/Unknown escalation strategy/);
    expect(() => resolveStrategy("60,50")).toThrow("not strictly increasing at round 2");
    expect(() => resolveStrategy("50,120")).toThrow("round 2: 120% is outside (0, 100]");
  });
});

describe("validateStrategy", () => {
  it("rejects an empty table", () => {
    expect(() => validateStrategy({ name: "empty", percentages: [] })).toThrow('Escalation strategy "empty" has no rounds');
  });
});

describe("formatPrice", () => {
  it("drops cents on whole amounts only", () => {
    expect(formatPrice(400)).toBe("400");
    expect(formatPrice(12.5)).toBe("12.50");
    expect(formatPrice(19.99)).toBe("19.99");
  });
});
