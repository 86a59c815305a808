import { describe, it, expect } from "vitest";
import { commandFromToolCall, parseCommand } from "../commands.js";

describe("parseCommand", () => {
  it("parses searches with an optional price ceiling", () => {
    expect(parseCommand("find iPhone 14 under $600")).toEqual({
      ok: true,
      command: { type: "search", query: "iPhone 14", maxPrice: 600 },
    });
    expect(parseCommand("search desk lamp")).toEqual({ ok: true, command: { type: "search", query: "desk lamp" } });
  });

  it("requires a search query", () => {
    expect(parseCommand("find")).toEqual({ ok: false, error: "Usage: find <query> [under $<max>]" });
  });

  it("parses index commands and their aliases", () => {
    expect(parseCommand("open 2")).toEqual({ ok: true, command: { type: "open", index: 2 } });
    expect(parseCommand("chat 1")).toEqual({ ok: true, command: { type: "open", index: 1 } });
    expect(parseCommand("  lowball 0 ")).toEqual({ ok: true, command: { type: "lowball", index: 0 } });
  });

  it("rejects missing or non-numeric indexes", () => {
    expect(parseCommand("open x")).toEqual({ ok: false, error: "Usage: open <index>" });
    expect(parseCommand("lowball")).toEqual({ ok: false, error: "Usage: lowball <index>" });
    expect(parseCommand("lowball -1")).toEqual({ ok: false, error: "Usage: lowball <index>" });
  });

  it("is case-insensitive on the verb", () => {
    expect(parseCommand("LISTINGS")).toEqual({ ok: true, command: { type: "listings" } });
    expect(parseCommand("History")).toEqual({ ok: true, command: { type: "history" } });
  });

  it("reports unknown commands", () => {
    expect(parseCommand("haggle 1")).toEqual({ ok: false, error: 'Unknown command "haggle". Type "help" for commands.' });
  });
});

describe("commandFromToolCall", () => {
  it("builds search commands", () => {
    expect(commandFromToolCall("search", { query: " lamp ", maxPrice: null })).toEqual({
      ok: true,
      command: { type: "search", query: "lamp" },
    });
    expect(commandFromToolCall("search", { query: "lamp", maxPrice: 300 })).toEqual({
      ok: true,
      command: { type: "search", query: "lamp", maxPrice: 300 },
    });
  });

  it("validates arguments", () => {
    expect(commandFromToolCall("search", { query: "" })).toEqual({ ok: false, error: "search: missing query" });
    expect(commandFromToolCall("search", { query: "lamp", maxPrice: -5 })).toEqual({
      ok: false,
      error: "search: maxPrice must be a positive number",
    });
    expect(commandFromToolCall("open", { index: 1.5 })).toEqual({ ok: false, error: "open: index must be an integer" });
  });

  it("maps index tools", () => {
    expect(commandFromToolCall("lowball", { index: 1 })).toEqual({ ok: true, command: { type: "lowball", index: 1 } });
    expect(commandFromToolCall("open", { index: 0 })).toEqual({ ok: true, command: { type: "open", index: 0 } });
  });

  it("rejects tools outside the command surface", () => {
    expect(commandFromToolCall("help", {})).toEqual({ ok: false, error: "Unknown tool: help" });
  });
});
