import type { ControllerCommand } from "./types.js";

export const HELP_TEXT = `Commands:
  find <query> [under $<max>]   Search for items (also: search)
  listings                      Show current listings
  open <index>                  Open the chat with a listing's seller (also: chat)
  lowball <index>               Negotiate a listing's price
  history                       Show negotiation history
  help                          Show this help`;

export type ParseResult =
  | { ok: true; command: ControllerCommand }
  | { ok: false; error: string };

function parseIndex(arg: string | undefined, usage: string): ParseResult | number {
  if (arg === undefined || !/^\d+$/.test(arg)) return { ok: false, error: `Usage: ${usage}` };
  return Number(arg);
}

/** Split "iphone 14 under $600" into query and price ceiling. */
function parseSearch(rest: string): ParseResult {
  const m = rest.match(/^(.*?)\s+(?:under|below|max|<)\s*\$?\s*(\d+(?:\.\d+)?)\s*$/i);
  const query = (m ? m[1] : rest).trim();
  if (!query) return { ok: false, error: "Usage: find <query> [under $<max>]" };
  return m ? { ok: true, command: { type: "search", query, maxPrice: Number(m[2]) } } : { ok: true, command: { type: "search", query } };
}

/** Parse one line of the text command interface. */
export function parseCommand(line: string): ParseResult {
  const trimmed = line.trim();
  const [head = "", ...args] = trimmed.split(/\s+/);
  const verb = head.toLowerCase();
  const rest = trimmed.slice(head.length).trim();

  switch (verb) {
    case "find":
    case "search":
      return parseSearch(rest);
    case "listings":
      return { ok: true, command: { type: "listings" } };
    case "open":
    case "chat": {
      const index = parseIndex(args[0], `${verb} <index>`);
      return typeof index === "number" ? { ok: true, command: { type: "open", index } } : index;
    }
    case "lowball": {
      const index = parseIndex(args[0], "lowball <index>");
      return typeof index === "number" ? { ok: true, command: { type: "lowball", index } } : index;
    }
    case "history":
      return { ok: true, command: { type: "history" } };
    case "help":
      return { ok: true, command: { type: "help" } };
    default:
      return { ok: false, error: `Unknown command "${head}". Type "help" for commands.` };
  }
}

/** Validate an LLM tool call against the command surface. */
export function commandFromToolCall(name: string, args: Record<string, unknown>): ParseResult {
  switch (name) {
    case "search": {
      const { query, maxPrice } = args;
      if (typeof query !== "string" || !query.trim()) return { ok: false, error: "search: missing query" };
      if (maxPrice === undefined || maxPrice === null) return { ok: true, command: { type: "search", query: query.trim() } };
      if (typeof maxPrice !== "number" || !(maxPrice > 0)) return { ok: false, error: "search: maxPrice must be a positive number" };
      return { ok: true, command: { type: "search", query: query.trim(), maxPrice } };
    }
    case "listings":
      return { ok: true, command: { type: "listings" } };
    case "history":
      return { ok: true, command: { type: "history" } };
    case "open":
    case "lowball": {
      const { index } = args;
      if (typeof index !== "number" || !Number.isInteger(index)) return { ok: false, error: `${name}: index must be an integer` };
      return { ok: true, command: name === "open" ? { type: "open", index } : { type: "lowball", index } };
    }
    default:
      return { ok: false, error: `Unknown tool: ${name}` };
  }
}
