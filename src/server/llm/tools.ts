import type { ControllerCommand } from "../types.js";
import type { ToolDefinition } from "./types.js";

// ─── Page reading (marketplace adapter) ─────────────────────────────

/** Listing extraction from a search results page snapshot. */
export const EXTRACT_LISTINGS_TOOL: ToolDefinition = {
  name: "extract_listings",
  description:
    "Read a marketplace search results page and list every item for sale, in page order.",
  parameters: {
    type: "object",
    properties: {
      listings: {
        type: "array",
        items: {
          type: "object",
          properties: {
            title: { type: "string", description: "Listing title exactly as shown." },
            price: { type: "number", description: "Asking price as a plain number, no currency symbol." },
            sellerId: { type: "string", description: "Seller username shown on the card." },
            url: { type: "string", description: "Link to the listing page (the card's href)." },
          },
          required: ["title", "price", "sellerId", "url"],
        },
      },
    },
    required: ["listings"],
    additionalProperties: false,
  },
};

/**
 * Chat reading: extract the messages visible in the seller chat. The input
 * box is found from the snapshot directly (see findChatInput).
 */
export const READ_CHAT_TOOL: ToolDefinition = {
  name: "read_chat",
  description:
    "Read a marketplace chat page, list the visible chat messages in order, and find the button that opens the chat if none is open.",
  parameters: {
    type: "object",
    properties: {
      messages: {
        type: "array",
        description: "Visible chat bubbles in page order. Do NOT include system banners or safety tips.",
        items: {
          type: "object",
          properties: {
            sender: {
              type: "string",
              enum: ["buyer", "seller"],
              description: "'buyer' for messages we sent, 'seller' for the other party.",
            },
            text: { type: "string", description: "The message text." },
          },
          required: ["sender", "text"],
        },
      },
      chatButtonRef: {
        type: "string",
        description: "Element ref of the button that opens the chat with the seller (listing pages only).",
      },
    },
    required: ["messages"],
    additionalProperties: false,
  },
};

// ─── Controller command surface ─────────────────────────────────────

/**
 * One tool per controller command. The tool name is the command tag, so a
 * tool call maps onto the ControllerCommand union without string lookups
 * elsewhere.
 */
export const CONTROLLER_TOOLS: Record<Exclude<ControllerCommand["type"], "help">, ToolDefinition> = {
  search: {
    name: "search",
    description: "Search marketplace listings. Use when the user wants to find items.",
    parameters: {
      type: "object",
      properties: {
        query: { type: "string", description: "Search query, e.g. 'iPhone 14'." },
        maxPrice: { type: "number", description: "Optional maximum asking price." },
      },
      required: ["query"],
      additionalProperties: false,
    },
  },
  listings: {
    name: "listings",
    description: "Show the listings found by the last search.",
    parameters: { type: "object", properties: {}, additionalProperties: false },
  },
  open: {
    name: "open",
    description: "Open the seller chat for a listing by its index in the last search.",
    parameters: {
      type: "object",
      properties: { index: { type: "integer", description: "Listing index from the last search." } },
      required: ["index"],
      additionalProperties: false,
    },
  },
  lowball: {
    name: "lowball",
    description: "Negotiate the price of a listing by its index in the last search.",
    parameters: {
      type: "object",
      properties: { index: { type: "integer", description: "Listing index from the last search." } },
      required: ["index"],
      additionalProperties: false,
    },
  },
  history: {
    name: "history",
    description: "Show the status of every negotiation so far.",
    parameters: { type: "object", properties: {}, additionalProperties: false },
  },
};
