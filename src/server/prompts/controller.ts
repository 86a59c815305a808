import type { Listing } from "../types.js";
import { formatPrice } from "../escalation.js";

export function controllerPrompt(listings: readonly Listing[]): string {
  const current = listings.length
    ? listings.map((l, i) => `[${i}] ${l.title}, $${formatPrice(l.price)} (seller ${l.sellerId})`).join("\n")
    : "(no search yet)";

  return `You are the command interpreter for a marketplace negotiation assistant.
Map the user's request onto exactly ONE tool call:
- search: find items ("find iPhone 14 under $600" → query "iPhone 14", maxPrice 600)
- listings: show the current results
- open: open the chat for a listing index
- lowball: negotiate a listing index
- history: show negotiation history

Listing indexes refer to the CURRENT LISTINGS below. If the user names an item instead of an index, pick the matching index.

CURRENT LISTINGS:
${current}`;
}
