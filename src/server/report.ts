import type { Negotiation } from "./types.js";
import { formatPrice } from "./escalation.js";

export interface NegotiationSummary {
  total: number;
  accepted: number;
  walkedAway: number;
  active: number;
  /** Mean percentage saved off the listed price across accepted deals, or null if none. */
  averageDiscountPct: number | null;
  totalSaved: number;
}

export function summarize(negotiations: Iterable<Negotiation>): NegotiationSummary {
  const summary: NegotiationSummary = { total: 0, accepted: 0, walkedAway: 0, active: 0, averageDiscountPct: null, totalSaved: 0 };
  let discountSum = 0;
  let savedCents = 0;

  for (const n of negotiations) {
    summary.total++;
    if (n.status === "active") summary.active++;
    else if (n.status === "walked_away") summary.walkedAway++;
    else if (n.finalPrice !== undefined) {
      summary.accepted++;
      discountSum += ((n.listing.price - n.finalPrice) / n.listing.price) * 100;
      savedCents += Math.round(n.listing.price * 100) - Math.round(n.finalPrice * 100);
    }
  }

  if (summary.accepted > 0) summary.averageDiscountPct = Math.round((discountSum / summary.accepted) * 10) / 10;
  summary.totalSaved = savedCents / 100;
  return summary;
}

export function formatTranscript(n: Negotiation): string {
  const lines = [`== ${n.listing.title} (seller ${n.listing.sellerId}) ==`, n.listing.sourceUrl];
  for (const m of n.messages) {
    const who = m.role === "buyer" ? "BUYER " : "SELLER";
    const tag = m.role === "buyer" && m.round !== undefined ? ` [round ${m.round}, $${formatPrice(m.offerPrice ?? 0)}]` : "";
    lines.push(`${who}${tag}${m.undelivered ? " (not delivered)" : ""}: ${m.content}`);
  }
  return lines.join("\n");
}
