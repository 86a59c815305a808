import { formatPrice } from "../escalation.js";

// Used when text generation fails. Deterministic per round.
const OFFER_TEMPLATES: ReadonlyArray<(item: string, offer: string) => string> = [
  (item, offer) => `Hi! I know this is below asking, but I've seen similar ${item} go for around $${offer}. Cash ready, can pick up today!`,
  (_item, offer) => `I hear you. Could you do $${offer} if I pick up within the hour? Cash in hand.`,
  (_item, offer) => `It seems like you'd like this sold quickly. $${offer} cash and I'm free right now to collect?`,
  (_item, offer) => `You probably have other offers coming in, but $${offer} cash today is my best. Serious buyer here.`,
  (_item, offer) => `$${offer} is really my final offer. No worries if it doesn't work, all the best with the sale!`,
];

export function fallbackOfferMessage(item: string, offerAmount: number, round: number): string {
  const idx = Math.min(Math.max(round, 1), OFFER_TEMPLATES.length) - 1;
  return OFFER_TEMPLATES[idx](item, formatPrice(offerAmount));
}

export function fallbackConfirmationMessage(finalPrice: number): string {
  return `Deal! $${formatPrice(finalPrice)} works for me. When and where can I collect? Cash ready.`;
}

export function fallbackWalkAwayMessage(item: string): string {
  return `Thanks for your time! I'll pass on the ${item} for now. Good luck with the sale!`;
}
