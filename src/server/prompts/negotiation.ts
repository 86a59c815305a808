import type { Message, Negotiation, Persona } from "../types.js";
import type { GenerationPrompt } from "../llm/types.js";
import { formatPrice } from "../escalation.js";
import { PERSONA_PROMPTS, tacticsForRound } from "./personas.js";
import { NEGOTIATION_RULES, OUTPUT_RULES, SAFETY_RULES } from "./safety-rules.js";

const HISTORY_WINDOW = 10;

function formatHistory(messages: readonly Message[]): string {
  return messages
    .slice(-HISTORY_WINDOW)
    .map((m) => `${m.role}: ${m.content}`)
    .join("\n");
}

export function offerMessagePrompt(
  negotiation: Negotiation,
  offerAmount: number,
  round: number,
  persona: Persona,
): GenerationPrompt {
  const { listing, messages } = negotiation;
  const lastSellerReply = [...messages].reverse().find((m) => m.role === "seller");

  const system = `${PERSONA_PROMPTS[persona]}

${NEGOTIATION_RULES}

${SAFETY_RULES}

${OUTPUT_RULES}`;

  const user = `Write the buyer's next chat message.

Item: ${listing.title}
Listed price: $${formatPrice(listing.price)}
Your offer: $${formatPrice(offerAmount)}
Round: ${round}
Seller's last reply: ${lastSellerReply ? `"${lastSellerReply.content}"` : "(none yet, this is the opening message)"}

CHAT HISTORY:
${formatHistory(messages) || "(none yet)"}

TACTICAL GUIDANCE:
${tacticsForRound(round)}`;

  return { system, user };
}

export function walkAwayMessagePrompt(negotiation: Negotiation, persona: Persona): GenerationPrompt {
  const system = `${PERSONA_PROMPTS[persona]}

${OUTPUT_RULES}`;

  const user = `You are ending the negotiation for "${negotiation.listing.title}" without a deal.
Write one short, courteous closing message. Do not make a new offer.

CHAT HISTORY:
${formatHistory(negotiation.messages) || "(none)"}`;

  return { system, user };
}

export function confirmationMessagePrompt(negotiation: Negotiation, persona: Persona): GenerationPrompt {
  const system = `${PERSONA_PROMPTS[persona]}

${OUTPUT_RULES}`;

  const price = negotiation.finalPrice !== undefined ? `$${formatPrice(negotiation.finalPrice)}` : "the agreed price";
  const user = `The seller of "${negotiation.listing.title}" has agreed to ${price}.
Write one short, friendly message confirming the deal at exactly ${price} and asking when and where to collect.
Do not change the price or make a new offer.

CHAT HISTORY:
${formatHistory(negotiation.messages) || "(none)"}`;

  return { system, user };
}
