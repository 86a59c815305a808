/**
 * Escalation policy: the table mapping round number to the percentage of
 * the listed price offered in that round. Tables are data, so a strategy can
 * be swapped without touching the negotiation state machine.
 */
export interface EscalationStrategy {
  name: string;
  /** Percentages for rounds 1..N, strictly increasing, each in (0, 100]. */
  percentages: readonly number[];
}

export const STANDARD_STRATEGY: EscalationStrategy = {
  name: "standard",
  percentages: [50, 60, 70],
};

/** Anchor low, then 85/95, then the buyer's true max. */
export const ACKERMAN_STRATEGY: EscalationStrategy = {
  name: "ackerman",
  percentages: [65, 85, 95, 100],
};

export const BUILT_IN_STRATEGIES: Readonly<Record<string, EscalationStrategy>> = {
  [STANDARD_STRATEGY.name]: STANDARD_STRATEGY,
  [ACKERMAN_STRATEGY.name]: ACKERMAN_STRATEGY,
};

export function validateStrategy(strategy: EscalationStrategy): EscalationStrategy {
  const { name, percentages } = strategy;
  if (percentages.length === 0) {
    throw new Error(`Escalation strategy "${name}" has no rounds`);
  }
  percentages.forEach((pct, i) => {
    if (!Number.isFinite(pct) || pct <= 0 || pct > 100) {
      throw new Error(`Escalation strategy "${name}" round ${i + 1}: ${pct}% is outside (0, 100]`);
    }
    if (i > 0 && pct <= percentages[i - 1]) {
      throw new Error(`Escalation strategy "${name}" is not strictly increasing at round ${i + 1}`);
    }
  });
  return strategy;
}

/**
 * Resolve a strategy by built-in name or a comma-separated custom table
 * such as "40,55,70".
 */
export function resolveStrategy(spec: string): EscalationStrategy {
  const builtIn = BUILT_IN_STRATEGIES[spec.trim().toLowerCase()];
  if (builtIn) return builtIn;

  const parts = spec.split(",").map((p) => p.trim());
  const percentages = parts.map(Number);
  if (parts.length === 0 || parts.some((p) => p === "") || percentages.some((n) => Number.isNaN(n))) {
    throw new Error(`Unknown escalation strategy "${spec}"`);
  }
  return validateStrategy({ name: `custom(${percentages.join(",")})`, percentages });
}

// --- Money (minor units) ---

export function toMinorUnits(amount: number): number {
  return Math.round(amount * 100);
}

export function fromMinorUnits(minor: number): number {
  return minor / 100;
}

/** Offer for a 1-indexed round, or null once the table is exhausted. */
export function offerForRound(strategy: EscalationStrategy, listedPrice: number, round: number): number | null {
  const pct = strategy.percentages[round - 1];
  if (pct === undefined) return null;
  return fromMinorUnits(Math.round((toMinorUnits(listedPrice) * pct) / 100));
}

export function formatPrice(amount: number): string {
  return Number.isInteger(amount) ? String(amount) : amount.toFixed(2);
}
