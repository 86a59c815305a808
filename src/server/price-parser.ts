export interface PriceExtractorOptions {
  /** Currency markers recognised in front of an amount, e.g. "$", "S$", "SGD". */
  currencyMarkers: readonly string[];
  /** When false, a bare number ("480 ok") also counts as a price. */
  requireCurrencyMarker: boolean;
  /** Amounts outside this range are ignored. */
  minPrice: number;
  maxPrice: number;
  /**
   * Bare numbers below this fraction of the reference price are read as
   * times, counts or model numbers ("collect after 6", "iphone 14").
   */
  minBareFraction: number;
}

export const DEFAULT_PRICE_OPTIONS: PriceExtractorOptions = {
  currencyMarkers: ["S$", "SGD", "$"],
  requireCurrencyMarker: false,
  minPrice: 1,
  maxPrice: 1_000_000,
  minBareFraction: 0.1,
};

export interface PriceContext {
  /** Listed price of the item under discussion. Without it the largest bare number is the reference. */
  listedPrice?: number;
}

export type PriceExtractor = (text: string, context?: PriceContext) => number | null;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Build an extractor that returns the last price mentioned in a seller reply.
 * Marked amounts win over bare numbers; "k" suffixes expand ("1.2k" = 1200).
 */
export function createPriceExtractor(overrides: Partial<PriceExtractorOptions> = {}): PriceExtractor {
  const opts = { ...DEFAULT_PRICE_OPTIONS, ...overrides };
  const markers = [...opts.currencyMarkers].sort((a, b) => b.length - a.length).map(escapeRegExp);
  const amount = String.raw`(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d{1,2}))?\s*(k\b)?`;
  const marked = markers.length > 0 ? new RegExp(String.raw`(?:${markers.join("|")})\s*${amount}`, "gi") : null;
  // A full stop ends a bare number unless a digit follows it.
  const bare = new RegExp(String.raw`(?<![\w.])${amount}(?![\w%]|\.\d)`, "gi");

  const toPrice = (whole: string, fraction: string | undefined, kilo: string | undefined): number => {
    const value = Number(`${whole.replace(/,/g, "")}${fraction ? `.${fraction}` : ""}`);
    return kilo ? value * 1000 : value;
  };

  const inRange = (re: RegExp, text: string): number[] => {
    const found: number[] = [];
    for (const m of text.matchAll(re)) {
      const price = toPrice(m[1], m[2], m[3]);
      if (price >= opts.minPrice && price <= opts.maxPrice) found.push(price);
    }
    return found;
  };

  return (text: string, context: PriceContext = {}): number | null => {
    const fromMarked = marked ? inRange(marked, text) : [];
    if (fromMarked.length > 0) return fromMarked[fromMarked.length - 1];
    if (opts.requireCurrencyMarker) return null;

    const candidates = inRange(bare, text);
    if (candidates.length === 0) return null;
    const reference = context.listedPrice ?? Math.max(...candidates);
    const plausible = candidates.filter((p) => p >= reference * opts.minBareFraction);
    return plausible.length > 0 ? plausible[plausible.length - 1] : null;
  };
}

export const extractPrice: PriceExtractor = createPriceExtractor();
