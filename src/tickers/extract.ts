export type TickerExtractor = {
  readonly tickers: readonly string[];
  extract: (text: string) => Set<string>;
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compiles one word-boundary alternation for the configured tickers. Matching is done on
 * the upper-cased text, so "goog" and "GOOG" match while "GOOGLE" does not.
 */
export function createTickerExtractor(tickers: readonly string[]): TickerExtractor {
  const normalized = Array.from(
    new Set(tickers.map((ticker) => ticker.trim().toUpperCase()).filter(Boolean)),
  );
  const pattern =
    normalized.length > 0
      ? new RegExp(`\\b(${normalized.map(escapeRegExp).join("|")})\\b`, "g")
      : null;

  function extract(text: string): Set<string> {
    const found = new Set<string>();
    if (!pattern || !text) {
      return found;
    }
    for (const match of text.toUpperCase().matchAll(pattern)) {
      const symbol = match[1];
      if (symbol) {
        found.add(symbol);
      }
    }
    return found;
  }

  return { tickers: normalized, extract };
}
