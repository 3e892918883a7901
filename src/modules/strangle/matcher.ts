import type { MatchResult, QuotedInstrument, SimilarPair } from './types.js';

function byPriceAscending(quotes: readonly QuotedInstrument[]): QuotedInstrument[] {
  return [...quotes].sort((left, right) => left.price - right.price);
}

export function isNearPrice(quote: QuotedInstrument, targetPrice: number, tolerance: number): boolean {
  return Math.abs(quote.price - targetPrice) <= quote.price * tolerance;
}

/** Quotes inside the tolerance band, cheapest first. */
export function quotesNearPrice(
  quotes: readonly QuotedInstrument[],
  targetPrice: number,
  tolerance: number,
): QuotedInstrument[] {
  return byPriceAscending(quotes).filter(quote => isNearPrice(quote, targetPrice, tolerance));
}

/**
 * Picks the call with the lowest strike and the put with the highest strike among
 * the quotes trading near `targetPrice`. Returns null unless both sides have one.
 */
export function matchAtPrice(
  targetPrice: number,
  callQuotes: readonly QuotedInstrument[],
  putQuotes: readonly QuotedInstrument[],
  tolerance: number,
): MatchResult {
  const calls = quotesNearPrice(callQuotes, targetPrice, tolerance);
  const puts = quotesNearPrice(putQuotes, targetPrice, tolerance);
  if (calls.length === 0 || puts.length === 0) return null;

  calls.sort((left, right) => left.strike - right.strike);
  puts.sort((left, right) => right.strike - left.strike);
  return { call: calls[0], put: puts[0] };
}

/**
 * Every call/put pair whose prices differ by less than `similarityTolerance` of the
 * call price, ordered by the distance between the two strikes.
 */
export function matchBySimilarity(
  callQuotes: readonly QuotedInstrument[],
  putQuotes: readonly QuotedInstrument[],
  similarityTolerance: number,
): SimilarPair[] {
  const calls = byPriceAscending(callQuotes);
  const puts = byPriceAscending(putQuotes);
  const pairs: SimilarPair[] = [];

  for (const call of calls) {
    const allowedDifference = call.price * similarityTolerance;
    for (const put of puts) {
      if (Math.abs(put.price - call.price) < allowedDifference) {
        pairs.push({ strikeDistance: Math.abs(put.strike - call.strike), call, put });
      }
    }
  }

  return pairs.sort((left, right) => left.strikeDistance - right.strikeDistance);
}
