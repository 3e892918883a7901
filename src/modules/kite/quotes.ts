import { QuoteUnavailableError, describeError } from '../strangle/errors.js';
import type { Instrument, MarketGateway } from '../strangle/types.js';
import { type KiteClient, quoteKey } from './client.js';

async function fetchLtpMap(client: KiteClient, keys: string[]): Promise<Record<string, { last_price: number }>> {
  try {
    return await client.getLTP(keys);
  } catch (error) {
    console.error(`[KITE] LTP request for ${keys.length} instruments failed:`, error);
    throw new QuoteUnavailableError(keys, describeError(error), { cause: error });
  }
}

function pickPrices(ltpMap: Record<string, { last_price: number } | undefined>, keys: string[]): number[] {
  const missing = keys.filter(key => typeof ltpMap[key]?.last_price !== 'number');
  if (missing.length > 0) {
    throw new QuoteUnavailableError(missing, 'no last price in response');
  }
  return keys.map(key => ltpMap[key]?.last_price ?? 0);
}

export function createKiteMarketGateway(client: KiteClient): MarketGateway {
  return {
    async getLastPrice(exchange, symbol) {
      const key = quoteKey(exchange, symbol);
      const ltpMap = await fetchLtpMap(client, [key]);
      const [price] = pickPrices(ltpMap, [key]);
      return price;
    },

    async getLastPrices(instruments: readonly Instrument[]) {
      if (instruments.length === 0) return [];
      const keys = instruments.map(instrument => quoteKey(instrument.exchange, instrument.tradingSymbol));
      const ltpMap = await fetchLtpMap(client, keys);
      return pickPrices(ltpMap, keys);
    },
  };
}
