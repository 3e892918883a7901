import { OrderRejectedError, describeError } from '../strangle/errors.js';
import type { OrderGateway } from '../strangle/types.js';
import type { KiteClient } from './client.js';

const TICK_SIZE = 0.05;

export function roundToTick(price: number, tickSize = TICK_SIZE): number {
  const ticks = Math.round(price / tickSize);
  return Number((ticks * tickSize).toFixed(2));
}

export function createKiteOrderGateway(client: KiteClient): OrderGateway {
  return {
    async placeSellOrder(symbol, quantity, stopLossPrice) {
      const triggerPrice = roundToTick(stopLossPrice);
      if (triggerPrice <= 0) {
        throw new OrderRejectedError(symbol, `stop-loss ${stopLossPrice} rounds to no valid trigger price`);
      }

      try {
        const response = await client.placeOrder('regular', {
          exchange: 'NFO',
          tradingsymbol: symbol,
          transaction_type: 'SELL',
          quantity,
          product: 'MIS',
          order_type: 'SL-M',
          validity: 'DAY',
          trigger_price: triggerPrice,
        });
        return String(response.order_id);
      } catch (error) {
        console.error(`[KITE] SELL ${symbol} x${quantity} trigger ${triggerPrice} failed:`, error);
        throw new OrderRejectedError(symbol, describeError(error), { cause: error });
      }
    },
  };
}
