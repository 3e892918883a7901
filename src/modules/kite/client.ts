import { KiteConnect } from 'kiteconnect';

export type KiteInstrumentRow = {
  tradingsymbol: string;
  name: string;
  expiry: Date | string;
  strike: number;
  lot_size: number;
  instrument_type: string;
  exchange: string;
};

export type SellOrderParams = {
  exchange: 'NFO';
  tradingsymbol: string;
  transaction_type: 'SELL';
  quantity: number;
  product: 'MIS';
  order_type: 'SL-M';
  validity: 'DAY';
  trigger_price: number;
};

// The slice of the SDK the bot talks to; tests hand in plain objects.
export interface KiteClient {
  getLTP(instruments: string[]): Promise<Record<string, { last_price: number }>>;
  placeOrder(variety: 'regular', params: SellOrderParams): Promise<{ order_id: string | number }>;
  getInstruments(exchange: 'NFO'): Promise<KiteInstrumentRow[]>;
  generateSession(requestToken: string, apiSecret: string): Promise<{ access_token: string }>;
  setAccessToken(accessToken: string): void;
  getLoginURL(): string;
}

export function createKiteClient(apiKey: string): KiteClient {
  return new KiteConnect({ api_key: apiKey });
}

export function quoteKey(exchange: string, symbol: string): string {
  return `${exchange}:${symbol}`;
}
