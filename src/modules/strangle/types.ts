export type OptionType = 'CALL' | 'PUT';

export type Instrument = {
  tradingSymbol: string;
  exchange: string;
  strike: number;
  optionType: OptionType;
  lotSize: number;
  expiry: string;
};

export type InstrumentUniverse = {
  underlying: string;
  expiry: string;
  strikeSpacing: number;
  instruments: readonly Instrument[];
};

export type QuoteKey = {
  exchange: string;
  symbol: string;
};

export type MarketSnapshot = {
  referencePrice: number;
  atm: number;
  calls: readonly Instrument[];
  puts: readonly Instrument[];
  builtAt: Date;
};

export type QuotedInstrument = {
  strike: number;
  price: number;
};

export type MatchedPair = {
  call: QuotedInstrument;
  put: QuotedInstrument;
};

export type MatchResult = MatchedPair | null;

export type SimilarPair = {
  strikeDistance: number;
  call: QuotedInstrument;
  put: QuotedInstrument;
};

export type JobHandle = {
  id: string;
  fireAt: Date;
  armedAt: Date;
};

export interface MarketGateway {
  getLastPrice(exchange: string, symbol: string): Promise<number>;
  /** Prices come back in the order of `instruments`. */
  getLastPrices(instruments: readonly Instrument[]): Promise<number[]>;
}

export interface OrderGateway {
  placeSellOrder(symbol: string, quantity: number, stopLossPrice: number): Promise<string>;
}
