import { InstrumentLookupError, OrderRejectedError, type StrangleError, describeError, toStrangleError } from './errors.js';
import { matchAtPrice, matchBySimilarity } from './matcher.js';
import type { StrangleSettings } from './settings.js';
import { buildSnapshot } from './snapshot.js';
import type {
  Instrument,
  InstrumentUniverse,
  MarketGateway,
  MarketSnapshot,
  MatchedPair,
  OptionType,
  OrderGateway,
  QuoteKey,
  QuotedInstrument,
  SimilarPair,
} from './types.js';

export type ExecutionState = 'ARMED' | 'REFRESHING' | 'MATCHING' | 'EXECUTING' | 'REPORTING_NO_MATCH' | 'DONE' | 'ERROR';

type LegOrder = {
  leg: OptionType;
  symbol: string;
  quantity: number;
  stopLoss: number;
};

export type LegResult =
  | (LegOrder & { status: 'placed'; orderId: string })
  | (LegOrder & { status: 'rejected'; reason: string });

export type ExecutionEvent =
  | { type: 'armed'; jobId: string; targetPrice: number; fireAt: Date }
  | { type: 'state'; jobId: string; state: ExecutionState }
  | { type: 'snapshot'; jobId: string; snapshot: MarketSnapshot }
  | { type: 'match-found'; jobId: string; targetPrice: number; match: MatchedPair }
  | { type: 'match-not-found'; jobId: string; targetPrice: number; candidates: SimilarPair[] }
  | ({ type: 'order-placed'; jobId: string } & LegOrder & { orderId: string })
  | ({ type: 'order-rejected'; jobId: string } & LegOrder & { reason: string })
  | { type: 'failed'; jobId: string; stage: ExecutionState; error: StrangleError };

export type EventSink = (event: ExecutionEvent) => void;

export type ExecutionOutcome =
  | { status: 'executed'; snapshot: MarketSnapshot; match: MatchedPair; legs: [LegResult, LegResult] }
  | { status: 'no-match'; snapshot: MarketSnapshot; candidates: SimilarPair[] }
  | { status: 'failed'; stage: ExecutionState; error: StrangleError };

export type ExecutionContext = {
  jobId: string;
  targetPrice: number;
  universe: InstrumentUniverse;
  reference: QuoteKey;
  market: MarketGateway;
  orders: OrderGateway;
  settings: StrangleSettings;
  emit: EventSink;
  onSnapshot?: (snapshot: MarketSnapshot) => void;
};

export async function captureSnapshot(
  universe: InstrumentUniverse,
  reference: QuoteKey,
  market: MarketGateway,
  settings: StrangleSettings,
): Promise<MarketSnapshot> {
  const referencePrice = await market.getLastPrice(reference.exchange, reference.symbol);
  return buildSnapshot(referencePrice, universe.strikeSpacing, universe.instruments, {
    windowStrikes: settings.windowStrikes,
  });
}

async function quoteInstruments(market: MarketGateway, instruments: readonly Instrument[]): Promise<QuotedInstrument[]> {
  if (instruments.length === 0) return [];
  const prices = await market.getLastPrices(instruments);
  return instruments.map((instrument, index) => ({ strike: instrument.strike, price: prices[index] }));
}

export function findInstrumentByStrike(instruments: readonly Instrument[], strike: number): Instrument {
  const instrument = instruments.find(candidate => candidate.strike === strike);
  if (!instrument) {
    throw new InstrumentLookupError(`No instrument with strike ${strike} among the candidates`);
  }
  return instrument;
}

function notify(emit: EventSink, event: ExecutionEvent): void {
  try {
    emit(event);
  } catch (error) {
    console.error(`[JOB] ${event.jobId} event sink failed on ${event.type}:`, error);
  }
}

async function submitLeg(
  context: ExecutionContext,
  leg: OptionType,
  instrument: Instrument,
  quote: QuotedInstrument,
): Promise<LegResult> {
  const order: LegOrder = {
    leg,
    symbol: instrument.tradingSymbol,
    quantity: context.settings.lots * instrument.lotSize,
    stopLoss: quote.price * context.settings.stopLossFraction,
  };

  try {
    const orderId = await context.orders.placeSellOrder(order.symbol, order.quantity, order.stopLoss);
    console.log(`[JOB] ${context.jobId} ${leg} ${order.symbol} placed, order id ${orderId}`);
    notify(context.emit, { type: 'order-placed', jobId: context.jobId, ...order, orderId });
    return { ...order, status: 'placed', orderId };
  } catch (error) {
    const reason = error instanceof OrderRejectedError ? error.reason : describeError(error);
    console.warn(`[JOB] ${context.jobId} ${leg} ${order.symbol} rejected: ${reason}`);
    notify(context.emit, { type: 'order-rejected', jobId: context.jobId, ...order, reason });
    return { ...order, status: 'rejected', reason };
  }
}

/**
 * Runs one fired job: REFRESHING -> MATCHING -> EXECUTING | REPORTING_NO_MATCH -> DONE,
 * or ERROR from any stage. Never rejects; failures come back as a `failed` outcome.
 */
export async function executeJob(context: ExecutionContext): Promise<ExecutionOutcome> {
  const { jobId, targetPrice, settings } = context;
  let state: ExecutionState = 'ARMED';
  const enter = (next: ExecutionState) => {
    state = next;
    notify(context.emit, { type: 'state', jobId, state: next });
  };

  try {
    enter('REFRESHING');
    const snapshot = await captureSnapshot(context.universe, context.reference, context.market, settings);
    context.onSnapshot?.(snapshot);
    console.log(
      `[JOB] ${jobId} snapshot atm=${snapshot.atm} calls=${snapshot.calls.length} puts=${snapshot.puts.length}`,
    );
    notify(context.emit, { type: 'snapshot', jobId, snapshot });

    enter('MATCHING');
    const callQuotes = await quoteInstruments(context.market, snapshot.calls);
    const putQuotes = await quoteInstruments(context.market, snapshot.puts);
    const match = matchAtPrice(targetPrice, callQuotes, putQuotes, settings.matchTolerance);

    if (!match) {
      enter('REPORTING_NO_MATCH');
      const candidates = matchBySimilarity(callQuotes, putQuotes, settings.similarityTolerance);
      console.warn(`[JOB] ${jobId} nothing trades near ${targetPrice}, ${candidates.length} similar pairs`);
      notify(context.emit, { type: 'match-not-found', jobId, targetPrice, candidates });
      enter('DONE');
      return { status: 'no-match', snapshot, candidates };
    }

    console.log(
      `[JOB] ${jobId} matched ${match.call.strike}CE@${match.call.price} ${match.put.strike}PE@${match.put.price}`,
    );
    notify(context.emit, { type: 'match-found', jobId, targetPrice, match });

    enter('EXECUTING');
    const callInstrument = findInstrumentByStrike(snapshot.calls, match.call.strike);
    const putInstrument = findInstrumentByStrike(snapshot.puts, match.put.strike);
    const callLeg = await submitLeg(context, 'CALL', callInstrument, match.call);
    const putLeg = await submitLeg(context, 'PUT', putInstrument, match.put);

    enter('DONE');
    return { status: 'executed', snapshot, match, legs: [callLeg, putLeg] };
  } catch (caught) {
    const stage = state;
    const error = toStrangleError(caught);
    console.error(`[JOB] ${jobId} failed while ${stage}:`, error);
    notify(context.emit, { type: 'failed', jobId, stage, error });
    enter('ERROR');
    return { status: 'failed', stage, error };
  }
}
