import { InstrumentLookupError } from '../strangle/errors.js';
import type { Instrument, InstrumentUniverse, OptionType } from '../strangle/types.js';
import type { KiteClient, KiteInstrumentRow } from './client.js';

const OPTION_TYPES: Record<string, OptionType> = { CE: 'CALL', PE: 'PUT' };

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

// The SDK parses the dump's `YYYY-MM-DD` expiry as UTC midnight.
function expiryKey(expiry: Date | string): string | null {
  const date = expiry instanceof Date ? expiry : new Date(expiry);
  if (Number.isNaN(date.getTime())) return null;
  return date.toISOString().slice(0, 10);
}

export function localDateKey(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** True once the universe's expiry date is before `today` in the server's time zone. */
export function hasExpired(universe: InstrumentUniverse, today: Date = new Date()): boolean {
  return universe.expiry < localDateKey(today);
}

/** Smallest gap between adjacent listed strikes. */
export function strikeSpacing(strikes: number[]): number | null {
  const distinct = Array.from(new Set(strikes)).sort((left, right) => left - right);
  let spacing: number | null = null;
  for (let index = 1; index < distinct.length; index++) {
    const gap = distinct[index] - distinct[index - 1];
    if (spacing === null || gap < spacing) spacing = gap;
  }
  return spacing;
}

export function toInstrument(row: KiteInstrumentRow): (Instrument & { name: string }) | null {
  const optionType = OPTION_TYPES[row.instrument_type];
  const expiry = expiryKey(row.expiry);
  const strike = Number(row.strike);
  const lotSize = Number(row.lot_size);
  if (!optionType || !expiry || !Number.isFinite(strike) || !(lotSize > 0)) return null;
  return {
    name: row.name,
    tradingSymbol: row.tradingsymbol,
    exchange: row.exchange,
    strike,
    optionType,
    lotSize,
    expiry,
  };
}

/**
 * Options of `underlying` at the nearest expiry on or after `today`.
 */
export function buildInstrumentUniverse(
  rows: KiteInstrumentRow[],
  underlying: string,
  today: Date = new Date(),
): InstrumentUniverse {
  const todayKey = localDateKey(today);
  const options = rows
    .map(toInstrument)
    .filter((instrument): instrument is Instrument & { name: string } => instrument !== null)
    .filter(instrument => instrument.name === underlying && instrument.expiry >= todayKey);

  const expiries = Array.from(new Set(options.map(instrument => instrument.expiry))).sort();
  if (expiries.length === 0) {
    throw new InstrumentLookupError(`No ${underlying} options expiring on or after ${todayKey}`);
  }
  const expiry = expiries[0];

  const instruments: Instrument[] = options
    .filter(instrument => instrument.expiry === expiry)
    .map(({ name: _name, ...instrument }) => instrument);

  const spacing = strikeSpacing(instruments.map(instrument => instrument.strike));
  if (spacing === null) {
    throw new InstrumentLookupError(`${underlying} ${expiry} lists fewer than two strikes`);
  }

  return {
    underlying,
    expiry,
    strikeSpacing: spacing,
    instruments: Object.freeze(instruments),
  };
}

export async function loadInstrumentUniverse(
  client: KiteClient,
  underlying: string,
  today: Date = new Date(),
): Promise<InstrumentUniverse> {
  console.log(`[KITE] Loading NFO instruments for ${underlying}`);
  const rows = await client.getInstruments('NFO');
  const universe = buildInstrumentUniverse(rows, underlying, today);
  console.log(
    `[KITE] ${underlying} expiry ${universe.expiry}: ${universe.instruments.length} options, step ${universe.strikeSpacing}`,
  );
  return universe;
}
