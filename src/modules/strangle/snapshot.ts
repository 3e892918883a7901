import type { Instrument, MarketSnapshot } from './types.js';

type SnapshotOptions = {
  windowStrikes?: number;
  builtAt?: Date;
};

// Ties go to the even neighbour: 356.5 -> 356, 357.5 -> 358.
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function atmStrike(referencePrice: number, strikeSpacing: number): number {
  return roundHalfEven(referencePrice / strikeSpacing) * strikeSpacing;
}

export function buildSnapshot(
  referencePrice: number,
  strikeSpacing: number,
  universe: readonly Instrument[],
  { windowStrikes = 10, builtAt = new Date() }: SnapshotOptions = {},
): MarketSnapshot {
  const atm = atmStrike(referencePrice, strikeSpacing);
  const lowest = atm - strikeSpacing * windowStrikes;
  const highest = atm + strikeSpacing * windowStrikes;

  const window = universe.filter(instrument => instrument.strike >= lowest && instrument.strike <= highest);
  const calls = window.filter(instrument => instrument.optionType === 'CALL' && instrument.strike > atm);
  const puts = window.filter(instrument => instrument.optionType === 'PUT' && instrument.strike < atm);

  return Object.freeze({
    referencePrice,
    atm,
    calls: Object.freeze(calls),
    puts: Object.freeze(puts),
    builtAt,
  });
}

/** Latest ad hoc snapshot; only ever swapped as a whole. */
export class SnapshotSlot {
  private snapshot: MarketSnapshot | null = null;

  replace(snapshot: MarketSnapshot): void {
    this.snapshot = snapshot;
  }

  current(): MarketSnapshot | null {
    return this.snapshot;
  }
}
