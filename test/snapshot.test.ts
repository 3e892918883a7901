import { describe, expect, it } from 'vitest';
import { SnapshotSlot, atmStrike, buildSnapshot, roundHalfEven } from '../src/modules/strangle/snapshot.js';
import { chain, option } from './helpers.js';

describe('atmStrike', () => {
  it('rounds the reference price to the nearest strike', () => {
    expect(atmStrike(17832, 50)).toBe(17850);
    expect(atmStrike(17824.9, 50)).toBe(17800);
  });

  it('sends exact halves to the even multiple', () => {
    expect(roundHalfEven(356.5)).toBe(356);
    expect(roundHalfEven(357.5)).toBe(358);
    expect(atmStrike(17825, 50)).toBe(17800);
    expect(atmStrike(17875, 50)).toBe(17900);
  });
});

describe('buildSnapshot', () => {
  const universe = chain(17000, 18700, 50);

  it('keeps ten strikes either side of ATM', () => {
    const snapshot = buildSnapshot(17832, 50, universe);
    expect(snapshot.atm).toBe(17850);
    expect(snapshot.calls.map(instrument => instrument.strike)).toEqual([
      17900, 17950, 18000, 18050, 18100, 18150, 18200, 18250, 18300, 18350,
    ]);
    expect(snapshot.puts.map(instrument => instrument.strike)).toEqual([
      17350, 17400, 17450, 17500, 17550, 17600, 17650, 17700, 17750, 17800,
    ]);
  });

  it('never leaks ATM or the wrong side into the candidates', () => {
    for (const referencePrice of [17000, 17412.5, 17850, 18188.8, 18700]) {
      const snapshot = buildSnapshot(referencePrice, 50, universe);
      expect(snapshot.calls.every(instrument => instrument.optionType === 'CALL' && instrument.strike > snapshot.atm)).toBe(
        true,
      );
      expect(snapshot.puts.every(instrument => instrument.optionType === 'PUT' && instrument.strike < snapshot.atm)).toBe(
        true,
      );
    }
  });

  it('respects a narrower window', () => {
    const snapshot = buildSnapshot(17832, 50, universe, { windowStrikes: 2 });
    expect(snapshot.calls.map(instrument => instrument.strike)).toEqual([17900, 17950]);
    expect(snapshot.puts.map(instrument => instrument.strike)).toEqual([17750, 17800]);
  });

  it('returns empty sides when the universe has nothing near ATM', () => {
    const snapshot = buildSnapshot(20000, 50, [option(17000, 'CALL'), option(17000, 'PUT')]);
    expect(snapshot.calls).toEqual([]);
    expect(snapshot.puts).toEqual([]);
  });

  it('freezes the snapshot', () => {
    const snapshot = buildSnapshot(17832, 50, universe, { builtAt: new Date('2026-10-19T04:00:00Z') });
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.calls)).toBe(true);
    expect(snapshot.builtAt.toISOString()).toBe('2026-10-19T04:00:00.000Z');
    expect(snapshot.referencePrice).toBe(17832);
  });
});

describe('SnapshotSlot', () => {
  it('holds only the latest snapshot', () => {
    const slot = new SnapshotSlot();
    expect(slot.current()).toBeNull();
    const first = buildSnapshot(17832, 50, chain(17000, 18700, 50));
    const second = buildSnapshot(18010, 50, chain(17000, 18700, 50));
    slot.replace(first);
    slot.replace(second);
    expect(slot.current()).toBe(second);
  });
});
