import { afterEach, describe, expect, it, vi } from 'vitest';
import type { LegRecord } from '../src/modules/journal/types.js';
import { createChatSink } from '../src/modules/strangle/delivery.js';
import { i18nT } from './helpers.js';

const recordedAt = new Date('2026-10-19T03:45:00.000Z');
const flush = () => new Promise(resolve => setTimeout(resolve, 0));

function setup() {
  const sent: string[] = [];
  const send = vi.fn(async (text: string) => {
    sent.push(text);
  });
  const record = vi.fn(async (_entry: LegRecord) => {});
  const sink = createChatSink({ send, record, i18nT, now: () => recordedAt });
  return { sink, send, record, sent };
}

describe('createChatSink', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends formatted events and skips silent ones', async () => {
    const { sink, sent } = setup();
    sink({ type: 'state', jobId: 'job-1', state: 'REFRESHING' });
    sink({ type: 'state', jobId: 'job-1', state: 'EXECUTING' });
    sink({ type: 'state', jobId: 'job-1', state: 'DONE' });
    await flush();

    expect(sent).toEqual(['🔄 <b>job-1</b> refreshing market data', '🏁 <b>job-1</b> done']);
  });

  it('waits for each message before sending the next', async () => {
    const { sink, send, sent } = setup();
    let release = () => {};
    send.mockImplementationOnce(
      text =>
        new Promise<void>(resolve => {
          release = () => {
            sent.push(text);
            resolve();
          };
        }),
    );

    sink({ type: 'state', jobId: 'job-1', state: 'REFRESHING' });
    sink({ type: 'state', jobId: 'job-1', state: 'MATCHING' });
    await flush();
    expect(send).toHaveBeenCalledTimes(1);

    release();
    await flush();
    expect(sent).toEqual(['🔄 <b>job-1</b> refreshing market data', '🔎 <b>job-1</b> matching quotes']);
  });

  it('keeps delivering after a failed send', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { sink, send, sent } = setup();
    send.mockRejectedValueOnce(new Error('Forbidden: bot was blocked by the user'));

    sink({ type: 'state', jobId: 'job-1', state: 'REFRESHING' });
    sink({ type: 'state', jobId: 'job-1', state: 'DONE' });
    await flush();

    expect(sent).toEqual(['🏁 <b>job-1</b> done']);
    expect(errorSpy).toHaveBeenCalledWith(
      '[BOT] Error delivering state of job-1:',
      new Error('Forbidden: bot was blocked by the user'),
    );
  });

  it('journals every leg attempt', async () => {
    const { sink, record } = setup();
    const leg = { jobId: 'job-1', symbol: 'NIFTY26O2217900CE', quantity: 50, stopLoss: 18.4 };
    sink({ type: 'order-placed', leg: 'CALL', ...leg, orderId: '250101' });
    sink({ type: 'order-rejected', leg: 'PUT', ...leg, symbol: 'NIFTY26O2217750PE', reason: 'insufficient margin' });
    sink({ type: 'state', jobId: 'job-1', state: 'DONE' });
    await flush();

    expect(record.mock.calls.map(([entry]) => entry)).toEqual([
      { ...leg, leg: 'CALL', orderId: '250101', reason: null, recordedAt },
      { ...leg, leg: 'PUT', symbol: 'NIFTY26O2217750PE', orderId: null, reason: 'insufficient margin', recordedAt },
    ]);
  });

  it('logs journal failures without blocking delivery', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { sink, record, sent } = setup();
    record.mockRejectedValueOnce(new Error('not primary'));

    sink({ type: 'order-placed', jobId: 'job-1', leg: 'CALL', symbol: 'X', quantity: 50, stopLoss: 18.4, orderId: '1' });
    await flush();

    expect(sent).toEqual(['📤 <b>job-1</b> CALL X ×50, SL ₹18.40, order 1']);
    expect(errorSpy).toHaveBeenCalledWith('[JOURNAL] Error recording CALL leg of job-1:', new Error('not primary'));
  });
});
