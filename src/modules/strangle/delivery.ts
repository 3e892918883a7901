import type { LegRecord } from '../journal/types.js';
import type { Translate } from '../telegram/context.js';
import { formatEvent } from './formatting.js';
import type { EventSink, ExecutionEvent } from './sequencer.js';

type ChatSinkOptions = {
  send: (text: string) => Promise<unknown>;
  record: (entry: LegRecord) => Promise<void>;
  i18nT: Translate;
  now?: () => Date;
};

function toLegRecord(event: ExecutionEvent, recordedAt: Date): LegRecord | null {
  if (event.type === 'order-placed') {
    const { jobId, leg, symbol, quantity, stopLoss, orderId } = event;
    return { jobId, leg, symbol, quantity, stopLoss, orderId, reason: null, recordedAt };
  }
  if (event.type === 'order-rejected') {
    const { jobId, leg, symbol, quantity, stopLoss, reason } = event;
    return { jobId, leg, symbol, quantity, stopLoss, orderId: null, reason, recordedAt };
  }
  return null;
}

/**
 * Delivers a job's events to one chat in emission order and journals every leg attempt.
 * Delivery failures are logged and never reach the job.
 */
export function createChatSink({ send, record, i18nT, now = () => new Date() }: ChatSinkOptions): EventSink {
  let queue: Promise<void> = Promise.resolve();

  return event => {
    const entry = toLegRecord(event, now());
    if (entry) {
      record(entry).catch(error => {
        console.error(`[JOURNAL] Error recording ${entry.leg} leg of ${entry.jobId}:`, error);
      });
    }

    const text = formatEvent(event, i18nT);
    if (text === null) return;
    queue = queue
      .then(async () => {
        await send(text);
      })
      .catch(error => {
        console.error(`[BOT] Error delivering ${event.type} of ${event.jobId}:`, error);
      });
  };
}
