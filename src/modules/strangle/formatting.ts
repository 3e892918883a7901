import type { Translate } from '../telegram/context.js';
import { escapeHtml, formatClock, formatPrice, formatStrike, formatTimeLeft } from '../utils/formatting.js';
import type { ExecutionEvent } from './sequencer.js';
import type { JobHandle, MarketSnapshot, QuotedInstrument, SimilarPair } from './types.js';

const MAX_LISTED_PAIRS = 15;

function leg(quote: QuotedInstrument, suffix: 'CE' | 'PE'): string {
  return `${formatStrike(quote.strike)}${suffix} ${formatPrice(quote.price)}`;
}

function formatSimilarPairs(candidates: SimilarPair[], i18nT: Translate): string[] {
  if (candidates.length === 0) {
    return [i18nT('event.similar_none')];
  }
  const lines = candidates.slice(0, MAX_LISTED_PAIRS).map((pair, index) =>
    i18nT(index === 0 ? 'event.similar_item_atm' : 'event.similar_item', {
      index,
      call: leg(pair.call, 'CE'),
      put: leg(pair.put, 'PE'),
    }),
  );
  if (candidates.length > MAX_LISTED_PAIRS) {
    lines.push(i18nT('event.similar_more', { count: candidates.length - MAX_LISTED_PAIRS }));
  }
  return [i18nT('event.similar_title'), ...lines];
}

/** Chat text for an execution event; null for transitions that carry nothing worth sending. */
export function formatEvent(event: ExecutionEvent, i18nT: Translate): string | null {
  const job = event.jobId;
  switch (event.type) {
    case 'armed':
      return i18nT('event.armed', { job, price: formatPrice(event.targetPrice), time: formatClock(event.fireAt) });
    case 'state':
      if (event.state === 'REFRESHING') return i18nT('event.refreshing', { job });
      if (event.state === 'MATCHING') return i18nT('event.matching', { job });
      if (event.state === 'DONE') return i18nT('event.done', { job });
      return null;
    case 'snapshot':
      return i18nT('event.snapshot', {
        job,
        atm: formatStrike(event.snapshot.atm),
        spot: formatPrice(event.snapshot.referencePrice),
        calls: event.snapshot.calls.length,
        puts: event.snapshot.puts.length,
      });
    case 'match-found':
      return i18nT('event.matched', { job, call: leg(event.match.call, 'CE'), put: leg(event.match.put, 'PE') });
    case 'match-not-found':
      return [
        i18nT('event.no_match', { job, price: formatPrice(event.targetPrice) }),
        ...formatSimilarPairs(event.candidates, i18nT),
      ].join('\n');
    case 'order-placed':
      return i18nT('event.order_placed', {
        job,
        leg: event.leg,
        symbol: escapeHtml(event.symbol),
        quantity: event.quantity,
        stopLoss: formatPrice(event.stopLoss),
        orderId: escapeHtml(event.orderId),
      });
    case 'order-rejected':
      return i18nT('event.order_rejected', {
        job,
        leg: event.leg,
        symbol: escapeHtml(event.symbol),
        quantity: event.quantity,
        reason: escapeHtml(event.reason),
      });
    case 'failed':
      return i18nT('event.failed', { job, stage: event.stage, error: escapeHtml(event.error.message) });
  }
}

export function formatSnapshot(snapshot: MarketSnapshot, strikeSpacing: number, i18nT: Translate): string {
  const strikes = (instruments: MarketSnapshot['calls']) =>
    instruments.length > 0
      ? instruments.map(instrument => formatStrike(instrument.strike)).join(', ')
      : i18nT('snapshot.none');
  return i18nT('snapshot.full', {
    atm: formatStrike(snapshot.atm),
    spot: formatPrice(snapshot.referencePrice),
    step: formatStrike(strikeSpacing),
    calls: strikes(snapshot.calls),
    puts: strikes(snapshot.puts),
    updated: formatClock(snapshot.builtAt),
  });
}

export function formatJobs(jobs: JobHandle[], i18nT: Translate, now: Date = new Date()): string {
  if (jobs.length === 0) return i18nT('jobs.empty');
  return jobs
    .map(job =>
      i18nT('jobs.item', { id: job.id, time: formatClock(job.fireAt), left: formatTimeLeft(now, job.fireAt) }),
    )
    .join('\n');
}
