import { InvalidPriceError } from './errors.js';
import { Scheduler } from './scheduler.js';
import { type EventSink, type ExecutionOutcome, captureSnapshot, executeJob } from './sequencer.js';
import { type StrangleSettings, resolveStrangleSettings } from './settings.js';
import { SnapshotSlot } from './snapshot.js';
import type {
  InstrumentUniverse,
  JobHandle,
  MarketGateway,
  MarketSnapshot,
  OrderGateway,
  QuoteKey,
} from './types.js';

export type StrangleEngineOptions = {
  universe: InstrumentUniverse;
  reference: QuoteKey;
  market: MarketGateway;
  orders: OrderGateway;
  settings?: Partial<StrangleSettings>;
  onEvent?: EventSink;
  scheduler?: Scheduler;
};

function describeOutcome(outcome: ExecutionOutcome): string {
  switch (outcome.status) {
    case 'executed':
      return `executed (${outcome.legs.map(leg => `${leg.leg}=${leg.status}`).join(', ')})`;
    case 'no-match':
      return `no match, ${outcome.candidates.length} similar pairs`;
    case 'failed':
      return `failed while ${outcome.stage}: ${outcome.error.message}`;
  }
}

export class StrangleEngine {
  readonly settings: StrangleSettings;
  private universe: InstrumentUniverse;
  private readonly reference: QuoteKey;
  private readonly market: MarketGateway;
  private readonly orders: OrderGateway;
  private readonly scheduler: Scheduler;
  private readonly slot: SnapshotSlot = new SnapshotSlot();
  private readonly onEvent: EventSink;

  constructor(options: StrangleEngineOptions) {
    this.universe = options.universe;
    this.reference = options.reference;
    this.market = options.market;
    this.orders = options.orders;
    this.settings = resolveStrangleSettings(options.settings);
    this.scheduler = options.scheduler ?? new Scheduler();
    this.onEvent = options.onEvent ?? (() => {});
  }

  /** Arms a job selling the strangle nearest `targetPrice` at `fireAt`. Throws InvalidTimeError for non-future instants. */
  requestSchedule(targetPrice: number, fireAt: Date, sink?: EventSink): JobHandle {
    if (!Number.isFinite(targetPrice) || targetPrice <= 0) {
      throw new InvalidPriceError(targetPrice);
    }
    const emit = sink ?? this.onEvent;
    const universe = this.universe;
    const handle = this.scheduler.scheduleAt(fireAt, job => this.execute(job, targetPrice, universe, emit));
    try {
      emit({ type: 'armed', jobId: handle.id, targetPrice, fireAt: handle.fireAt });
    } catch (error) {
      console.error(`[JOB] ${handle.id} event sink failed on armed:`, error);
    }
    return handle;
  }

  async refreshSnapshot(): Promise<MarketSnapshot> {
    const snapshot = await captureSnapshot(this.universe, this.reference, this.market, this.settings);
    this.slot.replace(snapshot);
    return snapshot;
  }

  currentSnapshot(): MarketSnapshot | null {
    return this.slot.current();
  }

  pendingJobs(): JobHandle[] {
    return this.scheduler.pending();
  }

  getUniverse(): InstrumentUniverse {
    return this.universe;
  }

  /** Used by jobs armed from now on; armed jobs keep the universe they were armed with. */
  replaceUniverse(universe: InstrumentUniverse): void {
    this.universe = universe;
  }

  private async execute(
    job: JobHandle,
    targetPrice: number,
    universe: InstrumentUniverse,
    emit: EventSink,
  ): Promise<void> {
    console.log(`[JOB] ${job.id} executing, target ${targetPrice}`);
    const outcome = await executeJob({
      jobId: job.id,
      targetPrice,
      universe,
      reference: this.reference,
      market: this.market,
      orders: this.orders,
      settings: this.settings,
      emit,
      onSnapshot: snapshot => this.slot.replace(snapshot),
    });
    console.log(`[JOB] ${job.id} ${describeOutcome(outcome)}`);
  }
}
