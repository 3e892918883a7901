import { InvalidTimeError } from './errors.js';
import type { JobHandle } from './types.js';

// setTimeout overflows past 2^31 - 1 ms and fires immediately.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type ScheduledAction = (handle: JobHandle) => Promise<void> | void;

export class Scheduler {
  private pendingJobs: Map<string, JobHandle> = new Map();
  private sequence: number = 0;

  constructor(private readonly clock: () => number = () => Date.now()) {}

  scheduleAt(fireAt: Date, action: ScheduledAction): JobHandle {
    const now = this.clock();
    const fireTime = fireAt.getTime();
    if (Number.isNaN(fireTime)) {
      throw new InvalidTimeError('Fire time is not a valid date');
    }
    if (fireTime <= now) {
      throw new InvalidTimeError(
        `Fire time ${new Date(fireTime).toISOString()} must be later than ${new Date(now).toISOString()}`,
      );
    }

    this.sequence++;
    const handle: JobHandle = {
      id: `job-${this.sequence}`,
      fireAt: new Date(fireTime),
      armedAt: new Date(now),
    };
    this.pendingJobs.set(handle.id, handle);
    this.arm(handle, action);
    console.log(`[SCHEDULER] ${handle.id} armed for ${handle.fireAt.toISOString()}`);
    return handle;
  }

  pending(): JobHandle[] {
    return Array.from(this.pendingJobs.values()).sort(
      (left, right) => left.fireAt.getTime() - right.fireAt.getTime(),
    );
  }

  private arm(handle: JobHandle, action: ScheduledAction): void {
    const remaining = handle.fireAt.getTime() - this.clock();
    if (remaining > 0) {
      setTimeout(() => this.arm(handle, action), Math.min(remaining, MAX_TIMER_DELAY_MS));
      return;
    }
    this.fire(handle, action);
  }

  private fire(handle: JobHandle, action: ScheduledAction): void {
    this.pendingJobs.delete(handle.id);
    console.log(`[SCHEDULER] ${handle.id} firing`);
    Promise.resolve()
      .then(() => action(handle))
      .catch(error => {
        console.error(`[SCHEDULER] ${handle.id} action failed:`, error);
      });
  }
}
