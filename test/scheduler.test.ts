import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InvalidTimeError } from '../src/modules/strangle/errors.js';
import { Scheduler } from '../src/modules/strangle/scheduler.js';
import type { JobHandle } from '../src/modules/strangle/types.js';

const NOW = new Date('2026-10-19T03:45:00.000Z');

describe('Scheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('rejects instants that are not in the future', () => {
    const scheduler = new Scheduler();
    const action = vi.fn();
    expect(() => scheduler.scheduleAt(new Date(NOW.getTime()), action)).toThrow(InvalidTimeError);
    expect(() => scheduler.scheduleAt(new Date(NOW.getTime() - 60_000), action)).toThrow(InvalidTimeError);
    expect(() => scheduler.scheduleAt(new Date('not a date'), action)).toThrow(InvalidTimeError);
    expect(scheduler.pending()).toEqual([]);
  });

  it('fires once, no earlier than the requested instant', async () => {
    const scheduler = new Scheduler();
    const firedAt: number[] = [];
    const action = vi.fn(() => {
      firedAt.push(Date.now());
    });
    const fireAt = new Date(NOW.getTime() + 1000);

    const handle = scheduler.scheduleAt(fireAt, action);
    expect(handle).toEqual({ id: 'job-1', fireAt, armedAt: NOW });
    expect(action).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(999);
    expect(action).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(action).toHaveBeenCalledTimes(1);
    expect(action).toHaveBeenCalledWith(handle);
    expect(firedAt[0]).toBeGreaterThanOrEqual(fireAt.getTime());

    await vi.advanceTimersByTimeAsync(60_000);
    expect(action).toHaveBeenCalledTimes(1);
  });

  it('lists pending jobs by fire time until they fire', async () => {
    const scheduler = new Scheduler();
    const late = scheduler.scheduleAt(new Date(NOW.getTime() + 5000), vi.fn());
    const early = scheduler.scheduleAt(new Date(NOW.getTime() + 2000), vi.fn());
    expect(scheduler.pending().map(job => job.id)).toEqual([early.id, late.id]);

    await vi.advanceTimersByTimeAsync(2000);
    expect(scheduler.pending().map(job => job.id)).toEqual([late.id]);

    await vi.advanceTimersByTimeAsync(3000);
    expect(scheduler.pending()).toEqual([]);
  });

  it('keeps firing other jobs when one action fails', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const scheduler = new Scheduler();
    const failing = vi.fn(async () => {
      throw new Error('boom');
    });
    const healthy = vi.fn();
    const fireAt = new Date(NOW.getTime() + 1000);

    const failingJob = scheduler.scheduleAt(fireAt, failing);
    scheduler.scheduleAt(fireAt, healthy);
    await vi.advanceTimersByTimeAsync(1000);

    expect(failing).toHaveBeenCalledTimes(1);
    expect(healthy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(`[SCHEDULER] ${failingJob.id} action failed:`, new Error('boom'));
  });

  it('does not wait for a running action before firing the next job', async () => {
    const scheduler = new Scheduler();
    const stuck = vi.fn(() => new Promise<void>(() => {}));
    const next = vi.fn();

    scheduler.scheduleAt(new Date(NOW.getTime() + 1000), stuck);
    scheduler.scheduleAt(new Date(NOW.getTime() + 2000), next);
    await vi.advanceTimersByTimeAsync(2000);

    expect(stuck).toHaveBeenCalledTimes(1);
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('re-arms delays longer than a single timer can hold', async () => {
    const scheduler = new Scheduler();
    const action = vi.fn();
    const thirtyDays = 30 * 24 * 60 * 60 * 1000;
    scheduler.scheduleAt(new Date(NOW.getTime() + thirtyDays), action);

    await vi.advanceTimersByTimeAsync(2_147_483_647);
    expect(action).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(thirtyDays - 2_147_483_647);
    expect(action).toHaveBeenCalledTimes(1);
  });

  it('numbers jobs per scheduler', () => {
    const scheduler = new Scheduler();
    const ids = [1, 2, 3].map(
      offset => scheduler.scheduleAt(new Date(NOW.getTime() + offset * 1000), vi.fn()).id,
    );
    expect(ids).toEqual(['job-1', 'job-2', 'job-3']);
  });

  it('accepts a custom clock', () => {
    const scheduler = new Scheduler(() => NOW.getTime() + 10_000);
    expect(() => scheduler.scheduleAt(new Date(NOW.getTime() + 5000), vi.fn())).toThrow(InvalidTimeError);
    const handle: JobHandle = scheduler.scheduleAt(new Date(NOW.getTime() + 20_000), vi.fn());
    expect(handle.armedAt.getTime()).toBe(NOW.getTime() + 10_000);
  });
});
