import { InvalidTimeError } from './errors.js';

const TIME_OF_DAY = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/** Turns `HH:MM` or `HH:MM:SS` into that time today, in the server's time zone. */
export function parseFireTime(input: string, now: Date = new Date()): Date {
  const match = input.trim().match(TIME_OF_DAY);
  if (!match) {
    throw new InvalidTimeError(`Expected HH:MM or HH:MM:SS, got "${input.trim()}"`);
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);
  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new InvalidTimeError(`"${input.trim()}" is not a time of day`);
  }

  const fireAt = new Date(now.getTime());
  fireAt.setHours(hours, minutes, seconds, 0);
  return fireAt;
}

export function parseScheduleInput(input: string): { targetPrice: number; time: string } | null {
  const parts = input.trim().split(/\s+/).filter(Boolean);
  if (parts.length !== 2) return null;
  const [rawPrice, time] = parts;
  if (!/^\d+(?:\.\d+)?$/.test(rawPrice)) return null;
  return { targetPrice: parseFloat(rawPrice), time };
}
