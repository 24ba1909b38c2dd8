/**
 * Time utilities for consistent timestamp handling
 */

import { differenceInMinutes, isValid, parseISO } from 'date-fns';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** UTC ISO-8601, independent of the host time zone */
export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

export function parseTimestamp(value: string): Date | null {
  const parsed = parseISO(value);
  return isValid(parsed) ? parsed : null;
}

/** Hours elapsed from `from` to `now`, floored at zero for timestamps in the future. */
export function hoursSince(from: Date, now: Date): number {
  return Math.max(0, differenceInMinutes(now, from) / 60);
}
