/**
 * @module exchange-logger
 * @description Exchange timestamps and durations.
 */

import { differenceInMilliseconds, format } from "date-fns";

/** `2024-01-15 10:30:00.123000`; Date only carries milliseconds */
export const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss.SSSSSS";

export function formatTimestamp(date: Date): string {
  return format(date, TIMESTAMP_FORMAT);
}

/** Whole milliseconds between start and end, or -1 without an end */
export function calculateResponseTimeMs(start: Date, end: Date | null): number {
  if (!end) return -1;
  return differenceInMilliseconds(end, start);
}
