import type { DateWindow } from "../types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

function toIsoDate(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

/**
 * Report window ending yesterday (UTC) and reaching `daysBack` days before
 * that. Today is never included.
 */
export function calculateDateRange(daysBack: number, now: Date = new Date()): DateWindow {
  if (!Number.isInteger(daysBack) || daysBack < 1) {
    throw new RangeError(`daysBack must be a positive integer, got ${daysBack}`);
  }

  const endMs = now.getTime() - DAY_MS;
  return {
    startDate: toIsoDate(endMs - daysBack * DAY_MS),
    endDate: toIsoDate(endMs),
  };
}
