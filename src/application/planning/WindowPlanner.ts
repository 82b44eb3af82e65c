/**
 * Time Window Planner
 * Layer: Application
 *
 * Turns the requested dates into contiguous, ordered UTC day windows:
 *
 *   stop   --stop-dt, or today's UTC midnight (the last full day is synced)
 *   start  --start-dt, else the persisted watermark, else the configured
 *          historical start, else one day before stop
 *
 * The first window may start mid-day when the watermark does. Test mode keeps
 * only the first window, capped at one day. Pure: the clock and the watermark
 * are passed in.
 */
import { injectable } from 'tsyringe';
import type { TimeWindow } from '@domain/entities/TimeWindow';
import { InvalidRangeError } from '@shared/errors/SyncError';

export const DAY_MS = 24 * 60 * 60 * 1000;

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface PlanRequest {
  startDt?: string;
  stopDt?: string;
  testMode: boolean;
  watermark: Date | null;
  historicalStart?: string | null;
  now: Date;
}

/** UTC midnight of a `YYYY-MM-DD` calendar date, or null when it is not one. */
export function calendarDate(value: string): Date | null {
  const match = DATE_ONLY.exec(value);
  if (!match) return null;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  const valid =
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d);
  return valid ? date : null;
}

export function parseDate(value: string, field: string): Date {
  const date = calendarDate(value);
  if (!date) {
    throw new InvalidRangeError(`${field} must be a YYYY-MM-DD date, got "${value}"`, { [field]: value });
  }
  return date;
}

export function utcMidnight(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

@injectable()
export class WindowPlanner {
  plan(request: PlanRequest): TimeWindow[] {
    const stop = request.stopDt ? parseDate(request.stopDt, 'stopDt') : utcMidnight(request.now);

    let start: Date;
    if (request.startDt) {
      start = parseDate(request.startDt, 'startDt');
      if (request.stopDt && start.getTime() >= stop.getTime()) {
        throw new InvalidRangeError(`startDt must be before stopDt`, {
          startDt: request.startDt,
          stopDt: request.stopDt,
        });
      }
    } else if (request.watermark) {
      start = request.watermark;
    } else if (request.historicalStart) {
      start = parseDate(request.historicalStart, 'historicalStart');
    } else {
      start = new Date(stop.getTime() - DAY_MS);
    }

    const windows: TimeWindow[] = [];
    let cursor = start;
    while (cursor.getTime() < stop.getTime()) {
      const nextMidnight = utcMidnight(cursor).getTime() + DAY_MS;
      const next = new Date(Math.min(nextMidnight, stop.getTime()));
      windows.push({ start: cursor, stop: next });
      cursor = next;
    }

    return request.testMode ? windows.slice(0, 1) : windows;
  }
}
