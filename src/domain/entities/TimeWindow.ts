/**
 * TimeWindow: a half-open `[start, stop)` span of UTC time that is
 * extracted and loaded as one unit. `start < stop` always holds.
 */
export interface TimeWindow {
  start: Date;
  stop: Date;
}

/** Log/error context for a window, in the form used to re-run it by hand. */
export function windowContext(window: TimeWindow): { windowStart: string; windowStop: string } {
  return {
    windowStart: window.start.toISOString(),
    windowStop: window.stop.toISOString(),
  };
}

/** YYYY-MM-DD of a UTC instant. */
export function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}
