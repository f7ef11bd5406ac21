import { formatApiDate } from "./timestamp.js";

const TEN_MINUTES_MS = 10 * 60 * 1000;
const ONE_HOUR_MS = 60 * 60 * 1000;
const ONE_DAY_MS = 24 * ONE_HOUR_MS;

/** `[date, hour]` request parameters: hour is `"-1"` for a whole day, `"h"` or `"h,mm"`. */
export type DateWindow = readonly [date: string, hour: string];

function floorMs(value: number, step: number): number {
  return value - (((value % step) + step) % step);
}

function ceilMs(value: number, step: number): number {
  const remainder = ((value % step) + step) % step;
  return remainder === 0 ? value : value + step - remainder;
}

function hourOf(ms: number): number {
  return new Date(ms).getUTCHours();
}

function minuteOf(ms: number): number {
  return new Date(ms).getUTCMinutes();
}

function dayWindow(ms: number): DateWindow {
  return [formatApiDate(new Date(ms)), "-1"];
}

function hourWindow(ms: number): DateWindow {
  return [formatApiDate(new Date(ms)), String(hourOf(ms))];
}

function slotWindow(ms: number): DateWindow {
  return [formatApiDate(new Date(ms)), `${hourOf(ms)},${String(minuteOf(ms)).padStart(2, "0")}`];
}

/**
 * Splits `[start, end)` into the coarsest windows the match-id-by-queue method accepts:
 * 10-minute slots up to the first full hour, hours up to the first full day, whole days,
 * then hours and slots again up to the end. Bounds are widened to 10-minute boundaries.
 * With `reverse`, windows are produced from the end backwards.
 */
export function* dateWindows(start: Date, end: Date, reverse = false): Generator<DateWindow> {
  let from = floorMs(start.getTime(), TEN_MINUTES_MS);
  let to = ceilMs(end.getTime(), TEN_MINUTES_MS);
  if (from >= to) return;

  if (reverse) {
    if (minuteOf(to) > 0) {
      const closestHour = floorMs(to, ONE_HOUR_MS);
      while (to > closestHour) {
        to -= TEN_MINUTES_MS;
        yield slotWindow(to);
        if (to <= from) return;
      }
    }
    if (hourOf(to) > 0) {
      const closestDay = floorMs(to, ONE_DAY_MS);
      if (closestDay >= from) {
        while (to > closestDay) {
          to -= ONE_HOUR_MS;
          yield hourWindow(to);
          if (to <= from) return;
        }
      }
    }
    const firstFullDay = ceilMs(from, ONE_DAY_MS);
    while (to > firstFullDay) {
      to -= ONE_DAY_MS;
      yield dayWindow(to);
    }
    if (to <= from) return;
    if (hourOf(from) > 0) {
      const firstFullHour = ceilMs(from, ONE_HOUR_MS);
      while (to > firstFullHour) {
        to -= ONE_HOUR_MS;
        yield hourWindow(to);
      }
      if (to <= from) return;
    }
    while (to > from) {
      to -= TEN_MINUTES_MS;
      yield slotWindow(to);
    }
    return;
  }

  if (minuteOf(from) > 0) {
    const closestHour = ceilMs(from, ONE_HOUR_MS);
    while (from < closestHour) {
      yield slotWindow(from);
      from += TEN_MINUTES_MS;
      if (from >= to) return;
    }
  }
  if (hourOf(from) > 0) {
    const closestDay = ceilMs(from, ONE_DAY_MS);
    if (closestDay <= to) {
      while (from < closestDay) {
        yield hourWindow(from);
        from += ONE_HOUR_MS;
        if (from >= to) return;
      }
    }
  }
  const lastFullDay = floorMs(to, ONE_DAY_MS);
  while (from < lastFullDay) {
    yield dayWindow(from);
    from += ONE_DAY_MS;
  }
  if (from >= to) return;
  if (hourOf(to) > 0) {
    const lastFullHour = floorMs(to, ONE_HOUR_MS);
    while (from < lastFullHour) {
      yield hourWindow(from);
      from += ONE_HOUR_MS;
    }
    if (from >= to) return;
  }
  while (from < to) {
    yield slotWindow(from);
    from += TEN_MINUTES_MS;
  }
}
