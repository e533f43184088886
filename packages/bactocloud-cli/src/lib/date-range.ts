import { invalidOption } from "./errors/catalog.js";
import { parseTimestamp, type Measurement } from "./models.js";

export interface DateRange {
  /** 00:00:00 UTC of the first day */
  start: Date;
  /** 23:59:59 UTC of the last day */
  end: Date;
}

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

interface CalendarDay {
  year: number;
  month: number;
  day: number;
}

function toCalendarDay(value: string | Date, optionName: string): CalendarDay {
  if (value instanceof Date) {
    if (isNaN(value.getTime())) {
      throw invalidOption(optionName, "not a valid date");
    }
    return {
      year: value.getUTCFullYear(),
      month: value.getUTCMonth(),
      day: value.getUTCDate(),
    };
  }

  const match = CALENDAR_DATE.exec(value.trim());
  if (!match) {
    throw invalidOption(optionName, `"${value}" is not a date in YYYY-MM-DD form`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  const probe = new Date(Date.UTC(year, month, day));
  if (probe.getUTCMonth() !== month || probe.getUTCDate() !== day) {
    throw invalidOption(optionName, `"${value}" is not a calendar date`);
  }

  return { year, month, day };
}

/**
 * Build a normalized range from two calendar dates.
 * `start` covers the whole first day, `end` runs to 23:59:59 of the last.
 */
export function createDateRange(start: string | Date, end: string | Date): DateRange {
  const from = toCalendarDay(start, "from");
  const to = toCalendarDay(end, "to");

  const range: DateRange = {
    start: new Date(Date.UTC(from.year, from.month, from.day, 0, 0, 0)),
    end: new Date(Date.UTC(to.year, to.month, to.day, 23, 59, 59)),
  };

  if (range.start.getTime() > range.end.getTime()) {
    throw invalidOption("from", "start date is after end date");
  }

  return range;
}

/**
 * Format an instant the way the data list endpoint expects it
 * (`2024-01-15T00:00:00Z`, no milliseconds).
 */
export function formatApiDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function isWithinRange(instant: Date, range: DateRange): boolean {
  const t = instant.getTime();
  return t >= range.start.getTime() && t <= range.end.getTime();
}

/**
 * Keep the measurements whose timestamp lies in `[range.start, range.end]`.
 * Order is preserved; unparseable timestamps are dropped.
 */
export function filterByDateRange(measurements: readonly Measurement[], range: DateRange): Measurement[] {
  return measurements.filter((measurement) => {
    const instant = parseTimestamp(measurement.timestamp);
    return instant !== undefined && isWithinRange(instant, range);
  });
}
