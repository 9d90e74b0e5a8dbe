import * as chrono from 'chrono-node';
import type { ParsedComponents, ParsedResult } from 'chrono-node';
import { DateTime, FixedOffsetZone } from 'luxon';

// Day-first reading ("10/01/2025" is 10 January), as written in Indonesian sources
const parser = chrono.en.GB;

export interface FoundDate {
  date: DateTime;
  index: number;
  end: number;
}

/**
 * Build a UTC instant from parsed components. The time of day is kept only
 * when the text states it; otherwise the date resolves to midnight UTC. A
 * written offset ("+0700", "GMT+7") applies to a written time.
 */
export function componentsToUtc(components: ParsedComponents): DateTime | null {
  const year = components.get('year');
  const month = components.get('month');
  const day = components.get('day');
  if (year == null || month == null || day == null) {
    return null;
  }

  const hasTime = components.isCertain('hour');
  const hour = hasTime ? components.get('hour') ?? 0 : 0;
  const minute = components.isCertain('minute') ? components.get('minute') ?? 0 : 0;

  // chrono reports the offset in minutes east of UTC
  const offset = components.get('timezoneOffset');
  if (hasTime && components.isCertain('timezoneOffset') && offset != null) {
    const local = DateTime.fromObject(
      { year, month, day, hour, minute },
      { zone: FixedOffsetZone.instance(offset) },
    );
    return local.isValid ? local.toUTC() : null;
  }

  const date = DateTime.utc(year, month, day, hour, minute);
  return date.isValid ? date : null;
}

// At least a day and a month, written with digits: rejects bare months,
// weekdays and relative words such as "now" or "tomorrow"
function hasDayAndMonth(components: ParsedComponents, text: string): boolean {
  return /\d/.test(text) && components.isCertain('day') && components.isCertain('month');
}

function parse(text: string, referenceDate: Date): ParsedResult[] {
  return parser.parse(text, referenceDate, { forwardDate: true });
}

/**
 * Find every date in the text, including both ends of ranges such as
 * "15-20 february 2025". Dates without a year resolve to the soonest
 * occurrence at or after the reference date.
 */
export function findDates(text: string, referenceDate: Date): FoundDate[] {
  const found: FoundDate[] = [];

  for (const result of parse(text, referenceDate)) {
    if (!hasDayAndMonth(result.start, result.text)) continue;

    const span = { index: result.index, end: result.index + result.text.length };
    const start = componentsToUtc(result.start);
    if (start) {
      found.push({ date: start, ...span });
    }

    if (result.end && hasDayAndMonth(result.end, result.text)) {
      const end = componentsToUtc(result.end);
      if (end) {
        found.push({ date: end, ...span });
      }
    }
  }

  return found;
}

/** The date the text starts with, or null. */
export function leadingDate(text: string, referenceDate: Date): DateTime | null {
  const trimmed = text.trim();
  const first = findDates(trimmed, referenceDate)[0];
  return first && first.index === 0 ? first.date : null;
}

/** The date the text ends with, or null. */
export function trailingDate(text: string, referenceDate: Date): DateTime | null {
  const trimmed = text.trim();
  const dates = findDates(trimmed, referenceDate);
  const last = dates[dates.length - 1];
  return last && last.end === trimmed.length ? last.date : null;
}

export function uniqueSorted(dates: DateTime[]): DateTime[] {
  const byInstant = new Map<number, DateTime>();
  for (const date of dates) {
    byInstant.set(date.toMillis(), date);
  }
  return [...byInstant.values()].sort((a, b) => a.toMillis() - b.toMillis());
}
