import { DateTime } from 'luxon';
import type { Logger } from 'pino';
import { errorMessage } from '../errors.js';
import type { DateKeywords, DateTriple } from '../../types.js';
import { findDates, leadingDate, trailingDate, uniqueSorted } from './extract.js';

export interface DateStrategyContext {
  referenceDate: Date;
  keywords: DateKeywords;
  logger?: Logger;
}

/**
 * One way of reading role-tagged dates out of normalized text. Returns null
 * when it does not apply so the next strategy can try.
 */
export type DateStrategy = (text: string, ctx: DateStrategyContext) => DateTriple | null;

const RANGE_SEPARATOR = ' - ';

function toTriple(deadline: DateTime | null, eventStart: DateTime | null, eventEnd: DateTime | null): DateTriple {
  return {
    deadline: deadline ? deadline.toJSDate() : null,
    eventStart: eventStart ? eventStart.toJSDate() : null,
    eventEnd: eventEnd ? eventEnd.toJSDate() : null,
  };
}

function earliest(dates: DateTime[]): DateTime {
  return dates.reduce((min, date) => (date < min ? date : min));
}

function latest(dates: DateTime[]): DateTime {
  return dates.reduce((max, date) => (date > max ? date : max));
}

/**
 * "10 jan - 20 feb 2025", "15 - 20 march 2025": two dates joined by a
 * spaced dash. The start borrows the month and year it lacks from the end; a
 * start landing after the end is moved back a year (december - january).
 */
export const rangeStrategy: DateStrategy = (text, ctx) => {
  const at = text.indexOf(RANGE_SEPARATOR);
  if (at < 0) return null;

  const startSpan = text.slice(0, at).trim();
  const endSpan = text.slice(at + RANGE_SEPARATOR.length).trim();
  if (!startSpan || !endSpan) return null;

  try {
    const end = leadingDate(endSpan, ctx.referenceDate);
    if (!end) return null;

    let start: DateTime | null;
    if (/^\d{1,2}$/.test(startSpan)) {
      const candidate = DateTime.utc(end.year, end.month, Number(startSpan));
      start = candidate.isValid ? candidate : null;
    } else {
      const withYear = /\b\d{4}\b/.test(startSpan) ? startSpan : `${startSpan} ${end.year}`;
      start = trailingDate(withYear, ctx.referenceDate);
    }
    if (!start) return null;

    if (start > end) {
      start = start.minus({ years: 1 });
    }

    const eventStart = start < end ? start : end;
    const eventEnd = start < end ? end : start;
    return toTriple(eventEnd, eventStart, eventEnd);
  } catch (error) {
    ctx.logger?.debug({ text, error: errorMessage(error) }, 'Range date parse failed');
    return null;
  }
};

// Punctuation, or a spaced dash not followed by a digit: "10 jan - pelaksanaan ..."
// splits, "10 jan - 20 feb" stays one clause
const CLAUSE_SEPARATOR = /[.,;\n]|\s-\s(?!\d)/;

function containsAny(text: string, keywords: string[]): boolean {
  return keywords.some(keyword => text.includes(keyword.toLowerCase()));
}

/**
 * Clause-level reading: a clause mentioning a deadline keyword gives the
 * deadline, one mentioning an event keyword gives the event span. Roles the
 * clauses leave open are filled positionally from all dates in the text.
 */
export const contextualStrategy: DateStrategy = (text, ctx) => {
  let deadline: DateTime | null = null;
  let eventStart: DateTime | null = null;
  let eventEnd: DateTime | null = null;

  for (const clause of text.split(CLAUSE_SEPARATOR)) {
    if (!clause.trim()) continue;

    const dates = findDates(clause, ctx.referenceDate).map(found => found.date);
    if (dates.length === 0) continue;

    if (containsAny(clause, ctx.keywords.deadlineKeywords)) {
      deadline ??= latest(dates);
    } else if (containsAny(clause, ctx.keywords.eventKeywords)) {
      eventStart ??= earliest(dates);
      if (dates.length > 1) {
        eventEnd ??= latest(dates);
      }
    }
  }

  if (!deadline && !eventStart) return null;

  const all = uniqueSorted(findDates(text, ctx.referenceDate).map(found => found.date));
  if (all.length === 0) return null;

  deadline ??= all[all.length - 1];

  if (!eventStart) {
    const resolvedDeadline = deadline;
    const others = all.filter(date => date.toMillis() !== resolvedDeadline.toMillis());
    const candidates = others.length > 0 ? others : all;
    eventStart = candidates[0];
    eventEnd = candidates[candidates.length - 1];
  }

  return toTriple(deadline, eventStart, eventEnd);
};

/**
 * Terminal fallback: the latest date is the deadline, the earliest and
 * latest bound the event. A lone date fills all three roles.
 */
export const positionalStrategy: DateStrategy = (text, ctx) => {
  const dates = uniqueSorted(findDates(text, ctx.referenceDate).map(found => found.date));
  if (dates.length === 0) return null;

  const first = dates[0];
  const last = dates[dates.length - 1];
  return toTriple(last, first, last);
};

export const DEFAULT_DATE_STRATEGIES: readonly DateStrategy[] = [
  rangeStrategy,
  contextualStrategy,
  positionalStrategy,
];
