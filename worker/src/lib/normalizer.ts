import { DateTime } from 'luxon';
import type {
  CanonicalEventRecord,
  DateTriple,
  NormalizeContext,
  RawEventRecord,
  ValidationIssue,
} from '../types.js';
import { classifyEvent } from './classifier.js';
import { parseDates, repairDateTriple } from './dates/index.js';
import { parsePrice } from './price.js';
import { enhanceRegistrationInfo } from './registration.js';
import { cleanTitle, extractTitleFromCaption } from './title.js';
import { detectOnline, emptyToNull, generateContentHash } from './utils.js';

function toUtcDate(value: string | Date | undefined): Date | null {
  if (value === undefined) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (!value.trim()) return null;

  const dt = DateTime.fromISO(value.trim(), { zone: 'utc' });
  return dt.isValid ? dt.toJSDate() : null;
}

// Dates read from text win per role; collector dates fill the gaps.
function mergeDates(fromText: DateTriple, record: RawEventRecord): DateTriple {
  const eventStart = fromText.eventStart ?? toUtcDate(record.eventStart);
  const eventEnd = fromText.eventEnd ?? toUtcDate(record.eventEnd);
  const deadline = fromText.deadline ?? toUtcDate(record.deadline) ?? eventStart ?? eventEnd;
  return { deadline, eventStart, eventEnd };
}

/**
 * Turn one raw collector record into a frozen canonical record. Never throws
 * on malformed text; a record without a usable title comes back with
 * `valid: false` and the `missing-title` issue.
 */
export function normalizeEvent(raw: RawEventRecord, ctx: NormalizeContext): CanonicalEventRecord {
  const { config, taxonomy, logger } = ctx;
  const record = enhanceRegistrationInfo(raw, config.registration);
  const description = emptyToNull(record.description);

  const title = cleanTitle(record.title) || extractTitleFromCaption(description, config.title);

  const price = parsePrice(record.priceText);

  const fromText = parseDates(emptyToNull(record.dateText) ?? description, {
    keywords: config.dates,
    referenceDate: ctx.referenceDate,
    logger,
  });
  const dates = repairDateTriple(mergeDates(fromText, record), {
    deadlinePolicy: ctx.deadlinePolicy,
    logger,
  });

  const categoryIds = classifyEvent(title, description, taxonomy, config.categoryKeywords);

  const isOnline = detectOnline(
    [title, description ?? '', record.location ?? ''].join(' '),
    record.isOnline,
  );

  const url = emptyToNull(record.url);
  const issues: ValidationIssue[] = title ? [] : ['missing-title'];

  if (issues.length > 0) {
    logger?.debug({ url, sourceName: record.sourceName }, 'Record has no usable title');
  }

  return Object.freeze({
    title,
    description,
    price: Object.freeze(price),
    dates: Object.freeze(dates),
    categoryIds: Object.freeze(categoryIds),
    registrationUrl: emptyToNull(record.registrationUrl),
    organizer: emptyToNull(record.organizer),
    url,
    posterUrl: emptyToNull(record.posterUrl),
    location: emptyToNull(record.location),
    participant: emptyToNull(record.participant),
    eventType: emptyToNull(record.eventType),
    isOnline,
    sourceName: emptyToNull(record.sourceName),
    contentHash: generateContentHash({ title, deadline: dates.deadline, url }),
    valid: issues.length === 0,
    issues: Object.freeze(issues),
  });
}
