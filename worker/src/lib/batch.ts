import type { Logger } from 'pino';
import { z } from 'zod';
import { errorMessage } from './errors.js';
import { normalizeEvent } from './normalizer.js';
import type { CanonicalEventRecord, NormalizeContext, RawEventRecord } from '../types.js';

const optionalText = z
  .string()
  .nullish()
  .transform(value => value ?? undefined);

const optionalDate = z
  .union([z.string(), z.date()])
  .nullish()
  .transform(value => value ?? undefined);

// Unknown keys are stripped; wrong-typed fields are dropped and reported.
export const rawEventRecordSchema = z.object({
  title: optionalText,
  description: optionalText,
  priceText: optionalText,
  dateText: optionalText,
  registrationUrl: optionalText,
  organizer: optionalText,
  url: optionalText,
  deadline: optionalDate,
  eventStart: optionalDate,
  eventEnd: optionalDate,
  posterUrl: optionalText,
  location: optionalText,
  participant: optionalText,
  eventType: optionalText,
  isOnline: z
    .boolean()
    .nullish()
    .transform(value => value ?? undefined),
  sourceName: optionalText,
});

export interface ParsedRawRecord {
  record: RawEventRecord | null;
  invalidFields: string[];
}

export function parseRawRecord(input: unknown): ParsedRawRecord {
  const first = rawEventRecordSchema.safeParse(input);
  if (first.success) {
    return { record: first.data, invalidFields: [] };
  }
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return { record: null, invalidFields: [] };
  }

  const invalidFields = [...new Set(first.error.issues.map(issue => String(issue.path[0])))];
  const cleaned = Object.fromEntries(Object.entries(input).filter(([key]) => !invalidFields.includes(key)));
  const second = rawEventRecordSchema.safeParse(cleaned);
  return { record: second.success ? second.data : null, invalidFields };
}

export type NormalizedCompetition = CanonicalEventRecord & {
  eventTypeId: string | null;
};

export type SkipReason = 'not-an-object' | 'missing-title' | 'expired' | 'unknown-event-type';

export interface SkippedRecord {
  index: number;
  sourceName: string | null;
  title: string | null;
  reason: SkipReason;
}

export interface BatchFailure {
  index: number;
  sourceName: string | null;
  error: string;
}

export interface SourceCounts {
  normalized: number;
  skipped: number;
  failed: number;
}

export interface BatchResult {
  records: NormalizedCompetition[];
  skipped: SkippedRecord[];
  failures: BatchFailure[];
  bySource: Record<string, SourceCounts>;
}

export interface BatchOptions extends Omit<NormalizeContext, 'logger'> {
  logger: Logger;
  /** Clock used for the expiry check and, unless given, as the reference date. */
  now?: () => Date;
  dropExpired?: boolean;
  /** Applied to records that carry no source name of their own. */
  sourceName?: string;
  /** Applied to records that carry no event type of their own. */
  defaultEventType?: string;
  /** Event type name to id. When given, records with unknown types are skipped. */
  eventTypes?: ReadonlyMap<string, string>;
}

const UNKNOWN_SOURCE = 'unknown';

export function emptyBatchResult(): BatchResult {
  return { records: [], skipped: [], failures: [], bySource: {} };
}

function countsFor(result: BatchResult, sourceName: string | null): SourceCounts {
  const key = sourceName ?? UNKNOWN_SOURCE;
  return (result.bySource[key] ??= { normalized: 0, skipped: 0, failed: 0 });
}

function resolveEventType(
  name: string | null,
  eventTypes: ReadonlyMap<string, string> | undefined,
): { known: boolean; id: string | null } {
  if (!eventTypes) return { known: true, id: null };
  if (!name) return { known: false, id: null };
  const id = eventTypes.get(name.trim().toLowerCase());
  return id === undefined ? { known: false, id: null } : { known: true, id };
}

/**
 * Normalize a list of raw records one by one. A record that fails is logged
 * and reported; the batch never aborts.
 */
export function normalizeBatch(raws: readonly unknown[], options: BatchOptions): BatchResult {
  const { logger } = options;
  const now = options.now ?? (() => new Date());
  const dropExpired = options.dropExpired ?? true;
  const eventTypes = options.eventTypes
    ? new Map([...options.eventTypes].map(([name, id]) => [name.trim().toLowerCase(), id]))
    : undefined;
  const result = emptyBatchResult();

  raws.forEach((input, index) => {
    let sourceName: string | null = options.sourceName ?? null;

    try {
      const { record, invalidFields } = parseRawRecord(input);
      if (!record) {
        countsFor(result, sourceName).skipped++;
        result.skipped.push({ index, sourceName, title: null, reason: 'not-an-object' });
        logger.warn({ index, sourceName }, 'Skipping raw record that is not an object');
        return;
      }

      sourceName = record.sourceName ?? sourceName;
      if (invalidFields.length > 0) {
        logger.warn({ index, sourceName, fields: invalidFields }, 'Dropped fields with unexpected types');
      }

      const canonical = normalizeEvent(
        {
          ...record,
          sourceName: sourceName ?? undefined,
          eventType: record.eventType ?? options.defaultEventType,
        },
        {
          config: options.config,
          taxonomy: options.taxonomy,
          referenceDate: options.referenceDate ?? now(),
          deadlinePolicy: options.deadlinePolicy,
          logger: logger.child({ index, source: sourceName ?? UNKNOWN_SOURCE }),
        },
      );
      const counts = countsFor(result, sourceName);

      if (!canonical.valid) {
        counts.skipped++;
        result.skipped.push({ index, sourceName, title: null, reason: 'missing-title' });
        logger.warn({ index, sourceName }, 'Skipping record without a title');
        return;
      }

      const { deadline } = canonical.dates;
      if (dropExpired && deadline && deadline < now()) {
        counts.skipped++;
        result.skipped.push({ index, sourceName, title: canonical.title, reason: 'expired' });
        logger.info({ index, title: canonical.title, deadline: deadline.toISOString() }, 'Skipping expired record');
        return;
      }

      const eventType = resolveEventType(canonical.eventType, eventTypes);
      if (!eventType.known) {
        counts.skipped++;
        result.skipped.push({ index, sourceName, title: canonical.title, reason: 'unknown-event-type' });
        logger.warn({ index, title: canonical.title, eventType: canonical.eventType }, 'Skipping record with unknown event type');
        return;
      }

      counts.normalized++;
      result.records.push(Object.freeze({ ...canonical, eventTypeId: eventType.id }));
    } catch (error) {
      countsFor(result, sourceName).failed++;
      result.failures.push({ index, sourceName, error: errorMessage(error) });
      logger.error({ index, sourceName, error: errorMessage(error) }, 'Failed to normalize record');
    }
  });

  logger.debug(
    { normalized: result.records.length, skipped: result.skipped.length, failed: result.failures.length },
    'Batch complete',
  );
  return result;
}

/** Concatenate batch results, summing per-source counts. */
export function mergeBatchResults(results: readonly BatchResult[]): BatchResult {
  const merged = emptyBatchResult();
  for (const result of results) {
    merged.records.push(...result.records);
    merged.skipped.push(...result.skipped);
    merged.failures.push(...result.failures);
    for (const [source, counts] of Object.entries(result.bySource)) {
      const target = (merged.bySource[source] ??= { normalized: 0, skipped: 0, failed: 0 });
      target.normalized += counts.normalized;
      target.skipped += counts.skipped;
      target.failed += counts.failed;
    }
  }
  return merged;
}
