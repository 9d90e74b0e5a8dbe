import { describe, it, expect } from 'vitest';
import { loadNormalizerConfig } from './config.js';
import { silentLogger } from './logger.js';
import { mergeBatchResults, normalizeBatch, parseRawRecord, type BatchOptions } from './batch.js';

const config = loadNormalizerConfig();

const options: BatchOptions = {
  config,
  taxonomy: [{ id: 'cat-essay', slug: 'essay' }],
  logger: silentLogger,
  now: () => new Date('2025-01-01T00:00:00Z'),
  sourceName: 'sheet',
  defaultEventType: 'Lomba',
  eventTypes: new Map([['Lomba', 'type-1']]),
};

const throwingRecord = {
  get title(): string {
    throw new Error('boom');
  },
};

const raws: unknown[] = [
  { title: 'Lomba Esai Nasional', dateText: '20 Mei 2025', eventType: 'lomba', sourceName: 'infolomba' },
  { title: 'Lomba Lama', dateText: '10 Desember 2024' },
  { description: 'We are hiring! Link di bio' },
  'just a string',
  { title: 'Workshop Fotografi', eventType: 'Seminar' },
  { title: 'Webinar Karier', priceText: 42, extra: 'dropped' },
  throwingRecord,
];

describe('parseRawRecord', () => {
  it('drops unknown keys and reports wrong-typed fields', () => {
    const parsed = parseRawRecord({ title: 'Lomba A', priceText: 42, extra: true });
    expect(parsed.record).toEqual({ title: 'Lomba A' });
    expect(parsed.invalidFields).toEqual(['priceText']);
  });

  it('turns null fields into absent ones', () => {
    expect(parseRawRecord({ title: 'Lomba A', organizer: null }).record).toEqual({ title: 'Lomba A' });
  });

  it('rejects values that are not objects', () => {
    expect(parseRawRecord(['a']).record).toBeNull();
    expect(parseRawRecord(null).record).toBeNull();
  });
});

describe('normalizeBatch', () => {
  it('keeps valid records and reports why the others were dropped', () => {
    const result = normalizeBatch(raws, options);

    expect(result.records.map(record => record.title)).toEqual(['Lomba Esai Nasional', 'Webinar Karier']);
    expect(result.records.map(record => record.eventTypeId)).toEqual(['type-1', 'type-1']);
    expect(result.records[0].categoryIds).toEqual(['cat-essay']);
    expect(result.records[1].price).toEqual({ min: null, max: null });

    expect(result.skipped.map(skip => [skip.index, skip.reason])).toEqual([
      [1, 'expired'],
      [2, 'missing-title'],
      [3, 'not-an-object'],
      [4, 'unknown-event-type'],
    ]);
    expect(result.failures).toEqual([{ index: 6, sourceName: 'sheet', error: 'boom' }]);
  });

  it('counts outcomes per source', () => {
    const result = normalizeBatch(raws, options);
    expect(result.bySource).toEqual({
      infolomba: { normalized: 1, skipped: 0, failed: 0 },
      sheet: { normalized: 1, skipped: 4, failed: 1 },
    });
  });

  it('keeps expired records when asked to', () => {
    const result = normalizeBatch(raws, { ...options, dropExpired: false });
    expect(result.records.map(record => record.title)).toContain('Lomba Lama');
  });

  it('does not resolve event types without a map', () => {
    const result = normalizeBatch(raws, { ...options, eventTypes: undefined });
    expect(result.records.map(record => record.title)).toEqual([
      'Lomba Esai Nasional',
      'Workshop Fotografi',
      'Webinar Karier',
    ]);
    expect(result.records.every(record => record.eventTypeId === null)).toBe(true);
    expect(result.records[1].eventType).toBe('Seminar');
  });

  it('returns an empty result for an empty batch', () => {
    expect(normalizeBatch([], options)).toEqual({ records: [], skipped: [], failures: [], bySource: {} });
  });
});

describe('mergeBatchResults', () => {
  it('sums per-source counts', () => {
    const first = normalizeBatch([{ title: 'Lomba Esai Nasional' }], options);
    const second = normalizeBatch([{ title: 'Lomba Debat' }, 'x'], options);
    const merged = mergeBatchResults([first, second]);

    expect(merged.records).toHaveLength(2);
    expect(merged.skipped).toHaveLength(1);
    expect(merged.bySource).toEqual({ sheet: { normalized: 2, skipped: 1, failed: 0 } });
  });
});
