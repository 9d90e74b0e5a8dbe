import { describe, it, expect } from 'vitest';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { getMigrationsDir } from '../db/migrate.js';
import { competitions as competitionsTable } from '../db/schema.js';
import { loadNormalizerConfig } from './config.js';
import { silentLogger } from './logger.js';
import { normalizeBatch } from './batch.js';
import { InMemoryCompetitionStore } from './store.js';

const config = loadNormalizerConfig();
const taxonomy = [{ id: 'cat-essay', slug: 'essay' }];

function competitions() {
  return normalizeBatch(
    [
      { title: 'Lomba Esai Nasional', dateText: '20 Mei 2025' },
      { title: 'Lomba Debat', dateText: '10 Februari 2025' },
      { title: 'Webinar Karier' },
    ],
    {
      config,
      taxonomy,
      logger: silentLogger,
      now: () => new Date('2025-01-01T00:00:00Z'),
    },
  ).records;
}

describe('InMemoryCompetitionStore', () => {
  it('serves the taxonomy and event types it was seeded with', async () => {
    const store = new InMemoryCompetitionStore({ taxonomy, eventTypes: new Map([['Lomba', 'type-1']]) });
    expect(await store.loadTaxonomy()).toEqual(taxonomy);
    expect(await store.loadEventTypes()).toEqual(new Map([['Lomba', 'type-1']]));
  });

  it('upserts on the content hash', async () => {
    const store = new InMemoryCompetitionStore();
    expect(await store.saveCompetitions(competitions())).toEqual({ saved: 3, failed: 0 });
    await store.saveCompetitions(competitions());
    expect(store.list()).toHaveLength(3);
  });

  it('deletes competitions whose deadline has passed', async () => {
    const store = new InMemoryCompetitionStore();
    await store.saveCompetitions(competitions());

    const deleted = await store.deleteExpired(new Date('2025-03-01T00:00:00Z'));

    expect(deleted).toBe(1);
    expect(store.list().map(record => record.title)).toEqual(['Lomba Esai Nasional', 'Webinar Karier']);
  });
});

describe('competitions table', () => {
  it('stores prices as 64-bit integers', async () => {
    expect(competitionsTable.priceMin.getSQLType()).toBe('bigint');
    expect(competitionsTable.priceMax.getSQLType()).toBe('bigint');

    const sql = await readFile(join(getMigrationsDir(), '0001_initial.sql'), 'utf-8');
    expect(sql).toContain('price_min bigint,');
    expect(sql).toContain('price_max bigint,');
  });
});
