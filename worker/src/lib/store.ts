import { asc, eq, lt } from 'drizzle-orm';
import type { Logger } from 'pino';
import { categories, competitionCategories, competitions, eventTypes, type NewCompetition } from '../db/schema.js';
import type { NormalizedCompetition } from './batch.js';
import type { Database, DatabaseConnection } from './database.js';
import { PersistenceError, errorMessage } from './errors.js';
import type { TaxonomyEntry } from '../types.js';

export interface SaveResult {
  saved: number;
  failed: number;
}

/**
 * Where canonical competitions and the reference data they point at live.
 */
export interface CompetitionStore {
  loadTaxonomy(): Promise<TaxonomyEntry[]>;
  /** Event type name to id. */
  loadEventTypes(): Promise<Map<string, string>>;
  saveCompetitions(records: readonly NormalizedCompetition[]): Promise<SaveResult>;
  /** Delete competitions whose deadline has passed; resolves to the number deleted. */
  deleteExpired(now: Date): Promise<number>;
  close(): Promise<void>;
}

function toRow(record: NormalizedCompetition): NewCompetition {
  return {
    title: record.title,
    description: record.description,
    priceMin: record.price.min,
    priceMax: record.price.max,
    deadline: record.dates.deadline,
    eventStart: record.dates.eventStart,
    eventEnd: record.dates.eventEnd,
    registrationUrl: record.registrationUrl,
    organizer: record.organizer,
    url: record.url,
    posterUrl: record.posterUrl,
    location: record.location,
    participant: record.participant,
    isOnline: record.isOnline,
    eventTypeId: record.eventTypeId,
    sourceName: record.sourceName,
    contentHash: record.contentHash,
  };
}

export class PostgresCompetitionStore implements CompetitionStore {
  private readonly db: Database;

  constructor(
    private readonly connection: DatabaseConnection,
    private readonly logger: Logger,
  ) {
    this.db = connection.db;
  }

  async loadTaxonomy(): Promise<TaxonomyEntry[]> {
    try {
      return await this.db
        .select({ id: categories.id, slug: categories.slug })
        .from(categories)
        .orderBy(asc(categories.name));
    } catch (error) {
      throw new PersistenceError(`Failed to load categories: ${errorMessage(error)}`);
    }
  }

  async loadEventTypes(): Promise<Map<string, string>> {
    try {
      const rows = await this.db.select({ id: eventTypes.id, name: eventTypes.name }).from(eventTypes);
      return new Map(rows.map(row => [row.name, row.id]));
    } catch (error) {
      throw new PersistenceError(`Failed to load event types: ${errorMessage(error)}`);
    }
  }

  async saveCompetitions(records: readonly NormalizedCompetition[]): Promise<SaveResult> {
    const result: SaveResult = { saved: 0, failed: 0 };

    for (const record of records) {
      try {
        await this.db.transaction(async (tx) => {
          const row = toRow(record);
          const [saved] = await tx
            .insert(competitions)
            .values(row)
            .onConflictDoUpdate({
              target: competitions.contentHash,
              set: { ...row, updatedAt: new Date() },
            })
            .returning({ id: competitions.id });

          if (!saved) {
            throw new PersistenceError('Upsert returned no row', { contentHash: record.contentHash });
          }

          // category links are replaced, not merged
          await tx.delete(competitionCategories).where(eq(competitionCategories.competitionId, saved.id));
          if (record.categoryIds.length > 0) {
            await tx.insert(competitionCategories).values(
              record.categoryIds.map(categoryId => ({ competitionId: saved.id, categoryId })),
            );
          }
        });
        result.saved++;
        this.logger.debug({ title: record.title, contentHash: record.contentHash }, 'Saved competition');
      } catch (error) {
        result.failed++;
        this.logger.error(
          { title: record.title, contentHash: record.contentHash, error: errorMessage(error) },
          'Failed to save competition',
        );
      }
    }

    return result;
  }

  async deleteExpired(now: Date): Promise<number> {
    try {
      const deleted = await this.db
        .delete(competitions)
        .where(lt(competitions.deadline, now))
        .returning({ id: competitions.id });
      return deleted.length;
    } catch (error) {
      throw new PersistenceError(`Failed to delete expired competitions: ${errorMessage(error)}`);
    }
  }

  async close(): Promise<void> {
    await this.connection.queryClient.end();
  }
}

export interface InMemoryStoreSeed {
  taxonomy?: readonly TaxonomyEntry[];
  eventTypes?: ReadonlyMap<string, string>;
}

/**
 * Store kept in process memory, keyed on content hash like the database.
 * Used by tests and by runs that only write a log file.
 */
export class InMemoryCompetitionStore implements CompetitionStore {
  private readonly taxonomy: TaxonomyEntry[];
  private readonly eventTypes: Map<string, string>;
  private readonly records = new Map<string, NormalizedCompetition>();

  constructor(seed: InMemoryStoreSeed = {}) {
    this.taxonomy = [...(seed.taxonomy ?? [])];
    this.eventTypes = new Map(seed.eventTypes ?? []);
  }

  async loadTaxonomy(): Promise<TaxonomyEntry[]> {
    return [...this.taxonomy];
  }

  async loadEventTypes(): Promise<Map<string, string>> {
    return new Map(this.eventTypes);
  }

  async saveCompetitions(records: readonly NormalizedCompetition[]): Promise<SaveResult> {
    for (const record of records) {
      this.records.set(record.contentHash, record);
    }
    return { saved: records.length, failed: 0 };
  }

  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;
    for (const [hash, record] of this.records) {
      if (record.dates.deadline && record.dates.deadline < now) {
        this.records.delete(hash);
        deleted++;
      }
    }
    return deleted;
  }

  // nothing to release
  async close(): Promise<void> {}

  list(): NormalizedCompetition[] {
    return [...this.records.values()];
  }
}
