import {
  pgTable,
  uuid,
  text,
  timestamp,
  boolean,
  bigint,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';

export const categories = pgTable('categories', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: text('name').notNull(),
  slug: text('slug').notNull().unique(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});

export const eventTypes = pgTable('event_types', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: text('name').notNull().unique(),
});

export const competitions = pgTable('competitions', {
  id: uuid('id').primaryKey().defaultRandom(),
  title: text('title').notNull(),
  description: text('description'),
  priceMin: bigint('price_min', { mode: 'number' }),
  priceMax: bigint('price_max', { mode: 'number' }),
  deadline: timestamp('deadline', { withTimezone: true }),
  eventStart: timestamp('event_start', { withTimezone: true }),
  eventEnd: timestamp('event_end', { withTimezone: true }),
  registrationUrl: text('registration_url'),
  organizer: text('organizer'),
  url: text('url'),
  posterUrl: text('poster_url'),
  location: text('location'),
  participant: text('participant'),
  isOnline: boolean('is_online'),
  eventTypeId: uuid('event_type_id').references(() => eventTypes.id),
  sourceName: text('source_name'),
  contentHash: text('content_hash').notNull().unique(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  deadlineIdx: index('competitions_deadline_idx').on(table.deadline),
}));

export const competitionCategories = pgTable('competition_categories', {
  competitionId: uuid('competition_id')
    .notNull()
    .references(() => competitions.id, { onDelete: 'cascade' }),
  categoryId: uuid('category_id')
    .notNull()
    .references(() => categories.id, { onDelete: 'cascade' }),
}, (table) => ({
  pk: primaryKey({ columns: [table.competitionId, table.categoryId] }),
}));

export type Category = typeof categories.$inferSelect;
export type EventType = typeof eventTypes.$inferSelect;
export type Competition = typeof competitions.$inferSelect;
export type NewCompetition = typeof competitions.$inferInsert;
