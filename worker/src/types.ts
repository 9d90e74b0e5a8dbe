import type { Logger } from 'pino';

export interface RawEventRecord {
  title?: string;
  description?: string;
  priceText?: string;
  dateText?: string;
  registrationUrl?: string;
  organizer?: string;
  url?: string;            // source page the record was scraped from
  deadline?: string | Date;
  eventStart?: string | Date;
  eventEnd?: string | Date;
  posterUrl?: string;
  location?: string;
  participant?: string;
  eventType?: string;
  isOnline?: boolean;
  sourceName?: string;
}

export interface PriceRange {
  min: number | null;
  max: number | null;
}

export interface DateTriple {
  deadline: Date | null;
  eventStart: Date | null;
  eventEnd: Date | null;
}

export interface TaxonomyEntry {
  id: string;
  slug: string;
}

export type CategoryKeywordTable = Record<string, string[]>;

export interface TitleHeuristics {
  noisePhrases: string[];
  eventKeywords: string[];
  linePrefixes: string[];
}

export interface DateKeywords {
  months: Record<string, string>;
  deadlineKeywords: string[];
  eventKeywords: string[];
}

export interface RegistrationHints {
  registrationKeywords: string[];
  shortenerDomains: string[];
  socialDomains: string[];
  organizerPlaceholders: string[];
  profileUrlBase: string;
}

export interface NormalizerConfig {
  categoryKeywords: CategoryKeywordTable;
  title: TitleHeuristics;
  dates: DateKeywords;
  registration: RegistrationHints;
}

/**
 * Which ordering of deadline and event start is treated as a mislabeling.
 * `not-before-start` swaps a deadline that falls before the event start,
 * `not-after-start` swaps one that falls after it.
 */
export type DeadlinePolicy = 'not-before-start' | 'not-after-start';

export type ValidationIssue = 'missing-title';

export interface CanonicalEventRecord {
  title: string;
  description: string | null;
  price: PriceRange;
  dates: DateTriple;
  categoryIds: readonly string[];
  registrationUrl: string | null;
  organizer: string | null;
  url: string | null;
  posterUrl: string | null;
  location: string | null;
  participant: string | null;
  eventType: string | null;
  isOnline: boolean | null;
  sourceName: string | null;
  contentHash: string;
  valid: boolean;
  issues: readonly ValidationIssue[];
}

export interface NormalizeContext {
  config: NormalizerConfig;
  taxonomy: readonly TaxonomyEntry[];
  referenceDate?: Date;
  deadlinePolicy?: DeadlinePolicy;
  logger?: Logger;
}
