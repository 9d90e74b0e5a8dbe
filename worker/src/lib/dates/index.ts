import type { Logger } from 'pino';
import type { DateKeywords, DateTriple } from '../../types.js';
import { isNoDateSentinel, normalizeDateText } from './normalize.js';
import { DEFAULT_DATE_STRATEGIES, type DateStrategy } from './strategies.js';

export { repairDateTriple } from './repair.js';
export {
  rangeStrategy,
  contextualStrategy,
  positionalStrategy,
  DEFAULT_DATE_STRATEGIES,
} from './strategies.js';
export type { DateStrategy, DateStrategyContext } from './strategies.js';
export { normalizeDateText } from './normalize.js';

export interface ParseDatesOptions {
  keywords: DateKeywords;
  referenceDate?: Date;
  strategies?: readonly DateStrategy[];
  logger?: Logger;
}

export const EMPTY_DATES: Readonly<DateTriple> = Object.freeze({
  deadline: null,
  eventStart: null,
  eventEnd: null,
});

/**
 * Extract the registration deadline and the event span from free text.
 * Strategies run in order on the normalized text; the first one that applies
 * wins. The result is not yet repaired, see `repairDateTriple`.
 */
export function parseDates(text: string | null | undefined, options: ParseDatesOptions): DateTriple {
  if (text == null) {
    return { ...EMPTY_DATES };
  }
  if (typeof text !== 'string') {
    throw new TypeError(`parseDates expects a string, got ${typeof text}`);
  }
  if (!text.trim() || isNoDateSentinel(text)) {
    return { ...EMPTY_DATES };
  }

  const normalized = normalizeDateText(text, options.keywords.months);
  const ctx = {
    referenceDate: options.referenceDate ?? new Date(),
    keywords: options.keywords,
    logger: options.logger,
  };

  for (const strategy of options.strategies ?? DEFAULT_DATE_STRATEGIES) {
    const triple = strategy(normalized, ctx);
    if (triple && (triple.deadline || triple.eventStart || triple.eventEnd)) {
      return triple;
    }
  }

  return { ...EMPTY_DATES };
}
