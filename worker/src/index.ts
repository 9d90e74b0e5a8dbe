export * from './types.js';
export { parsePrice, UNKNOWN_PRICE } from './lib/price.js';
export {
  parseDates,
  repairDateTriple,
  normalizeDateText,
  rangeStrategy,
  contextualStrategy,
  positionalStrategy,
  DEFAULT_DATE_STRATEGIES,
  EMPTY_DATES,
  type DateStrategy,
  type DateStrategyContext,
  type ParseDatesOptions,
} from './lib/dates/index.js';
export { cleanTitle, extractTitleFromCaption, scoreLineAsTitle } from './lib/title.js';
export { enhanceRegistrationInfo, findRegistrationUrl, findMentionedHandle, humanizeHandle } from './lib/registration.js';
export { classifyEvent, createCategoryClassifier, type CategoryClassifier } from './lib/classifier.js';
export { normalizeEvent } from './lib/normalizer.js';
export {
  normalizeBatch,
  mergeBatchResults,
  parseRawRecord,
  rawEventRecordSchema,
  type BatchOptions,
  type BatchResult,
  type NormalizedCompetition,
  type SkippedRecord,
  type SkipReason,
} from './lib/batch.js';
export {
  InMemoryCompetitionStore,
  PostgresCompetitionStore,
  type CompetitionStore,
  type SaveResult,
} from './lib/store.js';
export { createDatabase } from './lib/database.js';
export { loadEnv, loadNormalizerConfig, getDefaultConfigDir, type Env } from './lib/config.js';
export { createLogger, silentLogger } from './lib/logger.js';
export { NormalizerError, ConfigError, PersistenceError } from './lib/errors.js';
