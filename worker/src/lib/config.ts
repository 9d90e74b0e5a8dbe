import 'dotenv/config';
import { readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import type { NormalizerConfig } from '../types.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  DATABASE_URL: z.string().url().optional(),
  NORMALIZER_CONFIG_DIR: z.string().optional(),
  PROFILE_URL_BASE: z.string().url().optional(),
  DROP_EXPIRED: z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform(value => value === 'true' || value === '1'),
  DEADLINE_POLICY: z.enum(['not-before-start', 'not-after-start']).default('not-before-start'),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const variables = parsed.error.issues.map(issue => issue.path.join('.'));
    throw new ConfigError(`Invalid environment: ${variables.join(', ')}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

const keywordList = z.array(z.string().trim().min(1));

const categoryKeywordsSchema = z.record(z.string().min(1), keywordList);

const titleHeuristicsSchema = z.object({
  noisePhrases: keywordList,
  eventKeywords: keywordList,
  linePrefixes: keywordList,
});

const dateKeywordsSchema = z.object({
  months: z.record(z.string().min(1), z.string().min(1)),
  deadlineKeywords: keywordList,
  eventKeywords: keywordList,
});

const registrationHintsSchema = z.object({
  registrationKeywords: keywordList,
  shortenerDomains: keywordList,
  socialDomains: keywordList,
  organizerPlaceholders: z.array(z.string()),
  profileUrlBase: z.string().url(),
});

const CONFIG_FILES = {
  categoryKeywords: 'category-keywords.json',
  title: 'title-heuristics.json',
  dates: 'date-keywords.json',
  registration: 'registration.json',
} as const;

// worker/config, two levels above both src/lib and dist/lib
export function getDefaultConfigDir(): string {
  const runtimeDir = dirname(fileURLToPath(import.meta.url));
  return resolve(runtimeDir, '..', '..', 'config');
}

function readJsonFile<T>(dir: string, file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const path = join(dir, file);
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not read ${path}: ${errorMessage(error)}`, { path });
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration in ${path}`, {
      path,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export interface LoadConfigOptions {
  dir?: string;
  profileUrlBase?: string;
}

/**
 * Load the keyword and phrase tables the engine runs on. Every table lives in
 * its own JSON file so deployments can tune them without touching code.
 */
export function loadNormalizerConfig(options: LoadConfigOptions = {}): NormalizerConfig {
  const dir = resolve(options.dir ?? getDefaultConfigDir());

  const registration = readJsonFile(dir, CONFIG_FILES.registration, registrationHintsSchema);

  return {
    categoryKeywords: readJsonFile(dir, CONFIG_FILES.categoryKeywords, categoryKeywordsSchema),
    title: readJsonFile(dir, CONFIG_FILES.title, titleHeuristicsSchema),
    dates: readJsonFile(dir, CONFIG_FILES.dates, dateKeywordsSchema),
    registration: {
      ...registration,
      profileUrlBase: options.profileUrlBase ?? registration.profileUrlBase,
    },
  };
}
