#!/usr/bin/env node
import { realpathSync } from 'fs';
import { mkdir, readFile, readdir, stat, writeFile } from 'fs/promises';
import { basename, dirname, extname, join, resolve } from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import { parseArgs } from 'util';
import { DateTime } from 'luxon';
import type { Logger } from 'pino';
import { z } from 'zod';
import { runMigrations } from './db/migrate.js';
import { mergeBatchResults, normalizeBatch, type BatchResult } from './lib/batch.js';
import { loadEnv, loadNormalizerConfig, type Env } from './lib/config.js';
import { createDatabase } from './lib/database.js';
import { ConfigError, NormalizerError, errorMessage } from './lib/errors.js';
import { createLogger } from './lib/logger.js';
import { InMemoryCompetitionStore, PostgresCompetitionStore, type CompetitionStore } from './lib/store.js';
import type { TaxonomyEntry } from './types.js';

const USAGE = `Usage:
  event-normalizer normalize --input <file|dir> [--taxonomy <file>] [--out <file>] [--save] [--keep-expired]
  event-normalizer purge-expired
  event-normalizer migrate`;

const sourceGroupSchema = z.object({
  source: z.string().min(1).optional(),
  defaultEventType: z.string().min(1).optional(),
  records: z.array(z.unknown()),
});

const taxonomyFileSchema = z.array(
  z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    slug: z.string().min(1),
  }),
);

export type SourceGroup = z.infer<typeof sourceGroupSchema>;

export interface CliDependencies {
  env: Env;
  logger: Logger;
  now: () => Date;
  openStore: (env: Env, logger: Logger) => CompetitionStore;
  print: (line: string) => void;
}

function openPostgresStore(env: Env, logger: Logger): CompetitionStore {
  return new PostgresCompetitionStore(createDatabase(env.DATABASE_URL), logger);
}

async function readJson(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new NormalizerError(`Could not read ${path}: ${errorMessage(error)}`, 'IO_ERROR', { path });
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new NormalizerError(`Invalid JSON in ${path}: ${errorMessage(error)}`, 'IO_ERROR', { path });
  }
}

/**
 * Raw input is either an array of records, one `{ source, records }` group,
 * or an array of such groups. Files without a source name are named after
 * the file.
 */
export function toSourceGroups(data: unknown, fallbackSource: string): SourceGroup[] {
  const group = sourceGroupSchema.safeParse(data);
  if (group.success) {
    return [{ ...group.data, source: group.data.source ?? fallbackSource }];
  }

  if (Array.isArray(data)) {
    const groups = z.array(sourceGroupSchema).safeParse(data);
    if (groups.success && groups.data.length > 0) {
      return groups.data.map(entry => ({ ...entry, source: entry.source ?? fallbackSource }));
    }
    return [{ source: fallbackSource, records: data }];
  }

  throw new NormalizerError('Input must be an array of records or a { source, records } object', 'IO_ERROR');
}

async function loadSourceGroups(input: string): Promise<SourceGroup[]> {
  const path = resolve(input);
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(path)).isDirectory();
  } catch (error) {
    throw new NormalizerError(`Could not read ${path}: ${errorMessage(error)}`, 'IO_ERROR', { path });
  }

  const files = isDirectory
    ? (await readdir(path))
        .filter(file => extname(file).toLowerCase() === '.json')
        .sort()
        .map(file => join(path, file))
    : [path];

  const groups: SourceGroup[] = [];
  for (const file of files) {
    groups.push(...toSourceGroups(await readJson(file), basename(file, extname(file))));
  }
  return groups;
}

async function loadTaxonomyFile(path: string): Promise<TaxonomyEntry[]> {
  const parsed = taxonomyFileSchema.safeParse(await readJson(resolve(path)));
  if (!parsed.success) {
    throw new ConfigError(`Invalid taxonomy file ${path}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

function logFileName(now: Date): string {
  const stamp = DateTime.fromJSDate(now, { zone: 'utc' }).toFormat('yyyyLLdd_HHmmss');
  return join('logs', `normalize_log_${stamp}.json`);
}

async function writeLog(path: string, result: BatchResult, now: Date): Promise<void> {
  const body = {
    generatedAt: now.toISOString(),
    summary: {
      normalized: result.records.length,
      skipped: result.skipped.length,
      failed: result.failures.length,
      bySource: result.bySource,
    },
    records: result.records,
    skipped: result.skipped,
    failures: result.failures,
  };

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(body, null, 2)}\n`, 'utf-8');
  } catch (error) {
    throw new NormalizerError(`Could not write ${path}: ${errorMessage(error)}`, 'IO_ERROR', { path });
  }
}

function printSummary(result: BatchResult, print: (line: string) => void): void {
  for (const [source, counts] of Object.entries(result.bySource)) {
    print(`${source}: ${counts.normalized} normalized, ${counts.skipped} skipped, ${counts.failed} failed`);
  }
  print(
    `Total: ${result.records.length} normalized, ${result.skipped.length} skipped, ${result.failures.length} failed`,
  );
}

async function normalizeCommand(args: string[], deps: CliDependencies): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      input: { type: 'string', short: 'i' },
      taxonomy: { type: 'string', short: 't' },
      out: { type: 'string', short: 'o' },
      save: { type: 'boolean', default: false },
      'keep-expired': { type: 'boolean', default: false },
    },
    strict: true,
  });

  if (!values.input) {
    throw new ConfigError('--input is required');
  }
  if (values.save && !deps.env.DATABASE_URL) {
    throw new ConfigError('--save requires DATABASE_URL');
  }

  const { env, logger } = deps;
  const config = loadNormalizerConfig({
    dir: env.NORMALIZER_CONFIG_DIR,
    profileUrlBase: env.PROFILE_URL_BASE,
  });
  const groups = await loadSourceGroups(values.input);

  const fileTaxonomy = values.taxonomy ? await loadTaxonomyFile(values.taxonomy) : undefined;

  const store: CompetitionStore = env.DATABASE_URL
    ? deps.openStore(env, logger)
    : new InMemoryCompetitionStore({ taxonomy: fileTaxonomy });

  try {
    const taxonomy = fileTaxonomy ?? (await store.loadTaxonomy());
    const eventTypes = env.DATABASE_URL ? await store.loadEventTypes() : undefined;
    if (taxonomy.length === 0) {
      logger.warn('No category taxonomy loaded, records will carry no categories');
    }

    const now = deps.now();
    const results = groups.map(group =>
      normalizeBatch(group.records, {
        config,
        taxonomy,
        deadlinePolicy: env.DEADLINE_POLICY,
        logger: logger.child({ source: group.source }),
        now: () => now,
        dropExpired: values['keep-expired'] ? false : env.DROP_EXPIRED,
        sourceName: group.source,
        defaultEventType: group.defaultEventType,
        eventTypes,
      }),
    );
    const result = mergeBatchResults(results);

    const logPath = resolve(values.out ?? logFileName(now));
    await writeLog(logPath, result, now);
    logger.info({ path: logPath }, 'Wrote normalization log');

    if (values.save) {
      const saved = await store.saveCompetitions(result.records);
      logger.info(saved, 'Saved competitions');
      deps.print(`Saved: ${saved.saved}, failed: ${saved.failed}`);
    }

    printSummary(result, deps.print);
    return 0;
  } finally {
    await store.close();
  }
}

async function purgeExpiredCommand(deps: CliDependencies): Promise<number> {
  if (!deps.env.DATABASE_URL) {
    throw new ConfigError('purge-expired requires DATABASE_URL');
  }

  const store = deps.openStore(deps.env, deps.logger);
  try {
    const deleted = await store.deleteExpired(deps.now());
    deps.logger.info({ deleted }, 'Deleted expired competitions');
    deps.print(`Deleted ${deleted} expired competitions`);
    return 0;
  } finally {
    await store.close();
  }
}

async function migrateCommand(deps: CliDependencies): Promise<number> {
  const { queryClient } = createDatabase(deps.env.DATABASE_URL);
  try {
    const applied = await runMigrations(queryClient, deps.logger);
    deps.print(`Applied ${applied.length} migration file(s)`);
    return 0;
  } finally {
    await queryClient.end();
  }
}

/**
 * Run one CLI command and resolve to its exit code. Configuration and I/O
 * failures exit with 1; records that fail to normalize do not.
 */
export async function runCli(argv: string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  let deps: CliDependencies | undefined;

  try {
    const env = overrides.env ?? loadEnv();
    deps = {
      env,
      logger: overrides.logger ?? createLogger({ level: env.LOG_LEVEL }),
      now: overrides.now ?? (() => new Date()),
      openStore: overrides.openStore ?? openPostgresStore,
      print: overrides.print ?? (line => console.log(line)),
    };

    const [command, ...rest] = argv;
    switch (command) {
      case 'normalize':
        return await normalizeCommand(rest, deps);
      case 'purge-expired':
        return await purgeExpiredCommand(deps);
      case 'migrate':
        return await migrateCommand(deps);
      default:
        deps.print(USAGE);
        return command === undefined || command === 'help' || command === '--help' ? 0 : 1;
    }
  } catch (error) {
    const details = error instanceof NormalizerError ? { code: error.code, details: error.details } : {};
    if (deps) {
      deps.logger.error({ ...details, error: errorMessage(error) }, 'Command failed');
    } else {
      console.error(errorMessage(error));
    }
    return 1;
  }
}

/**
 * Whether the module at `moduleUrl` is the script node was started with.
 * npm links `bin` entries, so the script path is resolved through symlinks.
 */
export function isMainModule(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath) return false;
  try {
    const script = pathToFileURL(realpathSync(scriptPath)).href;
    return script === pathToFileURL(realpathSync(fileURLToPath(moduleUrl))).href;
  } catch {
    return false;
  }
}

if (isMainModule(import.meta.url, process.argv[1])) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(errorMessage(error));
      process.exitCode = 1;
    });
}
