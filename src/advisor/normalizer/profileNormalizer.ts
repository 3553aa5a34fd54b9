/**
 * Profile Normalizer
 *
 * Converts raw profiler output (factory, database and event profiles captured
 * per example) into a ProfileRecord.
 *
 * Raw keys are snake_case as the profiler writes them:
 *   { factory_prof: { stats | factories, error }, db_queries, event_prof: { events, error }, metadata }
 */

import { z } from 'zod';
import { AdvisorErrorFactory, isAdvisorError } from '../errors/types';
import { AdvisorLogger } from '../logging/logger';
import { createProfileRecord, toCount, toDuration } from '../types/builders';
import { FACTORY_STRATEGIES } from '../types';
import type {
  DbUsage,
  EventExample,
  EventUsage,
  FactoryStrategy,
  FactoryUsage,
  ProfileRecord,
  SpecType
} from '../types';

/**
 * Where the example ran and how it was described
 */
export interface ExampleContext {
  location?: string;
  file_path?: string;
  runtime?: number;
  duration?: number;
  example_group?: string;
  tags?: unknown;
  description?: string;
}

const RawSectionSchema = z.record(z.unknown());

const RawProfileSchema = z.object({
  factory_prof: RawSectionSchema.optional(),
  db_queries: RawSectionSchema.optional(),
  event_prof: RawSectionSchema.optional(),
  metadata: RawSectionSchema.optional()
}).passthrough();

const ExampleContextSchema = z.object({
  location: z.string().optional(),
  file_path: z.string().optional(),
  runtime: z.number().optional(),
  duration: z.number().optional(),
  example_group: z.string().optional(),
  tags: z.unknown().optional(),
  description: z.string().optional()
}).passthrough();

type RawSection = z.infer<typeof RawSectionSchema>;

const LocationSchema = z.object({
  location: z.string().optional(),
  file_path: z.string().optional()
});

/**
 * Example location named by a context, '' when there is none
 */
export function contextLocation(context: unknown): string {
  const parsed = LocationSchema.safeParse(context);
  if (!parsed.success) return '';
  return parsed.data.location ?? parsed.data.file_path ?? '';
}

/**
 * Location prefixes and the spec type they imply, first match wins
 */
const SPEC_TYPE_PATTERNS: ReadonlyArray<[RegExp, SpecType]> = [
  [/spec\/models\//, 'model'],
  [/spec\/controllers\//, 'controller'],
  [/spec\/requests\//, 'request'],
  [/spec\/features\//, 'feature'],
  [/spec\/integration\//, 'integration'],
  [/spec\/system\//, 'system'],
  [/spec\/lib\//, 'lib'],
  [/spec\/helpers\//, 'helper'],
  [/spec\/views\//, 'view']
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function positive(value: unknown): boolean {
  return typeof value === 'number' && value > 0;
}

function asStrategy(value: unknown): FactoryStrategy | undefined {
  if (typeof value !== 'string') return undefined;
  return FACTORY_STRATEGIES.find(s => s === value);
}

export function inferSpecType(location: string): SpecType {
  for (const [pattern, specType] of SPEC_TYPE_PATTERNS) {
    if (pattern.test(location)) return specType;
  }
  return 'unknown';
}

/**
 * Detect a factory's strategy. The precedence order matters: changing it
 * changes recommendations.
 *
 * explicit strategy → create count → build count → build_stubbed count → method → unknown
 */
export function detectStrategy(info: Record<string, unknown>): FactoryStrategy {
  const explicit = asStrategy(info.strategy);
  if (explicit) return explicit;
  if (positive(info.create_count)) return 'create';
  if (positive(info.build_count)) return 'build';
  if (positive(info.build_stubbed_count)) return 'build_stubbed';
  return asStrategy(info.method) ?? 'unknown';
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Runtime in milliseconds. Values below 1 are taken as seconds.
 */
export function extractRuntime(context: ExampleContext, metadata: RawSection | undefined): number {
  const runtime = context.runtime ?? context.duration ?? metadata?.runtime ?? 0;
  if (typeof runtime !== 'number' || !Number.isFinite(runtime) || runtime < 0) return 0;
  return runtime < 1 ? roundTo2(runtime * 1000) : roundTo2(runtime);
}

function normalizeSingleFactory(info: unknown): FactoryUsage {
  if (isRecord(info)) {
    return {
      strategy: detectStrategy(info),
      count: toCount(info.count ?? info.total ?? 1),
      time: toDuration(info.time ?? info.duration ?? 0)
    };
  }
  if (typeof info === 'number') {
    return { strategy: 'unknown', count: toCount(info), time: 0 };
  }
  return { strategy: 'unknown', count: 1, time: 0 };
}

function normalizeFactories(section: RawSection | undefined): Record<string, FactoryUsage> {
  const normalized: Record<string, FactoryUsage> = {};
  if (!section) return normalized;

  const { stats, factories } = section;

  if (stats !== undefined) {
    if (!isRecord(stats)) {
      throw AdvisorErrorFactory.normalizationFailed('factory_prof.stats', 'Expected an object keyed by factory name');
    }
    for (const [name, entry] of Object.entries(stats)) {
      const info = isRecord(entry) ? entry : {};
      normalized[name] = {
        strategy: asStrategy(info.strategy) ?? 'unknown',
        count: toCount(info.count),
        time: toDuration(info.time)
      };
    }
  }

  if (factories !== undefined) {
    if (!isRecord(factories)) {
      throw AdvisorErrorFactory.normalizationFailed('factory_prof.factories', 'Expected an object keyed by factory name');
    }
    for (const [name, info] of Object.entries(factories)) {
      normalized[name] = normalizeSingleFactory(info);
    }
  }

  return normalized;
}

function normalizeDb(section: RawSection | undefined): DbUsage {
  const db = section ?? {};
  return {
    totalQueries: toCount(db.total_queries),
    inserts: toCount(db.inserts),
    selects: toCount(db.selects),
    updates: toCount(db.updates),
    deletes: toCount(db.deletes)
  };
}

function normalizeExample(example: unknown): EventExample {
  if (typeof example === 'string') return { sql: example };
  if (!isRecord(example)) return {};

  const out: EventExample = {};
  if (typeof example.sql === 'string') out.sql = example.sql;
  if (typeof example.time === 'number') out.time = example.time;
  if (typeof example.location === 'string') out.location = example.location;
  if (Array.isArray(example.backtrace)) {
    out.backtrace = example.backtrace.filter((line): line is string => typeof line === 'string');
  }
  return out;
}

function normalizeEvents(section: RawSection | undefined): Record<string, EventUsage> {
  const normalized: Record<string, EventUsage> = {};
  const events = section?.events;
  if (events === undefined) return normalized;

  if (!isRecord(events)) {
    throw AdvisorErrorFactory.normalizationFailed('event_prof.events', 'Expected an object keyed by event name');
  }

  for (const [name, entry] of Object.entries(events)) {
    const info = isRecord(entry) ? entry : {};
    normalized[name] = {
      count: toCount(info.count),
      time: toDuration(info.time),
      examples: Array.isArray(info.examples) ? info.examples.map(normalizeExample) : []
    };
  }

  return normalized;
}

function extractMetadata(
  factoryProf: RawSection | undefined,
  dbQueries: RawSection | undefined,
  eventProf: RawSection | undefined,
  metadata: RawSection | undefined,
  context: ExampleContext
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...metadata };

  if (context.example_group) out.exampleGroup = context.example_group;
  if (context.tags !== undefined) out.tags = context.tags;
  if (context.description) out.description = context.description;

  if (factoryProf?.error !== undefined) out.factoryProfError = factoryProf.error;
  if (eventProf?.error !== undefined) out.eventProfError = eventProf.error;
  if (dbQueries?.error !== undefined) out.dbQueriesError = dbQueries.error;

  return out;
}

/**
 * Convert raw profiler output for one example into a ProfileRecord
 *
 * @throws AdvisorError NORMALIZATION_FAILED when the input has the wrong shape
 */
export function normalizeProfile(raw: unknown, context: unknown = {}): ProfileRecord {
  const parsedRaw = RawProfileSchema.safeParse(raw);
  if (!parsedRaw.success) {
    const issue = parsedRaw.error.errors[0];
    throw AdvisorErrorFactory.normalizationFailed(
      issue.path.join('.') || 'profile',
      `Profiler output must be an object: ${issue.message}`
    );
  }

  const parsedContext = ExampleContextSchema.safeParse(context);
  if (!parsedContext.success) {
    const issue = parsedContext.error.errors[0];
    throw AdvisorErrorFactory.normalizationFailed(
      `context.${issue.path.join('.')}`,
      issue.message
    );
  }

  const data = parsedRaw.data;
  const ctx = parsedContext.data;
  const location = ctx.location ?? ctx.file_path ?? '';

  try {
    const record = createProfileRecord({
      location,
      specType: inferSpecType(location),
      runtimeMs: extractRuntime(ctx, data.metadata),
      factories: normalizeFactories(data.factory_prof),
      db: normalizeDb(data.db_queries),
      events: normalizeEvents(data.event_prof),
      metadata: extractMetadata(data.factory_prof, data.db_queries, data.event_prof, data.metadata, ctx)
    });

    AdvisorLogger.logNormalization(record);
    return record;
  } catch (error) {
    if (isAdvisorError(error)) throw error;
    throw AdvisorErrorFactory.normalizationFailed(
      'profile',
      error instanceof Error ? error.message : String(error)
    );
  }
}
