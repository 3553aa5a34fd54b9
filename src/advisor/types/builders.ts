/**
 * Record builders
 *
 * Construct frozen ProfileRecords and Verdicts with every default filled in.
 */

import type {
  DbUsage,
  EventExample,
  EventUsage,
  FactoryUsage,
  ProfileRecord,
  ProfileRecordInput,
  StrategySuggestion,
  Verdict,
  VerdictKind,
  Confidence
} from './index';

/**
 * Non-negative integer, 0 for anything that is not a finite number
 */
export function toCount(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return 0;
  return Math.max(0, Math.floor(value));
}

/**
 * Non-negative number, 0 for anything that is not a finite number
 */
export function toDuration(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return 0;
  return Math.max(0, value);
}

function buildFactory(usage: Partial<FactoryUsage>): FactoryUsage {
  return Object.freeze({
    strategy: usage.strategy ?? 'unknown',
    count: toCount(usage.count),
    time: toDuration(usage.time)
  });
}

function buildExample(example: EventExample): EventExample {
  const copy: EventExample = { ...example };
  if (example.backtrace) {
    copy.backtrace = Object.freeze([...example.backtrace]);
  }
  return Object.freeze(copy);
}

function buildEvent(usage: Partial<EventUsage>): EventUsage {
  const examples = (usage.examples ?? []).map(buildExample);
  return Object.freeze({
    count: toCount(usage.count),
    time: toDuration(usage.time),
    examples: Object.freeze(examples)
  });
}

function buildDb(db: Partial<DbUsage>): DbUsage {
  return Object.freeze({
    totalQueries: toCount(db.totalQueries),
    inserts: toCount(db.inserts),
    selects: toCount(db.selects),
    updates: toCount(db.updates),
    deletes: toCount(db.deletes)
  });
}

function mapValues<I, O>(source: Record<string, I> | undefined, fn: (value: I) => O): Record<string, O> {
  const out: Record<string, O> = {};
  if (!source) return out;
  for (const [key, value] of Object.entries(source)) {
    out[key] = fn(value);
  }
  return out;
}

/**
 * Build an immutable profile record, filling defaults for missing sections
 */
export function createProfileRecord(input: ProfileRecordInput = {}): ProfileRecord {
  return Object.freeze({
    location: input.location ?? '',
    specType: input.specType ?? 'unknown',
    runtimeMs: toDuration(input.runtimeMs),
    factories: Object.freeze(mapValues(input.factories, buildFactory)),
    db: buildDb(input.db ?? {}),
    events: Object.freeze(mapValues(input.events, buildEvent)),
    metadata: Object.freeze({ ...input.metadata })
  });
}

export interface VerdictInput {
  agentName: string;
  verdict: VerdictKind;
  confidence: Confidence;
  reasoning?: string;
  suggestion?: StrategySuggestion;
  metadata?: Record<string, unknown>;
}

/**
 * Build an immutable verdict
 */
export function createVerdict(input: VerdictInput): Verdict {
  const verdict: Verdict = {
    agentName: input.agentName,
    verdict: input.verdict,
    confidence: input.confidence,
    reasoning: input.reasoning ?? '',
    metadata: Object.freeze({ ...input.metadata }),
    ...(input.suggestion ? { suggestion: Object.freeze({ ...input.suggestion }) } : {})
  };
  return Object.freeze(verdict);
}
