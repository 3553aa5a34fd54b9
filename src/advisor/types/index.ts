/**
 * Advisor Types
 *
 * Canonical data model shared by the agents, the consensus engine and the
 * safety policy:
 * - ProfileRecord: one normalized, immutable snapshot per test example
 * - Verdict: one agent's opinion about one concern
 * - Recommendation: the single, explainable output of one analysis call
 */

// ============================================================================
// Profile Record
// ============================================================================

export const SPEC_TYPES = [
  'model',
  'controller',
  'request',
  'feature',
  'integration',
  'system',
  'lib',
  'helper',
  'view',
  'unknown'
] as const;

export type SpecType = typeof SPEC_TYPES[number];

export const FACTORY_STRATEGIES = ['create', 'build', 'build_stubbed', 'unknown'] as const;

/**
 * Fixture-construction mode of a factory
 */
export type FactoryStrategy = typeof FACTORY_STRATEGIES[number];

export interface FactoryUsage {
  strategy: FactoryStrategy;
  count: number;
  time: number;
}

/**
 * Database counters. totalQueries is reported by the driver and need not
 * equal the sum of the other counters.
 */
export interface DbUsage {
  totalQueries: number;
  inserts: number;
  selects: number;
  updates: number;
  deletes: number;
}

export interface EventExample {
  sql?: string;
  time?: number;
  location?: string;
  backtrace?: readonly string[];
}

export interface EventUsage {
  count: number;
  time: number;
  examples: readonly EventExample[];
}

export interface ProfileRecord {
  readonly location: string;
  readonly specType: SpecType;
  readonly runtimeMs: number;
  readonly factories: Readonly<Record<string, FactoryUsage>>;
  readonly db: Readonly<DbUsage>;
  readonly events: Readonly<Record<string, EventUsage>>;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * Partial input accepted by createProfileRecord
 */
export interface ProfileRecordInput {
  location?: string;
  specType?: SpecType;
  runtimeMs?: number;
  factories?: Record<string, Partial<FactoryUsage>>;
  db?: Partial<DbUsage>;
  events?: Record<string, Partial<EventUsage>>;
  metadata?: Record<string, unknown>;
}

// ============================================================================
// Verdict
// ============================================================================

export const CONFIDENCE_LEVELS = ['high', 'medium', 'low'] as const;

export type Confidence = typeof CONFIDENCE_LEVELS[number];

export const VERDICT_KINDS = [
  'db_unnecessary',
  'db_required',
  'prefer_build_stubbed',
  'unit_test_behavior',
  'integration_test_behavior',
  'safe_to_optimize',
  'risk_detected',
  'no_action'
] as const;

export type VerdictKind = typeof VERDICT_KINDS[number];

/**
 * The concern an agent scores. Rule-based and generative agents share the
 * same four concerns.
 */
export type AgentConcern = 'database' | 'factory' | 'intent' | 'risk';

export const AGENT_CONCERNS: readonly AgentConcern[] = ['database', 'factory', 'intent', 'risk'];

/**
 * Concrete before/after material for a factory strategy change
 */
export interface StrategySuggestion {
  factory: string;
  fromValue: string;
  toValue: string;
}

/**
 * Output of one agent for one profile (a.k.a. AgentResult)
 */
export interface Verdict {
  readonly agentName: string;
  readonly verdict: VerdictKind;
  readonly confidence: Confidence;
  readonly reasoning: string;
  readonly suggestion?: Readonly<StrategySuggestion>;
  readonly metadata: Readonly<Record<string, unknown>>;
}

// ============================================================================
// Recommendation
// ============================================================================

export const RECOMMENDATION_ACTIONS = [
  'replace_factory_strategy',
  'avoid_db_persistence',
  'optimize_queries',
  'review_test_intent',
  'assess_risk_factors',
  'no_action'
] as const;

export type RecommendationAction = typeof RECOMMENDATION_ACTIONS[number];

export interface Recommendation {
  readonly specLocation: string;
  readonly action: RecommendationAction;
  readonly fromValue: string;
  readonly toValue: string;
  readonly confidence: Confidence;
  readonly explanation: readonly string[];
  readonly agentResults: readonly Verdict[];
}

// ============================================================================
// Configuration
// ============================================================================

export interface AgentThresholds {
  risk: {
    /** Distinct callback events that make a multi-step chain */
    callbackChainLength: number;
  };
}

export type OutputFormat = 'console' | 'json';

export interface LlmAgentSettings {
  enabled: boolean;
  provider: 'anthropic' | 'openai';
  model?: string;
  concerns: AgentConcern[];
  timeoutMs: number;
}

/**
 * Options consumed by one analysis call
 */
export interface AdvisorConfig {
  enabledAgents: AgentConcern[];
  enforcementMode: boolean;
  failOnHighConfidence: boolean;
  autoApplyEnabled: boolean;
  blockingModeEnabled: boolean;
  thresholds: AgentThresholds;
  llm: LlmAgentSettings;
  outputFormat: OutputFormat;
  logging: {
    enabled: boolean;
    maxLogs: number;
  };
}
export * from './builders';
