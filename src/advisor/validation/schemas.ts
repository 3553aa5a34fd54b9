/**
 * Advisor Validation Schemas
 *
 * Zod schemas for every boundary of the advisor: normalized profiles coming
 * in, verdicts flowing from agents to consensus, recommendations going out,
 * configuration, and responses from generative-model agents.
 */

import { z } from 'zod';
import {
  SPEC_TYPES,
  FACTORY_STRATEGIES,
  CONFIDENCE_LEVELS,
  VERDICT_KINDS,
  RECOMMENDATION_ACTIONS
} from '../types';

const count = (field: string) =>
  z.number().int(`${field} must be an integer`).nonnegative(`${field} must be non-negative`);

// ============================================================================
// Profile Record Schemas
// ============================================================================

export const SpecTypeSchema = z.enum(SPEC_TYPES);

export const FactoryStrategySchema = z.enum(FACTORY_STRATEGIES);

export const FactoryUsageSchema = z.object({
  strategy: FactoryStrategySchema,
  count: count('Factory count'),
  time: z.number().nonnegative('Factory time must be non-negative')
});

export const DbUsageSchema = z.object({
  totalQueries: count('totalQueries'),
  inserts: count('inserts'),
  selects: count('selects'),
  updates: count('updates'),
  deletes: count('deletes')
});

export const EventExampleSchema = z.object({
  sql: z.string().optional(),
  time: z.number().optional(),
  location: z.string().optional(),
  backtrace: z.array(z.string()).optional()
});

export const EventUsageSchema = z.object({
  count: count('Event count'),
  time: z.number().nonnegative('Event time must be non-negative'),
  examples: z.array(EventExampleSchema)
});

/**
 * Normalized profile record - location may be empty when unknown
 */
export const ProfileRecordSchema = z.object({
  location: z.string(),
  specType: SpecTypeSchema,
  runtimeMs: z.number().finite().nonnegative('Runtime must be non-negative'),
  factories: z.record(FactoryUsageSchema),
  db: DbUsageSchema,
  events: z.record(EventUsageSchema),
  metadata: z.record(z.unknown())
});

// ============================================================================
// Verdict Schemas
// ============================================================================

export const ConfidenceSchema = z.enum(CONFIDENCE_LEVELS);

export const VerdictKindSchema = z.enum(VERDICT_KINDS);

export const StrategySuggestionSchema = z.object({
  factory: z.string().trim().min(1, 'Factory name is required'),
  fromValue: z.string().trim().min(1, 'fromValue is required'),
  toValue: z.string().trim().min(1, 'toValue is required')
});

export const VerdictSchema = z
  .object({
    agentName: z.string().trim().min(1, 'Agent name is required'),
    verdict: VerdictKindSchema,
    confidence: ConfidenceSchema,
    reasoning: z.string(),
    suggestion: StrategySuggestionSchema.optional(),
    metadata: z.record(z.unknown())
  })
  .refine(v => v.verdict === 'no_action' || v.reasoning.trim().length > 0, {
    message: 'Reasoning is required for actionable verdicts',
    path: ['reasoning']
  });

// ============================================================================
// Recommendation Schemas
// ============================================================================

export const RecommendationActionSchema = z.enum(RECOMMENDATION_ACTIONS);

export const RecommendationSchema = z.object({
  specLocation: z.string(),
  action: RecommendationActionSchema,
  fromValue: z.string(),
  toValue: z.string(),
  confidence: ConfidenceSchema,
  explanation: z.array(z.string()),
  agentResults: z.array(VerdictSchema)
});

// ============================================================================
// Configuration Schemas
// ============================================================================

export const AgentConcernSchema = z.enum(['database', 'factory', 'intent', 'risk']);

export const AdvisorConfigSchema = z.object({
  enabledAgents: z.array(AgentConcernSchema),
  enforcementMode: z.boolean(),
  failOnHighConfidence: z.boolean(),
  autoApplyEnabled: z.boolean(),
  blockingModeEnabled: z.boolean(),
  thresholds: z.object({
    risk: z.object({
      callbackChainLength: z.number().int().min(1, 'Callback chain length must be at least 1')
    })
  }),
  llm: z.object({
    enabled: z.boolean(),
    provider: z.enum(['anthropic', 'openai']),
    model: z.string().trim().min(1).optional(),
    concerns: z.array(AgentConcernSchema),
    timeoutMs: z.number().int().positive('LLM timeout must be positive')
  }),
  outputFormat: z.enum(['console', 'json']),
  logging: z.object({
    enabled: z.boolean(),
    maxLogs: z.number().int().positive()
  })
});

// ============================================================================
// Generative-model Response Schema
// ============================================================================

/**
 * Response expected from a generative-model agent
 */
export const LlmVerdictResponseSchema = z.object({
  verdict: VerdictKindSchema,
  confidence: ConfidenceSchema,
  reasoning: z.string().trim().min(1, 'Reasoning is required'),
  suggestion: z
    .object({
      factory: z.string().trim().min(1),
      fromValue: z.string().trim().min(1),
      toValue: z.string().trim().min(1)
    })
    .optional(),
  metadata: z.record(z.unknown()).optional()
});

// ============================================================================
// Type exports
// ============================================================================

export type LlmVerdictResponse = z.infer<typeof LlmVerdictResponseSchema>;
