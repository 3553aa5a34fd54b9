/**
 * Analysis Pipeline
 *
 * configuration (fatal if unsafe) → normalize → agents → consensus → enforcement
 */

import { loadConfig } from './config';
import type { AdvisorConfigInput } from './config';
import { AdvisorErrorCode, AdvisorErrorFactory, isAdvisorError } from './errors/types';
import { AdvisorLogger } from './logging/logger';
import { AgentRegistry } from './agents/registry';
import { buildRecommendation, unanalyzedRecommendation } from './consensus/engine';
import { evaluateEnforcement } from './safety/enforcement';
import { enforcementStatus } from './safety/safetyPolicy';
import type { EnforcementResult } from './safety/enforcement';
import type { EnforcementStatus } from './safety/safetyPolicy';
import { contextLocation, normalizeProfile } from './normalizer/profileNormalizer';
import { createProfileRecord } from './types/builders';
import { profileRecordValidator } from './validation/validator';
import { createExampleLogger } from '../shared/logger';
import type { LLMCompleter } from '../shared/llm/types';
import type { Agent } from './agents/types';
import type { AdvisorConfig, ProfileRecord, Recommendation } from './types';

export interface AnalyzeOptions {
  config?: AdvisorConfigInput;
  /** Environment read for ADVISOR_* settings, process.env by default */
  env?: NodeJS.ProcessEnv;
  llmClient?: LLMCompleter;
  extraAgents?: readonly Agent[];
}

export interface RawProfileInput {
  data: unknown;
  context?: unknown;
}

export interface AnalysisResult {
  profile: ProfileRecord;
  recommendation: Recommendation;
}

export interface BatchResult {
  results: AnalysisResult[];
  enforcement: EnforcementResult;
  status: EnforcementStatus;
  config: AdvisorConfig;
}

/** Per-profile failures that become a no_action result inside a batch */
const BATCH_RECOVERABLE: readonly AdvisorErrorCode[] = [
  AdvisorErrorCode.INVALID_PROFILE,
  AdvisorErrorCode.NORMALIZATION_FAILED
];

/**
 * Validate configuration and build the agents for one analysis call
 */
function prepare(options: AnalyzeOptions): { config: AdvisorConfig; registry: AgentRegistry } {
  const config = loadConfig(options.config, options.env ?? process.env);
  const registry = AgentRegistry.fromConfig(config, {
    llmClient: options.llmClient,
    extraAgents: options.extraAgents
  });
  return { config, registry };
}

/**
 * Run one call's work with that call's audit logging switch
 */
function audited<T>(config: AdvisorConfig, fn: () => Promise<T>): Promise<T> {
  return AdvisorLogger.runScoped({ enabled: config.logging.enabled }, fn);
}

async function analyzeWith(registry: AgentRegistry, profile: ProfileRecord): Promise<Recommendation> {
  const validation = profileRecordValidator.validate(profile);
  if (!validation.isValid) {
    throw AdvisorErrorFactory.invalidProfile(validation.errors);
  }

  const log = createExampleLogger(profile.location);
  const verdicts = await registry.run(profile);
  const recommendation = buildRecommendation(profile, verdicts);
  log.debug(
    { action: recommendation.action, confidence: recommendation.confidence },
    'Recommendation built'
  );
  return recommendation;
}

/**
 * Analyze one batch input. A profile that cannot be normalized or validated
 * yields a no_action result instead of failing the batch.
 */
async function analyzeInput(
  registry: AgentRegistry,
  input: ProfileRecord | RawProfileInput
): Promise<AnalysisResult> {
  try {
    const profile = isRawInput(input) ? normalizeProfile(input.data, input.context ?? {}) : input;
    return { profile, recommendation: await analyzeWith(registry, profile) };
  } catch (error) {
    if (!isAdvisorError(error) || !BATCH_RECOVERABLE.includes(error.code)) {
      throw error;
    }

    const profile = isRawInput(input)
      ? createProfileRecord({ location: contextLocation(input.context) })
      : input;
    AdvisorLogger.logError(error, { specLocation: profile.location, operation: 'analyzeBatch' });
    createExampleLogger(profile.location).warn({ code: error.code }, 'Profile skipped');

    return {
      profile,
      recommendation: unanalyzedRecommendation(profile, `${error.userMessage}: ${error.technicalDetails}`)
    };
  }
}

/**
 * Analyze one normalized profile
 *
 * @throws AdvisorError UNSAFE_CONFIGURATION or CONFIGURATION_ERROR before any agent runs,
 * INVALID_PROFILE for a malformed record
 */
export async function analyzeProfile(
  profile: ProfileRecord,
  options: AnalyzeOptions = {}
): Promise<Recommendation> {
  const { config, registry } = prepare(options);
  return audited(config, () => analyzeWith(registry, profile));
}

/**
 * Normalize raw profiler output, then analyze it
 */
export async function analyzeRaw(
  raw: unknown,
  context: unknown = {},
  options: AnalyzeOptions = {}
): Promise<AnalysisResult> {
  const { config, registry } = prepare(options);
  return audited(config, async () => {
    const profile = normalizeProfile(raw, context);
    return { profile, recommendation: await analyzeWith(registry, profile) };
  });
}

/**
 * Analyze many profiles concurrently and compute the enforcement exit status.
 * Only configuration errors reject; a bad profile becomes a no_action result.
 */
export async function analyzeBatch(
  inputs: ReadonlyArray<ProfileRecord | RawProfileInput>,
  options: AnalyzeOptions = {}
): Promise<BatchResult> {
  const { config, registry } = prepare(options);
  const status = enforcementStatus(config);

  return audited(config, async () => {
    const results = await Promise.all(inputs.map(input => analyzeInput(registry, input)));

    const enforcement = evaluateEnforcement(
      results.map(r => r.recommendation),
      config.enforcementMode
    );

    return { results, enforcement, status, config };
  });
}

function isRawInput(input: ProfileRecord | RawProfileInput): input is RawProfileInput {
  return 'data' in input;
}
