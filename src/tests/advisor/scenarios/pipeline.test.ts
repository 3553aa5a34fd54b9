/**
 * End-to-end analysis scenarios
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { analyzeProfile, analyzeRaw, analyzeBatch } from '../../../advisor/pipeline';
import { AdvisorErrorCode } from '../../../advisor/errors/types';
import { AdvisorLogger, LogType } from '../../../advisor/logging/logger';
import { createVerdict } from '../../../advisor/types/builders';
import type { Agent } from '../../../advisor/agents/types';
import type { ProfileRecord } from '../../../advisor/types';
import {
  persistedUserProfile,
  commitCallbackProfile,
  systemSpecProfile,
  rawPersistedUser
} from '../fixtures';

// Never let a developer's shell leak ADVISOR_* settings into these runs
const env = {};

beforeEach(() => {
  AdvisorLogger.clearLogs();
});

afterEach(() => {
  AdvisorLogger.setEnabled(true);
  AdvisorLogger.setMaxLogs(5000);
});

// ============================================================================
// Single profiles
// ============================================================================

describe('analyzeProfile', () => {
  it('recommends build_stubbed when every insert comes from the factory', async () => {
    const recommendation = await analyzeProfile(persistedUserProfile(), { env });

    expect(recommendation.action).toBe('replace_factory_strategy');
    expect(recommendation.fromValue).toBe('create(:user)');
    expect(recommendation.toValue).toBe('build_stubbed(:user)');
    expect(recommendation.confidence).toBe('high');
    expect(recommendation.agentResults.map(v => v.verdict)).toEqual([
      'no_action',
      'prefer_build_stubbed',
      'unit_test_behavior',
      'safe_to_optimize'
    ]);
  });

  it('does nothing when a commit callback is involved', async () => {
    const recommendation = await analyzeProfile(commitCallbackProfile(), { env });

    expect(recommendation.action).toBe('no_action');
    expect(recommendation.confidence).toBe('low');
    expect(recommendation.explanation[recommendation.explanation.length - 1]).toBe(
      'Vetoed by risk: optimization could change test behaviour'
    );
  });

  it('does nothing for a system spec with mixed signals', async () => {
    const recommendation = await analyzeProfile(systemSpecProfile(), { env });

    expect(recommendation.action).toBe('no_action');
    expect(recommendation.specLocation).toBe('spec/system/checkout_spec.rb:22');
    expect(recommendation.explanation[0].startsWith('Mixed signals:')).toBe(true);
  });

  it('respects the enabled agents', async () => {
    const recommendation = await analyzeProfile(persistedUserProfile(), {
      env,
      config: { enabledAgents: ['factory', 'risk'] }
    });

    expect(recommendation.agentResults.map(v => v.agentName)).toEqual(['factory', 'risk']);
    expect(recommendation.action).toBe('replace_factory_strategy');
    expect(recommendation.explanation[recommendation.explanation.length - 1]).toBe(
      '2 of 2 agents agree: optimize persistence'
    );
  });

  it('lets extra agents take part in the decision', async () => {
    const veto: Agent = {
      name: 'custom_risk',
      concern: 'risk',
      analyze: () => createVerdict({
        agentName: 'custom_risk',
        verdict: 'risk_detected',
        confidence: 'medium',
        reasoning: 'custom rule fired'
      })
    };

    const recommendation = await analyzeProfile(persistedUserProfile(), { env, extraAgents: [veto] });

    expect(recommendation.action).toBe('no_action');
    expect(recommendation.explanation).toEqual([
      'custom rule fired',
      'Vetoed by custom_risk: optimization could change test behaviour'
    ]);
  });

  it('rejects an unsafe configuration before any agent runs', async () => {
    await expect(
      analyzeProfile(persistedUserProfile(), {
        env,
        config: { autoApplyEnabled: true, enforcementMode: true }
      })
    ).rejects.toMatchObject({ code: AdvisorErrorCode.UNSAFE_CONFIGURATION });

    expect(AdvisorLogger.getLogsByType(LogType.ANALYSIS)).toHaveLength(0);
    expect(AdvisorLogger.getLogsByType(LogType.VERDICT)).toHaveLength(0);
  });

  it('reads unsafe flags from the environment too', async () => {
    await expect(
      analyzeProfile(persistedUserProfile(), { env: { ADVISOR_BLOCKING_MODE: 'true' } })
    ).rejects.toMatchObject({
      code: AdvisorErrorCode.UNSAFE_CONFIGURATION,
      technicalDetails: 'Blocking mode requires enforcement mode'
    });
  });

  it('rejects a malformed profile record', async () => {
    const broken: ProfileRecord = { ...persistedUserProfile(), runtimeMs: -1 };

    await expect(analyzeProfile(broken, { env })).rejects.toMatchObject({
      code: AdvisorErrorCode.INVALID_PROFILE,
      technicalDetails: 'runtimeMs: Runtime must be non-negative'
    });
  });

  it('stops recording logs when logging is disabled', async () => {
    await analyzeProfile(persistedUserProfile(), { env, config: { logging: { enabled: false } } });

    expect(AdvisorLogger.getLogs()).toHaveLength(0);
    expect(AdvisorLogger.isEnabled()).toBe(true);
  });

  it('keeps the logging setting of concurrent calls apart', async () => {
    const quiet = persistedUserProfile();
    const loud = systemSpecProfile();

    await Promise.all([
      analyzeProfile(quiet, { env, config: { logging: { enabled: false } } }),
      analyzeProfile(loud, { env, config: { logging: { enabled: true } } })
    ]);

    expect(AdvisorLogger.getLogsForExample('spec/models/user_spec.rb:10')).toEqual([]);
    expect(AdvisorLogger.getLogsForExample('spec/system/checkout_spec.rb:22').map(entry => entry.type)).toContain(
      LogType.DECISION
    );
  });
});

// ============================================================================
// Raw profiler output
// ============================================================================

describe('analyzeRaw', () => {
  it('normalizes then analyzes', async () => {
    const { profile, recommendation } = await analyzeRaw(rawPersistedUser.data, rawPersistedUser.context, { env });

    expect(profile.location).toBe('spec/models/user_spec.rb:4');
    expect(profile.specType).toBe('model');
    expect(profile.runtimeMs).toBe(120);
    expect(profile.factories.user).toEqual({ strategy: 'create', count: 3, time: 0.05 });
    expect(profile.db).toEqual({ totalQueries: 8, inserts: 3, selects: 5, updates: 0, deletes: 0 });

    expect(recommendation.action).toBe('replace_factory_strategy');
    expect(recommendation.specLocation).toBe('spec/models/user_spec.rb:4');
    expect(AdvisorLogger.getLogsByType(LogType.NORMALIZATION)).toHaveLength(1);
  });

  it('fails on output that is not an object', async () => {
    await expect(analyzeRaw('not a profile', {}, { env })).rejects.toMatchObject({
      code: AdvisorErrorCode.NORMALIZATION_FAILED
    });
  });
});

// ============================================================================
// Batches and enforcement
// ============================================================================

describe('analyzeBatch', () => {
  it('analyzes normalized and raw inputs together, in input order', async () => {
    const batch = await analyzeBatch([commitCallbackProfile(), rawPersistedUser], { env });

    expect(batch.results.map(r => r.recommendation.specLocation)).toEqual([
      'spec/models/user_spec.rb:10',
      'spec/models/user_spec.rb:4'
    ]);
    expect(batch.results.map(r => r.recommendation.action)).toEqual(['no_action', 'replace_factory_strategy']);
    expect(batch.enforcement.exitCode).toBe(0);
    expect(batch.enforcement.message).toBe('1 high-confidence recommendation(s); enforcement disabled');
  });

  it('fails the run when enforcement is on and a recommendation is high confidence', async () => {
    const batch = await analyzeBatch([persistedUserProfile(), systemSpecProfile()], {
      env,
      config: { enforcementMode: true, failOnHighConfidence: true }
    });

    expect(batch.enforcement.exitCode).toBe(1);
    expect(batch.enforcement.message).toBe(
      'Enforcement failed: 1 high-confidence recommendation(s): spec/models/user_spec.rb:10'
    );
    expect(batch.status.ciFriendly).toBe(true);
    expect(batch.status.warnings).toEqual([]);
  });

  it('passes when nothing qualifies', async () => {
    const batch = await analyzeBatch([commitCallbackProfile()], {
      env,
      config: { enforcementMode: true, failOnHighConfidence: true }
    });

    expect(batch.enforcement.exitCode).toBe(0);
    expect(batch.enforcement.message).toBe('Enforcement passed: no high-confidence recommendations');
  });

  it('warns when enforcement runs without fail-on-high-confidence', async () => {
    const batch = await analyzeBatch([persistedUserProfile()], { env, config: { enforcementMode: true } });

    expect(batch.enforcement.exitCode).toBe(1);
    expect(batch.status.ciFriendly).toBe(false);
    expect(batch.status.warnings).toEqual([
      'Enforcement mode is enabled without fail-on-high-confidence; CI results may be surprising'
    ]);
  });

  it('turns an invalid profile into a no_action result and keeps the rest', async () => {
    const broken: ProfileRecord = { ...persistedUserProfile(), runtimeMs: -1 };

    const batch = await analyzeBatch([persistedUserProfile(), systemSpecProfile(), broken], { env });

    expect(batch.results.map(r => r.recommendation.action)).toEqual([
      'replace_factory_strategy',
      'no_action',
      'no_action'
    ]);
    const skipped = batch.results[2].recommendation;
    expect(skipped.confidence).toBe('low');
    expect(skipped.agentResults).toEqual([]);
    expect(skipped.explanation).toEqual([
      'Profile could not be analyzed: Profile record validation failed: runtimeMs: Runtime must be non-negative'
    ]);
    expect(batch.enforcement.message).toBe('1 high-confidence recommendation(s); enforcement disabled');
  });

  it('turns output that cannot be normalized into a no_action result', async () => {
    const batch = await analyzeBatch(
      [rawPersistedUser, { data: 'not a profile', context: { location: 'spec/models/broken_spec.rb:3' } }],
      { env, config: { enforcementMode: true, failOnHighConfidence: true } }
    );

    const [, skipped] = batch.results;
    expect(skipped.profile.location).toBe('spec/models/broken_spec.rb:3');
    expect(skipped.recommendation.specLocation).toBe('spec/models/broken_spec.rb:3');
    expect(skipped.recommendation.action).toBe('no_action');
    expect(skipped.recommendation.explanation[0].startsWith(
      'Profile could not be analyzed: Failed to normalize profiler output (profile)'
    )).toBe(true);
    expect(AdvisorLogger.getLogsByType(LogType.ERROR).map(entry => entry.context?.specLocation)).toEqual([
      'spec/models/broken_spec.rb:3'
    ]);

    expect(batch.enforcement.exitCode).toBe(1);
    expect(batch.enforcement.message).toBe(
      'Enforcement failed: 1 high-confidence recommendation(s): spec/models/user_spec.rb:4'
    );
  });

  it('still rejects an unsafe configuration', async () => {
    await expect(
      analyzeBatch([persistedUserProfile()], { env, config: { autoApplyEnabled: true, failOnHighConfidence: true } })
    ).rejects.toMatchObject({ code: AdvisorErrorCode.UNSAFE_CONFIGURATION });
  });

  it('returns the effective configuration', async () => {
    const batch = await analyzeBatch([], { env: { ADVISOR_OUTPUT_FORMAT: 'json' } });

    expect(batch.results).toEqual([]);
    expect(batch.config.outputFormat).toBe('json');
    expect(batch.enforcement.message).toBe('No high-confidence recommendations');
  });
});
