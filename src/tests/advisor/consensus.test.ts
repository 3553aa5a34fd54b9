/**
 * Tests for the Consensus Engine
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  buildRecommendation,
  combineConfidence,
  tallyVerdicts
} from '../../advisor/consensus/engine';
import { AgentRegistry } from '../../advisor/agents/registry';
import { DEFAULT_CONFIG } from '../../advisor/config';
import { createProfileRecord } from '../../advisor/types/builders';
import { AdvisorLogger, LogType } from '../../advisor/logging/logger';
import type { Verdict } from '../../advisor/types';
import {
  persistedUserProfile,
  commitCallbackProfile,
  systemSpecProfile,
  verdict,
  stubbedUser
} from './fixtures';

const profile = createProfileRecord({ location: 'spec/models/user_spec.rb:1', specType: 'model' });

beforeEach(() => {
  AdvisorLogger.clearLogs();
});

// ============================================================================
// Veto
// ============================================================================

describe('Veto', () => {
  it('should turn any risk_detected into a low-confidence no_action', () => {
    const verdicts: Verdict[] = [
      verdict({ agentName: 'factory', verdict: 'prefer_build_stubbed', suggestion: stubbedUser }),
      verdict({ agentName: 'intent', verdict: 'unit_test_behavior' }),
      verdict({ agentName: 'database', verdict: 'db_unnecessary' }),
      verdict({ agentName: 'risk', verdict: 'risk_detected', reasoning: 'after_commit present' })
    ];

    const result = buildRecommendation(profile, verdicts);

    expect(result.action).toBe('no_action');
    expect(result.confidence).toBe('low');
    expect(result.fromValue).toBe('');
    expect(result.toValue).toBe('');
    expect(result.explanation).toEqual([
      'after_commit present',
      'Vetoed by risk: optimization could change test behaviour'
    ]);
  });
});

// ============================================================================
// Aggregation and quorum
// ============================================================================

describe('Quorum', () => {
  it('should return no_action when there are no verdicts', () => {
    const result = buildRecommendation(profile, []);

    expect(result.action).toBe('no_action');
    expect(result.confidence).toBe('low');
    expect(result.explanation).toEqual(['No agent verdicts available']);
    expect(result.agentResults).toEqual([]);
  });

  it('should report mixed signals naming both sides', () => {
    const result = buildRecommendation(profile, [
      verdict({ agentName: 'database', verdict: 'db_unnecessary', reasoning: 'no inserts' }),
      verdict({ agentName: 'intent', verdict: 'integration_test_behavior', reasoning: 'system spec' })
    ]);

    expect(result.action).toBe('no_action');
    expect(result.confidence).toBe('low');
    expect(result.explanation).toEqual([
      'Mixed signals: database (db_unnecessary) support optimization; intent (integration_test_behavior) oppose it',
      'system spec'
    ]);
  });

  it('should not act on opposition alone', () => {
    const result = buildRecommendation(profile, [
      verdict({ agentName: 'database', verdict: 'db_required', reasoning: 'user reloaded' })
    ]);

    expect(result.action).toBe('no_action');
    expect(result.explanation).toEqual(['Optimization opposed by database (db_required)', 'user reloaded']);
  });

  it('should require two distinct supporting agents', () => {
    const result = buildRecommendation(profile, [
      verdict({ agentName: 'factory', verdict: 'prefer_build_stubbed', suggestion: stubbedUser }),
      verdict({ agentName: 'factory', verdict: 'prefer_build_stubbed', suggestion: stubbedUser }),
      verdict({ agentName: 'database', verdict: 'no_action', confidence: 'low' })
    ]);

    expect(result.action).toBe('no_action');
    expect(result.explanation).toEqual([
      'Only 1 agent supports optimization (factory (prefer_build_stubbed), factory (prefer_build_stubbed)); 2 required'
    ]);
  });

  it('should not act without a concrete factory change', () => {
    const result = buildRecommendation(profile, [
      verdict({ agentName: 'database', verdict: 'db_unnecessary', reasoning: 'no inserts' }),
      verdict({ agentName: 'risk', verdict: 'safe_to_optimize', reasoning: 'no callbacks' })
    ]);

    expect(result.action).toBe('no_action');
    expect(result.confidence).toBe('low');
    expect(result.explanation).toEqual([
      'no inserts',
      'no callbacks',
      '2 agents agree but none proposes a concrete factory change'
    ]);
  });

  it('should treat no_action verdicts as abstentions', () => {
    const result = buildRecommendation(profile, [
      verdict({ agentName: 'database', verdict: 'no_action', confidence: 'low', reasoning: 'inserts seen' }),
      verdict({ agentName: 'factory', verdict: 'prefer_build_stubbed', suggestion: stubbedUser, reasoning: 'stub it' }),
      verdict({ agentName: 'risk', verdict: 'safe_to_optimize', reasoning: 'no callbacks' })
    ]);

    expect(result.action).toBe('replace_factory_strategy');
    expect(result.fromValue).toBe('create(:user)');
    expect(result.toValue).toBe('build_stubbed(:user)');
    expect(result.explanation).toEqual([
      'stub it',
      'no callbacks',
      '2 of 3 agents agree: optimize persistence'
    ]);
  });

  it('should drop malformed verdicts', () => {
    const malformed: Verdict = { ...verdict({ agentName: 'intent', verdict: 'unit_test_behavior' }), reasoning: ' ' };

    const result = buildRecommendation(profile, [
      verdict({ agentName: 'factory', verdict: 'prefer_build_stubbed', suggestion: stubbedUser }),
      malformed
    ]);

    expect(result.action).toBe('no_action');
    expect(result.agentResults.map(v => v.agentName)).toEqual(['factory']);
  });
});

// ============================================================================
// Confidence and ordering
// ============================================================================

describe('Confidence', () => {
  it('should combine supporter confidence', () => {
    const high = verdict({ agentName: 'a', verdict: 'safe_to_optimize', confidence: 'high' });
    const medium = verdict({ agentName: 'b', verdict: 'safe_to_optimize', confidence: 'medium' });
    const low = verdict({ agentName: 'c', verdict: 'safe_to_optimize', confidence: 'low' });

    expect(combineConfidence([high, high])).toBe('high');
    expect(combineConfidence([high, medium])).toBe('medium');
    expect(combineConfidence([high, medium, low])).toBe('low');
    expect(combineConfidence([])).toBe('low');
  });

  it('should lower an actionable recommendation to the weakest supporter', () => {
    const result = buildRecommendation(profile, [
      verdict({ agentName: 'factory', verdict: 'prefer_build_stubbed', confidence: 'medium', suggestion: stubbedUser }),
      verdict({ agentName: 'intent', verdict: 'unit_test_behavior', confidence: 'high' })
    ]);

    expect(result.action).toBe('replace_factory_strategy');
    expect(result.confidence).toBe('medium');
  });

  it('should order agent results canonically regardless of input order', () => {
    const result = buildRecommendation(profile, [
      verdict({ agentName: 'llm_factory', verdict: 'no_action', confidence: 'low' }),
      verdict({ agentName: 'risk', verdict: 'safe_to_optimize' }),
      verdict({ agentName: 'intent', verdict: 'unit_test_behavior' }),
      verdict({ agentName: 'database', verdict: 'db_unnecessary' }),
      verdict({ agentName: 'factory', verdict: 'prefer_build_stubbed', suggestion: stubbedUser })
    ]);

    expect(result.agentResults.map(v => v.agentName)).toEqual([
      'database',
      'factory',
      'intent',
      'risk',
      'llm_factory'
    ]);
    expect(result.explanation[result.explanation.length - 1]).toBe('4 of 5 agents agree: optimize persistence');
  });

  it('should tally verdicts by role', () => {
    const tally = tallyVerdicts([
      verdict({ agentName: 'database', verdict: 'db_required' }),
      verdict({ agentName: 'factory', verdict: 'no_action', confidence: 'low' }),
      verdict({ agentName: 'intent', verdict: 'unit_test_behavior' }),
      verdict({ agentName: 'risk', verdict: 'risk_detected' })
    ]);

    expect(tally.opposers.map(v => v.agentName)).toEqual(['database']);
    expect(tally.abstainers.map(v => v.agentName)).toEqual(['factory']);
    expect(tally.supporters.map(v => v.agentName)).toEqual(['intent']);
    expect(tally.vetoes.map(v => v.agentName)).toEqual(['risk']);
  });

  it('should freeze the recommendation and log the decision', () => {
    const result = buildRecommendation(profile, []);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.explanation)).toBe(true);
    expect(AdvisorLogger.getLogsByType(LogType.DECISION)).toHaveLength(1);
  });
});

// ============================================================================
// End-to-end scenarios with the rule-based agents
// ============================================================================

describe('Scenarios', () => {
  const registry = AgentRegistry.fromConfig(DEFAULT_CONFIG);

  it('should replace create with build_stubbed for a persisted model fixture', async () => {
    const record = persistedUserProfile();
    const result = buildRecommendation(record, await registry.run(record));

    expect(result.action).toBe('replace_factory_strategy');
    expect(result.fromValue).toBe('create(:user)');
    expect(result.toValue).toBe('build_stubbed(:user)');
    expect(result.confidence).toBe('high');
    expect(result.specLocation).toBe('spec/models/user_spec.rb:10');
    expect(result.explanation).toEqual([
      'create(:user) used 3 times; build_stubbed(:user) avoids the insert',
      'model spec tests a unit in isolation',
      'No commit callbacks or callback chains detected',
      '3 of 4 agents agree: optimize persistence'
    ]);
  });

  it('should veto when a commit callback is present', async () => {
    const record = commitCallbackProfile();
    const verdicts = await registry.run(record);
    const result = buildRecommendation(record, verdicts);

    expect(verdicts.find(v => v.agentName === 'risk')?.verdict).toBe('risk_detected');
    expect(result.action).toBe('no_action');
    expect(result.confidence).toBe('low');
    expect(result.explanation).toEqual([
      'Optimization unsafe: commit-dependent callbacks (after_commit.active_record)',
      'Vetoed by risk: optimization could change test behaviour'
    ]);
  });

  it('should report mixed signals for a system spec', async () => {
    const record = systemSpecProfile();
    const verdicts = await registry.run(record);
    const result = buildRecommendation(record, verdicts);

    expect(verdicts.map(v => v.verdict)).toEqual([
      'db_unnecessary',
      'no_action',
      'integration_test_behavior',
      'safe_to_optimize'
    ]);
    expect(result.action).toBe('no_action');
    expect(result.confidence).toBe('low');
    expect(result.explanation[0]).toBe(
      'Mixed signals: database (db_unnecessary), risk (safe_to_optimize) support optimization; ' +
      'intent (integration_test_behavior) oppose it'
    );
  });
});
