/**
 * Risk Agent
 *
 * Flags examples where replacing persisted fixtures could change behaviour.
 * A risk_detected verdict vetoes any recommendation.
 */

import { RuleBasedAgent } from './baseAgent';
import { eventList, eventMatches } from './signals';
import { createVerdict } from '../types/builders';
import type { AgentThresholds, ProfileRecord, Verdict } from '../types';

const COMMIT_PATTERN = /after_commit|after_\w+_commit|commit_callback/i;
const CALLBACK_PATTERN = /(before|after)_(save|create|update|destroy)|callback/i;

const COMMIT_FLAGS = ['afterCommit', 'commitCallbacks'] as const;
const CHAIN_FLAGS = ['chainedCallbacks', 'nestedOperations'] as const;

export const DEFAULT_RISK_THRESHOLDS: AgentThresholds['risk'] = { callbackChainLength: 2 };

export class RiskAgent extends RuleBasedAgent {
  readonly concern = 'risk' as const;

  constructor(private readonly thresholds: AgentThresholds['risk'] = DEFAULT_RISK_THRESHOLDS) {
    super();
  }

  protected evaluate(profile: ProfileRecord): Verdict {
    const events = eventList(profile);
    const indicators: string[] = [];

    const commitEvents = events.filter(e => eventMatches(e.name, e.usage, COMMIT_PATTERN)).map(e => e.name);
    if (commitEvents.length > 0) {
      indicators.push(`commit-dependent callbacks (${commitEvents.join(', ')})`);
    }

    for (const flag of COMMIT_FLAGS) {
      if (profile.metadata[flag]) indicators.push(`commit-dependent callbacks flagged (${flag})`);
    }

    const callbackEvents = events.filter(e => CALLBACK_PATTERN.test(e.name)).map(e => e.name);
    if (callbackEvents.length >= this.thresholds.callbackChainLength) {
      indicators.push(`callback chain of ${callbackEvents.length} events (${callbackEvents.join(', ')})`);
    }

    for (const flag of CHAIN_FLAGS) {
      if (profile.metadata[flag]) indicators.push(`multi-step callback chain flagged (${flag})`);
    }

    if (indicators.length > 0) {
      return createVerdict({
        agentName: this.name,
        verdict: 'risk_detected',
        confidence: 'high',
        reasoning: `Optimization unsafe: ${indicators.join('; ')}`,
        metadata: { indicators, commitEvents, callbackEvents }
      });
    }

    return createVerdict({
      agentName: this.name,
      verdict: 'safe_to_optimize',
      confidence: 'high',
      reasoning: 'No commit callbacks or callback chains detected',
      metadata: { indicators, callbackEvents }
    });
  }
}
