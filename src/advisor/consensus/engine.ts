/**
 * Consensus Engine
 *
 * Reconciles agent verdicts into one recommendation. Decision order:
 * 1. Veto: any risk_detected forces no_action
 * 2. Aggregation: supporting, opposing and abstaining verdicts
 * 3. Quorum: at least two distinct supporters and no opposition
 * 4. Confidence: weakest supporter decides
 * 5. Action: from the first supporter carrying a factory suggestion
 *
 * Pure and deterministic: no clock, no randomness, nothing shared between calls.
 */

import { AdvisorLogger } from '../logging/logger';
import { isWellFormedVerdict } from '../validation/validator';
import { sortByCanonicalOrder } from '../agents/types';
import type { Confidence, ProfileRecord, Recommendation, Verdict, VerdictKind } from '../types';

export const SUPPORTING_VERDICTS: readonly VerdictKind[] = [
  'db_unnecessary',
  'prefer_build_stubbed',
  'unit_test_behavior',
  'safe_to_optimize'
];

export const OPPOSING_VERDICTS: readonly VerdictKind[] = ['db_required', 'integration_test_behavior'];

/** Distinct supporting agents needed before anything is recommended */
export const QUORUM = 2;

export interface VerdictTally {
  supporters: Verdict[];
  opposers: Verdict[];
  abstainers: Verdict[];
  vetoes: Verdict[];
}

export function tallyVerdicts(verdicts: readonly Verdict[]): VerdictTally {
  const tally: VerdictTally = { supporters: [], opposers: [], abstainers: [], vetoes: [] };
  for (const verdict of verdicts) {
    if (verdict.verdict === 'risk_detected') tally.vetoes.push(verdict);
    else if (SUPPORTING_VERDICTS.includes(verdict.verdict)) tally.supporters.push(verdict);
    else if (OPPOSING_VERDICTS.includes(verdict.verdict)) tally.opposers.push(verdict);
    else tally.abstainers.push(verdict);
  }
  return tally;
}

/**
 * All high → high; no low but some medium → medium; otherwise low
 */
export function combineConfidence(verdicts: readonly Verdict[]): Confidence {
  if (verdicts.length === 0) return 'low';
  if (verdicts.some(v => v.confidence === 'low')) return 'low';
  if (verdicts.some(v => v.confidence === 'medium')) return 'medium';
  return 'high';
}

function distinctAgents(verdicts: readonly Verdict[]): string[] {
  return [...new Set(verdicts.map(v => v.agentName))];
}

function describe(verdicts: readonly Verdict[]): string {
  return verdicts.map(v => `${v.agentName} (${v.verdict})`).join(', ');
}

function noAction(
  profile: ProfileRecord,
  explanation: string[],
  agentResults: readonly Verdict[]
): Recommendation {
  return {
    specLocation: profile.location,
    action: 'no_action',
    fromValue: '',
    toValue: '',
    confidence: 'low',
    explanation,
    agentResults
  };
}

function decide(profile: ProfileRecord, agentResults: Verdict[]): Recommendation {
  if (agentResults.length === 0) {
    return noAction(profile, ['No agent verdicts available'], agentResults);
  }

  const tally = tallyVerdicts(agentResults);

  if (tally.vetoes.length > 0) {
    return noAction(
      profile,
      [
        ...tally.vetoes.map(v => v.reasoning),
        `Vetoed by ${distinctAgents(tally.vetoes).join(', ')}: optimization could change test behaviour`
      ],
      agentResults
    );
  }

  const supporters = distinctAgents(tally.supporters);

  if (tally.opposers.length > 0) {
    const explanation = tally.supporters.length > 0
      ? [
          `Mixed signals: ${describe(tally.supporters)} support optimization; ${describe(tally.opposers)} oppose it`
        ]
      : [`Optimization opposed by ${describe(tally.opposers)}`];
    return noAction(profile, [...explanation, ...tally.opposers.map(v => v.reasoning)], agentResults);
  }

  if (supporters.length < QUORUM) {
    return noAction(
      profile,
      [
        supporters.length === 0
          ? 'No agent supports optimization'
          : `Only ${supporters.length} agent supports optimization (${describe(tally.supporters)}); ${QUORUM} required`
      ],
      agentResults
    );
  }

  const suggesting = tally.supporters.find(v => v.verdict === 'prefer_build_stubbed' && v.suggestion !== undefined);
  if (!suggesting?.suggestion) {
    return noAction(
      profile,
      [
        ...tally.supporters.map(v => v.reasoning),
        `${supporters.length} agents agree but none proposes a concrete factory change`
      ],
      agentResults
    );
  }

  return {
    specLocation: profile.location,
    action: 'replace_factory_strategy',
    fromValue: suggesting.suggestion.fromValue,
    toValue: suggesting.suggestion.toValue,
    confidence: combineConfidence(tally.supporters),
    explanation: [
      ...tally.supporters.map(v => v.reasoning),
      `${supporters.length} of ${distinctAgents(agentResults).length} agents agree: optimize persistence`
    ],
    agentResults
  };
}

/**
 * Build the recommendation for one profile from its agents' verdicts.
 * Malformed verdicts are dropped before deciding.
 */
export function buildRecommendation(profile: ProfileRecord, verdicts: readonly Verdict[]): Recommendation {
  const wellFormed = verdicts.filter(v => isWellFormedVerdict(v));
  if (wellFormed.length !== verdicts.length) {
    AdvisorLogger.logInfo('Dropped malformed verdicts', {
      specLocation: profile.location,
      dropped: verdicts.length - wellFormed.length
    });
  }

  return record(decide(profile, sortByCanonicalOrder(wellFormed)));
}

/**
 * Low-confidence no_action for a profile that never reached the agents
 */
export function unanalyzedRecommendation(profile: ProfileRecord, reason: string): Recommendation {
  return record(noAction(profile, [`Profile could not be analyzed: ${reason}`], []));
}

function record(recommendation: Recommendation): Recommendation {
  const frozen: Recommendation = Object.freeze({
    ...recommendation,
    explanation: Object.freeze([...recommendation.explanation]),
    agentResults: Object.freeze([...recommendation.agentResults])
  });

  AdvisorLogger.logDecision(frozen);
  return frozen;
}
