/**
 * Enforcement
 *
 * Maps a batch of recommendations to a process exit status.
 */

import { AdvisorLogger } from '../logging/logger';
import { isActionable } from '../validation/validator';
import type { Recommendation } from '../types';

export interface EnforcementResult {
  exitCode: 0 | 1;
  /** Recommendations that are both actionable and high confidence */
  qualifying: Recommendation[];
  message: string;
}

/**
 * Exit code is 1 only when enforcement is on and at least one recommendation
 * is high confidence and actionable.
 */
export function evaluateEnforcement(
  recommendations: readonly Recommendation[],
  enforcementMode: boolean
): EnforcementResult {
  const qualifying = recommendations.filter(r => r.confidence === 'high' && isActionable(r));

  let result: EnforcementResult;
  if (!enforcementMode) {
    result = {
      exitCode: 0,
      qualifying,
      message: qualifying.length > 0
        ? `${qualifying.length} high-confidence recommendation(s); enforcement disabled`
        : 'No high-confidence recommendations'
    };
  } else if (qualifying.length > 0) {
    result = {
      exitCode: 1,
      qualifying,
      message: `Enforcement failed: ${qualifying.length} high-confidence recommendation(s): ${qualifying
        .map(r => r.specLocation || '(unknown location)')
        .join(', ')}`
    };
  } else {
    result = {
      exitCode: 0,
      qualifying,
      message: 'Enforcement passed: no high-confidence recommendations'
    };
  }

  AdvisorLogger.logEnforcement(result.exitCode, qualifying.length, recommendations.length);
  return result;
}
