/**
 * Intent Agent
 *
 * Classifies whether the example tests a unit in isolation or behaviour that
 * crosses a request boundary.
 */

import { RuleBasedAgent } from './baseAgent';
import { createVerdict } from '../types/builders';
import type { ProfileRecord, SpecType, Verdict } from '../types';

const CROSS_BOUNDARY_PATTERN = /request|controller|process_action|action_dispatch|rack|http/i;

const INTEGRATION_TYPES: readonly SpecType[] = ['request', 'feature', 'system', 'integration'];
const BOUNDARY_TYPES: readonly SpecType[] = ['controller', 'view'];
const UNIT_TYPES: readonly SpecType[] = ['model', 'lib'];

export class IntentAgent extends RuleBasedAgent {
  readonly concern = 'intent' as const;

  protected evaluate(profile: ProfileRecord): Verdict {
    const { specType } = profile;
    const crossBoundary = Object.keys(profile.events).filter(name => CROSS_BOUNDARY_PATTERN.test(name));
    const metadata = { specType, crossBoundaryEvents: crossBoundary };

    if (INTEGRATION_TYPES.includes(specType) || crossBoundary.length > 0) {
      return createVerdict({
        agentName: this.name,
        verdict: 'integration_test_behavior',
        confidence: 'high',
        reasoning: crossBoundary.length > 0
          ? `Cross-boundary events observed (${crossBoundary.join(', ')}); the example exercises the full stack`
          : `${specType} spec exercises behaviour across boundaries`,
        metadata
      });
    }

    if (BOUNDARY_TYPES.includes(specType)) {
      return createVerdict({
        agentName: this.name,
        verdict: 'integration_test_behavior',
        confidence: 'medium',
        reasoning: `${specType} spec likely depends on wiring between layers`,
        metadata
      });
    }

    if (UNIT_TYPES.includes(specType) || specType === 'helper') {
      return createVerdict({
        agentName: this.name,
        verdict: 'unit_test_behavior',
        confidence: specType === 'helper' ? 'medium' : 'high',
        reasoning: `${specType} spec tests a unit in isolation`,
        metadata
      });
    }

    return createVerdict({
      agentName: this.name,
      verdict: 'no_action',
      confidence: 'low',
      reasoning: 'Spec type unknown; test intent cannot be classified',
      metadata
    });
  }
}
