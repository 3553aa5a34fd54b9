/**
 * Base class for rule-based agents. Any exception raised while evaluating a
 * profile becomes a low-confidence no_action verdict.
 */

import { GracefulDegradation } from '../errors/gracefulDegradation';
import type { AgentConcern, ProfileRecord, Verdict } from '../types';
import type { Agent } from './types';

export abstract class RuleBasedAgent implements Agent {
  abstract readonly concern: AgentConcern;

  get name(): string {
    return this.concern;
  }

  analyze(profile: ProfileRecord): Verdict {
    try {
      return this.evaluate(profile);
    } catch (error) {
      return GracefulDegradation.handleAgentFailure(this.name, error, profile.location);
    }
  }

  protected abstract evaluate(profile: ProfileRecord): Verdict;
}
