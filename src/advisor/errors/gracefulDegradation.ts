/**
 * Graceful Degradation Utilities
 *
 * Fallback strategies when a component fails:
 * - A failing agent abstains with a low-confidence no_action verdict
 * - A missing profiler subsystem leaves its section empty
 */

import { AdvisorLogger } from '../logging/logger';
import { AppError, toError } from '../../shared/errors/types';
import { createVerdict } from '../types/builders';
import type { Verdict } from '../types';

/**
 * Most specific description of a failure: technical details for AppError,
 * the message otherwise
 */
export function describeFailure(error: Error): string {
  return error instanceof AppError ? error.technicalDetails : error.message;
}

export class GracefulDegradation {
  /**
   * Handle agent failure - the agent abstains
   */
  static handleAgentFailure(agentName: string, error: unknown, specLocation?: string): Verdict {
    const err = toError(error);
    AdvisorLogger.logError(err, {
      operation: 'agent_analysis',
      agentName,
      specLocation,
      fallback: 'no_action'
    });

    return createVerdict({
      agentName,
      verdict: 'no_action',
      confidence: 'low',
      reasoning: `${agentName} agent failed: ${describeFailure(err)}`,
      metadata: { error: err.message, errorName: err.name }
    });
  }

  /**
   * Wrap operation with graceful degradation
   */
  static async withGracefulDegradation<T>(
    operation: () => Promise<T>,
    fallback: (error: Error) => T,
    operationName: string
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      const err = toError(error);
      AdvisorLogger.logError(err, {
        operation: operationName,
        fallback: 'using_fallback_value'
      });
      return fallback(err);
    }
  }
}
