/**
 * Safety Policy
 *
 * Rejects option combinations that could let the advisor change test code
 * while it is also gating a build, and reports whether enforcement is set up
 * for CI.
 */

import { AdvisorErrorFactory } from '../errors/types';
import { createComponentLogger } from '../../shared/logger';
import type { AdvisorConfig } from '../types';

const log = createComponentLogger('safety');

export type SafetyFlags = Pick<
  AdvisorConfig,
  'enforcementMode' | 'failOnHighConfidence' | 'autoApplyEnabled' | 'blockingModeEnabled'
>;

/**
 * Throws UNSAFE_CONFIGURATION for a forbidden combination of flags
 */
export function assertSafeConfiguration(config: SafetyFlags): void {
  const flags = {
    enforcementMode: config.enforcementMode,
    failOnHighConfidence: config.failOnHighConfidence,
    autoApplyEnabled: config.autoApplyEnabled,
    blockingModeEnabled: config.blockingModeEnabled
  };

  if (config.autoApplyEnabled && config.enforcementMode) {
    throw AdvisorErrorFactory.unsafeConfiguration(
      'Auto-apply cannot be enabled together with enforcement mode',
      flags
    );
  }

  if (config.autoApplyEnabled && config.failOnHighConfidence) {
    throw AdvisorErrorFactory.unsafeConfiguration(
      'Auto-apply cannot be enabled together with fail-on-high-confidence',
      flags
    );
  }

  if (config.blockingModeEnabled && !config.enforcementMode) {
    throw AdvisorErrorFactory.unsafeConfiguration(
      'Blocking mode requires enforcement mode',
      flags
    );
  }
}

export interface EnforcementStatus {
  enforcementMode: boolean;
  failOnHighConfidence: boolean;
  /** Enforcement is on and explicitly set to fail on high confidence */
  ciFriendly: boolean;
  warnings: string[];
}

export function enforcementStatus(config: SafetyFlags): EnforcementStatus {
  const warnings: string[] = [];

  if (config.enforcementMode && !config.failOnHighConfidence) {
    warnings.push('Enforcement mode is enabled without fail-on-high-confidence; CI results may be surprising');
  }

  for (const warning of warnings) {
    log.warn({ enforcementMode: config.enforcementMode }, warning);
  }

  return {
    enforcementMode: config.enforcementMode,
    failOnHighConfidence: config.failOnHighConfidence,
    ciFriendly: config.enforcementMode && config.failOnHighConfidence,
    warnings
  };
}
