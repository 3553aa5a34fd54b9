/**
 * Shared profiles for advisor tests
 */

import { createProfileRecord, createVerdict } from '../../advisor/types/builders';
import type { VerdictInput } from '../../advisor/types/builders';
import type { ProfileRecord, ProfileRecordInput, Verdict } from '../../advisor/types';

/**
 * Model spec creating three users, every insert explained by the factory
 */
export function persistedUserProfile(overrides: ProfileRecordInput = {}): ProfileRecord {
  return createProfileRecord({
    location: 'spec/models/user_spec.rb:10',
    specType: 'model',
    factories: { user: { strategy: 'create', count: 3, time: 0.05 } },
    db: { inserts: 3, selects: 5, totalQueries: 8 },
    ...overrides
  });
}

/**
 * Same as persistedUserProfile plus an after_commit callback
 */
export function commitCallbackProfile(): ProfileRecord {
  return persistedUserProfile({
    events: {
      'after_commit.active_record': { count: 1, time: 0.2, examples: [] }
    }
  });
}

/**
 * System spec going through the controller stack without inserts
 */
export function systemSpecProfile(): ProfileRecord {
  return createProfileRecord({
    location: 'spec/system/checkout_spec.rb:22',
    specType: 'system',
    db: { inserts: 0, selects: 12, totalQueries: 12 },
    events: {
      'process_action.action_controller': { count: 2, time: 30, examples: [] }
    }
  });
}

export function verdict(input: Partial<VerdictInput> & Pick<VerdictInput, 'agentName' | 'verdict'>): Verdict {
  return createVerdict({
    confidence: 'high',
    reasoning: `${input.agentName} says ${input.verdict}`,
    ...input
  });
}

export const stubbedUser = {
  factory: 'user',
  fromValue: 'create(:user)',
  toValue: 'build_stubbed(:user)'
};

/**
 * Raw profiler output equivalent to persistedUserProfile
 */
export const rawPersistedUser = {
  context: { location: 'spec/models/user_spec.rb:4', runtime: 0.12 },
  data: {
    factory_prof: { factories: { user: { create_count: 3, count: 3, time: 0.05 } } },
    db_queries: { total_queries: 8, inserts: 3, selects: 5 }
  }
};
