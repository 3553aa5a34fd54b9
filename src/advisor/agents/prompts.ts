/**
 * Prompts for generative-model agents
 *
 * One system prompt per concern. Each restricts the model to the verdicts
 * its rule-based counterpart can produce so the consensus engine treats both
 * kinds of agent the same way.
 */

import type { AgentConcern, ProfileRecord, VerdictKind } from '../types';

/**
 * Verdicts each concern may return
 */
export const CONCERN_VERDICTS: Record<AgentConcern, readonly VerdictKind[]> = {
  database: ['db_unnecessary', 'db_required', 'no_action'],
  factory: ['prefer_build_stubbed', 'no_action'],
  intent: ['unit_test_behavior', 'integration_test_behavior', 'no_action'],
  risk: ['safe_to_optimize', 'risk_detected', 'no_action']
};

const FOCUS: Record<AgentConcern, string> = {
  database: `Decide whether the example needs records persisted in the database.
- db_required: records created by a factory are reloaded or queried back.
- db_unnecessary: nothing is inserted and nothing is reloaded.
- no_action: the evidence is inconclusive.`,
  factory: `Decide whether fixtures built with create(:name) could use build_stubbed(:name).
- prefer_build_stubbed: created records are never read back from the database. Include a
  "suggestion" naming the most used factory, e.g. {"factory":"user","fromValue":"create(:user)","toValue":"build_stubbed(:user)"}.
- no_action: persistence is needed, or no factory uses create.`,
  intent: `Decide whether the example tests a unit in isolation or behaviour across a request boundary.
- unit_test_behavior: model, library or helper logic in isolation.
- integration_test_behavior: requests, controllers, views, full-stack flows.
- no_action: the spec type cannot be classified.`,
  risk: `Decide whether replacing persisted fixtures could change test behaviour.
- risk_detected: after_commit or other commit-dependent callbacks, or chains of save/create/update/destroy callbacks.
- safe_to_optimize: no such callbacks.
- no_action: the evidence is inconclusive.`
};

export function buildSystemPrompt(concern: AgentConcern): string {
  return `You are the ${concern.toUpperCase()} reviewer in a committee that decides how test fixtures should be built.
You look at one concern only and answer with a single JSON object.

${FOCUS[concern]}

Allowed verdicts: ${CONCERN_VERDICTS[concern].join(', ')}
Allowed confidence values: high, medium, low

Return JSON only, in this format:
{"verdict": "...", "confidence": "high|medium|low", "reasoning": "one or two sentences citing the profile data"}`;
}

/**
 * Compact view of a profile for the model. Event examples are trimmed.
 */
export function buildUserPrompt(profile: ProfileRecord): string {
  const events = Object.fromEntries(
    Object.entries(profile.events).map(([name, usage]) => [
      name,
      {
        count: usage.count,
        time: usage.time,
        examples: usage.examples.slice(0, 3).map(e => ({
          sql: e.sql,
          backtrace: e.backtrace?.slice(0, 5)
        }))
      }
    ])
  );

  const summary = {
    location: profile.location,
    specType: profile.specType,
    runtimeMs: profile.runtimeMs,
    factories: profile.factories,
    db: profile.db,
    events
  };

  return `PROFILE DATA:
${JSON.stringify(summary, null, 2)}

Respond with the JSON object only.`;
}
