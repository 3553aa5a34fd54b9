/**
 * Output Formatter
 *
 * Renders a recommendation for people (console) or for tools (JSON).
 */

import type {
  Confidence,
  OutputFormat,
  ProfileRecord,
  Recommendation,
  RecommendationAction,
  Verdict,
  VerdictKind
} from '../types';

const CONFIDENCE_SYMBOLS: Record<Confidence, string> = {
  high: '✔',
  medium: '⚠',
  low: '?'
};

const ACTION_SYMBOLS: Record<RecommendationAction, string> = {
  replace_factory_strategy: '✔',
  avoid_db_persistence: '✔',
  optimize_queries: '✔',
  review_test_intent: '⚠',
  assess_risk_factors: '⚠',
  no_action: '—'
};

const VERDICT_LABELS: Record<VerdictKind, string> = {
  db_unnecessary: 'DB unnecessary',
  db_required: 'DB required',
  prefer_build_stubbed: 'prefer build_stubbed',
  unit_test_behavior: 'unit test behavior',
  integration_test_behavior: 'integration test behavior',
  safe_to_optimize: 'safe to optimize',
  risk_detected: 'risk detected',
  no_action: 'no action'
};

export function humanizeAgentName(agentName: string): string {
  return `${agentName
    .split('_')
    .map(part => (part === 'llm' ? 'LLM' : part.charAt(0).toUpperCase() + part.slice(1)))
    .join(' ')} Agent`;
}

function formatSummary(profile: ProfileRecord): string[] {
  const lines = ['Summary:'];

  const factories = Object.entries(profile.factories).map(([name, usage]) =>
    `Factory :${name} used \`${usage.strategy}\`${usage.count > 1 ? ` (${usage.count}x)` : ''}`
  );
  if (factories.length > 0) lines.push(`- ${factories.join(', ')}`);

  const { db } = profile;
  lines.push(`- DB inserts: ${db.inserts}, selects: ${db.selects}, Total queries: ${db.totalQueries}`);

  if (profile.runtimeMs > 0) lines.push(`- Runtime: ${profile.runtimeMs}ms`);
  if (profile.specType !== 'unknown') lines.push(`- Type: ${profile.specType} spec`);

  return lines;
}

function formatVerdict(verdict: Verdict): string {
  return `- ${humanizeAgentName(verdict.agentName)}: ${VERDICT_LABELS[verdict.verdict]} (${CONFIDENCE_SYMBOLS[verdict.confidence]} ${verdict.confidence.toUpperCase()})`;
}

function formatAction(recommendation: Recommendation): string {
  switch (recommendation.action) {
    case 'replace_factory_strategy':
      return `Replace \`${recommendation.fromValue}\` with \`${recommendation.toValue}\``;
    case 'no_action':
      return 'No action recommended';
    default:
      return recommendation.action.split('_').join(' ');
  }
}

/**
 * Human-readable console output
 */
export function formatConsole(recommendation: Recommendation, profile?: ProfileRecord): string {
  const lines: string[] = [
    `${CONFIDENCE_SYMBOLS[recommendation.confidence]} Fixture Advisor Recommendation`,
    recommendation.specLocation || '(unknown location)'
  ];

  if (profile) {
    lines.push('', ...formatSummary(profile));
  }

  lines.push('', 'Agent Signals:');
  if (recommendation.agentResults.length === 0) {
    lines.push('- No agent results available');
  } else {
    lines.push(...recommendation.agentResults.map(formatVerdict));
  }

  lines.push(
    '',
    'Final Recommendation:',
    `${ACTION_SYMBOLS[recommendation.action]} ${formatAction(recommendation)}`,
    `Confidence: ${CONFIDENCE_SYMBOLS[recommendation.confidence]} ${recommendation.confidence.toUpperCase()}`
  );

  if (recommendation.explanation.length > 0) {
    lines.push('', 'Reasoning:', ...recommendation.explanation.map(line => `- ${line}`));
  }

  return lines.join('\n');
}

/**
 * Plain object for JSON output, snake_case like the profiler input
 */
export function toJsonObject(recommendation: Recommendation, profile?: ProfileRecord): Record<string, unknown> {
  return {
    spec_location: recommendation.specLocation,
    action: recommendation.action,
    from_value: recommendation.fromValue,
    to_value: recommendation.toValue,
    confidence: recommendation.confidence,
    explanation: recommendation.explanation,
    agent_results: recommendation.agentResults.map(v => ({
      agent_name: v.agentName,
      verdict: v.verdict,
      confidence: v.confidence,
      reasoning: v.reasoning,
      ...(v.suggestion ? { suggestion: v.suggestion } : {}),
      metadata: v.metadata
    })),
    ...(profile ? {
      profile_data: {
        spec_type: profile.specType,
        runtime_ms: profile.runtimeMs,
        factories: profile.factories,
        db: profile.db,
        events: Object.keys(profile.events)
      }
    } : {})
  };
}

export function formatJson(recommendation: Recommendation, profile?: ProfileRecord): string {
  return JSON.stringify(toJsonObject(recommendation, profile), null, 2);
}

export function formatRecommendation(
  recommendation: Recommendation,
  format: OutputFormat,
  profile?: ProfileRecord
): string {
  return format === 'json' ? formatJson(recommendation, profile) : formatConsole(recommendation, profile);
}
