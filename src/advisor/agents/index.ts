export { DatabaseAgent } from './databaseAgent';
export { FactoryAgent } from './factoryAgent';
export { IntentAgent } from './intentAgent';
export { RiskAgent, DEFAULT_RISK_THRESHOLDS } from './riskAgent';
export { LlmAgent } from './llmAgent';
export type { LlmAgentOptions } from './llmAgent';
export { RuleBasedAgent } from './baseAgent';
export { AgentRegistry, createRuleBasedAgent } from './registry';
export type { RegistryOptions } from './registry';
export { CANONICAL_AGENT_ORDER, sortByCanonicalOrder } from './types';
export type { Agent } from './types';
export { CONCERN_VERDICTS, buildSystemPrompt, buildUserPrompt } from './prompts';
