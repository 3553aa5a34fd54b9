/**
 * Agent Registry
 *
 * Ordered set of agents run against one profile. Agents run concurrently,
 * a failing agent only loses its own vote, and verdicts always come back in
 * canonical order whatever order the agents finish in.
 */

import { AdvisorErrorFactory } from '../errors/types';
import { GracefulDegradation } from '../errors/gracefulDegradation';
import { AdvisorLogger } from '../logging/logger';
import { isWellFormedVerdict } from '../validation/validator';
import { createLLMClientFromEnv } from '../../shared/llm/client';
import { DatabaseAgent } from './databaseAgent';
import { FactoryAgent } from './factoryAgent';
import { IntentAgent } from './intentAgent';
import { RiskAgent } from './riskAgent';
import { LlmAgent } from './llmAgent';
import { AGENT_CONCERNS } from '../types';
import { sortByCanonicalOrder } from './types';
import type { LLMCompleter } from '../../shared/llm/types';
import type { AdvisorConfig, AgentConcern, ProfileRecord, Verdict } from '../types';
import type { Agent } from './types';

export interface RegistryOptions {
  /** Appended after the configured agents */
  extraAgents?: readonly Agent[];
  /** Client for generative agents; created from the environment when omitted */
  llmClient?: LLMCompleter;
}

export function createRuleBasedAgent(concern: AgentConcern, config: Pick<AdvisorConfig, 'thresholds'>): Agent {
  switch (concern) {
    case 'database':
      return new DatabaseAgent();
    case 'factory':
      return new FactoryAgent();
    case 'intent':
      return new IntentAgent();
    case 'risk':
      return new RiskAgent(config.thresholds.risk);
  }
}

export class AgentRegistry {
  private readonly agents: readonly Agent[];

  constructor(agents: readonly Agent[]) {
    const names = agents.map(a => a.name);
    const duplicate = names.find((name, i) => names.indexOf(name) !== i);
    if (duplicate !== undefined) {
      throw AdvisorErrorFactory.configurationError('agents', `Agent name "${duplicate}" is registered twice`);
    }
    this.agents = [...agents];
  }

  /**
   * Build the enabled rule-based agents, then generative agents, then extras
   */
  static fromConfig(config: AdvisorConfig, options: RegistryOptions = {}): AgentRegistry {
    const agents: Agent[] = AGENT_CONCERNS
      .filter(concern => config.enabledAgents.includes(concern))
      .map(concern => createRuleBasedAgent(concern, config));

    if (config.llm.enabled && config.llm.concerns.length > 0) {
      const client = options.llmClient ?? createLLMClientFromEnv({
        provider: config.llm.provider,
        model: config.llm.model,
        timeout: config.llm.timeoutMs
      });
      for (const concern of config.llm.concerns) {
        agents.push(new LlmAgent({
          concern,
          client,
          timeoutMs: config.llm.timeoutMs,
          model: config.llm.model
        }));
      }
    }

    agents.push(...(options.extraAgents ?? []));
    return new AgentRegistry(agents);
  }

  get agentNames(): string[] {
    return this.agents.map(a => a.name);
  }

  get size(): number {
    return this.agents.length;
  }

  /**
   * Run every agent against the profile
   */
  async run(profile: ProfileRecord): Promise<Verdict[]> {
    AdvisorLogger.logAnalysisStart(profile, this.agentNames);
    const verdicts = await Promise.all(this.agents.map(agent => this.runAgent(agent, profile)));
    return sortByCanonicalOrder(verdicts);
  }

  private async runAgent(agent: Agent, profile: ProfileRecord): Promise<Verdict> {
    const start = Date.now();
    let verdict: Verdict;
    try {
      const result = await agent.analyze(profile);
      if (!isWellFormedVerdict(result)) {
        throw AdvisorErrorFactory.agentFailed(agent.name, 'Agent returned a malformed verdict');
      }
      verdict = result;
    } catch (error) {
      verdict = GracefulDegradation.handleAgentFailure(agent.name, error, profile.location);
    }

    AdvisorLogger.logVerdict(profile.location, verdict, Date.now() - start);
    return verdict;
  }
}
