/**
 * Generative-model Agent
 *
 * Scores one concern by asking an LLM. Shares the Agent contract with the
 * rule-based agents and can replace or join them. Network errors, timeouts
 * and unusable answers all become a low-confidence no_action verdict.
 */

import { AdvisorErrorFactory } from '../errors/types';
import { GracefulDegradation, describeFailure } from '../errors/gracefulDegradation';
import { verdictValidator } from '../validation/validator';
import { createVerdict } from '../types/builders';
import { parseJsonResponse } from '../../shared/llm/client';
import { buildSystemPrompt, buildUserPrompt, CONCERN_VERDICTS } from './prompts';
import type { LLMCompleter } from '../../shared/llm/types';
import type { AgentConcern, ProfileRecord, Verdict } from '../types';
import type { Agent } from './types';

export interface LlmAgentOptions {
  concern: AgentConcern;
  client: LLMCompleter;
  timeoutMs: number;
  model?: string;
  /** Defaults to llm_<concern> */
  name?: string;
}

export class LlmAgent implements Agent {
  readonly name: string;
  readonly concern: AgentConcern;
  private readonly client: LLMCompleter;
  private readonly timeoutMs: number;
  private readonly model?: string;

  constructor(options: LlmAgentOptions) {
    this.concern = options.concern;
    this.name = options.name ?? `llm_${options.concern}`;
    this.client = options.client;
    this.timeoutMs = options.timeoutMs;
    this.model = options.model;
  }

  async analyze(profile: ProfileRecord): Promise<Verdict> {
    return GracefulDegradation.withGracefulDegradation(
      () => this.evaluate(profile),
      error => createVerdict({
        agentName: this.name,
        verdict: 'no_action',
        confidence: 'low',
        reasoning: `${this.name} agent unavailable: ${describeFailure(error)}`,
        metadata: { error: error.message, errorName: error.name }
      }),
      `llm_agent_${this.concern}`
    );
  }

  private async evaluate(profile: ProfileRecord): Promise<Verdict> {
    const controller = new AbortController();
    const response = await this.withTimeout(
      this.client.complete({
        systemPrompt: buildSystemPrompt(this.concern),
        messages: [{ role: 'user', content: buildUserPrompt(profile) }],
        temperature: 0,
        model: this.model,
        signal: controller.signal
      }),
      controller
    );

    const payload = parseJsonResponse(response.content);
    const validation = verdictValidator.validateLlmResponse(payload);
    if (!validation.isValid) {
      throw AdvisorErrorFactory.llmResponseInvalid(
        this.name,
        validation.errors.map(e => `${e.field || '(root)'}: ${e.message}`).join('; '),
        validation.errors
      );
    }

    const result = verdictValidator.validateAndParseLlmResponse(payload);

    if (!CONCERN_VERDICTS[this.concern].includes(result.verdict)) {
      throw AdvisorErrorFactory.llmResponseInvalid(
        this.name,
        `Verdict ${result.verdict} is outside the ${this.concern} vocabulary`
      );
    }

    if (result.verdict === 'prefer_build_stubbed' && !result.suggestion) {
      throw AdvisorErrorFactory.llmResponseInvalid(this.name, 'prefer_build_stubbed requires a suggestion');
    }

    return createVerdict({
      agentName: this.name,
      verdict: result.verdict,
      confidence: result.confidence,
      reasoning: result.reasoning,
      suggestion: result.verdict === 'prefer_build_stubbed' ? result.suggestion : undefined,
      metadata: { ...result.metadata, model: response.model, source: 'llm' }
    });
  }

  /**
   * Wrap operation with timeout; the request is aborted when time runs out
   */
  private async withTimeout<T>(promise: Promise<T>, controller: AbortController): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        promise,
        new Promise<T>((_, reject) => {
          timer = setTimeout(() => {
            reject(AdvisorErrorFactory.agentTimeout(this.name, this.timeoutMs));
            controller.abort();
          }, this.timeoutMs);
        })
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
