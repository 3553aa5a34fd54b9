/**
 * LLM Client
 *
 * Unified client for Anthropic and OpenAI LLM providers.
 * Supports structured output and retry logic. Responses are never cached:
 * every analysis call stands alone.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { jsonrepair } from 'jsonrepair';
import { createComponentLogger } from '../logger';
import { toError } from '../errors/types';
import {
  LLMCompleter,
  LLMConfig,
  LLMProvider,
  LLMRequest,
  LLMResponse,
  DEFAULT_LLM_CONFIG,
  RetryConfig,
  DEFAULT_RETRY_CONFIG,
  isLLMProvider
} from './types';

const log = createComponentLogger('llm');

/**
 * Unified LLM client supporting both Anthropic and OpenAI
 */
export class LLMClient implements LLMCompleter {
  private config: LLMConfig;
  private anthropicClient?: Anthropic;
  private openaiClient?: OpenAI;
  private retryConfig: RetryConfig;

  constructor(
    config: Partial<LLMConfig> & { apiKey: string },
    retryConfig: Partial<RetryConfig> = {}
  ) {
    const provider: LLMProvider = config.provider ?? 'anthropic';

    // Merge with defaults
    const defaults = DEFAULT_LLM_CONFIG[provider];
    this.config = {
      ...defaults,
      ...config,
      provider
    };

    if (this.config.provider === 'anthropic') {
      this.anthropicClient = new Anthropic({
        apiKey: this.config.apiKey,
        timeout: this.config.timeout
      });
    } else {
      this.openaiClient = new OpenAI({
        apiKey: this.config.apiKey,
        timeout: this.config.timeout
      });
    }

    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...retryConfig };
  }

  /**
   * Send a completion request to the LLM
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    const temperature = request.temperature ?? this.config.temperature;
    const maxTokens = request.maxTokens ?? this.config.maxTokens;
    const model = request.model ?? this.config.model; // Allow per-request model override

    if (!request.messages.some(m => m.role === 'user')) {
      throw new Error('Request must include at least one user message');
    }

    const start = Date.now();
    log.debug(
      { provider: this.config.provider, model, temperature, maxTokens, messages: request.messages.length },
      'LLM request start'
    );

    const response = await this.retryWithBackoff(async () => {
      if (this.config.provider === 'anthropic') {
        return await this.callAnthropic(request, temperature, maxTokens, model);
      } else {
        return await this.callOpenAI(request, temperature, maxTokens, model);
      }
    }, request.signal);

    log.debug(
      {
        model: response.model,
        finishReason: response.finishReason ?? 'unknown',
        elapsedMs: Date.now() - start,
        usage: response.usage
      },
      'LLM request end'
    );

    return response;
  }

  /**
   * Call Anthropic API
   */
  private async callAnthropic(
    request: LLMRequest,
    temperature: number,
    maxTokens: number,
    model: string
  ): Promise<LLMResponse> {
    if (!this.anthropicClient) {
      throw new Error('Anthropic client not initialized');
    }

    // System prompt travels separately from messages
    const messages: Anthropic.MessageParam[] = request.messages
      .filter(m => m.role !== 'system')
      .map((m): Anthropic.MessageParam => ({
        role: m.role === 'assistant' ? 'assistant' : 'user',
        content: m.content
      }));

    const response = await this.anthropicClient.messages.create(
      {
        model,
        max_tokens: maxTokens,
        temperature,
        system: request.systemPrompt || '',
        messages
      },
      { signal: request.signal }
    );

    const content = response.content[0];
    if (!content || content.type !== 'text') {
      throw new Error('Unexpected response type from Anthropic');
    }

    return {
      content: content.text,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens
      },
      finishReason: response.stop_reason || undefined
    };
  }

  /**
   * Call OpenAI API
   */
  private async callOpenAI(
    request: LLMRequest,
    temperature: number,
    maxTokens: number,
    model: string
  ): Promise<LLMResponse> {
    if (!this.openaiClient) {
      throw new Error('OpenAI client not initialized');
    }

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];

    if (request.systemPrompt) {
      messages.push({
        role: 'system',
        content: request.systemPrompt
      });
    }

    for (const m of request.messages) {
      if (m.role === 'assistant') {
        messages.push({ role: 'assistant', content: m.content });
      } else if (m.role === 'system') {
        messages.push({ role: 'system', content: m.content });
      } else {
        messages.push({ role: 'user', content: m.content });
      }
    }

    const requestOptions: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model,
      messages,
      temperature,
      max_tokens: maxTokens
    };

    // Only use JSON mode when the prompt explicitly requests JSON output
    const hasJsonRequest = messages.some(message => {
      const content = typeof message.content === 'string' ? message.content : '';
      return /return.*json|respond.*json|output.*json|format.*json/i.test(content);
    });

    if (hasJsonRequest && (model.includes('gpt-4-turbo') || model.includes('gpt-4o'))) {
      requestOptions.response_format = { type: 'json_object' };
    }

    const response = await this.openaiClient.chat.completions.create(requestOptions, {
      signal: request.signal
    });

    const choice = response.choices[0];
    if (!choice || !choice.message.content) {
      throw new Error('No content in OpenAI response');
    }

    return {
      content: choice.message.content,
      model: response.model,
      usage: response.usage ? {
        inputTokens: response.usage.prompt_tokens,
        outputTokens: response.usage.completion_tokens,
        totalTokens: response.usage.total_tokens
      } : undefined,
      finishReason: choice.finish_reason || undefined
    };
  }

  /**
   * Retry logic with exponential backoff
   */
  private async retryWithBackoff<T>(
    fn: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    let lastError: Error | undefined;

    for (let attempt = 0; attempt < this.retryConfig.maxAttempts; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = toError(error);

        if (signal?.aborted) {
          throw lastError;
        }

        if (this.retryConfig.shouldRetry && !this.retryConfig.shouldRetry(lastError)) {
          throw lastError;
        }

        // Don't retry on last attempt
        if (attempt === this.retryConfig.maxAttempts - 1) {
          break;
        }

        const delay = this.retryConfig.backoffMs[attempt] || this.retryConfig.delayMs;
        log.warn({ attempt: attempt + 1, delayMs: delay, error: lastError.message }, 'LLM request failed, retrying');
        await this.sleep(delay);
      }
    }

    throw lastError || new Error('Retry failed');
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Parse JSON response from LLM, handling potential formatting issues
   */
  parseJsonResponse(text: string): unknown {
    return parseJsonResponse(text);
  }

  getConfig(): LLMConfig {
    return { ...this.config };
  }
}

/**
 * Parse a JSON object out of model output: strips code fences, falls back to
 * the outermost braces, then to jsonrepair.
 */
export function parseJsonResponse(text: string): unknown {
  const cleanText = text
    .trim()
    .replace(/^```json\s*/i, '')
    .replace(/^```\s*/, '')
    .replace(/\s*```$/, '')
    .trim();

  try {
    return JSON.parse(cleanText);
  } catch (error) {
    const firstBrace = text.indexOf('{');
    const lastBrace = text.lastIndexOf('}');
    const candidate = firstBrace !== -1 && lastBrace > firstBrace
      ? text.substring(firstBrace, lastBrace + 1)
      : cleanText;

    try {
      return JSON.parse(candidate);
    } catch {
      // fall through to repair
    }

    try {
      return JSON.parse(jsonrepair(candidate));
    } catch {
      const preview = text.substring(0, 500);
      throw new Error(
        `Failed to parse LLM response as JSON: ${toError(error).message}\n\nResponse preview (first 500 chars):\n${preview}`
      );
    }
  }
}

/**
 * Create an LLM client from environment variables
 */
export function createLLMClientFromEnv(
  overrides: Partial<Pick<LLMConfig, 'provider' | 'model' | 'timeout'>> = {},
  retryConfig?: Partial<RetryConfig>,
  env: NodeJS.ProcessEnv = process.env
): LLMClient {
  const provider: LLMProvider = overrides.provider
    ?? (isLLMProvider(env.LLM_PROVIDER) ? env.LLM_PROVIDER : 'anthropic');
  const apiKey = provider === 'anthropic'
    ? env.ANTHROPIC_API_KEY
    : env.OPENAI_API_KEY;

  if (!apiKey) {
    throw new Error(
      `API key not found. Set ${provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY'} environment variable.`
    );
  }

  return new LLMClient(
    {
      provider,
      apiKey,
      model: overrides.model || env.LLM_MODEL || DEFAULT_LLM_CONFIG[provider].model,
      ...(overrides.timeout !== undefined ? { timeout: overrides.timeout } : {})
    },
    retryConfig
  );
}
