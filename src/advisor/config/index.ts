/**
 * Configuration Management
 *
 * Advisor configuration with environment variable support.
 * Precedence: DEFAULT_CONFIG < environment < explicitly provided values.
 *
 * There is no process-wide instance: every analysis call receives its
 * configuration explicitly.
 */

import { AdvisorErrorFactory } from '../errors/types';
import type { AdvisorError } from '../errors/types';
import { configValidator } from '../validation/validator';
import { assertSafeConfiguration } from '../safety/safetyPolicy';
import { AGENT_CONCERNS } from '../types';
import type { AdvisorConfig, AgentConcern, LlmAgentSettings, OutputFormat } from '../types';

/**
 * Partial configuration accepted from callers and the environment
 */
export interface AdvisorConfigInput {
  enabledAgents?: AgentConcern[];
  enforcementMode?: boolean;
  failOnHighConfidence?: boolean;
  autoApplyEnabled?: boolean;
  blockingModeEnabled?: boolean;
  thresholds?: {
    risk?: {
      callbackChainLength?: number;
    };
  };
  llm?: Partial<LlmAgentSettings>;
  outputFormat?: OutputFormat;
  logging?: {
    enabled?: boolean;
    maxLogs?: number;
  };
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: AdvisorConfig = {
  enabledAgents: [...AGENT_CONCERNS],
  enforcementMode: false,
  failOnHighConfidence: false,
  autoApplyEnabled: false,
  blockingModeEnabled: false,
  thresholds: {
    risk: {
      callbackChainLength: 2
    }
  },
  llm: {
    enabled: false,
    provider: 'anthropic',
    concerns: [],
    timeoutMs: 30000
  },
  outputFormat: 'console',
  logging: {
    enabled: true,
    maxLogs: 5000
  }
};

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AdvisorConfig;

  /** Environment values that failed to parse; raised after the safety check */
  private envErrors: AdvisorError[] = [];

  constructor(config?: AdvisorConfigInput, env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadConfig(config, env);
    this.validateConfig();
  }

  /**
   * Load configuration from environment variables and provided config
   */
  private loadConfig(providedConfig: AdvisorConfigInput | undefined, env: NodeJS.ProcessEnv): AdvisorConfig {
    this.envErrors = [];
    const envConfig: AdvisorConfigInput = {
      enabledAgents: this.parseConcerns('ADVISOR_ENABLED_AGENTS', env.ADVISOR_ENABLED_AGENTS),
      enforcementMode: this.parseBoolean('ADVISOR_ENFORCEMENT_MODE', env.ADVISOR_ENFORCEMENT_MODE),
      failOnHighConfidence: this.parseBoolean('ADVISOR_FAIL_ON_HIGH_CONFIDENCE', env.ADVISOR_FAIL_ON_HIGH_CONFIDENCE),
      autoApplyEnabled: this.parseBoolean('ADVISOR_AUTO_APPLY', env.ADVISOR_AUTO_APPLY),
      blockingModeEnabled: this.parseBoolean('ADVISOR_BLOCKING_MODE', env.ADVISOR_BLOCKING_MODE),
      thresholds: {
        risk: {
          callbackChainLength: this.parseInt(env.ADVISOR_RISK_CALLBACK_CHAIN)
        }
      },
      llm: {
        enabled: this.parseBoolean('ADVISOR_LLM_ENABLED', env.ADVISOR_LLM_ENABLED),
        provider: this.parseProvider(env.ADVISOR_LLM_PROVIDER),
        model: env.ADVISOR_LLM_MODEL || undefined,
        concerns: this.parseConcerns('ADVISOR_LLM_CONCERNS', env.ADVISOR_LLM_CONCERNS),
        timeoutMs: this.parseInt(env.ADVISOR_LLM_TIMEOUT_MS)
      },
      outputFormat: this.parseOutputFormat(env.ADVISOR_OUTPUT_FORMAT),
      logging: {
        enabled: this.parseBoolean('ADVISOR_LOGGING_ENABLED', env.ADVISOR_LOGGING_ENABLED),
        maxLogs: this.parseInt(env.ADVISOR_MAX_LOGS)
      }
    };

    // Merge: DEFAULT_CONFIG < envConfig < providedConfig
    return mergeConfig(mergeConfig(DEFAULT_CONFIG, envConfig), providedConfig || {});
  }

  /**
   * Validate configuration. Unsafe flag combinations are checked first and
   * win over any other configuration error.
   */
  private validateConfig(): void {
    assertSafeConfiguration(this.config);

    const [envError] = this.envErrors;
    if (envError) {
      throw envError;
    }

    const result = configValidator.validate(this.config);
    if (!result.isValid) {
      const [first] = result.errors;
      throw AdvisorErrorFactory.configurationError(first.field || 'config', first.message);
    }

    if (new Set(this.config.enabledAgents).size !== this.config.enabledAgents.length) {
      throw AdvisorErrorFactory.configurationError('enabledAgents', 'Agents must not be listed twice');
    }
  }

  /**
   * Get configuration
   */
  getConfig(): AdvisorConfig {
    return cloneConfig(this.config);
  }

  /**
   * Update configuration
   */
  updateConfig(updates: AdvisorConfigInput): void {
    const previous = this.config;
    this.config = mergeConfig(this.config, updates);
    try {
      this.validateConfig();
    } catch (error) {
      this.config = previous;
      throw error;
    }
  }

  /**
   * Parse integer from environment variable
   */
  private parseInt(value: string | undefined): number | undefined {
    if (!value) return undefined;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? undefined : parsed;
  }

  private parseBoolean(name: string, value: string | undefined): boolean | undefined {
    if (value === undefined || value === '') return undefined;
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off'].includes(normalized)) return false;
    return this.rejectEnv(name, `Expected a boolean, got "${value}"`);
  }

  private parseConcerns(name: string, value: string | undefined): AgentConcern[] | undefined {
    if (value === undefined) return undefined;
    const names = value.split(',').map(s => s.trim().toLowerCase()).filter(s => s.length > 0);
    const concerns: AgentConcern[] = [];
    for (const concern of names) {
      const match = AGENT_CONCERNS.find(c => c === concern);
      if (!match) {
        return this.rejectEnv(name, `Unknown agent "${concern}" (expected one of ${AGENT_CONCERNS.join(', ')})`);
      }
      concerns.push(match);
    }
    return concerns;
  }

  private parseProvider(value: string | undefined): LlmAgentSettings['provider'] | undefined {
    if (!value) return undefined;
    if (value === 'anthropic' || value === 'openai') return value;
    return this.rejectEnv('ADVISOR_LLM_PROVIDER', `Unknown provider "${value}"`);
  }

  private parseOutputFormat(value: string | undefined): OutputFormat | undefined {
    if (!value) return undefined;
    if (value === 'console' || value === 'json') return value;
    return this.rejectEnv('ADVISOR_OUTPUT_FORMAT', `Unknown output format "${value}"`);
  }

  private rejectEnv(name: string, reason: string): undefined {
    this.envErrors.push(AdvisorErrorFactory.configurationError(name, reason));
    return undefined;
  }
}

/**
 * Merge a partial configuration over a complete one. Undefined values keep
 * the base value; arrays are replaced, not concatenated.
 */
export function mergeConfig(base: AdvisorConfig, override: AdvisorConfigInput): AdvisorConfig {
  return {
    enabledAgents: [...(override.enabledAgents ?? base.enabledAgents)],
    enforcementMode: override.enforcementMode ?? base.enforcementMode,
    failOnHighConfidence: override.failOnHighConfidence ?? base.failOnHighConfidence,
    autoApplyEnabled: override.autoApplyEnabled ?? base.autoApplyEnabled,
    blockingModeEnabled: override.blockingModeEnabled ?? base.blockingModeEnabled,
    thresholds: {
      risk: {
        callbackChainLength:
          override.thresholds?.risk?.callbackChainLength ?? base.thresholds.risk.callbackChainLength
      }
    },
    llm: {
      enabled: override.llm?.enabled ?? base.llm.enabled,
      provider: override.llm?.provider ?? base.llm.provider,
      model: override.llm?.model ?? base.llm.model,
      concerns: [...(override.llm?.concerns ?? base.llm.concerns)],
      timeoutMs: override.llm?.timeoutMs ?? base.llm.timeoutMs
    },
    outputFormat: override.outputFormat ?? base.outputFormat,
    logging: {
      enabled: override.logging?.enabled ?? base.logging.enabled,
      maxLogs: override.logging?.maxLogs ?? base.logging.maxLogs
    }
  };
}

function cloneConfig(config: AdvisorConfig): AdvisorConfig {
  return mergeConfig(config, {});
}

/**
 * Build and validate a configuration in one step
 */
export function loadConfig(config?: AdvisorConfigInput, env: NodeJS.ProcessEnv = process.env): AdvisorConfig {
  return new ConfigManager(config, env).getConfig();
}
