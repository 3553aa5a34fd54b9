/**
 * Advisor Error Types
 *
 * Error codes and response structures specific to profile analysis.
 * Extends shared error types from src/shared/errors/types.ts
 */

import { AppError, ErrorCategory, ErrorSeverity } from '../../shared/errors';
import type { ValidationError } from '../validation/types';

/**
 * Advisor-specific error codes
 */
export enum AdvisorErrorCode {
  // Input errors
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_PROFILE = 'INVALID_PROFILE',
  NORMALIZATION_FAILED = 'NORMALIZATION_FAILED',

  // Agent errors
  AGENT_FAILED = 'AGENT_FAILED',
  AGENT_TIMEOUT = 'AGENT_TIMEOUT',
  LLM_RESPONSE_INVALID = 'LLM_RESPONSE_INVALID',

  // Configuration and safety
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  UNSAFE_CONFIGURATION = 'UNSAFE_CONFIGURATION',
  SAFETY_VIOLATION = 'SAFETY_VIOLATION'
}

/**
 * Error response structure for CLI and JSON output
 */
export interface ErrorResponse {
  error: AdvisorErrorCode;
  message: string;
  details?: string;
  timestamp: string;
  validation_errors?: ValidationError[];
  retryable?: boolean;
  suggested_action?: string;
}

/**
 * Advisor-specific error class
 */
export class AdvisorError extends AppError {
  public readonly code: AdvisorErrorCode;
  public readonly validationErrors?: ValidationError[];
  public readonly retryable: boolean;

  constructor(
    code: AdvisorErrorCode,
    userMessage: string,
    technicalDetails: string,
    options?: {
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
      validationErrors?: ValidationError[];
      retryable?: boolean;
      suggestedAction?: string;
    }
  ) {
    super({
      category: options?.category || ErrorCategory.UNEXPECTED,
      severity: options?.severity || ErrorSeverity.MEDIUM,
      userMessage,
      technicalDetails,
      timestamp: new Date(),
      context: options?.context,
      recoverable: options?.retryable ?? false,
      suggestedAction: options?.suggestedAction
    });

    this.name = 'AdvisorError';
    this.code = code;
    this.validationErrors = options?.validationErrors;
    this.retryable = options?.retryable ?? false;
  }

  /**
   * Convert to error response format
   */
  toErrorResponse(): ErrorResponse {
    return {
      error: this.code,
      message: this.userMessage,
      details: this.technicalDetails,
      timestamp: this.timestamp.toISOString(),
      validation_errors: this.validationErrors,
      retryable: this.retryable,
      suggested_action: this.suggestedAction
    };
  }
}

export function isAdvisorError(error: unknown): error is AdvisorError {
  return error instanceof AdvisorError;
}

/**
 * Factory functions for common error types
 */
export class AdvisorErrorFactory {
  /**
   * Create invalid input error
   */
  static invalidInput(field: string, message: string, received?: unknown): AdvisorError {
    return new AdvisorError(
      AdvisorErrorCode.INVALID_INPUT,
      `Invalid input: ${field}`,
      message,
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        validationErrors: [{ field, message, received }],
        retryable: false,
        suggestedAction: 'Check the profile file format'
      }
    );
  }

  /**
   * Create profile record validation error
   */
  static invalidProfile(validationErrors: ValidationError[]): AdvisorError {
    return new AdvisorError(
      AdvisorErrorCode.INVALID_PROFILE,
      'Profile record validation failed',
      validationErrors.map(e => `${e.field || '(root)'}: ${e.message}`).join('; '),
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        validationErrors,
        retryable: false,
        suggestedAction: 'Build profile records with createProfileRecord or normalizeProfile'
      }
    );
  }

  /**
   * Create normalization error for wrong-shaped profiler output
   */
  static normalizationFailed(section: string, reason: string, context?: Record<string, unknown>): AdvisorError {
    return new AdvisorError(
      AdvisorErrorCode.NORMALIZATION_FAILED,
      `Failed to normalize profiler output (${section})`,
      reason,
      {
        category: ErrorCategory.PARSING,
        severity: ErrorSeverity.HIGH,
        context: { section, ...context },
        retryable: false,
        suggestedAction: 'Check that the profiler output was captured completely'
      }
    );
  }

  /**
   * Create agent failure error
   */
  static agentFailed(agentName: string, reason: string): AdvisorError {
    return new AdvisorError(
      AdvisorErrorCode.AGENT_FAILED,
      `Agent ${agentName} failed`,
      reason,
      {
        category: ErrorCategory.ANALYSIS,
        severity: ErrorSeverity.MEDIUM,
        context: { agentName },
        retryable: true,
        suggestedAction: 'The agent abstains; other agents still decide'
      }
    );
  }

  /**
   * Create agent timeout error
   */
  static agentTimeout(agentName: string, timeoutMs: number): AdvisorError {
    return new AdvisorError(
      AdvisorErrorCode.AGENT_TIMEOUT,
      `Agent ${agentName} timed out`,
      `Timed out after ${timeoutMs}ms with no response`,
      {
        category: ErrorCategory.NETWORK,
        severity: ErrorSeverity.HIGH,
        context: { agentName, timeoutMs },
        retryable: true,
        suggestedAction: 'Retry the operation or increase ADVISOR_LLM_TIMEOUT_MS'
      }
    );
  }

  /**
   * Create error for an unusable generative-model response
   */
  static llmResponseInvalid(agentName: string, reason: string, validationErrors?: ValidationError[]): AdvisorError {
    return new AdvisorError(
      AdvisorErrorCode.LLM_RESPONSE_INVALID,
      `Agent ${agentName} returned an unusable response`,
      reason,
      {
        category: ErrorCategory.PARSING,
        severity: ErrorSeverity.MEDIUM,
        context: { agentName },
        validationErrors,
        retryable: true
      }
    );
  }

  /**
   * Create configuration error
   */
  static configurationError(field: string, reason: string): AdvisorError {
    return new AdvisorError(
      AdvisorErrorCode.CONFIGURATION_ERROR,
      'Configuration error',
      `Invalid configuration for ${field}: ${reason}`,
      {
        category: ErrorCategory.CONFIGURATION,
        severity: ErrorSeverity.CRITICAL,
        context: { field },
        retryable: false,
        suggestedAction: 'Check configuration settings'
      }
    );
  }

  /**
   * Create error for a forbidden combination of options
   */
  static unsafeConfiguration(reason: string, flags: Record<string, boolean>): AdvisorError {
    return new AdvisorError(
      AdvisorErrorCode.UNSAFE_CONFIGURATION,
      'Unsafe configuration',
      reason,
      {
        category: ErrorCategory.SAFETY,
        severity: ErrorSeverity.CRITICAL,
        context: flags,
        retryable: false,
        suggestedAction: 'Disable auto-apply when enforcement is enabled'
      }
    );
  }

  /**
   * Create error raised when analysis touched spec files
   */
  static safetyViolation(changedFiles: string[]): AdvisorError {
    return new AdvisorError(
      AdvisorErrorCode.SAFETY_VIOLATION,
      'Spec files were modified during analysis',
      `Changed: ${changedFiles.join(', ')}`,
      {
        category: ErrorCategory.SAFETY,
        severity: ErrorSeverity.CRITICAL,
        context: { changedFiles },
        retryable: false,
        suggestedAction: 'Restore the spec files from version control'
      }
    );
  }
}
