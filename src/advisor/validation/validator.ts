/**
 * Advisor Validator Utilities
 *
 * Validation utilities for advisor inputs and outputs.
 */

import { z } from 'zod';
import { ValidationResult, ValidationError } from './types';
import {
  ProfileRecordSchema,
  VerdictSchema,
  RecommendationSchema,
  AdvisorConfigSchema,
  LlmVerdictResponseSchema
} from './schemas';
import type { LlmVerdictResponse } from './schemas';
import type { ProfileRecord, Verdict, Recommendation, AdvisorConfig } from '../types';

/**
 * Converts Zod validation errors to ValidationResult
 */
function zodErrorToValidationResult(error: z.ZodError): ValidationResult {
  const errors: ValidationError[] = error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message
  }));

  return {
    isValid: false,
    errors
  };
}

function toValidationResult<I, O>(result: z.SafeParseReturnType<I, O>): ValidationResult {
  if (result.success) {
    return {
      isValid: true,
      errors: []
    };
  }

  return zodErrorToValidationResult(result.error);
}

/**
 * Profile Record Validator
 */
export class ProfileRecordValidator {
  /**
   * Validates a normalized profile record
   * @returns Validation result with specific errors for each invalid field
   */
  validate(record: unknown): ValidationResult {
    return toValidationResult(ProfileRecordSchema.safeParse(record));
  }

  /**
   * Validates and parses a profile record, throwing on error
   * @throws ZodError if validation fails
   */
  validateAndParse(record: unknown): ProfileRecord {
    return ProfileRecordSchema.parse(record);
  }
}

/**
 * Verdict Validator
 */
export class VerdictValidator {
  validate(verdict: unknown): ValidationResult {
    return toValidationResult(VerdictSchema.safeParse(verdict));
  }

  validateAndParse(verdict: unknown): Verdict {
    return VerdictSchema.parse(verdict);
  }

  /**
   * Validates the JSON object returned by a generative-model agent
   */
  validateLlmResponse(response: unknown): ValidationResult {
    return toValidationResult(LlmVerdictResponseSchema.safeParse(response));
  }

  validateAndParseLlmResponse(response: unknown): LlmVerdictResponse {
    return LlmVerdictResponseSchema.parse(response);
  }
}

/**
 * Recommendation Validator
 */
export class RecommendationValidator {
  validate(recommendation: unknown): ValidationResult {
    return toValidationResult(RecommendationSchema.safeParse(recommendation));
  }

  validateAndParse(recommendation: unknown): Recommendation {
    return RecommendationSchema.parse(recommendation);
  }
}

/**
 * Configuration Validator
 */
export class ConfigValidator {
  /**
   * Validates a fully merged advisor configuration
   */
  validate(config: unknown): ValidationResult {
    return toValidationResult(AdvisorConfigSchema.safeParse(config));
  }

  validateAndParse(config: unknown): AdvisorConfig {
    return AdvisorConfigSchema.parse(config);
  }
}

// Export singleton instances
export const profileRecordValidator = new ProfileRecordValidator();
export const verdictValidator = new VerdictValidator();
export const recommendationValidator = new RecommendationValidator();
export const configValidator = new ConfigValidator();

// ============================================================================
// Predicates
// ============================================================================

/**
 * True when the value is a verdict the consensus engine can consume
 */
export function isWellFormedVerdict(value: unknown): value is Verdict {
  return VerdictSchema.safeParse(value).success;
}

/**
 * True when the action is recognized and every agent result is well formed
 */
export function isValidRecommendation(value: unknown): value is Recommendation {
  return RecommendationSchema.safeParse(value).success;
}

export function isActionable(recommendation: Pick<Recommendation, 'action'>): boolean {
  return recommendation.action !== 'no_action';
}
