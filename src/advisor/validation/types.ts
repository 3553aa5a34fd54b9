/**
 * Validation Types
 */

/**
 * Validation error for a specific field
 */
export interface ValidationError {
  field: string;
  message: string;
  received?: unknown;
}

/**
 * Result of validation
 */
export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}
