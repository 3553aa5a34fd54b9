/**
 * Advisor Validation Module
 *
 * Exports validation utilities, schemas, and types.
 */

export * from './validator';
export * from './schemas';
export type { ValidationResult, ValidationError } from './types';
