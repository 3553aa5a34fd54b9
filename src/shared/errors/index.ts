/**
 * Errors Module
 *
 * Standardized error types and error logging shared across the advisor.
 */

export * from './types';
export * from './logger';
