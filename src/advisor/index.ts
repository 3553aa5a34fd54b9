/**
 * Fixture Advisor
 *
 * Turns per-example test profiling data into one explainable
 * fixture-strategy recommendation per example.
 */

export * from './types';
export * from './validation';
export * from './errors';
export { AdvisorLogger, LogType } from './logging/logger';
export type { LogEntry } from './logging/logger';
export { ConfigManager, DEFAULT_CONFIG, loadConfig, mergeConfig } from './config';
export type { AdvisorConfigInput } from './config';
export * from './normalizer';
export * from './agents';
export * from './consensus';
export * from './safety';
export * from './output';
export { analyzeProfile, analyzeRaw, analyzeBatch } from './pipeline';
export type { AnalyzeOptions, AnalysisResult, BatchResult, RawProfileInput } from './pipeline';
export { runCli, parseArgs } from './cli';
export type { CliOptions, CliIO } from './cli';
export { LLMClient, createLLMClientFromEnv, parseJsonResponse } from '../shared/llm';
export type { LLMCompleter, LLMRequest, LLMResponse, LLMConfig } from '../shared/llm';
