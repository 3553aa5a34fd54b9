/**
 * Advisor Logger
 *
 * Audit log of analyses, agent verdicts, consensus decisions and errors.
 * Entries are kept in memory (bounded) so callers and tests can inspect why a
 * recommendation was made, and are forwarded to pino at debug level.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ErrorLogger } from '../../shared/errors/logger';
import { AppError } from '../../shared/errors/types';
import { createComponentLogger } from '../../shared/logger';
import type { ProfileRecord, Recommendation, Verdict } from '../types';

const log = createComponentLogger('advisor');

/**
 * Log entry types
 */
export enum LogType {
  NORMALIZATION = 'NORMALIZATION',
  ANALYSIS = 'ANALYSIS',
  VERDICT = 'VERDICT',
  DECISION = 'DECISION',
  ENFORCEMENT = 'ENFORCEMENT',
  ERROR = 'ERROR',
  INFO = 'INFO'
}

export interface LogEntry {
  type: LogType;
  timestamp: Date;
  message: string;
  context?: Record<string, unknown>;
}

export const DEFAULT_MAX_LOGS = 5000;

/**
 * Settings for the entries recorded inside one analysis call
 */
export interface AuditScope {
  enabled: boolean;
}

export class AdvisorLogger {
  private static logs: LogEntry[] = [];
  private static maxLogs = DEFAULT_MAX_LOGS;
  private static enabled = true;
  private static scope = new AsyncLocalStorage<AuditScope>();

  /**
   * Enable or disable the audit log for the whole process. Errors still
   * reach ErrorLogger.
   */
  static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  /**
   * Whether entries are recorded here; a scope set by runScoped overrides
   * the process-wide switch
   */
  static isEnabled(): boolean {
    return this.scope.getStore()?.enabled ?? this.enabled;
  }

  /**
   * Run fn with its own audit settings. Concurrent scopes do not see each
   * other's settings.
   */
  static runScoped<T>(settings: AuditScope, fn: () => T): T {
    return this.scope.run({ enabled: settings.enabled }, fn);
  }

  static setMaxLogs(maxLogs: number): void {
    this.maxLogs = maxLogs;
    if (this.logs.length > maxLogs) {
      this.logs = this.logs.slice(-maxLogs);
    }
  }

  /**
   * Log a normalized profile
   */
  static logNormalization(record: ProfileRecord): void {
    if (!this.isEnabled()) return;

    this.addLog({
      type: LogType.NORMALIZATION,
      timestamp: new Date(),
      message: `Normalized profile ${record.location || '(unknown location)'}`,
      context: {
        specLocation: record.location,
        specType: record.specType,
        runtimeMs: record.runtimeMs,
        factoryCount: Object.keys(record.factories).length,
        eventCount: Object.keys(record.events).length
      }
    });
  }

  /**
   * Log the start of an analysis
   */
  static logAnalysisStart(record: ProfileRecord, agentNames: string[]): void {
    if (!this.isEnabled()) return;

    this.addLog({
      type: LogType.ANALYSIS,
      timestamp: new Date(),
      message: `Analyzing ${record.location || '(unknown location)'} with ${agentNames.length} agents`,
      context: {
        specLocation: record.location,
        agents: agentNames
      }
    });
  }

  /**
   * Log one agent verdict
   */
  static logVerdict(specLocation: string, verdict: Verdict, durationMs?: number): void {
    if (!this.isEnabled()) return;

    this.addLog({
      type: LogType.VERDICT,
      timestamp: new Date(),
      message: `${verdict.agentName}: ${verdict.verdict} (${verdict.confidence})`,
      context: {
        specLocation,
        agentName: verdict.agentName,
        verdict: verdict.verdict,
        confidence: verdict.confidence,
        durationMs
      }
    });
  }

  /**
   * Log the consensus decision
   */
  static logDecision(recommendation: Recommendation): void {
    if (!this.isEnabled()) return;

    this.addLog({
      type: LogType.DECISION,
      timestamp: new Date(),
      message: `Recommendation for ${recommendation.specLocation || '(unknown location)'}: ${recommendation.action} (${recommendation.confidence})`,
      context: {
        specLocation: recommendation.specLocation,
        action: recommendation.action,
        confidence: recommendation.confidence,
        fromValue: recommendation.fromValue,
        toValue: recommendation.toValue,
        verdicts: recommendation.agentResults.map(r => `${r.agentName}:${r.verdict}`)
      }
    });
  }

  static logEnforcement(exitCode: number, qualifying: number, total: number): void {
    if (!this.isEnabled()) return;

    this.addLog({
      type: LogType.ENFORCEMENT,
      timestamp: new Date(),
      message: `Enforcement exit code ${exitCode}`,
      context: { exitCode, qualifying, total }
    });
  }

  /**
   * Log an error
   */
  static logError(error: AppError | Error, context?: Record<string, unknown>): void {
    // Use shared error logger
    ErrorLogger.logError(error);

    if (!this.isEnabled()) return;

    this.addLog({
      type: LogType.ERROR,
      timestamp: new Date(),
      message: error.message,
      context: {
        ...context,
        error: error instanceof AppError ? {
          category: error.category,
          severity: error.severity,
          recoverable: error.recoverable
        } : {
          name: error.name,
          stack: error.stack
        }
      }
    });
  }

  static logInfo(message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled()) return;

    this.addLog({
      type: LogType.INFO,
      timestamp: new Date(),
      message,
      context
    });
  }

  static getLogs(): LogEntry[] {
    return [...this.logs];
  }

  static getLogsByType(type: LogType): LogEntry[] {
    return this.logs.filter(entry => entry.type === type);
  }

  /**
   * Get every entry recorded for one spec location
   */
  static getLogsForExample(specLocation: string): LogEntry[] {
    return this.logs.filter(entry => entry.context?.specLocation === specLocation);
  }

  static clearLogs(): void {
    this.logs = [];
  }

  static exportLogs(): string {
    return JSON.stringify(this.logs, null, 2);
  }

  private static addLog(entry: LogEntry): void {
    this.logs.push(entry);

    // Keep only the most recent logs
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    log.debug({ type: entry.type, ...entry.context }, entry.message);
  }
}
