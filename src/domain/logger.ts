/**
 * Structured JSON logger for the Stedsnavn OSM server
 *
 * All logs go to stderr because stdout is reserved for MCP protocol communication.
 * Entries written inside a request context carry its request id and unit code.
 */

import { getContext } from './request-context.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  requestId?: string;
  unit?: string;
  context?: LogContext;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

class Logger {
  private minLevel: LogLevel;
  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levelPriority[level] >= this.levelPriority[this.minLevel];
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const request = getContext();
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(request ? { requestId: request.requestId } : {}),
      ...(request?.unitCode ? { unit: request.unitCode } : {}),
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };

    console.error(JSON.stringify(entry));
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  /**
   * Log an error object with stack trace
   */
  logError(error: Error, context?: LogContext): void {
    this.error(error.message, {
      ...context,
      errorName: error.name,
      stack: error.stack,
    });
  }

  logToolStart(toolName: string, input: unknown, requestId?: string): void {
    this.info('Tool call started', {
      requestId,
      toolName,
      inputSummary: this.summarizeInput(input),
    });
  }

  logToolEnd(
    toolName: string,
    latencyMs: number,
    outcome: 'success' | 'error',
    requestId?: string,
    errorCode?: string
  ): void {
    this.info('Tool call completed', {
      requestId,
      toolName,
      latencyMs,
      outcome,
      ...(errorCode && { errorCode }),
    });
  }

  /**
   * Log a call to Kartverket / Geonorge (WFS, kommuneinfo)
   */
  logUpstreamCall(
    upstreamUrl: string,
    upstreamStatus: number,
    latencyMs: number,
    bytes?: number,
    requestId?: string
  ): void {
    this.debug('Upstream call', {
      requestId,
      upstreamUrl,
      upstreamStatus,
      latencyMs,
      bytes,
    });
  }

  /**
   * Only the conversion parameters are logged, never file contents
   */
  private summarizeInput(input: unknown): Record<string, unknown> {
    if (typeof input !== 'object' || input === null) {
      return { type: typeof input };
    }

    const summary: Record<string, unknown> = {};
    const safeFields = [
      'scope',
      'nameType',
      'includeUntagged',
      'sourceMode',
      'skipBuildingRelocation',
      'includeAllWaterwayPoints',
      'firstPath',
      'secondPath',
    ];

    for (const field of safeFields) {
      if (field in input) {
        summary[field] = Reflect.get(input, field);
      }
    }

    return summary;
  }
}

const logger = new Logger();

export { Logger, logger };
