/**
 * Structured logging with Winston
 */

import winston from 'winston';
import { PerformanceMetrics, PerformanceSummary } from './types.js';
import { getErrorMessage } from './errors.js';
import { getCorrelationId } from './correlation.js';

// Winston logger instance
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL?.toLowerCase() || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ],
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Enrich metadata with correlation ID from async context */
function enrichWithCorrelation(meta?: Record<string, unknown>): Record<string, unknown> | undefined {
  const correlationId = getCorrelationId();
  if (correlationId === 'none') return meta;
  return { correlationId, ...meta };
}

/**
 * Engine logger with correlation-aware methods
 */
export class EngineLogger {
  private performanceMetrics: PerformanceMetrics[] = [];
  private maxMetrics = 1000;

  info(message: string, meta?: Record<string, unknown>): void {
    logger.info(message, enrichWithCorrelation(meta));
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    logger.warn(message, enrichWithCorrelation(meta));
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      logger.error(message, enrichWithCorrelation({ error: error.message, stack: error.stack }));
    } else if (isRecord(error)) {
      logger.error(message, enrichWithCorrelation(error));
    } else {
      const base = error !== undefined ? { error: getErrorMessage(error) } : undefined;
      logger.error(message, enrichWithCorrelation(base));
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    logger.debug(message, enrichWithCorrelation(meta));
  }

  /** Decisions that end up in a report (scores, tiers, registrations found) */
  audit(message: string, meta?: Record<string, unknown>): void {
    logger.info(`[AUDIT] ${message}`, enrichWithCorrelation(meta));
  }

  addPerformanceMetric(metric: PerformanceMetrics): void {
    this.performanceMetrics.push(metric);
    if (this.performanceMetrics.length > this.maxMetrics) {
      this.performanceMetrics.shift();
    }
  }

  getPerformanceMetrics(hours: number = 1): PerformanceMetrics[] {
    const since = new Date(Date.now() - hours * 60 * 60 * 1000);
    return this.performanceMetrics.filter((m) => m.timestamp >= since);
  }

  summarizePerformance(hours: number = 1): PerformanceSummary {
    const metrics = this.getPerformanceMetrics(hours);
    const totalDuration = metrics.reduce((sum, m) => sum + m.duration, 0);
    return {
      operations: metrics.length,
      failures: metrics.filter((m) => !m.success).length,
      averageDurationMs: metrics.length > 0 ? Math.round(totalDuration / metrics.length) : 0,
    };
  }
}

/**
 * Performance timer utility
 */
export class PerformanceTimer {
  private startTime: number;

  constructor(private operation: string) {
    this.startTime = Date.now();
    engineLogger.debug(`Starting: ${operation}`);
  }

  end(success: boolean, errorMessage?: string): number {
    const duration = Date.now() - this.startTime;

    engineLogger.addPerformanceMetric({
      timestamp: new Date(),
      operation: this.operation,
      duration,
      success,
      ...(errorMessage && { errorMessage }),
    });

    if (success) {
      engineLogger.debug(`Completed: ${this.operation} (${duration}ms)`);
    } else {
      engineLogger.warn(`Failed: ${this.operation} (${duration}ms)`, { errorMessage });
    }
    return duration;
  }
}

// Export singleton instance
export const engineLogger = new EngineLogger();
