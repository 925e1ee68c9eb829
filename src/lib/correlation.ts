/**
 * Correlation Context
 * Carries a correlation ID through a request's probes, scoring and rendering.
 * Uses AsyncLocalStorage to propagate context through async operations.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/** Correlation context carried through async operations */
export interface CorrelationContext {
  correlationId: string;
  /** Timestamp (ms) when the request entered the engine */
  startedAt: number;
  /** Current processing stage */
  stage: ProcessingStage;
  /** Every stage entered, with its offset from startedAt */
  transitions: StageTransition[];
}

export interface StageTransition {
  stage: ProcessingStage;
  atMs: number;
}

/** Snapshot of a context for the request log */
export interface CorrelationSummary {
  correlationId: string;
  stage: ProcessingStage;
  elapsedMs: number;
  stages: ProcessingStage[];
}

/** Processing stages for lifecycle tracking */
export type ProcessingStage =
  | 'received'
  | 'validation'
  | 'variant-generation'
  | 'registration-probe'
  | 'scoring'
  | 'rendering'
  | 'completed'
  | 'rejected';

const storage = new AsyncLocalStorage<CorrelationContext>();

/** Generate a new correlation ID */
export function generateCorrelationId(): string {
  return `corr-${randomUUID()}`;
}

/** Get the current correlation context (if any) */
export function getCorrelationContext(): CorrelationContext | undefined {
  return storage.getStore();
}

/** Get the current correlation ID, or 'none' if not in a context */
export function getCorrelationId(): string {
  return storage.getStore()?.correlationId ?? 'none';
}

/** Update the current processing stage */
export function setProcessingStage(stage: ProcessingStage): void {
  const ctx = storage.getStore();
  if (!ctx || ctx.stage === stage) return;
  ctx.stage = stage;
  ctx.transitions.push({ stage, atMs: Date.now() - ctx.startedAt });
}

export function summarizeCorrelation(context: CorrelationContext, now: number = Date.now()): CorrelationSummary {
  return {
    correlationId: context.correlationId,
    stage: context.stage,
    elapsedMs: now - context.startedAt,
    stages: context.transitions.map((t) => t.stage),
  };
}

/** Run a function within a new correlation context */
export function runWithCorrelation<T>(correlationId: string, fn: () => T): T {
  const context: CorrelationContext = {
    correlationId,
    startedAt: Date.now(),
    stage: 'received',
    transitions: [{ stage: 'received', atMs: 0 }],
  };
  return storage.run(context, fn);
}
