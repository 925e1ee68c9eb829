/**
 * Standardized error handling utilities
 */

/** A single failed check on an input field */
export interface ValidationIssue {
  path: string;
  message: string;
}

/** Malformed input rejected at a boundary */
export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** Similarity signal outside [0,100] or a negative/fractional mention count */
export class InputOutOfRangeError extends ValidationError {
  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message, issues);
    this.name = 'InputOutOfRangeError';
  }
}

/** A lookup that did not settle within its time budget */
export class LookupTimeoutError extends Error {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'LookupTimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/** Safely convert unknown caught value to an Error instance */
export function toError(err: unknown): Error {
  if (err instanceof Error) return err;
  return new Error(String(err));
}

/** Extract error message string from unknown caught value */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
