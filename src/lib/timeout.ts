/**
 * Per-operation time budgets
 */

import { LookupTimeoutError } from './errors.js';

/**
 * Race an operation against a timer. The timer is always cleared, so a settled
 * operation leaves nothing scheduled behind it.
 */
export async function withTimeout<T>(operation: string, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined;

  const timer = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => reject(new LookupTimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), timer]);
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle);
  }
}
