/**
 * Deadline enforcement for collaborator calls.
 *
 * @module pipeline/timeout
 */

import { isTimeoutError } from '../resolver/here-client.js';

/**
 * Error thrown when a collaborator call exceeds its deadline.
 */
export class ResolutionTimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message);
    this.name = 'ResolutionTimeoutError';
  }
}

/**
 * Execute a promise with a timeout.
 *
 * Uses Promise.race to enforce the deadline. The timer is always cleared,
 * whether the promise settles first or the deadline passes.
 *
 * @param promise - Promise to execute
 * @param timeoutMs - Timeout in milliseconds
 * @param operationName - Name for the error message
 * @throws ResolutionTimeoutError if the deadline passes first
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operationName: string
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new ResolutionTimeoutError(`${operationName} timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * True for a pipeline deadline or an aborted HTTP request.
 */
export function isResolutionTimeout(error: unknown): boolean {
  return error instanceof ResolutionTimeoutError || isTimeoutError(error);
}
