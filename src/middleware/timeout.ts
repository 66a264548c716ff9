/**
 * Execution timeout middleware.
 *
 * Rejects job execution that runs longer than the configured duration, so
 * the worker reports it as an exception and failure. The job function itself
 * keeps running unless it watches for cancellation on its own.
 *
 * @example
 * ```typescript
 * worker.use(timeout({ timeoutMs: 30_000 }));
 * ```
 *
 * @module
 */

import { GearmanTimeoutError } from '../errors.js';
import type { ExecutionMiddleware, JobContext, NextFunction } from '../middleware.js';

/** Options for the timeout middleware. */
export interface TimeoutOptions {
  /** Maximum execution time in milliseconds. */
  timeoutMs: number;
}

/**
 * Creates execution middleware that rejects with a {@link GearmanTimeoutError}
 * if what it wraps takes longer than `timeoutMs`.
 */
export function timeout(options: TimeoutOptions): ExecutionMiddleware {
  const { timeoutMs } = options;

  return async (ctx: JobContext, next: NextFunction): Promise<unknown> => {
    let timer: ReturnType<typeof setTimeout> | undefined;

    try {
      return await Promise.race([
        next(),
        new Promise<never>((_resolve, reject) => {
          timer = setTimeout(
            () => reject(new GearmanTimeoutError(ctx.job.handle, timeoutMs)),
            timeoutMs,
          );
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  };
}
