/**
 * Per-job log lines: one when a job starts (debug only), one when it
 * completes and one when it fails.
 *
 * @example
 * ```typescript
 * import { GearmanWorker } from 'gearman-wire';
 * import { logging } from 'gearman-wire/middleware';
 *
 * const worker = new GearmanWorker(connection);
 * worker.use(logging({ level: 'debug' }));
 * ```
 *
 * @module
 */

import { performance } from 'node:perf_hooks';
import { describeError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { ExecutionMiddleware } from '../middleware.js';

const LEVELS = { debug: 0, info: 1, error: 2 } as const;

/** Options for the logging middleware. */
export interface LoggingOptions {
  /** Logger instance. Defaults to `console`. */
  logger?: Logger;
  /** Minimum log level. Defaults to `'info'`. */
  level?: keyof typeof LEVELS;
}

/** Size of what a job received or returned, as sent on the wire. */
function byteLength(value: unknown): number {
  if (typeof value === 'string') return Buffer.byteLength(value);
  if (value instanceof Uint8Array) return value.byteLength;
  return 0;
}

export function logging(options?: LoggingOptions): ExecutionMiddleware {
  const logger = options?.logger ?? console;
  const threshold = LEVELS[options?.level ?? 'info'];

  return async (ctx, next) => {
    const { handle, functionName, data } = ctx.job;
    const label = `${functionName} (handle=${handle}, worker=${ctx.workerId})`;
    const start = performance.now();
    const elapsed = (): string => `${(performance.now() - start).toFixed(2)}ms`;

    if (threshold <= LEVELS.debug) {
      logger.debug(`[gearman] Job started: ${label}, ${data.length} bytes in`);
    }

    let result: unknown;
    try {
      result = await next();
    } catch (error) {
      logger.error(`[gearman] Job failed: ${label} after ${elapsed()}: ${describeError(error)}`);
      throw error;
    }

    if (threshold <= LEVELS.info) {
      logger.log(`[gearman] Job completed: ${label} in ${elapsed()}, ${byteLength(result)} bytes out`);
    }
    return result;
  };
}
