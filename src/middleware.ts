/**
 * Execution middleware for worker-side job handling.
 *
 * Middleware wraps a job function: it receives the job context and a
 * `next()` that runs whatever it wraps. Worker-wide middleware wraps
 * middleware scoped to one function, which wraps the function itself.
 */

import type { PayloadInput } from './frame.js';
import type { Job } from './job.js';

/** The context provided to execution middleware and job functions. */
export interface JobContext {
  /** The job being executed. */
  job: Job;
  /** ID of the worker executing the job. */
  workerId: string;
  /** Mutable metadata store scoped to this execution. */
  metadata: Map<string, unknown>;
  /** Aborted if the connection is lost while the job runs. */
  signal: AbortSignal;
  /** Push a WORK_DATA chunk to the server. */
  sendData(chunk: PayloadInput): void;
  /** Push a WORK_WARNING chunk to the server. */
  sendWarning(chunk: PayloadInput): void;
  /** Push a WORK_STATUS progress report to the server. */
  sendStatus(numerator: number, denominator: number): void;
}

/** Runs the wrapped middleware or, innermost, the job function. */
export type NextFunction = () => Promise<unknown>;

/** An execution middleware function. */
export type ExecutionMiddleware = (
  ctx: JobContext,
  next: NextFunction,
) => Promise<unknown>;

/**
 * Wrap `handler` in `middlewares`, the first being outermost.
 *
 * Each `next()` may be called once per job; a second call rejects.
 */
export function composeExecution(
  middlewares: readonly ExecutionMiddleware[],
  handler: (ctx: JobContext) => Promise<unknown>,
): (ctx: JobContext) => Promise<unknown> {
  return middlewares.reduceRight<(ctx: JobContext) => Promise<unknown>>(
    (inner, middleware) => (ctx) => {
      let called = false;
      return middleware(ctx, () => {
        if (called) {
          return Promise.reject(new Error('next() called multiple times'));
        }
        called = true;
        return inner(ctx);
      });
    },
    handler,
  );
}
