/**
 * Gearman worker: the consumer side of the protocol.
 *
 * The worker declares the functions it can run, grabs jobs from the
 * server, sleeps when there is nothing to do until the server wakes it
 * with a NOOP, and reports each job's outcome back over the connection.
 */

import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import { Command } from './commands.js';
import type { GearmanConnection } from './connection.js';
import { Deferred } from './deferred.js';
import {
  GearmanConnectionLostError,
  GearmanError,
  GearmanMalformedJobError,
  GearmanNotConnectedError,
  GearmanUnexpectedReplyError,
  describeError,
  parseServerError,
} from './errors.js';
import {
  GearmanEventEmitter,
  type GearmanEvent,
  type GearmanEventDataMap,
  type GearmanEventType,
  type WorkerStoppedData,
} from './events.js';
import { joinFields, toPayload, type PayloadInput } from './frame.js';
import { parseJob, type Job } from './job.js';
import type { Logger } from './logger.js';
import { composeExecution, type ExecutionMiddleware, type JobContext } from './middleware.js';

/** Where the worker is in its grab/sleep/execute cycle. */
export type WorkerState = 'idle' | 'grabbing' | 'sleeping' | 'executing' | 'reporting';

/** What a job function may return. Nothing or null completes with empty data. */
export type JobResult = string | Uint8Array | null | undefined | void;

/** A job function: receives the job's data and returns its result. */
export type JobFunction = (
  data: Buffer,
  ctx: JobContext,
) => JobResult | Promise<JobResult>;

/** Options for {@link GearmanWorker.registerFunction}. */
export interface RegisterOptions {
  /** Seconds the server should allow per job before giving up on this worker. */
  timeout?: number;
}

/** Configuration for GearmanWorker. */
export interface GearmanWorkerConfig {
  /** Identifier used in events. Default: `worker_<uuid>`. */
  workerId?: string;
  /** Logger instance. Defaults to `console`. */
  logger?: Logger;
}

/** A sleep shared by every caller until the server's NOOP arrives. */
interface PendingWake {
  done: Deferred<void>;
  /** Run synchronously on NOOP, before the next frame is dispatched. */
  continuations: (() => void)[];
}

export class GearmanWorker {
  private readonly connection: GearmanConnection;
  private readonly functions = new Map<string, JobFunction>();
  private readonly sharedMiddleware: ExecutionMiddleware[] = [];
  private readonly functionMiddleware = new Map<string, ExecutionMiddleware[]>();
  private readonly logger: Logger;

  /** The worker ID for this instance. */
  readonly workerId: string;

  /** Event emitter for worker-side events. */
  readonly events = new GearmanEventEmitter();

  private state: WorkerState = 'idle';
  private pendingWake: PendingWake | null = null;
  private readonly activeJobs = new Map<string, AbortController>();
  private currentJob: Promise<void> | null = null;
  private running = false;
  private serving = false;
  private serveController: AbortController | null = null;
  private jobsCompleted = 0;
  private startedAt = 0;

  constructor(connection: GearmanConnection, config: GearmanWorkerConfig = {}) {
    this.connection = connection;
    this.workerId = config.workerId ?? `worker_${randomUUID()}`;
    this.logger = config.logger ?? console;

    connection.onLost((error) => {
      const wake = this.pendingWake;
      this.pendingWake = null;
      wake?.done.reject(error);
      for (const controller of this.activeJobs.values()) {
        controller.abort(error);
      }
    });
  }

  /** Current position in the grab/sleep/execute cycle. */
  get currentState(): WorkerState {
    return this.state;
  }

  /** Whether the serve loop started by {@link start} is active. */
  get isRunning(): boolean {
    return this.running;
  }

  /** Names of the functions this worker has declared. */
  get functionNames(): string[] {
    return [...this.functions.keys()];
  }

  // ---- Registration ----

  /**
   * Register a function and declare it to the server.
   *
   * Registering a name again replaces its function without declaring it twice.
   *
   * @example
   * ```ts
   * worker.registerFunction('reverse', (data) => Buffer.from(data).reverse());
   * ```
   */
  registerFunction(name: string, fn: JobFunction, options?: RegisterOptions): this {
    if (!this.functions.has(name)) {
      if (options?.timeout !== undefined) {
        this.connection.sendRaw(
          Command.CAN_DO_TIMEOUT,
          joinFields(name, String(options.timeout)),
        );
      } else {
        this.connection.sendRaw(Command.CAN_DO, name);
      }
    }
    this.functions.set(name, fn);
    return this;
  }

  /** Withdraw a function. Unknown names are ignored. */
  unregisterFunction(name: string): this {
    if (this.functions.has(name)) {
      this.connection.sendRaw(Command.CANT_DO, name);
      this.functions.delete(name);
    }
    return this;
  }

  /** Withdraw every function. */
  resetAbilities(): this {
    this.connection.sendRaw(Command.RESET_ABILITIES);
    this.functions.clear();
    return this;
  }

  /** Set the ID the server shows for this worker in its admin listings. */
  setClientId(clientId: string): this {
    this.connection.sendRaw(Command.SET_CLIENT_ID, clientId);
    return this;
  }

  /**
   * Add execution middleware. Without a function name it wraps every job;
   * with one it wraps only jobs for that function, inside the shared
   * middleware.
   *
   * @example
   * ```ts
   * worker.use(async (ctx, next) => {
   *   const start = Date.now();
   *   const result = await next();
   *   console.log(`${ctx.job.functionName} took ${Date.now() - start}ms`);
   *   return result;
   * });
   * worker.use('resize', timeout({ timeoutMs: 5_000 }));
   * ```
   */
  use(fn: ExecutionMiddleware): this;
  use(functionName: string, fn: ExecutionMiddleware): this;
  use(nameOrFn: string | ExecutionMiddleware, fn?: ExecutionMiddleware): this {
    if (typeof nameOrFn === 'function') {
      this.sharedMiddleware.push(nameOrFn);
      return this;
    }
    if (!fn) {
      throw new TypeError(`Middleware for '${nameOrFn}' needs a function.`);
    }
    const scoped = this.functionMiddleware.get(nameOrFn) ?? [];
    scoped.push(fn);
    this.functionMiddleware.set(nameOrFn, scoped);
    return this;
  }

  /** Middleware that runs for jobs of `functionName`, outermost first. */
  middlewareFor(functionName: string): readonly ExecutionMiddleware[] {
    return [...this.sharedMiddleware, ...(this.functionMiddleware.get(functionName) ?? [])];
  }

  // ---- Job acquisition ----

  /**
   * Declare sleep and wait for the server's NOOP.
   *
   * Concurrent callers share one pending wake: only the first sends PRE_SLEEP.
   */
  sleepUntilWoken(): Promise<void> {
    return this.sleep().done.promise;
  }

  private sleep(): PendingWake {
    if (this.pendingWake) {
      return this.pendingWake;
    }

    const wake: PendingWake = { done: new Deferred<void>(), continuations: [] };
    const onFrame = (command: number): void => {
      if (command !== Command.NOOP) return;
      this.connection.unregisterUnsolicited(onFrame);
      if (this.pendingWake === wake) {
        this.pendingWake = null;
      }
      if (this.state === 'sleeping') {
        this.state = 'idle';
      }
      for (const continuation of wake.continuations.splice(0)) {
        continuation();
      }
      wake.done.resolve();
    };

    this.pendingWake = wake;
    this.connection.registerUnsolicited(onFrame);
    try {
      this.connection.preSleep();
    } catch (error) {
      this.connection.unregisterUnsolicited(onFrame);
      this.pendingWake = null;
      wake.done.reject(error);
      return wake;
    }
    this.state = 'sleeping';
    return wake;
  }

  /**
   * Grab the next job, sleeping while the server has none.
   *
   * Each reply is acted on as it is dispatched: a NO_JOB declares sleep and
   * a NOOP wake-up sends the next GRAB_JOB before any later frame from the
   * same read is processed. A call made while the worker is already asleep
   * joins the same wake-up.
   *
   * @param signal - Once aborted, no further GRAB_JOB is sent and the call
   *   rejects with the abort reason.
   * @throws GearmanMalformedJobError if the assignment cannot be parsed.
   */
  getJob(signal?: AbortSignal): Promise<Job> {
    const result = new Deferred<Job>();
    const fail = (error: unknown): void => {
      this.state = 'idle';
      result.reject(error);
    };

    const afterWake = (wake: PendingWake): void => {
      wake.continuations.push(grab);
      wake.done.promise.catch(fail);
    };

    const grab = (): void => {
      if (signal?.aborted) {
        fail(signal.reason);
        return;
      }
      this.state = 'grabbing';
      this.connection
        .send(Command.GRAB_JOB, undefined, (reply) => {
          switch (reply.command) {
            case Command.JOB_ASSIGN: {
              const job = parseJob(reply.payload);
              this.state = 'idle';
              result.resolve(job);
              return;
            }
            case Command.NO_JOB:
              afterWake(this.sleep());
              return;
            case Command.NOOP:
              // A wake-up answered the grab; grab again.
              grab();
              return;
            case Command.ERROR:
              throw parseServerError(reply.payload);
            default:
              throw new GearmanUnexpectedReplyError('GRAB_JOB', reply.command);
          }
        })
        .catch(fail);
    };

    if (this.pendingWake) {
      afterWake(this.pendingWake);
    } else {
      grab();
    }
    return result.promise;
  }

  /**
   * Grab one job, run it and report the outcome.
   *
   * Errors thrown by the job function are reported to the server and do
   * not reject; protocol errors (connection loss) do.
   */
  async doJob(signal?: AbortSignal): Promise<void> {
    const job = await this.getJob(signal);
    const run = this.reportResult(job);
    this.currentJob = run;
    try {
      await run;
    } finally {
      if (this.currentJob === run) {
        this.currentJob = null;
      }
    }
  }

  // ---- Reporting ----

  /**
   * Run the function registered for `job` and send its outcome:
   * WORK_COMPLETE with the result, or WORK_EXCEPTION followed by WORK_FAIL.
   */
  async reportResult(job: Job): Promise<void> {
    const fn = this.functions.get(job.functionName);
    const controller = new AbortController();
    const startedAt = performance.now();
    this.activeJobs.set(job.handle, controller);
    this.state = 'executing';

    try {
      let result: Buffer;
      try {
        if (!fn) {
          throw new GearmanError(
            `No function registered for '${job.functionName}'.`,
            'function_not_found',
          );
        }
        const execute = composeExecution(
          this.middlewareFor(job.functionName),
          async (ctx) => fn(ctx.job.data, ctx),
        );
        result = toResultPayload(await execute(this.createContext(job, controller.signal)));
      } catch (error) {
        const description = describeError(error);
        this.state = 'reporting';
        this.sendJobResponse(Command.WORK_EXCEPTION, job, description);
        this.sendJobResponse(Command.WORK_FAIL, job);

        await this.emitSafely(
          GearmanEventEmitter.createEvent(
            'job.failed',
            this.source,
            {
              function_name: job.functionName,
              duration_ms: performance.now() - startedAt,
              error: description,
            },
            job.handle,
          ),
        );
        return;
      }

      this.state = 'reporting';
      this.sendJobResponse(Command.WORK_COMPLETE, job, result);
      this.jobsCompleted++;

      await this.emitSafely(
        GearmanEventEmitter.createEvent(
          'job.completed',
          this.source,
          {
            function_name: job.functionName,
            duration_ms: performance.now() - startedAt,
            result_bytes: result.length,
          },
          job.handle,
        ),
      );
    } finally {
      this.activeJobs.delete(job.handle);
      this.state = 'idle';
    }
  }

  /**
   * Send `handle\0data` under the given packet type. Used for the terminal
   * outcome as well as WORK_DATA, WORK_WARNING and WORK_STATUS pushes.
   */
  sendJobResponse(
    command: number,
    job: { readonly handle: string },
    data: PayloadInput = '',
  ): void {
    this.connection.sendRaw(command, joinFields(job.handle, data));
  }

  // ---- Lifecycle ----

  /**
   * Start serving jobs: {@link doJob} in a loop until {@link stop} is
   * called or the connection fails.
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new Error('Worker is already running.');
    }
    if (this.serving) {
      throw new Error('Worker is still stopping.');
    }

    this.running = true;
    this.startedAt = Date.now();
    this.jobsCompleted = 0;

    await this.emitSafely(
      GearmanEventEmitter.createEvent('worker.started', this.source, {
        worker_id: this.workerId,
        functions: this.functionNames,
      }),
    );

    const controller = new AbortController();
    this.serveController = controller;
    this.serve(controller.signal).catch((error: unknown) => {
      this.logger.error(`[gearman] Worker ${this.workerId} serve loop failed:`, error);
    });
  }

  /**
   * Stop serving. Waits for the job currently executing, if any; a pending
   * sleep is not interrupted, but no further job is grabbed after it.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.serveController?.abort(new GearmanError('Worker stopped.', 'worker_stopped'));
    this.serveController = null;

    if (this.currentJob) {
      // Failures of the running job are logged by the serve loop.
      await Promise.allSettled([this.currentJob]);
    }

    await this.emitStopped('graceful_shutdown');
  }

  private async serve(signal: AbortSignal): Promise<void> {
    this.serving = true;
    try {
      while (!signal.aborted) {
        try {
          await this.doJob(signal);
        } catch (error) {
          if (signal.aborted) return;
          if (!(error instanceof GearmanMalformedJobError)) throw error;
          this.logger.error('[gearman] Skipping malformed job assignment:', error);
        }
      }
    } catch (error) {
      this.logger.error(`[gearman] Worker ${this.workerId} stopped serving:`, error);
      if (this.running) {
        this.running = false;
        await this.emitStopped(
          error instanceof GearmanConnectionLostError || error instanceof GearmanNotConnectedError
            ? 'connection_lost'
            : 'error',
        );
      }
    } finally {
      this.serving = false;
    }
  }

  private async emitStopped(reason: WorkerStoppedData['reason']): Promise<void> {
    await this.emitSafely(
      GearmanEventEmitter.createEvent('worker.stopped', this.source, {
        worker_id: this.workerId,
        reason,
        jobs_completed: this.jobsCompleted,
        uptime_ms: Date.now() - this.startedAt,
      }),
    );
  }

  /** Listener failures are logged; they never interrupt job handling. */
  private async emitSafely(
    event: GearmanEvent<GearmanEventDataMap[GearmanEventType]>,
  ): Promise<void> {
    try {
      await this.events.emit(event);
    } catch (error) {
      this.logger.error(`[gearman] Event listener failed for ${event.type}:`, error);
    }
  }

  private get source(): string {
    return `gearman://workers/${this.workerId}`;
  }

  private createContext(job: Job, signal: AbortSignal): JobContext {
    return {
      job,
      workerId: this.workerId,
      metadata: new Map(),
      signal,
      sendData: (chunk) => this.sendJobResponse(Command.WORK_DATA, job, chunk),
      sendWarning: (chunk) => this.sendJobResponse(Command.WORK_WARNING, job, chunk),
      sendStatus: (numerator, denominator) =>
        this.sendJobResponse(
          Command.WORK_STATUS,
          job,
          joinFields(String(numerator), String(denominator)),
        ),
    };
  }
}

function toResultPayload(result: unknown): Buffer {
  if (result === undefined || result === null) return Buffer.alloc(0);
  if (typeof result === 'string' || result instanceof Uint8Array) {
    return toPayload(result);
  }
  throw new TypeError(
    `Job function returned ${typeof result}; expected a string, Buffer or nothing.`,
  );
}
