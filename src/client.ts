/**
 * Gearman client: the producer side of the protocol.
 *
 * Submits jobs and follows them to completion. The server pushes a job's
 * progress (WORK_DATA, WORK_WARNING, WORK_STATUS) and its outcome as
 * unsolicited frames keyed by job handle; each is accumulated on that
 * job's {@link JobHandle} until WORK_COMPLETE or WORK_FAIL.
 */

import { Command } from './commands.js';
import type { GearmanConnection, Reply } from './connection.js';
import { Deferred } from './deferred.js';
import {
  GearmanJobFailedError,
  GearmanUnexpectedReplyError,
  parseServerError,
} from './errors.js';
import { joinFields, type PayloadInput } from './frame.js';
import { JobHandle } from './job.js';

/** Queue priority for a submitted job. */
export type JobPriority = 'normal' | 'high' | 'low';

/** Options for {@link GearmanClient.submit}. */
export interface SubmitOptions {
  /** Unique key; the server coalesces submissions sharing one. Default: `''`. */
  uniqueId?: string;
  /** Default: `'normal'`. */
  priority?: JobPriority;
}

/** Server-side status of a job, as returned by GET_STATUS. */
export interface JobStatusReport {
  handle: string;
  known: boolean;
  running: boolean;
  numerator: number;
  denominator: number;
}

const FOREGROUND: Record<JobPriority, number> = {
  normal: Command.SUBMIT_JOB,
  high: Command.SUBMIT_JOB_HIGH,
  low: Command.SUBMIT_JOB_LOW,
};

const BACKGROUND: Record<JobPriority, number> = {
  normal: Command.SUBMIT_JOB_BG,
  high: Command.SUBMIT_JOB_HIGH_BG,
  low: Command.SUBMIT_JOB_LOW_BG,
};

interface TrackedJob {
  handle: JobHandle;
  done: Deferred<JobHandle>;
}

export class GearmanClient {
  private readonly connection: GearmanConnection;
  private readonly jobs = new Map<string, TrackedJob>();

  constructor(connection: GearmanConnection) {
    this.connection = connection;
    connection.registerUnsolicited(this.onFrame);
    connection.onLost((error) => {
      for (const tracked of this.jobs.values()) {
        tracked.done.reject(error);
      }
      this.jobs.clear();
    });
  }

  /** Number of submitted jobs still waiting for their outcome. */
  get pendingJobs(): number {
    return this.jobs.size;
  }

  /**
   * Submit a job and wait for it to finish.
   *
   * @returns The job's handle; `workData` holds every WORK_DATA chunk
   *   followed by the WORK_COMPLETE data.
   * @throws GearmanJobFailedError if the job ends with WORK_FAIL.
   *
   * @example
   * ```ts
   * const result = await client.submit('reverse', 'hello');
   * console.log(result.workData.toString()); // 'olleh'
   * ```
   */
  async submit(
    functionName: string,
    data: PayloadInput,
    options?: SubmitOptions,
  ): Promise<JobHandle> {
    const done = new Deferred<JobHandle>();
    await this.connection.send(
      FOREGROUND[options?.priority ?? 'normal'],
      joinFields(functionName, options?.uniqueId ?? '', data),
      (reply) => {
        const handle = new JobHandle(expectJobCreated(reply));
        this.jobs.set(handle.handle, { handle, done });
      },
    );
    return done.promise;
  }

  /**
   * Submit a job the server runs detached from this connection.
   * @returns The job handle assigned by the server.
   */
  async submitBackground(
    functionName: string,
    data: PayloadInput,
    options?: SubmitOptions,
  ): Promise<string> {
    const reply = await this.connection.send(
      BACKGROUND[options?.priority ?? 'normal'],
      joinFields(functionName, options?.uniqueId ?? '', data),
    );
    return expectJobCreated(reply);
  }

  /** Ask the server for the status of a job. */
  async getStatus(handle: string): Promise<JobStatusReport> {
    const reply = await this.connection.send(Command.GET_STATUS, handle);
    if (reply.command === Command.ERROR) {
      throw parseServerError(reply.payload);
    }
    if (reply.command !== Command.STATUS_RES) {
      throw new GearmanUnexpectedReplyError('GET_STATUS', reply.command);
    }

    const [jobHandle = handle, known, running, numerator, denominator] = reply.payload
      .toString('utf8')
      .split('\0');
    return {
      handle: jobHandle,
      known: known === '1',
      running: running === '1',
      numerator: Number(numerator ?? 0),
      denominator: Number(denominator ?? 0),
    };
  }

  private readonly onFrame = (command: number, payload: Buffer): void => {
    const separator = payload.indexOf(0);
    const key = (separator === -1 ? payload : payload.subarray(0, separator)).toString('utf8');
    const rest = separator === -1 ? Buffer.alloc(0) : payload.subarray(separator + 1);

    const tracked = this.jobs.get(key);
    if (!tracked) return;
    const { handle, done } = tracked;

    switch (command) {
      case Command.WORK_DATA:
        handle.appendWorkData(rest);
        break;
      case Command.WORK_WARNING:
        handle.appendWorkWarning(rest);
        break;
      case Command.WORK_STATUS: {
        const [numerator = '0', denominator = '0'] = rest.toString('utf8').split('\0');
        handle.status = { numerator: Number(numerator), denominator: Number(denominator) };
        break;
      }
      case Command.WORK_EXCEPTION:
        handle.exception = rest.toString('utf8');
        break;
      case Command.WORK_COMPLETE:
        this.jobs.delete(key);
        handle.appendWorkData(rest);
        done.resolve(handle);
        break;
      case Command.WORK_FAIL:
        this.jobs.delete(key);
        done.reject(new GearmanJobFailedError(key, handle.exception));
        break;
    }
  };
}

function expectJobCreated(reply: Reply): string {
  if (reply.command === Command.ERROR) {
    throw parseServerError(reply.payload);
  }
  if (reply.command !== Command.JOB_CREATED) {
    throw new GearmanUnexpectedReplyError('SUBMIT_JOB', reply.command);
  }
  return reply.payload.toString('utf8');
}
