/**
 * Job values: the assignment a worker receives, and the progress a
 * submitter accumulates while a job runs.
 */

import { inspect } from 'node:util';
import { GearmanMalformedJobError } from './errors.js';
import { toPayload, type PayloadInput } from './frame.js';

/**
 * A job assigned to this worker (`JOB_ASSIGN`: `handle\0function\0data`).
 * Obtained only through {@link parseJob}; immutable once constructed.
 */
export class Job {
  readonly handle: string;
  readonly functionName: string;
  readonly data: Buffer;

  private constructor(handle: string, functionName: string, data: Buffer) {
    this.handle = handle;
    this.functionName = functionName;
    this.data = data;
    Object.freeze(this);
  }

  /** See {@link parseJob}. */
  static parse(payload: PayloadInput): Job {
    const bytes = toPayload(payload);

    const first = bytes.indexOf(0);
    const second = first === -1 ? -1 : bytes.indexOf(0, first + 1);
    if (second === -1) {
      throw new GearmanMalformedJobError(
        'Job assignment must contain handle, function and data separated by NUL.',
        { length: bytes.length },
      );
    }

    return new Job(
      bytes.subarray(0, first).toString('utf8'),
      bytes.subarray(first + 1, second).toString('utf8'),
      Buffer.from(bytes.subarray(second + 1)),
    );
  }

  toString(): string {
    return `Job ${this.handle} func=${this.functionName} with ${this.data.length} bytes of data`;
  }

  [inspect.custom](): string {
    return `<${this.toString()}>`;
  }
}

/**
 * Parse a job assignment payload.
 *
 * The payload is split at its first two NUL bytes; everything after the
 * second separator is the job's data, embedded NULs included.
 *
 * @throws GearmanMalformedJobError if fewer than two separators are present.
 */
export function parseJob(payload: PayloadInput): Job {
  return Job.parse(payload);
}

/** Last WORK_STATUS reported for a job. */
export interface JobStatus {
  numerator: number;
  denominator: number;
}

/**
 * Accumulates what a job reports before its terminal outcome.
 * Chunks are append-only; reading concatenates them in arrival order.
 */
export class JobHandle {
  readonly handle: string;
  /** Most recent progress report, if any. */
  status: JobStatus | undefined;
  /** Exception text reported with WORK_EXCEPTION, if any. */
  exception: string | undefined;

  private readonly dataChunks: Buffer[] = [];
  private readonly warningChunks: Buffer[] = [];

  constructor(handle: string) {
    this.handle = handle;
  }

  appendWorkData(chunk: PayloadInput): void {
    this.dataChunks.push(Buffer.from(toPayload(chunk)));
  }

  appendWorkWarning(chunk: PayloadInput): void {
    this.warningChunks.push(Buffer.from(toPayload(chunk)));
  }

  /** All WORK_DATA chunks received so far, concatenated. */
  get workData(): Buffer {
    return Buffer.concat(this.dataChunks);
  }

  /** All WORK_WARNING chunks received so far, concatenated. */
  get workWarning(): Buffer {
    return Buffer.concat(this.warningChunks);
  }
}
