/**
 * Gearman error types. Protocol-level failures (framing, connection loss)
 * propagate to every affected pending operation; job handler failures are
 * absorbed by the worker and reported to the server instead.
 */

import { commandName } from './commands.js';

/** Base error class for all Gearman errors. */
export class GearmanError extends Error {
  readonly code: string;
  readonly retryable: boolean;
  readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: string,
    options?: {
      retryable?: boolean | undefined;
      details?: Record<string, unknown> | undefined;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'GearmanError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
    this.details = options?.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

/** A packet header carried an unrecognised magic marker. Fatal to the connection. */
export class GearmanFramingError extends GearmanError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'framing_error', { retryable: false, details });
    this.name = 'GearmanFramingError';
  }
}

/** A job assignment payload did not contain handle, function and data fields. */
export class GearmanMalformedJobError extends GearmanError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'malformed_job', { retryable: false, details });
    this.name = 'GearmanMalformedJobError';
  }
}

/** The transport could not be opened. */
export class GearmanConnectionError extends GearmanError {
  constructor(message: string, cause?: unknown) {
    super(message, 'connection_error', { retryable: true, cause });
    this.name = 'GearmanConnectionError';
  }
}

/** The connection went away while the request was still pending. */
export class GearmanConnectionLostError extends GearmanError {
  /** Whatever the transport reported as the reason for the loss. */
  readonly reason: unknown;

  constructor(reason: unknown) {
    super(
      reason === undefined
        ? 'Connection lost.'
        : `Connection lost: ${describeError(reason)}`,
      'connection_lost',
      { retryable: true, cause: reason },
    );
    this.name = 'GearmanConnectionLostError';
    this.reason = reason;
  }
}

/** A request was issued after the connection was lost or closed. */
export class GearmanNotConnectedError extends GearmanError {
  constructor() {
    super('Not connected to a job server.', 'not_connected', { retryable: true });
    this.name = 'GearmanNotConnectedError';
  }
}

/** The server answered a request with a packet that is not a valid reply to it. */
export class GearmanUnexpectedReplyError extends GearmanError {
  readonly command: number;

  constructor(request: string, command: number) {
    super(
      `Unexpected ${commandName(command)} reply to ${request}.`,
      'unexpected_reply',
      { retryable: false, details: { request, command } },
    );
    this.name = 'GearmanUnexpectedReplyError';
    this.command = command;
  }
}

/** The server answered with an ERROR packet. */
export class GearmanServerError extends GearmanError {
  /** Error code as sent by the server, e.g. `ERR_UNKNOWN_COMMAND`. */
  readonly serverCode: string;

  constructor(serverCode: string, message: string) {
    super(message || serverCode, 'server_error', {
      retryable: false,
      details: { server_code: serverCode },
    });
    this.name = 'GearmanServerError';
    this.serverCode = serverCode;
  }
}

/** A submitted job finished with WORK_FAIL. */
export class GearmanJobFailedError extends GearmanError {
  readonly handle: string;
  /** Exception text reported by the worker before failing, if any. */
  readonly exception: string | undefined;

  constructor(handle: string, exception?: string) {
    super(
      exception ? `Job '${handle}' failed: ${exception}` : `Job '${handle}' failed.`,
      'job_failed',
      { retryable: true, details: { handle, exception } },
    );
    this.name = 'GearmanJobFailedError';
    this.handle = handle;
    this.exception = exception;
  }
}

/** A job handler exceeded its execution timeout. */
export class GearmanTimeoutError extends GearmanError {
  constructor(handle: string, timeoutMs: number) {
    super(
      `Job '${handle}' exceeded ${timeoutMs}ms timeout.`,
      'timeout',
      { retryable: true, details: { handle, timeout_ms: timeoutMs } },
    );
    this.name = 'GearmanTimeoutError';
  }
}

/**
 * Parse an ERROR packet payload (`code\0text`) into a {@link GearmanServerError}.
 */
export function parseServerError(payload: Buffer): GearmanServerError {
  const separator = payload.indexOf(0);
  if (separator === -1) {
    const code = payload.toString('utf8');
    return new GearmanServerError(code, code);
  }
  return new GearmanServerError(
    payload.subarray(0, separator).toString('utf8'),
    payload.subarray(separator + 1).toString('utf8'),
  );
}

/** Textual description of a thrown value, as reported in WORK_EXCEPTION. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
