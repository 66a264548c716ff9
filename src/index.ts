/**
 * gearman-wire: Gearman binary protocol client and worker for Node.js.
 *
 * @example
 * ```ts
 * import { connect, GearmanWorker } from 'gearman-wire';
 *
 * const worker = new GearmanWorker(await connect({ host: 'localhost' }));
 * worker.registerFunction('upper', (data) => data.toString().toUpperCase());
 * await worker.start();
 * ```
 *
 * @packageDocumentation
 */

// ---- Protocol ----
export {
  Command,
  DEFAULT_PORT,
  HEADER_LENGTH,
  MAGIC_REQUEST,
  MAGIC_RESPONSE,
  commandName,
} from './commands.js';
export type { CommandCode, CommandName } from './commands.js';
export { FrameDecoder, encodeFrame, joinFields, toPayload } from './frame.js';
export type { Frame, FrameKind, PayloadInput } from './frame.js';

// ---- Connection ----
export { GearmanConnection } from './connection.js';
export type {
  ConnectionConfig,
  ConnectionLostListener,
  Reply,
  UnsolicitedHandler,
} from './connection.js';
export { Deferred } from './deferred.js';

// ---- Worker (Consumer) ----
export { GearmanWorker } from './worker.js';
export type {
  GearmanWorkerConfig,
  JobFunction,
  JobResult,
  RegisterOptions,
  WorkerState,
} from './worker.js';

// ---- Client (Producer) ----
export { GearmanClient } from './client.js';
export type { JobPriority, JobStatusReport, SubmitOptions } from './client.js';

// ---- Job Types ----
export { Job, JobHandle, parseJob } from './job.js';
export type { JobStatus } from './job.js';

// ---- Middleware ----
export { composeExecution } from './middleware.js';
export type { ExecutionMiddleware, JobContext, NextFunction } from './middleware.js';

// ---- Events ----
export { GearmanEventEmitter } from './events.js';
export type {
  GearmanEvent,
  GearmanEventDataMap,
  GearmanEventListener,
  GearmanEventType,
  JobCompletedData,
  JobFailedData,
  WorkerStartedData,
  WorkerStoppedData,
} from './events.js';

// ---- Errors ----
export {
  GearmanError,
  GearmanFramingError,
  GearmanMalformedJobError,
  GearmanConnectionError,
  GearmanConnectionLostError,
  GearmanNotConnectedError,
  GearmanUnexpectedReplyError,
  GearmanServerError,
  GearmanJobFailedError,
  GearmanTimeoutError,
  describeError,
  parseServerError,
} from './errors.js';

// ---- Transport ----
export { StreamChannel, attachStream, connect } from './transport/socket.js';
export type { SocketConnectOptions } from './transport/socket.js';
export type { ByteChannel } from './transport/types.js';

// ---- Logging ----
export type { Logger } from './logger.js';

// ---- Testing Utilities ----
import * as testing from './testing.js';
export { testing };
export type { FakeChannel, TestConnection } from './testing.js';
