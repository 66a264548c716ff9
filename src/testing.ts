/**
 * Test utilities: an in-memory channel that records what a connection
 * writes and lets a test play the job server's part.
 *
 * Usage:
 *   import { testing, Command } from 'gearman-wire';
 *
 *   const { connection, channel, respond } = testing.createTestConnection();
 *   const worker = new GearmanWorker(connection);
 *   const job = worker.getJob();
 *   respond(Command.JOB_ASSIGN, 'H:1\0reverse\0abc');
 *   expect(channel.takeFrames()[0].command).toBe(Command.GRAB_JOB);
 */

import { GearmanConnection, type ConnectionConfig } from './connection.js';
import { FrameDecoder, encodeFrame, type Frame, type PayloadInput } from './frame.js';
import type { ByteChannel } from './transport/types.js';

/** A {@link ByteChannel} that keeps everything written to it. */
export class FakeChannel implements ByteChannel {
  /** Raw writes not yet taken by {@link takeFrames}. */
  readonly written: Buffer[] = [];
  /** Number of times `close()` was called. */
  closeCount = 0;

  write(bytes: Buffer): void {
    this.written.push(Buffer.from(bytes));
  }

  close(): void {
    this.closeCount++;
  }

  /** Decode and remove every frame written so far. */
  takeFrames(): Frame[] {
    const frames = new FrameDecoder().feed(Buffer.concat(this.written));
    this.written.length = 0;
    return frames;
  }
}

export interface TestConnection {
  connection: GearmanConnection;
  channel: FakeChannel;
  /** Deliver a response frame to the connection, as the server would. */
  respond(command: number, payload?: PayloadInput): void;
  /** Simulate the transport going away. */
  lose(reason?: unknown): void;
}

/** Create a connection over a {@link FakeChannel}. */
export function createTestConnection(config?: ConnectionConfig): TestConnection {
  const channel = new FakeChannel();
  const connection = new GearmanConnection(channel, config);

  return {
    connection,
    channel,
    respond(command, payload) {
      connection.onDataReceived(encodeFrame(command, payload, 'response'));
    },
    lose(reason = new Error('Connection closed')) {
      connection.onConnectionLost(reason);
    },
  };
}
