/**
 * Gearman protocol engine.
 *
 * Replies carry no request ID: the server answers in the order requests
 * were sent, so each inbound frame resolves the oldest pending request.
 * Frames that arrive while nothing is pending are unsolicited (wake-ups,
 * work progress) and are offered to every registered subscriber.
 */

import { Command } from './commands.js';
import { Deferred } from './deferred.js';
import {
  GearmanConnectionLostError,
  GearmanFramingError,
  GearmanNotConnectedError,
} from './errors.js';
import { FrameDecoder, encodeFrame, type Frame, type PayloadInput } from './frame.js';
import type { Logger } from './logger.js';
import type { ByteChannel } from './transport/types.js';

/** A correlated reply: the command and payload of the matching response frame. */
export interface Reply {
  command: number;
  payload: Buffer;
}

/** Receives every frame not consumed as a correlated reply. */
export type UnsolicitedHandler = (command: number, payload: Buffer) => void;

/** Called once when the connection is lost. */
export type ConnectionLostListener = (error: GearmanConnectionLostError) => void;

/** Configuration for GearmanConnection. */
export interface ConnectionConfig {
  /** Logger instance. Defaults to `console`. */
  logger?: Logger;
}

interface PendingRequest {
  reply: Deferred<Reply>;
  onReply: ((reply: Reply) => void) | undefined;
}

export class GearmanConnection {
  private readonly decoder = new FrameDecoder();
  private readonly pending: PendingRequest[] = [];
  private readonly subscribers: UnsolicitedHandler[] = [];
  private readonly lostListeners = new Set<ConnectionLostListener>();
  private readonly channel: ByteChannel;
  private readonly logger: Logger;
  private connected = true;

  constructor(channel: ByteChannel, config: ConnectionConfig = {}) {
    this.channel = channel;
    this.logger = config.logger ?? console;
  }

  /** False once the connection has been lost or closed. */
  get isConnected(): boolean {
    return this.connected;
  }

  /** Number of requests still waiting for a reply. */
  get pendingCount(): number {
    return this.pending.length;
  }

  /** Number of registered unsolicited subscribers. */
  get subscriberCount(): number {
    return this.subscribers.length;
  }

  // ---- Outbound ----

  /**
   * Write a frame without waiting for a reply.
   * @throws GearmanNotConnectedError after the connection is lost.
   */
  sendRaw(command: number, payload?: PayloadInput): void {
    if (!this.connected) {
      throw new GearmanNotConnectedError();
    }
    this.channel.write(encodeFrame(command, payload));
  }

  /**
   * Write a request frame and wait for its reply.
   *
   * Any number of requests may be outstanding; they are answered in the
   * order they were sent.
   *
   * @param onReply - Invoked synchronously when the reply is dispatched,
   *   before any later frame is processed.
   */
  send(
    command: number,
    payload?: PayloadInput,
    onReply?: (reply: Reply) => void,
  ): Promise<Reply> {
    if (!this.connected) {
      return Promise.reject(new GearmanNotConnectedError());
    }
    const request: PendingRequest = { reply: new Deferred<Reply>(), onReply };
    this.pending.push(request);
    this.channel.write(encodeFrame(command, payload));
    return request.reply.promise;
  }

  /** Declare that the worker is about to sleep. The wake-up arrives unsolicited. */
  preSleep(): void {
    this.sendRaw(Command.PRE_SLEEP);
  }

  /** Round-trip a payload through the server. */
  echo(payload: PayloadInput = 'hello'): Promise<Reply> {
    return this.send(Command.ECHO_REQ, payload);
  }

  // ---- Subscribers ----

  /** Subscribe to unsolicited frames. Registering the same handler twice is a no-op. */
  registerUnsolicited(handler: UnsolicitedHandler): void {
    if (!this.subscribers.includes(handler)) {
      this.subscribers.push(handler);
    }
  }

  /** Remove a subscriber. Unknown handlers are ignored. */
  unregisterUnsolicited(handler: UnsolicitedHandler): void {
    const index = this.subscribers.indexOf(handler);
    if (index !== -1) {
      this.subscribers.splice(index, 1);
    }
  }

  /**
   * Subscribe to connection loss.
   * @returns An unsubscribe function.
   */
  onLost(listener: ConnectionLostListener): () => void {
    this.lostListeners.add(listener);
    return () => {
      this.lostListeners.delete(listener);
    };
  }

  // ---- Inbound (driven by the transport) ----

  /** Feed bytes received from the transport. */
  onDataReceived(chunk: Buffer): void {
    if (!this.connected) return;

    try {
      for (const frame of this.decoder.decode(chunk)) {
        if (!this.connected) return;
        this.dispatch(frame);
      }
    } catch (error) {
      if (!(error instanceof GearmanFramingError)) throw error;
      this.logger.error(`[gearman] ${error.message} Closing connection.`);
      this.channel.close();
      this.onConnectionLost(error);
    }
  }

  /**
   * Reject every pending request and refuse further sends.
   * Only the first call has any effect.
   */
  onConnectionLost(reason?: unknown): void {
    if (!this.connected) return;
    this.connected = false;
    this.decoder.reset();

    const error = new GearmanConnectionLostError(reason);
    for (const request of this.pending.splice(0)) {
      request.reply.reject(error);
    }
    for (const listener of [...this.lostListeners]) {
      listener(error);
    }
    this.lostListeners.clear();
  }

  /** Close the channel and fail everything still pending. */
  close(): void {
    if (!this.connected) return;
    this.channel.close();
    this.onConnectionLost(new Error('Connection closed by client'));
  }

  private dispatch(frame: Frame): void {
    const reply: Reply = { command: frame.command, payload: frame.payload };

    const request = this.pending.shift();
    if (request) {
      try {
        request.onReply?.(reply);
      } catch (error) {
        request.reply.reject(error);
        return;
      }
      request.reply.resolve(reply);
      return;
    }

    // Snapshot: one-shot subscribers unregister themselves mid-dispatch.
    for (const handler of [...this.subscribers]) {
      try {
        handler(frame.command, frame.payload);
      } catch (error) {
        this.logger.error('[gearman] Unsolicited frame handler failed:', error);
      }
    }
  }
}
