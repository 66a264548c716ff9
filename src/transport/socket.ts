/**
 * Socket transport: binds a Node stream to a {@link GearmanConnection}.
 */

import { connect as netConnect } from 'node:net';
import type { Duplex } from 'node:stream';
import { DEFAULT_PORT } from '../commands.js';
import { GearmanConnection, type ConnectionConfig } from '../connection.js';
import { GearmanConnectionError } from '../errors.js';
import type { ByteChannel } from './types.js';

const DEFAULT_HOST = 'localhost';
const DEFAULT_CONNECT_TIMEOUT = 10_000;

/** Options for {@link connect}. */
export interface SocketConnectOptions extends ConnectionConfig {
  /** Job server host. Default: `'localhost'`. */
  host?: string;
  /** Job server port. Default: 4730. */
  port?: number;
  /** Milliseconds to wait for the TCP handshake. Default: 10000. */
  connectTimeout?: number;
}

/** {@link ByteChannel} over a Node duplex stream. */
export class StreamChannel implements ByteChannel {
  private readonly stream: Duplex;

  constructor(stream: Duplex) {
    this.stream = stream;
  }

  write(bytes: Buffer): void {
    this.stream.write(bytes);
  }

  close(): void {
    this.stream.destroy();
  }
}

/**
 * Drive a connection from an already-open stream: inbound `data` is fed to
 * the protocol engine and `close` fails whatever is still pending.
 */
export function attachStream(stream: Duplex, config: ConnectionConfig = {}): GearmanConnection {
  const connection = new GearmanConnection(new StreamChannel(stream), config);
  let lastError: Error | undefined;

  stream.on('data', (chunk: Buffer) => connection.onDataReceived(chunk));
  stream.on('error', (err: Error) => {
    lastError = err;
  });
  stream.on('close', () => {
    connection.onConnectionLost(lastError ?? new Error('Socket closed'));
  });

  return connection;
}

/**
 * Open a TCP connection to a job server.
 *
 * @example
 * ```ts
 * const connection = await connect({ host: 'gearmand.internal' });
 * const worker = new GearmanWorker(connection);
 * ```
 */
export function connect(options: SocketConnectOptions = {}): Promise<GearmanConnection> {
  const host = options.host ?? DEFAULT_HOST;
  const port = options.port ?? DEFAULT_PORT;
  const connectTimeout = options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT;

  return new Promise((resolve, reject) => {
    const socket = netConnect({ host, port });
    socket.setNoDelay(true);

    const timer = setTimeout(() => {
      socket.destroy();
      reject(new GearmanConnectionError(`Timed out connecting to ${host}:${port} after ${connectTimeout}ms.`));
    }, connectTimeout);

    const onError = (err: Error): void => {
      clearTimeout(timer);
      reject(new GearmanConnectionError(`Could not connect to ${host}:${port}: ${err.message}`, err));
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.off('error', onError);
      resolve(attachStream(socket, { logger: options.logger }));
    });
  });
}
