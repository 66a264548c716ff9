/**
 * Frame codec for the Gearman binary protocol.
 *
 * Frame format:
 *   [4B magic] [4B command (BE u32)] [4B length (BE u32)] [payload]
 */

import { HEADER_LENGTH, MAGIC_REQUEST, MAGIC_RESPONSE } from './commands.js';
import { GearmanFramingError } from './errors.js';

// ---- Frame ----

export type FrameKind = 'request' | 'response';

export interface Frame {
  /** True when the frame carried the `\0RES` marker. */
  isResponse: boolean;
  command: number;
  payload: Buffer;
}

/** Anything that can be sent as a payload. Strings are encoded as UTF-8. */
export type PayloadInput = Buffer | Uint8Array | string;

const EMPTY = Buffer.alloc(0);

export function toPayload(input: PayloadInput | null | undefined): Buffer {
  if (input === null || input === undefined) return EMPTY;
  if (typeof input === 'string') return Buffer.from(input, 'utf8');
  return Buffer.isBuffer(input) ? input : Buffer.from(input.buffer, input.byteOffset, input.byteLength);
}

/** Join payload fields with the NUL separator. */
export function joinFields(...fields: PayloadInput[]): Buffer {
  const parts: Buffer[] = [];
  fields.forEach((field, i) => {
    if (i > 0) parts.push(Buffer.from([0]));
    parts.push(toPayload(field));
  });
  return Buffer.concat(parts);
}

// ---- Encoding ----

/**
 * Encode a frame into a Buffer ready to be written to the transport.
 */
export function encodeFrame(
  command: number,
  payload: PayloadInput = EMPTY,
  kind: FrameKind = 'request',
): Buffer {
  const body = toPayload(payload);
  const frame = Buffer.alloc(HEADER_LENGTH + body.length);
  (kind === 'request' ? MAGIC_REQUEST : MAGIC_RESPONSE).copy(frame, 0);
  frame.writeUInt32BE(command, 4);
  frame.writeUInt32BE(body.length, 8);
  body.copy(frame, HEADER_LENGTH);
  return frame;
}

// ---- Stream decoder ----

interface Header {
  isResponse: boolean;
  command: number;
  length: number;
}

/**
 * Incremental frame decoder that handles partial reads from a stream.
 *
 * Usage:
 *   const decoder = new FrameDecoder();
 *   socket.on('data', (chunk) => {
 *     for (const frame of decoder.feed(chunk)) {
 *       handleFrame(frame);
 *     }
 *   });
 *
 * A header whose magic is neither `\0REQ` nor `\0RES` throws a
 * {@link GearmanFramingError}; the decoder does not try to resynchronise.
 */
export class FrameDecoder {
  private buf: Buffer = EMPTY;
  private header: Header | null = null;

  /** What the decoder needs next. */
  get awaiting(): 'header' | 'body' {
    return this.header ? 'body' : 'header';
  }

  /** Number of bytes held back for the next call. */
  get buffered(): number {
    return this.buf.length;
  }

  /**
   * Feed a chunk of data and return every frame it completes, in arrival order.
   */
  feed(chunk: Buffer): Frame[] {
    return [...this.decode(chunk)];
  }

  /**
   * Generator form of {@link feed}: frames preceding a corrupt header are
   * yielded before the framing error is thrown.
   */
  *decode(chunk: Buffer): Generator<Frame, void, undefined> {
    this.buf = this.buf.length === 0 ? chunk : Buffer.concat([this.buf, chunk]);

    for (;;) {
      if (!this.header) {
        if (this.buf.length < HEADER_LENGTH) return;
        this.header = this.readHeader();
      }

      const { length } = this.header;
      if (this.buf.length < HEADER_LENGTH + length) return;

      const frame: Frame = {
        isResponse: this.header.isResponse,
        command: this.header.command,
        payload: Buffer.from(this.buf.subarray(HEADER_LENGTH, HEADER_LENGTH + length)),
      };
      this.buf = this.buf.subarray(HEADER_LENGTH + length);
      this.header = null;
      yield frame;
    }
  }

  /** Drop any buffered bytes (e.g. after the connection is lost). */
  reset(): void {
    this.buf = EMPTY;
    this.header = null;
  }

  private readHeader(): Header {
    const magic = this.buf.subarray(0, 4);
    const isResponse = magic.equals(MAGIC_RESPONSE);
    if (!isResponse && !magic.equals(MAGIC_REQUEST)) {
      this.reset();
      throw new GearmanFramingError(
        `Bad packet magic 0x${magic.toString('hex')}.`,
        { magic: magic.toString('hex') },
      );
    }
    return {
      isResponse,
      command: this.buf.readUInt32BE(4),
      length: this.buf.readUInt32BE(8),
    };
  }
}
