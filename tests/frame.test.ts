import { describe, it, expect } from 'vitest';
import { Command, HEADER_LENGTH, commandName } from '../src/commands.js';
import { GearmanFramingError } from '../src/errors.js';
import { FrameDecoder, encodeFrame, joinFields, toPayload } from '../src/frame.js';

describe('protocol constants', () => {
  it('header is 12 bytes', () => {
    expect(HEADER_LENGTH).toBe(12);
  });

  it('command codes are unique', () => {
    const values = Object.values(Command);
    expect(new Set(values).size).toBe(values.length);
  });

  it('names known and unknown commands', () => {
    expect(commandName(Command.NO_JOB)).toBe('NO_JOB');
    expect(commandName(99)).toBe('UNKNOWN(99)');
  });
});

describe('encodeFrame', () => {
  it('writes request magic, big-endian command and length, then payload', () => {
    const frame = encodeFrame(11, 'some data');
    expect(frame.subarray(0, 4)).toEqual(Buffer.from('\0REQ', 'latin1'));
    expect(frame.readUInt32BE(4)).toBe(11);
    expect(frame.readUInt32BE(8)).toBe(9);
    expect(frame.subarray(12).toString()).toBe('some data');
  });

  it('encodes an empty payload as a bare header', () => {
    const frame = encodeFrame(Command.PRE_SLEEP);
    expect(frame.length).toBe(12);
    expect(frame.readUInt32BE(8)).toBe(0);
  });

  it('uses the response marker when asked', () => {
    const frame = encodeFrame(Command.NOOP, '', 'response');
    expect(frame.subarray(0, 4).toString('latin1')).toBe('\0RES');
  });

  it('rejects command codes outside uint32', () => {
    expect(() => encodeFrame(-1)).toThrow(RangeError);
  });
});

describe('joinFields / toPayload', () => {
  it('separates fields with NUL', () => {
    expect(joinFields('fn', '', 'data').toString('latin1')).toBe('fn\0\0data');
  });

  it('converts strings, buffers and byte arrays', () => {
    expect(toPayload('hé')).toEqual(Buffer.from('hé', 'utf8'));
    expect(toPayload(new Uint8Array([1, 2]))).toEqual(Buffer.from([1, 2]));
    expect(toPayload(undefined).length).toBe(0);
  });
});

describe('FrameDecoder', () => {
  it('decodes what encodeFrame produced', () => {
    const payload = Buffer.from([0, 1, 2, 0, 255]);
    const [frame] = new FrameDecoder().feed(encodeFrame(Command.WORK_DATA, payload, 'response'));
    expect(frame).toEqual({ isResponse: true, command: Command.WORK_DATA, payload });
  });

  it('returns several frames from one chunk in arrival order', () => {
    const chunk = Buffer.concat([
      encodeFrame(Command.NO_JOB, '', 'response'),
      encodeFrame(Command.NOOP, '', 'response'),
      encodeFrame(Command.JOB_ASSIGN, 'H:1\0fn\0x', 'response'),
    ]);
    const frames = new FrameDecoder().feed(chunk);
    expect(frames.map((f) => f.command)).toEqual([
      Command.NO_JOB,
      Command.NOOP,
      Command.JOB_ASSIGN,
    ]);
  });

  it('yields the same frame when fed one byte at a time', () => {
    const bytes = encodeFrame(Command.ECHO_RES, 'hello', 'response');
    const decoder = new FrameDecoder();
    const frames = [];
    for (let i = 0; i < bytes.length; i++) {
      frames.push(...decoder.feed(bytes.subarray(i, i + 1)));
    }
    expect(frames).toEqual(new FrameDecoder().feed(bytes));
    expect(frames[0]?.payload.toString()).toBe('hello');
  });

  it('tracks whether it is waiting for a header or a body', () => {
    const bytes = encodeFrame(Command.ECHO_RES, 'hello', 'response');
    const decoder = new FrameDecoder();

    expect(decoder.feed(bytes.subarray(0, 5))).toEqual([]);
    expect(decoder.awaiting).toBe('header');
    expect(decoder.buffered).toBe(5);

    expect(decoder.feed(bytes.subarray(5, 14))).toEqual([]);
    expect(decoder.awaiting).toBe('body');

    expect(decoder.feed(bytes.subarray(14))).toHaveLength(1);
    expect(decoder.awaiting).toBe('header');
    expect(decoder.buffered).toBe(0);
  });

  it('keeps trailing partial bytes for the next call', () => {
    const first = encodeFrame(Command.NO_JOB, '', 'response');
    const second = encodeFrame(Command.NOOP, '', 'response');
    const decoder = new FrameDecoder();

    expect(decoder.feed(Buffer.concat([first, second.subarray(0, 3)]))).toHaveLength(1);
    expect(decoder.feed(second.subarray(3))[0]?.command).toBe(Command.NOOP);
  });

  it('throws a framing error as soon as a header has bad magic', () => {
    const decoder = new FrameDecoder();
    expect(() => decoder.feed(Buffer.from('X'.repeat(12)))).toThrow(GearmanFramingError);
    expect(decoder.buffered).toBe(0);
  });

  it('yields frames that precede a corrupt header before throwing', () => {
    const chunk = Buffer.concat([
      encodeFrame(Command.NOOP, '', 'response'),
      Buffer.from('garbage-bytes'),
    ]);
    const seen: number[] = [];
    expect(() => {
      for (const frame of new FrameDecoder().decode(chunk)) {
        seen.push(frame.command);
      }
    }).toThrow('Bad packet magic 0x67617262.');
    expect(seen).toEqual([Command.NOOP]);
  });
});
