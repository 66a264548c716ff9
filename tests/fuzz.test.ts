/**
 * Property-based tests for the frame codec and job parsing.
 *
 * Uses fast-check to check that decoding does not depend on how the byte
 * stream is split into reads, and that parsers fail only with their own
 * error types on arbitrary input.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Command } from '../src/commands.js';
import { GearmanFramingError, GearmanMalformedJobError } from '../src/errors.js';
import { FrameDecoder, encodeFrame, joinFields, type Frame } from '../src/frame.js';
import { JobHandle, parseJob } from '../src/job.js';

// ---------------------------------------------------------------------------
// Arbitraries
// ---------------------------------------------------------------------------

const frameArb: fc.Arbitrary<Frame> = fc.record({
  isResponse: fc.boolean(),
  command: fc.constantFrom<number>(...Object.values(Command)),
  payload: fc.uint8Array({ maxLength: 64 }).map((bytes) => Buffer.from(bytes)),
});

const fieldArb = fc.string({ maxLength: 20 }).filter((s) => !s.includes('\0'));

function split(bytes: Buffer, cuts: number[]): Buffer[] {
  const points = [...new Set(cuts.map((c) => c % (bytes.length + 1)))].sort((a, b) => a - b);
  const pieces: Buffer[] = [];
  let start = 0;
  for (const point of points) {
    pieces.push(bytes.subarray(start, point));
    start = point;
  }
  pieces.push(bytes.subarray(start));
  return pieces;
}

// ---------------------------------------------------------------------------
// 1. Frame decoding
// ---------------------------------------------------------------------------

describe('fuzz: FrameDecoder', () => {
  it('decodes the same frames however the stream is split', () => {
    fc.assert(
      fc.property(
        fc.array(frameArb, { maxLength: 8 }),
        fc.array(fc.nat(), { maxLength: 10 }),
        (frames, cuts) => {
          const stream = Buffer.concat(
            frames.map((f) =>
              encodeFrame(f.command, f.payload, f.isResponse ? 'response' : 'request'),
            ),
          );
          const decoder = new FrameDecoder();
          const decoded = split(stream, cuts).flatMap((piece) => decoder.feed(piece));

          expect(decoded).toEqual(frames);
          expect(decoder.buffered).toBe(0);
          expect(decoder.awaiting).toBe('header');
        },
      ),
    );
  });

  it('only ever throws framing errors on arbitrary bytes', () => {
    fc.assert(
      fc.property(fc.uint8Array({ maxLength: 128 }), (bytes) => {
        try {
          new FrameDecoder().feed(Buffer.from(bytes));
        } catch (error) {
          expect(error).toBeInstanceOf(GearmanFramingError);
        }
      }),
    );
  });
});

// ---------------------------------------------------------------------------
// 2. Job assignment parsing
// ---------------------------------------------------------------------------

describe('fuzz: parseJob', () => {
  it('recovers handle, function and data', () => {
    fc.assert(
      fc.property(fieldArb, fieldArb, fc.uint8Array({ maxLength: 64 }), (handle, fn, data) => {
        const job = parseJob(joinFields(handle, fn, data));
        expect(job.handle).toBe(handle);
        expect(job.functionName).toBe(fn);
        expect(job.data).toEqual(Buffer.from(data));
      }),
    );
  });

  it('either parses or throws a malformed job error', () => {
    fc.assert(
      fc.property(fc.uint8Array({ maxLength: 64 }), (bytes) => {
        try {
          parseJob(Buffer.from(bytes));
        } catch (error) {
          expect(error).toBeInstanceOf(GearmanMalformedJobError);
        }
      }),
    );
  });
});

// ---------------------------------------------------------------------------
// 3. Progress accumulation
// ---------------------------------------------------------------------------

describe('fuzz: JobHandle', () => {
  it('workData is the concatenation of every chunk', () => {
    fc.assert(
      fc.property(fc.array(fc.uint8Array({ maxLength: 16 }), { maxLength: 10 }), (chunks) => {
        const handle = new JobHandle('H:fuzz');
        for (const chunk of chunks) handle.appendWorkData(chunk);
        expect(handle.workData).toEqual(Buffer.concat(chunks));
      }),
    );
  });
});
