import { describe, it, expect } from 'vitest';
import {
  serializeRangeHeader,
  deserializeRangeHeader,
  writeRangeStream,
  readRangeStream,
  RANGE_HEADER_SIZE,
} from '../src/format/range-header.js';
import {
  serializeRansHeader,
  deserializeRansHeader,
  writeRansStream,
  readRansStream,
  RANS_HEADER_SIZE,
} from '../src/format/rans-header.js';
import { combineHeaderAndPayload } from '../src/format/bytes.js';
import {
  CorruptHeaderError,
  EntropyCodingError,
  TruncatedStreamError,
} from '../src/errors.js';

describe('Range header', () => {
  it('should serialize to 12 little-endian bytes', () => {
    const bytes = serializeRangeHeader({ numBits: 0x01020304, count0: 5, count1: 0x100 });

    expect(bytes.length).toBe(RANGE_HEADER_SIZE);
    expect(Array.from(bytes)).toEqual([4, 3, 2, 1, 5, 0, 0, 0, 0, 1, 0, 0]);
  });

  it('should roundtrip through a stream', () => {
    const header = { numBits: 687, count0: 678, count1: 9 };
    const payload = Uint8Array.from([1, 2, 3, 4, 5]);
    const stream = writeRangeStream(header, payload);
    const restored = readRangeStream(stream);

    expect(restored.header).toEqual(header);
    expect(Array.from(restored.payload)).toEqual([1, 2, 3, 4, 5]);
  });

  it('should throw on a stream without the state bytes', () => {
    const stream = writeRangeStream({ numBits: 1, count0: 1, count1: 1 }, new Uint8Array(3));

    expect(() => deserializeRangeHeader(stream)).toThrow(TruncatedStreamError);
    expect(() => deserializeRangeHeader(stream)).toThrow(
      'Invalid range stream: expected at least 16 bytes, got 15'
    );
  });

  it('should throw on a zero count', () => {
    const stream = writeRangeStream({ numBits: 1, count0: 0, count1: 1 }, new Uint8Array(4));

    expect(() => readRangeStream(stream)).toThrow(CorruptHeaderError);
  });

  it('should throw when the bit count exceeds the count total', () => {
    const stream = writeRangeStream({ numBits: 3, count0: 1, count1: 1 }, new Uint8Array(4));

    expect(() => readRangeStream(stream)).toThrow(
      'Invalid range stream: 3 bits exceed count total 2'
    );
  });

  it('should accept counts totalling exactly 2^24', () => {
    const stream = writeRangeStream(
      { numBits: 0, count0: (1 << 24) - 1, count1: 1 },
      new Uint8Array(4)
    );

    expect(readRangeStream(stream).header.count0).toBe((1 << 24) - 1);
  });
});

describe('rANS header', () => {
  const freq = Uint16Array.from([3070, 1024, 1, 1]);

  it('should serialize to 12 little-endian bytes', () => {
    const bytes = serializeRansHeader({ symbolCount: 4, freq });

    expect(bytes.length).toBe(RANS_HEADER_SIZE);
    expect(Array.from(bytes)).toEqual([4, 0, 0, 0, 254, 11, 0, 4, 1, 0, 1, 0]);
  });

  it('should roundtrip through serialize/deserialize', () => {
    const restored = deserializeRansHeader(serializeRansHeader({ symbolCount: 0xffffffff, freq }));

    expect(restored.symbolCount).toBe(0xffffffff);
    expect(Array.from(restored.freq)).toEqual([3070, 1024, 1, 1]);
  });

  it('should throw on a truncated header', () => {
    expect(() => deserializeRansHeader(new Uint8Array(11))).toThrow(TruncatedStreamError);
  });

  it('should throw on a zero frequency', () => {
    const bytes = serializeRansHeader({ symbolCount: 1, freq: Uint16Array.from([4096, 0, 0, 0]) });

    expect(() => deserializeRansHeader(bytes)).toThrow(
      'Invalid rANS stream: zero frequency for symbol 1'
    );
  });

  it('should throw when frequencies do not sum to 4096', () => {
    const bytes = serializeRansHeader({ symbolCount: 1, freq: Uint16Array.from([1, 1, 1, 1]) });

    expect(() => deserializeRansHeader(bytes)).toThrow(
      'Invalid rANS stream: frequencies sum to 4, expected 4096'
    );
  });

  it('should require state bytes only when symbols are declared', () => {
    expect(readRansStream(writeRansStream({ symbolCount: 0, freq }, new Uint8Array(0))).payload.length).toBe(0);
    expect(() => readRansStream(writeRansStream({ symbolCount: 2, freq }, new Uint8Array(3)))).toThrow(
      TruncatedStreamError
    );
  });
});

describe('combineHeaderAndPayload', () => {
  it('should concatenate header and payload', () => {
    const combined = combineHeaderAndPayload(Uint8Array.from([1, 2]), Uint8Array.from([3]));

    expect(Array.from(combined)).toEqual([1, 2, 3]);
  });
});

describe('Errors', () => {
  it('should share a base class and carry their own name', () => {
    const error = new CorruptHeaderError('bad');

    expect(error).toBeInstanceOf(EntropyCodingError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('CorruptHeaderError');
    expect(error.message).toBe('bad');
  });
});
