/**
 * Range-coder stream header.
 *
 * Format (all fields little-endian):
 * [Bit count: 4 bytes]
 * [count0: 4 bytes]
 * [count1: 4 bytes]
 * [Payload: variable] (the last 4 bytes are the final low register, MSB first)
 */

import { CorruptHeaderError, TruncatedStreamError } from '../errors.js';
import { MAX_TOTAL_COUNT } from '../core/range-encoder.js';
import { combineHeaderAndPayload } from './bytes.js';

/**
 * Header size in bytes.
 */
export const RANGE_HEADER_SIZE = 12;

/**
 * Bytes the decoder needs after the header to initialize its code register.
 */
export const RANGE_STATE_BYTES = 4;

export interface RangeHeader {
  /** Number of coded bits */
  numBits: number;

  /** Occurrences of 0 (at least 1) */
  count0: number;

  /** Occurrences of 1 (at least 1) */
  count1: number;
}

/**
 * Serialize a header to bytes.
 */
export function serializeRangeHeader(header: RangeHeader): Uint8Array {
  const buffer = new ArrayBuffer(RANGE_HEADER_SIZE);
  const view = new DataView(buffer);

  view.setUint32(0, header.numBits, true);
  view.setUint32(4, header.count0, true);
  view.setUint32(8, header.count1, true);

  return new Uint8Array(buffer);
}

/**
 * Deserialize and validate a header.
 */
export function deserializeRangeHeader(data: Uint8Array): RangeHeader {
  if (data.length < RANGE_HEADER_SIZE + RANGE_STATE_BYTES) {
    throw new TruncatedStreamError(
      `Invalid range stream: expected at least ${RANGE_HEADER_SIZE + RANGE_STATE_BYTES} bytes, got ${data.length}`
    );
  }

  const view = new DataView(data.buffer, data.byteOffset, RANGE_HEADER_SIZE);
  const header: RangeHeader = {
    numBits: view.getUint32(0, true),
    count0: view.getUint32(4, true),
    count1: view.getUint32(8, true),
  };

  if (header.count0 === 0 || header.count1 === 0) {
    throw new CorruptHeaderError(
      `Invalid range stream: zero bit count (count0=${header.count0}, count1=${header.count1})`
    );
  }
  if (header.count0 + header.count1 > MAX_TOTAL_COUNT) {
    throw new CorruptHeaderError(
      `Invalid range stream: count total ${header.count0 + header.count1} exceeds ${MAX_TOTAL_COUNT}`
    );
  }
  // The encoder counts every bit it codes (plus at most one clamped count)
  if (header.numBits > header.count0 + header.count1) {
    throw new CorruptHeaderError(
      `Invalid range stream: ${header.numBits} bits exceed count total ${header.count0 + header.count1}`
    );
  }

  return header;
}

/**
 * Prefix a payload with its serialized header.
 */
export function writeRangeStream(header: RangeHeader, payload: Uint8Array): Uint8Array {
  return combineHeaderAndPayload(serializeRangeHeader(header), payload);
}

/**
 * Split a stream into its validated header and payload.
 */
export function readRangeStream(
  data: Uint8Array
): { header: RangeHeader; payload: Uint8Array } {
  const header = deserializeRangeHeader(data);
  const payload = data.slice(RANGE_HEADER_SIZE);
  return { header, payload };
}
