/**
 * rANS stream header.
 *
 * Format (all fields little-endian):
 * [Symbol count N: 4 bytes]
 * [freq[0..3]: 2 bytes each]
 * [Payload: variable] (the last 4 bytes are the final state, LSB first)
 */

import { CorruptHeaderError, TruncatedStreamError } from '../errors.js';
import { ALPHABET_SIZE } from '../core/binarizer.js';
import { TOTFREQ } from '../core/frequency-table.js';
import { combineHeaderAndPayload } from './bytes.js';

/**
 * Header size in bytes.
 */
export const RANS_HEADER_SIZE = 12;

/**
 * Bytes holding the final rANS state at the end of the stream.
 */
export const RANS_STATE_BYTES = 4;

export interface RansHeader {
  /** Number of coded symbols */
  symbolCount: number;

  /** Normalized frequencies, each >= 1, summing to TOTFREQ */
  freq: Uint16Array;
}

/**
 * Serialize a header to bytes.
 */
export function serializeRansHeader(header: RansHeader): Uint8Array {
  const buffer = new ArrayBuffer(RANS_HEADER_SIZE);
  const view = new DataView(buffer);

  view.setUint32(0, header.symbolCount, true);
  for (let k = 0; k < ALPHABET_SIZE; k++) {
    view.setUint16(4 + 2 * k, header.freq[k], true);
  }

  return new Uint8Array(buffer);
}

/**
 * Deserialize and validate a header.
 */
export function deserializeRansHeader(data: Uint8Array): RansHeader {
  if (data.length < RANS_HEADER_SIZE) {
    throw new TruncatedStreamError(
      `Invalid rANS stream: expected at least ${RANS_HEADER_SIZE} bytes, got ${data.length}`
    );
  }

  const view = new DataView(data.buffer, data.byteOffset, RANS_HEADER_SIZE);
  const symbolCount = view.getUint32(0, true);

  const freq = new Uint16Array(ALPHABET_SIZE);
  let total = 0;
  for (let k = 0; k < ALPHABET_SIZE; k++) {
    freq[k] = view.getUint16(4 + 2 * k, true);
    if (freq[k] === 0) {
      throw new CorruptHeaderError(`Invalid rANS stream: zero frequency for symbol ${k}`);
    }
    total += freq[k];
  }

  if (total !== TOTFREQ) {
    throw new CorruptHeaderError(
      `Invalid rANS stream: frequencies sum to ${total}, expected ${TOTFREQ}`
    );
  }

  return { symbolCount, freq };
}

/**
 * Prefix a payload with its serialized header.
 */
export function writeRansStream(header: RansHeader, payload: Uint8Array): Uint8Array {
  return combineHeaderAndPayload(serializeRansHeader(header), payload);
}

/**
 * Split a stream into its validated header and payload.
 */
export function readRansStream(
  data: Uint8Array
): { header: RansHeader; payload: Uint8Array } {
  const header = deserializeRansHeader(data);
  const payload = data.slice(RANS_HEADER_SIZE);

  if (header.symbolCount > 0 && payload.length < RANS_STATE_BYTES) {
    throw new TruncatedStreamError(
      `Invalid rANS stream: ${header.symbolCount} symbols but only ${payload.length} state bytes`
    );
  }

  return { header, payload };
}
