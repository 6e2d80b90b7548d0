import { CorruptHeaderError } from './errors.js';
import { RansEncoder, RANS_L } from './core/rans-encoder.js';
import { RansDecoder } from './core/rans-decoder.js';
import { buildHistogram, normalizeFrequencies } from './core/frequency-table.js';
import { readRansStream, writeRansStream } from './format/rans-header.js';

/**
 * Compress a sequence of symbols (0..3) with static-model rANS.
 *
 * The frequency table is derived from the input's own histogram and stored
 * in the 12-byte header, so the stream decodes without side information.
 * An empty input yields an empty buffer.
 *
 * @throws RangeError for symbols outside 0..3
 */
export function ransEncode(symbols: readonly number[]): Uint8Array {
  if (symbols.length === 0) {
    return new Uint8Array(0);
  }

  const freq = normalizeFrequencies(buildHistogram(symbols));
  const encoder = new RansEncoder(freq);

  // Reverse order so decoding yields symbols[0] first
  for (let i = symbols.length - 1; i >= 0; i--) {
    encoder.encodeSymbol(symbols[i]);
  }

  return writeRansStream({ symbolCount: symbols.length, freq }, encoder.finish());
}

/**
 * Decompress a stream produced by ransEncode.
 *
 * @throws TruncatedStreamError when shorter than the header or state bytes
 * @throws CorruptHeaderError on a zero frequency, a total other than 4096, or a
 *         symbol count that does not match the payload
 */
export function ransDecode(stream: Uint8Array): number[] {
  if (stream.length === 0) {
    return [];
  }

  const { header, payload } = readRansStream(stream);
  if (header.symbolCount === 0) {
    return [];
  }

  const decoder = new RansDecoder(payload, header.freq);
  const symbols: number[] = [];
  for (let i = 0; i < header.symbolCount; i++) {
    symbols.push(decoder.decodeSymbol());

    // Between symbols a well-formed stream never drops below RANS_L
    if (decoder.state < RANS_L && i < header.symbolCount - 1) {
      throw new CorruptHeaderError(
        `Invalid rANS stream: payload exhausted after ${i + 1} of ${header.symbolCount} symbols`
      );
    }
  }

  if (decoder.state !== RANS_L || decoder.remaining !== 0) {
    throw new CorruptHeaderError(
      `Invalid rANS stream: final state ${decoder.state} with ${decoder.remaining} bytes left`
    );
  }
  return symbols;
}
