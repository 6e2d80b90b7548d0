import type { Bit } from './bit-stream.js';
import { RANGE_TOP, splitRange, type BinaryModel } from './range-encoder.js';

const MASK = 0xffffffff;

/**
 * Binary range decoder. Mirrors RangeEncoder step for step.
 *
 * Reads from `payload`; once it is exhausted, zero bytes are shifted in.
 */
export class RangeDecoder {
  private low: number = 0;
  private range: number = MASK;
  private code: number = 0;
  private position: number = 0;
  private readonly payload: Uint8Array;
  private readonly model: BinaryModel;

  constructor(payload: Uint8Array, model: BinaryModel) {
    this.payload = payload;
    this.model = model;

    // Initialize code with the first 4 bytes (MSB first)
    for (let i = 0; i < 4; i++) {
      this.code = ((this.code << 8) | this.nextByte()) >>> 0;
    }
  }

  /**
   * Decode one bit.
   */
  decodeBit(): Bit {
    const split = splitRange(this.range, this.model);
    const offset = (this.code - this.low) >>> 0;

    let bit: Bit;
    if (offset < split) {
      bit = 0;
      this.range = split;
    } else {
      bit = 1;
      this.low = (this.low + split) >>> 0;
      this.range = (this.range - split) >>> 0;
    }

    // Renormalization (must match encoder exactly)
    while (this.range < RANGE_TOP) {
      this.range = (this.range << 8) >>> 0;
      this.low = (this.low << 8) >>> 0;
      this.code = ((this.code << 8) | this.nextByte()) >>> 0;
    }

    return bit;
  }

  private nextByte(): number {
    if (this.position >= this.payload.length) {
      return 0;
    }
    return this.payload[this.position++];
  }
}
