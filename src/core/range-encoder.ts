import type { Bit } from './bit-stream.js';

/**
 * Constants for the binary range coder.
 * The interval state is two unsigned 32-bit registers.
 */
export const RANGE_TOP = 1 << 24; // renormalize below this
const MASK = 0xffffffff;

/**
 * Largest `count0 + count1` the coder can split: after renormalization the
 * range is at least RANGE_TOP, so `range / total` stays >= 1.
 */
export const MAX_TOTAL_COUNT = RANGE_TOP;

/**
 * Static probability model for one bit: how often 0 and 1 occur.
 */
export interface BinaryModel {
  count0: number;
  count1: number;
}

/**
 * Size of the sub-interval given to a 0 bit.
 */
export function splitRange(range: number, model: BinaryModel): number {
  const total = model.count0 + model.count1;
  return Math.floor(range / total) * model.count0;
}

/**
 * Options for the range encoder.
 */
export interface RangeEncoderOptions {
  /**
   * Add the carry out of `low` into the bytes already written.
   * When false the carry is dropped (the carry-less variant):
   * identical output whenever no carry occurs, undecodable when one does.
   * The "should drop the carry when propagation is disabled" case in
   * test/range-coder.test.ts shows what the decoder recovers then.
   */
  propagateCarry: boolean;
}

export const DEFAULT_RANGE_CODER_CONFIG: Readonly<RangeEncoderOptions> = Object.freeze({
  propagateCarry: true,
});

/**
 * Binary range encoder with a static model.
 *
 * The interval [low, low + range) starts as [0, 2^32). Each bit narrows it
 * by the model's split; whenever range drops below 2^24 the top byte of low
 * is emitted and both registers shift left by 8.
 */
export class RangeEncoder {
  private low: number = 0;
  private range: number = MASK;
  private output: number[] = [];
  private readonly model: BinaryModel;
  private readonly options: RangeEncoderOptions;

  constructor(model: BinaryModel, options: Partial<RangeEncoderOptions> = {}) {
    this.model = model;
    this.options = { ...DEFAULT_RANGE_CODER_CONFIG, ...options };
  }

  /**
   * Encode one bit.
   */
  encodeBit(bit: Bit): void {
    const split = splitRange(this.range, this.model);

    if (bit === 0) {
      this.range = split;
    } else {
      if (this.low + split > MASK && this.options.propagateCarry) {
        this.propagateCarry();
      }
      this.low = (this.low + split) >>> 0;
      this.range = (this.range - split) >>> 0;
    }

    this.renormalize();
  }

  /**
   * Flush the 4 bytes of low (MSB first) and return the payload.
   */
  finish(): Uint8Array {
    for (let i = 0; i < 4; i++) {
      this.emitTopByte();
    }
    return new Uint8Array(this.output);
  }

  private renormalize(): void {
    while (this.range < RANGE_TOP) {
      this.emitTopByte();
      this.range = (this.range << 8) >>> 0;
    }
  }

  private emitTopByte(): void {
    this.output.push(this.low >>> 24);
    this.low = (this.low << 8) >>> 0;
  }

  private propagateCarry(): void {
    let i = this.output.length - 1;
    while (i >= 0 && this.output[i] === 0xff) {
      this.output[i] = 0;
      i--;
    }
    if (i < 0) {
      throw new Error('RangeEncoder: carry propagated past the first payload byte');
    }
    this.output[i]++;
  }
}
