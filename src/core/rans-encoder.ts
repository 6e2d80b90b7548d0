import { assertSymbol } from './binarizer.js';
import {
  buildCumulativeTable,
  checkFrequencyTable,
  SCALE_BITS,
  TOTFREQ,
} from './frequency-table.js';

/**
 * Lower bound of the normalized rANS state interval [RANS_L, 256 * RANS_L).
 */
export const RANS_L = 1 << 23;

/**
 * Byte-wise rANS encoder over a static frequency table.
 *
 * rANS is last-in first-out: feed symbols in reverse order so the decoder
 * produces them forwards. Renormalization bytes are appended in emission
 * order and the decoder consumes them from the tail.
 */
export class RansEncoder {
  private x: number = RANS_L;
  private output: number[] = [];
  private readonly freq: Uint16Array;
  private readonly cumulative: Uint32Array;

  /**
   * @throws RangeError unless every frequency is >= 1 and they sum to TOTFREQ
   */
  constructor(freq: Uint16Array) {
    const problem = checkFrequencyTable(freq);
    if (problem !== undefined) {
      throw new RangeError(`RansEncoder: ${problem}`);
    }
    this.freq = freq;
    this.cumulative = buildCumulativeTable(freq);
  }

  /**
   * Push one symbol onto the state.
   */
  encodeSymbol(symbol: number): void {
    assertSymbol(symbol, 'RansEncoder');
    const f = this.freq[symbol];
    const c = this.cumulative[symbol];

    // Keep the post-transform state below 256 * RANS_L
    const xMax = ((RANS_L >>> SCALE_BITS) << 8) * f;
    while (this.x >= xMax) {
      this.output.push(this.x & 0xff);
      this.x >>>= 8;
    }

    this.x = Math.floor(this.x / f) * TOTFREQ + (this.x % f) + c;
  }

  /**
   * Append the final state (4 bytes, least-significant first) and return
   * the payload.
   */
  finish(): Uint8Array {
    for (let i = 0; i < 4; i++) {
      this.output.push(this.x & 0xff);
      this.x >>>= 8;
    }
    return new Uint8Array(this.output);
  }
}
