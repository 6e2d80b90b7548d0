import { CorruptHeaderError, TruncatedStreamError } from '../errors.js';
import {
  buildCumulativeTable,
  checkFrequencyTable,
  findSymbol,
  TOTFREQ,
} from './frequency-table.js';
import { RANS_L } from './rans-encoder.js';

/**
 * Byte-wise rANS decoder. Reads the final state from the last 4 payload
 * bytes, then pulls renormalization bytes backwards from there.
 */
export class RansDecoder {
  private x: number;
  private position: number;
  private readonly payload: Uint8Array;
  private readonly freq: Uint16Array;
  private readonly cumulative: Uint32Array;

  /**
   * @param payload - Coded bytes following the header (at least 4)
   * @param freq - Frequencies summing to TOTFREQ
   * @throws CorruptHeaderError for an unusable frequency table
   * @throws TruncatedStreamError when the payload lacks the 4 state bytes
   */
  constructor(payload: Uint8Array, freq: Uint16Array) {
    const problem = checkFrequencyTable(freq);
    if (problem !== undefined) {
      throw new CorruptHeaderError(`RansDecoder: ${problem}`);
    }
    if (payload.length < 4) {
      throw new TruncatedStreamError(
        `RansDecoder: expected at least 4 state bytes, got ${payload.length}`
      );
    }
    this.payload = payload;
    this.freq = freq;
    this.cumulative = buildCumulativeTable(freq);

    const tail = payload.length - 4;
    this.x =
      (payload[tail] |
        (payload[tail + 1] << 8) |
        (payload[tail + 2] << 16) |
        (payload[tail + 3] << 24)) >>>
      0;
    this.position = tail;
  }

  /**
   * Pop one symbol off the state.
   */
  decodeSymbol(): number {
    const xMod = this.x % TOTFREQ;
    const xDiv = Math.floor(this.x / TOTFREQ);

    const symbol = findSymbol(this.cumulative, xMod);
    if (symbol < 0) {
      throw new Error(`RansDecoder: state ${this.x} maps outside the frequency table`);
    }

    this.x = this.freq[symbol] * xDiv + (xMod - this.cumulative[symbol]);

    // Renormalization (inverse of encoder)
    while (this.x < RANS_L && this.position > 0) {
      this.x = ((this.x << 8) | this.payload[--this.position]) >>> 0;
    }

    return symbol;
  }

  /**
   * Current state; equals RANS_L once a well-formed stream is fully decoded.
   */
  get state(): number {
    return this.x;
  }

  /**
   * Renormalization bytes not yet consumed.
   */
  get remaining(): number {
    return this.position;
  }
}
