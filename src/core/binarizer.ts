import { BitOutputStream, type Bit } from './bit-stream.js';

/**
 * Size of the symbol alphabet {0, 1, 2, 3}.
 */
export const ALPHABET_SIZE = 4;

/**
 * Which fixed codebook to binarize with.
 *
 * - `efficient`: truncated unary, short codes for the frequent symbol 0
 *   (0 -> 0, 1 -> 10, 2 -> 110, 3 -> 1110)
 * - `inefficient`: the same codes with lengths reversed
 *   (0 -> 1110, 1 -> 110, 2 -> 10, 3 -> 0)
 */
export type CodebookName = 'efficient' | 'inefficient';

export type Codebook = readonly (readonly Bit[])[];

function freezeCodebook(codes: Bit[][]): Codebook {
  return Object.freeze(codes.map((code) => Object.freeze(code)));
}

export const CODEBOOKS: Readonly<Record<CodebookName, Codebook>> = Object.freeze({
  efficient: freezeCodebook([[0], [1, 0], [1, 1, 0], [1, 1, 1, 0]]),
  inefficient: freezeCodebook([[1, 1, 1, 0], [1, 1, 0], [1, 0], [0]]),
});

/**
 * Throw a RangeError unless `symbol` is an integer in 0..3.
 */
export function assertSymbol(symbol: number, context: string): void {
  if (!Number.isInteger(symbol) || symbol < 0 || symbol >= ALPHABET_SIZE) {
    throw new RangeError(
      `${context}: symbol ${symbol} out of range (0..${ALPHABET_SIZE - 1})`
    );
  }
}

/**
 * Bits for one symbol. The returned array is the shared frozen codeword.
 */
export function binarizeSymbol(symbol: number, codebook: CodebookName): readonly Bit[] {
  assertSymbol(symbol, 'binarizeSymbol');
  return CODEBOOKS[codebook][symbol];
}

/**
 * Codeword length of a symbol in bits.
 */
export function codeLength(symbol: number, codebook: CodebookName): number {
  return binarizeSymbol(symbol, codebook).length;
}

/**
 * Binarize a whole sequence into one flat bit array.
 */
export function binarizeSequence(
  symbols: readonly number[],
  codebook: CodebookName
): Bit[] {
  const bits: Bit[] = [];
  for (const symbol of symbols) {
    bits.push(...binarizeSymbol(symbol, codebook));
  }
  return bits;
}

/**
 * Pack bits LSB-first into bytes with no header (raw size inspection).
 */
export function packBitsToBytes(bits: readonly Bit[]): Uint8Array {
  const stream = new BitOutputStream();
  for (const bit of bits) {
    stream.writeBit(bit);
  }
  return stream.flush();
}
