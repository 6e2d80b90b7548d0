export { BitOutputStream, BitInputStream, type Bit } from './bit-stream.js';
export {
  ALPHABET_SIZE,
  CODEBOOKS,
  type Codebook,
  type CodebookName,
  binarizeSymbol,
  binarizeSequence,
  codeLength,
  packBitsToBytes,
} from './binarizer.js';
export {
  RangeEncoder,
  type BinaryModel,
  type RangeEncoderOptions,
  DEFAULT_RANGE_CODER_CONFIG,
  MAX_TOTAL_COUNT,
  RANGE_TOP,
} from './range-encoder.js';
export { RangeDecoder } from './range-decoder.js';
export { RansEncoder, RANS_L } from './rans-encoder.js';
export { RansDecoder } from './rans-decoder.js';
export {
  buildHistogram,
  normalizeFrequencies,
  buildCumulativeTable,
  findSymbol,
  checkFrequencyTable,
  TOTFREQ,
  SCALE_BITS,
  MIN_FREQ,
} from './frequency-table.js';
