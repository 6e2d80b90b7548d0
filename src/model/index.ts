export {
  CABAC_RANGE_TAB_LPS,
  CABAC_STATE_COUNT,
  type LpsRangeRow,
  cabacStateProbability,
  findNearestCabacState,
} from './cabac-table.js';
export { countSymbols, symbolEntropy, binaryEntropy, lpsProbability } from './entropy.js';
export {
  type SourceConfig,
  DEFAULT_SOURCE_CONFIG,
  SeededRandom,
  generateSource,
} from './source.js';
