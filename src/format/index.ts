export { combineHeaderAndPayload } from './bytes.js';

export {
  type RangeHeader,
  RANGE_HEADER_SIZE,
  RANGE_STATE_BYTES,
  serializeRangeHeader,
  deserializeRangeHeader,
  writeRangeStream,
  readRangeStream,
} from './range-header.js';

export {
  type RansHeader,
  RANS_HEADER_SIZE,
  RANS_STATE_BYTES,
  serializeRansHeader,
  deserializeRansHeader,
  writeRansStream,
  readRansStream,
} from './rans-header.js';
