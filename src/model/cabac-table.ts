/**
 * H.264 / AVC CABAC LPS range table (ITU-T H.264 Table 9-44, public domain).
 *
 * Row `s` holds the LPS sub-range for probability state `s` at each of the
 * four quantized range indices. Column 0 divided by 256 approximates the LPS
 * probability of the state, which is all the coders here need: a way to name
 * the CABAC state closest to an observed bit skew.
 */

import table from './lps-range-table.json' with { type: 'json' };

export const CABAC_STATE_COUNT = 64;

export type LpsRangeRow = readonly [number, number, number, number];

function loadRangeTable(rows: readonly (readonly number[])[]): readonly LpsRangeRow[] {
  if (rows.length !== CABAC_STATE_COUNT) {
    throw new Error(
      `Invalid CABAC table: expected ${CABAC_STATE_COUNT} rows, got ${rows.length}`
    );
  }
  return Object.freeze(
    rows.map((row, state): LpsRangeRow => {
      if (row.length !== 4) {
        throw new Error(`Invalid CABAC table: row ${state} must have 4 entries`);
      }
      return Object.freeze([row[0], row[1], row[2], row[3]] as const);
    })
  );
}

export const CABAC_RANGE_TAB_LPS: readonly LpsRangeRow[] = loadRangeTable(table.rangeTabLPS);

/**
 * LPS probability modelled by a state.
 */
export function cabacStateProbability(state: number): number {
  if (!Number.isInteger(state) || state < 0 || state >= CABAC_STATE_COUNT) {
    throw new RangeError(
      `cabacStateProbability: state ${state} out of range (0..${CABAC_STATE_COUNT - 1})`
    );
  }
  return CABAC_RANGE_TAB_LPS[state][0] / 256;
}

/**
 * State whose modelled LPS probability is closest to `pLps`.
 * Ties go to the lower state index.
 */
export function findNearestCabacState(pLps: number): number {
  if (!Number.isFinite(pLps) || pLps < 0 || pLps > 1) {
    throw new RangeError(`findNearestCabacState: probability ${pLps} outside [0, 1]`);
  }

  let bestState = 0;
  let bestDistance = Infinity;
  for (let state = 0; state < CABAC_STATE_COUNT; state++) {
    const distance = Math.abs(pLps - cabacStateProbability(state));
    if (distance < bestDistance) {
      bestDistance = distance;
      bestState = state;
    }
  }
  return bestState;
}
