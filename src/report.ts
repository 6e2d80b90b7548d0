import type { Bit } from './core/bit-stream.js';
import { binarizeSequence, packBitsToBytes, type CodebookName } from './core/binarizer.js';
import { arithDecodeBits, arithEncodeBits } from './range-coder.js';
import { ransDecode, ransEncode } from './rans-coder.js';
import {
  binaryEntropy,
  countSymbols,
  lpsProbability,
  symbolEntropy,
} from './model/entropy.js';
import { cabacStateProbability, findNearestCabacState } from './model/cabac-table.js';

/**
 * Progress information callback payload.
 */
export interface ProgressInfo {
  stage: 'counting' | 'binarizing' | 'range-coding' | 'rans-coding';
  current: number;
  total: number;
}

export interface ReportOptions {
  /** Progress callback */
  onProgress?: (progress: ProgressInfo) => void;
}

/**
 * Cost of one binarization followed by the binary range coder.
 */
export interface BinarizationStats {
  codebook: CodebookName;
  /** Bins produced for the whole sequence */
  binCount: number;
  binsPerSymbol: number;
  /** Entropy of the bins' 0/1 distribution, bits/bin */
  binEntropy: number;
  /** binEntropy * binsPerSymbol: the best a static binary coder can do */
  idealRate: number;
  /** Size of the raw packed bins (no header) */
  packedBytes: number;
  /** Size of the range-coded stream including its header */
  rangeCodedBytes: number;
  rangeCodedRate: number;
  roundTrip: boolean;
}

/**
 * How well the nearest CABAC state models the observed bin skew.
 */
export interface CabacFit {
  observedLpsProbability: number;
  state: number;
  modelLpsProbability: number;
  difference: number;
}

export interface RansStats {
  streamBytes: number;
  rate: number;
  roundTrip: boolean;
}

export interface EntropyReport {
  symbolCount: number;
  counts: number[];
  /** Empirical entropy of the source, bits/symbol */
  symbolEntropy: number;
  efficient: BinarizationStats;
  inefficient: BinarizationStats;
  /** Fit of the efficient binarization's bins */
  cabac: CabacFit;
  rans: RansStats;
  /** Which scheme lands closest to the source entropy */
  winner: 'rans' | 'efficient-binarization';
}

const STAGE_COUNT = 4;

function bitsEqual(a: readonly Bit[], b: readonly Bit[]): boolean {
  return a.length === b.length && a.every((bit, i) => bit === b[i]);
}

function measureBinarization(
  symbolCount: number,
  codebook: CodebookName,
  bits: Bit[]
): BinarizationStats {
  const binsPerSymbol = bits.length / symbolCount;
  const binEntropy = binaryEntropy(bits);
  const stream = arithEncodeBits(bits);

  return {
    codebook,
    binCount: bits.length,
    binsPerSymbol,
    binEntropy,
    idealRate: binEntropy * binsPerSymbol,
    packedBytes: packBitsToBytes(bits).length,
    rangeCodedBytes: stream.length,
    rangeCodedRate: (8 * stream.length) / symbolCount,
    roundTrip: bitsEqual(arithDecodeBits(stream), bits),
  };
}

/**
 * Compare both binarizations (with the range coder) against rANS on one
 * symbol sequence.
 *
 * @throws RangeError for an empty sequence or symbols outside 0..3
 */
export function buildEntropyReport(
  symbols: readonly number[],
  options: ReportOptions = {}
): EntropyReport {
  if (symbols.length === 0) {
    throw new RangeError('buildEntropyReport: empty symbol sequence');
  }
  const report = (stage: ProgressInfo['stage'], current: number): void => {
    options.onProgress?.({ stage, current, total: STAGE_COUNT });
  };

  report('counting', 0);
  const counts = countSymbols(symbols);
  const entropy = symbolEntropy(counts);

  report('binarizing', 1);
  const efficientBits = binarizeSequence(symbols, 'efficient');
  const inefficientBits = binarizeSequence(symbols, 'inefficient');

  report('range-coding', 2);
  const efficient = measureBinarization(symbols.length, 'efficient', efficientBits);
  const inefficient = measureBinarization(symbols.length, 'inefficient', inefficientBits);

  const observed = lpsProbability(efficientBits);
  const state = findNearestCabacState(observed);
  const modelled = cabacStateProbability(state);

  report('rans-coding', 3);
  const ransStream = ransEncode(symbols);
  const decoded = ransDecode(ransStream);
  const rans: RansStats = {
    streamBytes: ransStream.length,
    rate: (8 * ransStream.length) / symbols.length,
    roundTrip: decoded.length === symbols.length && decoded.every((s, i) => s === symbols[i]),
  };

  const ransGap = Math.abs(rans.rate - entropy);
  const binaryGap = Math.abs(efficient.idealRate - entropy);

  return {
    symbolCount: symbols.length,
    counts,
    symbolEntropy: entropy,
    efficient,
    inefficient,
    cabac: {
      observedLpsProbability: observed,
      state,
      modelLpsProbability: modelled,
      difference: Math.abs(observed - modelled),
    },
    rans,
    winner: ransGap < binaryGap ? 'rans' : 'efficient-binarization',
  };
}

const LABEL_WIDTH = 30;

function line(label: string, value: string): string {
  return `${label.padEnd(LABEL_WIDTH)}${value}`;
}

function formatBinarization(title: string, stats: BinarizationStats): string[] {
  return [
    `-- ${title} --`,
    line('bins/symbol:', stats.binsPerSymbol.toFixed(6)),
    line('bin entropy:', `${stats.binEntropy.toFixed(6)} bits/bin`),
    line('ideal rate:', `${stats.idealRate.toFixed(6)} bits/symbol`),
    line('packed bins:', `${stats.packedBytes} bytes`),
    line('range-coded:', `${stats.rangeCodedBytes} bytes`),
    line('roundtrip OK:', String(stats.roundTrip)),
  ];
}

/**
 * Render a report as plain-text lines.
 */
export function formatEntropyReport(report: EntropyReport): string[] {
  return [
    line('symbols:', String(report.symbolCount)),
    ...report.counts.map((count, symbol) => line(`  symbol ${symbol}:`, String(count))),
    line('source entropy:', `${report.symbolEntropy.toFixed(6)} bits/symbol`),
    ...formatBinarization('efficient binarization', report.efficient),
    line('observed LPS probability:', report.cabac.observedLpsProbability.toFixed(6)),
    line(
      'CABAC LPS probability:',
      `${report.cabac.modelLpsProbability.toFixed(6)} (state ${report.cabac.state})`
    ),
    ...formatBinarization('inefficient binarization', report.inefficient),
    '-- rANS --',
    line('stream size:', `${report.rans.streamBytes} bytes`),
    line('rate:', `${report.rans.rate.toFixed(6)} bits/symbol`),
    line('roundtrip OK:', String(report.rans.roundTrip)),
    line('winner:', report.winner === 'rans' ? 'rANS' : 'efficient binarization'),
  ];
}
