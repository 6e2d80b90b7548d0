import { describe, it, expect } from 'vitest';
import { buildEntropyReport, formatEntropyReport, type ProgressInfo } from '../src/report.js';
import { generateSource } from '../src/model/source.js';

function pad(label: string, value: string): string {
  return label.padEnd(30) + value;
}

describe('buildEntropyReport', () => {
  it('should measure a uniform four-symbol input', () => {
    const report = buildEntropyReport([0, 1, 2, 3]);

    expect(report.symbolCount).toBe(4);
    expect(report.counts).toEqual([1, 1, 1, 1]);
    expect(report.symbolEntropy).toBe(2);

    expect(report.efficient.binCount).toBe(10);
    expect(report.efficient.binsPerSymbol).toBe(2.5);
    expect(report.efficient.packedBytes).toBe(2);
    expect(report.efficient.roundTrip).toBe(true);
    expect(report.inefficient.binCount).toBe(10);
    expect(report.inefficient.roundTrip).toBe(true);

    // 4 zeros and 6 ones among the efficient bins
    expect(report.cabac.observedLpsProbability).toBe(0.4);
    expect(report.cabac.state).toBe(7);
    expect(report.cabac.modelLpsProbability).toBe(100 / 256);

    expect(report.rans.streamBytes).toBe(17);
    expect(report.rans.rate).toBe(34);
    expect(report.rans.roundTrip).toBe(true);
    expect(report.winner).toBe('efficient-binarization');
  });

  it('should measure the default source', () => {
    const report = buildEntropyReport(generateSource());

    expect(report.counts).toEqual([724, 83, 88, 105]);
    expect(report.symbolEntropy).toBeCloseTo(1.2853418278, 8);

    expect(report.efficient.binCount).toBe(1574);
    expect(report.efficient.packedBytes).toBe(197);
    expect(report.efficient.rangeCodedBytes).toBe(202);
    expect(report.efficient.idealRate).toBeCloseTo(1.48979, 4);
    expect(report.inefficient.binCount).toBe(3426);
    expect(report.inefficient.rangeCodedBytes).toBe(389);

    expect(report.cabac.observedLpsProbability).toBeCloseTo(0.3646759848, 8);
    expect(report.cabac.state).toBe(8);

    expect(report.rans.streamBytes).toBe(176);
    expect(report.rans.rate).toBe(1.408);
    expect(report.winner).toBe('rans');
  });

  it('should report each stage in order', () => {
    const stages: ProgressInfo[] = [];
    buildEntropyReport([0, 0, 1], { onProgress: (p) => stages.push(p) });

    expect(stages).toEqual([
      { stage: 'counting', current: 0, total: 4 },
      { stage: 'binarizing', current: 1, total: 4 },
      { stage: 'range-coding', current: 2, total: 4 },
      { stage: 'rans-coding', current: 3, total: 4 },
    ]);
  });

  it('should throw on an empty sequence', () => {
    expect(() => buildEntropyReport([])).toThrow(RangeError);
  });

  it('should throw on symbols outside 0..3', () => {
    expect(() => buildEntropyReport([0, 4])).toThrow(RangeError);
  });
});

describe('formatEntropyReport', () => {
  it('should render aligned label/value lines', () => {
    const lines = formatEntropyReport(buildEntropyReport(generateSource()));

    expect(lines[0]).toBe(pad('symbols:', '1000'));
    expect(lines[1]).toBe(pad('  symbol 0:', '724'));
    expect(lines[4]).toBe(pad('  symbol 3:', '105'));
    expect(lines).toContain('-- efficient binarization --');
    expect(lines).toContain(pad('bins/symbol:', '1.574000'));
    expect(lines).toContain(pad('packed bins:', '197 bytes'));
    expect(lines).toContain(pad('CABAC LPS probability:', '0.371094 (state 8)'));
    expect(lines).toContain('-- rANS --');
    expect(lines).toContain(pad('stream size:', '176 bytes'));
    expect(lines).toContain(pad('rate:', '1.408000 bits/symbol'));
    expect(lines[lines.length - 1]).toBe(pad('winner:', 'rANS'));
  });
});
