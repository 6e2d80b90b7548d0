/**
 * Example: compare binarization + range coding against rANS on a generated
 * source.
 *
 * Usage:
 *   npx tsx examples/entropy-report.ts
 *
 *   Or with a custom source:
 *      npx tsx examples/entropy-report.ts --length 5000 --seed 7
 *      npx tsx examples/entropy-report.ts --weights 40,30,20,10
 */

import {
  buildEntropyReport,
  formatEntropyReport,
  generateSource,
  DEFAULT_SOURCE_CONFIG,
  type SourceConfig,
} from '../src/index.js';

function parseArgs(): SourceConfig {
  const args = process.argv.slice(2);
  const config: SourceConfig = { ...DEFAULT_SOURCE_CONFIG };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--length' && args[i + 1]) {
      config.length = parseInt(args[++i], 10);
    } else if (args[i] === '--seed' && args[i + 1]) {
      config.seed = parseInt(args[++i], 10);
    } else if (args[i] === '--weights' && args[i + 1]) {
      config.weights = args[++i].split(',').map(Number);
    }
  }

  return config;
}

function main() {
  const config = parseArgs();
  console.log(
    `Generating ${config.length} symbols (weights ${config.weights.join('/')}, seed ${config.seed})`
  );

  const symbols = generateSource(config);
  const report = buildEntropyReport(symbols, {
    onProgress: (progress) => {
      process.stdout.write(`\r  ${progress.stage} (${progress.current + 1}/${progress.total})`.padEnd(40));
    },
  });
  console.log();
  console.log();

  console.log('='.repeat(50));
  console.log('ENTROPY SUMMARY');
  console.log('='.repeat(50));
  for (const line of formatEntropyReport(report)) {
    console.log(line);
  }
  console.log('='.repeat(50));

  if (!report.rans.roundTrip || !report.efficient.roundTrip || !report.inefficient.roundTrip) {
    console.error('Roundtrip verification FAILED');
    process.exit(1);
  }
}

try {
  main();
} catch (err) {
  console.error('Error:', err);
  process.exit(1);
}
