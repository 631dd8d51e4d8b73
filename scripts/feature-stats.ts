#!/usr/bin/env npx tsx
/**
 * CLI wrapper for hierarchical feature statistics
 */
import dotenv from 'dotenv';
import { HELP_TEXT, parseArgs, type ParsedArgs } from '../src/lib/config';
import { ConfigError, formatError } from '../src/lib/detection-utils';
import { createDetectors } from '../src/lib/detectors';
import { FeatureStatsPipeline, type RunSummary } from '../src/lib/traversal';

dotenv.config();

function printTotals(summary: RunSummary) {
  console.log(`\n📊 ${summary.images} image(s) in ${summary.directories} director${summary.directories === 1 ? 'y' : 'ies'}` +
    (summary.failedImages > 0 ? `, ${summary.failedImages} failed to load` : ''));
  for (const node of summary.totals.values()) {
    const r = node.toSummary();
    console.log(
      `   ${r.detector.padEnd(14)} d_num=${r.d_num} f_mean=${r.f_mean.toFixed(2)} ` +
      `r_mean=${r.r_mean.toPrecision(6)} r_std=${r.r_std.toPrecision(6)}`
    );
  }
}

async function main() {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    console.error(`   Run with --help for usage.`);
    process.exit(1);
  }

  if (parsed.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  const { config } = parsed;
  console.log(`🚀 Starting feature statistics...`);
  console.log(`   Input:     ${config.inputPath}${config.recurse ? ' (recursive)' : ''}`);
  console.log(`   Output:    ${config.outputRoot ?? 'beside images'}`);
  console.log(`   Detectors: ${config.detectors.join(', ')}`);

  try {
    const pipeline = new FeatureStatsPipeline({
      ...config,
      detectors: createDetectors(config.detectors),
    });
    const summary = await pipeline.run();
    printTotals(summary);
    console.log(`\n🎉 Done!`);
  } catch (error) {
    console.error(`❌ ${error instanceof ConfigError ? error.message : formatError(error)}`);
    if (!(error instanceof ConfigError) && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(`❌ ${formatError(error)}`);
  process.exit(1);
});
