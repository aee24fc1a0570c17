/**
 * Level Validation Script
 *
 * Usage:
 *   npm run validate-levels -- [options]
 *
 * Options:
 *   --from <n>       First seed (default: 1)
 *   --to <n>         Last seed, inclusive (default: maxLevel from config)
 *   --config <path>  Config file (default: levelgen.config.json)
 *   --quiet, -q      Only print the summary line
 *   --help, -h       Show this help
 *
 * Exit status: 0 when every seed passes, 1 when any seed fails, 2 on bad
 * arguments or configuration.
 */

import {
  formatBatchReport,
  loadLevelGenConfig,
  parseValidateLevelsArgs,
  validateSeedRange,
} from "../src";

const HELP = `
Level Validation Script

Usage:
  npm run validate-levels -- [options]

Options:
  --from <n>       First seed (default: 1)
  --to <n>         Last seed, inclusive (default: maxLevel from config)
  --config <path>  Config file (default: levelgen.config.json)
  --quiet, -q      Only print the summary line
  --help, -h       Show this help
`;

function main(): number {
  const args = parseValidateLevelsArgs(process.argv.slice(2));
  if (args.isErr()) {
    console.error(`Error: ${args.error.message}`);
    console.error(HELP);
    return 2;
  }
  const options = args.value;
  if (options.help) {
    console.log(HELP);
    return 0;
  }

  const config = loadLevelGenConfig(options.configPath);
  if (config.isErr()) {
    console.error(`Error: ${config.error.message}`);
    return 2;
  }

  const from = options.from ?? 1;
  const to = options.to ?? config.value.maxLevel;
  if (from > to) {
    console.error(`Error: --from (${from}) must not be greater than --to (${to})`);
    return 2;
  }

  const report = validateSeedRange({ from, to }, config.value);
  console.log(formatBatchReport(report, { quiet: options.quiet }));
  if (!options.quiet) {
    console.log(`Validated seeds ${from}..${to} in ${report.durationMs.toFixed(0)}ms`);
  }

  return report.failedSeeds.length === 0 ? 0 : 1;
}

process.exitCode = main();
