/**
 * Level Preview Script
 *
 * Usage:
 *   npm run print-level -- <level> [options]
 *
 * Options:
 *   --no-color       Disable ANSI colors
 *   --ascii          Plain symbols, '.' for empty tiles
 *   --stats          Print level statistics
 *   --trace          Show pipeline trace/decisions
 *   --config <path>  Config file (default: levelgen.config.json)
 *   --help, -h       Show this help
 */

import {
  computeLevelStats,
  DEFAULT_CHARSET,
  DOTTED_CHARSET,
  isDecisionEvent,
  LevelGenerator,
  loadLevelGenConfig,
  parsePrintLevelArgs,
  printLevel,
  validateLevel,
} from "../src";

const HELP = `
Level Preview Script

Usage:
  npm run print-level -- <level> [options]

Options:
  --no-color       Disable ANSI colors
  --ascii          Plain symbols, '.' for empty tiles
  --stats          Print level statistics
  --trace          Show pipeline trace/decisions
  --config <path>  Config file (default: levelgen.config.json)
  --help, -h       Show this help
`;

function main(): number {
  const args = parsePrintLevelArgs(process.argv.slice(2));
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

  const generator = LevelGenerator.create({
    ...config.value,
    trace: config.value.trace || options.trace,
  });
  const result = generator.run(options.level);
  const level = result.artifact;

  printLevel(level, {
    charset: options.ascii ? DOTTED_CHARSET : DEFAULT_CHARSET,
    useColors: options.color,
  });

  if (options.stats) {
    const stats = computeLevelStats(level, generator.config.jumpEnvelope);
    const validation = validateLevel(level, generator.config);
    console.log("");
    console.log(`Archetype:        ${stats.archetype}`);
    console.log(`Trophy:           (${level.trophy.x}, ${level.trophy.y})`);
    console.log(`Exit:             (${level.exit.x}, ${level.exit.y})`);
    console.log(`Wall tiles:       ${stats.wallTiles}`);
    console.log(`Floor hazards:    ${stats.floorHazards}`);
    console.log(`Platform hazards: ${stats.platformHazards}`);
    console.log(`Diamonds:         ${stats.diamonds}`);
    console.log(
      `Reachable tiles:  ${stats.reachableTiles} (${(stats.reachableRatio * 100).toFixed(1)}%)`,
    );
    console.log(`Valid:            ${validation.success ? "yes" : "no"}`);
    for (const violation of validation.violations) {
      console.log(`  [${violation.severity}] ${violation.message}`);
    }
    console.log(`Generated in:     ${result.durationMs.toFixed(2)}ms`);
  }

  if (options.trace) {
    console.log("");
    console.log("Pipeline trace:");
    for (const event of result.trace.filter(isDecisionEvent)) {
      console.log(
        `  [${event.passId}] ${event.question}: ${JSON.stringify(event.chosen)} (${event.reason})`,
      );
    }
  }

  return 0;
}

process.exitCode = main();
