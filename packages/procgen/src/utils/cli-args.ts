/**
 * Command-line argument parsing for the level scripts.
 *
 * Parsers are pure: they take `argv` without the node and script entries
 * and never touch `process`.
 */

import {
  Err,
  LevelGenError,
  Ok,
  parseLevelSeed,
  type Result,
} from "@levelforge/contracts";

export interface ValidateLevelsArgs {
  /** Defaults to 1 */
  readonly from?: number;
  /** Defaults to the configured `maxLevel` */
  readonly to?: number;
  readonly configPath?: string;
  readonly quiet: boolean;
  readonly help: boolean;
}

export interface PrintLevelArgs {
  readonly level: number;
  readonly color: boolean;
  /** Plain `.`-for-empty output */
  readonly ascii: boolean;
  readonly stats: boolean;
  readonly trace: boolean;
  readonly configPath?: string;
  readonly help: boolean;
}

function parseSeedArg(
  flag: string,
  raw: string | undefined,
): Result<number, LevelGenError> {
  if (raw === undefined || raw.startsWith("--")) {
    return Err(LevelGenError.argumentInvalid(`Missing value for ${flag}`));
  }
  if (!/^\d+$/.test(raw)) {
    return Err(
      LevelGenError.argumentInvalid(`Invalid value for ${flag}: "${raw}"`, {
        flag,
        value: raw,
      }),
    );
  }
  return parseLevelSeed(Number(raw)).mapErr((error) =>
    LevelGenError.argumentInvalid(`Invalid value for ${flag}: ${error.message}`, {
      flag,
      value: raw,
    }),
  );
}

function parsePathArg(
  flag: string,
  raw: string | undefined,
): Result<string, LevelGenError> {
  if (raw === undefined || raw.startsWith("--")) {
    return Err(LevelGenError.argumentInvalid(`Missing value for ${flag}`));
  }
  return Ok(raw);
}

function unknownOption(arg: string): LevelGenError {
  return LevelGenError.argumentInvalid(
    arg.startsWith("-") ? `Unknown option: ${arg}` : `Unexpected argument: ${arg}`,
    { argument: arg },
  );
}

/**
 * `validate-levels [--from N] [--to N] [--config PATH] [--quiet]`
 */
export function parseValidateLevelsArgs(
  argv: readonly string[],
): Result<ValidateLevelsArgs, LevelGenError> {
  let from: number | undefined;
  let to: number | undefined;
  let configPath: string | undefined;
  let quiet = false;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    switch (arg) {
      case "--from": {
        const value = parseSeedArg(arg, argv[++i]);
        if (value.isErr()) return Err(value.error);
        from = value.value;
        break;
      }
      case "--to": {
        const value = parseSeedArg(arg, argv[++i]);
        if (value.isErr()) return Err(value.error);
        to = value.value;
        break;
      }
      case "--config": {
        const value = parsePathArg(arg, argv[++i]);
        if (value.isErr()) return Err(value.error);
        configPath = value.value;
        break;
      }
      case "--quiet":
      case "-q":
        quiet = true;
        break;
      case "--help":
      case "-h":
        help = true;
        break;
      default:
        return Err(unknownOption(arg));
    }
  }

  if (from !== undefined && to !== undefined && from > to) {
    return Err(
      LevelGenError.argumentInvalid(
        `--from (${from}) must not be greater than --to (${to})`,
        { from, to },
      ),
    );
  }

  return Ok({ from, to, configPath, quiet, help });
}

/**
 * `print-level <level> [--no-color] [--ascii] [--stats] [--trace] [--config PATH]`
 */
export function parsePrintLevelArgs(
  argv: readonly string[],
): Result<PrintLevelArgs, LevelGenError> {
  let level: number | undefined;
  let color = true;
  let ascii = false;
  let stats = false;
  let trace = false;
  let configPath: string | undefined;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    switch (arg) {
      case "--no-color":
        color = false;
        break;
      case "--ascii":
        ascii = true;
        break;
      case "--stats":
        stats = true;
        break;
      case "--trace":
        trace = true;
        break;
      case "--config": {
        const value = parsePathArg(arg, argv[++i]);
        if (value.isErr()) return Err(value.error);
        configPath = value.value;
        break;
      }
      case "--help":
      case "-h":
        help = true;
        break;
      default: {
        if (arg.startsWith("-") || level !== undefined) {
          return Err(unknownOption(arg));
        }
        const value = parseSeedArg("level", arg);
        if (value.isErr()) return Err(value.error);
        level = value.value;
      }
    }
  }

  if (level === undefined) {
    if (help) {
      return Ok({ level: 0, color, ascii, stats, trace, configPath, help });
    }
    return Err(LevelGenError.argumentInvalid("Missing level number"));
  }

  return Ok({ level, color, ascii, stats, trace, configPath, help });
}
