/**
 * Command-line argument parsing tests
 */

import { describe, expect, it } from "vitest";
import {
  parsePrintLevelArgs,
  parseValidateLevelsArgs,
} from "../src/utils/cli-args";

describe("parseValidateLevelsArgs", () => {
  it("defaults to the configured range", () => {
    const res = parseValidateLevelsArgs([]);
    expect(res.success).toBe(true);
    expect(res.value).toEqual({
      from: undefined,
      to: undefined,
      configPath: undefined,
      quiet: false,
      help: false,
    });
  });

  it("reads every option", () => {
    const res = parseValidateLevelsArgs([
      "--from",
      "5",
      "--to",
      "40",
      "--config",
      "custom.json",
      "--quiet",
    ]);
    expect(res.value).toEqual({
      from: 5,
      to: 40,
      configPath: "custom.json",
      quiet: true,
      help: false,
    });
  });

  it("rejects malformed numbers", () => {
    const res = parseValidateLevelsArgs(["--from", "-3"]);
    expect(res.success).toBe(false);
    expect(res.error.code).toBe("ARGUMENT_INVALID");
    expect(res.error.message).toBe('Invalid value for --from: "-3"');
  });

  it("rejects seeds beyond uint32", () => {
    const res = parseValidateLevelsArgs(["--to", "4294967296"]);
    expect(res.error.message).toBe(
      "Invalid value for --to: Seed must fit in uint32",
    );
  });

  it("rejects a missing value", () => {
    expect(parseValidateLevelsArgs(["--to"]).error.message).toBe(
      "Missing value for --to",
    );
    expect(parseValidateLevelsArgs(["--config", "--quiet"]).error.message).toBe(
      "Missing value for --config",
    );
  });

  it("rejects an inverted range", () => {
    expect(parseValidateLevelsArgs(["--from", "9", "--to", "3"]).error.message).toBe(
      "--from (9) must not be greater than --to (3)",
    );
  });

  it("rejects unknown options", () => {
    expect(parseValidateLevelsArgs(["--fast"]).error.message).toBe(
      "Unknown option: --fast",
    );
    expect(parseValidateLevelsArgs(["12"]).error.message).toBe(
      "Unexpected argument: 12",
    );
  });
});

describe("parsePrintLevelArgs", () => {
  it("requires a level number", () => {
    const res = parsePrintLevelArgs(["--stats"]);
    expect(res.success).toBe(false);
    expect(res.error.message).toBe("Missing level number");
  });

  it("reads the level and flags", () => {
    const res = parsePrintLevelArgs(["7", "--no-color", "--ascii", "--trace"]);
    expect(res.value).toEqual({
      level: 7,
      color: false,
      ascii: true,
      stats: false,
      trace: true,
      configPath: undefined,
      help: false,
    });
  });

  it("accepts flags before the level", () => {
    const res = parsePrintLevelArgs(["--stats", "--config", "a.json", "0"]);
    expect(res.value.level).toBe(0);
    expect(res.value.stats).toBe(true);
    expect(res.value.configPath).toBe("a.json");
  });

  it("rejects a second positional argument", () => {
    expect(parsePrintLevelArgs(["1", "2"]).error.message).toBe(
      "Unexpected argument: 2",
    );
  });

  it("rejects a non-numeric level", () => {
    expect(parsePrintLevelArgs(["abc"]).error.message).toBe(
      'Invalid value for level: "abc"',
    );
  });

  it("allows --help without a level", () => {
    expect(parsePrintLevelArgs(["--help"]).value.help).toBe(true);
  });
});
