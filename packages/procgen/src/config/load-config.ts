/**
 * Configuration file loading.
 *
 * A missing file means "use the defaults"; anything present must parse as
 * JSON and pass schema validation.
 */

import { existsSync, readFileSync } from "node:fs";
import {
  buildLevelGenConfig,
  type LevelGenConfig,
  LevelGenError,
  Result,
} from "@levelforge/contracts";

export const DEFAULT_CONFIG_PATH = "levelgen.config.json";

function describeThrown(thrown: unknown): string {
  return thrown instanceof Error ? thrown.message : String(thrown);
}

export function loadLevelGenConfig(
  path: string = DEFAULT_CONFIG_PATH,
): Result<LevelGenConfig, LevelGenError> {
  if (!existsSync(path)) {
    return buildLevelGenConfig({});
  }

  return Result.fromThrowable(
    () => readFileSync(path, "utf8"),
    (thrown) =>
      LevelGenError.configReadFailed(
        `Failed to read config file ${path}: ${describeThrown(thrown)}`,
        { path },
      ),
  )
    .flatMap((raw) =>
      Result.fromThrowable(
        (): unknown => JSON.parse(raw),
        (thrown) =>
          LevelGenError.configReadFailed(
            `Config file ${path} is not valid JSON: ${describeThrown(thrown)}`,
            { path },
          ),
      ),
    )
    .flatMap((parsed) =>
      buildLevelGenConfig(parsed).mapErr(
        (error) =>
          new LevelGenError(error.code, `${path}: ${error.message}`, {
            ...error.details,
            path,
          }),
      ),
    );
}
