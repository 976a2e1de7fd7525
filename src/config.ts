/**
 * Run configuration
 *
 * Settings are read once from environment-style variables through Effect's
 * `Config`, validated with the arktype schema in `types.ts` and frozen. The
 * resulting object is passed explicitly to every stage.
 *
 * | Variable          | Default                              |
 * | ----------------- | ------------------------------------ |
 * | `INPUT_DIR`       | required                             |
 * | `OUTPUT_DIR`      | required                             |
 * | `LEADER_TOOL`     | required                             |
 * | `DEPTH_TOOL`      | `samtools`                           |
 * | `REFERENCE`       | `NC_045512.2`                        |
 * | `MIN_QUALITY`     | `20`                                 |
 * | `THREADS_PER_JOB` | `4`                                  |
 * | `CPUS`            | available parallelism                |
 * | `EXECUTE`         | `false` (dry run)                    |
 * | `SITES`           | `data/sites-of-interest.json`        |
 * | `LOG_LEVEL`       | `Info`                               |
 */

import { availableParallelism } from "node:os";
import { type } from "arktype";
import { Config, ConfigError, Effect, LogLevel } from "effect";
import defaultSites from "../data/sites-of-interest.json";
import { ConfigurationError } from "./errors";
import { type PipelineConfig, PipelineConfigSchema } from "./types";

export const DEFAULT_SITES: ReadonlyArray<number> = defaultSites;

const PipelineSettings = Config.all({
  inputDir: Config.string("INPUT_DIR"),
  outputDir: Config.string("OUTPUT_DIR"),
  leaderTool: Config.string("LEADER_TOOL"),
  depthTool: Config.string("DEPTH_TOOL").pipe(Config.withDefault("samtools")),
  reference: Config.string("REFERENCE").pipe(Config.withDefault("NC_045512.2")),
  minQuality: Config.integer("MIN_QUALITY").pipe(Config.withDefault(20)),
  threadsPerJob: Config.integer("THREADS_PER_JOB").pipe(Config.withDefault(4)),
  totalCpus: Config.integer("CPUS").pipe(Config.withDefault(availableParallelism())),
  execute: Config.boolean("EXECUTE").pipe(Config.withDefault(false)),
  sites: Config.array(Config.integer(), "SITES").pipe(Config.withDefault(DEFAULT_SITES)),
});

export const LogLevelSetting = Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info));

function fromConfigError(error: ConfigError.ConfigError): ConfigurationError {
  const setting =
    ConfigError.isMissingData(error) || ConfigError.isInvalidData(error)
      ? error.path.join(".")
      : undefined;
  return new ConfigurationError(`Invalid configuration: ${String(error)}`, setting);
}

/**
 * Validate raw settings and freeze them into a `PipelineConfig`
 */
export const validateConfig = (input: unknown): Effect.Effect<PipelineConfig, ConfigurationError> => {
  const validated = PipelineConfigSchema(input);
  if (validated instanceof type.errors) {
    const setting = Object.keys(validated.byPath)[0];
    return Effect.fail(new ConfigurationError(`Invalid configuration: ${validated.summary}`, setting));
  }
  return Effect.succeed(
    Object.freeze({ ...validated, sites: Object.freeze([...new Set(validated.sites)]) })
  );
};

/**
 * Read, validate and freeze the run configuration from the active ConfigProvider
 *
 * @example
 * ```typescript
 * const config = yield* loadConfig;
 * yield* runPipeline(config);
 * ```
 */
export const loadConfig: Effect.Effect<PipelineConfig, ConfigurationError> = Effect.gen(
  function* () {
    const settings = yield* Effect.mapError(PipelineSettings, fromConfigError);
    return yield* validateConfig(settings);
  }
);
