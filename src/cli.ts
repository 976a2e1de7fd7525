#!/usr/bin/env node

/**
 * Command-line entry point
 *
 * Usage: INPUT_DIR=bams OUTPUT_DIR=out LEADER_TOOL=/opt/leader-filter EXECUTE=true npm start
 *
 * Leave EXECUTE unset to log the commands each stage would run without
 * running them. A dry run still creates OUTPUT_DIR and rewrites
 * aggregate.tsv, proportions.tsv and run-summary.tsv from the depth
 * listings already there.
 */

import { NodeRuntime } from "@effect/platform-node";
import { Effect, Layer } from "effect";
import { LogLevelSetting, loadConfig } from "./config";
import { loggerLayer, PlatformLive } from "./io/runtime";
import { hasFailures } from "./pipeline/report";
import { runPipeline } from "./pipeline/run";
import { ToolRunner } from "./pipeline/tool-runner";

const MainLive = ToolRunner.Live.pipe(Layer.provideMerge(PlatformLive));

const main = Effect.gen(function* () {
  const config = yield* loadConfig;
  yield* Effect.logInfo(
    `${config.execute ? "Running" : "Dry run of"} pipeline: ${config.inputDir} → ${config.outputDir}`
  );
  const report = yield* runPipeline(config);
  if (hasFailures(report.summary)) {
    yield* Effect.logWarning(`Some samples failed; see ${report.summaryPath}`);
    yield* Effect.sync(() => {
      process.exitCode = 1;
    });
  }
});

const program = Effect.gen(function* () {
  const level = yield* LogLevelSetting;
  yield* main.pipe(Effect.provide(loggerLayer(level)));
});

program.pipe(Effect.provide(MainLive), NodeRuntime.runMain);
