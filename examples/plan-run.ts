/**
 * Plan a run from code instead of the environment
 *
 * Usage: npx tsx examples/plan-run.ts <input-dir> <output-dir>
 *
 * Prints the commands each stage would run; nothing is executed.
 */

import { NodeRuntime } from "@effect/platform-node";
import { Effect, Layer } from "effect";
import {
  countOutcomes,
  PlatformLive,
  runPipeline,
  ToolRunner,
  validateConfig,
} from "../src";

const [inputDir = "bams", outputDir = "out"] = process.argv.slice(2);

const program = Effect.gen(function* () {
  const config = yield* validateConfig({
    inputDir,
    outputDir,
    leaderTool: "leader-filter",
    depthTool: "samtools",
    reference: "NC_045512.2",
    minQuality: 20,
    threadsPerJob: 4,
    totalCpus: 16,
    execute: false,
    sites: [55, 26469, 29530],
  });

  const report = yield* runPipeline(config);
  for (const stage of report.stages) {
    for (const outcome of stage.outcomes) {
      if (outcome.status === "planned") console.log(outcome.commandLine);
    }
    console.error(`${stage.stage}:`, countOutcomes(stage));
  }
});

program.pipe(
  Effect.provide(ToolRunner.Live.pipe(Layer.provideMerge(PlatformLive))),
  NodeRuntime.runMain
);
