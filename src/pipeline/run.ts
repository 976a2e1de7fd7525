/**
 * End-to-end pipeline: leader filtering → depth listing → aggregation → proportions
 *
 * Stages run one after another. Each dispatch returns only after all of its
 * jobs have finished, so every rescan sees the complete output of the
 * stage before it.
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect, Either } from "effect";
import { describeError, type FileError, type ParseError, ZeroDenominatorError } from "../errors";
import { discoverFiles } from "../io/file-discovery";
import { writeString } from "../io/file-writer";
import { type AggregateResult, aggregateDepths, createSiteSet } from "../operations/aggregate";
import { calculateProportionFile, type ProportionResult } from "../operations/proportions";
import type { PipelineConfig } from "../types";
import { countOutcomes, dispatchStage, type StageReport } from "./dispatcher";
import {
  aggregateSummaryRows,
  formatSummaryTable,
  proportionSummaryRows,
  type SummaryRow,
  stageSummaryRows,
} from "./report";
import { BAM_EXTENSION, DEPTH_EXTENSION, depthStage, leaderStage, runLayout } from "./stages";
import type { ToolRunner } from "./tool-runner";

export const AGGREGATE_STAGE = "aggregate";
export const PROPORTION_STAGE = "proportions";

export interface RunReport {
  readonly stages: ReadonlyArray<StageReport>;
  readonly aggregate: AggregateResult;
  /** Absent when the aggregate table itself could not be parsed */
  readonly proportions?: ProportionResult;
  readonly summary: ReadonlyArray<SummaryRow>;
  readonly summaryPath: string;
}

const proportionRows = (
  aggregate: AggregateResult,
  result: Either.Either<ProportionResult, ParseError | FileError>,
  outputPath: string
): SummaryRow[] => {
  const emptySamples = aggregate.emptySamples.map((sample) => new ZeroDenominatorError(sample));
  if (Either.isLeft(result)) {
    return [
      { stage: PROPORTION_STAGE, sample: "*", status: "failed", detail: describeError(result.left) },
      ...proportionSummaryRows(PROPORTION_STAGE, [], outputPath, emptySamples),
    ];
  }
  const samples = new Set(result.right.rows.map((row) => row.sample));
  return proportionSummaryRows(PROPORTION_STAGE, samples, outputPath, [
    ...result.right.failures,
    ...emptySamples,
  ]);
};

/**
 * Run every stage for one configuration and write the run summary
 *
 * Job, parse and zero-denominator failures are reported in the summary and
 * never abort the run. The effect fails only on I/O errors that leave no
 * output to report into.
 */
export const runPipeline = (
  config: PipelineConfig
): Effect.Effect<RunReport, FileError, FileSystem.FileSystem | Path.Path | ToolRunner> =>
  Effect.gen(function* () {
    const layout = runLayout(config.outputDir);
    const sites = createSiteSet(config.sites);
    const dispatchOptions = {
      workRoot: layout.workRoot,
      totalCpus: config.totalCpus,
      execute: config.execute,
    };

    const inputs = yield* discoverFiles(config.inputDir, BAM_EXTENSION);
    if (inputs.length === 0) {
      yield* Effect.logWarning(`No ${BAM_EXTENSION} files found under ${config.inputDir}`);
    }
    const leader = yield* dispatchStage(leaderStage(config), inputs, dispatchOptions);

    const filtered = yield* discoverFiles(layout.leaderDir, BAM_EXTENSION);
    const depth = yield* dispatchStage(depthStage(config), filtered, dispatchOptions);

    const listings = yield* discoverFiles(layout.depthDir, DEPTH_EXTENSION);
    const aggregate = yield* aggregateDepths(listings, sites, layout.aggregatePath);

    const proportions = yield* Effect.either(
      calculateProportionFile(layout.aggregatePath, layout.proportionPath)
    );
    if (Either.isLeft(proportions)) {
      yield* Effect.logError(`Proportions not written: ${proportions.left.message}`);
    }

    const summary: SummaryRow[] = [
      ...stageSummaryRows(leader),
      ...stageSummaryRows(depth),
      ...aggregateSummaryRows(AGGREGATE_STAGE, aggregate),
      ...proportionRows(aggregate, proportions, layout.proportionPath),
    ];
    yield* writeString(layout.summaryPath, formatSummaryTable(summary));

    for (const report of [leader, depth]) {
      const counts = countOutcomes(report);
      yield* Effect.logInfo(
        `${report.stage}: ${counts.completed} completed, ${counts.skipped} skipped, ${counts.planned} planned, ${counts.failed} failed`
      );
    }
    const failed = summary.filter((row) => row.status === "failed").length;
    yield* Effect.logInfo(`Run summary written to ${layout.summaryPath} (${failed} failures)`);

    return {
      stages: [leader, depth],
      aggregate,
      proportions: Either.getOrUndefined(proportions),
      summary,
      summaryPath: layout.summaryPath,
    };
  });
