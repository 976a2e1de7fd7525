/**
 * Bounded, idempotent dispatch of per-sample external tool jobs
 *
 * A job is skipped when its expected output already exists; presence is
 * the only completion signal. Remaining jobs run on a worker pool sized by
 * how many threads each tool invocation is told to use, each inside its own
 * scoped working directory. Every job yields exactly one outcome, and the
 * dispatch completes only once all of them have finished.
 *
 * @module pipeline/dispatcher
 */

import { join } from "node:path";
import { FileSystem } from "@effect/platform";
import { Effect, Either } from "effect";
import {
  describeError,
  FileError,
  JobError,
  type JobFailureReason,
  SampleCollisionError,
} from "../errors";
import { sampleStem } from "../io/file-discovery";
import type { PlannedJob, StageDefinition } from "./stages";
import { renderCommandLine, ToolRunner } from "./tool-runner";

// =============================================================================
// TYPES
// =============================================================================

export type JobOutcome =
  | { readonly status: "skipped"; readonly job: PlannedJob }
  | { readonly status: "planned"; readonly job: PlannedJob; readonly commandLine: string }
  | { readonly status: "completed"; readonly job: PlannedJob; readonly commandLine: string }
  | { readonly status: "failed"; readonly job: PlannedJob; readonly error: JobError };

export type JobStatus = JobOutcome["status"];

export interface StageReport {
  readonly stage: string;
  readonly poolSize: number;
  /** One outcome per input, in input order */
  readonly outcomes: ReadonlyArray<JobOutcome>;
}

export interface DispatchOptions {
  /** Parent directory for per-job scoped working directories */
  readonly workRoot: string;
  /** Threads available to the whole stage */
  readonly totalCpus: number;
  /** When false, commands are logged and never run */
  readonly execute: boolean;
}

// =============================================================================
// PLANNING
// =============================================================================

/**
 * Number of jobs that may run at once: `floor(totalCpus / threadsPerJob)`, at least 1
 */
export function workerPoolSize(totalCpus: number, threadsPerJob: number): number {
  return Math.max(1, Math.floor(totalCpus / Math.max(1, threadsPerJob)));
}

export interface PlanEntry {
  readonly job: PlannedJob;
  /** Set when another input of the stage derives the same sample name */
  readonly collision?: SampleCollisionError;
}

/**
 * Map inputs to jobs, flagging every input whose sample name is shared
 */
export function planJobs(
  stage: StageDefinition,
  inputs: ReadonlyArray<string>
): ReadonlyArray<PlanEntry> {
  const bySample = new Map<string, string[]>();
  for (const inputPath of inputs) {
    const sample = sampleStem(inputPath, stage.inputExtension);
    bySample.set(sample, [...(bySample.get(sample) ?? []), inputPath]);
  }

  return inputs.map((inputPath) => {
    const sample = sampleStem(inputPath, stage.inputExtension);
    const job: PlannedJob = {
      sample,
      inputPath,
      outputPath: join(stage.outputDir, `${sample}${stage.outputExtension}`),
    };
    const sharing = bySample.get(sample) ?? [];
    return sharing.length > 1
      ? { job, collision: new SampleCollisionError(stage.name, sample, inputPath, sharing) }
      : { job };
  });
}

// =============================================================================
// EXECUTION
// =============================================================================

const toJobError =
  (stage: StageDefinition, job: PlannedJob, reason: JobFailureReason, commandLine?: string) =>
  (error: unknown): JobError =>
    new JobError(
      describeError(error),
      stage.name,
      job.sample,
      job.inputPath,
      reason,
      commandLine,
      error
    );

/**
 * Run one job in a fresh working directory and move its artifact into place
 *
 * The working directory is removed when the job ends, whether it succeeded,
 * failed or was interrupted.
 *
 * @returns The rendered command line
 */
export const executeJob = (
  stage: StageDefinition,
  job: PlannedJob,
  workRoot: string
): Effect.Effect<string, JobError, FileSystem.FileSystem | ToolRunner> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const runner = yield* ToolRunner;

    const workDir = yield* fs
      .makeTempDirectoryScoped({ directory: workRoot, prefix: `${stage.name}-${job.sample}-` })
      .pipe(Effect.mapError(toJobError(stage, job, "filesystem")));

    const invocation = stage.invocation(job, workDir);
    const commandLine = renderCommandLine(invocation);
    yield* Effect.logDebug(`Running ${commandLine}`);

    yield* runner.run(invocation).pipe(Effect.mapError(toJobError(stage, job, "tool", commandLine)));

    const artifact = stage.artifactPath(job, workDir);
    const produced = yield* fs
      .exists(artifact)
      .pipe(Effect.mapError(toJobError(stage, job, "filesystem", commandLine)));
    if (!produced) {
      return yield* Effect.fail(
        new JobError(
          `tool reported success but left no output at ${artifact}`,
          stage.name,
          job.sample,
          job.inputPath,
          "missing-output",
          commandLine
        )
      );
    }

    yield* fs
      .rename(artifact, job.outputPath)
      .pipe(Effect.mapError(toJobError(stage, job, "filesystem", commandLine)));
    return commandLine;
  }).pipe(Effect.scoped);

const logOutcome = (outcome: JobOutcome): Effect.Effect<void> => {
  switch (outcome.status) {
    case "skipped":
      return Effect.logInfo(`Output exists, skipping: ${outcome.job.outputPath}`);
    case "planned":
      return Effect.logInfo(`Dry run: ${outcome.commandLine}`);
    case "completed":
      return Effect.logInfo(`Wrote ${outcome.job.outputPath}`);
    case "failed":
      return Effect.logError(outcome.error.message);
  }
};

/**
 * Dispatch one stage over its input files
 *
 * Fails only when the stage's directories cannot be created; job failures
 * are returned as `failed` outcomes.
 */
export const dispatchStage = (
  stage: StageDefinition,
  inputs: ReadonlyArray<string>,
  options: DispatchOptions
): Effect.Effect<StageReport, FileError, FileSystem.FileSystem | ToolRunner> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const directories = options.execute ? [stage.outputDir, options.workRoot] : [];
    for (const dir of directories) {
      yield* fs
        .makeDirectory(dir, { recursive: true })
        .pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", dir, error)));
    }

    const poolSize = workerPoolSize(options.totalCpus, stage.threadsPerJob);
    const outcomes: Array<JobOutcome | undefined> = [];
    const pending: Array<{ readonly index: number; readonly job: PlannedJob }> = [];

    const planned = planJobs(stage, inputs);
    for (const [index, { job, collision }] of planned.entries()) {
      if (collision !== undefined) {
        outcomes[index] = { status: "failed", job, error: collision };
        continue;
      }
      const exists = yield* fs
        .exists(job.outputPath)
        .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", job.outputPath, error)));
      if (exists) {
        outcomes[index] = { status: "skipped", job };
      } else if (!options.execute) {
        const workDir = join(options.workRoot, `${stage.name}-${job.sample}-XXXXXX`);
        outcomes[index] = {
          status: "planned",
          job,
          commandLine: renderCommandLine(stage.invocation(job, workDir)),
        };
      } else {
        pending.push({ index, job });
      }
    }

    yield* Effect.logInfo(
      `Submitting ${pending.length} of ${inputs.length} jobs on ${poolSize} workers`
    );

    const results = yield* Effect.forEach(
      pending,
      ({ job }) =>
        executeJob(stage, job, options.workRoot).pipe(
          Effect.either,
          Effect.annotateLogs("sample", job.sample)
        ),
      { concurrency: poolSize }
    );
    results.forEach((result, i) => {
      const entry = pending[i];
      if (entry === undefined) return;
      outcomes[entry.index] = Either.isRight(result)
        ? { status: "completed", job: entry.job, commandLine: result.right }
        : { status: "failed", job: entry.job, error: result.left };
    });

    const report: JobOutcome[] = outcomes.filter(
      (outcome): outcome is JobOutcome => outcome !== undefined
    );
    for (const outcome of report) {
      yield* logOutcome(outcome).pipe(Effect.annotateLogs("sample", outcome.job.sample));
    }

    return { stage: stage.name, poolSize, outcomes: report };
  }).pipe(Effect.annotateLogs("stage", stage.name));

/**
 * Count outcomes of a stage by status
 */
export function countOutcomes(report: StageReport): Record<JobStatus, number> {
  const counts: Record<JobStatus, number> = { skipped: 0, planned: 0, completed: 0, failed: 0 };
  for (const outcome of report.outcomes) counts[outcome.status] += 1;
  return counts;
}
