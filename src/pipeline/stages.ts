/**
 * External tool contracts for the two processing stages
 *
 * Stage 1 filters each alignment down to reads carrying the leader
 * sequence; stage 2 lists per-position depth of the filtered alignment.
 */

import { join, resolve } from "node:path";
import type { PipelineConfig } from "../types";
import type { ToolInvocation } from "./tool-runner";

/**
 * One input file of a stage and where its output belongs
 */
export interface PlannedJob {
  readonly sample: string;
  readonly inputPath: string;
  readonly outputPath: string;
}

export interface StageDefinition {
  readonly name: string;
  readonly inputExtension: string;
  readonly outputExtension: string;
  /** Directory the stage owns and fills with `<sample><outputExtension>` */
  readonly outputDir: string;
  /** Threads the external tool is told to use for one job */
  readonly threadsPerJob: number;
  readonly invocation: (job: PlannedJob, workDir: string) => ToolInvocation;
  /** File the tool leaves in `workDir` on success */
  readonly artifactPath: (job: PlannedJob, workDir: string) => string;
}

export const LEADER_STAGE = "leader";
export const DEPTH_STAGE = "depth";
export const BAM_EXTENSION = ".bam";
export const DEPTH_EXTENSION = ".depth.txt";

/**
 * Directories of one run, all absolute
 */
export interface RunLayout {
  readonly leaderDir: string;
  readonly depthDir: string;
  /** Parent of the scoped per-job working directories */
  readonly workRoot: string;
  readonly aggregatePath: string;
  readonly proportionPath: string;
  readonly summaryPath: string;
}

export function runLayout(outputDir: string): RunLayout {
  const root = resolve(outputDir);
  return {
    leaderDir: join(root, LEADER_STAGE),
    depthDir: join(root, DEPTH_STAGE),
    workRoot: join(root, ".work"),
    aggregatePath: join(root, "aggregate.tsv"),
    proportionPath: join(root, "proportions.tsv"),
    summaryPath: join(root, "run-summary.tsv"),
  };
}

/**
 * Leader-sequence filtering
 *
 * `<leaderTool> --input <bam> --reference <name> --min-quality <q> --threads <t> --output <sample>.bam`,
 * run inside the job's working directory, where the tool writes `<sample>.bam`.
 */
export function leaderStage(config: PipelineConfig): StageDefinition {
  return {
    name: LEADER_STAGE,
    inputExtension: BAM_EXTENSION,
    outputExtension: BAM_EXTENSION,
    outputDir: runLayout(config.outputDir).leaderDir,
    threadsPerJob: config.threadsPerJob,
    invocation: (job, workDir) => ({
      program: config.leaderTool,
      args: [
        "--input",
        resolve(job.inputPath),
        "--reference",
        config.reference,
        "--min-quality",
        String(config.minQuality),
        "--threads",
        String(config.threadsPerJob),
        "--output",
        `${job.sample}${BAM_EXTENSION}`,
      ],
      cwd: workDir,
    }),
    artifactPath: (job, workDir) => join(workDir, `${job.sample}${BAM_EXTENSION}`),
  };
}

/**
 * Depth listing: `<depthTool> depth <bam> > <sample>.depth.txt`
 */
export function depthStage(config: PipelineConfig): StageDefinition {
  const artifactPath = (job: PlannedJob, workDir: string): string =>
    join(workDir, `${job.sample}${DEPTH_EXTENSION}`);

  return {
    name: DEPTH_STAGE,
    inputExtension: BAM_EXTENSION,
    outputExtension: DEPTH_EXTENSION,
    outputDir: runLayout(config.outputDir).depthDir,
    threadsPerJob: 1,
    invocation: (job, workDir) => ({
      program: config.depthTool,
      args: ["depth", resolve(job.inputPath)],
      cwd: workDir,
      stdoutPath: artifactPath(job, workDir),
    }),
    artifactPath,
  };
}
