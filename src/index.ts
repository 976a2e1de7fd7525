/**
 * sgrna-sites - subgenomic RNA splice-site usage across many samples
 *
 * Orchestrates a leader-filtering tool and `samtools depth` over a directory
 * of alignments, then turns depth at fixed sites of interest into
 * per-sample proportions.
 */

// Configuration
export { DEFAULT_SITES, LogLevelSetting, loadConfig, validateConfig } from "./config";
// Error types
export {
  ConfigurationError,
  describeError,
  FileError,
  JobError,
  type JobFailureReason,
  ParseError,
  PipelineError,
  SampleCollisionError,
  ToolError,
  ValidationError,
  ZeroDenominatorError,
} from "./errors";
// Formats
export {
  AGGREGATE_HEADER,
  formatAggregateBlock,
  formatProportionTable,
  parseAggregateTable,
  parseDepthLine,
  PROPORTION_HEADER,
  sampleFromDepthPath,
} from "./formats/depth";
// File I/O
export { discoverFiles, sampleStem } from "./io/file-discovery";
export { readString, writeString } from "./io/file-writer";
export { loggerLayer, PlatformLive } from "./io/runtime";
// Aggregation and proportions
export {
  type AggregateFailure,
  type AggregateResult,
  aggregateDepths,
  createSiteSet,
  readDepthFile,
} from "./operations/aggregate";
export {
  calculateProportionFile,
  calculateProportions,
  groupBySample,
  normalizeSample,
  type ProportionResult,
  type SampleCounts,
} from "./operations/proportions";
// Job orchestration
export {
  countOutcomes,
  type DispatchOptions,
  dispatchStage,
  executeJob,
  type JobOutcome,
  type JobStatus,
  type PlanEntry,
  planJobs,
  type StageReport,
  workerPoolSize,
} from "./pipeline/dispatcher";
export {
  formatSummaryTable,
  hasFailures,
  SUMMARY_HEADER,
  type SummaryRow,
  type SummaryStatus,
} from "./pipeline/report";
export { type RunReport, runPipeline } from "./pipeline/run";
export {
  BAM_EXTENSION,
  DEPTH_EXTENSION,
  depthStage,
  leaderStage,
  type PlannedJob,
  type RunLayout,
  runLayout,
  type StageDefinition,
} from "./pipeline/stages";
export {
  renderCommandLine,
  type ToolInvocation,
  ToolRunner,
  type ToolRunnerShape,
} from "./pipeline/tool-runner";
// Core types
export type { DepthLine, DepthRecord, PipelineConfig, ProportionRow, SiteSet } from "./types";
export { PipelineConfigSchema, SitePositionsSchema } from "./types";
