/**
 * Core types and runtime schemas for the sgRNA site pipeline
 *
 * ArkType schemas validate values that arrive from outside the type system
 * (environment settings, site lists); plain interfaces describe the records
 * that flow between stages.
 */

import { type } from "arktype";

// =============================================================================
// GENOMIC COORDINATES
// =============================================================================

/**
 * A 1-based genomic coordinate or read depth
 */
export const NonNegativeIntegerSchema = type("number.integer>=0");

/**
 * Positions of interest, usually subgenomic RNA splice boundaries
 */
export const SitePositionsSchema = NonNegativeIntegerSchema.array().atLeastLength(1);

/**
 * Immutable set of coordinates fixed for the lifetime of a run
 */
export type SiteSet = ReadonlySet<number>;

// =============================================================================
// RECORDS
// =============================================================================

/**
 * One line of a depth listing as emitted by `samtools depth`
 */
export interface DepthLine {
  readonly reference: string;
  /** 1-based position on the reference */
  readonly position: number;
  readonly depth: number;
}

/**
 * Depth at one site of interest for one sample
 */
export interface DepthRecord {
  readonly sample: string;
  readonly position: number;
  readonly count: number;
}

/**
 * Normalized site usage for one sample
 */
export interface ProportionRow {
  readonly sample: string;
  readonly position: number;
  /** count / sum of counts for the sample, in [0, 1] */
  readonly proportion: number;
  readonly count: number;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export const PipelineConfigSchema = type({
  inputDir: "string>0",
  outputDir: "string>0",
  leaderTool: "string>0",
  depthTool: "string>0",
  reference: "string>0",
  minQuality: "number.integer>=0",
  threadsPerJob: "number.integer>=1",
  totalCpus: "number.integer>=1",
  execute: "boolean",
  sites: SitePositionsSchema,
});

/**
 * Immutable run configuration, constructed once and passed to each stage
 */
export type PipelineConfig = Readonly<Omit<typeof PipelineConfigSchema.infer, "sites">> & {
  readonly sites: ReadonlyArray<number>;
};
