/**
 * Depth aggregation at sites of interest
 *
 * Reads the per-sample depth listings produced by the depth stage, keeps
 * only the positions in the site set and writes one aggregate table in
 * file-then-line order.
 */

import { FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Chunk, Effect, Either, Option, Stream } from "effect";
import { FileError, ParseError, ValidationError } from "../errors";
import { formatAggregateBlock, parseDepthLine, sampleFromDepthPath } from "../formats/depth";
import { writeString } from "../io/file-writer";
import type { DepthRecord, SiteSet } from "../types";
import { SitePositionsSchema } from "../types";

/**
 * Depth listing that could not be aggregated
 */
export interface AggregateFailure {
  readonly sample: string;
  readonly filePath: string;
  readonly error: ParseError | FileError;
}

export interface AggregateResult {
  readonly outputPath: string;
  readonly records: ReadonlyArray<DepthRecord>;
  /** Samples with at least one parsed listing and no row at any site, across all listings */
  readonly emptySamples: ReadonlyArray<string>;
  readonly failures: ReadonlyArray<AggregateFailure>;
}

/**
 * Build the site set for a run
 *
 * @throws {ValidationError} When positions are empty, negative or non-integer
 */
export function createSiteSet(positions: ReadonlyArray<number>): SiteSet {
  const validated = SitePositionsSchema(positions);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid sites of interest: ${validated.summary}`);
  }
  return new Set(validated);
}

/**
 * Stream one depth listing and keep the rows at sites of interest
 */
export const readDepthFile = (
  filePath: string,
  sites: SiteSet
): Effect.Effect<DepthRecord[], ParseError | FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const sample = sampleFromDepthPath(filePath);

    const records = yield* fs.stream(filePath).pipe(
      Stream.mapError((error) => FileError.fromSystemError("read", filePath, error)),
      Stream.decodeText(),
      Stream.splitLines,
      Stream.zipWithIndex,
      Stream.mapEffect(([line, index]) =>
        Effect.try({
          try: () => parseDepthLine(line, index + 1, filePath),
          catch: (error) =>
            error instanceof ParseError
              ? error
              : new ParseError(String(error), "depth", filePath, index + 1, line),
        })
      ),
      Stream.filterMap((parsed) =>
        parsed !== null && sites.has(parsed.position)
          ? Option.some<DepthRecord>({ sample, position: parsed.position, count: parsed.depth })
          : Option.none()
      ),
      Stream.runCollect
    );

    return Chunk.toArray(records);
  });

/**
 * Aggregate depth listings into one table at `outputPath`
 *
 * Files are read concurrently but written in the order given. A listing
 * that fails to parse is reported in `failures` and left out of the table;
 * the remaining listings are still aggregated.
 */
export const aggregateDepths = (
  files: ReadonlyArray<string>,
  sites: SiteSet,
  outputPath: string,
  options: { readonly concurrency?: number } = {}
): Effect.Effect<AggregateResult, FileError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const parsed = yield* Effect.forEach(
      files,
      (filePath) => Effect.either(readDepthFile(filePath, sites)),
      { concurrency: options.concurrency ?? 4 }
    );

    const blocks: string[] = [];
    const records: DepthRecord[] = [];
    const failures: AggregateFailure[] = [];
    const parsedSamples = new Set<string>();
    const coveredSamples = new Set<string>();

    parsed.forEach((result, index) => {
      const filePath = files[index] ?? "";
      const sample = sampleFromDepthPath(filePath);
      if (Either.isLeft(result)) {
        failures.push({ sample, filePath, error: result.left });
        return;
      }
      blocks.push(formatAggregateBlock(result.right));
      records.push(...result.right);
      parsedSamples.add(sample);
      if (result.right.length > 0) coveredSamples.add(sample);
    });
    // Listings sharing a sample count together
    const emptySamples = [...parsedSamples].filter((sample) => !coveredSamples.has(sample));

    for (const failure of failures) {
      yield* Effect.logError(`Skipping depth listing: ${failure.error.message}`).pipe(
        Effect.annotateLogs("sample", failure.sample)
      );
    }
    for (const sample of emptySamples) {
      yield* Effect.logWarning("No depth at any site of interest").pipe(
        Effect.annotateLogs("sample", sample)
      );
    }

    yield* writeString(outputPath, blocks.join(""));
    yield* Effect.logInfo(
      `Aggregated ${records.length} rows from ${files.length - failures.length}/${files.length} depth listings into ${outputPath}`
    );

    return { outputPath, records, emptySamples, failures };
  });
