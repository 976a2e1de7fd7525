/**
 * Per-sample site proportions
 *
 * Groups the aggregate table by sample and divides each site's count by the
 * sample's total count across all sites of interest.
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect, Either } from "effect";
import { ParseError, ZeroDenominatorError, type FileError } from "../errors";
import { formatProportionTable, parseAggregateTable } from "../formats/depth";
import { readString, writeString } from "../io/file-writer";
import type { DepthRecord, ProportionRow } from "../types";

/**
 * sample → (position → count), in first-appearance order
 */
export type SampleCounts = Map<string, Map<number, number>>;

export interface ProportionResult {
  readonly outputPath: string;
  readonly rows: ReadonlyArray<ProportionRow>;
  readonly failures: ReadonlyArray<ZeroDenominatorError>;
}

/**
 * Group records by sample; a repeated sample/position pair keeps the last count
 */
export function groupBySample(records: Iterable<DepthRecord>): SampleCounts {
  const grouped: SampleCounts = new Map();
  for (const record of records) {
    let positions = grouped.get(record.sample);
    if (positions === undefined) {
      positions = new Map();
      grouped.set(record.sample, positions);
    }
    positions.set(record.position, record.count);
  }
  return grouped;
}

/**
 * Normalize one sample's counts so its proportions sum to 1
 */
export function normalizeSample(
  sample: string,
  counts: ReadonlyMap<number, number>
): Either.Either<ProportionRow[], ZeroDenominatorError> {
  let denominator = 0;
  for (const count of counts.values()) denominator += count;
  if (denominator === 0) return Either.left(new ZeroDenominatorError(sample));

  const rows: ProportionRow[] = [];
  for (const [position, count] of counts) {
    rows.push({ sample, position, proportion: count / denominator, count });
  }
  return Either.right(rows);
}

/**
 * Proportions for every sample; samples with a zero denominator are left
 * out of `rows` and returned in `failures`
 */
export function calculateProportions(grouped: SampleCounts): {
  rows: ProportionRow[];
  failures: ZeroDenominatorError[];
} {
  const rows: ProportionRow[] = [];
  const failures: ZeroDenominatorError[] = [];
  for (const [sample, counts] of grouped) {
    Either.match(normalizeSample(sample, counts), {
      onLeft: (error) => failures.push(error),
      onRight: (sampleRows) => rows.push(...sampleRows),
    });
  }
  return { rows, failures };
}

/**
 * Read the aggregate table at `aggregatePath` and write proportions to `outputPath`
 */
export const calculateProportionFile = (
  aggregatePath: string,
  outputPath: string
): Effect.Effect<ProportionResult, FileError | ParseError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const content = yield* readString(aggregatePath);
    const records = yield* Effect.try({
      try: () => parseAggregateTable(content, aggregatePath),
      catch: (error) =>
        error instanceof ParseError ? error : new ParseError(String(error), "aggregate", aggregatePath),
    });

    const { rows, failures } = calculateProportions(groupBySample(records));
    for (const failure of failures) {
      yield* Effect.logError(failure.message).pipe(Effect.annotateLogs("sample", failure.sample));
    }

    yield* writeString(outputPath, formatProportionTable(rows));
    yield* Effect.logInfo(`Wrote ${rows.length} proportion rows to ${outputPath}`);

    return { outputPath, rows, failures };
  });
