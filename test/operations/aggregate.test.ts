/**
 * Depth aggregation tests
 */

import { NodeContext } from "@effect/platform-node";
import { Effect } from "effect";
import { readFileSync, rmSync } from "fs";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ParseError, ValidationError } from "../../src/errors";
import { aggregateDepths, createSiteSet, readDepthFile } from "../../src/operations/aggregate";
import { depthListing, makeTempDir, writeFixture } from "../utils/fixtures";

const HEADER = "#sample_name\tposition\tcount\n";

describe("createSiteSet", () => {
  test("builds a set from integer positions", () => {
    const sites = createSiteSet([55, 29530, 55]);

    expect(sites.size).toBe(2);
    expect(sites.has(55)).toBe(true);
    expect(sites.has(29530)).toBe(true);
  });

  test("rejects empty, negative and fractional positions", () => {
    expect(() => createSiteSet([])).toThrow(ValidationError);
    expect(() => createSiteSet([-1])).toThrow(ValidationError);
    expect(() => createSiteSet([55.5])).toThrow(ValidationError);
  });
});

describe("aggregateDepths", () => {
  let root: string;
  const run = <A, E>(effect: Effect.Effect<A, E, NodeContext.NodeContext>) =>
    Effect.runPromise(effect.pipe(Effect.provide(NodeContext.layer)));

  beforeEach(() => {
    root = makeTempDir("aggregate");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  test("keeps only positions in the site set", async () => {
    const file = writeFixture(
      join(root, "S1.depth.txt"),
      depthListing([
        [10, 4],
        [55, 30],
        [100, 9],
      ])
    );

    const records = await run(readDepthFile(file, createSiteSet([55, 29530])));

    expect(records).toEqual([{ sample: "S1", position: 55, count: 30 }]);
  });

  test("writes one header per depth file in file-then-line order", async () => {
    const a = writeFixture(
      join(root, "A.depth.txt"),
      depthListing([
        [10, 5],
        [55, 30],
        [100, 7],
      ])
    );
    const b = writeFixture(
      join(root, "B.depth.txt"),
      depthListing([
        [55, 12],
        [29530, 8],
      ])
    );
    const output = join(root, "out", "aggregate.tsv");

    const result = await run(aggregateDepths([a, b], createSiteSet([55, 29530]), output));

    expect(readFileSync(output, "utf8")).toBe(
      `${HEADER}A\t55\t30\n${HEADER}B\t55\t12\nB\t29530\t8\n`
    );
    expect(result.records).toHaveLength(3);
    expect(result.failures).toEqual([]);
    expect(result.emptySamples).toEqual([]);
  });

  test("leaves a malformed listing out and reports its file and line", async () => {
    const good = writeFixture(join(root, "A.depth.txt"), depthListing([[55, 30]]));
    const bad = writeFixture(
      join(root, "B.depth.txt"),
      `${depthListing([[55, 12]])}NC_045512.2\tfifty\t3\n`
    );
    const output = join(root, "aggregate.tsv");

    const result = await run(aggregateDepths([good, bad], createSiteSet([55]), output));

    expect(readFileSync(output, "utf8")).toBe(`${HEADER}A\t55\t30\n`);
    expect(result.failures).toHaveLength(1);
    const [failure] = result.failures;
    expect(failure?.sample).toBe("B");
    expect(failure?.error).toBeInstanceOf(ParseError);
    expect(failure?.error.message).toBe(
      `${bad}:2: position must be a non-negative integer, got 'fifty'`
    );
  });

  test("reports listings without any site of interest as empty samples", async () => {
    const file = writeFixture(join(root, "S9.depth.txt"), depthListing([[100, 4]]));
    const output = join(root, "aggregate.tsv");

    const result = await run(aggregateDepths([file], createSiteSet([55]), output));

    expect(result.emptySamples).toEqual(["S9"]);
    expect(readFileSync(output, "utf8")).toBe(HEADER);
  });

  test("judges emptiness per sample across listings that share it", async () => {
    const covered = writeFixture(join(root, "A.depth.txt"), depthListing([[55, 7]]));
    const uncovered = writeFixture(join(root, "A.x.depth.txt"), depthListing([[100, 4]]));
    const empty = writeFixture(join(root, "B.depth.txt"), depthListing([[100, 1]]));
    const emptyAgain = writeFixture(join(root, "B.y.depth.txt"), depthListing([[101, 1]]));
    const output = join(root, "aggregate.tsv");

    const result = await run(
      aggregateDepths([covered, uncovered, empty, emptyAgain], createSiteSet([55]), output)
    );

    expect(result.emptySamples).toEqual(["B"]);
    expect(result.records).toEqual([{ sample: "A", position: 55, count: 7 }]);
  });

  test("produces the same table regardless of read concurrency", async () => {
    const files = ["S1", "S2", "S3", "S4"].map((sample, i) =>
      writeFixture(
        join(root, `${sample}.depth.txt`),
        depthListing([
          [55, 10 + i],
          [26469, 20 + i],
        ])
      )
    );
    const sites = createSiteSet([55, 26469]);

    await run(aggregateDepths(files, sites, join(root, "serial.tsv"), { concurrency: 1 }));
    await run(aggregateDepths(files, sites, join(root, "parallel.tsv"), { concurrency: 4 }));

    expect(readFileSync(join(root, "parallel.tsv"), "utf8")).toBe(
      readFileSync(join(root, "serial.tsv"), "utf8")
    );
  });
});
