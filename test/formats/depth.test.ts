/**
 * Depth listing and site table format tests
 */

import { describe, expect, test } from "vitest";
import { ParseError } from "../../src/errors";
import {
  AGGREGATE_HEADER,
  formatAggregateBlock,
  formatProportionTable,
  parseAggregateTable,
  parseDepthLine,
  sampleFromDepthPath,
} from "../../src/formats/depth";

describe("parseDepthLine", () => {
  test("parses a tab-separated samtools depth line", () => {
    expect(parseDepthLine("NC_045512.2\t55\t1203", 1, "S1.depth.txt")).toEqual({
      reference: "NC_045512.2",
      position: 55,
      depth: 1203,
    });
  });

  test("accepts runs of spaces and trailing carriage returns", () => {
    expect(parseDepthLine("chrV  10   3\r", 4, "S1.depth.txt")).toEqual({
      reference: "chrV",
      position: 10,
      depth: 3,
    });
  });

  test("returns null for blank lines", () => {
    expect(parseDepthLine("   ", 2, "S1.depth.txt")).toBeNull();
  });

  test("rejects lines with too few fields, naming file and line", () => {
    let caught: unknown;
    try {
      parseDepthLine("NC_045512.2\t55", 7, "/out/depth/S1.depth.txt");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ParseError);
    if (!(caught instanceof ParseError)) return;
    expect(caught.lineNumber).toBe(7);
    expect(caught.filePath).toBe("/out/depth/S1.depth.txt");
    expect(caught.message).toBe(
      "/out/depth/S1.depth.txt:7: expected 3 fields (reference, position, depth), found 2"
    );
  });

  test("rejects non-integer positions and depths", () => {
    expect(() => parseDepthLine("ref\t5.5\t1", 1, "a.depth.txt")).toThrow(ParseError);
    expect(() => parseDepthLine("ref\t5\t-1", 1, "a.depth.txt")).toThrow(
      "a.depth.txt:1: depth must be a non-negative integer, got '-1'"
    );
  });
});

describe("sampleFromDepthPath", () => {
  test("takes the file name up to the first dot", () => {
    expect(sampleFromDepthPath("/out/depth/S1.depth.txt")).toBe("S1");
    expect(sampleFromDepthPath("A1.sorted.depth.txt")).toBe("A1");
    expect(sampleFromDepthPath("/out/noext")).toBe("noext");
  });
});

describe("aggregate table", () => {
  test("formats a header and one row per record", () => {
    const block = formatAggregateBlock([
      { sample: "S1", position: 55, count: 30 },
      { sample: "S1", position: 26469, count: 70 },
    ]);

    expect(block).toBe(`${AGGREGATE_HEADER}\nS1\t55\t30\nS1\t26469\t70\n`);
  });

  test("formats a header alone for a sample without rows", () => {
    expect(formatAggregateBlock([])).toBe(`${AGGREGATE_HEADER}\n`);
  });

  test("parses rows and skips every header line", () => {
    const content = `${AGGREGATE_HEADER}\nS1\t55\t30\n${AGGREGATE_HEADER}\nS2\t29530\t8\n`;

    expect(parseAggregateTable(content, "aggregate.tsv")).toEqual([
      { sample: "S1", position: 55, count: 30 },
      { sample: "S2", position: 29530, count: 8 },
    ]);
  });

  test("reports the line of a malformed row", () => {
    const content = `${AGGREGATE_HEADER}\nS1\t55\t30\nS1\t26469\n`;

    expect(() => parseAggregateTable(content, "aggregate.tsv")).toThrow(
      "aggregate.tsv:3: expected 3 tab-separated fields (sample, position, count), found 2"
    );
  });
});

describe("formatProportionTable", () => {
  test("writes proportion before count", () => {
    const table = formatProportionTable([{ sample: "S1", position: 55, proportion: 0.3, count: 30 }]);

    expect(table).toBe("#sample_name\tposition\tproportion\tcount\nS1\t55\t0.3\t30\n");
  });
});
