/**
 * Depth listing and site table formats
 *
 * Depth listings are the `samtools depth` output of one alignment:
 * `reference<TAB>position<TAB>depth`, one line per covered position.
 * The aggregate and proportion tables are tab-separated with a `#` header.
 */

import { ParseError } from "../errors";
import type { DepthLine, DepthRecord, ProportionRow } from "../types";

export const AGGREGATE_HEADER = "#sample_name\tposition\tcount";
export const PROPORTION_HEADER = "#sample_name\tposition\tproportion\tcount";
export const HEADER_MARKER = "#";

const INTEGER = /^\d+$/;

function parseCount(
  field: string,
  name: string,
  format: ParseError["format"],
  filePath: string,
  lineNumber: number,
  line: string
): number {
  if (!INTEGER.test(field)) {
    throw new ParseError(
      `${name} must be a non-negative integer, got '${field}'`,
      format,
      filePath,
      lineNumber,
      line
    );
  }
  const value = Number(field);
  if (!Number.isSafeInteger(value)) {
    throw new ParseError(`${name} ${field} is out of range`, format, filePath, lineNumber, line);
  }
  return value;
}

/**
 * Parse one line of a depth listing
 *
 * Fields may be separated by tabs or runs of spaces; anything after the
 * third field is ignored (multi-BAM `samtools depth` output).
 *
 * @returns The parsed line, or `null` for a blank line
 * @throws {ParseError} When the line has fewer than three fields or a non-integer count
 */
export function parseDepthLine(line: string, lineNumber: number, filePath: string): DepthLine | null {
  const trimmed = line.trim();
  if (trimmed === "") return null;

  const fields = trimmed.split(/\s+/);
  if (fields.length < 3) {
    throw new ParseError(
      `expected 3 fields (reference, position, depth), found ${fields.length}`,
      "depth",
      filePath,
      lineNumber,
      line
    );
  }

  const [reference = "", positionField = "", depthField = ""] = fields;
  return {
    reference,
    position: parseCount(positionField, "position", "depth", filePath, lineNumber, line),
    depth: parseCount(depthField, "depth", "depth", filePath, lineNumber, line),
  };
}

/**
 * Sample name of a depth listing: its file name up to the first `.`
 *
 * `"/out/depth/A1.depth.txt"` and `"A1.sorted.depth.txt"` both give `"A1"`.
 */
export function sampleFromDepthPath(filePath: string): string {
  const fileName = filePath.split(/[\\/]/).pop() ?? filePath;
  const dot = fileName.indexOf(".");
  return dot === -1 ? fileName : fileName.slice(0, dot);
}

/**
 * Header line plus one row per record, newline-terminated
 */
export function formatAggregateBlock(records: ReadonlyArray<DepthRecord>): string {
  const lines = [AGGREGATE_HEADER];
  for (const record of records) {
    lines.push(`${record.sample}\t${record.position}\t${record.count}`);
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Parse the aggregate table into records, skipping header lines
 *
 * @throws {ParseError} When a data row does not have exactly three fields
 */
export function parseAggregateTable(content: string, filePath: string): DepthRecord[] {
  const records: DepthRecord[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    if (line.trim() === "" || line.startsWith(HEADER_MARKER)) return;

    const fields = line.split("\t");
    if (fields.length !== 3) {
      throw new ParseError(
        `expected 3 tab-separated fields (sample, position, count), found ${fields.length}`,
        "aggregate",
        filePath,
        lineNumber,
        line
      );
    }
    const [sample = "", positionField = "", countField = ""] = fields;
    if (sample === "") {
      throw new ParseError("sample name is empty", "aggregate", filePath, lineNumber, line);
    }

    records.push({
      sample,
      position: parseCount(positionField, "position", "aggregate", filePath, lineNumber, line),
      count: parseCount(countField, "count", "aggregate", filePath, lineNumber, line),
    });
  });

  return records;
}

/**
 * Proportion table with a single header line
 */
export function formatProportionTable(rows: ReadonlyArray<ProportionRow>): string {
  const lines = [PROPORTION_HEADER];
  for (const row of rows) {
    lines.push(`${row.sample}\t${row.position}\t${row.proportion}\t${row.count}`);
  }
  return `${lines.join("\n")}\n`;
}
