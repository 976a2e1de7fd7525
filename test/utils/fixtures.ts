/**
 * Temporary directories and run configurations for tests
 */

import { mkdirSync, mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import type { PipelineConfig } from "../../src/types";

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `sgrna-sites-${prefix}-`));
}

export function writeFixture(filePath: string, content: string): string {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
  return filePath;
}

/**
 * Depth listing text for a sample: one line per `[position, depth]`
 */
export function depthListing(entries: ReadonlyArray<readonly [number, number]>): string {
  return entries.map(([position, depth]) => `NC_045512.2\t${position}\t${depth}\n`).join("");
}

export function testConfig(root: string, overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    inputDir: join(root, "input"),
    outputDir: join(root, "output"),
    leaderTool: "leader-filter",
    depthTool: "samtools",
    reference: "NC_045512.2",
    minQuality: 20,
    threadsPerJob: 1,
    totalCpus: 2,
    execute: true,
    sites: [55, 26469, 29530],
    ...overrides,
  };
}
