/**
 * Configuration loading tests
 */

import { ConfigProvider, Effect } from "effect";
import { describe, expect, test } from "vitest";
import { DEFAULT_SITES, loadConfig } from "../src/config";
import { ConfigurationError } from "../src/errors";

const REQUIRED: ReadonlyArray<readonly [string, string]> = [
  ["INPUT_DIR", "/data/bams"],
  ["OUTPUT_DIR", "/data/out"],
  ["LEADER_TOOL", "/opt/leader-filter"],
];

const load = (entries: ReadonlyArray<readonly [string, string]>) =>
  loadConfig.pipe(Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries))));

describe("loadConfig", () => {
  test("applies defaults for optional settings", async () => {
    const config = await Effect.runPromise(load([...REQUIRED, ["CPUS", "16"]]));

    expect(config).toEqual({
      inputDir: "/data/bams",
      outputDir: "/data/out",
      leaderTool: "/opt/leader-filter",
      depthTool: "samtools",
      reference: "NC_045512.2",
      minQuality: 20,
      threadsPerJob: 4,
      totalCpus: 16,
      execute: false,
      sites: [...DEFAULT_SITES],
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  test("reads overrides including a comma-separated site list", async () => {
    const config = await Effect.runPromise(
      load([
        ...REQUIRED,
        ["EXECUTE", "true"],
        ["THREADS_PER_JOB", "2"],
        ["SITES", "55,26469,55"],
      ])
    );

    expect(config.execute).toBe(true);
    expect(config.threadsPerJob).toBe(2);
    expect(config.sites).toEqual([55, 26469]);
  });

  test("fails with a ConfigurationError naming a missing setting", async () => {
    const error = await Effect.runPromise(Effect.flip(load(REQUIRED.slice(1))));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.message).toContain("INPUT_DIR");
  });

  test("rejects values outside their schema", async () => {
    const error = await Effect.runPromise(
      Effect.flip(load([...REQUIRED, ["THREADS_PER_JOB", "0"]]))
    );

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.message).toContain("threadsPerJob");
  });
});
