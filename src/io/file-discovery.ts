/**
 * Recursive file discovery
 *
 * Stages hand work to each other through directories, so each stage starts
 * by rescanning its input directory for files with a known extension.
 *
 * @module file-discovery
 */

import { basename } from "node:path";
import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";

/**
 * Find every regular file under `root` whose name ends with `extension`
 *
 * Paths are absolute and sorted so downstream work does not depend on
 * directory listing order. A missing root yields an empty array.
 *
 * @example
 * ```typescript
 * const bams = yield* discoverFiles("/data/run-01", ".bam");
 * ```
 */
export const discoverFiles = (
  root: string,
  extension: string
): Effect.Effect<ReadonlyArray<string>, FileError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;
    const absoluteRoot = path.resolve(root);

    const rootExists = yield* fs.exists(absoluteRoot);
    if (!rootExists) {
      yield* Effect.logDebug(`No directory at ${absoluteRoot}; nothing to discover`);
      return [];
    }

    const entries = yield* fs.readDirectory(absoluteRoot, { recursive: true });
    const candidates = entries
      .filter((entry) => entry.endsWith(extension))
      .map((entry) => path.join(absoluteRoot, entry));

    const files: string[] = [];
    for (const candidate of candidates) {
      const info = yield* fs.stat(candidate);
      if (info.type === "File") files.push(candidate);
    }

    return files.sort();
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("scan", root, error)));

/**
 * Strip a known extension from a file name, keeping any other dots
 *
 * `sampleStem("/in/A1.sorted.bam", ".bam")` is `"A1.sorted"`.
 */
export const sampleStem = (filePath: string, extension: string): string =>
  basename(filePath, extension);
