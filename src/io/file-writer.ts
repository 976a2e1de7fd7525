/**
 * Text output writing using Effect Platform
 *
 * Tables are written to a temporary sibling and renamed into place, so a
 * reader never observes a half-written table and an interrupted run leaves
 * the previous version intact.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";

/**
 * Write string to file (overwrites if exists, creates parent directories)
 *
 * @example
 * ```typescript
 * yield* writeString("out/aggregate.tsv", "#sample_name\tposition\tcount\n");
 * ```
 */
export const writeString = (
  filePath: string,
  content: string
): Effect.Effect<void, FileError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    yield* fs
      .makeDirectory(path.dirname(filePath), { recursive: true })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", path.dirname(filePath), error)));

    const staging = `${filePath}.partial`;
    yield* fs
      .writeFileString(staging, content)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", staging, error)));
    yield* fs
      .rename(staging, filePath)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("rename", filePath, error)));
  });

/**
 * Read a whole text file
 */
export const readString = (
  filePath: string
): Effect.Effect<string, FileError, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) => fs.readFileString(filePath)).pipe(
    Effect.mapError((error) => FileError.fromSystemError("read", filePath, error))
  );
