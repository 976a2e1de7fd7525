/**
 * Effect platform and logger layers
 *
 * The pipeline runs on Node.js; `NodeContext.layer` provides FileSystem,
 * Path and CommandExecutor to everything below it.
 */

import { NodeContext } from "@effect/platform-node";
import { Layer, Logger, type LogLevel } from "effect";

/**
 * Platform services for file I/O and process execution
 */
export const PlatformLive = NodeContext.layer;

/**
 * Logfmt logger gated at the given minimum level
 *
 * @example
 * ```typescript
 * program.pipe(Effect.provide(loggerLayer(LogLevel.Debug)));
 * ```
 */
export function loggerLayer(level: LogLevel.LogLevel): Layer.Layer<never> {
  return Layer.merge(Logger.logFmt, Logger.minimumLogLevel(level));
}
