/**
 * Effect-based external tool execution
 *
 * Every stage reaches its external program through the `ToolRunner`
 * service, so tests can swap the live process layer for an in-process one.
 *
 * @example Running an invocation
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const runner = yield* ToolRunner;
 *   yield* runner.run({ program: "samtools", args: ["depth", "/abs/A1.bam"], cwd: "/tmp/work" });
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(ToolRunner.Live), Effect.provide(NodeContext.layer))
 * );
 * ```
 *
 * @module pipeline/tool-runner
 */

import { Command, CommandExecutor, FileSystem } from "@effect/platform";
import { Context, Effect, Layer, Stream } from "effect";
import { ToolError } from "../errors";

const STDERR_TAIL_LENGTH = 2000;

/**
 * One external program run
 */
export interface ToolInvocation {
  readonly program: string;
  readonly args: ReadonlyArray<string>;
  /** Working directory the tool runs in */
  readonly cwd: string;
  /** When set, standard output is written to this file */
  readonly stdoutPath?: string;
}

export interface ToolRunnerShape {
  /**
   * Run the invocation to completion
   *
   * Succeeds only when the process exits with status 0.
   */
  readonly run: (invocation: ToolInvocation) => Effect.Effect<void, ToolError>;
}

export class ToolRunner extends Context.Tag("@sgrna-sites/ToolRunner")<
  ToolRunner,
  ToolRunnerShape
>() {
  /**
   * Spawns real processes through the platform CommandExecutor
   */
  static readonly Live: Layer.Layer<
    ToolRunner,
    never,
    CommandExecutor.CommandExecutor | FileSystem.FileSystem
  > = Layer.effect(
    ToolRunner,
    Effect.gen(function* () {
      const executor = yield* CommandExecutor.CommandExecutor;
      const fs = yield* FileSystem.FileSystem;
      return {
        run: (invocation) =>
          spawn(invocation, fs).pipe(
            Effect.provideService(CommandExecutor.CommandExecutor, executor)
          ),
      };
    })
  );
}

/**
 * Shell-style rendering of an invocation, for logs and error reports
 */
export function renderCommandLine(invocation: ToolInvocation): string {
  const words = [invocation.program, ...invocation.args].map(quoteWord);
  const redirect =
    invocation.stdoutPath === undefined ? "" : ` > ${quoteWord(invocation.stdoutPath)}`;
  return `${words.join(" ")}${redirect}`;
}

function quoteWord(word: string): string {
  if (/^[\w@%+=:,./-]+$/.test(word)) return word;
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

const collectText = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  stream.pipe(
    Stream.decodeText(),
    Stream.runFold("", (acc, chunk) => (acc + chunk).slice(-STDERR_TAIL_LENGTH))
  );

function spawn(
  invocation: ToolInvocation,
  fs: FileSystem.FileSystem
): Effect.Effect<void, ToolError, CommandExecutor.CommandExecutor> {
  const command = Command.make(invocation.program, ...invocation.args).pipe(
    Command.workingDirectory(invocation.cwd)
  );

  return Effect.gen(function* () {
    const child = yield* Command.start(command);
    const stdout =
      invocation.stdoutPath === undefined
        ? Stream.runDrain(child.stdout)
        : Stream.run(child.stdout, fs.sink(invocation.stdoutPath));

    const [exitCode, , stderr] = yield* Effect.all(
      [child.exitCode, stdout, collectText(child.stderr)],
      { concurrency: "unbounded" }
    );
    return { exitCode: Number(exitCode), stderr: stderr.trim() };
  }).pipe(
    Effect.scoped,
    Effect.mapError(
      (error) =>
        new ToolError(
          `failed to run ${invocation.program}: ${error.message}`,
          invocation.program
        )
    ),
    Effect.flatMap(({ exitCode, stderr }) =>
      exitCode === 0
        ? Effect.void
        : Effect.fail(
            new ToolError(
              `${invocation.program} exited with status ${exitCode}`,
              invocation.program,
              exitCode,
              stderr
            )
          )
    )
  );
}
