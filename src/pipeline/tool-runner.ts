/**
 * External tool execution as an Effect service
 *
 * Every bcftools, tabix and GATK invocation goes through {@link ToolRunner}.
 * Success is decided by the exit status alone; stdout and stderr are captured
 * in full. Interrupting the calling fiber (cancellation, timeout) kills the
 * child process when the command's scope closes.
 *
 * ## Layers
 *
 * - `ToolRunner.Live` spawns real processes through the platform's
 *   `CommandExecutor` (provided by `NodeContext.layer`).
 * - `ToolRunner.withTimeout(ms)` is `Live` with a kill deadline per command.
 * - Tests substitute an in-process layer that fakes tool behaviour.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const runner = yield* ToolRunner;
 *   const { stdout } = yield* runner.run({
 *     tool: "bcftools",
 *     args: ["view", "-H", "-r", "1:11856378", "sample.vcf.gz"],
 *     label: "lookup",
 *   });
 *   return stdout;
 * });
 * ```
 *
 * @module pipeline/tool-runner
 */

import { Command, CommandExecutor } from "@effect/platform";
import { Context, Duration, Effect, Layer, Stream } from "effect";
import { ToolError, ToolTimeoutError } from "../errors";

// =============================================================================
// SERVICE SHAPE
// =============================================================================

export interface ToolInvocation {
  /** Executable name or path */
  readonly tool: string;
  readonly args: readonly string[];
  /** Short name used in log annotations (stage, lookup, ...) */
  readonly label: string;
}

export interface ToolOutput {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface ToolRunnerShape {
  /**
   * Run a command to completion
   *
   * Fails with {@link ToolError} on a nonzero exit status or when the process
   * cannot be started, and with {@link ToolTimeoutError} past the deadline.
   */
  readonly run: (invocation: ToolInvocation) => Effect.Effect<ToolOutput, ToolError>;
}

// =============================================================================
// SERVICE TAG
// =============================================================================

export class ToolRunner extends Context.Tag("allelic/ToolRunner")<ToolRunner, ToolRunnerShape>() {
  /**
   * Spawn real processes, no deadline
   */
  static readonly Live: Layer.Layer<ToolRunner, never, CommandExecutor.CommandExecutor> =
    ToolRunner.withTimeout(undefined);

  /**
   * Spawn real processes, killing any still running after `timeoutMs`
   */
  static withTimeout(
    timeoutMs: number | undefined
  ): Layer.Layer<ToolRunner, never, CommandExecutor.CommandExecutor> {
    return Layer.effect(
      ToolRunner,
      Effect.gen(function* () {
        const executor = yield* CommandExecutor.CommandExecutor;
        return {
          run: (invocation: ToolInvocation) =>
            runCommand(invocation, timeoutMs).pipe(
              Effect.provideService(CommandExecutor.CommandExecutor, executor)
            ),
        };
      })
    );
  }
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

/**
 * Render an invocation as a shell-like command line for logs and errors
 */
export function formatCommandLine(invocation: Pick<ToolInvocation, "tool" | "args">): string {
  return [invocation.tool, ...invocation.args]
    .map((part) => (/^[\w./:=,+-]+$/.test(part) ? part : `'${part.replace(/'/g, "'\\''")}'`))
    .join(" ");
}

function collectText<E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> {
  return stream.pipe(
    Stream.decodeText(),
    Stream.runFold("", (acc, chunk) => acc + chunk)
  );
}

function runCommand(
  invocation: ToolInvocation,
  timeoutMs: number | undefined
): Effect.Effect<ToolOutput, ToolError, CommandExecutor.CommandExecutor> {
  const commandLine = formatCommandLine(invocation);
  const command = Command.make(invocation.tool, ...invocation.args);

  const execution = Effect.scoped(
    Effect.gen(function* () {
      const child = yield* Command.start(command);
      const [exitCode, stdout, stderr] = yield* Effect.all(
        [child.exitCode, collectText(child.stdout), collectText(child.stderr)],
        { concurrency: "unbounded" }
      );
      return { exitCode: Number(exitCode), stdout, stderr };
    })
  ).pipe(Effect.mapError((error) => ToolError.fromSystemError(commandLine, error)));

  const bounded =
    timeoutMs === undefined
      ? execution
      : execution.pipe(
          Effect.timeoutFail({
            duration: Duration.millis(timeoutMs),
            onTimeout: () => new ToolTimeoutError(commandLine, timeoutMs),
          })
        );

  return Effect.logDebug(`Running ${commandLine}`).pipe(
    Effect.zipRight(bounded),
    Effect.flatMap((output) =>
      output.exitCode === 0
        ? Effect.succeed(output)
        : Effect.fail(ToolError.fromExit(commandLine, output.exitCode, output.stderr))
    ),
    Effect.annotateLogs({ tool: invocation.tool, label: invocation.label })
  );
}
