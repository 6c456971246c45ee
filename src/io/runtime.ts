/**
 * Effect platform layer selection and Promise entry point
 *
 * Every Promise-returning API in the library is a thin wrapper that builds an
 * Effect program and hands it to {@link runWithPlatform}, which provides the
 * Node.js platform services (file system, paths, child processes) and the
 * logger, and rethrows typed failures as the library's own error classes.
 */

import type { CommandExecutor, FileSystem, Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";
import { type LogLevelName, loggingLayer } from "../logging";

/**
 * Services the platform layer supplies to library programs
 */
export type PlatformServices = FileSystem.FileSystem | Path.Path | CommandExecutor.CommandExecutor;

export interface RunOptions {
  /** Aborting interrupts the program and kills any running external tool */
  readonly signal?: AbortSignal;
  readonly logLevel?: LogLevelName;
}

/**
 * Get the Effect platform layer for the current runtime
 */
export function getPlatform() {
  return NodeContext.layer;
}

/**
 * Run an Effect program on the Node.js platform
 *
 * Failures reject with the program's own error value rather than a fiber
 * failure wrapper, so `instanceof` checks against library errors hold.
 */
export async function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, PlatformServices>,
  options: RunOptions = {}
): Promise<A> {
  const runnable = program.pipe(
    Effect.provide(loggingLayer(options.logLevel)),
    Effect.provide(getPlatform())
  );

  const exit = await Effect.runPromiseExit(runnable, { signal: options.signal });
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
