/**
 * Logger layers for the Effect programs
 *
 * The pipeline, fan-out and report driver log through Effect's logger with
 * structured annotations (`stage`, `format`, `section`). This module turns a
 * plain level name from configuration into the layer that installs it.
 */

import { Layer, Logger, LogLevel } from "effect";

export type LogLevelName = "debug" | "info" | "warning" | "error" | "none";

const LEVELS: Record<LogLevelName, LogLevel.LogLevel> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warning: LogLevel.Warning,
  error: LogLevel.Error,
  none: LogLevel.None,
};

/**
 * Pretty console logger filtered to the given minimum level
 */
export function loggingLayer(level: LogLevelName = "info"): Layer.Layer<never> {
  return Layer.merge(Logger.pretty, Logger.minimumLogLevel(LEVELS[level]));
}
