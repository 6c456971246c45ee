/**
 * Fan-out of the combined table into consumer microarray formats
 *
 * Each format is derived from the combined table alone: rows are filtered by
 * the format's inclusion rule, rendered as tab-separated text or quoted CSV,
 * and packaged as `<base>_<format>.zip`. A package that is newer than the
 * combined table and above the size threshold is reused as-is.
 *
 * @module formats/fan-out
 */

import { basename, join } from "node:path";
import type { CommandExecutor, FileSystem } from "@effect/platform";
import { Effect, Either, Option, type Layer } from "effect";
import { gzip, packageEntry } from "../compression";
import { type PipelineConfig, type PipelineOptions, resolvePipelineConfig } from "../config";
import {
  type AllelicError,
  CombinedTableMissingError,
  type CompressionError,
  ConfigurationError,
  type FileError,
} from "../errors";
import { fileExists, getMetadata, readText } from "../io/file-reader";
import { removeFile, writeBytes } from "../io/file-writer";
import { runWithPlatform } from "../io/runtime";
import { artifactPaths, COMBINED_FORMAT, type PipelineArtifacts } from "../pipeline/artifacts";
import { isArtifactValid } from "../pipeline/stage-cache";
import { ToolRunner } from "../pipeline/tool-runner";
import { type PipelineOutcome, runPipeline, unpackCombinedTable } from "../pipeline/variant-calling";
import { includes, loadInclusionRule } from "./inclusion";
import { AVAILABLE_FORMATS, formatSuffix, isMicroarrayFormat } from "./microarray-formats";

// =============================================================================
// TYPES
// =============================================================================

export interface FormatResult {
  readonly format: string;
  readonly packagePath: string;
  /** True when an existing package was returned without recomputation */
  readonly reused: boolean;
  /** Rows written; undefined when reused */
  readonly rows?: number;
}

export interface FormatFailure {
  readonly format: string;
  readonly error: AllelicError;
}

export interface FanOutSummary {
  readonly pipeline: PipelineOutcome;
  readonly generated: readonly FormatResult[];
  readonly failed: readonly FormatFailure[];
  /** Pipeline assembled and every requested format was generated */
  readonly success: boolean;
}

export const CSV_HEADER = '"RSID","CHROMOSOME","POSITION","RESULT"';

// =============================================================================
// RENDERING
// =============================================================================

/**
 * Render selected combined-table lines in a format's layout
 *
 * @param header - The combined table's header line
 * @param lines - Data lines, tab-separated
 */
export function renderFormat(format: string, header: string, lines: readonly string[]): string {
  if (formatSuffix(format) === "txt") {
    return [header, ...lines].map((line) => `${line}\n`).join("");
  }

  const rows = lines.map((line) =>
    line
      .split("\t")
      .map((field) => `"${field.replace(/"/g, '""')}"`)
      .join(",")
  );
  return [CSV_HEADER, ...rows].map((row) => `${row}\n`).join("");
}

function requireCombinedTable(
  artifacts: PipelineArtifacts
): Effect.Effect<void, CombinedTableMissingError | FileError | CompressionError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    if (yield* fileExists(artifacts.combinedTable)) {
      return;
    }
    if (!(yield* fileExists(artifacts.combinedPackage))) {
      return yield* Effect.fail(new CombinedTableMissingError(artifacts.combinedTable));
    }
    yield* unpackCombinedTable(artifacts);
  });
}

// =============================================================================
// OPERATIONS
// =============================================================================

/**
 * Generate one consumer format from the combined table
 */
export function generateFormat(
  config: PipelineConfig,
  format: string
): Effect.Effect<
  FormatResult,
  CombinedTableMissingError | ConfigurationError | FileError | CompressionError,
  FileSystem.FileSystem
> {
  const artifacts = artifactPaths(config);

  return Effect.gen(function* () {
    if (!isMicroarrayFormat(format)) {
      return yield* Effect.fail(
        new ConfigurationError(`Unknown format '${format}'. Available formats: ${AVAILABLE_FORMATS.join(", ")}`)
      );
    }

    if (format === COMBINED_FORMAT) {
      if (!(yield* fileExists(artifacts.combinedPackage))) {
        return yield* Effect.fail(new CombinedTableMissingError(artifacts.combinedTable));
      }
      const result: FormatResult = { format, packagePath: artifacts.combinedPackage, reused: true };
      return result;
    }

    yield* requireCombinedTable(artifacts);

    const packagePath = join(config.outputDir, `${artifacts.base}_${format}.zip`);
    if (yield* isArtifactValid(packagePath, artifacts.combinedTable, config.thresholds.minFormatPackageBytes)) {
      yield* Effect.logInfo(`Reusing ${packagePath}`);
      const result: FormatResult = { format, packagePath, reused: true };
      return result;
    }

    const rule = yield* loadInclusionRule(config.referenceDir, format);
    const [header = "", ...body] = (yield* readText(artifacts.combinedTable)).split("\n");
    const lines = body.filter((line) => {
      const identifier = line.split("\t", 1)[0];
      return line.trim() !== "" && identifier !== undefined && includes(rule, identifier);
    });

    const rendered = new TextEncoder().encode(renderFormat(format, header, lines));
    const suffix = formatSuffix(format);
    const content = suffix === "csv.gz" ? yield* gzip(rendered) : rendered;

    const outputPath = join(config.outputDir, `${artifacts.base}_${format}.${suffix}`);
    yield* writeBytes(outputPath, content);
    yield* writeBytes(packagePath, yield* packageEntry({ name: basename(outputPath), data: content }));
    yield* removeFile(outputPath);

    const packaged = yield* getMetadata(packagePath);
    const size = Option.match(packaged, { onNone: () => 0, onSome: (info) => info.size });
    if (size <= config.thresholds.minFormatPackageBytes) {
      yield* Effect.logWarning(`${packagePath} is only ${size} bytes and may be incomplete`);
    }

    yield* Effect.logInfo(`Wrote ${lines.length} rows to ${packagePath}`);
    const result: FormatResult = { format, packagePath, reused: false, rows: lines.length };
    return result;
  }).pipe(Effect.annotateLogs("format", format));
}

/**
 * Run the pipeline, generate every requested format, then discard the
 * unpackaged combined table (and its package unless it was requested)
 *
 * Format failures are collected, not fatal. When the pipeline fails no format
 * is attempted and nothing is discarded.
 */
export function processAll(
  config: PipelineConfig,
  formats: readonly string[] | "all"
): Effect.Effect<FanOutSummary, FileError, FileSystem.FileSystem | ToolRunner> {
  const requested = formats === "all" ? [...AVAILABLE_FORMATS] : [...formats];
  const keepCombined = requested.includes(COMBINED_FORMAT);
  const artifacts = artifactPaths(config);

  return Effect.gen(function* () {
    const pipeline = yield* runPipeline(config);
    if (pipeline.state === "Failed") {
      yield* Effect.logError("Combined table unavailable, no formats generated");
      const summary: FanOutSummary = { pipeline, generated: [], failed: [], success: false };
      return summary;
    }

    const generated: FormatResult[] = [];
    const failed: FormatFailure[] = [];
    for (const format of requested.filter((name) => name !== COMBINED_FORMAT)) {
      const result = yield* Effect.either(generateFormat(config, format));
      if (Either.isLeft(result)) {
        yield* Effect.logError(`${format}: ${result.left.message}`);
        failed.push({ format, error: result.left });
      } else {
        generated.push(result.right);
      }
    }

    yield* removeFile(artifacts.combinedTable);
    if (!keepCombined) {
      yield* removeFile(artifacts.combinedPackage);
    }

    const attempted = generated.length + failed.length;
    yield* Effect.logInfo(`Generated ${generated.length}/${attempted} formats`);
    const summary: FanOutSummary = { pipeline, generated, failed, success: failed.length === 0 };
    return summary;
  });
}

// =============================================================================
// PROMISE API
// =============================================================================

/**
 * Promise API over the pipeline and format fan-out for one input
 *
 * @example
 * ```typescript
 * const fanOut = new FormatFanOut({ inputPath: "sample.bam", outputDir: "./out" });
 * const summary = await fanOut.processAll(["CombinedKit", "23andMe_V5", "FTDNA_V3"]);
 * console.log(summary.generated.map((result) => result.packagePath));
 * ```
 */
export class FormatFanOut {
  readonly config: PipelineConfig;

  /**
   * @throws {ConfigurationError} When the options do not validate
   */
  constructor(
    options: PipelineOptions,
    private readonly toolRunner?: Layer.Layer<ToolRunner, never, CommandExecutor.CommandExecutor>
  ) {
    this.config = resolvePipelineConfig(options);
  }

  /**
   * @throws {CombinedTableMissingError} When neither the combined table nor its package exists
   */
  generateFormat(format: string): Promise<FormatResult> {
    return runWithPlatform(generateFormat(this.config, format), { logLevel: this.config.logLevel });
  }

  processAll(formats: readonly string[] | "all" = "all"): Promise<FanOutSummary> {
    const runner = this.toolRunner ?? ToolRunner.withTimeout(this.config.toolTimeoutMs);
    return runWithPlatform(processAll(this.config, formats).pipe(Effect.provide(runner)), {
      logLevel: this.config.logLevel,
    });
  }
}
