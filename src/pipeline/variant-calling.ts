/**
 * Incremental variant-calling pipeline
 *
 * Turns an alignment into the combined genotype table in eight stages:
 *
 * ```
 * Pileup → Call → Annotate → IndexCalled → IndexAnnotated → Extract → Normalize → Assemble
 * ```
 *
 * Every stage writes one artifact whose freshness is judged against the input
 * alignment. A run resumes after the last valid artifact in stage order: that
 * stage is reused, earlier ones are superseded, later ones run. Re-running
 * on an unchanged input therefore runs nothing.
 *
 * Failures of calling and assembly end the run. Annotation, indexing,
 * extraction and normalization failures are recorded as warnings and the run
 * continues in degraded mode.
 *
 * @module pipeline/variant-calling
 */

import { basename } from "node:path";
import type { CommandExecutor, FileSystem } from "@effect/platform";
import { Effect, Either, Option, type Layer } from "effect";
import {
  type PipelineConfig,
  type PipelineOptions,
  referencePath,
  resolvePipelineConfig,
} from "../config";
import {
  type AllelicError,
  type CompressionError,
  describeError,
  type FileError,
  MissingInputError,
  StageError,
} from "../errors";
import { packageEntry, unpackFirstEntry } from "../compression";
import { fileExists, getMetadata, readBytes, readText } from "../io/file-reader";
import { ensureDirectory, setModifiedTime, writeBytes, writeText } from "../io/file-writer";
import { runWithPlatform } from "../io/runtime";
import { artifactPaths, type PipelineArtifacts } from "./artifacts";
import {
  annotateCommand,
  callCommand,
  extractCommand,
  genotypeGvcfsCommand,
  haplotypeCallerCommand,
  indexCommand,
  pileupCommand,
} from "./commands";
import { COMBINED_TABLE_HEADER, formatRow, normalizeExtract } from "./normalize";
import { ensurePloidyFile } from "./ploidy";
import { isArtifactValid } from "./stage-cache";
import { type ToolInvocation, ToolRunner } from "./tool-runner";

// =============================================================================
// TYPES
// =============================================================================

export const STAGES = [
  "Pileup",
  "Call",
  "Annotate",
  "IndexCalled",
  "IndexAnnotated",
  "Extract",
  "Normalize",
  "Assemble",
] as const;

export type StageName = (typeof STAGES)[number];

/**
 * What happened to a stage in one run
 *
 * - `ran`: executed and succeeded
 * - `reused`: its artifact was the last valid one, nothing executed
 * - `superseded`: an artifact later in the order was valid
 * - `failed`: executed and failed without ending the run
 */
export type StageDisposition = "ran" | "reused" | "superseded" | "failed";

export interface StageReport {
  readonly stage: StageName;
  readonly disposition: StageDisposition;
  readonly artifact: string;
}

export type PipelineOutcome =
  | {
      readonly state: "AssembledValid";
      /** True when any stage failed without ending the run */
      readonly degraded: boolean;
      readonly warnings: readonly string[];
      readonly stages: readonly StageReport[];
      readonly combinedTable: string;
      readonly combinedPackage: string;
    }
  | {
      readonly state: "Failed";
      readonly error: AllelicError;
      readonly stages: readonly StageReport[];
    };

type StageRequirements = FileSystem.FileSystem | ToolRunner;

interface StageDefinition {
  readonly name: StageName;
  readonly artifact: string;
  readonly minSizeBytes: number;
  /** A failure ends the run instead of degrading it */
  readonly fatal: boolean;
  readonly execute: Effect.Effect<void, AllelicError, StageRequirements>;
}

// =============================================================================
// STAGES
// =============================================================================

function runTool(invocation: ToolInvocation): Effect.Effect<void, AllelicError, ToolRunner> {
  return Effect.flatMap(ToolRunner, (runner) => runner.run(invocation)).pipe(Effect.asVoid);
}

function callStage(config: PipelineConfig, artifacts: PipelineArtifacts): Effect.Effect<void, AllelicError, StageRequirements> {
  if (config.backend === "bcftools") {
    return runTool(callCommand(config, artifacts));
  }

  return Effect.gen(function* () {
    if (yield* isArtifactValid(artifacts.gvcf, config.inputPath)) {
      yield* Effect.logInfo(`Reusing GVCF ${artifacts.gvcf}`);
    } else {
      yield* runTool(haplotypeCallerCommand(config, artifacts));
    }
    yield* runTool(genotypeGvcfsCommand(config, artifacts));
  });
}

function extractStage(config: PipelineConfig, artifacts: PipelineArtifacts): Effect.Effect<void, AllelicError, StageRequirements> {
  return Effect.gen(function* () {
    let source = artifacts.annotated;
    if (!(yield* fileExists(source))) {
      yield* Effect.logWarning(`Annotated calls missing, extracting from ${artifacts.called}`);
      source = artifacts.called;
    }
    yield* runTool(extractCommand(config, source, artifacts.extracted));
  });
}

function normalizeStage(artifacts: PipelineArtifacts): Effect.Effect<void, AllelicError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const rows = normalizeExtract(yield* readText(artifacts.extracted));
    yield* writeText(artifacts.sorted, rows.map((row) => `${formatRow(row)}\n`).join(""));
    yield* Effect.logInfo(`Normalized ${rows.length} calls`);
  });
}

function assembleStage(artifacts: PipelineArtifacts): Effect.Effect<void, AllelicError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const sorted = yield* readText(artifacts.sorted);
    const table = `${COMBINED_TABLE_HEADER}\n${sorted}`;
    yield* writeText(artifacts.combinedTable, table);

    const archive = yield* packageEntry({
      name: basename(artifacts.combinedTable),
      data: new TextEncoder().encode(table),
    });
    yield* writeBytes(artifacts.combinedPackage, archive);
  });
}

/**
 * Stage plan for the configured backend, in execution order
 */
export function planStages(config: PipelineConfig, artifacts: PipelineArtifacts): StageDefinition[] {
  const stages: StageDefinition[] = [];

  if (config.backend === "bcftools") {
    stages.push({
      name: "Pileup",
      artifact: artifacts.pileup,
      minSizeBytes: 0,
      fatal: true,
      execute: runTool(pileupCommand(config, artifacts)),
    });
  }

  stages.push(
    {
      name: "Call",
      artifact: artifacts.called,
      minSizeBytes: 0,
      fatal: true,
      execute: callStage(config, artifacts),
    },
    {
      name: "Annotate",
      artifact: artifacts.annotated,
      minSizeBytes: 0,
      fatal: false,
      execute: runTool(annotateCommand(config, artifacts)),
    },
    {
      name: "IndexCalled",
      artifact: artifacts.calledIndex,
      minSizeBytes: 0,
      fatal: false,
      execute: runTool(indexCommand(config, artifacts.called, "IndexCalled")),
    },
    {
      name: "IndexAnnotated",
      artifact: artifacts.annotatedIndex,
      minSizeBytes: 0,
      fatal: false,
      execute: runTool(indexCommand(config, artifacts.annotated, "IndexAnnotated")),
    },
    {
      name: "Extract",
      artifact: artifacts.extracted,
      minSizeBytes: 0,
      fatal: false,
      execute: extractStage(config, artifacts),
    },
    {
      name: "Normalize",
      artifact: artifacts.sorted,
      minSizeBytes: 0,
      fatal: false,
      execute: normalizeStage(artifacts),
    },
    {
      name: "Assemble",
      artifact: artifacts.combinedPackage,
      minSizeBytes: config.thresholds.minCombinedTableBytes,
      fatal: true,
      execute: assembleStage(artifacts),
    }
  );

  return stages;
}

// =============================================================================
// DRIVER
// =============================================================================

/**
 * Restore the text table from a valid package, keeping the package's
 * modification time so the restored table is not newer than it
 */
export function unpackCombinedTable(
  artifacts: PipelineArtifacts
): Effect.Effect<void, FileError | CompressionError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const entry = yield* unpackFirstEntry(yield* readBytes(artifacts.combinedPackage), artifacts.combinedPackage);
    yield* writeText(artifacts.combinedTable, new TextDecoder().decode(entry.data));

    const packageInfo = yield* getMetadata(artifacts.combinedPackage);
    const modified = Option.flatMap(packageInfo, (info) => Option.fromNullable(info.lastModified));
    if (Option.isSome(modified)) {
      yield* setModifiedTime(artifacts.combinedTable, modified.value);
    }
    yield* Effect.logInfo(`Unpacked ${artifacts.combinedTable} from its package`);
  });
}

function checkInputs(config: PipelineConfig): Effect.Effect<void, MissingInputError | FileError, FileSystem.FileSystem> {
  const required: ReadonlyArray<readonly [string, string]> = [
    ["Input alignment", config.inputPath],
    ["Reference genome", referencePath(config, "genome")],
    ["Reference variant database", referencePath(config, "variantDatabase")],
  ];

  return Effect.forEach(
    required,
    ([role, path]) =>
      Effect.flatMap(fileExists(path), (exists) =>
        exists ? Effect.void : Effect.fail(new MissingInputError(role, path))
      ),
    { discard: true }
  );
}

/**
 * Run the pipeline to a terminal outcome
 *
 * Never fails: every error ends up in a `Failed` outcome.
 */
export function runPipeline(config: PipelineConfig): Effect.Effect<PipelineOutcome, never, StageRequirements> {
  const artifacts = artifactPaths(config);
  const stages: StageReport[] = [];
  const warnings: string[] = [];

  const program = Effect.gen(function* () {
    yield* Effect.logInfo(`Generating combined table for ${config.inputPath} (${config.backend})`);
    yield* checkInputs(config);
    yield* ensureDirectory(config.outputDir);
    yield* ensureDirectory(config.tempDir);
    if (config.backend === "bcftools") {
      yield* ensurePloidyFile(referencePath(config, "ploidy"));
    }

    const plan = planStages(config, artifacts);
    const validity = yield* Effect.forEach(plan, (stage) =>
      isArtifactValid(stage.artifact, config.inputPath, stage.minSizeBytes)
    );
    const resumeAt = validity.lastIndexOf(true);

    for (const [index, stage] of plan.entries()) {
      const report = (disposition: StageDisposition) =>
        stages.push({ stage: stage.name, disposition, artifact: stage.artifact });

      if (index < resumeAt) {
        report("superseded");
        yield* Effect.logDebug("Superseded by a later valid artifact").pipe(Effect.annotateLogs("stage", stage.name));
        continue;
      }
      if (index === resumeAt) {
        report("reused");
        yield* Effect.logInfo(`Reusing ${stage.artifact}`).pipe(Effect.annotateLogs("stage", stage.name));
        continue;
      }

      const result = yield* Effect.either(
        Effect.logInfo("Running").pipe(Effect.zipRight(stage.execute), Effect.annotateLogs("stage", stage.name))
      );
      if (Either.isLeft(result)) {
        if (stage.fatal) {
          report("failed");
          return yield* Effect.fail(new StageError(describeError(result.left), stage.name, result.left));
        }
        const warning = new StageError(describeError(result.left), stage.name, result.left).message;
        warnings.push(warning);
        report("failed");
        yield* Effect.logWarning(warning).pipe(Effect.annotateLogs("stage", stage.name));
        continue;
      }
      report("ran");
    }

    if (!(yield* fileExists(artifacts.combinedTable))) {
      yield* unpackCombinedTable(artifacts);
    }

    const packaged = yield* getMetadata(artifacts.combinedPackage);
    const packageSize = Option.match(packaged, { onNone: () => 0, onSome: (info) => info.size });
    if (packageSize <= config.thresholds.minCombinedTableBytes) {
      return yield* Effect.fail(
        new StageError(
          `Combined table package is ${packageSize} bytes, expected more than ${config.thresholds.minCombinedTableBytes}`,
          "Assemble"
        )
      );
    }

    yield* Effect.logInfo(
      `Combined table ready: ${artifacts.combinedPackage}` + (warnings.length > 0 ? ` (${warnings.length} warnings)` : "")
    );
    const outcome: PipelineOutcome = {
      state: "AssembledValid",
      degraded: warnings.length > 0,
      warnings,
      stages,
      combinedTable: artifacts.combinedTable,
      combinedPackage: artifacts.combinedPackage,
    };
    return outcome;
  });

  return program.pipe(
    Effect.catchAll((error) =>
      Effect.logError(error.message).pipe(
        Effect.as<PipelineOutcome>({ state: "Failed", error, stages })
      )
    ),
    Effect.annotateLogs("input", basename(config.inputPath))
  );
}

// =============================================================================
// PROMISE API
// =============================================================================

/**
 * Variant-calling pipeline for one input alignment
 *
 * @example
 * ```typescript
 * const pipeline = new VariantCallingPipeline({
 *   inputPath: "sample.bam",
 *   outputDir: "./out",
 *   referenceDir: "./data/reference",
 * });
 * const outcome = await pipeline.run();
 * if (outcome.state === "AssembledValid") {
 *   console.log(outcome.combinedPackage, outcome.degraded);
 * }
 * ```
 */
export class VariantCallingPipeline {
  readonly config: PipelineConfig;
  readonly artifacts: PipelineArtifacts;

  /**
   * @throws {ConfigurationError} When the options do not validate
   */
  constructor(
    options: PipelineOptions,
    private readonly toolRunner?: Layer.Layer<ToolRunner, never, CommandExecutor.CommandExecutor>
  ) {
    this.config = resolvePipelineConfig(options);
    this.artifacts = artifactPaths(this.config);
  }

  run(): Promise<PipelineOutcome> {
    const runner = this.toolRunner ?? ToolRunner.withTimeout(this.config.toolTimeoutMs);
    return runWithPlatform(runPipeline(this.config).pipe(Effect.provide(runner)), {
      logLevel: this.config.logLevel,
    });
  }
}
