/**
 * Pipeline configuration
 *
 * Tool paths, reference file names, size thresholds and timeouts are carried
 * in an explicit configuration object handed to the pipeline and the format
 * fan-out at construction. Nothing is read from the environment.
 */

import { availableParallelism } from "node:os";
import { join, resolve } from "node:path";
import { type } from "arktype";
import { ConfigurationError } from "./errors";
import type { LogLevelName } from "./logging";

/**
 * Variant-calling backends
 */
export type CallerBackend = "bcftools" | "gatk";

export interface ToolPaths {
  readonly bcftools: string;
  readonly tabix: string;
  readonly gatk: string;
}

/**
 * File names looked up inside the reference directory
 */
export interface ReferenceFiles {
  /** Reference genome FASTA */
  readonly genome: string;
  /** Reference variant database used to annotate identifiers */
  readonly variantDatabase: string;
  /** bcftools ploidy specification; synthesized when absent */
  readonly ploidy: string;
}

export interface SizeThresholds {
  /** The packaged combined table must be larger than this to count as valid */
  readonly minCombinedTableBytes: number;
  /** A packaged consumer format must be larger than this to be reused */
  readonly minFormatPackageBytes: number;
}

export interface GatkMemory {
  readonly haplotypeCaller: string;
  readonly genotypeGvcfs: string;
}

/**
 * Options accepted from callers; everything except the paths has a default
 */
export interface PipelineOptions {
  inputPath: string;
  outputDir: string;
  referenceDir?: string;
  tempDir?: string;
  backend?: CallerBackend;
  tools?: Partial<ToolPaths>;
  referenceFiles?: Partial<ReferenceFiles>;
  thresholds?: Partial<SizeThresholds>;
  threads?: number;
  /** Kill any external tool still running after this many milliseconds */
  toolTimeoutMs?: number;
  gatkMemory?: Partial<GatkMemory>;
  logLevel?: LogLevelName;
}

/**
 * Fully resolved configuration with absolute paths
 */
export interface PipelineConfig {
  readonly inputPath: string;
  readonly outputDir: string;
  readonly referenceDir: string;
  readonly tempDir: string;
  readonly backend: CallerBackend;
  readonly tools: ToolPaths;
  readonly referenceFiles: ReferenceFiles;
  readonly thresholds: SizeThresholds;
  readonly threads: number;
  readonly toolTimeoutMs?: number;
  readonly gatkMemory: GatkMemory;
  readonly logLevel: LogLevelName;
}

export const DEFAULT_REFERENCE_DIR = "./data/reference";

export const DEFAULT_TOOLS: ToolPaths = {
  bcftools: "bcftools",
  tabix: "tabix",
  gatk: "gatk",
};

export const DEFAULT_REFERENCE_FILES: ReferenceFiles = {
  genome: "hs38d1.fna.gz",
  variantDatabase: "dbsnp_156_hg38.vcf.gz",
  ploidy: "ploidy.txt",
};

export const DEFAULT_THRESHOLDS: SizeThresholds = {
  minCombinedTableBytes: 500_000,
  minFormatPackageBytes: 2_500_000,
};

export const DEFAULT_GATK_MEMORY: GatkMemory = {
  haplotypeCaller: "16G",
  genotypeGvcfs: "8G",
};

const PipelineConfigSchema = type({
  inputPath: "string > 0",
  outputDir: "string > 0",
  referenceDir: "string > 0",
  tempDir: "string > 0",
  backend: "'bcftools' | 'gatk'",
  tools: { bcftools: "string > 0", tabix: "string > 0", gatk: "string > 0" },
  referenceFiles: { genome: "string > 0", variantDatabase: "string > 0", ploidy: "string > 0" },
  thresholds: { minCombinedTableBytes: "number.integer >= 0", minFormatPackageBytes: "number.integer >= 0" },
  threads: "number.integer >= 1",
  "toolTimeoutMs?": "number.integer > 0",
  gatkMemory: { haplotypeCaller: "/^[0-9]+[KMG]$/", genotypeGvcfs: "/^[0-9]+[KMG]$/" },
  logLevel: "'debug' | 'info' | 'warning' | 'error' | 'none'",
});

/**
 * Merge caller options over the defaults and validate the result
 *
 * @throws {ConfigurationError} When a merged value is out of range
 */
export function resolvePipelineConfig(options: PipelineOptions): PipelineConfig {
  const outputDir = resolve(options.outputDir);

  const merged = {
    inputPath: resolve(options.inputPath),
    outputDir,
    referenceDir: resolve(options.referenceDir ?? DEFAULT_REFERENCE_DIR),
    tempDir: options.tempDir !== undefined ? resolve(options.tempDir) : join(outputDir, "temp"),
    backend: options.backend ?? "bcftools",
    tools: { ...DEFAULT_TOOLS, ...options.tools },
    referenceFiles: { ...DEFAULT_REFERENCE_FILES, ...options.referenceFiles },
    thresholds: { ...DEFAULT_THRESHOLDS, ...options.thresholds },
    threads: options.threads ?? availableParallelism(),
    ...(options.toolTimeoutMs !== undefined ? { toolTimeoutMs: options.toolTimeoutMs } : {}),
    gatkMemory: { ...DEFAULT_GATK_MEMORY, ...options.gatkMemory },
    logLevel: options.logLevel ?? "info",
  };

  const validationResult = PipelineConfigSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new ConfigurationError(`Invalid pipeline options: ${validationResult.summary}`);
  }

  return merged;
}

/**
 * Absolute path of a file in the reference directory
 */
export function referencePath(config: PipelineConfig, name: keyof ReferenceFiles): string {
  return join(config.referenceDir, config.referenceFiles[name]);
}
