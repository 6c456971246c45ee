/**
 * allelic - genotype tables from sequencing alignments, and SNP reports
 * from genotype tables
 *
 * Two halves share this package: an incremental variant-calling pipeline
 * that turns an alignment into a combined genotype table and consumer
 * microarray formats, and a strand-aware classifier that reports a sample's
 * genotypes against a curated SNP catalog.
 */

// Catalog
export { DEFAULT_CATALOG_FILE, loadCatalog, parseCatalog, readCatalog, sectionNames } from "./catalog/loader";
// Packaging
export {
  fromExtension,
  fromMagicBytes,
  gunzip,
  gzip,
  type GzipLevel,
  type PackageFormat,
  packageEntry,
  unpackEntries,
  unpackFirstEntry,
  type ZipEntry,
} from "./compression";
// Configuration
export {
  type CallerBackend,
  DEFAULT_GATK_MEMORY,
  DEFAULT_REFERENCE_DIR,
  DEFAULT_REFERENCE_FILES,
  DEFAULT_THRESHOLDS,
  DEFAULT_TOOLS,
  type GatkMemory,
  type PipelineConfig,
  type PipelineOptions,
  type ReferenceFiles,
  referencePath,
  resolvePipelineConfig,
  type SizeThresholds,
  type ToolPaths,
} from "./config";
// Error types
export {
  AllelicError,
  CatalogUnavailableError,
  CombinedTableMissingError,
  CompressionError,
  ConfigurationError,
  describeError,
  FileError,
  InvalidGenotypeError,
  InvalidTableLayoutError,
  MissingInputError,
  StageError,
  ToolError,
  ToolTimeoutError,
  UnknownSectionError,
} from "./errors";
// Format fan-out
export {
  CSV_HEADER,
  type FanOutSummary,
  type FormatFailure,
  FormatFanOut,
  type FormatResult,
  generateFormat,
  processAll,
  renderFormat,
} from "./formats/fan-out";
export { hashString, includes, type InclusionRule, loadInclusionRule } from "./formats/inclusion";
export {
  admissionBuckets,
  AVAILABLE_FORMATS,
  formatSuffix,
  isMicroarrayFormat,
  type MicroarrayFormat,
} from "./formats/microarray-formats";
// Genotypes
export {
  complement,
  complementGenotype,
  formatGenotype,
  isCanonicalGenotype,
  isUnknownGenotype,
  parseRawGenotype,
  reverseGenotype,
  splitGenotype,
  tryParseRawGenotype,
} from "./genotype/alleles";
export { alternateChromosomeName, compareVersion, normalizeChromosome } from "./genotype/chromosomes";
export { classify, STATUS_TONE } from "./genotype/classifier";
export {
  FlatTableGenotypeResolver,
  type GenotypeResolver,
  type GenotypeTable,
  resolveRecord,
  StructuredGenotypeResolver,
  type VariantRecordSource,
} from "./genotype/resolver";
// Runtime and logging
export { getPlatform, type RunOptions, runWithPlatform } from "./io/runtime";
export { type LogLevelName, loggingLayer } from "./logging";
// Pipeline
export { artifactPaths, COMBINED_FORMAT, inputBaseName, type PipelineArtifacts } from "./pipeline/artifacts";
export { COMBINED_TABLE_HEADER, normalizeCallGenotype, normalizeExtract, type TableRow } from "./pipeline/normalize";
export { DEFAULT_PLOIDY } from "./pipeline/ploidy";
export { isArtifactValid } from "./pipeline/stage-cache";
export { type ToolInvocation, type ToolOutput, ToolRunner, type ToolRunnerShape } from "./pipeline/tool-runner";
export {
  type PipelineOutcome,
  runPipeline,
  STAGES,
  type StageDisposition,
  type StageName,
  type StageReport,
  VariantCallingPipeline,
} from "./pipeline/variant-calling";
// Reports
export { classifyEntry, type ReportOptions, runReport, type SectionSelection, selectSections } from "./report/driver";
export { type ReporterOptions, SnpReporter } from "./report/reporter";
// Variant sources
export { BcftoolsRecordSource } from "./sources/bcftools-source";
export { openVariantSource, type OpenSourceOptions, type SourceStrategy, strategyFromName } from "./sources/detect";
export {
  DEFAULT_TABLE_LAYOUT,
  FlatGenotypeTable,
  loadGenotypeTable,
  readGenotypeTable,
  TABLE_FIELD_ALIASES,
  TABLE_LAYOUT_VERSION,
  type TableLayout,
} from "./sources/genotype-table";
export { InMemoryRecordSource } from "./sources/in-memory-source";
export { firstRecord, parseVcfLine } from "./sources/vcf-record";
// Core types
export {
  type Allele,
  type CanonicalGenotype,
  type Catalog,
  type CatalogEntry,
  type CatalogSection,
  type ClassificationResult,
  type Resolution,
  type ResolvedGenotype,
  type SectionReport,
  UNKNOWN_GENOTYPE,
  type VariantCoordinate,
  type VariantRecord,
  VariantStatus,
} from "./types";
