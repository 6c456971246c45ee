/**
 * Promise API over catalog loading, source selection and the report driver
 *
 * @example
 * ```typescript
 * const reporter = await SnpReporter.open("sample.vcf.gz", { referenceDir: "./data/reference" });
 * for (const report of await reporter.run(["metabolism", "sleep"])) {
 *   for (const result of report.results) {
 *     console.log(report.section, result.identifier, result.genotype, result.status);
 *   }
 * }
 * ```
 */

import { join } from "node:path";
import { Effect, type Layer } from "effect";
import type { CommandExecutor } from "@effect/platform";
import { readCatalog, DEFAULT_CATALOG_FILE, sectionNames } from "../catalog/loader";
import { DEFAULT_REFERENCE_DIR } from "../config";
import type { GenotypeResolver } from "../genotype/resolver";
import { runWithPlatform } from "../io/runtime";
import type { LogLevelName } from "../logging";
import { ToolRunner } from "../pipeline/tool-runner";
import { openVariantSource } from "../sources/detect";
import type { Catalog, SectionReport } from "../types";
import { runReport, type SectionSelection } from "./driver";

export interface ReporterOptions {
  /** Directory holding `snp_catalog.json` */
  referenceDir?: string;
  /** Explicit catalog path; overrides `referenceDir` */
  catalogPath?: string;
  bcftools?: string;
  toolTimeoutMs?: number;
  /** Upper bound on sections processed at once for bcftools-backed sources */
  concurrency?: number;
  logLevel?: LogLevelName;
  /** Replaces the process-spawning tool runner */
  toolRunner?: Layer.Layer<ToolRunner, never, CommandExecutor.CommandExecutor>;
}

export class SnpReporter {
  private constructor(
    readonly catalog: Catalog,
    private readonly resolver: GenotypeResolver,
    private readonly options: ReporterOptions
  ) {}

  /**
   * Load the catalog and open the variant source
   *
   * @throws {CatalogUnavailableError} When the catalog cannot be loaded
   * @throws {MissingInputError} When the input file does not exist
   */
  static async open(inputPath: string, options: ReporterOptions = {}): Promise<SnpReporter> {
    const catalogPath =
      options.catalogPath ?? join(options.referenceDir ?? DEFAULT_REFERENCE_DIR, DEFAULT_CATALOG_FILE);
    const runner = options.toolRunner ?? ToolRunner.withTimeout(options.toolTimeoutMs);

    const program = Effect.gen(function* () {
      const catalog = yield* readCatalog(catalogPath);
      const resolver = yield* openVariantSource(inputPath, { bcftools: options.bcftools });
      return new SnpReporter(catalog, resolver, options);
    }).pipe(Effect.provide(runner));

    return runWithPlatform(program, { logLevel: options.logLevel });
  }

  /**
   * Section names in catalog order
   */
  listSections(): string[] {
    return sectionNames(this.catalog);
  }

  /**
   * Classify every entry of the selected sections
   *
   * @throws {UnknownSectionError} When a requested section is not in the catalog
   */
  run(selection: SectionSelection = "all"): Promise<SectionReport[]> {
    return runWithPlatform(
      runReport(this.catalog, selection, this.resolver, {
        ...(this.options.concurrency !== undefined ? { concurrency: this.options.concurrency } : {}),
      }),
      { logLevel: this.options.logLevel }
    );
  }
}
