/**
 * Report driver: resolve and classify every entry of the requested sections
 *
 * Sections are independent units of work. Against a source whose lookups are
 * external queries they run on a bounded pool; otherwise one after another.
 * Either way the reports come back in the requested order, entries in catalog
 * order, and a failed lookup becomes an ERROR result instead of failing the
 * report.
 */

import { availableParallelism } from "node:os";
import { Effect, Either } from "effect";
import { describeError, UnknownSectionError } from "../errors";
import { classify } from "../genotype/classifier";
import type { GenotypeResolver } from "../genotype/resolver";
import {
  type Catalog,
  type CatalogEntry,
  type CatalogSection,
  type ClassificationResult,
  type SectionReport,
  VariantStatus,
} from "../types";

/**
 * Section names to report, or every section in catalog order
 */
export type SectionSelection = readonly string[] | "all";

export interface ReportOptions {
  /** Upper bound on sections processed at once for concurrent sources */
  readonly concurrency?: number;
}

/**
 * Resolve a selection against the catalog
 *
 * Every requested name is checked before any lookup happens.
 */
export function selectSections(
  catalog: Catalog,
  selection: SectionSelection
): Either.Either<CatalogSection[], UnknownSectionError> {
  if (selection === "all") {
    return Either.right([...catalog.sections.values()]);
  }

  const selected: CatalogSection[] = [];
  for (const name of selection) {
    const section = catalog.sections.get(name);
    if (section === undefined) {
      return Either.left(new UnknownSectionError(name, [...catalog.sections.keys()]));
    }
    selected.push(section);
  }
  return Either.right(selected);
}

function errorResult(entry: CatalogEntry, error: unknown): ClassificationResult {
  return {
    identifier: entry.identifier,
    genotype: "Error",
    status: VariantStatus.ERROR,
    interpretation: describeError(error),
  };
}

/**
 * Resolve and classify one catalog entry; never fails
 */
export function classifyEntry(
  entry: CatalogEntry,
  resolver: GenotypeResolver
): Effect.Effect<ClassificationResult> {
  return resolver.resolve(entry.coordinate, entry.identifier).pipe(
    Effect.map((resolution): ClassificationResult => {
      const { display, status } = classify(resolution.genotype, entry.protective, entry.risk);
      return {
        identifier: entry.identifier,
        genotype: display,
        status,
        interpretation: entry.description,
        callCode: resolution.callCode,
      };
    }),
    Effect.catchAll((error) =>
      Effect.logWarning(`Lookup failed for ${entry.identifier}: ${describeError(error)}`).pipe(
        Effect.as(errorResult(entry, error))
      )
    ),
    Effect.catchAllDefect((defect) => Effect.succeed(errorResult(entry, defect)))
  );
}

function runSection(section: CatalogSection, resolver: GenotypeResolver): Effect.Effect<SectionReport> {
  return Effect.gen(function* () {
    yield* Effect.logDebug(`Checking ${section.entries.length} variants`);
    const results = yield* Effect.forEach(section.entries, (entry) => classifyEntry(entry, resolver));
    return { section: section.name, results };
  }).pipe(Effect.annotateLogs("section", section.name));
}

/**
 * Run a report over the selected catalog sections
 *
 * @example
 * ```typescript
 * const reports = yield* runReport(catalog, ["metabolism"], resolver);
 * reports[0].results[0]; // { identifier: "rs1801133", genotype: "C/T", status: "CARRIER", ... }
 * ```
 */
export function runReport(
  catalog: Catalog,
  selection: SectionSelection,
  resolver: GenotypeResolver,
  options: ReportOptions = {}
): Effect.Effect<SectionReport[], UnknownSectionError> {
  return Effect.gen(function* () {
    const sections = yield* selectSections(catalog, selection);
    const concurrency = resolver.concurrent
      ? Math.max(1, options.concurrency ?? Math.min(sections.length, 2 * availableParallelism()))
      : 1;

    yield* Effect.logInfo(
      `Reporting ${sections.length} sections` + (concurrency > 1 ? ` with concurrency ${concurrency}` : "")
    );
    return yield* Effect.forEach(sections, (section) => runSection(section, resolver), { concurrency });
  });
}
