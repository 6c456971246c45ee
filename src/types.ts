/**
 * Core type definitions for genotypes, catalogs and classification results
 *
 * Genotypes are modelled as template literal types so a canonical `A/G` and
 * the `Unknown/Unknown` sentinel are distinguishable at compile time, while
 * still widening to plain strings for display and comparison.
 */

import { type } from "arktype";

// =============================================================================
// ALLELES AND GENOTYPES
// =============================================================================

/**
 * Uppercase allele alphabet: the four bases, N for no-call, and a gap
 */
export type Allele = "A" | "C" | "G" | "T" | "N" | "-";

/**
 * Canonical genotype: two uppercase alleles joined by a slash
 */
export type CanonicalGenotype = `${Allele}/${Allele}`;

/**
 * Sentinel for a genotype that could not be resolved
 */
export const UNKNOWN_GENOTYPE = "Unknown/Unknown" as const;

export type UnknownGenotype = typeof UNKNOWN_GENOTYPE;

/**
 * Result of genotype resolution: canonical, or the sentinel
 */
export type ResolvedGenotype = CanonicalGenotype | UnknownGenotype;

/**
 * Call code reported alongside a resolved genotype.
 *
 * For structured sources this is the sample's GT field (`0/1`, `1|1`, ...);
 * flat tables report the canonical genotype itself.
 */
export type CallCode = string;

/**
 * Outcome of looking a variant up in a data source
 */
export interface Resolution {
  readonly callCode: CallCode;
  readonly genotype: ResolvedGenotype;
}

// =============================================================================
// COORDINATES AND VARIANT RECORDS
// =============================================================================

/**
 * Genomic coordinate, 1-based, with the chromosome named as the source names it
 */
export interface VariantCoordinate {
  readonly chromosome: string;
  readonly position: number;
}

/**
 * One data line of a VCF, reduced to what genotype resolution needs
 */
export interface VariantRecord {
  readonly chromosome: string;
  readonly position: number;
  /** Undefined when the ID column is `.` */
  readonly identifier?: string;
  readonly reference: string;
  readonly alternates: readonly string[];
  /** GT field of the first sample, empty when the record has no sample */
  readonly call: string;
}

// =============================================================================
// CATALOG
// =============================================================================

export interface CatalogEntry {
  readonly identifier: string;
  readonly coordinate: VariantCoordinate;
  readonly protective: CanonicalGenotype;
  readonly risk: CanonicalGenotype;
  readonly description: string;
}

export interface CatalogSection {
  readonly name: string;
  readonly entries: readonly CatalogEntry[];
}

/**
 * Loaded catalog; section order is the order of the catalog file
 */
export interface Catalog {
  readonly sections: ReadonlyMap<string, CatalogSection>;
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

/**
 * Classification statuses
 */
export const VariantStatus = {
  GOOD: "GOOD",
  RISK: "RISK",
  CARRIER: "CARRIER",
  UNKNOWN: "UNKNOWN",
  VARIANT: "VARIANT",
  ERROR: "ERROR",
} as const;

export type VariantStatus = (typeof VariantStatus)[keyof typeof VariantStatus];

export interface Classification {
  readonly display: ResolvedGenotype;
  readonly status: Exclude<VariantStatus, "ERROR">;
}

export interface ClassificationResult {
  readonly identifier: string;
  /** Display genotype, or `"Error"` for ERROR results */
  readonly genotype: ResolvedGenotype | "Error";
  readonly status: VariantStatus;
  /** Catalog description, or the failure message for ERROR results */
  readonly interpretation: string;
  readonly callCode?: CallCode;
}

export interface SectionReport {
  readonly section: string;
  readonly results: readonly ClassificationResult[];
}

// =============================================================================
// SCHEMAS
// =============================================================================

const GENOTYPE_PATTERN = /^[ACGTN-]\/[ACGTN-]$/;
const CATALOG_POSITION_PATTERN = /^(chr)?[0-9A-Za-z]+:[1-9][0-9]*$/;

/**
 * Canonical genotype as written in catalog files
 */
export const CanonicalGenotypeSchema = type("string").narrow(
  (value, ctx) => GENOTYPE_PATTERN.test(value) || ctx.mustBe("a genotype such as A/G")
);

/**
 * One entry in the on-disk catalog format
 */
export const CatalogFileEntrySchema = type({
  rs_id: "string > 0",
  position: type("string").narrow(
    (value, ctx) => CATALOG_POSITION_PATTERN.test(value) || ctx.mustBe("a coordinate such as 1:11856378")
  ),
  ref_genotype: CanonicalGenotypeSchema,
  alt_genotype: CanonicalGenotypeSchema,
  description: "string",
});

/**
 * Whole catalog file: `{ categories: { section: entries[] } }`
 */
export const CatalogFileSchema = type({
  categories: type({ "[string]": CatalogFileEntrySchema.array() }),
});

export type CatalogFileEntry = typeof CatalogFileEntrySchema.infer;
