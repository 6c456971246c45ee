/**
 * Strand-aware classification of a resolved genotype
 *
 * Array vendors and catalogs do not agree on which strand a genotype is
 * reported on, nor on allele order. A genotype is matched against the
 * catalog's protective and risk genotypes in four orientations before falling
 * back to a zygosity-based status.
 */

import {
  type CanonicalGenotype,
  type Classification,
  type ResolvedGenotype,
  VariantStatus,
} from "../types";
import { complementGenotype, isUnknownGenotype, reverseGenotype, splitGenotype } from "./alleles";

/**
 * Rendering hint per status for consumers that colour their output
 */
export const STATUS_TONE = {
  GOOD: "positive",
  CARRIER: "caution",
  RISK: "negative",
  UNKNOWN: "neutral",
  VARIANT: "neutral",
  ERROR: "negative",
} as const satisfies Record<VariantStatus, "positive" | "caution" | "negative" | "neutral">;

/**
 * Orientations tried in order: as resolved, reversed, complemented, and both
 */
function candidateOrientations(genotype: CanonicalGenotype): readonly CanonicalGenotype[] {
  const reversed = reverseGenotype(genotype);
  return [genotype, reversed, complementGenotype(genotype), complementGenotype(reversed)];
}

/**
 * Classify a genotype against a catalog entry's protective and risk genotypes
 *
 * The display genotype is the first orientation that equals either reference
 * genotype, or the genotype as resolved when none does.
 *
 * @example
 * ```typescript
 * classify("G/A", "A/G", "C/C"); // { display: "A/G", status: "GOOD" }
 * classify("T/T", "A/A", "G/G"); // { display: "A/A", status: "GOOD" }
 * classify("A/G", "C/C", "T/T"); // { display: "A/G", status: "CARRIER" }
 * ```
 */
export function classify(
  genotype: ResolvedGenotype,
  protective: CanonicalGenotype,
  risk: CanonicalGenotype
): Classification {
  if (isUnknownGenotype(genotype)) {
    return { display: genotype, status: VariantStatus.UNKNOWN };
  }

  const display =
    candidateOrientations(genotype).find((candidate) => candidate === protective || candidate === risk) ??
    genotype;

  if (display === protective) {
    return { display, status: VariantStatus.GOOD };
  }
  if (display === risk) {
    return { display, status: VariantStatus.RISK };
  }

  const [first, second] = splitGenotype(genotype);
  return { display, status: first !== second ? VariantStatus.CARRIER : VariantStatus.VARIANT };
}
