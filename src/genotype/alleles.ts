/**
 * Allele and genotype normalization
 *
 * Raw genotype tokens arrive in several spellings depending on the source
 * (`AG`, `A/G`, `A|G`, `A`, `--`, lowercase). Everything downstream works on
 * the canonical `X/Y` form produced here.
 */

import { InvalidGenotypeError } from "../errors";
import {
  type Allele,
  type CanonicalGenotype,
  type ResolvedGenotype,
  UNKNOWN_GENOTYPE,
  type UnknownGenotype,
} from "../types";

const COMPLEMENTS: Readonly<Record<string, string>> = {
  A: "T",
  T: "A",
  C: "G",
  G: "C",
  N: "N",
  "-": "-",
  a: "t",
  t: "a",
  c: "g",
  g: "c",
  n: "n",
};

const ALLELES: ReadonlySet<string> = new Set<Allele>(["A", "C", "G", "T", "N", "-"]);

const GENOTYPE_DELIMITERS = /[/|]/g;

/**
 * Check whether a string is a single uppercase allele
 */
export function isAllele(value: string): value is Allele {
  return ALLELES.has(value);
}

/**
 * Watson-Crick complement of one allele character
 *
 * Case is preserved; characters outside the allele alphabet come back as-is.
 *
 * @example
 * ```typescript
 * complement("A"); // "T"
 * complement("g"); // "c"
 * complement("-"); // "-"
 * ```
 */
export function complement(base: Allele): Allele;
export function complement(base: string): string;
export function complement(base: string): string {
  return COMPLEMENTS[base] ?? base;
}

/**
 * Parse a raw genotype token into canonical form
 *
 * @throws {InvalidGenotypeError} When the token is not one or two alleles
 *
 * @example
 * ```typescript
 * parseRawGenotype("ag");  // "A/G"
 * parseRawGenotype("C|T"); // "C/T"
 * parseRawGenotype("T");   // "T/T"
 * parseRawGenotype("--");  // "-/-"
 * ```
 */
export function parseRawGenotype(token: string): CanonicalGenotype {
  const parsed = tryParseRawGenotype(token);
  if (parsed === undefined) {
    throw new InvalidGenotypeError(`Invalid genotype token: "${token}"`, token);
  }
  return parsed;
}

/**
 * Parse a raw genotype token, returning `undefined` for invalid tokens
 */
export function tryParseRawGenotype(token: string): CanonicalGenotype | undefined {
  const bases = token.trim().replace(GENOTYPE_DELIMITERS, "").toUpperCase();
  if (bases.length < 1 || bases.length > 2) {
    return undefined;
  }

  const first = bases.charAt(0);
  const second = bases.length === 2 ? bases.charAt(1) : first;
  if (!isAllele(first) || !isAllele(second)) {
    return undefined;
  }
  return formatGenotype(first, second);
}

/**
 * Join two alleles into a canonical genotype
 */
export function formatGenotype(first: Allele, second: Allele): CanonicalGenotype {
  return `${first}/${second}`;
}

/**
 * Split a canonical genotype into its two alleles
 */
export function splitGenotype(genotype: CanonicalGenotype): readonly [Allele, Allele] {
  const first = genotype.charAt(0);
  const second = genotype.charAt(2);
  if (!isAllele(first) || !isAllele(second)) {
    throw new InvalidGenotypeError(`Malformed genotype: "${genotype}"`, genotype);
  }
  return [first, second];
}

/**
 * Same alleles in the opposite order
 */
export function reverseGenotype(genotype: CanonicalGenotype): CanonicalGenotype {
  const [first, second] = splitGenotype(genotype);
  return formatGenotype(second, first);
}

/**
 * Genotype read off the opposite strand, allele order kept
 */
export function complementGenotype(genotype: CanonicalGenotype): CanonicalGenotype {
  const [first, second] = splitGenotype(genotype);
  return formatGenotype(complement(first), complement(second));
}

export function isUnknownGenotype(genotype: ResolvedGenotype): genotype is UnknownGenotype {
  return genotype === UNKNOWN_GENOTYPE;
}

/**
 * Check whether a string is already a canonical genotype
 */
export function isCanonicalGenotype(value: string): value is CanonicalGenotype {
  return value.length === 3 && value.charAt(1) === "/" && isAllele(value.charAt(0)) && isAllele(value.charAt(2));
}
