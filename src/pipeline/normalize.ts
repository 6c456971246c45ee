/**
 * Normalization of extracted calls into combined-table rows
 *
 * `bcftools query` prints `ID CHROM POS TGT` per site. Rows are brought to
 * the consumer microarray conventions: bare chromosome names with `MT` for
 * the mitochondrion, undelimited genotypes (`AG`), `--` for no-calls and
 * heterozygous bases in alphabetical order. Rows are then sorted by
 * chromosome in natural order and by position.
 */

import { compareVersion, normalizeChromosome } from "../genotype/chromosomes";

export interface TableRow {
  readonly identifier: string;
  readonly chromosome: string;
  readonly position: number;
  readonly genotype: string;
}

export const COMBINED_TABLE_HEADER = "# rsid\tchromosome\tposition\tgenotype";

const SINGLE_ALLELE = /^[ACGTN.-]$/i;

/**
 * Normalize a `%TGT` genotype
 *
 * @example
 * ```typescript
 * normalizeCallGenotype("G/A"); // "AG"
 * normalizeCallGenotype("T|T"); // "TT"
 * normalizeCallGenotype("./."); // "--"
 * ```
 */
export function normalizeCallGenotype(genotype: string): string {
  const alleles = genotype.trim().split(/[/|]/);
  if (!alleles.every((allele) => SINGLE_ALLELE.test(allele))) {
    return alleles.join("");
  }

  return alleles
    .map((allele) => (allele === "." ? "-" : allele.toUpperCase()))
    .sort()
    .join("");
}

/**
 * Parse one line of `bcftools query` output
 */
export function parseExtractedLine(line: string): TableRow | undefined {
  const [identifier, chromosome, position, genotype] = line.replace(/\r$/, "").split("\t");
  if (identifier === undefined || chromosome === undefined || genotype === undefined) {
    return undefined;
  }

  const coordinate = Number(position);
  if (!Number.isInteger(coordinate)) {
    return undefined;
  }

  return {
    identifier,
    chromosome: normalizeChromosome(chromosome),
    position: coordinate,
    genotype: normalizeCallGenotype(genotype),
  };
}

export function compareRows(a: TableRow, b: TableRow): number {
  return compareVersion(a.chromosome, b.chromosome) || a.position - b.position;
}

/**
 * Normalize and sort the whole extract
 */
export function normalizeExtract(text: string): TableRow[] {
  const rows: TableRow[] = [];
  for (const line of text.split("\n")) {
    const row = parseExtractedLine(line);
    if (row !== undefined) {
      rows.push(row);
    }
  }
  return rows.sort(compareRows);
}

export function formatRow(row: TableRow): string {
  return `${row.identifier}\t${row.chromosome}\t${row.position}\t${row.genotype}`;
}
