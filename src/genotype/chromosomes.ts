/**
 * Chromosome naming and ordering
 */

/**
 * Chromosome name with any `chr` prefix removed and the mitochondrion as `MT`
 *
 * @example
 * ```typescript
 * normalizeChromosome("chr7"); // "7"
 * normalizeChromosome("chrM"); // "MT"
 * normalizeChromosome("X");    // "X"
 * ```
 */
export function normalizeChromosome(chromosome: string): string {
  const bare = chromosome.replace(/^chr/i, "");
  return bare === "M" ? "MT" : bare;
}

/**
 * The same chromosome under the other naming convention (`1` ↔ `chr1`,
 * `MT` ↔ `chrM`)
 */
export function alternateChromosomeName(chromosome: string): string {
  if (chromosome.startsWith("chr")) {
    return normalizeChromosome(chromosome);
  }
  return `chr${chromosome === "MT" ? "M" : chromosome}`;
}

const VERSION_TOKENS = /\d+|\D+/g;

/**
 * Natural ("version") order: digit runs compare numerically and sort before
 * letters, so `2` < `10` < `MT` < `X` < `Y`
 */
export function compareVersion(a: string, b: string): number {
  const left = a.match(VERSION_TOKENS) ?? [];
  const right = b.match(VERSION_TOKENS) ?? [];

  for (let i = 0; i < Math.min(left.length, right.length); i++) {
    const l = left[i] ?? "";
    const r = right[i] ?? "";
    if (l === r) continue;

    const lNumeric = /^\d/.test(l);
    const rNumeric = /^\d/.test(r);
    if (lNumeric && rNumeric) {
      const difference = Number(l) - Number(r);
      if (difference !== 0) return difference;
      return l.length - r.length;
    }
    if (lNumeric !== rNumeric) {
      return lNumeric ? -1 : 1;
    }
    return l < r ? -1 : 1;
  }
  return left.length - right.length;
}
