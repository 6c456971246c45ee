/**
 * Consumer microarray formats the combined table can be fanned out into
 */

import { COMBINED_FORMAT } from "../pipeline/artifacts";

export const AVAILABLE_FORMATS = [
  COMBINED_FORMAT,
  "23andMe_V3",
  "23andMe_V4",
  "23andMe_V5",
  "23andMe_SNPs_API",
  "23andMe_V35",
  "Ancestry_V1",
  "Ancestry_V2",
  "FTDNA_V2",
  "FTDNA_V3",
  "LDNA_V1",
  "LDNA_V2",
  "MyHeritage_V1",
  "MyHeritage_V2",
  "MTHFRGen",
  "Genera",
  "meuDNA",
  "1240K",
  "HOv1",
  "1240+HO",
] as const;

export type MicroarrayFormat = (typeof AVAILABLE_FORMATS)[number];

export type FormatSuffix = "txt" | "csv" | "csv.gz";

export function isMicroarrayFormat(name: string): name is MicroarrayFormat {
  return AVAILABLE_FORMATS.some((format) => format === name);
}

/**
 * File suffix of a format's unpackaged output
 */
export function formatSuffix(format: string): FormatSuffix {
  if (format.includes("FTDNA") || format.includes("MyHeritage")) {
    return "csv";
  }
  if (format.includes("LDNA")) {
    return "csv.gz";
  }
  return "txt";
}

/**
 * Out of ten identifier buckets, how many a format admits when no
 * identifier list is available for it
 */
export function admissionBuckets(format: string): number {
  if (format.startsWith("23andMe")) return 7;
  if (format.startsWith("Ancestry")) return 6;
  if (format.startsWith("FTDNA")) return 5;
  return 4;
}
