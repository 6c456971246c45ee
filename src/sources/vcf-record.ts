/**
 * VCF data line parsing
 *
 * Only the columns genotype resolution reads are kept: position, ID,
 * REF/ALT and the first sample's GT field.
 */

import type { VariantRecord } from "../types";

const CHROM = 0;
const POS = 1;
const ID = 2;
const REF = 3;
const ALT = 4;
const FORMAT = 8;
const FIRST_SAMPLE = 9;

/**
 * Parse one VCF data line
 *
 * @returns The record, or `undefined` for header, blank or malformed lines
 *
 * @example
 * ```typescript
 * parseVcfLine("1\t11856378\trs1801133\tG\tA\t50\tPASS\t.\tGT:DP\t0/1:31");
 * // { chromosome: "1", position: 11856378, identifier: "rs1801133",
 * //   reference: "G", alternates: ["A"], call: "0/1" }
 * ```
 */
export function parseVcfLine(line: string): VariantRecord | undefined {
  const trimmed = line.replace(/\r?\n$/, "");
  if (trimmed === "" || trimmed.startsWith("#")) {
    return undefined;
  }

  const columns = trimmed.split("\t");
  const chromosome = columns[CHROM];
  const position = Number(columns[POS]);
  const reference = columns[REF];
  if (chromosome === undefined || reference === undefined || !Number.isInteger(position) || position < 1) {
    return undefined;
  }

  const id = columns[ID];
  const alt = columns[ALT];

  return {
    chromosome,
    position,
    ...(id !== undefined && id !== "." && id !== "" ? { identifier: id } : {}),
    reference,
    alternates: alt === undefined || alt === "." ? [] : alt.split(","),
    call: firstSampleCall(columns),
  };
}

function firstSampleCall(columns: readonly string[]): string {
  const format = columns[FORMAT];
  const sample = columns[FIRST_SAMPLE];
  if (format === undefined || sample === undefined) {
    return "";
  }

  const gtIndex = format.split(":").indexOf("GT");
  if (gtIndex === -1) {
    return "";
  }
  return sample.split(":")[gtIndex] ?? "";
}

/**
 * First data record in a block of VCF text
 */
export function firstRecord(text: string): VariantRecord | undefined {
  for (const line of text.split("\n")) {
    const record = parseVcfLine(line);
    if (record !== undefined) {
      return record;
    }
  }
  return undefined;
}
