/**
 * Flat genotype tables: the combined table and consumer microarray formats
 *
 * Vendors disagree on column order, delimiter, quoting and whether the header
 * is commented out. The layout of a file is introspected once, from its
 * header, against {@link TABLE_FIELD_ALIASES}; files without a recognizable
 * header are read with the 23andMe column order.
 *
 * @example
 * ```typescript
 * const table = await loadGenotypeTable("sample_23andMe_V5.txt");
 * table.lookup("rs1801133"); // "AG"
 * ```
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Either } from "effect";
import type { CompressionError, FileError } from "../errors";
import { InvalidTableLayoutError } from "../errors";
import { tryParseRawGenotype } from "../genotype/alleles";
import type { GenotypeTable } from "../genotype/resolver";
import { readUnpackedText } from "../io/file-reader";
import { runWithPlatform } from "../io/runtime";

// =============================================================================
// LAYOUT SCHEMA
// =============================================================================

/**
 * Version of the layout schema below; bump when aliases or rules change
 */
export const TABLE_LAYOUT_VERSION = 1;

export type TableField = "identifier" | "chromosome" | "position" | "genotype" | "allele1" | "allele2";

/**
 * Header spellings recognized per logical field, lowercase
 */
export const TABLE_FIELD_ALIASES: Readonly<Record<TableField, readonly string[]>> = {
  identifier: ["rsid", "rs_id", "rs#", "snp", "snp_id", "snpid", "marker", "id"],
  chromosome: ["chromosome", "chrom", "chr"],
  position: ["position", "pos", "bp", "physical_position"],
  genotype: ["genotype", "result", "call"],
  allele1: ["allele1", "allele_1", "a1"],
  allele2: ["allele2", "allele_2", "a2"],
};

const TABLE_FIELDS: readonly TableField[] = ["identifier", "chromosome", "position", "genotype", "allele1", "allele2"];

export type TableDelimiter = "tab" | "comma" | "whitespace";

export type GenotypeColumns =
  | { readonly kind: "single"; readonly genotype: number }
  | { readonly kind: "pair"; readonly allele1: number; readonly allele2: number };

export interface TableLayout {
  readonly version: number;
  readonly delimiter: TableDelimiter;
  /** Whether the layout came from a header line rather than the default */
  readonly fromHeader: boolean;
  readonly identifier: number;
  readonly chromosome: number;
  readonly position: number;
  readonly genotype: GenotypeColumns;
}

/**
 * 23andMe raw data column order: rsid, chromosome, position, genotype
 */
export const DEFAULT_TABLE_LAYOUT: Omit<TableLayout, "delimiter"> = {
  version: TABLE_LAYOUT_VERSION,
  fromHeader: false,
  identifier: 0,
  chromosome: 1,
  position: 2,
  genotype: { kind: "single", genotype: 3 },
};

// =============================================================================
// INTROSPECTION
// =============================================================================

const SPLITTERS: Record<TableDelimiter, RegExp> = {
  tab: /\t/,
  comma: /,/,
  whitespace: /\s+/,
};

function detectDelimiter(line: string): TableDelimiter {
  if (line.includes("\t")) return "tab";
  if (line.includes(",")) return "comma";
  return "whitespace";
}

function unquote(field: string): string {
  const trimmed = field.trim();
  return trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')
    ? trimmed.slice(1, -1)
    : trimmed;
}

/**
 * Split a table line into unquoted fields
 */
export function splitFields(line: string, delimiter: TableDelimiter): string[] {
  return line.trim().split(SPLITTERS[delimiter]).map(unquote);
}

function fieldFor(header: string): TableField | undefined {
  const name = header.toLowerCase();
  return TABLE_FIELDS.find((field) => TABLE_FIELD_ALIASES[field].includes(name));
}

function mapHeader(fields: readonly string[]): Map<TableField, number> {
  const mapped = new Map<TableField, number>();
  fields.forEach((name, index) => {
    const field = fieldFor(name);
    if (field !== undefined && !mapped.has(field)) {
      mapped.set(field, index);
    }
  });
  return mapped;
}

/**
 * Build a layout from a header line
 *
 * A header that names some but not all required fields is an error rather
 * than a guess.
 */
export function layoutFromHeader(
  headerLine: string,
  tablePath: string
): Either.Either<TableLayout, InvalidTableLayoutError> {
  const delimiter = detectDelimiter(headerLine);
  const mapped = mapHeader(splitFields(headerLine, delimiter));

  const identifier = mapped.get("identifier");
  const chromosome = mapped.get("chromosome");
  const position = mapped.get("position");
  const genotype = mapped.get("genotype");
  const allele1 = mapped.get("allele1");
  const allele2 = mapped.get("allele2");

  const genotypeColumns: GenotypeColumns | undefined =
    genotype !== undefined
      ? { kind: "single", genotype }
      : allele1 !== undefined && allele2 !== undefined
        ? { kind: "pair", allele1, allele2 }
        : undefined;

  if (identifier === undefined || chromosome === undefined || position === undefined || genotypeColumns === undefined) {
    const missing: string[] = [];
    if (identifier === undefined) missing.push("identifier");
    if (chromosome === undefined) missing.push("chromosome");
    if (position === undefined) missing.push("position");
    if (genotypeColumns === undefined) {
      if (allele1 !== undefined) missing.push("allele2");
      else if (allele2 !== undefined) missing.push("allele1");
      else missing.push("genotype");
    }
    return Either.left(
      new InvalidTableLayoutError(
        `Unrecognized genotype table header in ${tablePath}: missing ${missing.join(", ")}`,
        tablePath,
        missing
      )
    );
  }

  return Either.right({
    version: TABLE_LAYOUT_VERSION,
    delimiter,
    fromHeader: true,
    identifier,
    chromosome,
    position,
    genotype: genotypeColumns,
  });
}

const DATA_IDENTIFIER = /^(rs|i)[0-9]+$/i;

function isHeaderCandidate(line: string, commented: boolean): boolean {
  const fields = splitFields(line, detectDelimiter(line));
  const first = fields[0];
  if (first === undefined || DATA_IDENTIFIER.test(first)) {
    return false;
  }
  if (commented) {
    return fieldFor(first) === "identifier";
  }
  return fields.some((field) => fieldFor(field) !== undefined);
}

/**
 * Introspect the layout of a table from its leading lines
 *
 * The header is either the first uncommented line, when it names known
 * fields, or the last `#` comment line before the data, when it starts with
 * an identifier column (`# rsid\tchromosome\tposition\tgenotype`).
 *
 * @returns The layout and the number of leading lines it consumed
 */
export function introspectLayout(
  lines: readonly string[],
  tablePath: string
): Either.Either<{ layout: TableLayout; dataStart: number }, InvalidTableLayoutError> {
  let lastComment: string | undefined;
  let index = 0;

  for (; index < lines.length; index++) {
    const line = lines[index]?.trim() ?? "";
    if (line === "") continue;
    if (!line.startsWith("#")) break;
    lastComment = line.replace(/^#+\s*/, "");
  }

  const firstContent = lines[index]?.trim();

  if (firstContent !== undefined && isHeaderCandidate(firstContent, false)) {
    return Either.map(layoutFromHeader(firstContent, tablePath), (layout) => ({
      layout,
      dataStart: index + 1,
    }));
  }

  if (lastComment !== undefined && isHeaderCandidate(lastComment, true)) {
    const header = lastComment;
    return Either.map(layoutFromHeader(header, tablePath), (layout) => ({
      layout: firstContent !== undefined ? { ...layout, delimiter: detectDelimiter(firstContent) } : layout,
      dataStart: index,
    }));
  }

  return Either.right({
    layout: { ...DEFAULT_TABLE_LAYOUT, delimiter: detectDelimiter(firstContent ?? "") },
    dataStart: index,
  });
}

// =============================================================================
// TABLE
// =============================================================================

/**
 * In-memory identifier → raw genotype token table
 */
export class FlatGenotypeTable implements GenotypeTable {
  private constructor(
    private readonly genotypes: ReadonlyMap<string, string>,
    readonly layout: TableLayout,
    /** Data rows dropped for a missing identifier or invalid genotype */
    readonly skippedRows: number
  ) {}

  /**
   * Parse table text
   *
   * @param tablePath - Used in error messages only
   */
  static parse(
    text: string,
    tablePath = "<memory>"
  ): Either.Either<FlatGenotypeTable, InvalidTableLayoutError> {
    const lines = text.split(/\r?\n/);
    return Either.map(introspectLayout(lines, tablePath), ({ layout, dataStart }) => {
      const genotypes = new Map<string, string>();
      let skipped = 0;

      for (const raw of lines.slice(dataStart)) {
        const line = raw.trim();
        if (line === "" || line.startsWith("#")) continue;

        const fields = splitFields(line, layout.delimiter);
        const identifier = fields[layout.identifier];
        const token =
          layout.genotype.kind === "single"
            ? fields[layout.genotype.genotype]
            : `${fields[layout.genotype.allele1] ?? ""}${fields[layout.genotype.allele2] ?? ""}`;

        if (identifier === undefined || identifier === "" || token === undefined || tryParseRawGenotype(token) === undefined) {
          skipped++;
          continue;
        }
        genotypes.set(identifier, token);
      }

      return new FlatGenotypeTable(genotypes, layout, skipped);
    });
  }

  get size(): number {
    return this.genotypes.size;
  }

  lookup(identifier: string): string | undefined {
    return this.genotypes.get(identifier);
  }
}

/**
 * Read and parse a table file (`.txt`, `.tsv`, `.csv`, optionally `.gz` or
 * `.zip` packaged)
 */
export function readGenotypeTable(
  tablePath: string
): Effect.Effect<FlatGenotypeTable, FileError | CompressionError | InvalidTableLayoutError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const text = yield* readUnpackedText(tablePath);
    const table = yield* FlatGenotypeTable.parse(text, tablePath);

    yield* Effect.logDebug(
      `Loaded ${table.size} genotypes from ${tablePath} (${table.skippedRows} rows skipped)`
    );
    return table;
  });
}

/**
 * Promise wrapper for {@link readGenotypeTable}
 */
export function loadGenotypeTable(tablePath: string): Promise<FlatGenotypeTable> {
  return runWithPlatform(readGenotypeTable(tablePath));
}
