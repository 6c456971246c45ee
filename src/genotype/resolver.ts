/**
 * Genotype resolution against variant data sources
 *
 * A resolver answers "what genotype does this sample carry at this variant?"
 * for one catalog entry. Variants the source does not know are reported as
 * the reference call `0/0` with the `Unknown/Unknown` sentinel, never as an
 * error; only failures of the underlying query fail the effect.
 */

import { Effect, Option } from "effect";
import type { AllelicError } from "../errors";
import {
  type Allele,
  type Resolution,
  UNKNOWN_GENOTYPE,
  type VariantCoordinate,
  type VariantRecord,
} from "../types";
import { formatGenotype, isAllele, tryParseRawGenotype } from "./alleles";
import { alternateChromosomeName } from "./chromosomes";

// =============================================================================
// CONTRACTS
// =============================================================================

/**
 * Resolves the sample's genotype for one catalog entry
 */
export interface GenotypeResolver {
  /**
   * Whether lookups are independent external queries worth running in
   * parallel. In-memory sources answer synchronously and report `false`.
   */
  readonly concurrent: boolean;

  resolve(coordinate: VariantCoordinate, identifier: string): Effect.Effect<Resolution, AllelicError>;
}

/**
 * Structured (VCF/BCF) records, looked up by identifier or coordinate
 */
export interface VariantRecordSource {
  readonly concurrent: boolean;
  findByIdentifier(identifier: string): Effect.Effect<Option.Option<VariantRecord>, AllelicError>;
  findByCoordinate(coordinate: VariantCoordinate): Effect.Effect<Option.Option<VariantRecord>, AllelicError>;
}

/**
 * Flat identifier → raw genotype token table
 */
export interface GenotypeTable {
  readonly size: number;
  lookup(identifier: string): string | undefined;
}

const NOT_FOUND: Resolution = { callCode: "0/0", genotype: UNKNOWN_GENOTYPE };

// =============================================================================
// STRUCTURED SOURCES
// =============================================================================

const MISSING_CALLS: ReadonlySet<string> = new Set(["", ".", "./.", ".|.", "./"]);

function singleBase(value: string | undefined): Allele | undefined {
  const upper = value?.toUpperCase();
  return upper !== undefined && isAllele(upper) ? upper : undefined;
}

/**
 * Map a record's GT call onto a canonical genotype
 *
 * @example
 * ```typescript
 * // REF=C, ALT=T
 * resolveRecord({ ...record, call: "0/1" }); // { callCode: "0/1", genotype: "C/T" }
 * resolveRecord({ ...record, call: "1|1" }); // { callCode: "1|1", genotype: "T/T" }
 * resolveRecord({ ...record, call: "./." }); // { callCode: "0/0", genotype: "C/C" }
 * ```
 */
export function resolveRecord(record: VariantRecord): Resolution {
  const call = record.call.trim();
  const reference = singleBase(record.reference);

  if (MISSING_CALLS.has(call)) {
    return {
      callCode: "0/0",
      genotype: reference !== undefined ? formatGenotype(reference, reference) : UNKNOWN_GENOTYPE,
    };
  }

  const unknown: Resolution = { callCode: call, genotype: UNKNOWN_GENOTYPE };

  const indices = call.split(/[/|]/);
  if (indices.length > 2 || !indices.every((index) => /^[0-9]+$/.test(index))) {
    return unknown;
  }

  const numeric = indices.map(Number).sort((a, b) => a - b);

  // Only reference calls are interpreted at multi-allelic sites
  if (record.alternates.length > 1 && numeric.some((index) => index !== 0)) {
    return unknown;
  }

  const alleles = [record.reference, ...record.alternates];
  const bases = numeric.map((index) => singleBase(alleles[index]));

  const first = bases[0];
  const second = bases.length === 2 ? bases[1] : first;
  if (first === undefined || second === undefined) {
    return unknown;
  }

  return { callCode: call, genotype: formatGenotype(first, second) };
}

/**
 * Resolver over a structured variant source
 *
 * Looks the variant up by identifier first; records without an identifier
 * are found by coordinate, trying both chromosome naming conventions.
 */
export class StructuredGenotypeResolver implements GenotypeResolver {
  constructor(private readonly source: VariantRecordSource) {}

  get concurrent(): boolean {
    return this.source.concurrent;
  }

  resolve(coordinate: VariantCoordinate, identifier: string): Effect.Effect<Resolution, AllelicError> {
    const source = this.source;
    return Effect.gen(function* () {
      let record = yield* source.findByIdentifier(identifier);

      if (Option.isNone(record)) {
        record = yield* source.findByCoordinate(coordinate);
      }
      if (Option.isNone(record)) {
        record = yield* source.findByCoordinate({
          chromosome: alternateChromosomeName(coordinate.chromosome),
          position: coordinate.position,
        });
      }

      return Option.match(record, {
        onNone: () => NOT_FOUND,
        onSome: resolveRecord,
      });
    });
  }
}

// =============================================================================
// FLAT TABLES
// =============================================================================

/**
 * Resolver over a flat genotype table; identifier lookup only
 */
export class FlatTableGenotypeResolver implements GenotypeResolver {
  readonly concurrent = false;

  constructor(private readonly table: GenotypeTable) {}

  resolve(_coordinate: VariantCoordinate, identifier: string): Effect.Effect<Resolution, AllelicError> {
    const token = this.table.lookup(identifier);
    const genotype = token !== undefined ? tryParseRawGenotype(token) : undefined;
    return Effect.succeed(genotype !== undefined ? { callCode: genotype, genotype } : NOT_FOUND);
  }
}
