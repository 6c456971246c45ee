/**
 * Variant record source over VCF text held in memory
 */

import { Effect, Option } from "effect";
import { normalizeChromosome } from "../genotype/chromosomes";
import type { VariantRecordSource } from "../genotype/resolver";
import type { VariantCoordinate, VariantRecord } from "../types";
import { parseVcfLine } from "./vcf-record";

function coordinateKey(chromosome: string, position: number): string {
  return `${normalizeChromosome(chromosome)}:${position}`;
}

/**
 * Records of an uncompressed VCF, indexed by identifier and coordinate
 *
 * When several records share a key the first one in file order wins, matching
 * what a `bcftools view` query would print first.
 */
export class InMemoryRecordSource implements VariantRecordSource {
  readonly concurrent = false;

  private readonly byIdentifier = new Map<string, VariantRecord>();
  private readonly byCoordinate = new Map<string, VariantRecord>();

  constructor(records: Iterable<VariantRecord>) {
    for (const record of records) {
      if (record.identifier !== undefined && !this.byIdentifier.has(record.identifier)) {
        this.byIdentifier.set(record.identifier, record);
      }
      const key = coordinateKey(record.chromosome, record.position);
      if (!this.byCoordinate.has(key)) {
        this.byCoordinate.set(key, record);
      }
    }
  }

  /**
   * Build a source from the full text of a VCF
   */
  static fromText(text: string): InMemoryRecordSource {
    const records: VariantRecord[] = [];
    for (const line of text.split("\n")) {
      const record = parseVcfLine(line);
      if (record !== undefined) {
        records.push(record);
      }
    }
    return new InMemoryRecordSource(records);
  }

  get size(): number {
    return this.byCoordinate.size;
  }

  findByIdentifier(identifier: string): Effect.Effect<Option.Option<VariantRecord>> {
    return Effect.succeed(Option.fromNullable(this.byIdentifier.get(identifier)));
  }

  findByCoordinate(coordinate: VariantCoordinate): Effect.Effect<Option.Option<VariantRecord>> {
    return Effect.succeed(
      Option.fromNullable(this.byCoordinate.get(coordinateKey(coordinate.chromosome, coordinate.position)))
    );
  }
}
