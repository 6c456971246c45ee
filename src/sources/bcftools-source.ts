/**
 * Variant record source backed by `bcftools view` queries
 *
 * Used for compressed VCF and BCF files, which are queried per variant rather
 * than loaded. Each lookup is an independent process, so report sections can
 * run in parallel against this source.
 */

import { Effect, Option } from "effect";
import type { AllelicError } from "../errors";
import type { VariantRecordSource } from "../genotype/resolver";
import type { ToolRunnerShape } from "../pipeline/tool-runner";
import type { VariantCoordinate, VariantRecord } from "../types";
import { firstRecord } from "./vcf-record";

const IDENTIFIER_PATTERN = /^[A-Za-z0-9_.:-]+$/;
const CHROMOSOME_PATTERN = /^[A-Za-z0-9_.-]+$/;

export class BcftoolsRecordSource implements VariantRecordSource {
  readonly concurrent = true;

  constructor(
    private readonly runner: ToolRunnerShape,
    readonly variantPath: string,
    private readonly bcftools = "bcftools"
  ) {}

  findByIdentifier(identifier: string): Effect.Effect<Option.Option<VariantRecord>, AllelicError> {
    // Identifiers become part of a filter expression
    if (!IDENTIFIER_PATTERN.test(identifier)) {
      return Effect.succeed(Option.none());
    }
    return this.query(["-i", `ID=="${identifier}"`], "lookup-id");
  }

  findByCoordinate(coordinate: VariantCoordinate): Effect.Effect<Option.Option<VariantRecord>, AllelicError> {
    if (!CHROMOSOME_PATTERN.test(coordinate.chromosome)) {
      return Effect.succeed(Option.none());
    }
    return this.query(["-r", `${coordinate.chromosome}:${coordinate.position}`], "lookup-region");
  }

  private query(
    selection: readonly string[],
    label: string
  ): Effect.Effect<Option.Option<VariantRecord>, AllelicError> {
    return this.runner
      .run({ tool: this.bcftools, args: ["view", "-H", ...selection, this.variantPath], label })
      .pipe(Effect.map(({ stdout }) => Option.fromNullable(firstRecord(stdout))));
  }
}
