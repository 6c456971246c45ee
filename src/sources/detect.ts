/**
 * Choose a variant source strategy for an input file
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { type CompressionError, type FileError, type InvalidTableLayoutError, MissingInputError } from "../errors";
import {
  FlatTableGenotypeResolver,
  type GenotypeResolver,
  StructuredGenotypeResolver,
} from "../genotype/resolver";
import { fromExtension } from "../compression";
import { fileExists, readUnpackedText } from "../io/file-reader";
import { ToolRunner } from "../pipeline/tool-runner";
import { BcftoolsRecordSource } from "./bcftools-source";
import { FlatGenotypeTable } from "./genotype-table";
import { InMemoryRecordSource } from "./in-memory-source";

export type SourceStrategy = "indexed-vcf" | "in-memory-vcf" | "flat-table";

const INDEXED_EXTENSIONS = [".vcf.gz", ".vcf.bgz", ".bcf"];

export interface OpenSourceOptions {
  /** bcftools executable used for indexed sources */
  readonly bcftools?: string;
}

function looksLikeVcf(text: string): boolean {
  const firstLine = text.split("\n", 1)[0] ?? "";
  return firstLine.startsWith("##") || firstLine.startsWith("#CHROM");
}

/**
 * Strategy decided from the file name alone, when the name is conclusive
 */
export function strategyFromName(path: string): SourceStrategy | undefined {
  const lower = path.toLowerCase();
  if (INDEXED_EXTENSIONS.some((extension) => lower.endsWith(extension))) {
    return "indexed-vcf";
  }
  if (lower.endsWith(".vcf")) {
    return "in-memory-vcf";
  }
  return undefined;
}

/**
 * Open a genotype resolver over a VCF/BCF file or a flat genotype table
 *
 * Compressed VCF and BCF are queried through bcftools; plain VCF is loaded
 * into memory. Other files are sniffed: a first line starting with `##` or
 * `#CHROM` marks a VCF, anything else is read as a flat table.
 */
export function openVariantSource(
  path: string,
  options: OpenSourceOptions = {}
): Effect.Effect<
  GenotypeResolver,
  MissingInputError | FileError | CompressionError | InvalidTableLayoutError,
  FileSystem.FileSystem | ToolRunner
> {
  return Effect.gen(function* () {
    if (!(yield* fileExists(path))) {
      return yield* Effect.fail(new MissingInputError("Variant source", path));
    }

    const indexed = (): Effect.Effect<GenotypeResolver, never, ToolRunner> =>
      Effect.map(
        ToolRunner,
        (runner) => new StructuredGenotypeResolver(new BcftoolsRecordSource(runner, path, options.bcftools))
      );

    const named = strategyFromName(path);
    if (named === "indexed-vcf") {
      yield* Effect.logDebug(`Querying ${path} through bcftools`);
      return yield* indexed();
    }

    const text = yield* readUnpackedText(path);

    if (named === "in-memory-vcf" || looksLikeVcf(text)) {
      if (fromExtension(path) === "gzip") {
        yield* Effect.logDebug(`Querying ${path} through bcftools`);
        return yield* indexed();
      }
      const source = InMemoryRecordSource.fromText(text);
      yield* Effect.logDebug(`Loaded ${source.size} variant records from ${path}`);
      return new StructuredGenotypeResolver(source);
    }

    const table = yield* FlatGenotypeTable.parse(text, path);
    yield* Effect.logDebug(
      `Loaded ${table.size} genotypes from ${path} (${table.skippedRows} rows skipped)`
    );
    return new FlatTableGenotypeResolver(table);
  });
}
