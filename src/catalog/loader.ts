/**
 * SNP catalog loading
 *
 * The catalog is a JSON document of named sections, each an ordered list of
 * variants with the genotype considered protective and the one considered a
 * risk. It is validated in full before use; there is no partial catalog.
 *
 * ```json
 * {
 *   "categories": {
 *     "metabolism": [
 *       {
 *         "rs_id": "rs1801133",
 *         "position": "1:11856378",
 *         "ref_genotype": "C/C",
 *         "alt_genotype": "T/T",
 *         "description": "MTHFR C677T"
 *       }
 *     ]
 *   }
 * }
 * ```
 */

import type { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CatalogUnavailableError, describeError } from "../errors";
import { isCanonicalGenotype } from "../genotype/alleles";
import { readText } from "../io/file-reader";
import { runWithPlatform } from "../io/runtime";
import {
  type CanonicalGenotype,
  type Catalog,
  type CatalogEntry,
  type CatalogFileEntry,
  CatalogFileSchema,
  type CatalogSection,
  type VariantCoordinate,
} from "../types";

export const DEFAULT_CATALOG_FILE = "snp_catalog.json";

function parseCoordinate(position: string): VariantCoordinate {
  const separator = position.lastIndexOf(":");
  return {
    chromosome: position.slice(0, separator),
    position: Number(position.slice(separator + 1)),
  };
}

function genotypeField(value: string, field: string, identifier: string, catalogPath: string): CanonicalGenotype {
  if (!isCanonicalGenotype(value)) {
    throw new CatalogUnavailableError(
      `Invalid ${field} "${value}" for ${identifier} in ${catalogPath}`,
      catalogPath
    );
  }
  return value;
}

const INTEGER_KEY = /^(0|[1-9][0-9]*)$/;

function toEntry(raw: CatalogFileEntry, catalogPath: string): CatalogEntry {
  return Object.freeze({
    identifier: raw.rs_id,
    coordinate: Object.freeze(parseCoordinate(raw.position)),
    protective: genotypeField(raw.ref_genotype, "ref_genotype", raw.rs_id, catalogPath),
    risk: genotypeField(raw.alt_genotype, "alt_genotype", raw.rs_id, catalogPath),
    description: raw.description,
  });
}

/**
 * Validate a parsed catalog document
 *
 * @param document - Parsed JSON
 * @param catalogPath - Used in error messages
 * @throws {CatalogUnavailableError} When the document does not match the schema or a section name is an integer
 */
export function parseCatalog(document: unknown, catalogPath = "<memory>"): Catalog {
  const validationResult = CatalogFileSchema(document);
  if (validationResult instanceof type.errors) {
    throw new CatalogUnavailableError(
      `Invalid SNP catalog ${catalogPath}: ${validationResult.summary}`,
      catalogPath
    );
  }

  const sections = new Map<string, CatalogSection>();
  for (const [name, entries] of Object.entries(validationResult.categories)) {
    // JSON objects list integer keys first, so their file order is already lost
    if (INTEGER_KEY.test(name)) {
      throw new CatalogUnavailableError(
        `Invalid SNP catalog ${catalogPath}: section name "${name}" must not be an integer`,
        catalogPath
      );
    }
    sections.set(
      name,
      Object.freeze({
        name,
        entries: Object.freeze(entries.map((raw) => toEntry(raw, catalogPath))),
      })
    );
  }

  return Object.freeze({ sections });
}

/**
 * Read, parse and validate a catalog file
 */
export function readCatalog(
  catalogPath: string
): Effect.Effect<Catalog, CatalogUnavailableError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const text = yield* readText(catalogPath).pipe(
      Effect.mapError(
        (error) =>
          new CatalogUnavailableError(`Cannot read SNP catalog ${catalogPath}`, catalogPath, error.message)
      )
    );

    const catalog = yield* Effect.try({
      try: () => parseCatalog(JSON.parse(text), catalogPath),
      catch: (error) =>
        error instanceof CatalogUnavailableError
          ? error
          : new CatalogUnavailableError(
              `Malformed SNP catalog ${catalogPath}: ${describeError(error)}`,
              catalogPath
            ),
    });

    yield* Effect.logDebug(`Loaded SNP catalog with ${catalog.sections.size} sections from ${catalogPath}`);
    return catalog;
  });
}

/**
 * Load a catalog file
 *
 * @throws {CatalogUnavailableError} On any read, JSON or validation failure
 */
export function loadCatalog(catalogPath: string): Promise<Catalog> {
  return runWithPlatform(readCatalog(catalogPath), { logLevel: "none" });
}

/**
 * Section names in catalog order
 */
export function sectionNames(catalog: Catalog): string[] {
  return [...catalog.sections.keys()];
}
