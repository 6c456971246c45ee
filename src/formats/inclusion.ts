/**
 * Row inclusion rules per consumer format
 *
 * A format's identifier list, `<referenceDir>/<format>_snps.txt` with one
 * identifier per line, decides exactly which rows it carries. Without one,
 * a fixed share of `rs` identifiers is admitted by hash bucket. That is an
 * approximation of the real chip content, but a deterministic one: the same
 * table always yields the same rows.
 */

import { join } from "node:path";
import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { FileError } from "../errors";
import { fileExists, readText } from "../io/file-reader";
import { admissionBuckets } from "./microarray-formats";

export type InclusionRule =
  | { readonly kind: "list"; readonly source: string; readonly identifiers: ReadonlySet<string> }
  | { readonly kind: "fallback"; readonly buckets: number };

const RS_IDENTIFIER = /^rs\d+/;

/**
 * 32-bit string hash, `hash * 31 + char` from a seed of 5381
 *
 * @example
 * ```typescript
 * hashString("ATCG") // 676518492
 * ```
 */
export function hashString(str: string): number {
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = ((hash << 5) - hash + char) | 0;
  }
  return Math.abs(hash);
}

export function identifierListPath(referenceDir: string, format: string): string {
  return join(referenceDir, `${format}_snps.txt`);
}

/**
 * Load the inclusion rule for a format
 */
export function loadInclusionRule(
  referenceDir: string,
  format: string
): Effect.Effect<InclusionRule, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const listPath = identifierListPath(referenceDir, format);

    if (yield* fileExists(listPath)) {
      const identifiers = new Set(
        (yield* readText(listPath))
          .split("\n")
          .map((line) => line.trim())
          .filter((line) => line !== "")
      );
      yield* Effect.logInfo(`Using ${identifiers.size} identifiers from ${listPath}`);
      const rule: InclusionRule = { kind: "list", source: listPath, identifiers };
      return rule;
    }

    const buckets = admissionBuckets(format);
    yield* Effect.logWarning(
      `No identifier list at ${listPath}; approximating ${format} with ${buckets}/10 of rs identifiers`
    );
    const rule: InclusionRule = { kind: "fallback", buckets };
    return rule;
  });
}

export function includes(rule: InclusionRule, identifier: string): boolean {
  if (rule.kind === "list") {
    return rule.identifiers.has(identifier);
  }
  return RS_IDENTIFIER.test(identifier) && hashString(identifier) % 10 < rule.buckets;
}
