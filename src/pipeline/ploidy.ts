/**
 * Default ploidy specification for `bcftools call`
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { FileError } from "../errors";
import { fileExists } from "../io/file-reader";
import { writeText } from "../io/file-writer";

/**
 * Every chromosome diploid, for either sex
 */
export const DEFAULT_PLOIDY = "* * * F 2\n* * * M 2\n";

/**
 * Write the default ploidy file when none exists
 *
 * @returns Whether a file was written
 */
export function ensurePloidyFile(path: string): Effect.Effect<boolean, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    if (yield* fileExists(path)) {
      return false;
    }
    yield* writeText(path, DEFAULT_PLOIDY);
    yield* Effect.logWarning(`Ploidy file not found, wrote a diploid default to ${path}`);
    return true;
  });
}
