/**
 * Zip packaging for the combined table and consumer formats
 *
 * Every packaged artifact is a single-entry archive named after the file it
 * wraps, the layout consumer genotype services expect on upload.
 */

import { Effect } from "effect";
import { unzipSync, zipSync } from "fflate";
import { CompressionError } from "../errors";

/**
 * One file inside an archive
 */
export interface ZipEntry {
  readonly name: string;
  readonly data: Uint8Array;
}

/**
 * Package one file into a zip archive
 */
export function packageEntry(entry: ZipEntry): Effect.Effect<Uint8Array, CompressionError> {
  return Effect.try({
    try: () => zipSync({ [entry.name]: entry.data }, { level: 6 }),
    catch: (error) => CompressionError.fromSystemError("zip", "compress", error),
  });
}

/**
 * Read every file entry of a zip archive, in archive order
 */
export function unpackEntries(archive: Uint8Array): Effect.Effect<ZipEntry[], CompressionError> {
  return Effect.try({
    try: () =>
      Object.entries(unzipSync(archive))
        .filter(([name]) => !name.endsWith("/"))
        .map(([name, data]) => ({ name, data })),
    catch: (error) => CompressionError.fromSystemError("zip", "decompress", error),
  });
}

/**
 * Read the first file entry of a single-entry archive
 */
export function unpackFirstEntry(
  archive: Uint8Array,
  archiveName: string
): Effect.Effect<ZipEntry, CompressionError> {
  return unpackEntries(archive).pipe(
    Effect.flatMap((entries) => {
      const first = entries[0];
      return first !== undefined
        ? Effect.succeed(first)
        : Effect.fail(new CompressionError(`Archive ${archiveName} contains no files`, "zip", "decompress"));
    })
  );
}
