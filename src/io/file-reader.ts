/**
 * File reading and inspection on the Effect platform
 *
 * Effect-returning functions for use inside library programs, each failing
 * with {@link FileError}. Packaged files (`.gz`, `.zip`) can be read through
 * {@link readUnpackedText}, which unwraps them transparently.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import { fromExtension, fromMagicBytes, gunzip, unpackFirstEntry } from "../compression";
import { type CompressionError, FileError } from "../errors";

/**
 * Size and modification time of an existing file
 */
export interface FileMetadata {
  readonly path: string;
  readonly size: number;
  /** Undefined when the platform cannot report a modification time */
  readonly lastModified?: Date;
}

/**
 * Check whether a regular file exists at the path
 */
export function fileExists(path: string): Effect.Effect<boolean, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(path);
    if (!pathExists) return false;

    const info = yield* fs.stat(path);
    return info.type === "File";
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));
}

/**
 * Metadata of a file, or `None` when nothing exists at the path
 */
export function getMetadata(
  path: string
): Effect.Effect<Option.Option<FileMetadata>, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(path))) {
      return Option.none();
    }

    const info = yield* fs.stat(path);
    return Option.some({
      path,
      size: Number(info.size),
      lastModified: Option.getOrUndefined(info.mtime),
    });
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));
}

/**
 * Read a text file
 */
export function readText(path: string): Effect.Effect<string, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(path);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("read", path, error)));
}

/**
 * Read a file as bytes
 */
export function readBytes(path: string): Effect.Effect<Uint8Array, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFile(path);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("read", path, error)));
}

/**
 * Read a text file that may be gzipped or wrapped in a single-entry zip
 *
 * A zip entry that is itself gzipped (`kit_LDNA_V2.csv.gz` inside
 * `kit_LDNA_V2.zip`) is unwrapped as well.
 */
export function readUnpackedText(
  path: string
): Effect.Effect<string, FileError | CompressionError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const format = fromExtension(path);
    if (format === "none") {
      return yield* readText(path);
    }

    const bytes = yield* readBytes(path);
    if (format === "gzip") {
      return new TextDecoder().decode(yield* gunzip(bytes));
    }

    const entry = yield* unpackFirstEntry(bytes, path);
    const nested = fromExtension(entry.name) === "gzip" || fromMagicBytes(entry.data) === "gzip";
    return new TextDecoder().decode(nested ? yield* gunzip(entry.data) : entry.data);
  });
}
