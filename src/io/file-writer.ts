/**
 * File writing on the Effect platform
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";

/**
 * Write string to file (overwrites if exists, creates if not)
 */
export function writeText(
  path: string,
  content: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(path, content);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));
}

/**
 * Write binary data to file (overwrites if exists, creates if not)
 */
export function writeBytes(
  path: string,
  content: Uint8Array
): Effect.Effect<void, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFile(path, content);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));
}

/**
 * Create a directory and any missing parents
 */
export function ensureDirectory(path: string): Effect.Effect<void, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.makeDirectory(path, { recursive: true });
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));
}

/**
 * Remove a file if it exists
 *
 * @returns Whether a file was removed
 */
export function removeFile(path: string): Effect.Effect<boolean, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(path))) {
      return false;
    }
    yield* fs.remove(path);
    return true;
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("remove", path, error)));
}

/**
 * Set a file's access and modification times
 */
export function setModifiedTime(
  path: string,
  modified: Date
): Effect.Effect<void, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.utimes(path, modified, modified);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));
}
