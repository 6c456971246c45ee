/**
 * Make-style freshness checks for pipeline artifacts
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import type { FileError } from "../errors";
import { getMetadata } from "../io/file-reader";

/**
 * Whether an artifact can be reused instead of recomputed
 *
 * Valid when the artifact exists, is strictly newer than its dependency, and
 * is larger than `minSizeBytes`. A missing dependency, or a modification time
 * the platform cannot report, makes the artifact invalid.
 */
export function isArtifactValid(
  artifact: string,
  dependency: string,
  minSizeBytes = 0
): Effect.Effect<boolean, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const artifactInfo = yield* getMetadata(artifact);
    const dependencyInfo = yield* getMetadata(dependency);

    if (Option.isNone(artifactInfo) || Option.isNone(dependencyInfo)) {
      return false;
    }

    const artifactTime = artifactInfo.value.lastModified;
    const dependencyTime = dependencyInfo.value.lastModified;
    if (artifactTime === undefined || dependencyTime === undefined) {
      return false;
    }

    return artifactTime.getTime() > dependencyTime.getTime() && artifactInfo.value.size > minSizeBytes;
  });
}
