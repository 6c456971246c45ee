/**
 * Gzip compression for consumer formats that ship as `.gz`
 */

import { Effect } from "effect";
import { gunzipSync, gzipSync } from "fflate";
import { CompressionError } from "../errors";

export type GzipLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/**
 * Gzip a buffer
 */
export function compress(data: Uint8Array, level: GzipLevel = 6): Effect.Effect<Uint8Array, CompressionError> {
  return Effect.try({
    try: () => gzipSync(data, { level }),
    catch: (error) => CompressionError.fromSystemError("gzip", "compress", error),
  });
}

/**
 * Gunzip a buffer
 */
export function decompress(data: Uint8Array): Effect.Effect<Uint8Array, CompressionError> {
  return Effect.try({
    try: () => gunzipSync(data),
    catch: (error) => CompressionError.fromSystemError("gzip", "decompress", error),
  });
}
