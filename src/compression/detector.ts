/**
 * Packaging format detection from file names
 */

export type PackageFormat = "gzip" | "zip" | "none";

const EXTENSION_FORMATS: ReadonlyArray<readonly [string, PackageFormat]> = [
  [".gz", "gzip"],
  [".bgz", "gzip"],
  [".zip", "zip"],
];

/**
 * Detect the packaging format from a path's extension
 *
 * @example
 * ```typescript
 * fromExtension("kit_LDNA_V2.csv.gz"); // "gzip"
 * fromExtension("kit_CombinedKit.zip"); // "zip"
 * fromExtension("kit_CombinedKit.txt"); // "none"
 * ```
 */
export function fromExtension(filePath: string): PackageFormat {
  const lower = filePath.toLowerCase();
  for (const [extension, format] of EXTENSION_FORMATS) {
    if (lower.endsWith(extension)) {
      return format;
    }
  }
  return "none";
}

/**
 * Detect the packaging format from leading magic bytes
 */
export function fromMagicBytes(data: Uint8Array): PackageFormat {
  if (data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b) {
    return "gzip";
  }
  if (data.length >= 4 && data[0] === 0x50 && data[1] === 0x4b && data[2] === 0x03 && data[3] === 0x04) {
    return "zip";
  }
  return "none";
}
