/**
 * Packaging infrastructure: zip archives and gzip streams
 */

export { fromExtension, fromMagicBytes, type PackageFormat } from "./detector";
export { compress as gzip, decompress as gunzip, type GzipLevel } from "./gzip";
export { packageEntry, unpackEntries, unpackFirstEntry, type ZipEntry } from "./zip";
