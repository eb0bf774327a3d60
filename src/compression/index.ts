/**
 * Compression module for annotation files
 *
 * @example Auto-detection and decompression
 * ```typescript
 * import { CompressionDetector, createDecompressor } from "./compression";
 *
 * const format = CompressionDetector.fromExtension("genes.gtf.gz");
 * if (format !== "none") {
 *   const decompressed = createDecompressor(format).wrapStream(compressedStream);
 * }
 * ```
 */

export { CompressionDetector } from "./detector";
export { GzipCompressor, GzipDecompressor } from "./gzip";

import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";
import { GzipDecompressor } from "./gzip";

export type { CompressionFormat, DecompressorOptions } from "../types";
export { CompressionFormatSchema, DecompressorOptionsSchema } from "../types";
export { CompressionError } from "../errors";

/**
 * Factory function to create the decompressor for a format
 *
 * @throws {CompressionError} For uncompressed data
 */
export function createDecompressor(format: CompressionFormat): typeof GzipDecompressor {
  switch (format) {
    case "gzip":
      return GzipDecompressor;
    case "none":
      throw new CompressionError("No decompression needed for uncompressed data", "none", "validate");
  }
}

/**
 * Check whether a compression format name is supported
 */
export function isCompressionSupported(format: string): format is CompressionFormat {
  return format === "gzip" || format === "none";
}
