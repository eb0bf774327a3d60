/**
 * Compression format detection for annotation files
 */

import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

/**
 * Detects the compression format of a file from its name
 *
 * @example
 * ```typescript
 * CompressionDetector.fromExtension("dmel.gff3.gz"); // "gzip"
 * CompressionDetector.fromExtension("gencode.gtf"); // "none"
 * ```
 */
export const CompressionDetector = {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  },
} as const;
