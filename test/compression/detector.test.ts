/**
 * Compression detection from file names
 */

import { describe, expect, test } from "vitest";
import { CompressionDetector, isCompressionSupported } from "../../src/compression";
import { CompressionError } from "../../src/errors";

describe("CompressionDetector.fromExtension", () => {
  test("recognises gzip extensions case-insensitively", () => {
    expect(CompressionDetector.fromExtension("dmel.gff3.gz")).toBe("gzip");
    expect(CompressionDetector.fromExtension("GENES.GTF.GZIP")).toBe("gzip");
    expect(CompressionDetector.fromExtension("C:\\data\\genes.gtf.gz")).toBe("gzip");
  });

  test("treats everything else as uncompressed", () => {
    expect(CompressionDetector.fromExtension("genes.gtf")).toBe("none");
    expect(CompressionDetector.fromExtension("genes.gz.bak")).toBe("none");
  });

  test("rejects an empty path", () => {
    expect(() => CompressionDetector.fromExtension("")).toThrow(CompressionError);
  });
});

describe("isCompressionSupported", () => {
  test("accepts known formats only", () => {
    expect(isCompressionSupported("gzip")).toBe(true);
    expect(isCompressionSupported("none")).toBe(true);
    expect(isCompressionSupported("zstd")).toBe(false);
  });
});
