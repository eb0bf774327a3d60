/**
 * Shared type definitions for file I/O and compression
 *
 * Option objects are described twice: as TypeScript interfaces for callers and
 * as ArkType schemas that validate them at runtime.
 */

import { type } from "arktype";

// =============================================================================
// FILE I/O TYPES
// =============================================================================

/**
 * Text encodings understood by the line reader
 */
export type TextEncoding = "utf8" | "binary";

/**
 * Compression formats the reader can decode transparently
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Options for opening a file as a byte stream
 */
export interface FileReaderOptions {
  /** Bytes requested per read from the file system */
  readonly bufferSize?: number;
  /** Text encoding used when splitting the stream into lines */
  readonly encoding?: TextEncoding;
  /** Decompress based on the file extension (default: true) */
  readonly autoDecompress?: boolean;
  /** Force a compression format instead of detecting it from the extension */
  readonly compressionFormat?: CompressionFormat;
}

/**
 * Options for the gzip transform stream
 */
export interface DecompressorOptions {
  /** Stop with an error once this many decompressed bytes were produced */
  readonly maxOutputSize?: number;
  /** Abort decompression */
  readonly signal?: AbortSignal;
}

/**
 * Options for writing a file
 */
export interface WriteOptions {
  /** Gzip-compress when the path ends in `.gz` or `.gzip` (default: true) */
  readonly autoCompress?: boolean;
  /** Gzip level 0-9 (default: 6) */
  readonly compressionLevel?: number;
}

/**
 * Result of splitting a decoded text buffer into lines
 */
export interface LineProcessingResult {
  readonly lines: string[];
  readonly remainder: string;
  readonly totalLines: number;
  readonly isComplete: boolean;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * File path validation schema
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject("a path without null characters");
  }
  if (/[<>"|*?]/.test(path)) {
    return ctx.reject("a path without <>\"|*? characters");
  }
  return true;
});

/**
 * Compression format validation schema
 */
export const CompressionFormatSchema = type('"gzip"|"none"');

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "1024<=number<=1048576",
  "encoding?": '"utf8"|"binary"',
  "autoDecompress?": "boolean",
  "compressionFormat?": CompressionFormatSchema,
});

/**
 * Decompressor options validation schema
 */
export const DecompressorOptionsSchema = type({
  "maxOutputSize?": "number>0",
  "signal?": "unknown",
});

/**
 * Write options validation schema
 */
export const WriteOptionsSchema = type({
  "autoCompress?": "boolean",
  "compressionLevel?": "0<=number.integer<=9",
});
