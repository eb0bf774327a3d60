/**
 * Gzip support
 *
 * Wraps fflate's incremental `Gunzip` in a web `TransformStream`, so a
 * compressed file stream can be piped straight into the line reader, and
 * compresses whole buffers for the file writer.
 */

import { type } from "arktype";
import { Gunzip, gzipSync } from "fflate";
import { CompressionError } from "../errors";
import type { DecompressorOptions } from "../types";
import { DecompressorOptionsSchema } from "../types";

const DEFAULT_MAX_OUTPUT_SIZE = 10_737_418_240; // 10GB

function validateOptions(options: DecompressorOptions): void {
  const result = DecompressorOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new CompressionError(`Invalid decompressor options: ${result.summary}`, "gzip", "validate");
  }
}

/**
 * Create gzip decompression transform stream
 *
 * @throws {CompressionError} If the options are invalid
 *
 * @example
 * ```typescript
 * const lines = readLines(compressed.pipeThrough(createStream()));
 * ```
 */
export function createStream(
  options: DecompressorOptions = {}
): TransformStream<Uint8Array, Uint8Array> {
  validateOptions(options);

  const maxOutputSize = options.maxOutputSize ?? DEFAULT_MAX_OUTPUT_SIZE;
  const gunzip = new Gunzip();
  let bytesProcessed = 0;
  let bytesProduced = 0;

  const push = (
    chunk: Uint8Array,
    final: boolean,
    controller: { error(reason: unknown): void }
  ): void => {
    if (options.signal?.aborted === true) {
      controller.error(new CompressionError("Decompression aborted", "gzip", "stream", bytesProcessed));
      return;
    }
    try {
      gunzip.push(chunk, final);
    } catch (err) {
      controller.error(CompressionError.fromSystemError("gzip", "stream", err, bytesProcessed));
    }
  };

  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller): void {
      gunzip.ondata = (data: Uint8Array): void => {
        bytesProduced += data.length;
        if (bytesProduced > maxOutputSize) {
          throw new CompressionError(
            `Decompressed size exceeds maximum ${maxOutputSize}`,
            "gzip",
            "stream",
            bytesProcessed
          );
        }
        controller.enqueue(data);
      };
    },
    transform(chunk, controller): void {
      bytesProcessed += chunk.length;
      push(chunk, false, controller);
    },
    flush(controller): void {
      push(new Uint8Array(0), true, controller);
    },
  });
}

/**
 * Wrap compressed readable stream with gzip decompression
 */
export function wrapStream(
  input: ReadableStream<Uint8Array>,
  options: DecompressorOptions = {}
): ReadableStream<Uint8Array> {
  return input.pipeThrough(createStream(options));
}

/**
 * Gzip-compress a whole buffer
 *
 * @throws {CompressionError} If the level is outside 0-9 or fflate fails
 */
export function compress(data: Uint8Array, level = 6): Uint8Array {
  if (!Number.isInteger(level) || level < 0 || level > 9) {
    throw new CompressionError(`Invalid gzip compression level: ${level}`, "gzip", "validate");
  }
  try {
    return gzipSync(data, { level: toDeflateLevel(level) });
  } catch (err) {
    throw CompressionError.fromSystemError("gzip", "compress", err, data.length);
  }
}

type DeflateLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

const DEFLATE_LEVELS: readonly DeflateLevel[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

function toDeflateLevel(level: number): DeflateLevel {
  return DEFLATE_LEVELS[level] ?? 6;
}

export const GzipDecompressor = {
  createStream,
  wrapStream,
} as const;

export const GzipCompressor = {
  compress,
} as const;
