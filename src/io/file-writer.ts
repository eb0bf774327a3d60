/**
 * File writing through the Effect platform file system
 *
 * Paths ending in `.gz` or `.gzip` are gzip-compressed unless disabled.
 */

import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector, GzipCompressor } from "../compression";
import { FileError, GffkitError } from "../errors";
import type { WriteOptions } from "../types";
import { FilePathSchema, WriteOptionsSchema } from "../types";

/**
 * Write text to a file, replacing any existing content
 *
 * @throws {FileError} If the path or options are invalid or the write fails
 * @throws {CompressionError} If gzip compression fails
 *
 * @example
 * ```typescript
 * await writeString("filtered.gff3.gz", text); // gzip-compressed
 * await writeString("filtered.gff3.gz", text, { autoCompress: false });
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  const validatedPath = validatePath(path);
  const optionsResult = WriteOptionsSchema(options);
  if (optionsResult instanceof type.errors) {
    throw new FileError(`Invalid write options: ${optionsResult.summary}`, validatedPath, "write");
  }

  const bytes = new TextEncoder().encode(content);
  const compress =
    (options.autoCompress ?? true) && CompressionDetector.fromExtension(validatedPath) === "gzip";
  const data = compress ? GzipCompressor.compress(bytes, options.compressionLevel) : bytes;

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFile(validatedPath, data);
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(NodeContext.layer)));
  } catch (error) {
    if (error instanceof GffkitError) throw error;
    throw FileError.fromSystemError("write", validatedPath, error);
  }
}

function validatePath(path: string): string {
  const result = FilePathSchema(path);
  if (result instanceof type.errors) {
    throw new FileError(`Invalid file path: ${result.summary}`, path, "write");
  }
  return result;
}

export const FileWriter = {
  writeString,
} as const;
