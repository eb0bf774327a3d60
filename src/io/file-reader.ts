/**
 * File reading through the Effect platform file system
 *
 * Opens annotation files as web byte streams, decompressing gzip input when the
 * file name asks for it.
 */

import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { CompressionDetector, createDecompressor } from "../compression";
import { FileError } from "../errors";
import type { FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  encoding: "utf8",
  autoDecompress: true,
  compressionFormat: "none", // detected from the extension
};

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If path validation or the stat call fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(NodeContext.layer)));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file
 *
 * @throws {FileError} If the path is invalid, missing, or cannot be opened
 *
 * @example
 * ```typescript
 * const stream = await createStream("dmel-r6.gff.gz");
 * for await (const line of readLines(stream)) {
 *   // ...
 * }
 * ```
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(validatedPath, options);

  if (!(await exists(validatedPath))) {
    throw new FileError("File does not exist or is not accessible", validatedPath, "open");
  }

  try {
    const stream = await createBaseStream(validatedPath, mergedOptions);
    return mergedOptions.autoDecompress
      ? applyDecompression(stream, validatedPath, mergedOptions)
      : stream;
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

async function createBaseStream(
  path: string,
  options: Required<FileReaderOptions>
): Promise<ReadableStream<Uint8Array>> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return Stream.toReadableStream(fs.stream(path, { chunkSize: options.bufferSize }));
  });

  return Effect.runPromise(program.pipe(Effect.provide(NodeContext.layer)));
}

function applyDecompression(
  stream: ReadableStream<Uint8Array>,
  path: string,
  options: Required<FileReaderOptions>
): ReadableStream<Uint8Array> {
  const format =
    options.compressionFormat === "none"
      ? CompressionDetector.fromExtension(path)
      : options.compressionFormat;

  if (format === "none") {
    return stream;
  }
  return createDecompressor(format).wrapStream(stream);
}

function validatePath(path: string): string {
  const result = FilePathSchema(path);
  if (result instanceof type.errors) {
    throw new FileError(`Invalid file path: ${result.summary}`, path, "stat");
  }
  return result;
}

function mergeOptions(path: string, options: FileReaderOptions): Required<FileReaderOptions> {
  const result = FileReaderOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${result.summary}`, path, "open");
  }
  return {
    bufferSize: options.bufferSize ?? DEFAULT_OPTIONS.bufferSize,
    encoding: options.encoding ?? DEFAULT_OPTIONS.encoding,
    autoDecompress: options.autoDecompress ?? DEFAULT_OPTIONS.autoDecompress,
    compressionFormat: options.compressionFormat ?? DEFAULT_OPTIONS.compressionFormat,
  };
}

export const FileReader = {
  exists,
  createStream,
} as const;
