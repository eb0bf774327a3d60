/**
 * Stream processing utilities for line-oriented text
 *
 * Turns a byte stream into complete lines regardless of how chunk boundaries
 * fall, with bounds on line and buffer length.
 */

import { BufferError, GffkitError, StreamError } from "../errors";
import type { LineProcessingResult, TextEncoding } from "../types";

const MAX_LINE_LENGTH = 1_000_000; // 1MB max line length
const MAX_BUFFER_SIZE = 10_485_760; // 10MB max buffer

function tooLong(line: string, message: string, context?: string): BufferError {
  return new BufferError(
    `${message}: ${line.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
    line.length,
    "overflow",
    context
  );
}

/**
 * Process text buffer to extract complete lines
 *
 * Handles `\n`, `\r\n` and bare `\r` endings. Text after the last line ending
 * is returned as the remainder for the next chunk.
 *
 * @throws {BufferError} If a single line exceeds the maximum length
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      const lineEnd = position > 0 && buffer[position - 1] === "\r" ? position - 1 : position;
      const line = buffer.slice(lineStart, lineEnd);
      if (line.length > MAX_LINE_LENGTH) {
        throw tooLong(line, "Line too long", `Line starts with: ${line.slice(0, 100)}...`);
      }
      lines.push(line);
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      // classic Mac line ending
      const line = buffer.slice(lineStart, position);
      if (line.length > MAX_LINE_LENGTH) {
        throw tooLong(line, "Line too long");
      }
      lines.push(line);
      lineStart = position + 1;
    }
  }

  const remainder = buffer.slice(lineStart);
  if (remainder.length > MAX_LINE_LENGTH) {
    throw tooLong(
      remainder,
      "Incomplete line too long",
      "This might indicate a file without proper line endings"
    );
  }

  return {
    lines,
    remainder,
    totalLines: lines.length,
    isComplete: remainder.length === 0,
  };
}

/**
 * Convert ReadableStream<Uint8Array> to an async sequence of lines
 *
 * A trailing line without a line ending is yielded unless it is blank.
 *
 * @throws {StreamError} If reading the stream fails; library errors raised
 * upstream (such as a CompressionError) pass through unchanged
 * @throws {BufferError} If a line is too long or the buffer overflows
 *
 * @example
 * ```typescript
 * const stream = await createStream("annotation.gff3.gz");
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith("##FASTA")) break;
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  encoding: TextEncoding = "utf8"
): AsyncGenerator<string, void, undefined> {
  const reader = stream.getReader();
  const decoder = new TextDecoder(encoding === "binary" ? "iso-8859-1" : "utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();

      if (done) {
        buffer += decoder.decode();
        const result = processBuffer(buffer);
        yield* result.lines;
        const lastLine = result.remainder.replace(/\r$/, "");
        if (lastLine.trim() !== "") {
          yield lastLine;
        }
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;

      if (buffer.length > MAX_BUFFER_SIZE) {
        throw new BufferError(
          `Buffer overflow: ${buffer.length} bytes exceeds maximum ${MAX_BUFFER_SIZE}`,
          buffer.length,
          "overflow"
        );
      }
    }
  } catch (error) {
    if (error instanceof GffkitError) {
      throw error;
    }
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    reader.releaseLock();
  }
}

export const StreamUtils = {
  readLines,
  processBuffer,
} as const;
