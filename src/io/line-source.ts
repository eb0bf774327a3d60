/**
 * Seekable line sources
 *
 * A {@link LineSource} is read one line at a time and can be repositioned to
 * its first line. Files are "seeked" by reopening their stream, which also
 * restarts gzip decompression from the first byte.
 */

import type { FileReaderOptions } from "../types";
import { createStream } from "./file-reader";
import { processBuffer, readLines } from "./stream-utils";

/**
 * Line reader with explicit repositioning
 */
export interface LineSource {
  /** Human-readable origin, used in error messages */
  readonly name: string;
  /** Next line without its line ending, or `null` at end of input */
  nextLine(): Promise<string | null>;
  /** Reposition to the first line */
  seekStart(): Promise<void>;
  /** Release any open handle */
  close(): Promise<void>;
}

/**
 * Line source backed by a (possibly gzip compressed) file
 */
export class FileLineSource implements LineSource {
  private stream: ReadableStream<Uint8Array> | undefined;
  private lines: AsyncGenerator<string, void, undefined> | undefined;

  constructor(
    readonly name: string,
    private readonly options: FileReaderOptions = {}
  ) {}

  async nextLine(): Promise<string | null> {
    this.lines ??= await this.open();
    const next = await this.lines.next();
    return next.done === true ? null : next.value;
  }

  async seekStart(): Promise<void> {
    await this.close();
  }

  async close(): Promise<void> {
    const { lines, stream } = this;
    this.lines = undefined;
    this.stream = undefined;

    await lines?.return(undefined);
    // an errored stream rejects cancel() with the error nextLine() already raised
    await stream?.cancel().catch(() => undefined);
  }

  private async open(): Promise<AsyncGenerator<string, void, undefined>> {
    const stream = await createStream(this.name, this.options);
    this.stream = stream;
    return readLines(stream, this.options.encoding);
  }
}

/**
 * Line source over text already in memory
 *
 * Splits lines exactly as a file with the same content would be split.
 *
 * @throws {BufferError} If a line exceeds the maximum line length
 */
export class StringLineSource implements LineSource {
  private readonly lines: readonly string[];
  private position = 0;

  constructor(
    text: string,
    readonly name = "<string>"
  ) {
    const { lines, remainder } = processBuffer(text);
    const lastLine = remainder.replace(/\r$/, "");
    this.lines = lastLine.trim() === "" ? lines : [...lines, lastLine];
  }

  async nextLine(): Promise<string | null> {
    const line = this.lines[this.position];
    if (line === undefined) {
      return null;
    }
    this.position++;
    return line;
  }

  async seekStart(): Promise<void> {
    this.position = 0;
  }

  async close(): Promise<void> {
    this.position = this.lines.length;
  }
}
