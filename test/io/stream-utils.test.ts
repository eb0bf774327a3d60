/**
 * Line splitting over byte streams
 */

import { describe, expect, test } from "vitest";
import { BufferError, StreamError } from "../../src/errors";
import { processBuffer, readLines } from "../../src/io/stream-utils";
import { collect, streamOf } from "../utils/fixtures";

describe("processBuffer", () => {
  test("splits on LF and CRLF, keeping the unterminated tail", () => {
    expect(processBuffer("a\nb\r\nc")).toEqual({
      lines: ["a", "b"],
      remainder: "c",
      totalLines: 2,
      isComplete: false,
    });
  });

  test("splits on bare CR", () => {
    expect(processBuffer("a\rb\n").lines).toEqual(["a", "b"]);
  });

  test("keeps a CR at the end for the next chunk", () => {
    const result = processBuffer("a\r");
    expect(result.lines).toEqual([]);
    expect(result.remainder).toBe("a\r");
  });

  test("rejects overlong lines", () => {
    expect(() => processBuffer(`${"x".repeat(1_000_001)}\n`)).toThrow(BufferError);
  });
});

describe("readLines", () => {
  test("joins lines split across chunks", async () => {
    const lines = await collect(readLines(streamOf(["chr1\tsr", "c\n#c\r", "\nlast"])));
    expect(lines).toEqual(["chr1\tsrc", "#c", "last"]);
  });

  test("drops a blank unterminated tail and a final CR", async () => {
    expect(await collect(readLines(streamOf(["a\n   "])))).toEqual(["a"]);
    expect(await collect(readLines(streamOf(["a\nb\r"])))).toEqual(["a", "b"]);
  });

  test("decodes multi-byte characters split across chunks", async () => {
    const bytes = new TextEncoder().encode("Note=café\n");
    const lines = await collect(readLines(streamOf([bytes.slice(0, 9), bytes.slice(9)])));
    expect(lines).toEqual(["Note=café"]);
  });

  test("decodes binary encoding as latin-1", async () => {
    const lines = await collect(readLines(streamOf([new Uint8Array([0x41, 0xe9, 0x0a])]), "binary"));
    expect(lines).toEqual(["Aé"]);
  });

  test("wraps stream failures", async () => {
    const failing = new ReadableStream<Uint8Array>({
      start(controller): void {
        controller.error(new Error("boom"));
      },
    });

    const error = await collect(readLines(failing)).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(StreamError);
    expect(error).toMatchObject({ message: "Line reading failed: boom", streamType: "read" });
  });
});
