/**
 * Error rendering and remediation hints
 */

import { describe, expect, test } from "vitest";
import {
  CompressionError,
  EmptyFileError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  GffkitError,
  InvalidConfigurationError,
  MalformedAttributeError,
  MalformedRecordError,
  ParseError,
  StreamError,
  UnsupportedComparisonError,
} from "../src/errors";

describe("GffkitError", () => {
  test("renders line number and context", () => {
    const error = new GffkitError("bad thing", "TEST", 7, "chr1\tsrc");
    expect(error.toString()).toBe("GffkitError: bad thing (line 7)\nContext: chr1\tsrc");
  });

  test("omits missing details", () => {
    expect(new UnsupportedComparisonError().toString()).toBe(
      "UnsupportedComparisonError: Features support equality only, not ordering"
    );
  });

  test("subclasses keep their code and hierarchy", () => {
    const error = new MalformedRecordError("Invalid start", "start", 4);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toBeInstanceOf(GffkitError);
    expect(error.code).toBe("MALFORMED_RECORD");
    expect(error.format).toBe("GFF");
    expect(error.toString()).toBe("MalformedRecordError: Invalid start (line 4)");
  });

  test("attribute errors carry the segment", () => {
    const error = new MalformedAttributeError("Bad attribute", "orphan", "GTF", 3);
    expect(error.toString()).toBe("MalformedAttributeError: Bad attribute (line 3)\nContext: Segment: 'orphan'");
  });
});

describe("FileError.fromSystemError", () => {
  test("adds a hint for missing files", () => {
    const error = FileError.fromSystemError("read", "/data/a.gff3", new Error("ENOENT: no such file"));

    expect(error.message).toBe(
      "read operation failed: ENOENT: no such file. Check that the file path is correct and the file exists"
    );
    expect(error.filePath).toBe("/data/a.gff3");
    expect(error.context).toBe("System error: ENOENT: no such file");
  });

  test("passes other messages through", () => {
    expect(FileError.fromSystemError("open", "/x", "disk on fire").message).toBe(
      "open operation failed: disk on fire"
    );
  });
});

describe("CompressionError", () => {
  test("reports bytes processed", () => {
    const error = CompressionError.fromSystemError("gzip", "stream", new Error("invalid gzip data"), 42);

    expect(error.message).toBe(
      "stream operation failed for gzip: invalid gzip data. File may be corrupted or not actually gzip compressed"
    );
    expect(error.toString()).toBe(
      `CompressionError: ${error.message}\nContext: System error: invalid gzip data\nBytes processed: 42`
    );
  });
});

describe("getErrorSuggestion", () => {
  test("maps codes to hints", () => {
    expect(getErrorSuggestion(new InvalidConfigurationError("both"))).toBe(
      ERROR_SUGGESTIONS.INVALID_CONFIGURATION
    );
    expect(getErrorSuggestion(new EmptyFileError("a.gff3"))).toBe(ERROR_SUGGESTIONS.EMPTY_FILE);
    expect(getErrorSuggestion(new StreamError("x", "read"))).toBe(ERROR_SUGGESTIONS.MALFORMED_LINE);
  });
});
