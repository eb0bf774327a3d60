/**
 * Error types for annotation parsing
 *
 * Every error raised by the library extends {@link GffkitError}, which carries
 * a machine-readable code and, where known, the source line number.
 */

/**
 * Base error class for all gffkit errors
 */
export class GffkitError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "GffkitError";
  }

  /**
   * Render the message with line and context details
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed or invalid values
 */
export class ValidationError extends GffkitError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends GffkitError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string,
    code = "PARSE_ERROR"
  ) {
    super(message, code, lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Reader options that contradict each other or fail schema validation
 */
export class InvalidConfigurationError extends GffkitError {
  constructor(
    message: string,
    public readonly option?: string
  ) {
    super(message, "INVALID_CONFIGURATION");
    this.name = "InvalidConfigurationError";
  }
}

/**
 * No structurally valid record was found while opening a source
 */
export class EmptyFileError extends GffkitError {
  constructor(public readonly source: string) {
    super(`No valid feature records found in '${source}'`, "EMPTY_FILE");
    this.name = "EmptyFileError";
  }
}

/**
 * A record line that cannot be turned into a feature
 */
export class MalformedRecordError extends ParseError {
  constructor(
    message: string,
    public readonly field?: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "GFF", lineNumber, context, "MALFORMED_RECORD");
    this.name = "MalformedRecordError";
  }
}

/**
 * An attribute segment without exactly one key/value separator
 */
export class MalformedAttributeError extends ParseError {
  constructor(
    message: string,
    public readonly segment: string,
    format: "GFF" | "GTF",
    lineNumber?: number
  ) {
    super(message, format, lineNumber, `Segment: '${segment}'`, "MALFORMED_ATTRIBUTE");
    this.name = "MalformedAttributeError";
  }
}

/**
 * Features define equality only; ordering them is an error
 */
export class UnsupportedComparisonError extends GffkitError {
  constructor(message = "Features support equality only, not ordering") {
    super(message, "UNSUPPORTED_COMPARISON");
    this.name = "UnsupportedComparisonError";
  }
}

/**
 * Something other than an Attributes instance was assigned to a feature
 */
export class InvalidAttributesAssignmentError extends GffkitError {
  constructor(public readonly received: string) {
    super(
      `Feature attributes must be an Attributes instance, received ${received}`,
      "INVALID_ATTRIBUTES_ASSIGNMENT"
    );
    this.name = "InvalidAttributesAssignmentError";
  }
}

/**
 * Compression/decompression errors with byte counts
 */
export class CompressionError extends GffkitError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "compress" | "decompress" | "stream" | "validate",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Wrap a failure raised by the decompressor
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const msg = errorMessage.toLowerCase();
    const suggestion =
      msg.includes("invalid gzip") || msg.includes("header")
        ? `File may be corrupted or not actually ${format} compressed`
        : msg.includes("unexpected eof") || msg.includes("truncated")
          ? "File appears to be truncated or incomplete"
          : undefined;

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  override toString(): string {
    let msg = super.toString();
    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }
    return msg;
  }
}

/**
 * File I/O errors carrying the path and the failed operation
 */
export class FileError extends GffkitError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "close" | "seek",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("not found")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }
}

/**
 * Stream processing errors for I/O operations
 */
export class StreamError extends GffkitError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Buffer management errors for streaming operations
 */
export class BufferError extends GffkitError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "allocate" | "resize" | "overflow" | "underflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}

export const ERROR_SUGGESTIONS = {
  MALFORMED_ATTRIBUTE:
    "GFF attributes are written key=value; GTF attributes are written key \"value\" with a single space",
  MALFORMED_RECORD: "Columns 4 and 5 must be integer coordinates and the line must have 9 tab-separated fields",
  INVALID_CONFIGURATION: "Use either an ignore list or an only list of feature types, not both",
  EMPTY_FILE: "Check that the file contains tab-separated records and not only comments",
  COMPRESSED_FILE_ERROR: "Check that the .gz file is complete and really gzip compressed",
  MALFORMED_LINE: "Check for extra whitespace, special characters, or encoding issues",
} as const;

/**
 * Get a remediation hint for an error raised by this library
 */
export function getErrorSuggestion(error: GffkitError): string {
  switch (error.code) {
    case "MALFORMED_ATTRIBUTE":
      return ERROR_SUGGESTIONS.MALFORMED_ATTRIBUTE;
    case "MALFORMED_RECORD":
      return ERROR_SUGGESTIONS.MALFORMED_RECORD;
    case "INVALID_CONFIGURATION":
      return ERROR_SUGGESTIONS.INVALID_CONFIGURATION;
    case "EMPTY_FILE":
      return ERROR_SUGGESTIONS.EMPTY_FILE;
    case "COMPRESSION_ERROR":
      return ERROR_SUGGESTIONS.COMPRESSED_FILE_ERROR;
    default:
      return ERROR_SUGGESTIONS.MALFORMED_LINE;
  }
}
