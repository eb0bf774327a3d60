/**
 * gffkit: GFF and GTF annotation parsing with exact round-trip serialization
 *
 * @example
 * ```typescript
 * import { Feature } from "gffkit";
 *
 * const feature = Feature.fromLine('chr1\tsrc\texon\t1\t90\t.\t+\t.\tgene_id "g1"; transcript_id "t1";');
 * feature.filetype; // "gtf"
 * feature.attributes.getText("transcript_id"); // "t1"
 * ```
 *
 * @packageDocumentation
 */

export * from "./formats/gff";

export {
  BufferError,
  CompressionError,
  EmptyFileError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  GffkitError,
  InvalidAttributesAssignmentError,
  InvalidConfigurationError,
  MalformedAttributeError,
  MalformedRecordError,
  ParseError,
  StreamError,
  UnsupportedComparisonError,
  ValidationError,
} from "./errors";

export { CompressionDetector, GzipCompressor, GzipDecompressor } from "./compression";
export { FileReader } from "./io/file-reader";
export { FileWriter } from "./io/file-writer";
export { FileLineSource, StringLineSource } from "./io/line-source";
export type { LineSource } from "./io/line-source";
export { StreamUtils } from "./io/stream-utils";

export type {
  CompressionFormat,
  DecompressorOptions,
  FileReaderOptions,
  TextEncoding,
  WriteOptions,
} from "./types";
