/**
 * GFF/GTF annotation module exports
 *
 * Reads GFF and GTF records as features whose attributes round-trip to the
 * exact text they came from.
 *
 * @example Reading a file
 * ```typescript
 * import { FeatureFileReader } from "gffkit";
 *
 * const reader = await FeatureFileReader.open("genes.gtf.gz", { only: ["gene"] });
 * for await (const feature of reader) {
 *   console.log(`${feature.id}\t${feature.chrom}:${feature.start}-${feature.stop}`);
 * }
 * await reader.close();
 * ```
 *
 * @module gff
 */

import {
  detectFeatureFormat,
  inferFiletype,
  isCommentLine,
  isSequenceSectionStart,
  splitRecord,
} from "./utils";

const GffUtils = {
  detectFeatureFormat,
  inferFiletype,
  isCommentLine,
  isSequenceSectionStart,
  splitRecord,
} as const;

// =============================================================================
// EXPORTS
// =============================================================================

export { Attributes } from "./attributes";
export { Feature } from "./feature";
export type { FeatureParseOptions } from "./feature";
export { FeatureFileReader } from "./reader";
export { FeatureWriter } from "./writer";

export type {
  AttributeValue,
  FeatureFileReaderOptions,
  FeatureInit,
  FileType,
  RecordFields,
  WarningHandler,
} from "./types";

export {
  ATTRIBUTE_SEPARATOR,
  FIELD_SEPARATORS,
  FileTypeSchema,
  GFF_ID_ATTRIBUTES,
  GTF_DBID_FEATURE_TYPES,
  MISSING_VALUE,
  RECORD_FIELD_COUNT,
  VALUE_SEPARATOR,
} from "./types";

export {
  detectFeatureFormat,
  inferFiletype,
  isCommentLine,
  isSequenceSectionStart,
  splitRecord,
} from "./utils";

export { GffUtils };
