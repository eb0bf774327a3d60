/**
 * Core GFF/GTF type definitions
 *
 * @module gff/types
 */

import { type } from "arktype";
import type { Attributes } from "./attributes";

/**
 * Attribute dialect of a record
 *
 * GFF writes attributes as `key=value;`, GTF as `key "value";`.
 *
 * @public
 */
export type FileType = "gff" | "gtf";

/**
 * Runtime check for {@link FileType}
 */
export const FileTypeSchema = type('"gff"|"gtf"');

/**
 * One attribute value: a single string, or the comma-separated values of a
 * multi-valued attribute
 *
 * @public
 */
export type AttributeValue =
  | { readonly kind: "scalar"; readonly value: string }
  | { readonly kind: "list"; readonly values: readonly string[] };

/**
 * The nine tab-separated columns of a record line
 */
export type RecordFields = readonly [
  chrom: string,
  source: string,
  featuretype: string,
  start: string,
  stop: string,
  score: string,
  strand: string,
  frame: string,
  attributes: string,
];

/**
 * Callback for recoverable conditions while reading
 */
export type WarningHandler = (warning: string, lineNumber?: number) => void;

/**
 * Fields for constructing a feature directly
 *
 * @public
 */
export interface FeatureInit {
  chrom: string;
  /** Defaults to "." */
  source?: string;
  featuretype: string;
  /** 1-based inclusive */
  start: number;
  /** 1-based inclusive */
  stop: number;
  /** Defaults to "." */
  score?: string;
  /** Defaults to "." */
  strand?: string;
  /** Defaults to "." */
  frame?: string;
  /** Raw attribute column, or already parsed attributes (default: "") */
  attributes?: string | Attributes;
  /** Skip dialect inference */
  filetype?: FileType;
  /** Skip id derivation */
  id?: string;
  /** Identifier assigned by an external store */
  dbid?: string;
  /** Source line the record was read from */
  lineNumber?: number;
}

/**
 * Feature file reader configuration options
 *
 * @public
 */
export interface FeatureFileReaderOptions {
  /** Feature types to skip; cannot be combined with `only` */
  ignore?: string[];
  /** The only feature types to keep; cannot be combined with `ignore` */
  only?: string[];
  /** Dialect to apply instead of inferring it from the first record */
  filetype?: FileType;
  /** Decompress `.gz` input (default: true) */
  autoDecompress?: boolean;
  /** Bytes requested per file read (default: 65536) */
  bufferSize?: number;
  /** Text encoding (default: "utf8") */
  encoding?: "utf8" | "binary";
  /** Called for non-comment lines skipped for a wrong column count */
  onWarning?: WarningHandler;
}

/** Number of tab-separated columns in a record */
export const RECORD_FIELD_COUNT = 9;

/** Placeholder for an unknown score, strand, frame or source */
export const MISSING_VALUE = ".";

/** Separator between attribute entries */
export const ATTRIBUTE_SEPARATOR = ";";

/** Separator between an attribute key and its value, per dialect */
export const FIELD_SEPARATORS = {
  gff: "=",
  gtf: " ",
} as const satisfies Record<FileType, string>;

/** Separator between the values of a multi-valued attribute */
export const VALUE_SEPARATOR = ",";

/** Attribute keys consulted, in order, for the id of a GFF record */
export const GFF_ID_ATTRIBUTES = ["ID", "Name", "gene_name"] as const;

/** GTF feature types whose id comes from the external `dbid` */
export const GTF_DBID_FEATURE_TYPES: ReadonlySet<string> = new Set(["gene", "mRNA"]);
