/**
 * A single GFF/GTF annotation record
 *
 * The attribute column stays raw text until it is first read; the dialect and
 * the identifier are derived on demand and cached.
 *
 * @module gff/feature
 */

import { type } from "arktype";
import {
  InvalidAttributesAssignmentError,
  MalformedRecordError,
  UnsupportedComparisonError,
  ValidationError,
} from "../../errors";
import { Attributes } from "./attributes";
import type { FeatureInit, FileType, RecordFields } from "./types";
import {
  FileTypeSchema,
  GFF_ID_ATTRIBUTES,
  GTF_DBID_FEATURE_TYPES,
  MISSING_VALUE,
  RECORD_FIELD_COUNT,
} from "./types";
import { inferFiletype, isCommentLine, splitRecord } from "./utils";

/**
 * Options for building a feature from text
 */
export interface FeatureParseOptions {
  /** Dialect of the attribute column, inferred when omitted */
  filetype?: FileType;
  /** Line the text came from, reported in errors */
  lineNumber?: number;
}

/** Integers as written back by `String(n)`: no leading zeros, no "-0" */
const COORDINATE_PATTERN = /^(0|-?[1-9]\d*)$/;

function parseCoordinate(text: string, field: "start" | "stop", lineNumber?: number): number {
  if (!COORDINATE_PATTERN.test(text)) {
    throw new MalformedRecordError(
      `Invalid ${field} coordinate '${text}': must be an integer without leading zeros`,
      field,
      lineNumber
    );
  }
  const value = Number.parseInt(text, 10);
  if (!Number.isSafeInteger(value)) {
    throw new MalformedRecordError(
      `Invalid ${field} coordinate '${text}': exceeds ${Number.MAX_SAFE_INTEGER}`,
      field,
      lineNumber
    );
  }
  return value;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}

/**
 * One annotation line
 *
 * @example
 * ```typescript
 * const feature = Feature.fromLine("chr2L\tFlyBase\tgene\t7529\t9484\t.\t+\t.\tID=FBgn0031208;Name=CG11023");
 * feature.filetype; // "gff"
 * feature.id; // "FBgn0031208"
 * feature.attributes.set("Note", "example");
 * feature.toString(); // "...\tID=FBgn0031208;Name=CG11023;Note=example"
 * ```
 *
 * @public
 */
export class Feature {
  chrom: string;
  source: string;
  featuretype: string;
  start: number;
  stop: number;
  score: string;
  strand: string;
  frame: string;
  /** Identifier assigned by an external store; the id of GTF genes and mRNAs */
  dbid: string | undefined;
  readonly lineNumber: number | undefined;

  private readonly rawAttributes: string;
  private cachedAttributes: Attributes | undefined;
  private cachedFiletype: FileType | undefined;
  private cachedId: string | undefined;

  constructor(init: FeatureInit) {
    this.chrom = init.chrom;
    this.source = init.source ?? MISSING_VALUE;
    this.featuretype = init.featuretype;
    this.start = init.start;
    this.stop = init.stop;
    this.score = init.score ?? MISSING_VALUE;
    this.strand = init.strand ?? MISSING_VALUE;
    this.frame = init.frame ?? MISSING_VALUE;
    this.dbid = init.dbid;
    this.lineNumber = init.lineNumber;
    this.cachedId = init.id;

    if (init.attributes instanceof Attributes) {
      this.cachedAttributes = init.attributes;
      this.rawAttributes = init.attributes.toString();
      this.cachedFiletype = init.filetype ?? init.attributes.filetype;
    } else {
      this.rawAttributes = init.attributes ?? "";
      this.cachedFiletype = init.filetype;
    }
  }

  /**
   * Parse a tab-separated record line
   *
   * A trailing line ending is ignored.
   *
   * @throws {MalformedRecordError} If the line is a comment, does not have nine
   * columns, or has non-integer coordinates
   */
  static fromLine(line: string, options: FeatureParseOptions = {}): Feature {
    const text = line.replace(/\r?\n$/, "");
    const fields = splitRecord(text);

    if (fields === undefined) {
      const message = isCommentLine(text)
        ? "Comment lines are not feature records"
        : `Expected ${RECORD_FIELD_COUNT} tab-separated fields, found ${text.split("\t").length}`;
      throw new MalformedRecordError(message, undefined, options.lineNumber, text);
    }
    return Feature.fromFields(fields, options);
  }

  /**
   * Build a feature from the nine columns of a record
   *
   * @throws {MalformedRecordError} If a coordinate is not an integer
   */
  static fromFields(fields: RecordFields, options: FeatureParseOptions = {}): Feature {
    const [chrom, source, featuretype, start, stop, score, strand, frame, attributes] = fields;
    const { filetype, lineNumber } = options;

    return new Feature({
      chrom,
      source,
      featuretype,
      start: parseCoordinate(start, "start", lineNumber),
      stop: parseCoordinate(stop, "stop", lineNumber),
      score,
      strand,
      frame,
      attributes,
      filetype,
      lineNumber,
    });
  }

  /**
   * Attribute dialect, inferred from the raw attribute column on first read
   */
  get filetype(): FileType {
    this.cachedFiletype ??= inferFiletype(this.rawAttributes);
    return this.cachedFiletype;
  }

  /**
   * Override the dialect. Attributes already parsed keep their own dialect.
   *
   * @throws {ValidationError} If the value is not "gff" or "gtf"
   */
  set filetype(value: FileType) {
    const result = FileTypeSchema(value);
    if (result instanceof type.errors) {
      throw new ValidationError(`Invalid filetype: ${result.summary}`, this.lineNumber);
    }
    this.cachedFiletype = result;
  }

  /**
   * Parsed attributes; once read, they are what {@link Feature.toString}
   * serializes
   *
   * @throws {MalformedAttributeError} On first read, if the column is malformed
   */
  get attributes(): Attributes {
    this.cachedAttributes ??= Attributes.parse(this.rawAttributes, this.filetype, this.lineNumber);
    return this.cachedAttributes;
  }

  /**
   * @throws {InvalidAttributesAssignmentError} Unless given an Attributes instance
   */
  set attributes(value: unknown) {
    if (!(value instanceof Attributes)) {
      throw new InvalidAttributesAssignmentError(describeValue(value));
    }
    this.cachedAttributes = value;
  }

  /**
   * Attribute column text, without parsing it if it was never read
   */
  get attributeString(): string {
    return this.cachedAttributes?.toString() ?? this.rawAttributes;
  }

  /**
   * Best-effort identifier
   *
   * GFF records use the first of `ID`, `Name` and `gene_name` that is present.
   * GTF genes and mRNAs use {@link Feature.dbid}. Anything else gets
   * `featuretype:chrom:start-stop:strand`. `undefined` only for a GTF gene or
   * mRNA without a dbid, and that result is not cached.
   */
  get id(): string | undefined {
    this.cachedId ??= this.deriveId();
    return this.cachedId;
  }

  /** Assigning `undefined` drops an override so the id is derived again */
  set id(value: string | undefined) {
    this.cachedId = value;
  }

  /** `stop - start + 1`, not validated */
  get length(): number {
    return this.stop - this.start + 1;
  }

  private deriveId(): string | undefined {
    if (this.filetype === "gtf") {
      return GTF_DBID_FEATURE_TYPES.has(this.featuretype) ? this.dbid : this.autogeneratedId();
    }

    for (const key of GFF_ID_ATTRIBUTES) {
      const value = this.attributes.getText(key);
      if (value !== undefined) return value;
    }
    return this.autogeneratedId();
  }

  private autogeneratedId(): string {
    return `${this.featuretype}:${this.chrom}:${this.start}-${this.stop}:${this.strand}`;
  }

  equals(other: Feature): boolean {
    return this.toString() === other.toString();
  }

  /**
   * @throws {UnsupportedComparisonError} Always; features have no ordering
   */
  compareTo(_other: Feature): never {
    throw new UnsupportedComparisonError();
  }

  /**
   * Relational operators coerce to numbers; that coercion is refused
   */
  [Symbol.toPrimitive](hint: string): string {
    if (hint === "number") {
      throw new UnsupportedComparisonError();
    }
    return this.toString();
  }

  /**
   * Tab-joined record line, without a line ending
   */
  toString(): string {
    return [
      this.chrom,
      this.source,
      this.featuretype,
      String(this.start),
      String(this.stop),
      this.score,
      this.strand,
      this.frame,
      this.attributeString,
    ].join("\t");
  }
}
