/**
 * GFF/GTF line classification and dialect detection
 *
 * @module gff/utils
 */

import type { FileType, RecordFields } from "./types";
import { RECORD_FIELD_COUNT } from "./types";

/**
 * Whether a line is a comment or directive
 */
function isCommentLine(line: string): boolean {
  return line.startsWith("#");
}

/**
 * Whether a line opens the embedded sequence section, after which no more
 * records follow
 *
 * @example
 * ```typescript
 * isSequenceSectionStart("##FASTA"); // true
 * isSequenceSectionStart(">chr2L"); // true
 * ```
 */
function isSequenceSectionStart(line: string): boolean {
  return line.startsWith(">") || line.startsWith("##FASTA");
}

function hasRecordShape(fields: readonly string[]): fields is RecordFields {
  return fields.length === RECORD_FIELD_COUNT;
}

/**
 * Split a line into its nine columns
 *
 * @returns The columns, or `undefined` for comments and lines with any other
 * number of tab-separated fields
 */
function splitRecord(line: string): RecordFields | undefined {
  if (isCommentLine(line)) {
    return undefined;
  }
  const fields = line.split("\t");
  return hasRecordShape(fields) ? fields : undefined;
}

function countOccurrences(text: string, char: string): number {
  let count = 0;
  for (const c of text) {
    if (c === char) count++;
  }
  return count;
}

/**
 * Infer the attribute dialect from a raw attribute column
 *
 * GFF pairs are joined with `=`, so a GFF column carries at least one `=` per
 * `;`-separated entry. Columns without any `=` are GTF.
 *
 * @example
 * ```typescript
 * inferFiletype("ID=FBgn000001;Name=foo;"); // "gff"
 * inferFiletype('gene_id "FBgn000001"; gene_name "foo";'); // "gtf"
 * ```
 */
function inferFiletype(attributeString: string): FileType {
  const semicolons = countOccurrences(attributeString, ";");
  const equals = countOccurrences(attributeString, "=");
  return equals > 0 && equals > semicolons - 1 ? "gff" : "gtf";
}

/**
 * Detect if text looks like GFF/GTF data
 *
 * Checks the first three records for nine columns and integer coordinates.
 */
function detectFeatureFormat(data: string): boolean {
  const records = data
    .split(/\r?\n/)
    .filter((line) => line.trim() !== "" && !isCommentLine(line));

  if (records.length === 0) return false;

  return records.slice(0, 3).every((line) => {
    const fields = splitRecord(line);
    return fields !== undefined && /^\d+$/.test(fields[3]) && /^\d+$/.test(fields[4]);
  });
}

// =============================================================================
// EXPORTS
// =============================================================================

export {
  detectFeatureFormat,
  inferFiletype,
  isCommentLine,
  isSequenceSectionStart,
  splitRecord,
};
