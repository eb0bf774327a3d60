/**
 * Ninth-column attribute parsing and serialization
 *
 * Attributes keep the order of their keys and the whitespace and quoting of
 * every entry, so that an unmodified instance serializes back to the exact
 * text it was parsed from.
 *
 * @module gff/attributes
 */

import { MalformedAttributeError, ValidationError } from "../../errors";
import type { AttributeValue, FileType } from "./types";
import { ATTRIBUTE_SEPARATOR, FIELD_SEPARATORS, MISSING_VALUE, VALUE_SEPARATOR } from "./types";

interface AttributeEntry {
  readonly value: AttributeValue;
  /** Whitespace between the preceding `;` and the key */
  readonly leading: string;
  /** Whether the value is wrapped in double quotes */
  readonly quoted: boolean;
}

function toAttributeValue(text: string): AttributeValue {
  const values = text.split(VALUE_SEPARATOR);
  const [first] = values;
  return values.length === 1 && first !== undefined
    ? { kind: "scalar", value: first }
    : { kind: "list", values };
}

function formatValue(value: AttributeValue): string {
  return value.kind === "scalar" ? value.value : value.values.join(VALUE_SEPARATOR);
}

function isQuoted(text: string): boolean {
  return text.length >= 2 && text.startsWith('"') && text.endsWith('"');
}

/**
 * Parsed attribute column of one feature
 *
 * @example GFF
 * ```typescript
 * const attrs = Attributes.parse("ID=gene1;Dbxref=FLYBASE:1,GO:2;", "gff");
 * attrs.get("Dbxref"); // { kind: "list", values: ["FLYBASE:1", "GO:2"] }
 * attrs.toString(); // "ID=gene1;Dbxref=FLYBASE:1,GO:2;"
 * ```
 *
 * @example GTF
 * ```typescript
 * const attrs = Attributes.parse('gene_id "g1"; gene_name "abc";', "gtf");
 * attrs.set("gene_biotype", "protein_coding");
 * attrs.toString(); // 'gene_id "g1"; gene_name "abc"; gene_biotype "protein_coding";'
 * ```
 *
 * @public
 */
export class Attributes implements Iterable<[string, AttributeValue]> {
  readonly separator = ATTRIBUTE_SEPARATOR;
  readonly fieldSeparator: string;
  private readonly fields = new Map<string, AttributeEntry>();
  private trailingSeparator: boolean;
  /** Text of an attribute-less column ("" or "."), echoed while there are no entries */
  private placeholder = "";

  constructor(readonly filetype: FileType) {
    this.fieldSeparator = FIELD_SEPARATORS[filetype];
    this.trailingSeparator = filetype === "gtf";
  }

  /**
   * Parse an attribute column
   *
   * Surrounding whitespace of the whole column is not preserved. A key that
   * occurs twice keeps its first position and its last value.
   *
   * @throws {MalformedAttributeError} If an entry does not split into exactly
   * one key and one value
   */
  static parse(text: string, filetype: FileType, lineNumber?: number): Attributes {
    const attributes = new Attributes(filetype);
    const trimmed = text.trim();

    if (trimmed === "" || trimmed === MISSING_VALUE) {
      attributes.placeholder = trimmed;
      return attributes;
    }

    attributes.trailingSeparator = trimmed.endsWith(ATTRIBUTE_SEPARATOR);
    for (const segment of trimmed.split(ATTRIBUTE_SEPARATOR)) {
      const body = segment.trimStart();
      if (body === "") continue;
      attributes.parseEntry(body, segment.slice(0, segment.length - body.length), lineNumber);
    }

    return attributes;
  }

  private parseEntry(body: string, leading: string, lineNumber?: number): void {
    const parts = body.split(this.fieldSeparator);
    const [key, raw] = parts;

    if (parts.length !== 2 || key === undefined || key === "" || raw === undefined) {
      throw new MalformedAttributeError(
        `Attribute '${body}' must be one key and one value separated by '${this.fieldSeparator}'`,
        body,
        this.filetype === "gff" ? "GFF" : "GTF",
        lineNumber
      );
    }

    const quoted = isQuoted(raw);
    this.fields.set(key, {
      value: toAttributeValue(quoted ? raw.slice(1, -1) : raw),
      leading,
      quoted,
    });
  }

  get size(): number {
    return this.fields.size;
  }

  /** Whether the serialized form ends with `;` */
  get hasTrailingSeparator(): boolean {
    return this.trailingSeparator;
  }

  has(key: string): boolean {
    return this.fields.has(key);
  }

  get(key: string): AttributeValue | undefined {
    return this.fields.get(key)?.value;
  }

  /**
   * Value as text, list values joined with ","
   */
  getText(key: string): string | undefined {
    const entry = this.fields.get(key);
    return entry === undefined ? undefined : formatValue(entry.value);
  }

  /**
   * Whether whitespace preceded the key in the parsed text
   */
  hasLeadingSpace(key: string): boolean {
    return (this.fields.get(key)?.leading ?? "") !== "";
  }

  /**
   * Assign a value
   *
   * An existing key keeps its position and formatting. A new key is appended:
   * GFF entries unquoted with no leading space, GTF entries quoted and
   * preceded by a space (except the first entry). A string containing ","
   * becomes a list value, as it would when parsed. An empty value on an
   * unquoted GTF entry is written quoted.
   *
   * @throws {ValidationError} If the key or value would not parse back
   */
  set(key: string, value: string | readonly string[]): this {
    this.validateKey(key);
    const normalized = this.normalizeValue(key, value);
    const existing = this.fields.get(key);

    this.fields.set(key, {
      value: normalized,
      leading: existing?.leading ?? (this.filetype === "gtf" && this.fields.size > 0 ? " " : ""),
      quoted: this.resolveQuoting(key, normalized, existing?.quoted ?? this.filetype === "gtf"),
    });
    return this;
  }

  delete(key: string): boolean {
    return this.fields.delete(key);
  }

  keys(): IterableIterator<string> {
    return this.fields.keys();
  }

  *[Symbol.iterator](): Iterator<[string, AttributeValue]> {
    for (const [key, entry] of this.fields) {
      yield [key, entry.value];
    }
  }

  /**
   * Plain key/value record, list values as arrays
   */
  toRecord(): Record<string, string | string[]> {
    const record: Record<string, string | string[]> = {};
    for (const [key, { value }] of this.fields) {
      record[key] = value.kind === "scalar" ? value.value : [...value.values];
    }
    return record;
  }

  /**
   * Serialize back to attribute column text
   */
  toString(): string {
    if (this.fields.size === 0) {
      return this.placeholder;
    }

    const entries = [...this.fields].map(([key, entry]) => {
      const text = formatValue(entry.value);
      return `${entry.leading}${key}${this.fieldSeparator}${entry.quoted ? `"${text}"` : text}`;
    });
    const body = entries.join(this.separator);
    return this.trailingSeparator ? `${body}${this.separator}` : body;
  }

  private validateKey(key: string): void {
    if (key === "" || key.trim() !== key) {
      throw new ValidationError(`Attribute key '${key}' must be non-empty without surrounding whitespace`);
    }
    if (key.includes(this.separator) || key.includes(this.fieldSeparator)) {
      throw new ValidationError(
        `Attribute key '${key}' cannot contain '${this.separator}' or '${this.fieldSeparator}'`
      );
    }
  }

  private normalizeValue(key: string, value: string | readonly string[]): AttributeValue {
    const normalized = typeof value === "string" ? toAttributeValue(value) : toListValue(key, value);
    const texts = normalized.kind === "scalar" ? [normalized.value] : normalized.values;

    for (const text of texts) {
      if (text.includes(this.separator) || text.includes(this.fieldSeparator)) {
        throw new ValidationError(
          `Value '${text}' for attribute '${key}' cannot contain '${this.separator}' or '${this.fieldSeparator}'`
        );
      }
    }
    return normalized;
  }

  private resolveQuoting(key: string, value: AttributeValue, quoted: boolean): boolean {
    const text = formatValue(value);
    if (/[\t\r\n]/.test(text)) {
      throw new ValidationError(`Value for attribute '${key}' cannot contain tabs or line breaks`);
    }
    if (quoted) return true;

    if (text.trim() !== text) {
      throw new ValidationError(
        `Unquoted value '${text}' for attribute '${key}' cannot start or end with whitespace`
      );
    }
    if (isQuoted(text)) {
      throw new ValidationError(
        `Unquoted value '${text}' for attribute '${key}' cannot be wrapped in double quotes`
      );
    }
    // `key ` loses its separator when the column is trimmed
    return this.filetype === "gtf" && text === "";
  }
}

function toListValue(key: string, values: readonly string[]): AttributeValue {
  if (values.length === 0) {
    throw new ValidationError(`Attribute '${key}' needs at least one value`);
  }
  if (values.some((value) => value.includes(VALUE_SEPARATOR))) {
    throw new ValidationError(`List values for attribute '${key}' cannot contain '${VALUE_SEPARATOR}'`);
  }
  const [first] = values;
  return values.length === 1 && first !== undefined
    ? { kind: "scalar", value: first }
    : { kind: "list", values: [...values] };
}
