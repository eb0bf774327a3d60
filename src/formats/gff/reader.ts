/**
 * Streaming GFF/GTF file reader
 *
 * Reads records lazily from a {@link LineSource}, skipping comments, lines
 * without nine columns and filtered feature types. The dialect of the whole
 * file is taken from its first record.
 *
 * @module gff/reader
 */

import { type } from "arktype";
import { EmptyFileError, InvalidConfigurationError } from "../../errors";
import type { LineSource } from "../../io/line-source";
import { FileLineSource, StringLineSource } from "../../io/line-source";
import type { FileReaderOptions } from "../../types";
import { Feature } from "./feature";
import type { FeatureFileReaderOptions, FileType, RecordFields, WarningHandler } from "./types";
import { FileTypeSchema, RECORD_FIELD_COUNT } from "./types";
import { inferFiletype, isCommentLine, isSequenceSectionStart, splitRecord } from "./utils";

/**
 * ArkType validation for reader options
 */
const FeatureFileReaderOptionsSchema = type({
  "ignore?": "string[]",
  "only?": "string[]",
  "filetype?": FileTypeSchema,
  "autoDecompress?": "boolean",
  "bufferSize?": "1024<=number<=1048576",
  "encoding?": '"utf8"|"binary"',
}).narrow((options, ctx) => {
  if ((options.ignore?.length ?? 0) > 0 && (options.only?.length ?? 0) > 0) {
    return ctx.reject({
      path: ["only"],
      expected: "empty when 'ignore' is set (use either 'ignore' or 'only')",
      actual: "both 'ignore' and 'only' given",
    });
  }
  return true;
});

type ValidatedOptions = typeof FeatureFileReaderOptionsSchema.infer;

interface TypeFilter {
  readonly ignore: ReadonlySet<string>;
  /** `undefined` keeps every type not ignored */
  readonly only: ReadonlySet<string> | undefined;
}

function validateOptions(options: FeatureFileReaderOptions): ValidatedOptions {
  const result = FeatureFileReaderOptionsSchema(options);
  if (result instanceof type.errors) {
    const option = result[0]?.path.map(String).join(".");
    throw new InvalidConfigurationError(
      `Invalid feature reader options: ${result.summary}`,
      option === "" ? undefined : option
    );
  }
  return result;
}

function toSourceOptions({ bufferSize, encoding, autoDecompress }: ValidatedOptions): FileReaderOptions {
  return {
    ...(bufferSize === undefined ? {} : { bufferSize }),
    ...(encoding === undefined ? {} : { encoding }),
    ...(autoDecompress === undefined ? {} : { autoDecompress }),
  };
}

function defaultWarningHandler(warning: string, lineNumber?: number): void {
  console.warn(`GFF Warning (line ${lineNumber}): ${warning}`);
}

async function findFirstRecord(source: LineSource): Promise<RecordFields | undefined> {
  for (let line = await source.nextLine(); line !== null; line = await source.nextLine()) {
    if (isSequenceSectionStart(line)) return undefined;
    const fields = splitRecord(line);
    if (fields !== undefined) return fields;
  }
  return undefined;
}

/**
 * Lazy, restartable sequence of features from one annotation file
 *
 * @example
 * ```typescript
 * const reader = await FeatureFileReader.open("dmel-r6.gtf.gz", { ignore: ["exon"] });
 * try {
 *   for await (const feature of reader) {
 *     console.log(feature.id, feature.length);
 *   }
 * } finally {
 *   await reader.close();
 * }
 * ```
 *
 * @public
 */
export class FeatureFileReader implements AsyncIterable<Feature> {
  private lineNumber = 0;
  private finished = false;

  private constructor(
    private readonly source: LineSource,
    /** Dialect applied to every feature read */
    readonly filetype: FileType,
    private readonly filter: TypeFilter,
    private readonly onWarning: WarningHandler
  ) {}

  /**
   * Open an annotation file, decompressing `.gz` input
   *
   * @throws {InvalidConfigurationError} If both `ignore` and `only` are given
   * or an option is malformed; no file is opened in that case
   * @throws {FileError} If the file cannot be read
   * @throws {EmptyFileError} If the file holds no record
   */
  static async open(path: string, options: FeatureFileReaderOptions = {}): Promise<FeatureFileReader> {
    const validated = validateOptions(options);
    return FeatureFileReader.create(
      new FileLineSource(path, toSourceOptions(validated)),
      validated,
      options.onWarning
    );
  }

  /**
   * Read records from text in memory
   */
  static async fromString(
    text: string,
    options: FeatureFileReaderOptions = {}
  ): Promise<FeatureFileReader> {
    const validated = validateOptions(options);
    return FeatureFileReader.create(new StringLineSource(text), validated, options.onWarning);
  }

  /**
   * Read records from any line source. The reader takes ownership of it.
   */
  static async fromSource(
    source: LineSource,
    options: FeatureFileReaderOptions = {}
  ): Promise<FeatureFileReader> {
    const validated = validateOptions(options);
    return FeatureFileReader.create(source, validated, options.onWarning);
  }

  private static async create(
    source: LineSource,
    options: ValidatedOptions,
    onWarning: WarningHandler = defaultWarningHandler
  ): Promise<FeatureFileReader> {
    try {
      const first = await findFirstRecord(source);
      if (first === undefined) {
        throw new EmptyFileError(source.name);
      }
      await source.seekStart();

      const filter: TypeFilter = {
        ignore: new Set(options.ignore ?? []),
        only: options.only !== undefined && options.only.length > 0 ? new Set(options.only) : undefined,
      };
      return new FeatureFileReader(source, options.filetype ?? inferFiletype(first[8]), filter, onWarning);
    } catch (error) {
      await source.close();
      throw error;
    }
  }

  /** Name of the underlying source */
  get name(): string {
    return this.source.name;
  }

  /**
   * Yield the remaining features
   *
   * Stops at end of input or at the start of an embedded sequence section
   * (`>` or `##FASTA`), and stays finished until {@link reset}.
   *
   * @throws {MalformedRecordError} If a record has non-integer coordinates
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<Feature, void, undefined> {
    while (!this.finished) {
      const line = await this.source.nextLine();
      if (line === null || isSequenceSectionStart(line)) {
        this.finished = true;
        return;
      }
      this.lineNumber++;

      const fields = this.acceptRecord(line);
      if (fields !== undefined) {
        yield Feature.fromFields(fields, { filetype: this.filetype, lineNumber: this.lineNumber });
      }
    }
  }

  /**
   * Count the features that pass the filters
   *
   * Rewinds before and after counting, so iteration afterwards starts from the
   * first record.
   */
  async count(): Promise<number> {
    await this.reset();
    let total = 0;
    for await (const _feature of this) {
      total++;
    }
    await this.reset();
    return total;
  }

  /**
   * Rewind to the first line
   */
  async reset(): Promise<void> {
    await this.source.seekStart();
    this.lineNumber = 0;
    this.finished = false;
  }

  /**
   * Release the underlying source; iteration yields nothing afterwards
   */
  async close(): Promise<void> {
    this.finished = true;
    await this.source.close();
  }

  private acceptRecord(line: string): RecordFields | undefined {
    if (isCommentLine(line)) return undefined;

    const fields = splitRecord(line);
    if (fields === undefined) {
      if (line.trim() !== "") {
        this.onWarning(
          `Skipping line with ${line.split("\t").length} tab-separated fields (expected ${RECORD_FIELD_COUNT})`,
          this.lineNumber
        );
      }
      return undefined;
    }

    const featuretype = fields[2];
    if (this.filter.ignore.has(featuretype)) return undefined;
    if (this.filter.only !== undefined && !this.filter.only.has(featuretype)) return undefined;
    return fields;
  }
}
