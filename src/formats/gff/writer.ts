/**
 * GFF/GTF output
 *
 * Features serialize themselves; the writer joins them into files and
 * streams.
 *
 * @module gff/writer
 */

import { writeString } from "../../io/file-writer";
import type { WriteOptions } from "../../types";
import type { Feature } from "./feature";

/**
 * Feature writer
 *
 * @example Filter a file
 * ```typescript
 * const reader = await FeatureFileReader.open("annotation.gff3", { only: ["gene"] });
 * await new FeatureWriter().writeToFile(reader, "genes.gff3.gz");
 * ```
 *
 * @public
 */
export class FeatureWriter {
  /**
   * Format one feature as a record line, without a line ending
   */
  formatFeature(feature: Feature): string {
    return feature.toString();
  }

  /**
   * Format features as newline-separated lines
   */
  formatFeatures(features: readonly Feature[]): string {
    return features.map((feature) => this.formatFeature(feature)).join("\n");
  }

  /**
   * Write features to WritableStream, one line each
   */
  async writeToStream(
    features: AsyncIterable<Feature> | Iterable<Feature>,
    stream: WritableStream<Uint8Array>
  ): Promise<void> {
    const writer = stream.getWriter();
    const encoder = new TextEncoder();

    try {
      for await (const feature of features) {
        await writer.write(encoder.encode(`${this.formatFeature(feature)}\n`));
      }
    } finally {
      writer.releaseLock();
    }
  }

  /**
   * Write features to a file, gzip-compressed for `.gz` paths
   *
   * @throws {FileError} If the file cannot be written
   */
  async writeToFile(
    features: AsyncIterable<Feature> | Iterable<Feature>,
    path: string,
    options: WriteOptions = {}
  ): Promise<void> {
    const lines: string[] = [];
    for await (const feature of features) {
      lines.push(`${this.formatFeature(feature)}\n`);
    }
    await writeString(path, lines.join(""), options);
  }
}
