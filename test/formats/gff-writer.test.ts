/**
 * FeatureWriter formatting, stream and file output
 */

import { readFileSync } from "fs";
import { join } from "path";
import { gunzipSync, strFromU8 } from "fflate";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { Feature, FeatureFileReader, FeatureWriter } from "../../src/formats/gff";
import { collect, createTempDir } from "../utils/fixtures";

const LINES = [
  "chr1\tsrc\tgene\t1\t1000\t.\t+\t.\tID=gene1;Name=alpha;",
  "chr1\tsrc\texon\t1\t200\t0.5\t+\t.\tID=exon1;Parent=gene1",
];

function features(): Feature[] {
  return LINES.map((line) => Feature.fromLine(line));
}

describe("FeatureWriter formatting", () => {
  test("formats one feature as its record line", () => {
    const [gene] = features();
    expect(gene && new FeatureWriter().formatFeature(gene)).toBe(LINES[0]);
  });

  test("joins features with newlines", () => {
    expect(new FeatureWriter().formatFeatures(features())).toBe(LINES.join("\n"));
  });

  test("writes attribute changes", () => {
    const [gene] = features();
    gene?.attributes.set("Note", "edited");

    expect(gene && new FeatureWriter().formatFeature(gene)).toBe(
      "chr1\tsrc\tgene\t1\t1000\t.\t+\t.\tID=gene1;Name=alpha;Note=edited;"
    );
  });
});

describe("FeatureWriter.writeToStream", () => {
  test("writes one line per feature", async () => {
    const chunks: string[] = [];
    const decoder = new TextDecoder();
    const sink = new WritableStream<Uint8Array>({
      write(chunk): void {
        chunks.push(decoder.decode(chunk));
      },
    });

    await new FeatureWriter().writeToStream(features(), sink);

    expect(chunks).toEqual([`${LINES[0]}\n`, `${LINES[1]}\n`]);
  });
});

describe("FeatureWriter.writeToFile", () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
  });

  afterEach(() => {
    cleanup();
  });

  test("writes plain text", async () => {
    const path = join(dir, "out.gff3");
    await new FeatureWriter().writeToFile(features(), path);

    expect(readFileSync(path, "utf8")).toBe(`${LINES.join("\n")}\n`);
  });

  test("compresses .gz output that reads back identically", async () => {
    const path = join(dir, "out.gff3.gz");
    await new FeatureWriter().writeToFile(features(), path);

    expect(strFromU8(gunzipSync(readFileSync(path)))).toBe(`${LINES.join("\n")}\n`);

    const reader = await FeatureFileReader.open(path);
    try {
      expect((await collect(reader)).map((feature) => feature.toString())).toEqual(LINES);
    } finally {
      await reader.close();
    }
  });

  test("copies a filtered file", async () => {
    const source = join(dir, "in.gff3");
    const target = join(dir, "genes.gff3");
    await new FeatureWriter().writeToFile(features(), source);

    const reader = await FeatureFileReader.open(source, { only: ["gene"] });
    try {
      await new FeatureWriter().writeToFile(reader, target);
    } finally {
      await reader.close();
    }

    expect(readFileSync(target, "utf8")).toBe(`${LINES[0]}\n`);
  });
});
