/**
 * Line classification and dialect detection helpers
 */

import { describe, expect, test } from "vitest";
import { GffUtils } from "../../src/formats/gff";

describe("GffUtils", () => {
  test("isSequenceSectionStart recognises FASTA markers", () => {
    expect(GffUtils.isSequenceSectionStart("##FASTA")).toBe(true);
    expect(GffUtils.isSequenceSectionStart(">chr2L description")).toBe(true);
    expect(GffUtils.isSequenceSectionStart("##gff-version 3")).toBe(false);
    expect(GffUtils.isSequenceSectionStart("chr1\tsrc")).toBe(false);
  });

  test("isCommentLine matches '#' prefixes only", () => {
    expect(GffUtils.isCommentLine("# note")).toBe(true);
    expect(GffUtils.isCommentLine("##sequence-region chr1 1 100")).toBe(true);
    expect(GffUtils.isCommentLine(" # indented")).toBe(false);
  });

  test("splitRecord returns exactly nine columns", () => {
    expect(GffUtils.splitRecord("a\tb\tc\t1\t2\t.\t+\t.\tID=x")).toEqual([
      "a",
      "b",
      "c",
      "1",
      "2",
      ".",
      "+",
      ".",
      "ID=x",
    ]);
    expect(GffUtils.splitRecord("a\tb\tc")).toBeUndefined();
    expect(GffUtils.splitRecord("a\tb\tc\t1\t2\t.\t+\t.\tID=x\textra")).toBeUndefined();
    expect(GffUtils.splitRecord("#a\tb\tc\t1\t2\t.\t+\t.\tID=x")).toBeUndefined();
  });

  test("inferFiletype compares '=' and ';' counts", () => {
    expect(GffUtils.inferFiletype("ID=FBgn000001;Name=foo;")).toBe("gff");
    expect(GffUtils.inferFiletype('gene_id "FBgn000001"; gene_name "foo";')).toBe("gtf");
    expect(GffUtils.inferFiletype("ID=a")).toBe("gff");
    expect(GffUtils.inferFiletype("ID=a;;;")).toBe("gtf");
    expect(GffUtils.inferFiletype("")).toBe("gtf");
    expect(GffUtils.inferFiletype(".")).toBe("gtf");
  });

  test("detectFeatureFormat checks columns and coordinates", () => {
    expect(
      GffUtils.detectFeatureFormat("##gff-version 3\nchr1\tsrc\tgene\t1\t100\t.\t+\t.\tID=g1\n")
    ).toBe(true);
    expect(GffUtils.detectFeatureFormat("chr1\tsrc\tgene\tx\t100\t.\t+\t.\tID=g1")).toBe(false);
    expect(GffUtils.detectFeatureFormat(">chr1\nACGT\n")).toBe(false);
    expect(GffUtils.detectFeatureFormat("# comments only\n")).toBe(false);
  });
});
