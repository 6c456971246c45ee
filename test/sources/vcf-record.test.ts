/**
 * Tests for VCF data line parsing
 */

import { describe, expect, test } from "vitest";
import { firstRecord, parseVcfLine } from "../../src/sources/vcf-record";

describe("parseVcfLine", () => {
  test("reads position, identifier, alleles and the first sample's GT", () => {
    expect(parseVcfLine("1\t11856378\trs1801133\tG\tA\t50\tPASS\t.\tGT:DP\t0/1:31")).toEqual({
      chromosome: "1",
      position: 11856378,
      identifier: "rs1801133",
      reference: "G",
      alternates: ["A"],
      call: "0/1",
    });
  });

  test("finds GT wherever it sits in FORMAT", () => {
    expect(parseVcfLine("2\t10\t.\tA\tC\t.\t.\t.\tDP:GT\t12:1|1")?.call).toBe("1|1");
  });

  test("omits the identifier for '.'", () => {
    expect(parseVcfLine("2\t10\t.\tA\tC\t.\t.\t.\tGT\t0/1")?.identifier).toBeUndefined();
  });

  test("splits multiple ALT alleles and drops '.'", () => {
    expect(parseVcfLine("2\t10\trs1\tA\tC,G\t.\t.\t.\tGT\t1/2")?.alternates).toEqual(["C", "G"]);
    expect(parseVcfLine("2\t10\trs1\tA\t.\t.\t.\t.\tGT\t0/0")?.alternates).toEqual([]);
  });

  test("reports an empty call for sites without samples", () => {
    expect(parseVcfLine("2\t10\trs1\tA\tC\t.\t.\t.")?.call).toBe("");
  });

  test("skips header, blank and malformed lines", () => {
    expect(parseVcfLine("##fileformat=VCFv4.2")).toBeUndefined();
    expect(parseVcfLine("#CHROM\tPOS\tID")).toBeUndefined();
    expect(parseVcfLine("")).toBeUndefined();
    expect(parseVcfLine("1\tnot-a-position\trs1\tA\tC")).toBeUndefined();
  });
});

describe("firstRecord", () => {
  test("returns the first data line of a block", () => {
    const text = "1\t100\trs10\tA\tG\t.\t.\t.\tGT\t0/1\n1\t200\trs20\tC\tT\t.\t.\t.\tGT\t1/1\n";
    expect(firstRecord(text)?.identifier).toBe("rs10");
  });

  test("returns undefined for empty output", () => {
    expect(firstRecord("")).toBeUndefined();
  });
});
