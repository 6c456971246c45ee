/**
 * Tests for flat genotype table layout introspection and loading
 */

import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Either } from "effect";
import { gzipSync, zipSync } from "fflate";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { InvalidTableLayoutError } from "../../src/errors";
import { FlatGenotypeTable, introspectLayout, loadGenotypeTable } from "../../src/sources/genotype-table";

function parse(text: string): FlatGenotypeTable {
  const result = FlatGenotypeTable.parse(text, "table.txt");
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}

describe("introspectLayout", () => {
  test("uses the 23andMe layout when there is no header", () => {
    const result = introspectLayout(["rs1\t1\t100\tAG"], "t.txt");
    expect(Either.isRight(result)).toBe(true);
    if (Either.isRight(result)) {
      expect(result.right.layout.fromHeader).toBe(false);
      expect(result.right.layout.genotype).toEqual({ kind: "single", genotype: 3 });
      expect(result.right.dataStart).toBe(0);
    }
  });

  test("maps a commented header", () => {
    const result = introspectLayout(
      ["# generated for testing", "# rsid\tchromosome\tposition\tgenotype", "rs1\t1\t100\tAG"],
      "t.txt"
    );
    if (Either.isLeft(result)) throw result.left;
    expect(result.right.layout.fromHeader).toBe(true);
    expect(result.right.layout.delimiter).toBe("tab");
    expect(result.right.dataStart).toBe(2);
  });

  test("maps a two-allele header in any column order", () => {
    const result = introspectLayout(["chromosome\tposition\trsid\tallele1\tallele2", "1\t100\trs1\tA\tG"], "t.txt");
    if (Either.isLeft(result)) throw result.left;
    expect(result.right.layout.identifier).toBe(2);
    expect(result.right.layout.chromosome).toBe(0);
    expect(result.right.layout.genotype).toEqual({ kind: "pair", allele1: 3, allele2: 4 });
    expect(result.right.dataStart).toBe(1);
  });

  test("fails on a header missing required fields", () => {
    const result = introspectLayout(["RSID,CHROMOSOME,RESULT", "rs1,1,AG"], "partial.csv");
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(InvalidTableLayoutError);
      expect(result.left.missingFields).toEqual(["position"]);
      expect(result.left.message).toBe(
        "Unrecognized genotype table header in partial.csv: missing position"
      );
    }
  });

  test("names the missing half of an allele pair", () => {
    const result = introspectLayout(["rsid\tchromosome\tposition\tallele1", "rs1\t1\t100\tA"], "t.txt");
    if (Either.isRight(result)) throw new Error("expected a layout error");
    expect(result.left.missingFields).toEqual(["allele2"]);
  });
});

describe("FlatGenotypeTable.parse", () => {
  test("reads 23andMe style text", () => {
    const table = parse("# rsid\tchromosome\tposition\tgenotype\nrs1801133\t1\t11856378\tAG\nrs429358\t19\t45411941\tTT\n");
    expect(table.size).toBe(2);
    expect(table.lookup("rs1801133")).toBe("AG");
    expect(table.lookup("rs429358")).toBe("TT");
  });

  test("strips CSV quoting", () => {
    const table = parse('RSID,CHROMOSOME,POSITION,RESULT\n"rs1801133","1","11856378","AG"\n');
    expect(table.layout.delimiter).toBe("comma");
    expect(table.lookup("rs1801133")).toBe("AG");
  });

  test("joins two allele columns", () => {
    const table = parse("rsid\tchromosome\tposition\tallele1\tallele2\nrs1801133\t1\t11856378\tA\tG\n");
    expect(table.lookup("rs1801133")).toBe("AG");
  });

  test("splits whitespace-delimited rows", () => {
    const table = parse("rs1801133 1 11856378 AG\nrs7412 19 45412079 CC\n");
    expect(table.layout.delimiter).toBe("whitespace");
    expect(table.lookup("rs7412")).toBe("CC");
  });

  test("skips and counts rows with invalid genotypes", () => {
    const table = parse("rs1\t1\t100\tAG\nrs2\t1\t200\t00\nrs3\t1\t300\tDI\nrs4\t1\t400\n");
    expect(table.size).toBe(1);
    expect(table.skippedRows).toBe(3);
  });

  test("does not take a data row with genotype GT for a header", () => {
    const table = parse("rs5\t2\t500\tGT\n");
    expect(table.layout.fromHeader).toBe(false);
    expect(table.lookup("rs5")).toBe("GT");
  });
});

describe("loadGenotypeTable", () => {
  const dir = mkdtempSync(join(tmpdir(), "genotype-table-"));
  const text = "# rsid\tchromosome\tposition\tgenotype\nrs1801133\t1\t11856378\tAG\n";

  beforeAll(() => {
    writeFileSync(join(dir, "kit.txt"), text);
    writeFileSync(join(dir, "kit.txt.gz"), gzipSync(new TextEncoder().encode(text)));
    writeFileSync(join(dir, "kit.zip"), zipSync({ "kit.txt": new TextEncoder().encode(text) }));
  });

  afterAll(() => {
    if (existsSync(dir)) rmSync(dir, { recursive: true, force: true });
  });

  test("reads plain, gzipped and zipped tables", async () => {
    for (const name of ["kit.txt", "kit.txt.gz", "kit.zip"]) {
      const table = await loadGenotypeTable(join(dir, name));
      expect(table.lookup("rs1801133")).toBe("AG");
    }
  });

  test("rejects a table with a partial header", async () => {
    const path = join(dir, "bad.csv");
    writeFileSync(path, "RSID,CHROMOSOME,RESULT\nrs1,1,AG\n");
    await expect(loadGenotypeTable(path)).rejects.toBeInstanceOf(InvalidTableLayoutError);
  });
});
