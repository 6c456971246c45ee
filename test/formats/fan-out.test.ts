/**
 * Tests for fanning the combined table out into consumer formats
 */

import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import { gunzipSync, strFromU8, strToU8, unzipSync, zipSync } from "fflate";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { PipelineOptions } from "../../src/config";
import { CombinedTableMissingError, ConfigurationError } from "../../src/errors";
import { CSV_HEADER, FormatFanOut, renderFormat } from "../../src/formats/fan-out";
import { runWithPlatform } from "../../src/io/runtime";
import { openVariantSource } from "../../src/sources/detect";
import { createFakeToolRunner, type FakeToolOptions } from "../utils/tool-layers";

const HEADER = "# rsid\tchromosome\tposition\tgenotype";
const TABLE = `${HEADER}\nrs1\t1\t100\tTT\nrs2\t2\t50\tAG\nrs5\t3\t10\tCC\ni6000\t4\t20\tGG\n`;

let dir: string;
let outputDir: string;
let referenceDir: string;
let options: PipelineOptions;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "fan-out-"));
  outputDir = join(dir, "out");
  referenceDir = join(dir, "reference");
  mkdirSync(outputDir);
  mkdirSync(referenceDir);

  options = {
    inputPath: join(dir, "sample.bam"),
    outputDir,
    referenceDir,
    referenceFiles: { genome: "genome.fna.gz", variantDatabase: "dbsnp.vcf.gz" },
    thresholds: { minCombinedTableBytes: 0, minFormatPackageBytes: 0 },
    threads: 1,
    logLevel: "none",
  };
});

afterEach(() => {
  if (existsSync(dir)) rmSync(dir, { recursive: true, force: true });
});

function writeCombinedTable(): void {
  const path = join(outputDir, "sample_CombinedKit.txt");
  writeFileSync(path, TABLE);
  const past = new Date(Date.now() - 60_000);
  utimesSync(path, past, past);
}

function readPackage(path: string): Record<string, Uint8Array> {
  return unzipSync(new Uint8Array(readFileSync(path)));
}

function singleEntry(path: string): [string, string] {
  const [entry] = Object.entries(readPackage(path));
  if (entry === undefined) throw new Error(`${path} is empty`);
  return [entry[0], strFromU8(entry[1])];
}

function fanOut(tools: FakeToolOptions = {}): FormatFanOut {
  return new FormatFanOut(options, createFakeToolRunner(tools).layer);
}

describe("renderFormat", () => {
  test("copies tab-separated lines under the table header", () => {
    expect(renderFormat("23andMe_V5", HEADER, ["rs1\t1\t100\tTT"])).toBe(`${HEADER}\nrs1\t1\t100\tTT\n`);
  });

  test("writes quoted CSV for FTDNA and MyHeritage", () => {
    expect(renderFormat("MyHeritage_V2", HEADER, ["rs1\t1\t100\tTT"])).toBe(`${CSV_HEADER}\n"rs1","1","100","TT"\n`);
  });
});

describe("generateFormat", () => {
  test("packages the rows admitted by the hash fallback", async () => {
    writeCombinedTable();

    const result = await fanOut().generateFormat("HOv1");

    expect(result).toEqual({
      format: "HOv1",
      packagePath: join(outputDir, "sample_HOv1.zip"),
      reused: false,
      rows: 2,
    });
    expect(singleEntry(result.packagePath)).toEqual([
      "sample_HOv1.txt",
      `${HEADER}\nrs2\t2\t50\tAG\nrs5\t3\t10\tCC\n`,
    ]);
    expect(existsSync(join(outputDir, "sample_HOv1.txt"))).toBe(false);
  });

  test("follows the format's identifier list", async () => {
    writeCombinedTable();
    writeFileSync(join(referenceDir, "FTDNA_V3_snps.txt"), "rs1\ni6000\n");

    const result = await fanOut().generateFormat("FTDNA_V3");

    expect(singleEntry(result.packagePath)).toEqual([
      "sample_FTDNA_V3.csv",
      `${CSV_HEADER}\n"rs1","1","100","TT"\n"i6000","4","20","GG"\n`,
    ]);
  });

  test("gzips LivingDNA output inside the package", async () => {
    writeCombinedTable();
    writeFileSync(join(referenceDir, "LDNA_V1_snps.txt"), "rs2\n");

    const result = await fanOut().generateFormat("LDNA_V1");
    const entries = readPackage(result.packagePath);
    const compressed = entries["sample_LDNA_V1.csv.gz"];

    expect(Object.keys(entries)).toEqual(["sample_LDNA_V1.csv.gz"]);
    expect(compressed !== undefined ? strFromU8(gunzipSync(compressed)) : undefined).toBe(
      `${CSV_HEADER}\n"rs2","2","50","AG"\n`
    );
  });

  test("an LDNA package opens as a flat genotype source", async () => {
    writeCombinedTable();
    writeFileSync(join(referenceDir, "LDNA_V2_snps.txt"), "rs2\n");

    const result = await fanOut().generateFormat("LDNA_V2");
    const resolver = await runWithPlatform(
      openVariantSource(result.packagePath).pipe(Effect.provide(createFakeToolRunner().layer)),
      { logLevel: "none" }
    );

    expect(await Effect.runPromise(resolver.resolve({ chromosome: "2", position: 50 }, "rs2"))).toEqual({
      callCode: "A/G",
      genotype: "A/G",
    });
  });

  test("reuses a package newer than the combined table", async () => {
    writeCombinedTable();
    const generator = fanOut();
    await generator.generateFormat("HOv1");

    const second = await generator.generateFormat("HOv1");

    expect(second).toEqual({ format: "HOv1", packagePath: join(outputDir, "sample_HOv1.zip"), reused: true });
  });

  test("unpacks the combined table from its package when needed", async () => {
    writeFileSync(
      join(outputDir, "sample_CombinedKit.zip"),
      zipSync({ "sample_CombinedKit.txt": strToU8(TABLE) })
    );

    const result = await fanOut().generateFormat("MTHFRGen");

    expect(result.rows).toBe(2);
    expect(readFileSync(join(outputDir, "sample_CombinedKit.txt"), "utf8")).toBe(TABLE);
  });

  test("returns the combined package itself for CombinedKit", async () => {
    writeFileSync(join(outputDir, "sample_CombinedKit.zip"), zipSync({ "sample_CombinedKit.txt": strToU8(TABLE) }));

    const result = await fanOut().generateFormat("CombinedKit");

    expect(result).toEqual({
      format: "CombinedKit",
      packagePath: join(outputDir, "sample_CombinedKit.zip"),
      reused: true,
    });
  });

  test("rejects unknown formats", async () => {
    writeCombinedTable();
    await expect(fanOut().generateFormat("Chip9000")).rejects.toBeInstanceOf(ConfigurationError);
  });

  test("requires the combined table or its package", async () => {
    await expect(fanOut().generateFormat("HOv1")).rejects.toBeInstanceOf(CombinedTableMissingError);
  });
});

describe("processAll", () => {
  const EXTRACT = "rs1\tchr1\t100\tT/T\nrs2\tchr2\t50\tG/A\nrs5\tchr3\t10\tC/C\n";

  beforeEach(() => {
    writeFileSync(join(referenceDir, "genome.fna.gz"), "genome");
    writeFileSync(join(referenceDir, "dbsnp.vcf.gz"), "dbsnp");
    writeFileSync(options.inputPath, "alignment");
    const past = new Date(Date.now() - 3_600_000);
    utimesSync(options.inputPath, past, past);
  });

  test("generates every requested format and keeps the requested combined package", async () => {
    const summary = await fanOut({ extractOutput: EXTRACT }).processAll(["CombinedKit", "HOv1", "Chip9000"]);

    expect(summary.pipeline.state).toBe("AssembledValid");
    expect(summary.generated.map((result) => result.format)).toEqual(["HOv1"]);
    expect(summary.failed.map((failure) => failure.format)).toEqual(["Chip9000"]);
    expect(summary.failed[0]?.error).toBeInstanceOf(ConfigurationError);
    expect(summary.success).toBe(false);

    expect(existsSync(join(outputDir, "sample_CombinedKit.txt"))).toBe(false);
    expect(existsSync(join(outputDir, "sample_CombinedKit.zip"))).toBe(true);
    expect(singleEntry(join(outputDir, "sample_HOv1.zip"))[1]).toBe(
      `${HEADER}\nrs2\t2\t50\tAG\nrs5\t3\t10\tCC\n`
    );
  });

  test("discards the combined package when it was not requested", async () => {
    const summary = await fanOut({ extractOutput: EXTRACT }).processAll(["HOv1"]);

    expect(summary.success).toBe(true);
    expect(existsSync(join(outputDir, "sample_CombinedKit.zip"))).toBe(false);
    expect(existsSync(join(outputDir, "sample_HOv1.zip"))).toBe(true);
  });

  test("generates nothing when the pipeline fails", async () => {
    const summary = await fanOut({ failLabels: ["Call"] }).processAll("all");

    expect(summary.pipeline.state).toBe("Failed");
    expect(summary.generated).toEqual([]);
    expect(summary.failed).toEqual([]);
    expect(summary.success).toBe(false);
  });
});
