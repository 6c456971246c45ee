/**
 * Tests for the SnpReporter Promise API
 */

import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { CatalogUnavailableError, UnknownSectionError } from "../../src/errors";
import { SnpReporter } from "../../src/report/reporter";
import { createFakeToolRunner } from "../utils/tool-layers";

const dir = mkdtempSync(join(tmpdir(), "reporter-"));
const catalogPath = join(dir, "snp_catalog.json");

beforeAll(() => {
  writeFileSync(
    catalogPath,
    JSON.stringify({
      categories: {
        metabolism: [
          { rs_id: "rs1801133", position: "1:11856378", ref_genotype: "C/C", alt_genotype: "T/T", description: "MTHFR C677T" },
        ],
        sleep: [
          { rs_id: "rs5751876", position: "22:24441333", ref_genotype: "T/T", alt_genotype: "C/C", description: "ADORA2A" },
        ],
      },
    })
  );
  writeFileSync(join(dir, "kit.txt"), "# rsid\tchromosome\tposition\tgenotype\nrs1801133\t1\t11856378\tCT\n");
  writeFileSync(
    join(dir, "calls.vcf"),
    "##fileformat=VCFv4.2\n22\t24441333\t.\tT\tC\t.\t.\t.\tGT\t1/1\n"
  );
});

afterAll(() => {
  if (existsSync(dir)) rmSync(dir, { recursive: true, force: true });
});

describe("SnpReporter", () => {
  test("reports a flat table", async () => {
    const reporter = await SnpReporter.open(join(dir, "kit.txt"), { catalogPath, logLevel: "none" });
    const reports = await reporter.run(["metabolism"]);

    expect(reports).toEqual([
      {
        section: "metabolism",
        results: [
          { identifier: "rs1801133", genotype: "C/T", status: "CARRIER", interpretation: "MTHFR C677T", callCode: "C/T" },
        ],
      },
    ]);
  });

  test("reports a VCF, looking records up by coordinate", async () => {
    const reporter = await SnpReporter.open(join(dir, "calls.vcf"), { catalogPath, logLevel: "none" });
    const [sleep] = await reporter.run(["sleep"]);
    expect(sleep?.results[0]).toEqual({
      identifier: "rs5751876",
      genotype: "C/C",
      status: "RISK",
      interpretation: "ADORA2A",
      callCode: "1/1",
    });
  });

  test("reports every section by default", async () => {
    const reporter = await SnpReporter.open(join(dir, "kit.txt"), { catalogPath, logLevel: "none" });
    const reports = await reporter.run();
    expect(reports.map((entry) => entry.section)).toEqual(["metabolism", "sleep"]);
    expect(reports[1]?.results[0]?.status).toBe("UNKNOWN");
  });

  test("lists sections in catalog order", async () => {
    const reporter = await SnpReporter.open(join(dir, "kit.txt"), { catalogPath, logLevel: "none" });
    expect(reporter.listSections()).toEqual(["metabolism", "sleep"]);
  });

  test("rejects unknown sections", async () => {
    const reporter = await SnpReporter.open(join(dir, "kit.txt"), { catalogPath, logLevel: "none" });
    await expect(reporter.run(["sleep", "astrology"])).rejects.toBeInstanceOf(UnknownSectionError);
  });

  test("fails to open without a catalog", async () => {
    await expect(
      SnpReporter.open(join(dir, "kit.txt"), { referenceDir: join(dir, "nowhere"), logLevel: "none" })
    ).rejects.toBeInstanceOf(CatalogUnavailableError);
  });

  test("queries compressed VCF through the tool runner", async () => {
    const vcfPath = join(dir, "calls.vcf.gz");
    writeFileSync(vcfPath, "placeholder");
    const tools = createFakeToolRunner({
      viewOutput: { 'ID=="rs1801133"': "1\t11856378\trs1801133\tC\tT\t.\t.\t.\tGT\t0/0\n" },
    });

    const reporter = await SnpReporter.open(vcfPath, { catalogPath, logLevel: "none", toolRunner: tools.layer });
    const [metabolism] = await reporter.run(["metabolism"]);

    expect(metabolism?.results[0]?.status).toBe("GOOD");
    expect(tools.invocations[0]?.label).toBe("lookup-id");
  });
});
