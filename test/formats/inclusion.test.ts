/**
 * Tests for format inclusion rules
 */

import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, describe, expect, test } from "vitest";
import { hashString, identifierListPath, includes, loadInclusionRule } from "../../src/formats/inclusion";
import { runWithPlatform } from "../../src/io/runtime";

const dir = mkdtempSync(join(tmpdir(), "inclusion-"));

afterAll(() => {
  if (existsSync(dir)) rmSync(dir, { recursive: true, force: true });
});

describe("hashString", () => {
  test("is deterministic", () => {
    expect(hashString("ATCG")).toBe(676518492);
    expect(hashString("rs1")).toBe(160418539);
  });
});

describe("includes", () => {
  test("admits listed identifiers only", () => {
    const rule = { kind: "list", source: "list.txt", identifiers: new Set(["rs7", "i5000"]) } as const;
    expect(includes(rule, "rs7")).toBe(true);
    expect(includes(rule, "i5000")).toBe(true);
    expect(includes(rule, "rs8")).toBe(false);
  });

  test("admits rs identifiers by hash bucket without a list", () => {
    const rule = { kind: "fallback", buckets: 4 } as const;
    // buckets: rs1 → 9, rs2 → 0, rs5 → 3, rs6 → 4
    expect(includes(rule, "rs1")).toBe(false);
    expect(includes(rule, "rs2")).toBe(true);
    expect(includes(rule, "rs5")).toBe(true);
    expect(includes(rule, "rs6")).toBe(false);
  });

  test("never admits other identifiers without a list", () => {
    expect(includes({ kind: "fallback", buckets: 10 }, "i5000")).toBe(false);
  });
});

describe("loadInclusionRule", () => {
  test("reads the format's identifier list", async () => {
    writeFileSync(identifierListPath(dir, "Genera"), "rs10\n\n  rs11 \nrs10\n");

    const rule = await runWithPlatform(loadInclusionRule(dir, "Genera"), { logLevel: "none" });

    expect(rule).toEqual({
      kind: "list",
      source: join(dir, "Genera_snps.txt"),
      identifiers: new Set(["rs10", "rs11"]),
    });
  });

  test("falls back to hash buckets without a list", async () => {
    const rule = await runWithPlatform(loadInclusionRule(dir, "Ancestry_V1"), { logLevel: "none" });
    expect(rule).toEqual({ kind: "fallback", buckets: 6 });
  });
});
