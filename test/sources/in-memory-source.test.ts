/**
 * Tests for the in-memory VCF record source
 */

import { Effect, Option } from "effect";
import { describe, expect, test } from "vitest";
import { InMemoryRecordSource } from "../../src/sources/in-memory-source";

const vcf = [
  "##fileformat=VCFv4.2",
  "#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO\tFORMAT\tSAMPLE",
  "chr1\t100\trs10\tA\tG\t.\t.\t.\tGT\t0/1",
  "chr1\t100\trs11\tA\tT\t.\t.\t.\tGT\t1/1",
  "chrM\t73\t.\tA\tG\t.\t.\t.\tGT\t1",
].join("\n");

describe("InMemoryRecordSource", () => {
  const source = InMemoryRecordSource.fromText(vcf);

  test("indexes every data line by coordinate, first one winning", async () => {
    expect(source.size).toBe(2);
    const found = await Effect.runPromise(source.findByCoordinate({ chromosome: "1", position: 100 }));
    expect(Option.getOrUndefined(found)?.identifier).toBe("rs10");
  });

  test("indexes records by identifier", async () => {
    const found = await Effect.runPromise(source.findByIdentifier("rs11"));
    expect(Option.getOrUndefined(found)?.alternates).toEqual(["T"]);
  });

  test("normalizes chromosome naming on both sides", async () => {
    const viaMT = await Effect.runPromise(source.findByCoordinate({ chromosome: "MT", position: 73 }));
    const viaChr = await Effect.runPromise(source.findByCoordinate({ chromosome: "chr1", position: 100 }));
    expect(Option.isSome(viaMT)).toBe(true);
    expect(Option.isSome(viaChr)).toBe(true);
  });

  test("is not concurrent", () => {
    expect(source.concurrent).toBe(false);
  });
});
