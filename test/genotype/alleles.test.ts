/**
 * Tests for allele complement and raw genotype normalization
 */

import { describe, expect, test } from "vitest";
import { InvalidGenotypeError } from "../../src/errors";
import {
  complement,
  complementGenotype,
  isCanonicalGenotype,
  isUnknownGenotype,
  parseRawGenotype,
  reverseGenotype,
  splitGenotype,
  tryParseRawGenotype,
} from "../../src/genotype/alleles";
import { UNKNOWN_GENOTYPE } from "../../src/types";

describe("complement", () => {
  test("pairs A with T and C with G", () => {
    expect(complement("A")).toBe("T");
    expect(complement("T")).toBe("A");
    expect(complement("C")).toBe("G");
    expect(complement("G")).toBe("C");
  });

  test("maps N and gap to themselves", () => {
    expect(complement("N")).toBe("N");
    expect(complement("-")).toBe("-");
  });

  test("preserves lowercase", () => {
    expect(complement("a")).toBe("t");
    expect(complement("g")).toBe("c");
    expect(complement("n")).toBe("n");
  });

  test("returns characters outside the alphabet unchanged", () => {
    expect(complement("X")).toBe("X");
    expect(complement(".")).toBe(".");
  });
});

describe("parseRawGenotype", () => {
  test("splits two-letter tokens", () => {
    expect(parseRawGenotype("AG")).toBe("A/G");
    expect(parseRawGenotype("ag")).toBe("A/G");
  });

  test("removes slash and pipe delimiters", () => {
    expect(parseRawGenotype("A/G")).toBe("A/G");
    expect(parseRawGenotype("C|T")).toBe("C/T");
  });

  test("expands single alleles to a homozygous pair", () => {
    expect(parseRawGenotype("T")).toBe("T/T");
  });

  test("accepts gaps and no-calls", () => {
    expect(parseRawGenotype("--")).toBe("-/-");
    expect(parseRawGenotype("NN")).toBe("N/N");
  });

  test("keeps the allele order of the token", () => {
    expect(parseRawGenotype("GA")).toBe("G/A");
  });

  test("rejects tokens outside the alphabet", () => {
    expect(() => parseRawGenotype("AGT")).toThrow(InvalidGenotypeError);
    expect(() => parseRawGenotype("")).toThrow(InvalidGenotypeError);
    expect(() => parseRawGenotype("0/1")).toThrow(InvalidGenotypeError);
    expect(() => parseRawGenotype("XY")).toThrow('Invalid genotype token: "XY"');
  });

  test("carries the rejected token", () => {
    try {
      parseRawGenotype("II");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidGenotypeError);
      if (error instanceof InvalidGenotypeError) {
        expect(error.token).toBe("II");
        expect(error.code).toBe("INVALID_GENOTYPE");
      }
    }
  });
});

describe("tryParseRawGenotype", () => {
  test("returns undefined instead of throwing", () => {
    expect(tryParseRawGenotype("DI")).toBeUndefined();
    expect(tryParseRawGenotype("cc")).toBe("C/C");
  });
});

describe("genotype helpers", () => {
  test("splitGenotype returns both alleles", () => {
    expect(splitGenotype("A/G")).toEqual(["A", "G"]);
  });

  test("reverseGenotype swaps allele order", () => {
    expect(reverseGenotype("A/G")).toBe("G/A");
    expect(reverseGenotype("T/T")).toBe("T/T");
  });

  test("complementGenotype complements each allele in place", () => {
    expect(complementGenotype("A/G")).toBe("T/C");
    expect(complementGenotype("-/N")).toBe("-/N");
  });

  test("isCanonicalGenotype accepts only the X/Y uppercase form", () => {
    expect(isCanonicalGenotype("A/G")).toBe(true);
    expect(isCanonicalGenotype("AG")).toBe(false);
    expect(isCanonicalGenotype("a/g")).toBe(false);
    expect(isCanonicalGenotype("A/GG")).toBe(false);
  });

  test("isUnknownGenotype recognizes the sentinel", () => {
    expect(isUnknownGenotype(UNKNOWN_GENOTYPE)).toBe(true);
    expect(isUnknownGenotype("A/A")).toBe(false);
  });
});
