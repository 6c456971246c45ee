/**
 * SNP report over a sample's variant calls
 *
 * Usage: tsx examples/snp-report.ts <calls.vcf.gz | kit.txt> [section...]
 *
 * Prints every selected catalog section as a table of identifier, genotype,
 * status and interpretation, with call codes for VCF input.
 */

import { AllelicError, SnpReporter, STATUS_TONE } from "../src";

const TONE_MARKERS = {
  positive: "+",
  negative: "!",
  caution: "~",
  neutral: " ",
} as const;

async function main(): Promise<void> {
  const [inputPath, ...sections] = process.argv.slice(2);
  if (inputPath === undefined) {
    console.error("Usage: snp-report <calls.vcf.gz | kit.txt> [section...]");
    process.exitCode = 2;
    return;
  }

  const reporter = await SnpReporter.open(inputPath, { referenceDir: "./data/reference", logLevel: "warning" });
  const reports = await reporter.run(sections.length > 0 ? sections : "all");

  for (const report of reports) {
    console.log(`\n=== ${report.section.toUpperCase()} ===`);
    for (const result of report.results) {
      const marker = TONE_MARKERS[STATUS_TONE[result.status]];
      const call = result.callCode !== undefined ? ` [${result.callCode}]` : "";
      console.log(
        `${marker} ${result.identifier.padEnd(12)} ${result.genotype.padEnd(16)} ${result.status.padEnd(8)} ${result.interpretation}${call}`
      );
    }
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof AllelicError ? error.toString() : error);
  process.exitCode = 1;
});
