/**
 * Alignment to consumer microarray formats
 *
 * Usage: tsx examples/generate-formats.ts <sample.bam> <output-dir> [format...]
 *
 * Runs the variant-calling pipeline (resuming from whatever a previous run
 * left behind), then packages each requested format next to the combined
 * table. Needs bcftools and tabix on PATH and the reference files in
 * ./data/reference.
 */

import { AVAILABLE_FORMATS, FormatFanOut } from "../src";

async function main(): Promise<void> {
  const [inputPath, outputDir, ...formats] = process.argv.slice(2);
  if (inputPath === undefined || outputDir === undefined) {
    console.error("Usage: generate-formats <sample.bam> <output-dir> [format...]");
    console.error(`Formats: ${AVAILABLE_FORMATS.join(", ")}`);
    process.exitCode = 2;
    return;
  }

  const fanOut = new FormatFanOut({ inputPath, outputDir, referenceDir: "./data/reference" });
  const summary = await fanOut.processAll(formats.length > 0 ? formats : "all");

  if (summary.pipeline.state === "Failed") {
    console.error(`Pipeline failed: ${summary.pipeline.error.message}`);
    process.exitCode = 1;
    return;
  }

  for (const warning of summary.pipeline.warnings) {
    console.warn(`warning: ${warning}`);
  }
  for (const result of summary.generated) {
    console.log(`${result.reused ? "reused" : "wrote "} ${result.packagePath}`);
  }
  for (const failure of summary.failed) {
    console.error(`failed ${failure.format}: ${failure.error.message}`);
  }
  process.exitCode = summary.success ? 0 : 1;
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
