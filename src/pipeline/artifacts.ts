/**
 * Artifact paths for one input alignment
 *
 * Intermediates live in the temp directory and are keyed by the input's base
 * name (everything before its first dot), so several samples can share one
 * output directory.
 */

import { basename, join } from "node:path";
import type { PipelineConfig } from "../config";

export interface PipelineArtifacts {
  readonly base: string;
  readonly pileup: string;
  readonly gvcf: string;
  readonly called: string;
  readonly calledIndex: string;
  readonly annotated: string;
  readonly annotatedIndex: string;
  readonly extracted: string;
  readonly sorted: string;
  readonly combinedTable: string;
  readonly combinedPackage: string;
}

export const COMBINED_FORMAT = "CombinedKit";

/**
 * Input file name up to its first dot: `sample.sorted.bam` → `sample`
 */
export function inputBaseName(inputPath: string): string {
  const name = basename(inputPath);
  const dot = name.indexOf(".");
  return dot > 0 ? name.slice(0, dot) : name;
}

export function artifactPaths(config: PipelineConfig): PipelineArtifacts {
  const base = inputBaseName(config.inputPath);
  const temp = (suffix: string) => join(config.tempDir, `${base}${suffix}`);
  const called = temp("_called.vcf.gz");
  const annotated = temp("_annotated.vcf.gz");

  return {
    base,
    pileup: temp("_pileup.bcf"),
    gvcf: temp("_gatk.g.vcf.gz"),
    called,
    calledIndex: `${called}.tbi`,
    annotated,
    annotatedIndex: `${annotated}.tbi`,
    extracted: temp("_result.tab"),
    sorted: temp("_result_sorted.tab"),
    combinedTable: join(config.outputDir, `${base}_${COMBINED_FORMAT}.txt`),
    combinedPackage: join(config.outputDir, `${base}_${COMBINED_FORMAT}.zip`),
  };
}
