/**
 * Command lines for the external tools run by the pipeline
 */

import { referencePath, type PipelineConfig } from "../config";
import type { PipelineArtifacts } from "./artifacts";
import type { ToolInvocation } from "./tool-runner";

/**
 * `bcftools query` format: identifier, chromosome, position, then the
 * genotype of every sample as bases
 */
export const EXTRACT_FORMAT = "%ID\\t%CHROM\\t%POS[\\t%TGT]\\n";

export function pileupCommand(config: PipelineConfig, artifacts: PipelineArtifacts): ToolInvocation {
  return {
    tool: config.tools.bcftools,
    args: [
      "mpileup",
      "-B",
      "-I",
      "-C",
      "50",
      "-f",
      referencePath(config, "genome"),
      "-Ob",
      "-o",
      artifacts.pileup,
      config.inputPath,
    ],
    label: "Pileup",
  };
}

export function callCommand(config: PipelineConfig, artifacts: PipelineArtifacts): ToolInvocation {
  return {
    tool: config.tools.bcftools,
    args: [
      "call",
      artifacts.pileup,
      "--ploidy-file",
      referencePath(config, "ploidy"),
      "-V",
      "indels",
      "-m",
      "-P",
      "0",
      "--threads",
      String(config.threads),
      "-Oz",
      "-o",
      artifacts.called,
    ],
    label: "Call",
  };
}

export function haplotypeCallerCommand(config: PipelineConfig, artifacts: PipelineArtifacts): ToolInvocation {
  return {
    tool: config.tools.gatk,
    args: [
      "--java-options",
      `-Xmx${config.gatkMemory.haplotypeCaller}`,
      "HaplotypeCaller",
      "-R",
      referencePath(config, "genome"),
      "-I",
      config.inputPath,
      "-O",
      artifacts.gvcf,
      "-ERC",
      "BP_RESOLUTION",
      "--native-pair-hmm-threads",
      String(Math.min(8, config.threads)),
    ],
    label: "Call",
  };
}

export function genotypeGvcfsCommand(config: PipelineConfig, artifacts: PipelineArtifacts): ToolInvocation {
  return {
    tool: config.tools.gatk,
    args: [
      "--java-options",
      `-Xmx${config.gatkMemory.genotypeGvcfs}`,
      "GenotypeGVCFs",
      "-R",
      referencePath(config, "genome"),
      "-V",
      artifacts.gvcf,
      "-O",
      artifacts.called,
    ],
    label: "Call",
  };
}

export function annotateCommand(config: PipelineConfig, artifacts: PipelineArtifacts): ToolInvocation {
  return {
    tool: config.tools.bcftools,
    args: [
      "annotate",
      "-a",
      referencePath(config, "variantDatabase"),
      "-c",
      "CHROM,POS,ID",
      "-Oz",
      "-o",
      artifacts.annotated,
      artifacts.called,
    ],
    label: "Annotate",
  };
}

/**
 * Tabix index of a bgzipped VCF; `-f` replaces a stale index
 */
export function indexCommand(config: PipelineConfig, vcfPath: string, label: string): ToolInvocation {
  return { tool: config.tools.tabix, args: ["-f", "-p", "vcf", vcfPath], label };
}

export function extractCommand(config: PipelineConfig, source: string, output: string): ToolInvocation {
  return {
    tool: config.tools.bcftools,
    args: ["query", "-f", EXTRACT_FORMAT, source, "-o", output],
    label: "Extract",
  };
}
