import type { GatkType } from "../gatk/version.js";

export interface AnnotationOptions {
  includeDepth?: boolean;
  includeBaseQRankSum?: boolean;
  extra?: string[];
  exclude?: string[];
}

export function getGatkAnnotations(type: GatkType, opts: AnnotationOptions = {}): string[] {
  const anns = ["MappingQualityRankSumTest", "MappingQualityZero", "QualByDepth", "ReadPosRankSumTest", "RMSMappingQuality"];
  if (opts.includeBaseQRankSum ?? true) anns.push("BaseQualityRankSumTest");
  anns.push("FisherStrand");
  if (type === "gatk4") {
    anns.push("MappingQuality");
  } else {
    anns.push("GCContent", "HaplotypeScore", "HomopolymerRun");
  }
  if (opts.includeDepth ?? true) {
    anns.push("DepthPerAlleleBySample", "Coverage");
  }

  for (const a of opts.extra ?? []) {
    if (!anns.includes(a)) anns.push(a);
  }
  const exclude = new Set(opts.exclude ?? []);
  return anns.filter((a) => !exclude.has(a));
}
