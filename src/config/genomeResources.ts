import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { CallerError } from "../core/errors.js";

const zGenomeResources = z.object({
  version: z.number().int(),
  aliases: z.record(z.string(), z.union([z.string(), z.boolean()])).default({}),
  variation: z.record(z.string(), z.string()).default({}),
  rnaseq: z.record(z.string(), z.unknown()).optional()
});

export interface GenomeResources {
  version: number;
  aliases: Record<string, string | boolean>;
  // Absolute paths, resolved against the resource file's directory.
  variation: Record<string, string>;
}

export interface AssocFiles {
  dbsnp?: string;
  cosmic?: string;
}

export async function loadGenomeResources(filePath: string): Promise<GenomeResources> {
  const resolved = path.resolve(filePath);
  const parsed = zGenomeResources.safeParse(YAML.parse(await fs.readFile(resolved, "utf8")) as unknown);
  if (!parsed.success) {
    throw new CallerError("CONFIG_INVALID", `invalid genome resources at ${resolved}:\n${z.prettifyError(parsed.error)}`);
  }

  const baseDir = path.dirname(resolved);
  const variation: Record<string, string> = {};
  for (const [k, v] of Object.entries(parsed.data.variation)) {
    variation[k] = path.isAbsolute(v) ? v : path.resolve(baseDir, v);
  }
  return { version: parsed.data.version, aliases: parsed.data.aliases, variation };
}

export function assocFilesFromResources(resources: GenomeResources): AssocFiles {
  const out: AssocFiles = {};
  if (resources.variation["dbsnp"]) out.dbsnp = resources.variation["dbsnp"];
  if (resources.variation["cosmic"]) out.cosmic = resources.variation["cosmic"];
  return out;
}
