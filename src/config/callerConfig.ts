import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { sha256Prefixed, stableJsonStringify, type Sha256Ref } from "../core/canonicalJson.js";
import { CallerError } from "../core/errors.js";

const DEFAULT_JVM_OPTS = ["-Xms750m", "-Xmx3500m"];

const zProgramResources = z.object({
  jvm_opts: z.array(z.string()).optional(),
  options: z.array(z.union([z.string(), z.number()])).optional()
});

export const zCallerConfig = z.object({
  version: z.number().int(),
  programs: z
    .object({
      gatk: z
        .object({
          path: z.string().min(1).default("gatk"),
          jar: z.string().min(1).nullable().default(null),
          version: z.string().min(1).nullable().default(null)
        })
        .prefault({}),
      java: z.string().min(1).default("java"),
      bgzip: z.string().min(1).default("bgzip"),
      tabix: z.string().min(1).default("tabix"),
      samtools: z.string().min(1).default("samtools"),
      picard: z.string().min(1).default("picard")
    })
    .prefault({}),
  resources: z.record(z.string(), zProgramResources).default({}),
  annotations: z
    .object({
      extra: z.array(z.string().min(1)).default([]),
      exclude: z.array(z.string().min(1)).default([])
    })
    .prefault({}),
  mutect2: z
    .object({
      use_assoc_files: z.boolean().default(false)
    })
    .prefault({}),
  genome: z
    .object({
      resources_path: z.string().min(1).nullable().default(null)
    })
    .prefault({}),
  quotas: z
    .object({
      max_runtime_seconds: z.number().int().min(1).default(172800)
    })
    .prefault({})
});

export type CallerConfigShape = z.output<typeof zCallerConfig>;
export type Programs = CallerConfigShape["programs"];

function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return null;
  const v = process.env[varName]?.trim();
  return v ? v : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expandSection(section: unknown): unknown {
  if (!isRecord(section)) return section;
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(section)) {
    if (typeof v === "string") {
      const expanded = expandEnvToken(v);
      if (expanded !== null) out[k] = expanded;
    } else {
      out[k] = expandSection(v);
    }
  }
  return out;
}

// Program paths and the genome resources path may be given as ${VAR}; an unset
// variable drops the key so the schema default applies.
function expandConfigEnv(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;
  const obj = { ...raw };
  if ("programs" in obj) obj.programs = expandSection(obj.programs);
  if ("genome" in obj) obj.genome = expandSection(obj.genome);
  return obj;
}

export class CallerConfig {
  readonly configHash: Sha256Ref;

  constructor(
    private readonly config: CallerConfigShape,
    private readonly baseDir: string = process.cwd()
  ) {
    this.configHash = sha256Prefixed(stableJsonStringify(config));
  }

  static parse(raw: unknown, baseDir?: string): CallerConfig {
    const parsed = zCallerConfig.safeParse(expandConfigEnv(raw));
    if (!parsed.success) {
      throw new CallerError("CONFIG_INVALID", `invalid caller config:\n${z.prettifyError(parsed.error)}`);
    }
    return new CallerConfig(parsed.data, baseDir);
  }

  static async loadFromFile(filePath: string): Promise<CallerConfig> {
    const raw = await fs.readFile(filePath, "utf8");
    let doc: unknown;
    try {
      doc = YAML.parse(raw) as unknown;
    } catch (e) {
      throw new CallerError("CONFIG_INVALID", `invalid caller config at ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    }
    return CallerConfig.parse(doc, path.dirname(path.resolve(filePath)));
  }

  get programs(): Programs {
    return this.config.programs;
  }

  gatkVersion(): string | null {
    return this.config.programs.gatk.version;
  }

  /** Resources for one program, falling back to the shared `gatk` entry for JVM options. */
  resourcesFor(program: string): { jvmOpts: string[]; options: string[] } {
    const own = this.config.resources[program];
    const shared = this.config.resources["gatk"];
    return {
      jvmOpts: own?.jvm_opts ?? shared?.jvm_opts ?? DEFAULT_JVM_OPTS,
      options: (own?.options ?? []).map((o) => String(o))
    };
  }

  annotationOverrides(): { extra: string[]; exclude: string[] } {
    return this.config.annotations;
  }

  useAssocFiles(): boolean {
    return this.config.mutect2.use_assoc_files;
  }

  genomeResourcesPath(): string | null {
    const p = this.config.genome.resources_path;
    return p ? path.resolve(this.baseDir, p) : null;
  }

  maxRuntimeSeconds(): number {
    return this.config.quotas.max_runtime_seconds;
  }
}
