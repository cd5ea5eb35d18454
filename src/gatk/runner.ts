import type { CallerConfig } from "../config/callerConfig.js";
import { CallerError } from "../core/errors.js";
import { fileExists, splitextPlus } from "../core/paths.js";
import type { LocalProcessSpec } from "../execution/backends/types.js";
import { gatkType, type GatkType } from "./version.js";

/**
 * Builds GATK (and Picard) command lines from the caller config. Commands are
 * argv lists; nothing here spawns a process.
 */
export class GatkRunner {
  private jvmOpts: string[];

  constructor(private readonly config: CallerConfig) {
    this.jvmOpts = config.resourcesFor("gatk").jvmOpts;
  }

  gatkVersion(): string {
    const v = this.config.gatkVersion();
    if (!v) {
      throw new CallerError("VERSION_UNSUPPORTED", "GATK version is not configured (programs.gatk.version)");
    }
    return v;
  }

  gatkType(): GatkType {
    return gatkType(this.gatkVersion());
  }

  /** Switch JVM options to those configured for `program`. */
  newResources(program: string): void {
    this.jvmOpts = this.config.resourcesFor(program).jvmOpts;
  }

  clGatk(params: string[], tmpDir: string): LocalProcessSpec {
    const jvm = [...this.jvmOpts, `-Djava.io.tmpdir=${tmpDir}`];
    const programs = this.config.programs;

    if (this.gatkType() === "gatk4") {
      const idx = params.indexOf("-T");
      const tool = idx >= 0 ? params[idx + 1] : undefined;
      if (idx < 0 || !tool) {
        throw new Error("gatk4 command requires -T <tool> in params");
      }
      const rest = [...params.slice(0, idx), ...params.slice(idx + 2)];
      return { kind: "local_process", argv: [programs.gatk.path, "--java-options", jvm.join(" "), tool, ...rest] };
    }

    const jar = programs.gatk.jar;
    if (!jar) {
      throw new CallerError("CONFIG_INVALID", "GATK 3 requires programs.gatk.jar");
    }
    return { kind: "local_process", argv: [programs.java, ...jvm, "-jar", jar, ...params] };
  }

  /** CreateSequenceDictionary for `refFile`, or null when the .dict is already present. */
  async picardIndexRef(refFile: string): Promise<LocalProcessSpec | null> {
    const dictFile = `${splitextPlus(refFile)[0]}.dict`;
    if (await fileExists(dictFile)) return null;
    return {
      kind: "local_process",
      argv: [this.config.programs.picard, "CreateSequenceDictionary", "-R", refFile, "-O", dictFile]
    };
  }
}
