import { CallerError } from "../core/errors.js";

export type GatkType = "gatk4" | "restricted" | "lite";

export const MUTECT2_MIN_GATK_VERSION = "3.5";

type VersionPart = number | string;

function versionParts(version: string): VersionPart[] {
  const out: VersionPart[] = [];
  for (const token of version.toLowerCase().split(/(\d+|[a-z]+|\.)/)) {
    if (token === "" || token === ".") continue;
    out.push(/^\d+$/.test(token) ? Number(token) : token);
  }
  return out;
}

function comparePart(a: VersionPart, b: VersionPart): -1 | 0 | 1 {
  if (typeof a === "number" && typeof b === "number") return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Loose comparison: "3.8-1-0-gf15c1c3ef" > "3.5" > "3.4.46" and "4.1.4.0" > "3.8".
 * Numeric components sort before alphabetic ones at the same position.
 */
export function compareLooseVersion(a: string, b: string): -1 | 0 | 1 {
  const pa = versionParts(a);
  const pb = versionParts(b);
  const n = Math.min(pa.length, pb.length);
  for (let i = 0; i < n; i++) {
    const x = pa[i];
    const y = pb[i];
    if (x === undefined || y === undefined) break;
    const c = comparePart(x, y);
    if (c !== 0) return c;
  }
  if (pa.length === pb.length) return 0;
  return pa.length < pb.length ? -1 : 1;
}

export function gatkMajorVersion(version: string): string {
  const trimmed = version.trim().replace(/^v/, "");
  if (trimmed.startsWith("nightly-")) return "3.6";
  const release = trimmed.split("-")[0] ?? trimmed;
  return release.split(".").slice(0, 2).join(".");
}

export function gatkType(version: string): GatkType {
  if (/lite/i.test(version)) return "lite";
  return compareLooseVersion(gatkMajorVersion(version), "4.0") >= 0 ? "gatk4" : "restricted";
}

export function assertMinimumVersion(version: string | null | undefined, minimum: string, context: string): string {
  const v = version?.trim();
  if (!v) {
    throw new CallerError(
      "VERSION_UNSUPPORTED",
      `${context}: GATK version is not configured (programs.gatk.version); require full GATK ${minimum}+`
    );
  }
  if (gatkType(v) === "lite") {
    throw new CallerError("VERSION_UNSUPPORTED", `${context}: GATK lite (${v}) is not supported; require full GATK ${minimum}+`);
  }
  if (compareLooseVersion(gatkMajorVersion(v), minimum) < 0) {
    throw new CallerError("VERSION_UNSUPPORTED", `${context}: require full version of GATK ${minimum}+ (configured ${v})`, {
      version: v,
      minimum
    });
  }
  return v;
}
