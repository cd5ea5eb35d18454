import { promises as fs } from "fs";
import path from "path";

const COMPRESSED_EXTS = new Set([".gz", ".bz2", ".zip"]);

/** Like path.extname but keeps compression suffixes attached: "a.vcf.gz" -> ["a", ".vcf.gz"]. */
export function splitextPlus(file: string): [string, string] {
  let ext = path.extname(file);
  let base = file.slice(0, file.length - ext.length);
  if (COMPRESSED_EXTS.has(ext)) {
    const inner = path.extname(base);
    base = base.slice(0, base.length - inner.length);
    ext = inner + ext;
  }
  return [base, ext];
}

export async function fileExists(file: string): Promise<boolean> {
  try {
    const st = await fs.stat(file);
    return st.isFile() && st.size > 0;
  } catch {
    return false;
  }
}

export async function isNewerThan(file: string, other: string): Promise<boolean> {
  try {
    const [a, b] = await Promise.all([fs.stat(file), fs.stat(other)]);
    return a.mtimeMs >= b.mtimeMs;
  } catch {
    return false;
  }
}
