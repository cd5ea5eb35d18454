import { promises as fs } from "fs";
import path from "path";
import { newTxId, type TxId } from "../core/ids.js";

// Index and dictionary files a tool may write next to its main output.
const SIDECAR_SUFFIXES = [".tbi", ".idx", ".bai", ".csi"];

export interface FileTransaction {
  txId: TxId;
  txDir: string;
  txPath: string;
}

function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe transaction path: ${name}`);
  }
  return joined;
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Runs `fn` against a temporary path beside `outFile` and moves the result (and
 * any index sidecars) into place only when `fn` resolves. The temporary
 * directory is removed either way, so a failed run leaves no final file behind.
 */
export async function fileTransaction<T>(outFile: string, fn: (tx: FileTransaction) => Promise<T>): Promise<T> {
  const finalPath = path.resolve(outFile);
  const txId = newTxId();
  const txDir = path.join(path.dirname(finalPath), "tx", txId);
  await fs.mkdir(txDir, { recursive: true });
  const txPath = safeJoin(txDir, path.basename(finalPath));

  try {
    const result = await fn({ txId, txDir, txPath });
    if (!(await exists(txPath))) {
      throw new Error(`transaction produced no output: ${path.basename(finalPath)}`);
    }
    for (const suffix of SIDECAR_SUFFIXES) {
      const sidecar = txPath + suffix;
      if (await exists(sidecar)) await fs.rename(sidecar, finalPath + suffix);
    }
    await fs.rename(txPath, finalPath);
    return result;
  } finally {
    await fs.rm(txDir, { recursive: true, force: true });
    await removeIfEmpty(path.join(path.dirname(finalPath), "tx"));
  }
}

async function removeIfEmpty(dir: string): Promise<void> {
  try {
    await fs.rmdir(dir);
  } catch (e) {
    const code = e instanceof Error && "code" in e ? e.code : undefined;
    // Another transaction in the same directory still holds it.
    if (code !== "ENOTEMPTY" && code !== "EEXIST" && code !== "ENOENT") throw e;
  }
}
