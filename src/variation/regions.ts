import { promises as fs } from "fs";
import { gunzipSync } from "zlib";
import { CallerError } from "../core/errors.js";
import { splitextPlus } from "../core/paths.js";
import { fileTransaction } from "../execution/transaction.js";
import type { BatchItem, PairedSamples } from "./samples.js";

/** 0-based half-open like BED. `end: null` covers the whole chromosome. */
export interface IntervalRegion {
  kind: "interval";
  chrom: string;
  start: number;
  end: number | null;
}

export interface BedRegion {
  kind: "bed";
  path: string;
}

export type Region = IntervalRegion | BedRegion;

export interface BedInterval {
  chrom: string;
  start: number;
  end: number;
}

const INTERVAL_RE = /^([^:\s]+):([\d,]+)-([\d,]+)$/;
const BED_RE = /\.bed(\.gz)?$/i;

function toInt(raw: string): number {
  return Number(raw.replace(/,/g, ""));
}

/** Accepts "chr1:1,001-2,000" (1-based, inclusive), "chr1", or a BED file path. */
export function parseRegion(value: string): Region {
  const trimmed = value.trim();
  const m = INTERVAL_RE.exec(trimmed);
  if (m && m[1] && m[2] && m[3]) {
    const start = toInt(m[2]);
    const end = toInt(m[3]);
    if (start < 1 || end < start) {
      throw new CallerError("REGION_INVALID", `invalid region bounds: ${value}`);
    }
    return { kind: "interval", chrom: m[1], start: start - 1, end };
  }
  if (BED_RE.test(trimmed)) return { kind: "bed", path: trimmed };
  if (/^[A-Za-z0-9_.]+$/.test(trimmed)) return { kind: "interval", chrom: trimmed, start: 0, end: null };
  throw new CallerError("REGION_INVALID", `unrecognized region: ${value}`);
}

export function regionToGatk(region: Region): string {
  if (region.kind === "bed") return region.path;
  if (region.end === null) return region.chrom;
  return `${region.chrom}:${region.start + 1}-${region.end}`;
}

export async function readBed(file: string): Promise<BedInterval[]> {
  const raw = await fs.readFile(file);
  const text = (file.endsWith(".gz") ? gunzipSync(raw) : raw).toString("utf8");
  const out: BedInterval[] = [];
  for (const line of text.split(/\r?\n/)) {
    if (!line.trim() || line.startsWith("#") || line.startsWith("track") || line.startsWith("browser")) continue;
    const [chrom, start, end] = line.split("\t");
    if (!chrom || start === undefined || end === undefined) {
      throw new CallerError("REGION_INVALID", `malformed BED line in ${file}: ${line}`);
    }
    const s = Number(start);
    const e = Number(end);
    if (!/^\d+$/.test(start) || !/^\d+$/.test(end.trim()) || e < s) {
      throw new CallerError("REGION_INVALID", `invalid BED coordinates in ${file}: ${line}`);
    }
    out.push({ chrom, start: s, end: e });
  }
  return out;
}

/** Sorts by chromosome (first-seen order) and start, merging overlapping or touching intervals. */
export function mergeIntervals(intervals: BedInterval[]): BedInterval[] {
  const order = new Map<string, number>();
  for (const i of intervals) if (!order.has(i.chrom)) order.set(i.chrom, order.size);

  const sorted = [...intervals].sort(
    (a, b) => (order.get(a.chrom) ?? 0) - (order.get(b.chrom) ?? 0) || a.start - b.start || a.end - b.end
  );
  const out: BedInterval[] = [];
  for (const cur of sorted) {
    const last = out[out.length - 1];
    if (last && last.chrom === cur.chrom && cur.start <= last.end) {
      last.end = Math.max(last.end, cur.end);
    } else {
      out.push({ ...cur });
    }
  }
  return out;
}

export function totalCoverage(intervals: BedInterval[]): number {
  return mergeIntervals(intervals).reduce((sum, i) => sum + (i.end - i.start), 0);
}

export function intersectIntervals(a: BedInterval[], b: Array<{ chrom: string; start: number; end: number | null }>): BedInterval[] {
  const out: BedInterval[] = [];
  for (const x of a) {
    for (const y of b) {
      if (x.chrom !== y.chrom) continue;
      const start = Math.max(x.start, y.start);
      const end = Math.min(x.end, y.end ?? Number.POSITIVE_INFINITY);
      if (end > start) out.push({ chrom: x.chrom, start, end });
    }
  }
  return mergeIntervals(out);
}

function itemVariantRegions(item: BatchItem): string | null {
  return item.variantRegions ?? item.callableRegions ?? null;
}

/**
 * The variant regions that apply to a whole batch: the tumor's for a pair,
 * otherwise the sample BED with the largest total coverage.
 */
export async function populationVariantRegions(items: BatchItem[], paired: PairedSamples | null): Promise<string | null> {
  const [only] = items;
  if (items.length === 1 && only) return itemVariantRegions(only);
  if (paired) return itemVariantRegions(paired.tumor);

  let best: { coverage: number; bed: string } | null = null;
  for (const item of items) {
    const bed = itemVariantRegions(item);
    if (!bed) continue;
    const coverage = totalCoverage(await readBed(bed));
    if (!best || coverage > best.coverage || (coverage === best.coverage && bed > best.bed)) {
      best = { coverage, bed };
    }
  }
  return best?.bed ?? null;
}

// null when the file has not been written yet.
async function fileSize(file: string): Promise<number | null> {
  try {
    return (await fs.stat(file)).size;
  } catch (e) {
    const code = e instanceof Error && "code" in e ? e.code : undefined;
    if (code === "ENOENT") return null;
    throw e;
  }
}

async function regionIntervals(region: Region): Promise<Array<{ chrom: string; start: number; end: number | null }>> {
  if (region.kind === "interval") return [region];
  return readBed(region.path);
}

/**
 * Restricts calling to the batch's variant regions within `region`. Writes
 * `<outFile base>-regions.bed` once and reuses it; an empty intersection falls
 * back to the region itself.
 */
export async function subsetVariantRegions(
  variantRegions: string | null,
  region: Region | null,
  outFile: string
): Promise<Region | null> {
  if (region === null) return variantRegions ? { kind: "bed", path: variantRegions } : null;
  if (variantRegions === null) return region;
  if (region.kind === "bed" && region.path.indexOf(":") > 0) {
    throw new CallerError("REGION_INVALID", `partial chromosome regions not supported as files: ${region.path}`);
  }

  const subsetFile = `${splitextPlus(outFile)[0]}-regions.bed`;
  let size = await fileSize(subsetFile);

  if (size === null) {
    const subset = intersectIntervals(await readBed(variantRegions), await regionIntervals(region));
    await fileTransaction(subsetFile, async (tx) => {
      await fs.writeFile(tx.txPath, subset.map((i) => `${i.chrom}\t${i.start}\t${i.end}\n`).join(""), "utf8");
    });
    size = (await fs.stat(subsetFile)).size;
  }

  return size === 0 ? region : { kind: "bed", path: subsetFile };
}
