import type { LandscapeRow } from "./derive.js";

export interface CountEntry {
  label: string;
  count: number;
}

export interface HistogramBin {
  /** Inclusive lower edge. */
  start: number;
  /** Exclusive upper edge, inclusive for the last bin. */
  end: number;
  count: number;
}

/** Counts of non-null values, largest first; ties keep first-seen order. */
export function valueCounts(values: readonly (string | null)[]): CountEntry[] {
  const counts = new Map<string, number>();
  for (const v of values) {
    if (v === null) continue;
    counts.set(v, (counts.get(v) ?? 0) + 1);
  }
  return [...counts].map(([label, count]) => ({ label, count })).sort((a, b) => b.count - a.count);
}

export function statusCounts(rows: readonly LandscapeRow[]): CountEntry[] {
  return valueCounts(rows.map((r) => r.Status));
}

export function topSponsors(rows: readonly LandscapeRow[], n = 5): CountEntry[] {
  return valueCounts(rows.map((r) => r.Sponsor)).slice(0, n);
}

export function enrollmentHistogram(rows: readonly LandscapeRow[], bins = 10): HistogramBin[] {
  if (!Number.isInteger(bins) || bins < 1) throw new RangeError(`bins must be a positive integer, got ${bins}`);
  const values = rows
    .map((r) => r.Enrollment)
    .filter((v): v is number => v !== null && Number.isFinite(v));
  if (values.length === 0) return [];

  const min = Math.min(...values);
  const max = Math.max(...values);
  if (min === max) return [{ start: min, end: max, count: values.length }];

  const width = (max - min) / bins;
  const out: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    start: min + i * width,
    end: i === bins - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));
  for (const v of values) {
    const idx = Math.min(Math.floor((v - min) / width), bins - 1);
    const bin = out[idx];
    if (bin) bin.count++;
  }
  return out;
}
