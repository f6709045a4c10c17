import type { LandscapeRow } from "./derive.js";

export interface LandscapeSummary {
  totalTrials: number;
  activeSponsors: number;
  medianEnrollment: number | null;
  medianDurationMonths: number | null;
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid] ?? null;
  const lo = sorted[mid - 1];
  const hi = sorted[mid];
  return lo === undefined || hi === undefined ? null : (lo + hi) / 2;
}

function present(values: readonly (number | null)[]): number[] {
  return values.filter((v): v is number => v !== null && Number.isFinite(v));
}

/** Headline numbers for the dashboard; nulls are skipped, never counted as zero. */
export function summarize(rows: readonly LandscapeRow[]): LandscapeSummary {
  const sponsors = new Set<string>();
  for (const r of rows) if (r.Sponsor !== null) sponsors.add(r.Sponsor);

  const enrollment = median(present(rows.map((r) => r.Enrollment)));
  return {
    totalTrials: rows.length,
    activeSponsors: sponsors.size,
    medianEnrollment: enrollment === null ? null : Math.trunc(enrollment),
    medianDurationMonths: median(present(rows.map((r) => r.durationMonths))),
  };
}
