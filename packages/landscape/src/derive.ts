import type { TrialRecord, TrialTable } from "@trialscope/registry";

export const DAYS_PER_MONTH = 30.44;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface LandscapeRow extends TrialRecord {
  startDate: Date | null;
  completionDate: Date | null;
  durationMonths: number | null;
}

const DATE_RE = /^(\d{4})(?:-(\d{2})(?:-(\d{2}))?)?$/;

/**
 * Registry dates are "YYYY-MM-DD" or month precision "YYYY-MM". Month and
 * year precision resolve to the first day. Returns null for anything else.
 */
export function parseRegistryDate(raw: string | null): Date | null {
  if (!raw) return null;
  const m = DATE_RE.exec(raw.trim());
  if (!m) return null;
  const year = Number(m[1]);
  const month = m[2] ? Number(m[2]) : 1;
  const day = m[3] ? Number(m[3]) : 1;
  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC rolls over out-of-range parts, e.g. 2021-02-30 -> March 2.
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

export function durationMonths(start: Date | null, end: Date | null): number | null {
  if (!start || !end) return null;
  const days = Math.floor((end.getTime() - start.getTime()) / MS_PER_DAY);
  return days / DAYS_PER_MONTH;
}

export function deriveLandscapeRows(table: TrialTable): LandscapeRow[] {
  return table.map((record) => {
    const startDate = parseRegistryDate(record.StartDate);
    const completionDate = parseRegistryDate(record.CompletionDate);
    return {
      ...record,
      startDate,
      completionDate,
      durationMonths: durationMonths(startDate, completionDate),
    };
  });
}
