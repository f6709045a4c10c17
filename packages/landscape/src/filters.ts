import type { LandscapeRow } from "./derive.js";

export type FilterColumn = "Status" | "Sponsor";

export interface LandscapeFilters {
  /** Undefined keeps every status; an empty list keeps none. */
  statuses?: readonly (string | null)[];
  sponsors?: readonly (string | null)[];
}

/** Distinct values in first-seen order. A null value is listed once. */
export function distinctValues(
  rows: readonly Pick<LandscapeRow, FilterColumn>[],
  column: FilterColumn
): (string | null)[] {
  return [...new Set(rows.map((r) => r[column]))];
}

export function applyFilters<R extends Pick<LandscapeRow, FilterColumn>>(
  rows: readonly R[],
  filters: LandscapeFilters
): R[] {
  const statuses = filters.statuses ? new Set(filters.statuses) : null;
  const sponsors = filters.sponsors ? new Set(filters.sponsors) : null;
  return rows.filter(
    (r) => (!statuses || statuses.has(r.Status)) && (!sponsors || sponsors.has(r.Sponsor))
  );
}
