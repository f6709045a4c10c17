/**
 * Normalized shape of one ClinicalTrials.gov study. Field names match the
 * dashboard's column headers.
 */
export interface TrialRecord {
  NCT_ID: string | null;
  Title: string | null;
  Status: string | null;
  Phase: string | null;
  Sponsor: string | null;
  Enrollment: number | null;
  StartDate: string | null;
  CompletionDate: string | null;
}

/** Records in registry page order, never longer than the requested budget. */
export type TrialTable = readonly TrialRecord[];

export const TRIAL_COLUMNS = [
  "NCT_ID",
  "Title",
  "Status",
  "Phase",
  "Sponsor",
  "Enrollment",
  "StartDate",
  "CompletionDate",
] as const satisfies readonly (keyof TrialRecord)[];

export type TrialColumn = (typeof TRIAL_COLUMNS)[number];

export interface Logger {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}
