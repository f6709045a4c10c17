import type { TrialRecord } from "./types.js";

function isRecord(x: unknown): x is Record<string, unknown> {
  return x != null && typeof x === "object" && !Array.isArray(x);
}

/**
 * Walk `keys` into a parsed JSON value. Returns null as soon as a step is
 * missing or is not an object, so absent modules never throw.
 */
export function getPath(value: unknown, ...keys: string[]): unknown {
  let current: unknown = value;
  for (const key of keys) {
    if (!isRecord(current)) return null;
    current = current[key];
    if (current === undefined) return null;
  }
  return current ?? null;
}

export function getString(value: unknown, ...keys: string[]): string | null {
  const leaf = getPath(value, ...keys);
  return typeof leaf === "string" ? leaf : null;
}

export function getNumber(value: unknown, ...keys: string[]): number | null {
  const leaf = getPath(value, ...keys);
  return typeof leaf === "number" && Number.isFinite(leaf) ? leaf : null;
}

function firstString(list: unknown): string | null {
  if (!Array.isArray(list) || list.length === 0) return null;
  const head: unknown = list[0];
  return typeof head === "string" ? head : null;
}

/**
 * Map one `studies[]` entry of a v2 search page to a flat record.
 * Older payloads nest phases under `phaseList` and report enrollment as
 * `enrollmentInfo.value`; both layouts are read.
 */
export function extractTrialRecord(study: unknown): TrialRecord {
  const protocol = getPath(study, "protocolSection");
  const design = getPath(protocol, "designModule");
  const status = getPath(protocol, "statusModule");

  const phases = getPath(design, "phases") ?? getPath(design, "phaseList", "phases");

  return {
    NCT_ID: getString(protocol, "identificationModule", "nctId"),
    Title: getString(protocol, "identificationModule", "briefTitle"),
    Status: getString(status, "overallStatus"),
    Phase: firstString(phases),
    Sponsor: getString(protocol, "sponsorCollaboratorsModule", "leadSponsor", "name"),
    Enrollment:
      getNumber(design, "enrollmentInfo", "count") ?? getNumber(design, "enrollmentInfo", "value"),
    StartDate: getString(status, "startDateStruct", "date"),
    CompletionDate: getString(status, "completionDateStruct", "date"),
  };
}
