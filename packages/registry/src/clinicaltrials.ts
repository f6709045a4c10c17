/**
 * ClinicalTrials.gov Data API v2: page through every study matching a
 * condition term and flatten each one to a TrialRecord.
 */

import { extractTrialRecord } from "./extract.js";
import { DEFAULT_TIMEOUT_MS, fetchRegistryPage, type FetchLike } from "./fetchRegistry.js";
import type { Logger, TrialRecord, TrialTable } from "./types.js";

export const CT_BASE = "https://clinicaltrials.gov/api/v2/studies";
export const MAX_PAGE_SIZE = 1000;
export const DEFAULT_MAX_RECORDS = 5000;
export const DEFAULT_PAGE_DELAY_MS = 200;

export interface FetchTrialsOptions {
  maxRecords?: number;
  /** Requested studies per page, 1..1000. */
  pageSize?: number;
  /** Pause between pages, fixed for the whole call. */
  delayMs?: number;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export function buildSearchUrl(
  baseUrl: string,
  condition: string,
  pageSize: number,
  pageToken: string | null
): string {
  const params = new URLSearchParams({
    "query.term": condition,
    pageSize: String(pageSize),
    format: "json",
  });
  if (pageToken) params.set("pageToken", pageToken);
  return `${baseUrl}?${params.toString()}`;
}

function assertOptions(condition: string, maxRecords: number, pageSize: number): void {
  if (!condition) throw new RangeError("condition must not be empty");
  if (!Number.isInteger(maxRecords) || maxRecords < 0) {
    throw new RangeError(`maxRecords must be a non-negative integer, got ${maxRecords}`);
  }
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new RangeError(`pageSize must be an integer in 1..${MAX_PAGE_SIZE}, got ${pageSize}`);
  }
}

/**
 * Fetch up to `maxRecords` studies for `condition`, following nextPageToken.
 * Stops when the cursor runs out or a page comes back empty. The last page
 * may overshoot the budget; the result is sliced to `maxRecords`.
 * Any registry error aborts the whole fetch.
 */
export async function fetchTrials(
  condition: string,
  options: FetchTrialsOptions = {}
): Promise<TrialTable> {
  const {
    maxRecords = DEFAULT_MAX_RECORDS,
    pageSize = MAX_PAGE_SIZE,
    delayMs = DEFAULT_PAGE_DELAY_MS,
    baseUrl = CT_BASE,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    fetch: fetchImpl,
    sleep = defaultSleep,
    logger = console,
  } = options;
  const term = condition.trim();
  assertOptions(term, maxRecords, pageSize);

  const records: TrialRecord[] = [];
  let pageToken: string | null = null;
  let pageNumber = 0;

  while (records.length < maxRecords) {
    pageNumber++;
    const url = buildSearchUrl(
      baseUrl,
      term,
      Math.min(pageSize, maxRecords - records.length),
      pageToken
    );
    const { status, page } = await fetchRegistryPage(url, { fetch: fetchImpl, timeoutMs });
    logger.log(`[registry] page ${pageNumber} status ${status} studies ${page.studies.length}`);

    for (const study of page.studies) {
      records.push(extractTrialRecord(study));
    }
    pageToken = page.nextPageToken;

    if (!pageToken || page.studies.length === 0) break;
    if (records.length >= maxRecords) break;

    await sleep(delayMs);
  }

  return records.slice(0, maxRecords);
}
