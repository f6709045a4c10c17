/**
 * Single GET against the registry search endpoint. No retries: the caller
 * decides whether a failed fetch is worth running again.
 */
import { z } from "zod";
import {
  RegistryRequestError,
  RegistryResponseError,
  TransportError,
  truncateBody,
} from "./errors.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const DEFAULT_TIMEOUT_MS = 30_000;

/** Envelope only; individual studies are read leniently by extractTrialRecord. */
export const RegistryPageSchema = z.object({
  studies: z.array(z.unknown()).optional(),
  nextPageToken: z.string().nullish(),
});

export interface RegistryPage {
  studies: unknown[];
  nextPageToken: string | null;
}

export interface FetchPageResult {
  status: number;
  page: RegistryPage;
}

export async function fetchRegistryPage(
  url: string,
  config: { fetch?: FetchLike; timeoutMs?: number } = {}
): Promise<FetchPageResult> {
  const { fetch: fetchImpl = fetch, timeoutMs = DEFAULT_TIMEOUT_MS } = config;

  let res: Response;
  try {
    res = await fetchImpl(url, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TransportError(`Registry unreachable: ${reason}`, { cause: err });
  }

  if (!res.ok) {
    // The status is what matters here; an unreadable error body is dropped.
    const body = await res.text().catch(() => "");
    throw new RegistryRequestError(res.status, truncateBody(body));
  }

  let text: string;
  try {
    text = await res.text();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TransportError(`Registry response interrupted: ${reason}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new RegistryResponseError("Registry response is not valid JSON", { cause: err });
  }

  const parsed = RegistryPageSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? issue.path.join(".") : "body";
    throw new RegistryResponseError(
      `Unexpected registry page shape at ${where}: ${issue?.message ?? "invalid"}`,
      { cause: parsed.error }
    );
  }

  return {
    status: res.status,
    page: {
      studies: parsed.data.studies ?? [],
      nextPageToken: parsed.data.nextPageToken ?? null,
    },
  };
}
