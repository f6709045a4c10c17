/**
 * Registry failures. Every one of them ends the fetch in progress; nothing is
 * retried here and no partial table is returned.
 */

export class RegistryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RegistryError";
  }
}

/** Non-2xx response. `body` is cut to the first 500 characters. */
export class RegistryRequestError extends RegistryError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`Registry request failed: HTTP ${status}${body ? `\n${body}` : ""}`);
    this.name = "RegistryRequestError";
    this.status = status;
    this.body = body;
  }
}

/** 2xx response whose body is not the JSON page envelope. */
export class RegistryResponseError extends RegistryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RegistryResponseError";
  }
}

/** Connection reset, DNS failure, timeout. */
export class TransportError extends RegistryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export const MAX_ERROR_BODY_CHARS = 500;

export function truncateBody(body: string): string {
  return body.slice(0, MAX_ERROR_BODY_CHARS);
}

/** One-line message for a failed-load notice. */
export function describeRegistryError(err: unknown): string {
  if (err instanceof RegistryRequestError) {
    return `ClinicalTrials.gov returned HTTP ${err.status}.`;
  }
  if (err instanceof RegistryResponseError) {
    return "ClinicalTrials.gov sent a response that could not be read.";
  }
  if (err instanceof TransportError) {
    return "Could not reach ClinicalTrials.gov.";
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
