export type TransientReason = "timeout" | "rate_limit" | "server_error" | "network" | "empty_response";

export type FatalKind =
  | "authentication"
  | "invalid_request"
  | "content_policy"
  | "provider_config"
  | "retries_exhausted";

/** Retryable provider failure (timeout, 429, 5xx). */
export class TransientFailure extends Error {
  readonly reason: TransientReason;
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(
    reason: TransientReason,
    message: string,
    details: { status?: number; retryAfterMs?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = "TransientFailure";
    this.reason = reason;
    this.status = details.status;
    this.retryAfterMs = details.retryAfterMs;
  }
}

/** Non-retryable provider failure. */
export class FatalFailure extends Error {
  readonly kind: FatalKind;
  readonly status?: number;

  constructor(kind: FatalKind, message: string, details: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.name = "FatalFailure";
    this.kind = kind;
    this.status = details.status;
  }

  /** Failures that will hit every section the same way abort the whole run. */
  get systemic(): boolean {
    return this.kind === "authentication" || this.kind === "provider_config";
  }
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1000);
  const at = Date.parse(header);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - Date.now());
}

/** Map a non-2xx provider response to the adapter's failure taxonomy. */
export function classifyHttpFailure(
  provider: string,
  status: number,
  body: string,
  retryAfterHeader: string | null = null
): TransientFailure | FatalFailure {
  const snippet = body.slice(0, 400);
  const message = `${provider} API error ${status}: ${snippet}`;
  if (status === 408) return new TransientFailure("timeout", message, { status });
  if (status === 429) {
    return new TransientFailure("rate_limit", message, {
      status,
      retryAfterMs: parseRetryAfter(retryAfterHeader),
    });
  }
  if (status >= 500) return new TransientFailure("server_error", message, { status });
  if (status === 401 || status === 403) return new FatalFailure("authentication", message, { status });
  if (/safety|content[_ ]policy|blocked/i.test(body)) {
    return new FatalFailure("content_policy", message, { status });
  }
  return new FatalFailure("invalid_request", message, { status });
}

/** Map a thrown fetch error (abort, DNS, socket reset) to a transient failure. */
export function classifyFetchError(provider: string, err: unknown): TransientFailure {
  const name = err instanceof Error ? err.name : "";
  const msg = err instanceof Error ? err.message : String(err);
  if (name === "TimeoutError" || name === "AbortError") {
    return new TransientFailure("timeout", `${provider} request timed out: ${msg}`, { cause: err });
  }
  return new TransientFailure("network", `${provider} request failed: ${msg}`, { cause: err });
}
