import { setTimeout as delay } from "node:timers/promises";
import { logger } from "../infra/logger";
import { FatalFailure, TransientFailure } from "./errors";
import type { GenerationClient, GenerationPrompt, GenerationResponse } from "./types";

export type RetryPolicy = {
  /** Retries after the first attempt; 3 means at most 4 calls. */
  retryLimit: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retryLimit: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
};

type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Exponential backoff with full jitter: uniform in [0, min(max, base * 2^attempt)].
 * A provider Retry-After hint raises the floor but never past maxDelayMs.
 */
export function backoffDelayMs(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
  retryAfterMs?: number
): number {
  const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** attempt);
  const jittered = Math.floor(random() * ceiling);
  if (retryAfterMs === undefined) return jittered;
  return Math.min(policy.maxDelayMs, Math.max(jittered, retryAfterMs));
}

/**
 * Wraps a client so TransientFailure is retried; FatalFailure passes straight through.
 * Exhausted retries escalate to FatalFailure("retries_exhausted") with the last failure as cause.
 */
export class RetryingGenerationClient implements GenerationClient {
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(
    private readonly inner: GenerationClient,
    private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    deps: { sleep?: Sleep; random?: () => number } = {}
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  describeModel(): string {
    return this.inner.describeModel();
  }

  async invoke(prompt: GenerationPrompt): Promise<GenerationResponse> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.inner.invoke(prompt);
      } catch (err) {
        if (!(err instanceof TransientFailure) || prompt.signal?.aborted) throw err;

        if (attempt >= this.policy.retryLimit) {
          throw new FatalFailure(
            "retries_exhausted",
            `gave up after ${attempt + 1} attempts: ${err.message}`,
            { status: err.status, cause: err }
          );
        }

        const waitMs = backoffDelayMs(attempt, this.policy, this.random, err.retryAfterMs);
        logger.warn("transient generation failure, retrying", {
          stage: prompt.stage,
          attempt: attempt + 1,
          retryLimit: this.policy.retryLimit,
          reason: err.reason,
          status: err.status,
          waitMs,
        });
        await this.sleep(waitMs, prompt.signal);
      }
    }
  }
}
