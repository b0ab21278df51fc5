import type { DspJobOptions } from "../queues/dspQueue";
import { CLASSIFICATIONS, INFRASTRUCTURE_TYPES } from "./metadata";
import { PROJECT_NAME_PATTERN } from "./summaryLoader";
import type { GenerateOptions, MetadataOverrides } from "./types";

export type DspJobRequest = {
  /** Summary text, or the name of a folder under the projects directory. Never a path. */
  summary: string;
  projectName?: string;
  options?: DspJobOptions;
  metadata?: MetadataOverrides;
};

export type ParsedJobRequest = { ok: true; request: DspJobRequest } | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function readInt(raw: Record<string, unknown>, key: keyof DspJobOptions, min: number): number | undefined | string {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    return `options.${key} must be an integer >= ${min}`;
  }
  return value;
}

type ParsedMetadata = { ok: true; metadata: MetadataOverrides } | { ok: false; error: string };

const METADATA_TEXT_KEYS = ["piName", "uislName", "department", "dataProvider"] as const;

function parseMetadata(raw: unknown): ParsedMetadata {
  if (!isRecord(raw)) return { ok: false, error: "metadata must be an object" };
  const metadata: MetadataOverrides = {};
  for (const key of METADATA_TEXT_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "string" || !value.trim()) {
      return { ok: false, error: `metadata.${key} must be a non-empty string` };
    }
    metadata[key] = value.trim();
  }
  if (raw.classification !== undefined) {
    const match = CLASSIFICATIONS.find((c) => c === raw.classification);
    if (match === undefined) {
      return { ok: false, error: `metadata.classification must be one of: ${CLASSIFICATIONS.join(", ")}` };
    }
    metadata.classification = match;
  }
  if (raw.infrastructure !== undefined) {
    const match = INFRASTRUCTURE_TYPES.find((t) => t === raw.infrastructure);
    if (match === undefined) {
      return { ok: false, error: `metadata.infrastructure must be one of: ${INFRASTRUCTURE_TYPES.join(", ")}` };
    }
    metadata.infrastructure = match;
  }
  if (raw.isCui !== undefined) {
    if (typeof raw.isCui !== "boolean") return { ok: false, error: "metadata.isCui must be a boolean" };
    metadata.isCui = raw.isCui;
  }
  return { ok: true, metadata };
}

/** Validate an untrusted `POST /dsp/jobs` body. */
export function parseJobRequest(body: unknown): ParsedJobRequest {
  if (!isRecord(body)) return { ok: false, error: "body must be a JSON object" };
  if (typeof body.summary !== "string" || !body.summary.trim()) {
    return { ok: false, error: "summary must be a non-empty string" };
  }
  if (body.projectName !== undefined && typeof body.projectName !== "string") {
    return { ok: false, error: "projectName must be a string" };
  }

  const summary = body.summary.trim();
  // a single token must name a project folder; file paths are never read for API callers
  if (!/\s/.test(summary) && !PROJECT_NAME_PATTERN.test(summary)) {
    return { ok: false, error: "summary must be summary text or a project name" };
  }

  const request: DspJobRequest = { summary };
  if (typeof body.projectName === "string" && body.projectName.trim()) {
    request.projectName = body.projectName.trim();
  }

  if (body.options !== undefined) {
    if (!isRecord(body.options)) return { ok: false, error: "options must be an object" };
    const raw = body.options;
    const options: DspJobOptions = {};
    const maxConcurrency = readInt(raw, "maxConcurrency", 1);
    const retrievalK = readInt(raw, "retrievalK", 0);
    const retryLimit = readInt(raw, "retryLimit", 0);
    for (const value of [maxConcurrency, retrievalK, retryLimit]) {
      if (typeof value === "string") return { ok: false, error: value };
    }
    if (typeof maxConcurrency === "number") options.maxConcurrency = maxConcurrency;
    if (typeof retrievalK === "number") options.retrievalK = retrievalK;
    if (typeof retryLimit === "number") options.retryLimit = retryLimit;
    if (raw.allowPartialOutput !== undefined) {
      if (typeof raw.allowPartialOutput !== "boolean") {
        return { ok: false, error: "options.allowPartialOutput must be a boolean" };
      }
      options.allowPartialOutput = raw.allowPartialOutput;
    }
    request.options = options;
  }

  if (body.metadata !== undefined) {
    const parsed = parseMetadata(body.metadata);
    if (!parsed.ok) return parsed;
    request.metadata = parsed.metadata;
  }

  return { ok: true, request };
}

/** Job-level overrides win over the environment defaults. */
export function mergeOptions(base: GenerateOptions, overrides: DspJobOptions = {}): GenerateOptions {
  return {
    ...base,
    maxConcurrency: overrides.maxConcurrency ?? base.maxConcurrency,
    retrievalK: overrides.retrievalK ?? base.retrievalK,
    retryLimit: overrides.retryLimit ?? base.retryLimit,
    allowPartialOutput: overrides.allowPartialOutput ?? base.allowPartialOutput,
  };
}
