import path from "node:path";
import { logger } from "../infra/logger";
import type { GenerateOptions } from "./types";

export type PipelineEnv = {
  options: GenerateOptions;
  corpusDir: string;
  outputDir: string;
  projectsDir: string;
};

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number, min = 1): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < min) {
    logger.warn(`invalid ${key}, using default`, { raw, fallback });
    return fallback;
  }
  return Math.floor(parsed);
}

function readBoolean(env: NodeJS.ProcessEnv, key: string, fallback = false): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === "1" || raw === "true" || raw === "yes") return true;
  if (raw === "0" || raw === "false" || raw === "no") return false;
  logger.warn(`invalid ${key}, using default`, { raw, fallback });
  return fallback;
}

function readPath(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  return path.resolve(env[key]?.trim() || fallback);
}

/** Pipeline knobs from the environment; bad values warn and fall back. */
export function readPipelineEnv(env: NodeJS.ProcessEnv = process.env): PipelineEnv {
  const runTimeoutMs = readPositiveInt(env, "DSP_RUN_TIMEOUT_MS", 0, 0);
  return {
    options: {
      maxConcurrency: readPositiveInt(env, "DSP_MAX_CONCURRENCY", 3),
      retrievalK: readPositiveInt(env, "DSP_RETRIEVAL_K", 4, 0),
      retryLimit: readPositiveInt(env, "DSP_RETRY_LIMIT", 3, 0),
      allowPartialOutput: readBoolean(env, "DSP_ALLOW_PARTIAL_OUTPUT", true),
      runTimeoutMs: runTimeoutMs > 0 ? runTimeoutMs : undefined,
      cancelGraceMs: readPositiveInt(env, "DSP_CANCEL_GRACE_MS", 30_000, 0),
    },
    corpusDir: readPath(env, "DSP_CORPUS_DIR", "example_dsps"),
    outputDir: readPath(env, "DSP_OUTPUT_DIR", "projects"),
    projectsDir: readPath(env, "DSP_PROJECTS_DIR", "projects"),
  };
}
