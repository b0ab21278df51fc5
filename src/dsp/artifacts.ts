import type Redis from "ioredis";
import { getRedis } from "../infra/redis";
import type { GenerateResult } from "./types";

export const ARTIFACT_TTL_SECONDS = 24 * 60 * 60;

export type ArtifactRecord = {
  runId: string;
  stage: string;
  createdAt: string;
  payload: unknown;
};

/** Per-run debugging artifacts: the document, each section, and stage errors. */
export interface ArtifactStore {
  write(runId: string, stage: string, payload: unknown): Promise<void>;
  read(runId: string, stage: string): Promise<ArtifactRecord | null>;
  /** Stage names written for a run, sorted. */
  list(runId: string): Promise<string[]>;
  clearRunArtifacts(runId: string): Promise<void>;
}

function isArtifactRecord(value: unknown): value is ArtifactRecord {
  if (!value || typeof value !== "object") return false;
  return (
    "runId" in value &&
    typeof value.runId === "string" &&
    "stage" in value &&
    typeof value.stage === "string" &&
    "createdAt" in value &&
    typeof value.createdAt === "string" &&
    "payload" in value
  );
}

function stageKey(runId: string, stage: string): string {
  return `dsp:artifact:${runId}:${stage}`;
}

function runIndexKey(runId: string): string {
  return `dsp:artifact:index:${runId}`;
}

export class RedisArtifactStore implements ArtifactStore {
  constructor(
    private readonly redis: Redis = getRedis(),
    private readonly ttlSeconds = ARTIFACT_TTL_SECONDS
  ) {}

  async write(runId: string, stage: string, payload: unknown): Promise<void> {
    const record: ArtifactRecord = { runId, stage, createdAt: new Date().toISOString(), payload };
    const indexKey = runIndexKey(runId);
    await this.redis
      .multi()
      .set(stageKey(runId, stage), JSON.stringify(record), "EX", this.ttlSeconds)
      .sadd(indexKey, stage)
      .expire(indexKey, this.ttlSeconds)
      .exec();
  }

  async read(runId: string, stage: string): Promise<ArtifactRecord | null> {
    const raw = await this.redis.get(stageKey(runId, stage));
    if (!raw) return null;
    const parsed: unknown = JSON.parse(raw);
    return isArtifactRecord(parsed) ? parsed : null;
  }

  async list(runId: string): Promise<string[]> {
    return (await this.redis.smembers(runIndexKey(runId))).sort();
  }

  async clearRunArtifacts(runId: string): Promise<void> {
    const indexKey = runIndexKey(runId);
    const stages = await this.redis.smembers(indexKey);
    const keys = stages.map((stage) => stageKey(runId, stage));
    if (keys.length > 0) {
      await this.redis.del(...keys);
    }
    await this.redis.del(indexKey);
  }
}

export async function writeErrorArtifact(
  store: ArtifactStore,
  runId: string,
  stage: string,
  error: string,
  rawSnippet?: string
): Promise<void> {
  await store.write(runId, `error_${stage}`, { error, rawSnippet: rawSnippet ?? "" });
}

/** Store the document, one `section_<id>` entry per section, and an error entry per non-valid section. */
export async function persistRunArtifacts(store: ArtifactStore, runId: string, result: GenerateResult): Promise<void> {
  await store.write(runId, "document", {
    status: result.status,
    abortReason: result.abortReason ?? null,
    failures: result.failures,
    document: result.document,
  });
  for (const section of result.document.sections) {
    await store.write(runId, `section_${section.sectionId}`, section);
    if (section.status === "failed") {
      await writeErrorArtifact(store, runId, section.sectionId, section.reason ?? "failed", section.rawText);
    }
  }
}
