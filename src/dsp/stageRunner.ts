import { logger } from "../infra/logger";
import type { GenerationClient } from "../llm/types";

export class StageError extends Error {
  stage: string;
  rawSnippet: string;

  constructor(stage: string, message: string, rawResponse?: string) {
    const snippet = (rawResponse ?? "").slice(0, 400);
    super(`[${stage}] ${message}${snippet ? ` | raw: ${snippet}` : ""}`);
    this.name = "StageError";
    this.stage = stage;
    this.rawSnippet = snippet;
  }
}

export function extractJsonCandidate(raw: string): string {
  const trimmed = raw.trim();
  const fenceMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fenceMatch?.[1]) {
    return fenceMatch[1].trim();
  }
  if (trimmed.startsWith("{") && trimmed.endsWith("}")) {
    return trimmed;
  }
  const firstBrace = trimmed.indexOf("{");
  const lastBrace = trimmed.lastIndexOf("}");
  if (firstBrace >= 0 && lastBrace > firstBrace) {
    return trimmed.slice(firstBrace, lastBrace + 1).trim();
  }
  return trimmed;
}

type RunJsonStageOptions<T> = {
  stage: string;
  prompt: string;
  maxTokens: number;
  validate: (value: unknown) => value is T;
  client: GenerationClient;
  complexity?: "low" | "medium" | "high";
  signal?: AbortSignal;
};

/**
 * One prompt, parsed as JSON and checked by a type guard. An empty, unparseable or
 * invalid first answer gets a single re-ask with the same prompt.
 */
export async function runJsonStage<T>(options: RunJsonStageOptions<T>): Promise<T> {
  let lastRaw = "";

  for (let attempt = 0; attempt < 2; attempt++) {
    const startedAt = Date.now();
    const { rawText: raw } = await options.client.invoke({
      text: options.prompt,
      maxTokens: options.maxTokens,
      complexity: options.complexity,
      stage: options.stage,
      signal: options.signal,
    });
    lastRaw = raw;

    logger.info("json stage completed", {
      stage: options.stage,
      attempt: attempt + 1,
      latencyMs: Date.now() - startedAt,
      empty: raw.trim().length === 0,
    });

    if (!raw || raw.trim().length === 0) {
      if (attempt === 0) continue;
      throw new StageError(options.stage, "Empty LLM output", raw);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(extractJsonCandidate(raw));
    } catch (err) {
      if (attempt === 0) continue;
      throw new StageError(options.stage, err instanceof Error ? err.message : "Invalid JSON", raw);
    }
    if (options.validate(parsed)) return parsed;
    if (attempt === 0) continue;
    throw new StageError(options.stage, "JSON schema validation failed", raw);
  }

  throw new StageError(options.stage, "Stage failed after retries", lastRaw);
}
