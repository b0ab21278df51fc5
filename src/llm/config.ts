import { readFileSync } from "node:fs";
import path from "node:path";
import { parse } from "yaml";
import { FatalFailure } from "./errors";
import type { ProviderKind, ResolvedModelConfig } from "./types";

type RawModel = {
  name: string;
  complexity: string[];
  reasoning: boolean;
  maxTokens: number;
};

type RawProvider = {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  models: RawModel[];
};

const PROVIDERS: readonly ProviderKind[] = ["gemini", "openai", "groq"];
const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TIMEOUT_MS = 120_000;

/** config/llm.yaml sits two levels above both src/llm and dist/llm. */
export const defaultLlmConfigPath = path.resolve(__dirname, "../../config/llm.yaml");

/** Resolve ${VAR} and ${VAR:-default} from process.env */
export function resolveEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{(\w+)(?::-([^}]*))?\}/g, (_, key: string, def: string | undefined) => {
    const v = env[key];
    return v !== undefined && v !== "" ? v : (def ?? "");
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isProviderKind(value: string): value is ProviderKind {
  return PROVIDERS.some((p) => p === value);
}

function parseModel(raw: unknown, where: string): RawModel {
  if (!isRecord(raw) || typeof raw.name !== "string" || raw.name.trim() === "") {
    throw new FatalFailure("provider_config", `Invalid llm config: ${where}.name must be a non-empty string`);
  }
  const complexity = Array.isArray(raw.complexity)
    ? raw.complexity.filter((c): c is string => typeof c === "string")
    : [];
  return {
    name: raw.name.trim(),
    complexity,
    reasoning: raw.reasoning === true,
    maxTokens: typeof raw.max_tokens === "number" && raw.max_tokens > 0 ? raw.max_tokens : DEFAULT_MAX_TOKENS,
  };
}

/** Parse llm.yaml content; provider order in the file is the selection preference. */
export function parseLlmConfig(content: string): Array<[ProviderKind, RawProvider]> {
  const raw: unknown = parse(content);
  const providers = isRecord(raw) && isRecord(raw.providers) ? raw.providers : {};
  const out: Array<[ProviderKind, RawProvider]> = [];

  for (const [name, value] of Object.entries(providers)) {
    if (!isProviderKind(name)) {
      throw new FatalFailure("provider_config", `Unsupported LLM provider in llm.yaml: ${name}`);
    }
    if (!isRecord(value)) continue;
    const models = Array.isArray(value.models)
      ? value.models.map((m, i) => parseModel(m, `providers.${name}.models[${i}]`))
      : [];
    out.push([
      name,
      {
        apiKey: typeof value.api_key === "string" ? value.api_key : "",
        baseUrl: typeof value.base_url === "string" ? value.base_url : undefined,
        timeoutMs: typeof value.timeout_ms === "number" ? value.timeout_ms : undefined,
        models,
      },
    ]);
  }
  return out;
}

function toResolved(
  providerName: ProviderKind,
  provider: RawProvider,
  apiKey: string,
  model: RawModel,
  env: NodeJS.ProcessEnv
): ResolvedModelConfig {
  return {
    provider: providerName,
    modelName: model.name,
    apiKey,
    maxTokens: model.maxTokens,
    timeoutMs: provider.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    baseUrl: provider.baseUrl ? resolveEnv(provider.baseUrl, env) : undefined,
  };
}

/**
 * Select a model based on complexity and reasoning requirements.
 * Selection algorithm:
 * 1. Skip providers whose api_key resolves to empty
 * 2. If reasoning=true: filter to models with reasoning=true; if false: to models without it
 * 3. Narrow by complexity when any candidate lists it
 * 4. Fallback: first model of the first provider with a key
 */
export function selectModel(
  providers: Array<[ProviderKind, RawProvider]>,
  options: { complexity?: "low" | "medium" | "high"; reasoning?: boolean } = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedModelConfig {
  const { complexity, reasoning } = options;

  for (const [providerName, provider] of providers) {
    const apiKey = resolveEnv(provider.apiKey, env).trim();
    if (!apiKey) continue;

    let candidates = provider.models;
    if (reasoning === true) {
      candidates = candidates.filter((m) => m.reasoning);
    } else if (reasoning === false) {
      candidates = candidates.filter((m) => !m.reasoning);
    }

    if (complexity && candidates.length > 0) {
      const byComplexity = candidates.filter((m) => m.complexity.includes(complexity));
      if (byComplexity.length > 0) candidates = byComplexity;
    }

    const chosen = candidates[0] ?? provider.models[0];
    if (chosen) return toResolved(providerName, provider, apiKey, chosen, env);
  }

  throw new FatalFailure(
    "provider_config",
    "No LLM provider with api_key and at least one model found in llm.yaml"
  );
}

export function loadLLMConfigForTask(
  options: { complexity?: "low" | "medium" | "high"; reasoning?: boolean } = {},
  configPath?: string
): ResolvedModelConfig {
  const file = configPath ?? process.env.LLM_CONFIG_PATH?.trim() ?? defaultLlmConfigPath;
  return selectModel(parseLlmConfig(readFileSync(file || defaultLlmConfigPath, "utf8")), options);
}

export function loadLLMConfig(configPath?: string): ResolvedModelConfig {
  return loadLLMConfigForTask({}, configPath);
}
