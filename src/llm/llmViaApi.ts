import type { GenerationClient, GenerationPrompt, GenerationResponse, ResolvedModelConfig } from "./types";
import { loadLLMConfig, loadLLMConfigForTask } from "./config";
import { classifyFetchError, classifyHttpFailure, FatalFailure, TransientFailure } from "./errors";
import { logger } from "../infra/logger";

const GROQ_BASE = "https://api.groq.com/openai/v1";
const OPENAI_BASE = "https://api.openai.com/v1";
const GEMINI_BASE = "https://generativelanguage.googleapis.com/v1beta";

type FetchFn = typeof fetch;

type ChatCompletionBody = {
  choices?: Array<{
    message?: { content?: string | null };
    finish_reason?: string;
  }>;
};

type GeminiBody = {
  candidates?: Array<{
    content?: { parts?: Array<{ text?: string }> };
    finishReason?: string;
  }>;
  promptFeedback?: { blockReason?: string };
};

const BLOCKED_FINISH_REASONS = new Set(["content_filter", "SAFETY", "BLOCKLIST", "PROHIBITED_CONTENT"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function asChatCompletion(data: unknown): ChatCompletionBody {
  if (!isRecord(data) || !Array.isArray(data.choices)) return {};
  return {
    choices: data.choices.filter(isRecord).map((c) => ({
      message: isRecord(c.message)
        ? { content: typeof c.message.content === "string" ? c.message.content : null }
        : undefined,
      finish_reason: typeof c.finish_reason === "string" ? c.finish_reason : undefined,
    })),
  };
}

function asGemini(data: unknown): GeminiBody {
  if (!isRecord(data)) return {};
  const candidates = Array.isArray(data.candidates) ? data.candidates.filter(isRecord) : [];
  const feedback = isRecord(data.promptFeedback) ? data.promptFeedback : undefined;
  return {
    candidates: candidates.map((c) => {
      const content = isRecord(c.content) ? c.content : undefined;
      const parts = content && Array.isArray(content.parts) ? content.parts.filter(isRecord) : [];
      return {
        content: { parts: parts.map((p) => ({ text: typeof p.text === "string" ? p.text : undefined })) },
        finishReason: typeof c.finishReason === "string" ? c.finishReason : undefined,
      };
    }),
    promptFeedback:
      feedback && typeof feedback.blockReason === "string" ? { blockReason: feedback.blockReason } : undefined,
  };
}

type Completion = { text: string | null; finishReason: string };

/**
 * Generation client that calls the configured provider's HTTP API.
 * Config is read from config/llm.yaml; api_key is resolved from env and never logged.
 * When no model is pinned, selection follows the prompt's complexity/reasoning hints.
 */
export class LlmViaApi implements GenerationClient {
  private readonly pinned?: ResolvedModelConfig;
  private readonly fetchImpl: FetchFn;
  private readonly configPath?: string;

  constructor(options: { config?: ResolvedModelConfig; fetch?: FetchFn; configPath?: string } = {}) {
    this.pinned = options.config;
    this.fetchImpl = options.fetch ?? fetch;
    this.configPath = options.configPath;
  }

  describeModel(): string {
    const config = this.pinned ?? loadLLMConfig(this.configPath);
    return `${config.provider}/${config.modelName}`;
  }

  async invoke(prompt: GenerationPrompt): Promise<GenerationResponse> {
    const config =
      this.pinned ??
      (prompt.complexity !== undefined || prompt.reasoning !== undefined
        ? loadLLMConfigForTask({ complexity: prompt.complexity, reasoning: prompt.reasoning }, this.configPath)
        : loadLLMConfig(this.configPath));
    const maxTokens = prompt.maxTokens ?? config.maxTokens;

    const call = (tokens: number) =>
      config.provider === "gemini"
        ? this.geminiComplete(config, prompt, tokens)
        : this.chatComplete(config, prompt, tokens);

    const first = await call(maxTokens);
    if (first.text !== null && first.text.trim() !== "") {
      return { rawText: first.text, finishReason: first.finishReason };
    }

    // Some reasoning models can consume the generation budget and return empty content with
    // finish_reason=length. Retry once with a larger completion budget before failing.
    if (first.finishReason === "length" || first.finishReason === "MAX_TOKENS") {
      const retryTokens = Math.max(maxTokens * 4, 512);
      logger.warn("empty completion with length finish, retrying with larger max_tokens", {
        provider: config.provider,
        model: config.modelName,
        stage: prompt.stage,
        firstMaxTokens: maxTokens,
        retryMaxTokens: retryTokens,
      });
      const second = await call(retryTokens);
      if (second.text !== null && second.text.trim() !== "") {
        return { rawText: second.text, finishReason: second.finishReason };
      }
      throw new TransientFailure(
        "empty_response",
        `${config.provider} returned empty content after retry (finish_reason: ${second.finishReason}, max_tokens: ${retryTokens})`
      );
    }

    if (BLOCKED_FINISH_REASONS.has(first.finishReason)) {
      throw new FatalFailure(
        "content_policy",
        `${config.provider} blocked the completion (finish_reason: ${first.finishReason})`
      );
    }

    throw new TransientFailure(
      "empty_response",
      `${config.provider} returned empty content (finish_reason: ${first.finishReason}, max_tokens: ${maxTokens})`
    );
  }

  private async post(
    provider: string,
    url: string,
    headers: Record<string, string>,
    body: unknown,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<unknown> {
    const timeout = AbortSignal.timeout(timeoutMs);
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...headers },
        body: JSON.stringify(body),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (err) {
      throw classifyFetchError(provider, err);
    }

    if (!res.ok) {
      const text = await res.text();
      logger.error(`${provider} API error`, { status: res.status, body: text.slice(0, 400) });
      throw classifyHttpFailure(provider, res.status, text, res.headers.get("retry-after"));
    }

    try {
      return await res.json();
    } catch (err) {
      throw new TransientFailure("server_error", `${provider} returned a non-JSON body`, { cause: err });
    }
  }

  private async chatComplete(
    config: ResolvedModelConfig,
    prompt: GenerationPrompt,
    maxTokens: number
  ): Promise<Completion> {
    const base = config.baseUrl ?? (config.provider === "groq" ? GROQ_BASE : OPENAI_BASE);
    const data = asChatCompletion(
      await this.post(
        config.provider,
        `${base}/chat/completions`,
        { Authorization: `Bearer ${config.apiKey}` },
        {
          model: config.modelName,
          messages: [{ role: "user", content: prompt.text }],
          max_tokens: maxTokens,
        },
        config.timeoutMs,
        prompt.signal
      )
    );
    const choice = data.choices?.[0];
    return {
      text: choice?.message?.content ?? null,
      finishReason: choice?.finish_reason ?? "unknown",
    };
  }

  private async geminiComplete(
    config: ResolvedModelConfig,
    prompt: GenerationPrompt,
    maxTokens: number
  ): Promise<Completion> {
    const base = config.baseUrl ?? GEMINI_BASE;
    const data = asGemini(
      await this.post(
        "gemini",
        `${base}/models/${encodeURIComponent(config.modelName)}:generateContent`,
        { "x-goog-api-key": config.apiKey },
        {
          contents: [{ role: "user", parts: [{ text: prompt.text }] }],
          generationConfig: { maxOutputTokens: maxTokens },
        },
        config.timeoutMs,
        prompt.signal
      )
    );

    if (data.promptFeedback?.blockReason) {
      throw new FatalFailure(
        "content_policy",
        `gemini blocked the prompt (blockReason: ${data.promptFeedback.blockReason})`
      );
    }
    const candidate = data.candidates?.[0];
    const parts = candidate?.content?.parts ?? [];
    const text = parts.map((p) => p.text ?? "").join("");
    return { text: text === "" ? null : text, finishReason: candidate?.finishReason ?? "unknown" };
  }
}
