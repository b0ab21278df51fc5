import fs from "node:fs";
import { describe, it, expect } from "vitest";
import { defaultLlmConfigPath, parseLlmConfig, resolveEnv, selectModel } from "../src/llm/config";
import { classifyHttpFailure, FatalFailure, TransientFailure } from "../src/llm/errors";
import { LlmViaApi } from "../src/llm/llmViaApi";
import type { ResolvedModelConfig } from "../src/llm/types";

type Captured = { url: string; headers: Headers; body: unknown };

function stubFetch(responses: Array<() => Response>) {
  const requests: Captured[] = [];
  const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    requests.push({
      url: String(input),
      headers: new Headers(init?.headers),
      body: JSON.parse(String(init?.body)),
    });
    const next = responses[requests.length - 1];
    if (!next) throw new Error("unexpected request");
    return next();
  };
  return { fetchImpl, requests };
}

const json = (body: unknown, status = 200, headers: Record<string, string> = {}) => () =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json", ...headers } });

const openai: ResolvedModelConfig = {
  provider: "openai",
  modelName: "gpt-test",
  apiKey: "test-secret",
  maxTokens: 100,
  timeoutMs: 5000,
  baseUrl: "https://llm.example.test/v1",
};

const gemini: ResolvedModelConfig = { ...openai, provider: "gemini", modelName: "gemini-test" };

const chat = (content: string | null, finish_reason = "stop") => json({ choices: [{ message: { content }, finish_reason }] });

describe("LlmViaApi (chat completions)", () => {
  it("posts the prompt and returns the completion text", async () => {
    const { fetchImpl, requests } = stubFetch([chat('{"ok":true}')]);
    const client = new LlmViaApi({ config: openai, fetch: fetchImpl });

    await expect(client.invoke({ text: "write", maxTokens: 50 })).resolves.toEqual({
      rawText: '{"ok":true}',
      finishReason: "stop",
    });
    expect(requests[0]?.url).toBe("https://llm.example.test/v1/chat/completions");
    expect(requests[0]?.headers.get("authorization")).toBe("Bearer test-secret");
    expect(requests[0]?.body).toEqual({
      model: "gpt-test",
      messages: [{ role: "user", content: "write" }],
      max_tokens: 50,
    });
    expect(client.describeModel()).toBe("openai/gpt-test");
  });

  it("retries an empty length-truncated completion once with a larger budget", async () => {
    const { fetchImpl, requests } = stubFetch([chat(null, "length"), chat("done")]);
    const client = new LlmViaApi({ config: openai, fetch: fetchImpl });

    await expect(client.invoke({ text: "write" })).resolves.toEqual({ rawText: "done", finishReason: "stop" });
    expect(requests.map((r) => (r.body && typeof r.body === "object" && "max_tokens" in r.body ? r.body.max_tokens : null))).toEqual([
      100, 512,
    ]);
  });

  it("classifies a filtered empty completion as a content policy failure", async () => {
    const { fetchImpl } = stubFetch([chat("", "content_filter")]);
    const client = new LlmViaApi({ config: openai, fetch: fetchImpl });
    await expect(client.invoke({ text: "write" })).rejects.toMatchObject({ name: "FatalFailure", kind: "content_policy" });
  });

  it("classifies other empty completions as transient", async () => {
    const { fetchImpl } = stubFetch([chat("  ")]);
    const client = new LlmViaApi({ config: openai, fetch: fetchImpl });
    await expect(client.invoke({ text: "write" })).rejects.toMatchObject({ name: "TransientFailure", reason: "empty_response" });
  });

  it("maps HTTP failures onto the failure taxonomy", async () => {
    const { fetchImpl } = stubFetch([
      json({ error: "slow down" }, 429, { "retry-after": "2" }),
      json({ error: "bad key" }, 401),
      json({ error: "oops" }, 503),
    ]);
    const client = new LlmViaApi({ config: openai, fetch: fetchImpl });

    await expect(client.invoke({ text: "a" })).rejects.toMatchObject({ reason: "rate_limit", status: 429, retryAfterMs: 2000 });
    const auth = await client.invoke({ text: "b" }).catch((e: unknown) => e);
    expect(auth).toBeInstanceOf(FatalFailure);
    expect(auth instanceof FatalFailure && auth.systemic).toBe(true);
    await expect(client.invoke({ text: "c" })).rejects.toMatchObject({ reason: "server_error", status: 503 });
  });

  it("maps thrown fetch errors to network failures", async () => {
    const client = new LlmViaApi({
      config: openai,
      fetch: async () => {
        throw new TypeError("fetch failed");
      },
    });
    await expect(client.invoke({ text: "a" })).rejects.toMatchObject({ name: "TransientFailure", reason: "network" });
  });
});

describe("LlmViaApi (gemini)", () => {
  it("calls generateContent and joins candidate parts", async () => {
    const { fetchImpl, requests } = stubFetch([
      json({ candidates: [{ content: { parts: [{ text: "part one, " }, { text: "part two" }] }, finishReason: "STOP" }] }),
    ]);
    const client = new LlmViaApi({ config: gemini, fetch: fetchImpl });

    await expect(client.invoke({ text: "write", maxTokens: 64 })).resolves.toEqual({
      rawText: "part one, part two",
      finishReason: "STOP",
    });
    expect(requests[0]?.url).toBe("https://llm.example.test/v1/models/gemini-test:generateContent");
    expect(requests[0]?.headers.get("x-goog-api-key")).toBe("test-secret");
    expect(requests[0]?.body).toEqual({
      contents: [{ role: "user", parts: [{ text: "write" }] }],
      generationConfig: { maxOutputTokens: 64 },
    });
  });

  it("treats a blocked prompt as a content policy failure", async () => {
    const { fetchImpl } = stubFetch([json({ promptFeedback: { blockReason: "SAFETY" } })]);
    const client = new LlmViaApi({ config: gemini, fetch: fetchImpl });
    await expect(client.invoke({ text: "write" })).rejects.toMatchObject({ kind: "content_policy" });
  });
});

describe("classifyHttpFailure", () => {
  it("separates retryable from fatal statuses", () => {
    expect(classifyHttpFailure("openai", 408, "")).toBeInstanceOf(TransientFailure);
    expect(classifyHttpFailure("openai", 400, "request blocked by safety system")).toMatchObject({ kind: "content_policy" });
    expect(classifyHttpFailure("openai", 400, "bad field")).toMatchObject({ kind: "invalid_request" });
    expect(classifyHttpFailure("openai", 403, "")).toMatchObject({ kind: "authentication" });
  });
});

describe("llm config", () => {
  const providers = parseLlmConfig(fs.readFileSync(defaultLlmConfigPath, "utf8"));

  it("resolves ${VAR} and ${VAR:-default}", () => {
    expect(resolveEnv("${A}/${B:-fallback}", { A: "x" })).toBe("x/fallback");
  });

  it("skips providers without a key and selects by complexity", () => {
    const chosen = selectModel(providers, { complexity: "high" }, { OPENAI_API_KEY: "test-secret" });
    expect(chosen).toMatchObject({
      provider: "openai",
      modelName: "gpt-4o",
      apiKey: "test-secret",
      baseUrl: "https://api.openai.com/v1",
    });
    expect(selectModel(providers, { complexity: "low" }, { OPENAI_API_KEY: "test-secret" }).modelName).toBe("gpt-4o-mini");
  });

  it("prefers the first provider and honours the reasoning flag", () => {
    const env = { GEMINI_API_KEY: "test-secret", GROQ_API_KEY: "test-secret" };
    expect(selectModel(providers, { reasoning: true }, env).modelName).toBe("gemini-2.5-pro");
    expect(selectModel(providers, { complexity: "low", reasoning: false }, env).modelName).toBe("gemini-2.5-flash");
  });

  it("fails with provider_config when no key is set", () => {
    expect(() => selectModel(providers, {}, {})).toThrow(FatalFailure);
  });

  it("rejects unknown providers", () => {
    expect(() => parseLlmConfig("providers:\n  acme:\n    api_key: x\n")).toThrow("Unsupported LLM provider in llm.yaml: acme");
  });
});
