/**
 * Abstract generation client: swap implementations (provider API, retry wrapper, test fake)
 * without changing the section synthesizer.
 */
export interface GenerationClient {
  /**
   * Send one prompt to the configured model.
   * Implementations throw TransientFailure or FatalFailure, never a bare Error.
   */
  invoke(prompt: GenerationPrompt): Promise<GenerationResponse>;
  /** "provider/model" label recorded in document metadata. */
  describeModel(): string;
}

export interface GenerationPrompt {
  text: string;
  /** Max tokens to generate (model default from llm.yaml if not set). */
  maxTokens?: number;
  /** Complexity level, used to select a model from llm.yaml. */
  complexity?: "low" | "medium" | "high";
  /** Whether the task needs a reasoning model. */
  reasoning?: boolean;
  /** Label used in logs, e.g. "section:data_storage". */
  stage?: string;
  signal?: AbortSignal;
}

export interface GenerationResponse {
  rawText: string;
  finishReason: string;
}

export type ProviderKind = "gemini" | "openai" | "groq";

/** Resolved model entry from config (one provider + one model). */
export interface ResolvedModelConfig {
  provider: ProviderKind;
  modelName: string;
  apiKey: string;
  maxTokens: number;
  timeoutMs: number;
  baseUrl?: string;
}
