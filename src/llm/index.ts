export type {
  GenerationClient,
  GenerationPrompt,
  GenerationResponse,
  ResolvedModelConfig,
  ProviderKind,
} from "./types";
export { loadLLMConfig, loadLLMConfigForTask } from "./config";
export { LlmViaApi } from "./llmViaApi";
export { RetryingGenerationClient, DEFAULT_RETRY_POLICY, type RetryPolicy } from "./retry";
export { TransientFailure, FatalFailure } from "./errors";
