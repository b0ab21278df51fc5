import { errorMessage, logger } from "../infra/logger";
import { FatalFailure } from "../llm/errors";
import { DEFAULT_RETRY_POLICY, RetryingGenerationClient } from "../llm/retry";
import type { GenerationClient } from "../llm/types";
import { runBounded, untilAbandoned, WorkAbandoned } from "./concurrency";
import { ContextDigest, type DigestLimits } from "./digest";
import {
  CorpusUnavailable,
  SchemaConfigError,
  SchemaCycleError,
  SectionCallFailed,
  SectionGenerationFailed,
} from "./errors";
import { PROMPT_VERSION_STRING } from "./prompts";
import { RetrievalSelector, type ScoringStrategy } from "./retrieval";
import { SectionSchemaRegistry } from "./schema";
import { synthesizeSection } from "./synthesizer";
import type {
  CorpusFragment,
  DocumentModel,
  GenerateOptions,
  GenerateResult,
  ProjectSummary,
  RetrievalResult,
  RunStatus,
  SectionFailure,
  SectionResult,
  SectionSpec,
} from "./types";

export const DEFAULT_GENERATE_OPTIONS: GenerateOptions = {
  maxConcurrency: 3,
  retrievalK: 4,
  retryLimit: 3,
  allowPartialOutput: true,
  cancelGraceMs: 30_000,
};

export type CorpusSource =
  | readonly CorpusFragment[]
  | ((registry: SectionSchemaRegistry) => readonly CorpusFragment[] | Promise<readonly CorpusFragment[]>);

export type GenerateDeps = {
  /** Raw provider client; generate() wraps it with retry per options.retryLimit. */
  client: GenerationClient;
  sections: readonly SectionSpec[];
  corpus: CorpusSource;
  scoring?: ScoringStrategy;
  metadataText?: string;
  digestLimits?: DigestLimits;
  now?: () => Date;
  retry?: {
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    random?: () => number;
  };
};

function assertOptions(options: GenerateOptions): void {
  if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1) {
    throw new RangeError(`maxConcurrency must be a positive integer, got ${options.maxConcurrency}`);
  }
  if (!Number.isInteger(options.retrievalK) || options.retrievalK < 0) {
    throw new RangeError(`retrievalK must be a non-negative integer, got ${options.retrievalK}`);
  }
  if (!Number.isInteger(options.retryLimit) || options.retryLimit < 0) {
    throw new RangeError(`retryLimit must be a non-negative integer, got ${options.retryLimit}`);
  }
}

function emptyResult(spec: SectionSpec, status: SectionResult["status"], reason: string): SectionResult {
  return {
    sectionId: spec.sectionId,
    title: spec.title,
    ordinal: spec.ordinal,
    status,
    validationStatus: null,
    structuredFields: {},
    rawText: "",
    reason,
    attempts: 0,
    retrievedFrom: [],
  };
}

function failureReason(err: unknown): string {
  if (err instanceof SectionGenerationFailed) return err.reason;
  if (err instanceof FatalFailure) return `${err.kind}: ${err.message}`;
  return errorMessage(err);
}

function collectFailures(sections: readonly SectionResult[]): SectionFailure[] {
  const failures: SectionFailure[] = [];
  for (const s of sections) {
    if (s.status === "valid") continue;
    failures.push({ sectionId: s.sectionId, status: s.status, reason: s.reason ?? s.status });
  }
  return failures;
}

function safeModelLabel(client: GenerationClient): string {
  try {
    return client.describeModel();
  } catch (err) {
    logger.warn("failed to resolve model label for document metadata", { error: errorMessage(err) });
    return "unknown";
  }
}

/**
 * Drive section synthesis over the whole registry and assemble the document model.
 *
 * Sections run layer by layer: every dependency of a section lives in an earlier layer,
 * so a section starts only after its dependencies settled. Within a layer up to
 * `maxConcurrency` sections run at once, all reading the digest snapshot taken when
 * the layer started; valid results are folded into the digest after the layer settles.
 */
export async function generate(
  summary: ProjectSummary,
  options: GenerateOptions,
  deps: GenerateDeps
): Promise<GenerateResult> {
  assertOptions(options);
  const now = deps.now ?? (() => new Date());
  const startedAt = Date.now();
  const client = new RetryingGenerationClient(
    deps.client,
    {
      retryLimit: options.retryLimit,
      baseDelayMs: options.retryBaseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
      maxDelayMs: options.retryMaxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    },
    deps.retry
  );

  const buildDocument = (sections: SectionResult[]): DocumentModel => ({
    metadata: {
      projectName: summary.projectName?.trim() || "Untitled Project",
      generatedAt: now().toISOString(),
      model: safeModelLabel(client),
      promptVersion: PROMPT_VERSION_STRING,
    },
    sections,
  });

  const abortBeforeStart = (err: Error): GenerateResult => {
    logger.error("dsp run aborted before generation", { error: err.message, errorType: err.name });
    const sections = [...deps.sections]
      .sort((a, b) => a.ordinal - b.ordinal)
      .map((spec) => emptyResult(spec, "not_attempted", err.message));
    return { document: buildDocument(sections), status: "failed", failures: collectFailures(sections), abortReason: err.message };
  };

  let registry: SectionSchemaRegistry;
  let corpus: readonly CorpusFragment[];
  try {
    registry = new SectionSchemaRegistry(deps.sections);
    corpus = typeof deps.corpus === "function" ? await deps.corpus(registry) : deps.corpus;
  } catch (err) {
    if (err instanceof SchemaCycleError || err instanceof SchemaConfigError || err instanceof CorpusUnavailable) {
      return abortBeforeStart(err);
    }
    throw err;
  }

  const selector = new RetrievalSelector(options.retrievalK, deps.scoring);
  const digest = new ContextDigest(deps.digestLimits);
  const results = new Map<string, SectionResult>();

  // `run` stops scheduling; `hard` abandons in-flight calls once the grace period ends
  const run = new AbortController();
  const hard = new AbortController();
  const timers: NodeJS.Timeout[] = [];
  let abortReason: string | undefined;
  let terminalFailure = false;

  const abortRun = (reason: string, terminal: boolean) => {
    if (run.signal.aborted) return;
    abortReason = reason;
    terminalFailure = terminal;
    logger.warn("dsp run aborting", { reason });
    run.abort(new Error(reason));
    timers.push(setTimeout(() => hard.abort(new Error(reason)), options.cancelGraceMs ?? 0));
  };

  const onExternalAbort = () => abortRun("run cancelled", false);
  if (options.signal?.aborted) onExternalAbort();
  options.signal?.addEventListener("abort", onExternalAbort, { once: true });
  if (options.runTimeoutMs !== undefined) {
    const ms = options.runTimeoutMs;
    timers.push(setTimeout(() => abortRun(`run timed out after ${ms}ms`, false), ms));
  }

  const recordFailure = (spec: SectionSpec, thrown: unknown, retrieved: RetrievalResult) => {
    const err = thrown instanceof SectionCallFailed ? thrown.cause : thrown;
    const reason = failureReason(err);
    results.set(spec.sectionId, {
      ...emptyResult(spec, "failed", reason),
      validationStatus: err instanceof SectionGenerationFailed ? err.validation : null,
      rawText: err instanceof SectionGenerationFailed ? err.rawSnippet : "",
      attempts: thrown instanceof SectionCallFailed ? thrown.attempts : err instanceof SectionGenerationFailed ? 2 : 1,
      retrievedFrom: retrieved.map((f) => f.sourceDocumentId),
    });
    logger.error("section failed", {
      sectionId: spec.sectionId,
      errorType: err instanceof Error ? err.name : typeof err,
      reason,
    });

    for (const dependentId of registry.dependentsOf(spec.sectionId)) {
      if (results.has(dependentId)) continue;
      results.set(
        dependentId,
        emptyResult(registry.get(dependentId), "skipped_dependency_failed", `depends on section "${spec.sectionId}", which failed: ${reason}`)
      );
    }

    if (err instanceof FatalFailure && err.systemic) {
      abortRun(`systemic generation failure in "${spec.sectionId}": ${err.message}`, true);
    } else if (!options.allowPartialOutput && !(err instanceof WorkAbandoned)) {
      abortRun(`section "${spec.sectionId}" failed and partial output is disabled`, true);
    }
  };

  logger.info("dsp run started", {
    projectName: summary.projectName,
    sections: registry.specs().length,
    fragments: corpus.length,
    maxConcurrency: options.maxConcurrency,
    retrievalK: options.retrievalK,
    retryLimit: options.retryLimit,
  });

  try {
    for (const layer of registry.layers()) {
      if (run.signal.aborted) break;
      const snapshot = digest.snapshot();

      await runBounded(layer, options.maxConcurrency, async (spec) => {
        if (run.signal.aborted || results.has(spec.sectionId)) return;
        const retrieved = selector.select(spec.sectionId, summary, corpus);
        try {
          const result = await untilAbandoned(
            synthesizeSection({
              spec,
              registry,
              summary,
              retrieved,
              digest: snapshot,
              client,
              metadataText: deps.metadataText,
              signal: hard.signal,
            }),
            hard.signal
          );
          results.set(spec.sectionId, result);
        } catch (err) {
          recordFailure(spec, err, retrieved);
        }
      });

      // single writer: fold after the whole layer settled, in document order
      for (const spec of layer) {
        const result = results.get(spec.sectionId);
        if (result?.status === "valid") digest.fold(result, spec);
      }
    }
  } finally {
    for (const t of timers) clearTimeout(t);
    options.signal?.removeEventListener("abort", onExternalAbort);
  }

  const sections = registry
    .documentOrder()
    .map((spec) => results.get(spec.sectionId) ?? emptyResult(spec, "not_attempted", abortReason ?? "run cancelled"));

  const validCount = sections.filter((s) => s.status === "valid").length;
  let status: RunStatus;
  if (sections.length > 0 && (terminalFailure || validCount === 0)) {
    status = "failed";
  } else {
    status = validCount === sections.length ? "complete" : "partial";
  }

  logger.info("dsp run finished", {
    projectName: summary.projectName,
    status,
    valid: validCount,
    total: sections.length,
    latencyMs: Date.now() - startedAt,
    abortReason,
  });

  return { document: buildDocument(sections), status, failures: collectFailures(sections), abortReason };
}

export function isDocumentComplete(document: DocumentModel): boolean {
  return document.sections.length > 0 && document.sections.every((s) => s.status === "valid");
}
