import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage, logger } from "../infra/logger";
import { DEFAULT_RETRY_POLICY, RetryingGenerationClient } from "../llm/retry";
import type { GenerationClient } from "../llm/types";
import { generate, type CorpusSource, type GenerateDeps } from "./assembler";
import { persistRunArtifacts, writeErrorArtifact, type ArtifactStore } from "./artifacts";
import { loadCorpus } from "./corpus";
import { CorpusUnavailable, SchemaConfigError, SchemaCycleError } from "./errors";
import { DEFAULT_PROJECT_METADATA, extractProjectMetadata, metadataToSummaryText } from "./metadata";
import { buildGenerationLog, renderDocument } from "./report";
import { defaultSectionsPath, parseSectionsYaml, SectionSchemaRegistry } from "./schema";
import type { GenerateOptions, GenerateResult, MetadataOverrides, ProjectSummary } from "./types";

export type DspPipelineInput = {
  runId: string;
  summary: ProjectSummary;
  options: GenerateOptions;
  client: GenerationClient;
  corpusDir: string;
  outputDir: string;
  sectionsPath?: string;
  templateDir?: string;
  /** Run the metadata extraction stage before the sections. Defaults to true. */
  extractMetadata?: boolean;
  /** Project facts supplied by the caller; they win over extracted values. */
  metadata?: MetadataOverrides;
  store?: ArtifactStore;
  retry?: GenerateDeps["retry"];
  now?: () => Date;
};

export type DspOutputFiles = {
  pdf: string;
  html: string;
  markdown: string;
  log: string;
};

export type DspPipelineResult = GenerateResult & {
  runId: string;
  files: DspOutputFiles;
};

export function projectSlug(name: string): string {
  const slug = name
    .trim()
    .replace(/[^A-Za-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return slug || "Untitled_Project";
}

/**
 * The end-to-end run shared by the worker and the CLI: optional metadata extraction,
 * section generation, rendering, output files and run artifacts.
 */
export async function runDspPipeline(input: DspPipelineInput): Promise<DspPipelineResult> {
  const startedAt = Date.now();
  const sectionsPath = input.sectionsPath ?? defaultSectionsPath;
  const sections = parseSectionsYaml(await fs.readFile(sectionsPath, "utf8"));

  // Schema and corpus problems must surface before any model call
  let corpus: CorpusSource;
  let configError: Error | undefined;
  try {
    corpus = loadCorpus(input.corpusDir, new SectionSchemaRegistry(sections));
  } catch (err) {
    if (!(err instanceof SchemaCycleError || err instanceof SchemaConfigError || err instanceof CorpusUnavailable)) {
      throw err;
    }
    configError = err;
    corpus = () => {
      throw err;
    };
  }

  let summary = input.summary;
  let metadataText: string | undefined;
  if ((input.extractMetadata ?? true) && !configError) {
    const metadataClient = new RetryingGenerationClient(
      input.client,
      { ...DEFAULT_RETRY_POLICY, retryLimit: input.options.retryLimit },
      input.retry
    );
    const overrides = { ...input.metadata, ...(summary.projectName ? { projectName: summary.projectName } : {}) };
    const metadata = await extractProjectMetadata(summary, metadataClient, overrides);
    metadataText = metadataToSummaryText(metadata);
    if (!summary.projectName && metadata.projectName !== DEFAULT_PROJECT_METADATA.projectName) {
      summary = { ...summary, projectName: metadata.projectName };
    }
  }

  const result = await generate(summary, input.options, {
    client: input.client,
    sections,
    corpus,
    metadataText,
    retry: input.retry,
    now: input.now,
  });

  const rendered = renderDocument(result.document, result.status, input.templateDir);
  const slug = projectSlug(result.document.metadata.projectName);
  const dir = path.join(input.outputDir, slug);
  await fs.mkdir(dir, { recursive: true });

  const files: DspOutputFiles = {
    pdf: path.join(dir, `${slug}_DSP.pdf`),
    html: path.join(dir, `${slug}_DSP.html`),
    markdown: path.join(dir, `${slug}_DSP.md`),
    log: path.join(dir, `${slug}_generation_log.json`),
  };
  await Promise.all([
    fs.writeFile(files.pdf, rendered.pdfBytes),
    fs.writeFile(files.html, rendered.html, "utf8"),
    fs.writeFile(files.markdown, rendered.text, "utf8"),
    fs.writeFile(files.log, JSON.stringify(buildGenerationLog(result.document, result.status), null, 2), "utf8"),
  ]);

  if (input.store) {
    try {
      await persistRunArtifacts(input.store, input.runId, result);
      if (result.abortReason) {
        await writeErrorArtifact(input.store, input.runId, "run", result.abortReason);
      }
    } catch (err) {
      // best effort
      logger.warn("failed to persist run artifacts", { runId: input.runId, error: errorMessage(err) });
    }
  }

  logger.info("dsp pipeline finished", {
    runId: input.runId,
    status: result.status,
    outputDir: dir,
    latencyMs: Date.now() - startedAt,
  });

  return { ...result, runId: input.runId, files };
}
