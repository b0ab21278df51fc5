import { logger } from "../infra/logger";
import type { GenerationClient, GenerationResponse } from "../llm/types";
import { condenseDigest } from "./digest";
import { SectionCallFailed, SectionGenerationFailed } from "./errors";
import { parseSectionOutput } from "./parse";
import { buildRepairPrompt, buildSectionPrompt, describeProblems } from "./prompts";
import type { SectionSchemaRegistry } from "./schema";
import type {
  DigestSnapshot,
  FieldValue,
  ProjectSummary,
  RetrievalResult,
  SectionResult,
  SectionSpec,
  StructuredFields,
  ValidationStatus,
} from "./types";

const SECTION_MAX_TOKENS = 3_000;

export type SynthesisInput = {
  spec: SectionSpec;
  registry: SectionSchemaRegistry;
  summary: ProjectSummary;
  retrieved: RetrievalResult;
  digest: DigestSnapshot;
  client: GenerationClient;
  metadataText?: string;
  signal?: AbortSignal;
};

type Attempt = {
  raw: string;
  fields: Record<string, unknown>;
  parseError: string | null;
  violations: ValidationStatus[];
};

function isFieldValue(value: unknown): value is FieldValue {
  return (
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value)) ||
    (Array.isArray(value) && value.every((v) => typeof v === "string"))
  );
}

function toStructured(fields: Record<string, unknown>): StructuredFields {
  const out: StructuredFields = {};
  for (const [name, value] of Object.entries(fields)) {
    if (isFieldValue(value)) out[name] = value;
  }
  return out;
}

/**
 * Produce one validated section: prompt, parse, validate, and at most one repair
 * round-trip. Throws SectionGenerationFailed rather than returning partial content;
 * adapter failures arrive wrapped in SectionCallFailed.
 */
export async function synthesizeSection(input: SynthesisInput): Promise<SectionResult> {
  const { spec, registry, client } = input;
  const stage = `section:${spec.sectionId}`;

  const run = async (text: string, attempt: number): Promise<Attempt> => {
    const startedAt = Date.now();
    let response: GenerationResponse;
    try {
      response = await client.invoke({
        text,
        maxTokens: SECTION_MAX_TOKENS,
        complexity: "high",
        stage,
        signal: input.signal,
      });
    } catch (err) {
      throw new SectionCallFailed(spec.sectionId, attempt, err);
    }
    const parsed = parseSectionOutput(response.rawText, spec);
    const fields = parsed.ok ? parsed.fields : {};
    const violations = parsed.ok ? registry.violations(spec.sectionId, fields) : [];

    logger.info("section stage completed", {
      stage,
      attempt,
      latencyMs: Date.now() - startedAt,
      finishReason: response.finishReason,
      parsed: parsed.ok,
      violations: violations.length,
    });
    return { raw: response.rawText, fields, parseError: parsed.ok ? null : parsed.error, violations };
  };

  const prompt = buildSectionPrompt({
    spec,
    summary: input.summary,
    retrieved: input.retrieved,
    digestText: condenseDigest(input.digest, registry.ancestorsOf(spec.sectionId)),
    metadataText: input.metadataText,
  });
  if (input.retrieved.length === 0) {
    logger.info("no reference excerpts, using schema-only prompt", { stage });
  }

  let current = await run(prompt, 1);
  let attempts = 1;

  if (current.parseError || current.violations.length > 0) {
    const problems = describeProblems(current.parseError, current.violations);
    logger.warn("section output rejected, requesting repair", { stage, problems });
    current = await run(buildRepairPrompt({ spec, rawOutput: current.raw, problems }), 2);
    attempts = 2;
  }

  if (current.parseError) {
    throw new SectionGenerationFailed(spec.sectionId, `unparseable after repair: ${current.parseError}`, current.raw);
  }
  if (current.violations.length > 0) {
    const reason = describeProblems(null, current.violations).join("; ");
    throw new SectionGenerationFailed(
      spec.sectionId,
      `invalid after repair: ${reason}`,
      current.raw,
      current.violations[0]
    );
  }

  return {
    sectionId: spec.sectionId,
    title: spec.title,
    ordinal: spec.ordinal,
    status: "valid",
    validationStatus: { kind: "valid" },
    structuredFields: toStructured(current.fields),
    rawText: current.raw,
    attempts,
    retrievedFrom: input.retrieved.map((f) => f.sourceDocumentId),
  };
}
