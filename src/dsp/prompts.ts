import { describeValidation } from "./schema";
import type { FieldSpec, ProjectSummary, RetrievalResult, SectionSpec, ValidationStatus } from "./types";

export const PROMPT_VERSIONS = {
  section: "dsp_section_v2",
  repair: "dsp_repair_v1",
  metadata: "dsp_metadata_v1",
} as const;

export const PROMPT_VERSION_STRING = [
  `sec:${PROMPT_VERSIONS.section}`,
  `fix:${PROMPT_VERSIONS.repair}`,
  `meta:${PROMPT_VERSIONS.metadata}`,
].join("|");

const MAX_FRAGMENT_CHARS = 2_500;

const TYPE_HINTS: Record<FieldSpec["type"], string> = {
  string: "string",
  markdown: "string (Markdown body text, no heading)",
  string_list: "array of strings",
  boolean: "true or false",
  number: "number",
  date: 'string "YYYY-MM-DD"',
};

function describeRule(field: FieldSpec): string {
  const rule = field.rule;
  if (!rule) return "";
  const parts: string[] = [];
  if (rule.minLength !== undefined) parts.push(`at least ${rule.minLength} characters`);
  if (rule.maxLength !== undefined) parts.push(`at most ${rule.maxLength} characters`);
  if (rule.minItems !== undefined) parts.push(`at least ${rule.minItems} items`);
  if (rule.maxItems !== undefined) parts.push(`at most ${rule.maxItems} items`);
  if (rule.min !== undefined) parts.push(`>= ${rule.min}`);
  if (rule.max !== undefined) parts.push(`<= ${rule.max}`);
  if (rule.enum) parts.push(`one of: ${rule.enum.map((v) => JSON.stringify(v)).join(", ")}`);
  if (rule.pattern) parts.push(`matching /${rule.pattern}/`);
  return parts.length > 0 ? `; ${parts.join("; ")}` : "";
}

export function describeFields(spec: SectionSpec): string {
  return spec.requiredFields
    .map((f) => `- "${f.name}": ${TYPE_HINTS[f.type]}${describeRule(f)}${f.description ? ` - ${f.description}` : ""}`)
    .join("\n");
}

function clipFragment(text: string): string {
  return text.length <= MAX_FRAGMENT_CHARS ? text : `${text.slice(0, MAX_FRAGMENT_CHARS)}\n[...]`;
}

type SectionPromptInput = {
  spec: SectionSpec;
  summary: ProjectSummary;
  retrieved: RetrievalResult;
  /** Condensed facts from completed sections this one depends on. */
  digestText: string;
  /** Structured project facts rendered as text, when known. */
  metadataText?: string;
};

export function buildSectionPrompt(input: SectionPromptInput): string {
  const { spec, summary, retrieved, digestText, metadataText } = input;

  const reference =
    retrieved.length > 0
      ? [
          "Below are excerpts from previously approved Data Security Plans for this same section.",
          "Adapt the strongest language and security controls to the new project; ignore names, dates and systems that do not apply.",
          "",
          ...retrieved.map((f, i) => `--- EXCERPT ${i + 1} [source: ${f.sourceDocumentId}] ---\n${clipFragment(f.text)}`),
          "--- END EXCERPTS ---",
        ].join("\n")
      : "No reference excerpts are available for this section. Write it from the project summary and the field requirements alone.";

  const established = digestText
    ? `Facts already established in earlier sections of this plan. Stay consistent with them and do not contradict them:\n${digestText}`
    : "No earlier sections are available; this section stands on its own.";

  return `You are an expert Research Compliance Officer at a research university. You are writing one section of a Data Security Plan (DSP) for a new research project.

Return JSON only. No markdown fences. No commentary.

### 1. The section
Title: "${spec.title}"
Instructions: ${spec.instructions}

### 2. The new project
${metadataText ? `${metadataText.trim()}\n\n` : ""}${summary.text.trim()}

### 3. Consistency
${established}

### 4. Reference material
${reference}

### 5. Output schema
Return one JSON object with exactly these keys:
${describeFields(spec)}

Rules:
- Formal, professional tone aligned with NIST SP 800-171 / CMMC practice.
- Use only facts from the project summary and established facts; do not invent people, systems or dates.
- No placeholder text such as [PLACEHOLDER] or TBD.
- Do not repeat the section title inside body text.`;
}

type RepairPromptInput = {
  spec: SectionSpec;
  rawOutput: string;
  problems: string[];
};

export function buildRepairPrompt(input: RepairPromptInput): string {
  const { spec, rawOutput, problems } = input;
  return `Your previous answer for the Data Security Plan section "${spec.title}" could not be accepted.

Return JSON only. No markdown fences. No commentary.

Problems to fix:
${problems.map((p) => `- ${p}`).join("\n")}

Required JSON keys:
${describeFields(spec)}

Keep every part of the previous answer that was already correct; change only what the problems require.

Previous answer:
${rawOutput.slice(0, 8_000)}`;
}

export function describeProblems(parseError: string | null, violations: readonly ValidationStatus[]): string[] {
  const problems = parseError ? [parseError] : [];
  return problems.concat(violations.map(describeValidation));
}

export function buildMetadataPrompt(summary: ProjectSummary): string {
  return `You extract structured facts from a research project description for a Data Security Plan.

Return JSON only. No markdown. No commentary.

Output schema (exact keys, camelCase; omit a key when the description does not state it):
{
  "projectName": "string",
  "piName": "string",
  "uislName": "string",
  "department": "string",
  "classification": "P3 (Moderate)|P4 (High)|HIPAA|CUI|Export Controlled",
  "isCui": false,
  "dataProvider": "string",
  "infrastructure": "Standalone Workstation|Research Computing Cluster|Cloud (AWS/GCP)|Air-Gapped Server",
  "osType": "string",
  "transferMethod": "string",
  "retentionDate": "YYYY-MM-DD",
  "destructionMethod": "string"
}

Rules:
- Use only what the description states. Do not guess names.

Project description:
${summary.text.trim()}`;
}
