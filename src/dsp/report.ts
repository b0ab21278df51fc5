import { buildPdf } from "../infra/pdf";
import { escapeHtml, markdownToHtml, markdownToPlainLines } from "./markdown";
import { loadReportCss, loadReportHtml } from "./templateLoader";
import type { DocumentModel, FieldValue, RunStatus, SectionResult } from "./types";

export type RenderedDocument = {
  html: string;
  /** Markdown rendition, saved as the `.md` output. */
  text: string;
  pdfBytes: Buffer;
};

const STATUS_LABELS: Record<RunStatus, string> = {
  complete: "Complete",
  partial: "Partial: some sections were not generated",
  failed: "Failed: the plan could not be generated",
};

const DISCLAIMER =
  "This plan was drafted automatically from the project summary and previously approved plans. " +
  "It must be reviewed by the Principal Investigator and the Unit Information Security Lead before submission.";

/** Status implied by the sections alone, for callers that did not keep the run status. */
export function documentStatus(model: DocumentModel): RunStatus {
  const valid = model.sections.filter((s) => s.status === "valid").length;
  if (model.sections.length === 0 || valid === 0) return "failed";
  return valid === model.sections.length ? "complete" : "partial";
}

/** "data_provider" -> "Data Provider" */
export function fieldLabel(name: string): string {
  return name
    .split(/[_\s]+/)
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}

export function formatFieldValue(value: FieldValue): string {
  if (Array.isArray(value)) return value.map((v) => `- ${v}`).join("\n");
  if (typeof value === "boolean") return value ? "Yes" : "No";
  return String(value);
}

function notGeneratedNotice(section: SectionResult): string {
  const label = section.status === "skipped_dependency_failed" ? "skipped" : section.status.replace(/_/g, " ");
  return `> **Not generated** (${label}): ${section.reason ?? "no reason recorded"}`;
}

function sectionMarkdown(section: SectionResult): string {
  const parts = [`## ${section.ordinal}. ${section.title}`];
  if (section.status !== "valid") {
    parts.push(notGeneratedNotice(section));
    return parts.join("\n\n");
  }
  for (const [name, value] of Object.entries(section.structuredFields)) {
    parts.push(`### ${fieldLabel(name)}`, formatFieldValue(value));
  }
  return parts.join("\n\n");
}

/** Markdown rendition of the whole plan, sections in document order. */
export function assembleReportText(model: DocumentModel, status: RunStatus = documentStatus(model)): string {
  const { metadata } = model;
  const header = [
    `# Data Security Plan: ${metadata.projectName}`,
    `Generated: ${metadata.generatedAt}`,
    `Model: ${metadata.model}`,
    `Prompt version: ${metadata.promptVersion}`,
    `Status: ${STATUS_LABELS[status]}`,
  ].join("\n");
  return [header, ...model.sections.map(sectionMarkdown)].join("\n\n") + "\n";
}

function sectionHtml(section: SectionResult): string {
  const id = `section-${escapeHtml(section.sectionId)}`;
  const heading = `<h2>${section.ordinal}. ${escapeHtml(section.title)}</h2>`;
  if (section.status !== "valid") {
    const label = section.status === "skipped_dependency_failed" ? "skipped" : section.status.replace(/_/g, " ");
    return `<section class="dsp-section" id="${id}">
${heading}
<div class="dsp-missing"><strong>Not generated</strong> (${escapeHtml(label)}): ${escapeHtml(section.reason ?? "no reason recorded")}</div>
</section>`;
  }
  const fields = Object.entries(section.structuredFields)
    .map(
      ([name, value]) => `<div class="dsp-field">
<h3>${escapeHtml(fieldLabel(name))}</h3>
${markdownToHtml(formatFieldValue(value), 3)}
</div>`
    )
    .join("\n");
  return `<section class="dsp-section" id="${id}">
${heading}
${fields}
</section>`;
}

function tocHtml(model: DocumentModel): string {
  const items = model.sections.map(
    (s) =>
      `<li><a href="#section-${escapeHtml(s.sectionId)}">${escapeHtml(s.title)}</a>${s.status === "valid" ? "" : " (not generated)"}</li>`
  );
  return `<ol>\n${items.join("\n")}\n</ol>`;
}

/** Self-contained HTML report: template placeholders filled, CSS inlined. */
export function buildHtmlReport(
  model: DocumentModel,
  status: RunStatus = documentStatus(model),
  templateDir?: string
): string {
  const css = loadReportCss(templateDir);
  const replacements: Record<string, string> = {
    PROJECT_NAME: escapeHtml(model.metadata.projectName),
    GENERATED_AT: escapeHtml(model.metadata.generatedAt),
    MODEL: escapeHtml(model.metadata.model),
    PROMPT_VERSION: escapeHtml(model.metadata.promptVersion),
    RUN_STATUS: status,
    RUN_STATUS_LABEL: escapeHtml(STATUS_LABELS[status]),
    TOC_HTML: tocHtml(model),
    SECTIONS_HTML: model.sections.map(sectionHtml).join("\n"),
    DISCLAIMER: escapeHtml(DISCLAIMER),
  };

  // Function replacers so `$` in model output is not read as a substitution pattern
  return loadReportHtml(templateDir)
    .replace('<link rel="stylesheet" href="styles.css">', () => `<style>${css}</style>`)
    .replace(/\{\{([A-Z_]+)\}\}/g, (match, key: string) => replacements[key] ?? match);
}

export function renderDocument(
  model: DocumentModel,
  status: RunStatus = documentStatus(model),
  templateDir?: string
): RenderedDocument {
  const text = assembleReportText(model, status);
  return {
    html: buildHtmlReport(model, status, templateDir),
    text,
    pdfBytes: buildPdf([...markdownToPlainLines(text), "", DISCLAIMER]),
  };
}

export type GenerationLog = {
  projectName: string;
  generatedAt: string;
  model: string;
  promptVersion: string;
  status: RunStatus;
  sections: Array<{
    sectionId: string;
    title: string;
    status: SectionResult["status"];
    attempts: number;
    reason: string | null;
    validationStatus: SectionResult["validationStatus"];
    retrievedFrom: string[];
    fields: SectionResult["structuredFields"];
    rawText: string;
  }>;
};

/** Per-section audit record written beside the rendered plan. */
export function buildGenerationLog(model: DocumentModel, status: RunStatus = documentStatus(model)): GenerationLog {
  return {
    projectName: model.metadata.projectName,
    generatedAt: model.metadata.generatedAt,
    model: model.metadata.model,
    promptVersion: model.metadata.promptVersion,
    status,
    sections: model.sections.map((s) => ({
      sectionId: s.sectionId,
      title: s.title,
      status: s.status,
      attempts: s.attempts,
      reason: s.reason ?? null,
      validationStatus: s.validationStatus,
      retrievedFrom: s.retrievedFrom,
      fields: s.structuredFields,
      rawText: s.rawText,
    })),
  };
}
