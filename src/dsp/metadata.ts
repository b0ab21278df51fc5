import { errorMessage, logger } from "../infra/logger";
import type { GenerationClient } from "../llm/types";
import { buildMetadataPrompt } from "./prompts";
import { runJsonStage } from "./stageRunner";
import type { DataClassification, InfrastructureType, ProjectMetadata, ProjectSummary } from "./types";

export const CLASSIFICATIONS: readonly DataClassification[] = [
  "P3 (Moderate)",
  "P4 (High)",
  "HIPAA",
  "CUI",
  "Export Controlled",
];

export const INFRASTRUCTURE_TYPES: readonly InfrastructureType[] = [
  "Standalone Workstation",
  "Research Computing Cluster",
  "Cloud (AWS/GCP)",
  "Air-Gapped Server",
];

export const DEFAULT_PROJECT_METADATA: ProjectMetadata = {
  projectName: "My Research Project",
  piName: "Unknown PI",
  uislName: "Unknown UISL",
  department: "Research Computing",
  classification: "P4 (High)",
  isCui: false,
  dataProvider: "External Agency",
  infrastructure: "Standalone Workstation",
  osType: "Linux",
  transferMethod: "Encrypted Drive",
  retentionDate: "2030-01-01",
  destructionMethod: "DoD 5220.22-M",
};

type MetadataCandidate = Record<string, unknown>;

function isCandidate(value: unknown): value is MetadataCandidate {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function pickString(raw: MetadataCandidate, key: keyof ProjectMetadata, fallback: string): string {
  const value = raw[key];
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

function pickOne<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  return allowed.find((a) => a === value) ?? fallback;
}

/** Merge an untrusted extraction over defaults; unknown enum values fall back. */
export function normalizeMetadata(
  raw: MetadataCandidate,
  defaults: ProjectMetadata = DEFAULT_PROJECT_METADATA
): ProjectMetadata {
  const retention = pickString(raw, "retentionDate", defaults.retentionDate);
  return {
    projectName: pickString(raw, "projectName", defaults.projectName),
    piName: pickString(raw, "piName", defaults.piName),
    uislName: pickString(raw, "uislName", defaults.uislName),
    department: pickString(raw, "department", defaults.department),
    classification: pickOne(raw.classification, CLASSIFICATIONS, defaults.classification),
    isCui: typeof raw.isCui === "boolean" ? raw.isCui : defaults.isCui,
    dataProvider: pickString(raw, "dataProvider", defaults.dataProvider),
    infrastructure: pickOne(raw.infrastructure, INFRASTRUCTURE_TYPES, defaults.infrastructure),
    osType: pickString(raw, "osType", defaults.osType),
    transferMethod: pickString(raw, "transferMethod", defaults.transferMethod),
    retentionDate: /^\d{4}-\d{2}-\d{2}$/.test(retention) ? retention : defaults.retentionDate,
    destructionMethod: pickString(raw, "destructionMethod", defaults.destructionMethod),
  };
}

/** Converts metadata into a prose block for section prompts. */
export function metadataToSummaryText(meta: ProjectMetadata): string {
  return [
    "**Project Identity:**",
    `Project: ${meta.projectName}`,
    `PI: ${meta.piName}`,
    `UISL: ${meta.uislName}`,
    `Department: ${meta.department}`,
    "",
    "**Data Sensitivity:**",
    `Classification: ${meta.classification}`,
    `CUI: ${meta.isCui ? "Yes" : "No"}`,
    `Data Provider: ${meta.dataProvider}`,
    "",
    "**Infrastructure:**",
    `Type: ${meta.infrastructure}`,
    `OS: ${meta.osType}`,
    `Transfer Method: ${meta.transferMethod}`,
    "",
    "**Lifecycle:**",
    `Retention Date: ${meta.retentionDate}`,
    `Destruction: ${meta.destructionMethod}`,
  ].join("\n");
}

/**
 * Ask the model for project facts stated in the summary. Any failure falls back to
 * the defaults (with the caller's overrides) so the section run can still proceed.
 */
export async function extractProjectMetadata(
  summary: ProjectSummary,
  client: GenerationClient,
  overrides: Partial<ProjectMetadata> = {}
): Promise<ProjectMetadata> {
  const defaults = { ...DEFAULT_PROJECT_METADATA, ...overrides };
  try {
    const raw = await runJsonStage({
      stage: "METADATA_EXTRACT",
      prompt: buildMetadataPrompt(summary),
      maxTokens: 800,
      validate: isCandidate,
      client,
      complexity: "low",
    });
    return { ...normalizeMetadata(raw, defaults), ...overrides };
  } catch (err) {
    logger.warn("project metadata extraction failed, using defaults", { error: errorMessage(err) });
    return defaults;
  }
}
