export type FieldType = "string" | "markdown" | "string_list" | "boolean" | "number" | "date";

export type ValidationRule = {
  minLength?: number;
  maxLength?: number;
  minItems?: number;
  maxItems?: number;
  pattern?: string;
  enum?: string[];
  min?: number;
  max?: number;
};

export type FieldSpec = {
  name: string;
  type: FieldType;
  description?: string;
  rule?: ValidationRule;
};

export type SectionSpec = {
  sectionId: string;
  title: string;
  ordinal: number;
  instructions: string;
  /** Extra headings that identify this section in exemplar documents. */
  aliases: string[];
  requiredFields: FieldSpec[];
  dependsOn: string[];
  /** Fields folded into the context digest; all required fields when empty. */
  digestFields: string[];
};

export type FieldValue = string | string[] | boolean | number;
export type StructuredFields = Record<string, FieldValue>;

export type ValidationStatus =
  | { kind: "valid" }
  | { kind: "missing_field"; field: string }
  | { kind: "type_mismatch"; field: string; expected: FieldType }
  | { kind: "constraint_violation"; field: string; rule: string };

export type SectionStatus = "valid" | "failed" | "skipped_dependency_failed" | "not_attempted";

export type ProjectSummary = {
  text: string;
  projectName?: string;
};

export type CorpusFragment = {
  sourceDocumentId: string;
  sectionTopic: string;
  text: string;
};

/** Top-K fragments for one section, best first. */
export type RetrievalResult = readonly CorpusFragment[];

export type SectionResult = {
  sectionId: string;
  title: string;
  ordinal: number;
  status: SectionStatus;
  validationStatus: ValidationStatus | null;
  structuredFields: StructuredFields;
  rawText: string;
  reason?: string;
  /** Generation round-trips spent (0 when never attempted, 2 after a repair). */
  attempts: number;
  /** Provenance of the fragments that were put in the prompt. */
  retrievedFrom: string[];
};

export type DigestEntry = {
  sectionId: string;
  title: string;
  facts: string[];
};

export type DigestSnapshot = ReadonlyMap<string, Readonly<DigestEntry>>;

export type DocumentMetadata = {
  projectName: string;
  generatedAt: string;
  model: string;
  promptVersion: string;
};

export type DocumentModel = {
  metadata: DocumentMetadata;
  sections: SectionResult[];
};

export type RunStatus = "complete" | "partial" | "failed";

export type SectionFailure = {
  sectionId: string;
  status: Exclude<SectionStatus, "valid">;
  reason: string;
};

export type GenerateOptions = {
  maxConcurrency: number;
  retrievalK: number;
  retryLimit: number;
  allowPartialOutput: boolean;
  /** Whole-run deadline; no new sections start after it fires. */
  runTimeoutMs?: number;
  /** How long in-flight generation calls may run after cancellation before they are abandoned. */
  cancelGraceMs?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  signal?: AbortSignal;
};

export type GenerateResult = {
  document: DocumentModel;
  status: RunStatus;
  failures: SectionFailure[];
  abortReason?: string;
};

export type DataClassification = "P3 (Moderate)" | "P4 (High)" | "HIPAA" | "CUI" | "Export Controlled";

export type InfrastructureType =
  | "Standalone Workstation"
  | "Research Computing Cluster"
  | "Cloud (AWS/GCP)"
  | "Air-Gapped Server";

export type ProjectMetadata = {
  projectName: string;
  piName: string;
  uislName: string;
  department: string;
  classification: DataClassification;
  isCui: boolean;
  dataProvider: string;
  infrastructure: InfrastructureType;
  osType: string;
  transferMethod: string;
  retentionDate: string;
  destructionMethod: string;
};

/** Project facts a caller pins instead of extracting them: CLI flags or a job's `metadata`. */
export type MetadataOverrides = Partial<
  Pick<ProjectMetadata, "piName" | "uislName" | "department" | "classification" | "isCui" | "dataProvider" | "infrastructure">
>;
