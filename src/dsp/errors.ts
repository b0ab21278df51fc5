import type { ValidationStatus } from "./types";

/** Base for configuration and pipeline errors raised by the dsp core. */
export class DspError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CorpusUnavailable extends DspError {
  readonly location: string;

  constructor(location: string, detail: string) {
    super(`Reference corpus unavailable at ${location}: ${detail}`);
    this.location = location;
  }
}

export class SchemaConfigError extends DspError {}

export class SchemaCycleError extends DspError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Section dependency cycle: ${cycle.join(" -> ")}`);
    this.cycle = cycle;
  }
}

export class SectionGenerationFailed extends DspError {
  readonly sectionId: string;
  readonly reason: string;
  readonly rawSnippet: string;
  /** First violation of the last attempt; null when the output never parsed. */
  readonly validation: ValidationStatus | null;

  constructor(sectionId: string, reason: string, rawResponse?: string, validation: ValidationStatus | null = null) {
    const snippet = (rawResponse ?? "").slice(0, 400);
    super(`[${sectionId}] ${reason}${snippet ? ` | raw: ${snippet}` : ""}`);
    this.sectionId = sectionId;
    this.reason = reason;
    this.rawSnippet = snippet;
    this.validation = validation;
  }
}

/** A generation call that failed inside section synthesis; `cause` is the adapter failure. */
export class SectionCallFailed extends DspError {
  readonly sectionId: string;
  /** Prompts sent for the section, the failed one included. */
  readonly attempts: number;

  constructor(sectionId: string, attempts: number, cause: unknown) {
    super(`[${sectionId}] generation call ${attempts} failed: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.sectionId = sectionId;
    this.attempts = attempts;
  }
}

export class SummaryNotFound extends DspError {
  readonly identifier: string;

  constructor(identifier: string) {
    super(`Could not find a project summary for '${identifier}'`);
    this.identifier = identifier;
  }
}
