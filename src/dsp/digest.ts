import type { DigestEntry, DigestSnapshot, FieldValue, SectionResult, SectionSpec } from "./types";

export type DigestLimits = {
  maxFactsPerSection: number;
  maxFactChars: number;
  maxTotalChars: number;
};

export const DEFAULT_DIGEST_LIMITS: DigestLimits = {
  maxFactsPerSection: 6,
  maxFactChars: 240,
  maxTotalChars: 4_000,
};

function clip(text: string, max: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length <= max ? flat : `${flat.slice(0, max - 1).trimEnd()}…`;
}

function renderValue(value: FieldValue): string {
  if (Array.isArray(value)) return value.join("; ");
  if (typeof value === "boolean") return value ? "yes" : "no";
  return String(value);
}

function entryChars(entry: DigestEntry): number {
  return entry.facts.reduce((sum, f) => sum + f.length, 0);
}

/**
 * Bounded running summary of facts settled by completed sections. Only the document
 * assembler folds into it; synthesizers read immutable snapshots.
 */
export class ContextDigest {
  private readonly entries = new Map<string, DigestEntry>();

  constructor(private readonly limits: DigestLimits = DEFAULT_DIGEST_LIMITS) {}

  fold(result: SectionResult, spec: SectionSpec): void {
    if (result.status !== "valid") return;
    const names = spec.digestFields.length > 0 ? spec.digestFields : spec.requiredFields.map((f) => f.name);
    const facts: string[] = [];
    for (const name of names) {
      const value = result.structuredFields[name];
      if (value === undefined) continue;
      facts.push(clip(`${name}: ${renderValue(value)}`, this.limits.maxFactChars));
      if (facts.length >= this.limits.maxFactsPerSection) break;
    }
    this.entries.set(result.sectionId, { sectionId: result.sectionId, title: result.title, facts });
    this.enforceBudget();
  }

  snapshot(): DigestSnapshot {
    const copy = new Map<string, Readonly<DigestEntry>>();
    for (const [id, entry] of this.entries) {
      copy.set(id, Object.freeze({ ...entry, facts: [...entry.facts] }));
    }
    return copy;
  }

  totalChars(): number {
    let total = 0;
    for (const entry of this.entries.values()) total += entryChars(entry);
    return total;
  }

  /** Drop trailing facts from the largest entry until under budget; each section keeps one fact. */
  private enforceBudget(): void {
    while (this.totalChars() > this.limits.maxTotalChars) {
      let largest: DigestEntry | null = null;
      for (const entry of this.entries.values()) {
        if (entry.facts.length > 1 && (!largest || entryChars(entry) > entryChars(largest))) largest = entry;
      }
      if (!largest) return;
      largest.facts.pop();
    }
  }
}

/** Render the digest entries of the given sections, in the given order, for a prompt. */
export function condenseDigest(snapshot: DigestSnapshot, sectionIds: readonly string[]): string {
  const blocks: string[] = [];
  for (const id of sectionIds) {
    const entry = snapshot.get(id);
    if (!entry || entry.facts.length === 0) continue;
    blocks.push([`[${entry.title}]`, ...entry.facts.map((f) => `- ${f}`)].join("\n"));
  }
  return blocks.join("\n\n");
}
