import { extractJsonCandidate } from "./stageRunner";
import type { FieldSpec, SectionSpec } from "./types";

export type ParsedSection =
  | { ok: true; fields: Record<string, unknown> }
  | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

const BULLET = /^\s*(?:[-*•]|\d+[.)])\s+/;

/**
 * Best-effort coercion toward the declared type. Values that cannot be coerced are
 * returned untouched so validation reports the type mismatch.
 */
export function coerceField(field: FieldSpec, value: unknown): unknown {
  if (value === undefined || value === null) return value;
  switch (field.type) {
    case "string":
    case "markdown":
      if (typeof value === "string") return value.trim();
      if (typeof value === "number" || typeof value === "boolean") return String(value);
      if (field.type === "markdown" && Array.isArray(value) && value.every((v) => typeof v === "string")) {
        return value.map((v) => `- ${v.trim()}`).join("\n");
      }
      return value;
    case "date":
      return typeof value === "string" ? value.trim().slice(0, 10) : value;
    case "string_list":
      if (Array.isArray(value)) {
        return value
          .map((v) => (typeof v === "string" ? v.trim() : v))
          .filter((v) => v !== "");
      }
      if (typeof value === "string") {
        return value
          .split(/\n|;/)
          .map((line) => line.replace(BULLET, "").trim())
          .filter((line) => line.length > 0);
      }
      return value;
    case "boolean":
      if (typeof value === "string") {
        const v = value.trim().toLowerCase();
        if (v === "true" || v === "yes") return true;
        if (v === "false" || v === "no") return false;
      }
      return value;
    case "number":
      if (typeof value === "string" && value.trim() !== "") {
        const n = Number(value.trim());
        return Number.isFinite(n) ? n : value;
      }
      return value;
  }
}

/**
 * Parse untrusted model output into the section's declared fields.
 * Keys the section does not declare are dropped; a `fields` wrapper object is unwrapped.
 */
export function parseSectionOutput(raw: string, spec: SectionSpec): ParsedSection {
  if (!raw.trim()) return { ok: false, error: "empty output" };

  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonCandidate(raw));
  } catch (err) {
    return { ok: false, error: `output is not valid JSON (${err instanceof Error ? err.message : String(err)})` };
  }
  if (!isRecord(parsed)) return { ok: false, error: "output is not a JSON object" };

  const source = isRecord(parsed.fields) ? parsed.fields : parsed;
  const fields: Record<string, unknown> = {};
  for (const field of spec.requiredFields) {
    if (field.name in source) fields[field.name] = coerceField(field, source[field.name]);
  }
  return { ok: true, fields };
}
