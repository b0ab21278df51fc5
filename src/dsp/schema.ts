import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { SchemaConfigError, SchemaCycleError } from "./errors";
import type { FieldSpec, FieldType, SectionSpec, ValidationRule, ValidationStatus } from "./types";

const FIELD_TYPES: readonly FieldType[] = ["string", "markdown", "string_list", "boolean", "number", "date"];
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const defaultSectionsPath = path.resolve(__dirname, "../../config/sections.yaml");

// --- YAML parsing --- //

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function asNonEmptyString(value: unknown, field: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new SchemaConfigError(`Invalid sections config: "${field}" must be a non-empty string`);
  }
  return value.trim();
}

function asStringList(value: unknown, field: string): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new SchemaConfigError(`Invalid sections config: "${field}" must be a list`);
  }
  return value.map((v, i) => asNonEmptyString(v, `${field}[${i}]`));
}

function asOptionalNumber(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new SchemaConfigError(`Invalid sections config: "${field}" must be a number`);
  }
  return value;
}

function isFieldType(value: string): value is FieldType {
  return FIELD_TYPES.some((t) => t === value);
}

function parseRule(raw: unknown, field: string): ValidationRule | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (!isRecord(raw)) {
    throw new SchemaConfigError(`Invalid sections config: "${field}" must be a mapping`);
  }
  const rule: ValidationRule = {
    minLength: asOptionalNumber(raw.min_length, `${field}.min_length`),
    maxLength: asOptionalNumber(raw.max_length, `${field}.max_length`),
    minItems: asOptionalNumber(raw.min_items, `${field}.min_items`),
    maxItems: asOptionalNumber(raw.max_items, `${field}.max_items`),
    min: asOptionalNumber(raw.min, `${field}.min`),
    max: asOptionalNumber(raw.max, `${field}.max`),
  };
  if (raw.pattern !== undefined) {
    const pattern = asNonEmptyString(raw.pattern, `${field}.pattern`);
    try {
      new RegExp(pattern);
    } catch {
      throw new SchemaConfigError(`Invalid sections config: "${field}.pattern" is not a valid regular expression`);
    }
    rule.pattern = pattern;
  }
  if (raw.enum !== undefined) {
    rule.enum = asStringList(raw.enum, `${field}.enum`);
  }
  return rule;
}

function parseField(raw: unknown, where: string): FieldSpec {
  if (!isRecord(raw)) {
    throw new SchemaConfigError(`Invalid sections config: "${where}" must be a mapping`);
  }
  const type = asNonEmptyString(raw.type, `${where}.type`);
  if (!isFieldType(type)) {
    throw new SchemaConfigError(`Invalid sections config: "${where}.type" must be one of ${FIELD_TYPES.join(", ")}`);
  }
  return {
    name: asNonEmptyString(raw.name, `${where}.name`),
    type,
    description: typeof raw.description === "string" ? raw.description.trim() : undefined,
    rule: parseRule(raw.rule, `${where}.rule`),
  };
}

function parseSection(raw: unknown, index: number): SectionSpec {
  const where = `sections[${index}]`;
  if (!isRecord(raw)) {
    throw new SchemaConfigError(`Invalid sections config: "${where}" must be a mapping`);
  }
  const fields = raw.fields;
  if (!Array.isArray(fields) || fields.length === 0) {
    throw new SchemaConfigError(`Invalid sections config: "${where}.fields" must be a non-empty list`);
  }
  return {
    sectionId: asNonEmptyString(raw.id, `${where}.id`),
    title: asNonEmptyString(raw.title, `${where}.title`),
    ordinal: asOptionalNumber(raw.ordinal, `${where}.ordinal`) ?? index + 1,
    instructions: asNonEmptyString(raw.instructions, `${where}.instructions`),
    aliases: asStringList(raw.aliases, `${where}.aliases`),
    requiredFields: fields.map((f, i) => parseField(f, `${where}.fields[${i}]`)),
    dependsOn: asStringList(raw.depends_on, `${where}.depends_on`),
    digestFields: asStringList(raw.digest_fields, `${where}.digest_fields`),
  };
}

export function parseSectionsYaml(content: string): SectionSpec[] {
  const raw: unknown = YAML.parse(content);
  if (!isRecord(raw) || !Array.isArray(raw.sections)) {
    throw new SchemaConfigError('Invalid sections config: top-level "sections" list is required');
  }
  return raw.sections.map(parseSection);
}

// --- Graph --- //

function byOrdinal(a: SectionSpec, b: SectionSpec): number {
  return a.ordinal - b.ordinal || a.sectionId.localeCompare(b.sectionId);
}

/** DFS with recursion-stack marking; returns the first cycle found as a closed path. */
export function findCycle(specs: readonly SectionSpec[]): string[] | null {
  const byId = new Map(specs.map((s) => [s.sectionId, s]));
  const done = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  const visit = (id: string): string[] | null => {
    if (onStack.has(id)) {
      return [...stack.slice(stack.indexOf(id)), id];
    }
    if (done.has(id)) return null;
    stack.push(id);
    onStack.add(id);
    for (const dep of byId.get(id)?.dependsOn ?? []) {
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    stack.pop();
    onStack.delete(id);
    done.add(id);
    return null;
  };

  for (const spec of [...specs].sort(byOrdinal)) {
    const cycle = visit(spec.sectionId);
    if (cycle) return cycle;
  }
  return null;
}

// --- Validation --- //

function isPresent(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === "string") return value.trim().length > 0;
  return true;
}

function typeMatches(value: unknown, type: FieldType): boolean {
  switch (type) {
    case "string":
    case "markdown":
      return typeof value === "string";
    case "date":
      return typeof value === "string" && ISO_DATE.test(value) && !Number.isNaN(Date.parse(value));
    case "string_list":
      return Array.isArray(value) && value.every((v) => typeof v === "string");
    case "boolean":
      return typeof value === "boolean";
    case "number":
      return typeof value === "number" && Number.isFinite(value);
  }
}

function ruleViolation(value: unknown, rule: ValidationRule): string | null {
  const strings = typeof value === "string" ? [value] : Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];

  if (typeof value === "string") {
    const len = value.trim().length;
    if (rule.minLength !== undefined && len < rule.minLength) return `minLength:${rule.minLength}`;
    if (rule.maxLength !== undefined && len > rule.maxLength) return `maxLength:${rule.maxLength}`;
  }
  if (Array.isArray(value)) {
    if (rule.minItems !== undefined && value.length < rule.minItems) return `minItems:${rule.minItems}`;
    if (rule.maxItems !== undefined && value.length > rule.maxItems) return `maxItems:${rule.maxItems}`;
  }
  if (typeof value === "number") {
    if (rule.min !== undefined && value < rule.min) return `min:${rule.min}`;
    if (rule.max !== undefined && value > rule.max) return `max:${rule.max}`;
  }
  if (rule.pattern !== undefined) {
    const re = new RegExp(rule.pattern);
    if (strings.some((s) => !re.test(s))) return `pattern:${rule.pattern}`;
  }
  if (rule.enum !== undefined) {
    const allowed = rule.enum;
    if (strings.some((s) => !allowed.includes(s))) return `enum:${allowed.join("|")}`;
  }
  return null;
}

function checkField(field: FieldSpec, value: unknown): ValidationStatus {
  if (!isPresent(value)) return { kind: "missing_field", field: field.name };
  if (!typeMatches(value, field.type)) return { kind: "type_mismatch", field: field.name, expected: field.type };
  const rule = field.rule ? ruleViolation(value, field.rule) : null;
  if (rule) return { kind: "constraint_violation", field: field.name, rule };
  return { kind: "valid" };
}

export function describeValidation(status: ValidationStatus): string {
  switch (status.kind) {
    case "valid":
      return "valid";
    case "missing_field":
      return `missing field "${status.field}"`;
    case "type_mismatch":
      return `field "${status.field}" must be of type ${status.expected}`;
    case "constraint_violation":
      return `field "${status.field}" violates ${status.rule}`;
  }
}

// --- Registry --- //

function normalizeHeading(text: string): string {
  return text
    .toLowerCase()
    .replace(/^[\s#*]*(?:section\s+)?(?:\d+(?:\.\d+)*\.?|[ivx]+\.)?\s*/, "")
    .replace(/[_*:]+/g, " ")
    .replace(/[^a-z0-9&/ ]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Static catalogue of document sections. Construction validates the dependency graph
 * so a registry instance is always acyclic and fully resolved.
 */
export class SectionSchemaRegistry {
  private readonly ordered: SectionSpec[];
  private readonly byId: Map<string, SectionSpec>;

  constructor(specs: readonly SectionSpec[]) {
    this.byId = new Map();
    for (const spec of specs) {
      if (this.byId.has(spec.sectionId)) {
        throw new SchemaConfigError(`Duplicate section id: ${spec.sectionId}`);
      }
      this.byId.set(spec.sectionId, spec);
    }
    for (const spec of specs) {
      for (const dep of spec.dependsOn) {
        if (!this.byId.has(dep)) {
          throw new SchemaConfigError(`Section "${spec.sectionId}" depends on unknown section "${dep}"`);
        }
      }
    }
    const cycle = findCycle(specs);
    if (cycle) throw new SchemaCycleError(cycle);
    this.ordered = this.topologicalOrder();
  }

  static fromYaml(content: string): SectionSchemaRegistry {
    return new SectionSchemaRegistry(parseSectionsYaml(content));
  }

  static load(filePath: string = defaultSectionsPath): SectionSchemaRegistry {
    return SectionSchemaRegistry.fromYaml(fs.readFileSync(filePath, "utf8"));
  }

  /** Specs in dependency order; among ready sections the lowest ordinal goes first. */
  specs(): readonly SectionSpec[] {
    return this.ordered;
  }

  /** Specs in ordinal order, the order of the finished document. */
  documentOrder(): SectionSpec[] {
    return [...this.byId.values()].sort(byOrdinal);
  }

  get(sectionId: string): SectionSpec {
    const spec = this.byId.get(sectionId);
    if (!spec) throw new SchemaConfigError(`Unknown section: ${sectionId}`);
    return spec;
  }

  /** Groups of mutually independent sections; every dependency sits in an earlier layer. */
  layers(): SectionSpec[][] {
    const depth = new Map<string, number>();
    for (const spec of this.ordered) {
      const d = spec.dependsOn.reduce((max, dep) => Math.max(max, (depth.get(dep) ?? 0) + 1), 0);
      depth.set(spec.sectionId, d);
    }
    const layers: SectionSpec[][] = [];
    for (const spec of this.ordered) {
      const d = depth.get(spec.sectionId) ?? 0;
      (layers[d] ??= []).push(spec);
    }
    return layers.map((layer) => layer.sort(byOrdinal));
  }

  /** Transitive dependents of a section, in dependency order. */
  dependentsOf(sectionId: string): string[] {
    const hit = new Set<string>([sectionId]);
    const out: string[] = [];
    for (const spec of this.ordered) {
      if (spec.dependsOn.some((dep) => hit.has(dep))) {
        hit.add(spec.sectionId);
        out.push(spec.sectionId);
      }
    }
    return out;
  }

  /** Transitive dependencies of a section, in dependency order. */
  ancestorsOf(sectionId: string): string[] {
    const need = new Set<string>();
    const walk = (id: string) => {
      for (const dep of this.get(id).dependsOn) {
        if (need.has(dep)) continue;
        need.add(dep);
        walk(dep);
      }
    };
    walk(sectionId);
    return this.ordered.filter((s) => need.has(s.sectionId)).map((s) => s.sectionId);
  }

  /** Resolve an exemplar heading to a section id by id, title or alias. */
  matchTopic(heading: string): string | null {
    const needle = normalizeHeading(heading);
    if (!needle) return null;
    let best: { id: string; length: number } | null = null;
    for (const spec of this.documentOrder()) {
      const names = [spec.sectionId.replace(/_/g, " "), spec.title, ...spec.aliases].map(normalizeHeading);
      for (const name of names) {
        if (!name) continue;
        if (name === needle) return spec.sectionId;
        if (needle.includes(name) && (!best || name.length > best.length)) {
          best = { id: spec.sectionId, length: name.length };
        }
      }
    }
    return best?.id ?? null;
  }

  /** Every violation, in field order. */
  violations(sectionId: string, candidate: Record<string, unknown>): ValidationStatus[] {
    return this.get(sectionId)
      .requiredFields.map((field) => checkField(field, candidate[field.name]))
      .filter((status) => status.kind !== "valid");
  }

  /** First violation in field order, or valid. */
  validate(sectionId: string, candidate: Record<string, unknown>): ValidationStatus {
    return this.violations(sectionId, candidate)[0] ?? { kind: "valid" };
  }

  private topologicalOrder(): SectionSpec[] {
    const remaining = [...this.byId.values()].sort(byOrdinal);
    const placed = new Set<string>();
    const out: SectionSpec[] = [];
    while (remaining.length > 0) {
      const idx = remaining.findIndex((s) => s.dependsOn.every((dep) => placed.has(dep)));
      // findCycle already ran, so a ready section always exists
      const [next] = remaining.splice(idx, 1);
      placed.add(next.sectionId);
      out.push(next);
    }
    return out;
  }
}
