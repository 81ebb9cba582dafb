import { z } from "zod";
import { SchemaViolationError, type FieldViolation } from "../errors.js";
import type { FieldSpec, FieldType, OutputSchema } from "./types.js";

export type OutputValidation =
  | { success: true; data: Record<string, unknown> }
  | { success: false; error: SchemaViolationError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function normalizeFieldName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

const LINE_RE = /^\s*(?:[-*]\s+)?(?:\*\*)?([A-Za-z][A-Za-z0-9_ -]*?)(?:\*\*)?\s*:\s*(?:\*\*)?\s*(.+?)\s*$/;

/** Read `name: value` lines (also `- **name**: value`) for the declared fields. */
function extractLines(raw: string, fields: readonly FieldSpec[]): Record<string, unknown> | undefined {
  const byName = new Map(fields.map((f) => [normalizeFieldName(f.name), f.name]));
  const out: Record<string, unknown> = {};
  for (const line of raw.split("\n")) {
    const match = LINE_RE.exec(line);
    if (!match) continue;
    const field = byName.get(normalizeFieldName(match[1]));
    if (field && !(field in out)) out[field] = match[2];
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

/**
 * Pull a field mapping out of agent output: a JSON object (optionally fenced
 * or surrounded by prose), or `name: value` lines naming declared fields.
 */
export function extractPayload(raw: string, fields: readonly FieldSpec[] = []): Record<string, unknown> | undefined {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  const candidates = [fenced?.[1], raw].filter((c): c is string => c !== undefined);

  for (const candidate of candidates) {
    const direct = tryParseJson(candidate.trim());
    if (isRecord(direct)) return direct;

    const braces = /\{[\s\S]*\}/.exec(candidate);
    if (braces) {
      const embedded = tryParseJson(braces[0]);
      if (isRecord(embedded)) return embedded;
    }
  }

  return fields.length > 0 ? extractLines(raw, fields) : undefined;
}

const emptyToUndefined = (v: unknown): unknown => (v === null ? undefined : v);

function numeric(v: unknown): unknown {
  if (typeof v === "string" && v.trim() !== "" && !Number.isNaN(Number(v.trim()))) {
    return Number(v.trim());
  }
  return v;
}

function boolish(v: unknown): unknown {
  if (typeof v === "string") {
    const t = v.trim().toLowerCase();
    if (t === "true") return true;
    if (t === "false") return false;
  }
  return v;
}

function jsonish(v: unknown): unknown {
  if (typeof v === "string" && /^\s*[[{]/.test(v)) {
    const parsed = tryParseJson(v);
    return parsed === undefined ? v : parsed;
  }
  return v;
}

function stringish(v: unknown): unknown {
  return typeof v === "number" || typeof v === "boolean" ? String(v) : v;
}

function baseSchema(type: FieldType): z.ZodTypeAny {
  switch (type) {
    case "string":
      return z.preprocess(stringish, z.string());
    case "number":
      return z.preprocess(numeric, z.number().finite());
    case "integer":
      return z.preprocess(numeric, z.number().int());
    case "boolean":
      return z.preprocess(boolish, z.boolean());
    case "array":
      return z.preprocess(jsonish, z.array(z.unknown()));
    case "object":
      return z.preprocess(jsonish, z.record(z.unknown()));
  }
}

function fieldSchema(field: FieldSpec): z.ZodTypeAny {
  const base = baseSchema(field.type);
  return z.preprocess(emptyToUndefined, field.required === false ? base.optional() : base);
}

function describeIssue(issue: z.ZodIssue): string {
  if (issue.code === "invalid_type") {
    return issue.received === "undefined" ? "missing" : `expected ${issue.expected}, received ${issue.received}`;
  }
  return issue.message;
}

/**
 * Validate agent output against a schema. Returns the structured mapping with
 * only the declared fields, or an error listing every violated field in
 * schema order.
 */
export function safeValidateOutput(raw: string, schema?: OutputSchema): OutputValidation {
  const fields = schema?.fields ?? [];
  const payload = extractPayload(raw, fields);

  if (fields.length === 0) {
    return { success: true, data: payload ?? { output: raw.trim() } };
  }

  const shape: Record<string, z.ZodTypeAny> = {};
  for (const field of fields) shape[field.name] = fieldSchema(field);

  const result = z.object(shape).safeParse(payload ?? {});
  if (result.success) {
    const data: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(result.data)) {
      if (value !== undefined) data[key] = value;
    }
    return { success: true, data };
  }

  const reasons = new Map<string, string>();
  for (const issue of result.error.issues) {
    const field = String(issue.path[0] ?? "");
    if (!reasons.has(field)) reasons.set(field, describeIssue(issue));
  }
  const violations: FieldViolation[] = fields
    .filter((f) => reasons.has(f.name))
    .map((f) => ({ field: f.name, reason: reasons.get(f.name) ?? "invalid" }));

  return { success: false, error: new SchemaViolationError(violations) };
}

/** Like safeValidateOutput, but throws SchemaViolationError. */
export function validateOutput(raw: string, schema?: OutputSchema): Record<string, unknown> {
  const result = safeValidateOutput(raw, schema);
  if (!result.success) throw result.error;
  return result.data;
}

/** Output contract appended to a task instruction. */
export function describeSchema(schema: OutputSchema): string {
  const lines = schema.fields.map((f) => {
    const flag = f.required === false ? "optional" : "required";
    return `- ${f.name} (${f.type}, ${flag})${f.description ? `: ${f.description}` : ""}`;
  });
  return `Give the final answer as a JSON object with these fields:\n${lines.join("\n")}`;
}

/** Feedback for a corrective re-prompt after a schema violation. */
export function correctionFeedback(error: SchemaViolationError): string {
  const lines = error.violations.map((v) => `- ${v.field}: ${v.reason}`);
  return `Your previous answer did not match the required output format:\n${lines.join(
    "\n",
  )}\nAnswer again with a JSON object that includes every required field with the right type.`;
}
