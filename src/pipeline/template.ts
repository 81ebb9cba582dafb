import { stableStringify } from "../utils/stable-json.js";
import type { TaskSpec } from "./types.js";
import { describeSchema } from "./validator.js";

const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z0-9_-]+(?:\.[a-zA-Z0-9_-]+)*)\s*\}\}/g;

export const INPUTS_ROOT = "inputs";

/** What a task may see: its declared dependencies' outputs and the run inputs. */
export type TaskContext = {
  dependencies: Record<string, unknown>;
  inputs: Record<string, unknown>;
};

/** First path segment of every placeholder in the template, in order of appearance. */
export function placeholderRoots(template: string): string[] {
  const roots: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_RE)) {
    const root = match[1].split(".")[0];
    if (!roots.includes(root)) roots.push(root);
  }
  return roots;
}

export function getPathValue(root: unknown, path: readonly string[]): unknown {
  let current = root;
  for (const part of path) {
    if (!current || typeof current !== "object") return undefined;
    current = Array.isArray(current) ? current[Number(part)] : Object.getOwnPropertyDescriptor(current, part)?.value;
  }
  return current;
}

/** Render a value for a prompt: strings as-is, scalars via String, the rest as sorted-key JSON. */
export function formatValue(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return stableStringify(value, 2);
}

export function renderTemplate(template: string, ctx: TaskContext): string {
  return template.replace(PLACEHOLDER_RE, (_match, path: string) => {
    const [root, ...rest] = path.split(".");
    if (root === INPUTS_ROOT) return formatValue(getPathValue(ctx.inputs, rest));
    if (!(root in ctx.dependencies)) return "";
    return formatValue(getPathValue(ctx.dependencies[root], rest));
  });
}

/**
 * Build the full instruction for a task: the rendered template, a context
 * block for dependencies the template does not reference, and the output
 * contract.
 */
export function buildInstruction(task: TaskSpec, ctx: TaskContext): string {
  const parts = [renderTemplate(task.instruction, ctx).trim()];

  const referenced = new Set(placeholderRoots(task.instruction));
  const unreferenced = task.dependsOn.filter((d) => !referenced.has(d) && d in ctx.dependencies);
  if (unreferenced.length > 0) {
    parts.push(
      "Context from prior tasks:\n\n" +
        unreferenced.map((d) => `### ${d}\n${formatValue(ctx.dependencies[d])}`).join("\n\n"),
    );
  }

  if (task.expectedOutput) {
    parts.push(`Expected output:\n${task.expectedOutput.trim()}`);
  }

  if (task.outputSchema && task.outputSchema.fields.length > 0) {
    parts.push(describeSchema(task.outputSchema));
  }

  return parts.join("\n\n");
}
