import { ModelReplySchema } from "../schemas.js";
import { stableStringify } from "../utils/stable-json.js";

export type ParsedReply =
  | { kind: "tool"; tool: string; params: Record<string, unknown> }
  | { kind: "final"; answer: string };

function parseJsonObject(text: string): unknown {
  const unfenced = text
    .replace(/^```(?:json)?\s*\n?/m, "")
    .replace(/\n?```\s*$/m, "")
    .trim();
  try {
    return JSON.parse(unfenced);
  } catch {
    // The model may have put prose around the JSON
    const match = text.match(/\{[\s\S]*\}/);
    if (!match) return undefined;
    try {
      return JSON.parse(match[0]);
    } catch {
      return undefined;
    }
  }
}

function answerText(answer: unknown): string {
  if (answer === undefined || answer === null) return "";
  return typeof answer === "string" ? answer : stableStringify(answer, 2);
}

/**
 * Interpret a completion. A JSON `{ "action": "tool" }` object is a tool
 * request and `{ "action": "final" }` a final answer; anything else is taken
 * as a free-text final answer.
 */
export function parseReply(raw: string): ParsedReply {
  const parsed = parseJsonObject(raw);
  if (parsed && typeof parsed === "object" && "action" in parsed) {
    const reply = ModelReplySchema.safeParse(parsed);
    if (reply.success) {
      return reply.data.action === "tool"
        ? { kind: "tool", tool: reply.data.tool, params: reply.data.params }
        : { kind: "final", answer: answerText(reply.data.answer) };
    }
  }
  return { kind: "final", answer: raw.trim() };
}
