import type { JsonValue, ParsedActions } from "./types.js";

/** Remove markdown code-fence markers when the output starts with one. */
export function stripCodeFences(raw: string): string {
  const text = raw.trim();
  if (!text.startsWith("```")) return text;
  return text.replaceAll("```json", "").replaceAll("```", "").trim();
}

/** Decide between structured and raw actions by attempting a JSON parse. */
export function parseActions(raw: string): ParsedActions {
  const text = stripCodeFences(raw);
  try {
    const value: JsonValue = JSON.parse(text);
    return { kind: "structured", value };
  } catch {
    return { kind: "raw", text };
  }
}

export function actionsValue(parsed: ParsedActions): JsonValue {
  return parsed.kind === "structured" ? parsed.value : parsed.text;
}

/**
 * Number of extracted tasks: the `tasks` array of an object, or the length of
 * a bare array. Anything else (raw text, diagnostics) counts as zero.
 */
export function countActions(actions: JsonValue | undefined): number {
  if (Array.isArray(actions)) return actions.length;
  if (actions !== null && typeof actions === "object") {
    const tasks = actions.tasks;
    return Array.isArray(tasks) ? tasks.length : 0;
  }
  return 0;
}
