import { countActions } from "./actions.js";
import type { JsonValue } from "./types.js";

export type PriorityLabel = "HIGH" | "MEDIUM" | "LOW";

export interface PriorityAssessment {
  score: number;
  label: PriorityLabel;
}

/** Fields the scorer reads. Any of them may be absent. */
export interface ScorableRecord {
  category?: string | null;
  subject?: string | null;
  body?: string | null;
  actions?: JsonValue;
}

const URGENT_KEYWORDS = ["urgent", "asap", "immediately", "critical", "high priority"];
const DEADLINE_KEYWORDS = ["deadline", "by ", "before ", "due ", "last date", "submit"];
const MEETING_KEYWORDS = ["meeting", "call", "discussion", "review", "planning"];

export const HIGH_THRESHOLD = 7;
export const MEDIUM_THRESHOLD = 4;
const MAX_ACTION_POINTS = 3;

/**
 * Rule-based priority, additive from 0:
 * - category important +3, to-do/todo +3, spam/newsletter -1
 * - urgent keywords +3, deadline keywords +2, meeting keywords +1
 * - one point per extracted task, at most 3
 */
export function scorePriority(record: ScorableRecord): PriorityAssessment {
  const category = (record.category ?? "").toLowerCase();
  const text = `${record.subject ?? ""} ${record.body ?? ""}`.toLowerCase();
  let score = 0;

  if (category.includes("important")) score += 3;
  if (category.includes("to-do") || category.includes("todo")) score += 3;
  if (category.includes("spam") || category.includes("newsletter")) score -= 1;

  if (containsAny(text, URGENT_KEYWORDS)) score += 3;
  if (containsAny(text, DEADLINE_KEYWORDS)) score += 2;
  if (containsAny(text, MEETING_KEYWORDS)) score += 1;

  score += Math.min(MAX_ACTION_POINTS, countActions(record.actions));

  return { score, label: priorityLabel(score) };
}

export function priorityLabel(score: number): PriorityLabel {
  if (score >= HIGH_THRESHOLD) return "HIGH";
  if (score >= MEDIUM_THRESHOLD) return "MEDIUM";
  return "LOW";
}

function containsAny(text: string, keywords: string[]): boolean {
  return keywords.some((k) => text.includes(k));
}
