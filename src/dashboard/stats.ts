/**
 * Aggregates over a stored batch, shaped for charts and summary tiles.
 * Counts are returned as `[key, count]` pairs, highest count first; ties keep
 * the order in which keys were first seen.
 */
import { countActions } from "../pipeline/actions.js";
import { scorePriority, type PriorityLabel } from "../pipeline/priority.js";
import type { EnrichedRecord } from "../pipeline/types.js";

export type CountPair = [key: string, count: number];

const STOPWORDS = new Set([
  "the", "and", "for", "with", "you", "your", "this", "that",
  "are", "our", "has", "have", "will", "from", "all", "but",
  "can", "was", "were", "they", "their", "them", "about",
  "please", "kindly", "hello", "thanks", "thank",
  "team", "dear", "regards", "best", "here", "link", "click",
  "http", "https", "com", "subject", "body",
]);

const TOKEN_EDGE = /^[.,!?:;()[\]"']+|[.,!?:;()[\]"']+$/g;

export type ScoredRecord = EnrichedRecord & {
  actionCount: number;
  priorityScore: number;
  priorityLabel: PriorityLabel;
};

export interface BatchSummary {
  total: number;
  success: number;
  errors: number;
  averageScore: number;
  priorities: Record<PriorityLabel, number>;
}

export function withPriority(records: readonly EnrichedRecord[]): ScoredRecord[] {
  return records.map((record) => {
    const { score, label } = scorePriority(record);
    return {
      ...record,
      actionCount: countActions(record.actions),
      priorityScore: score,
      priorityLabel: label,
    };
  });
}

export function categoryCounts(records: readonly EnrichedRecord[]): CountPair[] {
  return countBy(records.map((r) => r.category));
}

export function senderCounts(records: readonly EnrichedRecord[]): CountPair[] {
  return countBy(records.map((r) => r.sender));
}

/** Emails per UTC day, oldest first. Unparseable timestamps are skipped. */
export function dailyVolume(records: readonly EnrichedRecord[]): CountPair[] {
  const days: string[] = [];
  for (const record of records) {
    const time = Date.parse(record.timestamp);
    if (Number.isNaN(time)) continue;
    days.push(new Date(time).toISOString().slice(0, 10));
  }
  return countBy(days).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

export function priorityCounts(records: readonly EnrichedRecord[]): Record<PriorityLabel, number> {
  const counts: Record<PriorityLabel, number> = { HIGH: 0, MEDIUM: 0, LOW: 0 };
  for (const record of records) {
    counts[scorePriority(record).label] += 1;
  }
  return counts;
}

export function keywordCounts(records: readonly EnrichedRecord[], topN = 20): CountPair[] {
  const tokens: string[] = [];
  for (const record of records) {
    const text = `${record.subject} ${record.body}`.toLowerCase();
    for (const raw of text.split(/\s+/)) {
      const token = raw.replace(TOKEN_EDGE, "");
      if (token.length > 2 && !STOPWORDS.has(token)) tokens.push(token);
    }
  }
  return countBy(tokens).slice(0, topN);
}

export function summarizeBatch(records: readonly EnrichedRecord[]): BatchSummary {
  const scored = withPriority(records);
  const success = scored.filter((r) => r.status === "success").length;
  const totalScore = scored.reduce((sum, r) => sum + r.priorityScore, 0);

  return {
    total: scored.length,
    success,
    errors: scored.length - success,
    averageScore: scored.length > 0 ? totalScore / scored.length : 0,
    priorities: priorityCounts(records),
  };
}

function countBy(keys: readonly string[]): CountPair[] {
  const counts = new Map<string, number>();
  for (const key of keys) {
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  // Array.prototype.sort is stable, so ties stay in first-seen order.
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}
