export type EmailId = number | string;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface EmailRecord {
  id: EmailId;
  sender: string;
  subject: string;
  body: string;
  timestamp: string;
}

export interface ActionItem {
  task: string;
  deadline: string | null;
}

/**
 * Outcome of action extraction. `structured` holds whatever JSON the model
 * returned (usually `{ tasks: ActionItem[] }`); `raw` keeps the cleaned text
 * when it was not valid JSON.
 */
export type ParsedActions =
  | { kind: "structured"; value: JsonValue }
  | { kind: "raw"; text: string };

export interface EnrichedSuccess extends EmailRecord {
  status: "success";
  category: string;
  actions: JsonValue;
}

export interface EnrichedFailure extends EmailRecord {
  status: "error";
  category: "Error";
  /** Diagnostic, always `Processing failed: <cause>`. */
  actions: string;
}

export type EnrichedRecord = EnrichedSuccess | EnrichedFailure;

export type EnrichmentStatus = EnrichedRecord["status"];

export interface PromptSet {
  categorization_prompt: string;
  action_item_prompt: string;
  auto_reply_prompt: string;
}

export interface DraftMetadata {
  category?: string;
  actions?: JsonValue;
}

export interface DraftRecord {
  email_id: EmailId;
  original_subject: string;
  draft_subject: string;
  draft_body: string;
  suggested_followups: string[];
  metadata: DraftMetadata;
}

/**
 * Total order over ids: numbers numerically, strings lexically,
 * numbers before strings.
 */
export function compareIds(a: EmailId, b: EmailId): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}
