import { EmptyDraftError } from "../core/errors.js";
import type { DraftMetadata, DraftRecord, EmailRecord, EnrichedRecord } from "../pipeline/types.js";

const FOLLOWUPS_MARKER = "Followups:";

/** Lines after the first `Followups:` marker, bullets stripped, blanks dropped. */
export function parseFollowups(draftText: string): string[] {
  const markerAt = draftText.indexOf(FOLLOWUPS_MARKER);
  if (markerAt === -1) return [];

  return draftText
    .slice(markerAt + FOLLOWUPS_MARKER.length)
    .split("\n")
    .map((line) => line.replace(/^[-• ]+|[-• ]+$/g, "").trim())
    .filter((line) => line.length > 0);
}

export function buildDraftRecord(
  email: Pick<EmailRecord, "id" | "subject">,
  draftText: string,
  enriched?: Pick<EnrichedRecord, "category" | "actions">
): DraftRecord {
  const body = draftText.trim();
  if (body === "") throw new EmptyDraftError();

  const metadata: DraftMetadata = enriched
    ? { category: enriched.category, actions: enriched.actions }
    : {};

  return {
    email_id: email.id,
    original_subject: email.subject,
    draft_subject: `Re: ${email.subject}`,
    draft_body: body,
    suggested_followups: parseFollowups(body),
    metadata,
  };
}
