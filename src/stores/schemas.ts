import { z } from "zod";
import type {
  DraftRecord,
  EmailRecord,
  EnrichedRecord,
  JsonValue,
} from "../pipeline/types.js";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

const EmailIdSchema = z.union([z.number(), z.string()]);

export const EmailRecordSchema = z.object({
  id: EmailIdSchema,
  sender: z.string(),
  subject: z.string(),
  body: z.string(),
  timestamp: z.string(),
});

export const EnrichedRecordSchema = z.discriminatedUnion("status", [
  EmailRecordSchema.extend({
    status: z.literal("success"),
    category: z.string(),
    actions: JsonValueSchema,
  }),
  EmailRecordSchema.extend({
    status: z.literal("error"),
    category: z.literal("Error"),
    actions: z.string(),
  }),
]);

export const DraftRecordSchema = z.object({
  email_id: EmailIdSchema,
  original_subject: z.string(),
  draft_subject: z.string(),
  draft_body: z.string(),
  suggested_followups: z.array(z.string()),
  metadata: z.object({
    category: z.string().optional(),
    actions: JsonValueSchema.optional(),
  }),
});

export const PromptFileSchema = z.object({
  categorization_prompt: z.string().optional(),
  action_item_prompt: z.string().optional(),
  auto_reply_prompt: z.string().optional(),
});

// Compile-time checks that the schemas stay in step with the domain types.
export const emailListSchema: z.ZodType<EmailRecord[]> = z.array(EmailRecordSchema);
export const enrichedListSchema: z.ZodType<EnrichedRecord[]> = z.array(EnrichedRecordSchema);
export const draftListSchema: z.ZodType<DraftRecord[]> = z.array(DraftRecordSchema);
