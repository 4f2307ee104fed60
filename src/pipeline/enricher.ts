import { actionsValue, parseActions } from "./actions.js";
import { EmptyCompletionError, errorMessage } from "../core/errors.js";
import { formatEmailBlock } from "../utils/text.js";
import { sleep } from "../utils/sleep.js";
import type { CompletionService } from "../core/llm/completion-client.js";
import type { EmailRecord, EnrichedRecord, ParsedActions, PromptSet } from "./types.js";
import type { Logger } from "../utils/logger.js";

export interface EnricherDeps {
  completion: CompletionService;
  logger: Logger;
  /** Delay before each item's first call, to stay under provider rate limits. */
  pacingDelayMs?: number;
}

export const DEFAULT_PACING_DELAY_MS = 200;

export function buildCategorizationPrompt(email: EmailRecord, template: string): string {
  return `${template}

Email:
${formatEmailBlock(email)}

Respond with ONLY the category name (like: "Work", "Personal", "Urgent", etc.).`;
}

export function buildActionPrompt(email: EmailRecord, template: string): string {
  return `${template}

Email:
${formatEmailBlock(email)}

Respond ONLY with valid JSON.
Do NOT use backticks or markdown.`;
}

export async function categorize(
  email: EmailRecord,
  template: string,
  completion: CompletionService
): Promise<string> {
  const output = await completion.complete(buildCategorizationPrompt(email, template));
  const category = (output.split(/\r?\n/)[0] ?? "").trim();
  if (!category) throw new EmptyCompletionError("category");
  return category;
}

export async function extractActions(
  email: EmailRecord,
  template: string,
  completion: CompletionService
): Promise<ParsedActions> {
  const output = await completion.complete(buildActionPrompt(email, template));
  return parseActions(output);
}

/**
 * Categorize one email and extract its action items. Never rejects: a failure
 * in either call becomes an `error` record carrying the cause.
 */
export async function enrichEmail(
  email: EmailRecord,
  prompts: PromptSet,
  deps: EnricherDeps
): Promise<EnrichedRecord> {
  const base: EmailRecord = {
    id: email.id,
    sender: email.sender,
    subject: email.subject,
    body: email.body,
    timestamp: email.timestamp,
  };

  try {
    await sleep(deps.pacingDelayMs ?? DEFAULT_PACING_DELAY_MS);

    const category = await categorize(email, prompts.categorization_prompt, deps.completion);
    const actions = await extractActions(email, prompts.action_item_prompt, deps.completion);

    if (actions.kind === "raw") {
      deps.logger.debug({ emailId: email.id }, "Action output was not JSON, keeping raw text");
    }

    return { ...base, category, actions: actionsValue(actions), status: "success" };
  } catch (err) {
    deps.logger.warn({ emailId: email.id, error: errorMessage(err) }, "Email enrichment failed");
    return {
      ...base,
      category: "Error",
      actions: `Processing failed: ${errorMessage(err)}`,
      status: "error",
    };
  }
}
