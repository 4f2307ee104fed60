import { loadInbox } from "../stores/inbox.js";
import { UnknownEmailError } from "../core/errors.js";
import { buildDraftRecord } from "../assistant/drafts.js";
import { summarizeBatch, categoryCounts, senderCounts, dailyVolume, keywordCounts, withPriority } from "../dashboard/stats.js";
import type { AppServices } from "../app.js";
import type { EventBus } from "../core/events.js";
import type { BatchProgress } from "../pipeline/batch-runner.js";
import type { DraftRecord, EmailRecord, EnrichedRecord } from "../pipeline/types.js";

export interface ProcessCommandOptions {
  signal?: AbortSignal;
  onProgress?: (progress: BatchProgress) => void;
}

/** Run one batch over the inbox file. Rejects with EmptyBatchError when the inbox is empty. */
export async function processInbox(
  services: AppServices,
  options: ProcessCommandOptions = {}
): Promise<EnrichedRecord[]> {
  const emails = await loadInbox(services.paths.inbox, services.logger);
  const prompts = await services.prompts.load();
  return services.runner.run(emails, prompts, options);
}

/** Write one line per finished email while a batch runs. */
export function watchBatchProgress(eventBus: EventBus, write: (line: string) => void): void {
  eventBus.subscribe("batch.item.completed", async (event) => {
    const { completed, total, id, label, category, status } = event.payload;
    const outcome = status === "success" ? String(category) : "failed";
    write(`[${String(completed)}/${String(total)}] #${String(id)} ${String(label)}: ${outcome}`);
  });
}

export async function batchReport(services: AppServices) {
  const records = await services.results.load();
  return {
    summary: summarizeBatch(records),
    categories: categoryCounts(records),
    senders: senderCounts(records),
    volume: dailyVolume(records),
    keywords: keywordCounts(records),
    emails: withPriority(records).map((r) => ({
      id: r.id,
      subject: r.subject,
      category: r.category,
      status: r.status,
      actionCount: r.actionCount,
      priorityScore: r.priorityScore,
      priorityLabel: r.priorityLabel,
    })),
  };
}

export async function askAboutEmail(
  services: AppServices,
  emailId: string,
  question: string
): Promise<string> {
  const email = await findEmail(services, emailId);
  return services.assistant.ask(question, email);
}

/** Generate a reply with the current auto-reply template and append it to the draft store. */
export async function draftReply(services: AppServices, emailId: string): Promise<DraftRecord> {
  const email = await findEmail(services, emailId);
  const prompts = await services.prompts.load();
  const text = await services.assistant.draftReply(email, prompts);

  const enriched = (await services.results.load()).find((r) => String(r.id) === emailId);
  const draft = buildDraftRecord(email, text, enriched);
  await services.drafts.append(draft);
  return draft;
}

async function findEmail(services: AppServices, emailId: string): Promise<EmailRecord> {
  const inbox = await loadInbox(services.paths.inbox, services.logger);
  const email = inbox.find((e) => String(e.id) === emailId);
  if (!email) throw new UnknownEmailError(emailId);
  return email;
}
