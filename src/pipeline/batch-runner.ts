/**
 * Batch runner: fans a batch of emails out over a bounded pool of workers,
 * collects results as they finish, then orders them by id and persists them.
 *
 * Cancellation is cooperative. Once the signal aborts, no new email is
 * started; emails already in flight finish and are kept in the result.
 */
import { enrichEmail, DEFAULT_PACING_DELAY_MS } from "./enricher.js";
import { compareIds } from "./types.js";
import { EmptyBatchError } from "../core/errors.js";
import { getCurrentContext, withContext } from "../core/correlation.js";
import { generateRunId } from "../utils/id.js";
import { truncate } from "../utils/text.js";
import type { CompletionService } from "../core/llm/completion-client.js";
import type { EventBus } from "../core/events.js";
import type { BatchSink } from "../stores/result-store.js";
import type { EmailRecord, EmailId, EnrichedRecord, EnrichmentStatus, PromptSet } from "./types.js";
import type { Logger } from "../utils/logger.js";

export const DEFAULT_MAX_WORKERS = 5;
const PROGRESS_LABEL_LENGTH = 40;

export interface BatchProgress {
  completed: number;
  total: number;
  id: EmailId;
  label: string;
  category: string;
  status: EnrichmentStatus;
}

export interface BatchRunnerDeps {
  completion: CompletionService;
  sink: BatchSink;
  logger: Logger;
  eventBus?: EventBus;
}

export interface BatchRunnerSettings {
  maxWorkers?: number;
  pacingDelayMs?: number;
}

export interface RunBatchOptions {
  signal?: AbortSignal;
  onProgress?: (progress: BatchProgress) => void;
}

export class BatchRunner {
  private readonly maxWorkers: number;
  private readonly pacingDelayMs: number;

  constructor(
    private deps: BatchRunnerDeps,
    settings: BatchRunnerSettings = {}
  ) {
    this.maxWorkers = Math.max(1, settings.maxWorkers ?? DEFAULT_MAX_WORKERS);
    this.pacingDelayMs = settings.pacingDelayMs ?? DEFAULT_PACING_DELAY_MS;
  }

  async run(
    emails: readonly EmailRecord[],
    prompts: PromptSet,
    options: RunBatchOptions = {}
  ): Promise<EnrichedRecord[]> {
    if (emails.length === 0) throw new EmptyBatchError();

    // Taken once so that edits to the prompt file mid-run cannot mix templates.
    const snapshot: Readonly<PromptSet> = Object.freeze({
      categorization_prompt: prompts.categorization_prompt,
      action_item_prompt: prompts.action_item_prompt,
      auto_reply_prompt: prompts.auto_reply_prompt,
    });

    const ctx = getCurrentContext() ?? { runId: generateRunId(), command: "batch" };
    return withContext(ctx, () => this.execute(emails, snapshot, options));
  }

  private async execute(
    emails: readonly EmailRecord[],
    prompts: Readonly<PromptSet>,
    options: RunBatchOptions
  ): Promise<EnrichedRecord[]> {
    const { logger } = this.deps;
    const total = emails.length;
    const workerCount = Math.min(this.maxWorkers, total);
    const results: EnrichedRecord[] = [];
    const startedAt = Date.now();
    let nextIndex = 0;

    logger.info({ total, workers: workerCount }, "Batch started");

    const worker = async (): Promise<void> => {
      while (!options.signal?.aborted) {
        const email = emails[nextIndex++];
        if (email === undefined) return;

        const record = await enrichEmail(email, prompts, {
          completion: this.deps.completion,
          logger,
          pacingDelayMs: this.pacingDelayMs,
        });
        results.push(record);
        this.reportProgress(record, results.length, total, options.onProgress);
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    results.sort((a, b) => compareIds(a.id, b.id));
    await this.deps.sink.save(results);

    const successCount = results.filter((r) => r.status === "success").length;
    const cancelled = options.signal?.aborted ?? false;
    logger.info(
      {
        total,
        processed: results.length,
        success: successCount,
        errors: results.length - successCount,
        elapsedMs: Date.now() - startedAt,
        cancelled,
      },
      cancelled ? "Batch cancelled" : "Batch complete"
    );

    return results;
  }

  private reportProgress(
    record: EnrichedRecord,
    completed: number,
    total: number,
    onProgress: RunBatchOptions["onProgress"]
  ): void {
    const progress: BatchProgress = {
      completed,
      total,
      id: record.id,
      label: truncate(record.subject, PROGRESS_LABEL_LENGTH),
      category: record.category,
      status: record.status,
    };

    this.deps.logger.info(
      { completed, total, emailId: record.id, status: record.status, category: record.category },
      record.status === "success" ? "Email processed" : "Email failed"
    );

    if (onProgress) {
      try {
        onProgress(progress);
      } catch (err) {
        this.deps.logger.error({ error: err }, "Progress listener failed");
      }
    }

    this.deps.eventBus
      ?.publish({
        eventType: "batch.item.completed",
        timestamp: new Date().toISOString(),
        source: "batch-runner",
        payload: { ...progress },
        runId: getCurrentContext()?.runId,
      })
      .catch((e) => {
        this.deps.logger.error({ error: e }, "Failed to publish progress event");
      });
  }
}

/** One-shot form of {@link BatchRunner.run}. */
export function runBatch(
  emails: readonly EmailRecord[],
  prompts: PromptSet,
  deps: BatchRunnerDeps,
  options: RunBatchOptions & BatchRunnerSettings = {}
): Promise<EnrichedRecord[]> {
  const { maxWorkers, pacingDelayMs, ...runOptions } = options;
  return new BatchRunner(deps, { maxWorkers, pacingDelayMs }).run(emails, prompts, runOptions);
}
