import { resolveDataPaths, type AppConfig, type DataPaths } from "./utils/config.js";
import { CompletionClient, type CompletionService } from "./core/llm/completion-client.js";
import { InProcessEventBus, type EventBus } from "./core/events.js";
import { BatchRunner } from "./pipeline/batch-runner.js";
import { EmailAssistant } from "./assistant/assistant.js";
import { ResultStore } from "./stores/result-store.js";
import { DraftStore } from "./stores/draft-store.js";
import { PromptStore } from "./stores/prompt-store.js";
import type { Logger } from "./utils/logger.js";

export interface AppServices {
  paths: DataPaths;
  completion: CompletionService;
  eventBus: EventBus;
  results: ResultStore;
  drafts: DraftStore;
  prompts: PromptStore;
  runner: BatchRunner;
  assistant: EmailAssistant;
  logger: Logger;
}

export function createServices(
  config: AppConfig,
  logger: Logger,
  completion: CompletionService = CompletionClient.fromConfig(
    config.completion,
    logger.child({ component: "completion-client" })
  )
): AppServices {
  const paths = resolveDataPaths(config);
  const eventBus = new InProcessEventBus(logger);
  const results = new ResultStore(paths.processed, logger);

  return {
    paths,
    completion,
    eventBus,
    results,
    drafts: new DraftStore(paths.drafts, logger),
    prompts: new PromptStore(paths.prompts, logger),
    runner: new BatchRunner(
      { completion, sink: results, logger, eventBus },
      {
        maxWorkers: config.pipeline.max_workers,
        pacingDelayMs: config.pipeline.pacing_delay_ms,
      }
    ),
    assistant: new EmailAssistant(completion),
    logger,
  };
}
