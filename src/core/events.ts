import type { Logger } from "../utils/logger.js";

export interface PipelineEvent {
  eventType: string;
  timestamp: string;
  source: string;
  payload: Record<string, unknown>;
  runId?: string;
}

export interface EventBus {
  publish(event: PipelineEvent): Promise<void>;
  subscribe(
    pattern: string,
    handler: (event: PipelineEvent) => Promise<void>
  ): void;
}

/**
 * In-process event bus. Handlers run in subscription order; a failing handler
 * is logged and does not stop delivery to the others.
 */
export class InProcessEventBus implements EventBus {
  private subscriptions: Array<{
    pattern: RegExp;
    handler: (event: PipelineEvent) => Promise<void>;
  }> = [];
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async publish(event: PipelineEvent): Promise<void> {
    this.logger.debug({ eventType: event.eventType }, "Event published");

    for (const sub of this.subscriptions) {
      if (sub.pattern.test(event.eventType)) {
        try {
          await sub.handler(event);
        } catch (err) {
          this.logger.error(
            { eventType: event.eventType, error: err },
            "Event handler error"
          );
        }
      }
    }
  }

  subscribe(
    pattern: string,
    handler: (event: PipelineEvent) => Promise<void>
  ): void {
    // Convert glob-like pattern to regex: "batch.*" → /^batch\..*$/
    const regexStr = pattern
      .replace(/\./g, "\\.")
      .replace(/\*/g, ".*");
    const regex = new RegExp(`^${regexStr}$`);

    this.subscriptions.push({ pattern: regex, handler });
    this.logger.debug({ pattern }, "Event subscription registered");
  }
}
