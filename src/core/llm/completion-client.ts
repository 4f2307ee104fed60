import OpenAI, { type ClientOptions } from "openai";
import { ApiError, TimeoutError, errorMessage } from "../errors.js";
import {
  DEFAULT_RETRY_DELAYS,
  nextRetryStep,
  type FailureClass,
  type RetryDelays,
  type RetryState,
} from "./retry-policy.js";
import { sleep } from "../../utils/sleep.js";
import type { CompletionConfig } from "../../utils/config.js";
import type { Logger } from "../../utils/logger.js";

export interface CompleteOptions {
  /** Overrides the client default; `null` leaves `max_tokens` out of the request. */
  maxTokens?: number | null;
}

/** The single call the pipeline and the assistant need from a completion service. */
export interface CompletionService {
  complete(prompt: string, options?: CompleteOptions): Promise<string>;
}

export interface CompletionClientConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  retryDelays?: RetryDelays;
  defaultHeaders?: Record<string, string>;
  fetch?: ClientOptions["fetch"];
}

export class CompletionClient implements CompletionService {
  private client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number | undefined;
  private readonly timeoutMs: number;
  private readonly retryDelays: RetryDelays;

  constructor(
    config: CompletionClientConfig,
    private logger: Logger
  ) {
    this.model = config.model;
    this.temperature = config.temperature ?? 0.2;
    this.maxTokens = config.maxTokens;
    this.timeoutMs = config.timeoutMs ?? 20_000;
    this.retryDelays = config.retryDelays ?? DEFAULT_RETRY_DELAYS;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      defaultHeaders: config.defaultHeaders,
      timeout: this.timeoutMs,
      // Retries are owned by the policy below.
      maxRetries: 0,
      ...(config.fetch ? { fetch: config.fetch } : {}),
    });
  }

  static fromConfig(config: CompletionConfig, logger: Logger): CompletionClient {
    return new CompletionClient(
      {
        apiKey: config.api_key,
        baseURL: config.base_url,
        model: config.model,
        temperature: config.temperature,
        maxTokens: config.max_tokens,
        timeoutMs: config.request_timeout_ms,
        retryDelays: {
          rateLimitMs: config.rate_limit_retry_delay_ms,
          timeoutMs: config.timeout_retry_delay_ms,
        },
        defaultHeaders: config.default_headers,
      },
      logger
    );
  }

  async complete(prompt: string, options: CompleteOptions = {}): Promise<string> {
    const maxTokens =
      options.maxTokens === undefined ? this.maxTokens : options.maxTokens ?? undefined;
    let state: RetryState = "first_attempt";

    for (;;) {
      try {
        return await this.send(prompt, maxTokens);
      } catch (err) {
        const failure = classifyFailure(err);
        const decision = nextRetryStep(state, failure, this.retryDelays);

        if (decision.action === "fail") {
          throw this.toPipelineError(err, failure);
        }

        this.logger.debug(
          { failure, delayMs: decision.delayMs, error: errorMessage(err) },
          "Retrying completion request"
        );
        await sleep(decision.delayMs);
        state = decision.next;
      }
    }
  }

  private async send(prompt: string, maxTokens: number | undefined): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      temperature: this.temperature,
      ...(maxTokens !== undefined ? { max_tokens: maxTokens } : {}),
    });

    return (response.choices[0]?.message?.content ?? "").trim();
  }

  private toPipelineError(err: unknown, failure: FailureClass): Error {
    if (failure === "timeout") return new TimeoutError(this.timeoutMs);

    if (err instanceof OpenAI.APIError && typeof err.status === "number") {
      const body = err.error !== undefined ? JSON.stringify(err.error) : err.message;
      return new ApiError(err.status, body);
    }

    return new ApiError(0, errorMessage(err));
  }
}

export function classifyFailure(err: unknown): FailureClass {
  // APIConnectionTimeoutError extends APIError, so it is checked first.
  if (err instanceof OpenAI.APIConnectionTimeoutError) return "timeout";
  if (err instanceof OpenAI.APIError && err.status === 429) return "rate_limited";
  return "fatal";
}
