/** Error taxonomy for the completion client, the batch runner and the stores. */

/** Non-retryable failure from the completion service. `status` is 0 when no HTTP response arrived. */
export class ApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`Completion API error ${status}${body ? `: ${body}` : ""}`);
    this.name = "ApiError";
    this.status = status;
    this.body = body;
  }
}

/** The completion call exceeded its deadline on the retry as well. */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Completion request timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class EmptyBatchError extends Error {
  constructor() {
    super("No emails to process: the batch is empty");
    this.name = "EmptyBatchError";
  }
}

/** A persisted file exists but cannot be read back. Recovered locally, never thrown to callers. */
export class MalformedStoreError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Malformed store file ${path}: ${reason}`);
    this.name = "MalformedStoreError";
    this.path = path;
  }
}

export class EmptyDraftError extends Error {
  constructor() {
    super("Draft is empty");
    this.name = "EmptyDraftError";
  }
}

/** The model answered, but with nothing usable as a category. */
export class EmptyCompletionError extends Error {
  constructor(what: string) {
    super(`Completion returned no ${what}`);
    this.name = "EmptyCompletionError";
  }
}

/** A command that calls the completion service was started without a key. */
export class MissingApiKeyError extends Error {
  constructor() {
    super("No completion API key configured (completion.api_key or OPENROUTER_API_KEY)");
    this.name = "MissingApiKeyError";
  }
}

export class UnknownEmailError extends Error {
  readonly emailId: string;

  constructor(emailId: string) {
    super(`No email with id ${emailId} in the inbox`);
    this.name = "UnknownEmailError";
    this.emailId = emailId;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
