import {
  ApiError,
  EmptyBatchError,
  EmptyDraftError,
  MissingApiKeyError,
  TimeoutError,
  UnknownEmailError,
} from "../core/errors.js";

/**
 * Convert a batch or assistant failure into one short message naming the cause.
 * Never exposes stack traces, file paths, keys or raw provider payloads.
 */
export function formatUserFacingError(err: unknown): string {
  if (err instanceof EmptyBatchError) {
    return "No emails found. Put your inbox in the data directory (mock_inbox.json) first.";
  }

  if (err instanceof EmptyDraftError) {
    return "The draft is empty, so there is nothing to save.";
  }

  if (err instanceof UnknownEmailError) {
    return `There is no email with id ${err.emailId} in the inbox.`;
  }

  if (err instanceof MissingApiKeyError) {
    return "No API key is configured. Set OPENROUTER_API_KEY or completion.api_key in the config file.";
  }

  const statusCode = err instanceof ApiError ? err.status : extractStatusCode(err);
  const msg = extractMessage(err).toLowerCase();

  if (statusCode === 429 || msg.includes("rate limit") || msg.includes("too many requests")) {
    return "The completion service is rate limiting requests. Please try again in about a minute.";
  }

  if (
    statusCode === 401 ||
    statusCode === 403 ||
    msg.includes("unauthorized") ||
    msg.includes("invalid api key")
  ) {
    return "Could not authenticate with the completion service. Please check the API key configuration.";
  }

  if (
    err instanceof TimeoutError ||
    statusCode === 0 ||
    statusCode === 503 ||
    msg.includes("timed out") ||
    msg.includes("econnreset") ||
    msg.includes("enotfound") ||
    msg.includes("econnrefused")
  ) {
    return "The completion service could not be reached. Please try again in a moment.";
  }

  return "Sorry, processing failed. Please try again.";
}

function extractStatusCode(err: unknown): number | null {
  if (!err || typeof err !== "object") return null;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return null;
}

function extractMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err && typeof err === "object" && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err ?? "");
}
