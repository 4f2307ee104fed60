import { randomBytes } from "node:crypto";

/**
 * Generate a compact, time-sortable run ID.
 * Format: base36(timestamp) + "-" + 8 hex chars of randomness.
 */
export function generateRunId(): string {
  const timePart = Date.now().toString(36);
  const randomPart = randomBytes(4).toString("hex");
  return `${timePart}-${randomPart}`;
}
