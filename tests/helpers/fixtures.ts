import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { EmailRecord, EnrichedRecord } from "../../src/pipeline/types.js";

export function createEmail(id: number, overrides: Partial<EmailRecord> = {}): EmailRecord {
  return {
    id,
    sender: `sender${id}@example.com`,
    subject: `Subject ${id}`,
    body: `Body of email ${id}`,
    timestamp: `2025-03-${String((id % 28) + 1).padStart(2, "0")}T09:00:00Z`,
    ...overrides,
  };
}

export function createEmails(count: number): EmailRecord[] {
  return Array.from({ length: count }, (_, i) => createEmail(i + 1));
}

export function createEnriched(
  id: number,
  overrides: Partial<Omit<EnrichedRecord, "status" | "category" | "actions">> & {
    category?: string;
    actions?: EnrichedRecord["actions"];
  } = {}
): EnrichedRecord {
  const { category = "Important", actions = { tasks: [] }, ...rest } = overrides;
  return {
    ...createEmail(id),
    ...rest,
    category,
    actions,
    status: "success",
  };
}

export function createFailed(id: number, cause = "Completion API error 500"): EnrichedRecord {
  return {
    ...createEmail(id),
    category: "Error",
    actions: `Processing failed: ${cause}`,
    status: "error",
  };
}

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "mail-triage-test-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}
