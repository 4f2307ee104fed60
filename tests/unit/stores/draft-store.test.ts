import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { DraftStore } from "../../../src/stores/draft-store.js";
import type { DraftRecord } from "../../../src/pipeline/types.js";
import { makeTempDir } from "../../helpers/fixtures.js";
import { createMockLogger } from "../../helpers/mocks.js";

function createDraft(emailId: number, overrides: Partial<DraftRecord> = {}): DraftRecord {
  return {
    email_id: emailId,
    original_subject: `Subject ${emailId}`,
    draft_subject: `Re: Subject ${emailId}`,
    draft_body: "Thanks, will do.\nFollowups:\n- Send agenda",
    suggested_followups: ["Send agenda"],
    metadata: { category: "To-Do", actions: { tasks: [{ task: "Send agenda", deadline: null }] } },
    ...overrides,
  };
}

describe("DraftStore", () => {
  let path: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    const tmp = await makeTempDir();
    cleanup = tmp.cleanup;
    path = join(tmp.dir, "drafts.json");
  });

  afterEach(async () => {
    await cleanup();
  });

  it("loads nothing when the file is missing or corrupt", async () => {
    const store = new DraftStore(path, createMockLogger());
    await expect(store.load()).resolves.toEqual([]);

    await writeFile(path, "not json at all");
    await expect(store.load()).resolves.toEqual([]);
  });

  it("appends drafts in order", async () => {
    const store = new DraftStore(path, createMockLogger());

    await store.append(createDraft(1));
    await store.append(createDraft(2, { metadata: {} }));

    await expect(store.load()).resolves.toEqual([createDraft(1), createDraft(2, { metadata: {} })]);
  });

  it("round-trips every field", async () => {
    const store = new DraftStore(path, createMockLogger());
    const drafts = [createDraft(1), createDraft(5, { suggested_followups: [] })];

    await store.save(drafts);
    const loaded = await store.load();
    await store.save(loaded);

    await expect(store.load()).resolves.toEqual(drafts);
  });
});
