import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { ResultStore } from "../../../src/stores/result-store.js";
import { createEnriched, createFailed, makeTempDir } from "../../helpers/fixtures.js";
import { createMockLogger } from "../../helpers/mocks.js";

describe("ResultStore", () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let path: string;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
    path = join(dir, "data", "processed.json");
  });

  afterEach(async () => {
    await cleanup();
  });

  it("loads an empty batch when the file is missing", async () => {
    const store = new ResultStore(path, createMockLogger());
    await expect(store.load()).resolves.toEqual([]);
  });

  it("loads an empty batch from an empty file", async () => {
    await mkdir(join(dir, "data"), { recursive: true });
    await writeFile(path, "  \n");
    const store = new ResultStore(path, createMockLogger());

    await expect(store.load()).resolves.toEqual([]);
  });

  it("treats invalid JSON as no data and warns", async () => {
    await mkdir(join(dir, "data"), { recursive: true });
    await writeFile(path, "[{not json");
    const logger = createMockLogger();
    const store = new ResultStore(path, logger);

    await expect(store.load()).resolves.toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ path }),
      "Ignoring unreadable store file"
    );
  });

  it("treats structurally invalid records as no data", async () => {
    await mkdir(join(dir, "data"), { recursive: true });
    await writeFile(path, JSON.stringify([{ id: 1, subject: "missing fields" }]));
    const store = new ResultStore(path, createMockLogger());

    await expect(store.load()).resolves.toEqual([]);
  });

  it("round-trips structured, raw and error records", async () => {
    const batch = [
      createEnriched(1, {
        category: "To-Do",
        actions: { tasks: [{ task: "Send report", deadline: null }] },
      }),
      createEnriched(2, { category: "Newsletter", actions: "Nothing to do here" }),
      createFailed(3),
      createEnriched(4, { id: 4, subject: "Ünïcode ✓", actions: [{ task: "x", deadline: "2025-04-01" }] }),
    ];
    const store = new ResultStore(path, createMockLogger());

    await store.save(batch);
    const loaded = await store.load();

    expect(loaded).toEqual(batch);
    await store.save(loaded);
    await expect(store.load()).resolves.toEqual(batch);
  });

  it("writes pretty JSON and fully replaces earlier content", async () => {
    const store = new ResultStore(path, createMockLogger());
    await store.save([createEnriched(1), createEnriched(2)]);
    await store.save([createEnriched(3)]);

    const content = await readFile(path, "utf-8");
    expect(content.startsWith('[\n  {\n    "id": 3,')).toBe(true);
    expect(content.endsWith("]\n")).toBe(true);
    expect(JSON.parse(content)).toEqual([createEnriched(3)]);
  });
});
