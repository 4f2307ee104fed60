import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { CompletionClient } from "../../src/core/llm/completion-client.js";
import { BatchRunner } from "../../src/pipeline/batch-runner.js";
import { ResultStore } from "../../src/stores/result-store.js";
import { DEFAULT_PROMPTS } from "../../src/stores/prompt-store.js";
import { scorePriority } from "../../src/pipeline/priority.js";
import { createEmail, makeTempDir } from "../helpers/fixtures.js";
import {
  completionBody,
  createFakeFetch,
  createMockLogger,
  createRespondingFetch,
  type FakeReply,
} from "../helpers/mocks.js";

describe("batch pipeline over the completion API", () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  function setup(replies: FakeReply[]) {
    const logger = createMockLogger();
    const fetch = createFakeFetch(replies);
    const completion = new CompletionClient(
      {
        apiKey: "test-key",
        baseURL: "https://completion.test/v1",
        model: "test-model",
        maxTokens: 300,
        timeoutMs: 1_000,
        retryDelays: { rateLimitMs: 1, timeoutMs: 1 },
        fetch,
      },
      logger
    );
    const store = new ResultStore(join(dir, "processed.json"), logger);
    const runner = new BatchRunner(
      { completion, sink: store, logger },
      { maxWorkers: 1, pacingDelayMs: 0 }
    );
    return { fetch, store, runner };
  }

  it("recovers from a 429, records a 500 as an error and persists the batch", async () => {
    const { fetch, store, runner } = setup([
      { status: 429, body: { error: { message: "Rate limit exceeded" } } },
      { status: 200, body: completionBody("To-Do update\nIt asks for a report") },
      {
        status: 200,
        body: completionBody(
          '```json\n{"tasks": [{"task": "Write report", "deadline": "Friday"}, {"task": "Submit report", "deadline": "Friday"}]}\n```'
        ),
      },
      { status: 500, body: { error: { message: "upstream exploded" } } },
    ]);
    const emails = [
      createEmail(1, { subject: "Please submit report by Friday", body: "Thanks" }),
      createEmail(2, { subject: "Lunch?", body: "Are you free" }),
    ];

    const results = await runner.run(emails, DEFAULT_PROMPTS);

    expect(fetch).toHaveBeenCalledTimes(4);
    expect(results[0]).toMatchObject({
      id: 1,
      status: "success",
      category: "To-Do update",
      actions: {
        tasks: [
          { task: "Write report", deadline: "Friday" },
          { task: "Submit report", deadline: "Friday" },
        ],
      },
    });
    expect(results[1]).toMatchObject({ id: 2, status: "error", category: "Error" });
    expect(results[1]?.actions).toContain("500");
    expect(scorePriority(results[0] ?? {})).toEqual({ score: 7, label: "HIGH" });

    const persisted: unknown = JSON.parse(await readFile(join(dir, "processed.json"), "utf-8"));
    expect(persisted).toEqual(results);
    await expect(store.load()).resolves.toEqual(results);
  });

  it("processes a batch of 24 with five workers into 24 ordered records", async () => {
    const logger = createMockLogger();
    // Workers interleave, so answer by prompt kind rather than by call order.
    const fetch = createRespondingFetch((body) => ({
      status: 200,
      body: completionBody(body.includes("Respond ONLY with valid JSON") ? '{"tasks": []}' : "Important"),
    }));
    const completion = new CompletionClient(
      { apiKey: "test-key", baseURL: "https://completion.test/v1", model: "test-model", fetch },
      logger
    );
    const store = new ResultStore(join(dir, "processed.json"), logger);
    const runner = new BatchRunner({ completion, sink: store, logger }, { maxWorkers: 5, pacingDelayMs: 0 });
    const emails = Array.from({ length: 24 }, (_, i) => createEmail(24 - i));

    const results = await runner.run(emails, DEFAULT_PROMPTS);

    expect(results.map((r) => r.id)).toEqual(Array.from({ length: 24 }, (_, i) => i + 1));
    expect(results.every((r) => r.status === "success" && r.category === "Important")).toBe(true);
    expect(fetch).toHaveBeenCalledTimes(48);
    await expect(store.load()).resolves.toEqual(results);
  });
});
