/**
 * Whole-file JSON persistence for small collections.
 *
 * Reads never throw: a missing, empty or malformed file yields the fallback.
 * Writes replace the file through a temporary sibling and a rename.
 */
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { z } from "zod";
import { MalformedStoreError, errorMessage } from "../core/errors.js";
import type { Logger } from "../utils/logger.js";

export type StoreReadResult<T> =
  | { kind: "missing" }
  | { kind: "empty" }
  | { kind: "ok"; value: T }
  | { kind: "malformed"; error: MalformedStoreError };

export class JsonFileStore<T> {
  constructor(
    readonly path: string,
    private schema: z.ZodType<T>,
    private fallback: () => T,
    private logger: Logger
  ) {}

  async read(): Promise<T> {
    const result = await this.readDetailed();

    switch (result.kind) {
      case "ok":
        return result.value;
      case "malformed":
        this.logger.warn(
          { path: this.path, error: result.error.message },
          "Ignoring unreadable store file"
        );
        return this.fallback();
      case "missing":
      case "empty":
        return this.fallback();
    }
  }

  async readDetailed(): Promise<StoreReadResult<T>> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return { kind: "missing" };
      return { kind: "malformed", error: new MalformedStoreError(this.path, errorMessage(err)) };
    }

    if (content.trim() === "") return { kind: "empty" };

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      return { kind: "malformed", error: new MalformedStoreError(this.path, errorMessage(err)) };
    }

    const validated = this.schema.safeParse(parsed);
    if (!validated.success) {
      const issue = validated.error.issues[0];
      const reason = issue
        ? `${issue.path.join(".") || "<root>"}: ${issue.message}`
        : "schema validation failed";
      return { kind: "malformed", error: new MalformedStoreError(this.path, reason) };
    }

    return { kind: "ok", value: validated.data };
  }

  async write(value: T): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.${process.pid}.${Date.now()}.tmp`;
    await writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, "utf-8");
    await rename(tmpPath, this.path);
    this.logger.debug({ path: this.path }, "Store file written");
  }
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
