import { JsonFileStore } from "./json-file-store.js";
import { draftListSchema } from "./schemas.js";
import type { DraftRecord } from "../pipeline/types.js";
import type { Logger } from "../utils/logger.js";

/** Append-only collection of saved reply drafts. */
export class DraftStore {
  private file: JsonFileStore<DraftRecord[]>;

  constructor(path: string, logger: Logger) {
    this.file = new JsonFileStore(path, draftListSchema, () => [], logger);
  }

  async load(): Promise<DraftRecord[]> {
    return this.file.read();
  }

  async save(drafts: DraftRecord[]): Promise<void> {
    await this.file.write(drafts);
  }

  async append(draft: DraftRecord): Promise<DraftRecord[]> {
    const drafts = await this.load();
    drafts.push(draft);
    await this.save(drafts);
    return drafts;
  }
}
