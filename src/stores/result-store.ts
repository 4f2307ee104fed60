import { JsonFileStore } from "./json-file-store.js";
import { enrichedListSchema } from "./schemas.js";
import type { EnrichedRecord } from "../pipeline/types.js";
import type { Logger } from "../utils/logger.js";

/** Where a finished batch goes. */
export interface BatchSink {
  save(batch: EnrichedRecord[]): Promise<void>;
}

/** The enriched batch, persisted as one ordered JSON array. */
export class ResultStore implements BatchSink {
  private file: JsonFileStore<EnrichedRecord[]>;

  constructor(path: string, logger: Logger) {
    this.file = new JsonFileStore(path, enrichedListSchema, () => [], logger);
  }

  get path(): string {
    return this.file.path;
  }

  async load(): Promise<EnrichedRecord[]> {
    return this.file.read();
  }

  async save(batch: EnrichedRecord[]): Promise<void> {
    await this.file.write(batch);
  }
}
