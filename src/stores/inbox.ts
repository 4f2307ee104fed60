import { JsonFileStore } from "./json-file-store.js";
import { emailListSchema } from "./schemas.js";
import type { EmailRecord } from "../pipeline/types.js";
import type { Logger } from "../utils/logger.js";

/**
 * Read the inbox file. A missing or malformed inbox is an empty inbox;
 * deciding what to do about that is up to the caller.
 */
export async function loadInbox(path: string, logger: Logger): Promise<EmailRecord[]> {
  const file = new JsonFileStore(path, emailListSchema, () => [], logger);
  return file.read();
}
