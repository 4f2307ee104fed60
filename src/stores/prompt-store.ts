import { JsonFileStore } from "./json-file-store.js";
import { PromptFileSchema } from "./schemas.js";
import type { PromptSet } from "../pipeline/types.js";
import type { Logger } from "../utils/logger.js";

export const DEFAULT_PROMPTS: Readonly<PromptSet> = Object.freeze({
  categorization_prompt:
    "You are an email categorization assistant. " +
    "Categorize this email into one of these categories: Important, Newsletter, Spam, To-Do. " +
    "To-Do emails must include a direct request requiring user action. " +
    "Reply ONLY with the category name.",
  action_item_prompt:
    "Extract all action items and deadlines from this email. Respond in JSON as a list under 'tasks': " +
    '[{"task": "...", "deadline": "..."}]. If there is no explicit deadline, set "deadline": null.',
  auto_reply_prompt:
    "You write polite, concise professional replies. Draft a reply to this email based on the user's tone: " +
    "friendly but professional. If it is a meeting request, ask for an agenda and confirm time. " +
    "Respond with Subject and Body in a clearly marked format.",
});

type PromptFile = Partial<PromptSet>;

/**
 * Prompt templates with file-backed overrides. `load()` always returns a
 * complete, frozen snapshot; keys missing from the file come from the defaults.
 */
export class PromptStore {
  private file: JsonFileStore<PromptFile>;

  constructor(path: string, logger: Logger) {
    this.file = new JsonFileStore<PromptFile>(path, PromptFileSchema, () => ({}), logger);
  }

  async load(): Promise<Readonly<PromptSet>> {
    const stored = await this.file.read();
    return Object.freeze({
      categorization_prompt: stored.categorization_prompt ?? DEFAULT_PROMPTS.categorization_prompt,
      action_item_prompt: stored.action_item_prompt ?? DEFAULT_PROMPTS.action_item_prompt,
      auto_reply_prompt: stored.auto_reply_prompt ?? DEFAULT_PROMPTS.auto_reply_prompt,
    });
  }

  async save(prompts: PromptSet): Promise<void> {
    await this.file.write({
      categorization_prompt: prompts.categorization_prompt,
      action_item_prompt: prompts.action_item_prompt,
      auto_reply_prompt: prompts.auto_reply_prompt,
    });
  }

  async reset(): Promise<Readonly<PromptSet>> {
    await this.save(DEFAULT_PROMPTS);
    return DEFAULT_PROMPTS;
  }
}
