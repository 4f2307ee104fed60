import { formatEmailBlock } from "../utils/text.js";
import type { CompletionService } from "../core/llm/completion-client.js";
import type { EmailRecord, PromptSet } from "../pipeline/types.js";

/** Single-email operations that call the completion service directly, outside the batch path. */
export class EmailAssistant {
  constructor(private completion: CompletionService) {}

  async ask(question: string, email: EmailRecord): Promise<string> {
    const prompt = `You are an email assistant.

Email:
${formatEmailBlock(email)}

User question:
${question}

Give a short, clear answer.`;

    return this.completion.complete(prompt, { maxTokens: null });
  }

  async draftReply(email: EmailRecord, prompts: Pick<PromptSet, "auto_reply_prompt">): Promise<string> {
    const prompt = `${prompts.auto_reply_prompt}

Original Email:
${formatEmailBlock(email)}

Generate the reply now:`;

    return this.completion.complete(prompt, { maxTokens: null });
  }
}
