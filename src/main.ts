#!/usr/bin/env node
/**
 * Usage:
 *   mail-triage process              categorize the inbox and extract actions
 *   mail-triage stats                print aggregates of the stored batch
 *   mail-triage ask <id> <question>  ask a question about one email
 *   mail-triage draft <id>           generate and save a reply draft
 *   mail-triage reset-prompts        restore the default prompt templates
 */
import { loadConfig, requireApiKey } from "./utils/config.js";
import { createLogger } from "./utils/logger.js";
import { withContext } from "./core/correlation.js";
import { generateRunId } from "./utils/id.js";
import { createServices } from "./app.js";
import {
  askAboutEmail,
  batchReport,
  draftReply,
  processInbox,
  watchBatchProgress,
} from "./cli/commands.js";
import { formatUserFacingError } from "./interfaces/user-facing-error.js";

const logger = createLogger();

const COMPLETION_COMMANDS = new Set(["process", "ask", "draft"]);

async function main(argv: string[]): Promise<number> {
  const [command = "process", ...args] = argv;
  const config = loadConfig();
  if (COMPLETION_COMMANDS.has(command)) requireApiKey(config);
  const services = createServices(config, logger);

  return withContext({ runId: generateRunId(), command }, async () => {
    switch (command) {
      case "process": {
        const controller = new AbortController();
        process.once("SIGINT", () => {
          logger.warn("Interrupted, finishing emails already in flight");
          controller.abort();
        });
        watchBatchProgress(services.eventBus, (line) => process.stderr.write(`${line}\n`));
        const results = await processInbox(services, { signal: controller.signal });
        printJson({ processed: results.length, file: services.results.path });
        return 0;
      }
      case "stats":
        printJson(await batchReport(services));
        return 0;
      case "ask": {
        const [emailId, ...question] = args;
        if (!emailId || question.length === 0) return usage();
        process.stdout.write(`${await askAboutEmail(services, emailId, question.join(" "))}\n`);
        return 0;
      }
      case "draft": {
        const [emailId] = args;
        if (!emailId) return usage();
        printJson(await draftReply(services, emailId));
        return 0;
      }
      case "reset-prompts":
        printJson(await services.prompts.reset());
        return 0;
      default:
        return usage();
    }
  });
}

function usage(): number {
  process.stderr.write("Usage: mail-triage <process|stats|ask <id> <question>|draft <id>|reset-prompts>\n");
  return 2;
}

function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.fatal({ error: err }, "Command failed");
    process.stderr.write(`${formatUserFacingError(err)}\n`);
    process.exitCode = 1;
  });
