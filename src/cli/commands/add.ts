import { z } from "zod";
import type { Command } from "commander";
import { loadConfig } from "../../infrastructure/config/load";
import { createQaRuntime } from "../../application/runtime";
import { createLogger } from "../logging";
import { ExitCode } from "../exit-codes";
import { reportError, verbosity } from "./shared";

export function registerAddCommand(program: Command): void {
  program
    .command("add")
    .description("Store a question/answer pair unless the question already exists")
    .requiredOption("--question <text>", "Question text")
    .requiredOption("--answer <text>", "Answer text")
    .option("--source <tag>", "Provenance tag", "manual")
    .option("--config <path>", "Path to YAML/JSON config file")
    .option("--verbose", "Verbose logs")
    .option("--debug", "Debug logs (includes stack traces)")
    .action(async (opts) => {
      const parsed = z
        .object({
          question: z.string().min(1),
          answer: z.string().min(1),
          source: z.string().min(1).default("manual"),
          config: z.string().optional(),
          verbose: z.boolean().optional(),
          debug: z.boolean().optional(),
        })
        .safeParse(opts);
      if (!parsed.success) {
        console.error(parsed.error.issues.map((i) => i.message).join("\n"));
        process.exit(ExitCode.usage);
      }
      const args = parsed.data;

      try {
        const config = await loadConfig({
          configPath: args.config,
          overrides: { logLevel: verbosity(args) },
        });
        const logger = createLogger(config);
        const { store, ingest } = await createQaRuntime(config, logger);
        if (!store.isAvailable) {
          console.error("Question store is unavailable");
          process.exit(ExitCode.failure);
        }

        const outcome = await ingest.add({
          question: args.question,
          answer: args.answer,
          source: args.source,
        });
        if (outcome.status === "added") {
          process.stdout.write(`Added ${outcome.record.id}\n`);
          process.exit(ExitCode.success);
        }
        if (outcome.status === "duplicate") {
          console.error(`Question already stored: "${outcome.questionNormalized}"`);
          process.exit(ExitCode.failure);
        }
        console.error(`Invalid question/answer: ${outcome.reason}`);
        process.exit(ExitCode.usage);
      } catch (error) {
        reportError(error, args.debug);
        process.exit(ExitCode.failure);
      }
    });
}
