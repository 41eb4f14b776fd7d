import { z } from "zod";
import type { Command } from "commander";
import { loadConfig } from "../../infrastructure/config/load";
import { createQaRuntime } from "../../application/runtime";
import { createLogger } from "../logging";
import { ExitCode, exitCodeForAnswer } from "../exit-codes";
import { reportError, verbosity } from "./shared";

const MESSAGES = {
  not_found: "No matching answer found.",
  too_short: "Question is too short.",
  store_unavailable: "Answer store is unavailable, try again later.",
} as const;

export function registerAskCommand(program: Command): void {
  program
    .command("ask")
    .description("Look up the stored answer for a question (exact, then fuzzy)")
    .requiredOption("-q, --question <text>", "Question text (raw or OCR output)")
    .option("--json", "Print the full result as JSON")
    .option("--config <path>", "Path to YAML/JSON config file")
    .option("--verbose", "Verbose logs")
    .option("--debug", "Debug logs (includes stack traces)")
    .action(async (opts) => {
      const parsed = z
        .object({
          question: z.string().min(1),
          json: z.boolean().optional(),
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
        const { matcher } = await createQaRuntime(config, logger);

        const result = await matcher.findAnswer(args.question);
        if (args.json) {
          process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
        } else if (result.status === "found") {
          logger.info(`stage=${result.stage} score=${result.score.toFixed(3)}`);
          process.stdout.write(`${result.answer}\n`);
        } else {
          console.error(MESSAGES[result.status]);
        }
        process.exit(exitCodeForAnswer(result.status));
      } catch (error) {
        reportError(error, args.debug);
        process.exit(ExitCode.failure);
      }
    });
}
