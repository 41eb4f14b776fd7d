import { z } from "zod";
import type { Command } from "commander";
import { loadConfig } from "../../infrastructure/config/load";
import { QaFileLoader } from "../../infrastructure/loaders/qa-file-loader";
import { createQaRuntime } from "../../application/runtime";
import { createLogger } from "../logging";
import { ExitCode } from "../exit-codes";
import { reportError, verbosity } from "./shared";

export function registerImportCommand(program: Command): void {
  program
    .command("import")
    .description("Bulk import question/answer pairs (JSON, YAML, Markdown or Q/A text)")
    .requiredOption("-f, --file <path...>", "Import file (repeatable)")
    .option("--format <json|yaml|markdown|text>", "Override format detection")
    .option("--source <tag>", "Provenance tag for pairs without one")
    .option("--config <path>", "Path to YAML/JSON config file")
    .option("--verbose", "Verbose logs")
    .option("--debug", "Debug logs (includes stack traces)")
    .action(async (opts) => {
      const parsed = z
        .object({
          file: z.array(z.string().min(1)).min(1),
          format: z.enum(["json", "yaml", "markdown", "text"]).optional(),
          source: z.string().min(1).optional(),
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

        const totals = { added: 0, duplicates: 0, invalid: 0 };
        for (const file of args.file) {
          const docs = await new QaFileLoader(file, {
            format: args.format,
            source: args.source,
          }).load();
          const stats = await ingest.importPairs(
            docs.map((d) => ({
              question: d.pageContent,
              answer: d.metadata.answer,
              source: d.metadata.source,
            })),
          );
          totals.added += stats.added;
          totals.duplicates += stats.duplicates;
          totals.invalid += stats.invalid;
        }

        process.stdout.write(
          `Imported: added=${totals.added} duplicates=${totals.duplicates} invalid=${totals.invalid}\n`,
        );
        process.exit(ExitCode.success);
      } catch (error) {
        reportError(error, args.debug);
        process.exit(ExitCode.failure);
      }
    });
}
