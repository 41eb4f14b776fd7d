import { createProgram } from "./program";
import { ExitCode } from "./exit-codes";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(ExitCode.failure);
  });
