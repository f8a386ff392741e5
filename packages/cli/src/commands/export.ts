import { Command } from "commander";
import { DEFAULT_EXPORT_PATH, writeExport } from "../utils/export-writer";
import { createSpinner } from "../utils/cli-helpers";
import { withStore } from "../utils/store";

/**
 * Register the export command
 */
export function registerExportCommand(program: Command): void {
  program
    .command("export")
    .description("Export configuration to JSON")
    .option("--output <path>", "File to write", DEFAULT_EXPORT_PATH)
    .action(async (options: { output: string }, command: Command) => {
      const spinner = createSpinner("Exporting configuration...").start();
      try {
        const written = await withStore(command, (store) => writeExport(options.output, store.exportAll()));
        spinner.succeed(`Exported to: ${written}`);
      } catch (err) {
        spinner.fail("Export failed");
        throw err;
      }
    });
}
