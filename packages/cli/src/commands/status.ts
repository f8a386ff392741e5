import { Command } from "commander";
import { formatStatus } from "../utils/display";
import { withStore } from "../utils/store";

/**
 * Register the status command
 */
export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show CDN fleet summary")
    .action(async (_options: object, command: Command) => {
      const summary = await withStore(command, (store) => store.cdnStatus());
      console.log(formatStatus(summary).join("\n"));
    });
}
