import { Argument, Command, Option } from "commander";
import chalk from "chalk";
import { PURGE_STATUSES, PURGE_TYPES } from "@cdn-ledger/core";
import { formatPurgeEvent } from "../utils/display";
import { parseInteger, showSuccess, showWarning } from "../utils/cli-helpers";
import { withStore } from "../utils/store";

interface PurgeOptions {
  type: string;
  target: string;
  by: string;
}

interface PurgesOptions {
  origin?: number;
  limit: number;
}

/**
 * Register the purge commands: purge, purges, purge-status
 */
export function registerPurgeCommands(program: Command): void {
  program
    .command("purge")
    .description("Queue a cache purge for an origin")
    .argument("<origin_id>", "Origin id", parseInteger)
    .addOption(new Option("--type <type>", "Purge type").choices(PURGE_TYPES).default("full"))
    .option("--target <target>", "Path pattern or tag to purge", "*")
    .option("--by <actor>", "Who triggered the purge", "cli")
    .action(async (originId: number, options: PurgeOptions, command: Command) => {
      const event = await withStore(command, (store) =>
        store.purgeCache({
          origin_id: originId,
          purge_type: options.type,
          target: options.target,
          triggered_by: options.by,
        })
      );
      showSuccess(`Purge queued (event #${event.id})`);
      console.log(
        chalk.yellow(`  Origin #${event.origin_id}  type=${event.purge_type}  target=${event.target}`)
      );
    });

  program
    .command("purges")
    .description("List recent purge events")
    .option("--origin <origin_id>", "Only events of this origin", parseInteger)
    .option("--limit <count>", "How many events to show", parseInteger, 20)
    .action(async (options: PurgesOptions, command: Command) => {
      const events = await withStore(command, (store) =>
        store.listPurgeEvents({ originId: options.origin, limit: options.limit })
      );

      if (events.length === 0) {
        showWarning("No purge events recorded.");
        return;
      }

      console.log(`  ${chalk.bold(`Purge Events (${events.length})`)}\n`);
      for (const event of events) {
        console.log(formatPurgeEvent(event));
      }
    });

  program
    .command("purge-status")
    .description("Mark a queued purge as complete or failed")
    .argument("<event_id>", "Purge event id", parseInteger)
    .addArgument(new Argument("<status>", "New status").choices(PURGE_STATUSES))
    .action(async (eventId: number, status: string, _options: object, command: Command) => {
      const event = await withStore(command, (store) => store.setPurgeStatus(eventId, status));
      showSuccess(`Purge #${event.id} is now ${event.status}`);
    });
}
