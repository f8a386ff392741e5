import { Argument, Command } from "commander";
import chalk from "chalk";
import { KNOWN_PROVIDERS, ORIGIN_STATUSES } from "@cdn-ledger/core";
import { colorStatus, formatOrigin } from "../utils/display";
import { parseInteger, showSuccess, showWarning } from "../utils/cli-helpers";
import { withStore } from "../utils/store";

interface ListOptions {
  provider?: string;
}

interface AddOptions {
  provider: string;
  ttl: number;
  notes: string;
}

/**
 * Register the origin commands: list, add, set-status
 */
export function registerOriginCommands(program: Command): void {
  program
    .command("list")
    .description("List CDN origins")
    .option("--provider <name>", "Only origins of this provider")
    .action(async (options: ListOptions, command: Command) => {
      const origins = await withStore(command, (store) => store.listOrigins(options.provider));

      if (origins.length === 0) {
        showWarning("No origins registered.");
        return;
      }

      console.log(`  ${chalk.bold(`CDN Origins (${origins.length})`)}\n`);
      for (const origin of origins) {
        console.log(formatOrigin(origin).join("\n"));
        console.log("");
      }
    });

  program
    .command("add")
    .description("Register a CDN origin")
    .argument("<name>", "Unique origin name")
    .argument("<origin_url>", "Backend URL")
    .argument("<cdn_url>", "Public CDN URL")
    .option("--provider <name>", `CDN provider (${KNOWN_PROVIDERS.join(", ")})`, "cloudflare")
    .option("--ttl <seconds>", "Default cache TTL", parseInteger, 3600)
    .option("--notes <text>", "Free-form notes", "")
    .action(
      async (name: string, originUrl: string, cdnUrl: string, options: AddOptions, command: Command) => {
        const origin = await withStore(command, (store) =>
          store.addOrigin({
            name,
            origin_url: originUrl,
            cdn_url: cdnUrl,
            provider: options.provider,
            cache_ttl: options.ttl,
            notes: options.notes,
          })
        );
        showSuccess(`Origin registered: [${origin.id}] ${origin.name}`);
      }
    );

  program
    .command("set-status")
    .description("Change an origin's status")
    .argument("<origin_id>", "Origin id", parseInteger)
    .addArgument(new Argument("<status>", "New status").choices(ORIGIN_STATUSES))
    .action(async (originId: number, status: string, _options: object, command: Command) => {
      const origin = await withStore(command, (store) => store.setOriginStatus(originId, status));
      showSuccess(`Origin [${origin.id}] ${origin.name} is now ${colorStatus(origin.status)}`);
    });
}
