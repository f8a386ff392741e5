// ABOUTME: CLI command registration for the ledger tool.

import { Command } from "commander";
import { registerOriginCommands } from "./origins";
import { registerRuleCommands } from "./rules";
import { registerPurgeCommands } from "./purges";
import { registerStatusCommand } from "./status";
import { registerExportCommand } from "./export";

/**
 * Register CLI commands.
 *
 * - list/add/set-status: origins
 * - rule/rules: cache rules
 * - purge/purges/purge-status: purge events
 * - status: fleet summary
 * - export: JSON snapshot
 */
export function registerCommands(program: Command): void {
  registerOriginCommands(program);
  registerRuleCommands(program);
  registerPurgeCommands(program);
  registerStatusCommand(program);
  registerExportCommand(program);
}
