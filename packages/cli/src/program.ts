import { Command } from "commander";
import { parseLogLevel, setLogLevel } from "@cdn-ledger/core";
import { registerCommands } from "./commands";
import type { GlobalOptions } from "./utils/store";

/**
 * Build the commander program with every command registered
 */
export function createProgram(): Command {
  const program: Command = new Command();

  program
    .name("cdn-ledger")
    .description("CDN Ledger - origins, cache rules and purge events")
    .version("0.1.0")
    .option("--data-dir <dir>", "Directory holding the ledger database (env CDN_LEDGER_DATA_DIR)")
    .option(
      "-l, --log-level <level>",
      "Set logging level (0=none, 1=error, 2=warn, 3=info, 4=debug)"
    );

  program.hook("preAction", (thisCommand) => {
    const { logLevel } = thisCommand.opts<GlobalOptions>();
    if (logLevel === undefined) {
      return;
    }
    const level = parseLogLevel(logLevel);
    if (level === null) {
      program.error(`Invalid log level: ${logLevel}. Must be 0 (none), 1 (error), 2 (warn), 3 (info), or 4 (debug)`);
    }
    setLogLevel(level);
  });

  registerCommands(program);

  return program;
}
