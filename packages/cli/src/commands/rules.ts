import { Command, Option } from "commander";
import chalk from "chalk";
import { RULE_TYPES, ttlLabel } from "@cdn-ledger/core";
import { formatRule } from "../utils/display";
import { parseInteger, showSuccess, showWarning } from "../utils/cli-helpers";
import { withStore } from "../utils/store";

interface RuleOptions {
  ttl: number;
  type: string;
  cacheHeaders: boolean;
}

/**
 * Register the cache rule commands
 */
export function registerRuleCommands(program: Command): void {
  program
    .command("rule")
    .description("Add a cache rule to an origin")
    .argument("<origin_id>", "Origin id", parseInteger)
    .argument("<path_pattern>", "Path pattern, e.g. /static/*")
    .option("--ttl <seconds>", "TTL for matching paths", parseInteger, 3600)
    .addOption(new Option("--type <type>", "Rule type").choices(RULE_TYPES).default("cache"))
    .option("--no-cache-headers", "Do not send cache headers for matching paths")
    .action(
      async (originId: number, pathPattern: string, options: RuleOptions, command: Command) => {
        const rule = await withStore(command, (store) =>
          store.addCacheRule({
            origin_id: originId,
            path_pattern: pathPattern,
            ttl: options.ttl,
            cache_headers: options.cacheHeaders,
            rule_type: options.type,
          })
        );
        showSuccess(`Rule [${rule.id}]: ${rule.path_pattern} → TTL ${ttlLabel(rule.ttl)}`);
      }
    );

  program
    .command("rules")
    .description("List cache rules")
    .argument("[origin_id]", "Only rules of this origin", parseInteger)
    .action(async (originId: number | undefined, _options: object, command: Command) => {
      const rules = await withStore(command, (store) => store.listCacheRules(originId));

      if (rules.length === 0) {
        showWarning("No cache rules.");
        return;
      }

      console.log(`  ${chalk.bold(`Cache Rules (${rules.length})`)}\n`);
      for (const rule of rules) {
        console.log(formatRule(rule));
      }
    });
}
