// ABOUTME: Terminal rendering of ledger records. Every function returns lines;
// ABOUTME: callers decide where they go.

import chalk, { type ChalkInstance } from "chalk";
import {
  shortTimestamp,
  statusTone,
  ttlLabel,
  type CacheRule,
  type Origin,
  type PurgeEvent,
  type StatusSummary,
  type StatusTone,
} from "@cdn-ledger/core";

const TONE_COLORS: Record<StatusTone, ChalkInstance> = {
  healthy: chalk.green,
  alarm: chalk.red,
  warning: chalk.yellow,
  neutral: chalk.reset,
};

export function colorStatus(status: string): string {
  return TONE_COLORS[statusTone(status)](status);
}

export function formatOrigin(origin: Origin): string[] {
  const lines = [
    `  ${chalk.bold(`[${String(origin.id).padStart(3)}]`)} ${chalk.cyan(origin.name)}  ${chalk.blue(`(${origin.provider})`)}`,
    `        Status : ${colorStatus(origin.status)}   TTL: ${ttlLabel(origin.cache_ttl)}`,
    `        Origin : ${origin.origin_url}`,
    `        CDN    : ${origin.cdn_url}`,
  ];
  if (origin.last_purge) {
    lines.push(`        Purged : ${chalk.yellow(shortTimestamp(origin.last_purge))}`);
  }
  if (origin.notes) {
    lines.push(`        Notes  : ${origin.notes}`);
  }
  return lines;
}

export function formatRule(rule: CacheRule): string {
  const headers = rule.cache_headers ? "" : chalk.dim("  (no cache headers)");
  return `  ${chalk.bold(`[${String(rule.id).padStart(3)}]`)} origin #${rule.origin_id}  ${chalk.cyan(rule.path_pattern)}  ${rule.rule_type}  TTL ${ttlLabel(rule.ttl)}${headers}`;
}

export function formatPurgeEvent(event: PurgeEvent): string {
  return `  ${chalk.bold(`#${event.id}`)} ${shortTimestamp(event.created_at)}  origin #${event.origin_id}  ${event.purge_type} ${event.target}  ${event.status}  by ${event.triggered_by}`;
}

function row(label: string, value: string): string {
  return `  ${label.padEnd(22)}  ${value}`;
}

/**
 * Fleet summary with provider and status breakdowns sorted by key
 */
export function formatStatus(summary: StatusSummary): string[] {
  const lines = [
    `  ${chalk.bold("CDN Fleet Status")}`,
    row("Origins", chalk.cyan(String(summary.total_origins))),
    row("Cache Rules", String(summary.total_rules)),
    row("Total Purges", String(summary.total_purges)),
    row("Purges (24 h)", chalk.yellow(String(summary.purges_24h))),
  ];

  const providers = Object.entries(summary.by_provider).sort(([a], [b]) => a.localeCompare(b));
  if (providers.length > 0) {
    lines.push("", `  ${chalk.bold("By Provider:")}`);
    for (const [provider, count] of providers) {
      lines.push(`    ${chalk.cyan(provider.padEnd(20))} ${count}`);
    }
  }

  const statuses = Object.entries(summary.by_status).sort(([a], [b]) => a.localeCompare(b));
  if (statuses.length > 0) {
    lines.push("", `  ${chalk.bold("By Status:")}`);
    for (const [status, count] of statuses) {
      lines.push(`    ${TONE_COLORS[statusTone(status)](status.padEnd(20))} ${count}`);
    }
  }

  return lines;
}
