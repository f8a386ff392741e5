// ABOUTME: Pure display helpers shared by every renderer of ledger data.

export type StatusTone = "healthy" | "alarm" | "warning" | "neutral";

/**
 * Human label for a TTL in seconds: 45 -> "45s", 120 -> "2m",
 * 7200 -> "2h", 172800 -> "2d". Remainders are dropped.
 */
export function ttlLabel(ttl: number): string {
  if (ttl < 60) return `${ttl}s`;
  if (ttl < 3600) return `${Math.floor(ttl / 60)}m`;
  if (ttl < 86400) return `${Math.floor(ttl / 3600)}h`;
  return `${Math.floor(ttl / 86400)}d`;
}

/**
 * Display category for an origin status
 */
export function statusTone(status: string): StatusTone {
  switch (status) {
    case "active":
      return "healthy";
    case "error":
      return "alarm";
    case "paused":
      return "warning";
    default:
      return "neutral";
  }
}

/**
 * First 19 characters of an ISO timestamp, with the T replaced by a space
 */
export function shortTimestamp(iso: string): string {
  return iso.slice(0, 19).replace("T", " ");
}
