/**
 * Trading behaviour summary
 *
 * Condenses raw platform activity into the counts the classifier looks at.
 */

import type { PlatformActivity, TradingBehavior } from "../api/chain/types";

const SECONDS_PER_DAY = 86_400;

/**
 * Unix seconds from a numeric or ISO-8601 timestamp; null when unparseable.
 * Numbers above 1e10 are taken as milliseconds.
 */
export function parseActivityTimestamp(value: number | string | null | undefined): number | null {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value <= 0) return null;
    return value > 10_000_000_000 ? Math.floor(value / 1000) : Math.floor(value);
  }
  if (typeof value === "string" && value.length > 0) {
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? null : Math.floor(ms / 1000);
  }
  return null;
}

/**
 * Summarize activity records as of `now` (unix seconds).
 * Returns null when there is no activity.
 */
export function summarizeActivity(
  activity: readonly PlatformActivity[],
  now: number = Math.floor(Date.now() / 1000)
): TradingBehavior | null {
  if (activity.length === 0) {
    return null;
  }

  const markets = new Set<string>();
  const outcomes = new Set<string>();
  let firstTradeAt: number | null = null;
  let lastTradeAt: number | null = null;

  for (const record of activity) {
    if (record.conditionId) markets.add(record.conditionId);
    if (record.outcome) outcomes.add(record.outcome);

    const ts = parseActivityTimestamp(record.timestamp);
    if (ts === null) continue;
    firstTradeAt = firstTradeAt === null ? ts : Math.min(firstTradeAt, ts);
    lastTradeAt = lastTradeAt === null ? ts : Math.max(lastTradeAt, ts);
  }

  return {
    totalTrades: activity.length,
    marketsTraded: markets.size,
    uniqueOutcomes: outcomes.size,
    firstTradeAt,
    lastTradeAt,
    accountAgeDays: firstTradeAt === null ? null : Math.floor((now - firstTradeAt) / SECONDS_PER_DAY),
  };
}
