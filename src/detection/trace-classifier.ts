/**
 * Classification Engine
 *
 * Pure functions over an aggregated trace: a fixed, ordered battery of
 * signal checks (at most one string each) and an ordered decision list
 * where the first matching rule wins.
 */

import { formatUsd, parseAmount, percentOf, sumAmounts } from "../api/chain/amounts";
import type { ClassificationKind, TraceResult } from "../api/chain/types";

// ============================================================================
// Thresholds
// ============================================================================

export const CLASSIFIER_THRESHOLDS = {
  veryFreshAccountDays: 7,
  newAccountDays: 30,
  highSiblingCount: 5,
  mediumSiblingCount: 2,
  concentratedMarkets: 3,
  highActivityTrades: 100,
  lowActivityTrades: 10,
  largePortfolioUsd: 50_000,
  highWinRate: 70,
  lowWinRate: 30,
  minTradesForWinRate: 10,
  whaleFunding: parseAmount("100000"),
  largeFunding: parseAmount("50000"),
  significantFunding: parseAmount("10000"),
  multipleWalletSources: 3,

  coordinatedLinkedAccounts: 3,
  sophisticatedMinFunding: parseAmount("10000"),
  freshAccountDays: 14,
  freshLargeMinFunding: parseAmount("5000"),
  singleBetMaxTrades: 10,
  singleBetMinFunding: parseAmount("2000"),
  diversifiedMarkets: 5,
} as const;

const T = CLASSIFIER_THRESHOLDS;

// ============================================================================
// Derived figures
// ============================================================================

/**
 * The parts of a trace the classifier reads
 */
export type ClassifierInput = Pick<
  TraceResult,
  | "fundingSources"
  | "totalFunded"
  | "siblings"
  | "fundedMemberAccounts"
  | "originChains"
  | "bridgeOrigins"
  | "trading"
  | "portfolio"
>;

export interface TraceSummary {
  siblingCount: number;
  fundedMemberCount: number;
  hasBridgeFunding: boolean;
  bridgeAmount: bigint;
  exchangeFunding: bigint;
  hasExchangeOrigin: boolean;
  decodedOrigins: number;
  walletSources: number;
  freshFunders: number;
}

export function summarizeResult(result: ClassifierInput): TraceSummary {
  const bridgeSources = result.fundingSources.filter((s) => s.category === "bridge");

  return {
    siblingCount: result.siblings.filter((s) => s.isMember === true).length,
    fundedMemberCount: result.fundedMemberAccounts.length,
    hasBridgeFunding: bridgeSources.length > 0,
    bridgeAmount: sumAmounts(bridgeSources.map((s) => s.totalAmount)),
    exchangeFunding: sumAmounts(
      result.fundingSources.filter((s) => s.category === "exchange").map((s) => s.totalAmount)
    ),
    hasExchangeOrigin: result.originChains.some((c) => c.origin?.fromCategory === "exchange"),
    decodedOrigins: result.bridgeOrigins.length,
    walletSources: result.fundingSources.filter(
      (s) => s.category !== "bridge" && s.category !== "protocol" && s.category !== "swap"
    ).length,
    freshFunders: result.fundingSources.filter((s) => s.category === "fresh_wallet").length,
  };
}

// ============================================================================
// Signals
// ============================================================================

/**
 * Human-readable findings, in a fixed order
 */
export function generateSignals(result: ClassifierInput): string[] {
  const summary = summarizeResult(result);
  const { trading, portfolio, totalFunded } = result;
  const signals: string[] = [];

  const age = trading?.accountAgeDays ?? null;
  if (age !== null) {
    if (age < T.veryFreshAccountDays) {
      signals.push(`Very fresh account (${age} days old)`);
    } else if (age < T.newAccountDays) {
      signals.push(`New account (${age} days old)`);
    }
  }

  if (summary.hasBridgeFunding) {
    const pct = percentOf(summary.bridgeAmount, totalFunded);
    signals.push(`Bridge funding: ${formatUsd(summary.bridgeAmount)} (${pct.toFixed(0)}%)`);
    if (summary.decodedOrigins > 0) {
      signals.push(`Decoded ${summary.decodedOrigins} cross-chain origin(s)`);
    }
  }

  if (summary.exchangeFunding > 0n) {
    signals.push(`Exchange funding: ${formatUsd(summary.exchangeFunding)}`);
  } else if (summary.hasExchangeOrigin) {
    signals.push("Origin traced to exchange");
  }

  const siblings = summary.siblingCount;
  if (siblings >= T.highSiblingCount) {
    signals.push(`HIGH: ${siblings} other platform accounts from same funder`);
  } else if (siblings >= T.mediumSiblingCount) {
    signals.push(`MEDIUM: ${siblings} other platform accounts from same funder`);
  } else if (siblings === 1) {
    signals.push("1 other platform account from same funder");
  }

  if (summary.fundedMemberCount > 0) {
    signals.push(`Funded ${summary.fundedMemberCount} other platform account(s)`);
  }

  if (trading) {
    if (trading.marketsTraded === 1) {
      signals.push("Single market focus");
    } else if (trading.marketsTraded > 1 && trading.marketsTraded <= T.concentratedMarkets) {
      signals.push(`Concentrated: ${trading.marketsTraded} markets`);
    }

    if (trading.totalTrades >= T.highActivityTrades) {
      signals.push(`High activity: ${trading.totalTrades}+ trades`);
    } else if (trading.totalTrades < T.lowActivityTrades) {
      signals.push(`Low activity: ${trading.totalTrades} trades`);
    }
  }

  if (portfolio) {
    if (portfolio.totalValue >= T.largePortfolioUsd) {
      signals.push(`Large portfolio: ${formatUsd(portfolio.totalValue)}`);
    }
    if (portfolio.winRate >= T.highWinRate) {
      signals.push(`High win rate: ${portfolio.winRate.toFixed(0)}%`);
    } else if (portfolio.winRate <= T.lowWinRate && portfolio.totalTrades >= T.minTradesForWinRate) {
      signals.push(`Low win rate: ${portfolio.winRate.toFixed(0)}%`);
    }
  }

  if (totalFunded >= T.whaleFunding) {
    signals.push(`Whale funding: ${formatUsd(totalFunded)}`);
  } else if (totalFunded >= T.largeFunding) {
    signals.push(`Large funding: ${formatUsd(totalFunded)}`);
  } else if (totalFunded >= T.significantFunding) {
    signals.push(`Significant funding: ${formatUsd(totalFunded)}`);
  }

  if (summary.walletSources >= T.multipleWalletSources) {
    signals.push(`Multiple funding sources: ${summary.walletSources} wallets`);
  }

  if (summary.freshFunders > 0) {
    signals.push(`Funded by ${summary.freshFunders} fresh wallet(s)`);
  }

  return signals;
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Ordered decision list; rules are checked in severity order
 */
export function classify(result: ClassifierInput): ClassificationKind {
  const summary = summarizeResult(result);
  const { trading, totalFunded } = result;
  const siblings = summary.siblingCount;

  if (siblings + summary.fundedMemberCount >= T.coordinatedLinkedAccounts) {
    return "coordinated";
  }

  if (summary.hasBridgeFunding) {
    if (trading && trading.marketsTraded <= T.concentratedMarkets && totalFunded >= T.sophisticatedMinFunding) {
      return "sophisticated_concentrated";
    }
    return "cross_chain_review";
  }

  const age = trading?.accountAgeDays ?? null;
  if (age !== null && age < T.freshAccountDays && totalFunded >= T.freshLargeMinFunding) {
    return "fresh_large_funding";
  }

  if (
    trading &&
    trading.totalTrades < T.singleBetMaxTrades &&
    trading.marketsTraded === 1 &&
    totalFunded >= T.singleBetMinFunding
  ) {
    return "single_bet";
  }

  if (summary.fundedMemberCount > 0) {
    return "funds_members";
  }

  if (siblings === 1 || siblings === 2) {
    return "some_linked";
  }

  if (siblings === 0) {
    if (trading && trading.marketsTraded >= T.diversifiedMarkets) {
      return "retail_diversified";
    }
    return "retail";
  }

  return "inconclusive";
}
