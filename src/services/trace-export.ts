/**
 * Trace export and labels
 *
 * JSON-safe view of a TraceResult (amounts as decimal strings, times as
 * ISO-8601) and the user-facing rendering of a classification.
 */

import { formatAmount } from "../api/chain/amounts";
import type { ClassificationKind, Position, TraceResult } from "../api/chain/types";
import { summarizeResult } from "../detection/trace-classifier";

// ============================================================================
// Labels
// ============================================================================

export interface ClassificationLabel {
  icon: string;
  text: string;
}

export const CLASSIFICATION_LABELS: Readonly<Record<ClassificationKind, ClassificationLabel>> = {
  coordinated: { icon: "🚨", text: "Likely Coordinated (Multi-Account)" },
  sophisticated_concentrated: { icon: "⚠️", text: "Likely Sophisticated/Concentrated Bet" },
  cross_chain_review: { icon: "⚠️", text: "Cross-chain Funder - Review Needed" },
  fresh_large_funding: { icon: "⚠️", text: "Fresh + Large Funding - Worth Investigating" },
  single_bet: { icon: "⚠️", text: "Single Bet Account - Check Market" },
  funds_members: { icon: "⚠️", text: "Funds Other Platform Accounts - Check for Coordination" },
  some_linked: { icon: "ℹ️", text: "Some Linked Accounts - Manual Review" },
  retail_diversified: { icon: "✅", text: "Likely Retail (Diversified)" },
  retail: { icon: "✅", text: "Likely Retail" },
  inconclusive: { icon: "❓", text: "Inconclusive - Manual Review Needed" },
};

/**
 * Render a classification with its icon. With a result at hand, the
 * linked-account labels carry their counts.
 */
export function formatClassification(
  kind: ClassificationKind,
  result?: Pick<TraceResult, "siblings" | "fundedMemberAccounts">
): string {
  const { icon, text } = CLASSIFICATION_LABELS[kind];
  if (!result) {
    return `${icon} ${text}`;
  }

  const siblings = result.siblings.filter((s) => s.isMember === true).length;
  const funded = result.fundedMemberAccounts.length;

  switch (kind) {
    case "coordinated":
      return `${icon} ${text} - ${siblings + funded} linked accounts`;
    case "funds_members":
      return `${icon} Funds ${funded} Other Platform Account(s) - Check for Coordination`;
    default:
      return `${icon} ${text}`;
  }
}

// ============================================================================
// Report
// ============================================================================

export interface TraceReport {
  address: string;
  isMember: boolean;
  classification: ClassificationKind;
  classificationLabel: string;
  signals: string[];
  funding: {
    totalFunded: string;
    firstFundingDate: string | null;
    sources: Array<{
      address: string;
      amount: string;
      category: string;
      label: string | null;
      isBridge: boolean;
      transferCount: number;
      bridgeOrigins: Array<{ chain: string; address: string; amount: string }>;
    }>;
  };
  siblings: {
    count: number;
    accounts: Array<{ address: string; funded: string; sharedFunders: string[] }>;
  };
  fundedAccounts: {
    count: number;
    totalSent: string;
    memberAccounts: Array<{ address: string; sent: string }>;
  };
  trading: {
    totalTrades: number;
    marketsTraded: number;
    accountAgeDays: number | null;
  } | null;
  portfolio: {
    totalValue: number;
    unrealizedPnl: number;
    realizedPnl: number;
    winRate: number;
    positionsCount: number;
  } | null;
  positions: Position[];
  originTracing: {
    ultimateOrigins: string[];
    chains: Array<{
      depth: number;
      stopReason: string;
      origin: { address: string; category: string; label: string | null } | null;
    }>;
  };
}

function toIso(timestamp: number | null): string | null {
  return timestamp === null ? null : new Date(timestamp * 1000).toISOString();
}

/**
 * JSON-safe report of a trace
 */
export function exportTraceResult(result: TraceResult): TraceReport {
  const summary = summarizeResult(result);

  return {
    address: result.address,
    isMember: result.isMember,
    classification: result.classification,
    classificationLabel: formatClassification(result.classification, result),
    signals: [...result.signals],
    funding: {
      totalFunded: formatAmount(result.totalFunded),
      firstFundingDate: toIso(result.firstFundedAt),
      sources: result.fundingSources.map((source) => ({
        address: source.address,
        amount: formatAmount(source.totalAmount),
        category: source.category,
        label: source.label,
        isBridge: source.isBridge,
        transferCount: source.transferCount,
        bridgeOrigins: result.bridgeOrigins
          .filter((d) => d.sourceAddress === source.address)
          .map((d) => ({
            chain: d.origin.originChainName,
            address: d.origin.originAddress,
            amount: formatAmount(d.origin.amount),
          })),
      })),
    },
    siblings: {
      count: summary.siblingCount,
      accounts: result.siblings
        .filter((s) => s.isMember === true)
        .map((s) => ({
          address: s.address,
          funded: formatAmount(s.totalReceived),
          sharedFunders: [...s.sharedFunders],
        })),
    },
    fundedAccounts: {
      count: summary.fundedMemberCount,
      totalSent: formatAmount(result.totalSentToOthers),
      memberAccounts: result.fundedMemberAccounts.map((f) => ({
        address: f.address,
        sent: formatAmount(f.totalSent),
      })),
    },
    trading: result.trading
      ? {
          totalTrades: result.trading.totalTrades,
          marketsTraded: result.trading.marketsTraded,
          accountAgeDays: result.trading.accountAgeDays,
        }
      : null,
    portfolio: result.portfolio
      ? {
          totalValue: result.portfolio.totalValue,
          unrealizedPnl: result.portfolio.unrealizedPnl,
          realizedPnl: result.portfolio.realizedPnl,
          winRate: result.portfolio.winRate,
          positionsCount: result.portfolio.positionsCount,
        }
      : null,
    positions: result.positions.map((p) => ({ ...p })),
    originTracing: {
      ultimateOrigins: [...result.ultimateOrigins],
      chains: result.originChains.map((chain) => ({
        depth: chain.depth,
        stopReason: chain.stopReason,
        origin: chain.origin
          ? { address: chain.origin.from, category: chain.origin.fromCategory, label: chain.origin.fromLabel }
          : null,
      })),
    },
  };
}
