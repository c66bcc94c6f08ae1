/**
 * Funding Graph Builder
 *
 * Aggregates raw transfers into one edge per counterparty: who funded a
 * wallet (incoming) and whom the wallet funded (outgoing). Every qualifying
 * transfer lands in exactly one edge, so edge totals always add up to the
 * qualifying transfer total.
 */

import { AddressRegistry, getSharedAddressRegistry, isTerminalCategory } from "../api/chain/address-registry";
import { parseAmount, sumAmounts } from "../api/chain/amounts";
import type { FundedAccount, FundingSource, Transfer, WalletInfo } from "../api/chain/types";

// ============================================================================
// Constants
// ============================================================================

/** Funders younger than this many days count as fresh wallets */
export const DEFAULT_FRESH_WALLET_AGE_DAYS = 7;

/** Outgoing edges below this total are dust */
export const DEFAULT_OUTBOUND_MIN_AMOUNT = parseAmount("10");

/** Funding sources below this total are not worth tracing upstream */
export const DEFAULT_ORIGIN_SOURCE_MIN_AMOUNT = parseAmount("100");

const SECONDS_PER_DAY = 86_400;

// ============================================================================
// Types
// ============================================================================

export interface FundingGraphConfig {
  registry?: AddressRegistry;

  /** Age threshold for the fresh_wallet category (default: 7 days) */
  freshWalletAgeDays?: number;

  /** Dust threshold for outgoing edges (default: 10 units) */
  outboundMinAmount?: bigint;
}

export interface BuildIncomingOptions {
  /** Prior history of senders, keyed by lower-cased address */
  walletInfo?: ReadonlyMap<string, WalletInfo>;

  /** Reference time in unix seconds (default: now) */
  now?: number;
}

export interface BuildOutgoingOptions {
  /** Overrides the configured dust threshold */
  minAmount?: bigint;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Whether a wallet's history is too short to be trusted
 */
export function isFreshWallet(info: WalletInfo, now: number, thresholdDays: number): boolean {
  if (info.firstSeen === null || info.transactionCount === 0) {
    return true;
  }
  return (now - info.firstSeen) / SECONDS_PER_DAY < thresholdDays;
}

/**
 * Group transfers by sender, preserving first-appearance order
 */
export function groupBySender(transfers: readonly Transfer[]): Map<string, Transfer[]> {
  return groupBy(transfers, (t) => t.from);
}

/**
 * Group transfers by recipient, preserving first-appearance order
 */
export function groupByRecipient(transfers: readonly Transfer[]): Map<string, Transfer[]> {
  return groupBy(transfers, (t) => t.to);
}

function groupBy(transfers: readonly Transfer[], key: (t: Transfer) => string): Map<string, Transfer[]> {
  const groups = new Map<string, Transfer[]>();
  for (const transfer of transfers) {
    const k = key(transfer);
    const group = groups.get(k);
    if (group) {
      group.push(transfer);
    } else {
      groups.set(k, [transfer]);
    }
  }
  return groups;
}

/**
 * Sum of all funding source totals
 */
export function totalOf(sources: readonly FundingSource[]): bigint {
  return sumAmounts(sources.map((s) => s.totalAmount));
}

/**
 * Sources worth tracing upstream: not already explained, and large enough
 */
export function tracingCandidates(
  sources: readonly FundingSource[],
  minAmount: bigint = DEFAULT_ORIGIN_SOURCE_MIN_AMOUNT
): FundingSource[] {
  return sources.filter((s) => !isTerminalCategory(s.category) && s.totalAmount >= minAmount);
}

/**
 * Sources whose other recipients are worth inspecting.
 * Bridges and protocol contracts pay nearly every platform user.
 */
export function siblingFunders(sources: readonly FundingSource[]): FundingSource[] {
  return sources.filter((s) => s.category !== "bridge" && s.category !== "protocol");
}

// ============================================================================
// FundingGraphBuilder Class
// ============================================================================

export class FundingGraphBuilder {
  private readonly registry: AddressRegistry;
  private readonly freshWalletAgeDays: number;
  private readonly outboundMinAmount: bigint;

  constructor(config: FundingGraphConfig = {}) {
    this.registry = config.registry ?? getSharedAddressRegistry();
    this.freshWalletAgeDays = config.freshWalletAgeDays ?? DEFAULT_FRESH_WALLET_AGE_DAYS;
    this.outboundMinAmount = config.outboundMinAmount ?? DEFAULT_OUTBOUND_MIN_AMOUNT;
  }

  /**
   * Aggregate the transfers received by `target` into one source per sender
   */
  buildIncoming(
    target: string,
    transfers: readonly Transfer[],
    options: BuildIncomingOptions = {}
  ): FundingSource[] {
    const targetLower = target.toLowerCase();
    const now = options.now ?? Math.floor(Date.now() / 1000);
    const sources = new Map<string, FundingSource>();

    for (const transfer of transfers) {
      if (transfer.to !== targetLower || transfer.from === targetLower) {
        continue;
      }

      const existing = sources.get(transfer.from);
      if (existing) {
        existing.totalAmount += transfer.amount;
        existing.transferCount++;
        existing.transfers.push(transfer);
        existing.firstSeen = Math.min(existing.firstSeen, transfer.timestamp);
        existing.lastSeen = Math.max(existing.lastSeen, transfer.timestamp);
        continue;
      }

      const info = this.registry.classify(transfer.from);
      sources.set(transfer.from, {
        address: info.address,
        label: info.label,
        category: info.category,
        totalAmount: transfer.amount,
        transferCount: 1,
        firstSeen: transfer.timestamp,
        lastSeen: transfer.timestamp,
        transfers: [transfer],
        isBridge: info.category === "bridge",
        walletInfo: null,
      });
    }

    for (const source of sources.values()) {
      if (source.category !== "unknown") continue;
      const walletInfo = options.walletInfo?.get(source.address);
      if (!walletInfo) continue;

      source.walletInfo = walletInfo;
      if (isFreshWallet(walletInfo, now, this.freshWalletAgeDays)) {
        source.category = "fresh_wallet";
      }
    }

    return Array.from(sources.values());
  }

  /**
   * Aggregate the transfers sent by `source` into one edge per recipient,
   * dropping protocol contracts and dust, largest first
   */
  buildOutgoing(
    source: string,
    transfers: readonly Transfer[],
    options: BuildOutgoingOptions = {}
  ): FundedAccount[] {
    const sourceLower = source.toLowerCase();
    const minAmount = options.minAmount ?? this.outboundMinAmount;
    const accounts = new Map<string, FundedAccount>();

    for (const transfer of transfers) {
      if (transfer.from !== sourceLower || transfer.to === sourceLower) {
        continue;
      }
      if (this.registry.isProtocolContract(transfer.to)) {
        continue;
      }

      const existing = accounts.get(transfer.to);
      if (existing) {
        existing.totalSent += transfer.amount;
        existing.transferCount++;
        existing.transfers.push(transfer);
        existing.firstSeen = Math.min(existing.firstSeen, transfer.timestamp);
        continue;
      }

      const info = this.registry.classify(transfer.to);
      accounts.set(transfer.to, {
        address: info.address,
        label: info.label,
        category: info.category,
        totalSent: transfer.amount,
        transferCount: 1,
        firstSeen: transfer.timestamp,
        transfers: [transfer],
        isMember: null,
      });
    }

    return Array.from(accounts.values())
      .filter((account) => account.totalSent >= minAmount)
      .sort(compareFundedAccounts);
  }

  /**
   * Category lookup for callers that only hold an address
   */
  getRegistry(): AddressRegistry {
    return this.registry;
  }
}

/**
 * Largest total first; ties broken by earlier first transfer, then address
 */
function compareFundedAccounts(a: FundedAccount, b: FundedAccount): number {
  if (a.totalSent !== b.totalSent) return a.totalSent > b.totalSent ? -1 : 1;
  if (a.firstSeen !== b.firstSeen) return a.firstSeen - b.firstSeen;
  return a.address < b.address ? -1 : a.address > b.address ? 1 : 0;
}

// ============================================================================
// Convenience Functions
// ============================================================================

export function createFundingGraphBuilder(config?: FundingGraphConfig): FundingGraphBuilder {
  return new FundingGraphBuilder(config);
}

/**
 * Aggregate incoming transfers with a default-configured builder
 */
export function buildIncoming(
  target: string,
  transfers: readonly Transfer[],
  options?: BuildIncomingOptions & FundingGraphConfig
): FundingSource[] {
  return new FundingGraphBuilder(options).buildIncoming(target, transfers, options);
}

/**
 * Aggregate outgoing transfers with a default-configured builder
 */
export function buildOutgoing(
  source: string,
  transfers: readonly Transfer[],
  options?: BuildOutgoingOptions & FundingGraphConfig
): FundedAccount[] {
  return new FundingGraphBuilder(options).buildOutgoing(source, transfers, options);
}
