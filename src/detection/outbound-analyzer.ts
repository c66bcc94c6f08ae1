/**
 * Outbound Analyzer
 *
 * Who did the target pay? Aggregates the target's own outgoing transfers,
 * drops protocol recipients and dust, and resolves membership for the
 * largest recipients. Non-members stay in the report.
 */

import { AddressRegistry, getSharedAddressRegistry } from "../api/chain/address-registry";
import { sumAmounts } from "../api/chain/amounts";
import { resolveMembership } from "../api/chain/membership";
import { toError, type FundedAccount, type LedgerProvider, type MembershipOracle, type Transfer } from "../api/chain/types";
import { serviceLoggers, type Logger } from "../utils/logger";
import type { WorkerPoolOptions } from "../utils/worker-pool";
import { DEFAULT_OUTBOUND_MIN_AMOUNT, FundingGraphBuilder } from "./funding-graph";
import { DEFAULT_MAX_SIBLINGS } from "./sibling-detector";

export interface OutboundAnalyzerConfig {
  ledger: LedgerProvider;
  membership: MembershipOracle;
  registry?: AddressRegistry;

  /** Dust threshold (default: 10 units) */
  minAmount?: bigint;

  /** Recipients checked for membership, largest first (default: 20) */
  cap?: number;

  pool?: WorkerPoolOptions;
  logger?: Logger;
}

export interface OutboundSummary {
  /** Every recipient above the dust threshold, largest first */
  accounts: FundedAccount[];

  /** Recipients resolved as platform members */
  fundedMembers: FundedAccount[];

  /** Total sent across all reported recipients */
  totalSent: bigint;
}

export class OutboundAnalyzer {
  private readonly ledger: LedgerProvider;
  private readonly membership: MembershipOracle;
  private readonly builder: FundingGraphBuilder;
  private readonly minAmount: bigint;
  private readonly cap: number;
  private readonly pool: WorkerPoolOptions;
  private readonly logger: Logger;

  constructor(config: OutboundAnalyzerConfig) {
    this.ledger = config.ledger;
    this.membership = config.membership;
    this.builder = new FundingGraphBuilder({ registry: config.registry ?? getSharedAddressRegistry() });
    this.minAmount = config.minAmount ?? DEFAULT_OUTBOUND_MIN_AMOUNT;
    this.cap = Math.max(0, Math.floor(config.cap ?? DEFAULT_MAX_SIBLINGS));
    this.logger = config.logger ?? serviceLoggers.outboundAnalyzer;
    this.pool = { logger: this.logger, ...config.pool };
  }

  async findFunded(target: string): Promise<OutboundSummary> {
    const targetLower = target.toLowerCase();

    let outgoing: Transfer[];
    try {
      outgoing = await this.ledger.getOutgoingTransfers(targetLower);
    } catch (error) {
      this.logger.warn("Outgoing lookup failed", { address: targetLower, error: toError(error).message });
      return { accounts: [], fundedMembers: [], totalSent: 0n };
    }

    const accounts = this.builder.buildOutgoing(targetLower, outgoing, { minAmount: this.minAmount });
    const checked = accounts.slice(0, this.cap).map((a) => a.address);
    const resolved =
      checked.length > 0 ? await resolveMembership(checked, this.membership, this.pool) : new Map<string, boolean>();

    const reported = accounts.map((account) => ({
      ...account,
      isMember: resolved.get(account.address) ?? null,
    }));
    const fundedMembers = reported.filter((a) => a.isMember === true);
    const totalSent = sumAmounts(reported.map((a) => a.totalSent));

    this.logger.debug("Outbound analysis complete", {
      recipients: reported.length,
      members: fundedMembers.length,
    });

    return { accounts: reported, fundedMembers, totalSent };
  }
}

export function createOutboundAnalyzer(config: OutboundAnalyzerConfig): OutboundAnalyzer {
  return new OutboundAnalyzer(config);
}

/**
 * Analyze the target's outgoing funding (convenience function)
 */
export async function findFunded(
  target: string,
  config: OutboundAnalyzerConfig
): Promise<OutboundSummary> {
  return new OutboundAnalyzer(config).findFunded(target);
}
