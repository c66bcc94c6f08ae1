/**
 * Sibling Detector
 *
 * Finds other platform members paid by the same funders as the target.
 * Each funder's outgoing transfers are merged into one candidate map keyed
 * by recipient; the first `cap` candidates (discovery order) are checked
 * against the Membership Oracle and only members are kept.
 */

import { AddressRegistry, getSharedAddressRegistry } from "../api/chain/address-registry";
import { resolveMembership } from "../api/chain/membership";
import type { FundingSource, LedgerProvider, MembershipOracle, SiblingCandidate, Transfer } from "../api/chain/types";
import { serviceLoggers, type Logger } from "../utils/logger";
import { runPool, type WorkerPoolOptions } from "../utils/worker-pool";
import { siblingFunders } from "./funding-graph";

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_MAX_SIBLINGS = 20;

export interface SiblingDetectorConfig {
  ledger: LedgerProvider;
  membership: MembershipOracle;
  registry?: AddressRegistry;

  /** Candidates checked for membership (default: 20) */
  cap?: number;

  /** Pool settings for outbound lookups and membership checks */
  pool?: WorkerPoolOptions;

  logger?: Logger;
}

export interface FindSiblingsParams {
  /** The target's funding sources; bridges and protocol contracts are skipped */
  funders: readonly FundingSource[];
  target: string;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Merge each funder's outgoing transfers into one candidate per recipient.
 * Funders are visited in input order, so map order is discovery order.
 */
export function mergeRecipients(
  target: string,
  outgoingByFunder: ReadonlyArray<readonly [string, readonly Transfer[]]>,
  registry: AddressRegistry
): Map<string, SiblingCandidate> {
  const targetLower = target.toLowerCase();
  const candidates = new Map<string, SiblingCandidate>();

  for (const [funder, transfers] of outgoingByFunder) {
    for (const transfer of transfers) {
      const recipient = transfer.to;
      if (transfer.from !== funder || recipient === targetLower || recipient === funder) {
        continue;
      }
      if (registry.isProtocolContract(recipient)) {
        continue;
      }

      const existing = candidates.get(recipient);
      if (!existing) {
        candidates.set(recipient, {
          address: recipient,
          totalReceived: transfer.amount,
          sharedFunders: [funder],
          transfers: [transfer],
          isMember: null,
        });
        continue;
      }

      existing.totalReceived += transfer.amount;
      existing.transfers.push(transfer);
      if (!existing.sharedFunders.includes(funder)) {
        existing.sharedFunders.push(funder);
      }
    }
  }

  return candidates;
}

// ============================================================================
// SiblingDetector Class
// ============================================================================

export class SiblingDetector {
  private readonly ledger: LedgerProvider;
  private readonly membership: MembershipOracle;
  private readonly registry: AddressRegistry;
  private readonly cap: number;
  private readonly pool: WorkerPoolOptions;
  private readonly logger: Logger;

  constructor(config: SiblingDetectorConfig) {
    this.ledger = config.ledger;
    this.membership = config.membership;
    this.registry = config.registry ?? getSharedAddressRegistry();
    this.cap = Math.max(0, Math.floor(config.cap ?? DEFAULT_MAX_SIBLINGS));
    this.logger = config.logger ?? serviceLoggers.siblingDetector;
    this.pool = { logger: this.logger, ...config.pool };
  }

  async findSiblings(params: FindSiblingsParams): Promise<SiblingCandidate[]> {
    const funders = siblingFunders(params.funders).map((f) => f.address);
    if (funders.length === 0) {
      return [];
    }

    const outcomes = await runPool(funders, (funder) => this.ledger.getOutgoingTransfers(funder), this.pool);

    const outgoingByFunder: Array<[string, Transfer[]]> = [];
    for (const funder of funders) {
      const outcome = outcomes.get(funder);
      if (!outcome) continue;
      if (!outcome.ok) {
        this.logger.warn("Outbound lookup failed, skipping funder", {
          funder,
          error: outcome.error.message,
        });
        continue;
      }
      outgoingByFunder.push([funder, outcome.value]);
    }

    const candidates = mergeRecipients(params.target, outgoingByFunder, this.registry);
    const checked = Array.from(candidates.values()).slice(0, this.cap);
    if (checked.length === 0) {
      return [];
    }

    const resolved = await resolveMembership(
      checked.map((c) => c.address),
      this.membership,
      this.pool
    );

    const siblings: SiblingCandidate[] = [];
    for (const candidate of checked) {
      const isMember = resolved.get(candidate.address);
      if (isMember === true) {
        siblings.push({ ...candidate, isMember });
      }
    }

    this.logger.debug("Sibling detection complete", {
      funders: funders.length,
      candidates: candidates.size,
      checked: checked.length,
      siblings: siblings.length,
    });

    return siblings;
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

export function createSiblingDetector(config: SiblingDetectorConfig): SiblingDetector {
  return new SiblingDetector(config);
}

/**
 * Find member siblings of `target` (convenience function)
 */
export async function findSiblings(
  params: FindSiblingsParams & SiblingDetectorConfig
): Promise<SiblingCandidate[]> {
  return new SiblingDetector(params).findSiblings(params);
}
