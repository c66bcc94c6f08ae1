/**
 * Backward Origin Tracer
 *
 * Follows the largest qualifying funder upstream, one hop at a time, until
 * it reaches an explainable source (exchange, bridge, swap venue, protocol
 * contract), runs out of qualifying funders, or exhausts its hop budget.
 * The walk is a loop over (current, remainingHops), so depth is bounded by
 * construction even on cyclic funding graphs.
 */

import { AddressRegistry, getSharedAddressRegistry, isTerminalCategory } from "../api/chain/address-registry";
import { parseAmount } from "../api/chain/amounts";
import {
  toError,
  type ChainStopReason,
  type FundingChain,
  type FundingHop,
  type FundingSource,
  type LedgerProvider,
  type Transfer,
} from "../api/chain/types";
import { createAbortError } from "../utils/worker-pool";
import { serviceLoggers, type Logger } from "../utils/logger";
import { DEFAULT_ORIGIN_SOURCE_MIN_AMOUNT, tracingCandidates } from "./funding-graph";

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_MAX_ORIGIN_HOPS = 3;

/** Transfers below this amount are ignored while walking upstream */
export const DEFAULT_MIN_TRACE_AMOUNT = parseAmount("50");

// ============================================================================
// Types
// ============================================================================

export interface OriginTracerConfig {
  ledger: LedgerProvider;
  registry?: AddressRegistry;
  maxHops?: number;
  minAmount?: bigint;
  logger?: Logger;
}

export interface TraceOriginOptions {
  maxHops?: number;
  minAmount?: bigint;
  signal?: AbortSignal;
}

export interface TraceOriginsOptions extends TraceOriginOptions {
  /** Sources below this total are not traced (default: 100 units) */
  sourceMinAmount?: bigint;
}

export interface OriginTraceSummary {
  /** One chain per traced source that found at least one hop, in source order */
  chains: FundingChain[];

  /** Distinct chain origins, in chain order */
  ultimateOrigins: string[];
}

/**
 * Aggregated view of one upstream sender
 */
interface SenderTotal {
  address: string;
  total: bigint;
  earliest: Transfer;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Aggregate qualifying transfers into per-sender totals
 */
function senderTotals(current: string, transfers: readonly Transfer[], minAmount: bigint): SenderTotal[] {
  const totals = new Map<string, SenderTotal>();

  for (const transfer of transfers) {
    if (transfer.to !== current || transfer.from === current || transfer.amount < minAmount) {
      continue;
    }
    const existing = totals.get(transfer.from);
    if (!existing) {
      totals.set(transfer.from, { address: transfer.from, total: transfer.amount, earliest: transfer });
      continue;
    }
    existing.total += transfer.amount;
    const { earliest } = existing;
    if (
      transfer.timestamp < earliest.timestamp ||
      (transfer.timestamp === earliest.timestamp && transfer.txHash < earliest.txHash)
    ) {
      existing.earliest = transfer;
    }
  }

  return Array.from(totals.values());
}

/**
 * Largest total wins; equal totals go to the earlier first transfer, then
 * the lexicographically smaller address
 */
export function selectLargestSender<T extends { address: string; total: bigint; earliest: { timestamp: number } }>(
  candidates: readonly T[]
): T | null {
  let best: T | null = null;
  for (const candidate of candidates) {
    if (best === null || compareSenders(candidate, best) < 0) {
      best = candidate;
    }
  }
  return best;
}

function compareSenders(
  a: { address: string; total: bigint; earliest: { timestamp: number } },
  b: { address: string; total: bigint; earliest: { timestamp: number } }
): number {
  if (a.total !== b.total) return a.total > b.total ? -1 : 1;
  if (a.earliest.timestamp !== b.earliest.timestamp) return a.earliest.timestamp - b.earliest.timestamp;
  return a.address < b.address ? -1 : a.address > b.address ? 1 : 0;
}

function buildChain(start: string, hops: FundingHop[], stopReason: ChainStopReason): FundingChain {
  return {
    start,
    hops,
    depth: hops.length,
    origin: hops[0] ?? null,
    stopReason,
  };
}

// ============================================================================
// OriginTracer Class
// ============================================================================

export class OriginTracer {
  private readonly ledger: LedgerProvider;
  private readonly registry: AddressRegistry;
  private readonly maxHops: number;
  private readonly minAmount: bigint;
  private readonly logger: Logger;

  constructor(config: OriginTracerConfig) {
    this.ledger = config.ledger;
    this.registry = config.registry ?? getSharedAddressRegistry();
    this.maxHops = config.maxHops ?? DEFAULT_MAX_ORIGIN_HOPS;
    this.minAmount = config.minAmount ?? DEFAULT_MIN_TRACE_AMOUNT;
    this.logger = config.logger ?? serviceLoggers.originTracer;
  }

  /**
   * Walk upstream from `address`. The returned chain is ordered origin
   * first; its last hop pays `address`.
   */
  async traceOrigin(address: string, options: TraceOriginOptions = {}): Promise<FundingChain> {
    const start = address.toLowerCase();
    const minAmount = options.minAmount ?? this.minAmount;
    const hops: FundingHop[] = [];
    const onChain = new Set<string>([start]);

    let current = start;
    let remainingHops = Math.max(0, Math.floor(options.maxHops ?? this.maxHops));

    for (;;) {
      if (options.signal?.aborted) {
        throw createAbortError();
      }

      if (this.registry.isProtocolContract(current)) {
        return buildChain(start, hops, "protocol");
      }
      if (remainingHops === 0) {
        return buildChain(start, hops, "hop_limit");
      }
      if (isTerminalCategory(this.registry.classify(current).category)) {
        return buildChain(start, hops, "terminal_category");
      }

      let incoming: Transfer[];
      try {
        incoming = await this.ledger.getIncomingTransfers(current);
      } catch (error) {
        this.logger.warn("Incoming lookup failed, ending origin walk", {
          address: current,
          depth: hops.length,
          error: toError(error).message,
        });
        return buildChain(start, hops, "lookup_failed");
      }

      const selected = selectLargestSender(senderTotals(current, incoming, minAmount));
      if (!selected) {
        return buildChain(start, hops, "no_qualifying_funder");
      }
      if (this.registry.isProtocolContract(selected.address)) {
        return buildChain(start, hops, "protocol");
      }
      if (onChain.has(selected.address)) {
        return buildChain(start, hops, "cycle");
      }

      const info = this.registry.classify(selected.address);
      hops.unshift({
        from: selected.address,
        to: current,
        amount: selected.total,
        timestamp: selected.earliest.timestamp,
        txHash: selected.earliest.txHash,
        fromCategory: info.category,
        fromLabel: info.label,
      });

      onChain.add(selected.address);
      remainingHops--;
      current = selected.address;
    }
  }

  /**
   * Trace every qualifying funding source independently and concurrently
   */
  async traceOrigins(
    sources: readonly FundingSource[],
    options: TraceOriginsOptions = {}
  ): Promise<OriginTraceSummary> {
    const candidates = tracingCandidates(sources, options.sourceMinAmount ?? DEFAULT_ORIGIN_SOURCE_MIN_AMOUNT);
    const traced = await Promise.all(candidates.map((source) => this.traceOrigin(source.address, options)));

    const chains = traced.filter((chain) => chain.depth > 0);
    const ultimateOrigins: string[] = [];
    for (const chain of chains) {
      if (chain.origin && !ultimateOrigins.includes(chain.origin.from)) {
        ultimateOrigins.push(chain.origin.from);
      }
    }

    this.logger.debug("Origin tracing complete", {
      sources: candidates.length,
      chains: chains.length,
      origins: ultimateOrigins.length,
    });

    return { chains, ultimateOrigins };
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

export function createOriginTracer(config: OriginTracerConfig): OriginTracer {
  return new OriginTracer(config);
}

/**
 * Trace one address upstream (convenience function)
 */
export async function traceOrigin(
  address: string,
  config: OriginTracerConfig & TraceOriginOptions
): Promise<FundingChain> {
  return new OriginTracer(config).traceOrigin(address, config);
}
