/**
 * Account Tracer Service
 *
 * Entry point of a trace. Validates the request, builds the target's
 * funding graph, then runs origin tracing, sibling detection, outbound
 * analysis, bridge decoding and activity lookups concurrently. Each phase
 * writes its own fields; classification runs only after all of them have
 * returned.
 *
 * Events:
 * - 'phase:complete' after each phase that ran
 * - 'trace:complete' with the final classification
 */

import { randomUUID } from "crypto";
import { EventEmitter } from "events";
import { isAddress } from "viem";

import {
  BRIDGE_CONCURRENCY,
  BRIDGE_DELAY_MS,
  decodeBridgeTransfers,
  DEFAULT_MAX_BRIDGE_DECODES,
  isRelayAddress,
} from "../api/bridge/relay-decoder";
import { AddressRegistry, getSharedAddressRegistry } from "../api/chain/address-registry";
import { parseAmount } from "../api/chain/amounts";
import { MEMBERSHIP_CONCURRENCY, MEMBERSHIP_DELAY_MS } from "../api/chain/membership";
import {
  TraceError,
  toError,
  type ActivityProvider,
  type BridgeDecoder,
  type ClassificationKind,
  type DecodedBridgeTransfer,
  type FundingSource,
  type LedgerProvider,
  type MembershipOracle,
  type PortfolioSummary,
  type Position,
  type TraceResult,
  type TradingBehavior,
  type Transfer,
  type WalletInfo,
} from "../api/chain/types";
import {
  DEFAULT_FRESH_WALLET_AGE_DAYS,
  DEFAULT_ORIGIN_SOURCE_MIN_AMOUNT,
  DEFAULT_OUTBOUND_MIN_AMOUNT,
  FundingGraphBuilder,
  totalOf,
} from "../detection/funding-graph";
import {
  DEFAULT_MAX_ORIGIN_HOPS,
  DEFAULT_MIN_TRACE_AMOUNT,
  OriginTracer,
  type OriginTraceSummary,
} from "../detection/origin-tracer";
import { OutboundAnalyzer, type OutboundSummary } from "../detection/outbound-analyzer";
import { DEFAULT_MAX_SIBLINGS, SiblingDetector } from "../detection/sibling-detector";
import { classify, generateSignals } from "../detection/trace-classifier";
import { summarizeActivity } from "../detection/trading-behavior";
import { createTraceLogger, serviceLoggers, type Logger } from "../utils/logger";
import { createAbortError, runPool, successfulValues, type WorkerPoolOptions } from "../utils/worker-pool";

// ============================================================================
// Types
// ============================================================================

/**
 * Amount given as a fixed-point bigint or a human-readable decimal
 */
export type AmountInput = bigint | string | number;

/**
 * Per-trace options
 */
export interface TraceOptions {
  /** Run sibling detection (default: true) */
  deep?: boolean;

  /** Sibling and outbound candidates checked for membership (default: 20) */
  maxSiblings?: number;

  /** Trace funding sources upstream (default: true) */
  traceOrigin?: boolean;

  /** Hop budget per origin chain (default: 3) */
  maxOriginHops?: number;

  /** Transfers below this are ignored while tracing upstream (default: 50) */
  minTraceAmount?: AmountInput;

  /** Sources below this total are not traced (default: 100) */
  originSourceMinAmount?: AmountInput;

  /** Analyze whom the target funded (default: true) */
  checkOutbound?: boolean;

  /** Dust threshold for outbound edges (default: 10) */
  outboundMinAmount?: AmountInput;

  /** Funders younger than this count as fresh (default: 7) */
  freshWalletAgeDays?: number;

  /** Fetch platform activity, portfolio and positions when a provider is configured (default: true) */
  includeActivity?: boolean;

  /** Bridge deliveries decoded per trace (default: 10) */
  maxBridgeDecodes?: number;

  membershipConcurrency?: number;
  membershipDelayMs?: number;
  bridgeConcurrency?: number;
  bridgeDelayMs?: number;

  /** Abandons the trace; it then rejects with TRACE_ABORTED */
  signal?: AbortSignal;

  /** Reference time in unix seconds (default: now) */
  now?: number;
}

/**
 * Collaborators a tracer is wired to
 */
export interface AccountTracerConfig {
  ledger: LedgerProvider;
  membership: MembershipOracle;
  bridgeDecoder?: BridgeDecoder;
  activity?: ActivityProvider;
  registry?: AddressRegistry;
  logger?: Logger;
}

export type TracePhase = "funding" | "origins" | "siblings" | "outbound" | "bridge" | "activity";

/**
 * Emitted after each phase that ran
 */
export interface PhaseCompleteEvent {
  type: "phase:complete";
  traceId: string;
  address: string;
  phase: TracePhase;
  durationMs: number;
}

/**
 * Emitted once the result is classified
 */
export interface TraceCompleteEvent {
  type: "trace:complete";
  traceId: string;
  address: string;
  classification: ClassificationKind;
  signalCount: number;
  durationMs: number;
}

/**
 * Options with defaults applied and amounts parsed
 */
interface ResolvedTraceOptions {
  deep: boolean;
  maxSiblings: number;
  traceOrigin: boolean;
  maxOriginHops: number;
  minTraceAmount: bigint;
  originSourceMinAmount: bigint;
  checkOutbound: boolean;
  outboundMinAmount: bigint;
  freshWalletAgeDays: number;
  includeActivity: boolean;
  maxBridgeDecodes: number;
  membershipPool: WorkerPoolOptions;
  bridgePool: WorkerPoolOptions;
  signal: AbortSignal | undefined;
  now: number;
}

interface ActivityOutcome {
  trading: TradingBehavior | null;
  portfolio: PortfolioSummary | null;
  positions: Position[];
}

const EMPTY_ORIGINS: OriginTraceSummary = { chains: [], ultimateOrigins: [] };
const EMPTY_OUTBOUND: OutboundSummary = { accounts: [], fundedMembers: [], totalSent: 0n };

function emptyActivity(): ActivityOutcome {
  return { trading: null, portfolio: null, positions: [] };
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Reject anything that is not a 20-byte hex address
 */
export function validateTraceAddress(address: string): string {
  const normalized = address.trim().toLowerCase();
  if (!isAddress(normalized)) {
    throw new TraceError(`Invalid address: ${address}`, "INVALID_ADDRESS", {
      context: { address },
    });
  }
  return normalized;
}

function nonNegativeInteger(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value < 0) {
    throw new TraceError(`Option ${name} must be a non-negative integer, got ${value}`, "INVALID_OPTIONS", {
      context: { option: name, value },
    });
  }
  return value;
}

function positiveInteger(name: string, value: number | undefined, fallback: number): number {
  const resolved = nonNegativeInteger(name, value, fallback);
  if (resolved === 0) {
    throw new TraceError(`Option ${name} must be at least 1`, "INVALID_OPTIONS", {
      context: { option: name, value },
    });
  }
  return resolved;
}

function amountOption(name: string, value: AmountInput | undefined, fallback: bigint): bigint {
  if (value === undefined) return fallback;
  if (typeof value === "bigint") {
    if (value < 0n) {
      throw new TraceError(`Option ${name} must not be negative`, "INVALID_OPTIONS", {
        context: { option: name, value: value.toString() },
      });
    }
    return value;
  }
  try {
    return parseAmount(value);
  } catch (error) {
    throw new TraceError(`Option ${name} is not a valid amount: ${String(value)}`, "INVALID_OPTIONS", {
      cause: toError(error),
      context: { option: name, value },
    });
  }
}

/**
 * Apply defaults and validate every numeric option
 */
export function resolveTraceOptions(options: TraceOptions = {}): ResolvedTraceOptions {
  const now = options.now ?? Math.floor(Date.now() / 1000);
  if (!Number.isFinite(now)) {
    throw new TraceError(`Option now must be a finite timestamp, got ${now}`, "INVALID_OPTIONS");
  }

  return {
    deep: options.deep ?? true,
    maxSiblings: nonNegativeInteger("maxSiblings", options.maxSiblings, DEFAULT_MAX_SIBLINGS),
    traceOrigin: options.traceOrigin ?? true,
    maxOriginHops: nonNegativeInteger("maxOriginHops", options.maxOriginHops, DEFAULT_MAX_ORIGIN_HOPS),
    minTraceAmount: amountOption("minTraceAmount", options.minTraceAmount, DEFAULT_MIN_TRACE_AMOUNT),
    originSourceMinAmount: amountOption(
      "originSourceMinAmount",
      options.originSourceMinAmount,
      DEFAULT_ORIGIN_SOURCE_MIN_AMOUNT
    ),
    checkOutbound: options.checkOutbound ?? true,
    outboundMinAmount: amountOption("outboundMinAmount", options.outboundMinAmount, DEFAULT_OUTBOUND_MIN_AMOUNT),
    freshWalletAgeDays: nonNegativeInteger(
      "freshWalletAgeDays",
      options.freshWalletAgeDays,
      DEFAULT_FRESH_WALLET_AGE_DAYS
    ),
    includeActivity: options.includeActivity ?? true,
    maxBridgeDecodes: nonNegativeInteger("maxBridgeDecodes", options.maxBridgeDecodes, DEFAULT_MAX_BRIDGE_DECODES),
    membershipPool: {
      concurrency: positiveInteger("membershipConcurrency", options.membershipConcurrency, MEMBERSHIP_CONCURRENCY),
      delayMs: nonNegativeInteger("membershipDelayMs", options.membershipDelayMs, MEMBERSHIP_DELAY_MS),
      signal: options.signal,
    },
    bridgePool: {
      concurrency: positiveInteger("bridgeConcurrency", options.bridgeConcurrency, BRIDGE_CONCURRENCY),
      delayMs: nonNegativeInteger("bridgeDelayMs", options.bridgeDelayMs, BRIDGE_DELAY_MS),
      signal: options.signal,
    },
    signal: options.signal,
    now,
  };
}

// ============================================================================
// AccountTracer Class
// ============================================================================

export class AccountTracer extends EventEmitter {
  private readonly ledger: LedgerProvider;
  private readonly membership: MembershipOracle;
  private readonly bridgeDecoder: BridgeDecoder | undefined;
  private readonly activity: ActivityProvider | undefined;
  private readonly registry: AddressRegistry;
  private readonly logger: Logger;

  constructor(config: AccountTracerConfig) {
    super();
    this.ledger = config.ledger;
    this.membership = config.membership;
    this.bridgeDecoder = config.bridgeDecoder;
    this.activity = config.activity;
    this.registry = config.registry ?? getSharedAddressRegistry();
    this.logger = config.logger ?? serviceLoggers.tracer;
  }

  /**
   * Trace one wallet. Rejects only on invalid input or abandonment.
   */
  async trace(target: string, options: TraceOptions = {}): Promise<TraceResult> {
    const address = validateTraceAddress(target);
    const opts = resolveTraceOptions(options);
    this.throwIfAborted(opts.signal);

    const traceId = randomUUID();
    const log = createTraceLogger(traceId, this.logger);
    const startedAt = Date.now();
    log.debug("Trace started", { address, deep: opts.deep, traceOrigin: opts.traceOrigin });

    // Funding graph
    const { isMember, fundingSources } = await this.runPhase(traceId, address, "funding", () =>
      this.buildFunding(address, opts, log)
    );
    this.throwIfAborted(opts.signal);

    // Independent phases behind one join barrier
    const [origins, siblings, outbound, bridgeOrigins, activity] = await Promise.all([
      opts.traceOrigin
        ? this.runPhase(traceId, address, "origins", () =>
            new OriginTracer({
              ledger: this.ledger,
              registry: this.registry,
              maxHops: opts.maxOriginHops,
              minAmount: opts.minTraceAmount,
              logger: log.child({ service: "OriginTracer" }),
            }).traceOrigins(fundingSources, {
              sourceMinAmount: opts.originSourceMinAmount,
              signal: opts.signal,
            })
          )
        : EMPTY_ORIGINS,
      opts.deep
        ? this.runPhase(traceId, address, "siblings", () =>
            new SiblingDetector({
              ledger: this.ledger,
              membership: this.membership,
              registry: this.registry,
              cap: opts.maxSiblings,
              pool: opts.membershipPool,
              logger: log.child({ service: "SiblingDetector" }),
            }).findSiblings({ funders: fundingSources, target: address })
          )
        : [],
      opts.checkOutbound
        ? this.runPhase(traceId, address, "outbound", () =>
            new OutboundAnalyzer({
              ledger: this.ledger,
              membership: this.membership,
              registry: this.registry,
              minAmount: opts.outboundMinAmount,
              cap: opts.maxSiblings,
              pool: opts.membershipPool,
              logger: log.child({ service: "OutboundAnalyzer" }),
            }).findFunded(address)
          )
        : EMPTY_OUTBOUND,
      this.bridgeDecoder
        ? this.decodeBridges(traceId, address, fundingSources, this.bridgeDecoder, opts, log)
        : [],
      opts.includeActivity && this.activity
        ? this.runPhase(traceId, address, "activity", () =>
            this.fetchActivity(address, isMember, opts.now, log)
          )
        : emptyActivity(),
    ]);
    this.throwIfAborted(opts.signal);

    const incomingTimes = fundingSources.map((s) => s.firstSeen);
    const result: TraceResult = {
      address,
      isMember,
      fundingSources,
      totalFunded: totalOf(fundingSources),
      firstFundedAt: incomingTimes.length > 0 ? Math.min(...incomingTimes) : null,
      siblings,
      fundedAccounts: outbound.accounts,
      fundedMemberAccounts: outbound.fundedMembers,
      totalSentToOthers: outbound.totalSent,
      originChains: origins.chains,
      ultimateOrigins: origins.ultimateOrigins,
      bridgeOrigins,
      trading: activity.trading,
      portfolio: activity.portfolio,
      positions: activity.positions,
      signals: [],
      classification: "inconclusive",
    };
    result.signals = generateSignals(result);
    result.classification = classify(result);

    const durationMs = Date.now() - startedAt;
    log.info("Trace complete", {
      address,
      classification: result.classification,
      sources: fundingSources.length,
      siblings: siblings.length,
      durationMs,
    });

    const event: TraceCompleteEvent = {
      type: "trace:complete",
      traceId,
      address,
      classification: result.classification,
      signalCount: result.signals.length,
      durationMs,
    };
    this.emit("trace:complete", event);

    return result;
  }

  // ==========================================================================
  // Phases
  // ==========================================================================

  private async buildFunding(
    address: string,
    opts: ResolvedTraceOptions,
    log: Logger
  ): Promise<{ isMember: boolean; fundingSources: FundingSource[] }> {
    const [isMember, incoming] = await Promise.all([
      recover(
        () => this.membership.isMember(address),
        false,
        (error) => log.warn("Target membership check failed", { address, error: error.message })
      ),
      recover(
        (): Promise<Transfer[]> => this.ledger.getIncomingTransfers(address),
        [],
        (error) => log.warn("Incoming lookup failed", { address, error: error.message })
      ),
    ]);

    const walletInfo = await this.lookupWalletInfo(address, incoming, opts, log);
    const builder = new FundingGraphBuilder({
      registry: this.registry,
      freshWalletAgeDays: opts.freshWalletAgeDays,
    });

    return {
      isMember,
      fundingSources: builder.buildIncoming(address, incoming, { walletInfo, now: opts.now }),
    };
  }

  /**
   * Prior history of senders the registry cannot explain
   */
  private async lookupWalletInfo(
    address: string,
    incoming: readonly Transfer[],
    opts: ResolvedTraceOptions,
    log: Logger
  ): Promise<Map<string, WalletInfo>> {
    const ledger = this.ledger;
    if (!ledger.getWalletInfo) {
      return new Map();
    }
    const getWalletInfo = ledger.getWalletInfo.bind(ledger);

    const senders = incoming
      .filter((t) => t.to === address && t.from !== address)
      .map((t) => t.from)
      .filter((sender) => this.registry.classify(sender).category === "unknown");

    const outcomes = await runPool(senders, (sender) => getWalletInfo(sender), {
      ...opts.membershipPool,
      logger: log,
    });
    for (const [sender, outcome] of outcomes) {
      if (!outcome.ok) {
        log.warn("Wallet info lookup failed", { address: sender, error: outcome.error.message });
      }
    }
    return successfulValues(outcomes);
  }

  private decodeBridges(
    traceId: string,
    address: string,
    sources: readonly FundingSource[],
    decoder: BridgeDecoder,
    opts: ResolvedTraceOptions,
    log: Logger
  ): Promise<DecodedBridgeTransfer[]> {
    if (!sources.some((s) => isRelayAddress(s.address))) {
      return Promise.resolve([]);
    }
    return this.runPhase(traceId, address, "bridge", () =>
      decodeBridgeTransfers(sources, decoder, {
        maxDecodes: opts.maxBridgeDecodes,
        pool: opts.bridgePool,
        logger: log.child({ service: "BridgeDecoder" }),
      })
    );
  }

  private async fetchActivity(
    address: string,
    isMember: boolean,
    now: number,
    log: Logger
  ): Promise<ActivityOutcome> {
    const provider = this.activity;
    if (!provider) {
      return emptyActivity();
    }
    const getPortfolio = isMember ? provider.getPortfolio?.bind(provider) : undefined;
    const getPositions = isMember ? provider.getPositions?.bind(provider) : undefined;

    const [trading, portfolio, positions] = await Promise.all([
      recover(
        async (): Promise<TradingBehavior | null> =>
          summarizeActivity(await provider.getActivity(address), now),
        null,
        (error) => log.warn("Activity lookup failed", { address, error: error.message })
      ),
      getPortfolio
        ? recover(
            () => getPortfolio(address),
            null,
            (error) => log.warn("Portfolio lookup failed", { address, error: error.message })
          )
        : null,
      getPositions
        ? recover(
            () => getPositions(address),
            [],
            (error) => log.warn("Positions lookup failed", { address, error: error.message })
          )
        : [],
    ]);

    return { trading, portfolio, positions };
  }

  private async runPhase<R>(
    traceId: string,
    address: string,
    phase: TracePhase,
    run: () => Promise<R>
  ): Promise<R> {
    const startedAt = Date.now();
    const value = await run();
    const event: PhaseCompleteEvent = {
      type: "phase:complete",
      traceId,
      address,
      phase,
      durationMs: Date.now() - startedAt,
    };
    this.emit("phase:complete", event);
    return value;
  }

  private throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw createAbortError();
    }
  }
}

/**
 * Run a collaborator call, turning a throw or a rejection into the fallback
 */
async function recover<T>(call: () => Promise<T>, fallback: T, onError: (error: Error) => void): Promise<T> {
  try {
    return await call();
  } catch (error) {
    onError(toError(error));
    return fallback;
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

export function createAccountTracer(config: AccountTracerConfig): AccountTracer {
  return new AccountTracer(config);
}

/**
 * Trace one wallet with a throwaway tracer (convenience function)
 */
export async function trace(
  target: string,
  config: AccountTracerConfig & TraceOptions
): Promise<TraceResult> {
  return new AccountTracer(config).trace(target, config);
}
