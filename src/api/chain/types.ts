/**
 * Types for funding provenance tracing
 *
 * Data model shared by the registry, the graph builder, the tracer phases
 * and the classifier, plus the collaborator interfaces the engine consumes.
 * Amounts are fixed-point bigints at AMOUNT_DECIMALS fractional digits;
 * timestamps are unix seconds.
 */

// ============================================================================
// Transfers
// ============================================================================

/**
 * A single token transfer, as handed over by a LedgerProvider
 */
export interface Transfer {
  /** Transaction hash */
  readonly txHash: string;

  /** Sender address (lower-cased) */
  readonly from: string;

  /** Recipient address (lower-cased) */
  readonly to: string;

  /** Amount in fixed-point units (see AMOUNT_DECIMALS) */
  readonly amount: bigint;

  /** Token symbol, e.g. "USDC" or "USDC.e" */
  readonly tokenSymbol: string;

  /** Block timestamp (seconds) */
  readonly timestamp: number;

  /** Block number */
  readonly blockNumber: bigint;
}

// ============================================================================
// Address classification
// ============================================================================

/**
 * Category an address falls into
 */
export type AddressCategory =
  | "exchange"
  | "bridge"
  | "swap"
  | "entity"
  | "protocol"
  | "fresh_wallet"
  | "unknown";

/**
 * Categories at which backward tracing stops
 */
export type TerminalCategory = Extract<
  AddressCategory,
  "exchange" | "bridge" | "swap" | "protocol"
>;

/**
 * Registry lookup result
 */
export interface AddressInfo {
  address: string;
  label: string | null;
  category: AddressCategory;
}

/**
 * Prior on-chain history of an address
 */
export interface WalletInfo {
  address: string;

  /** Timestamp of the first known transaction, null when the wallet has none */
  firstSeen: number | null;

  transactionCount: number;
}

// ============================================================================
// Funding graph
// ============================================================================

/**
 * Aggregated incoming edge: everything one counterparty sent to the target
 */
export interface FundingSource {
  address: string;
  label: string | null;
  category: AddressCategory;
  totalAmount: bigint;
  transferCount: number;
  firstSeen: number;
  lastSeen: number;
  transfers: Transfer[];

  /** Whether the counterparty is a bridge contract */
  isBridge: boolean;

  /** History used to decide the fresh_wallet category, when it was looked up */
  walletInfo: WalletInfo | null;
}

/**
 * Aggregated outgoing edge: everything the target sent to one recipient
 */
export interface FundedAccount {
  address: string;
  label: string | null;
  category: AddressCategory;
  totalSent: bigint;
  transferCount: number;
  firstSeen: number;
  transfers: Transfer[];

  /** Platform membership; null when it was not resolved */
  isMember: boolean | null;
}

/**
 * One step of an origin chain
 */
export interface FundingHop {
  from: string;
  to: string;
  amount: bigint;
  timestamp: number;
  txHash: string;
  fromCategory: AddressCategory;
  fromLabel: string | null;
}

/**
 * Why an origin walk ended
 */
export type ChainStopReason =
  | "hop_limit"
  | "terminal_category"
  | "no_qualifying_funder"
  | "protocol"
  | "cycle"
  | "lookup_failed";

/**
 * Ordered funding path, ultimate origin first
 */
export interface FundingChain {
  /** Address the walk started from (the last hop's recipient) */
  start: string;
  hops: FundingHop[];
  depth: number;
  origin: FundingHop | null;
  stopReason: ChainStopReason;
}

/**
 * Another wallet paid by one or more of the target's funders
 */
export interface SiblingCandidate {
  address: string;
  totalReceived: bigint;

  /** Funders (in discovery order) that paid this address */
  sharedFunders: string[];

  transfers: Transfer[];
  isMember: boolean | null;
}

// ============================================================================
// Bridge decoding
// ============================================================================

/**
 * Cross-chain origin of a bridge delivery
 */
export interface BridgeOrigin {
  originChainId: number;
  originChainName: string;
  originAddress: string;
  originTxHash: string | null;
  amount: bigint;
  tokenSymbol: string;
  timestamp: number | null;
  destinationChainId: number;
  destinationChainName: string;
  destinationAddress: string;
  destinationTxHash: string;
  status: string;
}

/**
 * A decoded bridge transfer attributed to the funding source that delivered it
 */
export interface DecodedBridgeTransfer {
  sourceAddress: string;
  txHash: string;
  origin: BridgeOrigin;
}

// ============================================================================
// Platform activity
// ============================================================================

/**
 * One platform activity record (trade, split, redeem...)
 */
export interface PlatformActivity {
  conditionId?: string | null;
  outcome?: string | null;

  /** Unix seconds or an ISO-8601 string */
  timestamp?: number | string | null;
}

/**
 * Trading pattern summary derived from platform activity
 */
export interface TradingBehavior {
  totalTrades: number;
  marketsTraded: number;
  uniqueOutcomes: number;
  firstTradeAt: number | null;
  lastTradeAt: number | null;

  /** Whole days since the first trade */
  accountAgeDays: number | null;
}

/**
 * Portfolio figures reported by the platform (USD)
 */
export interface PortfolioSummary {
  totalValue: number;
  unrealizedPnl: number;
  realizedPnl: number;

  /** Percentage, 0-100 */
  winRate: number;

  positionsCount: number;
  totalTrades: number;
  marketsTraded: number;
  volumeTraded: number;
}

/**
 * An open position held on the platform (USD figures)
 */
export interface Position {
  /** Market title or condition id */
  market: string;
  outcome: string;
  size: number;
  avgPrice: number;
  currentPrice: number;
  value: number;
  unrealizedPnl: number;
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Closed set of classification outcomes, most severe first
 */
export type ClassificationKind =
  | "coordinated"
  | "sophisticated_concentrated"
  | "cross_chain_review"
  | "fresh_large_funding"
  | "single_bet"
  | "funds_members"
  | "some_linked"
  | "retail_diversified"
  | "retail"
  | "inconclusive";

// ============================================================================
// Aggregate result
// ============================================================================

/**
 * Everything learned about one traced wallet
 */
export interface TraceResult {
  address: string;
  isMember: boolean;

  // Funding (graph builder)
  fundingSources: FundingSource[];
  totalFunded: bigint;
  firstFundedAt: number | null;

  // Sibling detector
  siblings: SiblingCandidate[];

  // Outbound analyzer
  fundedAccounts: FundedAccount[];
  fundedMemberAccounts: FundedAccount[];
  totalSentToOthers: bigint;

  // Origin tracer
  originChains: FundingChain[];
  ultimateOrigins: string[];

  // Bridge decoding
  bridgeOrigins: DecodedBridgeTransfer[];

  // Platform activity
  trading: TradingBehavior | null;
  portfolio: PortfolioSummary | null;

  /** Open positions, members only */
  positions: Position[];

  // Classification
  signals: string[];
  classification: ClassificationKind;
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Source of parsed transfer records.
 * Results are ascending by timestamp, lower-cased and amount-normalized.
 */
export interface LedgerProvider {
  getIncomingTransfers(address: string): Promise<Transfer[]>;
  getOutgoingTransfers(address: string): Promise<Transfer[]>;

  /** Prior history, used to spot freshly created funders */
  getWalletInfo?(address: string): Promise<WalletInfo>;
}

/**
 * Answers whether an address participates in the platform
 */
export interface MembershipOracle {
  isMember(address: string): Promise<boolean>;
}

/**
 * Decodes bridge deliveries; null means the hash could not be decoded
 */
export interface BridgeDecoder {
  decode(txHash: string): Promise<BridgeOrigin | null>;
}

/**
 * Platform activity and portfolio lookups
 */
export interface ActivityProvider {
  getActivity(address: string): Promise<PlatformActivity[]>;
  getPortfolio?(address: string): Promise<PortfolioSummary | null>;
  getPositions?(address: string): Promise<Position[]>;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Trace error codes
 */
export type TraceErrorCode =
  | "INVALID_ADDRESS"
  | "INVALID_OPTIONS"
  | "INVALID_AMOUNT"
  | "INVALID_TRANSFER"
  | "TRACE_ABORTED"
  | "COLLABORATOR_FAILED";

/**
 * Error raised at the trace boundary
 */
export class TraceError extends Error {
  readonly code: TraceErrorCode;
  readonly cause?: Error;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: TraceErrorCode,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = "TraceError";
    this.code = code;
    this.cause = options?.cause;
    this.context = options?.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TraceError);
    }
  }
}

/**
 * Narrow an unknown thrown value to an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
