/**
 * Funding Trace
 * Main entry point
 */

export const APP_NAME = "funding-trace";
export const VERSION = "0.1.0";

// Entry point
export {
  AccountTracer,
  createAccountTracer,
  trace,
  resolveTraceOptions,
  validateTraceAddress,
  type AccountTracerConfig,
  type AmountInput,
  type PhaseCompleteEvent,
  type TraceCompleteEvent,
  type TraceOptions,
  type TracePhase,
} from "./services/account-tracer";
export {
  CLASSIFICATION_LABELS,
  exportTraceResult,
  formatClassification,
  type ClassificationLabel,
  type TraceReport,
} from "./services/trace-export";

// Data model and collaborators
export * from "./api/chain/types";
export {
  AMOUNT_DECIMALS,
  ONE_UNIT,
  formatAmount,
  formatUsd,
  parseAmount,
  percentOf,
  scaleTokenAmount,
  sumAmounts,
  toWholeUnits,
} from "./api/chain/amounts";
export {
  filterByDirection,
  normalizeTokenTransfer,
  sortTransfers,
  type TokenTransferRow,
  type TransferDirection,
} from "./api/chain/transfers";
export {
  AddressRegistry,
  KNOWN_ADDRESSES,
  createAddressRegistry,
  getSharedAddressRegistry,
  isTerminalCategory,
  resetSharedAddressRegistry,
  setSharedAddressRegistry,
  type RegistryCategory,
  type RegistryEntry,
  type RegistryTable,
} from "./api/chain/address-registry";
export { resolveMembership } from "./api/chain/membership";
export {
  RELAY_ADDRESSES,
  RELAY_CHAIN_NAMES,
  createRelayDecoder,
  decodeBridgeTransfers,
  getChainName,
  isRelayAddress,
  parseRelayRequest,
  type RelayRequestFetcher,
} from "./api/bridge/relay-decoder";

// Components
export { FundingGraphBuilder, buildIncoming, buildOutgoing, isFreshWallet } from "./detection/funding-graph";
export { OriginTracer, traceOrigin, type OriginTraceSummary } from "./detection/origin-tracer";
export { SiblingDetector, findSiblings } from "./detection/sibling-detector";
export { OutboundAnalyzer, findFunded, type OutboundSummary } from "./detection/outbound-analyzer";
export { summarizeActivity } from "./detection/trading-behavior";
export {
  CLASSIFIER_THRESHOLDS,
  classify,
  generateSignals,
  summarizeResult,
  type ClassifierInput,
  type TraceSummary,
} from "./detection/trace-classifier";

// Utilities
export { runPool, type PoolOutcome, type WorkerPoolOptions } from "./utils/worker-pool";
export { createLogger, logger, type Logger, type LogLevel } from "./utils/logger";
