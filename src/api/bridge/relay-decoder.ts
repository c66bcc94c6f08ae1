/**
 * Relay bridge decoding
 *
 * Turns Relay `requests/v2` responses into BridgeOrigin records and decodes
 * the bridge deliveries a wallet received through a bounded pool. Fetching
 * the response is left to the host: createRelayDecoder wraps whatever
 * request function it is given.
 */

import { isAddress } from "viem";

import { scaleTokenAmount } from "../chain/amounts";
import type {
  BridgeDecoder,
  BridgeOrigin,
  DecodedBridgeTransfer,
  FundingSource,
} from "../chain/types";
import { serviceLoggers, type Logger } from "../../utils/logger";
import { runPool, type WorkerPoolOptions } from "../../utils/worker-pool";

// ============================================================================
// Constants
// ============================================================================

/**
 * EVM chains Relay delivers from
 */
export const RELAY_CHAIN_NAMES: Readonly<Record<number, string>> = {
  1: "Ethereum",
  10: "Optimism",
  56: "BNB Chain",
  137: "Polygon",
  250: "Fantom",
  324: "zkSync Era",
  8453: "Base",
  42161: "Arbitrum",
  43114: "Avalanche",
  59144: "Linea",
  81457: "Blast",
  534352: "Scroll",
};

/** Relay contracts that deliver bridged funds on Polygon */
export const RELAY_ADDRESSES: ReadonlySet<string> = new Set([
  "0x0000000000a39bb272e79075ade125fd351887ac",
  "0xf70da97812cb96acdf810712aa562db8dfa3dbef",
]);

export function isRelayAddress(address: string): boolean {
  return RELAY_ADDRESSES.has(address.toLowerCase());
}

/** Chain the deliveries land on when the response omits it */
export const DEFAULT_DESTINATION_CHAIN_ID = 137;

/** Relay reports stablecoin amounts with 6 decimals */
const RELAY_AMOUNT_DECIMALS = 6;

export const BRIDGE_CONCURRENCY = 3;
export const BRIDGE_DELAY_MS = 200;
export const DEFAULT_MAX_BRIDGE_DECODES = 10;

// ============================================================================
// Parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(...candidates: unknown[]): string {
  for (const candidate of candidates) {
    if (typeof candidate === "string" && candidate.length > 0) {
      return candidate;
    }
  }
  return "";
}

export function getChainName(chainId: number): string {
  return RELAY_CHAIN_NAMES[chainId] ?? `Chain ${chainId}`;
}

/**
 * Whether `value` is a 0x-prefixed 20-byte hex address.
 * Solana and other non-EVM origins fail this check.
 */
export function isEvmAddress(value: string): boolean {
  return isAddress(value.trim().toLowerCase());
}

function parseInAmount(raw: unknown): bigint {
  const text = typeof raw === "number" && Number.isSafeInteger(raw) ? String(raw) : raw;
  if (typeof text !== "string" || !/^\d+$/.test(text)) {
    return 0n;
  }
  return scaleTokenAmount(BigInt(text), RELAY_AMOUNT_DECIMALS);
}

function parseCreatedAt(raw: unknown): number | null {
  if (typeof raw !== "string") return null;
  const ms = Date.parse(raw);
  return Number.isNaN(ms) ? null : Math.floor(ms / 1000);
}

/**
 * Pick the request out of a response: `{ requests: [...] }` or a bare request
 */
function firstRequest(payload: unknown): Record<string, unknown> | null {
  if (!isRecord(payload)) return null;

  const requests = payload.requests;
  if (Array.isArray(requests) && requests.length > 0) {
    const first: unknown = requests[0];
    return isRecord(first) ? first : null;
  }
  return "originChainId" in payload ? payload : null;
}

/**
 * Parse a Relay response for the delivery `txHash`.
 * Returns null for unknown origin chains, non-EVM origin addresses and
 * payloads that carry no request.
 */
export function parseRelayRequest(payload: unknown, txHash: string): BridgeOrigin | null {
  const request = firstRequest(payload);
  if (!request) {
    return null;
  }

  const originChainId = request.originChainId;
  if (typeof originChainId !== "number" || RELAY_CHAIN_NAMES[originChainId] === undefined) {
    return null;
  }

  const destinationChainId =
    typeof request.destinationChainId === "number" ? request.destinationChainId : DEFAULT_DESTINATION_CHAIN_ID;
  const data = isRecord(request.data) ? request.data : {};

  const originAddress = stringField(data.user, request.user).trim();
  if (!isEvmAddress(originAddress)) {
    return null;
  }

  const destinationAddress = stringField(data.recipient, request.recipient);
  const inTxHashes = Array.isArray(request.inTxHashes) ? request.inTxHashes : [];
  const originTxHash: unknown = inTxHashes[0];
  const inAmount = data.inAmount || request.inAmount;

  return {
    originChainId,
    originChainName: getChainName(originChainId),
    originAddress: originAddress.toLowerCase(),
    originTxHash: typeof originTxHash === "string" ? originTxHash : null,
    amount: parseInAmount(inAmount),
    tokenSymbol: "USDC",
    timestamp: parseCreatedAt(request.createdAt),
    destinationChainId,
    destinationChainName: getChainName(destinationChainId),
    destinationAddress: destinationAddress.toLowerCase(),
    destinationTxHash: txHash,
    status: stringField(request.status) || "unknown",
  };
}

// ============================================================================
// Decoder
// ============================================================================

/**
 * Fetches the raw Relay response for a delivery hash; null when not found
 */
export type RelayRequestFetcher = (txHash: string) => Promise<unknown>;

/**
 * BridgeDecoder over a host-supplied fetcher
 */
export function createRelayDecoder(fetchRequest: RelayRequestFetcher): BridgeDecoder {
  return {
    async decode(txHash: string): Promise<BridgeOrigin | null> {
      const payload = await fetchRequest(txHash);
      return payload == null ? null : parseRelayRequest(payload, txHash);
    },
  };
}

// ============================================================================
// Batch decoding
// ============================================================================

export interface DecodeBridgeTransfersOptions {
  /** Hashes decoded per trace (default: 10) */
  maxDecodes?: number;

  /** Pool settings (default: 3 in flight, 200 ms pause) */
  pool?: WorkerPoolOptions;

  logger?: Logger;
}

/**
 * Decode the deliveries received from Relay sources. Other bridges are
 * not looked up. Hashes are taken in source order, then transfer order. Undecodable or
 * failed hashes are left out.
 */
export async function decodeBridgeTransfers(
  sources: readonly FundingSource[],
  decoder: BridgeDecoder,
  options: DecodeBridgeTransfersOptions = {}
): Promise<DecodedBridgeTransfer[]> {
  const log = options.logger ?? serviceLoggers.bridgeDecoder;
  const maxDecodes = Math.max(0, Math.floor(options.maxDecodes ?? DEFAULT_MAX_BRIDGE_DECODES));

  const owners = new Map<string, string>();
  for (const source of sources) {
    if (source.category !== "bridge" || !isRelayAddress(source.address)) continue;
    for (const transfer of source.transfers) {
      if (!owners.has(transfer.txHash)) {
        owners.set(transfer.txHash, source.address);
      }
    }
  }

  const hashes = Array.from(owners.keys()).slice(0, maxDecodes);
  if (hashes.length === 0) {
    return [];
  }

  const outcomes = await runPool(hashes, (hash) => decoder.decode(hash), {
    logger: log,
    ...options.pool,
    concurrency: options.pool?.concurrency ?? BRIDGE_CONCURRENCY,
    delayMs: options.pool?.delayMs ?? BRIDGE_DELAY_MS,
  });

  const decoded: DecodedBridgeTransfer[] = [];
  for (const hash of hashes) {
    const outcome = outcomes.get(hash);
    const sourceAddress = owners.get(hash);
    if (!outcome || sourceAddress === undefined) continue;

    if (!outcome.ok) {
      log.warn("Bridge decode failed", { txHash: hash, error: outcome.error.message });
      continue;
    }
    if (outcome.value) {
      decoded.push({ sourceAddress, txHash: hash, origin: outcome.value });
    }
  }

  log.debug("Bridge decoding complete", { requested: hashes.length, decoded: decoded.length });
  return decoded;
}
