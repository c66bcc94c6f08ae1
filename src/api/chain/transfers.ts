/**
 * Token transfer normalization
 *
 * Helpers for LedgerProvider implementations: turn explorer `tokentx` rows
 * into Transfer records, order them, and split them by direction.
 */

import { isAddress } from "viem";

import { scaleTokenAmount } from "./amounts";
import { TraceError, type Transfer } from "./types";

// ============================================================================
// Types
// ============================================================================

/**
 * ERC-20 transfer row as returned by Etherscan-compatible explorers
 */
export interface TokenTransferRow {
  hash: string;
  from: string;
  to: string;
  value: string;
  tokenDecimal?: string;
  tokenSymbol?: string;
  timeStamp: string;
  blockNumber: string;
}

/**
 * Transfer direction relative to a wallet
 */
export type TransferDirection = "in" | "out";

const INTEGER_PATTERN = /^\d+$/;

// ============================================================================
// Normalization
// ============================================================================

/**
 * Convert an explorer row into a Transfer.
 *
 * The row's own tokenDecimal is used to scale the value; rows that do not
 * declare their decimals are rejected rather than guessed.
 */
export function normalizeTokenTransfer(
  row: TokenTransferRow,
  fallbackSymbol?: string
): Transfer {
  if (!isAddress(row.from.toLowerCase()) || !isAddress(row.to.toLowerCase())) {
    throw new TraceError(
      `Transfer ${row.hash} has a malformed counterparty`,
      "INVALID_TRANSFER",
      { context: { from: row.from, to: row.to } }
    );
  }

  if (row.tokenDecimal === undefined || !INTEGER_PATTERN.test(row.tokenDecimal)) {
    throw new TraceError(
      `Transfer ${row.hash} does not declare token decimals`,
      "INVALID_TRANSFER"
    );
  }

  if (!INTEGER_PATTERN.test(row.value)) {
    throw new TraceError(
      `Transfer ${row.hash} has a malformed value: ${row.value}`,
      "INVALID_TRANSFER"
    );
  }

  const timestamp = INTEGER_PATTERN.test(row.timeStamp) ? parseInt(row.timeStamp, 10) : NaN;
  if (Number.isNaN(timestamp) || !INTEGER_PATTERN.test(row.blockNumber)) {
    throw new TraceError(
      `Transfer ${row.hash} has a malformed timestamp or block number`,
      "INVALID_TRANSFER"
    );
  }

  return {
    txHash: row.hash,
    from: row.from.toLowerCase(),
    to: row.to.toLowerCase(),
    amount: scaleTokenAmount(BigInt(row.value), parseInt(row.tokenDecimal, 10)),
    tokenSymbol: row.tokenSymbol || fallbackSymbol || "UNKNOWN",
    timestamp,
    blockNumber: BigInt(row.blockNumber),
  };
}

/**
 * Order transfers ascending by timestamp, then block, then hash
 */
export function sortTransfers(transfers: readonly Transfer[]): Transfer[] {
  return [...transfers].sort((a, b) => {
    if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
    if (a.blockNumber !== b.blockNumber) return a.blockNumber < b.blockNumber ? -1 : 1;
    return a.txHash < b.txHash ? -1 : a.txHash > b.txHash ? 1 : 0;
  });
}

/**
 * Keep only the transfers flowing into or out of an address
 */
export function filterByDirection(
  transfers: readonly Transfer[],
  address: string,
  direction: TransferDirection
): Transfer[] {
  const lower = address.toLowerCase();
  return transfers.filter((t) =>
    direction === "in" ? t.to === lower : t.from === lower
  );
}
