/**
 * Batched platform membership checks
 */

import { runPool, type WorkerPoolOptions } from "../../utils/worker-pool";
import { serviceLoggers } from "../../utils/logger";
import type { MembershipOracle } from "./types";

/** Membership checks in flight at once */
export const MEMBERSHIP_CONCURRENCY = 5;

/** Pause after each membership check */
export const MEMBERSHIP_DELAY_MS = 100;

/**
 * Resolve membership for a batch of addresses through the bounded pool.
 *
 * The returned map only holds addresses whose check completed; a failed
 * check leaves its address unresolved.
 */
export async function resolveMembership(
  addresses: readonly string[],
  oracle: MembershipOracle,
  options: WorkerPoolOptions = {}
): Promise<Map<string, boolean>> {
  const log = options.logger ?? serviceLoggers.workerPool;
  const outcomes = await runPool(addresses, (address) => oracle.isMember(address), {
    ...options,
    concurrency: options.concurrency ?? MEMBERSHIP_CONCURRENCY,
    delayMs: options.delayMs ?? MEMBERSHIP_DELAY_MS,
  });

  const resolved = new Map<string, boolean>();
  for (const [address, outcome] of outcomes) {
    if (outcome.ok) {
      resolved.set(address, outcome.value);
    } else {
      log.warn("Membership check failed", { address, error: outcome.error.message });
    }
  }
  return resolved;
}
