/**
 * Bounded worker pool
 *
 * Runs independent lookups against rate-limited collaborators with a cap on
 * in-flight work and a fixed pause after each unit. Every unit settles on its
 * own: a failure is recorded against its key and never aborts the others.
 */

import { TraceError, toError } from "../api/chain/types";
import { serviceLoggers, type Logger } from "./logger";

// ============================================================================
// Types
// ============================================================================

export interface WorkerPoolOptions {
  /** Maximum units in flight (default: 5) */
  concurrency?: number;

  /** Pause after each unit, in milliseconds (default: 100) */
  delayMs?: number;

  /** Stops dispatching new units once aborted */
  signal?: AbortSignal;

  logger?: Logger;
}

/**
 * Settled result of one unit of work
 */
export type PoolOutcome<R> =
  | { ok: true; value: R }
  | { ok: false; error: Error };

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_POOL_CONCURRENCY = 5;
export const DEFAULT_POOL_DELAY_MS = 100;

// ============================================================================
// Pool
// ============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function abortError(): TraceError {
  return new TraceError("Trace aborted by caller", "TRACE_ABORTED");
}

/**
 * Run `worker` over `items` with bounded concurrency.
 *
 * Outcomes are keyed by item, so completion order does not matter. Duplicate
 * items are processed once. Rejects with TRACE_ABORTED if the signal fires.
 */
export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T) => Promise<R>,
  options: WorkerPoolOptions = {}
): Promise<Map<T, PoolOutcome<R>>> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_POOL_CONCURRENCY));
  const delayMs = Math.max(0, options.delayMs ?? DEFAULT_POOL_DELAY_MS);
  const { signal } = options;
  const log = options.logger ?? serviceLoggers.workerPool;

  const queue = [...new Set(items)];
  const outcomes = new Map<T, PoolOutcome<R>>();

  if (signal?.aborted) {
    throw abortError();
  }

  let next = 0;

  async function runLane(): Promise<void> {
    while (next < queue.length) {
      if (signal?.aborted) {
        return;
      }
      const index = next++;
      const item = queue[index];
      if (item === undefined) {
        continue;
      }

      try {
        outcomes.set(item, { ok: true, value: await worker(item) });
      } catch (error) {
        outcomes.set(item, { ok: false, error: toError(error) });
      }

      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }

  const lanes = Array.from({ length: Math.min(concurrency, queue.length) }, () => runLane());
  await Promise.all(lanes);

  if (signal?.aborted) {
    throw abortError();
  }

  const failed = [...outcomes.values()].filter((o) => !o.ok).length;
  log.debug("Pool drained", { units: queue.length, failed, concurrency });

  return outcomes;
}

/**
 * Values of the successful outcomes, keyed by item
 */
export function successfulValues<T, R>(outcomes: Map<T, PoolOutcome<R>>): Map<T, R> {
  const values = new Map<T, R>();
  for (const [item, outcome] of outcomes) {
    if (outcome.ok) {
      values.set(item, outcome.value);
    }
  }
  return values;
}

export { abortError as createAbortError };
