import dotenv from "dotenv";

import { getSharedAddressRegistry, type AddressRegistry, type RegistryTable } from "../src/api/chain/address-registry";
import type { TraceOptions } from "../src/services/account-tracer";
import { logger } from "../src/utils/logger";

// Load environment variables from .env file
dotenv.config();

/**
 * Environment variable configuration with type safety and validation
 */

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Get a required environment variable
 */
function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get an environment variable as a non-negative integer
 */
function getEnvVarAsNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    throw new Error(`Environment variable ${key} must be a non-negative number, got: ${value}`);
  }
  return parsed;
}

/**
 * Get an environment variable as a boolean
 */
function getEnvVarAsBoolean(key: string, defaultValue?: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value.toLowerCase() === "true" || value === "1";
}

/**
 * Parse a comma-separated list of values
 */
function getEnvVarAsList(key: string, defaultValue?: string[]): string[] {
  const value = process.env[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    return [];
  }
  return value.split(",").map((item) => item.trim()).filter((item) => item !== "");
}

/**
 * Get a decimal token amount ("50", "0.5"), kept as a string so no
 * precision is lost before it reaches the amount parser
 */
function getEnvVarAsDecimal(key: string, defaultValue: string): string {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new Error(`Environment variable ${key} must be a decimal amount, got: ${value}`);
  }
  return trimmed;
}

/**
 * Read every setting from process.env
 */
export function loadEnv() {
  const nodeEnv = getEnvVar("NODE_ENV", "development");

  return {
    // Application
    NODE_ENV: nodeEnv,
    isDevelopment: nodeEnv === "development",
    isProduction: nodeEnv === "production",
    isTest: nodeEnv === "test",
    LOG_LEVEL: getEnvVar("LOG_LEVEL", nodeEnv === "production" ? "info" : "debug"),

    // Trace phases
    TRACE_DEEP: getEnvVarAsBoolean("TRACE_DEEP", true),
    TRACE_MAX_SIBLINGS: getEnvVarAsNumber("TRACE_MAX_SIBLINGS", 20),
    TRACE_ORIGIN: getEnvVarAsBoolean("TRACE_ORIGIN", true),
    TRACE_MAX_ORIGIN_HOPS: getEnvVarAsNumber("TRACE_MAX_ORIGIN_HOPS", 3),
    TRACE_CHECK_OUTBOUND: getEnvVarAsBoolean("TRACE_CHECK_OUTBOUND", true),
    TRACE_INCLUDE_ACTIVITY: getEnvVarAsBoolean("TRACE_INCLUDE_ACTIVITY", true),

    // Amount thresholds (token units)
    TRACE_MIN_AMOUNT: getEnvVarAsDecimal("TRACE_MIN_AMOUNT", "50"),
    TRACE_ORIGIN_SOURCE_MIN_AMOUNT: getEnvVarAsDecimal("TRACE_ORIGIN_SOURCE_MIN_AMOUNT", "100"),
    TRACE_OUTBOUND_MIN_AMOUNT: getEnvVarAsDecimal("TRACE_OUTBOUND_MIN_AMOUNT", "10"),
    FRESH_WALLET_AGE_DAYS: getEnvVarAsNumber("FRESH_WALLET_AGE_DAYS", 7),

    // Collaborator rate limits
    MEMBERSHIP_CONCURRENCY: getEnvVarAsNumber("MEMBERSHIP_CONCURRENCY", 5),
    MEMBERSHIP_DELAY_MS: getEnvVarAsNumber("MEMBERSHIP_DELAY_MS", 100),
    BRIDGE_CONCURRENCY: getEnvVarAsNumber("BRIDGE_CONCURRENCY", 3),
    BRIDGE_DELAY_MS: getEnvVarAsNumber("BRIDGE_DELAY_MS", 200),
    BRIDGE_MAX_DECODES: getEnvVarAsNumber("BRIDGE_MAX_DECODES", 10),

    // Extra registry entries, "address:label" pairs
    EXTRA_EXCHANGE_ADDRESSES: getEnvVarAsList("EXTRA_EXCHANGE_ADDRESSES", []),
  } as const;
}

/**
 * All environment configuration with validation
 */
export const env = loadEnv();

export type Env = ReturnType<typeof loadEnv>;

/**
 * Trace options derived from the environment
 */
export function getTraceOptionsFromEnv(source: Env = env): TraceOptions {
  return {
    deep: source.TRACE_DEEP,
    maxSiblings: source.TRACE_MAX_SIBLINGS,
    traceOrigin: source.TRACE_ORIGIN,
    maxOriginHops: source.TRACE_MAX_ORIGIN_HOPS,
    minTraceAmount: source.TRACE_MIN_AMOUNT,
    originSourceMinAmount: source.TRACE_ORIGIN_SOURCE_MIN_AMOUNT,
    checkOutbound: source.TRACE_CHECK_OUTBOUND,
    outboundMinAmount: source.TRACE_OUTBOUND_MIN_AMOUNT,
    freshWalletAgeDays: source.FRESH_WALLET_AGE_DAYS,
    includeActivity: source.TRACE_INCLUDE_ACTIVITY,
    maxBridgeDecodes: source.BRIDGE_MAX_DECODES,
    membershipConcurrency: source.MEMBERSHIP_CONCURRENCY,
    membershipDelayMs: source.MEMBERSHIP_DELAY_MS,
    bridgeConcurrency: source.BRIDGE_CONCURRENCY,
    bridgeDelayMs: source.BRIDGE_DELAY_MS,
  };
}

/**
 * Parse "address:label" pairs from EXTRA_EXCHANGE_ADDRESSES
 */
export function parseAddressLabels(entries: readonly string[]): Array<{ address: string; label: string }> {
  return entries.map((entry) => {
    const separator = entry.indexOf(":");
    const address = (separator === -1 ? entry : entry.slice(0, separator)).trim().toLowerCase();
    const label = separator === -1 ? "Exchange" : entry.slice(separator + 1).trim() || "Exchange";
    if (!/^0x[0-9a-f]{40}$/.test(address)) {
      throw new Error(`EXTRA_EXCHANGE_ADDRESSES entry is not an address: ${entry}`);
    }
    return { address, label };
  });
}

/**
 * Shared registry extended with the exchanges listed in the environment
 */
export function createRegistryFromEnv(source: Env = env): AddressRegistry {
  const extra: RegistryTable = {};
  for (const { address, label } of parseAddressLabels(source.EXTRA_EXCHANGE_ADDRESSES)) {
    extra[address] = { label, category: "exchange" };
  }
  return getSharedAddressRegistry().extend(extra);
}

/**
 * Log the effective configuration
 */
export function logConfig(source: Env = env): void {
  logger.info("Environment configuration", {
    NODE_ENV: source.NODE_ENV,
    LOG_LEVEL: source.LOG_LEVEL,
    TRACE_DEEP: source.TRACE_DEEP,
    TRACE_MAX_SIBLINGS: source.TRACE_MAX_SIBLINGS,
    TRACE_ORIGIN: source.TRACE_ORIGIN,
    TRACE_MAX_ORIGIN_HOPS: source.TRACE_MAX_ORIGIN_HOPS,
    TRACE_CHECK_OUTBOUND: source.TRACE_CHECK_OUTBOUND,
    TRACE_INCLUDE_ACTIVITY: source.TRACE_INCLUDE_ACTIVITY,
    TRACE_MIN_AMOUNT: source.TRACE_MIN_AMOUNT,
    TRACE_ORIGIN_SOURCE_MIN_AMOUNT: source.TRACE_ORIGIN_SOURCE_MIN_AMOUNT,
    TRACE_OUTBOUND_MIN_AMOUNT: source.TRACE_OUTBOUND_MIN_AMOUNT,
    FRESH_WALLET_AGE_DAYS: source.FRESH_WALLET_AGE_DAYS,
    MEMBERSHIP_CONCURRENCY: source.MEMBERSHIP_CONCURRENCY,
    MEMBERSHIP_DELAY_MS: source.MEMBERSHIP_DELAY_MS,
    BRIDGE_CONCURRENCY: source.BRIDGE_CONCURRENCY,
    BRIDGE_DELAY_MS: source.BRIDGE_DELAY_MS,
    BRIDGE_MAX_DECODES: source.BRIDGE_MAX_DECODES,
    EXTRA_EXCHANGE_ADDRESSES: `[${source.EXTRA_EXCHANGE_ADDRESSES.length} address(es)]`,
  });
}

/**
 * Validate that the environment is properly configured
 * Returns an object with validation results
 */
export function validateEnv(source: Env = env): {
  valid: boolean;
  errors: string[];
  warnings: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (source.MEMBERSHIP_CONCURRENCY === 0) {
    errors.push("MEMBERSHIP_CONCURRENCY must be at least 1");
  }
  if (source.BRIDGE_CONCURRENCY === 0) {
    errors.push("BRIDGE_CONCURRENCY must be at least 1");
  }

  try {
    parseAddressLabels(source.EXTRA_EXCHANGE_ADDRESSES);
  } catch (error) {
    errors.push(error instanceof Error ? error.message : String(error));
  }

  if (source.TRACE_MAX_ORIGIN_HOPS === 0 && source.TRACE_ORIGIN) {
    warnings.push("TRACE_MAX_ORIGIN_HOPS is 0 - origin chains will always be empty");
  }
  if (source.TRACE_DEEP && source.TRACE_MAX_SIBLINGS === 0) {
    warnings.push("TRACE_MAX_SIBLINGS is 0 - sibling detection will report nothing");
  }
  if (source.MEMBERSHIP_DELAY_MS === 0 || source.BRIDGE_DELAY_MS === 0) {
    warnings.push("A collaborator delay is 0 - third-party rate limits may be hit");
  }
  if (source.MEMBERSHIP_CONCURRENCY > 10) {
    warnings.push(`MEMBERSHIP_CONCURRENCY is ${source.MEMBERSHIP_CONCURRENCY} - third-party rate limits may be hit`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Log config and throw if critical errors are found
 */
export function initializeEnv(source: Env = env): void {
  if (!source.isTest) {
    logConfig(source);
  }

  const validation = validateEnv(source);

  for (const warning of validation.warnings) {
    logger.warn("Configuration warning", { warning });
  }

  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error("Configuration error", { error });
    }
    throw new Error(`Environment validation failed with ${validation.errors.length} error(s)`);
  }
}

// Export utility functions for testing
export const envUtils = {
  getEnvVar,
  getEnvVarAsNumber,
  getEnvVarAsBoolean,
  getEnvVarAsList,
  getEnvVarAsDecimal,
  parseAddressLabels,
};
