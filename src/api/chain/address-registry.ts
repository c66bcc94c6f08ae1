/**
 * Address Registry
 *
 * Static classification of addresses into exchanges, bridges, swap venues,
 * known entities and protocol contracts. Lookups are case-insensitive and
 * never touch the network; deployments inject their own table.
 */

import knownAddresses from "./known-addresses.json";
import type { AddressCategory, AddressInfo, TerminalCategory } from "./types";

// ============================================================================
// Types
// ============================================================================

/**
 * Category a static table entry may carry.
 * fresh_wallet and unknown are derived, never stored.
 */
export type RegistryCategory = Exclude<AddressCategory, "fresh_wallet" | "unknown">;

/**
 * One entry of the static table
 */
export interface RegistryEntry {
  label: string;
  category: RegistryCategory;
}

/**
 * Table keyed by address (any case)
 */
export type RegistryTable = Record<string, RegistryEntry>;

// ============================================================================
// Constants
// ============================================================================

const REGISTRY_CATEGORIES: readonly RegistryCategory[] = [
  "exchange",
  "bridge",
  "swap",
  "entity",
  "protocol",
];

const TERMINAL_CATEGORIES: ReadonlySet<AddressCategory> = new Set<TerminalCategory>([
  "exchange",
  "bridge",
  "swap",
  "protocol",
]);

/**
 * Whether backward tracing stops at this category
 */
export function isTerminalCategory(category: AddressCategory): category is TerminalCategory {
  return TERMINAL_CATEGORIES.has(category);
}

function isRegistryCategory(value: string): value is RegistryCategory {
  return REGISTRY_CATEGORIES.some((category) => category === value);
}

/**
 * Validate the bundled table; JSON gives us strings, not categories
 */
function loadBundledTable(raw: Record<string, { label: string; category: string }>): RegistryTable {
  const table: RegistryTable = {};
  for (const [address, entry] of Object.entries(raw)) {
    if (!isRegistryCategory(entry.category)) {
      throw new Error(`Unknown category "${entry.category}" for ${address}`);
    }
    table[address] = { label: entry.label, category: entry.category };
  }
  return table;
}

/**
 * Default table: exchange hot wallets, bridges, swap routers and the
 * platform's settlement and token contracts on Polygon
 */
export const KNOWN_ADDRESSES: Readonly<RegistryTable> = loadBundledTable(knownAddresses);

// ============================================================================
// AddressRegistry Class
// ============================================================================

export class AddressRegistry {
  private readonly entries: Map<string, RegistryEntry>;

  constructor(table: RegistryTable = KNOWN_ADDRESSES) {
    this.entries = new Map();
    for (const [address, entry] of Object.entries(table)) {
      this.entries.set(address.toLowerCase(), entry);
    }
  }

  /**
   * Classify an address. Total: unknown addresses get category "unknown".
   */
  classify(address: string): AddressInfo {
    const lower = address.toLowerCase();
    const entry = this.entries.get(lower);
    return {
      address: lower,
      label: entry?.label ?? null,
      category: entry?.category ?? "unknown",
    };
  }

  getLabel(address: string): string | null {
    return this.entries.get(address.toLowerCase())?.label ?? null;
  }

  isProtocolContract(address: string): boolean {
    return this.entries.get(address.toLowerCase())?.category === "protocol";
  }

  isBridge(address: string): boolean {
    return this.entries.get(address.toLowerCase())?.category === "bridge";
  }

  isTerminal(address: string): boolean {
    return isTerminalCategory(this.classify(address).category);
  }

  /**
   * New registry with extra (or overriding) entries
   */
  extend(table: RegistryTable): AddressRegistry {
    const merged: RegistryTable = {};
    for (const [address, entry] of this.entries) {
      merged[address] = entry;
    }
    for (const [address, entry] of Object.entries(table)) {
      merged[address.toLowerCase()] = entry;
    }
    return new AddressRegistry(merged);
  }

  /**
   * Addresses of one category, in table order
   */
  addressesOf(category: RegistryCategory): string[] {
    const result: string[] = [];
    for (const [address, entry] of this.entries) {
      if (entry.category === category) result.push(address);
    }
    return result;
  }

  get size(): number {
    return this.entries.size;
  }
}

// ============================================================================
// Singleton Management
// ============================================================================

let sharedRegistry: AddressRegistry | null = null;

export function createAddressRegistry(table?: RegistryTable): AddressRegistry {
  return new AddressRegistry(table);
}

/**
 * Registry used when a component is not given one
 */
export function getSharedAddressRegistry(): AddressRegistry {
  if (!sharedRegistry) {
    sharedRegistry = new AddressRegistry();
  }
  return sharedRegistry;
}

export function setSharedAddressRegistry(registry: AddressRegistry): void {
  sharedRegistry = registry;
}

export function resetSharedAddressRegistry(): void {
  sharedRegistry = null;
}
