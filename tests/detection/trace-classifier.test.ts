/**
 * Classification Engine Tests
 */

import { describe, it, expect } from "vitest";
import {
  classify,
  generateSignals,
  summarizeResult,
  type ClassifierInput,
} from "../../src/detection/trace-classifier";
import { sumAmounts } from "../../src/api/chain/amounts";
import type {
  AddressCategory,
  FundedAccount,
  FundingChain,
  FundingSource,
  SiblingCandidate,
  TradingBehavior,
} from "../../src/api/chain/types";
import { BASE_TIME, addr, bridgeOrigin, units } from "../fixtures/fakes";

const BINANCE = "0x28c6c06298d514db089934071355e5743bf21d60";
const RELAY = "0x0000000000a39bb272e79075ade125fd351887ac";

function source(address: string, category: AddressCategory, amount: string | number): FundingSource {
  return {
    address,
    label: null,
    category,
    totalAmount: units(amount),
    transferCount: 1,
    firstSeen: BASE_TIME,
    lastSeen: BASE_TIME,
    transfers: [],
    isBridge: category === "bridge",
    walletInfo: null,
  };
}

function sibling(n: number): SiblingCandidate {
  return { address: addr(0x100 + n), totalReceived: units(100), sharedFunders: [addr(2)], transfers: [], isMember: true };
}

function fundedMember(n: number): FundedAccount {
  return {
    address: addr(0x200 + n),
    label: null,
    category: "unknown",
    totalSent: units(100),
    transferCount: 1,
    firstSeen: BASE_TIME,
    transfers: [],
    isMember: true,
  };
}

function trading(overrides: Partial<TradingBehavior>): TradingBehavior {
  return {
    totalTrades: 20,
    marketsTraded: 4,
    uniqueOutcomes: 2,
    firstTradeAt: BASE_TIME,
    lastTradeAt: BASE_TIME,
    accountAgeDays: 60,
    ...overrides,
  };
}

function exchangeChain(): FundingChain {
  const hop = {
    from: BINANCE,
    to: addr(2),
    amount: units(500),
    timestamp: BASE_TIME,
    txHash: "0x01",
    fromCategory: "exchange" as const,
    fromLabel: "Binance",
  };
  return { start: addr(2), hops: [hop], depth: 1, origin: hop, stopReason: "terminal_category" };
}

function input(overrides: Partial<ClassifierInput> = {}): ClassifierInput {
  const fundingSources = overrides.fundingSources ?? [];
  return {
    fundingSources,
    totalFunded: sumAmounts(fundingSources.map((s) => s.totalAmount)),
    siblings: [],
    fundedMemberAccounts: [],
    originChains: [],
    bridgeOrigins: [],
    trading: null,
    portfolio: null,
    ...overrides,
  };
}

describe("classify", () => {
  it("should put coordination ahead of bridge funding", () => {
    const result = input({
      fundingSources: [source(RELAY, "bridge", 20000)],
      siblings: [1, 2, 3, 4].map(sibling),
      trading: trading({ marketsTraded: 1 }),
    });
    expect(classify(result)).toBe("coordinated");
  });

  it("should count siblings and funded members together", () => {
    expect(classify(input({ siblings: [sibling(1), sibling(2)], fundedMemberAccounts: [fundedMember(1)] }))).toBe(
      "coordinated"
    );
  });

  it("should separate concentrated bridge funding from other bridge funding", () => {
    const bridged = [source(RELAY, "bridge", 20000)];
    expect(classify(input({ fundingSources: bridged, trading: trading({ marketsTraded: 2 }) }))).toBe(
      "sophisticated_concentrated"
    );
    expect(classify(input({ fundingSources: bridged }))).toBe("cross_chain_review");
    expect(
      classify(input({ fundingSources: [source(RELAY, "bridge", 9000)], trading: trading({ marketsTraded: 2 }) }))
    ).toBe("cross_chain_review");
  });

  it("should flag fresh accounts with large funding", () => {
    const result = input({
      fundingSources: [source(BINANCE, "exchange", 6000)],
      trading: trading({ accountAgeDays: 5 }),
    });
    expect(classify(result)).toBe("fresh_large_funding");
  });

  it("should flag a single large bet", () => {
    const result = input({
      fundingSources: [source(BINANCE, "exchange", 3000)],
      trading: trading({ totalTrades: 3, marketsTraded: 1 }),
    });
    expect(classify(result)).toBe("single_bet");
  });

  it("should flag wallets that fund other members", () => {
    expect(classify(input({ fundedMemberAccounts: [fundedMember(1)] }))).toBe("funds_members");
  });

  it("should flag a few linked accounts", () => {
    expect(classify(input({ siblings: [sibling(1)] }))).toBe("some_linked");
    expect(classify(input({ siblings: [sibling(1), sibling(2)] }))).toBe("some_linked");
  });

  it("should fall back to retail", () => {
    expect(classify(input({ trading: trading({ marketsTraded: 5 }) }))).toBe("retail_diversified");
    expect(classify(input())).toBe("retail");
  });

  it("should ignore siblings that are not confirmed members", () => {
    const unresolved = { ...sibling(1), isMember: null };
    expect(classify(input({ siblings: [unresolved, unresolved, unresolved] }))).toBe("retail");
  });
});

describe("generateSignals", () => {
  it("should emit findings in a fixed order", () => {
    const result = input({
      fundingSources: [
        source(RELAY, "bridge", 3000),
        source(BINANCE, "exchange", 5000),
        source(addr(3), "fresh_wallet", 1000),
        source(addr(4), "fresh_wallet", 1000),
      ],
      bridgeOrigins: [{ sourceAddress: RELAY, txHash: "0x01", origin: bridgeOrigin({ destinationTxHash: "0x01" }) }],
      siblings: [sibling(1)],
      fundedMemberAccounts: [fundedMember(1), fundedMember(2)],
      trading: trading({ accountAgeDays: 3, marketsTraded: 1, totalTrades: 4 }),
      portfolio: {
        totalValue: 60000,
        unrealizedPnl: 0,
        realizedPnl: 0,
        winRate: 75,
        positionsCount: 1,
        totalTrades: 4,
        marketsTraded: 1,
        volumeTraded: 0,
      },
    });

    expect(generateSignals(result)).toEqual([
      "Very fresh account (3 days old)",
      "Bridge funding: $3,000 (30%)",
      "Decoded 1 cross-chain origin(s)",
      "Exchange funding: $5,000",
      "1 other platform account from same funder",
      "Funded 2 other platform account(s)",
      "Single market focus",
      "Low activity: 4 trades",
      "Large portfolio: $60,000",
      "High win rate: 75%",
      "Significant funding: $10,000",
      "Multiple funding sources: 3 wallets",
      "Funded by 2 fresh wallet(s)",
    ]);
  });

  it("should report traced exchange origins and heavy activity", () => {
    const result = input({
      fundingSources: [source(addr(2), "unknown", 150000)],
      originChains: [exchangeChain()],
      siblings: [1, 2, 3, 4, 5].map(sibling),
      trading: trading({ accountAgeDays: 10, marketsTraded: 3, totalTrades: 150 }),
      portfolio: {
        totalValue: 100,
        unrealizedPnl: 0,
        realizedPnl: 0,
        winRate: 20,
        positionsCount: 1,
        totalTrades: 12,
        marketsTraded: 3,
        volumeTraded: 0,
      },
    });

    expect(generateSignals(result)).toEqual([
      "New account (10 days old)",
      "Origin traced to exchange",
      "HIGH: 5 other platform accounts from same funder",
      "Concentrated: 3 markets",
      "High activity: 150+ trades",
      "Low win rate: 20%",
      "Whale funding: $150,000",
    ]);
  });

  it("should grade sibling counts and funding size", () => {
    const medium = generateSignals(
      input({ fundingSources: [source(addr(2), "unknown", 60000)], siblings: [sibling(1), sibling(2)] })
    );
    expect(medium).toEqual(["MEDIUM: 2 other platform accounts from same funder", "Large funding: $60,000"]);
  });

  it("should return the same findings and classification on every run", () => {
    const fundingSources = [
      source(RELAY, "bridge", 8000),
      source(addr(3), "fresh_wallet", 1500),
      source(addr(4), "unknown", 700),
      source(BINANCE, "exchange", 2000),
    ];
    const siblings = [sibling(1), sibling(2)];
    const first = input({ fundingSources, siblings, trading: trading({ marketsTraded: 2, accountAgeDays: 5 }) });
    const reordered = input({
      fundingSources: [...fundingSources].reverse(),
      siblings: [...siblings].reverse(),
      trading: trading({ marketsTraded: 2, accountAgeDays: 5 }),
    });

    const signals = generateSignals(first);
    expect(generateSignals(first)).toEqual(signals);
    expect(generateSignals(reordered)).toEqual(signals);
    expect(classify(first)).toBe("sophisticated_concentrated");
    expect(classify(first)).toBe(classify(reordered));
  });

  it("should emit no market signal when activity names no market", () => {
    const signals = generateSignals(input({ trading: trading({ marketsTraded: 0, totalTrades: 12, accountAgeDays: 90 }) }));
    expect(signals).toEqual([]);
  });

  it("should emit nothing for an empty trace", () => {
    expect(generateSignals(input())).toEqual([]);
  });
});

describe("summarizeResult", () => {
  it("should leave bridges, protocol and swap venues out of wallet sources", () => {
    const summary = summarizeResult(
      input({
        fundingSources: [
          source(RELAY, "bridge", 10),
          source(addr(5), "protocol", 10),
          source(addr(6), "swap", 10),
          source(addr(7), "unknown", 10),
          source(addr(8), "entity", 10),
        ],
      })
    );
    expect(summary.walletSources).toBe(2);
    expect(summary.bridgeAmount).toBe(units(10));
    expect(summary.hasBridgeFunding).toBe(true);
  });
});
