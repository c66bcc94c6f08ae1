/**
 * Trace Export Tests
 */

import { describe, it, expect } from "vitest";
import {
  CLASSIFICATION_LABELS,
  exportTraceResult,
  formatClassification,
} from "../../src/services/trace-export";
import type { TraceResult } from "../../src/api/chain/types";
import { BASE_TIME, addr, bridgeOrigin, position, units } from "../fixtures/fakes";

const RELAY = "0x0000000000a39bb272e79075ade125fd351887ac";
const BINANCE = "0x28c6c06298d514db089934071355e5743bf21d60";

function result(overrides: Partial<TraceResult> = {}): TraceResult {
  return {
    address: addr(1),
    isMember: true,
    fundingSources: [],
    totalFunded: 0n,
    firstFundedAt: null,
    siblings: [],
    fundedAccounts: [],
    fundedMemberAccounts: [],
    totalSentToOthers: 0n,
    originChains: [],
    ultimateOrigins: [],
    bridgeOrigins: [],
    trading: null,
    portfolio: null,
    positions: [],
    signals: [],
    classification: "retail",
    ...overrides,
  };
}

const member = {
  address: addr(0xb),
  totalReceived: units("250.5"),
  sharedFunders: [addr(0xa)],
  transfers: [],
  isMember: true,
};

describe("formatClassification", () => {
  it("should render icon and text", () => {
    expect(formatClassification("retail")).toBe("✅ Likely Retail");
    expect(formatClassification("inconclusive")).toBe("❓ Inconclusive - Manual Review Needed");
  });

  it("should count linked accounts for coordinated wallets", () => {
    const funded = {
      address: addr(0xc),
      label: null,
      category: "unknown" as const,
      totalSent: units(10),
      transferCount: 1,
      firstSeen: BASE_TIME,
      transfers: [],
      isMember: true,
    };
    const linked = result({ siblings: [member, { ...member, isMember: null }], fundedMemberAccounts: [funded, funded] });

    expect(formatClassification("coordinated", linked)).toBe("🚨 Likely Coordinated (Multi-Account) - 3 linked accounts");
    expect(formatClassification("funds_members", linked)).toBe(
      "⚠️ Funds 2 Other Platform Account(s) - Check for Coordination"
    );
  });

  it("should label every classification", () => {
    expect(Object.keys(CLASSIFICATION_LABELS)).toHaveLength(10);
  });
});

describe("exportTraceResult", () => {
  it("should render amounts as decimal strings and times as ISO-8601", () => {
    const report = exportTraceResult(
      result({
        fundingSources: [
          {
            address: RELAY,
            label: "Relay.link",
            category: "bridge",
            totalAmount: units("1500.25"),
            transferCount: 2,
            firstSeen: BASE_TIME,
            lastSeen: BASE_TIME,
            transfers: [],
            isBridge: true,
            walletInfo: null,
          },
        ],
        totalFunded: units("1500.25"),
        firstFundedAt: BASE_TIME,
        bridgeOrigins: [{ sourceAddress: RELAY, txHash: "0x01", origin: bridgeOrigin({ destinationTxHash: "0x01" }) }],
        siblings: [member],
        signals: ["Bridge funding: $1,500 (100%)"],
        classification: "cross_chain_review",
      })
    );

    expect(report.classificationLabel).toBe("⚠️ Cross-chain Funder - Review Needed");
    expect(report.funding).toEqual({
      totalFunded: "1500.25",
      firstFundingDate: "2024-01-01T00:00:00.000Z",
      sources: [
        {
          address: RELAY,
          amount: "1500.25",
          category: "bridge",
          label: "Relay.link",
          isBridge: true,
          transferCount: 2,
          bridgeOrigins: [{ chain: "Base", address: addr(0xb0b), amount: "1000" }],
        },
      ],
    });
    expect(report.siblings).toEqual({
      count: 1,
      accounts: [{ address: addr(0xb), funded: "250.5", sharedFunders: [addr(0xa)] }],
    });
    expect(report.signals).toEqual(["Bridge funding: $1,500 (100%)"]);
  });

  it("should summarize origin chains", () => {
    const hop = {
      from: BINANCE,
      to: addr(2),
      amount: units(500),
      timestamp: BASE_TIME,
      txHash: "0x01",
      fromCategory: "exchange" as const,
      fromLabel: "Binance",
    };
    const report = exportTraceResult(
      result({
        originChains: [{ start: addr(2), hops: [hop], depth: 1, origin: hop, stopReason: "terminal_category" }],
        ultimateOrigins: [BINANCE],
      })
    );

    expect(report.originTracing).toEqual({
      ultimateOrigins: [BINANCE],
      chains: [
        {
          depth: 1,
          stopReason: "terminal_category",
          origin: { address: BINANCE, category: "exchange", label: "Binance" },
        },
      ],
    });
  });

  it("should list open positions", () => {
    const report = exportTraceResult(result({ positions: [position({ size: 40, value: 22.5 })] }));

    expect(report.positions).toEqual([
      {
        market: "Will it rain tomorrow?",
        outcome: "Yes",
        size: 40,
        avgPrice: 0.4,
        currentPrice: 0.5,
        value: 22.5,
        unrealizedPnl: 10,
      },
    ]);
    expect(exportTraceResult(result()).positions).toEqual([]);
  });

  it("should produce JSON-serializable output", () => {
    const report = exportTraceResult(result({ totalFunded: units(42) }));
    expect(JSON.parse(JSON.stringify(report))).toMatchObject({ funding: { totalFunded: "42" }, trading: null });
  });
});
