import { describe, it, expect } from "vitest";
import {
  createRelayDecoder,
  decodeBridgeTransfers,
  getChainName,
  isEvmAddress,
  isRelayAddress,
  parseRelayRequest,
} from "../../../src/api/bridge/relay-decoder";
import { buildIncoming } from "../../../src/detection/funding-graph";
import { createLogger } from "../../../src/utils/logger";
import { FakeBridgeDecoder, addr, bridgeOrigin, transfer, units } from "../../fixtures/fakes";

const silent = createLogger({ level: "fatal", prettyPrint: false });

const RELAY = "0x0000000000a39bb272e79075ade125fd351887ac";
const RELAY_EXECUTOR = "0xf70da97812cb96acdf810712aa562db8dfa3dbef";
const POLYGON_POS_BRIDGE = "0xa0c68c638235ee32657e8f720a23cec1bfc77c77";
const STARGATE = "0x45a01e4e04f14f7a4a6702c74187c5f6222033cd";
const BINANCE = "0x28c6c06298d514db089934071355e5743bf21d60";
const USER = "0xAbCdEf0123456789abcdef0123456789ABCDEF01";

function relayRequest(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    originChainId: 8453,
    destinationChainId: 137,
    status: "success",
    createdAt: "2024-01-01T00:00:00.000Z",
    inTxHashes: ["0xorigin"],
    data: { user: USER, recipient: addr(5), inAmount: "2500000" },
    ...overrides,
  };
}

describe("parseRelayRequest", () => {
  it("should parse the first request of a response", () => {
    expect(parseRelayRequest({ requests: [relayRequest()] }, "0xdest")).toEqual({
      originChainId: 8453,
      originChainName: "Base",
      originAddress: USER.toLowerCase(),
      originTxHash: "0xorigin",
      amount: units("2.5"),
      tokenSymbol: "USDC",
      timestamp: 1704067200,
      destinationChainId: 137,
      destinationChainName: "Polygon",
      destinationAddress: addr(5),
      destinationTxHash: "0xdest",
      status: "success",
    });
  });

  it("should accept a bare request object", () => {
    expect(parseRelayRequest(relayRequest({ originChainId: 42161 }), "0xdest")?.originChainName).toBe("Arbitrum");
  });

  it("should fall back to top-level fields and defaults", () => {
    const origin = parseRelayRequest(
      {
        requests: [
          {
            originChainId: 1,
            user: USER,
            inAmount: 1_000_000,
          },
        ],
      },
      "0xdest"
    );

    expect(origin).toMatchObject({
      originChainName: "Ethereum",
      amount: units(1),
      destinationChainId: 137,
      originTxHash: null,
      timestamp: null,
      status: "unknown",
    });
  });

  it("should reject unknown chains and non-EVM origins", () => {
    expect(parseRelayRequest(relayRequest({ originChainId: 792703809 }), "0xdest")).toBeNull();
    expect(
      parseRelayRequest(relayRequest({ data: { user: "7xKXtg2CW87d97TXJSDpbD5jBkheTqA83TZRuJosgAsU" } }), "0xdest")
    ).toBeNull();
  });

  it("should reject payloads without a request", () => {
    expect(parseRelayRequest({ requests: [] }, "0xdest")).toBeNull();
    expect(parseRelayRequest("not json", "0xdest")).toBeNull();
    expect(parseRelayRequest(null, "0xdest")).toBeNull();
  });

  it("should yield a zero amount for malformed inAmount", () => {
    expect(parseRelayRequest(relayRequest({ data: { user: USER, inAmount: "12.5" } }), "0xdest")?.amount).toBe(0n);
  });
});

describe("helpers", () => {
  it("should name unknown chains by id", () => {
    expect(getChainName(10)).toBe("Optimism");
    expect(getChainName(999)).toBe("Chain 999");
  });

  it("should recognise Relay contracts in any case", () => {
    expect(isRelayAddress(RELAY.toUpperCase().replace("0X", "0x"))).toBe(true);
    expect(isRelayAddress(POLYGON_POS_BRIDGE)).toBe(false);
  });

  it("should validate EVM addresses", () => {
    expect(isEvmAddress(USER)).toBe(true);
    expect(isEvmAddress("0x123")).toBe(false);
  });
});

describe("createRelayDecoder", () => {
  it("should parse what the fetcher returns", async () => {
    const seen: string[] = [];
    const decoder = createRelayDecoder(async (hash) => {
      seen.push(hash);
      return hash === "0xknown" ? { requests: [relayRequest()] } : null;
    });

    expect((await decoder.decode("0xknown"))?.originChainId).toBe(8453);
    expect(await decoder.decode("0xmissing")).toBeNull();
    expect(seen).toEqual(["0xknown", "0xmissing"]);
  });
});

describe("decodeBridgeTransfers", () => {
  const target = addr(1);

  it("should leave deliveries from other bridges undecoded", async () => {
    const polygonBridge = transfer({ from: POLYGON_POS_BRIDGE, to: target, amount: 2000, txHash: "0xpos" });
    const stargate = transfer({ from: STARGATE, to: target, amount: 800, txHash: "0xstg" });
    const relayed = transfer({ from: RELAY_EXECUTOR, to: target, amount: 300, txHash: "0xrelay" });
    const sources = buildIncoming(target, [polygonBridge, stargate, relayed]);
    const decoder = new FakeBridgeDecoder(new Map([["0xrelay", bridgeOrigin({ destinationTxHash: "0xrelay" })]]));

    const decoded = await decodeBridgeTransfers(sources, decoder, { pool: { delayMs: 0 }, logger: silent });

    expect(sources.map((s) => s.category)).toEqual(["bridge", "bridge", "bridge"]);
    expect(decoder.calls).toEqual(["0xrelay"]);
    expect(decoded.map((d) => d.sourceAddress)).toEqual([RELAY_EXECUTOR]);
  });

  it("should decode only deliveries from bridge sources", async () => {
    const bridged = transfer({ from: RELAY, to: target, amount: 1000, txHash: "0xbridge1" });
    const exchange = transfer({ from: BINANCE, to: target, amount: 500, txHash: "0xcex" });
    const sources = buildIncoming(target, [bridged, exchange]);
    const decoder = new FakeBridgeDecoder(
      new Map([["0xbridge1", bridgeOrigin({ destinationTxHash: "0xbridge1" })]])
    );

    const decoded = await decodeBridgeTransfers(sources, decoder, { pool: { delayMs: 0 }, logger: silent });

    expect(decoder.calls).toEqual(["0xbridge1"]);
    expect(decoded).toEqual([
      { sourceAddress: RELAY, txHash: "0xbridge1", origin: bridgeOrigin({ destinationTxHash: "0xbridge1" }) },
    ]);
  });

  it("should cap the number of decoded hashes", async () => {
    const transfers = [1, 2, 3].map((n) => transfer({ from: RELAY, to: target, amount: 100, txHash: `0xb${n}` }));
    const decoder = new FakeBridgeDecoder();

    const decoded = await decodeBridgeTransfers(buildIncoming(target, transfers), decoder, {
      maxDecodes: 2,
      pool: { delayMs: 0 },
      logger: silent,
    });

    expect(decoder.calls).toEqual(["0xb1", "0xb2"]);
    expect(decoded).toEqual([]);
  });

  it("should skip hashes whose decode fails", async () => {
    const transfers = [
      transfer({ from: RELAY, to: target, amount: 100, txHash: "0xfail" }),
      transfer({ from: RELAY, to: target, amount: 100, txHash: "0xok" }),
    ];
    const decoder = {
      async decode(hash: string) {
        if (hash === "0xfail") throw new Error("503");
        return bridgeOrigin({ destinationTxHash: hash });
      },
    };

    const decoded = await decodeBridgeTransfers(buildIncoming(target, transfers), decoder, {
      pool: { delayMs: 0 },
      logger: silent,
    });

    expect(decoded.map((d) => d.txHash)).toEqual(["0xok"]);
  });

  it("should not call the decoder without bridge sources", async () => {
    const decoder = new FakeBridgeDecoder();
    const sources = buildIncoming(target, [transfer({ from: addr(2), to: target, amount: 100 })]);

    expect(await decodeBridgeTransfers(sources, decoder, { logger: silent })).toEqual([]);
    expect(decoder.calls).toEqual([]);
  });
});
