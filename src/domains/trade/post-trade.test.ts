import { describe, expect, it } from "vitest";

import { toUnit } from "@/lib/decimal";
import {
  createGlobalParameters,
  createMarketParameters,
  createPosition,
} from "@/testing/fixtures";

import { type TradeInput, orderSizeTooLarge, postTradeDetails } from "./post-trade";

const createTradeInput = (overrides: Partial<TradeInput> = {}): TradeInput => ({
  position: createPosition({ margin: toUnit(1000) }),
  sizeDelta: toUnit(50),
  valuation: { price: toUnit(100), fundingPerUnit: 0n },
  priceInvalid: false,
  feeRate: toUnit("0.003"),
  latestFundingIndex: 3,
  market: { marketSize: 0n, marketSkew: 0n },
  parameters: createMarketParameters(),
  globals: createGlobalParameters(),
  ...overrides,
});

const at = (price: string | number) => ({ price: toUnit(price), fundingPerUnit: 0n });

describe("postTradeDetails", () => {
  it("should project a new position net of the fee", () => {
    const projection = postTradeDetails(createTradeInput());

    expect(projection).toEqual({
      position: {
        id: 1,
        lastFundingIndex: 3,
        margin: toUnit(985),
        lockedMargin: 0n,
        lastPrice: toUnit(100),
        size: toUnit(50),
      },
      margin: toUnit(985),
      size: toUnit(50),
      fee: toUnit(15),
      status: "OK",
    });
  });

  it("should realize accrued funding into margin", () => {
    const projection = postTradeDetails(
      createTradeInput({
        position: createPosition({ margin: toUnit(1000), size: toUnit(10) }),
        sizeDelta: toUnit(10),
        valuation: { price: toUnit(100), fundingPerUnit: toUnit(-6) },
      }),
    );

    expect(projection.status).toBe("OK");
    expect(projection.margin).toBe(toUnit(937));
  });

  it("should reject empty orders", () => {
    const input = createTradeInput({ sizeDelta: 0n });

    expect(postTradeDetails(input)).toEqual({
      position: input.position,
      margin: toUnit(1000),
      size: 0n,
      fee: 0n,
      status: "NIL_ORDER",
    });
  });

  it("should reject trades at an invalid price", () => {
    expect(postTradeDetails(createTradeInput({ priceInvalid: true })).status).toBe("INVALID_PRICE");
  });

  it("should reject trades on a liquidatable position", () => {
    const projection = postTradeDetails(
      createTradeInput({
        position: createPosition({ margin: toUnit(50), size: toUnit(10) }),
        sizeDelta: toUnit(-1),
        valuation: at(96),
      }),
    );

    expect(projection.status).toBe("CAN_LIQUIDATE");
  });

  it("should reject when the fee exceeds the margin", () => {
    const projection = postTradeDetails(
      createTradeInput({ position: createPosition({ margin: toUnit(10) }) }),
    );

    expect(projection.status).toBe("INSUFFICIENT_MARGIN");
    expect(projection.fee).toBe(0n);
  });

  it("should require the minimum initial margin before the fee", () => {
    const rejected = postTradeDetails(
      createTradeInput({
        position: createPosition({ margin: toUnit(99) }),
        sizeDelta: toUnit(10),
        valuation: at(10),
      }),
    );
    const accepted = postTradeDetails(
      createTradeInput({
        position: createPosition({ margin: toUnit(100) }),
        sizeDelta: toUnit(10),
        valuation: at(10),
      }),
    );

    expect(rejected.status).toBe("INSUFFICIENT_MARGIN");
    expect(accepted.status).toBe("OK");
    expect(accepted.margin).toBe(toUnit("99.7"));
    expect(accepted.fee).toBe(toUnit("0.3"));
  });

  it("should not keep locked margin tradeable", () => {
    const projection = postTradeDetails(
      createTradeInput({
        position: createPosition({ margin: toUnit(1000), lockedMargin: toUnit(990) }),
      }),
    );

    expect(projection.status).toBe("INSUFFICIENT_MARGIN");
  });

  it("should reject trades that would leave the position liquidatable", () => {
    const projection = postTradeDetails(
      createTradeInput({
        position: createPosition({ margin: toUnit(100) }),
        sizeDelta: toUnit(200),
      }),
    );

    expect(projection.status).toBe("CAN_LIQUIDATE");
  });

  it("should allow max leverage within the tolerance", () => {
    expect(postTradeDetails(createTradeInput({ sizeDelta: toUnit("100.09") })).status).toBe("OK");
    expect(postTradeDetails(createTradeInput({ sizeDelta: toUnit("-100.09") })).status).toBe("OK");
  });

  it("should reject leverage past the tolerance", () => {
    expect(postTradeDetails(createTradeInput({ sizeDelta: toUnit(101) })).status).toBe(
      "MAX_LEVERAGE_EXCEEDED",
    );
    expect(postTradeDetails(createTradeInput({ sizeDelta: toUnit(-101) })).status).toBe(
      "MAX_LEVERAGE_EXCEEDED",
    );
  });

  it("should cap one-sided open interest", () => {
    const input = createTradeInput({
      position: createPosition({ margin: toUnit(10011) }),
      valuation: at(1),
      parameters: createMarketParameters({ maxSingleSideValueUSD: toUnit(10000) }),
    });

    expect(postTradeDetails({ ...input, sizeDelta: toUnit(10101) }).status).toBe(
      "MAX_MARKET_SIZE_EXCEEDED",
    );
    expect(postTradeDetails({ ...input, sizeDelta: toUnit(10100) }).status).toBe("OK");
    expect(postTradeDetails({ ...input, sizeDelta: toUnit(-10101) }).status).toBe(
      "MAX_MARKET_SIZE_EXCEEDED",
    );
  });

  it("should never block reductions with the size cap", () => {
    const projection = postTradeDetails(
      createTradeInput({
        position: createPosition({ margin: toUnit(10000), size: toUnit(20000), lastPrice: toUnit(1) }),
        sizeDelta: toUnit(-5000),
        valuation: at(1),
        market: { marketSize: toUnit(20000), marketSkew: toUnit(20000) },
        parameters: createMarketParameters({ maxSingleSideValueUSD: toUnit(10000) }),
      }),
    );

    expect(projection.status).toBe("OK");
    expect(projection.size).toBe(toUnit(15000));
  });

  it("should close positions below the minimum margin", () => {
    const projection = postTradeDetails(
      createTradeInput({
        position: createPosition({ margin: toUnit(50), size: toUnit(-10) }),
        sizeDelta: toUnit(10),
      }),
    );

    expect(projection.status).toBe("OK");
    expect(projection.size).toBe(0n);
    expect(projection.margin).toBe(toUnit(47));
  });
});

describe("orderSizeTooLarge", () => {
  const market = { marketSize: toUnit(100), marketSkew: toUnit(20) };

  it("should compare the resulting side against the cap", () => {
    // longs 60, shorts 40 before; a new 50 long makes longs 110
    expect(orderSizeTooLarge(toUnit(100), 0n, toUnit(50), market)).toBe(true);
    expect(orderSizeTooLarge(toUnit(110), 0n, toUnit(50), market)).toBe(false);
    // a new 50 short makes shorts 90
    expect(orderSizeTooLarge(toUnit(89), 0n, toUnit(-50), market)).toBe(true);
    expect(orderSizeTooLarge(toUnit(90), 0n, toUnit(-50), market)).toBe(false);
  });

  it("should ignore trades that shrink the position", () => {
    expect(orderSizeTooLarge(0n, toUnit(60), toUnit(10), market)).toBe(false);
    expect(orderSizeTooLarge(0n, toUnit(60), toUnit(-10), market)).toBe(false);
  });
});
