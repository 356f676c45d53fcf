import * as v from "valibot";
import { afterEach, describe, expect, it, vi } from "vitest";

import { ExchangeError } from "../errors";
import { createPaperCapabilities, parsePaperOptions } from "./capabilities";

const PERP = "BTC/USDT:USDT";
const SPOT = "BTC/USDT";

const balanceOf = async (
  paper: ReturnType<typeof createPaperCapabilities>,
  asset: string,
): Promise<{ free: number; used: number; total: number } | undefined> =>
  (await paper.fetchBalances()).find((balance) => balance.asset === asset);

const captureError = async (promise: Promise<unknown>): Promise<ExchangeError> => {
  const error = await promise.catch((e: unknown) => e);
  if (!(error instanceof ExchangeError)) {
    throw new Error(`Expected ExchangeError, got ${String(error)}`);
  }
  return error;
};

describe("createPaperCapabilities", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe("market data", () => {
    it("should list the default markets", async () => {
      const paper = createPaperCapabilities();

      const markets = await paper.loadMarkets(false);

      expect(markets.map((market) => market.symbol)).toEqual([
        "BTC/USDT:USDT",
        "ETH/USDT:USDT",
        "BTC/USDT",
        "ETH/USDT",
      ]);
      expect(markets[0]).toMatchObject({ type: "swap", settle: "USDT", pricePrecision: 0.1 });
    });

    it("should quote the configured price", async () => {
      const paper = createPaperCapabilities({ prices: { [PERP]: 65_000 } });

      const ticker = await paper.fetchTicker(PERP);

      expect(ticker).toMatchObject({ symbol: PERP, lastPrice: 65_000, bidPrice: 65_000 });
    });

    it("should reject unknown symbols", async () => {
      const paper = createPaperCapabilities();

      const error = await captureError(paper.fetchTicker("DOGE/USDT"));

      expect(error.code).toBe("INVALID_ORDER");
      expect(error.message).toBe("Unknown market DOGE/USDT");
      expect(error.exchange).toBe("paper");
    });

    it("should report the next funding time on the 8h grid", async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2026-01-01T03:00:00.000Z"));
      const paper = createPaperCapabilities({ fundingRates: { [PERP]: -0.0002 } });

      const funding = await paper.fetchFundingRate(PERP);

      expect(funding).toEqual({
        symbol: PERP,
        exchange: "paper",
        rate: -0.0002,
        fundingTime: new Date("2026-01-01T08:00:00.000Z"),
      });
      expect((await paper.fetchFundingRate("ETH/USDT:USDT")).rate).toBe(0.0001);
    });

    it("should list funding rates for every perpetual", async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2026-01-01T03:00:00.000Z"));
      const paper = createPaperCapabilities({ fundingRates: { [PERP]: -0.0002 } });

      expect(await paper.fetchFundingRates()).toEqual([
        {
          symbol: PERP,
          exchange: "paper",
          rate: -0.0002,
          fundingTime: new Date("2026-01-01T08:00:00.000Z"),
        },
        {
          symbol: "ETH/USDT:USDT",
          exchange: "paper",
          rate: 0.0001,
          fundingTime: new Date("2026-01-01T08:00:00.000Z"),
        },
      ]);
    });

    it("should refuse funding rates for spot markets", async () => {
      const paper = createPaperCapabilities();

      expect((await captureError(paper.fetchFundingRate(SPOT))).code).toBe("INVALID_ORDER");
    });

    it("should round prices to the market tick", () => {
      const paper = createPaperCapabilities();

      expect(paper.priceToPrecision(PERP, 60_123.456)).toBe(60_123.5);
    });
  });

  describe("spot orders", () => {
    it("should fill market buys at the last price", async () => {
      const paper = createPaperCapabilities();

      const order = await paper.createOrder({
        symbol: SPOT,
        side: "BUY",
        type: "MARKET",
        amount: 0.1,
        clientOrderId: "my-1",
      });

      expect(order).toMatchObject({
        id: "paper-1",
        clientOrderId: "my-1",
        status: "CLOSED",
        filled: 0.1,
        average: 60_000,
        price: null,
      });
      expect((await balanceOf(paper, "USDT"))?.free).toBeCloseTo(4_000);
      expect((await balanceOf(paper, "BTC"))?.free).toBeCloseTo(0.1);
    });

    it("should reject orders the balance cannot cover", async () => {
      const paper = createPaperCapabilities();

      const error = await captureError(
        paper.createOrder({ symbol: SPOT, side: "BUY", type: "MARKET", amount: 1 }),
      );

      expect(error.code).toBe("INSUFFICIENT_FUNDS");
      expect(await balanceOf(paper, "USDT")).toEqual({
        asset: "USDT",
        free: 10_000,
        used: 0,
        total: 10_000,
      });
    });

    it("should rest limit orders until the price crosses", async () => {
      const paper = createPaperCapabilities();

      const order = await paper.createOrder({
        symbol: SPOT,
        side: "BUY",
        type: "LIMIT",
        amount: 0.1,
        price: 59_000,
      });
      expect(order.status).toBe("OPEN");
      expect((await balanceOf(paper, "USDT"))?.free).toBe(10_000);

      paper.setPrice(SPOT, 58_000);

      expect((await balanceOf(paper, "USDT"))?.free).toBeCloseTo(4_200);
      const error = await captureError(paper.cancelOrder(order.id, SPOT));
      expect(error.message).toBe("Order paper-1 is already CLOSED");
    });

    it("should cancel resting orders once", async () => {
      const paper = createPaperCapabilities();
      const order = await paper.createOrder({
        symbol: SPOT,
        side: "SELL",
        type: "LIMIT",
        amount: 0.1,
        price: 70_000,
      });

      const canceled = await paper.cancelOrder(order.id, SPOT);

      expect(canceled.status).toBe("CANCELED");
      expect((await captureError(paper.cancelOrder(order.id, SPOT))).code).toBe("INVALID_ORDER");
      expect((await captureError(paper.cancelOrder("missing", SPOT))).message).toBe(
        "Order missing not found",
      );
    });

    it("should enforce market limits", async () => {
      const paper = createPaperCapabilities();

      const error = await captureError(
        paper.createOrder({ symbol: PERP, side: "BUY", type: "MARKET", amount: 0.0001 }),
      );

      expect(error.code).toBe("INVALID_ORDER");
      expect(error.message).toBe("Amount 0.0001 is below the minimum 0.001");
    });
  });

  describe("contract positions", () => {
    it("should lock margin by leverage and realize pnl on close", async () => {
      const paper = createPaperCapabilities();
      await paper.setLeverage(5, PERP);

      await paper.createOrder({ symbol: PERP, side: "BUY", type: "MARKET", amount: 0.5 });

      expect(await balanceOf(paper, "USDT")).toEqual({
        asset: "USDT",
        free: 4_000,
        used: 6_000,
        total: 10_000,
      });

      paper.setPrice(PERP, 62_000);
      const [open] = await paper.fetchPositions([PERP]);
      expect(open).toMatchObject({
        side: "LONG",
        contracts: 0.5,
        entryPrice: 60_000,
        markPrice: 62_000,
        leverage: 5,
        collateral: 6_000,
        unrealizedPnl: 1_000,
        marginMode: "cross",
      });

      await paper.createOrder({
        symbol: PERP,
        side: "SELL",
        type: "MARKET",
        amount: 0.5,
        reduceOnly: true,
      });

      expect(await balanceOf(paper, "USDT")).toEqual({
        asset: "USDT",
        free: 11_000,
        used: 0,
        total: 11_000,
      });
      const [flat] = await paper.fetchPositions();
      expect(flat.contracts).toBe(0);

      const report = await paper.fetchClosedPositionReport(PERP);
      expect(report).toMatchObject({
        exchange: "paper",
        symbol: PERP,
        side: "LONG",
        contracts: 0.5,
        entryPriceAvg: 60_000,
        exitPriceAvg: 62_000,
        leverage: 5,
        feesTotal: 0,
      });
    });

    it("should reject reduce-only orders that would open a position", async () => {
      const paper = createPaperCapabilities();

      const error = await captureError(
        paper.createOrder({
          symbol: PERP,
          side: "SELL",
          type: "MARKET",
          amount: 0.1,
          reduceOnly: true,
        }),
      );

      expect(error.message).toBe("Reduce-only order would increase the position");
      expect(await paper.fetchPositions()).toEqual([]);
    });

    it("should leave the account untouched when a flip lacks margin", async () => {
      const paper = createPaperCapabilities();
      await paper.createOrder({ symbol: PERP, side: "SELL", type: "MARKET", amount: 0.1 });

      // Closing 0.1 frees 6 000, opening 0.2 needs 12 000
      const error = await captureError(
        paper.createOrder({ symbol: PERP, side: "BUY", type: "MARKET", amount: 0.3 }),
      );

      expect(error.code).toBe("INSUFFICIENT_FUNDS");
      const [position] = await paper.fetchPositions();
      expect(position).toMatchObject({ side: "SHORT", contracts: 0.1 });
      expect((await balanceOf(paper, "USDT"))?.used).toBeCloseTo(6_000);
    });

    it("should validate leverage", async () => {
      const paper = createPaperCapabilities();

      expect((await captureError(paper.setLeverage(0, PERP))).code).toBe("INVALID_ORDER");
      expect((await captureError(paper.setLeverage(2.5, PERP))).code).toBe("INVALID_ORDER");
      expect((await captureError(paper.setLeverage(3, SPOT))).code).toBe("INVALID_ORDER");
    });

    it("should have no report before a position closes", async () => {
      const paper = createPaperCapabilities();
      await paper.createOrder({ symbol: PERP, side: "BUY", type: "MARKET", amount: 0.01 });

      expect(await paper.fetchClosedPositionReport(PERP)).toBeNull();
    });
  });

  describe("account modes", () => {
    it("should open positions in the configured margin mode", async () => {
      const paper = createPaperCapabilities();
      await paper.setMarginMode("isolated", PERP);

      await paper.createOrder({ symbol: PERP, side: "BUY", type: "MARKET", amount: 0.01 });

      const [position] = await paper.fetchPositions([PERP]);
      expect(position?.marginMode).toBe("isolated");
      const error = await captureError(paper.setMarginMode("cross", PERP));
      expect(error.message).toBe(
        "Cannot switch BTC/USDT:USDT to cross margin with an open position",
      );
    });

    it("should refuse margin modes for spot markets", async () => {
      const paper = createPaperCapabilities();

      const error = await captureError(paper.setMarginMode("cross", SPOT));

      expect(error.message).toBe("BTC/USDT is a spot market");
    });

    it("should accept one-way mode only", async () => {
      const paper = createPaperCapabilities();

      await paper.setPositionMode(false);
      const error = await captureError(paper.setPositionMode(true, PERP));

      expect(error.code).toBe("INVALID_ORDER");
      expect(error.message).toBe("Paper positions are one-way only");
      expect(error.symbol).toBe(PERP);
    });
  });

  describe("trigger orders", () => {
    it("should take profit on a long once the price reaches the target", async () => {
      const paper = createPaperCapabilities();

      const entry = await paper.createTpslOrder({
        symbol: PERP,
        side: "BUY",
        type: "MARKET",
        amount: 0.1,
        takeProfit: 66_000,
        stopLoss: 57_000,
      });

      expect(entry).toMatchObject({ id: "paper-1", status: "CLOSED", filled: 0.1 });
      expect((await paper.fetchPositions([PERP]))[0]?.marginMode).toBe("isolated");
      expect(await paper.fetchTriggerOrders(PERP)).toEqual([
        {
          id: "paper-2",
          clientOrderId: null,
          symbol: PERP,
          side: "SELL",
          type: "MARKET",
          amount: 0.1,
          triggerPrice: null,
          takeProfitPrice: 66_000,
          stopLossPrice: 57_000,
          reduceOnly: true,
        },
      ]);

      paper.setPrice(PERP, 65_000);
      expect(await paper.fetchTriggerOrders(PERP)).toHaveLength(1);

      paper.setPrice(PERP, 66_500);
      expect(await paper.fetchTriggerOrders(PERP)).toEqual([]);
      const [position] = await paper.fetchPositions([PERP]);
      expect(position?.contracts).toBe(0);
      const balance = await balanceOf(paper, "USDT");
      expect(balance?.free).toBeCloseTo(10_650);
      expect(balance?.used).toBeCloseTo(0);
    });

    it("should stop out part of a short with a standalone stop-loss", async () => {
      const paper = createPaperCapabilities();
      await paper.createOrder({ symbol: PERP, side: "SELL", type: "MARKET", amount: 0.1 });

      const order = await paper.createStopLossOrder({
        symbol: PERP,
        side: "BUY",
        amount: 0.05,
        triggerPrice: 63_000,
      });

      expect(order).toMatchObject({
        id: "paper-2",
        side: "BUY",
        type: "MARKET",
        status: "OPEN",
        amount: 0.05,
        price: null,
        reduceOnly: true,
      });
      expect(await paper.fetchTriggerOrders(PERP)).toMatchObject([
        { triggerPrice: 63_000, takeProfitPrice: null, stopLossPrice: 63_000 },
      ]);

      paper.setPrice(PERP, 62_000);
      expect(await paper.fetchTriggerOrders(PERP)).toHaveLength(1);

      paper.setPrice(PERP, 63_000);
      expect(await paper.fetchTriggerOrders(PERP)).toEqual([]);
      const [position] = await paper.fetchPositions([PERP]);
      expect(position?.side).toBe("SHORT");
      expect(position?.contracts).toBeCloseTo(0.05);
    });

    it("should refuse a protective order without a matching position", async () => {
      const paper = createPaperCapabilities();
      const params = { symbol: PERP, side: "SELL" as const, amount: 0.1, triggerPrice: 70_000 };

      const flat = await captureError(paper.createTakeProfitOrder(params));
      await paper.createOrder({ symbol: PERP, side: "BUY", type: "MARKET", amount: 0.1 });
      const wrongSide = await captureError(
        paper.createTakeProfitOrder({ ...params, side: "BUY" }),
      );

      expect(flat.message).toBe("No open position on BTC/USDT:USDT for a SELL trigger");
      expect(wrongSide.message).toBe("No open position on BTC/USDT:USDT for a BUY trigger");
    });

    it("should drop a trigger that fires while the entry still rests", async () => {
      const paper = createPaperCapabilities();
      await paper.createTpslOrder({
        symbol: PERP,
        side: "BUY",
        type: "LIMIT",
        amount: 0.1,
        price: 50_000,
        takeProfit: 70_000,
        stopLoss: 45_000,
      });

      paper.setPrice(PERP, 70_000);

      expect(await paper.fetchTriggerOrders(PERP)).toEqual([]);
      expect(await paper.fetchPositions()).toEqual([]);
    });

    it("should refuse TP/SL entries on spot markets", async () => {
      const paper = createPaperCapabilities();

      const error = await captureError(
        paper.createTpslOrder({
          symbol: SPOT,
          side: "BUY",
          type: "MARKET",
          amount: 0.01,
          takeProfit: 66_000,
          stopLoss: 57_000,
        }),
      );

      expect(error.message).toBe("BTC/USDT is a spot market");
    });

    it("should cancel trigger orders all or nothing", async () => {
      const paper = createPaperCapabilities();
      const params = {
        symbol: PERP,
        side: "BUY" as const,
        type: "MARKET" as const,
        amount: 0.01,
        takeProfit: 66_000,
        stopLoss: 57_000,
      };
      await paper.createTpslOrder(params);
      await paper.createTpslOrder(params);

      const error = await captureError(paper.cancelTriggerOrders(PERP, ["paper-2", "missing"]));
      expect(error.message).toBe("Trigger order missing not found");
      expect(await paper.fetchTriggerOrders(PERP)).toHaveLength(2);

      await paper.cancelTriggerOrders(PERP, ["paper-2"]);
      expect((await paper.fetchTriggerOrders(PERP)).map((trigger) => trigger.id)).toEqual([
        "paper-4",
      ]);
    });
  });

  describe("close", () => {
    it("should refuse calls after close", async () => {
      const paper = createPaperCapabilities();

      await paper.close();

      expect(paper.isClosed()).toBe(true);
      expect((await captureError(paper.fetchTicker(PERP))).code).toBe("EXCHANGE_UNAVAILABLE");
    });
  });

  describe("parsePaperOptions", () => {
    it("should reject negative balances and non-positive prices", () => {
      expect(() => parsePaperOptions({ initialBalances: { USDT: -1 } })).toThrow(v.ValiError);
      expect(() => parsePaperOptions({ prices: { [PERP]: 0 } })).toThrow(v.ValiError);
      expect(() => parsePaperOptions({ defaultLeverage: 200 })).toThrow(v.ValiError);
    });

    it("should drop unknown keys", () => {
      expect(parsePaperOptions({ initialBalances: { USDC: 5 }, recvWindow: 1 })).toEqual({
        initialBalances: { USDC: 5 },
      });
    });
  });
});
