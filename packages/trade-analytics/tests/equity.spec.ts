import { describe, expect, it } from "vitest";
import { buildEquitySeries, equityCurve, hasEquityFields } from "../src/equity";
import { pnlTrade } from "./helpers";

describe("buildEquitySeries", () => {
  it("tracks cumulative P&L, peak and drawdown", () => {
    const series = buildEquitySeries([
      pnlTrade("2024-01-01", 100),
      pnlTrade("2024-01-02", -150),
    ]);

    expect(series.map((trade) => trade.cumulativePnl)).toEqual([100, -50]);
    expect(series.map((trade) => trade.peak)).toEqual([100, 100]);
    expect(series.map((trade) => trade.drawdown)).toEqual([0, -150]);
    expect(series.map((trade) => trade.drawdownPct)).toEqual([0, -150]);
  });

  it("orders by date and keeps input order for equal dates", () => {
    const series = buildEquitySeries([
      pnlTrade("2024-03-01", 10, { symbol: "C" }),
      pnlTrade("2024-01-15", 20, { symbol: "A" }),
      pnlTrade("2024-03-01", 30, { symbol: "D" }),
      pnlTrade("2024-01-15", 40, { symbol: "B" }),
    ]);

    expect(series.map((trade) => trade.symbol)).toEqual(["A", "B", "C", "D"]);
    expect(series.map((trade) => trade.cumulativePnl)).toEqual([
      20, 60, 70, 100,
    ]);
  });

  it("starts the peak at zero so an opening loss is a drawdown", () => {
    const [first, second] = buildEquitySeries([
      pnlTrade("2024-01-01", -20),
      pnlTrade("2024-01-02", 50),
    ]);

    expect(first).toMatchObject({
      cumulativePnl: -20,
      peak: 0,
      drawdown: -20,
      drawdownPct: 0,
    });
    expect(second).toMatchObject({
      cumulativePnl: 30,
      peak: 30,
      drawdown: 0,
      drawdownPct: 0,
    });
  });

  it("measures drawdown percent against the running peak", () => {
    const series = buildEquitySeries([
      pnlTrade("2024-01-01", 200),
      pnlTrade("2024-01-02", -50),
      pnlTrade("2024-01-03", -30),
      pnlTrade("2024-01-04", 100),
    ]);

    expect(series.map((trade) => trade.drawdownPct)).toEqual([0, -25, -40, 0]);
    expect(series.map((trade) => trade.peak)).toEqual([200, 200, 200, 220]);
  });

  it("never lowers the peak and never reports a positive drawdown", () => {
    const pnls = [30, -80, 45, 10, -5, -60, 120, -15];
    const series = buildEquitySeries(
      pnls.map((pnl, index) => pnlTrade(`2024-02-${String(index + 1).padStart(2, "0")}`, pnl)),
    );

    series.forEach((trade, index) => {
      expect(trade.drawdown).toBeLessThanOrEqual(0);
      if (index > 0) {
        expect(trade.peak).toBeGreaterThanOrEqual(series[index - 1]?.peak ?? 0);
      }
    });
  });

  it("does not reorder or mutate its input", () => {
    const input = [pnlTrade("2024-01-02", 5), pnlTrade("2024-01-01", 7)];
    buildEquitySeries(input);

    expect(input.map((trade) => trade.date)).toEqual([
      "2024-01-02",
      "2024-01-01",
    ]);
    expect(hasEquityFields(input[0] ?? pnlTrade("2024-01-01", 0))).toBe(false);
  });

  it("returns an empty series for no trades", () => {
    expect(buildEquitySeries([])).toEqual([]);
  });
});

describe("equityCurve", () => {
  it("projects the series to chart points", () => {
    const series = buildEquitySeries([
      pnlTrade("2024-01-01", 100),
      pnlTrade("2024-01-02", -150),
    ]);

    expect(equityCurve(series)).toEqual([
      { date: "2024-01-01", equity: 100, drawdown: 0 },
      { date: "2024-01-02", equity: -50, drawdown: -150 },
    ]);
  });
});
