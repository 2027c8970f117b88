import { describe, expect, it } from "vitest";
import { createAnalyticsConfig, defaultAnalyticsConfig } from "../src/config";

describe("createAnalyticsConfig", () => {
  it("returns the defaults without overrides", () => {
    expect(createAnalyticsConfig()).toEqual({
      uncategorizedLabel: "uncategorized",
      zeroLossPayoff: "infinity",
      reportPrecision: 2,
    });
    expect(createAnalyticsConfig()).toBe(defaultAnalyticsConfig);
  });

  it("applies overrides and ignores undefined keys", () => {
    const config = createAnalyticsConfig({
      zeroLossPayoff: "zero",
      reportPrecision: undefined,
    });

    expect(config.zeroLossPayoff).toBe("zero");
    expect(config.reportPrecision).toBe(2);
  });

  it("trims the uncategorized label", () => {
    expect(
      createAnalyticsConfig({ uncategorizedLabel: "  none " }).uncategorizedLabel,
    ).toBe("none");
  });

  it("rejects invalid overrides", () => {
    expect(() => createAnalyticsConfig({ reportPrecision: 11 })).toThrow();
    expect(() => createAnalyticsConfig({ uncategorizedLabel: " " })).toThrow();
  });
});
