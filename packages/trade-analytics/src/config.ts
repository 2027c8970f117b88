import { z } from "zod";

export const ZeroLossPayoffSchema = z.enum(["infinity", "zero"]);
export type ZeroLossPayoff = z.infer<typeof ZeroLossPayoffSchema>;

export const analyticsConfigSchema = z.object({
  uncategorizedLabel: z.string().trim().min(1).default("uncategorized"),
  /**
   * Payoff ratio reported when there are winners but the average loss is
   * zero. `"infinity"` is the default; `"zero"` reproduces the variant used
   * by some journals that cannot display infinity.
   */
  zeroLossPayoff: ZeroLossPayoffSchema.default("infinity"),
  reportPrecision: z.number().int().min(0).max(10).default(2),
});

export type AnalyticsConfig = z.infer<typeof analyticsConfigSchema>;

export const defaultAnalyticsConfig: AnalyticsConfig = {
  uncategorizedLabel: "uncategorized",
  zeroLossPayoff: "infinity",
  reportPrecision: 2,
};

export function createAnalyticsConfig(
  overrides?: Partial<AnalyticsConfig>,
): AnalyticsConfig {
  if (!overrides) return defaultAnalyticsConfig;

  const patch = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );

  return analyticsConfigSchema.parse({ ...defaultAnalyticsConfig, ...patch });
}
