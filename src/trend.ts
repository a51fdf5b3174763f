// Pure derivations over a Quote — recomputed on every render.

import type { DerivedView, Quote, TrendBucket } from "./domain.ts";

export function changeAmountUsd(quote: Quote): number {
  return (quote.priceUsd * quote.change24hPercent) / 100;
}

/** Price 24 hours ago, reconstructed from the current price and the
 *  percent change. */
export function previousPriceUsd(quote: Quote): number {
  return quote.priceUsd - changeAmountUsd(quote);
}

// Thresholds are inclusive on the side closer to zero:
// 5 is moderate-up, -2 is slight-down, -5 is moderate-down.
export function classifyTrend(changePercent: number): TrendBucket {
  if (changePercent > 5) return "strong-up";
  if (changePercent > 2) return "moderate-up";
  if (changePercent > 0) return "slight-up";
  if (changePercent < -5) return "strong-down";
  if (changePercent < -2) return "moderate-down";
  if (changePercent < 0) return "slight-down";
  return "flat";
}

export function deriveView(quote: Quote): DerivedView {
  return {
    previousPriceUsd: previousPriceUsd(quote),
    changeAmountUsd: changeAmountUsd(quote),
    trendBucket: classifyTrend(quote.change24hPercent),
  };
}

export type TrendDirection = "up" | "down" | "flat";

export function trendDirection(bucket: TrendBucket): TrendDirection {
  switch (bucket) {
    case "strong-up":
    case "moderate-up":
    case "slight-up":
      return "up";
    case "strong-down":
    case "moderate-down":
    case "slight-down":
      return "down";
    case "flat":
      return "flat";
  }
}
