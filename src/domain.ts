// Pure domain types — no framework dependency, no I/O.

/** A validated BTC/USD snapshot. `priceUsd` is always > 0. */
export interface Quote {
  readonly priceUsd: number;
  readonly change24hPercent: number; // 3.21 means +3.21%
  readonly volume24hUsd: number;
  readonly lastUpdatedAtUnixSeconds?: number;
}

export type TrendBucket =
  | "strong-up"
  | "moderate-up"
  | "slight-up"
  | "flat"
  | "slight-down"
  | "moderate-down"
  | "strong-down";

/** Values computed from a Quote on every render. Never cached. */
export interface DerivedView {
  readonly previousPriceUsd: number;
  readonly changeAmountUsd: number;
  readonly trendBucket: TrendBucket;
}

/** How the caller wants the quote: served from cache when fresh, or
 *  refetched with retries regardless of cache freshness. */
export type RequestMode = "cached" | "force-retry";
