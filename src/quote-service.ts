// BTC quotes — the one entry point callers use to get a quote.
//
// "cached" serves from the quote cache while it is fresh and does a single
// fetch otherwise. "force-retry" skips the freshness check, retries per the
// configured policy, and still writes its success into the cache.

import { Context, Duration, Effect, Layer, Option } from "effect";
import type { Quote, RequestMode } from "./domain.ts";
import type { FetchError } from "./quote-api.ts";
import { type CachedQuote, makeQuoteCache } from "./quote-cache.ts";
import { fetchWithRetry, type RetryPolicy } from "./retry.ts";
import { makeCoinGeckoFetch } from "./providers/coingecko.ts";
import { AppConfig } from "./config.ts";
import { Transport } from "./transport.ts";

// --- Service ---

export interface BtcQuotesShape {
  readonly getQuote: (mode: RequestMode) => Effect.Effect<Quote, FetchError>;
  readonly cached: Effect.Effect<Option.Option<CachedQuote>>;
}

export class BtcQuotes extends Context.Tag("BtcQuotes")<
  BtcQuotes,
  BtcQuotesShape
>() {}

export interface BtcQuotesOptions {
  readonly cacheTtl: Duration.DurationInput;
  readonly retry: RetryPolicy;
}

export function makeBtcQuotes(
  fetchOnce: Effect.Effect<Quote, FetchError>,
  options: BtcQuotesOptions,
): Effect.Effect<BtcQuotesShape> {
  return Effect.gen(function* () {
    const cache = yield* makeQuoteCache(options.cacheTtl);

    const getQuote = (mode: RequestMode): Effect.Effect<Quote, FetchError> => {
      switch (mode) {
        case "cached":
          return cache.getOrFetch(fetchOnce);
        case "force-retry":
          return cache.refresh(fetchWithRetry(fetchOnce, options.retry));
      }
    };

    return { getQuote, cached: cache.entry } satisfies BtcQuotesShape;
  });
}

// --- Layer ---

export const BtcQuotesLive = Layer.effect(
  BtcQuotes,
  Effect.gen(function* () {
    const config = yield* AppConfig;
    const transport = yield* Transport;
    const fetchOnce = makeCoinGeckoFetch(
      transport,
      config.baseUrl,
      config.requestTimeout,
    );

    const quotes = yield* makeBtcQuotes(fetchOnce, {
      cacheTtl: config.cacheTtl,
      retry: config.retry,
    });

    return BtcQuotes.of({
      ...quotes,
      getQuote: (mode) =>
        Effect.logDebug(`[quotes] ${mode} request to ${config.baseUrl}`).pipe(
          Effect.zipRight(quotes.getQuote(mode)),
        ),
    });
  }),
);
