// Quote cache — Effect shell.
//
// Wires the pure rules (quote-cache-state.ts) to Ref, Clock and a
// one-permit semaphore. Every read-check-fetch-write runs under the
// semaphore, so a second caller waits for the in-flight fetch and then
// finds a fresh entry instead of issuing its own request.

import { Clock, Duration, Effect, Option, Ref } from "effect";
import type { Quote } from "./domain.ts";
import { type CachedQuote, lookup, store } from "./quote-cache-state.ts";

export type { CachedQuote } from "./quote-cache-state.ts";

export interface QuoteCache {
  /** Serve the cached quote while fresh; otherwise run `fetch` and store
   *  its result. A failed fetch leaves the existing entry untouched. */
  readonly getOrFetch: <E, R>(
    fetch: Effect.Effect<Quote, E, R>,
  ) => Effect.Effect<Quote, E, R>;

  /** Run `fetch` regardless of freshness, storing its result on success. */
  readonly refresh: <E, R>(
    fetch: Effect.Effect<Quote, E, R>,
  ) => Effect.Effect<Quote, E, R>;

  /** The raw entry, expired or not. */
  readonly entry: Effect.Effect<Option.Option<CachedQuote>>;
}

export function makeQuoteCache(
  ttl: Duration.DurationInput,
): Effect.Effect<QuoteCache> {
  return Effect.gen(function* () {
    const ttlMs = Duration.toMillis(Duration.decode(ttl));
    const ref = yield* Ref.make<CachedQuote | undefined>(undefined);
    const lock = yield* Effect.makeSemaphore(1);

    const fetchAndStore = <E, R>(
      fetch: Effect.Effect<Quote, E, R>,
    ): Effect.Effect<Quote, E, R> =>
      fetch.pipe(
        Effect.tap((quote) =>
          Clock.currentTimeMillis.pipe(
            Effect.flatMap((now) => Ref.set(ref, store(quote, now))),
            Effect.zipRight(Effect.logDebug("[cache] stored fresh quote")),
          ),
        ),
      );

    const getOrFetch = <E, R>(
      fetch: Effect.Effect<Quote, E, R>,
    ): Effect.Effect<Quote, E, R> =>
      lock.withPermits(1)(
        Effect.gen(function* () {
          const now = yield* Clock.currentTimeMillis;
          const found = lookup(yield* Ref.get(ref), now, ttlMs);

          switch (found._tag) {
            case "Fresh":
              yield* Effect.logDebug("[cache] hit");
              return found.quote;
            case "Expired":
              yield* Effect.logDebug(
                `[cache] expired (age ${found.ageMs}ms) — fetching`,
              );
              break;
            case "Empty":
              yield* Effect.logDebug("[cache] empty — fetching");
              break;
          }

          return yield* fetchAndStore(fetch);
        }),
      );

    const refresh = <E, R>(
      fetch: Effect.Effect<Quote, E, R>,
    ): Effect.Effect<Quote, E, R> =>
      lock.withPermits(1)(
        Effect.logDebug("[cache] forced refresh").pipe(
          Effect.zipRight(fetchAndStore(fetch)),
        ),
      );

    return {
      getOrFetch,
      refresh,
      entry: Ref.get(ref).pipe(Effect.map(Option.fromNullable)),
    } satisfies QuoteCache;
  });
}
