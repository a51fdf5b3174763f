// Retry — sequential attempts with a fixed pause, last error wins.

import { Duration, Effect, Predicate, Ref, Schedule } from "effect";

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly delay: Duration.DurationInput;
}

export const defaultRetryPolicy: RetryPolicy = {
  maxAttempts: 3,
  delay: "2 seconds",
};

const errorLabel = (e: unknown): string =>
  Predicate.hasProperty(e, "_tag") ? String(e._tag) : String(e);

/** Run `fetch` up to `policy.maxAttempts` times, pausing `policy.delay`
 *  between a failure and the next attempt. Succeeds with the first success;
 *  otherwise fails with the error of the final attempt only. */
export function fetchWithRetry<A, E, R>(
  fetch: Effect.Effect<A, E, R>,
  policy: RetryPolicy = defaultRetryPolicy,
): Effect.Effect<A, E, R> {
  const { maxAttempts, delay } = policy;
  const schedule = Schedule.spaced(delay).pipe(
    Schedule.intersect(Schedule.recurs(Math.max(0, maxAttempts - 1))),
  );

  return Effect.gen(function* () {
    const attempts = yield* Ref.make(0);

    const attempt = Ref.updateAndGet(attempts, (n) => n + 1).pipe(
      Effect.tap((n) => Effect.logDebug(`[retry] attempt ${n}/${maxAttempts}`)),
      Effect.zipRight(fetch),
      Effect.tapError((e) =>
        Effect.logDebug(`[retry] attempt failed: ${errorLabel(e)}`),
      ),
    );

    return yield* Effect.retry(attempt, schedule);
  });
}
