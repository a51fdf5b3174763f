// Offline transports — canned CoinGecko responses for development and tests.

import { Effect, Layer, Ref } from "effect";
import type { TransportError } from "../quote-api.ts";
import {
  type QueryParams,
  Transport,
  type TransportShape,
} from "../transport.ts";

// --- Sample data ---

export const sampleBody = JSON.stringify({
  bitcoin: {
    usd: 67250.5,
    usd_24h_change: 1.84,
    usd_24h_vol: 28_500_000_000,
    last_updated_at: 1718467200,
  },
});

// --- Mock layer ---

export const TransportTestLive = Layer.succeed(
  Transport,
  Transport.of({
    get: () => Effect.succeed(sampleBody),
  }),
);

// --- Scripted transport ---

export interface RecordedRequest {
  readonly url: string;
  readonly params: QueryParams;
}

export interface ScriptedTransport {
  readonly transport: TransportShape;
  readonly requests: Effect.Effect<ReadonlyArray<RecordedRequest>>;
}

/** A transport that answers the n-th call with `script[n]`, repeating the
 *  last step once the script runs out, and records every request. */
export function makeScriptedTransport(
  script: ReadonlyArray<Effect.Effect<string, TransportError>>,
): Effect.Effect<ScriptedTransport> {
  return Effect.gen(function* () {
    const log = yield* Ref.make<ReadonlyArray<RecordedRequest>>([]);

    const get: TransportShape["get"] = (url, params) =>
      Ref.modify(log, (requests) => [
        requests.length,
        [...requests, { url, params }],
      ]).pipe(
        Effect.flatMap((index) => {
          const step = script[Math.min(index, script.length - 1)];
          return step === undefined
            ? Effect.dieMessage("Scripted transport has no steps")
            : step;
        }),
      );

    return { transport: { get }, requests: Ref.get(log) };
  });
}
