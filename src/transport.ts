// Transport — one HTTP GET with a timeout, failures mapped to TransportError.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Context, Duration, Effect, Layer } from "effect";
import {
  ConnectionError,
  HttpError,
  OtherTransportError,
  Timeout,
  type TransportError,
} from "./quote-api.ts";

// --- Service ---

export type QueryParams = Readonly<Record<string, string>>;

export interface TransportShape {
  /** Perform a single GET and return the body of a 2xx response as text.
   *  No retries, no caching. */
  readonly get: (
    url: string,
    params: QueryParams,
    timeout: Duration.DurationInput,
  ) => Effect.Effect<string, TransportError>;
}

export class Transport extends Context.Tag("Transport")<
  Transport,
  TransportShape
>() {}

// --- HTTP layer ---

export const HttpTransportLive = Layer.effect(
  Transport,
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
      HttpClient.mapRequest(HttpClientRequest.acceptJson),
    );

    return Transport.of({
      get: (url, params, timeout) => {
        const timeoutMs = Duration.toMillis(Duration.decode(timeout));
        return client.get(url, { urlParams: params }).pipe(
          Effect.flatMap((response) => response.text),
          Effect.timeoutFail({
            duration: timeout,
            onTimeout: () => new Timeout({ timeoutMs }),
          }),
          Effect.catchTags({
            RequestError: (e) =>
              e.reason === "Transport"
                ? Effect.fail(new ConnectionError({ message: e.message }))
                : Effect.fail(new OtherTransportError({ message: e.message })),
            ResponseError: (e) =>
              e.reason === "StatusCode"
                ? Effect.fail(new HttpError({ status: e.response.status }))
                : Effect.fail(new OtherTransportError({ message: e.message })),
          }),
        );
      },
    });
  }),
);
