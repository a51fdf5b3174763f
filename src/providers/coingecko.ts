// CoinGecko — request shape and response validation for BTC/USD.

import { Duration, Effect, Predicate, Schema } from "effect";
import type { Quote } from "../domain.ts";
import {
  AssetNotFound,
  type FetchError,
  ImplausibleValue,
  MalformedPayload,
  MissingField,
  type ValidationError,
} from "../quote-api.ts";
import type { QueryParams, TransportShape } from "../transport.ts";

export const ASSET_ID = "bitcoin";

export const DEFAULT_BASE_URL =
  "https://api.coingecko.com/api/v3/simple/price";

export const SIMPLE_PRICE_PARAMS: QueryParams = {
  ids: ASSET_ID,
  vs_currencies: "usd",
  include_24hr_change: "true",
  include_24hr_vol: "true",
  include_last_updated_at: "true",
};

const REQUIRED_FIELDS = ["usd", "usd_24h_change"] as const;

// --- CoinGecko response schema ---

const CoinGeckoAsset = Schema.Struct({
  usd: Schema.Finite,
  usd_24h_change: Schema.Finite,
  usd_24h_vol: Schema.optional(Schema.NullOr(Schema.Finite)),
  last_updated_at: Schema.optional(Schema.NullOr(Schema.Int)),
});

type CoinGeckoAssetType = typeof CoinGeckoAsset.Type;

const decodeJson = Schema.decodeUnknown(Schema.parseJson());

// --- Decode CoinGecko body into Quote ---

export function decodeCoinGeckoBody(
  rawBody: string,
): Effect.Effect<Quote, ValidationError> {
  return decodeJson(rawBody).pipe(
    Effect.mapError(
      (e) => new MalformedPayload({ message: `Invalid JSON: ${e.message}` }),
    ),
    Effect.flatMap(interpretCoinGeckoResponse),
  );
}

function interpretCoinGeckoResponse(
  json: unknown,
): Effect.Effect<Quote, ValidationError> {
  if (!Predicate.isRecord(json)) {
    return Effect.fail(
      new MalformedPayload({ message: "Response is not an object" }),
    );
  }

  const asset = json[ASSET_ID];

  if (!Predicate.isRecord(asset) || Object.keys(asset).length === 0) {
    return Effect.fail(new AssetNotFound({ asset: ASSET_ID }));
  }

  for (const field of REQUIRED_FIELDS) {
    if (asset[field] === undefined || asset[field] === null) {
      return Effect.fail(new MissingField({ field }));
    }
  }

  return Schema.decodeUnknown(CoinGeckoAsset)(asset).pipe(
    Effect.mapError(
      (e) => new MalformedPayload({ message: `Invalid response: ${e.message}` }),
    ),
    Effect.flatMap(toQuote),
  );
}

function toQuote(
  asset: CoinGeckoAssetType,
): Effect.Effect<Quote, ImplausibleValue> {
  if (asset.usd <= 0) {
    return Effect.fail(
      new ImplausibleValue({ message: `Price must be positive, got ${asset.usd}` }),
    );
  }

  const volume = asset.usd_24h_vol ?? 0;
  if (volume < 0) {
    return Effect.fail(
      new ImplausibleValue({
        message: `24h volume must not be negative, got ${volume}`,
      }),
    );
  }

  const quote: Quote = {
    priceUsd: asset.usd,
    change24hPercent: asset.usd_24h_change,
    volume24hUsd: volume,
  };

  return Effect.succeed(
    asset.last_updated_at === undefined || asset.last_updated_at === null
      ? quote
      : { ...quote, lastUpdatedAtUnixSeconds: asset.last_updated_at },
  );
}

// --- One fetch-then-validate cycle ---

export function makeCoinGeckoFetch(
  transport: TransportShape,
  baseUrl: string,
  timeout: Duration.DurationInput,
): Effect.Effect<Quote, FetchError> {
  return transport.get(baseUrl, SIMPLE_PRICE_PARAMS, timeout).pipe(
    Effect.flatMap(decodeCoinGeckoBody),
  );
}
