import { expect, test } from "vitest";
import { Effect, Either } from "effect";
import {
  decodeCoinGeckoBody,
  DEFAULT_BASE_URL,
  makeCoinGeckoFetch,
  SIMPLE_PRICE_PARAMS,
} from "./coingecko.ts";
import { makeScriptedTransport } from "./coingecko-mock.ts";
import { HttpError, type ValidationError } from "../quote-api.ts";
import type { Quote } from "../domain.ts";

// --- Test data ---

const validAsset = {
  usd: 50000,
  usd_24h_change: 3.21,
  usd_24h_vol: 1000000,
  last_updated_at: 1700000000,
};

const body = (json: unknown): string => JSON.stringify(json);

// --- Helpers ---

function decode(raw: string): Promise<Either.Either<Quote, ValidationError>> {
  return Effect.runPromise(Effect.either(decodeCoinGeckoBody(raw)));
}

async function decodeSuccess(raw: string): Promise<Quote> {
  const result = await decode(raw);
  if (Either.isLeft(result)) throw new Error(`Expected success, got: ${result.left._tag}`);
  return result.right;
}

async function decodeFailure(raw: string): Promise<ValidationError> {
  const result = await decode(raw);
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  return result.left;
}

// --- decodeCoinGeckoBody ---

test("decodeCoinGeckoBody: valid payload produces a Quote", async () => {
  const quote = await decodeSuccess(body({ bitcoin: validAsset }));

  expect(quote).toEqual({
    priceUsd: 50000,
    change24hPercent: 3.21,
    volume24hUsd: 1000000,
    lastUpdatedAtUnixSeconds: 1700000000,
  });
});

test("decodeCoinGeckoBody: optional fields default when absent", async () => {
  const quote = await decodeSuccess(
    body({ bitcoin: { usd: 61000, usd_24h_change: -1.5 } }),
  );

  expect(quote.volume24hUsd).toBe(0);
  expect("lastUpdatedAtUnixSeconds" in quote).toBe(false);
});

test("decodeCoinGeckoBody: null optional fields count as absent", async () => {
  const quote = await decodeSuccess(
    body({
      bitcoin: { usd: 61000, usd_24h_change: -1.5, usd_24h_vol: null, last_updated_at: null },
    }),
  );

  expect(quote.volume24hUsd).toBe(0);
  expect("lastUpdatedAtUnixSeconds" in quote).toBe(false);
});

test("decodeCoinGeckoBody: extra fields are ignored", async () => {
  const quote = await decodeSuccess(
    body({ bitcoin: { ...validAsset, usd_market_cap: 1 }, ethereum: { usd: 3000 } }),
  );

  expect(quote.priceUsd).toBe(50000);
});

test("decodeCoinGeckoBody: non-JSON body returns MalformedPayload", async () => {
  const error = await decodeFailure("<html>Bad gateway</html>");
  expect(error._tag).toBe("MalformedPayload");
});

test("decodeCoinGeckoBody: top-level array returns MalformedPayload", async () => {
  const error = await decodeFailure(body([validAsset]));
  expect(error._tag).toBe("MalformedPayload");
});

test("decodeCoinGeckoBody: missing asset returns AssetNotFound", async () => {
  const error = await decodeFailure(body({ ethereum: validAsset }));
  expect(error).toEqual(expect.objectContaining({ _tag: "AssetNotFound", asset: "bitcoin" }));
});

test("decodeCoinGeckoBody: empty asset object returns AssetNotFound", async () => {
  const error = await decodeFailure(body({ bitcoin: {} }));
  expect(error._tag).toBe("AssetNotFound");
});

test("decodeCoinGeckoBody: non-object asset returns AssetNotFound", async () => {
  const error = await decodeFailure(body({ bitcoin: 50000 }));
  expect(error._tag).toBe("AssetNotFound");
});

test("decodeCoinGeckoBody: missing usd returns MissingField(usd)", async () => {
  const error = await decodeFailure(body({ bitcoin: { usd_24h_change: 1 } }));
  expect(error).toEqual(expect.objectContaining({ _tag: "MissingField", field: "usd" }));
});

test("decodeCoinGeckoBody: missing usd_24h_change returns MissingField(usd_24h_change)", async () => {
  const error = await decodeFailure(body({ bitcoin: { usd: 50000, usd_24h_vol: 5 } }));
  expect(error).toEqual(
    expect.objectContaining({ _tag: "MissingField", field: "usd_24h_change" }),
  );
});

test("decodeCoinGeckoBody: null required field counts as missing", async () => {
  const error = await decodeFailure(body({ bitcoin: { usd: 50000, usd_24h_change: null } }));
  expect(error).toEqual(
    expect.objectContaining({ _tag: "MissingField", field: "usd_24h_change" }),
  );
});

test("decodeCoinGeckoBody: string price returns MalformedPayload", async () => {
  const error = await decodeFailure(
    body({ bitcoin: { usd: "50000", usd_24h_change: 1 } }),
  );
  expect(error._tag).toBe("MalformedPayload");
});

test("decodeCoinGeckoBody: fractional last_updated_at returns MalformedPayload", async () => {
  const error = await decodeFailure(
    body({ bitcoin: { ...validAsset, last_updated_at: 1700000000.5 } }),
  );
  expect(error._tag).toBe("MalformedPayload");
});

test("decodeCoinGeckoBody: non-positive prices are always ImplausibleValue", async () => {
  for (const usd of [0, -0.01, -1, -50000]) {
    const error = await decodeFailure(body({ bitcoin: { usd, usd_24h_change: 1 } }));
    expect(error._tag).toBe("ImplausibleValue");
  }
});

test("decodeCoinGeckoBody: positive prices with both required fields are always accepted", async () => {
  for (const usd of [0.0001, 1, 50000, 1e9]) {
    for (const usd_24h_change of [-99, -5, 0, 2, 42.5]) {
      const quote = await decodeSuccess(body({ bitcoin: { usd, usd_24h_change } }));
      expect(quote.priceUsd).toBe(usd);
      expect(quote.change24hPercent).toBe(usd_24h_change);
    }
  }
});

test("decodeCoinGeckoBody: overflowing numbers are MalformedPayload", async () => {
  // JSON.parse turns 1e999 into Infinity.
  const bodies = [
    '{"bitcoin":{"usd":1e999,"usd_24h_change":1}}',
    '{"bitcoin":{"usd":50000,"usd_24h_change":-1e999}}',
    '{"bitcoin":{"usd":50000,"usd_24h_change":1,"usd_24h_vol":1e999}}',
  ];
  for (const raw of bodies) {
    const error = await decodeFailure(raw);
    expect(error._tag).toBe("MalformedPayload");
  }
});

test("decodeCoinGeckoBody: negative volume returns ImplausibleValue", async () => {
  const error = await decodeFailure(body({ bitcoin: { ...validAsset, usd_24h_vol: -1 } }));
  expect(error._tag).toBe("ImplausibleValue");
});

// --- makeCoinGeckoFetch ---

test("makeCoinGeckoFetch: requests the simple price endpoint with BTC/USD params", async () => {
  const result = await Effect.runPromise(
    Effect.gen(function* () {
      const scripted = yield* makeScriptedTransport([
        Effect.succeed(body({ bitcoin: validAsset })),
      ]);
      const quote = yield* makeCoinGeckoFetch(scripted.transport, DEFAULT_BASE_URL, "10 seconds");
      return { quote, requests: yield* scripted.requests };
    }),
  );

  expect(result.quote.priceUsd).toBe(50000);
  expect(result.requests).toEqual([
    {
      url: "https://api.coingecko.com/api/v3/simple/price",
      params: {
        ids: "bitcoin",
        vs_currencies: "usd",
        include_24hr_change: "true",
        include_24hr_vol: "true",
        include_last_updated_at: "true",
      },
    },
  ]);
  expect(result.requests[0]?.params).toBe(SIMPLE_PRICE_PARAMS);
});

test("makeCoinGeckoFetch: transport errors pass through unchanged", async () => {
  const result = await Effect.runPromise(
    Effect.gen(function* () {
      const scripted = yield* makeScriptedTransport([
        Effect.fail(new HttpError({ status: 429 })),
      ]);
      return yield* Effect.either(
        makeCoinGeckoFetch(scripted.transport, DEFAULT_BASE_URL, "10 seconds"),
      );
    }),
  );

  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result)) {
    expect(result.left).toEqual(expect.objectContaining({ _tag: "HttpError", status: 429 }));
  }
});
