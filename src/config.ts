// App configuration — read from the environment through effect's Config.

import { Config, Context, Duration, Layer } from "effect";
import { DEFAULT_BASE_URL } from "./providers/coingecko.ts";
import type { RetryPolicy } from "./retry.ts";

export interface AppConfigShape {
  readonly baseUrl: string;
  readonly requestTimeout: Duration.Duration;
  readonly cacheTtl: Duration.Duration;
  readonly retry: RetryPolicy;
}

export class AppConfig extends Context.Tag("AppConfig")<
  AppConfig,
  AppConfigShape
>() {}

const seconds = (
  name: string,
  fallback: number,
  allowZero: boolean,
): Config.Config<Duration.Duration> =>
  Config.number(name).pipe(
    Config.withDefault(fallback),
    Config.validate({
      message: allowZero
        ? `${name} must be zero or more seconds`
        : `${name} must be a positive number of seconds`,
      validation: (n) => (allowZero ? n >= 0 : n > 0),
    }),
    Config.map(Duration.seconds),
  );

export const appConfig: Config.Config<AppConfigShape> = Config.all({
  baseUrl: Config.string("COINGECKO_API_URL").pipe(
    Config.withDefault(DEFAULT_BASE_URL),
  ),
  requestTimeout: seconds("REQUEST_TIMEOUT", 10, false),
  cacheTtl: seconds("CACHE_TTL", 30, true),
  retry: Config.all({
    maxAttempts: Config.integer("RETRY_MAX_ATTEMPTS").pipe(
      Config.withDefault(3),
      Config.validate({
        message: "RETRY_MAX_ATTEMPTS must be at least 1",
        validation: (n) => n >= 1,
      }),
    ),
    delay: seconds("RETRY_DELAY", 2, true),
  }),
});

export const AppConfigLive = Layer.effect(AppConfig, appConfig);

// Set QUOTE_PROVIDER to "coingecko" (default) or "test".
export const quoteProvider = Config.literal("coingecko", "test")(
  "QUOTE_PROVIDER",
).pipe(Config.withDefault("coingecko" as const));
