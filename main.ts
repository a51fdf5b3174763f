import { Command, Options } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import {
  Console,
  Duration,
  Effect,
  Layer,
  Logger,
  LogLevel,
  Option,
  Schema,
} from "effect";
import type { RequestMode } from "./src/domain.ts";
import type { FetchError } from "./src/quote-api.ts";
import { BtcQuotes, BtcQuotesLive } from "./src/quote-service.ts";
import { AppConfigLive, quoteProvider } from "./src/config.ts";
import { HttpTransportLive } from "./src/transport.ts";
import { TransportTestLive } from "./src/providers/coingecko-mock.ts";
import { deriveView } from "./src/trend.ts";
import { formatError, formatQuote } from "./src/format.ts";

// --- CLI ---

const retry = Options.boolean("retry").pipe(
  Options.withAlias("r"),
  Options.withDescription("Skip the cache and refetch, retrying on failure"),
);

const watch = Options.integer("watch").pipe(
  Options.withAlias("w"),
  Options.withDescription("Refresh every N seconds (10-300) until interrupted"),
  Options.withSchema(Schema.Number.pipe(Schema.between(10, 300))),
  Options.optional,
);

const raw = Options.boolean("raw").pipe(
  Options.withDescription("Also print the validated quote as JSON"),
);

const verbose = Options.boolean("verbose").pipe(
  Options.withAlias("v"),
  Options.withDescription("Show cache and retry diagnostics"),
);

const logApiError = (e: FetchError) => Console.error(formatError(e));

const command = Command.make(
  "btc-quote",
  { retry, watch, raw, verbose },
  ({ retry, watch, raw, verbose }) => {
    const render = (mode: RequestMode) =>
      Effect.gen(function* () {
        const quotes = yield* BtcQuotes;
        const quote = yield* quotes.getQuote(mode);
        yield* Console.log(formatQuote(quote, deriveView(quote)));
        if (raw) yield* Console.log(JSON.stringify(quote, null, 2));
      });

    const firstMode: RequestMode = retry ? "force-retry" : "cached";

    // Watch mode keeps going after a failed refresh; later refreshes go
    // through the cache like a plain run.
    const program: Effect.Effect<void, FetchError, BtcQuotes> = Option.match(watch, {
      onNone: () => render(firstMode),
      onSome: (seconds) =>
        render(firstMode).pipe(
          Effect.catchAll(logApiError),
          Effect.zipRight(
            render("cached").pipe(
              Effect.catchAll(logApiError),
              Effect.delay(Duration.seconds(seconds)),
              Effect.forever,
            ),
          ),
        ),
    });

    return program.pipe(
      Logger.withMinimumLogLevel(verbose ? LogLevel.Debug : LogLevel.Info),
    );
  },
);

// --- Layers ---
// Set QUOTE_PROVIDER to "coingecko" (default) or "test".

const TransportLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* quoteProvider;
    switch (provider) {
      case "test":
        return TransportTestLive;
      case "coingecko":
        return HttpTransportLive.pipe(Layer.provide(FetchHttpClient.layer));
    }
  }),
);

const BtcQuotesMain = BtcQuotesLive.pipe(
  Layer.provide(Layer.merge(TransportLive, AppConfigLive)),
);

// --- Run ---

const cli = Command.run(command, {
  name: "btc-quote",
  version: "0.1.0",
});

cli(process.argv).pipe(
  Effect.catchTags({
    Timeout: logApiError,
    ConnectionError: logApiError,
    HttpError: logApiError,
    OtherTransportError: logApiError,
    MalformedPayload: logApiError,
    AssetNotFound: logApiError,
    MissingField: logApiError,
    ImplausibleValue: logApiError,
  }),
  Effect.provide(BtcQuotesMain),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
