// Pure formatting functions — no I/O.

import type { DerivedView, Quote, TrendBucket } from "./domain.ts";
import type { FetchError, HttpError } from "./quote-api.ts";
import { trendDirection } from "./trend.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Numbers ---

const usdCents = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const usdWhole = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export function formatUsd(amount: number): string {
  return usdCents.format(amount);
}

export function formatVolume(amount: number): string {
  return usdWhole.format(amount);
}

/** `YYYY-MM-DD HH:MM:SS UTC` for a unix timestamp in seconds. */
export function formatTimestamp(unixSeconds: number): string {
  const iso = new Date(unixSeconds * 1000).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

// --- Quote formatting ---

const TREND_LABELS: Record<TrendBucket, string> = {
  "strong-up": "Strong rally",
  "moderate-up": "Steady climb",
  "slight-up": "Slight gain",
  flat: "Holding flat",
  "slight-down": "Slight dip",
  "moderate-down": "Clear decline",
  "strong-down": "Sharp drop",
};

export function trendLabel(bucket: TrendBucket): string {
  return TREND_LABELS[bucket];
}

/** `▲ +$1,605.00 (+3.21%)`, without colour. */
export function formatChange(quote: Quote, view: DerivedView): string {
  const direction = trendDirection(view.trendBucket);
  const [arrow, sign] =
    direction === "up" ? ["▲", "+"] : direction === "down" ? ["▼", "-"] : ["■", ""];
  const amount = formatUsd(Math.abs(view.changeAmountUsd));
  const percent = Math.abs(quote.change24hPercent).toFixed(2);
  return `${arrow} ${sign}${amount} (${sign}${percent}%)`;
}

export function formatQuote(quote: Quote, view: DerivedView): string {
  const direction = trendDirection(view.trendBucket);
  const color = direction === "up" ? GREEN : direction === "down" ? RED : DIM;

  const lines = [
    "",
    `${BOLD}  BTC/USD${RESET}`,
    `  ${BOLD}${formatUsd(quote.priceUsd)}${RESET}`,
    `  ${color}${formatChange(quote, view)}${RESET}`,
    "",
    `  24h ago   ${formatUsd(view.previousPriceUsd)}`,
    `  Volume    ${formatVolume(quote.volume24hUsd)}`,
    `  Trend     ${trendLabel(view.trendBucket)}`,
  ];

  if (quote.lastUpdatedAtUnixSeconds !== undefined) {
    lines.push(
      `  ${DIM}Updated   ${formatTimestamp(quote.lastUpdatedAtUnixSeconds)}${RESET}`,
    );
  }

  lines.push("");
  return lines.join("\n");
}

// --- Error formatting ---

export interface DescribedError {
  readonly title: string;
  readonly hint: string;
}

export function formatError(error: FetchError): string {
  const friendly = describeError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

export function describeError(error: FetchError): DescribedError {
  switch (error._tag) {
    case "Timeout":
      return {
        title: "Request timed out",
        hint: `No answer within ${error.timeoutMs / 1000}s. Check your connection and try again.`,
      };
    case "ConnectionError":
      return {
        title: "Network error",
        hint: "Could not reach the API. Check your internet connection.",
      };
    case "HttpError":
      return describeHttpError(error);
    case "OtherTransportError":
      return {
        title: "Request failed",
        hint: error.message,
      };
    case "MalformedPayload":
      return {
        title: "Unexpected response",
        hint: "The API returned data in an unexpected format.",
      };
    case "AssetNotFound":
      return {
        title: "No Bitcoin data",
        hint: `The response did not include "${error.asset}".`,
      };
    case "MissingField":
      return {
        title: "Incomplete data",
        hint: `The response is missing "${error.field}".`,
      };
    case "ImplausibleValue":
      return {
        title: "Implausible data",
        hint: error.message,
      };
  }
}

function describeHttpError(error: HttpError): DescribedError {
  if (error.status === 429) {
    return {
      title: "Rate limited",
      hint: "Too many requests. Wait a moment, then run again with --retry.",
    };
  }
  if (error.status >= 500 && error.status < 600) {
    return {
      title: "Server error",
      hint: "CoinGecko is having issues. Try again in a few minutes.",
    };
  }
  return {
    title: "HTTP error",
    hint: `HTTP ${error.status}`,
  };
}
