// Quote cache — pure freshness rules.
//
// A single entry holds the last successful quote and when it was stored.
// An entry is fresh while `now - fetchedAt < ttlMs`; after that it stays in
// place but is never served. Empty and expired look the same to callers:
// both mean "fetch".
//
// Zero external dependencies — just data in, data out.

import type { Quote } from "./domain.ts";

// --- State ---

export interface CachedQuote {
  readonly quote: Quote;
  readonly fetchedAt: number; // epoch ms
}

export type Fresh = { readonly _tag: "Fresh"; readonly quote: Quote };
export type Expired = { readonly _tag: "Expired"; readonly ageMs: number };
export type Empty = { readonly _tag: "Empty" };

export type Lookup = Fresh | Expired | Empty;

// --- Transitions ---

export function lookup(
  entry: CachedQuote | undefined,
  now: number,
  ttlMs: number,
): Lookup {
  if (entry === undefined) return { _tag: "Empty" };
  const ageMs = now - entry.fetchedAt;
  return ageMs < ttlMs
    ? { _tag: "Fresh", quote: entry.quote }
    : { _tag: "Expired", ageMs };
}

/** The entry that replaces whatever was cached after a successful fetch. */
export function store(quote: Quote, now: number): CachedQuote {
  return { quote, fetchedAt: now };
}
