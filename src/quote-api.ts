// Quote API — domain errors shared by the transport and the validator.

import { Data } from "effect";

// --- Transport errors ---

export class Timeout extends Data.TaggedError("Timeout")<{
  readonly timeoutMs: number;
}> {}

export class ConnectionError extends Data.TaggedError("ConnectionError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class OtherTransportError extends Data.TaggedError(
  "OtherTransportError",
)<{
  readonly message: string;
}> {}

export type TransportError =
  | Timeout
  | ConnectionError
  | HttpError
  | OtherTransportError;

// --- Validation errors ---

export class MalformedPayload extends Data.TaggedError("MalformedPayload")<{
  readonly message: string;
}> {}

export class AssetNotFound extends Data.TaggedError("AssetNotFound")<{
  readonly asset: string;
}> {}

export class MissingField extends Data.TaggedError("MissingField")<{
  readonly field: string;
}> {}

export class ImplausibleValue extends Data.TaggedError("ImplausibleValue")<{
  readonly message: string;
}> {}

export type ValidationError =
  | MalformedPayload
  | AssetNotFound
  | MissingField
  | ImplausibleValue;

/** Everything a single fetch-then-validate cycle can fail with. */
export type FetchError = TransportError | ValidationError;
