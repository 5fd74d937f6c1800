/**
 * Error taxonomy for item and batch operations.
 */

/** Precondition a caller-supplied request failed before anything was sent. */
export type ValidationCode =
  | "EmptyRequest"
  | "TooManyItems"
  | "ItemTooLarge"
  | "RequestTooLarge"
  | "MissingAttributes"
  | "InvalidKey";

/** The caller's data violates a precondition. Detected before any network call. */
export interface ValidationFailure {
  readonly type: "validation";
  readonly code: ValidationCode;
  readonly message: string;
}

/** A read found no record. An expected outcome of GetItem, not a fault. */
export interface NotFoundFailure {
  readonly type: "not-found";
  readonly message: string;
}

/** The service returned a shape the decoder cannot interpret. */
export interface MalformedResponseFailure {
  readonly type: "malformed-response";
  readonly message: string;
  /** Raw text of the part of the response that failed to decode. */
  readonly fragment: string;
}

/** The transport rejected; `cause` is whatever it rejected with. */
export interface TransportFailure {
  readonly type: "transport";
  readonly message: string;
  readonly cause: unknown;
}

/** Error type returned by every operation. */
export type DynamoError =
  | ValidationFailure
  | NotFoundFailure
  | MalformedResponseFailure
  | TransportFailure;

export const validationError = (
  code: ValidationCode,
  message: string,
): ValidationFailure => Object.freeze({ type: "validation" as const, code, message });

export const notFoundError = (message: string): NotFoundFailure =>
  Object.freeze({ type: "not-found" as const, message });

/**
 * Renders a decoded JSON fragment back to text for diagnostics.
 * Strings are kept as they are so a non-JSON body is reported verbatim.
 */
export const describeFragment = (fragment: unknown): string => {
  if (typeof fragment === "string") return fragment;
  return JSON.stringify(fragment) ?? String(fragment);
};

export const malformedResponseError = (
  fragment: unknown,
  message = "Unexpected response",
): MalformedResponseFailure => {
  const text = describeFragment(fragment);
  return Object.freeze({
    type: "malformed-response" as const,
    message: `${message}: ${text}`,
    fragment: text,
  });
};

export const transportError = (
  cause: unknown,
  operation: string,
): TransportFailure =>
  Object.freeze({
    type: "transport" as const,
    message:
      cause instanceof Error ? cause.message : `${operation} request failed`,
    cause,
  });
