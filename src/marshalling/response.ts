/**
 * Shape checks for JSON response documents.
 *
 * Every nesting level of a response is checked against the shape the
 * decoder expects before it is unpacked. A mismatch is a
 * `malformed-response` carrying the offending fragment, never a default.
 */

import { z } from "zod";
import { type Result, ok, err } from "../types/common.js";
import { type DynamoError, malformedResponseError } from "../types/errors.js";

export type JsonObject = Record<string, unknown>;

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * A JSON object with unknown members. Arrays and `null` do not match.
 *
 * The object is passed through as is rather than copied key by key, so a
 * member named `__proto__` stays an own property.
 */
export const jsonObjectSchema = z.custom<JsonObject>(isJsonObject);

export const jsonArraySchema = z.array(z.unknown());

const parseJson = (body: string): Result<unknown, DynamoError> => {
  try {
    return ok(JSON.parse(body));
  } catch {
    return err(malformedResponseError(body, "Response is not valid JSON"));
  }
};

/**
 * Parses a raw response body whose top level must be a JSON object.
 */
export const parseResponseBody = (
  body: string,
): Result<JsonObject, DynamoError> => {
  const document = parseJson(body);
  if (!document.success) return document;
  return expectObject(document.data, body);
};

/**
 * Checks that a write acknowledgement is JSON. Its contents are not used,
 * so any JSON value is accepted.
 */
export const parseAcknowledgement = (
  body: string,
): Result<void, DynamoError> => {
  const document = parseJson(body);
  return document.success ? ok(undefined) : document;
};

/**
 * Checks that `value` is a JSON object.
 *
 * @param fragment - What to report on failure; defaults to `value` itself
 */
export const expectObject = (
  value: unknown,
  fragment: unknown = value,
): Result<JsonObject, DynamoError> => {
  const parsed = jsonObjectSchema.safeParse(value);
  return parsed.success ? ok(parsed.data) : err(malformedResponseError(fragment));
};

/** Checks that `value` is a JSON array. */
export const expectArray = (
  value: unknown,
  fragment: unknown = value,
): Result<readonly unknown[], DynamoError> => {
  const parsed = jsonArraySchema.safeParse(value);
  return parsed.success ? ok(parsed.data) : err(malformedResponseError(fragment));
};
