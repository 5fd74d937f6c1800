/**
 * Dispatches one request through the transport.
 */

import type { DynamoOperation, RequestPayload, Transport } from "../adapters/adapter.js";
import { type Result, ok, err } from "../types/common.js";
import { type DynamoError, transportError } from "../types/errors.js";
import type { Logger } from "../utils/logger.js";

/**
 * Sends `payload` as `operation` and returns the raw body, or a
 * `transport` error wrapping whatever the transport rejected with.
 */
export const sendRequest = async (
  transport: Transport,
  operation: DynamoOperation,
  payload: RequestPayload,
  logger: Logger,
  context: Readonly<Record<string, unknown>> = {},
): Promise<Result<string, DynamoError>> => {
  logger.debug("Sending request", { operation, ...context });
  try {
    return ok(await transport.send(operation, payload));
  } catch (cause) {
    const error = transportError(cause, operation);
    logger.error("Request failed", { operation, ...context, error: error.message });
    return err(error);
  }
};
