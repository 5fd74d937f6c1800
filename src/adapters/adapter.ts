/**
 * Transport interface: the boundary between this library and whatever
 * signs and sends DynamoDB requests.
 *
 * A transport is a record of functions (not a class). It owns
 * credentials, signing, retries, connections and timeouts; the library
 * only hands it an operation name and a JSON payload and reads back the
 * response body.
 */

/** DynamoDB API operations issued by this library. */
export type DynamoOperation =
  | "GetItem"
  | "PutItem"
  | "DeleteItem"
  | "UpdateItem"
  | "BatchWriteItem"
  | "BatchGetItem";

/** The JSON request document of one operation, in DynamoDB's field names. */
export type RequestPayload = Readonly<Record<string, unknown>>;

export interface Transport {
  /**
   * Sends one request and resolves with the raw response body.
   *
   * Rejects on any network, auth or non-2xx failure; the rejection reaches
   * the caller as a `transport` error.
   */
  readonly send: (
    operation: DynamoOperation,
    payload: RequestPayload,
  ) => Promise<string>;
}
