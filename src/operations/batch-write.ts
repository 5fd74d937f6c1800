/**
 * BatchWriteItem: a single request bundling puts and deletes across tables.
 *
 * DynamoDB rejects a batch of more than 25 items, an item over 64 KB or
 * a request over 1 MB. These limits are checked here, before anything is
 * sent. Items the service accepts but does not apply come back as
 * "unprocessed items"; retrying them is left to the caller.
 */

import type { Transport } from "../adapters/adapter.js";
import type { Item } from "../types/item.js";
import type { AttributeMap } from "../marshalling/types.js";
import { type Result, ok, err } from "../types/common.js";
import { type DynamoError, validationError } from "../types/errors.js";
import { marshallItem } from "../marshalling/marshall.js";
import { unmarshallItem } from "../marshalling/unmarshall.js";
import { expectArray, expectObject, parseResponseBody } from "../marshalling/response.js";
import { type Logger, silentLogger } from "../utils/logger.js";
import { sendRequest } from "./send.js";

/** Maximum items per BatchWriteItem request. */
export const BATCH_WRITE_MAX_ITEMS = 25;

/** Maximum size of a single item, in bytes. */
export const ITEM_SIZE_LIMIT = 65_536;

/** Maximum combined size of all items in one BatchWriteItem request, in bytes. */
export const BATCH_WRITE_SIZE_LIMIT = 1_048_576;

/** The pending operations on one table. */
export interface TableWriteOperations {
  /** Items carrying only the key attributes of the records to delete. */
  readonly deleteRequests: readonly Item[];
  readonly putRequests: readonly Item[];
}

/**
 * Accumulates puts and deletes per table.
 *
 * Not synchronized: build one per batch and hand it to a single call.
 */
export interface BatchWriteRequest {
  readonly addPutRequest: (tableName: string, item: Item) => BatchWriteRequest;
  readonly addDeleteRequest: (tableName: string, key: Item) => BatchWriteRequest;
  /**
   * Asks the service for consumed capacity. The request carries the flag,
   * but the returned capacity data is not decoded.
   */
  readonly setReturnConsumedCapacity: (value: boolean) => BatchWriteRequest;
  /**
   * Asks the service for item collection metrics. The request carries the
   * flag, but the returned metrics are not decoded.
   */
  readonly setReturnItemCollectionMetrics: (value: boolean) => BatchWriteRequest;
  readonly returnConsumedCapacity: () => boolean;
  readonly returnItemCollectionMetrics: () => boolean;
  /** Operations per table, in the order tables were first used. */
  readonly operations: () => ReadonlyMap<string, TableWriteOperations>;
  /** Every item in the request: per table, its deletes and then its puts. */
  readonly items: () => readonly Item[];
}

/**
 * Items the service did not apply: table name, then operation kind as the
 * service names it (`"PutRequest"` / `"DeleteRequest"`), then the items in
 * response order.
 */
export type UnprocessedItems = Readonly<
  Record<string, Readonly<Record<string, readonly Item[]>>>
>;

/** Options for {@link executeBatchWrite}. */
export interface BatchWriteOptions {
  readonly logger?: Logger | undefined;
}

/**
 * Creates an empty batch write request.
 *
 * @example
 * ```ts
 * const request = createBatchWriteRequest()
 *   .addPutRequest("Orders", order)
 *   .addDeleteRequest("Orders", createItem([stringAttribute("customerId", "c-9")]));
 * ```
 */
export const createBatchWriteRequest = (): BatchWriteRequest => {
  const tables = new Map<string, { deleteRequests: Item[]; putRequests: Item[] }>();
  let consumedCapacity = false;
  let itemCollectionMetrics = false;

  const tableOperations = (tableName: string) => {
    let ops = tables.get(tableName);
    if (!ops) {
      ops = { deleteRequests: [], putRequests: [] };
      tables.set(tableName, ops);
    }
    return ops;
  };

  const request: BatchWriteRequest = Object.freeze({
    addPutRequest: (tableName: string, item: Item) => {
      tableOperations(tableName).putRequests.push(item);
      return request;
    },

    addDeleteRequest: (tableName: string, key: Item) => {
      tableOperations(tableName).deleteRequests.push(key);
      return request;
    },

    setReturnConsumedCapacity: (value: boolean) => {
      consumedCapacity = value;
      return request;
    },

    setReturnItemCollectionMetrics: (value: boolean) => {
      itemCollectionMetrics = value;
      return request;
    },

    returnConsumedCapacity: () => consumedCapacity,
    returnItemCollectionMetrics: () => itemCollectionMetrics,

    operations: () => {
      const snapshot = new Map<string, TableWriteOperations>();
      for (const [tableName, ops] of tables) {
        snapshot.set(
          tableName,
          Object.freeze({
            deleteRequests: Object.freeze([...ops.deleteRequests]),
            putRequests: Object.freeze([...ops.putRequests]),
          }),
        );
      }
      return snapshot;
    },

    items: () => {
      const all: Item[] = [];
      for (const ops of tables.values()) {
        all.push(...ops.deleteRequests, ...ops.putRequests);
      }
      return Object.freeze(all);
    },
  });

  return request;
};

/**
 * Checks the service limits, reporting the first one violated, in order:
 * empty request, item count, single item size, total size.
 */
export const validateBatchWriteRequest = (
  request: BatchWriteRequest,
): Result<void, DynamoError> => {
  const items = request.items();

  if (items.length === 0) {
    return err(validationError("EmptyRequest", "The request must contain at least 1 item"));
  }

  if (items.length > BATCH_WRITE_MAX_ITEMS) {
    return err(
      validationError(
        "TooManyItems",
        `The request cannot contain more than ${BATCH_WRITE_MAX_ITEMS} items (got ${items.length})`,
      ),
    );
  }

  let totalSize = 0;
  for (const item of items) {
    const size = item.size();
    if (size > ITEM_SIZE_LIMIT) {
      return err(
        validationError(
          "ItemTooLarge",
          `The size of an item cannot exceed ${ITEM_SIZE_LIMIT} bytes (got ${size})`,
        ),
      );
    }
    totalSize += size;
  }

  if (totalSize > BATCH_WRITE_SIZE_LIMIT) {
    return err(
      validationError(
        "RequestTooLarge",
        `The size of the request cannot exceed ${BATCH_WRITE_SIZE_LIMIT} bytes (got ${totalSize})`,
      ),
    );
  }

  return ok(undefined);
};

type WriteRequest =
  | { readonly DeleteRequest: { readonly Key: AttributeMap } }
  | { readonly PutRequest: { readonly Item: AttributeMap } };

/** Builds the BatchWriteItem request document. */
export const buildBatchWritePayload = (
  request: BatchWriteRequest,
): Readonly<Record<string, unknown>> => {
  const requestItems = Object.fromEntries(
    Array.from(request.operations(), ([tableName, ops]): [string, WriteRequest[]] => [
      tableName,
      [
        ...ops.deleteRequests.map((key) => ({ DeleteRequest: { Key: marshallItem(key) } })),
        ...ops.putRequests.map((item) => ({ PutRequest: { Item: marshallItem(item) } })),
      ],
    ]),
  );

  return {
    RequestItems: requestItems,
    ...(request.returnConsumedCapacity() ? { ReturnConsumedCapacity: "TOTAL" } : {}),
    ...(request.returnItemCollectionMetrics() ? { ReturnItemCollectionMetrics: "SIZE" } : {}),
  };
};

/**
 * Decodes a BatchWriteItem response body into its unprocessed items.
 *
 * `"UnprocessedItems": {}` means every item was applied and decodes to an
 * empty result. A missing or non-object `UnprocessedItems`, or a deviation
 * at any level below it, is a `malformed-response` error.
 */
export const parseBatchWriteResponse = (
  body: string,
  logger: Logger = silentLogger,
): Result<UnprocessedItems, DynamoError> => {
  const document = parseResponseBody(body);
  if (!document.success) return document;

  const tables = expectObject(document.data["UnprocessedItems"], body);
  if (!tables.success) return tables;

  const results = new Map<string, Map<string, Item[]>>();

  for (const [tableName, entries] of Object.entries(tables.data)) {
    const containers = expectArray(entries);
    if (!containers.success) return containers;

    const tableResult = new Map<string, Item[]>();

    for (const entry of containers.data) {
      const operations = expectObject(entry);
      if (!operations.success) return operations;

      for (const [kind, request] of Object.entries(operations.data)) {
        // { "Item": {...} } for puts, { "Key": {...} } for deletes
        const wrapped = expectObject(request);
        if (!wrapped.success) return wrapped;

        const items = tableResult.get(kind) ?? [];
        for (const attributes of Object.values(wrapped.data)) {
          const item = unmarshallItem(attributes, logger);
          if (!item.success) return item;
          items.push(item.data);
        }
        tableResult.set(kind, items);
      }
    }

    results.set(tableName, tableResult);
  }

  return ok(
    Object.fromEntries(
      Array.from(results, ([tableName, kinds]): [string, Record<string, Item[]>] => [
        tableName,
        Object.fromEntries(kinds),
      ]),
    ),
  );
};

/**
 * Validates, sends and decodes a BatchWriteItem request.
 *
 * @returns The unprocessed items (empty when everything was applied), or a
 *   DynamoError. Validation failures are returned without calling the
 *   transport.
 */
export const executeBatchWrite = async (
  transport: Transport,
  request: BatchWriteRequest,
  options?: BatchWriteOptions,
): Promise<Result<UnprocessedItems, DynamoError>> => {
  const logger = options?.logger ?? silentLogger;

  const valid = validateBatchWriteRequest(request);
  if (!valid.success) return valid;

  if (request.returnConsumedCapacity()) {
    logger.warn("ReturnConsumedCapacity is sent but the consumed capacity in the response is not decoded");
  }
  if (request.returnItemCollectionMetrics()) {
    logger.warn("ReturnItemCollectionMetrics is sent but the metrics in the response are not decoded");
  }

  const body = await sendRequest(
    transport,
    "BatchWriteItem",
    buildBatchWritePayload(request),
    logger,
    { tables: [...request.operations().keys()] },
  );
  if (!body.success) return body;

  return parseBatchWriteResponse(body.data, logger);
};
