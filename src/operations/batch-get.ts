/**
 * BatchGetItem: fetches items by key from one or more tables in one request.
 */

import type { Transport } from "../adapters/adapter.js";
import type { TableDefinition } from "../types/table.js";
import type { Key } from "../types/key.js";
import type { Item } from "../types/item.js";
import type { AttributeMap } from "../marshalling/types.js";
import { type Result, ok, err } from "../types/common.js";
import { type DynamoError, malformedResponseError } from "../types/errors.js";
import { buildKey } from "../keys/key-builder.js";
import { unmarshallItem } from "../marshalling/unmarshall.js";
import { expectArray, expectObject, parseResponseBody } from "../marshalling/response.js";
import { type Logger, silentLogger } from "../utils/logger.js";
import { sendRequest } from "./send.js";

/** The keys requested from one table. */
export interface BatchGetTable {
  readonly table: TableDefinition;
  readonly keys: readonly Key[];
}

/**
 * Keys to fetch, grouped by table name.
 *
 * Adding a table that is already present replaces its keys.
 */
export interface BatchGet {
  readonly addTable: (table: TableDefinition, keys: readonly Key[]) => BatchGet;
  /** Requested tables in the order they were first added. */
  readonly tables: () => readonly BatchGetTable[];
}

/** Options for {@link executeBatchGet}. */
export interface BatchGetOptions {
  readonly consistentRead?: boolean | undefined;
  readonly logger?: Logger | undefined;
}

/** Decoded BatchGetItem response. */
export interface BatchGetResult {
  /** Items found, per table, in response order. */
  readonly responses: Readonly<Record<string, readonly Item[]>>;
  /**
   * Keys the service did not get to, per table, as items holding the key
   * attributes. Empty when everything was read.
   */
  readonly unprocessedKeys: Readonly<Record<string, readonly Item[]>>;
}

/**
 * Starts a batch get with the keys of a first table.
 *
 * @example
 * ```ts
 * const batch = createBatchGet(orders, [{ partitionKey: "c-1", sortKey: "7" }])
 *   .addTable(customers, [{ partitionKey: "c-1" }]);
 * ```
 */
export const createBatchGet = (
  table: TableDefinition,
  keys: readonly Key[],
): BatchGet => {
  const tables = new Map<string, BatchGetTable>();

  const batch: BatchGet = Object.freeze({
    addTable: (next: TableDefinition, nextKeys: readonly Key[]) => {
      tables.set(next.tableName, Object.freeze({ table: next, keys: Object.freeze([...nextKeys]) }));
      return batch;
    },
    tables: () => Object.freeze([...tables.values()]),
  });

  return batch.addTable(table, keys);
};

/**
 * Builds the BatchGetItem request document.
 *
 * Fails with an `InvalidKey` validation error if any key does not fit its
 * table's key schema.
 */
export const buildBatchGetPayload = (
  batch: BatchGet,
  options?: Pick<BatchGetOptions, "consistentRead">,
): Result<Readonly<Record<string, unknown>>, DynamoError> => {
  const requestItems: Array<[string, Readonly<Record<string, unknown>>]> = [];

  for (const { table, keys } of batch.tables()) {
    const keyMaps: AttributeMap[] = [];
    for (const key of keys) {
      const keyMap = buildKey(table, key);
      if (!keyMap.success) return keyMap;
      keyMaps.push(keyMap.data);
    }
    requestItems.push([
      table.tableName,
      {
        Keys: keyMaps,
        ...(options?.consistentRead !== undefined
          ? { ConsistentRead: options.consistentRead }
          : {}),
      },
    ]);
  }

  return ok({ RequestItems: Object.fromEntries(requestItems) });
};

const decodeItems = (
  entries: unknown,
  logger: Logger,
): Result<readonly Item[], DynamoError> => {
  const list = expectArray(entries);
  if (!list.success) return list;

  const items: Item[] = [];
  for (const entry of list.data) {
    const item = unmarshallItem(entry, logger);
    if (!item.success) return item;
    items.push(item.data);
  }
  return ok(items);
};

/**
 * Decodes a BatchGetItem response body.
 *
 * `Responses` must be an object of table name to a list of items.
 * `UnprocessedKeys` may be absent; when present it must be an object of
 * table name to `{ "Keys": [...] }`.
 */
export const parseBatchGetResponse = (
  body: string,
  logger: Logger = silentLogger,
): Result<BatchGetResult, DynamoError> => {
  const document = parseResponseBody(body);
  if (!document.success) return document;

  const tables = expectObject(document.data["Responses"], body);
  if (!tables.success) return tables;

  const responses = new Map<string, readonly Item[]>();
  for (const [tableName, entries] of Object.entries(tables.data)) {
    const items = decodeItems(entries, logger);
    if (!items.success) return items;
    responses.set(tableName, items.data);
  }

  const unprocessedKeys = new Map<string, readonly Item[]>();
  const unprocessed = document.data["UnprocessedKeys"];
  if (unprocessed !== undefined) {
    const pending = expectObject(unprocessed);
    if (!pending.success) return pending;

    for (const [tableName, request] of Object.entries(pending.data)) {
      const keysAndAttributes = expectObject(request);
      if (!keysAndAttributes.success) return keysAndAttributes;
      if (!("Keys" in keysAndAttributes.data)) {
        return err(malformedResponseError(request, "Unprocessed keys without Keys"));
      }
      const keys = decodeItems(keysAndAttributes.data["Keys"], logger);
      if (!keys.success) return keys;
      unprocessedKeys.set(tableName, keys.data);
    }
  }

  return ok({
    responses: Object.fromEntries(responses),
    unprocessedKeys: Object.fromEntries(unprocessedKeys),
  });
};

/**
 * Sends a BatchGetItem request and decodes the items found.
 */
export const executeBatchGet = async (
  transport: Transport,
  batch: BatchGet,
  options?: BatchGetOptions,
): Promise<Result<BatchGetResult, DynamoError>> => {
  const logger = options?.logger ?? silentLogger;

  const payload = buildBatchGetPayload(batch, options);
  if (!payload.success) return payload;

  const body = await sendRequest(transport, "BatchGetItem", payload.data, logger, {
    tables: batch.tables().map((t) => t.table.tableName),
  });
  if (!body.success) return body;

  return parseBatchGetResponse(body.data, logger);
};
