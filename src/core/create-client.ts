/**
 * Client factory: binds a transport and a logger to the item and batch
 * operations.
 */

import type { Transport } from "../adapters/adapter.js";
import type { TableDefinition } from "../types/table.js";
import type { Key } from "../types/key.js";
import type { Item } from "../types/item.js";
import type { Attribute } from "../marshalling/types.js";
import type { DynamoError } from "../types/errors.js";
import type { Result } from "../types/common.js";
import { type Logger, createConsoleLogger } from "../utils/logger.js";
import { executeGet } from "../operations/get.js";
import { executePut } from "../operations/put.js";
import { executeDelete } from "../operations/delete.js";
import {
  executeAddAttributes,
  executeUpdateAttributes,
  executeDeleteAttributes,
} from "../operations/update.js";
import {
  executeBatchWrite,
  type BatchWriteRequest,
  type UnprocessedItems,
} from "../operations/batch-write.js";
import {
  executeBatchGet,
  createBatchGet,
  type BatchGet,
  type BatchGetResult,
} from "../operations/batch-get.js";

/** Configuration for creating a client. */
export interface ClientConfig {
  readonly transport: Transport;
  /** Defaults to a console logger at `warn`. */
  readonly logger?: Logger | undefined;
}

/** Operations scoped to a single table. */
export interface TableClient {
  readonly definition: TableDefinition;

  /** Reads an item; a miss is a `not-found` error. */
  readonly getItem: (
    key: Key,
    options?: { readonly consistentRead?: boolean | undefined },
  ) => Promise<Result<Item, DynamoError>>;

  /** Writes a full item, replacing any item with the same key. */
  readonly putItem: (item: Item) => Promise<Result<boolean, DynamoError>>;

  readonly deleteItem: (key: Key) => Promise<Result<boolean, DynamoError>>;

  /** `ADD` update: increments numbers, unions sets. */
  readonly addAttributes: (
    key: Key,
    attributes: readonly Attribute[],
  ) => Promise<Result<boolean, DynamoError>>;

  /** `PUT` update: overwrites attribute values. */
  readonly updateAttributes: (
    key: Key,
    attributes: readonly Attribute[],
  ) => Promise<Result<boolean, DynamoError>>;

  /** `DELETE` update: removes attributes, or elements of sets. */
  readonly deleteAttributes: (
    key: Key,
    attributes: readonly Attribute[],
  ) => Promise<Result<boolean, DynamoError>>;

  /** Starts a batch get on this table; add more tables with `addTable`. */
  readonly batchGetItems: (keys: readonly Key[]) => BatchGet;

  /** Same as {@link DynamoClient.batchWriteItem}. */
  readonly batchWriteItem: (
    request: BatchWriteRequest,
  ) => Promise<Result<UnprocessedItems, DynamoError>>;
}

/** The DynamoDB client. */
export interface DynamoClient {
  readonly table: (definition: TableDefinition) => TableClient;

  /**
   * Sends a batch write and returns the items the service did not apply.
   * Deciding whether to resend them is up to the caller.
   */
  readonly batchWriteItem: (
    request: BatchWriteRequest,
  ) => Promise<Result<UnprocessedItems, DynamoError>>;

  readonly batchGetItem: (
    batch: BatchGet,
    options?: { readonly consistentRead?: boolean | undefined },
  ) => Promise<Result<BatchGetResult, DynamoError>>;
}

/**
 * Creates a DynamoDB client.
 *
 * @example
 * ```ts
 * import { createClient, defineTable, createItem, numberAttribute } from "dynamo-items";
 *
 * const client = createClient({ transport });
 * const orders = client.table(defineTable({
 *   tableName: "Orders",
 *   partitionKey: { name: "id", type: "N" },
 * }));
 *
 * await orders.putItem(createItem().addAttribute(numberAttribute("id", "1")));
 * const result = await orders.getItem({ partitionKey: "1" });
 * ```
 */
export const createClient = (config: ClientConfig): DynamoClient => {
  const { transport } = config;
  const logger = config.logger ?? createConsoleLogger("warn");

  const batchWriteItem = (request: BatchWriteRequest) =>
    executeBatchWrite(transport, request, { logger });

  const table = (definition: TableDefinition): TableClient =>
    Object.freeze({
      definition,

      getItem: (key: Key, options?: { readonly consistentRead?: boolean | undefined }) =>
        executeGet(transport, definition, key, { ...options, logger }),

      putItem: (item: Item) => executePut(transport, definition, item, { logger }),

      deleteItem: (key: Key) => executeDelete(transport, definition, key, { logger }),

      addAttributes: (key: Key, attributes: readonly Attribute[]) =>
        executeAddAttributes(transport, definition, key, attributes, { logger }),

      updateAttributes: (key: Key, attributes: readonly Attribute[]) =>
        executeUpdateAttributes(transport, definition, key, attributes, { logger }),

      deleteAttributes: (key: Key, attributes: readonly Attribute[]) =>
        executeDeleteAttributes(transport, definition, key, attributes, { logger }),

      batchGetItems: (keys: readonly Key[]) => createBatchGet(definition, keys),

      batchWriteItem,
    });

  return Object.freeze({
    table,
    batchWriteItem,
    batchGetItem: (
      batch: BatchGet,
      options?: { readonly consistentRead?: boolean | undefined },
    ) => executeBatchGet(transport, batch, { ...options, logger }),
  });
};
