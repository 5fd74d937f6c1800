/**
 * GetItem: reads one item by primary key.
 */

import type { Transport } from "../adapters/adapter.js";
import type { TableDefinition } from "../types/table.js";
import type { Key } from "../types/key.js";
import type { Item } from "../types/item.js";
import { type Result, err } from "../types/common.js";
import { type DynamoError, notFoundError } from "../types/errors.js";
import { buildKey } from "../keys/key-builder.js";
import { unmarshallItem } from "../marshalling/unmarshall.js";
import { parseResponseBody } from "../marshalling/response.js";
import { type Logger, silentLogger } from "../utils/logger.js";
import { sendRequest } from "./send.js";

/** Options for {@link executeGet}. */
export interface GetOptions {
  readonly consistentRead?: boolean | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Executes a GetItem request.
 *
 * @returns The item, or a `not-found` error when the response has no
 *   `Item` field. `"Item": {}` decodes to an item with no attributes.
 */
export const executeGet = async (
  transport: Transport,
  table: TableDefinition,
  key: Key,
  options?: GetOptions,
): Promise<Result<Item, DynamoError>> => {
  const logger = options?.logger ?? silentLogger;

  const keyMap = buildKey(table, key);
  if (!keyMap.success) return keyMap;

  const body = await sendRequest(
    transport,
    "GetItem",
    {
      TableName: table.tableName,
      Key: keyMap.data,
      ...(options?.consistentRead !== undefined
        ? { ConsistentRead: options.consistentRead }
        : {}),
    },
    logger,
    { table: table.tableName },
  );
  if (!body.success) return body;

  const document = parseResponseBody(body.data);
  if (!document.success) return document;

  if (!Object.hasOwn(document.data, "Item")) {
    return err(
      notFoundError(`No item in "${table.tableName}" with the requested key`),
    );
  }

  return unmarshallItem(document.data["Item"], logger);
};
