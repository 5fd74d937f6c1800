/**
 * DeleteItem: removes one item by primary key.
 */

import type { Transport } from "../adapters/adapter.js";
import type { TableDefinition } from "../types/table.js";
import type { Key } from "../types/key.js";
import { type Result, ok } from "../types/common.js";
import type { DynamoError } from "../types/errors.js";
import { buildKey } from "../keys/key-builder.js";
import { parseAcknowledgement } from "../marshalling/response.js";
import { type Logger, silentLogger } from "../utils/logger.js";
import { sendRequest } from "./send.js";

/** Options for {@link executeDelete}. */
export interface DeleteOptions {
  readonly logger?: Logger | undefined;
}

/**
 * Executes a DeleteItem request.
 *
 * Deleting a key that does not exist still succeeds.
 */
export const executeDelete = async (
  transport: Transport,
  table: TableDefinition,
  key: Key,
  options?: DeleteOptions,
): Promise<Result<boolean, DynamoError>> => {
  const logger = options?.logger ?? silentLogger;

  const keyMap = buildKey(table, key);
  if (!keyMap.success) return keyMap;

  const body = await sendRequest(
    transport,
    "DeleteItem",
    { TableName: table.tableName, Key: keyMap.data },
    logger,
    { table: table.tableName },
  );
  if (!body.success) return body;

  const acknowledgement = parseAcknowledgement(body.data);
  if (!acknowledgement.success) return acknowledgement;

  return ok(true);
};
