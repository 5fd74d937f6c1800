/**
 * PutItem: writes one full item, replacing any item with the same key.
 */

import type { Transport } from "../adapters/adapter.js";
import type { TableDefinition } from "../types/table.js";
import type { Item } from "../types/item.js";
import { type Result, ok, err } from "../types/common.js";
import { type DynamoError, validationError } from "../types/errors.js";
import { marshallItem } from "../marshalling/marshall.js";
import { parseAcknowledgement } from "../marshalling/response.js";
import { type Logger, silentLogger } from "../utils/logger.js";
import { sendRequest } from "./send.js";

/** Options for {@link executePut}. */
export interface PutOptions {
  readonly logger?: Logger | undefined;
}

/**
 * Executes a PutItem request.
 *
 * @returns `true` once the service acknowledges with a parseable body, or a
 *   `MissingAttributes` validation error (without sending) for an empty item.
 */
export const executePut = async (
  transport: Transport,
  table: TableDefinition,
  item: Item,
  options?: PutOptions,
): Promise<Result<boolean, DynamoError>> => {
  const logger = options?.logger ?? silentLogger;

  if (item.attributes().length === 0) {
    return err(validationError("MissingAttributes", "At least one attribute is required"));
  }

  const body = await sendRequest(
    transport,
    "PutItem",
    { TableName: table.tableName, Item: marshallItem(item) },
    logger,
    { table: table.tableName },
  );
  if (!body.success) return body;

  const acknowledgement = parseAcknowledgement(body.data);
  if (!acknowledgement.success) return acknowledgement;

  return ok(true);
};
