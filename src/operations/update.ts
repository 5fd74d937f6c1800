/**
 * UpdateItem through the `AttributeUpdates` parameter.
 *
 * Adding, replacing and deleting attributes are one request shape with a
 * different action keyword:
 * - `ADD`: adds to a number or to a set; creates the attribute if absent.
 * - `PUT`: replaces the attribute's value.
 * - `DELETE`: removes a scalar attribute, or the given elements of a set.
 */

import type { Transport } from "../adapters/adapter.js";
import type { TableDefinition } from "../types/table.js";
import type { Key } from "../types/key.js";
import type { Attribute, AttributeValue } from "../marshalling/types.js";
import { isSetAttribute } from "../marshalling/types.js";
import { type Result, ok, err } from "../types/common.js";
import { type DynamoError, validationError } from "../types/errors.js";
import { buildKey } from "../keys/key-builder.js";
import { marshallAttribute } from "../marshalling/marshall.js";
import { parseAcknowledgement } from "../marshalling/response.js";
import { type Logger, silentLogger } from "../utils/logger.js";
import { sendRequest } from "./send.js";

/** Action keyword of an attribute update. */
export type UpdateAction = "ADD" | "PUT" | "DELETE";

/** One entry of the `AttributeUpdates` map. */
export interface AttributeUpdate {
  readonly Action: UpdateAction;
  readonly Value?: AttributeValue;
}

/** Options for the update operations. */
export interface UpdateOptions {
  readonly logger?: Logger | undefined;
}

/**
 * Builds the `AttributeUpdates` map. A `DELETE` of a scalar attribute
 * removes it outright and so carries no `Value`.
 */
export const buildAttributeUpdates = (
  attributes: readonly Attribute[],
  action: UpdateAction,
): Readonly<Record<string, AttributeUpdate>> =>
  Object.fromEntries(
    attributes.map((attribute): [string, AttributeUpdate] => [
      attribute.name,
      action === "DELETE" && !isSetAttribute(attribute)
        ? { Action: action }
        : { Action: action, Value: marshallAttribute(attribute) },
    ]),
  );

/**
 * Applies `action` to `attributes` on the item identified by `key`.
 *
 * @returns `true` once the service acknowledges with a parseable body, or a
 *   `MissingAttributes` validation error (without sending) for an empty list.
 */
export const executeUpdate = async (
  transport: Transport,
  table: TableDefinition,
  key: Key,
  attributes: readonly Attribute[],
  action: UpdateAction,
  options?: UpdateOptions,
): Promise<Result<boolean, DynamoError>> => {
  const logger = options?.logger ?? silentLogger;

  if (attributes.length === 0) {
    return err(validationError("MissingAttributes", "At least one attribute is required"));
  }

  const keyMap = buildKey(table, key);
  if (!keyMap.success) return keyMap;

  const body = await sendRequest(
    transport,
    "UpdateItem",
    {
      TableName: table.tableName,
      Key: keyMap.data,
      AttributeUpdates: buildAttributeUpdates(attributes, action),
    },
    logger,
    { table: table.tableName, action },
  );
  if (!body.success) return body;

  const acknowledgement = parseAcknowledgement(body.data);
  if (!acknowledgement.success) return acknowledgement;

  return ok(true);
};

/** `ADD` update: increments numbers, unions sets. */
export const executeAddAttributes = (
  transport: Transport,
  table: TableDefinition,
  key: Key,
  attributes: readonly Attribute[],
  options?: UpdateOptions,
): Promise<Result<boolean, DynamoError>> =>
  executeUpdate(transport, table, key, attributes, "ADD", options);

/** `PUT` update: overwrites attribute values. */
export const executeUpdateAttributes = (
  transport: Transport,
  table: TableDefinition,
  key: Key,
  attributes: readonly Attribute[],
  options?: UpdateOptions,
): Promise<Result<boolean, DynamoError>> =>
  executeUpdate(transport, table, key, attributes, "PUT", options);

/** `DELETE` update: removes attributes, or elements of sets. */
export const executeDeleteAttributes = (
  transport: Transport,
  table: TableDefinition,
  key: Key,
  attributes: readonly Attribute[],
  options?: UpdateOptions,
): Promise<Result<boolean, DynamoError>> =>
  executeUpdate(transport, table, key, attributes, "DELETE", options);
