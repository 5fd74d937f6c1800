/**
 * Builds the wire `Key` of an item from a table's key schema.
 */

import type { TableDefinition, KeyAttribute } from "../types/table.js";
import type { Key } from "../types/key.js";
import type { AttributeMap, AttributeValue } from "../marshalling/types.js";
import { type Result, ok, err } from "../types/common.js";
import { type DynamoError, validationError } from "../types/errors.js";

const keyValue = (attribute: KeyAttribute, value: string): AttributeValue => {
  switch (attribute.type) {
    case "S":
      return { S: value };
    case "N":
      return { N: value };
    case "B":
      return { B: value };
  }
};

/**
 * Builds the wire key for `key` on `table`.
 *
 * @returns The key map, or an `InvalidKey` validation error when the sort
 *   key is missing on a composite-key table or given on a simple-key table.
 *
 * @example
 * ```ts
 * buildKey(orders, { partitionKey: "c-1", sortKey: "7" });
 * // => { success: true, data: { customerId: { S: "c-1" }, orderNumber: { N: "7" } } }
 * ```
 */
export const buildKey = (
  table: TableDefinition,
  key: Key,
): Result<AttributeMap, DynamoError> => {
  const entries: Array<[string, AttributeValue]> = [
    [table.partitionKey.name, keyValue(table.partitionKey, key.partitionKey)],
  ];

  if (table.sortKey) {
    if (key.sortKey === undefined) {
      return err(
        validationError(
          "InvalidKey",
          `Table "${table.tableName}" requires a value for sort key "${table.sortKey.name}"`,
        ),
      );
    }
    entries.push([table.sortKey.name, keyValue(table.sortKey, key.sortKey)]);
  } else if (key.sortKey !== undefined) {
    return err(
      validationError(
        "InvalidKey",
        `Table "${table.tableName}" has no sort key`,
      ),
    );
  }

  return ok(Object.fromEntries(entries));
};
