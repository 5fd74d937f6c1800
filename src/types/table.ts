/**
 * Table definition types: the table name and its primary key schema.
 */

import type { ScalarAttributeType } from "../marshalling/types.js";

/** DynamoDB key attribute type. Keys are always scalar. */
export type KeyAttributeType = ScalarAttributeType;

/** A key attribute of a table's primary key. */
export interface KeyAttribute {
  readonly name: string;
  readonly type: KeyAttributeType;
}

/** Configuration input for `defineTable()`. */
export interface TableConfig {
  readonly tableName: string;
  readonly partitionKey: KeyAttribute;
  readonly sortKey?: KeyAttribute | undefined;
}

/** The frozen table definition produced by `defineTable()`. */
export interface TableDefinition {
  readonly tableName: string;
  readonly partitionKey: KeyAttribute;
  readonly sortKey?: KeyAttribute | undefined;
}
