/**
 * Factory function for creating immutable table definitions.
 */

import type { TableConfig, TableDefinition } from "../types/table.js";

/**
 * Defines a DynamoDB table by name and primary key schema.
 *
 * @returns A frozen {@link TableDefinition} object
 *
 * @example
 * ```ts
 * const orders = defineTable({
 *   tableName: "Orders",
 *   partitionKey: { name: "customerId", type: "S" },
 *   sortKey: { name: "orderNumber", type: "N" },
 * });
 * ```
 */
export const defineTable = (config: TableConfig): TableDefinition =>
  Object.freeze({
    tableName: config.tableName,
    partitionKey: Object.freeze({ ...config.partitionKey }),
    sortKey: config.sortKey ? Object.freeze({ ...config.sortKey }) : undefined,
  });
