/**
 * dynamo-items: typed DynamoDB item, batch-write and batch-get bindings.
 *
 * Attributes and items are built client-side, encoded into DynamoDB's JSON
 * wire format and sent through a pluggable {@link Transport}. Every
 * operation returns a {@link Result} instead of throwing.
 *
 * @example
 * ```ts
 * import {
 *   createClient, defineTable, createItem, createBatchWriteRequest,
 *   numberAttribute, stringAttribute,
 * } from "dynamo-items";
 * import { createSDKv3Transport } from "dynamo-items/adapters/sdk-v3";
 *
 * const client = createClient({ transport: createSDKv3Transport(sdkClient, commands) });
 *
 * const request = createBatchWriteRequest()
 *   .addPutRequest("Orders", createItem()
 *     .addAttribute(numberAttribute("id", "1"))
 *     .addAttribute(stringAttribute("description", "lorem")));
 *
 * const result = await client.batchWriteItem(request);
 * if (result.success) {
 *   // result.data holds the unprocessed items, per table and operation kind
 * }
 * ```
 */

// Core factory functions
export { defineTable } from "./core/define-table.js";
export { createItem } from "./core/create-item.js";
export { createClient } from "./core/create-client.js";

// Core types
export type { TableConfig, TableDefinition, KeyAttribute, KeyAttributeType } from "./types/table.js";
export type { Key } from "./types/key.js";
export type { Item } from "./types/item.js";
export type { ClientConfig, TableClient, DynamoClient } from "./core/create-client.js";

// Attributes and marshalling
export {
  stringAttribute,
  numberAttribute,
  binaryAttribute,
  stringSetAttribute,
  numberSetAttribute,
  binarySetAttribute,
  isSetAttribute,
} from "./marshalling/types.js";
export type {
  Attribute,
  ScalarAttribute,
  SetAttribute,
  AttributeType,
  ScalarAttributeType,
  SetAttributeType,
  AttributeValue,
  AttributeMap,
} from "./marshalling/types.js";
export { marshallAttribute, marshallAttributes, marshallItem } from "./marshalling/marshall.js";
export { unmarshallAttribute, unmarshallItem } from "./marshalling/unmarshall.js";
export { buildKey } from "./keys/key-builder.js";

// Single-item operations
export { executeGet, type GetOptions } from "./operations/get.js";
export { executePut, type PutOptions } from "./operations/put.js";
export { executeDelete, type DeleteOptions } from "./operations/delete.js";
export {
  executeUpdate,
  executeAddAttributes,
  executeUpdateAttributes,
  executeDeleteAttributes,
  buildAttributeUpdates,
  type UpdateAction,
  type AttributeUpdate,
  type UpdateOptions,
} from "./operations/update.js";

// Batch operations
export {
  createBatchWriteRequest,
  validateBatchWriteRequest,
  buildBatchWritePayload,
  parseBatchWriteResponse,
  executeBatchWrite,
  BATCH_WRITE_MAX_ITEMS,
  ITEM_SIZE_LIMIT,
  BATCH_WRITE_SIZE_LIMIT,
  type BatchWriteRequest,
  type TableWriteOperations,
  type UnprocessedItems,
  type BatchWriteOptions,
} from "./operations/batch-write.js";
export {
  createBatchGet,
  buildBatchGetPayload,
  parseBatchGetResponse,
  executeBatchGet,
  type BatchGet,
  type BatchGetTable,
  type BatchGetOptions,
  type BatchGetResult,
} from "./operations/batch-get.js";

// Result type and errors
export { type Result, ok, err, mapResult, mapError, flatMapResult } from "./types/common.js";
export {
  validationError,
  notFoundError,
  malformedResponseError,
  transportError,
  type DynamoError,
  type ValidationCode,
  type ValidationFailure,
  type NotFoundFailure,
  type MalformedResponseFailure,
  type TransportFailure,
} from "./types/errors.js";

// Logging
export { createConsoleLogger, silentLogger, type Logger, type LogLevel, type LogContext } from "./utils/logger.js";

// Transport type (for custom transports)
export type { Transport, DynamoOperation, RequestPayload } from "./adapters/adapter.js";
