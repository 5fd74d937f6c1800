/**
 * Shared test fixtures used across all test files.
 */

import { vi } from "vitest";
import { defineTable } from "../core/define-table.js";
import { createItem } from "../core/create-item.js";
import type { Transport } from "../adapters/adapter.js";
import type { Logger } from "../utils/logger.js";
import type { Item } from "../types/item.js";
import { numberAttribute, stringAttribute } from "../marshalling/types.js";

// ---------------------------------------------------------------------------
// Table definitions
// ---------------------------------------------------------------------------

/** Simple primary key: numeric partition key only. */
export const productsTable = defineTable({
  tableName: "Products",
  partitionKey: { name: "id", type: "N" },
});

/** Composite primary key. */
export const ordersTable = defineTable({
  tableName: "Orders",
  partitionKey: { name: "customerId", type: "S" },
  sortKey: { name: "orderNumber", type: "N" },
});

// ---------------------------------------------------------------------------
// Mock transport and logger
// ---------------------------------------------------------------------------

export const createMockTransport = (body = "{}") => {
  const send = vi.fn<Transport["send"]>().mockResolvedValue(body);
  const transport: Transport = { send };
  return { transport, send };
};

export const createMockLogger = () => {
  const logger = {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  };
  return logger satisfies Logger;
};

// ---------------------------------------------------------------------------
// Sample data
// ---------------------------------------------------------------------------

export const productItem = (id: string, description = "lorem"): Item =>
  createItem()
    .addAttribute(numberAttribute("id", id))
    .addAttribute(stringAttribute("description", description));

/** An item whose only attribute is a string of `bytes` ASCII characters. */
export const itemOfSize = (bytes: number): Item =>
  createItem().addAttribute(stringAttribute("payload", "a".repeat(bytes)));
