import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createClient } from "../../core/create-client.js";
import { createBatchWriteRequest } from "../../operations/batch-write.js";
import { numberAttribute, stringSetAttribute } from "../../marshalling/types.js";
import {
  createMockLogger,
  createMockTransport,
  ordersTable,
  productItem,
  productsTable,
} from "../fixtures.js";

describe("createClient()", () => {
  let mock: ReturnType<typeof createMockTransport>;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    mock = createMockTransport();
    logger = createMockLogger();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("binds a table definition", () => {
    const client = createClient({ transport: mock.transport, logger });
    expect(client.table(productsTable).definition).toBe(productsTable);
  });

  it("routes getItem through the transport with read options", async () => {
    mock.send.mockResolvedValueOnce('{"Item": {"id": {"N": "1"}}}');
    const products = createClient({ transport: mock.transport, logger }).table(productsTable);

    const result = await products.getItem({ partitionKey: "1" }, { consistentRead: true });

    expect(mock.send).toHaveBeenCalledWith("GetItem", {
      TableName: "Products",
      Key: { id: { N: "1" } },
      ConsistentRead: true,
    });
    expect(result.success).toBe(true);
  });

  it("routes putItem and deleteItem", async () => {
    const products = createClient({ transport: mock.transport, logger }).table(productsTable);

    await products.putItem(productItem("1"));
    await products.deleteItem({ partitionKey: "1" });

    expect(mock.send.mock.calls.map(([operation]) => operation)).toEqual(["PutItem", "DeleteItem"]);
  });

  it("routes the attribute updates with their actions", async () => {
    const products = createClient({ transport: mock.transport, logger }).table(productsTable);
    const key = { partitionKey: "1" };

    await products.addAttributes(key, [numberAttribute("stock", "2")]);
    await products.updateAttributes(key, [numberAttribute("stock", "9")]);
    await products.deleteAttributes(key, [stringSetAttribute("tags", ["old"])]);

    expect(mock.send.mock.calls.map(([, payload]) => payload["AttributeUpdates"])).toEqual([
      { stock: { Action: "ADD", Value: { N: "2" } } },
      { stock: { Action: "PUT", Value: { N: "9" } } },
      { tags: { Action: "DELETE", Value: { SS: ["old"] } } },
    ]);
  });

  it("starts a batch get from a table and sends it", async () => {
    mock.send.mockResolvedValueOnce('{"Responses": {"Products": [], "Orders": []}}');
    const client = createClient({ transport: mock.transport, logger });
    const batch = client
      .table(productsTable)
      .batchGetItems([{ partitionKey: "1" }])
      .addTable(ordersTable, [{ partitionKey: "c-1", sortKey: "7" }]);

    const result = await client.batchGetItem(batch, { consistentRead: false });

    expect(mock.send).toHaveBeenCalledWith("BatchGetItem", {
      RequestItems: {
        Products: { Keys: [{ id: { N: "1" } }], ConsistentRead: false },
        Orders: {
          Keys: [{ customerId: { S: "c-1" }, orderNumber: { N: "7" } }],
          ConsistentRead: false,
        },
      },
    });
    expect(result).toMatchObject({
      success: true,
      data: { responses: { Products: [], Orders: [] }, unprocessedKeys: {} },
    });
  });

  it("sends batch writes with the configured logger", async () => {
    mock.send.mockResolvedValueOnce('{"UnprocessedItems": {}}');
    const client = createClient({ transport: mock.transport, logger });
    const request = createBatchWriteRequest()
      .addPutRequest("Products", productItem("1"))
      .setReturnConsumedCapacity(true);

    const result = await client.table(productsTable).batchWriteItem(request);

    expect(result).toEqual({ success: true, data: {} });
    expect(logger.warn).toHaveBeenCalledWith(
      "ReturnConsumedCapacity is sent but the consumed capacity in the response is not decoded",
    );
  });

  it("logs failures to the console when no logger is given", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    mock.send.mockRejectedValueOnce(new Error("unreachable"));

    const result = await createClient({ transport: mock.transport })
      .table(productsTable)
      .deleteItem({ partitionKey: "1" });

    expect(result.success).toBe(false);
    expect(error).toHaveBeenCalledTimes(1);
    expect(debug).not.toHaveBeenCalled();
  });
});
