import { describe, it, expect, beforeEach } from "vitest";
import {
  buildAttributeUpdates,
  executeAddAttributes,
  executeDeleteAttributes,
  executeUpdate,
  executeUpdateAttributes,
  type UpdateAction,
} from "../../operations/update.js";
import {
  numberAttribute,
  numberSetAttribute,
  stringAttribute,
  stringSetAttribute,
} from "../../marshalling/types.js";
import { createMockTransport, productsTable } from "../fixtures.js";

describe("buildAttributeUpdates()", () => {
  it("pairs each attribute with the action and its wire value", () => {
    expect(
      buildAttributeUpdates([numberAttribute("stock", "5"), stringSetAttribute("tags", ["new"])], "ADD"),
    ).toEqual({
      stock: { Action: "ADD", Value: { N: "5" } },
      tags: { Action: "ADD", Value: { SS: ["new"] } },
    });
  });

  it("omits Value when deleting a scalar attribute", () => {
    expect(buildAttributeUpdates([stringAttribute("description", "")], "DELETE")).toEqual({
      description: { Action: "DELETE" },
    });
  });

  it("keeps Value when deleting elements of a set", () => {
    expect(buildAttributeUpdates([stringSetAttribute("tags", ["old"])], "DELETE")).toEqual({
      tags: { Action: "DELETE", Value: { SS: ["old"] } },
    });
  });

  it("keeps an attribute named __proto__", () => {
    const updates = buildAttributeUpdates([stringAttribute("__proto__", "x")], "PUT");
    expect(JSON.stringify(updates)).toBe('{"__proto__":{"Action":"PUT","Value":{"S":"x"}}}');
  });
});

describe("executeUpdate()", () => {
  let mock: ReturnType<typeof createMockTransport>;

  beforeEach(() => {
    mock = createMockTransport();
  });

  it("sends UpdateItem with the key and attribute updates", async () => {
    const result = await executeUpdate(
      mock.transport,
      productsTable,
      { partitionKey: "1" },
      [stringAttribute("description", "ipsum")],
      "PUT",
    );
    expect(result).toEqual({ success: true, data: true });
    expect(mock.send).toHaveBeenCalledWith("UpdateItem", {
      TableName: "Products",
      Key: { id: { N: "1" } },
      AttributeUpdates: { description: { Action: "PUT", Value: { S: "ipsum" } } },
    });
  });

  it("rejects an empty attribute list without sending", async () => {
    const result = await executeUpdate(mock.transport, productsTable, { partitionKey: "1" }, [], "ADD");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatchObject({ type: "validation", code: "MissingAttributes" });
    }
    expect(mock.send).not.toHaveBeenCalled();
  });

  it("returns a transport error when the transport rejects", async () => {
    mock.send.mockRejectedValueOnce(new Error("ConditionalCheckFailed"));
    const result = await executeUpdate(
      mock.transport,
      productsTable,
      { partitionKey: "1" },
      [numberAttribute("stock", "1")],
      "ADD",
    );
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.type).toBe("transport");
  });

  it("accepts an array acknowledgement", async () => {
    mock.send.mockResolvedValueOnce("[]");
    const result = await executeUpdate(
      mock.transport,
      productsTable,
      { partitionKey: "1" },
      [numberAttribute("stock", "1")],
      "ADD",
    );
    expect(result).toEqual({ success: true, data: true });
  });
});

describe("update wrappers", () => {
  const wrappers: Array<[string, typeof executeAddAttributes, UpdateAction]> = [
    ["executeAddAttributes", executeAddAttributes, "ADD"],
    ["executeUpdateAttributes", executeUpdateAttributes, "PUT"],
    ["executeDeleteAttributes", executeDeleteAttributes, "DELETE"],
  ];

  it.each(wrappers)("%s sends its action", async (_name, execute, action) => {
    const mock = createMockTransport();
    await execute(mock.transport, productsTable, { partitionKey: "1" }, [
      numberSetAttribute("sizes", ["42"]),
    ]);
    expect(mock.send.mock.calls[0]?.[1]).toMatchObject({
      AttributeUpdates: { sizes: { Action: action, Value: { NS: ["42"] } } },
    });
  });

  it("rejects an empty attribute list in every wrapper", async () => {
    const mock = createMockTransport();
    for (const execute of [executeAddAttributes, executeUpdateAttributes, executeDeleteAttributes]) {
      const result = await execute(mock.transport, productsTable, { partitionKey: "1" }, []);
      expect(result.success).toBe(false);
    }
    expect(mock.send).not.toHaveBeenCalled();
  });
});
