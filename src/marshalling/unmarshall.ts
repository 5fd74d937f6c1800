/**
 * Decodes DynamoDB JSON wire attributes back into typed attributes.
 */

import { z } from "zod";
import type { Attribute, AttributeType } from "./types.js";
import { ATTRIBUTE_TYPES } from "./types.js";
import type { Item } from "../types/item.js";
import { createItem } from "../core/create-item.js";
import { type Result, ok } from "../types/common.js";
import type { DynamoError } from "../types/errors.js";
import { type Logger, silentLogger } from "../utils/logger.js";
import { expectObject } from "./response.js";

const scalarSchema = z.string();
const setSchema = z.array(z.string());

/**
 * Decodes the value under one tag. A set holding anything but strings does
 * not decode at all: the whole field is rejected rather than decoded with
 * blanks in place of the bad elements.
 */
const decodeTagged = (
  name: string,
  type: AttributeType,
  tagged: unknown,
): Attribute | undefined => {
  switch (type) {
    case "S":
    case "N":
    case "B": {
      const parsed = scalarSchema.safeParse(tagged);
      return parsed.success
        ? Object.freeze({ type, name, value: parsed.data })
        : undefined;
    }
    case "SS":
    case "NS":
    case "BS": {
      const parsed = setSchema.safeParse(tagged);
      return parsed.success
        ? Object.freeze({ type, name, values: Object.freeze(parsed.data) })
        : undefined;
    }
  }
};

/**
 * Decodes one wire attribute.
 *
 * Tags are probed in the order S, N, B, SS, NS, BS; the first tag that is
 * present with a value of the right shape wins. Returns `undefined` when
 * `raw` is not an object or carries no usable tag.
 *
 * @example
 * ```ts
 * unmarshallAttribute("tags", { SS: ["a", "b"] });
 * // => { type: "SS", name: "tags", values: ["a", "b"] }
 * ```
 */
export const unmarshallAttribute = (
  name: string,
  raw: unknown,
): Attribute | undefined => {
  const fields = expectObject(raw);
  if (!fields.success) return undefined;

  for (const type of ATTRIBUTE_TYPES) {
    if (!Object.hasOwn(fields.data, type)) continue;
    const attribute = decodeTagged(name, type, fields.data[type]);
    if (attribute) return attribute;
  }
  return undefined;
};

/**
 * Decodes an attribute-name to wire-attribute object into an {@link Item}.
 *
 * `raw` itself must be an object, otherwise the decode fails with a
 * `malformed-response` error. Individual fields that don't decode are
 * logged and skipped; the rest of the item is kept.
 */
export const unmarshallItem = (
  raw: unknown,
  logger: Logger = silentLogger,
): Result<Item, DynamoError> => {
  const fields = expectObject(raw);
  if (!fields.success) return fields;

  const item = createItem();
  for (const [name, value] of Object.entries(fields.data)) {
    const attribute = unmarshallAttribute(name, value);
    if (attribute) {
      item.addAttribute(attribute);
    } else {
      logger.warn("Skipping attribute with unrecognized wire format", {
        attribute: name,
        value,
      });
    }
  }
  return ok(item);
};
