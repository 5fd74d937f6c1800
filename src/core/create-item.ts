/**
 * Factory for the mutable item builder.
 */

import type { Attribute } from "../marshalling/types.js";
import type { Item } from "../types/item.js";

const encoder = new TextEncoder();

/** UTF-8 byte length of a string. */
export const byteLength = (value: string): number => encoder.encode(value).length;

const isMap = (
  source: ReadonlyMap<string, Attribute> | Readonly<Record<string, Attribute>>,
): source is ReadonlyMap<string, Attribute> => source instanceof Map;

/**
 * Creates an empty item.
 *
 * @example
 * ```ts
 * const item = createItem()
 *   .addAttribute(numberAttribute("id", "1"))
 *   .addAttribute(stringAttribute("description", "lorem"));
 * ```
 */
export const createItem = (initial?: Iterable<Attribute>): Item => {
  const attributes: Attribute[] = initial ? [...initial] : [];

  const item: Item = Object.freeze({
    addAttribute: (attribute: Attribute) => {
      attributes.push(attribute);
      return item;
    },

    addAttributes: (more: Iterable<Attribute>) => {
      for (const attribute of more) attributes.push(attribute);
      return item;
    },

    addAttributesFromMap: (
      map: ReadonlyMap<string, Attribute> | Readonly<Record<string, Attribute>>,
    ) => {
      const values: Iterable<Attribute> = isMap(map) ? map.values() : Object.values(map);
      for (const attribute of values) attributes.push(attribute);
      return item;
    },

    attributes: () => Object.freeze([...attributes]),

    getAttribute: (name: string) => attributes.find((a) => a.name === name),

    size: () => {
      let total = 0;
      for (const attribute of attributes) {
        if ("value" in attribute) total += byteLength(attribute.value);
      }
      return total;
    },
  });

  return item;
};
