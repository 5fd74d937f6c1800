/**
 * Encodes attributes and items into the DynamoDB JSON wire format.
 */

import type { Attribute, AttributeMap, AttributeValue } from "./types.js";

/**
 * Encodes one attribute as its single-key tagged wire object.
 *
 * - `S` / `N` / `B` -> `{ S: "..." }`, `{ N: "..." }`, `{ B: "..." }`
 * - `SS` / `NS` / `BS` -> `{ SS: [...] }`, `{ NS: [...] }`, `{ BS: [...] }`
 */
export const marshallAttribute = (attribute: Attribute): AttributeValue => {
  switch (attribute.type) {
    case "S":
      return { S: attribute.value };
    case "N":
      return { N: attribute.value };
    case "B":
      return { B: attribute.value };
    case "SS":
      return { SS: [...attribute.values] };
    case "NS":
      return { NS: [...attribute.values] };
    case "BS":
      return { BS: [...attribute.values] };
  }
};

/**
 * Encodes attributes as an attribute-name to wire-attribute map.
 * A repeated name keeps its last value.
 */
export const marshallAttributes = (
  attributes: Iterable<Attribute>,
): AttributeMap =>
  Object.fromEntries(
    Array.from(attributes, (attribute): [string, AttributeValue] => [
      attribute.name,
      marshallAttribute(attribute),
    ]),
  );

/** Encodes an item (anything exposing its attributes) as an {@link AttributeMap}. */
export const marshallItem = (item: {
  readonly attributes: () => readonly Attribute[];
}): AttributeMap => marshallAttributes(item.attributes());
