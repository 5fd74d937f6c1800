/**
 * Attribute types and their DynamoDB JSON wire representation.
 *
 * Numbers stay as decimal strings end to end, so arbitrary precision
 * survives a round trip. Binary values are the base64 text the JSON
 * protocol carries.
 */

/** Type tags of single-valued attributes. */
export type ScalarAttributeType = "S" | "N" | "B";

/** Type tags of set-valued attributes. */
export type SetAttributeType = "SS" | "NS" | "BS";

/** Every attribute type tag the codec understands. */
export type AttributeType = ScalarAttributeType | SetAttributeType;

/** A named single-valued attribute. */
export interface ScalarAttribute {
  readonly type: ScalarAttributeType;
  readonly name: string;
  readonly value: string;
}

/** A named set-valued attribute. Element order is preserved. */
export interface SetAttribute {
  readonly type: SetAttributeType;
  readonly name: string;
  readonly values: readonly string[];
}

/** One named, typed value (or set of values) belonging to an item. */
export type Attribute = ScalarAttribute | SetAttribute;

/** A wire attribute: a single-key object tagged with the attribute type. */
export type AttributeValue =
  | { readonly S: string }
  | { readonly N: string }
  | { readonly B: string }
  | { readonly SS: readonly string[] }
  | { readonly NS: readonly string[] }
  | { readonly BS: readonly string[] };

/** Attribute name to wire attribute, as found under `Item`, `Key` and friends. */
export type AttributeMap = Readonly<Record<string, AttributeValue>>;

/** Type tags in the order the decoder probes them. */
export const ATTRIBUTE_TYPES: readonly AttributeType[] = Object.freeze([
  "S",
  "N",
  "B",
  "SS",
  "NS",
  "BS",
]);

export const isSetAttribute = (attribute: Attribute): attribute is SetAttribute =>
  attribute.type === "SS" || attribute.type === "NS" || attribute.type === "BS";

export const stringAttribute = (name: string, value: string): ScalarAttribute =>
  Object.freeze({ type: "S" as const, name, value });

/** `value` is the decimal text of the number, e.g. `"42"` or `"-1.5e3"`. */
export const numberAttribute = (name: string, value: string): ScalarAttribute =>
  Object.freeze({ type: "N" as const, name, value });

/** `value` is base64 text. */
export const binaryAttribute = (name: string, value: string): ScalarAttribute =>
  Object.freeze({ type: "B" as const, name, value });

export const stringSetAttribute = (
  name: string,
  values: readonly string[],
): SetAttribute =>
  Object.freeze({ type: "SS" as const, name, values: Object.freeze([...values]) });

export const numberSetAttribute = (
  name: string,
  values: readonly string[],
): SetAttribute =>
  Object.freeze({ type: "NS" as const, name, values: Object.freeze([...values]) });

export const binarySetAttribute = (
  name: string,
  values: readonly string[],
): SetAttribute =>
  Object.freeze({ type: "BS" as const, name, values: Object.freeze([...values]) });
